import Anthropic from '@anthropic-ai/sdk';
import type { LLMMessage, LLMChatCompletionResponse, ExecutionOptions, RequestContext } from './types';
import { logLLMRequest } from './logger';
import { calculateCost } from './pricing';
import { PROVIDER_CONFIG, REQUEST_TIMEOUTS, TOKEN_LIMITS } from './config';
import { ConfigurationError, ProviderError, extractErrorMessage } from '../../utils/error-utils';

const clients = new Map<string, Anthropic>();

function getClient(apiKey: string, timeoutMs: number = REQUEST_TIMEOUTS.COMPLETION_MS): Anthropic {
  const cacheKey = `${apiKey}|${timeoutMs}`;
  let client = clients.get(cacheKey);
  if (!client) {
    client = new Anthropic({
      apiKey,
      baseURL: PROVIDER_CONFIG.ANTHROPIC.API_BASE_URL,
      timeout: timeoutMs,
      maxRetries: 1
    });
    clients.set(cacheKey, client);
  }
  return client;
}

/**
 * Generate a chat completion using Anthropic Claude
 */
export async function chatCompletion(
  messages: LLMMessage[],
  config: ExecutionOptions,
  context: RequestContext = {}
): Promise<LLMChatCompletionResponse> {
  if (!config.apiKey) {
    throw new ConfigurationError('Anthropic API key not configured. Run: agentsteam config --anthropic-key YOUR_KEY');
  }

  const startTime = Date.now();
  const model = config.model;
  const temperature = config.temperature ?? 0.7;
  const maxTokens = config.maxTokens ?? TOKEN_LIMITS.CHAT;

  const promptText = messages.map(m => m.content).join(' ');
  const tokensPrompt = Math.round(promptText.length / 4);

  // Anthropic takes the system prompt separately and only user/assistant turns
  const system = messages
    .filter(m => m.role === 'system')
    .map(m => m.content)
    .join('\n\n');
  const turns: Anthropic.MessageParam[] = messages
    .filter(m => m.role !== 'system')
    .map((m): Anthropic.MessageParam => ({
      role: m.role === 'assistant' ? 'assistant' : 'user',
      content: m.content
    }));

  try {
    const response = await getClient(config.apiKey, config.timeoutMs).messages.create({
      model,
      system: system || undefined,
      messages: turns,
      temperature,
      max_tokens: maxTokens
    });
    const durationMs = Date.now() - startTime;

    const content = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
    const tokenUsage = {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens
    };
    const costUsd = calculateCost('anthropic', model, tokenUsage.promptTokens, tokenUsage.completionTokens);

    await logLLMRequest({
      provider: 'anthropic',
      model,
      operation: context.operation || 'chat',
      prompt: messages,
      response: content,
      tokenUsage,
      costUsd,
      durationMs,
      context
    });

    return {
      content,
      tokenUsage,
      model,
      provider: 'anthropic',
      durationMs,
      finishReason: response.stop_reason ?? undefined
    };
  } catch (error: unknown) {
    const errorMessage = extractErrorMessage(error);
    await logLLMRequest({
      provider: 'anthropic',
      model,
      operation: context.operation || 'chat',
      prompt: messages,
      tokenUsage: { promptTokens: tokensPrompt, completionTokens: 0, totalTokens: tokensPrompt },
      costUsd: 0,
      durationMs: Date.now() - startTime,
      status: 'error',
      error: errorMessage,
      context
    });
    throw new ProviderError(`Anthropic chat completion failed: ${errorMessage}`, 'anthropic', model);
  }
}
