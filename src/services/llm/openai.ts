import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions';
import type { LLMMessage, LLMChatCompletionResponse, ExecutionOptions, RequestContext } from './types';
import { logLLMRequest } from './logger';
import { calculateCost } from './pricing';
import { DEFAULT_TOP_P, PROVIDER_CONFIG, REQUEST_TIMEOUTS, TOKEN_LIMITS } from './config';
import { ConfigurationError, ProviderError, extractErrorMessage } from '../../utils/error-utils';

type OpenAICompatibleProvider = 'openai' | 'ollama';

const clients = new Map<string, OpenAI>();

/**
 * Clients are cached per endpoint and key so repeated calls share connections
 */
export function getClient(apiKey: string, baseURL?: string, timeoutMs: number = REQUEST_TIMEOUTS.COMPLETION_MS): OpenAI {
  const cacheKey = `${baseURL ?? 'default'}|${apiKey}|${timeoutMs}`;
  let client = clients.get(cacheKey);
  if (!client) {
    client = new OpenAI({
      apiKey,
      baseURL,
      organization: baseURL ? undefined : PROVIDER_CONFIG.OPENAI.ORGANIZATION_ID,
      timeout: timeoutMs,
      maxRetries: 1
    });
    clients.set(cacheKey, client);
  }
  return client;
}

function toOpenAIMessages(messages: LLMMessage[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'assistant':
        return { role: 'assistant', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
    }
  });
}

// o-series reasoning models take max_completion_tokens and no sampling settings
function isReasoningModel(model: string): boolean {
  return /^o\d/.test(model);
}

/**
 * Chat completion against any OpenAI-compatible endpoint. Used directly for
 * OpenAI and through ./ollama for a local Ollama host.
 */
export async function runChatCompletion(
  client: OpenAI,
  provider: OpenAICompatibleProvider,
  messages: LLMMessage[],
  config: ExecutionOptions,
  context: RequestContext = {}
): Promise<LLMChatCompletionResponse> {
  const startTime = Date.now();
  const model = config.model;
  const temperature = config.temperature ?? 0.7;
  const topP = config.topP ?? DEFAULT_TOP_P;
  const maxTokens = config.maxTokens ?? TOKEN_LIMITS.CHAT;

  // Rough estimate for logging if the API does not report usage
  const promptText = messages.map(m => m.content).join(' ');
  const tokensPrompt = Math.round(promptText.length / 4);

  const params: ChatCompletionCreateParamsNonStreaming = isReasoningModel(model) && provider === 'openai'
    ? { model, messages: toOpenAIMessages(messages), max_completion_tokens: maxTokens }
    : { model, messages: toOpenAIMessages(messages), temperature, top_p: topP, max_tokens: maxTokens };

  try {
    const response = await client.chat.completions.create(params);
    const durationMs = Date.now() - startTime;
    const choice = response.choices[0];
    const content = choice?.message.content ?? '';

    const promptTokens = response.usage?.prompt_tokens ?? tokensPrompt;
    const completionTokens = response.usage?.completion_tokens ?? Math.round(content.length / 4);
    const tokenUsage = {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens
    };
    const costUsd = calculateCost(provider, model, promptTokens, completionTokens);

    await logLLMRequest({
      provider,
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
      provider,
      durationMs,
      finishReason: choice?.finish_reason
    };
  } catch (error: unknown) {
    const errorMessage = extractErrorMessage(error);
    await logLLMRequest({
      provider,
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

    const label = provider === 'ollama' ? 'Ollama' : 'OpenAI';
    throw new ProviderError(`${label} chat completion failed: ${errorMessage}`, provider, model);
  }
}

/**
 * Generate a chat completion using OpenAI
 */
export async function chatCompletion(
  messages: LLMMessage[],
  config: ExecutionOptions,
  context: RequestContext = {}
): Promise<LLMChatCompletionResponse> {
  if (!config.apiKey) {
    throw new ConfigurationError('OpenAI API key not configured. Run: agentsteam config --openai-key YOUR_KEY');
  }
  const client = getClient(config.apiKey, config.baseUrl ?? PROVIDER_CONFIG.OPENAI.API_BASE_URL, config.timeoutMs);
  return runChatCompletion(client, 'openai', messages, config, context);
}
