import type { LLMMessage, LLMChatCompletionResponse, ExecutionOptions, RequestContext } from './types';
import { getClient, runChatCompletion } from './openai';
import { PROVIDER_CONFIG, REQUEST_TIMEOUTS } from './config';
import { isDebugEnabled } from './env';
import { extractErrorMessage } from '../../utils/error-utils';

// Ollama serves an OpenAI-compatible API under /v1
export function ollamaApiUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/v1`;
}

/**
 * Generate a chat completion on a local (or LAN) Ollama host
 */
export async function chatCompletion(
  messages: LLMMessage[],
  config: ExecutionOptions,
  context: RequestContext = {}
): Promise<LLMChatCompletionResponse> {
  const baseUrl = config.baseUrl ?? PROVIDER_CONFIG.OLLAMA.DEFAULT_BASE_URL;
  const client = getClient(PROVIDER_CONFIG.OLLAMA.API_KEY_PLACEHOLDER, ollamaApiUrl(baseUrl), config.timeoutMs);
  return runChatCompletion(client, 'ollama', messages, config, context);
}

/**
 * Names of the models an Ollama host reports. An unreachable host yields an empty list.
 */
export async function listOllamaModels(baseUrl: string = PROVIDER_CONFIG.OLLAMA.DEFAULT_BASE_URL): Promise<string[]> {
  const client = getClient(PROVIDER_CONFIG.OLLAMA.API_KEY_PLACEHOLDER, ollamaApiUrl(baseUrl), REQUEST_TIMEOUTS.MODEL_LIST_MS);
  try {
    const models: string[] = [];
    for await (const model of client.models.list()) {
      models.push(model.id);
    }
    return models;
  } catch (error) {
    if (isDebugEnabled()) {
      console.warn(`Could not list Ollama models at ${baseUrl}: ${extractErrorMessage(error)}`);
    }
    return [];
  }
}
