import * as openai from './openai';
import * as ollama from './ollama';
import * as anthropic from './anthropic';
import type {
  LLMMessage,
  LLMChatCompletionResponse,
  RequestContext,
  ExecutionOptions
} from './types';

// Export all centralized modules
export * from './types';
export * from './prompts';
export * from './config';
export { calculateCost } from './pricing';
export { logLLMRequest, requestLogDir } from './logger';
export { listOllamaModels, ollamaApiUrl } from './ollama';

/**
 * Generate a chat completion with the provider named in the options.
 * Cloud providers fail fast with a ConfigurationError when no key is set.
 */
export async function chatCompletion(
  messages: LLMMessage[],
  options: ExecutionOptions,
  context: RequestContext = {}
): Promise<LLMChatCompletionResponse> {
  switch (options.provider) {
    case 'ollama':
      return ollama.chatCompletion(messages, options, context);
    case 'openai':
      return openai.chatCompletion(messages, options, context);
    case 'anthropic':
      return anthropic.chatCompletion(messages, options, context);
  }
}
