import type { ModelInfo } from '../../types/model';
import type { LLMMessage } from './types';
import { chatCompletion } from './index';
import { SYSTEM_PROMPTS } from './prompts';
import { TEMPERATURE_SETTINGS, TOKEN_LIMITS } from './config';

export interface GenerateOptions {
  system?: string;
  // Swap in a system prompt that forbids prose around the code
  codeOnly?: boolean;
  temperature?: number;
  maxTokens?: number;
  operation?: string;
  history?: LLMMessage[];
}

/**
 * Anything that turns a prompt into text. The builder, generator and
 * corrector depend on this rather than on a provider.
 */
export interface TextGenerator {
  readonly info: ModelInfo;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface ModelCredentials {
  apiKey?: string;
  baseUrl?: string;
}

export class ModelClient implements TextGenerator {
  constructor(
    readonly info: ModelInfo,
    private readonly credentials: ModelCredentials = {}
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const system = options.codeOnly
      ? SYSTEM_PROMPTS.CODE_ONLY
      : options.system ?? SYSTEM_PROMPTS.ASSISTANT;

    const messages: LLMMessage[] = [
      { role: 'system', content: system },
      ...(options.history ?? []),
      { role: 'user', content: prompt }
    ];

    const response = await chatCompletion(
      messages,
      {
        provider: this.info.provider,
        model: this.info.model,
        apiKey: this.credentials.apiKey,
        baseUrl: this.credentials.baseUrl ?? this.info.baseUrl,
        temperature: options.temperature ?? TEMPERATURE_SETTINGS.CODE_GENERATION,
        maxTokens: options.maxTokens ?? TOKEN_LIMITS.CODE_GENERATION
      },
      { operation: options.operation }
    );
    return response.content;
  }
}
