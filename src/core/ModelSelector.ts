import { z } from 'zod';
import preferenceTable from '../config/model-preferences.json';
import type { CloudTier, Complexity, ModelInfo, Provider, ProviderMode } from '../types/model';
import { isProvider } from '../types/model';
import type { ConfigStore } from '../config/store';
import { DEFAULT_MODELS, listOllamaModels } from '../services/llm';
import { ModelClient } from '../services/llm/model-client';
import type { TextGenerator } from '../services/llm/model-client';
import { ConfigurationError, ModelUnavailableError } from '../utils/error-utils';

const PreferencesSchema = z.object({
  large: z.array(z.string()),
  small: z.array(z.string())
});

const preferences = PreferencesSchema.parse(preferenceTable);

export type ModelLister = (baseUrl: string) => Promise<string[]>;

export const CLOUD_MODELS: Record<CloudTier, string> = {
  fast: DEFAULT_MODELS.CLOUD_FAST,
  balanced: DEFAULT_MODELS.CLOUD_BALANCED,
  powerful: DEFAULT_MODELS.CLOUD_POWERFUL
};

const COMPLEXITY_TIERS: Record<Complexity, CloudTier> = {
  simple: 'fast',
  medium: 'balanced',
  complex: 'powerful'
};

/**
 * First available model containing a preferred name (case-insensitive),
 * walking the preference list in order; otherwise the first available model.
 */
export function pickPreferredModel(available: string[], preferred: string[]): string | null {
  if (available.length === 0) {
    return null;
  }
  for (const wanted of preferred) {
    const needle = wanted.toLowerCase();
    const match = available.find(name => name.toLowerCase().includes(needle));
    if (match) {
      return match;
    }
  }
  return available[0];
}

function guessProvider(model: string): Provider {
  const name = model.toLowerCase();
  if (name.startsWith('gpt-oss')) return 'ollama';
  if (/^(?:gpt-|chatgpt|o\d(?:-|$))/.test(name)) return 'openai';
  if (name.startsWith('claude')) return 'anthropic';
  return 'ollama';
}

/**
 * Parse `provider:model` or a bare model name. Only a known provider counts
 * as a prefix, so Ollama tags such as `qwen2.5-coder:7b` stay intact.
 */
export function parseModelString(value: string): ModelInfo {
  const trimmed = value.trim();
  const separator = trimmed.indexOf(':');
  if (separator > 0) {
    const prefix = trimmed.slice(0, separator).toLowerCase();
    if (isProvider(prefix)) {
      const model = trimmed.slice(separator + 1).trim();
      if (!model) {
        throw new ConfigurationError(`Missing model name after "${prefix}:"`);
      }
      return { provider: prefix, model };
    }
  }
  if (!trimmed) {
    throw new ConfigurationError('Model name is empty');
  }
  return { provider: guessProvider(trimmed), model: trimmed };
}

/**
 * Routes a task to a local Ollama model when one is installed and to a
 * cloud model otherwise, by task complexity.
 */
export class ModelSelector {
  mode: ProviderMode;
  private cachedModels: string[] | null = null;

  constructor(
    private readonly config: ConfigStore,
    private readonly listModels: ModelLister = listOllamaModels,
    mode: ProviderMode = 'auto'
  ) {
    this.mode = mode;
  }

  get ollamaUrl(): string {
    return this.config.ollamaUrl;
  }

  hasOpenAIKey(): boolean {
    return Boolean(this.config.openaiKey);
  }

  hasAnthropicKey(): boolean {
    return Boolean(this.config.anthropicKey);
  }

  setMode(mode: ProviderMode): void {
    this.mode = mode;
  }

  // Forget the cached model list, e.g. after the Ollama URL changed
  refresh(): void {
    this.cachedModels = null;
  }

  async getOllamaModels(refresh: boolean = false): Promise<string[]> {
    if (refresh || this.cachedModels === null) {
      this.cachedModels = await this.listModels(this.ollamaUrl);
    }
    return this.cachedModels;
  }

  async selectLocalModel(preferLarge: boolean): Promise<ModelInfo | null> {
    const available = await this.getOllamaModels();
    const model = pickPreferredModel(available, preferLarge ? preferences.large : preferences.small);
    return model ? { provider: 'ollama', model, baseUrl: this.ollamaUrl } : null;
  }

  selectCloudModel(tier: CloudTier): ModelInfo {
    if (!this.hasOpenAIKey()) {
      throw new ModelUnavailableError('OpenAI API key not configured. Run: agentsteam config --openai-key YOUR_KEY');
    }
    return { provider: 'openai', model: CLOUD_MODELS[tier] };
  }

  selectAnthropicModel(): ModelInfo {
    if (!this.hasAnthropicKey()) {
      throw new ModelUnavailableError('Anthropic API key not configured. Run: agentsteam config --anthropic-key YOUR_KEY');
    }
    return { provider: 'anthropic', model: DEFAULT_MODELS.ANTHROPIC_DEFAULT };
  }

  async selectModel(complexity: Complexity): Promise<ModelInfo> {
    const preferLarge = complexity !== 'simple';

    switch (this.mode) {
      case 'ollama': {
        const local = await this.selectLocalModel(preferLarge);
        if (!local) {
          throw new ModelUnavailableError(`No Ollama models available at ${this.ollamaUrl}. Pull one with: ollama pull qwen2.5-coder:7b`);
        }
        return local;
      }
      case 'openai':
        return this.selectCloudModel(COMPLEXITY_TIERS[complexity]);
      case 'anthropic':
        return this.selectAnthropicModel();
      case 'auto': {
        const local = await this.selectLocalModel(preferLarge);
        if (local) {
          return local;
        }
        if (!this.hasOpenAIKey() && this.hasAnthropicKey()) {
          return this.selectAnthropicModel();
        }
        return this.selectCloudModel(COMPLEXITY_TIERS[complexity]);
      }
    }
  }

  /**
   * Model used for file fixes: the medium-complexity choice, or null when nothing is available
   */
  async getBestModel(): Promise<ModelInfo | null> {
    try {
      return await this.selectModel('medium');
    } catch (error) {
      if (error instanceof ModelUnavailableError) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Resolve a user-supplied model string, falling back to complexity routing
   */
  async resolveModel(requested: string | undefined, complexity: Complexity): Promise<ModelInfo> {
    if (!requested) {
      return this.selectModel(complexity);
    }
    const info = parseModelString(requested);
    return info.provider === 'ollama' ? { ...info, baseUrl: this.ollamaUrl } : info;
  }

  createClient(info: ModelInfo): TextGenerator {
    switch (info.provider) {
      case 'ollama':
        return new ModelClient(info, { baseUrl: info.baseUrl ?? this.ollamaUrl });
      case 'openai':
        return new ModelClient(info, { apiKey: this.config.openaiKey });
      case 'anthropic':
        return new ModelClient(info, { apiKey: this.config.anthropicKey });
    }
  }
}
