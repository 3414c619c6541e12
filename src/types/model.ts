export type Provider = 'ollama' | 'openai' | 'anthropic';

export type ProviderMode = 'auto' | Provider;

export type Complexity = 'simple' | 'medium' | 'complex';

export type CloudTier = 'fast' | 'balanced' | 'powerful';

export const PROVIDERS: readonly Provider[] = ['ollama', 'openai', 'anthropic'];

export const PROVIDER_MODES: readonly ProviderMode[] = ['auto', ...PROVIDERS];

export const COMPLEXITY_LEVELS: readonly Complexity[] = ['simple', 'medium', 'complex'];

export interface ModelInfo {
  provider: Provider;
  model: string;
  // Only set for Ollama models
  baseUrl?: string;
}

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some(provider => provider === value);
}

export function isProviderMode(value: string): value is ProviderMode {
  return PROVIDER_MODES.some(mode => mode === value);
}

export function isComplexity(value: string): value is Complexity {
  return COMPLEXITY_LEVELS.some(level => level === value);
}

export function describeModel(info: ModelInfo): string {
  return `${info.provider}:${info.model}`;
}
