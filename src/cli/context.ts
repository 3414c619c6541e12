import { InvalidArgumentError } from 'commander';
import { ConfigStore, CONFIG_KEYS } from '../config/store';
import { DEFAULT_OLLAMA_PORT } from '../config/constants';
import { ModelSelector } from '../core/ModelSelector';
import type { ModelLister } from '../core/ModelSelector';
import { listOllamaModels } from '../services/llm';
import type { TextGenerator } from '../services/llm/model-client';
import { runCommand } from '../services/process-runner';
import type { CommandRunner } from '../services/process-runner';
import { isProviderMode } from '../types/model';
import type { ModelInfo } from '../types/model';
import { ConfigurationError } from '../utils/error-utils';

export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const consoleOutput: Output = {
  log: message => console.log(message),
  error: message => console.error(message)
};

/**
 * Everything the commands reach outside the process through. Tests swap in
 * fakes for the model, the subprocess runner and the terminal.
 */
export interface CliDeps {
  loadConfig: () => Promise<ConfigStore>;
  listModels: ModelLister;
  runner: CommandRunner;
  createGenerator: (selector: ModelSelector, info: ModelInfo) => TextGenerator;
  output: Output;
  cwd: () => string;
}

export function defaultDeps(): CliDeps {
  return {
    loadConfig: () => ConfigStore.load(),
    listModels: listOllamaModels,
    runner: runCommand,
    createGenerator: (selector, info) => selector.createClient(info),
    output: consoleOutput,
    cwd: () => process.cwd()
  };
}

export function createSelector(config: ConfigStore, deps: CliDeps): ModelSelector {
  const mode = config.getString(CONFIG_KEYS.PROVIDER_MODE, 'auto');
  return new ModelSelector(config, deps.listModels, isProviderMode(mode) ? mode : 'auto');
}

// "python, fastapi" -> ['python', 'fastapi']
export function parseTechnologies(value?: string): string[] {
  return (value ?? '')
    .split(',')
    .map(tech => tech.trim())
    .filter(Boolean);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected zero or a positive whole number.');
  }
  return parsed;
}

/**
 * Accept `host`, `host:port` or a full URL for an Ollama server; the default
 * Ollama port is added when none is given
 */
export function normalizeServerUrl(raw: string): string {
  let url = raw.trim().replace(/\/+$/, '');
  if (!url) {
    throw new ConfigurationError('Server URL is empty');
  }
  if (!/^https?:\/\//i.test(url)) {
    url = `http://${url}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid server URL: ${raw}`);
  }
  if (!parsed.port) {
    parsed.port = DEFAULT_OLLAMA_PORT;
  }
  const pathname = parsed.pathname.replace(/\/+$/, '');
  return `${parsed.protocol}//${parsed.host}${pathname}`;
}
