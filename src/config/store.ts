import os from 'os';
import path from 'path';
import { z } from 'zod';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_OLLAMA_URL } from './constants';
import { ENV_KEYS } from '../services/llm/env';
import { readJsonFile, writeJsonFile } from '../utils/file-helpers';
import { ConfigurationError } from '../utils/error-utils';

export type ConfigValue = string | number | boolean | null | ConfigObject;

export interface ConfigObject {
  [key: string]: ConfigValue;
}

const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.record(ConfigValueSchema)])
);

const ConfigObjectSchema: z.ZodType<ConfigObject> = z.record(ConfigValueSchema);

export const CONFIG_KEYS = {
  OPENAI_API_KEY: 'openai.api_key',
  ANTHROPIC_API_KEY: 'anthropic.api_key',
  OLLAMA_BASE_URL: 'ollama.base_url',
  PROVIDER_MODE: 'models.mode',
  DEFAULT_MODEL: 'models.default'
} as const;

export function defaultConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV_KEYS.HOME] || path.join(os.homedir(), CONFIG_DIR_NAME);
}

// `openai.api_key` -> `OPENAI_API_KEY`
export function envKeyFor(key: string): string {
  return key.toUpperCase().replace(/\./g, '_');
}

function isConfigObject(value: ConfigValue | undefined): value is ConfigObject {
  return typeof value === 'object' && value !== null;
}

/**
 * Coerce a raw CLI string into a config value
 */
export function parseConfigValue(raw: string): ConfigValue {
  const trimmed = raw.trim();
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (trimmed === 'null') return null;
  if (/^-?\d+(?:\.\d+)?$/.test(trimmed)) return Number(trimmed);
  return trimmed;
}

/**
 * JSON-backed configuration with dot-notation keys. Environment variables
 * named after a key take precedence over the file.
 */
export class ConfigStore {
  private data: ConfigObject;

  constructor(
    readonly filePath: string,
    data: ConfigObject = {},
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.data = data;
  }

  static async load(options: { dir?: string; env?: NodeJS.ProcessEnv } = {}): Promise<ConfigStore> {
    const env = options.env ?? process.env;
    const filePath = path.join(options.dir ?? defaultConfigDir(env), CONFIG_FILE_NAME);
    const data = await readJsonFile(filePath, ConfigObjectSchema, {});
    return new ConfigStore(filePath, data, env);
  }

  get(key: string): ConfigValue | undefined;
  get(key: string, fallback: ConfigValue): ConfigValue;
  get(key: string, fallback?: ConfigValue): ConfigValue | undefined {
    const fromEnv = this.env[envKeyFor(key)];
    if (fromEnv !== undefined && fromEnv !== '') {
      return fromEnv;
    }

    let current: ConfigValue | undefined = this.data;
    for (const part of key.split('.')) {
      if (!isConfigObject(current)) {
        return fallback;
      }
      current = current[part];
    }
    return current === undefined ? fallback : current;
  }

  getString(key: string): string | undefined;
  getString(key: string, fallback: string): string;
  getString(key: string, fallback?: string): string | undefined {
    const value = this.get(key);
    if (value === undefined || value === null || isConfigObject(value)) {
      return fallback;
    }
    const text = String(value).trim();
    return text ? text : fallback;
  }

  async set(key: string, value: ConfigValue): Promise<void> {
    const parts = key.split('.').filter(Boolean);
    if (parts.length === 0) {
      throw new ConfigurationError(`Invalid configuration key: "${key}"`);
    }

    let current = this.data;
    for (const part of parts.slice(0, -1)) {
      const next = current[part];
      if (isConfigObject(next)) {
        current = next;
      } else {
        const created: ConfigObject = {};
        current[part] = created;
        current = created;
      }
    }
    current[parts[parts.length - 1]] = value;
    await this.save();
  }

  getAll(): ConfigObject {
    return structuredClone(this.data);
  }

  // Copy of the file contents with every api key masked
  redacted(): ConfigObject {
    const mask = (object: ConfigObject): ConfigObject => {
      const result: ConfigObject = {};
      for (const [key, value] of Object.entries(object)) {
        if (isConfigObject(value)) {
          result[key] = mask(value);
        } else if (key.endsWith('api_key') && value) {
          result[key] = '[REDACTED]';
        } else {
          result[key] = value;
        }
      }
      return result;
    };
    return mask(this.data);
  }

  async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.data);
  }

  get ollamaUrl(): string {
    return this.getString(CONFIG_KEYS.OLLAMA_BASE_URL, DEFAULT_OLLAMA_URL).replace(/\/+$/, '');
  }

  get openaiKey(): string | undefined {
    return this.getString(CONFIG_KEYS.OPENAI_API_KEY);
  }

  get anthropicKey(): string | undefined {
    return this.getString(CONFIG_KEYS.ANTHROPIC_API_KEY);
  }
}
