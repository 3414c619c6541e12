import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { chatCompletion, logLLMRequest, ollamaApiUrl } from './index';
import { REQUEST_LOG_FILE } from './logger';
import { ModelClient } from './model-client';
import { ConfigurationError } from '../../utils/error-utils';

describe('chatCompletion', () => {
  it('should require an OpenAI key', async () => {
    await expect(
      chatCompletion([{ role: 'user', content: 'hi' }], { provider: 'openai', model: 'gpt-4o-mini' })
    ).rejects.toThrow(ConfigurationError);
  });

  it('should require an Anthropic key', async () => {
    const client = new ModelClient({ provider: 'anthropic', model: 'claude-3-5-haiku-latest' });
    await expect(client.generate('hi')).rejects.toThrow('Anthropic API key not configured');
  });

  it('should point Ollama at its OpenAI-compatible path', () => {
    expect(ollamaApiUrl('http://localhost:11434/')).toBe('http://localhost:11434/v1');
  });
});

describe('logLLMRequest', () => {
  let dir: string | undefined;

  afterEach(async () => {
    vi.unstubAllEnvs();
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should append a JSON line per request', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-logs-'));
    vi.stubEnv('AGENTSTEAM_LOG_DIR', dir);
    vi.stubEnv('AGENTSTEAM_DISABLE_REQUEST_LOG', '');

    const id = await logLLMRequest({
      provider: 'ollama',
      model: 'llama3',
      operation: 'chat',
      prompt: 'hello',
      response: 'hi there',
      tokenUsage: { promptTokens: 2, completionTokens: 3, totalTokens: 5 },
      costUsd: 0,
      durationMs: 12
    });

    const lines = (await fs.readFile(path.join(dir, REQUEST_LOG_FILE), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ id, provider: 'ollama', prompt: 'hello', response: 'hi there', status: 'completed' });
  });

  it('should skip the file when request logging is disabled', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-logs-'));
    vi.stubEnv('AGENTSTEAM_LOG_DIR', dir);
    vi.stubEnv('AGENTSTEAM_DISABLE_REQUEST_LOG', 'true');

    await logLLMRequest({
      provider: 'ollama',
      model: 'llama3',
      operation: 'chat',
      prompt: 'hello',
      tokenUsage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      costUsd: 0,
      durationMs: 1
    });
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
