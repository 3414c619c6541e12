import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { LLMMessage, TokenUsage, RequestContext } from './types';
import { ENV_KEYS, isDebugEnabled, isRequestLoggingEnabled } from './env';
import { defaultConfigDir } from '../../config/store';
import { ensureDirectory } from '../../utils/file-helpers';
import { truncate } from '../../utils/text-utils';

export const REQUEST_LOG_FILE = 'llm-requests.jsonl';

const MAX_TEXT_LENGTH = 20000;

export interface LLMRequestLogEntry {
  id: string;
  timestamp: string;
  provider: string;
  model: string;
  operation: string;
  prompt: string;
  response: string | null;
  tokenUsage: TokenUsage;
  costUsd: number;
  durationMs: number;
  status: 'completed' | 'error';
  error: string | null;
  context: RequestContext;
}

export function requestLogDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[ENV_KEYS.LOG_DIR] || path.join(defaultConfigDir(env), 'logs');
}

/**
 * LLM Request Logger - appends every LLM API call to a JSON lines file
 */
export async function logLLMRequest({
  provider,
  model,
  operation,
  prompt,
  response = null,
  tokenUsage,
  costUsd,
  durationMs,
  status = 'completed',
  error = null,
  context = {}
}: {
  provider: string;
  model: string;
  operation: string;
  prompt: LLMMessage[] | string;
  response?: string | null;
  tokenUsage: TokenUsage;
  costUsd: number;
  durationMs: number;
  status?: 'completed' | 'error';
  error?: string | null;
  context?: RequestContext;
}): Promise<string> {
  const id = uuidv4();
  const timestamp = new Date().toISOString();

  if (isDebugEnabled()) {
    console.log(`[LLM ${provider}] ${timestamp} - ${operation}:`, {
      id,
      model,
      tokens: {
        prompt: tokenUsage.promptTokens,
        completion: tokenUsage.completionTokens,
        total: tokenUsage.totalTokens
      },
      costUsd,
      durationMs,
      status
    });
  }

  if (!isRequestLoggingEnabled()) {
    return id;
  }

  const promptString = typeof prompt === 'string' ? prompt : JSON.stringify(prompt);
  const entry: LLMRequestLogEntry = {
    id,
    timestamp,
    provider,
    model,
    operation,
    prompt: truncate(promptString, MAX_TEXT_LENGTH),
    response: response === null ? null : truncate(response, MAX_TEXT_LENGTH),
    tokenUsage,
    costUsd,
    durationMs,
    status,
    error,
    context
  };

  // A broken log file never fails the request itself
  try {
    const dir = requestLogDir();
    await ensureDirectory(dir);
    await fs.appendFile(path.join(dir, REQUEST_LOG_FILE), JSON.stringify(entry) + '\n', 'utf-8');
  } catch (logError) {
    console.error('Error writing LLM request log:', logError instanceof Error ? logError.message : logError);
  }
  return id;
}
