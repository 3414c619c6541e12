/**
 * Centralized access to environment variables
 * Values are read on every call so that flags such as --debug can be applied at runtime
 */

export const ENV_KEYS = {
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  ANTHROPIC_API_KEY: 'ANTHROPIC_API_KEY',
  OLLAMA_BASE_URL: 'OLLAMA_BASE_URL',
  DEBUG: 'AGENTSTEAM_DEBUG',
  HOME: 'AGENTSTEAM_HOME',
  LOG_DIR: 'AGENTSTEAM_LOG_DIR',
  DISABLE_REQUEST_LOG: 'AGENTSTEAM_DISABLE_REQUEST_LOG'
} as const;

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[ENV_KEYS.DEBUG] === 'true';
}

export function enableDebugLogging(env: NodeJS.ProcessEnv = process.env): void {
  env[ENV_KEYS.DEBUG] = 'true';
}

export function isRequestLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[ENV_KEYS.DISABLE_REQUEST_LOG] !== 'true';
}
