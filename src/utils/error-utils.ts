/**
 * Utilities for standardized error handling across the application
 */
import { isDebugEnabled } from '../services/llm/env';

/**
 * Base error for every failure the CLI reports on its own terms
 */
export class AgentsTeamError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string = 'AGENTSTEAM_ERROR', details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationError extends AgentsTeamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class ModelUnavailableError extends AgentsTeamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MODEL_UNAVAILABLE', details);
  }
}

export class ProviderError extends AgentsTeamError {
  readonly provider: string;
  readonly model: string;

  constructor(message: string, provider: string, model: string) {
    super(message, 'PROVIDER_ERROR', { provider, model });
    this.provider = provider;
    this.model = model;
  }
}

export class DiffApplyError extends AgentsTeamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DIFF_APPLY_FAILED', details);
  }
}

export class UnsafePathError extends AgentsTeamError {
  constructor(filePath: string) {
    super(`Refusing to write outside the project directory: ${filePath}`, 'UNSAFE_PATH', { path: filePath });
  }
}

/**
 * Extract error message from different error types
 */
export const extractErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  } else if (typeof error === 'string') {
    return error;
  } else if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
};

/**
 * Extract stack trace if available
 */
export const extractErrorStack = (error: unknown): string | undefined => {
  if (error instanceof Error) {
    return error.stack;
  } else if (error && typeof error === 'object' && 'stack' in error) {
    return String(error.stack);
  }
  return undefined;
};

/**
 * Log error with consistent format. Stacks are only printed in debug mode.
 */
export const logError = (error: unknown, context: string): void => {
  const message = extractErrorMessage(error);
  const stack = extractErrorStack(error);

  console.error(`Error in ${context}: ${message}`);
  if (stack && isDebugEnabled()) {
    console.error(stack);
  }
};

export const createError = (
  message: string,
  code?: string,
  details?: Record<string, unknown>
): AgentsTeamError => {
  return new AgentsTeamError(message, code, details);
};

/**
 * Handle promise rejection with consistent pattern
 */
export const handleRejection = <T>(
  promise: Promise<T>,
  context: string
): Promise<T> => {
  return promise.catch((error: unknown) => {
    logError(error, context);
    throw error;
  });
};
