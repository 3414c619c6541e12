import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  AgentsTeamError,
  ConfigurationError,
  UnsafePathError,
  createError,
  extractErrorMessage,
  handleRejection,
  logError
} from './error-utils';

describe('error-utils', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should extract messages from any thrown value', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage({ message: 42 })).toBe('42');
    expect(extractErrorMessage(null)).toBe('Unknown error');
  });

  it('should name and code custom errors', () => {
    const error = new ConfigurationError('missing key');
    expect(error).toBeInstanceOf(AgentsTeamError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('CONFIGURATION_ERROR');

    expect(createError('generic').code).toBe('AGENTSTEAM_ERROR');
    expect(new UnsafePathError('../x').message).toBe('Refusing to write outside the project directory: ../x');
  });

  it('should log errors with their context', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logError(new Error('boom'), 'loading config');
    expect(spy).toHaveBeenCalledWith('Error in loading config: boom');
  });

  it('should log and rethrow rejections', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await expect(handleRejection(Promise.reject(new Error('nope')), 'request')).rejects.toThrow('nope');
    expect(spy).toHaveBeenCalledWith('Error in request: nope');
  });
});
