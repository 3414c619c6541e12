import { exec } from 'child_process';
import { LIMITS } from '../config/constants';

export interface CommandResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  // stdout and stderr joined, for display
  output: string;
  timedOut: boolean;
  durationMs: number;
}

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (command: string, options?: RunCommandOptions) => Promise<CommandResult>;

const MAX_BUFFER = 10 * 1024 * 1024;

// Exit code a POSIX shell returns when the program is not installed
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

/**
 * Run a command through the shell. Never rejects: a non-zero exit, a
 * timeout or a spawn failure all resolve with success: false.
 */
export const runCommand: CommandRunner = (command, options = {}) => {
  const startTime = Date.now();
  const timeoutMs = options.timeoutMs ?? LIMITS.COMMAND_TIMEOUT_MS;

  return new Promise(resolve => {
    exec(
      command,
      {
        cwd: options.cwd,
        timeout: timeoutMs,
        maxBuffer: MAX_BUFFER,
        env: { ...process.env, ...options.env }
      },
      (error, stdout, stderr) => {
        const durationMs = Date.now() - startTime;
        const output = [stdout, stderr].filter(Boolean).join('\n');

        if (!error) {
          resolve({ success: true, exitCode: 0, stdout, stderr, output, timedOut: false, durationMs });
          return;
        }

        const timedOut = error.killed === true && durationMs >= timeoutMs;
        const exitCode = typeof error.code === 'number' ? error.code : null;
        const errorText = stderr || (timedOut ? `Command timed out after ${timeoutMs}ms` : error.message);

        resolve({
          success: false,
          exitCode,
          stdout,
          stderr: errorText,
          output: [stdout, errorText].filter(Boolean).join('\n'),
          timedOut,
          durationMs
        });
      }
    );
  });
};
