// In-process stand-ins for the model, the subprocess runner and the terminal
import { vi } from 'vitest';
import type { GenerateOptions, TextGenerator } from '../services/llm/model-client';
import type { CommandResult, CommandRunner } from '../services/process-runner';
import type { ModelInfo } from '../types/model';
import type { Output } from '../cli/context';

/**
 * Answers prompts from a fixed script, in order. An Error in the script is
 * thrown instead of returned.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly info: ModelInfo;
  readonly prompts: string[] = [];
  readonly operations: Array<string | undefined> = [];

  constructor(
    private readonly responses: Array<string | Error>,
    info: ModelInfo = { provider: 'ollama', model: 'test-model' }
  ) {
    this.info = info;
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    this.operations.push(options?.operation);
    const next = this.responses.shift();
    if (next === undefined) throw new Error('No scripted response left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export const commandResult = (overrides: Partial<CommandResult> = {}): CommandResult => ({
  success: true,
  exitCode: 0,
  stdout: '',
  stderr: '',
  output: '',
  timedOut: false,
  durationMs: 1,
  ...overrides
});

export const failedResult = (stderr: string, exitCode: number = 1): CommandResult =>
  commandResult({ success: false, exitCode, stderr, output: stderr });

// Returns the scripted results in order, then plain successes
export function scriptedRunner(results: CommandResult[] = []) {
  return vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => results.shift() ?? commandResult());
}

export class RecordingOutput implements Output {
  readonly logs: string[] = [];
  readonly errors: string[] = [];

  log(message: string): void {
    this.logs.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}
