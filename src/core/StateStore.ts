import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { STATE_FILE_NAME } from '../config/constants';
import type { BuildState, StepRecord } from '../types/build';
import { fileExists, writeJsonFile } from '../utils/file-helpers';
import { extractErrorMessage } from '../utils/error-utils';

const StepRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  step: z.string(),
  success: z.boolean(),
  stdoutTail: z.string(),
  stderrTail: z.string(),
  timestamp: z.string()
});

const FailedPatchSchema = z.object({
  path: z.string(),
  content: z.string(),
  error: z.string(),
  step: z.string(),
  recordedAt: z.string()
});

const BuildStateSchema: z.ZodType<BuildState> = z.object({
  version: z.literal(1),
  description: z.string(),
  technologies: z.array(z.string()),
  steps: z.array(z.string()),
  completedSteps: z.array(StepRecordSchema),
  failedPatches: z.array(FailedPatchSchema),
  lastRun: z
    .object({
      command: z.string(),
      success: z.boolean(),
      exitCode: z.number().nullable(),
      stdoutTail: z.string(),
      stderrTail: z.string()
    })
    .nullable(),
  updatedAt: z.string()
});

export function createBuildState(description: string, technologies: string[], steps: string[]): BuildState {
  return {
    version: 1,
    description,
    technologies,
    steps,
    completedSteps: [],
    failedPatches: [],
    lastRun: null,
    updatedAt: new Date().toISOString()
  };
}

// Replace the record for the same step index, or append
export function upsertStepRecord(state: BuildState, record: StepRecord): void {
  const existing = state.completedSteps.findIndex(entry => entry.index === record.index);
  if (existing === -1) {
    state.completedSteps.push(record);
  } else {
    state.completedSteps[existing] = record;
  }
}

/**
 * The JSON state file kept in a project directory. The whole file is
 * rewritten on every save; the latest write wins.
 */
export class StateStore {
  readonly filePath: string;

  constructor(readonly projectDir: string) {
    this.filePath = path.join(projectDir, STATE_FILE_NAME);
  }

  /**
   * Load the state, or null when there is none. A corrupt file is reported and ignored.
   */
  async load(): Promise<BuildState | null> {
    if (!(await fileExists(this.filePath))) {
      return null;
    }

    try {
      const raw: unknown = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
      const parsed = BuildStateSchema.safeParse(raw);
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`Ignoring unreadable build state in ${this.filePath}`);
    } catch (error) {
      console.warn(`Ignoring unreadable build state in ${this.filePath}: ${extractErrorMessage(error)}`);
    }
    return null;
  }

  async save(state: BuildState): Promise<void> {
    state.updatedAt = new Date().toISOString();
    await writeJsonFile(this.filePath, state);
  }

  async reset(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
