import type { CommandResult } from '../services/process-runner';

export enum BuildStopReason {
  COMPLETED = 'completed',
  STEP_FAILED = 'step_failed',
  STAGNATION = 'stagnation',
  ERROR = 'error'
}

// A file change proposed by the model for one build step
export type FileChange =
  | { path: string; code: string }
  | { path: string; diff: string };

export interface AppliedChange {
  path: string;
  content: string;
  diff: string;
  created: boolean;
}

export interface StepRecord {
  index: number;
  step: string;
  success: boolean;
  stdoutTail: string;
  stderrTail: string;
  timestamp: string;
}

export interface FailedPatch {
  path: string;
  content: string;
  error: string;
  step: string;
  recordedAt: string;
}

export interface LastRun {
  command: string;
  success: boolean;
  exitCode: number | null;
  stdoutTail: string;
  stderrTail: string;
}

export interface BuildState {
  version: 1;
  description: string;
  technologies: string[];
  steps: string[];
  completedSteps: StepRecord[];
  failedPatches: FailedPatch[];
  lastRun: LastRun | null;
  updatedAt: string;
}

export interface BuildOptions {
  description: string;
  technologies?: string[];
  outputDir: string;
  runCommand?: string;
  maxSteps?: number;
  expect?: string;
  dynamicRun?: boolean;
  resume?: boolean;
  maxFixAttempts?: number;
  maxStepRetries?: number;
  commandTimeoutMs?: number;
}

export interface BuildResult {
  success: boolean;
  steps: string[];
  completedSteps: StepRecord[];
  failedStep?: string;
  stdout?: string;
  stderr?: string;
  runCommand: string;
  durationMs: number;
  stoppedEarly: boolean;
  stopReason: BuildStopReason;
}

export interface StepOutcome {
  status: 'completed' | 'failed' | 'no_effect';
  applied: AppliedChange[];
  result: CommandResult | null;
}
