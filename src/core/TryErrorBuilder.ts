import EventEmitter from 'events';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { TextGenerator } from '../services/llm/model-client';
import { SYSTEM_PROMPTS, BUILD_PROMPTS, TEMPERATURE_SETTINGS, TOKEN_LIMITS, OPERATION_NAMES } from '../services/llm';
import { runCommand } from '../services/process-runner';
import type { CommandResult, CommandRunner } from '../services/process-runner';
import { DEFAULT_MAX_LISTENERS, EVENTS, LIMITS, PROJECT_WORK_DIR, STATE_FILE_NAME, STEP_STATUS } from '../config/constants';
import { BuildStopReason } from '../types/build';
import type { AppliedChange, BuildOptions, BuildResult, BuildState, FileChange, StepOutcome } from '../types/build';
import { BuildPlan } from './Plan';
import type { BuildStep } from './Plan';
import { generateBuildSteps } from './PlanGenerator';
import { BackupStore } from './BackupStore';
import { StateStore, createBuildState, upsertStepRecord } from './StateStore';
import { NegativeMemory } from './NegativeMemory';
import { ErrorCorrector } from './ErrorCorrector';
import type { FixAttempt } from './ErrorCorrector';
import { parseFileChanges } from '../utils/code-extraction';
import { applyUnifiedDiff, createUnifiedDiff } from '../utils/diff';
import { ensureDirectory, isDirectoryEmpty, readTextFile, resolveInside, toPosixPath, writeTextFile } from '../utils/file-helpers';
import { inferRunCommand, isScaffoldStep, isTestCommand, scaffoldProject, summarizeProject } from '../utils/project-utils';
import { DiffApplyError, UnsafePathError, extractErrorMessage, logError } from '../utils/error-utils';
import { tail } from '../utils/text-utils';

/**
 * What the builder needs from the error corrector
 */
export interface StepFixer {
  attemptFix(errorText: string, command: string, candidateFiles?: string[], backups?: BackupStore): Promise<FixAttempt>;
}

export interface TryErrorBuilderOptions {
  generator: TextGenerator;
  runner?: CommandRunner;
  // Builds the fixer for a project directory; defaults to an ErrorCorrector
  createFixer?: (projectDir: string) => StepFixer;
}

export interface RunEvaluation {
  passed: boolean;
  errorText: string;
}

export interface IntrospectionInput {
  appliedFiles: string[];
  recentDiffs: string[];
  lastResult: CommandResult | null;
  knownFailures: string;
}

/**
 * A run passes when the command succeeds and, for non-test commands, its
 * stdout contains the expected text
 */
export function evaluateRun(result: CommandResult, command: string, expect?: string): RunEvaluation {
  if (!result.success) {
    return { passed: false, errorText: result.stderr.trim() || result.stdout.trim() || `Command failed: ${command}` };
  }
  if (expect && !isTestCommand(command) && !result.stdout.includes(expect)) {
    return {
      passed: false,
      errorText: `Expected the output of "${command}" to contain "${expect}". Actual output:\n${tail(result.stdout, LIMITS.INTROSPECTION_STDOUT_TAIL)}`
    };
  }
  return { passed: true, errorText: '' };
}

export function formatIntrospection(input: IntrospectionInput): string {
  const parts: string[] = [];

  if (input.appliedFiles.length > 0) {
    parts.push(`Files changed by the previous step: ${input.appliedFiles.join(', ')}`);
  }
  if (input.recentDiffs.length > 0) {
    parts.push(`Recent diffs:\n${input.recentDiffs.join('\n\n')}`);
  }
  if (input.lastResult) {
    const stderr = input.lastResult.stderr.trim();
    const stdout = input.lastResult.stdout.trim();
    if (stderr) parts.push(`Last stderr:\n${tail(stderr, LIMITS.INTROSPECTION_STDERR_TAIL)}`);
    if (stdout) parts.push(`Last stdout:\n${tail(stdout, LIMITS.INTROSPECTION_STDOUT_TAIL)}`);
  }
  if (input.knownFailures) {
    parts.push(`Changes that broke the build before (do not repeat them):\n${input.knownFailures}`);
  }

  return parts.length > 0 ? parts.join('\n\n') : '(no prior run context)';
}

// Everything one run of the builder carries between steps
interface BuildContext {
  options: BuildOptions;
  outputDir: string;
  technologies: string[];
  runCommand: string;
  plan: BuildPlan;
  state: BuildState;
  stateStore: StateStore;
  memory: NegativeMemory;
  fixer: StepFixer;
  recentDiffs: string[];
  appliedFiles: string[];
  lastResult: CommandResult | null;
  lastEvaluation: RunEvaluation | null;
  // Commands run in this session
  runs: number;
}

/**
 * Incremental try-error builder: plan small steps, apply the model's file
 * changes one step at a time, run the project after each step and fix or
 * roll back what breaks it.
 */
export class TryErrorBuilder extends EventEmitter {
  private readonly generator: TextGenerator;
  private readonly runner: CommandRunner;
  private readonly createFixer: (projectDir: string) => StepFixer;

  constructor(options: TryErrorBuilderOptions) {
    super();
    this.setMaxListeners(DEFAULT_MAX_LISTENERS);

    this.generator = options.generator;
    this.runner = options.runner ?? runCommand;
    this.createFixer =
      options.createFixer ?? (projectDir => new ErrorCorrector(this.generator, { cwd: projectDir, runner: this.runner }));
  }

  planSteps(description: string, technologies: string[] = [], maxSteps: number = LIMITS.MAX_STEPS): Promise<string[]> {
    return generateBuildSteps(this.generator, description, technologies, maxSteps);
  }

  async run(options: BuildOptions): Promise<BuildResult> {
    const startTime = Date.now();
    const outputDir = path.resolve(options.outputDir);
    const technologies = options.technologies ?? [];
    let context: BuildContext | null = null;

    const finish = (
      success: boolean,
      stopReason: BuildStopReason,
      extra: { failedStep?: string; stoppedEarly?: boolean } = {}
    ): BuildResult => {
      const result: BuildResult = {
        success,
        steps: context?.plan.descriptions ?? [],
        completedSteps: context?.state.completedSteps ?? [],
        failedStep: extra.failedStep,
        stdout: context?.lastResult?.stdout,
        stderr: context?.lastResult?.stderr,
        runCommand: context?.runCommand ?? options.runCommand ?? '',
        durationMs: Date.now() - startTime,
        stoppedEarly: extra.stoppedEarly ?? false,
        stopReason
      };
      this.emit(success ? EVENTS.BUILD.COMPLETED : EVENTS.BUILD.FAILED, result);
      return result;
    };

    try {
      await ensureDirectory(outputDir);
      const wasEmpty = await isDirectoryEmpty(outputDir);
      context = await this.prepare(options, outputDir, technologies);

      this.emit(EVENTS.BUILD.PLAN_CREATED, { planId: context.plan.id, steps: context.plan.descriptions });

      if (wasEmpty) {
        const scaffold = await scaffoldProject(outputDir, options.description, technologies);
        context.appliedFiles = scaffold;
      }
      context.runCommand = options.runCommand ?? (await inferRunCommand(outputDir, technologies));

      let noEffectStreak = 0;
      let seenFirstStep = false;

      for (const step of context.plan.steps) {
        if (step.status === STEP_STATUS.COMPLETED) {
          seenFirstStep = true;
          continue;
        }

        if (seenFirstStep && isScaffoldStep(step.description)) {
          context.plan.updateStep(step.id, { status: STEP_STATUS.SKIPPED });
          this.emit(EVENTS.STEP.SKIPPED, { step, reason: 'redundant scaffold step' });
          continue;
        }
        seenFirstStep = true;

        if (options.dynamicRun && !options.runCommand) {
          context.runCommand = await inferRunCommand(outputDir, technologies);
        }

        const outcome = await this.runStepWithRetries(context, step);

        if (outcome.status === 'no_effect') {
          noEffectStreak++;
          context.plan.updateStep(step.id, { status: STEP_STATUS.SKIPPED, error: 'No effective changes' });
          this.emit(EVENTS.STEP.SKIPPED, { step, reason: 'no effective changes' });

          if (noEffectStreak >= LIMITS.STAGNATION_LIMIT) {
            this.emit(EVENTS.BUILD.STAGNATION, { step, noEffectSteps: noEffectStreak });
            const passed = await this.verify(context);
            return finish(passed, BuildStopReason.STAGNATION, { stoppedEarly: true });
          }
          continue;
        }

        noEffectStreak = 0;
        upsertStepRecord(context.state, {
          index: step.index,
          step: step.description,
          success: outcome.status === 'completed',
          stdoutTail: tail(outcome.result?.stdout ?? '', LIMITS.STATE_STDOUT_TAIL),
          stderrTail: tail(outcome.result?.stderr ?? '', LIMITS.STATE_STDERR_TAIL),
          timestamp: new Date().toISOString()
        });
        await this.persist(context);

        if (outcome.status === 'failed') {
          context.plan.updateStep(step.id, {
            status: STEP_STATUS.FAILED,
            error: context.lastEvaluation?.errorText
          });
          this.emit(EVENTS.STEP.FAILED, { step, result: outcome.result });
          return finish(false, BuildStopReason.STEP_FAILED, { failedStep: step.description, stoppedEarly: true });
        }

        context.plan.updateStep(step.id, { status: STEP_STATUS.COMPLETED });
        this.emit(EVENTS.STEP.COMPLETED, { step, applied: outcome.applied.map(change => change.path) });
      }

      // Nothing ran in this session (all steps resumed or skipped)
      if (context.runs === 0) {
        const passed = await this.verify(context);
        return finish(passed, BuildStopReason.COMPLETED);
      }
      return finish(context.lastEvaluation?.passed ?? false, BuildStopReason.COMPLETED);
    } catch (error) {
      logError(error, 'TryErrorBuilder.run');
      if (context) {
        context.lastEvaluation = { passed: false, errorText: extractErrorMessage(error) };
      }
      return finish(false, BuildStopReason.ERROR, { stoppedEarly: true });
    }
  }

  private async prepare(options: BuildOptions, outputDir: string, technologies: string[]): Promise<BuildContext> {
    const maxSteps = options.maxSteps ?? LIMITS.MAX_STEPS;
    const stateStore = new StateStore(outputDir);
    const previous = await stateStore.load();
    const sameProject = previous !== null && previous.description === options.description;

    let state: BuildState;
    if (options.resume && previous && sameProject) {
      state = previous;
    } else {
      if (options.resume && previous && !sameProject) {
        console.warn('⚠️  Saved build state belongs to a different description, starting over');
      }
      const steps = await this.planSteps(options.description, technologies, maxSteps);
      state = createBuildState(options.description, technologies, steps);
      // Failed patches stay known across runs of the same project
      if (previous && sameProject) {
        state.failedPatches = previous.failedPatches;
      }
    }

    const plan = new BuildPlan(uuidv4(), options.description, technologies, state.steps);
    plan.markCompleted(state.completedSteps.filter(record => record.success).map(record => record.index));

    const context: BuildContext = {
      options,
      outputDir,
      technologies,
      runCommand: options.runCommand ?? '',
      plan,
      state,
      stateStore,
      memory: new NegativeMemory(state.failedPatches),
      fixer: this.createFixer(outputDir),
      recentDiffs: [],
      appliedFiles: [],
      lastResult: state.lastRun
        ? {
            success: state.lastRun.success,
            exitCode: state.lastRun.exitCode,
            stdout: state.lastRun.stdoutTail,
            stderr: state.lastRun.stderrTail,
            output: [state.lastRun.stdoutTail, state.lastRun.stderrTail].filter(Boolean).join('\n'),
            timedOut: false,
            durationMs: 0
          }
        : null,
      lastEvaluation: null,
      runs: 0
    };

    await this.persist(context);
    return context;
  }

  private async runStepWithRetries(context: BuildContext, step: BuildStep): Promise<StepOutcome> {
    const maxRetries = context.options.maxStepRetries ?? LIMITS.MAX_STEP_RETRIES;
    let outcome: StepOutcome = { status: 'no_effect', applied: [], result: null };

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        this.emit(EVENTS.STEP.RETRY, { step, attempt });
      }
      context.plan.updateStep(step.id, { status: STEP_STATUS.IN_PROGRESS, attempts: step.attempts + 1 });
      this.emit(EVENTS.STEP.STARTED, { step, attempt });

      const current = await this.attemptStep(context, step, attempt);
      if (current.status !== 'failed') {
        // A retry that changes nothing leaves the step failed
        return outcome.status === 'failed' && current.status === 'no_effect' ? outcome : current;
      }
      outcome = current;
    }
    return outcome;
  }

  private async requestChanges(context: BuildContext, step: BuildStep): Promise<string> {
    return this.generator.generate(
      BUILD_PROMPTS.STEP_CHANGES({
        description: context.options.description,
        technologies: context.technologies,
        step: step.description,
        stepNumber: step.index + 1,
        totalSteps: context.plan.steps.length,
        runCommand: context.runCommand,
        expect: context.options.expect,
        contextSummary: await summarizeProject(context.outputDir),
        introspection: formatIntrospection({
          appliedFiles: context.appliedFiles,
          recentDiffs: context.recentDiffs,
          lastResult: context.lastResult,
          knownFailures: context.memory.describe()
        })
      }),
      {
        system: SYSTEM_PROMPTS.BUILDER,
        temperature: TEMPERATURE_SETTINGS.CODE_GENERATION,
        maxTokens: TOKEN_LIMITS.CODE_GENERATION,
        operation: OPERATION_NAMES.STEP_CHANGES
      }
    );
  }

  private async attemptStep(context: BuildContext, step: BuildStep, attempt: number): Promise<StepOutcome> {
    let response: string;
    try {
      response = await this.requestChanges(context, step);
    } catch (error) {
      // Provider failures cost this attempt only
      logError(error, `TryErrorBuilder.attemptStep(${step.description})`);
      return { status: 'no_effect', applied: [], result: null };
    }

    const backups = new BackupStore(context.outputDir, `${step.id}-a${attempt}`);
    const applied = await this.applyChanges(context, parseFileChanges(response), backups, step);
    if (applied.length === 0) {
      return { status: 'no_effect', applied, result: null };
    }

    context.appliedFiles = applied.map(change => change.path);
    context.recentDiffs = [...context.recentDiffs, ...applied.map(change => change.diff).filter(Boolean)].slice(
      -LIMITS.RECENT_DIFFS
    );
    this.emit(EVENTS.STEP.CHANGES_APPLIED, { step, files: context.appliedFiles });

    let result = await this.execute(context);
    let evaluation = evaluateRun(result, context.runCommand, context.options.expect);
    this.emit(EVENTS.STEP.RUN_COMPLETED, { step, result, passed: evaluation.passed });

    const maxFixAttempts = context.options.maxFixAttempts ?? LIMITS.MAX_FIX_ATTEMPTS;
    for (let fixAttempt = 1; !evaluation.passed && fixAttempt <= maxFixAttempts; fixAttempt++) {
      const fix = await context.fixer.attemptFix(evaluation.errorText, context.runCommand, context.appliedFiles, backups);
      this.emit(EVENTS.STEP.FIX_ATTEMPT, { step, attempt: fixAttempt, fixed: fix.fixed, filePath: fix.filePath, reason: fix.reason });
      if (!fix.fixed) {
        break;
      }

      result = await this.execute(context);
      evaluation = evaluateRun(result, context.runCommand, context.options.expect);
      this.emit(EVENTS.STEP.RUN_COMPLETED, { step, result, passed: evaluation.passed });
    }

    if (evaluation.passed) {
      backups.discard();
      return { status: 'completed', applied, result };
    }

    for (const change of applied) {
      context.memory.record({
        path: change.path,
        content: change.content,
        error: tail(evaluation.errorText, LIMITS.STATE_STDERR_TAIL),
        step: step.description
      });
    }
    const restored = await backups.rollback();
    this.emit(EVENTS.STEP.ROLLED_BACK, { step, attempt, files: restored });
    await this.persist(context);
    return { status: 'failed', applied, result };
  }

  /**
   * Write the step's changes inside the project, snapshotting each file
   * first. Unsafe paths, builder files, no-op changes, unappliable diffs and
   * patches the negative memory knows are skipped.
   */
  private async applyChanges(
    context: BuildContext,
    changes: FileChange[],
    backups: BackupStore,
    step: BuildStep
  ): Promise<AppliedChange[]> {
    const applied: AppliedChange[] = [];

    for (const change of changes) {
      let target: string;
      try {
        target = resolveInside(context.outputDir, change.path);
      } catch (error) {
        if (error instanceof UnsafePathError) {
          console.warn(`⚠️  Rejected change to ${change.path}: ${error.message}`);
          continue;
        }
        throw error;
      }

      const relative = toPosixPath(path.relative(context.outputDir, target));
      if (relative === STATE_FILE_NAME || relative === PROJECT_WORK_DIR || relative.startsWith(`${PROJECT_WORK_DIR}/`)) {
        console.warn(`⚠️  Rejected change to builder file ${relative}`);
        continue;
      }

      const current = await readTextFile(target);
      let next: string;
      if ('diff' in change) {
        if (current === null) {
          console.warn(`⚠️  Cannot apply a diff to missing file ${relative}`);
          continue;
        }
        try {
          next = applyUnifiedDiff(current, change.diff);
        } catch (error) {
          if (error instanceof DiffApplyError) {
            console.warn(`⚠️  Diff for ${relative} not applied: ${error.message}`);
            continue;
          }
          throw error;
        }
      } else {
        next = change.code.length > 0 && !change.code.endsWith('\n') ? `${change.code}\n` : change.code;
      }

      if (next === current) {
        continue;
      }
      if (context.memory.isKnownFailure(relative, next)) {
        console.warn(`⚠️  Skipping change to ${relative}: it matches a patch that failed before (step "${step.description}")`);
        continue;
      }

      await backups.snapshot(relative);
      await writeTextFile(target, next);
      applied.push({
        path: relative,
        content: next,
        diff: createUnifiedDiff(relative, current ?? '', next, { maxLines: LIMITS.DIFF_MAX_LINES }),
        created: current === null
      });
    }
    return applied;
  }

  private async execute(context: BuildContext): Promise<CommandResult> {
    const result = await this.runner(context.runCommand, {
      cwd: context.outputDir,
      timeoutMs: context.options.commandTimeoutMs
    });
    context.runs++;
    context.lastResult = result;
    context.lastEvaluation = evaluateRun(result, context.runCommand, context.options.expect);
    context.state.lastRun = {
      command: context.runCommand,
      success: result.success,
      exitCode: result.exitCode,
      stdoutTail: tail(result.stdout, LIMITS.STATE_STDOUT_TAIL),
      stderrTail: tail(result.stderr, LIMITS.STATE_STDERR_TAIL)
    };
    return result;
  }

  // Final check when the loop itself did not run the project
  private async verify(context: BuildContext): Promise<boolean> {
    const result = await this.execute(context);
    await this.persist(context);
    return evaluateRun(result, context.runCommand, context.options.expect).passed;
  }

  private async persist(context: BuildContext): Promise<void> {
    context.state.failedPatches = context.memory.toJSON();
    context.state.steps = context.plan.descriptions;
    await context.stateStore.save(context.state);
  }
}
