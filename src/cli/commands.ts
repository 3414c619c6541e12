import path from 'path';
import { Command, Option } from 'commander';
import { CONFIG_KEYS, parseConfigValue } from '../config/store';
import { DEFAULT_OUTPUT_DIR, EVENTS, LIMITS } from '../config/constants';
import { ComplexityAnalyzer, estimateGenerationTime } from '../core/ComplexityAnalyzer';
import { ProjectGenerator } from '../core/ProjectGenerator';
import { TryErrorBuilder } from '../core/TryErrorBuilder';
import type { BuildStep } from '../core/Plan';
import { ErrorCorrector } from '../core/ErrorCorrector';
import type { FixResult } from '../core/ErrorCorrector';
import { DEFAULT_MODELS } from '../services/llm';
import { enableDebugLogging } from '../services/llm/env';
import type { TextGenerator } from '../services/llm/model-client';
import type { CommandResult } from '../services/process-runner';
import { COMPLEXITY_LEVELS, PROVIDER_MODES, describeModel, isComplexity } from '../types/model';
import type { Complexity } from '../types/model';
import type { BuildResult } from '../types/build';
import { isSupportedSourceFile } from '../utils/code-extraction';
import { fileExists, walkFiles } from '../utils/file-helpers';
import { ConfigurationError, extractErrorMessage } from '../utils/error-utils';
import { tail } from '../utils/text-utils';
import type { CliDeps, Output } from './context';
import { createSelector, normalizeServerUrl, parseNonNegativeInt, parsePositiveInt, parseTechnologies } from './context';

export const OPENAI_MODELS = ['gpt-4.1', 'gpt-4.1-mini', 'gpt-4.1-nano', 'o4-mini', 'gpt-4o', 'gpt-4o-mini'];

export interface GenerateCommandOptions {
  tech?: string;
  model?: string;
  output?: string;
  complexity?: string;
  incremental?: boolean;
  run?: string;
  expect?: string;
  maxSteps?: number;
  maxFixAttempts?: number;
  resume?: boolean;
  dynamicRun?: boolean;
}

export interface FixCommandOptions {
  file?: string;
  command?: string;
  error?: string;
  maxAttempts?: number;
  debug?: boolean;
}

export interface ConfigCommandOptions {
  openaiKey?: string;
  anthropicKey?: string;
  ollamaUrl?: string;
  mode?: string;
  set?: string;
  show?: boolean;
}

/**
 * Print builder progress as it happens
 */
export function attachBuildReporter(builder: TryErrorBuilder, out: Output): void {
  builder.on(EVENTS.BUILD.PLAN_CREATED, (event: { steps: string[] }) => {
    out.log(`📋 Plan (${event.steps.length} steps):`);
    event.steps.forEach((step, index) => out.log(`  ${index + 1}. ${step}`));
  });
  builder.on(EVENTS.STEP.STARTED, (event: { step: BuildStep; attempt: number }) => {
    const retry = event.attempt > 0 ? ` (retry ${event.attempt})` : '';
    out.log(`\n▶️  Step ${event.step.index + 1}: ${event.step.description}${retry}`);
  });
  builder.on(EVENTS.STEP.SKIPPED, (event: { step: BuildStep; reason: string }) => {
    out.log(`⏭️  Skipped step ${event.step.index + 1}: ${event.reason}`);
  });
  builder.on(EVENTS.STEP.CHANGES_APPLIED, (event: { files: string[] }) => {
    out.log(`📝 Changed: ${event.files.join(', ')}`);
  });
  builder.on(EVENTS.STEP.RUN_COMPLETED, (event: { result: CommandResult; passed: boolean }) => {
    out.log(event.passed ? '✅ Run passed' : `❌ Run failed (exit ${event.result.exitCode ?? 'n/a'})`);
  });
  builder.on(EVENTS.STEP.FIX_ATTEMPT, (event: { attempt: number; fixed: boolean; filePath?: string; reason?: string }) => {
    out.log(
      event.fixed
        ? `🔧 Fix attempt ${event.attempt}: rewrote ${event.filePath ?? 'a file'}`
        : `🔧 Fix attempt ${event.attempt} gave up: ${event.reason ?? 'no fix'}`
    );
  });
  builder.on(EVENTS.STEP.ROLLED_BACK, (event: { files: string[] }) => {
    out.log(`↩️  Rolled back: ${event.files.join(', ') || 'nothing to restore'}`);
  });
  builder.on(EVENTS.BUILD.STAGNATION, () => {
    out.log('⚠️  No progress in the last steps, stopping');
  });
}

function reportBuild(result: BuildResult, out: Output): void {
  const completed = result.completedSteps.filter(record => record.success).length;
  out.log('');
  if (result.success) {
    out.log(`✅ Build finished: ${completed}/${result.steps.length} steps completed`);
  } else {
    const where = result.failedStep ? ` at step "${result.failedStep}"` : '';
    out.log(`❌ Build stopped (${result.stopReason})${where}`);
    if (result.stderr?.trim()) {
      out.log(tail(result.stderr.trim(), LIMITS.INTROSPECTION_STDERR_TAIL));
    }
  }
  out.log(`▶️  Run command: ${result.runCommand}`);
  out.log(`⏱️  Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
}

export async function runGenerate(description: string, options: GenerateCommandOptions, deps: CliDeps): Promise<number> {
  const out = deps.output;
  try {
    const config = await deps.loadConfig();
    const selector = createSelector(config, deps);
    const technologies = parseTechnologies(options.tech);
    out.log(`🚀 Generating: ${description}`);

    let complexity: Complexity;
    if (options.complexity) {
      if (!isComplexity(options.complexity)) {
        throw new ConfigurationError(`Unknown complexity "${options.complexity}" (expected ${COMPLEXITY_LEVELS.join(', ')})`);
      }
      complexity = options.complexity;
      out.log(`🎯 Using forced complexity: ${complexity}`);
    } else {
      const analysis = new ComplexityAnalyzer().analyze(description, technologies);
      complexity = analysis.level;
      out.log(`🔍 Detected complexity: ${complexity} (score ${analysis.score})`);
    }

    const requested = options.model ?? config.getString(CONFIG_KEYS.DEFAULT_MODEL);
    const info = await selector.resolveModel(requested, complexity);
    out.log(`${requested ? '🎯 Using model' : '🤖 Selected model'}: ${describeModel(info)}`);
    out.log(`⏱️  Estimated time: ~${estimateGenerationTime(complexity, info.provider)}s`);

    const generator = deps.createGenerator(selector, info);
    const outputDir = path.resolve(deps.cwd(), options.output ?? DEFAULT_OUTPUT_DIR);

    if (options.incremental) {
      return await runIncremental(description, technologies, outputDir, options, generator, deps);
    }

    const result = await new ProjectGenerator(generator, message => out.log(message)).generate({
      description,
      technologies,
      outputDir
    });

    if (!result.success) {
      out.error(`❌ Generation failed: ${result.error ?? 'Unknown error'}`);
      return 1;
    }

    out.log('\n✅ Code generated successfully!');
    out.log(`📁 Output directory: ${result.outputDir}`);
    out.log(`📊 Files created: ${result.filesCreated}`);
    if (result.failedFiles.length > 0) {
      out.log(`⚠️  Not generated: ${result.failedFiles.join(', ')}`);
    }
    out.log(`⏱️  Generation time: ${(result.generationTimeMs / 1000).toFixed(1)}s`);
    if (result.instructions.length > 0) {
      out.log('\n📋 Next steps:');
      result.instructions.forEach(instruction => out.log(`  • ${instruction}`));
    }
    return 0;
  } catch (error) {
    out.error(`❌ Error: ${extractErrorMessage(error)}`);
    return 1;
  }
}

async function runIncremental(
  description: string,
  technologies: string[],
  outputDir: string,
  options: GenerateCommandOptions,
  generator: TextGenerator,
  deps: CliDeps
): Promise<number> {
  const builder = new TryErrorBuilder({ generator, runner: deps.runner });
  attachBuildReporter(builder, deps.output);

  const result = await builder.run({
    description,
    technologies,
    outputDir,
    runCommand: options.run,
    maxSteps: options.maxSteps,
    expect: options.expect,
    dynamicRun: options.dynamicRun,
    resume: options.resume,
    maxFixAttempts: options.maxFixAttempts
  });
  reportBuild(result, deps.output);
  return result.success ? 0 : 1;
}

function reportFix(result: FixResult, out: Output): void {
  if (result.success && !result.changed) {
    out.log(`✅ No errors detected in ${result.filePath}`);
  } else if (result.success) {
    out.log(`✅ Fixed: ${result.filePath}`);
    if (result.backupPath) out.log(`💾 Backup: ${result.backupPath}`);
    if (result.explanation) out.log(`🔧 ${result.explanation}`);
  } else {
    out.error(`❌ Could not fix ${result.filePath}: ${result.error ?? 'unknown error'}`);
  }
}

export async function runFix(target: string | undefined, options: FixCommandOptions, deps: CliDeps): Promise<number> {
  const out = deps.output;
  if (options.debug) {
    enableDebugLogging();
  }

  try {
    out.log('🔧 AgentsTeam error correction');
    const config = await deps.loadConfig();
    const selector = createSelector(config, deps);
    const info = await selector.getBestModel();
    if (!info) {
      out.error('❌ No AI models available. Start Ollama or run: agentsteam config --openai-key YOUR_KEY');
      return 1;
    }
    out.log(`🤖 Using model: ${describeModel(info)}`);

    const cwd = deps.cwd();
    const corrector = new ErrorCorrector(deps.createGenerator(selector, info), { cwd, runner: deps.runner });

    let command = options.command;
    let file = options.file;
    // A bare target is a file when it exists, otherwise a command
    if (!command && !file && target) {
      if (await fileExists(path.resolve(cwd, target))) {
        file = target;
      } else {
        command = target;
      }
    }

    if (command) {
      out.log(`🚀 Running with auto-fix: ${command}`);
      const result = await corrector.runAndFix(command, { maxAttempts: options.maxAttempts });
      if (result.success) {
        out.log(`✅ Command succeeded after ${result.attempts} fix(es)`);
        if (result.fixesApplied.length > 0) out.log(`🔧 Fixed files: ${result.fixesApplied.join(', ')}`);
        if (result.output.trim()) out.log(`\n📄 Output:\n${result.output.trimEnd()}`);
        return 0;
      }
      out.error(`❌ Command failed: ${result.reason ?? 'unknown reason'}`);
      if (result.error) out.error(`\n📄 Error:\n${result.error}`);
      return 1;
    }

    if (file) {
      out.log(`🔍 Analyzing file: ${file}`);
      const result = await corrector.fixFile(file, options.error);
      reportFix(result, out);
      return result.success ? 0 : 1;
    }

    const candidates = (await walkFiles(cwd, { maxDepth: 1 })).filter(isSupportedSourceFile);
    if (candidates.length === 0) {
      out.log('No source files found in the current directory.');
      out.log('\nUsage examples:');
      out.log('  agentsteam fix --file main.py');
      out.log("  agentsteam fix --command 'python main.py'");
      out.log("  agentsteam fix 'python main.py'");
      return 0;
    }

    out.log(`🔍 Checking ${candidates.length} file(s)...`);
    let failures = 0;
    for (const candidate of candidates) {
      const result = await corrector.fixFile(candidate);
      reportFix(result, out);
      if (!result.success) failures++;
    }
    return failures > 0 ? 1 : 0;
  } catch (error) {
    out.error(`❌ Error: ${extractErrorMessage(error)}`);
    return 1;
  }
}

export async function runConfig(options: ConfigCommandOptions, deps: CliDeps): Promise<number> {
  const out = deps.output;
  try {
    const config = await deps.loadConfig();
    let changed = false;

    if (options.openaiKey) {
      await config.set(CONFIG_KEYS.OPENAI_API_KEY, options.openaiKey.trim());
      out.log('✅ OpenAI API key configured');
      changed = true;
    }
    if (options.anthropicKey) {
      await config.set(CONFIG_KEYS.ANTHROPIC_API_KEY, options.anthropicKey.trim());
      out.log('✅ Anthropic API key configured');
      changed = true;
    }
    if (options.ollamaUrl) {
      const url = normalizeServerUrl(options.ollamaUrl);
      await config.set(CONFIG_KEYS.OLLAMA_BASE_URL, url);
      out.log(`✅ Ollama server set to ${url}`);
      changed = true;
    }
    if (options.mode) {
      await config.set(CONFIG_KEYS.PROVIDER_MODE, options.mode);
      out.log(`✅ Provider mode set to ${options.mode}`);
      changed = true;
    }
    if (options.set) {
      const separator = options.set.indexOf('=');
      if (separator <= 0) {
        throw new ConfigurationError(`Expected key=value, got "${options.set}"`);
      }
      const key = options.set.slice(0, separator).trim();
      await config.set(key, parseConfigValue(options.set.slice(separator + 1)));
      out.log(`✅ Set ${key}`);
      changed = true;
    }

    if (options.show || !changed) {
      out.log('\n🔧 Current configuration:');
      out.log(`Config file: ${config.filePath}`);
      out.log(`OpenAI API key: ${config.openaiKey ? 'configured' : 'not configured'}`);
      out.log(`Anthropic API key: ${config.anthropicKey ? 'configured' : 'not configured'}`);
      out.log(`Ollama URL: ${config.ollamaUrl}`);
      out.log(`Provider mode: ${config.getString(CONFIG_KEYS.PROVIDER_MODE, 'auto')}`);
      out.log(JSON.stringify(config.redacted(), null, 2));
    }
    return 0;
  } catch (error) {
    out.error(`❌ Error: ${extractErrorMessage(error)}`);
    return 1;
  }
}

export async function runModels(deps: CliDeps): Promise<number> {
  const out = deps.output;
  try {
    const config = await deps.loadConfig();
    const selector = createSelector(config, deps);
    out.log('\n🤖 Available models:');

    const local = await selector.getOllamaModels();
    if (local.length > 0) {
      out.log(`\n📍 Local (Ollama at ${selector.ollamaUrl}):`);
      local.forEach(model => out.log(`  • ${model}`));
    } else {
      out.log(`\n❌ Ollama not available at ${selector.ollamaUrl} (install: https://ollama.com/download)`);
    }

    if (selector.hasOpenAIKey()) {
      out.log('\n☁️  OpenAI:');
      OPENAI_MODELS.forEach(model => out.log(`  • ${model}`));
    } else {
      out.log('\n❌ OpenAI not configured (run: agentsteam config --openai-key YOUR_KEY)');
    }

    if (selector.hasAnthropicKey()) {
      out.log('\n☁️  Anthropic:');
      out.log(`  • ${DEFAULT_MODELS.ANTHROPIC_DEFAULT}`);
    }
    return 0;
  } catch (error) {
    out.error(`❌ Error: ${extractErrorMessage(error)}`);
    return 1;
  }
}

const setExitCode = (code: number): void => {
  if (code !== 0) {
    process.exitCode = code;
  }
};

export function registerGenerateCommand(program: Command, deps: CliDeps): void {
  program
    .command('generate')
    .description('Generate a project from a description')
    .argument('<description>', 'project description')
    .option('-t, --tech <list>', 'technologies (comma-separated)')
    .option('-m, --model <model>', 'force a model, e.g. ollama:qwen2.5-coder:7b or openai:gpt-4.1-mini')
    .option('-o, --output <dir>', 'output directory', DEFAULT_OUTPUT_DIR)
    .addOption(new Option('-c, --complexity <level>', 'force the complexity level').choices(COMPLEXITY_LEVELS))
    .option('-i, --incremental', 'build step by step, running and fixing after each step')
    .option('--run <command>', 'command that checks the project (incremental)')
    .option('--expect <text>', 'text the run output must contain (incremental)')
    .option('--max-steps <n>', 'maximum number of build steps (incremental)', parsePositiveInt)
    .option('--max-fix-attempts <n>', 'fix attempts per failing step (incremental)', parseNonNegativeInt)
    .option('--dynamic-run', 'infer the run command again before each step (incremental)')
    .option('--resume', 'continue from the saved build state (incremental)')
    .action(async (description: string, options: GenerateCommandOptions) => {
      setExitCode(await runGenerate(description, options, deps));
    });
}

export function registerFixCommand(program: Command, deps: CliDeps): void {
  program
    .command('fix')
    .description('Fix errors in a file, or run a command and fix what makes it fail')
    .argument('[target]', 'file to fix or command to run')
    .option('-f, --file <file>', 'file to analyze and fix')
    .option('-c, --command <command>', 'command to run and auto-fix')
    .option('-e, --error <message>', 'error message to address')
    .option('--max-attempts <n>', 'maximum fix attempts', parsePositiveInt, LIMITS.MAX_FIX_ATTEMPTS)
    .option('--debug', 'print debug output')
    .action(async (target: string | undefined, options: FixCommandOptions) => {
      setExitCode(await runFix(target, options, deps));
    });
}

export function registerConfigCommand(program: Command, deps: CliDeps): void {
  program
    .command('config')
    .description('Configure API keys and settings')
    .option('--openai-key <key>', 'set the OpenAI API key')
    .option('--anthropic-key <key>', 'set the Anthropic API key')
    .option('--ollama-url <url>', 'set the Ollama server URL')
    .addOption(new Option('--mode <mode>', 'default provider mode').choices(PROVIDER_MODES))
    .option('--set <key=value>', 'set any configuration key')
    .option('--show', 'show the current configuration')
    .action(async (options: ConfigCommandOptions) => {
      setExitCode(await runConfig(options, deps));
    });
}

export function registerModelsCommand(program: Command, deps: CliDeps): void {
  program
    .command('models')
    .description('List available models')
    .action(async () => {
      setExitCode(await runModels(deps));
    });
}
