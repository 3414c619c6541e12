import os from 'os';
import path from 'path';
import type { TextGenerator } from '../services/llm/model-client';
import { SYSTEM_PROMPTS, FIX_PROMPTS, TEMPERATURE_SETTINGS, TOKEN_LIMITS, OPERATION_NAMES } from '../services/llm';
import { runCommand, COMMAND_NOT_FOUND_EXIT_CODE } from '../services/process-runner';
import type { CommandRunner } from '../services/process-runner';
import { PYTHON_COMMAND, LIMITS } from '../config/constants';
import type { BackupStore } from './BackupStore';
import { createTimestampedBackup } from './BackupStore';
import {
  extractCode,
  extractExplanation,
  extractFixedCode,
  isSupportedSourceFile,
  languageForPath
} from '../utils/code-extraction';
import { fileExists, readTextFile, resolveInside, walkFiles, writeTextFile } from '../utils/file-helpers';
import { UnsafePathError, extractErrorMessage, logError } from '../utils/error-utils';
import { tail } from '../utils/text-utils';

export interface ErrorAnalysis {
  fixable: boolean;
  language: string | null;
  errorText: string;
  command: string;
  fileMatch: string | null;
  // Every file the error names, most likely culprit first
  fileMatches: string[];
  lineNumber: number | null;
}

export interface CodeFix {
  code: string;
  explanation: string | null;
}

export interface FixResult {
  success: boolean;
  changed: boolean;
  filePath: string;
  backupPath: string | null;
  explanation: string | null;
  error?: string;
}

export interface FixAttempt {
  fixed: boolean;
  filePath?: string;
  reason?: string;
}

export interface RunAndFixResult {
  success: boolean;
  attempts: number;
  output: string;
  error: string;
  reason?: string;
  fixesApplied: string[];
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
  // False when the validator program is not installed
  checked: boolean;
}

export interface ErrorCorrectorOptions {
  cwd?: string;
  runner?: CommandRunner;
  // Syntax-check files after writing a fix
  validate?: boolean;
  now?: () => Date;
}

interface ErrorPattern {
  language: string;
  pattern: RegExp;
  // Take the last match (innermost frame) rather than the first
  last?: boolean;
}

// Ordered: the first pattern that finds a file wins
const ERROR_PATTERNS: ErrorPattern[] = [
  { language: 'python', pattern: /File "([^"<>]+)", line (\d+)/g, last: true },
  { language: 'javascript', pattern: /\bat (?:.*? \()?((?:[A-Za-z]:)?[^\s():]+\.(?:js|mjs|cjs|jsx|ts|tsx)):(\d+):\d+\)?/g },
  { language: 'typescript', pattern: /(\/?(?:[\w.-]+\/)*[\w.-]+\.(?:ts|tsx|js|jsx|mjs|cjs))(?::(\d+):\d+|\((\d+),\d+\))/g },
  { language: 'javascript', pattern: /^(\/?(?:[\w.-]+\/)*[\w.-]+\.(?:js|mjs|cjs)):(\d+)$/gm },
  { language: 'c', pattern: /(\/?(?:[\w.-]+\/)*[\w.-]+\.(?:c|cc|cpp|cxx|h|hpp)):(\d+):(?:\d+:)?\s*(?:fatal )?error/g },
  { language: 'java', pattern: /(\/?(?:[\w.-]+\/)*[\w.-]+\.java):(\d+):\s*error/g },
  { language: 'rust', pattern: /-->\s*(\/?(?:[\w.-]+\/)*[\w.-]+\.rs):(\d+):\d+/g },
  { language: 'go', pattern: /(\/?(?:[\w.-]+\/)*[\w.-]+\.go):(\d+)(?::\d+)?:/g }
];

const COMMON_FILES: Record<string, string[]> = {
  python: ['main.py', 'app.py', 'hello.py', 'script.py', 'run.py'],
  javascript: ['index.js', 'main.js', 'app.js', 'server.js'],
  typescript: ['src/index.ts', 'index.ts', 'main.ts'],
  go: ['main.go'],
  rust: ['src/main.rs', 'main.rs'],
  java: ['Main.java', 'src/Main.java'],
  c: ['main.c'],
  cpp: ['main.cpp', 'main.cc']
};

const LANGUAGE_EXTENSIONS: Record<string, string[]> = {
  python: ['.py'],
  javascript: ['.js', '.mjs', '.cjs', '.jsx'],
  typescript: ['.ts', '.tsx'],
  go: ['.go'],
  rust: ['.rs'],
  java: ['.java'],
  c: ['.c'],
  cpp: ['.cpp', '.cc', '.cxx']
};

function guessLanguageFromCommand(command: string): string | null {
  if (/\b(?:python3?|pytest|pip)\b/.test(command)) return 'python';
  if (/\b(?:tsc|ts-node|tsx)\b/.test(command)) return 'typescript';
  if (/\b(?:node|npm|npx|yarn)\b/.test(command)) return 'javascript';
  if (/\bgo\s/.test(command)) return 'go';
  if (/\b(?:cargo|rustc)\b/.test(command)) return 'rust';
  if (/\bjavac?\b/.test(command)) return 'java';
  if (/\b(?:g\+\+|clang\+\+|c\+\+)/.test(command)) return 'cpp';
  if (/\b(?:gcc|cc|clang|make)\b/.test(command)) return 'c';
  return null;
}

const COMPILE_COMMAND =
  /^\s*(?:gcc|g\+\+|clang\+\+|clang|cc|c\+\+|rustc|javac|tsc|make|cmake|go\s+(?:build|run)|cargo\s+(?:build|run|check))(?=\s|$)/;
const COMPILE_ERROR = /\berror\b|undefined reference|cannot find symbol/i;

/**
 * True when a failed command was a compiler invocation that reported errors
 */
export function isCompilationError(errorText: string, command: string): boolean {
  return COMPILE_COMMAND.test(command) && COMPILE_ERROR.test(errorText);
}

/**
 * Source files named as arguments of a command line
 */
export function sourceFilesFromCommand(command: string): string[] {
  return command
    .split(/\s+/)
    .map(token => token.replace(/^["']|["']$/g, ''))
    .filter(token => token && !token.startsWith('-') && isSupportedSourceFile(token));
}

const quote = (value: string): string => JSON.stringify(value);

/**
 * Syntax-check command for a file, or null when the language has no validator
 */
export function validationCommand(filePath: string): string | null {
  const file = quote(filePath);
  const scratch = os.tmpdir();
  switch (languageForPath(filePath)) {
    case 'python':
      return `${PYTHON_COMMAND} -m py_compile ${file}`;
    case 'javascript':
      return `node --check ${file}`;
    case 'typescript':
      return `tsc --noEmit --skipLibCheck ${file}`;
    case 'go':
      return `go build -o ${quote(path.join(scratch, 'agentsteam-go-check'))} ${file}`;
    case 'java':
      return `javac -d ${quote(scratch)} ${file}`;
    case 'c':
      return `cc -fsyntax-only ${file}`;
    case 'cpp':
      return `c++ -fsyntax-only ${file}`;
    case 'rust':
      return `rustc --emit=metadata -o ${quote(path.join(scratch, 'agentsteam-check.rmeta'))} ${file}`;
    default:
      return null;
  }
}

/**
 * Runs a command, reads its error output, finds the file at fault, asks the
 * model for a corrected version and tries again.
 */
export class ErrorCorrector {
  readonly cwd: string;
  private readonly runner: CommandRunner;
  private readonly validate: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly generator: TextGenerator,
    options: ErrorCorrectorOptions = {}
  ) {
    this.cwd = path.resolve(options.cwd ?? process.cwd());
    this.runner = options.runner ?? runCommand;
    this.validate = options.validate ?? true;
    this.now = options.now ?? (() => new Date());
  }

  analyzeError(errorText: string, command: string = ''): ErrorAnalysis {
    const text = errorText.trim();
    const analysis: ErrorAnalysis = {
      fixable: text.length > 0,
      language: guessLanguageFromCommand(command),
      errorText: text,
      command,
      fileMatch: null,
      fileMatches: [],
      lineNumber: null
    };

    for (const { language, pattern, last } of ERROR_PATTERNS) {
      const matches = [...text.matchAll(pattern)].filter(match => !/site-packages|node_modules|node:internal/.test(match[0]));
      if (matches.length === 0) continue;

      const ordered = last ? [...matches].reverse() : matches;
      const match = ordered[0];
      const line = match[2] ?? match[3];
      analysis.fileMatch = match[1];
      analysis.fileMatches = [...new Set(ordered.map(entry => entry[1]))];
      analysis.lineNumber = line ? parseInt(line, 10) : null;
      analysis.language = languageForPath(match[1]) ?? language;
      break;
    }
    return analysis;
  }

  // Absolute path of a file under cwd, or null for anything outside it
  private projectPath(file: string): string | null {
    try {
      return resolveInside(this.cwd, path.relative(this.cwd, path.resolve(this.cwd, file)));
    } catch (error) {
      if (error instanceof UnsafePathError) return null;
      throw error;
    }
  }

  /**
   * Locate the file to fix: the innermost project file named in the error,
   * then the candidates, then common entry points for the language. Files
   * outside cwd are never returned.
   */
  async findErrorFile(analysis: ErrorAnalysis, candidateFiles: string[] = []): Promise<string | null> {
    for (const file of analysis.fileMatches) {
      const matched = this.projectPath(file);
      if (matched && isSupportedSourceFile(matched) && (await fileExists(matched))) {
        return matched;
      }
    }

    const matchesLanguage = (file: string): boolean =>
      !analysis.language || languageForPath(file) === analysis.language;

    for (const candidate of candidateFiles) {
      const resolved = this.projectPath(candidate);
      if (resolved && isSupportedSourceFile(resolved) && matchesLanguage(resolved) && (await fileExists(resolved))) {
        return resolved;
      }
    }

    if (!analysis.language) {
      return null;
    }

    for (const name of COMMON_FILES[analysis.language] ?? []) {
      const resolved = path.join(this.cwd, name);
      if (await fileExists(resolved)) {
        return resolved;
      }
    }

    const extensions = LANGUAGE_EXTENSIONS[analysis.language] ?? [];
    const found = (await walkFiles(this.cwd, { maxDepth: 4 })).find(file =>
      extensions.includes(path.extname(file).toLowerCase())
    );
    return found ? path.join(this.cwd, found) : null;
  }

  /**
   * Ask for a corrected file; a stricter prompt is used when the first
   * answer holds no usable code
   */
  async generateCodeFix(code: string, errorMessage: string, language: string, filePath: string): Promise<CodeFix | null> {
    const response = await this.generator.generate(FIX_PROMPTS.PRIMARY(code, errorMessage, language, filePath), {
      system: SYSTEM_PROMPTS.FIXER,
      temperature: TEMPERATURE_SETTINGS.FIX,
      maxTokens: TOKEN_LIMITS.FIX,
      operation: OPERATION_NAMES.CODE_FIX
    });

    const fixed = extractFixedCode(response, language);
    if (fixed && fixed.trim() !== code.trim()) {
      return { code: fixed, explanation: extractExplanation(response) };
    }

    const retry = await this.generator.generate(FIX_PROMPTS.STRICT(code, errorMessage, language), {
      codeOnly: true,
      temperature: TEMPERATURE_SETTINGS.FIX,
      maxTokens: TOKEN_LIMITS.FIX,
      operation: OPERATION_NAMES.CODE_FIX
    });
    const strict = extractFixedCode(retry, language) ?? extractCode(retry, language);
    if (!strict.trim() || strict.trim() === code.trim()) {
      return null;
    }
    return { code: strict, explanation: extractExplanation(response) };
  }

  async validateFile(filePath: string): Promise<ValidationResult> {
    const command = validationCommand(filePath);
    if (!command) {
      return { valid: true, checked: false };
    }

    const result = await this.runner(command, { cwd: path.dirname(filePath) });
    if (result.success) {
      return { valid: true, checked: true };
    }
    if (result.exitCode === COMMAND_NOT_FOUND_EXIT_CODE || /command not found|is not recognized/i.test(result.stderr)) {
      return { valid: true, checked: false };
    }
    return { valid: false, error: result.stderr.trim() || result.stdout.trim(), checked: true };
  }

  /**
   * Fix one file. Without an error message the file is validated first and
   * left alone when it is already valid.
   */
  async fixFile(filePath: string, errorMessage?: string, backups?: BackupStore): Promise<FixResult> {
    const absolute = path.resolve(this.cwd, filePath);
    const failure = (error: string): FixResult => ({
      success: false,
      changed: false,
      filePath: absolute,
      backupPath: null,
      explanation: null,
      error
    });

    const original = await readTextFile(absolute);
    if (original === null) {
      return failure(`File not found: ${absolute}`);
    }

    let problem = errorMessage?.trim();
    if (!problem) {
      const validation = await this.validateFile(absolute);
      if (validation.valid) {
        return { success: true, changed: false, filePath: absolute, backupPath: null, explanation: 'No errors detected' };
      }
      problem = validation.error ?? 'File failed validation';
    }

    const language = languageForPath(absolute) ?? 'text';
    try {
      const fix = await this.generateCodeFix(original, problem, language, path.relative(this.cwd, absolute));
      if (!fix) {
        return failure('The model did not return a usable fix');
      }

      // A build's backup store already restores the file on rollback
      if (backups) await backups.snapshot(absolute);
      const backupPath = backups ? null : await createTimestampedBackup(absolute, this.now());
      await writeTextFile(absolute, fix.code.endsWith('\n') ? fix.code : `${fix.code}\n`);

      if (!this.validate) {
        return { success: true, changed: true, filePath: absolute, backupPath, explanation: fix.explanation };
      }

      const validation = await this.validateFile(absolute);
      if (validation.valid) {
        return { success: true, changed: true, filePath: absolute, backupPath, explanation: fix.explanation };
      }

      // One more try with the validator's complaint
      const retry = await this.generateCodeFix(fix.code, validation.error ?? problem, language, path.relative(this.cwd, absolute));
      if (retry) {
        await writeTextFile(absolute, retry.code.endsWith('\n') ? retry.code : `${retry.code}\n`);
        const second = await this.validateFile(absolute);
        return {
          success: second.valid,
          changed: true,
          filePath: absolute,
          backupPath,
          explanation: retry.explanation ?? fix.explanation,
          error: second.valid ? undefined : second.error
        };
      }
      return {
        success: false,
        changed: true,
        filePath: absolute,
        backupPath,
        explanation: fix.explanation,
        error: validation.error
      };
    } catch (error) {
      logError(error, `ErrorCorrector.fixFile(${absolute})`);
      return failure(extractErrorMessage(error));
    }
  }

  /**
   * One fix attempt for a failed run: analyse, locate, rewrite
   */
  async attemptFix(
    errorText: string,
    command: string,
    candidateFiles: string[] = [],
    backups?: BackupStore
  ): Promise<FixAttempt> {
    const analysis = this.analyzeError(errorText, command);
    if (!analysis.fixable) {
      return { fixed: false, reason: 'The command failed without any error output' };
    }

    const file = await this.findErrorFile(analysis, candidateFiles);
    if (!file) {
      return { fixed: false, reason: 'Could not locate the file that caused the error' };
    }

    const result = await this.fixFile(file, tail(analysis.errorText, 4000), backups);
    if (!result.changed) {
      return { fixed: false, filePath: file, reason: result.error ?? `No fix generated for ${file}` };
    }
    return { fixed: true, filePath: file };
  }

  /**
   * Run a command and fix the failing file until it passes or attempts run out
   */
  async runAndFix(
    command: string,
    options: { maxAttempts?: number; candidateFiles?: string[]; timeoutMs?: number } = {}
  ): Promise<RunAndFixResult> {
    const maxAttempts = options.maxAttempts ?? LIMITS.MAX_FIX_ATTEMPTS;
    const fixesApplied: string[] = [];
    let lastError = '';
    let lastOutput = '';

    for (let attempt = 0; attempt <= maxAttempts; attempt++) {
      const result = await this.runner(command, { cwd: this.cwd, timeoutMs: options.timeoutMs });
      lastOutput = result.stdout;
      if (result.success) {
        return { success: true, attempts: attempt, output: result.stdout, error: '', fixesApplied };
      }

      lastError = result.stderr.trim() || result.stdout.trim();
      if (attempt === maxAttempts) {
        break;
      }

      const fix = await this.attemptFix(lastError, command, options.candidateFiles);
      if (!fix.fixed) {
        return { success: false, attempts: attempt, output: lastOutput, error: lastError, reason: fix.reason, fixesApplied };
      }
      fixesApplied.push(path.relative(this.cwd, fix.filePath ?? ''));
    }

    return {
      success: false,
      attempts: maxAttempts,
      output: lastOutput,
      error: lastError,
      reason: `Still failing after ${maxAttempts} fix attempts`,
      fixesApplied
    };
  }
}
