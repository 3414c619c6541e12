import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ErrorCorrector, isCompilationError, sourceFilesFromCommand, validationCommand } from './ErrorCorrector';
import { BackupStore } from './BackupStore';
import { PYTHON_COMMAND } from '../config/constants';
import type { CommandResult, RunCommandOptions } from '../services/process-runner';
import { ScriptedGenerator, commandResult, failedResult } from '../testing/fakes';

// Syntax checks pass; every other command takes the next scripted result
function checkingRunner(results: CommandResult[]) {
  const commands: Array<{ command: string; options?: RunCommandOptions }> = [];
  const runner = async (command: string, options?: RunCommandOptions): Promise<CommandResult> => {
    commands.push({ command, options });
    if (command.includes('py_compile')) return commandResult();
    return results.shift() ?? commandResult();
  };
  return { runner, commands };
}

const FIX_RESPONSE = 'EXPLANATION: define y first\n\nFIXED_CODE:\n```python\ny = 1\nprint(y)\n```';

const TRACEBACK = [
  'Traceback (most recent call last):',
  '  File "/usr/lib/python3/site-packages/helper.py", line 3, in <module>',
  '  File "main.py", line 1, in <module>',
  "NameError: name 'y' is not defined"
].join('\n');

describe('ErrorCorrector.analyzeError', () => {
  const corrector = new ErrorCorrector(new ScriptedGenerator([]), { cwd: os.tmpdir() });

  it('should find the innermost project frame of a traceback', () => {
    expect(corrector.analyzeError(TRACEBACK, 'python3 main.py')).toEqual({
      fixable: true,
      language: 'python',
      errorText: TRACEBACK,
      command: 'python3 main.py',
      fileMatch: 'main.py',
      fileMatches: ['main.py'],
      lineNumber: 1
    });
  });

  it('should read node stack traces', () => {
    const text = 'ReferenceError: foo is not defined\n    at Object.<anonymous> (/app/index.js:3:3)';
    const analysis = corrector.analyzeError(text, 'node index.js');
    expect(analysis.fileMatch).toBe('/app/index.js');
    expect(analysis.lineNumber).toBe(3);
    expect(analysis.language).toBe('javascript');
  });

  it('should read compiler errors', () => {
    const analysis = corrector.analyzeError("main.c:5:3: error: expected ';'", 'gcc main.c');
    expect(analysis).toMatchObject({ fileMatch: 'main.c', lineNumber: 5, language: 'c' });
  });

  it('should not treat empty output as fixable', () => {
    expect(corrector.analyzeError('  ', 'make').fixable).toBe(false);
  });
});

describe('compiler output', () => {
  it('should only flag compiler commands that report errors', () => {
    expect(isCompilationError("main.c:3:5: error: expected ';'", 'gcc main.c -o main')).toBe(true);
    expect(isCompilationError('main.c:3:5: warning: unused variable', 'gcc main.c')).toBe(false);
    expect(isCompilationError('error: no such file', 'cat main.c')).toBe(false);
    expect(isCompilationError('error[E0425]: cannot find value', 'cargo build')).toBe(true);
  });

  it('should pick source files out of a command line', () => {
    expect(sourceFilesFromCommand('gcc -Wall main.c util.c -o "app" -lm')).toEqual(['main.c', 'util.c']);
    expect(sourceFilesFromCommand('javac "src/Main.java"')).toEqual(['src/Main.java']);
    expect(sourceFilesFromCommand('make all')).toEqual([]);
  });
});

describe('validationCommand', () => {
  it('should pick a checker by language', () => {
    expect(validationCommand('main.py')).toBe(`${PYTHON_COMMAND} -m py_compile "main.py"`);
    expect(validationCommand('index.js')).toBe('node --check "index.js"');
    expect(validationCommand('README.md')).toBeNull();
  });
});

describe('ErrorCorrector', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-fix-'));
    await fs.writeFile(path.join(root, 'main.py'), 'print(y)\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should rewrite the failing file and keep a backup', async () => {
    const { runner, commands } = checkingRunner([]);
    const corrector = new ErrorCorrector(new ScriptedGenerator([FIX_RESPONSE]), {
      cwd: root,
      runner,
      now: () => new Date('2024-05-01T13:45:09Z')
    });

    const attempt = await corrector.attemptFix(TRACEBACK, 'python3 main.py');

    expect(attempt).toEqual({ fixed: true, filePath: path.join(root, 'main.py') });
    expect(await fs.readFile(path.join(root, 'main.py'), 'utf-8')).toBe('y = 1\nprint(y)\n');
    expect(await fs.readFile(path.join(root, 'main.py.backup.2024-05-01T13-45-09'), 'utf-8')).toBe('print(y)\n');
    expect(commands).toEqual([
      { command: `${PYTHON_COMMAND} -m py_compile ${JSON.stringify(path.join(root, 'main.py'))}`, options: { cwd: root } }
    ]);
  });

  it('should never rewrite a file outside the working directory', async () => {
    const lib = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-lib-'));
    const helper = path.join(lib, 'helper.py');
    await fs.writeFile(helper, 'def helper():\n    return y\n');
    const traceback = [
      'Traceback (most recent call last):',
      '  File "main.py", line 1, in <module>',
      `  File "${helper}", line 2, in helper`,
      "NameError: name 'y' is not defined"
    ].join('\n');

    try {
      const corrector = new ErrorCorrector(new ScriptedGenerator([FIX_RESPONSE]), { cwd: root, runner: checkingRunner([]).runner });
      expect(corrector.analyzeError(traceback, 'python3 main.py').fileMatches).toEqual([helper, 'main.py']);

      const attempt = await corrector.attemptFix(traceback, 'python3 main.py', [helper]);

      expect(attempt).toEqual({ fixed: true, filePath: path.join(root, 'main.py') });
      expect(await fs.readFile(helper, 'utf-8')).toBe('def helper():\n    return y\n');
      expect(await fs.readFile(path.join(root, 'main.py'), 'utf-8')).toBe('y = 1\nprint(y)\n');
    } finally {
      await fs.rm(lib, { recursive: true, force: true });
    }
  });

  it('should report no file when the error only names files outside the working directory', async () => {
    await fs.rm(path.join(root, 'main.py'));
    const corrector = new ErrorCorrector(new ScriptedGenerator([]), { cwd: root, runner: checkingRunner([]).runner });

    const attempt = await corrector.attemptFix('  File "/opt/lib/tool.py", line 4\nValueError: bad', 'python3 run.py');

    expect(attempt).toEqual({ fixed: false, reason: 'Could not locate the file that caused the error' });
  });

  it('should leave backups to the build store when one is given', async () => {
    const backups = new BackupStore(root, 'step-1-a1');
    const corrector = new ErrorCorrector(new ScriptedGenerator([FIX_RESPONSE]), {
      cwd: root,
      runner: checkingRunner([]).runner
    });

    const result = await corrector.fixFile('main.py', "NameError: name 'y' is not defined", backups);

    expect(result).toMatchObject({ success: true, changed: true, backupPath: null });
    expect((await fs.readdir(root)).filter(name => name.includes('.backup.'))).toEqual([]);

    await backups.rollback();
    expect(await fs.readFile(path.join(root, 'main.py'), 'utf-8')).toBe('print(y)\n');
  });

  it('should leave a valid file alone', async () => {
    const { runner } = checkingRunner([]);
    const generator = new ScriptedGenerator([]);
    const corrector = new ErrorCorrector(generator, { cwd: root, runner });

    const result = await corrector.fixFile('main.py');
    expect(result).toEqual({
      success: true,
      changed: false,
      filePath: path.join(root, 'main.py'),
      backupPath: null,
      explanation: 'No errors detected'
    });
    expect(generator.prompts).toEqual([]);
  });

  it('should report a missing file', async () => {
    const corrector = new ErrorCorrector(new ScriptedGenerator([]), { cwd: root, runner: checkingRunner([]).runner });
    const result = await corrector.fixFile('absent.py', 'boom');
    expect(result.success).toBe(false);
    expect(result.error).toBe(`File not found: ${path.join(root, 'absent.py')}`);
  });

  it('should ask again when the first answer has no code', async () => {
    const generator = new ScriptedGenerator(['I am not sure what is wrong.', '```python\ny = 2\nprint(y)\n```']);
    const corrector = new ErrorCorrector(generator, { cwd: root });

    expect(await corrector.generateCodeFix('print(y)\n', 'NameError', 'python', 'main.py')).toEqual({
      code: 'y = 2\nprint(y)',
      explanation: null
    });
    expect(generator.prompts).toHaveLength(2);
  });

  it('should run, fix and run again', async () => {
    const { runner, commands } = checkingRunner([failedResult(TRACEBACK), commandResult({ stdout: '1\n', output: '1\n' })]);
    const corrector = new ErrorCorrector(new ScriptedGenerator([FIX_RESPONSE]), { cwd: root, runner });

    const result = await corrector.runAndFix('python3 main.py', { maxAttempts: 2 });

    expect(result).toEqual({ success: true, attempts: 1, output: '1\n', error: '', fixesApplied: ['main.py'] });
    expect(commands.map(entry => entry.command.split(' ')[0])).toEqual(['python3', PYTHON_COMMAND, 'python3']);
  });

  it('should stop when a failure has no output to work with', async () => {
    const { runner } = checkingRunner([failedResult('')]);
    const corrector = new ErrorCorrector(new ScriptedGenerator([]), { cwd: root, runner });

    const result = await corrector.runAndFix('python3 main.py');
    expect(result).toMatchObject({
      success: false,
      attempts: 0,
      reason: 'The command failed without any error output'
    });
  });
});
