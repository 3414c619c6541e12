import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ShellSession } from './shell';
import { createSelector } from './context';
import type { CliDeps } from './context';
import { ConfigStore } from '../config/store';
import { RecordingOutput, ScriptedGenerator, commandResult, failedResult, scriptedRunner } from '../testing/fakes';

describe('ShellSession', () => {
  let root: string;
  let out: RecordingOutput;
  let config: ConfigStore;
  let runner: ReturnType<typeof scriptedRunner>;
  let generator: ScriptedGenerator;
  let models: string[];

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-shell-'));
    out = new RecordingOutput();
    config = new ConfigStore(path.join(root, '.cfg', 'config.json'), {}, {});
    runner = scriptedRunner();
    generator = new ScriptedGenerator([]);
    models = ['qwen2.5-coder:7b'];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  function createSession(): ShellSession {
    const deps: CliDeps = {
      loadConfig: async () => config,
      listModels: async () => models,
      runner,
      createGenerator: () => generator,
      output: out,
      cwd: () => root
    };
    return new ShellSession(config, createSelector(config, deps), deps);
  }

  it('should show the directory and mode in the prompt', async () => {
    const session = createSession();
    expect(session.prompt).toBe(`[${path.basename(root)}|auto] > `);

    await session.handleInput('/ollama');
    expect(session.prompt).toBe(`[${path.basename(root)}|ollama] > `);

    await session.handleInput('/select qwen2.5-coder:7b');
    expect(session.prompt).toBe(`[${path.basename(root)}|ollama:qwen2.5-coder:7b] > `);
  });

  it('should run direct commands and retry the last one', async () => {
    runner = scriptedRunner([commandResult({ stdout: 'a.txt\n' }), failedResult('', 2)]);
    const session = createSession();

    await session.handleInput('\\ls -la');
    await session.handleInput('/retry');

    expect(runner).toHaveBeenNthCalledWith(1, 'ls -la', { cwd: root });
    expect(out.logs).toEqual([
      '💻 Executing: ls -la',
      'a.txt',
      '🔄 Retrying: ls -la',
      '💻 Executing: ls -la',
      '⚠️  exit code 2'
    ]);
  });

  it('should block dangerous commands', async () => {
    const session = createSession();

    await session.handleInput('run sudo rm -rf /');

    expect(runner).not.toHaveBeenCalled();
    expect(out.logs).toEqual([
      '🛡️  BLOCKED: sudo rm -rf /',
      '   Privileged, destructive, system-path and pipe-to-shell commands are not run from the shell.'
    ]);
  });

  it('should apply directives from a chat reply', async () => {
    generator = new ScriptedGenerator([
      ['CREATE DIRECTORY: src', 'CREATE FILE: src/app.py', '```python', 'print("hi")', '```', 'RUN COMMAND: python3 src/app.py'].join(
        '\n'
      )
    ]);
    runner = scriptedRunner([commandResult({ stdout: 'hi\n' })]);
    const session = createSession();

    await session.handleInput('/select qwen2.5-coder:7b');
    await session.handleInput('make a hello script');

    expect(out.logs.slice(1, 3)).toEqual(['🤔 Thinking...', '🧠 Using: ollama:qwen2.5-coder:7b']);
    expect(out.logs.slice(4)).toEqual([
      '📁 Created directory: src',
      '✅ Created: src/app.py',
      '🔧 Running: python3 src/app.py',
      '📤 Output:\nhi'
    ]);
    expect(await fs.readFile(path.join(root, 'src', 'app.py'), 'utf-8')).toBe('print("hi")\n');
    expect(runner).toHaveBeenCalledWith('python3 src/app.py', { cwd: root, timeoutMs: 30000 });
    expect(session.history.map(entry => entry.role)).toEqual(['user', 'assistant']);
    expect(generator.operations).toEqual(['chat']);
  });

  it('should refuse directives that leave the working directory', async () => {
    const session = createSession();

    await session.applyDirectives([{ type: 'file', path: '../outside.txt', content: 'x' }]);

    expect(out.errors).toHaveLength(1);
    expect(out.logs).toEqual([]);
  });

  it('should reject an Ollama model that is not installed', async () => {
    const session = createSession();

    await session.handleInput('/select llama3:8b');

    expect(session.forcedModel).toBeNull();
    expect(out.logs).toEqual(["❌ Model 'llama3:8b' not found in Ollama. Install it with: ollama pull llama3:8b"]);
  });

  it('should point the session at another Ollama server', async () => {
    models = ['llama3:8b', 'gemma2:2b'];
    const session = createSession();

    await session.handleInput('/server 192.168.1.62');

    expect(out.logs).toEqual([
      '🖥️  Ollama server set to: http://192.168.1.62:11434',
      '✅ Found 2 model(s): llama3:8b, gemma2:2b'
    ]);
    expect(config.ollamaUrl).toBe('http://192.168.1.62:11434');
  });

  it('should handle built-in commands', async () => {
    await fs.mkdir(path.join(root, 'pkg'));
    const session = createSession();

    await session.handleInput('project demo');
    await session.handleInput('cat missing.txt');
    await session.handleInput('cd nowhere');
    await session.handleInput('cd pkg');
    await session.handleInput('/switch cloud');
    await session.handleInput('/nope');

    expect(out.logs).toEqual([
      '📂 Project set to: demo',
      '❌ File not found: missing.txt',
      '❌ Directory not found: nowhere',
      `📁 Changed to: ${path.join(root, 'pkg')}`,
      'Usage: /switch [auto|ollama|openai|anthropic]',
      'Current mode: auto',
      '❓ Unknown command /nope. Type /help for the list.'
    ]);
    expect(session.cwd).toBe(path.join(root, 'pkg'));
  });

  it('should show files with line numbers', async () => {
    await fs.writeFile(path.join(root, 'main.py'), 'import sys\nprint(sys.argv)\n');
    const session = createSession();

    await session.handleInput('/read main.py');
    await session.handleInput('/read *.md');

    expect(out.logs).toEqual([
      '📄 main.py (27 chars, 2 lines)',
      '─'.repeat(60),
      '  1│ import sys\n  2│ print(sys.argv)',
      '─'.repeat(60),
      '❌ No files match: *.md'
    ]);
  });

  it('should draw the directory tree', async () => {
    await fs.mkdir(path.join(root, 'src'));
    await fs.writeFile(path.join(root, 'src', 'app.py'), 'print(1)\n');
    await fs.writeFile(path.join(root, 'README.md'), '# demo\n');
    const session = createSession();

    await session.handleInput('/tree');

    expect(out.logs).toEqual([`🌳 ${path.basename(root)}/`, '├── src/\n│   └── app.py\n└── README.md']);
  });

  it('should find text across files and within a directory', async () => {
    await fs.mkdir(path.join(root, 'src'));
    await fs.writeFile(path.join(root, 'main.py'), 'import sys\nprint(sys.argv)\n');
    await fs.writeFile(path.join(root, 'src', 'app.py'), 'SYS = 1\n');
    const session = createSession();

    await session.handleInput('/find sys');
    await session.handleInput('/find sys src/');
    await session.handleInput('/find nothing-here');

    expect(out.logs).toEqual([
      '🔍 3 match(es) for "sys":',
      '📄 main.py',
      '  1│ import sys',
      '  2│ print(sys.argv)',
      '📄 src/app.py',
      '  1│ SYS = 1',
      '🔍 1 match(es) for "sys":',
      '📄 src/app.py',
      '  1│ SYS = 1',
      '❌ No matches for "nothing-here"'
    ]);
  });

  it('should run the detected test command and git', async () => {
    await fs.mkdir(path.join(root, 'tests'));
    await fs.writeFile(path.join(root, 'tests', 'test_app.py'), 'def test_ok():\n    assert True\n');
    const session = createSession();

    await session.handleInput('/test');
    await session.handleInput('/git status --short');

    expect(runner.mock.calls.map(call => call[0])).toEqual(['pytest -v', 'git status --short']);
    expect(out.logs).toEqual(['🧪 Running tests: pytest -v', '🔧 Running: pytest -v', '💻 Executing: git status --short']);
  });

  it('should fix a file after a failed compile', async () => {
    await fs.writeFile(path.join(root, 'main.c'), 'int main() {\n    int x = 1\n    return x;\n}\n');
    runner = scriptedRunner([failedResult("main.c:2:14: error: expected ';' before 'return'")]);
    generator = new ScriptedGenerator([
      'EXPLANATION: add the missing semicolon\n\nFIXED_CODE:\n```c\nint main() {\n    int x = 1;\n    return x;\n}\n```'
    ]);
    const session = createSession();

    await session.handleInput('/select qwen2.5-coder:7b');
    await session.handleInput('\\gcc main.c -o main');

    expect(out.logs.slice(1)).toEqual([
      '💻 Executing: gcc main.c -o main',
      "⚠️  main.c:2:14: error: expected ';' before 'return'",
      '🤖 Compilation error detected, trying an automatic fix...',
      '🔧 Fixed main.c. Use /retry to run the command again.'
    ]);
    expect(await fs.readFile(path.join(root, 'main.c'), 'utf-8')).toBe('int main() {\n    int x = 1;\n    return x;\n}\n');
    expect(generator.operations).toEqual(['fix_code']);
    expect(session.lastCommand).toBe('gcc main.c -o main');
  });

  it('should not try to fix a failure that is not a compile error', async () => {
    runner = scriptedRunner([failedResult('error: pathspec did not match')]);
    const session = createSession();

    await session.handleInput('\\git checkout nope');

    expect(out.logs).toEqual(['💻 Executing: git checkout nope', '⚠️  error: pathspec did not match']);
    expect(generator.prompts).toEqual([]);
  });

  it('should explain a file with the model', async () => {
    await fs.writeFile(path.join(root, 'main.py'), 'import sys\nprint(sys.argv)\n');
    generator = new ScriptedGenerator(['It prints its command line arguments.\n']);
    const session = createSession();

    await session.handleInput('/select qwen2.5-coder:7b');
    await session.handleInput('/explain main.py argv handling');
    await session.handleInput('/explain missing.py');

    expect(out.logs.slice(1)).toEqual([
      '📖 Explaining main.py with ollama:qwen2.5-coder:7b...',
      'It prints its command line arguments.',
      '❌ File not found: missing.py'
    ]);
    expect(generator.operations).toEqual(['explain_code']);
    expect(generator.prompts[0]).toContain('focusing on: argv handling');
  });

  it('should analyze source files only', async () => {
    await fs.writeFile(path.join(root, 'main.py'), 'print(1)\n');
    await fs.writeFile(path.join(root, 'notes.txt'), 'todo\n');
    generator = new ScriptedGenerator(['No issues found']);
    const session = createSession();

    await session.handleInput('/select qwen2.5-coder:7b');
    await session.handleInput('/analyze');

    expect(out.logs.slice(1)).toEqual([
      '🔬 Analyzing 1 file(s) with ollama:qwen2.5-coder:7b...',
      '📄 main.py:\nNo issues found'
    ]);
    expect(generator.operations).toEqual(['analyze_code']);
  });

  it('should close on exit', async () => {
    const session = createSession();

    await session.handleInput('exit');

    expect(session.isClosed).toBe(true);
    expect(out.logs).toEqual(['👋 Goodbye!']);
  });
});
