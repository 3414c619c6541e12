import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import readline from 'readline';
import type { ConfigStore } from '../config/store';
import { CONFIG_KEYS, parseConfigValue } from '../config/store';
import { LIMITS } from '../config/constants';
import { analyzeMessageComplexity } from '../core/ComplexityAnalyzer';
import type { ModelSelector } from '../core/ModelSelector';
import { parseModelString } from '../core/ModelSelector';
import { ErrorCorrector, isCompilationError, sourceFilesFromCommand } from '../core/ErrorCorrector';
import { TryErrorBuilder } from '../core/TryErrorBuilder';
import { SYSTEM_PROMPTS, SHELL_PROMPTS, TEMPERATURE_SETTINGS, TOKEN_LIMITS, OPERATION_NAMES } from '../services/llm';
import type { LLMMessage } from '../services/llm';
import { COMPLEXITY_LEVELS, describeModel, isProviderMode } from '../types/model';
import type { Complexity, ModelInfo } from '../types/model';
import { isSupportedSourceFile, languageForPath, parseShellDirectives } from '../utils/code-extraction';
import type { ShellDirective } from '../utils/code-extraction';
import { isDangerousCommand } from '../utils/command-safety';
import { readTextFile, resolveInside, toPosixPath, walkFiles, writeTextFile } from '../utils/file-helpers';
import { extractErrorMessage } from '../utils/error-utils';
import { detectTestCommand, formatTree } from '../utils/project-utils';
import { globToRegExp, isGlob, splitLines, truncate } from '../utils/text-utils';
import type { CliDeps, Output } from './context';
import { createSelector, defaultDeps, normalizeServerUrl } from './context';
import { attachBuildReporter } from './commands';

type CommandHandler = (args: string[]) => Promise<void>;

// Directives from a chat reply run with a shorter leash than direct commands
const DIRECTIVE_TIMEOUT_MS = 30000;

const HELP_TEXT = `
🤖 AgentsTeam shell

Built-in commands:
  help             show this help
  models           list available models
  config [k v]     show the configuration, or set a key
  cd <dir>         change directory
  ls               list files
  cat <file>       show a file
  run <command>    run a command (dangerous commands are blocked)
  project [name]   show or set the current project name
  clear            clear the chat history
  exit             leave the shell

Direct commands:
  \\<command>       run a shell command as typed, e.g. \\ls -la
                   a failed compile (gcc, javac, cargo build, ...) is fixed automatically

Anything else is sent to the model. Replies may create directories and
files or run commands inside the current directory.
Type /help for slash commands.`;

const SLASH_HELP_TEXT = `
Slash commands:
  /model           current model and what auto mode would pick
  /models          list available models
  /select MODEL    always use MODEL (e.g. /select openai:gpt-4.1-mini)
  /switch MODE     auto | ollama | openai | anthropic
  /ollama          use local Ollama models only
  /openai          use OpenAI models only
  /auto            pick models by message complexity
  /status          session and provider status
  /server URL      set the Ollama server (port 11434 is added when missing)
  /fix FILE [ERR]  fix a file
  /build DESC      build a project in the current directory step by step
  /tree [DIR]      show the directory tree
  /read PATH|GLOB  show files with line numbers
  /find TEXT [GLOB|DIR/]  search files for TEXT (case-insensitive)
  /test            run the project's tests
  /explain FILE [FOCUS]  explain a file
  /analyze [PATH|GLOB]   review up to 3 source files
  /git ARGS        run a git command
  /retry           run the last direct command again
  /clear           clear the chat history`;

/**
 * State and command dispatch for one interactive session. Reading the
 * terminal is left to startShell so the session can be driven directly.
 */
export class ShellSession {
  cwd: string;
  project: string | null = null;
  history: LLMMessage[] = [];
  forcedModel: ModelInfo | null = null;
  lastModel: ModelInfo | null = null;
  lastCommand: string | null = null;
  private closed = false;
  private readonly out: Output;
  private readonly builtins: Record<string, CommandHandler>;
  private readonly slashCommands: Record<string, CommandHandler>;

  constructor(
    private readonly config: ConfigStore,
    private readonly selector: ModelSelector,
    private readonly deps: CliDeps
  ) {
    this.cwd = deps.cwd();
    this.out = deps.output;

    this.builtins = {
      help: async () => this.out.log(HELP_TEXT),
      models: () => this.listModels(),
      config: args => this.configCommand(args),
      cd: args => this.changeDirectory(args),
      ls: () => this.listFiles(),
      cat: args => this.showFile(args),
      run: args => this.runSafely(args.join(' ')),
      project: async args => this.projectCommand(args),
      clear: async () => this.clearHistory(),
      exit: async () => this.close()
    };

    this.slashCommands = {
      '/help': async () => this.out.log(SLASH_HELP_TEXT),
      '/model': () => this.modelInfo(),
      '/models': () => this.listModels(),
      '/select': args => this.selectModel(args),
      '/switch': async args => this.switchMode(args[0] ?? ''),
      '/ollama': async () => this.switchMode('ollama'),
      '/openai': async () => this.switchMode('openai'),
      '/auto': async () => this.switchMode('auto'),
      '/status': () => this.status(),
      '/server': args => this.setServer(args),
      '/fix': args => this.fixFile(args),
      '/build': args => this.build(args.join(' ')),
      '/tree': args => this.showTree(args),
      '/read': args => this.readFiles(args),
      '/find': args => this.findText(args),
      '/test': () => this.runTests(),
      '/explain': args => this.explain(args),
      '/analyze': args => this.analyze(args),
      '/git': args => this.git(args),
      '/retry': () => this.retry(),
      '/clear': async () => this.clearHistory()
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get prompt(): string {
    let indicator: string;
    if (this.forcedModel) {
      indicator = describeModel(this.forcedModel);
    } else if (this.selector.mode !== 'auto') {
      indicator = this.selector.mode;
    } else {
      indicator = this.lastModel ? `auto:${this.lastModel.model}` : 'auto';
    }
    return `[${path.basename(this.cwd) || this.cwd}|${indicator}] > `;
  }

  async printBanner(): Promise<void> {
    this.out.log('🤖 AgentsTeam interactive shell');
    this.out.log("Type 'help' for commands, /help for slash commands, or describe what you want to build.");
    this.out.log(`Current directory: ${this.cwd}`);
    await this.status();
  }

  /**
   * Route one line: `\cmd` runs directly, `/cmd` is a slash command, a known
   * first word is a built-in, anything else goes to the model
   */
  async handleInput(line: string): Promise<void> {
    const input = line.trim();
    if (!input) {
      return;
    }

    try {
      if (input.startsWith('\\')) {
        await this.runDirect(input.slice(1).trim());
        return;
      }

      const [first, ...args] = input.split(/\s+/);
      const name = first.toLowerCase();

      if (name.startsWith('/')) {
        const handler = this.slashCommands[name];
        if (handler) {
          await handler(args);
        } else {
          this.out.log(`❓ Unknown command ${name}. Type /help for the list.`);
        }
        return;
      }

      const builtin = this.builtins[name];
      if (builtin) {
        await builtin(args);
        return;
      }

      await this.chat(input);
    } catch (error) {
      this.out.error(`❌ ${extractErrorMessage(error)}`);
    }
  }

  async chat(message: string): Promise<void> {
    this.out.log('🤔 Thinking...');
    const info = this.forcedModel ?? (await this.selector.selectModel(analyzeMessageComplexity(message)));
    this.lastModel = info;
    this.out.log(`🧠 Using: ${describeModel(info)}`);

    const recent = this.history
      .slice(-LIMITS.CHAT_HISTORY)
      .map(entry => `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`)
      .join('\n');

    const generator = this.deps.createGenerator(this.selector, info);
    const response = await generator.generate(SHELL_PROMPTS.CHAT(message, this.cwd, recent), {
      system: SYSTEM_PROMPTS.SHELL,
      temperature: TEMPERATURE_SETTINGS.CHAT,
      maxTokens: TOKEN_LIMITS.CHAT,
      operation: OPERATION_NAMES.CHAT
    });

    this.out.log(`🤖 ${response}`);
    this.history.push({ role: 'user', content: message }, { role: 'assistant', content: response });
    await this.applyDirectives(parseShellDirectives(response));
  }

  /**
   * Carry out CREATE DIR, CREATE FILE and RUN COMMAND directives inside the
   * current directory
   */
  async applyDirectives(directives: ShellDirective[]): Promise<void> {
    for (const directive of directives) {
      try {
        switch (directive.type) {
          case 'mkdir':
            await fs.mkdir(resolveInside(this.cwd, directive.path), { recursive: true });
            this.out.log(`📁 Created directory: ${directive.path}`);
            break;
          case 'file':
            await writeTextFile(resolveInside(this.cwd, directive.path), directive.content);
            this.out.log(`✅ Created: ${directive.path}`);
            break;
          case 'run':
            await this.runSafely(directive.command, DIRECTIVE_TIMEOUT_MS);
            break;
        }
      } catch (error) {
        this.out.error(`❌ ${extractErrorMessage(error)}`);
      }
    }
  }

  async runDirect(command: string): Promise<void> {
    if (!command) {
      this.out.log('Usage: \\<command>');
      return;
    }
    this.lastCommand = command;
    this.out.log(`💻 Executing: ${command}`);
    const result = await this.deps.runner(command, { cwd: this.cwd });
    if (result.stdout.trim()) this.out.log(result.stdout.trimEnd());
    if (!result.success) {
      this.out.log(`⚠️  ${result.stderr.trimEnd() || `exit code ${result.exitCode ?? 'unknown'}`}`);
      const errorText = result.stderr.trim() || result.stdout.trim();
      if (isCompilationError(errorText, command)) {
        await this.fixCompilation(command, errorText);
      }
    } else if (result.stderr.trim()) {
      this.out.log(result.stderr.trimEnd());
    }
  }

  private async fixCompilation(command: string, errorText: string): Promise<void> {
    this.out.log('🤖 Compilation error detected, trying an automatic fix...');
    const info = await this.modelFor('medium');
    const corrector = new ErrorCorrector(this.deps.createGenerator(this.selector, info), {
      cwd: this.cwd,
      runner: this.deps.runner
    });
    const fix = await corrector.attemptFix(errorText, command, sourceFilesFromCommand(command));
    if (fix.fixed && fix.filePath) {
      this.out.log(`🔧 Fixed ${toPosixPath(path.relative(this.cwd, fix.filePath))}. Use /retry to run the command again.`);
    } else {
      this.out.log(`❌ Automatic fix failed: ${fix.reason ?? 'unknown reason'}`);
    }
  }

  async runSafely(command: string, timeoutMs?: number): Promise<void> {
    if (!command.trim()) {
      this.out.log('Usage: run <command>');
      return;
    }
    if (isDangerousCommand(command)) {
      this.out.log(`🛡️  BLOCKED: ${command}`);
      this.out.log('   Privileged, destructive, system-path and pipe-to-shell commands are not run from the shell.');
      return;
    }

    this.out.log(`🔧 Running: ${command}`);
    const result = await this.deps.runner(command, { cwd: this.cwd, timeoutMs });
    if (result.timedOut) {
      this.out.log('⏱️  Command timed out');
    }
    if (result.stdout.trim()) this.out.log(`📤 Output:\n${result.stdout.trimEnd()}`);
    if (result.stderr.trim()) this.out.log(`⚠️  Errors:\n${result.stderr.trimEnd()}`);
  }

  private async changeDirectory(args: string[]): Promise<void> {
    const raw = args.join(' ');
    const target = !raw || raw === '~' ? os.homedir() : path.resolve(this.cwd, raw.replace(/^~(?=\/)/, os.homedir()));
    const stats = await fs.stat(target).catch(() => null);
    if (!stats?.isDirectory()) {
      this.out.log(`❌ Directory not found: ${raw}`);
      return;
    }
    this.cwd = target;
    this.out.log(`📁 Changed to: ${this.cwd}`);
  }

  private async listFiles(): Promise<void> {
    const entries = await fs.readdir(this.cwd, { withFileTypes: true });
    if (entries.length === 0) {
      this.out.log('📁 Directory is empty');
      return;
    }
    this.out.log(`📁 Contents of ${this.cwd}:`);
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      this.out.log(`  ${entry.isDirectory() ? '📁' : '📄'} ${entry.name}`);
    }
  }

  private async showFile(args: string[]): Promise<void> {
    const name = args.join(' ');
    if (!name) {
      this.out.log('Usage: cat <file>');
      return;
    }
    const content = await readTextFile(path.resolve(this.cwd, name));
    if (content === null) {
      this.out.log(`❌ File not found: ${name}`);
      return;
    }
    this.out.log(`📄 ${name}:`);
    this.out.log('-'.repeat(40));
    this.out.log(content.trimEnd());
    this.out.log('-'.repeat(40));
  }

  private async configCommand(args: string[]): Promise<void> {
    if (args.length === 0) {
      this.out.log('⚙️  Configuration:');
      this.out.log(JSON.stringify(this.config.redacted(), null, 2));
      return;
    }
    if (args.length < 2) {
      this.out.log('Usage: config <key> <value>');
      return;
    }
    const [key, ...value] = args;
    await this.config.set(key, parseConfigValue(value.join(' ')));
    this.selector.refresh();
    this.out.log(`✅ Set ${key}`);
  }

  private projectCommand(args: string[]): void {
    if (args.length === 0) {
      this.out.log(`📂 Current project: ${this.project ?? 'None'}`);
      return;
    }
    this.project = args.join(' ');
    this.out.log(`📂 Project set to: ${this.project}`);
  }

  private clearHistory(): void {
    this.history = [];
    this.out.log('🧹 Chat history cleared');
  }

  private close(): void {
    this.closed = true;
    this.out.log('👋 Goodbye!');
  }

  private async listModels(): Promise<void> {
    const local = await this.selector.getOllamaModels(true);
    this.out.log('🤖 Available models:');
    this.out.log(local.length > 0 ? `📍 Ollama: ${local.join(', ')}` : `❌ Ollama not available at ${this.selector.ollamaUrl}`);
    this.out.log(this.selector.hasOpenAIKey() ? '☁️  OpenAI: configured' : '❌ OpenAI not configured');
    this.out.log(this.selector.hasAnthropicKey() ? '☁️  Anthropic: configured' : '❌ Anthropic not configured');
  }

  private async modelInfo(): Promise<void> {
    this.out.log('🧠 Current model configuration:');
    this.out.log(this.forcedModel ? `   Selected: ${describeModel(this.forcedModel)}` : `   Mode: ${this.selector.mode}`);
    if (this.lastModel) {
      this.out.log(`   Last used: ${describeModel(this.lastModel)}`);
    }
    if (this.forcedModel) {
      return;
    }

    this.out.log('\n   Selection preview:');
    for (const complexity of COMPLEXITY_LEVELS) {
      try {
        const info = await this.selector.selectModel(complexity);
        this.out.log(`   ${complexity.padEnd(8)} → ${describeModel(info)}`);
      } catch (error) {
        this.out.log(`   ${complexity.padEnd(8)} → ❌ ${extractErrorMessage(error)}`);
      }
    }
  }

  private async selectModel(args: string[]): Promise<void> {
    if (args.length === 0) {
      this.out.log('Usage: /select MODEL (e.g. /select qwen2.5-coder:7b, /select openai:gpt-4.1-mini)');
      return;
    }

    const info = parseModelString(args[0]);
    if (info.provider === 'ollama') {
      const available = await this.selector.getOllamaModels();
      if (!available.includes(info.model)) {
        this.out.log(`❌ Model '${info.model}' not found in Ollama. Install it with: ollama pull ${info.model}`);
        return;
      }
      this.forcedModel = { ...info, baseUrl: this.selector.ollamaUrl };
    } else if (info.provider === 'openai' && !this.selector.hasOpenAIKey()) {
      this.out.log('❌ OpenAI API key not configured');
      return;
    } else if (info.provider === 'anthropic' && !this.selector.hasAnthropicKey()) {
      this.out.log('❌ Anthropic API key not configured');
      return;
    } else {
      this.forcedModel = info;
    }
    this.out.log(`✅ Will use ${describeModel(info)} for all requests. Use /auto to return to automatic selection.`);
  }

  private switchMode(mode: string): void {
    const normalized = mode.trim().toLowerCase();
    if (!isProviderMode(normalized)) {
      this.out.log('Usage: /switch [auto|ollama|openai|anthropic]');
      this.out.log(`Current mode: ${this.selector.mode}`);
      return;
    }
    this.selector.setMode(normalized);
    this.forcedModel = null;
    this.out.log(`🔄 Provider mode: ${normalized}`);
  }

  private async status(): Promise<void> {
    const local = await this.selector.getOllamaModels();
    this.out.log(`📍 Ollama: ${local.length > 0 ? `✅ ${local.length} model(s)` : '❌ not available'} at ${this.selector.ollamaUrl}`);
    this.out.log(`☁️  OpenAI: ${this.selector.hasOpenAIKey() ? '✅ configured' : '❌ not configured'}`);
    this.out.log(`☁️  Anthropic: ${this.selector.hasAnthropicKey() ? '✅ configured' : '❌ not configured'}`);
    this.out.log(`🧠 Mode: ${this.forcedModel ? describeModel(this.forcedModel) : this.selector.mode}`);
    this.out.log(`💬 Chat history: ${this.history.length} message(s)`);
  }

  private async setServer(args: string[]): Promise<void> {
    if (args.length === 0) {
      this.out.log(`Current Ollama server: ${this.selector.ollamaUrl}`);
      this.out.log('Usage: /server <url>, e.g. /server 192.168.1.62');
      return;
    }

    const url = normalizeServerUrl(args[0]);
    await this.config.set(CONFIG_KEYS.OLLAMA_BASE_URL, url);
    this.selector.refresh();
    this.out.log(`🖥️  Ollama server set to: ${url}`);

    const models = await this.selector.getOllamaModels();
    this.out.log(models.length > 0 ? `✅ Found ${models.length} model(s): ${models.slice(0, 5).join(', ')}` : '⚠️  No models found on that server');
  }

  private async fixFile(args: string[]): Promise<void> {
    const [file, ...errorWords] = args;
    if (!file) {
      this.out.log('Usage: /fix FILE [ERROR MESSAGE]');
      return;
    }

    const info = await this.modelFor('medium');
    const corrector = new ErrorCorrector(this.deps.createGenerator(this.selector, info), {
      cwd: this.cwd,
      runner: this.deps.runner
    });
    const result = await corrector.fixFile(file, errorWords.join(' ') || undefined);
    if (result.success) {
      this.out.log(result.changed ? `✅ Fixed: ${result.filePath}` : `✅ No errors detected in ${result.filePath}`);
      if (result.explanation && result.changed) this.out.log(`🔧 ${result.explanation}`);
    } else {
      this.out.log(`❌ Could not fix ${result.filePath}: ${result.error ?? 'unknown error'}`);
    }
  }

  private async modelFor(complexity: Complexity): Promise<ModelInfo> {
    return this.forcedModel ?? this.selector.selectModel(complexity);
  }

  // Relative paths of the files a name, a glob or a directory stands for
  private async resolveTargets(target: string): Promise<string[]> {
    if (isGlob(target)) {
      const matcher = globToRegExp(target.replace(/^\.\//, ''));
      return (await walkFiles(this.cwd, { maxDepth: LIMITS.TREE_DEPTH })).filter(file => matcher.test(file));
    }

    const absolute = path.resolve(this.cwd, target);
    const stats = await fs.stat(absolute).catch(() => null);
    if (!stats) {
      return [];
    }
    const relative = toPosixPath(path.relative(this.cwd, absolute));
    if (stats.isDirectory()) {
      const files = await walkFiles(absolute, { maxDepth: LIMITS.TREE_DEPTH });
      return relative ? files.map(file => `${relative}/${file}`) : files;
    }
    return [relative];
  }

  private async showTree(args: string[]): Promise<void> {
    const raw = args.join(' ');
    const target = path.resolve(this.cwd, raw || '.');
    const stats = await fs.stat(target).catch(() => null);
    if (!stats?.isDirectory()) {
      this.out.log(`❌ Directory not found: ${raw}`);
      return;
    }
    const files = await walkFiles(target, { maxDepth: LIMITS.TREE_DEPTH });
    this.out.log(`🌳 ${path.basename(target) || target}/`);
    this.out.log(files.length > 0 ? formatTree(files).join('\n') : '   (empty)');
  }

  private async readFiles(args: string[]): Promise<void> {
    const target = args.join(' ');
    if (!target) {
      this.out.log('Usage: /read FILE|PATTERN (e.g. /read main.py, /read src/*.py)');
      return;
    }
    const files = await this.resolveTargets(target);
    if (files.length === 0) {
      this.out.log(`❌ No files match: ${target}`);
      return;
    }

    for (const file of files.slice(0, LIMITS.READ_FILES)) {
      const content = await readTextFile(path.resolve(this.cwd, file));
      if (content === null) continue;
      const lines = splitLines(content);
      this.out.log(`📄 ${file} (${content.length} chars, ${lines.length} lines)`);
      this.out.log('─'.repeat(60));
      this.out.log(lines.map((line, index) => `${String(index + 1).padStart(3)}│ ${line}`).join('\n'));
      this.out.log('─'.repeat(60));
    }
    if (files.length > LIMITS.READ_FILES) {
      this.out.log(`... and ${files.length - LIMITS.READ_FILES} more file(s)`);
    }
  }

  private async findText(args: string[]): Promise<void> {
    const last = args[args.length - 1] ?? '';
    const scoped = args.length > 1 && (isGlob(last) || last.endsWith('/'));
    const query = (scoped ? args.slice(0, -1) : args).join(' ');
    if (!query) {
      this.out.log('Usage: /find TEXT [GLOB|DIR/] (e.g. /find TODO *.py)');
      return;
    }

    const needle = query.toLowerCase();
    const matches: Array<{ file: string; line: number; text: string }> = [];
    for (const file of await this.resolveTargets(scoped ? last : '.')) {
      const content = await readTextFile(path.resolve(this.cwd, file));
      // Skip unreadable and binary files
      if (content === null || content.includes('\u0000')) continue;
      splitLines(content).forEach((text, index) => {
        if (text.toLowerCase().includes(needle)) {
          matches.push({ file, line: index + 1, text: text.trim() });
        }
      });
    }

    if (matches.length === 0) {
      this.out.log(`❌ No matches for "${query}"`);
      return;
    }
    this.out.log(`🔍 ${matches.length} match(es) for "${query}":`);
    let currentFile: string | null = null;
    for (const match of matches.slice(0, LIMITS.FIND_MATCHES)) {
      if (match.file !== currentFile) {
        currentFile = match.file;
        this.out.log(`📄 ${match.file}`);
      }
      this.out.log(`${String(match.line).padStart(3)}│ ${match.text}`);
    }
    if (matches.length > LIMITS.FIND_MATCHES) {
      this.out.log(`... and ${matches.length - LIMITS.FIND_MATCHES} more matches`);
    }
  }

  private async runTests(): Promise<void> {
    const command = detectTestCommand(await walkFiles(this.cwd, { maxDepth: 3 }));
    if (!command) {
      this.out.log('❌ No tests found (looked for test_*.py, *_test.py, package.json, Cargo.toml and go.mod)');
      return;
    }
    this.out.log(`🧪 Running tests: ${command}`);
    await this.runSafely(command);
  }

  private async git(args: string[]): Promise<void> {
    if (args.length === 0) {
      this.out.log('Usage: /git ARGS (e.g. /git status, /git log --oneline)');
      return;
    }
    await this.runDirect(`git ${args.join(' ')}`);
  }

  private async explain(args: string[]): Promise<void> {
    const [file, ...focus] = args;
    if (!file) {
      this.out.log('Usage: /explain FILE [FOCUS]');
      return;
    }
    const content = await readTextFile(path.resolve(this.cwd, file));
    if (content === null) {
      this.out.log(`❌ File not found: ${file}`);
      return;
    }

    const info = await this.modelFor('medium');
    this.out.log(`📖 Explaining ${file} with ${describeModel(info)}...`);
    const response = await this.deps.createGenerator(this.selector, info).generate(
      SHELL_PROMPTS.EXPLAIN(
        file,
        truncate(content, LIMITS.PROMPT_FILE_CHARS),
        languageForPath(file) ?? 'text',
        focus.join(' ') || undefined
      ),
      {
        system: SYSTEM_PROMPTS.ASSISTANT,
        temperature: TEMPERATURE_SETTINGS.CHAT,
        maxTokens: TOKEN_LIMITS.CHAT,
        operation: OPERATION_NAMES.EXPLAIN
      }
    );
    this.out.log(response.trim());
  }

  private async analyze(args: string[]): Promise<void> {
    const target = args.join(' ') || '.';
    const files = (await this.resolveTargets(target)).filter(file => isSupportedSourceFile(file));
    if (files.length === 0) {
      this.out.log(`❌ No source files to analyze in ${target}`);
      return;
    }

    const selected = files.slice(0, LIMITS.ANALYZE_FILES);
    const info = await this.modelFor('medium');
    const generator = this.deps.createGenerator(this.selector, info);
    this.out.log(`🔬 Analyzing ${selected.length} file(s) with ${describeModel(info)}...`);

    for (const file of selected) {
      const content = await readTextFile(path.resolve(this.cwd, file));
      if (content === null) continue;
      const response = await generator.generate(
        SHELL_PROMPTS.ANALYZE(file, truncate(content, LIMITS.PROMPT_FILE_CHARS), languageForPath(file) ?? 'text'),
        {
          system: SYSTEM_PROMPTS.ASSISTANT,
          temperature: TEMPERATURE_SETTINGS.FIX,
          maxTokens: TOKEN_LIMITS.CHAT,
          operation: OPERATION_NAMES.ANALYZE
        }
      );
      this.out.log(`📄 ${file}:\n${response.trim()}`);
    }
  }

  private async build(description: string): Promise<void> {
    if (!description.trim()) {
      this.out.log('Usage: /build DESCRIPTION');
      return;
    }

    const info = this.forcedModel ?? (await this.selector.selectModel(analyzeMessageComplexity(description)));
    const builder = new TryErrorBuilder({ generator: this.deps.createGenerator(this.selector, info), runner: this.deps.runner });
    attachBuildReporter(builder, this.out);

    const result = await builder.run({ description, outputDir: this.cwd, resume: true });
    this.out.log(result.success ? '✅ Build finished' : `❌ Build stopped (${result.stopReason})`);
  }

  private async retry(): Promise<void> {
    if (!this.lastCommand) {
      this.out.log('❌ No previous command to retry');
      return;
    }
    this.out.log(`🔄 Retrying: ${this.lastCommand}`);
    await this.runDirect(this.lastCommand);
  }
}

/**
 * Read lines from the terminal until `exit` or end of input
 */
export async function startShell(deps: CliDeps = defaultDeps()): Promise<void> {
  const config = await deps.loadConfig();
  const session = new ShellSession(config, createSelector(config, deps), deps);
  await session.printBanner();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    deps.output.log("\n👋 Use 'exit' to quit");
    rl.prompt();
  });

  try {
    rl.setPrompt(session.prompt);
    rl.prompt();
    for await (const line of rl) {
      await session.handleInput(line);
      if (session.isClosed) {
        break;
      }
      rl.setPrompt(session.prompt);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
