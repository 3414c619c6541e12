import { Command } from 'commander';
import { VERSION } from '../version';
import type { CliDeps } from './context';
import { defaultDeps } from './context';
import { registerConfigCommand, registerFixCommand, registerGenerateCommand, registerModelsCommand } from './commands';
import { startShell } from './shell';

export function createProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command();

  program
    .name('agentsteam')
    .description('AI-powered code generation that routes between local Ollama models and cloud models')
    .version(VERSION)
    .addHelpText(
      'after',
      `
Examples:
  $ agentsteam shell
  $ agentsteam generate "Simple REST API for blog posts" --tech python,fastapi
  $ agentsteam generate "CLI todo app" --incremental --run "python main.py" --expect "todo"
  $ agentsteam fix --command "python main.py"
  $ agentsteam config --openai-key YOUR_KEY`
    );

  program
    .command('shell')
    .description('Start the interactive shell')
    .action(async () => {
      await startShell(deps);
    });

  registerGenerateCommand(program, deps);
  registerFixCommand(program, deps);
  registerConfigCommand(program, deps);
  registerModelsCommand(program, deps);

  return program;
}
