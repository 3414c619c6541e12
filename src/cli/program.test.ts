import path from 'path';
import { describe, it, expect } from 'vitest';
import { createProgram } from './program';
import { defaultDeps } from './context';
import { ConfigStore } from '../config/store';
import { RecordingOutput } from '../testing/fakes';

describe('createProgram', () => {
  it('should register every command', () => {
    const program = createProgram();
    expect(program.commands.map(command => command.name())).toEqual(['shell', 'generate', 'fix', 'config', 'models']);
  });

  it('should pass parsed options to the command', async () => {
    const out = new RecordingOutput();
    const config = new ConfigStore(path.join('/nonexistent', 'config.json'), { models: { mode: 'openai' } }, {});
    const program = createProgram({ ...defaultDeps(), loadConfig: async () => config, output: out });

    await program.parseAsync(['config', '--show'], { from: 'user' });

    expect(out.logs).toContain('Provider mode: openai');
    expect(out.logs).toContain('Config file: /nonexistent/config.json');
  });
});
