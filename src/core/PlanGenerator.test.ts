import { afterEach, describe, it, expect, vi } from 'vitest';
import { FALLBACK_STEPS, generateBuildSteps, generateProjectPlan, parseProjectPlan } from './PlanGenerator';
import { ScriptedGenerator } from '../testing/fakes';

describe('generateProjectPlan', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should read the files the model plans', async () => {
    const generator = new ScriptedGenerator([
      '```json\n{"files": [{"path": " main.py ", "description": "entry"}, {"path": "util.py"}]}\n```'
    ]);

    const plan = await generateProjectPlan(generator, 'todo app', ['python']);
    expect(plan).toEqual({
      files: [
        { path: 'main.py', description: 'entry' },
        { path: 'util.py', description: '' }
      ],
      usedFallback: false
    });
    expect(generator.operations).toEqual(['plan_project']);
  });

  it('should fall back to a default layout when the answer is unusable', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const plan = await generateProjectPlan(new ScriptedGenerator(['no plan here']), 'todo api', ['FastAPI']);

    expect(plan.usedFallback).toBe(true);
    expect(plan.files.map(file => file.path)).toEqual(['README.md', 'requirements.txt', 'main.py', 'app.py', 'models.py']);
  });

  it('should fall back when the model fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const plan = await generateProjectPlan(new ScriptedGenerator([new Error('offline')]), 'todo', []);

    expect(plan.usedFallback).toBe(true);
    expect(error).toHaveBeenCalledWith('Error in generateProjectPlan: offline');
  });

  it('should reject plans without files', () => {
    expect(parseProjectPlan('{"files": []}')).toBeNull();
    expect(parseProjectPlan('{"files": [')).toBeNull();
  });
});

describe('generateBuildSteps', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should parse one step per line up to the limit', async () => {
    const generator = new ScriptedGenerator(['1. Create minimal app\n2. Add a parser\n3. Write tests now']);
    expect(await generateBuildSteps(generator, 'calculator', [], 2)).toEqual(['Create minimal app', 'Add a parser']);
  });

  it('should use the default steps for an empty answer', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(await generateBuildSteps(new ScriptedGenerator(['']), 'calculator', [], 3)).toEqual(FALLBACK_STEPS.slice(0, 3));
  });
});
