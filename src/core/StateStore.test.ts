import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { StateStore, createBuildState, upsertStepRecord } from './StateStore';
import type { StepRecord } from '../types/build';

const record = (index: number, success: boolean): StepRecord => ({
  index,
  step: `step ${index}`,
  success,
  stdoutTail: '',
  stderrTail: success ? '' : 'boom',
  timestamp: '2024-01-01T00:00:00.000Z'
});

describe('StateStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-state-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should save and load the state file', async () => {
    const store = new StateStore(root);
    expect(await store.load()).toBeNull();

    const state = createBuildState('todo app', ['python'], ['create minimal scaffold']);
    upsertStepRecord(state, record(0, true));
    await store.save(state);

    expect(store.filePath).toBe(path.join(root, '.agentsteam_state.json'));
    expect(await store.load()).toEqual(state);

    await store.reset();
    expect(await store.load()).toBeNull();
  });

  it('should ignore corrupt or foreign files', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new StateStore(root);

    await fs.writeFile(store.filePath, '{');
    expect(await store.load()).toBeNull();

    await fs.writeFile(store.filePath, JSON.stringify({ version: 2 }));
    expect(await store.load()).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe('upsertStepRecord', () => {
  it('should replace the record of the same step', () => {
    const state = createBuildState('todo', [], ['a b', 'c d']);
    upsertStepRecord(state, record(0, false));
    upsertStepRecord(state, record(1, true));
    upsertStepRecord(state, record(0, true));

    expect(state.completedSteps.map(entry => [entry.index, entry.success])).toEqual([[0, true], [1, true]]);
  });
});
