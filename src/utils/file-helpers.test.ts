import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  fileExists,
  isDirectoryEmpty,
  readJsonFile,
  readTextFile,
  resolveInside,
  walkFiles,
  writeJsonFile,
  writeTextFile
} from './file-helpers';
import { UnsafePathError } from './error-utils';

describe('file-helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agentsteam-files-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should write text files into missing directories', async () => {
    await writeTextFile(path.join(root, 'a/b/c.txt'), 'hello');
    expect(await readTextFile(path.join(root, 'a/b/c.txt'))).toBe('hello');
    expect(await readTextFile(path.join(root, 'missing.txt'))).toBeNull();
    expect(await fileExists(path.join(root, 'a/b'))).toBe(true);
  });

  it('should validate JSON files against a schema', async () => {
    const schema = z.object({ count: z.number() });
    const file = path.join(root, 'data.json');

    await writeJsonFile(file, { count: 2 });
    expect(await readJsonFile(file, schema, { count: 0 })).toEqual({ count: 2 });

    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await fs.writeFile(file, JSON.stringify({ count: 'two' }));
    expect(await readJsonFile(file, schema, { count: 0 })).toEqual({ count: 0 });
    expect(await readJsonFile(path.join(root, 'none.json'), schema, { count: 7 })).toEqual({ count: 7 });
  });

  it('should walk project files and skip noise', async () => {
    await writeTextFile(path.join(root, 'main.py'), 'print(1)\n');
    await writeTextFile(path.join(root, 'pkg/util.py'), 'x = 1\n');
    await writeTextFile(path.join(root, 'node_modules/dep/index.js'), '');
    await writeTextFile(path.join(root, '.hidden/secret'), '');
    await writeTextFile(path.join(root, 'main.py.backup.2024-01-02T03-04-05'), '');

    expect(await walkFiles(root)).toEqual(['main.py', 'pkg/util.py']);
    expect(await walkFiles(root, { maxDepth: 0 })).toEqual(['main.py']);
  });

  it('should report empty directories', async () => {
    expect(await isDirectoryEmpty(root)).toBe(true);
    await writeTextFile(path.join(root, '.agentsteam_state.json'), '{}');
    expect(await isDirectoryEmpty(root)).toBe(true);
    await writeTextFile(path.join(root, 'main.py'), '');
    expect(await isDirectoryEmpty(root)).toBe(false);
  });

  it('should resolve paths inside the root only', () => {
    expect(resolveInside(root, 'src/app.py')).toBe(path.join(root, 'src', 'app.py'));
    expect(() => resolveInside(root, '../escape.py')).toThrow(UnsafePathError);
    expect(() => resolveInside(root, '/etc/passwd')).toThrow(UnsafePathError);
    expect(() => resolveInside(root, 'C:/Windows/win.ini')).toThrow(UnsafePathError);
    expect(() => resolveInside(root, '  ')).toThrow(UnsafePathError);
    expect(() => resolveInside(root, '.')).toThrow(UnsafePathError);
  });
});
