import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { ZodType } from 'zod';
import { UnsafePathError } from './error-utils';

const SKIPPED_DIRECTORIES = new Set(['node_modules', '__pycache__', 'venv', 'dist', 'build', 'target']);
const BACKUP_FILE_PATTERN = /\.backup\.\d{4}-\d{2}-\d{2}T/;

// Check if a file exists
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

// Create directory if it doesn't exist
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    console.error(`Error creating directory ${dirPath}:`, error);
    throw error;
  }
}

// Read a text file, null when it does not exist
export async function readTextFile(filePath: string): Promise<string | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  return fs.readFile(filePath, 'utf-8');
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}

// Read and validate a JSON file, falling back to the default when missing or invalid
export async function readJsonFile<T>(filePath: string, schema: ZodType<T>, defaultValue: T): Promise<T> {
  try {
    if (await fileExists(filePath)) {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed = schema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`Ignoring invalid contents of ${filePath}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
    return defaultValue;
  } catch (error) {
    console.error(`Error reading JSON file ${filePath}:`, error);
    return defaultValue;
  }
}

// Write data to JSON file
export async function writeJsonFile<T>(filePath: string, data: T): Promise<void> {
  try {
    await ensureDirectory(path.dirname(filePath));
    await fs.writeFile(filePath, JSON.stringify(data, null, 2));
  } catch (error) {
    console.error(`Error writing JSON file ${filePath}:`, error);
    throw error;
  }
}

export interface WalkOptions {
  maxDepth?: number;
  includeHidden?: boolean;
}

/**
 * Recursively list project files as sorted, forward-slash relative paths.
 * Dependency folders, hidden entries and timestamped backups are skipped.
 */
export async function walkFiles(rootDir: string, options: WalkOptions = {}): Promise<string[]> {
  const maxDepth = options.maxDepth ?? 6;
  const results: string[] = [];

  const visit = async (dir: string, depth: number): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      if (!options.includeHidden && entry.name.startsWith('.')) continue;
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (SKIPPED_DIRECTORIES.has(entry.name) || depth >= maxDepth) continue;
        await visit(fullPath, depth + 1);
      } else if (entry.isFile() && !BACKUP_FILE_PATTERN.test(entry.name)) {
        results.push(toPosixPath(path.relative(rootDir, fullPath)));
      }
    }
  };

  await visit(rootDir, 0);
  return results.sort();
}

// True when the directory has no project files (hidden entries are ignored)
export async function isDirectoryEmpty(dirPath: string): Promise<boolean> {
  const files = await walkFiles(dirPath, { maxDepth: 1 });
  return files.length === 0;
}

export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Resolve a model-supplied relative path inside rootDir.
 * Absolute paths and paths that climb out of the root are rejected.
 */
export function resolveInside(rootDir: string, relativePath: string): string {
  const cleaned = relativePath.trim().replace(/\\/g, '/');
  if (!cleaned || path.isAbsolute(cleaned) || /^[a-zA-Z]:\//.test(cleaned)) {
    throw new UnsafePathError(relativePath);
  }

  const root = path.resolve(rootDir);
  const target = path.resolve(root, cleaned);
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new UnsafePathError(relativePath);
  }
  return target;
}
