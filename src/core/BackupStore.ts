import fs from 'fs/promises';
import path from 'path';
import { PROJECT_WORK_DIR } from '../config/constants';
import { fileExists, readTextFile, writeTextFile, toPosixPath } from '../utils/file-helpers';

// 2024-05-01T13:45:09 -> 2024-05-01T13-45-09
export function backupTimestamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 19).replace(/:/g, '-');
}

/**
 * Copy a file to `<file>.backup.<timestamp>` before it is rewritten.
 * Returns the backup path, or null when there was nothing to back up.
 */
export async function createTimestampedBackup(filePath: string, now: Date = new Date()): Promise<string | null> {
  if (!(await fileExists(filePath))) {
    return null;
  }
  const backupPath = `${filePath}.backup.${backupTimestamp(now)}`;
  await fs.copyFile(filePath, backupPath);
  return backupPath;
}

/**
 * Snapshots of the files one build step touches, so the step can be undone.
 * A file that did not exist before the step is deleted on rollback.
 */
export class BackupStore {
  private snapshots = new Map<string, string | null>();

  constructor(
    private readonly rootDir: string,
    readonly stepId: string
  ) {}

  get backupDir(): string {
    return path.join(this.rootDir, PROJECT_WORK_DIR, 'backups', this.stepId);
  }

  get paths(): string[] {
    return [...this.snapshots.keys()];
  }

  /**
   * Record the current content of a file (relative to the project root or
   * absolute) the first time it is touched during the step.
   */
  async snapshot(filePath: string): Promise<void> {
    const absolute = path.resolve(this.rootDir, filePath);
    const relative = toPosixPath(path.relative(this.rootDir, absolute));
    if (relative.startsWith('..') || this.snapshots.has(relative)) {
      return;
    }

    const content = await readTextFile(absolute);
    this.snapshots.set(relative, content);
    if (content !== null) {
      await writeTextFile(path.join(this.backupDir, relative), content);
    }
  }

  /**
   * Restore every snapshot. Returns the restored relative paths.
   */
  async rollback(): Promise<string[]> {
    const restored: string[] = [];
    for (const [relative, content] of this.snapshots) {
      const absolute = path.join(this.rootDir, relative);
      if (content === null) {
        await fs.rm(absolute, { force: true });
      } else {
        await writeTextFile(absolute, content);
      }
      restored.push(relative);
    }
    this.snapshots.clear();
    return restored;
  }

  discard(): void {
    this.snapshots.clear();
  }
}
