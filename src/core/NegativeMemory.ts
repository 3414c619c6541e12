import path from 'path';
import { LIMITS } from '../config/constants';
import type { FailedPatch } from '../types/build';
import { similarity } from '../utils/diff';
import { truncate } from '../utils/text-utils';

function normalizePath(filePath: string): string {
  return path.posix.normalize(filePath.trim().replace(/\\/g, '/')).replace(/^\.\//, '');
}

/**
 * Patches that broke the build and could not be fixed. A later patch that is
 * nearly identical to one of these is not applied again.
 */
export class NegativeMemory {
  private entries: FailedPatch[];

  constructor(
    entries: FailedPatch[] = [],
    private readonly capacity: number = LIMITS.NEGATIVE_MEMORY_SIZE
  ) {
    this.entries = entries.slice(-capacity);
  }

  get size(): number {
    return this.entries.length;
  }

  record(patch: Omit<FailedPatch, 'recordedAt'>, now: Date = new Date()): void {
    const filePath = normalizePath(patch.path);
    this.entries = this.entries.filter(entry => !(entry.path === filePath && entry.content === patch.content));
    this.entries.push({ ...patch, path: filePath, recordedAt: now.toISOString() });

    if (this.entries.length > this.capacity) {
      this.entries = this.entries.slice(this.entries.length - this.capacity);
    }
  }

  /**
   * The most recent failed patch for the same file whose content is at least
   * `threshold` similar, if any
   */
  findSimilar(filePath: string, content: string, threshold: number = LIMITS.NEGATIVE_MEMORY_THRESHOLD): FailedPatch | undefined {
    const normalized = normalizePath(filePath);
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.path === normalized && similarity(entry.content, content) >= threshold) {
        return entry;
      }
    }
    return undefined;
  }

  isKnownFailure(filePath: string, content: string, threshold?: number): boolean {
    return this.findSimilar(filePath, content, threshold) !== undefined;
  }

  // Short summary of recent failures for prompts
  describe(limit: number = 3): string {
    if (this.entries.length === 0) {
      return '';
    }
    return this.entries
      .slice(-limit)
      .map(entry => `- ${entry.path} (step "${entry.step}") failed with: ${truncate(entry.error.trim().split('\n').slice(-1)[0] ?? '', 160)}`)
      .join('\n');
  }

  toJSON(): FailedPatch[] {
    return this.entries.map(entry => ({ ...entry }));
  }
}
