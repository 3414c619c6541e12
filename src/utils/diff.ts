/**
 * Unified diff creation and application
 */
import { DiffApplyError } from './error-utils';
import { normalizeWhitespace, splitLines } from './text-utils';
import { LIMITS } from '../config/constants';

type DiffOp = { type: ' ' | '-' | '+'; line: string };

interface Hunk {
  header: string;
  lines: DiffOp[];
}

export interface CreateDiffOptions {
  context?: number;
  maxLines?: number;
}

// Above this many cells the LCS table is skipped and the diff becomes a full replacement
const MAX_LCS_CELLS = 4_000_000;

function diffLines(oldLines: string[], newLines: string[]): DiffOp[] {
  const n = oldLines.length;
  const m = newLines.length;

  if (n * m > MAX_LCS_CELLS) {
    return [
      ...oldLines.map((line): DiffOp => ({ type: '-', line })),
      ...newLines.map((line): DiffOp => ({ type: '+', line }))
    ];
  }

  // lengths[i][j] = LCS length of oldLines[i..] and newLines[j..]
  const lengths: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lengths[i][j] = oldLines[i] === newLines[j]
        ? lengths[i + 1][j + 1] + 1
        : Math.max(lengths[i + 1][j], lengths[i][j + 1]);
    }
  }

  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (oldLines[i] === newLines[j]) {
      ops.push({ type: ' ', line: oldLines[i] });
      i++;
      j++;
    } else if (lengths[i + 1][j] >= lengths[i][j + 1]) {
      ops.push({ type: '-', line: oldLines[i] });
      i++;
    } else {
      ops.push({ type: '+', line: newLines[j] });
      j++;
    }
  }
  while (i < n) ops.push({ type: '-', line: oldLines[i++] });
  while (j < m) ops.push({ type: '+', line: newLines[j++] });
  return ops;
}

/**
 * Create a unified diff between two versions of a file. Returns an empty
 * string when nothing changed; long diffs are cut at maxLines.
 */
export function createUnifiedDiff(
  filePath: string,
  oldText: string,
  newText: string,
  options: CreateDiffOptions = {}
): string {
  const context = options.context ?? 3;
  const maxLines = options.maxLines ?? LIMITS.DIFF_MAX_LINES;
  const ops = diffLines(splitLines(oldText), splitLines(newText));

  const changeIndexes = ops.flatMap((op, index) => (op.type === ' ' ? [] : [index]));
  if (changeIndexes.length === 0) {
    return '';
  }

  // Group changes whose context windows touch
  const groups: Array<[number, number]> = [];
  let groupStart = changeIndexes[0];
  let groupEnd = changeIndexes[0];
  for (const index of changeIndexes.slice(1)) {
    if (index - groupEnd > context * 2) {
      groups.push([groupStart, groupEnd]);
      groupStart = index;
    }
    groupEnd = index;
  }
  groups.push([groupStart, groupEnd]);

  const output = [`--- ${filePath}:old`, `+++ ${filePath}:new`];
  for (const [first, last] of groups) {
    const start = Math.max(0, first - context);
    const end = Math.min(ops.length, last + context + 1);

    const before = ops.slice(0, start);
    const oldBefore = before.filter(op => op.type !== '+').length;
    const newBefore = before.filter(op => op.type !== '-').length;

    const body = ops.slice(start, end);
    const oldCount = body.filter(op => op.type !== '+').length;
    const newCount = body.filter(op => op.type !== '-').length;

    const oldStart = oldCount === 0 ? oldBefore : oldBefore + 1;
    const newStart = newCount === 0 ? newBefore : newBefore + 1;
    output.push(`@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`);
    for (const op of body) {
      output.push(`${op.type}${op.line}`);
    }
  }

  if (output.length > maxLines) {
    return [...output.slice(0, maxLines), '... (truncated)'].join('\n');
  }
  return output.join('\n');
}

function parseHunks(diff: string): Hunk[] {
  const hunks: Hunk[] = [];
  let current: Hunk | null = null;

  for (const rawLine of diff.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (line.startsWith('@@')) {
      current = { header: line, lines: [] };
      hunks.push(current);
      continue;
    }
    if (!current) continue;
    if (line.startsWith('\\')) continue;

    if (line.startsWith('+') && !line.startsWith('+++')) {
      current.lines.push({ type: '+', line: line.slice(1) });
    } else if (line.startsWith('-') && !line.startsWith('---')) {
      current.lines.push({ type: '-', line: line.slice(1) });
    } else if (line.startsWith(' ')) {
      current.lines.push({ type: ' ', line: line.slice(1) });
    } else if (line === '') {
      // Editors and models often strip the leading space of blank context lines
      current.lines.push({ type: ' ', line: '' });
    }
  }

  // Trailing blank context produced by a final newline is not part of the hunk
  for (const hunk of hunks) {
    while (hunk.lines.length > 0) {
      const last = hunk.lines[hunk.lines.length - 1];
      if (last.type !== ' ' || last.line !== '') break;
      hunk.lines.pop();
    }
  }
  return hunks.filter(hunk => hunk.lines.length > 0);
}

function hunkToBeforeAfter(lines: DiffOp[]): { before: string[]; after: string[] } {
  return {
    before: lines.filter(op => op.type !== '+').map(op => op.line),
    after: lines.filter(op => op.type !== '-').map(op => op.line)
  };
}

// Zero-based old-file line a hunk header points at, or null without a usable header
function headerStart(header: string): number | null {
  const match = /^@@ -(\d+)(?:,\d+)? \+/.exec(header);
  if (!match) return null;
  const start = parseInt(match[1], 10);
  return start > 0 ? start - 1 : 0;
}

function findBlocks(haystack: string[], needle: string[], equals: (a: string, b: string) => boolean): number[] {
  const positions: number[] = [];
  for (let position = 0; position + needle.length <= haystack.length; position++) {
    if (needle.every((line, offset) => equals(haystack[position + offset], line))) {
      positions.push(position);
    }
  }
  return positions;
}

const exactEquals = (a: string, b: string): boolean => a === b;
const looseEquals = (a: string, b: string): boolean => normalizeWhitespace(a) === normalizeWhitespace(b);

/**
 * Where the block sits: among the matches (after the cursor when there are
 * any), the one closest to the expected line, the earlier one on a tie.
 */
function locate(lines: string[], before: string[], from: number, expected: number): number {
  for (const equals of [exactEquals, looseEquals]) {
    const positions = findBlocks(lines, before, equals);
    if (positions.length === 0) continue;

    const ahead = positions.filter(position => position >= from);
    const pool = ahead.length > 0 ? ahead : positions;
    return pool.reduce((best, position) =>
      Math.abs(position - expected) < Math.abs(best - expected) ? position : best
    );
  }
  return -1;
}

/**
 * Apply every hunk of a unified diff to content. Hunks are matched by their
 * context, first exactly, then ignoring whitespace, then with progressively
 * less surrounding context. When the context occurs more than once, the
 * hunk header's line number picks the occurrence. Throws without applying
 * anything when a hunk cannot be placed.
 */
export function applyUnifiedDiff(content: string, diff: string): string {
  const hunks = parseHunks(diff);
  if (hunks.length === 0) {
    throw new DiffApplyError('Diff contains no hunks');
  }

  const lines = splitLines(content);
  let cursor = 0;
  // Lines added minus lines removed by the hunks applied so far
  let shift = 0;

  hunks.forEach((hunk, hunkIndex) => {
    const { before, after } = hunkToBeforeAfter(hunk.lines);

    if (before.length === 0) {
      lines.push(...after);
      cursor = lines.length;
      return;
    }

    const start = headerStart(hunk.header);
    const expected = start === null ? cursor : start + shift;

    let position = locate(lines, before, cursor, expected);
    let trimmedBefore = before;
    let trimmedAfter = after;

    if (position === -1) {
      const leading = hunk.lines.findIndex(op => op.type !== ' ');
      const trailing = [...hunk.lines].reverse().findIndex(op => op.type !== ' ');

      for (let k = 1; k <= Math.max(leading, trailing) && position === -1; k++) {
        const dropStart = Math.min(k, leading);
        const dropEnd = Math.min(k, trailing);
        const candidate = hunk.lines.slice(dropStart, hunk.lines.length - dropEnd);
        const reduced = hunkToBeforeAfter(candidate);
        if (reduced.before.length === 0) break;

        position = locate(lines, reduced.before, cursor, expected + dropStart);
        if (position !== -1) {
          trimmedBefore = reduced.before;
          trimmedAfter = reduced.after;
        }
      }
    }

    if (position === -1) {
      throw new DiffApplyError(`Hunk ${hunkIndex + 1} could not be applied: context not found`, {
        hunk: hunkIndex + 1,
        header: hunk.header
      });
    }

    lines.splice(position, trimmedBefore.length, ...trimmedAfter);
    cursor = position + trimmedAfter.length;
    shift += trimmedAfter.length - trimmedBefore.length;
  });

  if (content.trim() !== '' && lines.every(line => line.trim() === '')) {
    throw new DiffApplyError('Diff would remove the entire file content');
  }

  const endsWithNewline = content === '' ? lines.length > 0 : content.endsWith('\n');
  return lines.join('\n') + (endsWithNewline && lines.length > 0 ? '\n' : '');
}

/**
 * Similarity of two texts in [0, 1]: Dice coefficient over their
 * whitespace-normalized non-empty lines.
 */
export function similarity(a: string, b: string): number {
  const toLines = (text: string): string[] =>
    splitLines(text).map(normalizeWhitespace).filter(line => line.length > 0);

  const left = toLines(a);
  const right = toLines(b);
  if (left.length === 0 && right.length === 0) return 1;
  if (left.length === 0 || right.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const line of left) {
    counts.set(line, (counts.get(line) ?? 0) + 1);
  }

  let shared = 0;
  for (const line of right) {
    const available = counts.get(line) ?? 0;
    if (available > 0) {
      shared++;
      counts.set(line, available - 1);
    }
  }
  return (2 * shared) / (left.length + right.length);
}
