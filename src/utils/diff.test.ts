import { describe, it, expect } from 'vitest';
import { applyUnifiedDiff, createUnifiedDiff, similarity } from './diff';
import { DiffApplyError } from './error-utils';

describe('createUnifiedDiff', () => {
  it('should render a single changed line with surrounding context', () => {
    const diff = createUnifiedDiff('a.py', 'a\nb\nc\n', 'a\nB\nc\n');
    expect(diff).toBe(['--- a.py:old', '+++ a.py:new', '@@ -1,3 +1,3 @@', ' a', '-b', '+B', ' c'].join('\n'));
  });

  it('should return an empty string when nothing changed', () => {
    expect(createUnifiedDiff('a.py', 'same\n', 'same\n')).toBe('');
  });

  it('should truncate long diffs', () => {
    const content = Array.from({ length: 200 }, (_, i) => `line ${i + 1}`).join('\n');
    const lines = createUnifiedDiff('f', '', content, { maxLines: 10 }).split('\n');

    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('--- f:old');
    expect(lines[2]).toBe('@@ -0,0 +1,200 @@');
    expect(lines[10]).toBe('... (truncated)');
  });
});

describe('applyUnifiedDiff', () => {
  it('should apply a diff produced by createUnifiedDiff', () => {
    const original = 'a\nb\nc\n';
    const diff = createUnifiedDiff('a.py', original, 'a\nB\nc\n');
    expect(applyUnifiedDiff(original, diff)).toBe('a\nB\nc\n');
  });

  it('should match context that differs only in whitespace', () => {
    const original = 'def f():\n    return 1\n';
    const diff = '@@ -1,2 +1,2 @@\n def f():\n-  return 1\n+    return 2';
    expect(applyUnifiedDiff(original, diff)).toBe('def f():\n    return 2\n');
  });

  it('should drop context lines that do not match', () => {
    const diff = '@@ -1,3 +1,3 @@\n WRONG\n x\n-y\n+Y\n z';
    expect(applyUnifiedDiff('x\ny\nz\n', diff)).toBe('x\nY\nz\n');
  });

  it('should treat bare empty lines as blank context', () => {
    const diff = '@@ -1,3 +1,3 @@\n a\n\n-b\n+c\n';
    expect(applyUnifiedDiff('a\n\nb\n', diff)).toBe('a\n\nc\n');
  });

  it('should append when a hunk has no context', () => {
    expect(applyUnifiedDiff('a\n', '@@ -1,0 +2,1 @@\n+b')).toBe('a\nb\n');
  });

  it('should use the hunk header to choose between repeated context', () => {
    const original = 'def a():\n    x = 1\n    return x\n\ndef b():\n    x = 1\n    return x\n';
    const diff = '@@ -6,2 +6,2 @@\n     x = 1\n-    return x\n+    return x * 2';
    expect(applyUnifiedDiff(original, diff)).toBe(
      'def a():\n    x = 1\n    return x\n\ndef b():\n    x = 1\n    return x * 2\n'
    );
  });

  it('should account for lines added by earlier hunks', () => {
    const diff = '@@ -1,1 +1,2 @@\n a\n+inserted\n@@ -4,1 +5,1 @@\n-dup\n+DUP';
    expect(applyUnifiedDiff('a\ndup\nb\ndup\nc\n', diff)).toBe('a\ninserted\ndup\nb\nDUP\nc\n');
  });

  it('should take the first repeated block when the header has no line numbers', () => {
    expect(applyUnifiedDiff('dup\nx\ndup\n', '@@ @@\n-dup\n+one')).toBe('one\nx\ndup\n');
  });

  it('should reject a diff without hunks', () => {
    expect(() => applyUnifiedDiff('a\n', 'garbage')).toThrow(DiffApplyError);
    expect(() => applyUnifiedDiff('a\n', 'garbage')).toThrow('Diff contains no hunks');
  });

  it('should reject a hunk whose context is missing', () => {
    expect(() => applyUnifiedDiff('a\n', '@@ -1 +1 @@\n-nothere\n+x')).toThrow(
      'Hunk 1 could not be applied: context not found'
    );
  });

  it('should refuse to empty a file', () => {
    expect(() => applyUnifiedDiff('a\n', '@@ -1 +0,0 @@\n-a')).toThrow('Diff would remove the entire file content');
  });
});

describe('similarity', () => {
  it('should score identical text as 1', () => {
    expect(similarity('a\nb', 'a\nb')).toBe(1);
    expect(similarity('', '')).toBe(1);
  });

  it('should score text against nothing as 0', () => {
    expect(similarity('a', '')).toBe(0);
  });

  it('should ignore whitespace differences', () => {
    expect(similarity('  a  b', 'a b')).toBe(1);
  });

  it('should count shared lines', () => {
    expect(similarity('a\nb\nc\nd', 'a\nb\nc\nx')).toBe(0.75);
  });
});
