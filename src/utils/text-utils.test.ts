import { describe, it, expect } from 'vitest';
import { escapeRegExp, globToRegExp, isGlob, normalizeWhitespace, slugify, splitLines, tail, truncate } from './text-utils';

describe('text-utils', () => {
  it('should keep the end of long text', () => {
    expect(tail('abcdef', 3)).toBe('def');
    expect(tail('ab', 3)).toBe('ab');
  });

  it('should truncate with a marker', () => {
    expect(truncate('abcdef', 3)).toBe('abc...(truncated)');
    expect(truncate('abcdef', 3, '...')).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });

  it('should collapse whitespace', () => {
    expect(normalizeWhitespace('  a \t b  ')).toBe('a b');
  });

  it('should split lines without a trailing empty entry', () => {
    expect(splitLines('a\r\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('')).toEqual([]);
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });

  it('should escape regular expression characters', () => {
    expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
  });

  it('should match globs segment by segment', () => {
    expect(globToRegExp('*.py').test('main.py')).toBe(true);
    expect(globToRegExp('*.py').test('src/main.py')).toBe(false);
    expect(globToRegExp('**/*.py').test('src/pkg/main.py')).toBe(true);
    expect(globToRegExp('**/*.py').test('main.py')).toBe(true);
    expect(globToRegExp('test_?.py').test('test_a.py')).toBe(true);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
    expect(isGlob('src/*.ts')).toBe(true);
    expect(isGlob('src/main.ts')).toBe(false);
  });

  it('should slugify descriptions', () => {
    expect(slugify('Hello, World!')).toBe('hello-world');
    expect(slugify('!!!')).toBe('project');
    expect(slugify('a'.repeat(50))).toHaveLength(40);
  });
});
