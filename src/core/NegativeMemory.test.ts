import { describe, it, expect } from 'vitest';
import { NegativeMemory } from './NegativeMemory';

const patch = (content: string, filePath: string = './src/a.py') => ({
  path: filePath,
  content,
  error: 'Traceback (most recent call last):\nNameError: name z is not defined',
  step: 'add core logic'
});

describe('NegativeMemory', () => {
  it('should recognise a repeated patch', () => {
    const memory = new NegativeMemory();
    memory.record(patch('x = 1\ny = 2'));

    expect(memory.isKnownFailure('src/a.py', 'x = 1\ny = 2\n')).toBe(true);
    expect(memory.isKnownFailure('src\\a.py', 'x  =  1\ny = 2')).toBe(true);
    expect(memory.isKnownFailure('src/b.py', 'x = 1\ny = 2')).toBe(false);
    expect(memory.isKnownFailure('src/a.py', 'completely\ndifferent')).toBe(false);
  });

  it('should keep only the newest entries', () => {
    const memory = new NegativeMemory([], 2);
    memory.record(patch('one'));
    memory.record(patch('two'));
    memory.record(patch('three'));
    memory.record(patch('three'));

    expect(memory.size).toBe(2);
    expect(memory.toJSON().map(entry => entry.content)).toEqual(['two', 'three']);
  });

  it('should restore saved entries', () => {
    const saved = new NegativeMemory();
    saved.record(patch('x = 1'), new Date('2024-01-01T00:00:00Z'));

    const restored = new NegativeMemory(saved.toJSON());
    expect(restored.findSimilar('src/a.py', 'x = 1')).toEqual({
      path: 'src/a.py',
      content: 'x = 1',
      error: 'Traceback (most recent call last):\nNameError: name z is not defined',
      step: 'add core logic',
      recordedAt: '2024-01-01T00:00:00.000Z'
    });
  });

  it('should describe recent failures by their last error line', () => {
    const memory = new NegativeMemory();
    expect(memory.describe()).toBe('');

    memory.record(patch('x = 1'));
    expect(memory.describe()).toBe('- src/a.py (step "add core logic") failed with: NameError: name z is not defined');
  });
});
