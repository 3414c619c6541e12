import { describe, it, expect } from 'vitest';
import {
  ComplexityAnalyzer,
  analyzeMessageComplexity,
  estimateFileCount,
  estimateGenerationTime
} from './ComplexityAnalyzer';

describe('ComplexityAnalyzer', () => {
  const analyzer = new ComplexityAnalyzer();

  it('should rate small scripts as simple', () => {
    const result = analyzer.analyze('a simple calculator script', ['python']);
    expect(result).toEqual({
      level: 'simple',
      score: 5,
      reasons: [
        'simple keyword "simple" (+1)',
        'simple keyword "script" (+1)',
        'simple keyword "calculator" (+1)',
        'technology "python" (+2)'
      ]
    });
  });

  it('should rate an API as medium', () => {
    const result = analyzer.analyze('REST api for notes', ['Flask']);
    expect(result.score).toBe(28);
    expect(result.level).toBe('medium');
  });

  it('should rate distributed systems as complex', () => {
    expect(analyzer.analyze('scalable microservices platform on kubernetes').level).toBe('complex');
  });

  it('should match keywords as whole words', () => {
    expect(analyzer.analyze('an apiary inventory').score).toBe(0);
  });

  it('should score long requirement lists', () => {
    const result = analyzer.analyze('App with 8 features');
    expect(result.score).toBe(16);
    expect(result.reasons).toEqual(['8 listed requirements (+16)']);
  });

  it('should reject an invalid keyword table', () => {
    expect(() => new ComplexityAnalyzer({})).toThrow();
  });
});

describe('analyzeMessageComplexity', () => {
  it('should grade chat messages', () => {
    expect(analyzeMessageComplexity('hi there')).toBe('simple');
    expect(analyzeMessageComplexity('fix this error')).toBe('medium');
    expect(analyzeMessageComplexity('design the architecture')).toBe('complex');
    expect(analyzeMessageComplexity('x'.repeat(401))).toBe('complex');
  });
});

describe('estimates', () => {
  it('should scale time for local models', () => {
    expect(estimateGenerationTime('medium', 'ollama')).toBe(135);
    expect(estimateGenerationTime('simple', 'openai')).toBe(30);
    expect(estimateFileCount('complex')).toBe(12);
  });
});
