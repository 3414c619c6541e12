import { z } from 'zod';
import keywordTable from '../config/complexity-keywords.json';
import type { Complexity, Provider } from '../types/model';
import { escapeRegExp } from '../utils/text-utils';

const KeywordTableSchema = z.object({
  weights: z.object({ simple: z.number(), medium: z.number(), complex: z.number(), enterprise: z.number() }),
  keywords: z.object({
    simple: z.array(z.string()),
    medium: z.array(z.string()),
    complex: z.array(z.string()),
    enterprise: z.array(z.string())
  }),
  technologies: z.record(z.number()),
  defaultTechnologyScore: z.number(),
  serviceIndicators: z.array(z.string()),
  message: z.object({ complex: z.array(z.string()), medium: z.array(z.string()) })
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

export interface ComplexityAnalysis {
  level: Complexity;
  score: number;
  reasons: string[];
}

const SIMPLE_MAX_SCORE = 15;
const MEDIUM_MAX_SCORE = 40;

const wordPattern = (word: string): RegExp =>
  new RegExp(`(?<![\\w-])${escapeRegExp(word)}(?![\\w-])`, 'i');

/**
 * Scores a project description by keywords, technologies and size to pick
 * which class of model should handle it.
 */
export class ComplexityAnalyzer {
  private readonly table: KeywordTable;

  constructor(table: unknown = keywordTable) {
    this.table = KeywordTableSchema.parse(table);
  }

  analyze(description: string, technologies: string[] = []): ComplexityAnalysis {
    let score = 0;
    const reasons: string[] = [];

    for (const category of ['simple', 'medium', 'complex', 'enterprise'] as const) {
      const weight = this.table.weights[category];
      for (const keyword of this.table.keywords[category]) {
        if (wordPattern(keyword).test(description)) {
          score += weight;
          reasons.push(`${category} keyword "${keyword}" (+${weight})`);
        }
      }
    }

    for (const tech of technologies) {
      const name = tech.trim().toLowerCase();
      if (!name) continue;
      const techScore = this.table.technologies[name] ?? this.table.defaultTechnologyScore;
      score += techScore;
      reasons.push(`technology "${name}" (+${techScore})`);
    }

    const wordCount = description.split(/\s+/).filter(Boolean).length;
    if (wordCount > 100) {
      score += 20;
      reasons.push(`long description, ${wordCount} words (+20)`);
    } else if (wordCount > 50) {
      score += 10;
      reasons.push(`detailed description, ${wordCount} words (+10)`);
    }

    const serviceMentions = this.table.serviceIndicators.reduce((count, indicator) => {
      const plural = new RegExp(`(?<![\\w-])${escapeRegExp(indicator)}s?(?![\\w-])`, 'gi');
      return count + (description.match(plural)?.length ?? 0);
    }, 0);
    if (serviceMentions > 3) {
      score += 15;
      reasons.push(`${serviceMentions} service/component mentions (+15)`);
    }

    for (const match of description.matchAll(/(\d+)\s*(?:requirements?|features?|components?)\b/gi)) {
      const count = parseInt(match[1], 10);
      if (count > 5) {
        score += count * 2;
        reasons.push(`${count} listed requirements (+${count * 2})`);
      }
    }

    const level: Complexity = score <= SIMPLE_MAX_SCORE ? 'simple' : score <= MEDIUM_MAX_SCORE ? 'medium' : 'complex';
    return { level, score, reasons };
  }

  /**
   * Lighter check for a chat message in the interactive shell
   */
  analyzeMessage(message: string): Complexity {
    if (this.table.message.complex.some(word => wordPattern(word).test(message)) || message.length > 400) {
      return 'complex';
    }
    if (this.table.message.medium.some(word => wordPattern(word).test(message)) || message.length > 100) {
      return 'medium';
    }
    return 'simple';
  }
}

const defaultAnalyzer = new ComplexityAnalyzer();

export function analyzeComplexity(description: string, technologies: string[] = []): Complexity {
  return defaultAnalyzer.analyze(description, technologies).level;
}

export function analyzeMessageComplexity(message: string): Complexity {
  return defaultAnalyzer.analyzeMessage(message);
}

// Rough wall-clock estimate in seconds; local models are slower
export function estimateGenerationTime(complexity: Complexity, provider: Provider): number {
  const base: Record<Complexity, number> = { simple: 30, medium: 90, complex: 240 };
  return Math.round(base[complexity] * (provider === 'ollama' ? 1.5 : 1));
}

export function estimateFileCount(complexity: Complexity): number {
  const counts: Record<Complexity, number> = { simple: 3, medium: 6, complex: 12 };
  return counts[complexity];
}
