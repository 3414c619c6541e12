import { z } from 'zod';
import pricingTable from '../../config/pricing.json';
import type { ModelPricing } from './types';

// Prices are per 1K tokens, in USD
const PricingSchema = z.object({
  openai: z.record(z.object({ input: z.number(), output: z.number() })),
  anthropic: z.record(z.object({ input: z.number(), output: z.number() })),
  defaults: z.object({ openai: z.string(), anthropic: z.string() })
});

const pricing = PricingSchema.parse(pricingTable);

/**
 * Look up pricing by exact name, then by the longest known prefix
 * (dated snapshots such as `gpt-4o-mini-2024-07-18`), then the provider default.
 */
function findPricing(table: Record<string, ModelPricing>, model: string, fallback: string): ModelPricing {
  const exact = table[model];
  if (exact) {
    return exact;
  }

  const prefix = Object.keys(table)
    .filter(name => model.startsWith(name))
    .sort((a, b) => b.length - a.length)[0];
  if (prefix) {
    return table[prefix];
  }
  return table[fallback] ?? { input: 0, output: 0 };
}

/**
 * Calculate cost for an LLM API call based on token usage
 *
 * @returns Cost in USD. Local Ollama models are free.
 */
export function calculateCost(
  provider: string,
  model: string,
  inputTokens: number,
  outputTokens: number
): number {
  let modelPricing: ModelPricing;

  switch (provider.toLowerCase()) {
    case 'ollama':
      return 0;
    case 'openai':
      modelPricing = findPricing(pricing.openai, model, pricing.defaults.openai);
      break;
    case 'anthropic':
      modelPricing = findPricing(pricing.anthropic, model, pricing.defaults.anthropic);
      break;
    default:
      console.warn(`Unknown provider "${provider}", cost not tracked`);
      return 0;
  }

  return (inputTokens / 1000 * modelPricing.input) + (outputTokens / 1000 * modelPricing.output);
}
