import type { ModelPricing } from '../../types/index.js';

/**
 * USD cost of a call; zero when no pricing is configured
 */
export function calculateCost(
  pricing: ModelPricing | undefined,
  promptTokens: number,
  completionTokens: number
): number {
  if (!pricing) {
    return 0;
  }
  return (promptTokens * pricing.inputPerMillion + completionTokens * pricing.outputPerMillion) / 1_000_000;
}
