import type { ModelPrice, PriceTable } from '../../shared/config';
import type { TokenUsage } from '../../shared/types';

export const zeroTokenUsage = (): TokenUsage => ({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
  costUsd: 0,
});

/**
 * Finds the table entry whose key occurs in the model name. When several keys
 * match (`gpt-4o` and `gpt-4o-mini`), the longest one wins.
 */
export const resolveModelPrice = (model: string, table: PriceTable, fallback: ModelPrice): ModelPrice => {
  const name = model.toLowerCase();
  let bestKey: string | null = null;
  for (const key of Object.keys(table)) {
    const candidate = key.toLowerCase();
    if (name.includes(candidate) && (bestKey == null || candidate.length > bestKey.length)) {
      bestKey = key;
    }
  }
  return bestKey == null ? fallback : table[bestKey];
};

/** Prices are USD per million tokens. */
export const computeCostUsd = (promptTokens: number, completionTokens: number, price: ModelPrice): number =>
  (promptTokens / 1_000_000) * price.input + (completionTokens / 1_000_000) * price.output;
