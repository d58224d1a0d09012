/**
 * Run Budget
 *
 * Spend ledger for paid enrichment calls. A reserve fraction of the total is
 * held back; a call may start only if its estimate fits under the usable
 * limit.
 */

import { z } from 'zod';
import { loadDataFile } from '../core/utils/data-files.js';

export const DEFAULT_BUDGET_USD = 5.0;
export const DEFAULT_RESERVE_RATIO = 0.15;

export interface BudgetSnapshot {
  readonly total_usd: number;
  readonly spent_usd: number;
  readonly remaining_usd: number;
  readonly reserve_ratio: number;
}

export class BudgetState {
  private spent = 0;

  constructor(
    readonly totalUsd: number = DEFAULT_BUDGET_USD,
    readonly reserveRatio: number = DEFAULT_RESERVE_RATIO
  ) {
    if (!Number.isFinite(totalUsd) || totalUsd < 0) {
      throw new RangeError(`Budget must be a non-negative number, got ${totalUsd}`);
    }
    if (!(reserveRatio >= 0 && reserveRatio < 1)) {
      throw new RangeError(`Reserve ratio must be in [0, 1), got ${reserveRatio}`);
    }
  }

  get spentUsd(): number {
    return this.spent;
  }

  get usableUsd(): number {
    return this.totalUsd * (1 - this.reserveRatio);
  }

  get remainingUsd(): number {
    return Math.max(0, this.usableUsd - this.spent);
  }

  canSpend(estimateUsd: number): boolean {
    return this.spent + estimateUsd <= this.usableUsd;
  }

  record(costUsd: number): void {
    if (costUsd > 0) this.spent += costUsd;
  }

  snapshot(): BudgetSnapshot {
    return {
      total_usd: this.totalUsd,
      spent_usd: this.spent,
      remaining_usd: this.remainingUsd,
      reserve_ratio: this.reserveRatio,
    };
  }
}

// ============================================================================
// Cost estimation
// ============================================================================

const modelCostsSchema = z.record(
  z.object({
    input: z.number().nonnegative(),
    output: z.number().nonnegative(),
  })
);

export type ModelCostTable = z.infer<typeof modelCostsSchema>;

/**
 * USD per million tokens, by model
 */
export function loadModelCosts(): ModelCostTable {
  return loadDataFile('model-costs.json', modelCostsSchema);
}

/**
 * Rough token count: one token per four characters, at least one
 */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.length / 4));
}

/**
 * Unknown models cost nothing.
 */
export function estimateCallCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
  costs: ModelCostTable = loadModelCosts()
): number {
  const rates = costs[model];
  if (!rates) return 0;
  return (inputTokens / 1_000_000) * rates.input + (outputTokens / 1_000_000) * rates.output;
}
