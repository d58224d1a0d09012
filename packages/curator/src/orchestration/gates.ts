/**
 * Run Gates
 *
 * Fatal run conditions are values, not exceptions. Every check returns a
 * `GateSignal`; the orchestrator loop switches on `kind` and maps the first
 * non-ok signal onto a terminal state.
 */

import type { DriftReport } from '../validators/drift-gate.js';
import type { BudgetState } from './budget.js';

// ============================================================================
// Signals
// ============================================================================

export type GateSignal =
  | { readonly kind: 'ok' }
  | {
      readonly kind: 'budget_exceeded';
      readonly stage: string;
      readonly record_id: string;
      readonly estimate_usd: number;
      readonly spent_usd: number;
      readonly limit_usd: number;
    }
  | {
      readonly kind: 'failure_rate_exceeded';
      readonly processed: number;
      readonly failed: number;
      readonly failure_rate: number;
      readonly threshold: number;
    }
  | {
      readonly kind: 'drift_exceeded';
      readonly drift_rate: number;
      readonly threshold: number;
    };

export type RunState = 'completed' | 'aborted_budget' | 'aborted_failure_rate' | 'aborted_drift';

export const GATE_OK: GateSignal = { kind: 'ok' };

export function terminalStateFor(signal: GateSignal): RunState {
  switch (signal.kind) {
    case 'ok':
      return 'completed';
    case 'budget_exceeded':
      return 'aborted_budget';
    case 'failure_rate_exceeded':
      return 'aborted_failure_rate';
    case 'drift_exceeded':
      return 'aborted_drift';
  }
}

// ============================================================================
// Budget gate
// ============================================================================

export function checkBudget(
  budget: BudgetState,
  estimateUsd: number,
  stage: string,
  recordId: string
): GateSignal {
  if (budget.canSpend(estimateUsd)) return GATE_OK;
  return {
    kind: 'budget_exceeded',
    stage,
    record_id: recordId,
    estimate_usd: estimateUsd,
    spent_usd: budget.spentUsd,
    limit_usd: budget.usableUsd,
  };
}

// ============================================================================
// Failure-rate circuit breaker
// ============================================================================

export const DEFAULT_FAILURE_RATE_THRESHOLD = 0.1;

/**
 * Running processed/failed counts across the whole run. Checked after every
 * record.
 */
export class FailureRateTracker {
  private processedCount = 0;
  private failedCount = 0;

  constructor(
    readonly threshold: number = DEFAULT_FAILURE_RATE_THRESHOLD,
    readonly minSample: number = 1
  ) {}

  get processed(): number {
    return this.processedCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get failureRate(): number {
    return this.processedCount === 0 ? 0 : this.failedCount / this.processedCount;
  }

  recordSuccess(): void {
    this.processedCount++;
  }

  recordFailure(): void {
    this.processedCount++;
    this.failedCount++;
  }

  check(): GateSignal {
    if (this.processedCount < this.minSample) return GATE_OK;
    const rate = this.failureRate;
    if (rate <= this.threshold) return GATE_OK;
    return {
      kind: 'failure_rate_exceeded',
      processed: this.processedCount,
      failed: this.failedCount,
      failure_rate: rate,
      threshold: this.threshold,
    };
  }
}

// ============================================================================
// Drift gate
// ============================================================================

export function checkDriftSignal(report: DriftReport): GateSignal {
  if (!report.exceeded) return GATE_OK;
  return { kind: 'drift_exceeded', drift_rate: report.drift_rate, threshold: report.threshold };
}
