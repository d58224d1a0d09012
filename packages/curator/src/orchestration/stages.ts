/**
 * Stage Contracts
 *
 * In-process stage interface called directly by the orchestrator. Three
 * kinds:
 *
 * - `record`:    per-record enrichment producing candidate envelopes; the
 *                orchestrator applies them, enforces budget and failure rate
 * - `partition`: whole-partition pass over a loaded session (deterministic
 *                derivations, scoring)
 * - `finalize`:  once per run after every partition (index rebuild)
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { CuratedRecord, Recommendation } from '@museum-curation/types';
import type { AdapterCache } from '../cache/adapter-cache.js';
import type { FieldPolicy } from '../curation/field-policy.js';
import type {
  ApplyOptions,
  ApplySummary,
  CandidateFields,
} from '../curation/record-updater.js';
import type { PartitionSession } from '../persistence/partition-session.js';
import type { PartitionStore } from '../persistence/partition-store.js';
import type { BudgetState } from './budget.js';

// ============================================================================
// Shared
// ============================================================================

export interface StageContext {
  readonly runId: string;
  readonly dryRun: boolean;
  readonly cache: AdapterCache;
  readonly budget: BudgetState;
  readonly policy: FieldPolicy;
  readonly now: () => Date;
}

export type StageMetrics = Readonly<Record<string, number>>;

export interface StageResult {
  readonly success: boolean;
  readonly error?: string;
  readonly metrics: StageMetrics;
}

/**
 * Share of a partition's records that must already satisfy a stage's input
 * condition before the stage may run
 */
export interface StagePrerequisite {
  readonly description: string;
  readonly satisfied: (record: CuratedRecord) => boolean;
  /** Default 0.5 */
  readonly minRatio?: number;
}

export const DEFAULT_PREREQUISITE_RATIO = 0.5;

export interface PrerequisiteCheck {
  readonly met: boolean;
  readonly ratio: number;
  readonly required: number;
}

/**
 * An empty partition has nothing to process and always meets the
 * prerequisite.
 */
export function checkPrerequisite(
  prerequisite: StagePrerequisite,
  records: readonly CuratedRecord[]
): PrerequisiteCheck {
  const required = prerequisite.minRatio ?? DEFAULT_PREREQUISITE_RATIO;
  if (records.length === 0) {
    return { met: true, ratio: 1, required };
  }
  const satisfied = records.filter((record) => prerequisite.satisfied(record)).length;
  const ratio = satisfied / records.length;
  return { met: ratio >= required, ratio, required };
}

// ============================================================================
// Record stages
// ============================================================================

export interface CandidateBatch {
  readonly fields: CandidateFields;
  /** Actual spend for this call */
  readonly cost_usd?: number;
  readonly recommendations?: readonly Recommendation[];
}

export interface RecordStage {
  readonly kind: 'record';
  readonly name: string;
  /** Restricted to the run's top-N targets */
  readonly expensive?: boolean;
  readonly prerequisite?: StagePrerequisite;
  /** Candidates are deterministic derivations (skip the volatility gate) */
  readonly derived?: boolean;
  /** Pre-call cost estimate in USD; presence makes the stage budget-gated */
  estimateCost?(record: CuratedRecord): number;
  enrich(record: CuratedRecord, context: StageContext): Promise<CandidateBatch>;
}

// ============================================================================
// Partition stages
// ============================================================================

export interface PartitionStageInput {
  readonly partition: string;
  readonly session: PartitionSession;
  readonly context: StageContext;
  /** Apply a batch through the record updater and record it in the run's changes */
  apply(recordId: string, candidates: CandidateFields, options?: ApplyOptions): ApplySummary;
}

export interface PartitionStage {
  readonly kind: 'partition';
  readonly name: string;
  readonly prerequisite?: StagePrerequisite;
  run(input: PartitionStageInput): Promise<StageResult>;
}

// ============================================================================
// Finalize stages
// ============================================================================

export interface FinalizeStageInput {
  readonly store: PartitionStore;
  readonly partitions: readonly string[];
  readonly context: StageContext;
}

export interface FinalizeStage {
  readonly kind: 'finalize';
  readonly name: string;
  run(input: FinalizeStageInput): Promise<StageResult>;
}

export type Stage = RecordStage | PartitionStage | FinalizeStage;
