/**
 * Deterministic Priority Scorer
 *
 * Pure function from a record's scored fields to a visit-priority score.
 * Lower score = higher priority. Any required input missing yields `null`;
 * no defaults are guessed.
 *
 *   primary_strength = max(strength_a, strength_b)
 *   dual_bonus       = 2 if strength_a >= 4 and strength_b >= 4, else 0
 *   cluster_bonus    = 1 if >= 3 other records share the locality, else 0
 *   score = (6 - primary_strength) * 3
 *         + (6 - historical_context) * 2
 *         + reputation_penalty
 *         + collection_penalty
 *         - dual_bonus
 *         - cluster_bonus
 *
 * Used by the priority stage when finalizing scores and by target selection
 * for the expensive enrichment stage.
 */

import type { CuratedRecord, FieldValue } from '@museum-curation/types';

// ============================================================================
// Types
// ============================================================================

export interface PriorityInputs {
  /** Impressionist strength, 0-5 */
  readonly strength_a: number | null | undefined;
  /** Modern/contemporary strength, 0-5 */
  readonly strength_b: number | null | undefined;
  /** 0-5 */
  readonly historical_context: number | null | undefined;
  /** 0-3 */
  readonly reputation_penalty: number | null | undefined;
  /** 0-3 */
  readonly collection_penalty: number | null | undefined;
  /** Number of other records sharing the locality (optional) */
  readonly cluster_size?: number | null;
}

export type PrimaryArt = 'Impressionist' | 'Modern/Contemporary';

export interface PriorityBreakdown {
  readonly score: number;
  readonly primary_strength: number;
  readonly dual_bonus: number;
  readonly cluster_bonus: number;
  readonly primary_art: PrimaryArt | null;
  readonly overall_quality_score: number;
}

export const CLUSTER_BONUS_MIN_SIBLINGS = 3;
export const DUAL_STRENGTH_MIN = 4;

// ============================================================================
// Scoring
// ============================================================================

interface CompleteInputs {
  readonly a: number;
  readonly b: number;
  readonly historical: number;
  readonly reputation: number;
  readonly collection: number;
  readonly clusterSize: number | null;
}

function isScoreInput(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function complete(inputs: PriorityInputs): CompleteInputs | null {
  const { strength_a, strength_b, historical_context, reputation_penalty, collection_penalty } =
    inputs;
  if (
    !isScoreInput(strength_a) ||
    !isScoreInput(strength_b) ||
    !isScoreInput(historical_context) ||
    !isScoreInput(reputation_penalty) ||
    !isScoreInput(collection_penalty)
  ) {
    return null;
  }
  const clusterSize = inputs.cluster_size;
  return {
    a: strength_a,
    b: strength_b,
    historical: historical_context,
    reputation: reputation_penalty,
    collection: collection_penalty,
    clusterSize: typeof clusterSize === 'number' && Number.isFinite(clusterSize) ? clusterSize : null,
  };
}

/**
 * Full score breakdown, or null when a required input is missing
 */
export function explainPriorityScore(inputs: PriorityInputs): PriorityBreakdown | null {
  const values = complete(inputs);
  if (values === null) return null;

  const primaryStrength = Math.max(values.a, values.b);
  const dualBonus = values.a >= DUAL_STRENGTH_MIN && values.b >= DUAL_STRENGTH_MIN ? 2 : 0;
  const clusterBonus =
    values.clusterSize !== null && values.clusterSize >= CLUSTER_BONUS_MIN_SIBLINGS ? 1 : 0;

  const score =
    (6 - primaryStrength) * 3 +
    (6 - values.historical) * 2 +
    values.reputation +
    values.collection -
    dualBonus -
    clusterBonus;

  let primaryArt: PrimaryArt | null = null;
  if (values.a > values.b) {
    primaryArt = 'Impressionist';
  } else if (values.b > 0) {
    primaryArt = 'Modern/Contemporary';
  }

  return {
    score,
    primary_strength: primaryStrength,
    dual_bonus: dualBonus,
    cluster_bonus: clusterBonus,
    primary_art: primaryArt,
    overall_quality_score:
      primaryStrength * 3 + (3 - values.reputation) + (3 - values.collection) + dualBonus,
  };
}

export function computePriorityScore(inputs: PriorityInputs): number | null {
  return explainPriorityScore(inputs)?.score ?? null;
}

// ============================================================================
// Record helpers
// ============================================================================

function numeric(value: FieldValue | undefined): number | null {
  return typeof value === 'number' ? value : null;
}

export function scoringInputsFromRecord(record: CuratedRecord): PriorityInputs {
  const fields = record.fields;
  return {
    strength_a: numeric(fields.impressionist_strength),
    strength_b: numeric(fields.modern_contemporary_strength),
    historical_context: numeric(fields.historical_context_score),
    reputation_penalty: numeric(fields.reputation),
    collection_penalty: numeric(fields.collection_tier),
    cluster_size: numeric(fields.nearby_record_count),
  };
}

export function scoreRecord(record: CuratedRecord): number | null {
  return computePriorityScore(scoringInputsFromRecord(record));
}

export interface RankedRecord<T extends CuratedRecord = CuratedRecord> {
  readonly record: T;
  readonly score: number | null;
}

const MISSING_TIER = 9;

/**
 * Sort records by priority: score ascending (unscored last), then
 * reputation, then collection tier, then record id.
 */
export function rankRecords<T extends CuratedRecord>(records: readonly T[]): RankedRecord<T>[] {
  return records
    .map((record) => ({ record, score: scoreRecord(record) }))
    .sort((left, right) => {
      const ls = left.score ?? Number.POSITIVE_INFINITY;
      const rs = right.score ?? Number.POSITIVE_INFINITY;
      if (ls !== rs) return ls < rs ? -1 : 1;

      const lr = numeric(left.record.fields.reputation) ?? MISSING_TIER;
      const rr = numeric(right.record.fields.reputation) ?? MISSING_TIER;
      if (lr !== rr) return lr - rr;

      const lc = numeric(left.record.fields.collection_tier) ?? MISSING_TIER;
      const rc = numeric(right.record.fields.collection_tier) ?? MISSING_TIER;
      if (lc !== rc) return lc - rc;

      if (left.record.record_id === right.record.record_id) return 0;
      return left.record.record_id < right.record.record_id ? -1 : 1;
    });
}
