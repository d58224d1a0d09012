/**
 * Record Update Applier
 *
 * Applies a batch of candidate fields to one record, layering business gates
 * over the merge engine. Per field, in order:
 *
 *   catalog -> manual-override guard -> normalize -> domain eligibility
 *   -> volatility -> merge engine
 *
 * The domain field is processed before every other field of the batch, so a
 * batch that classifies a record and scores it in one go is judged against
 * the post-merge domain.
 *
 * Every rejection, from any gate, is returned as `{ field, reason,
 * proposed_value }`. Volatility failures additionally become review-queue
 * recommendations.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { TrustLevel, type FieldValue, type Recommendation } from '@museum-curation/types';
import { merge, type AcceptReason, type RejectReason } from '../provenance/merge-engine.js';
import {
  trustLevelName,
  withNormalizedValue,
  type EnrichedField,
} from '../provenance/trust-model.js';
import { toIsoTimestamp } from '../provenance/timestamps.js';
import { PartitionSession } from '../persistence/partition-session.js';
import type { PartitionStore } from '../persistence/partition-store.js';
import { DOMAIN_FIELD, FieldPolicy, VOLATILE_TRUST_FLOOR } from './field-policy.js';
import { normalizeField } from './normalizers.js';

// ============================================================================
// Types
// ============================================================================

export type GateRejectReason =
  | 'unknown_field'
  | 'manual_override_not_permitted'
  | 'ineligible_domain'
  | 'low_confidence'
  | `invalid_${string}`;

export type RejectionReason = RejectReason | GateRejectReason;

export interface FieldRejection {
  readonly field: string;
  readonly reason: RejectionReason;
  readonly proposed_value: FieldValue;
}

export interface AppliedField {
  readonly field: string;
  readonly value: FieldValue;
  readonly previous_value: FieldValue;
  readonly reason: AcceptReason;
  readonly source: string;
}

export interface ApplySummary {
  readonly record_id: string;
  readonly applied_fields: readonly AppliedField[];
  readonly rejected_fields: readonly FieldRejection[];
  readonly recommendations: readonly Recommendation[];
}

/**
 * Candidate batch for one record: field name -> envelope
 */
export type CandidateFields = Readonly<Record<string, EnrichedField>>;

export interface ApplyOptions {
  /** Human curation path only */
  readonly allowManualOverride?: boolean;
  /**
   * Candidates computed deterministically from the record itself (lookups,
   * counts). Skips the volatility gate; every other gate still applies.
   */
  readonly derived?: boolean;
}

// ============================================================================
// Updater
// ============================================================================

export class RecordUpdater {
  constructor(
    private readonly policy: FieldPolicy = new FieldPolicy(),
    private readonly now: () => Date = () => new Date()
  ) {}

  get fieldPolicy(): FieldPolicy {
    return this.policy;
  }

  /**
   * Apply `candidates` to `recordId` inside `session` (in memory; the caller
   * commits the session).
   */
  applyBatch(
    session: PartitionSession,
    recordId: string,
    candidates: CandidateFields,
    options: ApplyOptions = {}
  ): ApplySummary {
    const applied: AppliedField[] = [];
    const rejected: FieldRejection[] = [];
    const recommendations: Recommendation[] = [];

    for (const field of orderFields(Object.keys(candidates))) {
      const candidate = candidates[field];
      if (candidate === undefined) continue;

      const reject = (reason: RejectionReason): void => {
        rejected.push({ field, reason, proposed_value: candidate.value });
      };

      if (!this.policy.isKnownField(field)) {
        reject('unknown_field');
        continue;
      }

      if (candidate.trust_level === TrustLevel.MANUAL_OVERRIDE && !options.allowManualOverride) {
        reject('manual_override_not_permitted');
        continue;
      }

      const normalized = normalizeField(field, candidate.value);
      if (!normalized.ok) {
        reject(normalized.reason);
        continue;
      }
      const envelope = withNormalizedValue(candidate, normalized.value);

      if (
        this.policy.isDomainConditional(field) &&
        !this.policy.isEligibleDomain(session.getField(recordId, DOMAIN_FIELD))
      ) {
        reject('ineligible_domain');
        continue;
      }

      const currentValue = session.getField(recordId, field);

      if (
        this.policy.isVolatile(field) &&
        !options.derived &&
        !this.policy.passesVolatilityGate(envelope)
      ) {
        reject('low_confidence');
        recommendations.push(
          this.buildRecommendation(recordId, field, currentValue ?? null, envelope)
        );
        continue;
      }

      const result = merge(
        currentValue,
        session.getProvenance(recordId, field),
        envelope,
        session.isLocked(recordId, field)
      );

      if (!result.accepted) {
        reject(result.reason);
        continue;
      }

      session.setField(recordId, field, result.value, result.provenance);
      session.addDataSource(recordId, envelope.source);
      applied.push({
        field,
        value: result.value,
        previous_value: currentValue ?? null,
        reason: result.reason,
        source: envelope.source,
      });
    }

    if (applied.length > 0) {
      session.touch(recordId, this.now());
    }

    return {
      record_id: recordId,
      applied_fields: applied,
      rejected_fields: rejected,
      recommendations,
    };
  }

  private buildRecommendation(
    recordId: string,
    field: string,
    currentValue: FieldValue,
    candidate: EnrichedField
  ): Recommendation {
    const threshold = this.policy.confidenceThreshold;
    const reason =
      `low_confidence: ${field} is high-churn and needs trust >= ` +
      `${trustLevelName(VOLATILE_TRUST_FLOOR)} and confidence >= ${threshold} ` +
      `(got ${trustLevelName(candidate.trust_level)}, confidence ${candidate.confidence})`;
    return {
      record_id: recordId,
      field,
      current_value: currentValue,
      proposed_value: candidate.value,
      reason,
      source: candidate.source,
      trust_level: candidate.trust_level,
      confidence: candidate.confidence,
      retrieved_at: toIsoTimestamp(candidate.retrieved_at),
    };
  }
}

function orderFields(fields: readonly string[]): string[] {
  return fields.includes(DOMAIN_FIELD)
    ? [DOMAIN_FIELD, ...fields.filter((field) => field !== DOMAIN_FIELD)]
    : [...fields];
}

// ============================================================================
// Single-record convenience
// ============================================================================

export interface ApplyAndPersistOptions extends ApplyOptions {
  readonly dryRun?: boolean;
}

/**
 * Lock, load, apply, write once, unlock.
 */
export async function applyAndPersist(
  store: PartitionStore,
  partition: string,
  recordId: string,
  candidates: CandidateFields,
  updater: RecordUpdater = new RecordUpdater(),
  options: ApplyAndPersistOptions = {}
): Promise<ApplySummary> {
  const lock = await store.acquireLock(partition);
  try {
    const session = await PartitionSession.open(store, partition, { dryRun: options.dryRun });
    const summary = updater.applyBatch(session, recordId, candidates, options);
    await session.commit();
    return summary;
  } finally {
    await lock.release();
  }
}
