/**
 * Merge Engine
 *
 * Decides, per field, whether a candidate may replace the stored value and
 * its provenance. Pure: no I/O, no clock, same inputs always give the same
 * result.
 *
 * RULE ORDER (first match wins; the order is part of the contract):
 * 1. cannot_replace_known_with_null  - null/empty candidate over a known value
 * 2. manual_lock                     - locked field, candidate below MANUAL_OVERRIDE
 * 3. placeholder_blocked             - candidate is a placeholder token
 * 4. no_existing_provenance          - nothing stored yet (accept)
 * 5. higher_trust                    - candidate trust > stored trust (accept)
 * 6. equal_trust_newer               - equal trust, strictly newer (accept)
 *    equal_trust_no_timestamp        - equal trust, stored time missing (accept)
 * 7. lower_trust_or_older            - everything else
 *
 * Callers must check `accepted`/`reason`; on rejection the returned value and
 * provenance are the inputs, unchanged.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { TrustLevel, type FieldValue, type ProvenanceEntry } from '@museum-curation/types';
import { coerceTrustLevel, compareTrust, toProvenanceEntry, type EnrichedField } from './trust-model.js';
import { parseTimestamp } from './timestamps.js';

// ============================================================================
// Types
// ============================================================================

export type AcceptReason =
  | 'no_existing_provenance'
  | 'higher_trust'
  | 'equal_trust_newer'
  | 'equal_trust_no_timestamp';

export type RejectReason =
  | 'cannot_replace_known_with_null'
  | 'manual_lock'
  | 'placeholder_blocked'
  | 'lower_trust_or_older';

export type MergeReason = AcceptReason | RejectReason;

export type MergeDecision =
  | { readonly accepted: true; readonly reason: AcceptReason }
  | { readonly accepted: false; readonly reason: RejectReason };

export type MergeResult =
  | {
      readonly accepted: true;
      readonly reason: AcceptReason;
      readonly value: FieldValue;
      readonly provenance: ProvenanceEntry;
    }
  | {
      readonly accepted: false;
      readonly reason: RejectReason;
      readonly value: FieldValue;
      readonly provenance: ProvenanceEntry | null;
    };

// ============================================================================
// Value classification
// ============================================================================

/**
 * Tokens that mean "no real value" (compared trimmed, case-insensitive)
 */
export const PLACEHOLDER_TOKENS: ReadonlySet<string> = new Set([
  '',
  'tbd',
  'unknown',
  'n/a',
  '-',
  'null',
  'none',
  'pending',
]);

/**
 * null, undefined, or a blank string
 */
export function isEmptyValue(value: FieldValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && value.trim() === '';
}

export function isMeaningful(value: FieldValue | undefined): boolean {
  return !isEmptyValue(value);
}

export function isPlaceholder(value: FieldValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value !== 'string') return false;
  return PLACEHOLDER_TOKENS.has(value.trim().toLowerCase());
}

// ============================================================================
// Decision
// ============================================================================

/**
 * Decide whether `candidate` may replace the stored value.
 */
export function decide(
  currentValue: FieldValue | undefined,
  currentProvenance: ProvenanceEntry | null | undefined,
  candidate: EnrichedField,
  manualLock: boolean
): MergeDecision {
  const isManual = candidate.trust_level === TrustLevel.MANUAL_OVERRIDE;

  // Clearing a known value is a curation action, never a merge outcome
  if (isEmptyValue(candidate.value) && isMeaningful(currentValue)) {
    return { accepted: false, reason: 'cannot_replace_known_with_null' };
  }

  if (manualLock && !isManual) {
    return { accepted: false, reason: 'manual_lock' };
  }

  if (isPlaceholder(candidate.value)) {
    return { accepted: false, reason: 'placeholder_blocked' };
  }

  if (!currentProvenance) {
    return { accepted: true, reason: 'no_existing_provenance' };
  }

  const storedTrust = coerceTrustLevel(currentProvenance.trust_level);
  const ordering = compareTrust(candidate.trust_level, storedTrust);

  if (ordering > 0) {
    return { accepted: true, reason: 'higher_trust' };
  }

  if (ordering === 0) {
    const storedAt = parseTimestamp(currentProvenance.retrieved_at);
    if (storedAt === null) {
      return { accepted: true, reason: 'equal_trust_no_timestamp' };
    }
    if (candidate.retrieved_at.getTime() > storedAt.getTime()) {
      return { accepted: true, reason: 'equal_trust_newer' };
    }
  }

  return { accepted: false, reason: 'lower_trust_or_older' };
}

/**
 * Apply `decide` and produce the resulting value/provenance pair.
 */
export function merge(
  currentValue: FieldValue | undefined,
  currentProvenance: ProvenanceEntry | null | undefined,
  candidate: EnrichedField,
  manualLock: boolean
): MergeResult {
  const decision = decide(currentValue, currentProvenance, candidate, manualLock);

  if (!decision.accepted) {
    return {
      accepted: false,
      reason: decision.reason,
      value: currentValue ?? null,
      provenance: currentProvenance ?? null,
    };
  }

  return {
    accepted: true,
    reason: decision.reason,
    value: candidate.value,
    provenance: toProvenanceEntry(candidate),
  };
}
