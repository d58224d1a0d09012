/**
 * Provenance wire types
 *
 * Shapes shared between adapters, the merge engine and the provenance sidecar
 * files. Everything here is plain data (JSON-serializable).
 */

import type { TrustLevel } from './trust.js';

/**
 * Scalar value a record field can hold
 */
export type FieldValue = string | number | boolean | null;

/**
 * Recorded origin of a field's currently stored value
 */
export interface ProvenanceEntry {
  readonly source: string;
  readonly trust_level: TrustLevel;
  /** ISO 8601, null when the source gave no retrieval time */
  readonly retrieved_at: string | null;
  /** 1-5 */
  readonly confidence: number;
}

/**
 * Field name -> provenance for one record
 */
export type FieldProvenance = Readonly<Record<string, ProvenanceEntry>>;

/**
 * Candidate value with its provenance, as emitted by a source adapter
 */
export interface EnrichedFieldData {
  readonly value: FieldValue;
  readonly source: string;
  readonly trust_level: TrustLevel;
  readonly confidence: number;
  readonly retrieved_at: Date;
}

/**
 * A proposed change that failed auto-apply gating.
 * Consumed by the review queue, never applied automatically.
 */
export interface Recommendation {
  readonly record_id: string;
  readonly field: string;
  readonly current_value: FieldValue;
  readonly proposed_value: FieldValue;
  readonly reason: string;
  readonly source: string;
  readonly trust_level: TrustLevel;
  readonly confidence: number;
  readonly retrieved_at: string;
}
