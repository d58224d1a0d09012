/**
 * Curated record and partition document types
 */

import type { FieldProvenance, FieldValue } from './provenance.js';

/**
 * Primary domain classification of a museum
 */
export type PrimaryDomain = 'Art' | 'History' | 'Science' | 'Culture' | 'Specialty' | 'Mixed';

export type TimeNeeded = 'Quick stop (<1 hr)' | 'Half day' | 'Full day';

/**
 * A curated entity. Fields are a flat map; locks and sources are sets
 * serialized as sorted-by-insertion arrays.
 */
export interface CuratedRecord {
  readonly record_id: string;
  readonly fields: Readonly<Record<string, FieldValue>>;
  readonly manual_lock_fields: readonly string[];
  /** Append-only */
  readonly data_sources: readonly string[];
  readonly updated_at: string | null;
}

/**
 * On-disk partition file (one per state/region)
 */
export interface PartitionDocument {
  readonly partition: string;
  readonly updated_at: string | null;
  readonly records: readonly CuratedRecord[];
}

/**
 * On-disk provenance sidecar: record id -> field -> provenance
 */
export type ProvenanceDocument = Readonly<Record<string, FieldProvenance>>;
