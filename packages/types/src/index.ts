/**
 * @museum-curation/types
 *
 * Shared types for the museum curation workspace.
 */

export { TrustLevel, TRUST_LEVELS } from './trust.js';
export type { TrustLevelName } from './trust.js';
export type {
  FieldValue,
  ProvenanceEntry,
  FieldProvenance,
  EnrichedFieldData,
  Recommendation,
} from './provenance.js';
export type {
  PrimaryDomain,
  TimeNeeded,
  CuratedRecord,
  PartitionDocument,
  ProvenanceDocument,
} from './record.js';
