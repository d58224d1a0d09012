/**
 * Trust levels for field sources
 *
 * Ordinal ranking of how reliable a source is considered. Stored provenance
 * serializes the numeric value, so the numbers are part of the on-disk format
 * and must not be renumbered.
 */
export enum TrustLevel {
  UNKNOWN = 0,
  MODEL_GUESS = 1,
  MODEL_EXTRACTED = 2,
  ENCYCLOPEDIA_SUMMARY = 3,
  KNOWLEDGE_BASE = 4,
  OFFICIAL_SOURCE_EXTRACT = 5,
  OFFICIAL_STRUCTURED_DATA = 6,
  /** Only ever produced by an explicit human action */
  MANUAL_OVERRIDE = 10,
}

export const TRUST_LEVELS: readonly TrustLevel[] = [
  TrustLevel.UNKNOWN,
  TrustLevel.MODEL_GUESS,
  TrustLevel.MODEL_EXTRACTED,
  TrustLevel.ENCYCLOPEDIA_SUMMARY,
  TrustLevel.KNOWLEDGE_BASE,
  TrustLevel.OFFICIAL_SOURCE_EXTRACT,
  TrustLevel.OFFICIAL_STRUCTURED_DATA,
  TrustLevel.MANUAL_OVERRIDE,
];

export type TrustLevelName = keyof typeof TrustLevel;
