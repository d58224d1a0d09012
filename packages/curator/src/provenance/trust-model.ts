/**
 * Trust Model
 *
 * Ordering over source trust levels plus the single constructor for candidate
 * envelopes. Envelopes are validated when built, never at merge time, and are
 * frozen afterwards.
 *
 * MANUAL_OVERRIDE envelopes cannot be built by `createEnrichedField`; the only
 * way to obtain one is `createManualOverride`, which the human-facing curate
 * commands call.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { z } from 'zod';
import {
  TrustLevel,
  TRUST_LEVELS,
  type EnrichedFieldData,
  type FieldValue,
  type ProvenanceEntry,
} from '@museum-curation/types';
import { InvalidEnvelopeError } from '../core/errors.js';
import { parseTimestamp, toIsoTimestamp } from './timestamps.js';

// ============================================================================
// Ordering
// ============================================================================

export function compareTrust(a: TrustLevel, b: TrustLevel): -1 | 0 | 1 {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isAtLeast(level: TrustLevel, floor: TrustLevel): boolean {
  return compareTrust(level, floor) >= 0;
}

/**
 * Map a stored trust value onto the enum. Anything unrecognized is UNKNOWN.
 */
export function coerceTrustLevel(raw: unknown): TrustLevel {
  if (typeof raw === 'number') {
    const match = TRUST_LEVELS.find((level) => level === raw);
    return match ?? TrustLevel.UNKNOWN;
  }
  if (typeof raw === 'string') {
    const byName = TRUST_LEVELS.find((level) => TrustLevel[level] === raw.trim().toUpperCase());
    if (byName !== undefined) return byName;
    const numeric = Number(raw);
    return Number.isInteger(numeric) ? coerceTrustLevel(numeric) : TrustLevel.UNKNOWN;
  }
  return TrustLevel.UNKNOWN;
}

export function trustLevelName(level: TrustLevel): string {
  return TrustLevel[level];
}

// ============================================================================
// Envelope
// ============================================================================

const ENVELOPE_BRAND: unique symbol = Symbol('EnrichedField');

/**
 * Validated, immutable candidate envelope
 */
export type EnrichedField = Readonly<EnrichedFieldData> & {
  readonly [ENVELOPE_BRAND]: true;
};

export interface EnrichedFieldInput {
  readonly value: FieldValue;
  readonly source: string;
  readonly trust_level: TrustLevel;
  readonly confidence: number;
  /** Defaults to the current time */
  readonly retrieved_at?: Date | string;
}

const fieldValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const retrievedAtSchema = z.preprocess(
  (raw) => (typeof raw === 'string' ? parseTimestamp(raw) ?? raw : raw),
  z.date({ invalid_type_error: 'retrieved_at must be an ISO timestamp or Date' })
);

const envelopeSchema = z.object({
  value: fieldValueSchema,
  source: z.string().trim().min(1, 'source must be non-empty'),
  trust_level: z.nativeEnum(TrustLevel),
  confidence: z
    .number()
    .int('confidence must be an integer')
    .min(1, 'confidence must be between 1 and 5')
    .max(5, 'confidence must be between 1 and 5'),
  retrieved_at: retrievedAtSchema,
});

function buildEnvelope(input: EnrichedFieldInput, now: () => Date): EnrichedField {
  const result = envelopeSchema.safeParse({
    ...input,
    retrieved_at: input.retrieved_at ?? now(),
  });

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'envelope'}: ${issue.message}`
    );
    throw new InvalidEnvelopeError(`Invalid candidate envelope: ${issues.join('; ')}`, issues);
  }

  const data = result.data;
  return Object.freeze({
    value: data.value,
    source: data.source,
    trust_level: data.trust_level,
    confidence: data.confidence,
    retrieved_at: data.retrieved_at,
    [ENVELOPE_BRAND]: true as const,
  });
}

/**
 * Build a candidate envelope for an automated source.
 *
 * @throws InvalidEnvelopeError on out-of-range confidence, empty source,
 *   unparseable timestamp, or a MANUAL_OVERRIDE trust level
 */
export function createEnrichedField(
  input: EnrichedFieldInput,
  now: () => Date = () => new Date()
): EnrichedField {
  if (input.trust_level === TrustLevel.MANUAL_OVERRIDE) {
    throw new InvalidEnvelopeError(
      'MANUAL_OVERRIDE envelopes can only be created through createManualOverride',
      ['trust_level: MANUAL_OVERRIDE is reserved for human curation']
    );
  }
  return buildEnvelope(input, now);
}

export interface ManualOverrideInput {
  readonly value: FieldValue;
  /** Human curator identifier, recorded as `manual:<curator>` */
  readonly curator: string;
  readonly retrievedAt?: Date;
}

/**
 * Build a MANUAL_OVERRIDE envelope. Human entry points only.
 */
export function createManualOverride(
  input: ManualOverrideInput,
  now: () => Date = () => new Date()
): EnrichedField {
  const curator = input.curator.trim();
  if (curator === '') {
    throw new InvalidEnvelopeError('Manual override requires a curator', [
      'curator: must be non-empty',
    ]);
  }
  return buildEnvelope(
    {
      value: input.value,
      source: `manual:${curator}`,
      trust_level: TrustLevel.MANUAL_OVERRIDE,
      confidence: 5,
      retrieved_at: input.retrievedAt ?? now(),
    },
    now
  );
}

/**
 * Same provenance, canonicalized value. Used after normalization; the input
 * envelope is left untouched.
 */
export function withNormalizedValue(envelope: EnrichedField, value: FieldValue): EnrichedField {
  if (value === envelope.value) return envelope;
  return Object.freeze({ ...envelope, value });
}

/**
 * Serialize an accepted envelope into the stored provenance shape
 */
export function toProvenanceEntry(envelope: EnrichedField): ProvenanceEntry {
  return Object.freeze({
    source: envelope.source,
    trust_level: envelope.trust_level,
    retrieved_at: toIsoTimestamp(envelope.retrieved_at),
    confidence: envelope.confidence,
  });
}
