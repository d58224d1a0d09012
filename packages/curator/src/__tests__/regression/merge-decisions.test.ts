/**
 * Merge Decision Regression Table
 *
 * Every row of fixtures/merge-cases.json pins one outcome of the merge rules
 * (ordering, null protection, locks, placeholders, trust coercion).
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { TrustLevel, type ProvenanceEntry } from '@museum-curation/types';
import { merge } from '../../provenance/merge-engine.js';
import {
  coerceTrustLevel,
  createEnrichedField,
  createManualOverride,
  type EnrichedField,
} from '../../provenance/trust-model.js';
import { fixedClock } from '../utils/fixtures.js';

const valueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const caseSchema = z.object({
  name: z.string(),
  current: z
    .object({ value: valueSchema, trust: z.string(), retrieved_at: z.string().nullable() })
    .nullable(),
  locked: z.boolean().default(false),
  candidate: z.object({ value: valueSchema, trust: z.string(), retrieved_at: z.string() }),
  expected: z.object({ accepted: z.boolean(), reason: z.string(), value: valueSchema }),
});

type MergeCase = z.infer<typeof caseSchema>;

const CASES = z
  .array(caseSchema)
  .parse(
    JSON.parse(
      readFileSync(fileURLToPath(new URL('../fixtures/merge-cases.json', import.meta.url)), 'utf-8')
    )
  );

function candidateFor(input: MergeCase['candidate']): EnrichedField {
  const trust = coerceTrustLevel(input.trust);
  const retrievedAt = new Date(input.retrieved_at);
  if (trust === TrustLevel.MANUAL_OVERRIDE) {
    return createManualOverride({ value: input.value, curator: 'alice', retrievedAt }, fixedClock());
  }
  return createEnrichedField(
    { value: input.value, source: 'regression', trust_level: trust, confidence: 4, retrieved_at: retrievedAt },
    fixedClock()
  );
}

function storedProvenance(current: MergeCase['current']): ProvenanceEntry | null {
  if (current === null) return null;
  return {
    source: 'stored',
    trust_level: coerceTrustLevel(current.trust),
    retrieved_at: current.retrieved_at,
    confidence: 4,
  };
}

describe('merge decision table', () => {
  it('should load every case', () => {
    expect(CASES.length).toBeGreaterThanOrEqual(14);
  });

  it.each(CASES)('$name', (row) => {
    const result = merge(
      row.current?.value,
      storedProvenance(row.current),
      candidateFor(row.candidate),
      row.locked
    );

    expect(result.accepted).toBe(row.expected.accepted);
    expect(result.reason).toBe(row.expected.reason);
    expect(result.value).toBe(row.expected.value);
  });
});
