/**
 * Test Fixtures
 *
 * Builders for envelopes, records and partitions with a fixed clock.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import {
  TrustLevel,
  type CuratedRecord,
  type FieldValue,
  type ProvenanceEntry,
} from '@museum-curation/types';
import {
  createEnrichedField,
  type EnrichedField,
  type EnrichedFieldInput,
} from '../../provenance/trust-model.js';
import { InMemoryAdapterCache } from '../../cache/adapter-cache.js';
import { FieldPolicy } from '../../curation/field-policy.js';
import { BudgetState } from '../../orchestration/budget.js';
import type { StageContext } from '../../orchestration/stages.js';
import type { PartitionData } from '../../persistence/partition-store.js';

// ============================================================================
// Clock
// ============================================================================

export const FIXED_NOW = new Date('2024-06-01T12:00:00.000Z');

export function fixedClock(at: Date = FIXED_NOW): () => Date {
  return () => new Date(at.getTime());
}

/**
 * Clock that advances `stepMs` on every read
 */
export function steppingClock(start: Date = FIXED_NOW, stepMs = 1000): () => Date {
  let current = start.getTime();
  return () => {
    const at = new Date(current);
    current += stepMs;
    return at;
  };
}

// ============================================================================
// Envelopes
// ============================================================================

export function envelope(
  value: FieldValue,
  overrides: Partial<EnrichedFieldInput> = {}
): EnrichedField {
  return createEnrichedField(
    {
      value,
      source: 'test_source',
      trust_level: TrustLevel.KNOWLEDGE_BASE,
      confidence: 5,
      retrieved_at: FIXED_NOW,
      ...overrides,
    },
    fixedClock()
  );
}

export function provenance(
  trustLevel: TrustLevel,
  retrievedAt: string | null = '2024-01-01T00:00:00.000Z',
  overrides: Partial<ProvenanceEntry> = {}
): ProvenanceEntry {
  return {
    source: 'stored_source',
    trust_level: trustLevel,
    retrieved_at: retrievedAt,
    confidence: 4,
    ...overrides,
  };
}

// ============================================================================
// Records and partitions
// ============================================================================

export function makeRecord(
  recordId: string,
  fields: Readonly<Record<string, FieldValue>> = {},
  overrides: Partial<Omit<CuratedRecord, 'record_id' | 'fields'>> = {}
): CuratedRecord {
  return {
    record_id: recordId,
    fields,
    manual_lock_fields: [],
    data_sources: [],
    updated_at: null,
    ...overrides,
  };
}

/**
 * Art record with every priority input present
 */
export function makeScoredArtRecord(
  recordId: string,
  scores: {
    readonly impressionist: number;
    readonly modern: number;
    readonly historical: number;
    readonly reputation: number;
    readonly collection: number;
  },
  extra: Readonly<Record<string, FieldValue>> = {}
): CuratedRecord {
  return makeRecord(recordId, {
    museum_name: `Museum ${recordId}`,
    city: 'Boise',
    primary_domain: 'Art',
    impressionist_strength: scores.impressionist,
    modern_contemporary_strength: scores.modern,
    historical_context_score: scores.historical,
    reputation: scores.reputation,
    collection_tier: scores.collection,
    ...extra,
  });
}

export function makePartition(
  partition: string,
  records: readonly CuratedRecord[],
  recordProvenance: Readonly<Record<string, Readonly<Record<string, ProvenanceEntry>>>> = {}
): PartitionData {
  return {
    partition,
    updatedAt: null,
    records,
    provenance: recordProvenance,
  };
}

// ============================================================================
// Stage context
// ============================================================================

export function makeStageContext(overrides: Partial<StageContext> = {}): StageContext {
  const now = fixedClock();
  return {
    runId: 'run-test',
    dryRun: false,
    cache: new InMemoryAdapterCache(() => now().getTime()),
    budget: new BudgetState(10, 0.15),
    policy: new FieldPolicy(),
    now,
    ...overrides,
  };
}
