/**
 * Record Update Applier Tests
 *
 * Gate order, domain-first processing, review recommendations and
 * idempotence of batch application.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TrustLevel } from '@museum-curation/types';
import { RecordNotFoundError } from '../../../core/errors.js';
import { FieldPolicy } from '../../../curation/field-policy.js';
import {
  RecordUpdater,
  applyAndPersist,
  type CandidateFields,
} from '../../../curation/record-updater.js';
import { PartitionSession } from '../../../persistence/partition-session.js';
import { InMemoryPartitionStore } from '../../../persistence/partition-store.js';
import { createManualOverride } from '../../../provenance/trust-model.js';
import {
  envelope,
  fixedClock,
  makePartition,
  makeRecord,
  provenance,
} from '../../utils/fixtures.js';

function sessionFor(
  store: InMemoryPartitionStore,
  records = [makeRecord('rec-1', { city: 'Portland', primary_domain: 'Art' })]
): PartitionSession {
  return PartitionSession.fromData(store, makePartition('OR', records), { now: fixedClock() });
}

describe('RecordUpdater', () => {
  let store: InMemoryPartitionStore;
  let updater: RecordUpdater;

  beforeEach(() => {
    store = new InMemoryPartitionStore();
    updater = new RecordUpdater(new FieldPolicy(), fixedClock());
  });

  describe('Catalog and guards', () => {
    it('should reject fields outside the catalog', () => {
      const summary = updater.applyBatch(sessionFor(store), 'rec-1', {
        gift_shop: envelope('yes'),
      });

      expect(summary.applied_fields).toEqual([]);
      expect(summary.rejected_fields).toEqual([
        { field: 'gift_shop', reason: 'unknown_field', proposed_value: 'yes' },
      ]);
    });

    it('should reject derived fields from candidates', () => {
      const summary = updater.applyBatch(sessionFor(store), 'rec-1', {
        priority_score: envelope(3),
      });
      expect(summary.rejected_fields[0]?.reason).toBe('unknown_field');
    });

    it('should refuse manual overrides unless the caller allows them', () => {
      const session = sessionFor(store);
      const override = createManualOverride({ value: 'Curated', curator: 'alice' }, fixedClock());

      const refused = updater.applyBatch(session, 'rec-1', { museum_name: override });
      expect(refused.rejected_fields[0]?.reason).toBe('manual_override_not_permitted');

      const allowed = updater.applyBatch(
        session,
        'rec-1',
        { museum_name: override },
        { allowManualOverride: true }
      );
      expect(allowed.applied_fields[0]?.reason).toBe('no_existing_provenance');
      expect(session.getField('rec-1', 'museum_name')).toBe('Curated');
    });

    it('should reject values that fail normalization', () => {
      const summary = updater.applyBatch(sessionFor(store), 'rec-1', {
        website: envelope('not a url'),
        reputation: envelope(7, { trust_level: TrustLevel.MODEL_GUESS, confidence: 1 }),
      });

      expect(summary.rejected_fields).toEqual([
        { field: 'website', reason: 'invalid_website', proposed_value: 'not a url' },
        { field: 'reputation', reason: 'invalid_reputation', proposed_value: 7 },
      ]);
      expect(summary.recommendations).toEqual([]);
    });

    it('should throw for a record that is not in the partition', () => {
      expect(() =>
        updater.applyBatch(sessionFor(store), 'missing', { museum_name: envelope('x') })
      ).toThrow(RecordNotFoundError);
    });
  });

  describe('Volatility gate', () => {
    it('should hold back a high-churn field from a low-trust source even when the merge would accept it', () => {
      const session = sessionFor(store);
      const candidate = envelope(1, {
        trust_level: TrustLevel.MODEL_EXTRACTED,
        confidence: 5,
        source: 'llm_extract',
      });

      const summary = updater.applyBatch(session, 'rec-1', { reputation: candidate });

      expect(summary.applied_fields).toEqual([]);
      expect(summary.rejected_fields).toEqual([
        { field: 'reputation', reason: 'low_confidence', proposed_value: 1 },
      ]);
      expect(summary.recommendations).toEqual([
        {
          record_id: 'rec-1',
          field: 'reputation',
          current_value: null,
          proposed_value: 1,
          reason:
            'low_confidence: reputation is high-churn and needs trust >= ENCYCLOPEDIA_SUMMARY ' +
            'and confidence >= 4 (got MODEL_EXTRACTED, confidence 5)',
          source: 'llm_extract',
          trust_level: TrustLevel.MODEL_EXTRACTED,
          confidence: 5,
          retrieved_at: '2024-06-01T12:00:00.000Z',
        },
      ]);
      expect(session.getField('rec-1', 'reputation')).toBeUndefined();
    });

    it('should hold back a trusted source below the confidence threshold', () => {
      const strict = new RecordUpdater(new FieldPolicy().withConfidenceThreshold(5), fixedClock());
      const summary = strict.applyBatch(sessionFor(store), 'rec-1', {
        reputation: envelope(1, { trust_level: TrustLevel.ENCYCLOPEDIA_SUMMARY, confidence: 4 }),
      });
      expect(summary.rejected_fields[0]?.reason).toBe('low_confidence');
    });

    it('should skip the volatility gate for derived candidates', () => {
      const summary = updater.applyBatch(
        sessionFor(store),
        'rec-1',
        { city_tier: envelope(2, { trust_level: TrustLevel.MODEL_GUESS, confidence: 3 }) },
        { derived: true }
      );
      expect(summary.applied_fields).toEqual([
        {
          field: 'city_tier',
          value: 2,
          previous_value: null,
          reason: 'no_existing_provenance',
          source: 'test_source',
        },
      ]);
    });

    it('should not gate stable fields', () => {
      const summary = updater.applyBatch(sessionFor(store), 'rec-1', {
        phone: envelope('555-0100', { trust_level: TrustLevel.MODEL_GUESS, confidence: 1 }),
      });
      expect(summary.applied_fields[0]?.reason).toBe('no_existing_provenance');
    });
  });

  describe('Domain eligibility', () => {
    it('should reject domain-conditional fields on ineligible records', () => {
      const session = sessionFor(store, [
        makeRecord('rec-1', { city: 'Boston', primary_domain: 'History' }),
      ]);
      const summary = updater.applyBatch(session, 'rec-1', {
        impressionist_strength: envelope(4),
      });

      expect(summary.rejected_fields).toEqual([
        { field: 'impressionist_strength', reason: 'ineligible_domain', proposed_value: 4 },
      ]);
    });

    it('should judge the batch against the domain it sets', () => {
      const session = sessionFor(store, [makeRecord('rec-1', { city: 'Boston' })]);
      const summary = updater.applyBatch(session, 'rec-1', {
        impressionist_strength: envelope(4),
        primary_domain: envelope('art'),
      });

      expect(summary.applied_fields.map((applied) => [applied.field, applied.value])).toEqual([
        ['primary_domain', 'Art'],
        ['impressionist_strength', 4],
      ]);
      expect(summary.rejected_fields).toEqual([]);
    });

    it('should reject the field when the domain change in the batch is itself rejected', () => {
      const session = PartitionSession.fromData(
        store,
        makePartition('MA', [makeRecord('rec-1', { primary_domain: 'History' })], {
          'rec-1': { primary_domain: provenance(TrustLevel.OFFICIAL_STRUCTURED_DATA) },
        }),
        { now: fixedClock() }
      );
      const summary = updater.applyBatch(session, 'rec-1', {
        primary_domain: envelope('Art', { trust_level: TrustLevel.MODEL_GUESS }),
        modern_contemporary_strength: envelope(5),
      });

      expect(summary.rejected_fields).toEqual([
        { field: 'primary_domain', reason: 'lower_trust_or_older', proposed_value: 'Art' },
        { field: 'modern_contemporary_strength', reason: 'ineligible_domain', proposed_value: 5 },
      ]);
    });
  });

  describe('Merge outcomes', () => {
    it('should report a lock rejection', () => {
      const session = sessionFor(store, [
        makeRecord('rec-1', { museum_name: 'Curated' }, { manual_lock_fields: ['museum_name'] }),
      ]);
      const summary = updater.applyBatch(session, 'rec-1', {
        museum_name: envelope('Automated', { trust_level: TrustLevel.OFFICIAL_STRUCTURED_DATA }),
      });

      expect(summary.rejected_fields).toEqual([
        { field: 'museum_name', reason: 'manual_lock', proposed_value: 'Automated' },
      ]);
      expect(session.getField('rec-1', 'museum_name')).toBe('Curated');
    });

    it('should record sources and touch the record once when something applies', () => {
      const session = sessionFor(store);
      updater.applyBatch(session, 'rec-1', {
        museum_name: envelope('Portland Art Museum', { source: 'wikidata' }),
        website: envelope('portlandartmuseum.org', { source: 'wikidata' }),
      });

      const record = session.getRecord('rec-1');
      expect(record.fields.website).toBe('https://portlandartmuseum.org');
      expect(record.data_sources).toEqual(['wikidata']);
      expect(record.updated_at).toBe('2024-06-01T12:00:00.000Z');
      expect(session.getProvenance('rec-1', 'museum_name')?.source).toBe('wikidata');
    });

    it('should leave an untouched record clean', () => {
      const session = sessionFor(store);
      updater.applyBatch(session, 'rec-1', { city: envelope(null) });

      expect(session.isDirty).toBe(false);
      expect(session.getRecord('rec-1').updated_at).toBeNull();
    });
  });

  describe('Idempotence', () => {
    const batch = (): CandidateFields => ({
      museum_name: envelope('Portland Art Museum', { source: 'wikidata' }),
      website: envelope('portlandartmuseum.org', { source: 'wikidata' }),
      reputation: envelope(1, {
        source: 'wikipedia',
        trust_level: TrustLevel.ENCYCLOPEDIA_SUMMARY,
        confidence: 4,
      }),
      time_needed: envelope('half day', { trust_level: TrustLevel.MODEL_GUESS, confidence: 3 }),
      city: envelope(null),
    });

    it('should give identical state and reasons from the same starting state', () => {
      const first = sessionFor(store);
      const second = sessionFor(store);

      const a = updater.applyBatch(first, 'rec-1', batch());
      const b = updater.applyBatch(second, 'rec-1', batch());

      expect(b).toEqual(a);
      expect(second.snapshot()).toEqual(first.snapshot());
      expect(a.applied_fields.map((applied) => applied.field)).toEqual([
        'museum_name',
        'website',
        'reputation',
      ]);
      expect(a.rejected_fields).toEqual([
        { field: 'time_needed', reason: 'low_confidence', proposed_value: 'half day' },
        { field: 'city', reason: 'cannot_replace_known_with_null', proposed_value: null },
      ]);
      expect(first.getRecord('rec-1').data_sources).toEqual(['wikidata', 'wikipedia']);
    });

    it('should change nothing when the same batch is applied again', () => {
      const session = sessionFor(store);
      updater.applyBatch(session, 'rec-1', batch());
      const before = session.snapshot();

      const again = updater.applyBatch(session, 'rec-1', batch());

      expect(again.applied_fields).toEqual([]);
      expect(again.rejected_fields.map((rejection) => rejection.reason)).toEqual([
        'lower_trust_or_older',
        'lower_trust_or_older',
        'lower_trust_or_older',
        'low_confidence',
        'cannot_replace_known_with_null',
      ]);
      expect(session.snapshot()).toEqual(before);
    });
  });
});

describe('applyAndPersist', () => {
  it('should write the partition once and release the lock', async () => {
    const store = new InMemoryPartitionStore([
      makePartition('OR', [makeRecord('rec-1', { city: 'Portland' })]),
    ]);

    const summary = await applyAndPersist(store, 'OR', 'rec-1', {
      museum_name: envelope('Portland Art Museum'),
    });

    expect(summary.applied_fields).toHaveLength(1);
    expect(store.saveCount).toBe(1);
    expect(store.isLocked('OR')).toBe(false);
    const data = await store.load('OR');
    expect(data.records[0]?.fields.museum_name).toBe('Portland Art Museum');
    expect(data.provenance['rec-1']?.museum_name?.trust_level).toBe(TrustLevel.KNOWLEDGE_BASE);
  });

  it('should not write under dry-run', async () => {
    const store = new InMemoryPartitionStore([
      makePartition('OR', [makeRecord('rec-1', { city: 'Portland' })]),
    ]);

    const summary = await applyAndPersist(
      store,
      'OR',
      'rec-1',
      { museum_name: envelope('Portland Art Museum') },
      new RecordUpdater(),
      { dryRun: true }
    );

    expect(summary.applied_fields).toHaveLength(1);
    expect(store.saveCount).toBe(0);
    expect((await store.load('OR')).records[0]?.fields.museum_name).toBeUndefined();
  });
});
