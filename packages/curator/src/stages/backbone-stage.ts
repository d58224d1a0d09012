/**
 * Backbone Stage
 *
 * Deterministic, offline fill of the fields every record needs before
 * scoring:
 *
 * - city_tier: 1 (major hub) / 2 (medium city, cultural centre) / 3 (other),
 *   from lookup lists in data/city-tiers.json; only filled when missing
 * - time_needed: keyword rules over museum type + name
 *   (data/time-needed-rules.json); only filled when missing
 * - museum_type: canonicalized through the museum type table
 * - nearby_record_count: other records in the partition sharing the city
 *   (case-insensitive), recomputed every run
 *
 * Every value goes through the record updater as a candidate envelope, so
 * locks, null-protection and the merge rules still hold. Only the volatility
 * gate is skipped (derived values).
 */

import { z } from 'zod';
import {
  TrustLevel,
  type CuratedRecord,
  type FieldValue,
  type TimeNeeded,
} from '@museum-curation/types';
import { loadDataFile } from '../core/utils/data-files.js';
import type { CandidateFields } from '../curation/record-updater.js';
import {
  loadMuseumTypes,
  normalizeMuseumType,
  type MuseumTypeTable,
} from '../curation/normalizers.js';
import { isPlaceholder } from '../provenance/merge-engine.js';
import { createEnrichedField, type EnrichedField } from '../provenance/trust-model.js';
import type { PartitionSession } from '../persistence/partition-session.js';
import type {
  PartitionStage,
  PartitionStageInput,
  StagePrerequisite,
  StageResult,
} from '../orchestration/stages.js';

export const BACKBONE_SOURCE = 'backbone_heuristic';

// ============================================================================
// Lookup tables
// ============================================================================

const cityTiersSchema = z.object({
  tier1: z.array(z.string()),
  tier2: z.array(z.string()),
});

const timeNeededSchema = z.object({
  default: z.enum(['Quick stop (<1 hr)', 'Half day', 'Full day']),
  rules: z.array(
    z.object({
      bucket: z.enum(['Quick stop (<1 hr)', 'Half day', 'Full day']),
      keywords: z.array(z.string().min(1)),
    })
  ),
});

export interface BackboneTables {
  readonly tier1: ReadonlySet<string>;
  readonly tier2: ReadonlySet<string>;
  readonly timeNeeded: z.infer<typeof timeNeededSchema>;
  readonly museumTypes: MuseumTypeTable;
}

export function loadBackboneTables(): BackboneTables {
  const tiers = loadDataFile('city-tiers.json', cityTiersSchema);
  return {
    tier1: new Set(tiers.tier1.map((city) => city.toLowerCase())),
    tier2: new Set(tiers.tier2.map((city) => city.toLowerCase())),
    timeNeeded: loadDataFile('time-needed-rules.json', timeNeededSchema),
    museumTypes: loadMuseumTypes(),
  };
}

// ============================================================================
// Derivations
// ============================================================================

export function computeCityTier(city: string, tables: BackboneTables): 1 | 2 | 3 {
  const key = city.trim().toLowerCase();
  if (tables.tier1.has(key)) return 1;
  if (tables.tier2.has(key)) return 2;
  return 3;
}

export function computeTimeNeeded(
  museumType: string | null,
  museumName: string | null,
  tables: BackboneTables
): TimeNeeded {
  const text = `${museumType ?? ''} ${museumName ?? ''}`.trim().toLowerCase();
  if (text === '') return tables.timeNeeded.default;
  for (const rule of tables.timeNeeded.rules) {
    if (rule.keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
      return rule.bucket;
    }
  }
  return tables.timeNeeded.default;
}

/**
 * Other records in `records` sharing `recordId`'s city
 */
export function computeNearbyCount(
  records: readonly CuratedRecord[],
  recordId: string,
  city: string
): number {
  const key = city.trim().toLowerCase();
  if (key === '') return 0;
  return records.filter((other) => {
    if (other.record_id === recordId) return false;
    const otherCity = other.fields.city;
    return typeof otherCity === 'string' && otherCity.trim().toLowerCase() === key;
  }).length;
}

function text(value: FieldValue | undefined): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function clampConfidence(confidence: number): number {
  return Number.isFinite(confidence) ? Math.min(5, Math.max(1, Math.round(confidence))) : 3;
}

function isMissing(value: FieldValue | undefined): boolean {
  return value === undefined || isPlaceholder(value);
}

// ============================================================================
// Stage
// ============================================================================

export interface BackboneStageOptions {
  /** Recompute city_tier and time_needed even when present */
  readonly force?: boolean;
  readonly tables?: BackboneTables;
}

export class BackboneStage implements PartitionStage {
  readonly kind = 'partition';
  readonly name = 'backbone';
  readonly prerequisite: StagePrerequisite = {
    description: 'city present',
    satisfied: (record) => text(record.fields.city) !== null,
  };

  private readonly force: boolean;
  private tables: BackboneTables | null;

  constructor(options: BackboneStageOptions = {}) {
    this.force = options.force ?? false;
    this.tables = options.tables ?? null;
  }

  /**
   * Candidate batch for one record against the partition's current records
   */
  candidatesFor(
    record: CuratedRecord,
    records: readonly CuratedRecord[],
    session: PartitionSession,
    now: () => Date
  ): CandidateFields {
    const tables = this.getTables();
    const fields = record.fields;
    const city = text(fields.city);
    const retrievedAt = now();
    const candidates: Record<string, EnrichedField> = {};

    const heuristic = (value: FieldValue, confidence: number): EnrichedField =>
      createEnrichedField({
        value,
        source: BACKBONE_SOURCE,
        trust_level: TrustLevel.MODEL_GUESS,
        confidence,
        retrieved_at: retrievedAt,
      });

    if (city !== null && (this.force || isMissing(fields.city_tier))) {
      candidates.city_tier = heuristic(computeCityTier(city, tables), 3);
    }

    const museumType = text(fields.museum_type);
    if (this.force || isMissing(fields.time_needed)) {
      candidates.time_needed = heuristic(
        computeTimeNeeded(museumType, text(fields.museum_name), tables),
        3
      );
    }

    if (museumType !== null) {
      const canonical = normalizeMuseumType(museumType, tables.museumTypes);
      const existing = session.getProvenance(record.record_id, 'museum_type');
      // Canonicalizing keeps the stored trust; a human value is left alone
      if (canonical !== museumType && existing?.trust_level !== TrustLevel.MANUAL_OVERRIDE) {
        candidates.museum_type = createEnrichedField({
          value: canonical,
          source: text(existing?.source) ?? BACKBONE_SOURCE,
          trust_level: existing?.trust_level ?? TrustLevel.MODEL_GUESS,
          confidence: existing ? clampConfidence(existing.confidence) : 3,
          retrieved_at: retrievedAt,
        });
      }
    }

    if (city !== null) {
      const count = computeNearbyCount(records, record.record_id, city);
      if (fields.nearby_record_count !== count) {
        candidates.nearby_record_count = createEnrichedField({
          value: count,
          source: BACKBONE_SOURCE,
          trust_level: TrustLevel.OFFICIAL_STRUCTURED_DATA,
          confidence: 5,
          retrieved_at: retrievedAt,
        });
      }
    }

    return candidates;
  }

  async run(input: PartitionStageInput): Promise<StageResult> {
    const { session, context } = input;
    const records = session.listRecords();
    let applied = 0;
    let rejected = 0;
    let touched = 0;

    for (const record of records) {
      const candidates = this.candidatesFor(record, records, session, context.now);
      if (Object.keys(candidates).length === 0) continue;

      const summary = input.apply(record.record_id, candidates, { derived: true });
      applied += summary.applied_fields.length;
      rejected += summary.rejected_fields.length;
      if (summary.applied_fields.length > 0) touched++;
    }

    return {
      success: true,
      metrics: {
        records: records.length,
        records_updated: touched,
        applied_fields: applied,
        rejected_fields: rejected,
      },
    };
  }

  private getTables(): BackboneTables {
    this.tables ??= loadBackboneTables();
    return this.tables;
  }
}
