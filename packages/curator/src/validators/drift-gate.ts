/**
 * Drift/Regression Gate
 *
 * Compares a curated gold set of expected field values against the live
 * record store after a run. Exact equality; a field absent from the record
 * compares as `null`.
 *
 * Runs after commit: a drift-triggering run is flagged, never rolled back.
 *
 * Gold set file formats:
 *   { "records": [ { "record_id": "...", "expected": { "field": value } } ] }
 *   [ { "record_id": "...", "expected": { ... } } ]
 *   [ { "record_id": "...", "field": value, ... } ]   (fields inline)
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CuratedRecord, FieldValue } from '@museum-curation/types';
import { GoldSetFormatError, isCuratorError, isErrnoException } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { PartitionStore } from '../persistence/partition-store.js';

const log = createLogger({ module: 'drift-gate' });

// ============================================================================
// Types
// ============================================================================

export interface GoldRecord {
  readonly record_id: string;
  readonly expected: Readonly<Record<string, FieldValue>>;
}

export interface GoldSet {
  readonly records: readonly GoldRecord[];
}

export interface DriftDiff {
  readonly record_id: string;
  readonly field: string;
  readonly expected: FieldValue;
  readonly actual: FieldValue;
}

export interface DriftReport {
  readonly total_fields_checked: number;
  readonly drifted_fields: number;
  readonly drift_rate: number;
  readonly threshold: number;
  readonly exceeded: boolean;
  /** Gold record ids not present in the store (skipped) */
  readonly missing_records: readonly string[];
  readonly diffs: readonly DriftDiff[];
}

export type RecordLookup = (recordId: string) => CuratedRecord | undefined;

export const DEFAULT_DRIFT_THRESHOLD = 0.02;

// ============================================================================
// Gold set parsing
// ============================================================================

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const goldEntrySchema = z
  .object({ record_id: z.string().min(1) })
  .passthrough()
  .transform((entry, ctx): GoldRecord => {
    const { record_id, expected, ...inline } = entry;
    const fields = expected === undefined ? inline : expected;
    const parsed = z.record(fieldValueSchema).safeParse(fields);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [record_id, ...issue.path],
          message: issue.message,
        });
      }
      return { record_id, expected: {} };
    }
    return { record_id, expected: parsed.data };
  });

const goldSetSchema = z.union([
  z.object({ records: z.array(goldEntrySchema) }),
  z.array(goldEntrySchema).transform((records) => ({ records })),
]);

export function parseGoldSet(raw: unknown, source: string): GoldSet {
  const result = goldSetSchema.safeParse(raw);
  if (!result.success) {
    throw new GoldSetFormatError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export async function loadGoldSet(filePath: string): Promise<GoldSet> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new GoldSetFormatError(filePath, ['file not found']);
    }
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new GoldSetFormatError(filePath, [
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  return parseGoldSet(raw, filePath);
}

// ============================================================================
// Drift check
// ============================================================================

export function checkDrift(
  goldSet: GoldSet,
  lookup: RecordLookup,
  threshold: number = DEFAULT_DRIFT_THRESHOLD
): DriftReport {
  let checked = 0;
  const diffs: DriftDiff[] = [];
  const missing: string[] = [];

  for (const gold of goldSet.records) {
    const record = lookup(gold.record_id);
    if (!record) {
      missing.push(gold.record_id);
      continue;
    }
    for (const [field, expected] of Object.entries(gold.expected)) {
      checked++;
      const actual = record.fields[field] ?? null;
      if (actual !== expected) {
        diffs.push({ record_id: gold.record_id, field, expected, actual });
      }
    }
  }

  const driftRate = checked === 0 ? 0 : diffs.length / checked;
  const report: DriftReport = {
    total_fields_checked: checked,
    drifted_fields: diffs.length,
    drift_rate: driftRate,
    threshold,
    exceeded: driftRate > threshold,
    missing_records: missing,
    diffs,
  };

  if (missing.length > 0) {
    log.warn('Gold records missing from store', { count: missing.length });
  }
  log.info('Drift check complete', {
    checked,
    drifted: diffs.length,
    driftRate,
    exceeded: report.exceeded,
  });
  return report;
}

export interface RecordLookupOptions {
  /** Partitions to index (default: every partition in the store) */
  readonly partitions?: readonly string[];
  /** Records read in place of the store's copy, by partition (a dry run's would-be state) */
  readonly overlay?: ReadonlyMap<string, readonly CuratedRecord[]>;
  /** Leave out partitions the store cannot load instead of failing */
  readonly skipUnreadable?: boolean;
}

/**
 * Index every record by id. Later partitions win on duplicate ids.
 */
export async function buildRecordLookup(
  store: PartitionStore,
  options: RecordLookupOptions = {}
): Promise<RecordLookup> {
  const overlay = options.overlay ?? new Map<string, readonly CuratedRecord[]>();
  const partitions = new Set([
    ...(options.partitions ?? (await store.listPartitions())),
    ...overlay.keys(),
  ]);

  const byId = new Map<string, CuratedRecord>();
  for (const partition of partitions) {
    let records = overlay.get(partition);
    if (!records) {
      try {
        records = (await store.load(partition)).records;
      } catch (error) {
        if (!options.skipUnreadable || !isCuratorError(error)) throw error;
        log.warn('Partition left out of drift lookup', { partition, error: error.message });
        continue;
      }
    }
    for (const record of records) {
      byId.set(record.record_id, record);
    }
  }
  return (recordId) => byId.get(recordId);
}
