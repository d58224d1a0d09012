/**
 * Partition Store
 *
 * Record store contract: a partition (one state/region) is loaded as an
 * ordered collection of records keyed by a stable record id, together with
 * its provenance sidecar, and written back atomically.
 *
 * ARCHITECTURE (FilePartitionStore):
 * - <dataDir>/partitions/<partition>.json   records
 * - <dataDir>/provenance/<partition>.json   record id -> field -> provenance
 * - <dataDir>/locks/<partition>.lock        advisory single-writer lock
 * - <dataDir>/index/all-records.json        cross-partition index
 * - Atomic writes with temp files + rename
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type {
  CuratedRecord,
  FieldValue,
  ProvenanceDocument,
  ProvenanceEntry,
} from '@museum-curation/types';
import {
  PartitionFormatError,
  PartitionLockError,
  PartitionNotFoundError,
  isErrnoException,
} from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { coerceTrustLevel } from '../provenance/trust-model.js';
import { acquireFileLock, type AcquireLockOptions, type PartitionLock } from './partition-lock.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A partition's records plus provenance, as loaded
 */
export interface PartitionData {
  readonly partition: string;
  readonly updatedAt: string | null;
  readonly records: readonly CuratedRecord[];
  readonly provenance: ProvenanceDocument;
}

export interface RecordIndexEntry {
  readonly record_id: string;
  readonly partition: string;
  readonly museum_name: FieldValue;
  readonly city: FieldValue;
  readonly primary_domain: FieldValue;
  readonly priority_score: FieldValue;
}

export interface RecordIndexDocument {
  readonly generated_at: string;
  readonly total_records: number;
  readonly records: readonly RecordIndexEntry[];
}

export interface PartitionStore {
  listPartitions(): Promise<string[]>;
  load(partition: string): Promise<PartitionData>;
  save(data: PartitionData): Promise<void>;
  acquireLock(partition: string): Promise<PartitionLock>;
  saveIndex(index: RecordIndexDocument): Promise<void>;
}

// ============================================================================
// Schemas
// ============================================================================

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const provenanceEntrySchema = z.object({
  source: z.string(),
  trust_level: z.unknown().transform(coerceTrustLevel),
  retrieved_at: z
    .string()
    .nullable()
    .optional()
    .transform((value) => value ?? null),
  confidence: z.number(),
});

const provenanceDocumentSchema = z.record(z.record(provenanceEntrySchema));

const curatedRecordSchema = z.object({
  record_id: z.string().min(1),
  fields: z.record(fieldValueSchema),
  manual_lock_fields: z.array(z.string()).default([]),
  data_sources: z.array(z.string()).default([]),
  updated_at: z.string().nullable().default(null),
});

const partitionDocumentSchema = z.object({
  partition: z.string(),
  updated_at: z.string().nullable().default(null),
  records: z.array(curatedRecordSchema),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a partition document and its provenance sidecar
 */
export function parsePartitionData(
  partitionRaw: unknown,
  provenanceRaw: unknown,
  source: string
): PartitionData {
  const doc = partitionDocumentSchema.safeParse(partitionRaw);
  if (!doc.success) {
    throw new PartitionFormatError(source, formatIssues(doc.error));
  }
  const provenance = provenanceDocumentSchema.safeParse(provenanceRaw);
  if (!provenance.success) {
    throw new PartitionFormatError(`${source} (provenance)`, formatIssues(provenance.error));
  }

  const seen = new Set<string>();
  for (const record of doc.data.records) {
    if (seen.has(record.record_id)) {
      throw new PartitionFormatError(source, [`duplicate record_id ${record.record_id}`]);
    }
    seen.add(record.record_id);
  }

  const provenanceDoc: Record<string, Record<string, ProvenanceEntry>> = provenance.data;
  return {
    partition: doc.data.partition,
    updatedAt: doc.data.updated_at,
    records: doc.data.records,
    provenance: provenanceDoc,
  };
}

// ============================================================================
// File-backed store
// ============================================================================

export interface FilePartitionStoreOptions {
  readonly lock?: AcquireLockOptions;
}

export class FilePartitionStore implements PartitionStore {
  constructor(
    private readonly dataDir: string,
    private readonly options: FilePartitionStoreOptions = {}
  ) {}

  partitionPath(partition: string): string {
    return join(this.dataDir, 'partitions', `${partition}.json`);
  }

  provenancePath(partition: string): string {
    return join(this.dataDir, 'provenance', `${partition}.json`);
  }

  lockPath(partition: string): string {
    return join(this.dataDir, 'locks', `${partition}.lock`);
  }

  indexPath(): string {
    return join(this.dataDir, 'index', 'all-records.json');
  }

  async listPartitions(): Promise<string[]> {
    try {
      const entries = await readdir(join(this.dataDir, 'partitions'));
      return entries
        .filter((name) => name.endsWith('.json'))
        .map((name) => name.slice(0, -'.json'.length))
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }
  }

  async load(partition: string): Promise<PartitionData> {
    const filePath = this.partitionPath(partition);
    const partitionRaw = await this.readJson(filePath);
    if (partitionRaw === undefined) {
      throw new PartitionNotFoundError(partition);
    }
    const provenanceRaw = (await this.readJson(this.provenancePath(partition))) ?? {};
    return parsePartitionData(partitionRaw, provenanceRaw, filePath);
  }

  /**
   * Two atomic renames, records first. A crash between them leaves new values
   * paired with the previous provenance (or none); a rerun re-applies the same
   * candidates, since they outrank or tie that provenance, and rewrites the
   * sidecar. The reverse order would pin old values under provenance that
   * rejects the candidates which produced it.
   */
  async save(data: PartitionData): Promise<void> {
    await atomicWriteJSON(this.partitionPath(data.partition), {
      partition: data.partition,
      updated_at: data.updatedAt,
      records: data.records,
    });
    await atomicWriteJSON(this.provenancePath(data.partition), data.provenance);
  }

  acquireLock(partition: string): Promise<PartitionLock> {
    return acquireFileLock(partition, this.lockPath(partition), this.options.lock);
  }

  async saveIndex(index: RecordIndexDocument): Promise<void> {
    await atomicWriteJSON(this.indexPath(), index);
  }

  private async readJson(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return undefined;
      throw error;
    }
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new PartitionFormatError(filePath, [
        `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
  }
}

// ============================================================================
// In-memory store
// ============================================================================

/**
 * Store held entirely in memory. Used by tests and by callers embedding the
 * pipeline without a data directory.
 */
export class InMemoryPartitionStore implements PartitionStore {
  private readonly partitions = new Map<string, PartitionData>();
  private readonly locks = new Set<string>();
  private index: RecordIndexDocument | null = null;
  saveCount = 0;

  constructor(initial: readonly PartitionData[] = []) {
    for (const data of initial) {
      this.partitions.set(data.partition, structuredClone(data));
    }
  }

  async listPartitions(): Promise<string[]> {
    return [...this.partitions.keys()].sort();
  }

  async load(partition: string): Promise<PartitionData> {
    const data = this.partitions.get(partition);
    if (!data) throw new PartitionNotFoundError(partition);
    return structuredClone(data);
  }

  async save(data: PartitionData): Promise<void> {
    this.saveCount++;
    this.partitions.set(data.partition, structuredClone(data));
  }

  async acquireLock(partition: string): Promise<PartitionLock> {
    if (this.locks.has(partition)) {
      throw new PartitionLockError(partition, null);
    }
    this.locks.add(partition);
    return {
      partition,
      release: async () => {
        this.locks.delete(partition);
      },
    };
  }

  async saveIndex(index: RecordIndexDocument): Promise<void> {
    this.index = structuredClone(index);
  }

  getIndex(): RecordIndexDocument | null {
    return this.index;
  }

  isLocked(partition: string): boolean {
    return this.locks.has(partition);
  }
}
