/**
 * Partition Session
 *
 * Working copy of one partition for the duration of a stage run: loaded once,
 * mutated in memory by the record updater and deterministic stages, written
 * once on `commit()`. Under dry-run, `commit()` reports what would have been
 * written and touches nothing.
 */

import type {
  CuratedRecord,
  FieldValue,
  ProvenanceEntry,
} from '@museum-curation/types';
import { RecordNotFoundError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { PartitionData, PartitionStore } from './partition-store.js';

const log = createLogger({ module: 'partition-session' });

interface WorkingRecord {
  readonly record_id: string;
  fields: Record<string, FieldValue>;
  manual_lock_fields: Set<string>;
  data_sources: string[];
  updated_at: string | null;
}

export interface SessionOptions {
  readonly dryRun?: boolean;
  readonly now?: () => Date;
}

export interface CommitResult {
  readonly partition: string;
  readonly written: boolean;
  readonly dirtyRecords: number;
}

export class PartitionSession {
  private readonly records = new Map<string, WorkingRecord>();
  private readonly provenance = new Map<string, Record<string, ProvenanceEntry>>();
  private readonly dirtyIds = new Set<string>();
  private readonly dryRun: boolean;
  private readonly now: () => Date;
  private updatedAt: string | null;
  readonly partition: string;

  private constructor(
    private readonly store: PartitionStore,
    data: PartitionData,
    options: SessionOptions
  ) {
    this.partition = data.partition;
    this.dryRun = options.dryRun ?? false;
    this.now = options.now ?? (() => new Date());
    this.updatedAt = data.updatedAt;

    for (const record of data.records) {
      this.records.set(record.record_id, {
        record_id: record.record_id,
        fields: { ...record.fields },
        manual_lock_fields: new Set(record.manual_lock_fields),
        data_sources: [...record.data_sources],
        updated_at: record.updated_at,
      });
      this.provenance.set(record.record_id, { ...(data.provenance[record.record_id] ?? {}) });
    }
  }

  /**
   * Load a partition into a new session
   */
  static async open(
    store: PartitionStore,
    partition: string,
    options: SessionOptions = {}
  ): Promise<PartitionSession> {
    const data = await store.load(partition);
    return new PartitionSession(store, data, options);
  }

  static fromData(
    store: PartitionStore,
    data: PartitionData,
    options: SessionOptions = {}
  ): PartitionSession {
    return new PartitionSession(store, data, options);
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  get isDryRun(): boolean {
    return this.dryRun;
  }

  get isDirty(): boolean {
    return this.dirtyIds.size > 0;
  }

  recordIds(): string[] {
    return [...this.records.keys()];
  }

  hasRecord(recordId: string): boolean {
    return this.records.has(recordId);
  }

  /**
   * Immutable snapshot of one record
   */
  getRecord(recordId: string): CuratedRecord {
    return this.snapshotRecord(this.require(recordId));
  }

  /**
   * Immutable snapshots of every record, in partition order
   */
  listRecords(): CuratedRecord[] {
    return [...this.records.values()].map((record) => this.snapshotRecord(record));
  }

  getField(recordId: string, field: string): FieldValue | undefined {
    return this.require(recordId).fields[field];
  }

  getProvenance(recordId: string, field: string): ProvenanceEntry | undefined {
    return this.provenance.get(recordId)?.[field];
  }

  getRecordProvenance(recordId: string): Readonly<Record<string, ProvenanceEntry>> {
    this.require(recordId);
    return { ...(this.provenance.get(recordId) ?? {}) };
  }

  isLocked(recordId: string, field: string): boolean {
    return this.require(recordId).manual_lock_fields.has(field);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Store a merged value with its provenance
   */
  setField(recordId: string, field: string, value: FieldValue, provenance: ProvenanceEntry): void {
    const record = this.require(recordId);
    record.fields[field] = value;
    const recordProvenance = this.provenance.get(recordId) ?? {};
    recordProvenance[field] = provenance;
    this.provenance.set(recordId, recordProvenance);
    this.markDirty(recordId);
  }

  /**
   * Store a value computed by a deterministic stage (no provenance entry).
   * `undefined` removes the field.
   */
  setDerivedField(recordId: string, field: string, value: FieldValue | undefined): boolean {
    const record = this.require(recordId);
    if (record.fields[field] === value) return false;
    if (value === undefined) {
      if (!(field in record.fields)) return false;
      delete record.fields[field];
    } else {
      record.fields[field] = value;
    }
    this.markDirty(recordId);
    return true;
  }

  /**
   * Append a source id to the record's data_sources (deduplicated)
   */
  addDataSource(recordId: string, source: string): void {
    const record = this.require(recordId);
    if (!record.data_sources.includes(source)) {
      record.data_sources.push(source);
      this.markDirty(recordId);
    }
  }

  touch(recordId: string, at: Date = this.now()): void {
    this.require(recordId).updated_at = at.toISOString();
    this.markDirty(recordId);
  }

  lockField(recordId: string, field: string): boolean {
    const locks = this.require(recordId).manual_lock_fields;
    if (locks.has(field)) return false;
    locks.add(field);
    this.markDirty(recordId);
    return true;
  }

  unlockField(recordId: string, field: string): boolean {
    const changed = this.require(recordId).manual_lock_fields.delete(field);
    if (changed) this.markDirty(recordId);
    return changed;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Full partition snapshot in store format
   */
  snapshot(): PartitionData {
    const provenance: Record<string, Record<string, ProvenanceEntry>> = {};
    for (const [recordId, fields] of this.provenance) {
      if (Object.keys(fields).length > 0) {
        provenance[recordId] = { ...fields };
      }
    }
    return {
      partition: this.partition,
      updatedAt: this.updatedAt,
      records: this.listRecords(),
      provenance,
    };
  }

  /**
   * Write the partition once. No-op when nothing changed or under dry-run;
   * either way the dirty set starts over for the next commit.
   */
  async commit(): Promise<CommitResult> {
    const dirtyRecords = this.dirtyIds.size;
    if (dirtyRecords === 0) {
      return { partition: this.partition, written: false, dirtyRecords };
    }
    if (this.dryRun) {
      log.info('Dry run: partition not written', { partition: this.partition, dirtyRecords });
      this.dirtyIds.clear();
      return { partition: this.partition, written: false, dirtyRecords };
    }

    this.updatedAt = this.now().toISOString();
    await this.store.save(this.snapshot());
    this.dirtyIds.clear();
    log.debug('Partition committed', { partition: this.partition, dirtyRecords });
    return { partition: this.partition, written: true, dirtyRecords };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private require(recordId: string): WorkingRecord {
    const record = this.records.get(recordId);
    if (!record) throw new RecordNotFoundError(this.partition, recordId);
    return record;
  }

  private markDirty(recordId: string): void {
    this.dirtyIds.add(recordId);
  }

  private snapshotRecord(record: WorkingRecord): CuratedRecord {
    return Object.freeze({
      record_id: record.record_id,
      fields: Object.freeze({ ...record.fields }),
      manual_lock_fields: Object.freeze([...record.manual_lock_fields]),
      data_sources: Object.freeze([...record.data_sources]),
      updated_at: record.updated_at,
    });
  }
}
