/**
 * Index Rebuild Stage
 *
 * Finalize stage: rebuilds the cross-partition record index from every
 * partition in the store. Under dry-run the index is built and counted but
 * not written.
 */

import type { CuratedRecord } from '@museum-curation/types';
import { createLogger } from '../core/utils/logger.js';
import type {
  FinalizeStage,
  FinalizeStageInput,
  StageResult,
} from '../orchestration/stages.js';
import type {
  PartitionStore,
  RecordIndexDocument,
  RecordIndexEntry,
} from '../persistence/partition-store.js';

const log = createLogger({ module: 'index-rebuild' });

export function toIndexEntry(partition: string, record: CuratedRecord): RecordIndexEntry {
  const fields = record.fields;
  return {
    record_id: record.record_id,
    partition,
    museum_name: fields.museum_name ?? null,
    city: fields.city ?? null,
    primary_domain: fields.primary_domain ?? null,
    priority_score: fields.priority_score ?? null,
  };
}

/**
 * Index over every partition in the store, sorted by partition then record id
 */
export async function buildRecordIndex(
  store: PartitionStore,
  generatedAt: Date
): Promise<RecordIndexDocument> {
  const entries: RecordIndexEntry[] = [];
  for (const partition of await store.listPartitions()) {
    const data = await store.load(partition);
    for (const record of data.records) {
      entries.push(toIndexEntry(partition, record));
    }
  }
  entries.sort((a, b) => {
    if (a.partition !== b.partition) return a.partition < b.partition ? -1 : 1;
    if (a.record_id === b.record_id) return 0;
    return a.record_id < b.record_id ? -1 : 1;
  });
  return {
    generated_at: generatedAt.toISOString(),
    total_records: entries.length,
    records: entries,
  };
}

export class IndexRebuildStage implements FinalizeStage {
  readonly kind = 'finalize';
  readonly name = 'index-rebuild';

  async run(input: FinalizeStageInput): Promise<StageResult> {
    const index = await buildRecordIndex(input.store, input.context.now());
    if (input.context.dryRun) {
      log.info('Dry run: index not written', { totalRecords: index.total_records });
    } else {
      await input.store.saveIndex(index);
      log.info('Index rebuilt', { totalRecords: index.total_records });
    }
    return { success: true, metrics: { total_records: index.total_records } };
  }
}
