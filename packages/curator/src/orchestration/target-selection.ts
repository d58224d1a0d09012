/**
 * Target selection for the expensive enrichment stage: the top-N
 * domain-eligible records across every partition of the run, by priority
 * rank.
 */

import type { CuratedRecord } from '@museum-curation/types';
import { isCuratorError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { FieldPolicy } from '../curation/field-policy.js';
import { DOMAIN_FIELD } from '../curation/field-policy.js';
import type { PartitionStore } from '../persistence/partition-store.js';
import { rankRecords } from '../scoring/priority-scorer.js';

const log = createLogger({ module: 'target-selection' });

export const DEFAULT_TOP_N = 100;

export function targetKey(partition: string, recordId: string): string {
  return `${partition}/${recordId}`;
}

export interface PartitionedRecord extends CuratedRecord {
  readonly partition: string;
}

export function selectTopTargets(
  records: readonly PartitionedRecord[],
  policy: FieldPolicy,
  topN: number = DEFAULT_TOP_N
): Set<string> {
  const eligible = records.filter((record) =>
    policy.isEligibleDomain(record.fields[DOMAIN_FIELD])
  );
  return new Set(
    rankRecords(eligible)
      .slice(0, Math.max(0, topN))
      .map(({ record }) => targetKey(record.partition, record.record_id))
  );
}

/**
 * Load every partition once and select the run's targets. A partition that
 * cannot be loaded contributes no targets; the run records it as failed when
 * it reaches that partition.
 */
export async function selectTargetsFromStore(
  store: PartitionStore,
  partitions: readonly string[],
  policy: FieldPolicy,
  topN: number = DEFAULT_TOP_N
): Promise<Set<string>> {
  const records: PartitionedRecord[] = [];
  for (const partition of partitions) {
    let loaded: readonly CuratedRecord[];
    try {
      loaded = (await store.load(partition)).records;
    } catch (error) {
      if (!isCuratorError(error)) throw error;
      log.warn('Partition skipped for target selection', { partition, error: error.message });
      continue;
    }
    for (const record of loaded) {
      records.push({ ...record, partition });
    }
  }
  return selectTopTargets(records, policy, topN);
}
