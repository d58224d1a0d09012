/**
 * Score Command
 *
 * Prints one partition's domain-eligible records in priority order with the
 * score breakdown. Read-only: nothing is written.
 *
 * Usage:
 *   museum-curator score <partition> [--limit <n>]
 */

import type { Command } from 'commander';
import type { CuratedRecord } from '@museum-curation/types';
import { errorMessage } from '../../core/errors.js';
import {
  DEFAULT_FIELD_POLICY_CONFIG,
  DOMAIN_FIELD,
  FieldPolicy,
} from '../../curation/field-policy.js';
import { FilePartitionStore } from '../../persistence/partition-store.js';
import {
  explainPriorityScore,
  rankRecords,
  scoringInputsFromRecord,
  type PriorityBreakdown,
} from '../../scoring/priority-scorer.js';
import { resolvePath } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, type ExitCode, type GlobalContext } from '../lib/context.js';
import { formatTable, type TableColumn } from '../lib/output.js';

export interface ScoreCommandOptions {
  readonly limit?: string;
}

export interface ScoreRow {
  readonly rank: number;
  readonly record_id: string;
  readonly museum_name: string | null;
  readonly city: string | null;
  readonly score: number | null;
  readonly breakdown: PriorityBreakdown | null;
}

const COLUMNS: readonly TableColumn[] = [
  { key: 'rank', header: '#', align: 'right' },
  { key: 'record_id', header: 'Record' },
  { key: 'museum_name', header: 'Museum', width: 36 },
  { key: 'city', header: 'City' },
  { key: 'score', header: 'Score', align: 'right' },
  { key: 'primary_strength', header: 'Strength', align: 'right' },
  { key: 'dual_bonus', header: 'Dual', align: 'right' },
  { key: 'cluster_bonus', header: 'Cluster', align: 'right' },
  { key: 'primary_art', header: 'Primary art' },
];

function text(record: CuratedRecord, field: string): string | null {
  const value = record.fields[field];
  return typeof value === 'string' ? value : null;
}

/**
 * Ranked rows for a partition's eligible records
 */
export function scoreRows(
  records: readonly CuratedRecord[],
  policy: FieldPolicy,
  limit?: number
): ScoreRow[] {
  const eligible = records.filter((record) => policy.isEligibleDomain(record.fields[DOMAIN_FIELD]));
  const ranked = rankRecords(eligible).slice(0, limit);
  return ranked.map(({ record, score }, index) => ({
    rank: index + 1,
    record_id: record.record_id,
    museum_name: text(record, 'museum_name'),
    city: text(record, 'city'),
    score,
    breakdown: explainPriorityScore(scoringInputsFromRecord(record)),
  }));
}

export async function scoreCommand(
  partition: string,
  options: ScoreCommandOptions,
  context: GlobalContext
): Promise<ExitCode> {
  const { config, logger } = context;

  const limit = options.limit === undefined ? undefined : Number(options.limit);
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    logger.error('Invalid --limit', { value: options.limit });
    return EXIT_CODES.CONFIG_ERROR;
  }

  const store = new FilePartitionStore(resolvePath(config, 'dataDir'));
  const policy = new FieldPolicy({
    ...DEFAULT_FIELD_POLICY_CONFIG,
    eligibleDomain: config.run.eligibleDomain,
  });

  try {
    const data = await store.load(partition);
    const rows = scoreRows(data.records, policy, limit);
    logger.result({ partition, records: rows }, () =>
      formatTable(
        rows.map((row) => ({
          rank: row.rank,
          record_id: row.record_id,
          museum_name: row.museum_name,
          city: row.city,
          score: row.score,
          primary_strength: row.breakdown?.primary_strength,
          dual_bonus: row.breakdown?.dual_bonus,
          cluster_bonus: row.breakdown?.cluster_bonus,
          primary_art: row.breakdown?.primary_art,
        })),
        COLUMNS
      )
    );
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error('Scoring failed', { partition, error: errorMessage(error) });
    return EXIT_CODES.ERRORS;
  }
}

export function registerScoreCommand(program: Command): void {
  program
    .command('score <partition>')
    .description('Show the priority ranking of a partition')
    .option('--limit <n>', 'Show only the top N records')
    .action(async (partition: string, options: ScoreCommandOptions) => {
      process.exitCode = await scoreCommand(partition, options, getGlobalContext());
    });
}
