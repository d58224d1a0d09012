/**
 * Drift Command
 *
 * Compares the stored records against a gold set without running any stage.
 *
 * Usage:
 *   museum-curator drift --gold <file> [--threshold <ratio>]
 *
 * Exit code 1 when the drift rate exceeds the threshold.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { errorMessage } from '../../core/errors.js';
import { FilePartitionStore } from '../../persistence/partition-store.js';
import {
  buildRecordLookup,
  checkDrift,
  loadGoldSet,
  type DriftReport,
} from '../../validators/drift-gate.js';
import { resolvePath } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, type ExitCode, type GlobalContext } from '../lib/context.js';
import { formatTable, formatters } from '../lib/output.js';

export interface DriftCommandOptions {
  readonly gold?: string;
  readonly threshold?: string;
}

function renderReport(report: DriftReport): string {
  const lines = [
    `Fields checked: ${report.total_fields_checked}`,
    `Drifted:        ${report.drifted_fields}`,
    `Drift rate:     ${formatters.percent(report.drift_rate)} (threshold ${formatters.percent(report.threshold)})`,
    `Status:         ${report.exceeded ? 'EXCEEDED' : 'ok'}`,
  ];
  if (report.missing_records.length > 0) {
    lines.push(`Missing:        ${report.missing_records.join(', ')}`);
  }
  if (report.diffs.length > 0) {
    lines.push(
      '',
      formatTable(
        report.diffs.map((diff) => ({
          record_id: diff.record_id,
          field: diff.field,
          expected: JSON.stringify(diff.expected),
          actual: JSON.stringify(diff.actual),
        })),
        [
          { key: 'record_id', header: 'Record' },
          { key: 'field', header: 'Field' },
          { key: 'expected', header: 'Expected' },
          { key: 'actual', header: 'Actual' },
        ]
      )
    );
  }
  return lines.join('\n');
}

export async function driftCommand(
  options: DriftCommandOptions,
  context: GlobalContext
): Promise<ExitCode> {
  const { config, logger } = context;

  const goldPath = options.gold ?? config.paths.goldSet;
  if (!goldPath) {
    logger.error('No gold set: pass --gold or set paths.gold_set');
    return EXIT_CODES.CONFIG_ERROR;
  }
  const threshold =
    options.threshold === undefined ? config.run.driftThreshold : Number(options.threshold);
  if (!(threshold >= 0 && threshold <= 1)) {
    logger.error('Invalid --threshold', { value: options.threshold });
    return EXIT_CODES.CONFIG_ERROR;
  }

  try {
    const goldSet = await loadGoldSet(resolve(goldPath));
    const store = new FilePartitionStore(resolvePath(config, 'dataDir'));
    const report = checkDrift(goldSet, await buildRecordLookup(store), threshold);
    logger.result(report, () => renderReport(report));
    return report.exceeded ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error('Drift check failed', { error: errorMessage(error) });
    return EXIT_CODES.ERRORS;
  }
}

export function registerDriftCommand(program: Command): void {
  program
    .command('drift')
    .description('Check stored records against a gold set')
    .option('--gold <file>', 'Gold set file')
    .option('--threshold <ratio>', 'Maximum tolerated drift rate')
    .action(async (options: DriftCommandOptions) => {
      process.exitCode = await driftCommand(options, getGlobalContext());
    });
}
