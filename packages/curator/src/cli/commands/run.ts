/**
 * Run Command
 *
 * Runs the curation pipeline (backbone, configured source adapters, priority,
 * index rebuild) over the selected partitions and maps the terminal state to
 * an exit code.
 *
 * Usage:
 *   museum-curator run [options]
 *
 * Options:
 *   --partition <name...>   Partitions to process (default: all)
 *   --force                 Recompute backbone fields even when present
 *   --gold <file>           Gold set for the drift gate
 *   --budget <usd>          Run budget in USD
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import Database from 'better-sqlite3';
import type { Command } from 'commander';
import { SqliteAdapterCache } from '../../cache/adapter-cache.js';
import { errorMessage, isCuratorError } from '../../core/errors.js';
import type { RunState } from '../../orchestration/gates.js';
import {
  PipelineOrchestrator,
  type RunResult,
} from '../../orchestration/pipeline-orchestrator.js';
import type { Stage } from '../../orchestration/stages.js';
import { FilePartitionStore } from '../../persistence/partition-store.js';
import { BackboneStage } from '../../stages/backbone-stage.js';
import { IndexRebuildStage } from '../../stages/index-rebuild-stage.js';
import { PriorityStage } from '../../stages/priority-stage.js';
import { loadAdapterStages } from '../lib/adapters.js';
import { resolvePath, toRunParameters } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext, type ExitCode, type GlobalContext } from '../lib/context.js';
import { formatDuration } from '../lib/logger.js';
import { formatters } from '../lib/output.js';

export interface RunCommandOptions {
  readonly partition?: readonly string[];
  readonly force?: boolean;
  readonly gold?: string;
  readonly budget?: string;
}

/**
 * Exit code for a finished run. Drift flags the run without rolling it back,
 * so it maps to a warning; other aborts and failed partitions are errors.
 */
export function exitCodeForRun(state: RunState, failedPartitions: number): ExitCode {
  switch (state) {
    case 'aborted_budget':
    case 'aborted_failure_rate':
      return EXIT_CODES.ERRORS;
    case 'aborted_drift':
      return EXIT_CODES.WARNINGS;
    case 'completed':
      return failedPartitions > 0 ? EXIT_CODES.ERRORS : EXIT_CODES.SUCCESS;
  }
}

/**
 * Stage order for a run: adapters enrich after the backbone fills its fields
 * and before priority scores the result
 */
export function builtInStages(force: boolean, adapterStages: readonly Stage[] = []): Stage[] {
  return [
    new BackboneStage({ force }),
    ...adapterStages,
    new PriorityStage(),
    new IndexRebuildStage(),
  ];
}

function renderRun(result: RunResult): string {
  const lines = [
    `Run:        ${result.runId}`,
    `State:      ${result.state}`,
    `Partitions: ${result.partitions.length}` +
      (result.failedPartitions.length > 0
        ? ` (failed: ${result.failedPartitions.join(', ')})`
        : ''),
    `Changes:    ${result.artifacts.changes.length}`,
    `Review:     ${result.artifacts.review_queue.length}`,
    `Budget:     ${formatters.decimal(result.metrics.budget_spent)} / ${formatters.decimal(result.metrics.budget_total)} USD`,
    `Duration:   ${formatDuration(result.metrics.duration_ms)}`,
  ];
  if (result.driftReport) {
    lines.push(
      `Drift:      ${formatters.percent(result.driftReport.drift_rate)} ` +
        `(threshold ${formatters.percent(result.driftReport.threshold)})`
    );
  }
  if (result.signal.kind !== 'ok') {
    lines.push(`Abort:      ${result.signal.kind}`);
  }
  return lines.join('\n');
}

/**
 * Execute the run command
 */
export async function runCommand(
  options: RunCommandOptions,
  context: GlobalContext
): Promise<ExitCode> {
  const { config, logger } = context;
  const store = new FilePartitionStore(resolvePath(config, 'dataDir'));

  const budgetUsd = options.budget === undefined ? undefined : Number(options.budget);
  if (budgetUsd !== undefined && !(budgetUsd > 0)) {
    logger.error('Invalid --budget', { value: options.budget });
    return EXIT_CODES.CONFIG_ERROR;
  }

  let adapterStages: Stage[];
  try {
    adapterStages = await loadAdapterStages(config);
  } catch (error) {
    if (!isCuratorError(error)) throw error;
    logger.error('Invalid adapter configuration', { error: error.message });
    return EXIT_CODES.CONFIG_ERROR;
  }

  const cachePath = resolvePath(config, 'cacheDb');
  mkdirSync(dirname(cachePath), { recursive: true });
  const db = new Database(cachePath);

  logger.commandStart('run', {
    partitions: options.partition?.length ?? 'all',
    dryRun: config.dryRun,
  });

  try {
    const cache = new SqliteAdapterCache(db);
    const purged = cache.purgeExpired();
    if (purged > 0) logger.debug('Purged expired cache entries', { purged });

    const params = toRunParameters(config);
    const orchestrator = new PipelineOrchestrator({
      store,
      stages: builtInStages(options.force ?? false, adapterStages),
      cache,
      params: {
        ...params,
        ...(budgetUsd !== undefined ? { budgetUsd } : {}),
        ...(options.gold !== undefined ? { goldSetPath: resolve(options.gold) } : {}),
      },
    });

    const result = await orchestrator.run(options.partition);
    logger.result(
      {
        run_id: result.runId,
        state: result.state,
        failed_partitions: result.failedPartitions,
        summary: result.summary,
        metrics: result.metrics,
        drift: result.driftReport,
      },
      () => renderRun(result)
    );

    const exitCode = exitCodeForRun(result.state, result.failedPartitions.length);
    logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, { state: result.state, exitCode });
    return exitCode;
  } catch (error) {
    logger.commandEnd(false, { error: errorMessage(error) });
    return EXIT_CODES.ERRORS;
  } finally {
    db.close();
  }
}

/**
 * Register the run command
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the curation pipeline over the record partitions')
    .option('--partition <name...>', 'Partitions to process (default: all)')
    .option('--force', 'Recompute backbone fields even when present')
    .option('--gold <file>', 'Gold set file for the drift gate')
    .option('--budget <usd>', 'Run budget in USD')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await runCommand(options, getGlobalContext());
    });
}
