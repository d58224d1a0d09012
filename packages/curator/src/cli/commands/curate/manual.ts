/**
 * Curate Manual Commands
 *
 * Usage:
 *   museum-curator curate override <partition> <record-id> <field> <value> --curator <name> [--lock]
 *   museum-curator curate lock <partition> <record-id> <field> --curator <name>
 *   museum-curator curate unlock <partition> <record-id> <field> --curator <name>
 *   museum-curator curate clear <partition> <record-id> <field> --curator <name>
 *
 * Values are read as JSON when they parse as a number, boolean or null, and
 * as plain text otherwise. Every action lands in <dataDir>/audit/curation.ndjson.
 */

import type { Command } from 'commander';
import type { FieldValue } from '@museum-curation/types';
import { errorMessage } from '../../../core/errors.js';
import { CurationAuditLog, getCurationAuditPath } from '../../../curation/curation-audit.js';
import { ManualCuration, type ManualActionTarget } from '../../../curation/manual-curation.js';
import { RecordUpdater } from '../../../curation/record-updater.js';
import { FilePartitionStore } from '../../../persistence/partition-store.js';
import { resolvePath } from '../../lib/config.js';
import {
  EXIT_CODES,
  getGlobalContext,
  type ExitCode,
  type GlobalContext,
} from '../../lib/context.js';

export interface ManualCommandOptions {
  readonly curator: string;
  readonly reason?: string;
  readonly lock?: boolean;
}

export type ManualAction =
  | { readonly kind: 'override'; readonly value: FieldValue; readonly lock: boolean }
  | { readonly kind: 'lock' }
  | { readonly kind: 'unlock' }
  | { readonly kind: 'clear' };

/**
 * Command-line value: number, boolean and null literals, otherwise text
 */
export function parseFieldValue(raw: string): FieldValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (
    parsed === null ||
    typeof parsed === 'number' ||
    typeof parsed === 'boolean' ||
    typeof parsed === 'string'
  ) {
    return parsed;
  }
  return raw;
}

function createCuration(context: GlobalContext): ManualCuration {
  const dataDir = resolvePath(context.config, 'dataDir');
  return new ManualCuration(
    new FilePartitionStore(dataDir),
    new CurationAuditLog(getCurationAuditPath(dataDir)),
    new RecordUpdater(),
    { dryRun: context.config.dryRun }
  );
}

interface ActionOutcome {
  readonly changed: boolean;
  readonly outcome: string;
}

async function performAction(
  curation: ManualCuration,
  action: ManualAction,
  target: ManualActionTarget
): Promise<ActionOutcome> {
  switch (action.kind) {
    case 'override': {
      const summary = await curation.override({ ...target, value: action.value, lock: action.lock });
      const applied = summary.applied_fields[0];
      return applied
        ? { changed: true, outcome: applied.reason }
        : { changed: false, outcome: summary.rejected_fields[0]?.reason ?? 'rejected' };
    }
    case 'lock': {
      const changed = await curation.lock(target);
      return { changed, outcome: changed ? 'locked' : 'already_locked' };
    }
    case 'unlock': {
      const changed = await curation.unlock(target);
      return { changed, outcome: changed ? 'unlocked' : 'not_locked' };
    }
    case 'clear': {
      const outcome = await curation.clear(target);
      return { changed: outcome === 'cleared', outcome };
    }
  }
}

/**
 * Execute one manual action. Exit code 1 when the action changed nothing.
 */
export async function manualCommand(
  action: ManualAction,
  target: ManualActionTarget,
  context: GlobalContext
): Promise<ExitCode> {
  const { logger } = context;
  const curation = createCuration(context);
  logger.commandStart(`curate ${action.kind}`, {
    partition: target.partition,
    record: target.recordId,
    field: target.field,
  });

  try {
    const { changed, outcome } = await performAction(curation, action, target);
    logger.result({ action: action.kind, changed, outcome }, () => `${action.kind}: ${outcome}`);
    logger.commandEnd(true, { outcome });
    return changed ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
  } catch (error) {
    logger.commandEnd(false, { error: errorMessage(error) });
    return EXIT_CODES.ERRORS;
  }
}

function toTarget(
  partition: string,
  recordId: string,
  field: string,
  options: ManualCommandOptions
): ManualActionTarget {
  return {
    partition,
    recordId,
    field,
    curator: options.curator,
    ...(options.reason !== undefined ? { reason: options.reason } : {}),
  };
}

export function registerManualCommands(curate: Command): void {
  curate
    .command('override <partition> <record-id> <field> <value>')
    .description('Set a field under MANUAL_OVERRIDE provenance')
    .requiredOption('--curator <name>', 'Curator recorded in provenance and audit')
    .option('--reason <text>', 'Audit log reason')
    .option('--lock', 'Lock the field after the override')
    .action(
      async (
        partition: string,
        recordId: string,
        field: string,
        value: string,
        options: ManualCommandOptions
      ) => {
        process.exitCode = await manualCommand(
          { kind: 'override', value: parseFieldValue(value), lock: options.lock ?? false },
          toTarget(partition, recordId, field, options),
          getGlobalContext()
        );
      }
    );

  for (const kind of ['lock', 'unlock', 'clear'] as const) {
    const descriptions = {
      lock: 'Lock a field against automated updates',
      unlock: 'Remove a field lock',
      clear: 'Remove a field value',
    };
    curate
      .command(`${kind} <partition> <record-id> <field>`)
      .description(descriptions[kind])
      .requiredOption('--curator <name>', 'Curator recorded in the audit log')
      .option('--reason <text>', 'Audit log reason')
      .action(
        async (partition: string, recordId: string, field: string, options: ManualCommandOptions) => {
          process.exitCode = await manualCommand(
            { kind },
            toTarget(partition, recordId, field, options),
            getGlobalContext()
          );
        }
      );
  }
}
