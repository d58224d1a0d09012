/**
 * Curate Commands Index
 *
 * Registers the human curation subcommands:
 * - override: set a field under MANUAL_OVERRIDE provenance
 * - lock / unlock: manage a record's locked fields
 * - clear: remove a field's value
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { Command } from 'commander';
import { registerManualCommands } from './manual.js';

/**
 * Register all curate subcommands
 *
 * @param program - Commander program instance
 */
export function registerCurateCommands(program: Command): void {
  const curate = program
    .command('curate')
    .description('Manual curation: overrides, field locks and clears');

  registerManualCommands(curate);
}
