#!/usr/bin/env tsx
/**
 * Museum Curator CLI Entry Point
 *
 * Pipeline runs, priority rankings, drift checks and manual curation over a
 * partitioned museum dataset.
 *
 * @module museum-curator-cli
 */

import 'dotenv/config';
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { EXIT_CODES, initializeContext, type GlobalOptions } from '../src/cli/lib/context.js';
import { registerRunCommand } from '../src/cli/commands/run.js';
import { registerScoreCommand } from '../src/cli/commands/score.js';
import { registerDriftCommand } from '../src/cli/commands/drift.js';
import { registerCurateCommands } from '../src/cli/commands/curate/index.js';
import { errorMessage } from '../src/core/errors.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson = z
      .object({ version: z.string() })
      .safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return packageJson.success ? packageJson.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('museum-curator')
    .description('Museum Curator CLI - provenance-aware curation of museum records')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--dry-run', 'Show what would happen without writing partitions')
    .option('--config <path>', 'Path to config file (default: .curatorrc)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerRunCommand(program);
  registerScoreCommand(program);
  registerDriftCommand(program);
  registerCurateCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
