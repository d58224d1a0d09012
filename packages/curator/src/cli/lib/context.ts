/**
 * CLI Global Context
 *
 * Exit codes and the per-invocation context (configuration + logger) that
 * the program's preAction hook initializes before any command runs.
 *
 * @module cli/lib/context
 */

import { configureLogging } from '../../core/utils/logger.js';
import { loadConfig, type CuratorConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CuratorConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly dryRun?: boolean;
  readonly config?: string;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dryRun: options.dryRun,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });
  // Core module logs follow the same flags
  configureLogging({
    format: config.json ? 'json' : 'text',
    ...(config.verbose ? { level: 'debug' as const } : {}),
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}
