/**
 * Museum Curator CLI Configuration
 *
 * Loads configuration from .curatorrc (YAML or JSON) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CURATOR_*)
 * 3. Config file (.curatorrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { DEFAULT_BUDGET_USD, DEFAULT_RESERVE_RATIO } from '../../orchestration/budget.js';
import { DEFAULT_FAILURE_RATE_THRESHOLD } from '../../orchestration/gates.js';
import type { RunParameters } from '../../orchestration/pipeline-orchestrator.js';
import { DEFAULT_TOP_N } from '../../orchestration/target-selection.js';
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_ELIGIBLE_DOMAIN,
  DEFAULT_VOLATILE_FIELDS,
} from '../../curation/field-policy.js';
import { DEFAULT_DRIFT_THRESHOLD } from '../../validators/drift-gate.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Partitions, provenance, locks, index and curation audit */
  readonly dataDir: string;
  /** One directory per run id */
  readonly runsDir: string;
  /** SQLite adapter cache */
  readonly cacheDb: string;
  readonly goldSet: string | null;
}

export interface RunConfig {
  readonly budgetUsd: number;
  readonly reserveRatio: number;
  readonly confidenceThreshold: number;
  readonly topN: number;
  readonly failureRateThreshold: number;
  readonly failureMinSample: number;
  readonly driftThreshold: number;
  readonly eligibleDomain: string;
  readonly volatileFields: readonly string[];
}

/**
 * A source adapter module plugged into `run` between the backbone and
 * priority stages
 */
export interface AdapterConfig {
  /** Module path, relative to the config file */
  readonly module: string;
  /** Stage name (default: the adapter's own name) */
  readonly name: string | null;
  /** Restrict to the run's top-N records */
  readonly expensive: boolean;
  readonly ttlDays: number | null;
  /** Passed to the module's factory */
  readonly options: Readonly<Record<string, unknown>>;
}

export interface CuratorConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly run: RunConfig;
  readonly adapters: readonly AdapterConfig[];

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  readonly dryRun: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const configFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        data_dir: z.string().min(1).optional(),
        runs_dir: z.string().min(1).optional(),
        cache_db: z.string().min(1).optional(),
        gold_set: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    run: z
      .object({
        budget_usd: z.number().optional(),
        reserve_ratio: z.number().optional(),
        confidence_threshold: z.number().optional(),
        top_n: z.number().optional(),
        failure_rate_threshold: z.number().optional(),
        failure_min_sample: z.number().optional(),
        drift_threshold: z.number().optional(),
        eligible_domain: z.string().min(1).optional(),
        volatile_fields: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
    adapters: z
      .array(
        z
          .object({
            module: z.string().min(1),
            name: z.string().min(1).optional(),
            expensive: z.boolean().optional(),
            ttl_days: z.number().positive().optional(),
            options: z.record(z.unknown()).optional(),
          })
          .strict()
      )
      .optional(),
  })
  .strict();

type ConfigFileSchema = z.infer<typeof configFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Pick<CuratorConfig, 'version' | 'paths' | 'run' | 'adapters'> = {
  version: 1,

  paths: {
    dataDir: './data',
    runsDir: './data/runs',
    cacheDb: './data/cache/adapter-cache.db',
    goldSet: null,
  },

  run: {
    budgetUsd: DEFAULT_BUDGET_USD,
    reserveRatio: DEFAULT_RESERVE_RATIO,
    confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
    topN: DEFAULT_TOP_N,
    failureRateThreshold: DEFAULT_FAILURE_RATE_THRESHOLD,
    failureMinSample: 1,
    driftThreshold: DEFAULT_DRIFT_THRESHOLD,
    eligibleDomain: DEFAULT_ELIGIBLE_DOMAIN,
    volatileFields: DEFAULT_VOLATILE_FIELDS,
  },

  adapters: [],
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.curatorrc',
  '.curatorrc.yaml',
  '.curatorrc.yml',
  '.curatorrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate a config file (YAML parser also reads plain JSON)
 */
export function parseConfigFile(filePath: string): ConfigFileSchema {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  // An empty YAML document parses to null
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

class EnvReader {
  constructor(private readonly env: Env) {}

  get(name: string): string | undefined {
    const value = this.env[`CURATOR_${name}`];
    return value === undefined || value.trim() === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  number(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (!Number.isFinite(num)) {
      throw new ConfigError(`CURATOR_${name} must be a number, got "${value}"`);
    }
    return num;
  }
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config search starts from (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly dryRun?: boolean;
    readonly dataDir?: string;
    readonly runsDir?: string;
    readonly budgetUsd?: number;
    readonly confidenceThreshold?: number;
    readonly topN?: number;
    readonly goldSet?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a file or value is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CuratorConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  const explicitPath = options.configPath ?? env.get('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const filePaths = fileConfig.paths ?? {};
  const fileRun = fileConfig.run ?? {};

  const config: CuratorConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      dataDir:
        overrides.dataDir ?? env.get('DATA_DIR') ?? filePaths.data_dir ?? DEFAULT_CONFIG.paths.dataDir,
      runsDir:
        overrides.runsDir ?? env.get('RUNS_DIR') ?? filePaths.runs_dir ?? DEFAULT_CONFIG.paths.runsDir,
      cacheDb: env.get('CACHE_DB') ?? filePaths.cache_db ?? DEFAULT_CONFIG.paths.cacheDb,
      goldSet: overrides.goldSet ?? filePaths.gold_set ?? DEFAULT_CONFIG.paths.goldSet,
    },

    run: {
      budgetUsd:
        overrides.budgetUsd ??
        env.number('BUDGET_USD') ??
        fileRun.budget_usd ??
        DEFAULT_CONFIG.run.budgetUsd,
      reserveRatio: fileRun.reserve_ratio ?? DEFAULT_CONFIG.run.reserveRatio,
      confidenceThreshold:
        overrides.confidenceThreshold ??
        env.number('CONFIDENCE_THRESHOLD') ??
        fileRun.confidence_threshold ??
        DEFAULT_CONFIG.run.confidenceThreshold,
      topN: overrides.topN ?? env.number('TOP_N') ?? fileRun.top_n ?? DEFAULT_CONFIG.run.topN,
      failureRateThreshold:
        fileRun.failure_rate_threshold ?? DEFAULT_CONFIG.run.failureRateThreshold,
      failureMinSample: fileRun.failure_min_sample ?? DEFAULT_CONFIG.run.failureMinSample,
      driftThreshold: fileRun.drift_threshold ?? DEFAULT_CONFIG.run.driftThreshold,
      eligibleDomain: fileRun.eligible_domain ?? DEFAULT_CONFIG.run.eligibleDomain,
      volatileFields: fileRun.volatile_fields ?? DEFAULT_CONFIG.run.volatileFields,
    },

    adapters:
      fileConfig.adapters?.map((adapter) => ({
        module: adapter.module,
        name: adapter.name ?? null,
        expensive: adapter.expensive ?? false,
        ttlDays: adapter.ttl_days ?? null,
        options: adapter.options ?? {},
      })) ?? DEFAULT_CONFIG.adapters,

    // Runtime flags
    verbose: overrides.verbose ?? env.bool('VERBOSE') ?? false,
    json: overrides.json ?? env.bool('JSON') ?? false,
    dryRun: overrides.dryRun ?? env.bool('DRY_RUN') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Directory configured paths are relative to: the config file's directory, or
 * the working directory when no file was loaded
 */
export function configBaseDir(config: CuratorConfig, cwd: string = process.cwd()): string {
  return config.configPath ? resolve(config.configPath, '..') : cwd;
}

export function resolvePath(
  config: CuratorConfig,
  pathKey: 'dataDir' | 'runsDir' | 'cacheDb',
  cwd: string = process.cwd()
): string {
  return resolve(configBaseDir(config, cwd), config.paths[pathKey]);
}

/**
 * Validate configuration
 *
 * @throws ConfigError listing every invalid value
 */
export function validateConfig(config: CuratorConfig): void {
  const issues: string[] = [];
  const run = config.run;

  if (config.version !== 1) {
    issues.push(`unsupported config version ${config.version}, expected 1`);
  }
  if (!(run.budgetUsd > 0)) {
    issues.push('budget_usd must be positive');
  }
  if (!(run.reserveRatio >= 0 && run.reserveRatio < 1)) {
    issues.push('reserve_ratio must be in [0, 1)');
  }
  if (!(run.confidenceThreshold >= 1 && run.confidenceThreshold <= 5)) {
    issues.push('confidence_threshold must be between 1 and 5');
  }
  if (!Number.isInteger(run.topN) || run.topN < 1) {
    issues.push('top_n must be a positive integer');
  }
  if (!(run.failureRateThreshold >= 0 && run.failureRateThreshold <= 1)) {
    issues.push('failure_rate_threshold must be in [0, 1]');
  }
  if (!Number.isInteger(run.failureMinSample) || run.failureMinSample < 1) {
    issues.push('failure_min_sample must be a positive integer');
  }
  if (!(run.driftThreshold >= 0 && run.driftThreshold <= 1)) {
    issues.push('drift_threshold must be in [0, 1]');
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
}

/**
 * Orchestrator parameters for a configuration
 */
export function toRunParameters(
  config: CuratorConfig,
  cwd: string = process.cwd()
): Partial<RunParameters> {
  const basePath = configBaseDir(config, cwd);
  return {
    budgetUsd: config.run.budgetUsd,
    reserveRatio: config.run.reserveRatio,
    confidenceThreshold: config.run.confidenceThreshold,
    volatileFields: config.run.volatileFields,
    eligibleDomain: config.run.eligibleDomain,
    topN: config.run.topN,
    failureRateThreshold: config.run.failureRateThreshold,
    failureMinSample: config.run.failureMinSample,
    driftThreshold: config.run.driftThreshold,
    goldSetPath: config.paths.goldSet === null ? null : resolve(basePath, config.paths.goldSet),
    dryRun: config.dryRun,
    runsDir: resolvePath(config, 'runsDir', cwd),
  };
}
