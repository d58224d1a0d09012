/**
 * Source adapter loading
 *
 * Adapters named under `adapters:` in .curatorrc are modules loaded by path.
 * A module exports a `SourceAdapter` object, or a factory taking the entry's
 * `options`, as its default export or as `adapter`.
 *
 * @module cli/lib/adapters
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { AdapterStage, type SourceAdapter } from '../../stages/adapter-stage.js';
import { configBaseDir, type AdapterConfig, type CuratorConfig } from './config.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Builds an adapter from the entry's `options`, sync or async */
export type AdapterFactory = (options: Readonly<Record<string, unknown>>) => unknown;

function isAdapterFactory(value: unknown): value is AdapterFactory {
  return typeof value === 'function';
}

function isSourceAdapter(value: unknown): value is SourceAdapter {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string' || value.name.length === 0) {
    return false;
  }
  if (!('requestParams' in value) || typeof value.requestParams !== 'function') return false;
  if (!('fetch' in value) || typeof value.fetch !== 'function') return false;
  return !('estimateCost' in value) || typeof value.estimateCost === 'function';
}

function moduleExport(loaded: unknown): unknown {
  if (typeof loaded !== 'object' || loaded === null) return undefined;
  if ('default' in loaded && loaded.default !== undefined) return loaded.default;
  return 'adapter' in loaded ? loaded.adapter : undefined;
}

async function loadAdapter(entry: AdapterConfig, baseDir: string): Promise<SourceAdapter> {
  const path = resolve(baseDir, entry.module);
  let loaded: unknown;
  try {
    loaded = await import(pathToFileURL(path).href);
  } catch (error) {
    throw new ConfigError(`Cannot load adapter module ${path}: ${errorMessage(error)}`);
  }

  const exported = moduleExport(loaded);
  const candidate: unknown = isAdapterFactory(exported)
    ? await exported(entry.options)
    : exported;
  if (!isSourceAdapter(candidate)) {
    throw new ConfigError(
      `Adapter module ${path} must export a source adapter (name, requestParams, fetch) or a factory returning one`
    );
  }
  return candidate;
}

/**
 * Adapter stages for the configured modules, in configuration order
 *
 * @throws ConfigError when a module cannot be loaded or exports no adapter
 */
export async function loadAdapterStages(
  config: CuratorConfig,
  cwd: string = process.cwd()
): Promise<AdapterStage[]> {
  const baseDir = configBaseDir(config, cwd);
  const stages: AdapterStage[] = [];
  const names = new Set<string>();

  for (const entry of config.adapters) {
    const adapter = await loadAdapter(entry, baseDir);
    const stage = new AdapterStage(adapter, {
      ...(entry.name !== null ? { name: entry.name } : {}),
      expensive: entry.expensive,
      ...(entry.ttlDays !== null ? { ttlMs: entry.ttlDays * DAY_MS } : {}),
    });
    if (names.has(stage.name)) {
      throw new ConfigError(`Duplicate adapter stage name: ${stage.name}`);
    }
    names.add(stage.name);
    stages.push(stage);
  }
  return stages;
}
