/**
 * Bundled data tables (lookup lists, cost tables) shipped under `data/`.
 * Parsed once per process and validated on load.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import { ConfigError } from '../errors.js';

const DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));

const cache = new Map<string, unknown>();

export function dataFilePath(fileName: string): string {
  return `${DATA_DIR}${fileName}`;
}

/**
 * Read and validate a bundled JSON data file
 *
 * @throws ConfigError if the content does not match `schema`
 */
export function loadDataFile<T>(
  fileName: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const cached = cache.get(fileName);
  const raw: unknown = cached ?? JSON.parse(readFileSync(dataFilePath(fileName), 'utf-8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Data file ${fileName} is invalid`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  cache.set(fileName, raw);
  return parsed.data;
}
