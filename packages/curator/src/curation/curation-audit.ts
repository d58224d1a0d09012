/**
 * Curation Audit Log
 *
 * Append-only NDJSON log of human curation actions (manual overrides, field
 * locks, manual clears). Lives beside the partitions at
 * `<dataDir>/audit/curation.ndjson`.
 *
 * @module curation/curation-audit
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { isErrnoException } from '../core/errors.js';

export type CurationAction = 'override' | 'lock' | 'unlock' | 'clear';

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const curationAuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  action: z.enum(['override', 'lock', 'unlock', 'clear']),
  partition: z.string(),
  record_id: z.string(),
  field: z.string(),
  actor: z.string(),
  reason: z.string().optional(),
  before: fieldValueSchema.optional(),
  after: fieldValueSchema.optional(),
  outcome: z.string(),
});

export type CurationAuditEntry = z.infer<typeof curationAuditEntrySchema>;

export type CurationAuditInput = Omit<CurationAuditEntry, 'id' | 'timestamp'>;

export function getCurationAuditPath(dataDir: string): string {
  return join(dataDir, 'audit', 'curation.ndjson');
}

export class CurationAuditLog {
  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async append(input: CurationAuditInput): Promise<CurationAuditEntry> {
    const entry: CurationAuditEntry = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      ...input,
    };
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    return entry;
  }

  /**
   * Read every entry. Lines that fail to parse are skipped and counted.
   */
  async readAll(): Promise<{ entries: CurationAuditEntry[]; invalidLines: number }> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { entries: [], invalidLines: 0 };
      }
      throw error;
    }

    const entries: CurationAuditEntry[] = [];
    let invalidLines = 0;
    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;
      try {
        const parsed = curationAuditEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          entries.push(parsed.data);
        } else {
          invalidLines++;
        }
      } catch {
        invalidLines++;
      }
    }
    return { entries, invalidLines };
  }
}
