/**
 * Module Logger Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  configureLogging,
  createLogger,
  formatLogRecord,
  resetLogging,
  type LogRecord,
} from '../../../core/utils/logger.js';

function collect(): { lines: string[]; records: LogRecord[] } {
  const lines: string[] = [];
  const records: LogRecord[] = [];
  configureLogging({
    sink: (line, record) => {
      lines.push(line);
      records.push(record);
    },
  });
  return { lines, records };
}

describe('createLogger', () => {
  afterEach(() => {
    resetLogging();
  });

  it('should drop lines below the configured level', () => {
    const { records } = collect();
    configureLogging({ level: 'warn' });
    const log = createLogger({ module: 'orchestrator' });

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');

    expect(records.map((record) => [record.level, record.message])).toEqual([
      ['warn', 'shown'],
      ['error', 'shown too'],
    ]);
    expect(records[0]?.module).toBe('museum-curator:orchestrator');
  });

  it('should bind child metadata under per-call metadata', () => {
    const { records } = collect();
    configureLogging({ level: 'debug' });
    const log = createLogger({ module: 'orchestrator' }).child({ runId: 'run-1', partition: 'WA' });

    log.info('Stage done', { partition: 'OR', stage: 'backbone' });

    expect(records[0]?.metadata).toEqual({ runId: 'run-1', partition: 'OR', stage: 'backbone' });
  });

  it('should emit JSON lines in json format', () => {
    const { lines } = collect();
    configureLogging({ level: 'info', format: 'json' });

    createLogger({ module: 'drift-gate' }).info('Drift checked', { drift_rate: 0 });

    const parsed: unknown = JSON.parse(lines[0] ?? '');
    expect(parsed).toMatchObject({
      level: 'info',
      module: 'museum-curator:drift-gate',
      message: 'Drift checked',
      drift_rate: 0,
    });
  });
});

describe('formatLogRecord', () => {
  const record: LogRecord = {
    timestamp: '2024-06-01T12:00:00.000Z',
    level: 'warn',
    module: 'museum-curator:partition-lock',
    message: 'Breaking stale lock',
    metadata: {},
  };

  it('should render one text line without metadata', () => {
    expect(formatLogRecord(record, 'text')).toBe(
      '[2024-06-01T12:00:00.000Z] WARN museum-curator:partition-lock: Breaking stale lock'
    );
  });

  it('should append metadata as JSON in text format', () => {
    expect(formatLogRecord({ ...record, metadata: { partition: 'WA' } }, 'text')).toBe(
      '[2024-06-01T12:00:00.000Z] WARN museum-curator:partition-lock: Breaking stale lock {"partition":"WA"}'
    );
  });
});
