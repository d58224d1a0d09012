/**
 * CLI Command Tests
 *
 * Commands run against a temporary data directory with an explicit global
 * context; JSON output is captured from console.log.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { driftCommand } from '../../../cli/commands/drift.js';
import { manualCommand, parseFieldValue } from '../../../cli/commands/curate/manual.js';
import { builtInStages, exitCodeForRun, runCommand } from '../../../cli/commands/run.js';
import { scoreCommand, scoreRows } from '../../../cli/commands/score.js';
import { loadConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES, type GlobalContext } from '../../../cli/lib/context.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { FieldPolicy } from '../../../curation/field-policy.js';
import { FilePartitionStore } from '../../../persistence/partition-store.js';
import { AdapterStage } from '../../../stages/adapter-stage.js';
import { makePartition, makeRecord, makeScoredArtRecord } from '../../utils/fixtures.js';

const STATIC_ADAPTER = fileURLToPath(
  new URL('../../fixtures/adapters/static-adapter.ts', import.meta.url)
);

const RECORDS = [
  makeScoredArtRecord('art-1', { impressionist: 3, modern: 4, historical: 3, reputation: 1, collection: 2 }),
  makeScoredArtRecord('art-2', { impressionist: 5, modern: 4, historical: 5, reputation: 0, collection: 0 }),
  makeRecord('hist-1', { museum_name: 'Old Mill', city: 'Boise', primary_domain: 'History' }),
  makeRecord('art-3', { museum_name: 'Sketch Hall', city: 'Boise', primary_domain: 'Art' }),
];

describe('run command helpers', () => {
  it('should map terminal states to exit codes', () => {
    expect(exitCodeForRun('completed', 0)).toBe(EXIT_CODES.SUCCESS);
    expect(exitCodeForRun('completed', 1)).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeForRun('aborted_drift', 0)).toBe(EXIT_CODES.WARNINGS);
    expect(exitCodeForRun('aborted_budget', 0)).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeForRun('aborted_failure_rate', 0)).toBe(EXIT_CODES.ERRORS);
  });

  it('should run backbone, priority and index rebuild in order', () => {
    expect(builtInStages(false).map((stage) => stage.name)).toEqual([
      'backbone',
      'priority',
      'index-rebuild',
    ]);
  });

  it('should place adapter stages between backbone and priority', () => {
    const adapter = new AdapterStage({
      name: 'kb',
      requestParams: (record) => record.record_id,
      fetch: async () => ({ fields: {} }),
    });

    expect(builtInStages(false, [adapter]).map((stage) => stage.name)).toEqual([
      'backbone',
      'kb',
      'priority',
      'index-rebuild',
    ]);
  });
});

describe('parseFieldValue', () => {
  it('should read scalar literals', () => {
    expect(parseFieldValue('3')).toBe(3);
    expect(parseFieldValue('true')).toBe(true);
    expect(parseFieldValue('null')).toBeNull();
    expect(parseFieldValue('"Half day"')).toBe('Half day');
  });

  it('should keep everything else as text', () => {
    expect(parseFieldValue('Art Museum')).toBe('Art Museum');
    expect(parseFieldValue('[1,2]')).toBe('[1,2]');
    expect(parseFieldValue('{"a":1}')).toBe('{"a":1}');
  });
});

describe('scoreRows', () => {
  it('should rank eligible records with unscored ones last', () => {
    const rows = scoreRows(RECORDS, new FieldPolicy());

    expect(rows.map((row) => [row.rank, row.record_id, row.score])).toEqual([
      [1, 'art-2', 3],
      [2, 'art-1', 15],
      [3, 'art-3', null],
    ]);
    expect(rows[0]?.breakdown?.primary_art).toBe('Impressionist');
    expect(rows[2]?.breakdown).toBeNull();
  });

  it('should honour the limit', () => {
    expect(scoreRows(RECORDS, new FieldPolicy(), 1).map((row) => row.record_id)).toEqual(['art-2']);
  });
});

describe('commands against a data directory', () => {
  let dataDir: string;
  let context: GlobalContext;
  let printed: string[];

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'curator-cli-'));
    await new FilePartitionStore(dataDir).save(makePartition('ID', RECORDS));
    const config = await loadConfig({ cwd: dataDir, env: {}, overrides: { dataDir, json: true } });
    context = { config, logger: createCLILogger({ level: 'error', json: true }), startTime: 0 };

    printed = [];
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      printed.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dataDir, { recursive: true, force: true });
  });

  describe('score', () => {
    it('should print the ranking as JSON', async () => {
      const code = await scoreCommand('ID', { limit: '2' }, context);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const output: unknown = JSON.parse(printed[0] ?? 'null');
      expect(output).toMatchObject({
        partition: 'ID',
        records: [
          { rank: 1, record_id: 'art-2', score: 3 },
          { rank: 2, record_id: 'art-1', score: 15 },
        ],
      });
    });

    it('should reject an invalid limit', async () => {
      expect(await scoreCommand('ID', { limit: 'many' }, context)).toBe(EXIT_CODES.CONFIG_ERROR);
    });

    it('should fail on an unknown partition', async () => {
      expect(await scoreCommand('ZZ', {}, context)).toBe(EXIT_CODES.ERRORS);
    });
  });

  describe('drift', () => {
    let goldPath: string;

    beforeEach(async () => {
      goldPath = join(dataDir, 'gold.json');
      await writeFile(
        goldPath,
        JSON.stringify([{ record_id: 'art-1', city: 'Boise', museum_name: 'Renamed Museum' }])
      );
    });

    it('should warn when drift exceeds the threshold', async () => {
      expect(await driftCommand({ gold: goldPath }, context)).toBe(EXIT_CODES.WARNINGS);
      expect(JSON.parse(printed[0] ?? 'null')).toMatchObject({
        total_fields_checked: 2,
        drifted_fields: 1,
        drift_rate: 0.5,
      });
    });

    it('should pass under a looser threshold', async () => {
      expect(await driftCommand({ gold: goldPath, threshold: '0.6' }, context)).toBe(
        EXIT_CODES.SUCCESS
      );
    });

    it('should require a gold set and a valid threshold', async () => {
      expect(await driftCommand({}, context)).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(await driftCommand({ gold: goldPath, threshold: '2' }, context)).toBe(
        EXIT_CODES.CONFIG_ERROR
      );
    });
  });

  describe('run', () => {
    async function configure(adapterModule: string): Promise<GlobalContext> {
      await writeFile(
        join(dataDir, '.curatorrc'),
        [
          'paths:',
          '  data_dir: .',
          '  runs_dir: ./runs',
          '  cache_db: ./cache/adapters.db',
          'adapters:',
          `  - module: ${JSON.stringify(adapterModule)}`,
          '    options:',
          '      notes: Fresh from the adapter',
          '',
        ].join('\n')
      );
      const config = await loadConfig({ cwd: dataDir, env: {}, overrides: { json: true } });
      return { ...context, config };
    }

    it('should apply candidates from a configured adapter module', async () => {
      const code = await runCommand({ partition: ['ID'] }, await configure(STATIC_ADAPTER));

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const data = await new FilePartitionStore(dataDir).load('ID');
      const art = data.records.find((record) => record.record_id === 'art-1');
      expect(art?.fields.notes).toBe('Fresh from the adapter');
      expect(data.provenance['art-1']?.notes?.source).toBe('static-notes');
    });

    it('should refuse to run when an adapter module cannot be loaded', async () => {
      const code = await runCommand({}, await configure(join(dataDir, 'missing-adapter.js')));

      expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    });
  });

  describe('curate', () => {
    const target = { partition: 'ID', recordId: 'art-1', field: 'notes', curator: 'alice' };

    it('should apply an override under manual provenance', async () => {
      const code = await manualCommand(
        { kind: 'override', value: 'Open late on Fridays', lock: false },
        target,
        context
      );

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const data = await new FilePartitionStore(dataDir).load('ID');
      expect(data.records[0]?.fields.notes).toBe('Open late on Fridays');
      expect(data.provenance['art-1']?.notes?.source).toBe('manual:alice');
    });

    it('should report an action that changed nothing', async () => {
      expect(await manualCommand({ kind: 'unlock' }, target, context)).toBe(EXIT_CODES.WARNINGS);
    });

    it('should fail on an unknown partition', async () => {
      expect(
        await manualCommand({ kind: 'lock' }, { ...target, partition: 'ZZ' }, context)
      ).toBe(EXIT_CODES.ERRORS);
    });
  });
});
