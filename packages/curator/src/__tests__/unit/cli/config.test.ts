/**
 * CLI Configuration Tests
 *
 * Precedence: flags > CURATOR_* environment > config file > defaults.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../../core/errors.js';
import { DEFAULT_BUDGET_USD } from '../../../orchestration/budget.js';
import {
  loadConfig,
  resolvePath,
  toRunParameters,
} from '../../../cli/lib/config.js';

const FILE_CONFIG = `
paths:
  data_dir: ./records
  gold_set: ./gold/expected.json
run:
  budget_usd: 3
  top_n: 25
`;

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'curator-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('should use defaults without a file or environment', async () => {
      const config = await loadConfig({ cwd: dir, env: {} });

      expect(config.run.budgetUsd).toBe(DEFAULT_BUDGET_USD);
      expect(config.paths.dataDir).toBe('./data');
      expect(config.dryRun).toBe(false);
      expect(config.adapters).toEqual([]);
    });
  });

  describe('config file', () => {
    it('should read a YAML .curatorrc found in the working directory', async () => {
      await writeFile(join(dir, '.curatorrc'), FILE_CONFIG);

      const config = await loadConfig({ cwd: dir, env: {} });

      expect(config.configPath).toBe(join(dir, '.curatorrc'));
      expect(config.paths.dataDir).toBe('./records');
      expect(config.run.budgetUsd).toBe(3);
      expect(config.run.topN).toBe(25);
    });

    it('should resolve configured paths against the config file directory', async () => {
      await writeFile(join(dir, '.curatorrc'), FILE_CONFIG);
      const config = await loadConfig({ cwd: dir, env: {} });

      expect(resolvePath(config, 'dataDir', '/elsewhere')).toBe(join(dir, 'records'));
      expect(toRunParameters(config, '/elsewhere').goldSetPath).toBe(
        join(dir, 'gold', 'expected.json')
      );
    });

    it('should read an explicit JSON config path', async () => {
      await writeFile(join(dir, 'curator.json'), JSON.stringify({ run: { top_n: 5 } }));

      const config = await loadConfig({ cwd: dir, env: {}, configPath: 'curator.json' });

      expect(config.run.topN).toBe(5);
    });

    it('should reject unknown keys', async () => {
      await writeFile(join(dir, '.curatorrc'), 'run:\n  budget: 3\n');

      await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigError);
    });

    it('should reject out-of-range values', async () => {
      await writeFile(join(dir, '.curatorrc'), 'run:\n  budget_usd: 0\n');

      await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(
        'Invalid configuration: budget_usd must be positive'
      );
    });

    it('should read adapter entries with their defaults', async () => {
      await writeFile(
        join(dir, '.curatorrc'),
        [
          'adapters:',
          '  - module: ./adapters/kb.js',
          '  - module: ./adapters/llm.js',
          '    name: llm-judge',
          '    expensive: true',
          '    ttl_days: 7',
          '    options:',
          '      model: test-model',
          '',
        ].join('\n')
      );

      const config = await loadConfig({ cwd: dir, env: {} });

      expect(config.adapters).toEqual([
        { module: './adapters/kb.js', name: null, expensive: false, ttlDays: null, options: {} },
        {
          module: './adapters/llm.js',
          name: 'llm-judge',
          expensive: true,
          ttlDays: 7,
          options: { model: 'test-model' },
        },
      ]);
    });

    it('should reject an adapter entry without a module', async () => {
      await writeFile(join(dir, '.curatorrc'), 'adapters:\n  - name: kb\n');

      await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigError);
    });

    it('should reject a missing explicit config file', async () => {
      await expect(
        loadConfig({ cwd: dir, env: {}, configPath: 'absent.yaml' })
      ).rejects.toThrow(`Config file not found: ${join(dir, 'absent.yaml')}`);
    });
  });

  describe('precedence', () => {
    it('should let the environment override the file', async () => {
      await writeFile(join(dir, '.curatorrc'), FILE_CONFIG);

      const config = await loadConfig({
        cwd: dir,
        env: { CURATOR_BUDGET_USD: '7', CURATOR_DRY_RUN: 'true', CURATOR_DATA_DIR: '/srv/records' },
      });

      expect(config.run.budgetUsd).toBe(7);
      expect(config.dryRun).toBe(true);
      expect(config.paths.dataDir).toBe('/srv/records');
    });

    it('should let flags override the environment', async () => {
      const config = await loadConfig({
        cwd: dir,
        env: { CURATOR_BUDGET_USD: '7' },
        overrides: { budgetUsd: 9, dryRun: false },
      });

      expect(config.run.budgetUsd).toBe(9);
    });

    it('should ignore blank environment values', async () => {
      const config = await loadConfig({ cwd: dir, env: { CURATOR_TOP_N: '  ' } });
      expect(config.run.topN).toBe(100);
    });

    it('should reject a non-numeric environment value', async () => {
      await expect(loadConfig({ cwd: dir, env: { CURATOR_TOP_N: 'lots' } })).rejects.toThrow(
        'CURATOR_TOP_N must be a number, got "lots"'
      );
    });
  });
});
