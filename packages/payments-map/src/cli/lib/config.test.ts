/**
 * Configuration Loading Tests
 *
 * Every test passes an explicit env and cwd so the host environment and any
 * config file above the temp directory cannot leak in.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FILTERED_TITLE, UNFILTERED_TITLE, loadConfig } from './config.js';
import { ConfigError } from '../../core/errors.js';

describe('loadConfig()', () => {
  let root: string;
  let cwd: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'payments-map-config-'));
    cwd = join(root, 'project');
    mkdirSync(cwd);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('defaults', () => {
    it('should resolve the default paths against the working directory', async () => {
      const config = await loadConfig({ cwd, env: {} });

      expect(config.input).toBe(join(cwd, 'dpi-payments.csv'));
      expect(config.output).toBe(join(cwd, 'index.html'));
    });

    it('should filter to active implemented systems', async () => {
      const config = await loadConfig({ cwd, env: {} });

      expect(config.filterToActiveImplemented).toBe(true);
      expect(config.map.title).toBe(FILTERED_TITLE);
    });

    it('should default runtime flags off with no config file', async () => {
      const config = await loadConfig({ cwd, env: {} });

      expect(config.verbose).toBe(false);
      expect(config.json).toBe(false);
      expect(config.configPath).toBeNull();
    });
  });

  describe('CLI overrides', () => {
    it('should resolve relative paths against the working directory', async () => {
      const config = await loadConfig({
        cwd,
        env: {},
        overrides: { input: 'data/in.csv', output: '/srv/www/map.html' },
      });

      expect(config.input).toBe(join(cwd, 'data', 'in.csv'));
      expect(config.output).toBe('/srv/www/map.html');
    });

    it('should switch to the unfiltered title with --all-systems', async () => {
      const config = await loadConfig({ cwd, env: {}, overrides: { allSystems: true } });

      expect(config.filterToActiveImplemented).toBe(false);
      expect(config.map.title).toBe(UNFILTERED_TITLE);
    });
  });

  describe('environment', () => {
    it('should read PAYMENTS_MAP_* variables', async () => {
      const config = await loadConfig({
        cwd,
        env: {
          PAYMENTS_MAP_INPUT: 'env.csv',
          PAYMENTS_MAP_ALL_SYSTEMS: 'true',
          PAYMENTS_MAP_VERBOSE: '1',
          PAYMENTS_MAP_JSON: 'TRUE',
        },
      });

      expect(config.input).toBe(join(cwd, 'env.csv'));
      expect(config.filterToActiveImplemented).toBe(false);
      expect(config.verbose).toBe(true);
      expect(config.json).toBe(true);
    });

    it('should ignore empty variables', async () => {
      const config = await loadConfig({ cwd, env: { PAYMENTS_MAP_INPUT: '' } });

      expect(config.input).toBe(join(cwd, 'dpi-payments.csv'));
    });

    it('should treat other values as false', async () => {
      const config = await loadConfig({ cwd, env: { PAYMENTS_MAP_ALL_SYSTEMS: 'yes' } });

      expect(config.filterToActiveImplemented).toBe(true);
    });

    it('should lose to CLI overrides', async () => {
      const config = await loadConfig({
        cwd,
        env: { PAYMENTS_MAP_OUTPUT: 'env.html', PAYMENTS_MAP_ALL_SYSTEMS: 'true' },
        overrides: { output: 'cli.html', allSystems: false },
      });

      expect(config.output).toBe(join(cwd, 'cli.html'));
      expect(config.filterToActiveImplemented).toBe(true);
    });
  });

  describe('config files', () => {
    it('should find a YAML file in a parent directory', async () => {
      const file = join(root, '.payments-maprc');
      writeFileSync(
        file,
        [
          'version: 1',
          'input: data/payments.csv',
          'filter:',
          '  active_implemented_only: false',
          'map:',
          '  title: Payment Rails',
        ].join('\n')
      );

      const config = await loadConfig({ cwd, env: {} });

      expect(config.configPath).toBe(file);
      expect(config.input).toBe(join(root, 'data', 'payments.csv'));
      expect(config.output).toBe(join(cwd, 'index.html'));
      expect(config.filterToActiveImplemented).toBe(false);
      expect(config.map).toEqual({
        title: 'Payment Rails',
        caption: 'Click markers for details. Switch layers to explore different attributes.',
      });
    });

    it('should read JSON files', async () => {
      writeFileSync(join(cwd, '.payments-maprc.json'), JSON.stringify({ output: 'out/map.html' }));

      const config = await loadConfig({ cwd, env: {} });

      expect(config.output).toBe(join(cwd, 'out', 'map.html'));
    });

    it('should lose to environment variables', async () => {
      writeFileSync(join(cwd, '.payments-maprc'), 'input: file.csv\n');

      const config = await loadConfig({ cwd, env: { PAYMENTS_MAP_INPUT: 'env.csv' } });

      expect(config.input).toBe(join(cwd, 'env.csv'));
    });

    it('should accept an empty file', async () => {
      writeFileSync(join(cwd, '.payments-maprc.yml'), '');

      const config = await loadConfig({ cwd, env: {} });

      expect(config.configPath).toBe(join(cwd, '.payments-maprc.yml'));
      expect(config.input).toBe(join(cwd, 'dpi-payments.csv'));
    });

    it('should load an explicit path', async () => {
      const file = join(root, 'custom.yaml');
      writeFileSync(file, 'output: site/index.html\n');

      const config = await loadConfig({ cwd, env: {}, configPath: '../custom.yaml' });

      expect(config.configPath).toBe(file);
      expect(config.output).toBe(join(root, 'site', 'index.html'));
    });

    it('should load the path named by PAYMENTS_MAP_CONFIG', async () => {
      writeFileSync(join(cwd, 'env-config.yaml'), 'input: from-env-config.csv\n');

      const config = await loadConfig({ cwd, env: { PAYMENTS_MAP_CONFIG: 'env-config.yaml' } });

      expect(config.input).toBe(join(cwd, 'from-env-config.csv'));
    });
  });

  describe('errors', () => {
    it('should reject a missing explicit config file', async () => {
      await expect(loadConfig({ cwd, env: {}, configPath: 'missing.yaml' })).rejects.toThrow(
        `Config file not found: ${join(cwd, 'missing.yaml')}`
      );
    });

    it('should report invalid settings as ConfigError issues', async () => {
      const file = join(cwd, '.payments-maprc');
      writeFileSync(file, 'version: 2\nfilter:\n  active_implemented_only: maybe\n');

      const error = await loadConfig({ cwd, env: {} }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.configPath).toBe(file);
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^version: /);
      expect(error.issues[1]).toMatch(/^filter\.active_implemented_only: /);
    });

    it('should reject unknown keys', async () => {
      writeFileSync(join(cwd, '.payments-maprc'), 'colour: red\n');

      await expect(loadConfig({ cwd, env: {} })).rejects.toThrow(ConfigError);
    });

    it('should reject a file that is not a mapping', async () => {
      writeFileSync(join(cwd, '.payments-maprc'), '- input.csv\n');

      const error = await loadConfig({ cwd, env: {} }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues[0]).toMatch(/^\(root\): /);
    });

    it('should report YAML syntax errors', async () => {
      writeFileSync(join(cwd, '.payments-maprc'), 'input: [unclosed\n');

      await expect(loadConfig({ cwd, env: {} })).rejects.toThrow(/^Cannot parse config file: /);
    });
  });
});

describe('ConfigError', () => {
  it('should list issues under the message', () => {
    const error = new ConfigError('Invalid config file: /tmp/rc', '/tmp/rc', [
      'version: Invalid literal value, expected 1',
      'input: Expected string, received number',
    ]);

    expect(error.getSummary()).toBe(
      'Invalid config file: /tmp/rc\n' +
        '  - version: Invalid literal value, expected 1\n' +
        '  - input: Expected string, received number'
    );
    expect(error.name).toBe('ConfigError');
  });
});
