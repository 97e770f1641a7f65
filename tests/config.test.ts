/**
 * Tests for configuration loading.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { getDefaultConfig, loadConfig, loadConfigFile, mergeConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crate-bridge-config-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(content: unknown): Promise<string> {
    const configPath = path.join(tempDir, 'config.json');
    await fs.promises.writeFile(
      configPath,
      typeof content === 'string' ? content : JSON.stringify(content)
    );
    return configPath;
  }

  describe('getDefaultConfig', () => {
    it('points at the Serato folder in the home directory', () => {
      const config = getDefaultConfig();

      expect(config.crateRoot).toBe(path.join(os.homedir(), 'Music', '_Serato_', 'Subcrates'));
      expect(config.output).toBe(path.join(os.homedir(), 'Music', '_Serato_', 'rekordbox-export.xml'));
      expect(config.intervalSeconds).toBe(30);
      expect(config.logging.level).toBe('info');
    });
  });

  describe('loadConfig', () => {
    it('returns the defaults without a file or overrides', async () => {
      expect(await loadConfig()).toEqual(getDefaultConfig());
    });

    it('applies the file over the defaults and overrides over the file', async () => {
      const configPath = await writeConfig({
        crateRoot: '/from/file',
        output: '/from/file.xml',
        intervalSeconds: 5,
        logging: { level: 'warn' },
      });

      const config = await loadConfig(configPath, { output: '/from/cli.xml', productName: undefined });

      expect(config).toEqual({
        ...getDefaultConfig(),
        crateRoot: '/from/file',
        output: '/from/cli.xml',
        intervalSeconds: 5,
        logging: { level: 'warn' },
      });
    });
  });

  describe('loadConfigFile', () => {
    it('rejects a missing file', async () => {
      const missing = path.join(tempDir, 'missing.json');

      await expect(loadConfigFile(missing)).rejects.toThrow(
        `Invalid config ${missing}: file could not be read`
      );
    });

    it('rejects invalid JSON', async () => {
      const configPath = await writeConfig('{ not json');

      await expect(loadConfigFile(configPath)).rejects.toBeInstanceOf(ConfigError);
    });

    it('names the fields that fail validation', async () => {
      const configPath = await writeConfig({ intervalSeconds: -1, logging: { level: 'loud' } });

      const error = await loadConfigFile(configPath).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof Error ? error.message : '').toMatch(
        /^Invalid config .*config\.json: intervalSeconds: .+; logging\.level: .+$/
      );
    });
  });

  describe('mergeConfig', () => {
    it('keeps base values for missing overrides', () => {
      const base = getDefaultConfig();

      expect(mergeConfig(base, { logging: {} })).toEqual(base);
    });
  });
});
