import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  loadConfig,
  saveConfig,
  getConfigValue,
  setConfigValue,
  parseConfig,
  withConfigValue,
  isConfigKey,
  isNumericKey,
  DEFAULT_CONFIG,
  type RepoctxConfig,
} from './config.js';

describe('config management', () => {
  let testDir: string;

  beforeEach(async () => {
    // Create a unique temp directory for each test
    testDir = join(tmpdir(), `repoctx-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    process.env['REPOCTX_HOME'] = testDir;
  });

  afterEach(async () => {
    delete process.env['REPOCTX_HOME'];
    await rm(testDir, { recursive: true, force: true });
  });

  describe('DEFAULT_CONFIG', () => {
    it('should have the documented budget defaults', () => {
      expect(DEFAULT_CONFIG.maxTokens).toBe(15000);
      expect(DEFAULT_CONFIG.maxFiles).toBe(20);
      expect(DEFAULT_CONFIG.maxCharsPerFile).toBe(10000);
      expect(DEFAULT_CONFIG.maxDepth).toBe(3);
    });

    it('should have a 1MB max file size', () => {
      expect(DEFAULT_CONFIG.maxFileSize).toBe(1024 * 1024);
    });

    it('should have cache and timeout defaults', () => {
      expect(DEFAULT_CONFIG.cacheCapacity).toBe(10);
      expect(DEFAULT_CONFIG.cacheTtlMs).toBe(300000);
      expect(DEFAULT_CONFIG.timeoutMs).toBe(30000);
      expect(DEFAULT_CONFIG.propagationHops).toBe(1);
      expect(DEFAULT_CONFIG.configExcerptChars).toBe(1500);
    });

    it('should have default excludes', () => {
      expect(DEFAULT_CONFIG.excludes).toContain('.git');
      expect(DEFAULT_CONFIG.excludes).toContain('node_modules');
      expect(DEFAULT_CONFIG.secretExcludes).toContain('.env*');
    });
  });

  describe('key helpers', () => {
    it('should recognize config keys', () => {
      expect(isConfigKey('maxTokens')).toBe(true);
      expect(isConfigKey('model')).toBe(false);
      expect(isConfigKey('toString')).toBe(false);
    });

    it('should tell numeric keys from list keys', () => {
      expect(isNumericKey('maxFiles')).toBe(true);
      expect(isNumericKey('excludes')).toBe(false);
    });
  });

  describe('withConfigValue', () => {
    it('should allow zero only where it means something', () => {
      expect(withConfigValue(DEFAULT_CONFIG, 'propagationHops', 0)?.propagationHops).toBe(0);
      expect(withConfigValue(DEFAULT_CONFIG, 'maxTokens', 0)).toBeUndefined();
      expect(withConfigValue(DEFAULT_CONFIG, 'maxTokens', 1.5)).toBeUndefined();
      expect(withConfigValue(DEFAULT_CONFIG, 'maxTokens', '100')).toBeUndefined();
      expect(withConfigValue(DEFAULT_CONFIG, 'maxTokens', -1)).toBeUndefined();
      expect(withConfigValue(DEFAULT_CONFIG, 'maxTokens', Number.NaN)).toBeUndefined();
    });

    it('should leave the original config untouched', () => {
      const updated = withConfigValue(DEFAULT_CONFIG, 'maxFiles', 3);

      expect(updated?.maxFiles).toBe(3);
      expect(DEFAULT_CONFIG.maxFiles).toBe(20);
    });
  });

  describe('parseConfig', () => {
    it('should keep defaults for missing or malformed values', () => {
      const config = parseConfig({ maxTokens: 500, maxFiles: 'many', excludes: ['a', 1], unknownKey: true });

      expect(config.maxTokens).toBe(500);
      expect(config.maxFiles).toBe(DEFAULT_CONFIG.maxFiles);
      expect(config.excludes).toEqual(DEFAULT_CONFIG.excludes);
      expect(config).not.toHaveProperty('unknownKey');
    });

    it('should fall back to defaults for anything but an object', () => {
      expect(parseConfig(undefined)).toEqual(DEFAULT_CONFIG);
      expect(parseConfig([1, 2])).toEqual(DEFAULT_CONFIG);
      expect(parseConfig('maxTokens')).toEqual(DEFAULT_CONFIG);
    });

    it('should not share list instances with the defaults', () => {
      const config = parseConfig({});
      config.excludes.push('extra');

      expect(DEFAULT_CONFIG.excludes).not.toContain('extra');
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config file exists', async () => {
      expect(await loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge saved config with defaults', async () => {
      await writeFile(join(testDir, 'config.json'), JSON.stringify({ maxTokens: 8000 }));

      const config = await loadConfig();

      expect(config.maxTokens).toBe(8000);
      expect(config.maxFiles).toBe(DEFAULT_CONFIG.maxFiles);
    });

    it('should fall back to defaults for a corrupt file', async () => {
      await writeFile(join(testDir, 'config.json'), '{ broken');

      expect(await loadConfig()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('saveConfig', () => {
    it('should create the home directory and write pretty JSON', async () => {
      const nested = join(testDir, 'nested');
      process.env['REPOCTX_HOME'] = nested;
      const config: RepoctxConfig = { ...DEFAULT_CONFIG, maxFiles: 7 };

      await saveConfig(config);
      const raw = await readFile(join(nested, 'config.json'), 'utf-8');

      expect(JSON.parse(raw)).toEqual(config);
      expect(raw).toContain('\n  "maxFiles": 7');
    });
  });

  describe('getConfigValue / setConfigValue', () => {
    it('should read a single value', async () => {
      expect(await getConfigValue('maxDepth')).toBe(3);
    });

    it('should persist a single value', async () => {
      await setConfigValue('timeoutMs', 5000);
      await setConfigValue('excludes', ['vendor']);

      expect(await getConfigValue('timeoutMs')).toBe(5000);
      expect(await getConfigValue('excludes')).toEqual(['vendor']);
    });
  });
});
