import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { runConfigCommand } from './config.js';

describe('config command', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    testDir = join(tmpdir(), `repoctx-config-cmd-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });

    originalEnv = { ...process.env };
    process.env['REPOCTX_HOME'] = testDir;
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(testDir, { recursive: true, force: true });
  });

  describe('show all config', () => {
    it('should show default config when no config file exists', async () => {
      const output = await runConfigCommand();

      expect(output.split('\n')).toContain('maxTokens: 15000');
      expect(output.split('\n')).toContain('maxFiles: 20');
    });

    it('should show saved config values', async () => {
      await writeFile(join(testDir, 'config.json'), JSON.stringify({ maxTokens: 4000 }));

      const output = await runConfigCommand();

      expect(output.split('\n')).toContain('maxTokens: 4000');
    });

    it('should output JSON when requested', async () => {
      const output = await runConfigCommand(undefined, undefined, true);
      const parsed: unknown = JSON.parse(output);

      expect(parsed).toMatchObject({ command: 'config', data: { maxTokens: 15000, maxDepth: 3 } });
    });
  });

  describe('get config value', () => {
    it('should get a numeric value', async () => {
      expect(await runConfigCommand('maxDepth')).toBe('3');
    });

    it('should get a list value comma separated', async () => {
      await writeFile(join(testDir, 'config.json'), JSON.stringify({ excludes: ['vendor', 'tmp'] }));

      expect(await runConfigCommand('excludes')).toBe('vendor, tmp');
    });

    it('should get a single value as JSON', async () => {
      const output = await runConfigCommand('maxFiles', undefined, true);

      expect(JSON.parse(output)).toEqual({ command: 'config', data: { maxFiles: 20 } });
    });

    it('should reject unknown keys', async () => {
      await expect(runConfigCommand('model')).rejects.toThrow('Unknown config key: model');
    });
  });

  describe('set config value', () => {
    it('should set and persist a numeric value', async () => {
      const output = await runConfigCommand('maxTokens', '8000');

      expect(output).toBe('Set maxTokens = 8000');
      const saved: unknown = JSON.parse(await readFile(join(testDir, 'config.json'), 'utf-8'));
      expect(saved).toMatchObject({ maxTokens: 8000 });
    });

    it('should split list values on commas', async () => {
      const output = await runConfigCommand('excludes', 'vendor, build ,,tmp');

      expect(output).toBe('Set excludes = vendor, build, tmp');
      expect(await runConfigCommand('excludes')).toBe('vendor, build, tmp');
    });

    it('should accept zero for propagation hops', async () => {
      expect(await runConfigCommand('propagationHops', '0')).toBe('Set propagationHops = 0');
    });

    it('should reject invalid numbers', async () => {
      await expect(runConfigCommand('maxTokens', 'lots')).rejects.toThrow('Invalid numeric value for maxTokens: lots');
      await expect(runConfigCommand('maxFiles', '0')).rejects.toThrow('Invalid numeric value for maxFiles: 0');
      await expect(runConfigCommand('maxDepth', '2.5')).rejects.toThrow('Invalid numeric value for maxDepth: 2.5');
    });
  });
});
