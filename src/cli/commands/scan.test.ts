import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { runScanCommand, formatScanResult } from './scan.js';

describe('scan command', () => {
  let testDir: string;
  let sourceDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    testDir = join(tmpdir(), `repoctx-scan-test-${randomUUID()}`);
    sourceDir = join(testDir, 'source');
    await mkdir(join(sourceDir, 'src', 'deep', 'er'), { recursive: true });
    originalEnv = { ...process.env };
    process.env['REPOCTX_HOME'] = join(testDir, 'home');

    await writeFile(join(sourceDir, 'main.go'), 'package main\n');
    await writeFile(join(sourceDir, 'src', 'lib.rs'), 'fn a() {}\n');
    await writeFile(join(sourceDir, 'src', 'deep', 'er', 'x.py'), 'x = 1\n');
    await writeFile(join(sourceDir, 'logo.png'), 'png');
    await writeFile(join(sourceDir, '.env'), 'TOKEN=test-secret');
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(testDir, { recursive: true, force: true });
  });

  it('should list files with language and size', async () => {
    const result = await runScanCommand(sourceDir);

    expect(result.files).toEqual([
      { path: 'main.go', language: 'go', sizeBytes: 13 },
      { path: 'src/deep/er/x.py', language: 'python', sizeBytes: 6 },
      { path: 'src/lib.rs', language: 'rust', sizeBytes: 10 },
    ]);
    expect(result.skipped).toEqual([{ path: 'logo.png', reason: 'binary' }]);
    expect(result.partial).toBe(false);
  });

  it('should honor a depth override', async () => {
    const result = await runScanCommand(sourceDir, { maxDepth: 1 });

    expect(result.files.map(f => f.path)).toEqual(['main.go', 'src/lib.rs']);
  });

  it('should use configured excludes', async () => {
    await mkdir(join(testDir, 'home'), { recursive: true });
    await writeFile(join(testDir, 'home', 'config.json'), JSON.stringify({ excludes: ['src'] }));

    const result = await runScanCommand(sourceDir);

    expect(result.files.map(f => f.path)).toEqual(['main.go']);
  });

  it('should format a listing with a summary', async () => {
    const output = formatScanResult(await runScanCommand(sourceDir, { maxDepth: 1 }));

    expect(output).toBe(
      [
        'main.go  (go, 13 bytes)',
        'src/lib.rs  (rust, 10 bytes)',
        'skipped logo.png  (binary)',
        '',
        `2 files in ${sourceDir}`,
      ].join('\n')
    );
  });
});
