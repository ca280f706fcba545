import { resolve } from 'node:path';
import { createDeadline } from '../../core/concurrency.js';
import { scanTree } from '../../core/walker.js';
import { loadConfig } from '../../storage/config.js';
import type { Language } from '../../core/languages.js';
import type { SkippedFile } from '../../types/context.js';

export interface ScanCommandOptions {
  maxDepth?: number;
}

export interface ScannedFile {
  path: string;
  language: Language;
  sizeBytes: number;
}

export interface ScanCommandResult {
  root: string;
  files: ScannedFile[];
  skipped: SkippedFile[];
  partial: boolean;
}

/**
 * List the files a context request would consider, honoring configured excludes.
 */
export async function runScanCommand(path: string | undefined, options: ScanCommandOptions = {}): Promise<ScanCommandResult> {
  const config = await loadConfig();
  const root = resolve(path ?? process.cwd());

  const result = await scanTree(root, {
    maxDepth: options.maxDepth ?? config.maxDepth,
    maxFileSize: config.maxFileSize,
    excludes: [...config.excludes, ...config.secretExcludes],
    noDefaultExcludes: true,
    concurrency: config.concurrency,
    deadline: createDeadline(config.timeoutMs),
  });

  return {
    root,
    files: result.records.map(r => ({ path: r.path, language: r.language, sizeBytes: r.sizeBytes })),
    skipped: result.skipped,
    partial: result.partial,
  };
}

/**
 * Human-readable listing of a scan.
 */
export function formatScanResult(result: ScanCommandResult): string {
  const lines = result.files.map(f => `${f.path}  (${f.language}, ${f.sizeBytes} bytes)`);
  for (const skipped of result.skipped) {
    lines.push(`skipped ${skipped.path}  (${skipped.reason})`);
  }
  lines.push('');
  lines.push(`${result.files.length} file${result.files.length === 1 ? '' : 's'} in ${result.root}${result.partial ? ' (partial)' : ''}`);
  return lines.join('\n');
}
