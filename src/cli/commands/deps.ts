import { resolve } from 'node:path';
import { createDeadline } from '../../core/concurrency.js';
import { buildDependencyGraph } from '../../core/deps/dependency-graph.js';
import { normalizeRelative } from '../../core/deps/file-index.js';
import { loadContents, scanTree } from '../../core/walker.js';
import { loadConfig } from '../../storage/config.js';
import { createSpinner } from '../utils/progress.js';

/**
 * Options for the deps command.
 */
export interface DepsOptions {
  /** Report only this file's imports and importers (root-relative) */
  file?: string;
  showProgress?: boolean;
  json?: boolean;
}

export interface FileDependencies {
  path: string;
  imports: string[];
  importedBy: string[];
}

/**
 * Result of the deps command.
 */
export interface DepsCommandResult {
  root: string;
  fileCount: number;
  edgeCount: number;
  /** Importing file to imported files */
  edges: Record<string, string[]>;
  file?: FileDependencies;
  partial: boolean;
}

/**
 * Run the deps command: build the import graph of a tree.
 */
export async function runDepsCommand(path: string | undefined, options: DepsOptions = {}): Promise<DepsCommandResult> {
  const showProgress = options.showProgress ?? true;
  const spinner = showProgress && !options.json ? createSpinner('Scanning files...') : null;

  try {
    spinner?.start();
    const config = await loadConfig();
    const root = resolve(path ?? process.cwd());
    const deadline = createDeadline(config.timeoutMs);

    const scan = await scanTree(root, {
      maxDepth: config.maxDepth,
      maxFileSize: config.maxFileSize,
      excludes: [...config.excludes, ...config.secretExcludes],
      noDefaultExcludes: true,
      concurrency: config.concurrency,
      deadline,
    });

    spinner?.update(`Reading ${scan.records.length} files...`);
    const load = await loadContents(scan.records, { concurrency: config.concurrency, deadline });
    const { graph, partial } = buildDependencyGraph(load.loaded, { deadline });

    let file: FileDependencies | undefined;
    if (options.file !== undefined) {
      const target = normalizeRelative(options.file.replace(/\\/g, '/'));
      if (target === undefined || !scan.records.some(r => r.path === target)) {
        throw new Error(`File not found in scan: ${options.file}`);
      }
      file = { path: target, imports: graph.dependenciesOf(target), importedBy: graph.dependentsOf(target) };
    }

    spinner?.succeed(`Found ${graph.edgeCount} import edges`);
    return {
      root,
      fileCount: scan.records.length,
      edgeCount: graph.edgeCount,
      edges: graph.toJSON(),
      file,
      partial: scan.partial || load.partial || partial,
    };
  } catch (err) {
    spinner?.fail('Dependency mapping failed');
    throw err;
  }
}

/**
 * Human-readable form of a deps result.
 */
export function formatDepsResult(result: DepsCommandResult): string {
  if (result.file) {
    const { path, imports, importedBy } = result.file;
    const lines = [`${path}`, '', 'Imports:'];
    lines.push(...(imports.length > 0 ? imports.map(p => `  ${p}`) : ['  (none)']));
    lines.push('', 'Imported by:');
    lines.push(...(importedBy.length > 0 ? importedBy.map(p => `  ${p}`) : ['  (none)']));
    return lines.join('\n');
  }

  const lines: string[] = [];
  for (const [from, targets] of Object.entries(result.edges)) {
    lines.push(from);
    for (const to of targets) {
      lines.push(`  -> ${to}`);
    }
  }
  lines.push('');
  lines.push(`${result.edgeCount} edge${result.edgeCount === 1 ? '' : 's'} across ${result.fileCount} files${result.partial ? ' (partial)' : ''}`);
  return lines.join('\n');
}
