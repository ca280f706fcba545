#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { createLogger, type Logger } from '../core/logger.js';
import { runConfigCommand } from './commands/config.js';
import { runContextCommand, renderContext, parseContextFormat } from './commands/context.js';
import { runScanCommand, formatScanResult } from './commands/scan.js';
import { runDepsCommand, formatDepsResult } from './commands/deps.js';
import { runKeywordsCommand, formatKeywords } from './commands/keywords.js';
import { runCacheCommand, formatCacheResult } from './commands/cache.js';
import { formatAsJson, toError } from './commands/json-formatter.js';
import { createSpinner } from './utils/progress.js';

const program = new Command();

program
  .name('repoctx')
  .description('Pick the files of a repository that matter for a task, within a token budget')
  .version('0.1.0');

/**
 * Parse a numeric option, rejecting anything that is not a whole number.
 */
function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Invalid number: ${value}`);
  }
  return parsed;
}

function reportError(err: unknown, json: boolean | undefined): never {
  const error = toError(err);
  if (json) {
    console.log(formatAsJson('error', error));
  } else {
    console.error(`Error: ${error.message}`);
  }
  process.exit(1);
}

program
  .command('context <task>')
  .description('Build a budgeted context bundle for a task (for LLM consumption)')
  .option('-p, --path <dir>', 'Repository root (default: current directory)')
  .option('--max-tokens <n>', 'Token budget', parseInteger)
  .option('--max-files <n>', 'Max files to include', parseInteger)
  .option('--max-chars <n>', 'Max characters per file', parseInteger)
  .option('--max-depth <n>', 'Max directory depth to scan', parseInteger)
  .option('--timeout <ms>', 'Wall-clock limit in milliseconds', parseInteger)
  .option('--tree-version <id>', 'Version of the tree (e.g. a commit id) used for caching')
  .option('--hops <n>', 'Import-graph hops relevance spreads across', parseInteger)
  .option('--no-cache', 'Do not read or write the context cache')
  .option('--format <type>', 'Output format (json|markdown|prompt)', 'json')
  .option('-j, --json', 'JSON output (same as --format json)')
  .option('-v, --verbose', 'Log pipeline stages to stderr')
  .action(async (task: string, options: {
    path?: string;
    maxTokens?: number;
    maxFiles?: number;
    maxChars?: number;
    maxDepth?: number;
    timeout?: number;
    treeVersion?: string;
    hops?: number;
    cache: boolean;
    format?: string;
    json?: boolean;
    verbose?: boolean;
  }) => {
    let logger: Logger | undefined;
    try {
      const format = options.json ? 'json' : parseContextFormat(options.format);
      logger = createLogger({ verbose: options.verbose });
      const spinner = format === 'json' ? null : createSpinner('Building context...');
      spinner?.start();

      const result = await runContextCommand(task, {
        path: options.path,
        maxTokens: options.maxTokens,
        maxFiles: options.maxFiles,
        maxChars: options.maxChars,
        maxDepth: options.maxDepth,
        timeoutMs: options.timeout,
        treeVersion: options.treeVersion,
        hops: options.hops,
        noCache: !options.cache,
        logger,
      });

      const { bundle } = result;
      spinner?.succeed(
        `Selected ${bundle.files.length} of ${bundle.filesDiscoveredCount} files (~${bundle.totalTokensEstimated} tokens)${result.cached ? ' from cache' : ''}`
      );
      console.log(renderContext(bundle, format, task));
    } catch (err) {
      reportError(err, options.json);
    } finally {
      logger?.close();
    }
  });

program
  .command('scan [path]')
  .description('List the files a context request would consider')
  .option('--max-depth <n>', 'Max directory depth to scan', parseInteger)
  .option('-j, --json', 'Output as JSON')
  .action(async (path: string | undefined, options: { maxDepth?: number; json?: boolean }) => {
    try {
      const result = await runScanCommand(path, { maxDepth: options.maxDepth });
      console.log(options.json ? formatAsJson('scan', result) : formatScanResult(result));
    } catch (err) {
      reportError(err, options.json);
    }
  });

program
  .command('deps [path]')
  .description('Show the import graph between files')
  .option('--file <path>', 'Show imports and importers of one file')
  .option('-j, --json', 'Output as JSON')
  .action(async (path: string | undefined, options: { file?: string; json?: boolean }) => {
    try {
      const result = await runDepsCommand(path, { file: options.file, json: options.json });
      console.log(options.json ? formatAsJson('deps', result) : formatDepsResult(result));
    } catch (err) {
      reportError(err, options.json);
    }
  });

program
  .command('keywords <prompt>')
  .description('Show the weighted keywords extracted from a prompt')
  .option('-j, --json', 'Output as JSON')
  .action((prompt: string, options: { json?: boolean }) => {
    try {
      const result = runKeywordsCommand(prompt);
      console.log(options.json ? formatAsJson('keywords', result) : formatKeywords(result));
    } catch (err) {
      reportError(err, options.json);
    }
  });

program
  .command('config [key] [value]')
  .description('Get or set configuration values')
  .option('-j, --json', 'Output as JSON')
  .action(async (key: string | undefined, value: string | undefined, options: { json?: boolean }) => {
    try {
      const output = await runConfigCommand(key, value, options.json);
      console.log(output);
    } catch (err) {
      reportError(err, options.json);
    }
  });

program
  .command('cache <action>')
  .description('Manage the persisted context cache (clear|stats)')
  .option('-j, --json', 'Output as JSON')
  .action(async (action: string, options: { json?: boolean }) => {
    try {
      const result = await runCacheCommand(action);
      console.log(options.json ? formatAsJson('cache', result) : formatCacheResult(result));
    } catch (err) {
      reportError(err, options.json);
    }
  });

await program.parseAsync();
