import { open, readdir, readFile, realpath, stat } from 'node:fs/promises';
import { existsSync, type Dirent } from 'node:fs';
import { extname, join, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { loadStringList } from './data.js';
import { ScanError, isNodeError } from './errors.js';
import { languageForExtension } from './languages.js';
import { NO_DEADLINE, runPool, type Deadline } from './concurrency.js';
import type { FileRecord, SkippedFile } from '../types/context.js';

/**
 * Options for scanning a working tree.
 */
export interface ScanOptions {
  /** Directories deeper than this many path segments are not descended into */
  maxDepth?: number;
  /** Maximum file size in bytes */
  maxFileSize?: number;
  /** Extra patterns to exclude (names, globs, or root-relative paths) */
  excludes?: string[];
  /** Replace the default exclude list instead of extending it */
  noDefaultExcludes?: boolean;
  /** Whether to include hidden files (default: false) */
  includeHidden?: boolean;
  /** Whether to respect .gitignore and .repoctxignore (default: true) */
  respectIgnoreFiles?: boolean;
  /** Files probed in parallel (default: 16) */
  concurrency?: number;
  deadline?: Deadline;
}

/**
 * Result of a tree scan.
 */
export interface ScanResult {
  /** Accepted files in ascending path order */
  records: FileRecord[];
  skipped: SkippedFile[];
  /** The deadline or a read failure cut the scan short */
  partial: boolean;
}

/**
 * Default directories and file patterns to exclude: version control,
 * dependency and vendor directories, build outputs, caches and lock files.
 */
export const DEFAULT_EXCLUDES: readonly string[] = loadStringList('default-excludes');

/**
 * Default patterns for secret/sensitive files to exclude.
 */
export const DEFAULT_SECRET_EXCLUDES: readonly string[] = loadStringList('secret-excludes');

const BINARY_EXTENSIONS = new Set(loadStringList('binary-extensions'));

export const DEFAULT_SCAN_CONCURRENCY = 16;
export const DEFAULT_MAX_DEPTH = 3;
export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

/** Bytes inspected when sniffing for binary content */
const SNIFF_BYTES = 8192;

/**
 * Check if a file is likely binary based on extension.
 */
export function isBinaryFile(filename: string): boolean {
  const ext = extname(filename).toLowerCase();
  return BINARY_EXTENSIONS.has(ext);
}

/**
 * Check whether a buffer looks binary (contains a NUL byte).
 */
export function looksBinary(buffer: Uint8Array): boolean {
  return buffer.includes(0);
}

/**
 * Check if a path should be excluded based on patterns.
 * Patterns containing a slash match the root-relative path; others match the entry name.
 */
export function shouldExclude(name: string, excludes: readonly string[], relativePath: string = name): boolean {
  for (const pattern of excludes) {
    const subject = pattern.includes('/') ? relativePath : name;
    const trimmed = pattern.replace(/\/+$/, '');

    // Exact match
    if (subject === trimmed) {
      return true;
    }

    // Glob pattern matching
    if (trimmed.includes('*') && globToRegex(trimmed).test(subject)) {
      return true;
    }
  }

  return false;
}

/**
 * Convert a simple glob pattern to a regex.
 */
function globToRegex(pattern: string): RegExp {
  // Escape special regex characters except *
  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');

  // Anchor the pattern
  return new RegExp(`^${regexStr}$`);
}

/**
 * Number of segments in a POSIX relative path.
 */
export function pathDepth(relativePath: string): number {
  return relativePath.split('/').filter(Boolean).length;
}

/**
 * Read and parse an ignore file (.gitignore or .repoctxignore).
 */
async function readIgnoreFile(filePath: string): Promise<string[]> {
  if (!existsSync(filePath)) {
    return [];
  }
  try {
    const content = await readFile(filePath, 'utf-8');
    return content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line && !line.startsWith('#'));
  } catch {
    // An unreadable ignore file means nothing extra is ignored
    return [];
  }
}

/**
 * Create an ignore instance from .gitignore and .repoctxignore at the root.
 */
async function createIgnoreFilter(rootPath: string, enabled: boolean): Promise<Ignore> {
  const ig = ignore();
  if (!enabled) {
    return ig;
  }

  for (const name of ['.gitignore', '.repoctxignore']) {
    const patterns = await readIgnoreFile(join(rootPath, name));
    if (patterns.length > 0) {
      ig.add(patterns);
    }
  }

  return ig;
}

function isInside(realTarget: string, realRoot: string): boolean {
  return realTarget === realRoot || realTarget.startsWith(realRoot.endsWith(sep) ? realRoot : realRoot + sep);
}

async function resolveRoot(rootPath: string): Promise<string> {
  try {
    const stats = await stat(rootPath);
    if (!stats.isDirectory()) {
      throw new ScanError('ROOT_NOT_DIRECTORY', rootPath);
    }
    return await realpath(rootPath);
  } catch (error) {
    if (error instanceof ScanError) {
      throw error;
    }
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      throw new ScanError('ROOT_NOT_FOUND', rootPath, { cause: error });
    }
    throw new ScanError('ROOT_UNREADABLE', rootPath, { cause: error });
  }
}

interface Candidate {
  absolutePath: string;
  relativePath: string;
}

type ProbeOutcome =
  | { kind: 'record'; record: FileRecord }
  | { kind: 'skipped'; skipped: SkippedFile; failed: boolean };

async function probeFile(candidate: Candidate, maxFileSize: number): Promise<ProbeOutcome> {
  const { absolutePath, relativePath } = candidate;
  try {
    const stats = await stat(absolutePath);
    if (stats.size > maxFileSize) {
      return { kind: 'skipped', skipped: { path: relativePath, reason: 'too-large' }, failed: false };
    }

    const handle = await open(absolutePath, 'r');
    try {
      const buffer = Buffer.alloc(Math.min(SNIFF_BYTES, stats.size));
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
      if (looksBinary(buffer.subarray(0, bytesRead))) {
        return { kind: 'skipped', skipped: { path: relativePath, reason: 'binary' }, failed: false };
      }
    } finally {
      await handle.close();
    }

    return {
      kind: 'record',
      record: {
        path: relativePath,
        absolutePath,
        language: languageForExtension(extname(relativePath)),
        sizeBytes: stats.size,
        depth: pathDepth(relativePath),
        modifiedAt: stats.mtimeMs,
      },
    };
  } catch {
    return { kind: 'skipped', skipped: { path: relativePath, reason: 'unreadable' }, failed: true };
  }
}

/**
 * Walk a working tree and return file records in lexical path order.
 * Throws ScanError only when the root itself cannot be read.
 */
export async function scanTree(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const {
    maxDepth = DEFAULT_MAX_DEPTH,
    maxFileSize = DEFAULT_MAX_FILE_SIZE,
    excludes = [],
    noDefaultExcludes = false,
    includeHidden = false,
    respectIgnoreFiles = true,
    concurrency = DEFAULT_SCAN_CONCURRENCY,
    deadline = NO_DEADLINE,
  } = options;

  const realRoot = await resolveRoot(rootPath);
  const allExcludes = noDefaultExcludes
    ? [...excludes]
    : [...DEFAULT_EXCLUDES, ...DEFAULT_SECRET_EXCLUDES, ...excludes];
  const ignoreFilter = await createIgnoreFilter(realRoot, respectIgnoreFiles);

  const candidates: Candidate[] = [];
  const skipped: SkippedFile[] = [];
  const visitedDirs = new Set<string>();
  let partial = false;

  async function walk(currentPath: string, relativeDir: string): Promise<void> {
    if (deadline.expired()) {
      partial = true;
      return;
    }

    let realDir: string;
    let entries: Dirent[];
    try {
      realDir = await realpath(currentPath);
      entries = await readdir(currentPath, { withFileTypes: true });
    } catch (error) {
      if (relativeDir === '') {
        throw new ScanError('ROOT_UNREADABLE', rootPath, { cause: error });
      }
      partial = true;
      return;
    }

    // Symlinked directories can lead back to a directory already walked
    if (visitedDirs.has(realDir)) {
      return;
    }
    visitedDirs.add(realDir);

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const name = entry.name;
      const fullPath = join(currentPath, name);
      const relativePath = relativeDir ? `${relativeDir}/${name}` : name;

      // Skip hidden files/directories unless explicitly included
      if (!includeHidden && name.startsWith('.')) {
        continue;
      }

      if (shouldExclude(name, allExcludes, relativePath)) {
        continue;
      }

      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        try {
          const target = await realpath(fullPath);
          if (!isInside(target, realRoot)) {
            skipped.push({ path: relativePath, reason: 'outside-root' });
            continue;
          }
          const targetStats = await stat(target);
          isDirectory = targetStats.isDirectory();
          isFile = targetStats.isFile();
        } catch {
          // Dangling link
          continue;
        }
      }

      if (isDirectory) {
        if (ignoreFilter.ignores(`${relativePath}/`)) {
          continue;
        }
        if (pathDepth(relativePath) > maxDepth) {
          continue;
        }
        await walk(fullPath, relativePath);
      } else if (isFile) {
        if (ignoreFilter.ignores(relativePath)) {
          continue;
        }
        if (isBinaryFile(name)) {
          skipped.push({ path: relativePath, reason: 'binary' });
          continue;
        }
        candidates.push({ absolutePath: fullPath, relativePath });
      }
    }
  }

  await walk(realRoot, '');

  const pool = await runPool(candidates, concurrency, c => probeFile(c, maxFileSize), deadline);
  if (pool.interrupted) {
    partial = true;
  }

  const records: FileRecord[] = [];
  for (const outcome of pool.results) {
    if (!outcome) {
      continue;
    }
    if (outcome.kind === 'record') {
      records.push(outcome.record);
    } else {
      skipped.push(outcome.skipped);
      if (outcome.failed) {
        partial = true;
      }
    }
  }

  records.sort((a, b) => comparePaths(a.path, b.path));
  skipped.sort((a, b) => comparePaths(a.path, b.path));

  return { records, skipped, partial };
}

/**
 * Result of loading file contents.
 */
export interface LoadResult {
  /** Records whose content was read, in input order */
  loaded: FileRecord[];
  partial: boolean;
}

/**
 * Read content for each record through a bounded pool, stopping at the deadline.
 * Content is attached to the record it belongs to.
 */
export async function loadContents(
  records: readonly FileRecord[],
  options: { concurrency?: number; deadline?: Deadline } = {}
): Promise<LoadResult> {
  const { concurrency = DEFAULT_SCAN_CONCURRENCY, deadline = NO_DEADLINE } = options;
  let failed = false;

  const pool = await runPool(
    records,
    concurrency,
    async record => {
      try {
        record.content = await readFile(record.absolutePath, 'utf-8');
        return record;
      } catch {
        failed = true;
        return undefined;
      }
    },
    deadline
  );

  const loaded = pool.results.filter((r): r is FileRecord => r !== undefined);
  return { loaded, partial: failed || pool.interrupted };
}

/**
 * Ordinal comparison so ordering does not depend on the host locale.
 */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
