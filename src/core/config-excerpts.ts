import { truncateAtLineBoundary } from './tokens.js';
import { comparePaths } from './walker.js';
import type { ConfigExcerpt, FileRecord } from '../types/context.js';

/** Characters kept from the head of each root project file */
export const DEFAULT_CONFIG_EXCERPT_CHARS = 1500;

/**
 * Root-level files that describe how a project is built and run.
 */
export const CONFIG_FILE_NAMES: ReadonlySet<string> = new Set([
  'package.json',
  'tsconfig.json',
  'webpack.config.js',
  'requirements.txt',
  'pyproject.toml',
  'setup.py',
  'Cargo.toml',
  'go.mod',
  'pom.xml',
  'build.gradle',
  'Gemfile',
  'composer.json',
  'pubspec.yaml',
  'CMakeLists.txt',
  'Makefile',
  'Dockerfile',
  'docker-compose.yml',
  'README.md',
  'LICENSE',
]);

export interface ExcerptOptions {
  /** Paths already in the bundle */
  selected: ReadonlySet<string>;
  /** Tokens the selected files left unused */
  remainingTokens: number;
  maxChars: number;
}

export interface Excerpts {
  excerpts: ConfigExcerpt[];
  tokens: number;
}

/**
 * Take the head of every loaded root project file that was not selected,
 * in path order, while the leftover budget lasts.
 */
export function collectConfigExcerpts(records: readonly FileRecord[], options: ExcerptOptions): Excerpts {
  const excerpts: ConfigExcerpt[] = [];
  let remaining = options.remainingTokens;
  if (options.maxChars <= 0) {
    return { excerpts, tokens: 0 };
  }

  const candidates = records
    .filter(r => r.depth === 1 && CONFIG_FILE_NAMES.has(r.path) && !options.selected.has(r.path))
    .sort((a, b) => comparePaths(a.path, b.path));

  for (const record of candidates) {
    if (remaining <= 0) {
      break;
    }
    if (!record.content) {
      continue;
    }
    const head = truncateAtLineBoundary(record.content, { maxChars: options.maxChars, maxTokens: remaining });
    if (head.content === '') {
      continue;
    }
    excerpts.push(
      Object.freeze({ path: record.path, content: head.content, estimatedTokens: head.tokens, truncated: head.truncated })
    );
    remaining -= head.tokens;
  }

  return { excerpts, tokens: options.remainingTokens - remaining };
}
