import { posix } from 'node:path';

/**
 * Lookup structure over the set of known file paths, used when resolving imports.
 */
export class FileIndex {
  private readonly paths: ReadonlySet<string>;
  private readonly byDirectory = new Map<string, string[]>();
  private readonly byBaseName = new Map<string, string[]>();

  constructor(paths: Iterable<string>) {
    const sorted = Array.from(new Set(paths)).sort();
    this.paths = new Set(sorted);

    for (const path of sorted) {
      const dir = posix.dirname(path);
      const base = posix.basename(path);
      const inDir = this.byDirectory.get(dir);
      if (inDir) {
        inDir.push(path);
      } else {
        this.byDirectory.set(dir, [path]);
      }
      const named = this.byBaseName.get(base);
      if (named) {
        named.push(path);
      } else {
        this.byBaseName.set(base, [path]);
      }
    }
  }

  has(path: string): boolean {
    return this.paths.has(path);
  }

  /**
   * Return the first candidate that names a known file.
   */
  firstExisting(candidates: Iterable<string>): string | undefined {
    for (const candidate of candidates) {
      const normalized = normalizeRelative(candidate);
      if (normalized !== undefined && this.paths.has(normalized)) {
        return normalized;
      }
    }
    return undefined;
  }

  /** Files directly inside a directory ('.' for the root), in path order */
  filesIn(directory: string): readonly string[] {
    return this.byDirectory.get(directory) ?? [];
  }

  directories(): IterableIterator<string> {
    return this.byDirectory.keys();
  }

  /** Files whose path equals `suffix` or ends with `/suffix`, in path order */
  withSuffix(suffix: string): string[] {
    const candidates = this.byBaseName.get(posix.basename(suffix)) ?? [];
    return candidates.filter(p => p === suffix || p.endsWith(`/${suffix}`));
  }
}

/**
 * Normalize a root-relative POSIX path. Returns undefined for paths that leave the root.
 */
export function normalizeRelative(path: string): string | undefined {
  const normalized = posix.normalize(path).replace(/^\.\/+/, '').replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../') || posix.isAbsolute(normalized) || normalized === '.') {
    return undefined;
  }
  return normalized;
}
