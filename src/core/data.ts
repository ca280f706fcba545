import { readFileSync } from 'node:fs';

/**
 * Lists shipped in the package-level `data/` directory.
 */
export type DataList = 'default-excludes' | 'secret-excludes' | 'binary-extensions' | 'stop-words';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Read a string list from `data/<name>.json` (synchronous, module load time).
 */
export function loadStringList(name: DataList): string[] {
  const raw: unknown = JSON.parse(readFileSync(new URL(`${name}.json`, DATA_DIR), 'utf-8'));
  if (!Array.isArray(raw) || !raw.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Data file ${name}.json must contain an array of strings`);
  }
  return raw;
}
