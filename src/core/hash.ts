import { createHash } from 'node:crypto';
import type { FileRecord } from '../types/context.js';

/**
 * Generate a SHA-256 hash of string or buffer content.
 */
export function hashContent(content: string | Buffer): string {
  const hash = createHash('sha256');
  hash.update(content);
  return hash.digest('hex');
}

/**
 * Case-fold and collapse whitespace so trivially different prompts share a cache slot.
 */
export function canonicalPrompt(prompt: string): string {
  return prompt.normalize('NFKC').replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Hash a prompt together with the signature of the keywords extracted from it
 * and the request settings. Two requests collide only if all three agree.
 */
export function hashPrompt(prompt: string, keywordSignature: string, settings = ''): string {
  return hashContent(`${canonicalPrompt(prompt)}\n${keywordSignature}\n${settings}`);
}

/**
 * Create a cache key from its parts.
 */
export function createCacheKey(repositoryIdentity: string, treeVersion: string, promptHash: string): string {
  return `${repositoryIdentity}\u0000${treeVersion}\u0000${promptHash}`;
}

/**
 * Version identifier for a scanned tree, derived from path, size and mtime of every record.
 * Any added, removed, resized or touched file changes it.
 */
export function fingerprintTree(records: readonly Pick<FileRecord, 'path' | 'sizeBytes' | 'modifiedAt'>[]): string {
  const lines = records
    .map(r => `${r.path}\t${r.sizeBytes}\t${Math.trunc(r.modifiedAt)}`)
    .sort();
  return `fp-${hashContent(lines.join('\n')).slice(0, 16)}`;
}
