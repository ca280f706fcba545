import { extractKeywords } from '../../core/keywords.js';
import type { KeywordSet } from '../../types/context.js';

/**
 * Run the keywords command: show how a prompt is read.
 */
export function runKeywordsCommand(prompt: string): KeywordSet {
  return extractKeywords(prompt);
}

export function formatKeywords(set: KeywordSet): string {
  if (set.keywords.length === 0) {
    return 'No keywords extracted.';
  }
  const width = Math.max(...set.keywords.map(k => k.term.length));
  const lines = set.keywords.map(k => `${k.term.padEnd(width)}  ${k.weight.toFixed(1)}  ${k.kind}`);
  if (set.languages.length > 0) {
    lines.push('', `Languages: ${set.languages.join(', ')}`);
  }
  return lines.join('\n');
}
