import { loadStringList } from './data.js';
import { isKnownExtension, languageForWord, type Language } from './languages.js';
import type { Keyword, KeywordKind, KeywordSet } from '../types/context.js';

/**
 * Weight assigned to each kind of keyword.
 */
export const KEYWORD_WEIGHTS = {
  phrase: 3,
  filename: 2.5,
  language: 2,
  identifier: 1.5,
  term: 1,
  subtoken: 0.5,
} as const satisfies Record<KeywordKind, number>;

export const MAX_KEYWORDS = 64;
export const MIN_TERM_LENGTH = 3;

/**
 * Short terms kept despite being under the minimum length.
 */
export const ACRONYMS: ReadonlySet<string> = new Set([
  'ai', 'api', 'cd', 'ci', 'db', 'id', 'io', 'ip', 'ml', 'os', 'pr', 'qa', 'ui', 'ux', 'vm', 'ws',
]);

const STOP_WORDS: ReadonlySet<string> = new Set(loadStringList('stop-words'));

const DOUBLE_QUOTED = /"([^"]+)"/g;
const BACKTICK_QUOTED = /`([^`]+)`/g;
// Apostrophes inside words ("user's") must not open a phrase
const SINGLE_QUOTED = /(?<![\p{L}\p{N}_])'([^']+)'(?![\p{L}\p{N}_])/gu;
const FILE_NAME = /[\p{L}\p{N}_-]+\.[A-Za-z0-9]+(?![\p{L}\p{N}_])/gu;
const TOKEN_SPLIT = /[^\p{L}\p{N}_]+/u;
const CAMEL_BOUNDARY = /(?<=[\p{Ll}\p{N}])(?=\p{Lu})|(?<=\p{Lu})(?=\p{Lu}\p{Ll})/u;

/**
 * Collapse whitespace and apply NFKC so equivalent prompts extract identically.
 */
export function normalizePrompt(prompt: string): string {
  return prompt.normalize('NFKC').replace(/\s+/g, ' ').trim();
}

/**
 * Whether a raw token is written as an identifier (camelCase, PascalCase or snake_case).
 */
export function isIdentifierLike(token: string): boolean {
  if (/[\p{L}\p{N}]_[\p{L}\p{N}]/u.test(token)) {
    return true;
  }
  return /\p{Ll}\p{Lu}/u.test(token) || /\p{Lu}{2,}\p{Ll}/u.test(token);
}

/**
 * Split an identifier into its lower-cased parts.
 */
export function splitIdentifier(token: string): string[] {
  return token
    .split('_')
    .flatMap(part => part.split(CAMEL_BOUNDARY))
    .map(part => part.toLowerCase())
    .filter(Boolean);
}

class KeywordCollector {
  private readonly terms = new Map<string, Keyword>();
  readonly languages = new Set<Language>();

  add(term: string, kind: KeywordKind): void {
    const weight = KEYWORD_WEIGHTS[kind];
    const existing = this.terms.get(term);
    if (!existing || existing.weight < weight) {
      this.terms.set(term, { term, weight, kind });
    }
  }

  /**
   * Add a plain word, applying the language, stop-word and length rules.
   */
  addWord(word: string, kind: 'term' | 'subtoken'): void {
    const language = languageForWord(word);
    if (language) {
      this.add(word, 'language');
      this.languages.add(language);
      return;
    }
    if (STOP_WORDS.has(word) || /^\p{N}+$/u.test(word)) {
      return;
    }
    if (word.length < MIN_TERM_LENGTH && !ACRONYMS.has(word)) {
      return;
    }
    this.add(word, kind);
  }

  build(): KeywordSet {
    const keywords = Array.from(this.terms.values())
      .sort((a, b) => b.weight - a.weight || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .slice(0, MAX_KEYWORDS)
      .map(k => Object.freeze(k));
    const languages = Array.from(this.languages).sort();
    return Object.freeze({
      keywords: Object.freeze(keywords),
      languages: Object.freeze(languages),
    });
  }
}

function matchGroups(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), m => m[1] ?? '');
}

/**
 * Derive a weighted keyword set from a task prompt.
 * Deterministic for identical input, and unchanged by `normalizePrompt`.
 */
export function extractKeywords(prompt: string): KeywordSet {
  const text = normalizePrompt(prompt);
  const collector = new KeywordCollector();

  // Quoted substrings are literal phrases
  const quoted = [
    ...matchGroups(text, DOUBLE_QUOTED),
    ...matchGroups(text, BACKTICK_QUOTED),
    ...matchGroups(text, SINGLE_QUOTED),
  ];
  for (const raw of quoted) {
    const phrase = raw.trim().toLowerCase();
    if (phrase.length >= MIN_TERM_LENGTH) {
      collector.add(phrase, 'phrase');
    }
  }

  // name.ext mentions point straight at files
  for (const match of text.matchAll(FILE_NAME)) {
    const fileName = match[0].toLowerCase();
    const dot = fileName.lastIndexOf('.');
    if (dot > 0 && isKnownExtension(fileName.slice(dot))) {
      collector.add(fileName, 'filename');
    }
  }

  for (const token of text.split(TOKEN_SPLIT)) {
    const stripped = token.replace(/^_+|_+$/g, '');
    if (!stripped) {
      continue;
    }
    const lower = stripped.toLowerCase();

    if (languageForWord(lower)) {
      collector.addWord(lower, 'term');
      continue;
    }

    if (isIdentifierLike(stripped)) {
      if (lower.length >= MIN_TERM_LENGTH) {
        collector.add(lower, 'identifier');
      }
      for (const part of splitIdentifier(stripped)) {
        collector.addWord(part, 'subtoken');
      }
      continue;
    }

    collector.addWord(lower, 'term');
  }

  return collector.build();
}

/**
 * Stable text form of a keyword set, used in cache keys.
 */
export function keywordSignature(keywords: KeywordSet): string {
  return keywords.keywords.map(k => `${k.kind}:${k.term}:${k.weight}`).join('|');
}
