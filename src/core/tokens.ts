/**
 * Approximate token counting. Not tied to any model's tokenizer; it leans high
 * so a budget computed with it stays under a real model's limit.
 */

/** Average characters per token for prose and ordinary code */
export const CHARS_PER_TOKEN = 4;

/** Average characters per token for symbol-dense text */
export const DENSE_CHARS_PER_TOKEN = 3;

/** Share of non-whitespace characters that must be symbols to count as dense */
export const DENSE_SYMBOL_RATIO = 0.25;

const WORD_CHAR = /[\p{L}\p{N}_]/u;
const WHITESPACE = /\s/;

interface TextCounts {
  length: number;
  nonWhitespace: number;
  symbols: number;
}

function countText(text: string): TextCounts {
  let nonWhitespace = 0;
  let symbols = 0;
  for (const char of text) {
    if (WHITESPACE.test(char)) {
      continue;
    }
    nonWhitespace++;
    if (!WORD_CHAR.test(char)) {
      symbols++;
    }
  }
  return { length: text.length, nonWhitespace, symbols };
}

function estimateFromCounts(counts: TextCounts): number {
  if (counts.length === 0) {
    return 0;
  }
  const dense = counts.nonWhitespace > 0 && counts.symbols / counts.nonWhitespace > DENSE_SYMBOL_RATIO;
  return Math.ceil(counts.length / (dense ? DENSE_CHARS_PER_TOKEN : CHARS_PER_TOKEN));
}

/**
 * Estimate the token count of a piece of text.
 */
export function estimateTokens(text: string): number {
  return estimateFromCounts(countText(text));
}

export interface TruncateLimits {
  maxChars: number;
  maxTokens: number;
}

export interface Truncated {
  content: string;
  tokens: number;
  truncated: boolean;
}

/**
 * Cut text to the longest run of whole lines that stays within both limits.
 * The result may be empty when the first line alone is over a limit.
 */
export function truncateAtLineBoundary(text: string, limits: TruncateLimits): Truncated {
  const whole = estimateTokens(text);
  if (text.length <= limits.maxChars && whole <= limits.maxTokens) {
    return { content: text, tokens: whole, truncated: false };
  }

  const lines = text.split(/(?<=\n)/);
  const running: TextCounts = { length: 0, nonWhitespace: 0, symbols: 0 };
  let end = 0;
  let tokens = 0;

  for (const line of lines) {
    const counts = countText(line);
    const next: TextCounts = {
      length: running.length + counts.length,
      nonWhitespace: running.nonWhitespace + counts.nonWhitespace,
      symbols: running.symbols + counts.symbols,
    };
    const nextTokens = estimateFromCounts(next);
    if (next.length > limits.maxChars || nextTokens > limits.maxTokens) {
      break;
    }
    running.length = next.length;
    running.nonWhitespace = next.nonWhitespace;
    running.symbols = next.symbols;
    end = next.length;
    tokens = nextTokens;
  }

  return { content: text.slice(0, end), tokens, truncated: true };
}
