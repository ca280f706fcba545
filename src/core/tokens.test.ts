import { describe, it, expect } from 'vitest';
import { estimateTokens, truncateAtLineBoundary } from './tokens.js';

describe('token estimation', () => {
  describe('estimateTokens', () => {
    it('should return 0 for empty text', () => {
      expect(estimateTokens('')).toBe(0);
    });

    it('should use four characters per token for ordinary text', () => {
      expect(estimateTokens('abcd')).toBe(1);
      expect(estimateTokens('abcde')).toBe(2);
      expect(estimateTokens('x'.repeat(400))).toBe(100);
    });

    it('should use three characters per token for symbol-dense text', () => {
      // 2 of 4 non-whitespace characters are symbols
      expect(estimateTokens('a = b;')).toBe(2);
      expect(estimateTokens('{}();')).toBe(2);
    });

    it('should count whitespace in the length but not in the density', () => {
      expect(estimateTokens('ab      ')).toBe(2);
    });
  });

  describe('truncateAtLineBoundary', () => {
    const text = 'aaa\nbbb\nccc\n';

    it('should return text that fits unchanged', () => {
      expect(truncateAtLineBoundary(text, { maxChars: 100, maxTokens: 100 })).toEqual({
        content: text,
        tokens: 3,
        truncated: false,
      });
    });

    it('should cut at the last whole line within the character limit', () => {
      expect(truncateAtLineBoundary(text, { maxChars: 10, maxTokens: 100 })).toEqual({
        content: 'aaa\nbbb\n',
        tokens: 2,
        truncated: true,
      });
    });

    it('should cut at the last whole line within the token limit', () => {
      expect(truncateAtLineBoundary(text, { maxChars: 100, maxTokens: 1 })).toEqual({
        content: 'aaa\n',
        tokens: 1,
        truncated: true,
      });
    });

    it('should return an empty fragment when the first line does not fit', () => {
      expect(truncateAtLineBoundary('a very long first line\nshort\n', { maxChars: 5, maxTokens: 100 })).toEqual({
        content: '',
        tokens: 0,
        truncated: true,
      });
    });

    it('should keep a final line without a newline when it fits', () => {
      expect(truncateAtLineBoundary('aaa\nbb', { maxChars: 6, maxTokens: 100 }).content).toBe('aaa\nbb');
    });
  });
});
