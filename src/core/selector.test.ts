import { describe, it, expect } from 'vitest';
import { selectFiles, eligibleFiles } from './selector.js';
import type { ContextBudget, ScoredFile } from '../types/context.js';

/** `count` lines of 40 characters, ten tokens each */
function lines(count: number): string {
  return `${'a'.repeat(39)}\n`.repeat(count);
}

function candidate(path: string, content: string | undefined, score: number, relevance = score): ScoredFile {
  return {
    record: {
      path,
      absolutePath: `/repo/${path}`,
      language: 'python',
      sizeBytes: content?.length ?? 0,
      depth: 1,
      modifiedAt: 0,
      content,
    },
    score,
    relevance,
    matchReasons: [],
  };
}

function budget(overrides: Partial<ContextBudget> = {}): ContextBudget {
  return { maxTokens: 1000, maxFiles: 10, maxCharsPerFile: 100_000, maxDepth: 3, ...overrides };
}

const withKeywords = { keywordsPresent: true };

describe('selector', () => {
  describe('eligibleFiles', () => {
    const scored = [candidate('a.py', 'a', 3), candidate('b.py', 'b', 1, 0)];

    it('should drop irrelevant files when something matched', () => {
      expect(eligibleFiles(scored, withKeywords).map(s => s.record.path)).toEqual(['a.py']);
    });

    it('should keep everything without keywords', () => {
      expect(eligibleFiles(scored, { keywordsPresent: false })).toHaveLength(2);
    });

    it('should keep everything when nothing matched', () => {
      const unmatched = [candidate('a.py', 'a', 1, 0), candidate('b.py', 'b', 0.5, 0)];

      expect(eligibleFiles(unmatched, withKeywords)).toHaveLength(2);
    });
  });

  describe('selectFiles', () => {
    it('should include files in rank order while they fit', () => {
      const result = selectFiles(
        [candidate('a.py', lines(3), 5), candidate('b.py', lines(2), 4)],
        budget({ maxTokens: 100 }),
        withKeywords
      );

      expect(result.files.map(f => [f.path, f.estimatedTokens, f.truncated])).toEqual([
        ['a.py', 30, false],
        ['b.py', 20, false],
      ]);
      expect(result.totalTokensEstimated).toBe(50);
      expect(result.filesConsideredCount).toBe(2);
    });

    it('should stop at the file limit', () => {
      const result = selectFiles(
        [candidate('a.py', lines(1), 3), candidate('b.py', lines(1), 2), candidate('c.py', lines(1), 1)],
        budget({ maxFiles: 1 }),
        withKeywords
      );

      expect(result.files.map(f => f.path)).toEqual(['a.py']);
      expect(result.filesConsideredCount).toBe(1);
    });

    it('should skip a candidate when less than half of it would fit', () => {
      const result = selectFiles(
        [
          candidate('a.py', lines(4), 4),
          candidate('b.py', lines(3), 3),
          candidate('c.py', lines(1), 2),
          candidate('d.py', lines(1), 1),
        ],
        budget({ maxTokens: 50 }),
        withKeywords
      );

      expect(result.files.map(f => f.path)).toEqual(['a.py', 'c.py']);
      expect(result.totalTokensEstimated).toBe(50);
      expect(result.filesConsideredCount).toBe(3);
    });

    it('should cut a candidate to the remaining budget when at least half of it fits', () => {
      const result = selectFiles(
        [candidate('login.py', lines(20), 9), candidate('tokens.py', lines(10), 5), candidate('README.md', lines(5), 1)],
        budget({ maxTokens: 250, maxFiles: 5 }),
        withKeywords
      );

      expect(result.files.map(f => [f.path, f.estimatedTokens, f.truncated])).toEqual([
        ['login.py', 200, false],
        ['tokens.py', 50, true],
      ]);
      expect(result.files[1]?.content).toBe(lines(5));
      expect(result.totalTokensEstimated).toBe(250);
      expect(result.filesConsideredCount).toBe(2);
    });

    it('should always cut down the top-ranked candidate', () => {
      const result = selectFiles(
        [candidate('big.py', lines(5), 2), candidate('small.py', lines(1), 1)],
        budget({ maxTokens: 25 }),
        withKeywords
      );

      expect(result.files.map(f => [f.path, f.content, f.truncated])).toEqual([['big.py', lines(2), true]]);
      expect(result.totalTokensEstimated).toBe(20);
      expect(result.filesConsideredCount).toBe(2);
    });

    it('should cut down the best candidate with content when an empty file ranks above it', () => {
      const result = selectFiles(
        [candidate('auth/__init__.py', '', 10), candidate('auth/service.py', lines(160), 9)],
        budget({ maxTokens: 100 }),
        withKeywords
      );

      expect(result.files.map(f => [f.path, f.content, f.truncated])).toEqual([['auth/service.py', lines(10), true]]);
      expect(result.totalTokensEstimated).toBe(100);
      expect(result.filesConsideredCount).toBe(2);
    });

    it('should cap each file at the character limit', () => {
      const result = selectFiles([candidate('a.py', lines(5), 1)], budget({ maxCharsPerFile: 80 }), withKeywords);

      expect(result.files[0]).toEqual({
        path: 'a.py',
        language: 'python',
        content: lines(2),
        score: 1,
        estimatedTokens: 20,
        truncated: true,
      });
    });

    it('should count but skip candidates without content', () => {
      const result = selectFiles(
        [candidate('gone.py', undefined, 2), candidate('empty.py', '', 1.5), candidate('a.py', lines(1), 1)],
        budget(),
        withKeywords
      );

      expect(result.files.map(f => f.path)).toEqual(['a.py']);
      expect(result.filesConsideredCount).toBe(3);
    });

    it('should return frozen files', () => {
      const result = selectFiles([candidate('a.py', lines(1), 1)], budget(), withKeywords);

      expect(Object.isFrozen(result.files[0])).toBe(true);
    });

    it('should select nothing from an empty ranking', () => {
      expect(selectFiles([], budget(), withKeywords)).toEqual({
        files: [],
        totalTokensEstimated: 0,
        filesConsideredCount: 0,
      });
    });
  });
});
