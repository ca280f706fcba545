import { describe, it, expect } from 'vitest';
import { hashContent, canonicalPrompt, hashPrompt, createCacheKey, fingerprintTree } from './hash.js';

describe('hashing utilities', () => {
  describe('hashContent', () => {
    it('should generate a SHA-256 hash for string content', () => {
      expect(hashContent('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should hash buffers and strings alike', () => {
      expect(hashContent(Buffer.from('abc'))).toBe(hashContent('abc'));
    });
  });

  describe('canonicalPrompt', () => {
    it('should fold case, width and whitespace', () => {
      expect(canonicalPrompt('  Fix\tthe  ＬＯＧＩＮ\n')).toBe('fix the login');
    });
  });

  describe('hashPrompt', () => {
    it('should share a hash for prompts that differ only in case and spacing', () => {
      expect(hashPrompt('Fix  Login', 'term:fix:1|term:login:1')).toBe(hashPrompt('fix login', 'term:fix:1|term:login:1'));
    });

    it('should differ when the keyword signature differs', () => {
      expect(hashPrompt('fix login', 'term:login:1')).not.toBe(hashPrompt('fix login', 'term:fix:1|term:login:1'));
    });

    it('should differ when the request settings differ', () => {
      expect(hashPrompt('fix login', 'term:login:1', '[15000,20]')).not.toBe(hashPrompt('fix login', 'term:login:1', '[50,20]'));
    });
  });

  describe('createCacheKey', () => {
    it('should join the parts with a separator no path contains', () => {
      expect(createCacheKey('/repo', 'v1', 'abc')).toBe('/repo\u0000v1\u0000abc');
    });

    it('should not collide when parts shift', () => {
      expect(createCacheKey('/a', 'bc', 'd')).not.toBe(createCacheKey('/ab', 'c', 'd'));
    });
  });

  describe('fingerprintTree', () => {
    const source = { path: 'src/a.ts', sizeBytes: 10, modifiedAt: 1000 };
    const readme = { path: 'README.md', sizeBytes: 4, modifiedAt: 2000 };
    const records = [source, readme];

    it('should produce a short prefixed identifier', () => {
      expect(fingerprintTree(records)).toMatch(/^fp-[0-9a-f]{16}$/);
    });

    it('should not depend on record order', () => {
      expect(fingerprintTree([...records].reverse())).toBe(fingerprintTree(records));
    });

    it('should change when a file is touched, resized, added or removed', () => {
      const base = fingerprintTree(records);

      expect(fingerprintTree([{ ...source, modifiedAt: 1001 }, readme])).not.toBe(base);
      expect(fingerprintTree([{ ...source, sizeBytes: 11 }, readme])).not.toBe(base);
      expect(fingerprintTree([...records, { path: 'b.ts', sizeBytes: 1, modifiedAt: 0 }])).not.toBe(base);
      expect(fingerprintTree(records.slice(1))).not.toBe(base);
    });
  });
});
