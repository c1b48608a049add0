import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { getDefaultEnv, splitEnvList } from './env.js';

describe('environment variables', () => {
  describe('getDefaultEnv', () => {
    it('should return the process environment', () => {
      expect(getDefaultEnv()).toBe(process.env);
    });
  });

  describe('splitEnvList', () => {
    it('should split on commas and trim entries', () => {
      expect(splitEnvList('a, b ,c')).toEqual(['a', 'b', 'c']);
    });

    it('should keep commas and spaces inside quotes', () => {
      expect(splitEnvList('"a, b",c')).toEqual(['a, b', 'c']);
      expect(splitEnvList('x, " padded "')).toEqual(['x', ' padded ']);
    });

    it('should unescape doubled quotes inside quotes', () => {
      expect(splitEnvList('"say ""hi""",b')).toEqual(['say "hi"', 'b']);
    });

    it('should keep empty entries', () => {
      expect(splitEnvList('a,,b')).toEqual(['a', '', 'b']);
      expect(splitEnvList('single')).toEqual(['single']);
    });

    it('should return no entries for an empty value', () => {
      expect(splitEnvList('')).toEqual([]);
      expect(splitEnvList('""')).toEqual(['']);
    });

    it('should round-trip entries without commas or quotes (property-based)', () => {
      const entry = fc.stringOf(fc.constantFrom('a', 'b', '1', '-', '_', '='), { minLength: 1 });
      fc.assert(
        fc.property(fc.array(entry, { minLength: 1 }), (entries) => {
          expect(splitEnvList(entries.join(','))).toEqual(entries);
        })
      );
    });
  });
});
