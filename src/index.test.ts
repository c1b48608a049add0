import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { VERSION, command, createParser, flag, option, string, toKebabCase } from './index.js';

describe('argsmith', () => {
  describe('VERSION', () => {
    it('should be defined and follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('should parse through the exported entry points', () => {
      const parser = createParser(command({ name: option(string()), loud: flag() }), { name: 'greet' });
      const outcome = parser.parse(['--name', 'World', '--loud']);

      expect(outcome.kind === 'parsed' ? outcome.value.values : undefined).toEqual({ name: 'World', loud: true });
    });
  });

  describe('property-based tests', () => {
    it('should accept every kebab-cased camelCase key as a long flag', () => {
      const key = fc
        .tuple(
          fc.stringOf(fc.constantFrom('a', 'b', 'c'), { minLength: 1, maxLength: 5 }),
          fc.array(fc.stringOf(fc.constantFrom('x', 'y'), { minLength: 1, maxLength: 3 }), { maxLength: 3 })
        )
        .map(([head, words]) => head + words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join(''));

      fc.assert(
        fc.property(key, (fieldKey) => {
          const parser = createParser(command({ [fieldKey]: flag() }), { name: 'prop' });
          const outcome = parser.parse([`--${toKebabCase(fieldKey)}`]);
          expect(outcome.kind === 'parsed' ? outcome.value.values : undefined).toEqual({ [fieldKey]: true });
        }),
        { numRuns: 100 }
      );
    });
  });
});
