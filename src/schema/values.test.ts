import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  boolean,
  choice,
  custom,
  integer,
  number,
  string,
  ValueConversionFailure,
  type ValueType,
} from './values.js';

function reasonFor<T>(type: ValueType<T>, raw: string): string {
  try {
    type.parse(raw);
  } catch (error) {
    if (error instanceof ValueConversionFailure) {
      return error.reason;
    }
    throw error;
  }
  throw new Error(`Expected '${raw}' to be rejected`);
}

describe('value types', () => {
  describe('string', () => {
    it('should accept any literal unchanged', () => {
      fc.assert(
        fc.property(fc.string(), (raw) => {
          expect(string().parse(raw)).toBe(raw);
        })
      );
    });
  });

  describe('integer', () => {
    it('should parse signed base-10 integers', () => {
      expect(integer().parse('42')).toBe(42);
      expect(integer().parse('-7')).toBe(-7);
      expect(integer().parse('+3')).toBe(3);
    });

    it('should read negative zero as zero', () => {
      expect(Object.is(integer().parse('-0'), 0)).toBe(true);
    });

    it('should reject non-integers', () => {
      expect(reasonFor(integer(), 'INVALID')).toBe('cannot parse "INVALID" as integer');
      expect(reasonFor(integer(), '1.5')).toBe('cannot parse "1.5" as integer');
      expect(reasonFor(integer(), '')).toBe('cannot parse "" as integer');
    });

    it('should reject values outside the safe-integer range', () => {
      expect(reasonFor(integer(), '9007199254740993')).toBe('value "9007199254740993" is out of range');
    });

    it('should format what it parses back to the same number', () => {
      fc.assert(
        fc.property(fc.maxSafeInteger(), (value) => {
          const type = integer();
          expect(type.parse(type.format(value))).toBe(value);
        })
      );
    });
  });

  describe('number', () => {
    it('should parse decimal and exponent literals', () => {
      expect(number().parse('0.25')).toBe(0.25);
      expect(number().parse('1e3')).toBe(1000);
      expect(number().parse('-.5')).toBe(-0.5);
      expect(number().parse('2.')).toBe(2);
    });

    it('should reject hex, binary and octal literals', () => {
      expect(reasonFor(number(), '0x10')).toBe('cannot parse "0x10" as number');
      expect(reasonFor(number(), '0b11')).toBe('cannot parse "0b11" as number');
      expect(reasonFor(number(), '0o7')).toBe('cannot parse "0o7" as number');
    });

    it('should reject empty and non-finite literals', () => {
      expect(reasonFor(number(), '')).toBe('cannot parse "" as number');
      expect(reasonFor(number(), 'Infinity')).toBe('cannot parse "Infinity" as number');
      expect(reasonFor(number(), 'abc')).toBe('cannot parse "abc" as number');
    });
  });

  describe('boolean', () => {
    it('should accept truthy and falsy words case-insensitively', () => {
      for (const raw of ['true', '1', 'YES', 'On']) {
        expect(boolean().parse(raw)).toBe(true);
      }
      for (const raw of ['false', '0', 'no', 'OFF']) {
        expect(boolean().parse(raw)).toBe(false);
      }
    });

    it('should list accepted values when rejecting', () => {
      expect(reasonFor(boolean(), 'maybe')).toBe(
        'cannot parse "maybe" as boolean, expected one of: true, 1, yes, on, false, 0, no, off'
      );
    });
  });

  describe('choice', () => {
    it('should accept only listed literals', () => {
      const format = choice(['json', 'text']);
      expect(format.parse('json')).toBe('json');
      expect(format.name).toBe('one of json|text');
      expect(reasonFor(format, 'xml')).toBe('cannot parse "xml" as one of json|text');
    });
  });

  describe('custom', () => {
    it('should wrap thrown errors as conversion failures', () => {
      const port = custom('port', (raw) => {
        const value = Number(raw);
        if (!Number.isInteger(value) || value < 1 || value > 65535) {
          throw new RangeError(`port ${raw} is out of range`);
        }
        return value;
      });
      expect(port.parse('8080')).toBe(8080);
      expect(reasonFor(port, '70000')).toBe('port 70000 is out of range');
    });

    it('should format with String by default', () => {
      const upper = custom('upper', (raw) => raw.toUpperCase());
      expect(upper.format('ABC')).toBe('ABC');
    });
  });
});
