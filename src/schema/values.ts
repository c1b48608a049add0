/**
 * Value types: conversion of a single command-line literal to its semantic value.
 *
 * @packageDocumentation
 */

/**
 * Raised by {@link ValueType.parse} when a literal cannot be converted.
 *
 * The parser catches it and reports a ConversionError that also names the
 * argument the literal was bound to.
 */
export class ValueConversionFailure extends Error {
  /** Why the literal was rejected. */
  public readonly reason: string;

  /**
   * Creates a new ValueConversionFailure.
   *
   * @param reason - Why the literal was rejected.
   */
  constructor(reason: string) {
    super(reason);
    this.name = 'ValueConversionFailure';
    this.reason = reason;
  }
}

/**
 * Converts one literal to a value of type `T` and back for display.
 */
export interface ValueType<T> {
  /** Type name shown in conversion errors, e.g. `integer`. */
  readonly name: string;

  /**
   * Converts a literal.
   * @throws ValueConversionFailure when the literal is not a valid `T`.
   */
  parse(raw: string): T;

  /** Renders a value for `[default: ...]` annotations. */
  format(value: T): string;
}

const TRUTHY: readonly string[] = ['true', '1', 'yes', 'on'];
const FALSY: readonly string[] = ['false', '0', 'no', 'off'];

function cannotParse(raw: string, typeName: string): ValueConversionFailure {
  return new ValueConversionFailure(`cannot parse "${raw}" as ${typeName}`);
}

/**
 * Accepts any literal unchanged.
 */
export function string(): ValueType<string> {
  return {
    name: 'string',
    parse: (raw) => raw,
    format: (value) => value,
  };
}

/**
 * Base-10 integers within the safe-integer range, with an optional sign.
 */
export function integer(): ValueType<number> {
  return {
    name: 'integer',
    parse(raw) {
      if (!/^[+-]?\d+$/.test(raw)) {
        throw cannotParse(raw, 'integer');
      }
      const value = Number(raw);
      if (!Number.isSafeInteger(value)) {
        throw new ValueConversionFailure(`value "${raw}" is out of range`);
      }
      // -0 reads as 0
      return value === 0 ? 0 : value;
    },
    format: (value) => String(value),
  };
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Finite decimal numbers, e.g. `0.25`, `-3`, `1e3`. Hex, binary and octal
 * literals are rejected.
 */
export function number(): ValueType<number> {
  return {
    name: 'number',
    parse(raw) {
      const trimmed = raw.trim();
      const value = Number(trimmed);
      if (!DECIMAL_PATTERN.test(trimmed) || !Number.isFinite(value)) {
        throw cannotParse(raw, 'number');
      }
      return value;
    },
    format: (value) => String(value),
  };
}

/**
 * Case-insensitive booleans: `true 1 yes on` and `false 0 no off`.
 */
export function boolean(): ValueType<boolean> {
  return {
    name: 'boolean',
    parse(raw) {
      const normalized = raw.trim().toLowerCase();
      if (TRUTHY.includes(normalized)) {
        return true;
      }
      if (FALSY.includes(normalized)) {
        return false;
      }
      throw new ValueConversionFailure(
        `cannot parse "${raw}" as boolean, expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
      );
    },
    format: (value) => String(value),
  };
}

/**
 * Exactly one of a fixed set of literals.
 *
 * @param values - Accepted literals, in the order they are listed in errors.
 *
 * @example
 * ```typescript
 * const format = option(choice(['json', 'text'] as const), { default: 'text' });
 * ```
 */
export function choice<const V extends string>(values: readonly V[]): ValueType<V> {
  const typeName = `one of ${values.join('|')}`;
  return {
    name: typeName,
    parse(raw) {
      const match = values.find((value) => value === raw);
      if (match === undefined) {
        throw cannotParse(raw, typeName);
      }
      return match;
    },
    format: (value) => value,
  };
}

/**
 * Wraps a caller-supplied conversion.
 *
 * Any error thrown by `parse` is reported as a conversion failure with the
 * thrown message as the reason.
 *
 * @param name - Type name used in error messages.
 * @param parse - Conversion from literal to value.
 * @param format - Rendering for default annotations; `String(value)` when omitted.
 */
export function custom<T>(
  name: string,
  parse: (raw: string) => T,
  format: (value: T) => string = (value) => String(value)
): ValueType<T> {
  return {
    name,
    parse(raw) {
      try {
        return parse(raw);
      } catch (error) {
        if (error instanceof ValueConversionFailure) {
          throw error;
        }
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValueConversionFailure(reason);
      }
    },
    format,
  };
}
