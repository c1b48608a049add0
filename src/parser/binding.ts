/**
 * Conversion and storage of literals into a level's destination.
 *
 * Used by the matcher for command-line tokens and by the precedence
 * resolver for environment and config values, so every source converts
 * and accumulates the same way.
 *
 * @packageDocumentation
 */

import type { CommandDescriptor, FieldDescriptor } from '../schema/types.js';
import { ValueConversionFailure } from '../schema/values.js';
import { ConversionError } from './errors.js';
import { filledKey, type BoundLevel, type ParseState } from './types.js';

/**
 * Creates a destination for a level with every default pre-populated.
 *
 * Defaults are copied so that parses never share mutable containers.
 *
 * @param descriptor - The level.
 */
export function createLevel(descriptor: CommandDescriptor): BoundLevel {
  const values = new Map<string, unknown>();
  for (const field of descriptor.fields) {
    values.set(field.key, copyDefault(field));
  }
  return { descriptor, values, nextPositional: 0, selected: undefined };
}

function copyDefault(field: FieldDescriptor): unknown {
  const value = field.defaultValue;
  if (Array.isArray(value)) {
    return [...value];
  }
  if (value instanceof Map) {
    return new Map(value);
  }
  return value;
}

/**
 * Converts one literal through the field's value type.
 *
 * @param field - The target field.
 * @param literal - The literal to convert.
 * @param argument - What the literal was bound through, for error messages.
 * @throws ConversionError when the value type rejects the literal.
 */
export function convert(field: FieldDescriptor, literal: string, argument: string): unknown {
  try {
    return field.valueType.parse(literal);
  } catch (error) {
    if (error instanceof ValueConversionFailure) {
      throw new ConversionError(argument, literal, field.valueType.name, error.reason);
    }
    throw error;
  }
}

/**
 * Splits a `key=value` map entry and converts the value.
 *
 * @throws ConversionError when the entry has no `=` or the value does not convert.
 */
function convertEntry(field: FieldDescriptor, literal: string, argument: string): [string, unknown] {
  const eq = literal.indexOf('=');
  if (eq === -1) {
    throw new ConversionError(
      argument,
      literal,
      field.valueType.name,
      `cannot parse "${literal}" as key=value`
    );
  }
  return [literal.slice(0, eq), convert(field, literal.slice(eq + 1), argument)];
}

/**
 * Binds literals to a field, replacing or extending its current value.
 *
 * Single-valued fields take the last literal. Multi-valued fields start from
 * empty the first time any source binds them, so a bound source always
 * replaces the default; after that `append` decides whether later
 * occurrences extend or replace.
 *
 * @param state - The parse state.
 * @param level - Destination level.
 * @param field - The field to bind.
 * @param literals - Literals in order of appearance.
 * @param argument - What the literals were bound through.
 * @param append - Whether to extend an already bound multi-value.
 */
export function bindLiterals(
  state: ParseState,
  level: BoundLevel,
  field: FieldDescriptor,
  literals: readonly string[],
  argument: string,
  append: boolean
): void {
  const key = filledKey(field);
  const extend = append && state.filled.has(key);

  switch (field.container) {
    case 'single': {
      const last = literals[literals.length - 1];
      if (last !== undefined) {
        level.values.set(field.key, convert(field, last, argument));
      }
      break;
    }
    case 'list': {
      const current = level.values.get(field.key);
      const base: unknown[] = extend && Array.isArray(current) ? [...current] : [];
      for (const literal of literals) {
        base.push(convert(field, literal, argument));
      }
      level.values.set(field.key, base);
      break;
    }
    case 'map': {
      const current = level.values.get(field.key);
      const base = extend && current instanceof Map ? new Map<unknown, unknown>(current) : new Map<unknown, unknown>();
      for (const literal of literals) {
        const [entryKey, entryValue] = convertEntry(field, literal, argument);
        base.set(entryKey, entryValue);
      }
      level.values.set(field.key, base);
      break;
    }
  }

  state.filled.add(key);
}

/**
 * Stores an already converted single value, e.g. `true` for a present flag.
 */
export function bindValue(
  state: ParseState,
  level: BoundLevel,
  field: FieldDescriptor,
  value: unknown
): void {
  level.values.set(field.key, value);
  state.filled.add(filledKey(field));
}
