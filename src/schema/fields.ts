/**
 * Declaration constructors for configuration shapes.
 *
 * @example
 * ```typescript
 * const spec = command({
 *   input: positional(string()),
 *   output: rest(string()),
 *   verbose: flag({ short: 'v', help: 'verbosity level' }),
 *   dataset: option(string(), { help: 'dataset to use' }),
 *   optimize: option(integer(), { short: 'O', help: 'optimization level' }),
 * });
 * ```
 *
 * @packageDocumentation
 */

import type {
  CommandSpec,
  FieldMap,
  FlagField,
  FlagOptions,
  ListField,
  ListOptions,
  MapField,
  MapOptions,
  OptionField,
  OptionOptions,
  PositionalField,
  PositionalOptions,
  Presence,
  RestField,
  RestOptions,
  SubcommandField,
  SubcommandOptions,
} from './types.js';
import type { ValueType } from './values.js';

/**
 * Declares a configuration level.
 *
 * @param fields - Field declarations keyed by destination name, in display order.
 */
export function command<F extends FieldMap>(fields: F): CommandSpec<F> {
  return { kind: 'command', fields };
}

/**
 * Declares a boolean flag. Present means `true`; `--flag=false` is also accepted.
 */
export function flag(options: FlagOptions = {}): FlagField {
  return { kind: 'flag', options };
}

/**
 * Declares a single-valued option.
 *
 * The result type is `T` when the option is required or has a default and
 * `T | undefined` otherwise.
 */
export function option<T>(
  type: ValueType<T>,
  options: OptionOptions<T> & { readonly required: true }
): OptionField<T, 'required'>;
export function option<T>(
  type: ValueType<T>,
  options: OptionOptions<T> & { readonly default: T }
): OptionField<T, 'defaulted'>;
export function option<T>(type: ValueType<T>, options?: OptionOptions<T>): OptionField<T, 'optional'>;
export function option<T>(type: ValueType<T>, options: OptionOptions<T> = {}): OptionField<T, Presence> {
  return { kind: 'option', type, presence: presenceOf(options), options };
}

/**
 * Declares a multi-valued option collected into an array.
 */
export function list<T>(type: ValueType<T>, options: ListOptions<T> = {}): ListField<T> {
  return { kind: 'list', type, options };
}

/**
 * Declares a multi-valued option of `key=value` entries collected into a Map.
 * Later entries for the same key win.
 */
export function map<T>(type: ValueType<T>, options: MapOptions<T> = {}): MapField<T> {
  return { kind: 'map', type, options };
}

/**
 * Declares a positional argument. Positionals are filled in declaration order.
 */
export function positional<T>(
  type: ValueType<T>,
  options: PositionalOptions<T> = {}
): PositionalField<T> {
  return { kind: 'positional', type, options };
}

/**
 * Declares the trailing positional that collects every remaining value.
 * At most one per level, and it must be the last positional.
 */
export function rest<T>(type: ValueType<T>, options: RestOptions<T> = {}): RestField<T> {
  return { kind: 'rest', type, options };
}

/**
 * Declares a subcommand. At most one subcommand per level is selected.
 */
export function subcommand<G extends FieldMap>(
  spec: CommandSpec<G>,
  options: SubcommandOptions = {}
): SubcommandField<G> {
  return { kind: 'subcommand', command: spec, options };
}

function presenceOf<T>(options: OptionOptions<T>): Presence {
  if (options.required === true) {
    return 'required';
  }
  return options.default === undefined ? 'optional' : 'defaulted';
}
