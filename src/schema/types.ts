/**
 * Type definitions for configuration shapes and their field descriptors.
 *
 * A configuration shape is declared with the constructors in `fields.ts`
 * and compiled once into a {@link CommandDescriptor} tree by `builder.ts`.
 * The matcher, the precedence resolver and the usage formatter all read the
 * same descriptor tree.
 *
 * @packageDocumentation
 */

import type { ValueType } from './values.js';

/**
 * Whether a scalar option must be supplied, has a default, or may be absent.
 */
export type Presence = 'required' | 'defaulted' | 'optional';

/**
 * Naming and documentation shared by every flag-style declaration.
 */
export interface NamedOptions {
  /** Long name without dashes. Defaults to the kebab-cased field key. */
  readonly long?: string;
  /** Single-character short alias without the dash. */
  readonly short?: string;
  /** Help text shown next to the flag. */
  readonly help?: string;
  /**
   * Environment variable consulted when no token binds the field.
   * `true` derives UPPER_SNAKE of the field key.
   */
  readonly env?: boolean | string;
  /** Value placeholder in usage text. Defaults to UPPER_SNAKE of the long name. */
  readonly placeholder?: string;
}

/**
 * Options for a boolean flag.
 */
export interface FlagOptions extends Omit<NamedOptions, 'placeholder'> {
  readonly required?: boolean;
  readonly default?: boolean;
}

/**
 * Options for a single-valued option.
 */
export interface OptionOptions<T> extends NamedOptions {
  readonly required?: boolean;
  readonly default?: T;
}

/**
 * Options for a multi-valued option.
 */
export interface ListOptions<T> extends NamedOptions {
  readonly required?: boolean;
  readonly default?: readonly T[];
  /**
   * When true the flag repeats, each occurrence contributing one value.
   * When false one occurrence takes every following value token.
   * @defaultValue false
   */
  readonly separate?: boolean;
}

/**
 * Options for a `key=value` multi-valued option.
 */
export interface MapOptions<T> extends NamedOptions {
  readonly required?: boolean;
  readonly default?: ReadonlyMap<string, T>;
  /** @defaultValue false */
  readonly separate?: boolean;
}

/**
 * Options for a positional argument.
 */
export interface PositionalOptions<T> {
  readonly help?: string;
  readonly env?: boolean | string;
  readonly placeholder?: string;
  /** Positionals are required unless they have a default. */
  readonly required?: true;
  readonly default?: T;
}

/**
 * Options for the trailing multi-valued positional.
 */
export interface RestOptions<T> {
  readonly help?: string;
  readonly env?: boolean | string;
  readonly placeholder?: string;
  /** When true at least one value must be supplied. */
  readonly required?: boolean;
  readonly default?: readonly T[];
}

/**
 * Options for a subcommand branch.
 */
export interface SubcommandOptions {
  /** Name typed on the command line. Defaults to the kebab-cased field key. */
  readonly name?: string;
  readonly help?: string;
}

/** A boolean flag, `--verbose`. */
export interface FlagField {
  readonly kind: 'flag';
  readonly options: FlagOptions;
}

/** A single-valued option, `--dataset NAME`. */
export interface OptionField<T, P extends Presence = Presence> {
  readonly kind: 'option';
  readonly type: ValueType<T>;
  readonly presence: P;
  readonly options: OptionOptions<T>;
}

/** A multi-valued option, `--ids 1 2 3` or `-c a -c b`. */
export interface ListField<T> {
  readonly kind: 'list';
  readonly type: ValueType<T>;
  readonly options: ListOptions<T>;
}

/** A multi-valued `key=value` option, `--header a=1 b=2`. */
export interface MapField<T> {
  readonly kind: 'map';
  readonly type: ValueType<T>;
  readonly options: MapOptions<T>;
}

/** A positional argument filled in declaration order. */
export interface PositionalField<T> {
  readonly kind: 'positional';
  readonly type: ValueType<T>;
  readonly options: PositionalOptions<T>;
}

/** The trailing positional that takes every remaining value. */
export interface RestField<T> {
  readonly kind: 'rest';
  readonly type: ValueType<T>;
  readonly options: RestOptions<T>;
}

/** A named branch holding its own configuration level. */
export interface SubcommandField<G extends FieldMap> {
  readonly kind: 'subcommand';
  readonly command: CommandSpec<G>;
  readonly options: SubcommandOptions;
}

/**
 * Any field declaration.
 */
export type AnyField =
  | FlagField
  | OptionField<unknown>
  | ListField<unknown>
  | MapField<unknown>
  | PositionalField<unknown>
  | RestField<unknown>
  | SubcommandField<FieldMap>;

/**
 * Field declarations of one configuration level, keyed by destination name.
 */
export interface FieldMap {
  readonly [key: string]: AnyField;
}

/**
 * One configuration level.
 */
export interface CommandSpec<F extends FieldMap = FieldMap> {
  readonly kind: 'command';
  readonly fields: F;
}

/**
 * The value a field contributes to the parsed result.
 */
export type FieldValue<F> = F extends FlagField
  ? boolean
  : F extends OptionField<infer T, infer P>
    ? P extends 'optional'
      ? T | undefined
      : T
    : F extends ListField<infer T>
      ? T[]
      : F extends MapField<infer T>
        ? Map<string, T>
        : F extends PositionalField<infer T>
          ? T
          : F extends RestField<infer T>
            ? T[]
            : never;

/**
 * Bound values of one level. Subcommand fields are reported separately.
 */
export type ValuesOf<F extends FieldMap> = {
  -readonly [K in keyof F as F[K] extends SubcommandField<FieldMap> ? never : K]: FieldValue<F[K]>;
};

/**
 * The selected branch of a level: one variant per subcommand field.
 */
export type SelectedSubcommand<F extends FieldMap> = {
  [K in keyof F & string]: F[K] extends SubcommandField<infer G>
    ? SelectedBranch<K, G>
    : never;
}[keyof F & string];

/**
 * A selected subcommand, tagged by its field key.
 */
export interface SelectedBranch<K extends string, G extends FieldMap> extends ParsedCommand<G> {
  readonly name: K;
}

/**
 * Result of a successful parse of one level and everything below it.
 */
export interface ParsedCommand<F extends FieldMap> {
  readonly values: ValuesOf<F>;
  /** `undefined` when no subcommand was selected at this level. */
  readonly subcommand: SelectedSubcommand<F> | undefined;
}

/**
 * How a leaf field is matched.
 */
export type FieldKind =
  | 'scalar'
  | 'boolean-flag'
  | 'multi-value'
  | 'positional-scalar'
  | 'positional-multi';

/**
 * Shape of the value a leaf field holds in the destination.
 */
export type Container = 'single' | 'list' | 'map';

/**
 * Static metadata for one leaf field.
 */
export interface FieldDescriptor {
  /** Subcommand keys from the top level down, then the field key. */
  readonly path: readonly string[];
  readonly key: string;
  readonly kind: FieldKind;
  readonly container: Container;
  /** Undefined for positionals. */
  readonly longName: string | undefined;
  readonly shortAlias: string | undefined;
  readonly required: boolean;
  readonly hasDefault: boolean;
  /** Pre-set destination value; copied fresh for every parse. */
  readonly defaultValue: unknown;
  readonly envVar: string | undefined;
  /** Key looked up in a config file table. */
  readonly configKey: string;
  readonly helpText: string;
  readonly separate: boolean;
  readonly placeholder: string;
  readonly valueType: ValueType<unknown>;
}

/**
 * Static metadata for a subcommand branch.
 */
export interface SubcommandDescriptor {
  readonly kind: 'subcommand';
  readonly path: readonly string[];
  readonly key: string;
  readonly name: string;
  readonly helpText: string;
  readonly command: CommandDescriptor;
}

/**
 * Compiled form of one configuration level.
 */
export interface CommandDescriptor {
  /** Subcommand keys from the top level down; empty at the top. */
  readonly path: readonly string[];
  /** Command-line names of the subcommands leading here. */
  readonly names: readonly string[];
  /** Every leaf field in declaration order. */
  readonly fields: readonly FieldDescriptor[];
  /** Flag-style fields in declaration order. */
  readonly options: readonly FieldDescriptor[];
  /** Positional fields in declaration order. */
  readonly positionals: readonly FieldDescriptor[];
  readonly subcommands: readonly SubcommandDescriptor[];
  readonly longNames: ReadonlyMap<string, FieldDescriptor>;
  readonly shortAliases: ReadonlyMap<string, FieldDescriptor>;
  readonly subcommandNames: ReadonlyMap<string, SubcommandDescriptor>;
}
