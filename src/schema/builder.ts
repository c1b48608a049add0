/**
 * Field Descriptor Builder.
 *
 * Compiles a {@link CommandSpec} into a frozen {@link CommandDescriptor}
 * tree. Declaration order is preserved, so the same shape always yields the
 * same descriptor order. Misconfigured shapes fail here, before any token is
 * read.
 *
 * @packageDocumentation
 */

import { toKebabCase, toUpperSnakeCase } from './naming.js';
import type {
  AnyField,
  CommandDescriptor,
  CommandSpec,
  Container,
  FieldDescriptor,
  FieldKind,
  FieldMap,
  SubcommandDescriptor,
} from './types.js';
import { boolean, type ValueType } from './values.js';

/**
 * Error codes for misconfigured shapes.
 */
export type ShapeErrorCode =
  | 'DUPLICATE_LONG_NAME'
  | 'DUPLICATE_SHORT_ALIAS'
  | 'DUPLICATE_SUBCOMMAND'
  | 'RESERVED_NAME'
  | 'MULTIPLE_REST_POSITIONALS'
  | 'REST_POSITIONAL_NOT_LAST'
  | 'REQUIRED_WITH_DEFAULT'
  | 'INVALID_NAME';

/**
 * A configuration shape that cannot be parsed against.
 *
 * This is a programming error in the shape declaration and is thrown, never
 * returned as a parse failure.
 */
export class ShapeError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ShapeErrorCode;
  /** Path of the offending field or level. */
  public readonly path: readonly string[];

  /**
   * Creates a new ShapeError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param path - Path of the offending field or level.
   */
  constructor(message: string, code: ShapeErrorCode, path: readonly string[]) {
    super(message);
    this.name = 'ShapeError';
    this.code = code;
    this.path = path;
  }
}

/**
 * Options that influence descriptor construction.
 */
export interface BuildOptions {
  /** Prefix for environment variable names derived with `env: true`. */
  readonly envPrefix?: string;
  /** Long names taken by built-in flags, e.g. `help` and `version`. */
  readonly reservedLongNames?: readonly string[];
  /** Short aliases taken by built-in flags, e.g. `h`. */
  readonly reservedShortAliases?: readonly string[];
}

const DEFAULT_RESERVED_LONG = ['help'];
const DEFAULT_RESERVED_SHORT = ['h'];

/**
 * Compiles a configuration shape.
 *
 * @param spec - The top-level configuration shape.
 * @param options - Build options.
 * @returns The descriptor tree for the top level.
 * @throws ShapeError when the shape is misconfigured.
 *
 * @example
 * ```typescript
 * const descriptor = buildDescriptors(command({ verbose: flag({ short: 'v' }) }));
 * descriptor.options[0]?.longName; // "verbose"
 * ```
 */
export function buildDescriptors(spec: CommandSpec, options: BuildOptions = {}): CommandDescriptor {
  return buildLevel(spec.fields, [], [], options);
}

function buildLevel(
  fields: FieldMap,
  path: readonly string[],
  names: readonly string[],
  options: BuildOptions
): CommandDescriptor {
  const reservedLong = options.reservedLongNames ?? DEFAULT_RESERVED_LONG;
  const reservedShort = options.reservedShortAliases ?? DEFAULT_RESERVED_SHORT;

  const leaves: FieldDescriptor[] = [];
  const subcommands: SubcommandDescriptor[] = [];
  const longNames = new Map<string, FieldDescriptor>();
  const shortAliases = new Map<string, FieldDescriptor>();
  const subcommandNames = new Map<string, SubcommandDescriptor>();

  for (const [key, field] of Object.entries(fields)) {
    const fieldPath = [...path, key];

    if (field.kind === 'subcommand') {
      const name = field.options.name ?? toKebabCase(key);
      checkName(name, fieldPath, 'subcommand name');
      if (subcommandNames.has(name)) {
        throw new ShapeError(
          `Subcommand '${name}' is declared more than once at ${describeLevel(names)}`,
          'DUPLICATE_SUBCOMMAND',
          fieldPath
        );
      }
      const descriptor: SubcommandDescriptor = Object.freeze({
        kind: 'subcommand',
        path: Object.freeze(fieldPath),
        key,
        name,
        helpText: field.options.help ?? '',
        command: buildLevel(field.command.fields, fieldPath, [...names, name], options),
      });
      subcommands.push(descriptor);
      subcommandNames.set(name, descriptor);
      continue;
    }

    const descriptor = describeField(key, field, fieldPath, options);
    leaves.push(descriptor);

    if (descriptor.longName !== undefined) {
      if (reservedLong.includes(descriptor.longName)) {
        throw new ShapeError(
          `Field '${fieldPath.join('.')}' uses reserved name --${descriptor.longName}`,
          'RESERVED_NAME',
          fieldPath
        );
      }
      const existing = longNames.get(descriptor.longName);
      if (existing !== undefined) {
        throw new ShapeError(
          `Fields '${existing.path.join('.')}' and '${fieldPath.join('.')}' both use --${descriptor.longName}`,
          'DUPLICATE_LONG_NAME',
          fieldPath
        );
      }
      longNames.set(descriptor.longName, descriptor);
    }

    if (descriptor.shortAlias !== undefined) {
      if (reservedShort.includes(descriptor.shortAlias)) {
        throw new ShapeError(
          `Field '${fieldPath.join('.')}' uses reserved alias -${descriptor.shortAlias}`,
          'RESERVED_NAME',
          fieldPath
        );
      }
      const existing = shortAliases.get(descriptor.shortAlias);
      if (existing !== undefined) {
        throw new ShapeError(
          `Fields '${existing.path.join('.')}' and '${fieldPath.join('.')}' both use -${descriptor.shortAlias}`,
          'DUPLICATE_SHORT_ALIAS',
          fieldPath
        );
      }
      shortAliases.set(descriptor.shortAlias, descriptor);
    }
  }

  const positionals = leaves.filter(isPositional);
  checkPositionalOrder(positionals);

  return Object.freeze({
    path: Object.freeze([...path]),
    names: Object.freeze([...names]),
    fields: Object.freeze(leaves),
    options: Object.freeze(leaves.filter((leaf) => !isPositional(leaf))),
    positionals: Object.freeze(positionals),
    subcommands: Object.freeze(subcommands),
    longNames,
    shortAliases,
    subcommandNames,
  });
}

function isPositional(descriptor: FieldDescriptor): boolean {
  return descriptor.kind === 'positional-scalar' || descriptor.kind === 'positional-multi';
}

function checkPositionalOrder(positionals: readonly FieldDescriptor[]): void {
  const restFields = positionals.filter((field) => field.kind === 'positional-multi');
  const [first, second] = restFields;
  if (first === undefined) {
    return;
  }
  if (second !== undefined) {
    throw new ShapeError(
      `Only one multi-value positional is allowed, found '${first.key}' and '${second.key}'`,
      'MULTIPLE_REST_POSITIONALS',
      second.path
    );
  }
  if (positionals[positionals.length - 1] !== first) {
    throw new ShapeError(
      `Multi-value positional '${first.key}' must be the last positional`,
      'REST_POSITIONAL_NOT_LAST',
      first.path
    );
  }
}

interface LeafShape {
  readonly kind: FieldKind;
  readonly container: Container;
  readonly valueType: ValueType<unknown>;
  readonly flagStyle: boolean;
  readonly long: string | undefined;
  readonly short: string | undefined;
  readonly help: string | undefined;
  readonly env: boolean | string | undefined;
  readonly placeholder: string | undefined;
  readonly required: boolean;
  readonly explicitDefault: unknown;
  readonly implicitDefault: unknown;
  readonly separate: boolean;
}

function leafShape(field: Exclude<AnyField, { kind: 'subcommand' }>): LeafShape {
  switch (field.kind) {
    case 'flag':
      return {
        kind: 'boolean-flag',
        container: 'single',
        valueType: boolean(),
        flagStyle: true,
        long: field.options.long,
        short: field.options.short,
        help: field.options.help,
        env: field.options.env,
        placeholder: undefined,
        required: field.options.required ?? false,
        explicitDefault: field.options.default,
        implicitDefault: false,
        separate: false,
      };
    case 'option':
      return {
        kind: 'scalar',
        container: 'single',
        valueType: field.type,
        flagStyle: true,
        long: field.options.long,
        short: field.options.short,
        help: field.options.help,
        env: field.options.env,
        placeholder: field.options.placeholder,
        required: field.options.required ?? false,
        explicitDefault: field.options.default,
        implicitDefault: undefined,
        separate: false,
      };
    case 'list':
      return {
        kind: 'multi-value',
        container: 'list',
        valueType: field.type,
        flagStyle: true,
        long: field.options.long,
        short: field.options.short,
        help: field.options.help,
        env: field.options.env,
        placeholder: field.options.placeholder,
        required: field.options.required ?? false,
        explicitDefault: field.options.default,
        implicitDefault: [],
        separate: field.options.separate ?? false,
      };
    case 'map':
      return {
        kind: 'multi-value',
        container: 'map',
        valueType: field.type,
        flagStyle: true,
        long: field.options.long,
        short: field.options.short,
        help: field.options.help,
        env: field.options.env,
        placeholder: field.options.placeholder,
        required: field.options.required ?? false,
        explicitDefault: field.options.default,
        implicitDefault: new Map<string, unknown>(),
        separate: field.options.separate ?? false,
      };
    case 'positional':
      return {
        kind: 'positional-scalar',
        container: 'single',
        valueType: field.type,
        flagStyle: false,
        long: undefined,
        short: undefined,
        help: field.options.help,
        env: field.options.env,
        placeholder: field.options.placeholder,
        // Unfilled positionals fail unless a default stands in.
        required: field.options.required === true || field.options.default === undefined,
        explicitDefault: field.options.default,
        implicitDefault: undefined,
        separate: false,
      };
    case 'rest':
      return {
        kind: 'positional-multi',
        container: 'list',
        valueType: field.type,
        flagStyle: false,
        long: undefined,
        short: undefined,
        help: field.options.help,
        env: field.options.env,
        placeholder: field.options.placeholder,
        required: field.options.required ?? false,
        explicitDefault: field.options.default,
        implicitDefault: [],
        separate: false,
      };
  }
}

function describeField(
  key: string,
  field: Exclude<AnyField, { kind: 'subcommand' }>,
  path: readonly string[],
  options: BuildOptions
): FieldDescriptor {
  const shape = leafShape(field);
  const hasDefault = shape.explicitDefault !== undefined;

  if (shape.required && hasDefault) {
    throw new ShapeError(
      `Field '${path.join('.')}' cannot be both required and have a default`,
      'REQUIRED_WITH_DEFAULT',
      path
    );
  }

  const kebab = toKebabCase(key);
  const longName = shape.flagStyle ? (shape.long ?? kebab) : undefined;
  if (longName !== undefined) {
    checkName(longName, path, 'long name');
  }

  if (shape.short !== undefined && !/^[^-=\s]$/.test(shape.short)) {
    throw new ShapeError(
      `Field '${path.join('.')}' has invalid short alias '${shape.short}': expected one character`,
      'INVALID_NAME',
      path
    );
  }

  const placeholder = shape.placeholder ?? toUpperSnakeCase(longName ?? key);
  if (placeholder === '') {
    throw new ShapeError(`Field '${path.join('.')}' has an empty placeholder`, 'INVALID_NAME', path);
  }

  let envVar: string | undefined;
  if (shape.env === true) {
    envVar = `${options.envPrefix ?? ''}${toUpperSnakeCase(key)}`;
  } else if (typeof shape.env === 'string') {
    if (shape.env === '') {
      throw new ShapeError(
        `Field '${path.join('.')}' has an empty environment variable name`,
        'INVALID_NAME',
        path
      );
    }
    envVar = shape.env;
  }

  return Object.freeze({
    path: Object.freeze([...path]),
    key,
    kind: shape.kind,
    container: shape.container,
    longName,
    shortAlias: shape.short,
    required: shape.required,
    hasDefault,
    defaultValue: hasDefault ? shape.explicitDefault : shape.implicitDefault,
    envVar,
    configKey: longName ?? kebab,
    helpText: shape.help ?? '',
    separate: shape.separate,
    placeholder,
    valueType: shape.valueType,
  });
}

function checkName(name: string, path: readonly string[], what: string): void {
  if (name === '' || name.startsWith('-') || /[=\s]/.test(name)) {
    throw new ShapeError(`Field '${path.join('.')}' has invalid ${what} '${name}'`, 'INVALID_NAME', path);
  }
}

function describeLevel(names: readonly string[]): string {
  return names.length === 0 ? 'the top level' : `'${names.join(' ')}'`;
}
