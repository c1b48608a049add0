/**
 * Declaring configuration shapes and compiling them to descriptors.
 *
 * @packageDocumentation
 */

export { command, flag, list, map, option, positional, rest, subcommand } from './fields.js';
export { boolean, choice, custom, integer, number, string, ValueConversionFailure } from './values.js';
export type { ValueType } from './values.js';
export { buildDescriptors, ShapeError } from './builder.js';
export type { BuildOptions, ShapeErrorCode } from './builder.js';
export { toKebabCase, toUpperSnakeCase } from './naming.js';
export type {
  Presence,
  NamedOptions,
  FlagOptions,
  OptionOptions,
  ListOptions,
  MapOptions,
  PositionalOptions,
  RestOptions,
  SubcommandOptions,
  FlagField,
  OptionField,
  ListField,
  MapField,
  PositionalField,
  RestField,
  SubcommandField,
  AnyField,
  FieldMap,
  CommandSpec,
  FieldValue,
  ValuesOf,
  SelectedSubcommand,
  SelectedBranch,
  ParsedCommand,
  FieldKind,
  Container,
  FieldDescriptor,
  SubcommandDescriptor,
  CommandDescriptor,
} from './types.js';
