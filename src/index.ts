/**
 * argsmith
 *
 * Declarative command-line argument parsing: describe a program's options,
 * positionals and subcommands once, then parse argument lists into typed
 * values with environment and config-file fallbacks.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export {
  boolean,
  buildDescriptors,
  choice,
  command,
  custom,
  flag,
  integer,
  list,
  map,
  number,
  option,
  positional,
  rest,
  ShapeError,
  string,
  subcommand,
  toKebabCase,
  toUpperSnakeCase,
  ValueConversionFailure,
} from './schema/index.js';
export type {
  AnyField,
  BuildOptions,
  CommandDescriptor,
  CommandSpec,
  FieldDescriptor,
  FieldMap,
  ParsedCommand,
  SelectedSubcommand,
  ShapeErrorCode,
  SubcommandDescriptor,
  ValueType,
  ValuesOf,
} from './schema/index.js';

export {
  AmbiguousSubcommandError,
  ArgumentParser,
  ConversionError,
  createParser,
  MissingRequiredError,
  MissingValueError,
  ParseError,
  UnknownFlagError,
} from './parser/index.js';
export type { ParseErrorCode, ParseOutcome, ProgramOptions } from './parser/index.js';

export { formatHelp, formatUsage } from './usage/index.js';
export type { UsageProgram } from './usage/index.js';

export { CommandLine, formatFailure, mustParse } from './cli/index.js';
export type { CommandLineOptions, OutputSink } from './cli/index.js';

export {
  ConfigFileError,
  getDefaultEnv,
  loadConfigFile,
  parseConfigFile,
  splitEnvList,
} from './config/index.js';
export type { ConfigTable, EnvRecord, ParseSources } from './config/index.js';

export { Logger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
