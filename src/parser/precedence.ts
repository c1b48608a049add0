/**
 * Precedence Resolver.
 *
 * Runs after the matcher. Fields no command-line token bound are filled
 * from the environment, then from the config file; whatever is left keeps
 * the default the destination was created with. Required fields are checked
 * last, over the whole resolved chain.
 *
 * Override precedence: command line > env > config file > defaults
 *
 * @packageDocumentation
 */

import { splitEnvList } from '../config/env.js';
import { isConfigTable } from '../config/file.js';
import type { ConfigTable, ParseSources } from '../config/types.js';
import type { FieldDescriptor } from '../schema/types.js';
import type { Logger } from '../utils/logger.js';
import { bindLiterals } from './binding.js';
import { ConversionError, MissingRequiredError } from './errors.js';
import { displayName, filledKey, type BoundLevel, type ParseState } from './types.js';

/**
 * Applies env and config values, then checks required fields.
 *
 * @param state - State left by a successful matcher run.
 * @param sources - Environment and config file.
 * @param logger - Receives `env_applied`, `config_applied` and `config_key_unknown`.
 * @throws ConversionError when an env or config value does not convert.
 * @throws MissingRequiredError for the first required field no source supplied.
 */
export function resolve(state: ParseState, sources: ParseSources, logger: Logger): void {
  const env = sources.env ?? {};

  for (const level of state.chain) {
    const table = configTableFor(sources.config, level);
    if (table !== undefined) {
      warnUnknownKeys(level, table, logger);
    }

    for (const field of level.descriptor.fields) {
      if (state.filled.has(filledKey(field))) {
        continue;
      }

      const envValue = field.envVar === undefined ? undefined : env[field.envVar];
      if (field.envVar !== undefined && envValue !== undefined) {
        const literals = field.container === 'single' ? [envValue] : splitEnvList(envValue);
        bindLiterals(state, level, field, literals, `environment variable ${field.envVar}`, false);
        logger.debug('env_applied', { field: filledKey(field), variable: field.envVar });
        continue;
      }

      const configValue = table?.[field.configKey];
      if (configValue !== undefined) {
        const key = [...level.descriptor.names, field.configKey].join('.');
        const argument = `config key "${key}"`;
        bindLiterals(state, level, field, configLiterals(field, configValue, argument), argument, false);
        logger.debug('config_applied', { field: filledKey(field), key });
      }
    }
  }

  for (const level of state.chain) {
    for (const field of level.descriptor.fields) {
      if (field.required && !state.filled.has(filledKey(field))) {
        throw new MissingRequiredError(displayName(field), field.envVar);
      }
    }
  }
}

/**
 * The nested table for a level: the root table, then one table per subcommand name.
 */
function configTableFor(config: ConfigTable | undefined, level: BoundLevel): ConfigTable | undefined {
  let table = config;
  for (const name of level.descriptor.names) {
    const nested = table?.[name];
    table = isConfigTable(nested) ? nested : undefined;
  }
  return table;
}

function warnUnknownKeys(level: BoundLevel, table: ConfigTable, logger: Logger): void {
  const { descriptor } = level;
  const known = new Set<string>(descriptor.fields.map((field) => field.configKey));
  for (const name of descriptor.subcommandNames.keys()) {
    known.add(name);
  }
  for (const key of Object.keys(table)) {
    if (!known.has(key)) {
      logger.warn('config_key_unknown', { key: [...descriptor.names, key].join('.') });
    }
  }
}

/**
 * Renders a config value as the literals the command line would have supplied.
 */
function configLiterals(field: FieldDescriptor, value: unknown, argument: string): string[] {
  switch (field.container) {
    case 'single':
      return [scalarLiteral(field, value, argument)];
    case 'list':
      return Array.isArray(value)
        ? value.map((item: unknown) => scalarLiteral(field, item, argument))
        : [scalarLiteral(field, value, argument)];
    case 'map': {
      if (!isConfigTable(value)) {
        throw new ConversionError(argument, describe(value), field.valueType.name, 'expected a table of key = value entries');
      }
      return Object.entries(value).map(
        ([entryKey, entryValue]) => `${entryKey}=${scalarLiteral(field, entryValue, argument)}`
      );
    }
  }
}

function scalarLiteral(field: FieldDescriptor, value: unknown, argument: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  throw new ConversionError(argument, describe(value), field.valueType.name, 'expected a single value');
}

function describe(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value === null ? 'null' : typeof value;
}
