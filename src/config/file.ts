/**
 * TOML config files as a value source.
 *
 * A config file supplies values for fields that neither the command line
 * nor the environment bound. Top-level keys are long names; subcommand
 * settings are nested tables named after the subcommand:
 *
 * ```toml
 * dataset = "train"
 * workers = 4
 *
 * [commit]
 * message = "wip"
 * ```
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import * as TOML from '@iarna/toml';
import type { ConfigTable } from './types.js';

/**
 * Error class for config file loading and parsing errors.
 */
export class ConfigFileError extends Error {
  /** The original error that caused the failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigFileError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigFileError';
    this.cause = cause;
  }
}

/**
 * Whether a config value is a nested table rather than a scalar or array.
 *
 * @param value - A value read from a config table.
 */
export function isConfigTable(value: unknown): value is ConfigTable {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Parses TOML content into a config table.
 *
 * @param tomlContent - Raw TOML string content.
 * @returns The parsed table.
 * @throws ConfigFileError if the TOML syntax is invalid.
 *
 * @example
 * ```typescript
 * const table = parseConfigFile('dataset = "train"');
 * table.dataset; // 'train'
 * ```
 */
export function parseConfigFile(tomlContent: string): ConfigTable {
  try {
    return TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigFileError(`Invalid TOML syntax: ${cause.message}`, cause);
  }
}

/**
 * Reads and parses a TOML config file.
 *
 * @param filePath - Path to the config file.
 * @param options - `optional: true` returns an empty table when the file does not exist.
 * @returns The parsed table.
 * @throws ConfigFileError if the file cannot be read or is not valid TOML.
 */
export async function loadConfigFile(
  filePath: string,
  options: { readonly optional?: boolean } = {}
): Promise<ConfigTable> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (options.optional === true && isMissingFile(error)) {
      return {};
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigFileError(`Cannot read config file '${filePath}': ${cause.message}`, cause);
  }
  return parseConfigFile(content);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
