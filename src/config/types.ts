/**
 * Types for the environment and config-file value sources.
 *
 * @packageDocumentation
 */

/**
 * Environment variables by name (matching process.env structure).
 */
export type EnvRecord = Readonly<Record<string, string | undefined>>;

/**
 * A parsed config-file table.
 *
 * Keys at the top level are long names of top-level fields; settings for a
 * subcommand live in a nested table named after the subcommand.
 */
export interface ConfigTable {
  readonly [key: string]: unknown;
}

/**
 * Value sources consulted for fields that no command-line token bound.
 *
 * Precedence: command line > env > config file > defaults
 */
export interface ParseSources {
  /** Environment variables. Nothing is read from the process unless passed here. */
  readonly env?: EnvRecord;
  /** Parsed config file. */
  readonly config?: ConfigTable;
}
