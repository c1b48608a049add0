/**
 * Value sources besides the command line: environment variables and TOML
 * config files.
 *
 * Override precedence: command line > env > config file > defaults
 *
 * @packageDocumentation
 */

export type { ConfigTable, EnvRecord, ParseSources } from './types.js';
export { getDefaultEnv, splitEnvList } from './env.js';
export { ConfigFileError, isConfigTable, loadConfigFile, parseConfigFile } from './file.js';
