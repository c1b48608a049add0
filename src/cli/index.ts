/**
 * Command-line shim and error reporter.
 *
 * @packageDocumentation
 */

export { CommandLine, mustParse } from './command-line.js';
export type { CommandLineOptions, OutputSink } from './command-line.js';
export { formatFailure } from './reporter.js';
