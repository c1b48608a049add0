/**
 * CommandLine: the thin shim between a parser and the process.
 *
 * Output streams, the environment and process termination are injected, so
 * the same code runs under tests with in-memory sinks and a throwing exit.
 *
 * @packageDocumentation
 */

import { getDefaultEnv } from '../config/env.js';
import type { ConfigTable, EnvRecord } from '../config/types.js';
import type { ArgumentParser } from '../parser/parser.js';
import type { FieldMap, ParsedCommand } from '../schema/types.js';
import { formatFailure } from './reporter.js';

/**
 * Anything text can be written to, such as `process.stdout`.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Collaborators of a {@link CommandLine}. Each defaults to the process's own.
 */
export interface CommandLineOptions {
  /** Receives help and version output. */
  readonly stdout?: OutputSink;
  /** Receives failure reports. */
  readonly stderr?: OutputSink;
  /** Ends the program. Must not return. */
  readonly exit?: (code: number) => never;
  /** Environment consulted for fields with an env var. */
  readonly env?: EnvRecord;
  /** Parsed config file consulted after the environment. */
  readonly config?: ConfigTable;
}

function exitProcess(code: number): never {
  process.exit(code);
}

/**
 * Runs a parser against process arguments and turns every outcome other
 * than a parsed value into output plus an exit status.
 *
 * @example
 * ```typescript
 * const cli = new CommandLine(parser);
 * const { values } = cli.mustParse();
 * ```
 */
export class CommandLine<F extends FieldMap> {
  private readonly parser: ArgumentParser<F>;
  private readonly stdout: OutputSink;
  private readonly stderr: OutputSink;
  private readonly exit: (code: number) => never;
  private readonly env: EnvRecord;
  private readonly config: ConfigTable | undefined;

  /**
   * Creates a new CommandLine.
   *
   * @param parser - The parser to run.
   * @param options - Injected collaborators.
   */
  constructor(parser: ArgumentParser<F>, options: CommandLineOptions = {}) {
    this.parser = parser;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.exit = options.exit ?? exitProcess;
    this.env = options.env ?? getDefaultEnv();
    this.config = options.config;
  }

  /**
   * Parses arguments or ends the program.
   *
   * Help is written to stdout with status 0, as is the version; a failure
   * is reported on stderr with status 1.
   *
   * @param args - Raw arguments. Defaults to `process.argv` without the runtime and script.
   * @returns The parsed value.
   */
  mustParse(args: readonly string[] = process.argv.slice(2)): ParsedCommand<F> {
    const outcome = this.parser.parse(args, { env: this.env, config: this.config });

    switch (outcome.kind) {
      case 'parsed':
        return outcome.value;
      case 'help':
        this.stdout.write(this.parser.formatHelp(outcome.chain));
        return this.exit(0);
      case 'version':
        this.stdout.write(`${this.parser.program.version ?? ''}\n`);
        return this.exit(0);
      case 'failed':
        this.stderr.write(formatFailure(this.parser.formatUsage(outcome.chain), outcome.error));
        return this.exit(1);
    }
  }

  /**
   * Reports an error the parser could not detect, such as two options that
   * conflict, and ends the program with status 1.
   *
   * @param message - The error message.
   * @param chain - Subcommand chain whose synopsis to show; the top level by default.
   */
  fail(message: string, chain: readonly string[] = []): never {
    this.stderr.write(formatFailure(this.parser.formatUsage(chain), message));
    return this.exit(1);
  }
}

/**
 * Parses `process.argv` with `process.env`, exiting on help, version or failure.
 *
 * @param parser - The parser to run.
 * @param options - Injected collaborators.
 * @returns The parsed value.
 */
export function mustParse<F extends FieldMap>(
  parser: ArgumentParser<F>,
  options: CommandLineOptions = {}
): ParsedCommand<F> {
  return new CommandLine(parser, options).mustParse();
}
