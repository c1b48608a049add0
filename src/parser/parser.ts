/**
 * ArgumentParser: the library entry point.
 *
 * Builds the descriptor tree once, then runs tokenizer, matcher and
 * precedence resolver over each argument list it is given. Runtime failures
 * are returned inside the outcome; only shape errors are thrown.
 *
 * @packageDocumentation
 */

import type { ParseSources } from '../config/types.js';
import { buildDescriptors } from '../schema/builder.js';
import type { CommandDescriptor, CommandSpec, FieldMap, ParsedCommand } from '../schema/types.js';
import { formatHelp, formatUsage, resolveLevels, type UsageProgram } from '../usage/formatter.js';
import { Logger } from '../utils/logger.js';
import { ParseError } from './errors.js';
import { match } from './matcher.js';
import { resolve } from './precedence.js';
import { chainNames, type BoundLevel } from './types.js';

/**
 * Program-wide settings.
 */
export interface ProgramOptions extends UsageProgram {
  /** Prefix for environment variable names derived with `env: true`. */
  readonly envPrefix?: string;
  /** Receives parse events. Defaults to a stderr logger. */
  readonly logger?: Logger;
  /**
   * Enables debug events on the default logger.
   * @defaultValue false
   */
  readonly debug?: boolean;
}

/**
 * Result of one parse.
 */
export type ParseOutcome<F extends FieldMap> =
  | { readonly kind: 'parsed'; readonly value: ParsedCommand<F>; readonly chain: readonly string[] }
  | { readonly kind: 'help'; readonly chain: readonly string[] }
  | { readonly kind: 'version'; readonly chain: readonly string[] }
  | { readonly kind: 'failed'; readonly error: ParseError; readonly chain: readonly string[] };

/**
 * Parses argument lists against one configuration shape.
 *
 * @example
 * ```typescript
 * const parser = createParser(
 *   command({ verbose: flag({ short: 'v' }), input: positional(string()) }),
 *   { name: 'example' }
 * );
 * const outcome = parser.parse(['-v', 'in.txt']);
 * if (outcome.kind === 'parsed') {
 *   outcome.value.values.input; // 'in.txt'
 * }
 * ```
 */
export class ArgumentParser<F extends FieldMap> {
  /** Program metadata. */
  public readonly program: ProgramOptions;
  /** Compiled descriptor tree, built once per parser. */
  public readonly descriptors: CommandDescriptor;
  private readonly matcherLogger: Logger;
  private readonly resolverLogger: Logger;

  /**
   * Creates a new ArgumentParser.
   *
   * @param spec - The configuration shape.
   * @param program - Program-wide settings.
   * @throws ShapeError when the shape is inconsistent.
   */
  constructor(spec: CommandSpec<F>, program: ProgramOptions) {
    this.program = program;
    const logger =
      program.logger ?? new Logger({ component: 'ArgumentParser', debugMode: program.debug ?? false });
    this.matcherLogger = logger.child('Matcher');
    this.resolverLogger = logger.child('PrecedenceResolver');
    this.descriptors = buildDescriptors(spec, {
      envPrefix: program.envPrefix,
      reservedLongNames: program.version !== undefined ? ['help', 'version'] : ['help'],
      reservedShortAliases: ['h'],
    });
  }

  /**
   * Parses one argument list.
   *
   * @param args - Raw arguments, excluding the program name.
   * @param sources - Environment and config file. Nothing is read from the process.
   * @returns The parsed value, a help or version request, or the failure.
   */
  parse(args: readonly string[], sources: ParseSources = {}): ParseOutcome<F> {
    const outcome = match(this.descriptors, args, {
      versionFlag: this.program.version !== undefined,
      logger: this.matcherLogger,
    });

    switch (outcome.kind) {
      case 'help':
        return { kind: 'help', chain: outcome.chain };
      case 'version':
        return { kind: 'version', chain: outcome.chain };
      case 'failed':
        return { kind: 'failed', error: outcome.error, chain: outcome.chain };
      case 'matched':
        break;
    }

    const { state } = outcome;
    const chain = chainNames(state);
    try {
      resolve(state, sources, this.resolverLogger);
    } catch (error) {
      if (error instanceof ParseError) {
        return { kind: 'failed', error, chain };
      }
      throw error;
    }

    const root = state.chain[0];
    if (root === undefined) {
      throw new Error('Parse state has no resolved level');
    }
    // The descriptor tree was built from F, so the materialized tree has its shape.
    const tree: unknown = materialize(root);
    const value = tree as ParsedCommand<F>;
    return { kind: 'parsed', value, chain };
  }

  /**
   * Renders the synopsis for a subcommand chain.
   *
   * @param chain - Subcommand names; empty for the top level.
   */
  formatUsage(chain: readonly string[] = []): string {
    return formatUsage(this.program, this.descriptors, chain);
  }

  /**
   * Renders full help for a subcommand chain.
   *
   * @param chain - Subcommand names; empty for the top level.
   */
  formatHelp(chain: readonly string[] = []): string {
    return formatHelp(this.program, this.descriptors, chain);
  }

  /**
   * Resolves a chain of subcommand names to its descriptors.
   *
   * @param chain - Subcommand names.
   * @returns Levels from the top down.
   * @throws Error when a name does not match a subcommand.
   */
  resolveChain(chain: readonly string[]): CommandDescriptor[] {
    return resolveLevels(this.descriptors, chain);
  }
}

interface MaterializedLevel {
  readonly values: Record<string, unknown>;
  readonly subcommand: (MaterializedLevel & { readonly name: string }) | undefined;
}

/**
 * Converts a bound level into `{ values, subcommand }`, recursing into the
 * selected branch.
 */
function materialize(level: BoundLevel): MaterializedLevel {
  const values = Object.fromEntries(level.values);
  const { selected } = level;
  if (selected === undefined) {
    return { values, subcommand: undefined };
  }
  return { values, subcommand: { name: selected.subcommand.key, ...materialize(selected.level) } };
}

/**
 * Creates a parser for a configuration shape.
 *
 * @param spec - The configuration shape.
 * @param program - Program-wide settings.
 * @throws ShapeError when the shape is inconsistent.
 */
export function createParser<F extends FieldMap>(
  spec: CommandSpec<F>,
  program: ProgramOptions
): ArgumentParser<F> {
  return new ArgumentParser(spec, program);
}
