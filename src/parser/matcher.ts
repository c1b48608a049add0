/**
 * Matcher/Binder: the parse state machine.
 *
 * Consumes classified tokens left to right, binds them to the descriptors
 * of the resolved level chain, and descends into subcommands as their
 * names appear. States move from `at-top-level` through `in-subcommand`
 * to `done` or `failed`; a help or version request stops the machine
 * where it stands.
 *
 * @packageDocumentation
 */

import type { CommandDescriptor, FieldDescriptor, SubcommandDescriptor } from '../schema/types.js';
import { closestMatch } from '../utils/similarity.js';
import type { Logger } from '../utils/logger.js';
import { bindLiterals, bindValue, convert, createLevel } from './binding.js';
import {
  AmbiguousSubcommandError,
  MissingValueError,
  ParseError,
  UnknownFlagError,
} from './errors.js';
import {
  Tokenizer,
  type LongFlagToken,
  type PositionalToken,
  type ShortFlagToken,
} from './tokenizer.js';
import { chainNames, type BoundLevel, type ParseState } from './types.js';

/**
 * Options for a matcher run.
 */
export interface MatcherOptions {
  /** Whether `--version` is a built-in flag. */
  readonly versionFlag: boolean;
  readonly logger: Logger;
}

/**
 * How a matcher run ended.
 */
export type MatchOutcome =
  | { readonly kind: 'matched'; readonly state: ParseState }
  | { readonly kind: 'help'; readonly chain: readonly string[] }
  | { readonly kind: 'version'; readonly chain: readonly string[] }
  | { readonly kind: 'failed'; readonly error: ParseError; readonly chain: readonly string[] };

interface Located {
  readonly level: BoundLevel;
  readonly field: FieldDescriptor;
}

type Interrupt = 'help' | 'version' | undefined;

/**
 * Runs the state machine over one argument list.
 *
 * @param root - Descriptor of the top level.
 * @param args - Raw arguments, excluding the program name.
 * @param options - Matcher options.
 * @returns The final state, a help/version request, or the failure.
 */
export function match(
  root: CommandDescriptor,
  args: readonly string[],
  options: MatcherOptions
): MatchOutcome {
  const state: ParseState = {
    tokens: new Tokenizer(args),
    chain: [createLevel(root)],
    filled: new Set<string>(),
  };
  const matcher = new Matcher(state, options);

  try {
    const interrupt = matcher.run();
    if (interrupt === 'help') {
      return { kind: 'help', chain: chainNames(state) };
    }
    if (interrupt === 'version') {
      return { kind: 'version', chain: chainNames(state) };
    }
  } catch (error) {
    if (error instanceof ParseError) {
      return { kind: 'failed', error, chain: chainNames(state) };
    }
    throw error;
  }

  return { kind: 'matched', state };
}

class Matcher {
  private readonly state: ParseState;
  private readonly options: MatcherOptions;

  constructor(state: ParseState, options: MatcherOptions) {
    this.state = state;
    this.options = options;
  }

  run(): Interrupt {
    for (let token = this.state.tokens.next(); token !== undefined; token = this.state.tokens.next()) {
      switch (token.kind) {
        case 'terminator':
          break;
        case 'positional':
          this.positional(token);
          break;
        case 'long': {
          const interrupt = this.longFlag(token);
          if (interrupt !== undefined) {
            return interrupt;
          }
          break;
        }
        case 'short': {
          const interrupt = this.shortFlag(token);
          if (interrupt !== undefined) {
            return interrupt;
          }
          break;
        }
      }
    }
    return undefined;
  }

  private get current(): BoundLevel {
    const level = this.state.chain[this.state.chain.length - 1];
    if (level === undefined) {
      throw new Error('Parse state has no resolved level');
    }
    return level;
  }

  private longFlag(token: LongFlagToken): Interrupt {
    if (token.name === 'help') {
      return 'help';
    }
    if (token.name === 'version' && this.options.versionFlag) {
      return 'version';
    }

    const found = this.findLong(token.name);
    if (found === undefined) {
      throw new UnknownFlagError(token.raw, this.suggestLong(token.name));
    }
    this.bindFlag(found, `--${token.name}`, token.inlineValue);
    return undefined;
  }

  private shortFlag(token: ShortFlagToken): Interrupt {
    if (token.name === 'h') {
      return 'help';
    }

    const found = this.findShort(token.name);
    if (found === undefined) {
      throw new UnknownFlagError(`-${token.name}`);
    }

    const label = `-${token.name}`;
    if (found.field.kind === 'boolean-flag' && !token.inlineValue) {
      this.bindFlag(found, label, undefined);
      if (token.attached !== undefined) {
        this.state.tokens.continueBundle(token.attached, token.raw);
      }
      return undefined;
    }

    // A value-taking flag consumes the rest of its bundle as the value.
    this.bindFlag(found, label, token.attached);
    return undefined;
  }

  private bindFlag(found: Located, label: string, inline: string | undefined): void {
    const { level, field } = found;
    const tokens = this.state.tokens;

    switch (field.kind) {
      case 'boolean-flag': {
        const value = inline === undefined ? true : convert(field, inline, label);
        bindValue(this.state, level, field, value);
        break;
      }
      case 'scalar': {
        const literal = inline ?? tokens.takeValue();
        if (literal === undefined) {
          throw new MissingValueError(label);
        }
        bindLiterals(this.state, level, field, [literal], label, false);
        break;
      }
      case 'multi-value': {
        const literals: string[] = [];
        if (inline !== undefined) {
          literals.push(inline);
        } else if (field.separate) {
          const literal = tokens.takeValue();
          if (literal === undefined) {
            throw new MissingValueError(label);
          }
          literals.push(literal);
        } else {
          for (let literal = tokens.takeValue(); literal !== undefined; literal = tokens.takeValue()) {
            literals.push(literal);
          }
        }
        bindLiterals(this.state, level, field, literals, label, field.separate);
        break;
      }
      case 'positional-scalar':
      case 'positional-multi':
        throw new Error(`Positional field '${field.key}' cannot be bound as a flag`);
    }

    this.options.logger.debug('token_bound', { field: field.path.join('.'), source: label });
  }

  private positional(token: PositionalToken): void {
    const level = this.current;
    const positionals = level.descriptor.positionals;
    const slot = positionals[level.nextPositional];

    if (slot !== undefined && slot.kind === 'positional-scalar') {
      bindLiterals(this.state, level, slot, [token.text], slot.placeholder, false);
      level.nextPositional++;
      this.options.logger.debug('token_bound', { field: slot.path.join('.'), source: 'positional' });
      return;
    }

    const subcommand = token.afterTerminator
      ? undefined
      : level.descriptor.subcommandNames.get(token.text);
    if (subcommand !== undefined) {
      this.select(level, subcommand);
      return;
    }

    if (slot !== undefined) {
      bindLiterals(this.state, level, slot, [token.text], slot.placeholder, true);
      this.options.logger.debug('token_bound', { field: slot.path.join('.'), source: 'positional' });
      return;
    }

    const hasSubcommands = level.descriptor.subcommands.length > 0;
    throw new AmbiguousSubcommandError(
      token.text,
      hasSubcommands,
      hasSubcommands ? closestMatch(token.text, level.descriptor.subcommandNames.keys()) : undefined
    );
  }

  private select(parent: BoundLevel, subcommand: SubcommandDescriptor): void {
    const level = createLevel(subcommand.command);
    parent.selected = { subcommand, level };
    this.state.chain.push(level);
    this.options.logger.debug('subcommand_selected', { chain: subcommand.command.names.join(' ') });
  }

  /** Searches the resolved chain from the deepest level up; sibling branches are never in scope. */
  private findLong(name: string): Located | undefined {
    for (let i = this.state.chain.length - 1; i >= 0; i--) {
      const level = this.state.chain[i];
      const field = level?.descriptor.longNames.get(name);
      if (level !== undefined && field !== undefined) {
        return { level, field };
      }
    }
    return undefined;
  }

  private findShort(name: string): Located | undefined {
    for (let i = this.state.chain.length - 1; i >= 0; i--) {
      const level = this.state.chain[i];
      const field = level?.descriptor.shortAliases.get(name);
      if (level !== undefined && field !== undefined) {
        return { level, field };
      }
    }
    return undefined;
  }

  private suggestLong(name: string): string | undefined {
    const candidates: string[] = [];
    for (const level of this.state.chain) {
      candidates.push(...level.descriptor.longNames.keys());
    }
    candidates.push('help');
    const match = closestMatch(name, candidates);
    return match === undefined ? undefined : `--${match}`;
  }
}
