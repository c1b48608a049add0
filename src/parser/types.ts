/**
 * Transient parse state shared by the matcher and the precedence resolver.
 *
 * @packageDocumentation
 */

import type { CommandDescriptor, FieldDescriptor, SubcommandDescriptor } from '../schema/types.js';
import type { Tokenizer } from './tokenizer.js';

/**
 * Destination for one configuration level, mutated field by field.
 */
export interface BoundLevel {
  readonly descriptor: CommandDescriptor;
  /** Field key to current value; pre-populated with defaults. */
  readonly values: Map<string, unknown>;
  /** Index into `descriptor.positionals` of the next slot to fill. */
  nextPositional: number;
  /** The subcommand selected at this level, if any. */
  selected: { readonly subcommand: SubcommandDescriptor; readonly level: BoundLevel } | undefined;
}

/**
 * State of one parse invocation. Created and discarded inside a single parse call.
 */
export interface ParseState {
  readonly tokens: Tokenizer;
  /** Levels from the top down to the currently resolved subcommand. */
  readonly chain: BoundLevel[];
  /** Joined paths of the fields some source has bound; defaults give way on first bind. */
  readonly filled: Set<string>;
}

/**
 * Key under which a field is recorded in {@link ParseState.filled}.
 *
 * @param descriptor - The field.
 */
export function filledKey(descriptor: FieldDescriptor): string {
  return descriptor.path.join('.');
}

/**
 * Subcommand names of the resolved chain, e.g. `['remote', 'add']`.
 *
 * @param state - The parse state.
 */
export function chainNames(state: ParseState): readonly string[] {
  const last = state.chain[state.chain.length - 1];
  return last === undefined ? [] : last.descriptor.names;
}

/**
 * How a field is named in messages: `--name` for flags, the placeholder for positionals.
 *
 * @param descriptor - The field.
 */
export function displayName(descriptor: FieldDescriptor): string {
  return descriptor.longName === undefined ? descriptor.placeholder : `--${descriptor.longName}`;
}
