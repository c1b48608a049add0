/**
 * Usage/Help Formatter.
 *
 * Renders the synopsis and help body from the same descriptor tree the
 * matcher consumes, so the text always describes what the parser accepts.
 *
 * @packageDocumentation
 */

import type { CommandDescriptor, FieldDescriptor } from '../schema/types.js';

/**
 * Program metadata shown in usage and help text.
 */
export interface UsageProgram {
  /** Program name as shown in the synopsis. */
  readonly name: string;
  /** Shown above the synopsis in help output. */
  readonly description?: string;
  /** Shown after every help section. */
  readonly epilogue?: string;
  /** When set, help lists the built-in `--version` flag. */
  readonly version?: string;
}

/** Help text starts at this column; longer entries put it on the next line. */
const HELP_COLUMN = 25;
const INDENT = '  ';
const GAP = 2;

interface Entry {
  readonly left: string;
  readonly help: string;
}

/**
 * Resolves a chain of subcommand names to the levels it passes through.
 *
 * @param root - Top-level descriptor.
 * @param chain - Subcommand names, e.g. `['remote', 'add']`.
 * @returns Levels from the top down; the last is the level the chain names.
 * @throws Error when a name is not a subcommand of the level before it.
 */
export function resolveLevels(root: CommandDescriptor, chain: readonly string[]): CommandDescriptor[] {
  const levels = [root];
  let current = root;
  for (const name of chain) {
    const next = current.subcommandNames.get(name);
    if (next === undefined) {
      throw new Error(`Unknown subcommand '${name}' in chain '${chain.join(' ')}'`);
    }
    current = next.command;
    levels.push(current);
  }
  return levels;
}

/**
 * Renders the one-line synopsis for a level.
 *
 * @param program - Program metadata.
 * @param root - Top-level descriptor.
 * @param chain - Subcommand names leading to the level.
 * @returns The synopsis, without a trailing newline.
 *
 * @example
 * ```typescript
 * formatUsage({ name: 'example' }, root, []);
 * // 'Usage: example [--verbose] [--dataset DATASET] INPUT [OUTPUT [OUTPUT ...]]'
 * ```
 */
export function formatUsage(
  program: UsageProgram,
  root: CommandDescriptor,
  chain: readonly string[]
): string {
  const levels = resolveLevels(root, chain);
  const level = levels[levels.length - 1] ?? root;

  const parts = ['Usage:', program.name, ...chain];
  for (const field of level.options) {
    parts.push(synopsisOption(field));
  }
  for (const field of level.positionals) {
    parts.push(synopsisPositional(field));
  }
  return parts.join(' ');
}

/**
 * Renders the full help text for a level, ending in a newline.
 *
 * Sections: description, synopsis, `Positional arguments:`, `Options:`
 * (closed by `--help` and `--version`), `Commands:`, then the epilogue.
 *
 * @param program - Program metadata.
 * @param root - Top-level descriptor.
 * @param chain - Subcommand names leading to the level.
 */
export function formatHelp(
  program: UsageProgram,
  root: CommandDescriptor,
  chain: readonly string[]
): string {
  const levels = resolveLevels(root, chain);
  const level = levels[levels.length - 1] ?? root;

  const positionals = level.positionals.map(
    (field): Entry => ({ left: field.placeholder, help: fieldHelp(field) })
  );
  const options = level.options.map(
    (field): Entry => ({ left: optionEntry(field), help: fieldHelp(field) })
  );
  options.push({ left: '--help, -h', help: 'display this help and exit' });
  if (program.version !== undefined) {
    options.push({ left: '--version', help: 'display version and exit' });
  }
  const commands = level.subcommands.map(
    (subcommand): Entry => ({ left: subcommand.name, help: subcommand.helpText })
  );

  const blocks: string[] = [];

  if (program.description !== undefined) {
    blocks.push(program.description);
  }
  blocks.push(formatUsage(program, root, chain));
  if (positionals.length > 0) {
    blocks.push(section('Positional arguments:', positionals));
  }
  blocks.push(section('Options:', options));
  if (commands.length > 0) {
    blocks.push(section('Commands:', commands));
  }
  if (program.epilogue !== undefined) {
    blocks.push(program.epilogue);
  }

  return blocks.join('\n\n') + '\n';
}

function synopsisOption(field: FieldDescriptor): string {
  const long = `--${field.longName ?? field.key}`;
  let text: string;
  if (field.kind === 'boolean-flag') {
    text = long;
  } else if (field.kind === 'multi-value' && !field.separate) {
    text = `${long} ${field.placeholder} [${field.placeholder} ...]`;
  } else {
    text = `${long} ${field.placeholder}`;
  }
  return field.required ? text : `[${text}]`;
}

function synopsisPositional(field: FieldDescriptor): string {
  if (field.kind === 'positional-multi') {
    const repeated = `${field.placeholder} [${field.placeholder} ...]`;
    return field.required ? repeated : `[${repeated}]`;
  }
  return field.required ? field.placeholder : `[${field.placeholder}]`;
}

/**
 * `--long VALUE, -s VALUE`, or `--long, -s` for boolean flags.
 */
function optionEntry(field: FieldDescriptor): string {
  const value = field.kind === 'boolean-flag' ? '' : ` ${field.placeholder}`;
  const names = [`--${field.longName ?? field.key}${value}`];
  if (field.shortAlias !== undefined) {
    names.push(`-${field.shortAlias}${value}`);
  }
  return names.join(', ');
}

function fieldHelp(field: FieldDescriptor): string {
  const parts = field.helpText === '' ? [] : [field.helpText];
  const defaultText = formatDefault(field);
  if (defaultText !== undefined) {
    parts.push(`[default: ${defaultText}]`);
  }
  if (field.envVar !== undefined) {
    parts.push(`[env: ${field.envVar}]`);
  }
  return parts.join(' ');
}

/**
 * Renders a default worth showing; `false` flags, empty containers and
 * absent values are not.
 */
function formatDefault(field: FieldDescriptor): string | undefined {
  const value = field.defaultValue;
  if (!field.hasDefault || value === undefined) {
    return undefined;
  }
  if (field.kind === 'boolean-flag' && value === false) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.length === 0
      ? undefined
      : value.map((item: unknown) => field.valueType.format(item)).join(', ');
  }
  if (value instanceof Map) {
    if (value.size === 0) {
      return undefined;
    }
    const entries: string[] = [];
    for (const [key, item] of value) {
      entries.push(`${String(key)}=${field.valueType.format(item)}`);
    }
    return entries.join(', ');
  }
  return field.valueType.format(value);
}

function section(title: string, entries: readonly Entry[]): string {
  const lines = [title];
  for (const entry of entries) {
    const left = INDENT + entry.left;
    if (entry.help === '') {
      lines.push(left);
    } else if (left.length + GAP <= HELP_COLUMN) {
      lines.push(left.padEnd(HELP_COLUMN) + entry.help);
    } else {
      lines.push(left, ' '.repeat(HELP_COLUMN) + entry.help);
    }
  }
  return lines.join('\n');
}
