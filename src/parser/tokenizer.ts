/**
 * Tokenizer/Classifier.
 *
 * Classifies raw arguments lazily, one at a time, so the matcher can pull
 * value tokens for the flag it is currently binding. Whether a flag name is
 * known is not decided here.
 *
 * @packageDocumentation
 */

/**
 * `--name` or `--name=value`.
 */
export interface LongFlagToken {
  readonly kind: 'long';
  readonly name: string;
  readonly inlineValue: string | undefined;
  readonly raw: string;
}

/**
 * `-n`, `-n=value`, or the head of a bundle such as `-vx` or `-O5`.
 *
 * `attached` holds the rest of the bundle. When `inlineValue` is true the
 * rest followed an `=` and can only be a value.
 */
export interface ShortFlagToken {
  readonly kind: 'short';
  readonly name: string;
  readonly attached: string | undefined;
  readonly inlineValue: boolean;
  readonly raw: string;
}

/**
 * Anything that is not a flag, including a lone `-`.
 */
export interface PositionalToken {
  readonly kind: 'positional';
  readonly text: string;
  /** True for tokens after `--`, which never select a subcommand. */
  readonly afterTerminator: boolean;
}

/**
 * A literal `--`.
 */
export interface TerminatorToken {
  readonly kind: 'terminator';
}

/**
 * A classified token.
 */
export type Token = LongFlagToken | ShortFlagToken | PositionalToken | TerminatorToken;

/**
 * Whether a raw argument is written as a flag.
 *
 * @param arg - A raw argument.
 */
export function looksLikeFlag(arg: string): boolean {
  return arg.length > 1 && arg.startsWith('-');
}

/**
 * Classifies a single raw argument that is not past a terminator.
 *
 * @param arg - A raw argument.
 * @returns The classified token.
 */
export function classify(arg: string): Token {
  if (arg === '--') {
    return { kind: 'terminator' };
  }
  if (arg.startsWith('--')) {
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    return eq === -1
      ? { kind: 'long', name: body, inlineValue: undefined, raw: arg }
      : { kind: 'long', name: body.slice(0, eq), inlineValue: body.slice(eq + 1), raw: arg };
  }
  if (looksLikeFlag(arg)) {
    return shortToken(arg.slice(1), arg);
  }
  return { kind: 'positional', text: arg, afterTerminator: false };
}

function shortToken(letters: string, raw: string): ShortFlagToken {
  const name = letters.charAt(0);
  const remainder = letters.slice(1);
  if (remainder.startsWith('=')) {
    return { kind: 'short', name, attached: remainder.slice(1), inlineValue: true, raw };
  }
  return {
    kind: 'short',
    name,
    attached: remainder === '' ? undefined : remainder,
    inlineValue: false,
    raw,
  };
}

/**
 * Lazy cursor over the raw argument list.
 *
 * @example
 * ```typescript
 * const tokens = new Tokenizer(['-vx', '--out=file', '--', '-n']);
 * tokens.next(); // { kind: 'short', name: 'v', attached: 'x', ... }
 * ```
 */
export class Tokenizer {
  private readonly args: readonly string[];
  private cursor = 0;
  private terminated = false;
  private pending: ShortFlagToken | undefined;

  /**
   * @param args - Raw arguments, excluding the program name.
   */
  constructor(args: readonly string[]) {
    this.args = args;
  }

  /** Whether a `--` has been consumed. */
  get afterTerminator(): boolean {
    return this.terminated;
  }

  /**
   * Returns the next classified token, or undefined at the end of input.
   */
  next(): Token | undefined {
    if (this.pending !== undefined) {
      const token = this.pending;
      this.pending = undefined;
      return token;
    }

    const arg = this.args[this.cursor];
    if (arg === undefined) {
      return undefined;
    }
    this.cursor++;

    if (this.terminated) {
      return { kind: 'positional', text: arg, afterTerminator: true };
    }

    const token = classify(arg);
    if (token.kind === 'terminator') {
      this.terminated = true;
    }
    return token;
  }

  /**
   * Queues the remaining letters of a short-flag bundle as the next token.
   *
   * @param letters - Letters after the flag that was just bound.
   * @param raw - The bundle as written, for error messages.
   */
  continueBundle(letters: string, raw: string): void {
    this.pending = shortToken(letters, raw);
  }

  /**
   * Whether the next raw argument can be taken as a value.
   */
  hasValue(): boolean {
    if (this.pending !== undefined) {
      return false;
    }
    const arg = this.args[this.cursor];
    if (arg === undefined) {
      return false;
    }
    return this.terminated || (arg !== '--' && !looksLikeFlag(arg));
  }

  /**
   * Consumes the next raw argument as a value.
   *
   * @returns The value, or undefined when the next argument is a flag, `--`, or absent.
   */
  takeValue(): string | undefined {
    if (!this.hasValue()) {
      return undefined;
    }
    const arg = this.args[this.cursor];
    this.cursor++;
    return arg;
  }
}
