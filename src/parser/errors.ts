/**
 * Runtime parse failures.
 *
 * Each failure is returned to library callers inside a failed outcome and
 * rendered by the command-line shim as the usage line plus
 * `error: <message>`.
 *
 * @packageDocumentation
 */

/**
 * Error codes for parse failures.
 */
export type ParseErrorCode =
  | 'UNKNOWN_FLAG'
  | 'CONVERSION'
  | 'MISSING_REQUIRED'
  | 'MISSING_VALUE'
  | 'AMBIGUOUS_SUBCOMMAND';

/**
 * Base class for every user-facing parse failure.
 */
export abstract class ParseError extends Error {
  /** The error code for programmatic handling. */
  public abstract readonly code: ParseErrorCode;
}

/**
 * A flag that matches no option in scope.
 */
export class UnknownFlagError extends ParseError {
  public override readonly code = 'UNKNOWN_FLAG';
  /** The offending token as written, e.g. `--verbos` or `-x`. */
  public readonly token: string;
  /** A close in-scope flag, rendered as a hint. */
  public readonly suggestion: string | undefined;

  /**
   * Creates a new UnknownFlagError.
   *
   * @param token - The offending token as written.
   * @param suggestion - A close in-scope flag, if any.
   */
  constructor(token: string, suggestion?: string) {
    const hint = suggestion === undefined ? '' : ` (did you mean ${suggestion}?)`;
    super(`unknown argument ${token}${hint}`);
    this.name = 'UnknownFlagError';
    this.token = token;
    this.suggestion = suggestion;
  }
}

/**
 * A literal that could not be converted to its field's type.
 */
export class ConversionError extends ParseError {
  public override readonly code = 'CONVERSION';
  /**
   * What the literal was bound through: `--optimize`, `INPUT`,
   * `environment variable OPTIMIZE` or `config key "optimize"`.
   */
  public readonly argument: string;
  /** The literal that failed to convert. */
  public readonly literal: string;
  /** Name of the target type, e.g. `integer`. */
  public readonly typeName: string;
  /** Why conversion failed. */
  public readonly reason: string;

  /**
   * Creates a new ConversionError.
   *
   * @param argument - What the literal was bound through.
   * @param literal - The literal that failed to convert.
   * @param typeName - Name of the target type.
   * @param reason - Why conversion failed.
   */
  constructor(argument: string, literal: string, typeName: string, reason: string) {
    super(`error processing ${argument}: ${reason}`);
    this.name = 'ConversionError';
    this.argument = argument;
    this.literal = literal;
    this.typeName = typeName;
    this.reason = reason;
  }
}

/**
 * A required field that no source supplied.
 */
export class MissingRequiredError extends ParseError {
  public override readonly code = 'MISSING_REQUIRED';
  /** `--name` for options, the placeholder for positionals. */
  public readonly argument: string;
  /** Environment variable that could also have supplied the value. */
  public readonly envVar: string | undefined;

  /**
   * Creates a new MissingRequiredError.
   *
   * @param argument - The field as shown in usage text.
   * @param envVar - Environment variable declared for the field, if any.
   */
  constructor(argument: string, envVar?: string) {
    const alternative = envVar === undefined ? '' : ` (or environment variable ${envVar})`;
    super(`${argument} is required${alternative}`);
    this.name = 'MissingRequiredError';
    this.argument = argument;
    this.envVar = envVar;
  }
}

/**
 * A value-taking flag at the end of input or followed by another flag.
 */
export class MissingValueError extends ParseError {
  public override readonly code = 'MISSING_VALUE';
  /** The flag as written. */
  public readonly argument: string;

  /**
   * Creates a new MissingValueError.
   *
   * @param argument - The flag as written.
   */
  constructor(argument: string) {
    super(`missing value for ${argument}`);
    this.name = 'MissingValueError';
    this.argument = argument;
  }
}

/**
 * Positional text with no positional slot left and no subcommand of that name.
 */
export class AmbiguousSubcommandError extends ParseError {
  public override readonly code = 'AMBIGUOUS_SUBCOMMAND';
  /** The unplaced token. */
  public readonly token: string;
  /** Whether the level declares subcommands the token could have named. */
  public readonly expectedSubcommand: boolean;
  /** A close subcommand name, rendered as a hint. */
  public readonly suggestion: string | undefined;

  /**
   * Creates a new AmbiguousSubcommandError.
   *
   * @param token - The unplaced token.
   * @param expectedSubcommand - Whether the level declares subcommands.
   * @param suggestion - A close subcommand name, if any.
   */
  constructor(token: string, expectedSubcommand: boolean, suggestion?: string) {
    const hint = suggestion === undefined ? '' : ` (did you mean ${suggestion}?)`;
    super(
      expectedSubcommand
        ? `invalid subcommand: ${token}${hint}`
        : `too many positional arguments at '${token}'`
    );
    this.name = 'AmbiguousSubcommandError';
    this.token = token;
    this.expectedSubcommand = expectedSubcommand;
    this.suggestion = suggestion;
  }
}
