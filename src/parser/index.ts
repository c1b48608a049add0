/**
 * Parsing: tokenizer, matcher, precedence resolver and the ArgumentParser facade.
 *
 * @packageDocumentation
 */

export { ArgumentParser, createParser } from './parser.js';
export type { ParseOutcome, ProgramOptions } from './parser.js';
export {
  AmbiguousSubcommandError,
  ConversionError,
  MissingRequiredError,
  MissingValueError,
  ParseError,
  UnknownFlagError,
} from './errors.js';
export type { ParseErrorCode } from './errors.js';
export { Tokenizer, classify, looksLikeFlag } from './tokenizer.js';
export type { LongFlagToken, PositionalToken, ShortFlagToken, TerminatorToken, Token } from './tokenizer.js';
