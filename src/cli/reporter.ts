/**
 * Error Reporter: renders a failure the way the command line shows it.
 *
 * @packageDocumentation
 */

/**
 * Formats a failure as the usage synopsis followed by one `error:` line.
 *
 * Only the message is shown; stack traces and parse state never are.
 *
 * @param usage - Synopsis for the resolved subcommand chain.
 * @param error - The failure, or a caller-detected message.
 * @returns The report, ending in a newline.
 *
 * @example
 * ```typescript
 * formatFailure('Usage: example get [--count COUNT]', 'missing value for --count');
 * // 'Usage: example get [--count COUNT]\nerror: missing value for --count\n'
 * ```
 */
export function formatFailure(usage: string, error: Error | string): string {
  const message = typeof error === 'string' ? error : error.message;
  return `${usage}\nerror: ${message}\n`;
}
