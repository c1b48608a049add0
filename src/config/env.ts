/**
 * Environment variable access for the command-line shim.
 *
 * The parser itself only sees the {@link EnvRecord} it is handed; this
 * module is where the process environment is read.
 *
 * @packageDocumentation
 */

import type { EnvRecord } from './types.js';

/**
 * Gets the environment from Node.js process.env.
 * Returns an empty object if process is not available (e.g., browser environment).
 */
export function getDefaultEnv(): EnvRecord {
  // Use globalThis to safely access process in a way that works in all environments
  const globalProcess = (globalThis as { process?: { env?: EnvRecord } }).process;
  return globalProcess?.env ?? {};
}

/**
 * Splits a multi-value environment variable into entries.
 *
 * Entries are comma-separated and trimmed. Double quotes protect commas
 * inside an entry, and `""` inside quotes is a literal quote. An empty
 * value has no entries.
 *
 * @param value - The raw variable value.
 * @returns The entries in order.
 *
 * @example
 * ```typescript
 * splitEnvList('a, b,"c,d"'); // ['a', 'b', 'c,d']
 * ```
 */
export function splitEnvList(value: string): string[] {
  if (value === '') {
    return [];
  }
  const entries: string[] = [];
  let current = '';
  let quoted = false;
  let wasQuoted = false;

  for (let i = 0; i < value.length; i++) {
    const char = value.charAt(i);
    if (quoted) {
      if (char === '"' && value.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      // Whitespace before an opening quote is not part of the entry.
      if (current.trim() === '') {
        current = '';
      }
      quoted = true;
      wasQuoted = true;
    } else if (char === ',') {
      entries.push(wasQuoted ? current : current.trim());
      current = '';
      wasQuoted = false;
    } else if (!wasQuoted) {
      current += char;
    }
  }
  entries.push(wasQuoted ? current : current.trim());

  return entries;
}
