/**
 * Usage and help text.
 *
 * @packageDocumentation
 */

export { formatHelp, formatUsage, resolveLevels } from './formatter.js';
export type { UsageProgram } from './formatter.js';
