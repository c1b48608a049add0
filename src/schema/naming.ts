/**
 * Name derivation for flags, placeholders and environment variables.
 *
 * @packageDocumentation
 */

/**
 * Converts a field key to a kebab-case flag name.
 *
 * @example
 * ```typescript
 * toKebabCase('setUpstream'); // "set-upstream"
 * toKebabCase('dry_run');     // "dry-run"
 * ```
 */
export function toKebabCase(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1-$2')
    .replace(/[_\s]+/g, '-')
    .toLowerCase();
}

/**
 * Converts a field key or flag name to UPPER_SNAKE_CASE.
 *
 * @example
 * ```typescript
 * toUpperSnakeCase('setUpstream'); // "SET_UPSTREAM"
 * toUpperSnakeCase('dry-run');     // "DRY_RUN"
 * ```
 */
export function toUpperSnakeCase(name: string): string {
  return toKebabCase(name).replace(/-/g, '_').toUpperCase();
}
