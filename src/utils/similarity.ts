/**
 * Typo detection for unknown flags and subcommands.
 *
 * @packageDocumentation
 */

/**
 * Calculates the Levenshtein distance between two strings.
 *
 * @param a - First string.
 * @param b - Second string.
 * @returns The minimum number of single-character insertions, deletions or substitutions.
 *
 * @example
 * ```typescript
 * levenshteinDistance('verbose', 'verbos'); // 1
 * levenshteinDistance('commit', 'comit'); // 1
 * ```
 */
export function levenshteinDistance(a: string, b: string): number {
  let previous: number[] = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current: number[] = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      const deletion = (previous[j] ?? 0) + 1;
      const insertion = (current[j - 1] ?? 0) + 1;
      current.push(Math.min(substitution, deletion, insertion));
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

/**
 * Finds the closest candidate within `maxDistance` edits.
 *
 * Ties keep the earliest candidate, so declaration order decides.
 *
 * @param input - The unrecognized input.
 * @param candidates - Names that would have been accepted.
 * @param maxDistance - Largest edit distance still worth suggesting.
 * @returns The suggested name, or undefined when nothing is close.
 */
export function closestMatch(
  input: string,
  candidates: Iterable<string>,
  maxDistance = 2
): string | undefined {
  let best: string | undefined;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const distance = levenshteinDistance(input, candidate);
    if (distance < bestDistance && distance <= maxDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
}
