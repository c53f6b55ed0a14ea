import { warning } from '@actions/core';
import { minimatch } from 'minimatch';

/**
 * Finds the first ignore pattern that matches the given path.
 *
 * Patterns use minimatch glob semantics against the full path relative to the repository
 * root: `*` matches within a single path segment and `**` matches across segments, so
 * `resources/**` covers everything below `resources/`. Dot-files are matched by wildcards.
 *
 * @remarks
 * - A pattern like "dir/**" will match files INSIDE "dir" but NOT a file named "dir" itself
 * - A pattern minimatch refuses to compile is reported as a warning and treated as non-matching
 *
 * @example
 * findMatchingPattern('docs/guide/intro.md', ['*.md', 'docs/**']); // 'docs/**'
 * findMatchingPattern('src/main.ts', ['docs/**']); // null
 *
 * @param {string} path - The changed file path to check.
 * @param {ReadonlyArray<string>} patterns - Glob patterns to match against.
 * @returns {string | null} The first matching pattern, or null if none match.
 */
export function findMatchingPattern(path: string, patterns: ReadonlyArray<string>): string | null {
  for (const pattern of patterns) {
    try {
      if (minimatch(path, pattern, { dot: true, matchBase: false })) {
        return pattern;
      }
    } catch (error) {
      warning(
        `Ignoring invalid glob pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return null;
}

/**
 * Checks whether a path matches any of the given glob patterns. An empty pattern list never matches.
 */
export function matchesAnyPattern(path: string, patterns: ReadonlyArray<string>): boolean {
  return findMatchingPattern(path, patterns) !== null;
}
