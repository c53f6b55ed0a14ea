import { findMatchingPattern } from '@/utils/glob';
import { debug, info } from '@actions/core';

/**
 * Determines whether the change set since the previous tag is ignorable, meaning it alone does
 * not warrant a release.
 *
 * A change set is ignorable when it is empty (think: `git commit --allow-empty -m "Trigger CI"`)
 * or when every changed path matches at least one ignore pattern. Only consulted when no commit
 * title carries a bump token.
 *
 * @param {ReadonlyArray<string>} changedPaths - Paths changed since the previous tag.
 * @param {ReadonlyArray<string>} ignorePatterns - Glob patterns for paths to ignore.
 * @returns {boolean} True if the change set is empty or fully covered by the ignore patterns.
 */
export function isIgnorableChange(changedPaths: ReadonlyArray<string>, ignorePatterns: ReadonlyArray<string>): boolean {
  if (changedPaths.length === 0) {
    info('No changed files since the previous tag.');
    return true;
  }

  for (const path of changedPaths) {
    const matchedPattern = findMatchingPattern(path, ignorePatterns);
    if (matchedPattern === null) {
      info(`Found a changed non-ignored file: ${path}`);
      return false;
    }
    debug(`Changed file ${path} is covered by ignore pattern: ${matchedPattern}`);
  }

  info(`All ${changedPaths.length} changed file(s) match an ignore pattern.`);
  return true;
}
