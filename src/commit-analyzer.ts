import type { BumpToken } from '@/types';
import { BUMP_TOKEN, BUMP_TOKEN_MARKERS, BUMP_TOKEN_PRECEDENCE } from '@/utils/constants';
import { debug } from '@actions/core';

/**
 * Tokens that can be detected in a commit title, in descending precedence.
 */
const DETECTABLE_TOKENS = [BUMP_TOKEN.MAJOR, BUMP_TOKEN.MINOR, BUMP_TOKEN.PATCH_OR_FIX, BUMP_TOKEN.NO_BUMP] as const;

/**
 * Returns the first line of a commit message.
 */
export function getCommitTitle(message: string): string {
  return message.trim().split(/\r?\n/, 1)[0] ?? '';
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Single-message detection
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Detects the bump token carried by a single commit message.
 *
 * Only the title (first line) is searched, so instructions quoted in the body such as
 * "add [major] to release a new major version" do not count. Matching is case-insensitive and
 * literal. When a title carries several tokens, the highest-precedence one is returned.
 *
 * Recognized markers:
 * - `[major]` → MAJOR
 * - `[minor]` → MINOR
 * - `[patch]`, `[fix]`, `[bump]` → PATCH_OR_FIX
 * - `[no-bump]`, `[no_bump]`, `[nobump]` → NO_BUMP
 *
 * @param message - The full commit message
 * @returns The detected token, or NONE if the title carries no marker
 *
 * @example
 * ```typescript
 * detectBumpToken('Drop legacy API [MAJOR]')
 * // → 'major'
 *
 * detectBumpToken('docs: typo\n\nuse [minor] next time')
 * // → 'none'
 * ```
 */
export function detectBumpToken(message: string): BumpToken {
  const title = getCommitTitle(message).toLowerCase();

  for (const token of DETECTABLE_TOKENS) {
    if (BUMP_TOKEN_MARKERS[token].some((marker) => title.includes(marker))) {
      return token;
    }
  }

  return BUMP_TOKEN.NONE;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Multi-message orchestration
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Returns the higher-precedence bump token of the two
 * (MAJOR > MINOR > PATCH_OR_FIX > NO_BUMP > NONE).
 *
 * @example
 * ```typescript
 * higherPriorityBumpToken('none', 'no-bump')     // → 'no-bump'
 * higherPriorityBumpToken('no-bump', 'patch-or-fix') // → 'patch-or-fix'
 * higherPriorityBumpToken('major', 'minor')      // → 'major'
 * ```
 */
export function higherPriorityBumpToken(current: BumpToken, candidate: BumpToken): BumpToken {
  return BUMP_TOKEN_PRECEDENCE[candidate] > BUMP_TOKEN_PRECEDENCE[current] ? candidate : current;
}

/**
 * Computes the effective bump token across a batch of commit messages: the highest-precedence
 * token found in any single title. The result does not depend on message order, so one
 * `[major]` commit among many unlabelled ones still forces a major bump.
 *
 * @param messages - Commit messages since the previous tag
 * @returns The effective token, or NONE if no title carries a marker
 */
export function scanBumpTokens(messages: ReadonlyArray<string>): BumpToken {
  let result: BumpToken = BUMP_TOKEN.NONE;

  for (const message of messages) {
    const token = detectBumpToken(message);
    if (token !== BUMP_TOKEN.NONE) {
      debug(`Found bump token '${token}' in commit: ${getCommitTitle(message)}`);
    }
    result = higherPriorityBumpToken(result, token);
  }

  return result;
}
