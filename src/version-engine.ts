import { isIgnorableChange } from '@/change-classifier';
import { scanBumpTokens } from '@/commit-analyzer';
import { bumpVersion, formatSemVer, parseSemVer, resolveFirstRelease } from '@/semver';
import type { BumpDecision, BumpToken, VersionDecisionInput, VersionDecisionResult } from '@/types';
import { BUMP_DECISION, BUMP_TOKEN } from '@/utils/constants';
import { endGroup, info, startGroup, warning } from '@actions/core';

/**
 * Maps the effective bump token, the change classification and the force-patch policy to a
 * bump decision.
 *
 * Explicit tokens always win over path-based reasoning, and `[no-bump]` is an explicit veto.
 * Without a token, a change touching only ignored paths never releases, while a change touching
 * real code falls back to the force-patch policy:
 *
 * | token        | ignorable | forcePatch | decision |
 * |--------------|-----------|------------|----------|
 * | MAJOR        | any       | any        | MAJOR    |
 * | MINOR        | any       | any        | MINOR    |
 * | PATCH_OR_FIX | any       | any        | PATCH    |
 * | NO_BUMP      | any       | any        | NONE     |
 * | NONE         | true      | any        | NONE     |
 * | NONE         | false     | true       | PATCH    |
 * | NONE         | false     | false      | NONE     |
 *
 * @param {BumpToken} token - The effective token across all commit titles.
 * @param {boolean} ignorable - Whether the change set is empty or fully ignored.
 * @param {boolean} forcePatchIfNoToken - Whether to release a patch for untokenized real changes.
 * @returns {BumpDecision} The bump to apply.
 */
export function decideBump(token: BumpToken, ignorable: boolean, forcePatchIfNoToken: boolean): BumpDecision {
  switch (token) {
    case BUMP_TOKEN.MAJOR:
      return BUMP_DECISION.MAJOR;
    case BUMP_TOKEN.MINOR:
      return BUMP_DECISION.MINOR;
    case BUMP_TOKEN.PATCH_OR_FIX:
      return BUMP_DECISION.PATCH;
    case BUMP_TOKEN.NO_BUMP:
      return BUMP_DECISION.NONE;
    case BUMP_TOKEN.NONE:
      if (ignorable) {
        return BUMP_DECISION.NONE;
      }
      return forcePatchIfNoToken ? BUMP_DECISION.PATCH : BUMP_DECISION.NONE;
    default: {
      const unknownToken: never = token;
      throw new Error(`Bump token not supported: ${String(unknownToken)}`);
    }
  }
}

/**
 * Computes the next version from the previous version, the commits since it and the files
 * they changed.
 *
 * When there is no previous version (or it is not a `v?X.Y.Z` string) the 0.0.0 baseline is
 * returned without looking at commits or files. Otherwise the commit titles are scanned for the
 * highest-precedence bump token; the change set is classified only when no token was found.
 *
 * This function is pure apart from logging: it reads no configuration or environment.
 *
 * @param {VersionDecisionInput} input - The previous version, commits, changed paths and policy.
 * @returns {VersionDecisionResult} The next version (empty string when no release is needed),
 *   the applied decision and the effective token.
 *
 * @example
 * ```typescript
 * computeNextVersion({
 *   previousVersion: 'v1.4.2',
 *   commitMessages: ['fix: bug', 'Add [minor] feature'],
 *   changedPaths: ['src/index.ts'],
 *   ignorePatterns: [],
 *   forcePatchIfNoToken: false,
 * });
 * // → { version: '1.5.0', decision: 'minor', token: 'minor' }
 * ```
 */
export function computeNextVersion(input: VersionDecisionInput): VersionDecisionResult {
  const { previousVersion, commitMessages, changedPaths, ignorePatterns, forcePatchIfNoToken } = input;

  try {
    startGroup('Computing Next Version');

    const previous = previousVersion === null ? null : parseSemVer(previousVersion);
    if (previousVersion !== null && previous === null) {
      warning(`Previous version '${previousVersion}' is not a valid X.Y.Z version. Treating as first release.`);
    }

    if (previous === null) {
      const version = formatSemVer(resolveFirstRelease(false));
      info(`No previous version tag found. Using first release version: ${version}`);
      return { version, decision: 'initial', token: null };
    }

    info(`Previous version: ${formatSemVer(previous)}`);
    info(`Commits since previous version: ${commitMessages.length}`);

    const token = scanBumpTokens(commitMessages);
    info(`Effective bump token: ${token}`);

    // The change set only matters when no commit title states an explicit intent
    const ignorable = token === BUMP_TOKEN.NONE ? isIgnorableChange(changedPaths, ignorePatterns) : false;

    const decision = decideBump(token, ignorable, forcePatchIfNoToken);
    info(`Bump decision: ${decision}`);

    const next = bumpVersion(previous, decision);
    if (next === null) {
      info("Commit log(s) don't signify a version bump.");
      return { version: '', decision, token };
    }

    const version = formatSemVer(next);
    info(`Next version: ${version}`);
    return { version, decision, token };
  } finally {
    endGroup();
  }
}
