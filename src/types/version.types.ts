import type { BumpDecision, BumpToken } from '@/types/common.types';

/**
 * Version decision types
 */

/**
 * A parsed MAJOR.MINOR.PATCH version. Each component is a non-negative integer of any size.
 */
export interface SemVer {
  major: bigint;
  minor: bigint;
  patch: bigint;
}

/**
 * Everything the version decision engine needs, supplied by the caller in one record.
 */
export interface VersionDecisionInput {
  /**
   * The previous release version (e.g. "v1.2.3" or "1.2.3"), or null when the repository has
   * no previous version tag.
   */
  previousVersion: string | null;

  /**
   * One full commit message per commit since the previous tag. Only the first line is scanned.
   */
  commitMessages: ReadonlyArray<string>;

  /**
   * Paths changed between the previous tag and the current commit.
   */
  changedPaths: ReadonlyArray<string>;

  /**
   * Glob patterns for paths whose changes alone never warrant a release.
   */
  ignorePatterns: ReadonlyArray<string>;

  /**
   * Whether a change touching non-ignored paths but carrying no bump token is released as a patch.
   */
  forcePatchIfNoToken: boolean;
}

/**
 * The outcome of a version decision.
 */
export interface VersionDecisionResult {
  /** The next version without a prefix, or an empty string when no release is needed */
  version: string;
  /** The applied decision, or 'initial' when the first-release baseline was used */
  decision: BumpDecision | 'initial';
  /** The effective bump token across all commits, or null for a first release */
  token: BumpToken | null;
}
