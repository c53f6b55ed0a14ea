import type { REPOSITORY_STATE } from '@/utils/constants';

/**
 * Repository state types.
 *
 * Each variant is a state the pre-evaluation checks can leave the run in. Only `EVALUATING`
 * hands control to the version decision engine; `FIRST_RELEASE` always produces the baseline
 * version and every other state produces no release.
 */

export interface FirstReleaseState {
  kind: typeof REPOSITORY_STATE.FIRST_RELEASE;
}

export interface BranchBehindState {
  kind: typeof REPOSITORY_STATE.BRANCH_BEHIND;
}

export interface AlreadyTaggedState {
  kind: typeof REPOSITORY_STATE.ALREADY_TAGGED;
  /** The latest version tag, which already points at the current commit */
  latestTag: string;
}

export interface TagNotAncestorState {
  kind: typeof REPOSITORY_STATE.TAG_NOT_ANCESTOR;
  latestTag: string;
  /** The commit the latest version tag points at */
  latestTagSha: string;
}

export interface EvaluatingState {
  kind: typeof REPOSITORY_STATE.EVALUATING;
  latestTag: string;
  latestTagSha: string;
  /** Full commit messages in latestTagSha..sha, newest first */
  commitMessages: string[];
  /** Paths changed in latestTagSha..sha */
  changedFiles: string[];
}

export type RepositoryState =
  | FirstReleaseState
  | BranchBehindState
  | AlreadyTaggedState
  | TagNotAncestorState
  | EvaluatingState;
