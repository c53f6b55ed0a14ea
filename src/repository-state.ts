import { context } from '@/context';
import {
  fetchTags,
  getChangedFiles,
  getCommitMessages,
  getLatestVersionTag,
  getTagCommitSha,
  isAncestor,
  isBranchBehind,
} from '@/git';
import type { RepositoryState } from '@/types';
import { REPOSITORY_STATE } from '@/utils/constants';
import { endGroup, info, startGroup, warning } from '@actions/core';

/**
 * Runs the checks that must pass before a version can be computed and gathers the inputs
 * for the version decision engine.
 *
 * The checks run in order and the first one that fails ends the run:
 * 1. BRANCH_BEHIND - after fetching tags, the branch has newer commits upstream
 * 2. FIRST_RELEASE - the repository has no `v?X.Y.Z` tag yet
 * 3. ALREADY_TAGGED - the latest version tag already points at the triggering commit
 * 4. TAG_NOT_ANCESTOR - the latest version tag is not in the triggering commit's history,
 *    which suggests the tag came from a newer commit
 *
 * Otherwise the state is EVALUATING and carries the commit messages and changed files
 * since the latest version tag.
 *
 * @returns {RepositoryState} The resolved state.
 * @throws {GitCommandError} If any git invocation fails.
 */
export function resolveRepositoryState(): RepositoryState {
  try {
    startGroup('Resolving Repository State');

    fetchTags();
    if (isBranchBehind()) {
      warning('This commit is not the most recent on this branch. No version will be computed.');
      return { kind: REPOSITORY_STATE.BRANCH_BEHIND };
    }

    const latestTag = getLatestVersionTag();
    info(`Latest version tag: ${latestTag ?? '<none>'}`);
    if (latestTag === null) {
      return { kind: REPOSITORY_STATE.FIRST_RELEASE };
    }

    const latestTagSha = getTagCommitSha(latestTag);
    info(`Latest version tag SHA: ${latestTagSha}`);

    if (latestTagSha === context.sha) {
      warning(`This commit (${context.sha}) is already tagged (${latestTag}). No version bump needed.`);
      return { kind: REPOSITORY_STATE.ALREADY_TAGGED, latestTag };
    }

    if (!isAncestor(latestTagSha, context.sha)) {
      warning(
        `The latest tag (${latestTag} -> ${latestTagSha}) is not an ancestor of this commit (${context.sha}). The tag may be from a newer commit, so the version cannot be bumped.`,
      );
      return { kind: REPOSITORY_STATE.TAG_NOT_ANCESTOR, latestTag, latestTagSha };
    }

    const commitMessages = getCommitMessages(latestTagSha, context.sha);
    const changedFiles = getChangedFiles(latestTagSha, context.sha);

    info(`Commits since ${latestTag}: ${commitMessages.length}`);
    info(`Changed files since ${latestTag}:`);
    for (const file of changedFiles) {
      info(`  ${file}`);
    }

    return { kind: REPOSITORY_STATE.EVALUATING, latestTag, latestTagSha, commitMessages, changedFiles };
  } finally {
    endGroup();
  }
}
