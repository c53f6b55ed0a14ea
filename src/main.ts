import { getConfig } from '@/config';
import { getContext } from '@/context';
import { GitCommandError, fetchBranch, isBranchBehind } from '@/git';
import { resolveRepositoryState } from '@/repository-state';
import type { Config, Context, RepositoryState } from '@/types';
import { REPOSITORY_STATE, VERSION_OUTPUT_NAME } from '@/utils/constants';
import { computeNextVersion } from '@/version-engine';
import { info, setFailed, setOutput, warning } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Computes the version for a resolved repository state. Only FIRST_RELEASE and EVALUATING
 * reach the version decision engine; every other state produces no release.
 *
 * @param {Config} config - The configuration object.
 * @param {RepositoryState} state - The resolved repository state.
 * @returns {string} The next version, or an empty string when no release is needed.
 */
function getVersionForState(config: Config, state: RepositoryState): string {
  switch (state.kind) {
    case REPOSITORY_STATE.FIRST_RELEASE:
      return computeNextVersion({
        previousVersion: null,
        commitMessages: [],
        changedPaths: [],
        ignorePatterns: config.ignorePaths,
        forcePatchIfNoToken: config.forcePatchIfNoCommitToken,
      }).version;
    case REPOSITORY_STATE.EVALUATING:
      return computeNextVersion({
        previousVersion: state.latestTag,
        commitMessages: state.commitMessages,
        changedPaths: state.changedFiles,
        ignorePatterns: config.ignorePaths,
        forcePatchIfNoToken: config.forcePatchIfNoCommitToken,
      }).version;
    case REPOSITORY_STATE.BRANCH_BEHIND:
    case REPOSITORY_STATE.ALREADY_TAGGED:
    case REPOSITORY_STATE.TAG_NOT_ANCESTOR:
      return '';
  }
}

/**
 * Executes the main process of the action.
 *
 * 1. Initializes config and context
 * 2. Resolves the repository state (fetching tags, checking staleness and tag ancestry)
 * 3. Computes the next version for FIRST_RELEASE or EVALUATING
 * 4. Re-checks that no newer commit landed on the branch in the meantime
 * 5. Sets the `version` output (empty string when no release is needed)
 *
 * Git failures never fail the workflow: they are reported as warnings and produce an empty
 * `version`. Any other error (invalid inputs, missing environment) is reported through setFailed.
 *
 * @returns {Promise<void>} A promise that resolves when the process completes
 */
export async function run(): Promise<void> {
  try {
    const { config } = initialize();

    let version: string;
    try {
      const state = resolveRepositoryState();
      version = getVersionForState(config, state);

      if (version !== '') {
        fetchBranch();
        if (isBranchBehind()) {
          warning('This commit is no longer the most recent on this branch. Aborting.');
          version = '';
        }
      }
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }
      warning(`${error.message}. No version will be computed.`);
      version = '';
    }

    if (version === '') {
      info('No version bump needed.');
    } else {
      info(`Next version: ${version}`);
    }
    setOutput(VERSION_OUTPUT_NAME, version);
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    } else {
      setFailed(String(error));
    }
  }
}
