import { execFileSync } from 'node:child_process';
import { context } from '@/context';
import type { ExecSyncError } from '@/types';
import { VERSION_TAG_REGEX } from '@/utils/constants';
import { debug } from '@actions/core';
import which from 'which';

/**
 * Checks whether a thrown value carries the fields execFileSync attaches to its errors.
 */
function isExecSyncError(error: unknown): error is ExecSyncError {
  return error instanceof Error && 'status' in error && (typeof error.status === 'number' || error.status === null);
}

/**
 * Raised when a git invocation fails. Carries the arguments and the exit status so callers
 * can tell an expected non-zero exit apart from a real failure.
 */
export class GitCommandError extends Error {
  readonly args: ReadonlyArray<string>;
  readonly status: number | null;

  constructor(args: ReadonlyArray<string>, cause: unknown) {
    const stderr = isExecSyncError(cause) ? String(cause.stderr ?? '').trim() : '';
    const reason = stderr || (cause instanceof Error ? cause.message : String(cause));
    super(`git ${args.join(' ')} failed: ${reason}`, { cause });

    this.name = 'GitCommandError';
    this.args = args;
    this.status = isExecSyncError(cause) ? cause.status : null;
  }
}

/**
 * Runs git in the workspace directory and returns its standard output.
 *
 * @param {string[]} args - Arguments passed to git.
 * @returns {string} The command's standard output.
 * @throws {GitCommandError} If git cannot be found or exits with a non-zero status.
 */
function git(args: string[]): string {
  try {
    const gitPath = which.sync('git');
    debug(`Running: git ${args.join(' ')}`);

    return execFileSync(gitPath, args, {
      cwd: context.workspaceDir,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'], // stdin, stdout, stderr
    });
  } catch (error) {
    throw new GitCommandError(args, error);
  }
}

/**
 * Splits command output into trimmed, non-empty lines.
 */
function toLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Fetches all tags from the remote so the latest version tag is visible.
 */
export function fetchTags(): void {
  git(['fetch', '--tags', '--quiet']);
}

/**
 * Fetches the current branch's upstream so {@link isBranchBehind} reflects the remote.
 */
export function fetchBranch(): void {
  git(['fetch', '--quiet']);
}

/**
 * Checks whether the checked-out branch is behind its upstream, meaning a newer commit has
 * landed since this run was triggered.
 *
 * The first line of `git status -sb` reads e.g. `## main...origin/main [behind 2]`.
 */
export function isBranchBehind(): boolean {
  const [branchLine = ''] = git(['status', '-sb']).split('\n');

  return /\[.*\bbehind \d+.*\]/.test(branchLine);
}

/**
 * Returns the most recently created tag of the form `vX.Y.Z` or `X.Y.Z`.
 *
 * @returns {string | null} The tag name, or null if the repository has no version tag.
 */
export function getLatestVersionTag(): string | null {
  const tags = toLines(git(['tag', '--sort=-creatordate']));

  return tags.find((tag) => VERSION_TAG_REGEX.test(tag)) ?? null;
}

/**
 * Returns the commit a tag points at. Annotated tags are dereferenced to their commit.
 */
export function getTagCommitSha(tag: string): string {
  return git(['rev-list', '-n', '1', tag]).trim();
}

/**
 * Checks whether `ancestor` is an ancestor of (or equal to) `descendant`.
 *
 * `git merge-base --is-ancestor` exits with status 1 when it is not; any other non-zero status
 * is a real failure and is rethrown.
 */
export function isAncestor(ancestor: string, descendant: string): boolean {
  try {
    git(['merge-base', '--is-ancestor', ancestor, descendant]);
    return true;
  } catch (error) {
    if (error instanceof GitCommandError && error.status === 1) {
      return false;
    }
    throw error;
  }
}

/**
 * Returns the full message of each commit in `fromSha..toSha`, newest first.
 */
export function getCommitMessages(fromSha: string, toSha: string): string[] {
  // NUL-separated so multi-line messages survive the split
  return git(['log', '--format=%B%x00', `${fromSha}..${toSha}`])
    .split('\0')
    .map((message) => message.trim())
    .filter(Boolean);
}

/**
 * Returns the paths changed between two commits.
 */
export function getChangedFiles(fromSha: string, toSha: string): string[] {
  return toLines(git(['diff', '--name-only', `${fromSha}..${toSha}`]));
}
