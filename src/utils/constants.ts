/**
 * Regular expression that matches version tags in the format of semantic versioning.
 * This regex validates version strings like "1.2.3" or "v1.2.3" and includes capture groups.
 * Group 1: Major version number
 * Group 2: Minor version number
 * Group 3: Patch version number
 *
 * Pre-release and build-metadata suffixes are not supported and never match.
 */
export const VERSION_TAG_REGEX = /^v?(\d+)\.(\d+)\.(\d+)$/;

/**
 * Bump tokens recognized in a commit title.
 */
export const BUMP_TOKEN = {
  MAJOR: 'major',
  MINOR: 'minor',
  PATCH_OR_FIX: 'patch-or-fix',
  NO_BUMP: 'no-bump',
  NONE: 'none',
} as const;

/**
 * Precedence rank of each bump token. When several commits carry different tokens, the
 * token with the highest rank wins.
 */
export const BUMP_TOKEN_PRECEDENCE = {
  [BUMP_TOKEN.MAJOR]: 4,
  [BUMP_TOKEN.MINOR]: 3,
  [BUMP_TOKEN.PATCH_OR_FIX]: 2,
  [BUMP_TOKEN.NO_BUMP]: 1,
  [BUMP_TOKEN.NONE]: 0,
} as const;

/**
 * Literal (lowercase) markers for each bump token, searched for in the lowercased commit title.
 */
export const BUMP_TOKEN_MARKERS = {
  [BUMP_TOKEN.MAJOR]: ['[major]'],
  [BUMP_TOKEN.MINOR]: ['[minor]'],
  [BUMP_TOKEN.PATCH_OR_FIX]: ['[patch]', '[fix]', '[bump]'],
  [BUMP_TOKEN.NO_BUMP]: ['[no-bump]', '[no_bump]', '[nobump]'],
} as const;

/**
 * Bump decision constants - the version increment to apply
 */
export const BUMP_DECISION = {
  NONE: 'none',
  PATCH: 'patch',
  MINOR: 'minor',
  MAJOR: 'major',
} as const;

/**
 * Repository state constants - where the pre-evaluation checks left the run
 */
export const REPOSITORY_STATE = {
  FIRST_RELEASE: 'first-release',
  BRANCH_BEHIND: 'branch-behind',
  ALREADY_TAGGED: 'already-tagged',
  TAG_NOT_ANCESTOR: 'tag-not-ancestor',
  EVALUATING: 'evaluating',
} as const;

export const VERSION_OUTPUT_NAME = 'version';
