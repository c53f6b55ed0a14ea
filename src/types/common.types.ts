import type { BUMP_DECISION, BUMP_TOKEN, REPOSITORY_STATE } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * Represents a bump token found in a commit title.
 *
 * @see {@link BUMP_TOKEN} for the available token values
 */
export type BumpToken = (typeof BUMP_TOKEN)[keyof typeof BUMP_TOKEN];

/**
 * Represents the version increment decided for a release.
 *
 * @see {@link BUMP_DECISION} for the available decision values
 */
export type BumpDecision = (typeof BUMP_DECISION)[keyof typeof BUMP_DECISION];

/**
 * Represents one of the states the repository checks can resolve to.
 *
 * @see {@link REPOSITORY_STATE} for the available state values
 */
export type RepositoryStateKind = (typeof REPOSITORY_STATE)[keyof typeof REPOSITORY_STATE];
