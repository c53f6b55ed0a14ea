/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config {
  /**
   * Whether to release a patch when the commits since the previous tag change at least one
   * non-ignored path but none of their titles carries a bump token. When false (default),
   * such changes produce no release.
   */
  forcePatchIfNoCommitToken: boolean;

  /**
   * A list of glob patterns (e.g., "docs/**", "*.md") for paths whose changes alone never
   * trigger a release. Patterns are matched against paths relative to the repository root
   * using minimatch semantics: `*` matches within a single path segment and `**` matches
   * across segments. An empty list ignores nothing.
   */
  ignorePaths: string[];
}
