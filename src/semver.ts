import type { BumpDecision, SemVer } from '@/types';
import { BUMP_DECISION, VERSION_TAG_REGEX } from '@/utils/constants';

/**
 * The version emitted when the repository has no previous semantic-version tag.
 */
const FIRST_RELEASE_VERSION: Readonly<SemVer> = { major: 0n, minor: 0n, patch: 0n };

/**
 * Parses a version tag such as "v1.2.3" or "1.2.3". Components are kept as bigints, so a tag
 * like "v1.0.9007199254740993" keeps every digit.
 *
 * @param {string} tag - The tag or version string.
 * @returns {SemVer | null} The parsed version, or null if the string is not exactly `v?X.Y.Z`.
 */
export function parseSemVer(tag: string): SemVer | null {
  const match = VERSION_TAG_REGEX.exec(tag.trim());
  if (!match) {
    return null;
  }

  const [, major, minor, patch] = match;
  return { major: BigInt(major), minor: BigInt(minor), patch: BigInt(patch) };
}

/**
 * Renders a version as "X.Y.Z", without a "v" prefix.
 */
export function formatSemVer(version: SemVer): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Compares two versions in semantic-version order.
 *
 * @returns A negative number if a < b, zero if equal, a positive number if a > b.
 */
export function compareSemVer(a: SemVer, b: SemVer): number {
  for (const key of ['major', 'minor', 'patch'] as const) {
    if (a[key] !== b[key]) {
      return a[key] < b[key] ? -1 : 1;
    }
  }
  return 0;
}

/**
 * Computes the next version for the given bump decision.
 *
 * - MAJOR: (M, N, P) → (M+1, 0, 0)
 * - MINOR: (M, N, P) → (M, N+1, 0)
 * - PATCH: (M, N, P) → (M, N, P+1)
 * - NONE: no next version
 *
 * @param {SemVer} previous - The previous release version.
 * @param {BumpDecision} decision - The bump to apply.
 * @returns {SemVer | null} The next version, or null when the decision is NONE.
 * @throws {Error} If the decision is not one of the known values.
 */
export function bumpVersion(previous: SemVer, decision: BumpDecision): SemVer | null {
  const { major, minor, patch } = previous;

  switch (decision) {
    case BUMP_DECISION.NONE:
      return null;
    case BUMP_DECISION.PATCH:
      return { major, minor, patch: patch + 1n };
    case BUMP_DECISION.MINOR:
      return { major, minor: minor + 1n, patch: 0n };
    case BUMP_DECISION.MAJOR:
      return { major: major + 1n, minor: 0n, patch: 0n };
    default: {
      const unknownDecision: never = decision;
      throw new Error(`Bump decision not supported: ${String(unknownDecision)}`);
    }
  }
}

/**
 * Resolves the version for a repository without a previous version tag.
 *
 * @param {boolean} previousTagExists - Whether a previous semantic-version tag exists.
 * @returns {SemVer | null} The 0.0.0 baseline when there is no previous tag, otherwise null.
 */
export function resolveFirstRelease(previousTagExists: false): SemVer;
export function resolveFirstRelease(previousTagExists: true): null;
export function resolveFirstRelease(previousTagExists: boolean): SemVer | null;
export function resolveFirstRelease(previousTagExists: boolean): SemVer | null {
  if (previousTagExists) {
    return null;
  }

  return { ...FIRST_RELEASE_VERSION };
}
