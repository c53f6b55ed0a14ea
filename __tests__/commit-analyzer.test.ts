import { detectBumpToken, getCommitTitle, higherPriorityBumpToken, scanBumpTokens } from '@/commit-analyzer';
import type { BumpToken } from '@/types';
import { BUMP_TOKEN } from '@/utils/constants';
import { debug } from '@actions/core';
import { describe, expect, it } from 'vitest';

describe('commit-analyzer', () => {
  describe('getCommitTitle()', () => {
    it('should return the first line of a multi-line message', () => {
      expect(getCommitTitle('Add feature [minor]\n\nLonger description')).toBe('Add feature [minor]');
    });

    it('should handle CRLF line endings', () => {
      expect(getCommitTitle('Fix bug [fix]\r\nbody')).toBe('Fix bug [fix]');
    });

    it('should skip leading blank lines', () => {
      expect(getCommitTitle('\n\n  Title here\nbody')).toBe('Title here');
    });

    it('should return an empty string for an empty message', () => {
      expect(getCommitTitle('')).toBe('');
    });
  });

  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
  // detectBumpToken()
  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

  describe('detectBumpToken()', () => {
    const cases: Array<{ message: string; expected: BumpToken }> = [
      { message: 'Drop legacy API [major]', expected: BUMP_TOKEN.MAJOR },
      { message: 'Add login page [minor]', expected: BUMP_TOKEN.MINOR },
      { message: 'Fix crash [patch]', expected: BUMP_TOKEN.PATCH_OR_FIX },
      { message: '[fix] off-by-one', expected: BUMP_TOKEN.PATCH_OR_FIX },
      { message: 'Update dependencies [bump]', expected: BUMP_TOKEN.PATCH_OR_FIX },
      { message: 'Tidy CI config [no-bump]', expected: BUMP_TOKEN.NO_BUMP },
      { message: 'Tidy CI config [no_bump]', expected: BUMP_TOKEN.NO_BUMP },
      { message: 'Tidy CI config [nobump]', expected: BUMP_TOKEN.NO_BUMP },
      { message: 'fix: regular conventional commit', expected: BUMP_TOKEN.NONE },
      { message: 'major refactor without brackets', expected: BUMP_TOKEN.NONE },
      { message: '', expected: BUMP_TOKEN.NONE },
    ];

    for (const { message, expected } of cases) {
      it(`should detect '${expected}' in "${message}"`, () => {
        expect(detectBumpToken(message)).toBe(expected);
      });
    }

    it('should be case insensitive', () => {
      expect(detectBumpToken('Drop legacy API [MAJOR]')).toBe(BUMP_TOKEN.MAJOR);
      expect(detectBumpToken('Add page [Minor]')).toBe(BUMP_TOKEN.MINOR);
      expect(detectBumpToken('Skip release [No-Bump]')).toBe(BUMP_TOKEN.NO_BUMP);
    });

    it('should only scan the title and ignore the body', () => {
      expect(detectBumpToken('docs: explain tokens\n\nAdd [major] to your title for a major release')).toBe(
        BUMP_TOKEN.NONE,
      );
    });

    it('should return the highest-precedence token when a title carries several', () => {
      expect(detectBumpToken('[no-bump] [patch] mixed signals')).toBe(BUMP_TOKEN.PATCH_OR_FIX);
      expect(detectBumpToken('[minor] and [major]')).toBe(BUMP_TOKEN.MAJOR);
    });

    it('should not match partial or unbracketed markers', () => {
      expect(detectBumpToken('[majority] vote')).toBe(BUMP_TOKEN.NONE);
      expect(detectBumpToken('(minor) tweak')).toBe(BUMP_TOKEN.NONE);
    });
  });

  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
  // higherPriorityBumpToken()
  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

  describe('higherPriorityBumpToken()', () => {
    const ordered: BumpToken[] = [
      BUMP_TOKEN.NONE,
      BUMP_TOKEN.NO_BUMP,
      BUMP_TOKEN.PATCH_OR_FIX,
      BUMP_TOKEN.MINOR,
      BUMP_TOKEN.MAJOR,
    ];

    it('should follow MAJOR > MINOR > PATCH_OR_FIX > NO_BUMP > NONE for every pair', () => {
      for (const [i, lower] of ordered.entries()) {
        for (const higher of ordered.slice(i)) {
          expect(higherPriorityBumpToken(lower, higher)).toBe(higher);
          expect(higherPriorityBumpToken(higher, lower)).toBe(higher);
        }
      }
    });
  });

  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
  // scanBumpTokens()
  ////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

  describe('scanBumpTokens()', () => {
    it('should return NONE for no messages', () => {
      expect(scanBumpTokens([])).toBe(BUMP_TOKEN.NONE);
    });

    it('should return NONE when no title carries a token', () => {
      expect(scanBumpTokens(['fix: bug', 'docs: typo'])).toBe(BUMP_TOKEN.NONE);
    });

    it('should let a single major commit win among unlabelled ones', () => {
      expect(scanBumpTokens(['fix: bug', 'Rework config format [major]', 'docs: typo'])).toBe(BUMP_TOKEN.MAJOR);
    });

    it('should pick MAJOR over MINOR regardless of order', () => {
      expect(scanBumpTokens(['Add export [minor]', 'Drop Node 18 [major]'])).toBe(BUMP_TOKEN.MAJOR);
      expect(scanBumpTokens(['Drop Node 18 [major]', 'Add export [minor]'])).toBe(BUMP_TOKEN.MAJOR);
    });

    it('should let an explicit patch token outrank a no-bump token in another commit', () => {
      expect(scanBumpTokens(['Tidy CI [no-bump]', 'Fix crash [fix]'])).toBe(BUMP_TOKEN.PATCH_OR_FIX);
    });

    it('should return NO_BUMP when it is the only token', () => {
      expect(scanBumpTokens(['Tidy CI [no-bump]', 'refactor: rename variable'])).toBe(BUMP_TOKEN.NO_BUMP);
    });

    it('should log each commit carrying a token', () => {
      scanBumpTokens(['Drop API [major]\n\nbody', 'plain commit']);

      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith("Found bump token 'major' in commit: Drop API [major]");
    });
  });
});
