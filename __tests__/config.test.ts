import { clearConfigForTesting, getConfig } from '@/config';
import {
  absentInputValues,
  booleanInputs,
  getConfigKey,
  multilineInputs,
  optionalInputs,
  stubInputEnv,
} from '@/tests/helpers/inputs';
import { endGroup, getBooleanInput, getMultilineInput, info, startGroup } from '@actions/core';
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

describe('config', () => {
  beforeAll(() => {
    // Config is mocked globally; these tests exercise the real implementation.
    vi.unmock('@/config');
  });

  beforeEach(() => {
    // The config is cached, so every test starts from a fresh instance.
    clearConfigForTesting();
  });

  describe('input validation', () => {
    for (const input of optionalInputs) {
      it(`should use the default for optional input "${input}" when not present`, () => {
        stubInputEnv({ [input]: null });
        expect(getConfig()[getConfigKey(input)]).toEqual(absentInputValues[input]);
      });
    }

    it('should not parse an absent force-patch input as a boolean', () => {
      stubInputEnv({ 'force-patch-if-no-commit-token': null });
      expect(getConfig().forcePatchIfNoCommitToken).toBe(false);
      expect(getBooleanInput).not.toHaveBeenCalled();
    });

    for (const input of booleanInputs) {
      it(`should throw error when input "${input}" has an invalid boolean value`, () => {
        stubInputEnv({ [input]: 'invalid-boolean' });
        expect(() => getConfig()).toThrow(
          new Error(
            `Failed to process input '${input}': Input does not meet YAML 1.2 "Core Schema" specification: ${input}\nSupport boolean input list: \`true | True | TRUE | false | False | FALSE\``,
          ),
        );
        expect(getBooleanInput).toHaveBeenCalled();
      });
    }

    for (const input of multilineInputs) {
      it(`should trim, drop empty lines and dedupe multiline input "${input}"`, () => {
        stubInputEnv({ [input]: '  docs/**  \n\n*.md\ndocs/**\n   \n.github/**' });
        expect(getConfig()[getConfigKey(input)]).toEqual(['docs/**', '*.md', '.github/**']);
        expect(getMultilineInput).toHaveBeenCalledWith(input, { required: false });
      });
    }

    it('should accept the capitalized boolean forms', () => {
      stubInputEnv({ 'force-patch-if-no-commit-token': 'True' });
      expect(getConfig().forcePatchIfNoCommitToken).toBe(true);
    });
  });

  describe('initialization', () => {
    it('should build the config from the default inputs', () => {
      stubInputEnv();
      expect(getConfig()).toEqual({
        forcePatchIfNoCommitToken: false,
        ignorePaths: ['docs/**', '*.md'],
      });
    });

    it('should log the resolved values inside a group', () => {
      stubInputEnv({ 'force-patch-if-no-commit-token': 'true' });
      getConfig();

      expect(startGroup).toHaveBeenCalledWith('Initializing Config');
      expect(vi.mocked(info).mock.calls).toEqual([
        ['Force Patch If No Commit Token: true'],
        ['Ignore Paths: docs/**, *.md'],
      ]);
      expect(endGroup).toHaveBeenCalledTimes(1);
    });

    it('should close the group when an input is invalid', () => {
      stubInputEnv({ 'force-patch-if-no-commit-token': 'yes' });
      expect(() => getConfig()).toThrow();
      expect(endGroup).toHaveBeenCalledTimes(1);
    });

    it('should maintain singleton instance across multiple calls', () => {
      stubInputEnv();
      expect(startGroup).toHaveBeenCalledTimes(0);
      const firstInstance = getConfig();
      expect(startGroup).toHaveBeenCalledTimes(1);
      const secondInstance = getConfig();
      expect(startGroup).toHaveBeenCalledTimes(1);
      expect(firstInstance).toBe(secondInstance);
    });

    it('should rebuild the config after clearConfigForTesting()', () => {
      stubInputEnv();
      const firstInstance = getConfig();
      clearConfigForTesting();
      const secondInstance = getConfig();

      expect(firstInstance).not.toBe(secondInstance);
      expect(firstInstance).toEqual(secondInstance);
    });
  });
});
