import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput, getMultilineInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 */
const optionalBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'boolean',
});

const optionalMultiline = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'multiline',
});

/**
 * Complete mapping of all GitHub Action inputs to their metadata.
 * This is the single source of truth for input configuration.
 * Note: defaults come from action.yml at runtime
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  'force-patch-if-no-commit-token': optionalBoolean('forcePatchIfNoCommitToken'),
  'ignore-paths': optionalMultiline('ignorePaths'),
} as const;

/**
 * Reads a boolean input. An optional input that is absent reads as false, since getBooleanInput
 * rejects an empty string.
 */
function getBooleanInputOrDefault(inputName: string, required: boolean): boolean {
  if (!required && getInput(inputName) === '') {
    return false;
  }

  return getBooleanInput(inputName, { required });
}

/**
 * Reads a newline-delimited input into a list of trimmed, non-empty, unique values.
 */
function getUniqueMultilineInput(inputName: string, required: boolean): string[] {
  const lines = getMultilineInput(inputName, { required })
    .map((line) => line.trim())
    .filter(Boolean);

  return Array.from(new Set(lines));
}

/**
 * Creates a config object by reading inputs using GitHub Actions API and converting them
 * according to the metadata definitions.
 */
export function createConfigFromInputs(): Config {
  const config: Config = {
    forcePatchIfNoCommitToken: false,
    ignorePaths: [],
  };

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type } = metadata;

    try {
      const value =
        type === 'boolean'
          ? getBooleanInputOrDefault(inputName, required)
          : getUniqueMultilineInput(inputName, required);

      Object.assign(config, { [configKey]: value });
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return config;
}
