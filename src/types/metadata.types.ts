import type { Config } from '@/types/config.types';

/**
 * Metadata definition for GitHub Action inputs that enables dynamic configuration mapping.
 *
 * This interface serves as the translation layer between GitHub Action inputs defined in
 * action.yml and our internal Config type. It provides the necessary metadata to:
 * - Parse input values according to their expected types
 * - Map action inputs to the corresponding config property names
 * - Enforce required/optional input validation
 *
 * @see {@link https://docs.github.com/en/actions/reference/metadata-syntax-for-github-actions#inputs} GitHub Actions input reference
 */
export interface ActionInputMetadata {
  /**
   * The config property name this input maps to.
   */
  configKey: keyof Config;

  /**
   * Whether this input is required by the GitHub Action.
   * When true, the action will fail if the input is not provided.
   */
  required: boolean;

  /**
   * The expected data type of the input.
   * - 'boolean': Parsed using getBooleanInput for proper true/false handling
   * - 'multiline': Newline-delimited string parsed into a trimmed, de-duplicated array
   */
  type: 'boolean' | 'multiline';
}
