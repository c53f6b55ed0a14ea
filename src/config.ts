import type { Config } from '@/types';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Resets the singleton so the next config access starts fresh with new mocked inputs.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object. Importing this module does not read any inputs;
 * they are read on the first getConfig() call.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const instance = createConfigFromInputs();

    info(`Force Patch If No Commit Token: ${instance.forcePatchIfNoCommitToken}`);
    info(`Ignore Paths: ${instance.ignorePaths.join(', ')}`);

    configInstance = instance;
    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}
