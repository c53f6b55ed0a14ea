import * as fs from 'node:fs';
import type { Context } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

/**
 * Retrieves a required environment variable.
 * This function checks if the environment variable exists and is a valid string.
 * If it is missing or invalid, an error is thrown to halt the workflow execution.
 *
 * @param {string} name - The name of the environment variable to retrieve.
 * @returns {string} The value of the environment variable.
 * @throws {Error} If the environment variable is missing or invalid.
 */
function getRequiredEnvironmentVar(name: string): string {
  const value = process.env[name];
  if (!value || typeof value !== 'string') {
    throw new Error(
      `The ${name} environment variable is missing or invalid. This variable should be automatically set by GitHub for each workflow run. Please review the workflow setup.`,
    );
  }

  return value;
}

/**
 * Clears the cached context instance during testing.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different context variations
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Lazily initializes the context object that contains the triggering commit and the checkout
 * directory. The context is only created once and reused for subsequent calls.
 *
 * @returns {Context} The context object.
 * @throws {Error} If a required environment variable is missing or the workspace does not exist.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const sha = getRequiredEnvironmentVar('GITHUB_SHA');
    const workspaceDir = getRequiredEnvironmentVar('GITHUB_WORKSPACE');

    if (!fs.existsSync(workspaceDir)) {
      throw new Error(`Specified GITHUB_WORKSPACE ${workspaceDir} does not exist`);
    }

    contextInstance = { sha, workspaceDir };

    info(`Commit SHA: ${contextInstance.sha}`);
    info(`Workspace Directory: ${contextInstance.workspaceDir}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (): Context => {
  return initializeContext();
};

// Property access initializes the context on first use
export const context: Context = new Proxy({} as Context, {
  get(_target, prop) {
    return getContext()[prop as keyof Context];
  },
});
