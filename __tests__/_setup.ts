import { config } from '@/mocks/config';
import { context } from '@/mocks/context';
import { afterEach, beforeEach, vi } from 'vitest';

// Mocked node modules (./__mocks__/*)
vi.mock('@actions/core');

// Mocked internal modules
vi.mock('@/config', () => import('@/mocks/config'));
vi.mock('@/context', () => import('@/mocks/context'));

const defaultEnvironmentVariables = {
  GITHUB_SHA: 'c0ffee0000000000000000000000000000000000',
  GITHUB_WORKSPACE: process.cwd(),
};

beforeEach(() => {
  // Initialize environment
  for (const [key, value] of Object.entries(defaultEnvironmentVariables)) {
    vi.stubEnv(key, value);
  }

  config.resetDefaults();
  context.reset();

  // Clear all mocked functions usage data and state
  vi.clearAllMocks();
});

afterEach(() => {
  // Unstub all environment variables.
  vi.unstubAllEnvs();

  // Clear all mocked functions usage data and state
  vi.clearAllMocks();
});
