/**
 * Context and runtime related types
 */

/**
 * Interface representing the runtime context required by this GitHub Action.
 */
export interface Context {
  /**
   * The commit SHA that triggered the workflow run.
   */
  sha: string;

  /**
   * The workspace directory where the repository is checked out during the workflow run.
   */
  workspaceDir: string;
}
