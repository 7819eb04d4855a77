/**
 * Context and runtime related types
 */

/**
 * Interface representing the workflow context this GitHub Action runs in.
 */
export interface Context {
  /**
   * The name of the event that triggered the workflow (e.g. `pull_request`, `push`).
   */
  eventName: string;

  /**
   * The repository in `owner/repo` form.
   */
  repository: string;

  /**
   * The workspace directory where the repository is checked out during the workflow run.
   */
  workspaceDir: string;

  /**
   * The revision range covering the commits introduced by the event, or `null` when the event
   * carries none (e.g. a `workflow_dispatch` run or the deletion of a branch).
   *
   * - pull_request: `<base sha>..<head sha>`
   * - push: `<before sha>..<after sha>`
   * - push creating a branch: `<after sha>`, limited by {@link eventMaxCount}
   */
  eventRevRange: string | null;

  /**
   * The number of commits to read from {@link eventRevRange}, or `null` when the range bounds them.
   */
  eventMaxCount: number | null;
}
