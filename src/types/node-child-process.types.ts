/**
 * Error thrown by `execFileSync` when the child process fails.
 */
export interface ExecSyncError extends Error {
  /**
   * The exit code of the subprocess, or null if the subprocess terminated due to a signal.
   */
  status: number | null;

  /**
   * The signal used to kill the subprocess, or null if the subprocess did not terminate due to a signal.
   */
  signal: string | null;

  /**
   * The captured standard output of the subprocess.
   */
  stdout: Buffer | string;

  /**
   * The captured standard error of the subprocess.
   */
  stderr: Buffer | string;
}

