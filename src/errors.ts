import type { CommitFailure } from '@/types';
import { EXIT_CODE } from '@/utils/constants';

/**
 * Base class of every failure the check reports at the process boundary. Each subclass carries the
 * exit code the CLI and the action terminate with.
 */
export abstract class CommitCheckError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The invocation selected zero or several commit sources.
 */
export class InvalidCommandArgumentError extends CommitCheckError {
  readonly exitCode = EXIT_CODE.INVALID_COMMAND_ARGUMENT;
}

/**
 * The selected revision range holds no commits.
 */
export class NoCommitsFoundError extends CommitCheckError {
  readonly exitCode = EXIT_CODE.NO_COMMITS_FOUND;
}

/**
 * One or more commits failed validation. The message is the rule's full report; `failures` keeps
 * every failed commit in source order and `checkedCount` counts every commit validated.
 */
export class InvalidCommitMessageError extends CommitCheckError {
  readonly exitCode = EXIT_CODE.INVALID_COMMIT_MESSAGE;

  constructor(
    message: string,
    readonly failures: ReadonlyArray<CommitFailure>,
    readonly checkedCount: number,
  ) {
    super(message);
  }
}

/**
 * The configured rule set name is not registered.
 */
export class UnknownRuleSetError extends CommitCheckError {
  readonly exitCode = EXIT_CODE.UNKNOWN_RULE_SET;
}

/**
 * A setting holds a value the check cannot work with.
 */
export class InvalidConfigurationError extends CommitCheckError {
  readonly exitCode = EXIT_CODE.INVALID_CONFIGURATION;
}

/**
 * `git` exited with a non-zero status or could not be started.
 */
export class GitCommandError extends CommitCheckError {
  readonly exitCode = EXIT_CODE.GIT_COMMAND_FAILED;
}

/**
 * Returns the exit code for any thrown value. Errors outside the check's own taxonomy map to `1`.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CommitCheckError) {
    return error.exitCode;
  }
  return 1;
}
