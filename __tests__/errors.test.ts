import {
  CommitCheckError,
  GitCommandError,
  InvalidCommandArgumentError,
  InvalidCommitMessageError,
  InvalidConfigurationError,
  NoCommitsFoundError,
  UnknownRuleSetError,
  getExitCode,
} from '@/errors';
import { createCommit } from '@/tests/helpers/commits';
import { describe, expect, it } from 'vitest';

describe('errors', () => {
  const cases: Array<[CommitCheckError, string, number]> = [
    [new UnknownRuleSetError('x'), 'UnknownRuleSetError', 1],
    [new GitCommandError('x'), 'GitCommandError', 2],
    [new NoCommitsFoundError('x'), 'NoCommitsFoundError', 3],
    [new InvalidCommitMessageError('x', [], 0), 'InvalidCommitMessageError', 14],
    [new InvalidConfigurationError('x'), 'InvalidConfigurationError', 15],
    [new InvalidCommandArgumentError('x'), 'InvalidCommandArgumentError', 18],
  ];

  for (const [error, name, exitCode] of cases) {
    it(`should map ${name} to exit code ${exitCode}`, () => {
      expect(error.name).toBe(name);
      expect(error.exitCode).toBe(exitCode);
      expect(getExitCode(error)).toBe(exitCode);
      expect(error).toBeInstanceOf(Error);
    });
  }

  it('should map other errors to exit code 1', () => {
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode('boom')).toBe(1);
  });

  it('should keep the failures and the checked count of an invalid commit message', () => {
    const failures = [{ commit: createCommit('bad', 'abc123'), reasons: [] }];

    const error = new InvalidCommitMessageError('report', failures, 3);

    expect(error.failures).toBe(failures);
    expect(error.checkedCount).toBe(3);
  });

  it('should keep the cause', () => {
    const cause = new Error('exit status 128');

    expect(new GitCommandError('git failed', { cause }).cause).toBe(cause);
  });
});
