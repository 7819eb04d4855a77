import type { Settings } from '@/types';

/**
 * The scissors line `git commit --verbose` writes above the diff it appends to the message
 * template. The line and everything below it are never part of the commit message.
 */
export const VERBOSE_DIFF_DELIMITER = '# ------------------------ >8 ------------------------';

/**
 * Prefixes of messages written by git itself (merges, reverts, fixup/squash/amend commits) or by
 * hosting platforms. Messages starting with one of these skip length and pattern checks.
 */
export const DEFAULT_ALLOWED_PREFIXES = ['Merge', 'Revert', 'Pull request', 'fixup!', 'squash!', 'amend!'];

/**
 * Registry names of the built-in rule sets.
 */
export const RULE_SET = {
  CONVENTIONAL_COMMITS: 'conventional-commits',
  ISSUE_KEY: 'issue-key',
  CUSTOMIZE: 'customize',
} as const;

/**
 * Settings used when no configuration overrides them.
 */
export const DEFAULT_SETTINGS: Settings = {
  ruleSet: RULE_SET.CONVENTIONAL_COMMITS,
  allowAbort: false,
  allowedPrefixes: DEFAULT_ALLOWED_PREFIXES,
  encoding: 'utf-8',
  messageLengthLimit: 0,
  schemaPattern: '',
  schemaExample: '',
};

/**
 * Process exit codes, one per failure kind.
 */
export const EXIT_CODE = {
  SUCCESS: 0,
  UNKNOWN_RULE_SET: 1,
  GIT_COMMAND_FAILED: 2,
  NO_COMMITS_FOUND: 3,
  INVALID_COMMIT_MESSAGE: 14,
  INVALID_CONFIGURATION: 15,
  INVALID_COMMAND_ARGUMENT: 18,
} as const;

export const SUCCESS_MESSAGE = 'Commit validation: successful!';

