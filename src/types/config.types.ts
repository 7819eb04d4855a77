/**
 * Configuration related types
 */

/**
 * Values exposed by the configuration provider. These act as the defaults of a check; the
 * per-invocation {@link CheckArguments} override them.
 */
export interface Settings {
  /**
   * The registry name of the rule set used to validate messages (e.g. `conventional-commits`).
   */
  ruleSet: string;

  /**
   * Whether an empty commit message is accepted. Git leaves an empty message behind when a commit is
   * aborted from the editor, so hooks usually want this enabled.
   */
  allowAbort: boolean;

  /**
   * Literal message prefixes exempt from length and pattern checks. Defaults to the prefixes of
   * messages git writes itself (merges, reverts, fixup and squash commits).
   */
  allowedPrefixes: string[];

  /**
   * The encoding used to read a commit message file.
   */
  encoding: BufferEncoding;

  /**
   * The maximum length of the first line of a message. `0` disables the limit.
   */
  messageLengthLimit: number;

  /**
   * The regular expression source used by the `customize` rule set. Empty disables pattern
   * enforcement for that rule set.
   */
  schemaPattern: string;

  /**
   * An example message shown by the `customize` rule set in failure reports.
   */
  schemaExample: string;
}

/**
 * Per-invocation arguments of a check (the command line flags or the action's source inputs).
 *
 * `commitMsgFile`, `message` and `revRange` are mutually exclusive; an empty string counts as
 * given. `allowedPrefixes` distinguishes three cases: `undefined` uses the configured default, an
 * empty array disables every exemption and a non-empty array replaces the default.
 */
export interface CheckArguments {
  commitMsgFile?: string;
  message?: string;
  revRange?: string;

  /**
   * Limits the commits read from `revRange`.
   */
  maxCount?: number;

  allowAbort?: boolean;
  messageLengthLimit?: number;
  allowedPrefixes?: string[];
}

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config extends Settings {
  /**
   * Path to a file holding the commit message to check (e.g. `.git/COMMIT_EDITMSG`).
   * Empty when not given.
   */
  commitMsgFile: string;

  /**
   * A commit message to check. Empty when not given.
   */
  message: string;

  /**
   * A git revision range whose commits are checked (e.g. `origin/main..HEAD`). Empty when not
   * given, in which case the range is taken from the workflow event.
   */
  revRange: string;
}
