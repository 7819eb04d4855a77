/**
 * Commit related types
 */

/**
 * A single commit whose message is checked.
 *
 * Records read from a message file, the `--message` argument or standard input are synthetic: they
 * carry an empty `revision` and `title`.
 */
export interface CommitRecord {
  /**
   * The full commit SHA, or an empty string for synthetic records.
   */
  readonly revision: string;

  /**
   * The commit subject line as reported by git. May be empty.
   */
  readonly title: string;

  /**
   * The complete commit message. Never null, may be empty.
   */
  readonly message: string;
}

/**
 * A commit that failed validation, paired with the reasons reported by the rule.
 */
export interface CommitFailure {
  commit: CommitRecord;
  reasons: string[];
}

/**
 * Reads commits from history. `end` is the revision range passed to `git log`; `null` or an empty
 * range lists every commit reachable from HEAD. `maxCount` limits the number of commits listed.
 */
export interface GitLogAccessor {
  getCommits(end: string | null, maxCount: number | null): CommitRecord[];
}

/**
 * Receives the user-visible success notice of a check.
 */
export interface OutputSink {
  success(message: string): void;
}

/**
 * The header of a message parsed with the Conventional Commits grammar.
 */
export interface ConventionalCommitHeader {
  /** The commit type as written (e.g. 'feat', 'fix') */
  type: string;
  /** The optional scope, without parentheses */
  scope: string | null;
  /** Whether the message declares a breaking change (`!` in the header or a `BREAKING CHANGE` footer) */
  breaking: boolean;
  /** The text after `: ` */
  subject: string;
}

/**
 * The single source a check reads commits from.
 *
 * - 'message': a message given on the command line
 * - 'file': a file holding the message (e.g. `.git/COMMIT_EDITMSG`)
 * - 'rev-range': the commits of a revision range, read with `git log`
 * - 'stdin': a message piped to standard input
 */
export type CommitSelection =
  | { mode: 'message'; message: string }
  | { mode: 'file'; path: string }
  | { mode: 'rev-range'; revRange: string | null; maxCount: number | null }
  | { mode: 'stdin'; message: string };
