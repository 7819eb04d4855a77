import type { CommitFailure } from './commit.types';
import type { Settings } from './config.types';

/**
 * Rule plugin types
 */

/**
 * Result of validating a single commit message.
 */
export interface ValidationOutcome {
  passed: boolean;

  /**
   * Human-readable failure details. Rules following the canonical algorithm leave this empty.
   */
  reasons: string[];
}

/**
 * Parameters handed to {@link RulePlugin.validateCommitMessage} for every commit.
 */
export interface ValidateCommitMessageParams {
  message: string;
  pattern: RegExp | null;
  allowAbort: boolean;
  allowedPrefixes: ReadonlyArray<string>;
  messageLengthLimit: number;
}

/**
 * The grammar of one commit convention.
 *
 * The check command depends on this interface only; concrete rule sets are resolved by name through
 * the registry in `@/rules`.
 */
export interface RulePlugin {
  /**
   * The registry name of the rule set (e.g. `conventional-commits`).
   */
  readonly name: string;

  /**
   * The pattern a conforming message must match at its start, or `null` when the rule only checks
   * that a message exists.
   */
  schemaPattern(): RegExp | null;

  validateCommitMessage(params: ValidateCommitMessageParams): ValidationOutcome;

  /**
   * Renders the summary thrown with `InvalidCommitMessageError`. Lists the revision and raw message
   * of every failed commit.
   */
  formatFailureReport(failures: ReadonlyArray<CommitFailure>): string;

  /**
   * Short human description of the expected format, e.g. `<type>(<scope>): <subject>`.
   */
  schema?(): string;

  /**
   * An example of a conforming commit message.
   */
  example?(): string;
}

/**
 * Creates a rule plugin from the active settings.
 */
export type RuleFactory = (settings: Settings) => RulePlugin;
