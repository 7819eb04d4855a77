import type { CommitFailure, CommitRecord, RulePlugin, ValidateCommitMessageParams, ValidationOutcome } from '@/types';
import { countCharacters, getFirstLine, matchesAtStart } from '@/utils/string';

/**
 * Base class of the built-in rule sets.
 *
 * Implements the validation algorithm shared by every rule set. The order of the checks is part of
 * the contract:
 *
 * 1. An empty message passes exactly when `allowAbort` is set.
 * 2. A rule without a pattern accepts every non-empty message.
 * 3. A message starting with an allowed prefix passes, whatever its length or format.
 * 4. With a positive `messageLengthLimit`, a first line (trimmed) longer than the limit fails
 *    without the pattern being consulted.
 * 5. Otherwise the message passes when the pattern matches at its start.
 *
 * Subclasses describe failures by overriding the `*Reasons` hooks; the base implementation reports
 * none.
 */
export abstract class BaseRule implements RulePlugin {
  abstract readonly name: string;

  /**
   * Human-readable name of the convention, used in failure reports.
   */
  protected abstract readonly displayName: string;

  abstract schemaPattern(): RegExp | null;

  validateCommitMessage({
    message,
    pattern,
    allowAbort,
    allowedPrefixes,
    messageLengthLimit,
  }: ValidateCommitMessageParams): ValidationOutcome {
    if (!message) {
      return { passed: allowAbort, reasons: allowAbort ? [] : this.emptyMessageReasons() };
    }

    if (pattern === null) {
      return { passed: true, reasons: [] };
    }

    if (allowedPrefixes.some((prefix) => message.startsWith(prefix))) {
      return { passed: true, reasons: [] };
    }

    if (messageLengthLimit > 0) {
      const headerLength = countCharacters(getFirstLine(message).trim());
      if (headerLength > messageLengthLimit) {
        return { passed: false, reasons: this.messageTooLongReasons(headerLength, messageLengthLimit) };
      }
    }

    if (matchesAtStart(pattern, message)) {
      return { passed: true, reasons: [] };
    }

    return { passed: false, reasons: this.patternMismatchReasons(message, pattern) };
  }

  formatFailureReport(failures: ReadonlyArray<CommitFailure>): string {
    const pattern = this.schemaPattern();
    const lines = [
      'commit validation: failed!',
      `please enter a commit message in the ${this.displayName} format.`,
      ...failures.map(({ commit, reasons }) => this.formatFailure(commit, reasons)),
      `pattern: ${pattern === null ? 'none' : pattern.source}`,
    ];

    const example = this.example?.();
    if (example) {
      lines.push(`example: ${getFirstLine(example)}`);
    }

    return lines.join('\n');
  }

  schema?(): string;

  example?(): string;

  protected formatFailure(commit: CommitRecord, reasons: ReadonlyArray<string>): string {
    const header = `commit "${commit.revision}": "${commit.message}"`;
    if (reasons.length === 0) {
      return header;
    }

    return [header, 'errors:', ...reasons.map((reason) => `- ${reason}`)].join('\n');
  }

  protected emptyMessageReasons(): string[] {
    return [];
  }

  protected messageTooLongReasons(_length: number, _limit: number): string[] {
    return [];
  }

  protected patternMismatchReasons(_message: string, _pattern: RegExp): string[] {
    return [];
  }
}
