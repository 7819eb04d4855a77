import { BaseRule } from '@/rules/base';
import { RULE_SET } from '@/utils/constants';

/**
 * Matches `<ISSUE-KEY>: <subject>`, e.g. `ABC-123: add login form`, optionally followed by a blank
 * line and a body.
 */
const ISSUE_KEY_PATTERN = /(?<issue>[A-Z][A-Z0-9]*-\d+): (?<subject>[^\n\r]+)(?<body>\n\n.*|\s*)?$/s;

/**
 * Rule set for teams that prefix every commit with the key of a tracker issue.
 *
 * Unlike the default rule set it reports a reason for every failure, an empty message included.
 */
export class IssueKeyRule extends BaseRule {
  readonly name = RULE_SET.ISSUE_KEY;

  protected readonly displayName = 'issue key';

  schemaPattern(): RegExp {
    return ISSUE_KEY_PATTERN;
  }

  schema(): string {
    return '<issue key>: <subject>';
  }

  example(): string {
    return 'ABC-123: add the login form';
  }

  protected emptyMessageReasons(): string[] {
    return ['commit message is empty'];
  }

  protected messageTooLongReasons(_length: number, limit: number): string[] {
    return [`commit message is too long. Max length is ${limit}`];
  }

  protected patternMismatchReasons(_message: string, pattern: RegExp): string[] {
    return [`commit message does not match pattern ${pattern.source}`];
  }
}
