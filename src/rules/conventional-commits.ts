import { CommitParser } from 'conventional-commits-parser';
import { BaseRule } from '@/rules/base';
import type { ConventionalCommitHeader } from '@/types';
import { RULE_SET } from '@/utils/constants';

/**
 * Commit types accepted by the `conventional-commits` rule set.
 */
export const CONVENTIONAL_COMMIT_TYPES = [
  'build',
  'ci',
  'docs',
  'feat',
  'fix',
  'perf',
  'refactor',
  'style',
  'test',
  'chore',
  'revert',
  'bump',
] as const;

const CONVENTIONAL_COMMIT_TYPE_SET: ReadonlySet<string> = new Set(CONVENTIONAL_COMMIT_TYPES);

/**
 * Matches `<type>[(<scope>)][!]: <subject>` at the start of a message, followed by nothing but
 * whitespace or by a blank line and a body. The `s` flag lets the body span several lines.
 */
const CONVENTIONAL_COMMIT_PATTERN = new RegExp(
  `(?<type>${CONVENTIONAL_COMMIT_TYPES.join('|')})(?<scope>\\(\\S+\\))?!?: (?<subject>[^\\n\\r]+)(?<body>\\n\\n.*|\\s*)?$`,
  's',
);

/**
 * Header options of the `conventional-changelog-conventionalcommits` preset. The `!?` in
 * `headerPattern` lets `feat!: x` parse; `breakingHeaderPattern` records it as a breaking change.
 */
const commitParser = new CommitParser({
  headerPattern: /^(\w*)(?:\((.*)\))?!?: (.*)$/,
  breakingHeaderPattern: /^(\w*)(?:\((.*)\))?!: (.*)$/,
  headerCorrespondence: ['type', 'scope', 'subject'],
  noteKeywords: ['BREAKING CHANGE', 'BREAKING-CHANGE'],
});

/**
 * Parses the header of a commit message with the Conventional Commits grammar.
 *
 * The header grammar here is looser than the rule set's pattern: any word is accepted as type and
 * the scope may contain spaces. This lets a failure report name what is wrong with a header.
 *
 * @param message - The full commit message
 * @returns The parsed header, or `null` when the first line is not `<type>[(<scope>)][!]: <subject>`
 *
 * @example
 * ```typescript
 * parseConventionalHeader('fix(auth)!: remove legacy flow')
 * // → { type: 'fix', scope: 'auth', breaking: true, subject: 'remove legacy flow' }
 *
 * parseConventionalHeader('update readme')
 * // → null
 * ```
 */
export function parseConventionalHeader(message: string): ConventionalCommitHeader | null {
  const trimmed = message.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = commitParser.parse(trimmed);
  if (!parsed.type) {
    return null;
  }

  return {
    type: parsed.type,
    scope: parsed.scope ?? null,
    breaking: parsed.notes.length > 0,
    subject: parsed.subject ?? '',
  };
}

/**
 * Explains why a message does not match the Conventional Commits pattern.
 *
 * @param message - A non-empty message that failed the pattern
 * @returns One reason describing the first problem found
 */
export function diagnoseConventionalCommit(message: string): string {
  if (/^\s/.test(message)) {
    return 'commit message must not start with whitespace';
  }

  const header = parseConventionalHeader(message);

  if (header === null) {
    return 'commit header must be formatted as "<type>[(<scope>)][!]: <subject>"';
  }

  if (!CONVENTIONAL_COMMIT_TYPE_SET.has(header.type)) {
    return `unknown commit type "${header.type}", expected one of: ${CONVENTIONAL_COMMIT_TYPES.join(', ')}`;
  }

  if (/^\w*\(\s*\)/.test(message)) {
    return 'commit scope must not be empty when parentheses are given';
  }

  if (header.scope !== null && /\s/.test(header.scope)) {
    return `commit scope "${header.scope}" must not contain whitespace`;
  }

  return 'commit body must be separated from the header by a blank line';
}

/**
 * The default rule set, implementing the Conventional Commits v1.0.0 header grammar.
 *
 * @see https://www.conventionalcommits.org/en/v1.0.0/
 */
export class ConventionalCommitsRule extends BaseRule {
  readonly name = RULE_SET.CONVENTIONAL_COMMITS;

  protected readonly displayName = 'Conventional Commits';

  schemaPattern(): RegExp {
    return CONVENTIONAL_COMMIT_PATTERN;
  }

  schema(): string {
    return '<type>(<scope>): <subject>\n<BLANK LINE>\n<body>\n<BLANK LINE>\n(BREAKING CHANGE: )<footer>';
  }

  example(): string {
    return 'fix: correct minor typos in code\n\nsee the issue for details on the typos fixed\n\ncloses issue #12';
  }

  protected messageTooLongReasons(length: number, limit: number): string[] {
    return [`commit header is ${length} characters long, the limit is ${limit}`];
  }

  protected patternMismatchReasons(message: string): string[] {
    return [diagnoseConventionalCommit(message)];
  }
}
