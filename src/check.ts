import { CommitSource, createDefaultSourceDependencies } from '@/commit-source';
import type { CommitSourceDependencies } from '@/commit-source';
import { InvalidCommandArgumentError, InvalidCommitMessageError, NoCommitsFoundError } from '@/errors';
import { createGitLogAccessor } from '@/git';
import { logOutput } from '@/output';
import { createRule } from '@/rules';
import type { CheckArguments, CommitFailure, CommitRecord, OutputSink, RulePlugin, Settings } from '@/types';
import { SUCCESS_MESSAGE } from '@/utils/constants';
import { info } from '@actions/core';

/**
 * Collaborators of a check. Every one is optional and defaults to the real implementation.
 */
export interface CommitCheckDependencies extends Partial<CommitSourceDependencies> {
  /**
   * The rule plugin. Defaults to the rule set named by `settings.ruleSet`.
   */
  rule?: RulePlugin;

  /**
   * Receives the success notice.
   */
  output?: OutputSink;

  /**
   * The git working directory used by the default git accessor.
   */
  cwd?: string;
}

/**
 * Outcome of a successful check.
 */
export interface CheckResult {
  /**
   * The name of the rule set the commits were validated with.
   */
  ruleSet: string;

  /**
   * Every commit checked, in source order.
   */
  commits: CommitRecord[];
}

/**
 * Validates the commit messages selected by a set of arguments against a rule set.
 *
 * Arguments take precedence over settings; `allowedPrefixes` falls back to the settings only when
 * it is `undefined`, so an empty list disables every exemption.
 */
export class CommitCheck {
  readonly allowAbort: boolean;

  readonly messageLengthLimit: number;

  readonly allowedPrefixes: ReadonlyArray<string>;

  readonly rule: RulePlugin;

  private readonly source: CommitSource;

  private readonly output: OutputSink;

  /**
   * @throws {InvalidCommandArgumentError} If the arguments select no source or several sources, or
   *   the length limit is not a non-negative integer
   * @throws {UnknownRuleSetError} If the configured rule set is not registered
   */
  constructor(settings: Settings, args: CheckArguments, dependencies: CommitCheckDependencies = {}) {
    this.allowAbort = args.allowAbort ?? settings.allowAbort;
    this.messageLengthLimit = args.messageLengthLimit ?? settings.messageLengthLimit;
    this.allowedPrefixes = args.allowedPrefixes ?? settings.allowedPrefixes;

    if (!Number.isInteger(this.messageLengthLimit) || this.messageLengthLimit < 0) {
      throw new InvalidCommandArgumentError(
        `Message length limit must be a non-negative integer. Got: '${this.messageLengthLimit}'`,
      );
    }

    const defaults = createDefaultSourceDependencies(
      dependencies.git ?? createGitLogAccessor(dependencies.cwd ?? process.cwd()),
    );
    this.source = new CommitSource(args, settings.encoding, {
      git: defaults.git,
      isInputInteractive: dependencies.isInputInteractive ?? defaults.isInputInteractive,
      readInput: dependencies.readInput ?? defaults.readInput,
    });

    this.rule = dependencies.rule ?? createRule(settings);
    this.output = dependencies.output ?? logOutput;
  }

  /**
   * Runs the check.
   *
   * Every commit is validated, so the failure report lists all offending commits rather than only
   * the first one.
   *
   * @returns The checked commits when all of them pass
   * @throws {NoCommitsFoundError} If the source yields no commit
   * @throws {InvalidCommitMessageError} If at least one commit fails validation
   */
  run(): CheckResult {
    const commits = this.source.getCommits();
    if (commits.length === 0) {
      throw new NoCommitsFoundError(`No commit found with range: '${this.source.revRange ?? 'HEAD'}'`);
    }

    const pattern = this.rule.schemaPattern();
    const failures: CommitFailure[] = [];

    for (const commit of commits) {
      const { passed, reasons } = this.rule.validateCommitMessage({
        message: commit.message,
        pattern,
        allowAbort: this.allowAbort,
        allowedPrefixes: this.allowedPrefixes,
        messageLengthLimit: this.messageLengthLimit,
      });

      if (!passed) {
        failures.push({ commit, reasons });
      }
    }

    info(`Checked ${commits.length} commit(s) with rule set '${this.rule.name}', ${failures.length} failed`);

    if (failures.length > 0) {
      throw new InvalidCommitMessageError(this.rule.formatFailureReport(failures), failures, commits.length);
    }

    this.output.success(SUCCESS_MESSAGE);

    return { ruleSet: this.rule.name, commits };
  }
}
