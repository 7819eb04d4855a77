import { CommitCheck } from '@/check';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import { InvalidCommitMessageError, getExitCode } from '@/errors';
import type { CheckArguments, Config, Context } from '@/types';
import { EXIT_CODE } from '@/utils/constants';
import { endGroup, info, setFailed, setOutput, startGroup } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Builds the check arguments from the action inputs.
 *
 * Action inputs cannot be told apart from empty strings, so empty source inputs count as absent.
 * When no source input is set, the commits of the triggering event are checked.
 *
 * @param {Config} config - The action configuration.
 * @param {Context} context - The workflow context.
 * @returns {CheckArguments | null} The arguments of the check, or `null` when neither the inputs nor
 *   the event select any commit.
 */
export function getCheckArguments(config: Config, context: Context): CheckArguments | null {
  const commitMsgFile = config.commitMsgFile || undefined;
  const message = config.message || undefined;
  let revRange = config.revRange || undefined;
  let maxCount: number | undefined;

  if (commitMsgFile === undefined && message === undefined && revRange === undefined) {
    if (context.eventRevRange === null) {
      return null;
    }
    revRange = context.eventRevRange;
    maxCount = context.eventMaxCount ?? undefined;
    info(`No commit source input set. Checking the commits of the '${context.eventName}' event: ${revRange}`);
  }

  return {
    commitMsgFile,
    message,
    revRange,
    maxCount,
    allowAbort: config.allowAbort,
    messageLengthLimit: config.messageLengthLimit,
    allowedPrefixes: config.allowedPrefixes,
  };
}

/**
 * Executes the commit message check of the action.
 *
 * 1. Reads the configuration and the workflow context
 * 2. Selects the commits from the source inputs, or from the event's revision range
 * 3. Validates every commit against the configured rule set
 * 4. Sets the `commits-checked` and `commits-failed` outputs
 *
 * Failures are reported through `setFailed`; the returned exit code tells the failure kinds apart.
 *
 * @returns {number} The process exit code.
 */
export function run(): number {
  try {
    const { config, context } = initialize();
    const args = getCheckArguments(config, context);

    if (args === null) {
      info(
        `No commit source input set and the '${context.eventName}' event introduces no commits. Set one of the 'message', 'commit-msg-file' and 'rev-range' inputs to check commits.`,
      );
      setOutput('commits-checked', 0);
      setOutput('commits-failed', 0);

      return EXIT_CODE.SUCCESS;
    }

    startGroup('Checking commit messages');
    let commitCount: number;
    try {
      const check = new CommitCheck(config, args, {
        cwd: context.workspaceDir,
        // Workflow steps have no terminal to pipe a message from
        isInputInteractive: () => true,
      });
      commitCount = check.run().commits.length;
    } finally {
      endGroup();
    }

    setOutput('commits-checked', commitCount);
    setOutput('commits-failed', 0);

    return EXIT_CODE.SUCCESS;
  } catch (error) {
    if (error instanceof InvalidCommitMessageError) {
      setOutput('commits-checked', error.checkedCount);
      setOutput('commits-failed', error.failures.length);
    }
    setFailed(error instanceof Error ? error.message : String(error));

    return getExitCode(error);
  }
}
