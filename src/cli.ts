import { CommitCheck } from '@/check';
import type { CommitCheckDependencies } from '@/check';
import { getExitCode } from '@/errors';
import { getRuleSetNames } from '@/rules';
import type { CheckArguments, Settings } from '@/types';
import { DEFAULT_SETTINGS, EXIT_CODE } from '@/utils/constants';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { version } from '../package.json';

/**
 * Options as parsed by commander. `allowedPrefixes` is `true` when the flag is given without values.
 */
export interface CliOptions {
  commitMsgFile?: string;
  message?: string;
  revRange?: string;
  allowAbort?: boolean;
  messageLengthLimit?: number;
  allowedPrefixes?: string[] | true;
  ruleSet: string;
  schemaPattern: string;
  encoding: BufferEncoding;
  dir: string;
}

/**
 * Collaborators of the CLI. `writeOut` and `writeErr` receive commander's help and error text and
 * the failure report; they default to the process streams.
 */
export interface CliDependencies extends CommitCheckDependencies {
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

function parseLengthLimit(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseEncoding(value: string): BufferEncoding {
  if (!Buffer.isEncoding(value)) {
    throw new InvalidArgumentError(`Unsupported encoding '${value}'.`);
  }
  return value;
}

/**
 * Builds the `commit-check` command.
 */
export function createCommand(dependencies: CliDependencies = {}): Command {
  const writeOut = dependencies.writeOut ?? ((text: string) => process.stdout.write(text));
  const writeErr = dependencies.writeErr ?? ((text: string) => process.stderr.write(text));

  return new Command()
    .name('commit-check')
    .description('Check that commit messages follow a commit convention')
    .version(version)
    .option('--commit-msg-file <path>', 'file holding the message to check, e.g. in a commit-msg hook')
    .option('-m, --message <text>', 'commit message to check')
    .option('--rev-range <range>', 'check every commit of a git revision range, e.g. origin/main..HEAD')
    .option('--allow-abort', 'accept an empty commit message')
    .option('-l, --message-length-limit <limit>', 'maximum length of the first line (0 = unlimited)', parseLengthLimit)
    .option(
      '--allowed-prefixes [prefixes...]',
      'message prefixes exempt from checks; give the flag without values to disable every exemption',
    )
    .option('--rule-set <name>', `rule set to validate with (${getRuleSetNames().join(', ')})`, DEFAULT_SETTINGS.ruleSet)
    .option('--schema-pattern <regex>', 'pattern of the customize rule set', DEFAULT_SETTINGS.schemaPattern)
    .option('--encoding <encoding>', 'encoding of the message file', parseEncoding, DEFAULT_SETTINGS.encoding)
    .option('-d, --dir <path>', 'git working directory', process.cwd())
    .exitOverride()
    .configureOutput({ writeOut, writeErr });
}

/**
 * Converts parsed options into settings and check arguments.
 */
export function toCheckInput(options: CliOptions): { settings: Settings; args: CheckArguments } {
  const settings: Settings = {
    ...DEFAULT_SETTINGS,
    ruleSet: options.ruleSet,
    schemaPattern: options.schemaPattern,
    encoding: options.encoding,
  };

  const args: CheckArguments = {
    commitMsgFile: options.commitMsgFile,
    message: options.message,
    revRange: options.revRange,
    allowAbort: options.allowAbort,
    messageLengthLimit: options.messageLengthLimit,
    allowedPrefixes: options.allowedPrefixes === true ? [] : options.allowedPrefixes,
  };

  return { settings, args };
}

/**
 * Runs the CLI and returns the process exit code. Failures are written to standard error.
 *
 * @param argv - The full argument vector, including the node binary and script path
 */
export function runCli(argv: string[], dependencies: CliDependencies = {}): number {
  const command = createCommand(dependencies);
  const writeErr = dependencies.writeErr ?? ((text: string) => process.stderr.write(text));

  try {
    command.parse(argv);
    const options = command.opts<CliOptions>();
    const { settings, args } = toCheckInput(options);

    new CommitCheck(settings, args, { cwd: options.dir, ...dependencies }).run();

    return EXIT_CODE.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander already printed its message (or the help text)
      return error.exitCode;
    }

    writeErr(`${error instanceof Error ? error.message : String(error)}\n`);
    return getExitCode(error);
  }
}
