import { readFileSync } from 'node:fs';
import { filterComments } from '@/comment-filter';
import { InvalidCommandArgumentError } from '@/errors';
import type { CheckArguments, CommitRecord, CommitSelection, GitLogAccessor } from '@/types';

/**
 * Capabilities the commit source needs from its environment. Injected so tests can stand in for
 * git and for the process's standard input.
 */
export interface CommitSourceDependencies {
  git: GitLogAccessor;

  /**
   * Whether standard input is an interactive terminal. Piped input is read as the commit message
   * when no source is selected explicitly.
   */
  isInputInteractive: () => boolean;

  /**
   * Reads the whole of standard input.
   */
  readInput: (encoding: BufferEncoding) => string;
}

/**
 * Default capabilities, bound to the current process.
 */
export function createDefaultSourceDependencies(git: GitLogAccessor): CommitSourceDependencies {
  return {
    git,
    isInputInteractive: () => process.stdin.isTTY === true,
    readInput: (encoding) => readFileSync(0, { encoding }),
  };
}

/**
 * Determines the selection mode from the source arguments.
 *
 * `commitMsgFile`, `message` and `revRange` are mutually exclusive; an empty string counts as
 * given. When none is given and standard input is not interactive, the piped input becomes the
 * message.
 *
 * @throws {InvalidCommandArgumentError} If no source or more than one source is given
 */
export function selectCommitSource(
  args: Pick<CheckArguments, 'commitMsgFile' | 'message' | 'revRange' | 'maxCount'>,
  encoding: BufferEncoding,
  dependencies: Pick<CommitSourceDependencies, 'isInputInteractive' | 'readInput'>,
): CommitSelection {
  const { commitMsgFile, message, revRange } = args;
  const providedCount = [commitMsgFile, message, revRange].filter((value) => value !== undefined).length;

  if (providedCount === 0) {
    if (dependencies.isInputInteractive()) {
      throw new InvalidCommandArgumentError(
        'No commit message source given. Use one of --rev-range, --message and --commit-msg-file, or pipe a message to standard input.',
      );
    }
    return { mode: 'stdin', message: dependencies.readInput(encoding) };
  }

  if (providedCount > 1) {
    throw new InvalidCommandArgumentError('Only one of --rev-range, --message and --commit-msg-file is permitted.');
  }

  if (commitMsgFile !== undefined) {
    return { mode: 'file', path: commitMsgFile };
  }
  if (message !== undefined) {
    return { mode: 'message', message };
  }
  return { mode: 'rev-range', revRange: revRange ?? null, maxCount: args.maxCount ?? null };
}

/**
 * Produces the commits a check validates, from exactly one selection mode.
 *
 * The selection is made when the source is constructed, so invalid argument combinations fail
 * before any commit is read.
 */
export class CommitSource {
  readonly selection: CommitSelection;

  private readonly encoding: BufferEncoding;

  private readonly git: GitLogAccessor;

  constructor(
    args: Pick<CheckArguments, 'commitMsgFile' | 'message' | 'revRange' | 'maxCount'>,
    encoding: BufferEncoding,
    dependencies: CommitSourceDependencies,
  ) {
    this.encoding = encoding;
    this.git = dependencies.git;
    this.selection = selectCommitSource(args, encoding, dependencies);
  }

  /**
   * The revision range commits are read from, or `null` when the message does not come from git.
   */
  get revRange(): string | null {
    return this.selection.mode === 'rev-range' ? this.selection.revRange : null;
  }

  /**
   * Resolves the commits to validate, in the order they are checked.
   *
   * Messages from a file, the command line or standard input are stripped of comments and wrapped in
   * a single record with an empty revision. Commits from git are returned as `git log` lists them.
   *
   * @throws If the message file cannot be read (the file system error is not wrapped)
   * @throws {GitCommandError} If `git log` fails
   */
  getCommits(): CommitRecord[] {
    switch (this.selection.mode) {
      case 'file':
        return [createSyntheticCommit(readFileSync(this.selection.path, { encoding: this.encoding }))];
      case 'message':
      case 'stdin':
        return [createSyntheticCommit(this.selection.message)];
      case 'rev-range':
        return this.git.getCommits(this.selection.revRange, this.selection.maxCount);
    }
  }
}

function createSyntheticCommit(rawMessage: string): CommitRecord {
  return { revision: '', title: '', message: filterComments(rawMessage) };
}
