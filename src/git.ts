import { execFileSync } from 'node:child_process';
import { GitCommandError } from '@/errors';
import type { CommitRecord, ExecSyncError, GitLogAccessor } from '@/types';
import { info } from '@actions/core';
import which from 'which';

/**
 * `git log` format: full hash and raw body separated by NUL. With `-z` every commit is terminated by
 * NUL too. NUL is the one byte git refuses to store in a commit message.
 */
const GIT_LOG_FORMAT = '--format=%H%x00%B';

function isExecSyncError(error: unknown): error is ExecSyncError {
  return error instanceof Error && 'status' in error && 'stderr' in error;
}

/**
 * The subject git reports for a message (`%s`): the first paragraph with its lines joined by spaces.
 */
export function getSubject(message: string): string {
  const [paragraph = ''] = message.trim().split(/\n\s*\n/);
  return paragraph
    .split('\n')
    .map((line) => line.trim())
    .join(' ');
}

/**
 * Splits `git log -z` output produced with {@link GIT_LOG_FORMAT} into commit records.
 *
 * @param output - The raw standard output of `git log`
 * @returns One record per commit, in output order
 */
export function parseGitLog(output: string): CommitRecord[] {
  const fields = output.split('\0');
  const commits: CommitRecord[] = [];

  for (let index = 0; index < fields.length; index += 2) {
    const revision = (fields[index] ?? '').trim();
    if (revision === '') {
      continue;
    }

    const message = (fields[index + 1] ?? '').trimEnd();
    commits.push({ revision, title: getSubject(message), message });
  }

  return commits;
}

/**
 * Lists the commits of a revision range with `git log`.
 *
 * Commits are returned in the order `git log` prints them (newest first unless the range says
 * otherwise). Signature verification output is disabled so that it cannot interleave with the
 * formatted records.
 *
 * @param cwd - The git working directory
 * @param end - The revision range (e.g. `origin/main..HEAD`); `null` or an empty range lists every
 *   commit reachable from HEAD
 * @param maxCount - The maximum number of commits to list, or `null` for no limit
 * @returns The commits found, possibly none
 * @throws {GitCommandError} If git is not installed or exits with a non-zero status
 */
export function getCommits(cwd: string, end: string | null, maxCount: number | null = null): CommitRecord[] {
  const range = end || 'HEAD';
  const args = ['-c', 'log.showSignature=false', 'log', '-z', GIT_LOG_FORMAT];
  if (maxCount !== null) {
    args.push(`--max-count=${maxCount}`);
  }
  if (end) {
    args.push(end);
  }
  // Terminate revisions so a range is never taken for a path
  args.push('--');

  let output: string;
  try {
    const gitPath = which.sync('git');
    output = execFileSync(gitPath, args, {
      cwd,
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    });
  } catch (error) {
    const stderr = isExecSyncError(error) ? String(error.stderr).trim() : '';
    const detail = stderr || (error instanceof Error ? error.message : String(error));
    throw new GitCommandError(`Unable to read commits for range '${range}': ${detail}`, { cause: error });
  }

  const commits = parseGitLog(output);
  info(`Found ${commits.length} commit(s) in range '${range}'`);

  return commits;
}

/**
 * Binds {@link getCommits} to a working directory.
 */
export function createGitLogAccessor(cwd: string): GitLogAccessor {
  return {
    getCommits: (end, maxCount) => getCommits(cwd, end, maxCount),
  };
}
