import { VERBOSE_DIFF_DELIMITER } from '@/utils/constants';

/**
 * Removes comment lines and the verbose diff from a raw commit message.
 *
 * Lines starting with `#` are dropped. Processing stops at the verbose-diff delimiter line written
 * by `git commit --verbose`; that line and everything below it are discarded.
 *
 * Only messages read from a file, the command line or standard input go through this filter.
 * Messages read with `git log` were already cleaned up by git when the commit was recorded.
 *
 * @param message - The raw message, typically the content of `.git/COMMIT_EDITMSG`
 * @returns The message without comments
 *
 * @example
 * ```typescript
 * filterComments('feat: x\n# Please enter the commit message\nbody')
 * // → 'feat: x\nbody'
 * ```
 */
export function filterComments(message: string): string {
  const lines: string[] = [];

  for (const line of message.split('\n')) {
    if (line === VERBOSE_DIFF_DELIMITER) {
      break;
    }
    if (!line.startsWith('#')) {
      lines.push(line);
    }
  }

  return lines.join('\n');
}
