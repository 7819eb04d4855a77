import { createCommand, runCli, toCheckInput } from '@/cli';
import type { CliOptions } from '@/cli';
import { createCommit, createGitStub, interactiveInput, pipedInput } from '@/tests/helpers/commits';
import { DEFAULT_SETTINGS, EXIT_CODE } from '@/utils/constants';
import { describe, expect, it, vi } from 'vitest';
import { version } from '../package.json';

function createStreams() {
  return { writeOut: vi.fn((_text: string) => {}), writeErr: vi.fn((_text: string) => {}) };
}

function cli(args: string[], dependencies: Parameters<typeof runCli>[1] = {}) {
  const streams = createStreams();
  const exitCode = runCli(['node', 'commit-check', ...args], { ...interactiveInput, ...streams, ...dependencies });
  return { exitCode, ...streams };
}

describe('cli', () => {
  describe('runCli()', () => {
    it('should pass a conforming message', () => {
      const { exitCode, writeErr } = cli(['-m', 'feat: add x']);

      expect(exitCode).toBe(EXIT_CODE.SUCCESS);
      expect(writeErr).not.toHaveBeenCalled();
    });

    it('should print the report of a failing message', () => {
      const { exitCode, writeErr } = cli(['--message', 'random text']);

      expect(exitCode).toBe(EXIT_CODE.INVALID_COMMIT_MESSAGE);
      expect(writeErr).toHaveBeenCalledTimes(1);
      expect(writeErr.mock.calls[0]?.[0]).toMatch(/^commit validation: failed!\n/);
      expect(writeErr.mock.calls[0]?.[0]).toContain('commit "": "random text"\n');
    });

    it('should reject several sources', () => {
      const { exitCode, writeErr } = cli(['-m', 'feat: add x', '--rev-range', 'a..b']);

      expect(exitCode).toBe(EXIT_CODE.INVALID_COMMAND_ARGUMENT);
      expect(writeErr).toHaveBeenCalledWith('Only one of --rev-range, --message and --commit-msg-file is permitted.\n');
    });

    it('should reject no source on an interactive terminal', () => {
      expect(cli([]).exitCode).toBe(EXIT_CODE.INVALID_COMMAND_ARGUMENT);
    });

    it('should read a piped message', () => {
      expect(cli([], pipedInput('fix: y\n')).exitCode).toBe(EXIT_CODE.SUCCESS);
    });

    it('should check a revision range', () => {
      const git = createGitStub([createCommit('feat: a', 'aaa111'), createCommit('bad', 'bbb222')]);

      const { exitCode, writeErr } = cli(['--rev-range', 'main..HEAD'], { git });

      expect(exitCode).toBe(EXIT_CODE.INVALID_COMMIT_MESSAGE);
      expect(git.getCommits).toHaveBeenCalledWith('main..HEAD', null);
      expect(writeErr.mock.calls[0]?.[0]).toContain('commit "bbb222": "bad"');
    });

    it('should report an empty range', () => {
      const { exitCode, writeErr } = cli(['--rev-range', 'a..a'], { git: createGitStub([]) });

      expect(exitCode).toBe(EXIT_CODE.NO_COMMITS_FOUND);
      expect(writeErr).toHaveBeenCalledWith("No commit found with range: 'a..a'\n");
    });

    it('should report an unknown rule set', () => {
      const { exitCode, writeErr } = cli(['--rule-set', 'nope', '-m', 'feat: add x']);

      expect(exitCode).toBe(EXIT_CODE.UNKNOWN_RULE_SET);
      expect(writeErr).toHaveBeenCalledWith(
        "The rule set 'nope' is not registered. Available rule sets: conventional-commits, issue-key, customize\n",
      );
    });

    it('should report an invalid custom pattern', () => {
      const { exitCode } = cli(['--rule-set', 'customize', '--schema-pattern', '(', '-m', 'x']);

      expect(exitCode).toBe(EXIT_CODE.INVALID_CONFIGURATION);
    });

    it('should validate with the customize rule set', () => {
      expect(cli(['--rule-set', 'customize', '--schema-pattern', 'JIRA-\\d+ ', '-m', 'JIRA-1 add x']).exitCode).toBe(
        EXIT_CODE.SUCCESS,
      );
    });

    it('should disable exemptions with a bare --allowed-prefixes', () => {
      expect(cli(['-m', "Merge branch 'x'"]).exitCode).toBe(EXIT_CODE.SUCCESS);
      expect(cli(['--allowed-prefixes', '-m', "Merge branch 'x'"]).exitCode).toBe(EXIT_CODE.INVALID_COMMIT_MESSAGE);
    });

    it('should replace the default prefixes', () => {
      expect(cli(['--allowed-prefixes', 'WIP', '-m', 'WIP add x']).exitCode).toBe(EXIT_CODE.SUCCESS);
      expect(cli(['--allowed-prefixes', 'WIP', '-m', "Merge branch 'x'"]).exitCode).toBe(
        EXIT_CODE.INVALID_COMMIT_MESSAGE,
      );
    });

    it('should enforce the length limit', () => {
      expect(cli(['-l', '10', '-m', 'feat: add a very long subject line']).exitCode).toBe(
        EXIT_CODE.INVALID_COMMIT_MESSAGE,
      );
    });

    it('should accept an empty message with --allow-abort', () => {
      expect(cli(['-m', '']).exitCode).toBe(EXIT_CODE.INVALID_COMMIT_MESSAGE);
      expect(cli(['--allow-abort', '-m', '']).exitCode).toBe(EXIT_CODE.SUCCESS);
    });

    it('should reject an invalid length limit', () => {
      const { exitCode, writeErr } = cli(['-l', 'many', '-m', 'feat: add x']);

      expect(exitCode).toBe(1);
      expect(writeErr.mock.calls[0]?.[0]).toContain('Expected a non-negative integer.');
    });

    it('should reject an unknown encoding', () => {
      const { exitCode, writeErr } = cli(['--encoding', 'klingon', '-m', 'feat: add x']);

      expect(exitCode).toBe(1);
      expect(writeErr.mock.calls[0]?.[0]).toContain("Unsupported encoding 'klingon'.");
    });

    it('should print the version', () => {
      const { exitCode, writeOut } = cli(['--version']);

      expect(exitCode).toBe(EXIT_CODE.SUCCESS);
      expect(writeOut).toHaveBeenCalledWith(`${version}\n`);
    });

    it('should print unexpected errors', () => {
      const { exitCode, writeErr } = cli(['--commit-msg-file', '/nonexistent/COMMIT_EDITMSG']);

      expect(exitCode).toBe(1);
      expect(writeErr.mock.calls[0]?.[0]).toMatch(/^ENOENT: no such file or directory/);
    });
  });

  describe('toCheckInput()', () => {
    it('should map the parsed options', () => {
      const command = createCommand().parse(
        ['--rev-range', 'a..b', '-l', '72', '--allowed-prefixes', 'WIP', 'Merge', '--encoding', 'latin1', '-d', '/repo'],
        { from: 'user' },
      );

      expect(toCheckInput(command.opts<CliOptions>())).toEqual({
        settings: { ...DEFAULT_SETTINGS, encoding: 'latin1' },
        args: {
          commitMsgFile: undefined,
          message: undefined,
          revRange: 'a..b',
          allowAbort: undefined,
          messageLengthLimit: 72,
          allowedPrefixes: ['WIP', 'Merge'],
        },
      });
      expect(command.opts<CliOptions>().dir).toBe('/repo');
    });

    it('should keep the settings prefixes when the flag is not given', () => {
      const { args } = toCheckInput(createCommand().parse(['-m', 'x'], { from: 'user' }).opts<CliOptions>());

      expect(args.allowedPrefixes).toBeUndefined();
    });
  });
});
