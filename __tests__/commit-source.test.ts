import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CommitSource, createDefaultSourceDependencies, selectCommitSource } from '@/commit-source';
import { CommitCheckError, InvalidCommandArgumentError } from '@/errors';
import { createCommit, createGitStub, interactiveInput, pipedInput } from '@/tests/helpers/commits';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

describe('commit-source', () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'commit-source-'));
  });

  afterAll(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('selectCommitSource()', () => {
    it('should reject no source on an interactive terminal', () => {
      expect(() => selectCommitSource({}, 'utf-8', interactiveInput)).toThrow(InvalidCommandArgumentError);
      expect(() => selectCommitSource({}, 'utf-8', interactiveInput)).toThrow(
        'No commit message source given. Use one of --rev-range, --message and --commit-msg-file, or pipe a message to standard input.',
      );
    });

    it('should read piped input when no source is given', () => {
      const input = pipedInput('feat: from stdin\n');

      expect(selectCommitSource({}, 'latin1', input)).toEqual({ mode: 'stdin', message: 'feat: from stdin\n' });
      expect(input.readInput).toHaveBeenCalledWith('latin1');
    });

    it('should reject more than one source', () => {
      const combinations = [
        { message: 'feat: x', revRange: 'a..b' },
        { message: 'feat: x', commitMsgFile: '.git/COMMIT_EDITMSG' },
        { commitMsgFile: '.git/COMMIT_EDITMSG', revRange: 'a..b' },
        { commitMsgFile: '.git/COMMIT_EDITMSG', message: 'feat: x', revRange: 'a..b' },
      ];

      for (const args of combinations) {
        expect(() => selectCommitSource(args, 'utf-8', interactiveInput)).toThrow(
          'Only one of --rev-range, --message and --commit-msg-file is permitted.',
        );
      }
    });

    it('should not read piped input when a source is given', () => {
      const input = pipedInput('ignored');

      expect(selectCommitSource({ revRange: 'a..b' }, 'utf-8', input)).toEqual({
        mode: 'rev-range',
        revRange: 'a..b',
        maxCount: null,
      });
      expect(input.readInput).not.toHaveBeenCalled();
    });

    it('should count an empty string as a given source', () => {
      expect(selectCommitSource({ message: '' }, 'utf-8', interactiveInput)).toEqual({ mode: 'message', message: '' });
      expect(() => selectCommitSource({ message: '', revRange: '' }, 'utf-8', interactiveInput)).toThrow(
        InvalidCommandArgumentError,
      );
    });

    it('should select a file source', () => {
      expect(selectCommitSource({ commitMsgFile: 'msg.txt' }, 'utf-8', interactiveInput)).toEqual({
        mode: 'file',
        path: 'msg.txt',
      });
    });
  });

  describe('CommitSource', () => {
    it('should fail on construction for invalid arguments', () => {
      const git = createGitStub();

      expect(() => new CommitSource({ message: 'a', revRange: 'b' }, 'utf-8', { git, ...interactiveInput })).toThrow(
        InvalidCommandArgumentError,
      );
    });

    it('should strip comments from an inline message', () => {
      const source = new CommitSource({ message: 'feat: add x\n# a comment\n\nbody' }, 'utf-8', {
        git: createGitStub(),
        ...interactiveInput,
      });

      expect(source.getCommits()).toEqual([createCommit('feat: add x\n\nbody')]);
      expect(source.revRange).toBeNull();
    });

    it('should strip comments from piped input', () => {
      const source = new CommitSource({}, 'utf-8', { git: createGitStub(), ...pipedInput('fix: y\n# hint') });

      expect(source.getCommits()).toEqual([createCommit('fix: y')]);
    });

    it('should read and filter a message file', () => {
      const path = join(tmpDir, 'COMMIT_EDITMSG');
      writeFileSync(
        path,
        'fix: correct typo\n# Please enter the commit message\n# ------------------------ >8 ------------------------\ndiff --git a/x b/x\n',
      );
      const source = new CommitSource({ commitMsgFile: path }, 'utf-8', { git: createGitStub(), ...interactiveInput });

      expect(source.getCommits()).toEqual([createCommit('fix: correct typo')]);
    });

    it('should read a message file with the configured encoding', () => {
      const path = join(tmpDir, 'LATIN1_MSG');
      writeFileSync(path, Buffer.from('docs: caf\xe9', 'latin1'));
      const source = new CommitSource({ commitMsgFile: path }, 'latin1', { git: createGitStub(), ...interactiveInput });

      expect(source.getCommits()).toEqual([createCommit('docs: café')]);
    });

    it('should propagate file system errors unwrapped', () => {
      const source = new CommitSource({ commitMsgFile: join(tmpDir, 'missing') }, 'utf-8', {
        git: createGitStub(),
        ...interactiveInput,
      });

      expect(() => source.getCommits()).toThrow(/ENOENT/);
      try {
        source.getCommits();
      } catch (error) {
        expect(error).not.toBeInstanceOf(CommitCheckError);
      }
    });

    it('should return commits from git as they are', () => {
      const commits = [createCommit('feat: b\n# kept', 'bbb222', 'feat: b'), createCommit('fix: a', 'aaa111', 'fix: a')];
      const git = createGitStub(commits);
      const source = new CommitSource({ revRange: 'main..HEAD' }, 'utf-8', { git, ...interactiveInput });

      expect(source.revRange).toBe('main..HEAD');
      expect(source.getCommits()).toEqual(commits);
      expect(git.getCommits).toHaveBeenCalledWith('main..HEAD', null);
    });

    it('should pass the commit limit to git', () => {
      const git = createGitStub([createCommit('feat: a', 'aaa111', 'feat: a')]);
      const source = new CommitSource({ revRange: 'aaa111', maxCount: 1 }, 'utf-8', { git, ...interactiveInput });

      expect(source.selection).toEqual({ mode: 'rev-range', revRange: 'aaa111', maxCount: 1 });
      source.getCommits();
      expect(git.getCommits).toHaveBeenCalledWith('aaa111', 1);
    });

    it('should pass an empty range to git as given', () => {
      const git = createGitStub([createCommit('feat: a', 'aaa111', 'feat: a')]);
      const source = new CommitSource({ revRange: '' }, 'utf-8', { git, ...interactiveInput });

      expect(source.getCommits()).toHaveLength(1);
      expect(git.getCommits).toHaveBeenCalledWith('', null);
    });
  });

  describe('createDefaultSourceDependencies()', () => {
    it('should keep the given git accessor', () => {
      const git = createGitStub();

      expect(createDefaultSourceDependencies(git).git).toBe(git);
    });
  });
});
