/**
 * Version-control command surface
 *
 * Everything the pipeline asks of git goes through RepoGit, so the
 * pipeline can run against an in-memory fake in tests.
 */

import { simpleGit, type SimpleGit } from 'simple-git';

/**
 * Tagged result of the ignore check. Callers branch on `ignored`
 * before touching the index.
 */
export type IgnoreCheck = { ignored: true; path: string } | { ignored: false };

export interface RepoGit {
  /** Absolute repository root, undefined outside a work tree */
  getRepoRoot(): Promise<string | undefined>;
  /** Paths with unstaged modifications (including unstaged deletions) */
  listModified(): Promise<string[]>;
  /** Untracked paths not excluded by ignore rules */
  listUntracked(): Promise<string[]>;
  /** Paths staged in the index */
  listStaged(): Promise<string[]>;
  /** All paths in the index */
  listTrackedFiles(): Promise<string[]>;
  /** Unstaged unified diff of one path */
  diffFile(path: string): Promise<string>;
  /** Staged unified diff of one path */
  diffStagedFile(path: string): Promise<string>;
  /** Path is in the index or in HEAD */
  isTracked(path: string): Promise<boolean>;
  /** Path exists in HEAD */
  isInHead(path: string): Promise<boolean>;
  checkIgnore(path: string): Promise<IgnoreCheck>;
  add(path: string): Promise<void>;
  /** Commit only `path` with `message`, returns the new commit hash */
  commit(path: string, message: string): Promise<string>;
  currentBranch(): Promise<string>;
  push(remote: string, branch: string): Promise<void>;
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * RepoGit backed by simple-git
 */
export function createRepoGit(cwd: string): RepoGit {
  const git: SimpleGit = simpleGit(cwd);

  const lsTreeHead = async (path: string): Promise<string> => {
    try {
      return await git.raw(['ls-tree', 'HEAD', '--', path]);
    } catch {
      // No HEAD yet (fresh repository)
      return '';
    }
  };

  return {
    async getRepoRoot() {
      const isRepo = await git.checkIsRepo();
      if (!isRepo) {
        return undefined;
      }
      const root = await git.revparse(['--show-toplevel']);
      return root.trim();
    },

    async listModified() {
      return splitLines(await git.diff(['--name-only']));
    },

    async listUntracked() {
      return splitLines(await git.raw(['ls-files', '--others', '--exclude-standard']));
    },

    async listStaged() {
      return splitLines(await git.diff(['--cached', '--name-only']));
    },

    async listTrackedFiles() {
      return splitLines(await git.raw(['ls-files']));
    },

    async diffFile(path) {
      return git.diff(['--', path]);
    },

    async diffStagedFile(path) {
      return git.diff(['--cached', '--', path]);
    },

    async isTracked(path) {
      const inIndex = await git.raw(['ls-files', '--', path]);
      if (inIndex.trim().length > 0) {
        return true;
      }
      return (await lsTreeHead(path)).trim().length > 0;
    },

    async isInHead(path) {
      return (await lsTreeHead(path)).trim().length > 0;
    },

    async checkIgnore(path) {
      const ignored = await git.checkIgnore([path]);
      return ignored.length > 0 ? { ignored: true, path } : { ignored: false };
    },

    async add(path) {
      await git.add(path);
    },

    async commit(path, message) {
      // Pathspec commit: anything else already staged stays out of this commit
      const result = await git.commit(message, [path]);
      return result.commit;
    },

    async currentBranch() {
      const branch = await git.revparse(['--abbrev-ref', 'HEAD']);
      return branch.trim();
    },

    async push(remote, branch) {
      await git.push(remote, branch);
    },
  };
}
