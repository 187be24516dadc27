/**
 * Git status analysis (Change Set Collector)
 */

import { minimatch } from 'minimatch';
import type { GitStatus } from '@solo-commit/commit-contracts';
import type { RepoGit } from './repo-git';
import { NotAGitRepositoryError } from '../errors';

/**
 * Resolve the repository root or fail the run
 */
export async function findRepoRoot(git: RepoGit, cwd: string): Promise<string> {
  const root = await git.getRepoRoot();
  if (!root) {
    throw new NotAGitRepositoryError(cwd);
  }
  return root;
}

/**
 * Read the three change-set sources (modified, untracked, staged)
 */
export async function getGitStatus(git: RepoGit): Promise<GitStatus> {
  const modified = await git.listModified();
  const untracked = await git.listUntracked();
  const staged = await git.listStaged();

  return { modified, untracked, staged };
}

/**
 * Check if path is an excluded directory or lives below one
 */
export function isExcludedPath(path: string, excludedDirs: readonly string[]): boolean {
  return excludedDirs.some((dir) => {
    const base = dir.replace(/\/+$/, '');
    return path === base || minimatch(path, `${base}/**`, { dot: true });
  });
}

/**
 * Ordered, duplicate-free candidate list.
 * First occurrence wins across modified, then untracked, then staged.
 */
export function getAllChangedFiles(status: GitStatus, excludedDirs: readonly string[] = []): string[] {
  const seen = new Set<string>();
  const files: string[] = [];

  for (const file of [...status.modified, ...status.untracked, ...status.staged]) {
    if (seen.has(file) || isExcludedPath(file, excludedDirs)) {
      continue;
    }
    seen.add(file);
    files.push(file);
  }

  return files;
}

/**
 * Check if there are any changes
 */
export function hasChanges(status: GitStatus): boolean {
  return status.modified.length > 0 || status.untracked.length > 0 || status.staged.length > 0;
}

/**
 * Collect candidate paths for a run
 */
export async function collectChangedFiles(git: RepoGit, excludedDirs: readonly string[]): Promise<string[]> {
  const status = await getGitStatus(git);
  return getAllChangedFiles(status, excludedDirs);
}
