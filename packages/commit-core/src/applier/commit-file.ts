/**
 * Single-file commit and push (Commit & Push Executor)
 */

import type { RepoGit } from '../analyzer/repo-git';
import { errorMessage } from '../errors';

/** Outcome reason for paths excluded by ignore rules */
export const IGNORED_REASON = 'File ignored by .gitignore';

export type CommitStage = 'ignore-check' | 'stage' | 'commit' | 'branch' | 'push';

export type CommitFileResult =
  | { status: 'committed'; sha: string; branch: string; remote: string }
  | { status: 'skipped'; reason: string }
  | {
      status: 'failed';
      stage: CommitStage;
      error: string;
      /** Present when the local commit succeeded and only the push failed */
      sha?: string;
    };

export interface CommitFileOptions {
  /** Remote name (default: origin) */
  remote?: string;
}

class StageError extends Error {
  constructor(public readonly stage: CommitStage, cause: unknown) {
    super(errorMessage(cause));
    this.name = 'StageError';
  }
}

async function step<T>(stage: CommitStage, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new StageError(stage, error);
  }
}

/**
 * Stage, commit and push exactly one path.
 *
 * The ignore check runs first and is answered by a tagged value, so a
 * skip never depends on reading git's error text. There is no rollback:
 * when push fails the local commit stays and its sha is reported.
 *
 * @param git - Repository adapter
 * @param filePath - Path relative to the repository root
 * @param message - Full commit message
 */
export async function commitAndPush(
  git: RepoGit,
  filePath: string,
  message: string,
  options: CommitFileOptions = {}
): Promise<CommitFileResult> {
  const remote = options.remote || 'origin';
  let sha: string | undefined;

  try {
    const ignore = await step('ignore-check', () => git.checkIgnore(filePath));
    if (ignore.ignored) {
      return { status: 'skipped', reason: IGNORED_REASON };
    }

    await step('stage', () => git.add(filePath));
    sha = await step('commit', () => git.commit(filePath, message));
    const branch = await step('branch', () => git.currentBranch());
    await step('push', () => git.push(remote, branch));

    return { status: 'committed', sha, branch, remote };
  } catch (error) {
    if (error instanceof StageError) {
      return sha === undefined
        ? { status: 'failed', stage: error.stage, error: error.message }
        : { status: 'failed', stage: error.stage, error: error.message, sha };
    }
    throw error;
  }
}
