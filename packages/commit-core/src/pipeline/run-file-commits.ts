/**
 * Per-file commit pipeline
 *
 * Files are processed one at a time in collection order: they share the
 * index and the branch tip, so nothing here may run concurrently.
 */

import type { CommitOutcome } from '@solo-commit/commit-contracts';
import type { RunOptions } from '../types';
import { collectChangedFiles } from '../analyzer/git-status';
import { extractChange } from '../analyzer/file-diff';
import { synthesizeCommitMessage } from '../generator/message-synthesizer';
import { commitAndPush } from '../applier/commit-file';
import { applyPostFormat, isInfraConfigFile } from '../applier/post-format';
import { errorMessage } from '../errors';
import { useLogger } from '../utils/logger';

export interface RunFileCommitsResult {
  files: string[];
  outcomes: readonly CommitOutcome[];
}

/**
 * Drive one path from discovery to its terminal state
 */
export async function processFile(filePath: string, options: RunOptions): Promise<CommitOutcome> {
  const { git, cwd, config, onProgress } = options;

  onProgress?.({ type: 'file-stage', path: filePath, stage: 'diff' });
  const change = await extractChange(git, cwd, filePath);

  onProgress?.({ type: 'file-stage', path: filePath, stage: 'message' });
  const synthesis = await synthesizeCommitMessage(filePath, change.diff, {
    llmComplete: options.llmComplete,
    debug: options.debug,
    maxDiffChars: config.llm.maxDiffChars,
  });

  onProgress?.({ type: 'file-stage', path: filePath, stage: 'commit' });
  const result = await commitAndPush(git, filePath, synthesis.message, { remote: config.git.remote });

  if (result.status === 'skipped') {
    return { path: filePath, status: 'skipped', message: result.reason };
  }

  if (result.status === 'failed') {
    return {
      path: filePath,
      status: 'failed',
      message: `git ${result.stage} failed`,
      detail: result.error,
      ...(result.sha ? { sha: result.sha } : {}),
    };
  }

  const outcome: CommitOutcome = {
    path: filePath,
    status: 'committed',
    message: synthesis.message,
    sha: result.sha,
    ...(synthesis.error ? { detail: synthesis.error } : {}),
  };

  if (change.kind === 'deleted' || !isInfraConfigFile(filePath, config.format.extensions)) {
    return outcome;
  }

  onProgress?.({ type: 'file-stage', path: filePath, stage: 'format' });
  const postFormat = await applyPostFormat(git, cwd, filePath, config.format, {
    remote: config.git.remote,
    runFormatter: options.runFormatter,
  });

  return {
    ...outcome,
    postFormat: postFormat.detail
      ? { status: postFormat.status, detail: postFormat.detail }
      : { status: postFormat.status },
  };
}

/**
 * Collect changed files and commit each of them separately.
 *
 * Per-file errors are converted into `failed` outcomes; only the
 * collection step can reject.
 */
export async function runFileCommits(options: RunOptions): Promise<RunFileCommitsResult> {
  const logger = useLogger();
  const files = await collectChangedFiles(options.git, options.config.git.excludedDirs);
  const outcomes: CommitOutcome[] = [];

  for (const [index, filePath] of files.entries()) {
    options.onProgress?.({ type: 'file-start', path: filePath, index, total: files.length });

    let outcome: CommitOutcome;
    try {
      outcome = await processFile(filePath, options);
    } catch (error) {
      logger.error(`Unexpected failure while processing ${filePath}`, error);
      outcome = { path: filePath, status: 'failed', message: 'unexpected error', detail: errorMessage(error) };
    }

    outcomes.push(Object.freeze(outcome));
    options.onProgress?.({ type: 'file-done', path: filePath, index, total: files.length, status: outcome.status });
  }

  return { files, outcomes: Object.freeze(outcomes) };
}
