/**
 * Shared startup for commands: logger, config, repository root, model client
 */

import {
  configureLogger,
  createOllamaComplete,
  createRepoGit,
  findRepoRoot,
  NotAGitRepositoryError,
  type LLMCompleteFunction,
  type RepoGit,
} from '@solo-commit/commit-core';
import {
  parseSoloCommitEnv,
  resolveSoloCommitConfig,
  type RunFlags,
  type SoloCommitConfig,
} from '@solo-commit/commit-contracts';
import type { CommandContext } from '../context';

export interface PreparedRun {
  repoRoot: string;
  git: RepoGit;
  config: SoloCommitConfig;
  llmComplete: LLMCompleteFunction;
}

/**
 * Resolve everything a run needs. Returns undefined (after reporting)
 * when the working directory is not inside a repository.
 */
export async function prepareRun(ctx: CommandContext, flags: RunFlags): Promise<PreparedRun | undefined> {
  const logger = configureLogger({ debug: flags.debug });

  const { overrides, rejected } = parseSoloCommitEnv(ctx.env);
  for (const name of rejected) {
    logger.warn(`Ignoring invalid value of ${name}, using default`);
  }
  const config = resolveSoloCommitConfig(overrides);

  const createGit = ctx.createGit ?? createRepoGit;
  let repoRoot: string;
  try {
    repoRoot = await findRepoRoot(createGit(ctx.cwd), ctx.cwd);
  } catch (error) {
    if (error instanceof NotAGitRepositoryError) {
      ctx.ui.error('Error: Not a git repository');
      return undefined;
    }
    throw error;
  }

  logger.debug('Resolved run configuration', { repoRoot, model: config.llm.model, endpoint: config.llm.endpoint });

  return {
    repoRoot,
    // Paths from git are relative to the root, so operate from there
    git: createGit(repoRoot),
    config,
    llmComplete: ctx.llmComplete ?? createOllamaComplete(config.llm),
  };
}
