/**
 * Post-commit formatting for infrastructure-config files
 */

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import { minimatch } from 'minimatch';
import type { FormatConfig, PostFormatStatus } from '@solo-commit/commit-contracts';
import type { RepoGit } from '../analyzer/repo-git';
import type { FormatterRunner } from '../types';
import { commitAndPush } from './commit-file';
import { errorMessage } from '../errors';
import { useLogger } from '../utils/logger';

const execFileAsync = promisify(execFile);

export interface PostFormatResult {
  status: PostFormatStatus;
  detail?: string;
  sha?: string;
}

export interface PostFormatOptions {
  remote: string;
  runFormatter?: FormatterRunner;
}

/**
 * Run an external command, rejecting on non-zero exit
 */
export const runExternalFormatter: FormatterRunner = async (command, args, cwd) => {
  await execFileAsync(command, args, { cwd });
};

/**
 * Check if the path has one of the infrastructure-config extensions
 */
export function isInfraConfigFile(filePath: string, extensions: readonly string[]): boolean {
  return extensions.some((ext) => minimatch(filePath, `**/*${ext}`, { dot: true, nocase: true }));
}

/**
 * Format an already committed file in place and, when bytes changed,
 * commit and push the result with the fixed formatter message.
 *
 * A formatter failure is reported here and leaves the first commit alone.
 */
export async function applyPostFormat(
  git: RepoGit,
  repoRoot: string,
  filePath: string,
  config: FormatConfig,
  options: PostFormatOptions
): Promise<PostFormatResult> {
  const logger = useLogger();
  const runFormatter = options.runFormatter ?? runExternalFormatter;
  const absolute = join(repoRoot, filePath);

  let before: Buffer;
  let after: Buffer;
  try {
    before = await readFile(absolute);
    await runFormatter(config.command, [...config.args, filePath], repoRoot);
    after = await readFile(absolute);
  } catch (error) {
    const detail = `Formatter failed: ${errorMessage(error)}`;
    logger.warn(detail, { file: filePath, command: config.command });
    return { status: 'failed', detail };
  }

  if (before.equals(after)) {
    return { status: 'unchanged' };
  }

  logger.info(`Formatted ${filePath}, committing formatter changes`);
  const result = await commitAndPush(git, filePath, config.message, { remote: options.remote });

  switch (result.status) {
    case 'committed':
      return { status: 'recommitted', sha: result.sha };
    case 'skipped':
      return { status: 'failed', detail: result.reason };
    case 'failed':
      return { status: 'failed', detail: `git ${result.stage} failed: ${result.error}` };
  }
}
