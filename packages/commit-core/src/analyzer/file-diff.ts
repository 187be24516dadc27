/**
 * File diff utilities (Diff/Status Extractor)
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChangeKind, ChangeRecord } from '@solo-commit/commit-contracts';
import type { RepoGit } from './repo-git';
import { useLogger } from '../utils/logger';
import { errorMessage } from '../errors';

/** Prefix of untracked file content handed to the synthesizer */
export const NEW_FILE_MARKER = 'NEW_FILE:';

/** Diff text for a tracked file whose diff came back empty */
export const NO_CHANGES_MARKER = 'no changes in tracked file';

export function isNewFileDiff(diff: string): boolean {
  return diff.startsWith(NEW_FILE_MARKER);
}

function record(path: string, kind: ChangeKind, diff: string): ChangeRecord {
  return Object.freeze({ path, kind, diff });
}

/**
 * Diff of a tracked path: unstaged first, then staged, then the marker
 */
async function trackedDiff(git: RepoGit, filePath: string): Promise<string> {
  const unstaged = await git.diffFile(filePath);
  if (unstaged.trim().length > 0) {
    return unstaged;
  }
  const staged = await git.diffStagedFile(filePath);
  if (staged.trim().length > 0) {
    return staged;
  }
  return NO_CHANGES_MARKER;
}

/**
 * Classify a path and isolate its change.
 *
 * - exists, not tracked → untracked, full content behind NEW_FILE_MARKER
 * - missing, tracked → deleted
 * - exists, tracked → modified (added when it is not in HEAD yet)
 *
 * Never throws: any failure yields kind `unknown` with an empty diff.
 */
export async function extractChange(git: RepoGit, repoRoot: string, filePath: string): Promise<ChangeRecord> {
  const logger = useLogger();

  try {
    const exists = existsSync(join(repoRoot, filePath));
    const tracked = await git.isTracked(filePath);

    if (exists && !tracked) {
      const content = await readFile(join(repoRoot, filePath), 'utf8');
      return record(filePath, 'untracked', `${NEW_FILE_MARKER}${filePath}\n${content}`);
    }

    if (!exists && tracked) {
      return record(filePath, 'deleted', await trackedDiff(git, filePath));
    }

    if (!exists) {
      return record(filePath, 'unknown', '');
    }

    const inHead = await git.isInHead(filePath);
    return record(filePath, inHead ? 'modified' : 'added', await trackedDiff(git, filePath));
  } catch (error) {
    logger.warn(`Could not read change for ${filePath}`, { error: errorMessage(error) });
    return record(filePath, 'unknown', '');
  }
}

/**
 * Cap diff size before it goes into a prompt
 */
export function truncateDiff(diff: string, maxChars: number): string {
  if (diff.length <= maxChars) {
    return diff;
  }
  return diff.slice(0, maxChars) + '\n... (truncated)';
}
