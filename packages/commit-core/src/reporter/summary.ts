/**
 * Summary Reporter: render the ordered outcomes as a table
 */

import type { CommitOutcome, CommitStatus } from '@solo-commit/commit-contracts';

export const PATH_COLUMN_WIDTH = 48;
export const FILL_CHAR = '.';

export interface OutcomeTotals {
  committed: number;
  skipped: number;
  failed: number;
}

const STATUS_LABEL: Record<CommitStatus, string> = {
  committed: 'COMMITTED',
  skipped: 'SKIPPED',
  failed: 'FAILED',
};

export function countOutcomes(outcomes: readonly CommitOutcome[]): OutcomeTotals {
  const totals: OutcomeTotals = { committed: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    totals[outcome.status] += 1;
  }
  return totals;
}

/**
 * Path followed by a dot leader up to the status column
 */
export function padPath(path: string, width: number = PATH_COLUMN_WIDTH): string {
  return `${path} `.padEnd(width, FILL_CHAR);
}

/**
 * One line per file plus detail lines and a totals line
 */
export function formatSummary(outcomes: readonly CommitOutcome[], width: number = PATH_COLUMN_WIDTH): string[] {
  if (outcomes.length === 0) {
    return ['No files processed'];
  }

  const lines: string[] = ['Summary:'];
  const statusWidth = Math.max(...Object.values(STATUS_LABEL).map((label) => label.length));

  for (const outcome of outcomes) {
    const firstLine = outcome.message.split('\n')[0] ?? '';
    lines.push(`${padPath(outcome.path, width)} ${STATUS_LABEL[outcome.status].padEnd(statusWidth)} ${firstLine}`);

    if (outcome.detail) {
      lines.push(`    ↳ ${outcome.detail}`);
    }
    if (outcome.postFormat) {
      const detail = outcome.postFormat.detail ? ` (${outcome.postFormat.detail})` : '';
      lines.push(`    ↳ format: ${outcome.postFormat.status}${detail}`);
    }
  }

  const totals = countOutcomes(outcomes);
  lines.push(`Committed: ${totals.committed}, Skipped: ${totals.skipped}, Failed: ${totals.failed}`);
  return lines;
}
