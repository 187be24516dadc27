/**
 * Tests for summary.ts - outcome table
 */

import { describe, it, expect } from 'vitest';
import type { CommitOutcome } from '@solo-commit/commit-contracts';
import { countOutcomes, formatSummary, padPath } from '../../src/reporter/summary';

const outcomes: CommitOutcome[] = [
  { path: 'a.ts', status: 'committed', message: 'fix: x\n\nlonger body', sha: 'sha1' },
  { path: 'secrets.env', status: 'skipped', message: 'File ignored by .gitignore' },
  { path: 'main.tf', status: 'committed', message: 'feat: add new file', sha: 'sha2', postFormat: { status: 'recommitted' } },
  { path: 'b.ts', status: 'failed', message: 'git push failed', detail: 'rejected' },
];

describe('padPath', () => {
  it('should fill with dots up to the column width', () => {
    expect(padPath('a.ts', 12)).toBe('a.ts .......');
  });

  it('should leave long paths as they are', () => {
    expect(padPath('very/long/path.ts', 8)).toBe('very/long/path.ts ');
  });
});

describe('formatSummary', () => {
  it('should render one line per file, details and totals', () => {
    expect(formatSummary(outcomes, 12)).toEqual([
      'Summary:',
      'a.ts ....... COMMITTED fix: x',
      'secrets.env  SKIPPED   File ignored by .gitignore',
      'main.tf .... COMMITTED feat: add new file',
      '    ↳ format: recommitted',
      'b.ts ....... FAILED    git push failed',
      '    ↳ rejected',
      'Committed: 2, Skipped: 1, Failed: 1',
    ]);
  });

  it('should show the formatter failure reason', () => {
    const lines = formatSummary(
      [{ path: 'x.tf', status: 'committed', message: 'fix: y', postFormat: { status: 'failed', detail: 'Formatter failed: boom' } }],
      8
    );

    expect(lines[2]).toBe('    ↳ format: failed (Formatter failed: boom)');
  });

  it('should say so when nothing was processed', () => {
    expect(formatSummary([])).toEqual(['No files processed']);
  });
});

describe('countOutcomes', () => {
  it('should count by status', () => {
    expect(countOutcomes(outcomes)).toEqual({ committed: 2, skipped: 1, failed: 1 });
  });
});
