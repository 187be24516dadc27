/**
 * Default command: commit and push every changed file on its own
 */

import { countOutcomes, formatSummary, runFileCommits, type RunFileCommitsResult } from '@solo-commit/commit-core';
import type { CommitRunOutput, RunFlags } from '@solo-commit/commit-contracts';
import { defineCommand } from '../context';
import { prepareRun } from './prepare';

export const runCommand = defineCommand<RunFlags, CommitRunOutput>({
  id: 'solo-commit:run',
  description: 'Commit and push each changed file separately',

  handler: {
    async execute(ctx, input) {
      const startTime = Date.now();
      const prepared = await prepareRun(ctx, input);
      if (!prepared) {
        return { exitCode: 1 };
      }
      const { repoRoot, git, config, llmComplete } = prepared;

      const loader = ctx.ui.loader('Collecting changes...');
      loader.start();

      let run: RunFileCommitsResult;
      try {
        run = await runFileCommits({
          cwd: repoRoot,
          git,
          config,
          llmComplete,
          debug: input.debug,
          runFormatter: ctx.runFormatter,
          onProgress: (event) => {
            switch (event.type) {
              case 'file-start':
                loader.update(`[${event.index + 1}/${event.total}] ${event.path}`);
                break;
              case 'file-stage':
                loader.update(`${event.path}: ${event.stage}`);
                break;
              case 'file-done':
                loader.stop();
                ctx.ui.write(`Processed ${event.path}: ${event.status}`);
                if (event.index + 1 < event.total) {
                  loader.start();
                }
                break;
            }
          },
        });
      } catch (error) {
        loader.fail('Run failed');
        throw error;
      }
      const { files, outcomes } = run;

      if (files.length === 0) {
        loader.stop();
        ctx.ui.warn('No changes to commit');
        return { exitCode: 0 };
      }

      ctx.ui.write('');
      for (const line of formatSummary(outcomes)) {
        ctx.ui.write(line);
      }

      return {
        exitCode: 0,
        result: {
          repoRoot,
          outcomes: [...outcomes],
          totals: countOutcomes(outcomes),
        },
        meta: {
          timing: Date.now() - startTime,
        },
      };
    },
  },
});
