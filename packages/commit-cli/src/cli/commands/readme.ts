/**
 * Documentation-regeneration mode: rewrite README.md with the model
 */

import { ReadmeGenerationError, regenerateReadme } from '@solo-commit/commit-core';
import type { ReadmeOutput, RunFlags } from '@solo-commit/commit-contracts';
import { defineCommand } from '../context';
import { prepareRun } from './prepare';

export const readmeCommand = defineCommand<RunFlags, ReadmeOutput>({
  id: 'solo-commit:readme',
  description: 'Regenerate README.md from the tracked file manifest',

  handler: {
    async execute(ctx, input) {
      const startTime = Date.now();
      const prepared = await prepareRun(ctx, input);
      if (!prepared) {
        return { exitCode: 1 };
      }

      const loader = ctx.ui.loader('Generating README...');
      loader.start();

      try {
        const output = await regenerateReadme({
          cwd: prepared.repoRoot,
          git: prepared.git,
          config: prepared.config,
          llmComplete: prepared.llmComplete,
          debug: input.debug,
        });
        loader.succeed(`Wrote ${output.path}`);

        ctx.ui.success('README updated', {
          sections: [{ header: 'Summary', items: [`Files in manifest: ${output.files}`, `Size: ${output.bytes} bytes`] }],
        });

        return { exitCode: 0, result: output, meta: { timing: Date.now() - startTime } };
      } catch (error) {
        if (error instanceof ReadmeGenerationError) {
          loader.fail(error.message);
          return { exitCode: 1 };
        }
        loader.stop();
        throw error;
      }
    },
  },
});
