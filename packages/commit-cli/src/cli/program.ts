/**
 * Command-line program
 */

import { Command } from 'commander';
import { runFlags, type RunFlags } from '@solo-commit/commit-contracts';
import { readmeCommand, runCommand } from './commands';
import type { CommandContext } from './context';

/**
 * Build the program. The action stores the exit code on `process.exitCode`.
 */
export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name('solo-commit')
    .description('Commit and push every changed file on its own, with messages from a local model')
    .option('--debug', runFlags.debug.description, runFlags.debug.default)
    .option('--readme', runFlags.readme.description, runFlags.readme.default)
    .action(async (options: Partial<RunFlags>) => {
      const flags: RunFlags = {
        debug: options.debug === true,
        readme: options.readme === true,
      };
      const command = flags.readme ? readmeCommand : runCommand;
      const { exitCode } = await command.handler.execute(ctx, flags);
      process.exitCode = exitCode;
    });

  return program;
}
