/**
 * Command context: terminal UI, loaders and injectable collaborators
 */

import chalk from 'chalk';
import ora from 'ora';
import type { FormatterRunner, LLMCompleteFunction, RepoGit } from '@solo-commit/commit-core';

export interface UISection {
  header: string;
  items: string[];
}

export interface Loader {
  start(): void;
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

export interface CommandUI {
  write(line: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(title: string, options?: { sections?: UISection[] }): void;
  loader(text: string): Loader;
}

export interface CommandContext {
  cwd: string;
  env: Record<string, string | undefined>;
  ui: CommandUI;
  /** Repository adapter factory, simple-git by default */
  createGit?: (cwd: string) => RepoGit;
  /** Model client override, the configured local service by default */
  llmComplete?: LLMCompleteFunction;
  runFormatter?: FormatterRunner;
}

export interface CommandResult<T> {
  exitCode: number;
  result?: T;
  meta?: Record<string, unknown>;
}

export interface CommandDefinition<TInput, TOutput> {
  id: string;
  description: string;
  handler: {
    execute(ctx: CommandContext, input: TInput): Promise<CommandResult<TOutput>>;
  };
}

/**
 * Typed command definition helper
 */
export function defineCommand<TInput, TOutput>(
  definition: CommandDefinition<TInput, TOutput>
): CommandDefinition<TInput, TOutput> {
  return definition;
}

function createOraLoader(text: string): Loader {
  const spinner = ora({ text, stream: process.stderr });
  return {
    start: () => {
      spinner.start();
    },
    update: (next) => {
      spinner.text = next;
    },
    succeed: (done) => {
      spinner.succeed(done);
    },
    fail: (failed) => {
      spinner.fail(failed);
    },
    stop: () => {
      spinner.stop();
    },
  };
}

/**
 * Terminal UI: stdout for results, spinners on stderr
 */
export function createTerminalUI(): CommandUI {
  return {
    write: (line) => {
      process.stdout.write(line + '\n');
    },
    warn: (message) => {
      process.stderr.write(chalk.yellow(message) + '\n');
    },
    error: (message) => {
      process.stderr.write(chalk.red(message) + '\n');
    },
    success: (title, options) => {
      process.stdout.write(chalk.green.bold(title) + '\n');
      for (const section of options?.sections ?? []) {
        process.stdout.write(chalk.bold(`${section.header}:`) + '\n');
        for (const item of section.items) {
          process.stdout.write(`  ${item}\n`);
        }
      }
    },
    loader: createOraLoader,
  };
}
