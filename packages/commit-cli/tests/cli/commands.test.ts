/**
 * Tests for the run and readme commands with an in-memory repository
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, readFile, writeFile, rm } from 'node:fs/promises';
import { configureLogger, type LLMCompleteFunction } from '@solo-commit/commit-core';
import { runCommand, readmeCommand } from '../../src/cli/commands';
import { createProgram } from '../../src/cli/program';
import type { CommandContext, CommandUI, Loader } from '../../src/cli/context';
import { FakeRepoGit } from '../../../commit-core/tests/helpers/fake-git';

const flags = { debug: false, readme: false };

interface RecordingUI extends CommandUI {
  writes: string[];
  warnings: string[];
  errors: string[];
  loaderEvents: string[];
}

function createRecordingUI(): RecordingUI {
  const writes: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  const loaderEvents: string[] = [];

  const loader = (text: string): Loader => ({
    start: () => loaderEvents.push(`start ${text}`),
    update: (next) => loaderEvents.push(`update ${next}`),
    succeed: (done) => loaderEvents.push(`succeed ${done ?? ''}`),
    fail: (failed) => loaderEvents.push(`fail ${failed ?? ''}`),
    stop: () => loaderEvents.push('stop'),
  });

  return {
    writes,
    warnings,
    errors,
    loaderEvents,
    write: (line) => writes.push(line),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
    success: (title) => writes.push(title),
    loader,
  };
}

function mockLLM() {
  return vi.fn<Parameters<LLMCompleteFunction>, ReturnType<LLMCompleteFunction>>();
}

describe('solo-commit commands', () => {
  let root: string;
  let ui: RecordingUI;

  function context(git: FakeRepoGit, llmComplete: LLMCompleteFunction = mockLLM()): CommandContext {
    return { cwd: root, env: {}, ui, createGit: () => git, llmComplete };
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'solo-commit-cli-'));
    ui = createRecordingUI();
  });

  afterEach(async () => {
    configureLogger({ write: () => undefined });
    process.exitCode = undefined;
    await rm(root, { recursive: true, force: true });
  });

  it('should stop with exit code 1 outside a repository', async () => {
    const { exitCode } = await runCommand.handler.execute(context(new FakeRepoGit()), flags);

    expect(exitCode).toBe(1);
    expect(ui.errors).toEqual(['Error: Not a git repository']);
  });

  it('should report that there is nothing to commit', async () => {
    const { exitCode, result } = await runCommand.handler.execute(context(new FakeRepoGit({ root })), flags);

    expect(exitCode).toBe(0);
    expect(result).toBeUndefined();
    expect(ui.warnings).toEqual(['No changes to commit']);
  });

  it('should stop the loader when collecting changes fails', async () => {
    const git = new FakeRepoGit({ root }).failOn('listModified', 'fatal: bad revision');

    await expect(runCommand.handler.execute(context(git), flags)).rejects.toThrow('fatal: bad revision');
    expect(ui.loaderEvents).toEqual(['start Collecting changes...', 'fail Run failed']);
  });

  it('should commit a new file and print the summary', async () => {
    await writeFile(join(root, 'notes.txt'), 'remember\n');
    const git = new FakeRepoGit({ root, untracked: ['notes.txt'] });
    const llmComplete = mockLLM();

    const { exitCode, result } = await runCommand.handler.execute(context(git, llmComplete), flags);

    expect(exitCode).toBe(0);
    expect(result?.totals).toEqual({ committed: 1, skipped: 0, failed: 0 });
    expect(result?.outcomes).toEqual([{ path: 'notes.txt', status: 'committed', message: 'feat: add new file', sha: 'sha1' }]);
    expect(ui.writes[0]).toBe('Processed notes.txt: committed');
    expect(ui.writes.slice(1, 3)).toEqual(['', 'Summary:']);
    expect(ui.writes[ui.writes.length - 1]).toBe('Committed: 1, Skipped: 0, Failed: 0');
    expect(llmComplete).not.toHaveBeenCalled();
  });

  it('should regenerate the README', async () => {
    const git = new FakeRepoGit({ root, tracked: ['src/index.ts'] });
    const llmComplete = mockLLM().mockResolvedValue({ content: '{"readme_content":"# Tool"}' });

    const { exitCode, result } = await readmeCommand.handler.execute(context(git, llmComplete), { ...flags, readme: true });

    expect(exitCode).toBe(0);
    expect(result).toEqual({ path: 'README.md', files: 1, bytes: 7 });
    expect(ui.loaderEvents).toEqual(['start Generating README...', 'succeed Wrote README.md']);
    expect(git.calls).toEqual([]);
  });

  it('should fail the README mode when the model is unreachable', async () => {
    const git = new FakeRepoGit({ root, tracked: ['src/index.ts'] });
    const llmComplete = mockLLM().mockRejectedValue(new Error('connection refused'));

    const { exitCode } = await readmeCommand.handler.execute(context(git, llmComplete), { ...flags, readme: true });

    expect(exitCode).toBe(1);
    expect(ui.loaderEvents[1]).toBe('fail README generation failed: connection refused');
  });

  it('should dispatch --readme from the command line', async () => {
    const git = new FakeRepoGit({ root, tracked: ['a.ts'] });
    const llmComplete = mockLLM().mockResolvedValue({ content: '# Plain' });

    await createProgram(context(git, llmComplete)).parseAsync(['--readme'], { from: 'user' });

    expect(process.exitCode).toBe(0);
    expect(await readFile(join(root, 'README.md'), 'utf8')).toBe('# Plain\n');
  });
});
