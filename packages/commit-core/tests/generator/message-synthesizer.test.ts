/**
 * Tests for message-synthesizer.ts
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  synthesizeCommitMessage,
  AUTOMATED_FALLBACK_MESSAGE,
  NEW_FILE_MESSAGE,
  TIMEOUT_DETAIL,
} from '../../src/generator/message-synthesizer';
import { LLMResponseError, LLMTimeoutError } from '../../src/errors';
import { configureLogger } from '../../src/utils/logger';
import type { LLMCompleteFunction } from '../../src/types';

function llm(content: string) {
  return vi.fn<Parameters<LLMCompleteFunction>, ReturnType<LLMCompleteFunction>>().mockResolvedValue({ content });
}

describe('synthesizeCommitMessage', () => {
  let logLines: string[];

  beforeEach(() => {
    logLines = [];
    configureLogger({ debug: true, write: (line) => logLines.push(line) });
  });

  it('should short-circuit new files without calling the model', async () => {
    const llmComplete = llm('{"header":"unused"}');

    const result = await synthesizeCommitMessage('foo.txt', 'NEW_FILE:foo.txt\nhello', {
      llmComplete,
      maxDiffChars: 1000,
    });

    expect(result.message).toBe(NEW_FILE_MESSAGE);
    expect(result.error).toBeUndefined();
    expect(llmComplete).not.toHaveBeenCalled();
  });

  it('should build the message from the model response', async () => {
    const llmComplete = llm('{"header":"fix: guard empty list","body":"Return early.","footer":null}');

    const result = await synthesizeCommitMessage('src/list.ts', '@@ -1 +1 @@', { llmComplete, maxDiffChars: 1000 });

    expect(result.message).toBe('fix: guard empty list\n\nReturn early.');
    expect(result.error).toBeUndefined();
    expect(llmComplete).toHaveBeenCalledTimes(1);
    expect(llmComplete.mock.calls[0]?.[0]).toContain('File: src/list.ts');
    expect(llmComplete.mock.calls[0]?.[1]).toEqual({ json: true });
  });

  it('should report a timeout and use the automated fallback', async () => {
    const llmComplete = vi
      .fn<Parameters<LLMCompleteFunction>, ReturnType<LLMCompleteFunction>>()
      .mockRejectedValue(new LLMTimeoutError(1000));

    const result = await synthesizeCommitMessage('src/a.ts', 'diff', { llmComplete, maxDiffChars: 1000 });

    expect(result.message).toBe(AUTOMATED_FALLBACK_MESSAGE);
    expect(result.error).toBe(TIMEOUT_DETAIL);
  });

  it('should report a malformed envelope and use the automated fallback', async () => {
    const llmComplete = vi
      .fn<Parameters<LLMCompleteFunction>, ReturnType<LLMCompleteFunction>>()
      .mockRejectedValue(new LLMResponseError('LLM response is not valid JSON: bad token', '<html>'));

    const result = await synthesizeCommitMessage('src/a.ts', 'diff', { llmComplete, maxDiffChars: 1000 });

    expect(result.message).toBe('chore: automated commit');
    expect(result.error).toBe('LLM request failed: LLM response is not valid JSON: bad token');
  });

  it('should not report an error for an empty header', async () => {
    const result = await synthesizeCommitMessage('src/a.ts', 'diff', {
      llmComplete: llm('{"header":""}'),
      maxDiffChars: 1000,
    });

    expect(result.message).toBe('chore: update file');
    expect(result.error).toBeUndefined();
  });

  it('should log the diff and raw response in debug mode', async () => {
    await synthesizeCommitMessage('src/a.ts', 'the-diff', {
      llmComplete: llm('docs: fix typo'),
      debug: true,
      maxDiffChars: 1000,
    });

    expect(logLines.some((line) => line.includes('Diff for src/a.ts'))).toBe(true);
    expect(logLines.some((line) => line.includes('Raw LLM response for src/a.ts'))).toBe(true);
  });
});
