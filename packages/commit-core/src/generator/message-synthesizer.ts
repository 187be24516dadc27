/**
 * Per-file commit message synthesis
 */

import type { GeneratedMessage } from '@solo-commit/commit-contracts';
import type { LLMCompleteFunction } from '../types';
import { isNewFileDiff } from '../analyzer/file-diff';
import { buildCommitPrompt, formatCommitMessage, parseCommitResponse } from './llm-prompt';
import { LLMTimeoutError, errorMessage } from '../errors';
import { useLogger } from '../utils/logger';

/** Message for untracked files, no model call */
export const NEW_FILE_MESSAGE = 'feat: add new file';

/** Message when the model could not be asked */
export const AUTOMATED_FALLBACK_MESSAGE = 'chore: automated commit';

export const TIMEOUT_DETAIL = 'LLM request timed out';

export interface SynthesizeOptions {
  llmComplete: LLMCompleteFunction;
  /** Log the diff sent and the raw response */
  debug?: boolean;
  /** Diff size cap for the prompt */
  maxDiffChars: number;
}

export interface SynthesisResult {
  /** Final commit message text */
  message: string;
  generated: GeneratedMessage;
  /** Set when the model call failed and a fallback was used */
  error?: string;
}

function fixed(header: string, error?: string): SynthesisResult {
  const generated: GeneratedMessage = { header, body: null, footer: null };
  return error === undefined
    ? { message: header, generated }
    : { message: header, generated, error };
}

/**
 * Generate the commit message for one file.
 *
 * Never throws. Transport problems come back as a fallback message plus
 * `error`; malformed model output degrades inside parseCommitResponse.
 */
export async function synthesizeCommitMessage(
  filePath: string,
  diff: string,
  options: SynthesizeOptions
): Promise<SynthesisResult> {
  const logger = useLogger();

  if (isNewFileDiff(diff)) {
    return fixed(NEW_FILE_MESSAGE);
  }

  if (options.debug) {
    logger.debug(`Diff for ${filePath}`, { diff });
  }

  let raw: string;
  try {
    const result = await options.llmComplete(buildCommitPrompt(filePath, diff, options.maxDiffChars), {
      json: true,
    });
    raw = result.content;
  } catch (error) {
    if (error instanceof LLMTimeoutError) {
      logger.warn(`LLM timed out for ${filePath}`, { timeoutMs: error.timeoutMs });
      return fixed(AUTOMATED_FALLBACK_MESSAGE, TIMEOUT_DETAIL);
    }
    const detail = `LLM request failed: ${errorMessage(error)}`;
    logger.warn(detail, { file: filePath });
    return fixed(AUTOMATED_FALLBACK_MESSAGE, detail);
  }

  if (options.debug) {
    logger.debug(`Raw LLM response for ${filePath}`, { raw });
  }

  const generated = parseCommitResponse(raw);
  return { message: formatCommitMessage(generated), generated };
}
