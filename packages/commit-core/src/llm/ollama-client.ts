/**
 * Client for the local model service (non-streaming generate endpoint)
 */

import { ModelEnvelopeSchema, type LLMConfig } from '@solo-commit/commit-contracts';
import type { LLMCompleteFunction } from '../types';
import { LLMRequestError, LLMResponseError, LLMTimeoutError, errorMessage } from '../errors';

interface GenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  response_format?: { type: 'json_object' };
}

function isTimeout(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) {
    return false;
  }
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

/**
 * Parse the transport envelope and return the completion text
 */
export function parseEnvelope(body: string): string {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new LLMResponseError(`LLM response is not valid JSON: ${errorMessage(error)}`, body);
  }

  const envelope = ModelEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new LLMResponseError('LLM response has no "response" text', body);
  }
  return envelope.data.response;
}

/**
 * Create an LLMCompleteFunction bound to the configured service.
 *
 * Rejects with LLMTimeoutError after `timeoutMs`, LLMRequestError on
 * network or HTTP failure, LLMResponseError on an unreadable envelope.
 */
export function createOllamaComplete(config: LLMConfig, fetchImpl: typeof fetch = fetch): LLMCompleteFunction {
  return async (prompt, options) => {
    const request: GenerateRequest = {
      model: config.model,
      prompt,
      stream: false,
    };
    if (options?.json && config.jsonMode) {
      request.response_format = { type: 'json_object' };
    }

    let body: string;
    try {
      const response = await fetchImpl(config.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(config.timeoutMs),
      });

      if (!response.ok) {
        throw new LLMRequestError(`LLM service returned HTTP ${response.status}`, response.status);
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof LLMRequestError) {
        throw error;
      }
      if (isTimeout(error)) {
        throw new LLMTimeoutError(config.timeoutMs);
      }
      throw new LLMRequestError(`Could not reach LLM service at ${config.endpoint}: ${errorMessage(error)}`);
    }

    return { content: parseEnvelope(body) };
  };
}
