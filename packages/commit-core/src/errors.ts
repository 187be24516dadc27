/**
 * Error types raised by commit-core
 *
 * Only NotAGitRepositoryError is fatal for a run; the others are caught at
 * the per-file boundary and end up on a CommitOutcome.
 */

export class NotAGitRepositoryError extends Error {
  constructor(public readonly cwd: string) {
    super(`Not a git repository: ${cwd}`);
    this.name = 'NotAGitRepositoryError';
  }
}

export class LLMTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`LLM request timed out after ${timeoutMs}ms`);
    this.name = 'LLMTimeoutError';
  }
}

/** Network failure or non-2xx status from the model service */
export class LLMRequestError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'LLMRequestError';
  }
}

/** Transport envelope could not be read */
export class LLMResponseError extends Error {
  constructor(message: string, public readonly body: string) {
    super(message);
    this.name = 'LLMResponseError';
  }
}

export class ReadmeGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReadmeGenerationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
