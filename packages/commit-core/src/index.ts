/**
 * solo-commit core
 *
 * One commit per changed file, messages from a local model.
 *
 * @module @solo-commit/commit-core
 */

// Types
export * from './types';

// Errors
export {
  NotAGitRepositoryError,
  LLMTimeoutError,
  LLMRequestError,
  LLMResponseError,
  ReadmeGenerationError,
  errorMessage,
} from './errors';

// Analyzer
export {
  findRepoRoot,
  getGitStatus,
  getAllChangedFiles,
  collectChangedFiles,
  hasChanges,
  isExcludedPath,
  extractChange,
  isNewFileDiff,
  NEW_FILE_MARKER,
  NO_CHANGES_MARKER,
  createRepoGit,
  type RepoGit,
  type IgnoreCheck,
} from './analyzer';

// Generator
export {
  synthesizeCommitMessage,
  parseCommitResponse,
  formatCommitMessage,
  buildCommitPrompt,
  NEW_FILE_MESSAGE,
  AUTOMATED_FALLBACK_MESSAGE,
  TIMEOUT_DETAIL,
  FALLBACK_HEADER,
  type SynthesisResult,
} from './generator';

// LLM client
export { createOllamaComplete, parseEnvelope } from './llm/ollama-client';

// Applier
export {
  commitAndPush,
  applyPostFormat,
  isInfraConfigFile,
  IGNORED_REASON,
  type CommitFileResult,
  type PostFormatResult,
} from './applier';

// Pipeline
export { processFile, runFileCommits, type RunFileCommitsResult } from './pipeline';

// Reporter
export { formatSummary, countOutcomes, padPath, type OutcomeTotals } from './reporter/summary';

// README mode
export { regenerateReadme, parseReadmeResponse, type RegenerateReadmeOptions } from './readme';

// Logger
export { useLogger, configureLogger, createLogger, type Logger, type LogMeta } from './utils/logger';
