/**
 * Core types for solo-commit
 *
 * Note: Zod schemas and inferred types are in @solo-commit/commit-contracts.
 * This file contains internal types used within commit-core.
 */

import type { CommitStatus, SoloCommitConfig } from '@solo-commit/commit-contracts';
import type { RepoGit } from './analyzer/repo-git';

// Re-export types from contracts for convenience
export type {
  ChangeKind,
  ChangeRecord,
  CommitOutcome,
  CommitStatus,
  GeneratedMessage,
  GitStatus,
  PostFormatStatus,
} from '@solo-commit/commit-contracts';

// ============================================================================
// Internal Types
// ============================================================================

export interface LLMCompleteOptions {
  /** Ask the service for a JSON object */
  json?: boolean;
}

/**
 * LLM completion function signature
 */
export type LLMCompleteFunction = (
  prompt: string,
  options?: LLMCompleteOptions
) => Promise<{
  content: string;
}>;

/**
 * Runs the external formatter on one file, rejects when it fails
 */
export type FormatterRunner = (command: string, args: string[], cwd: string) => Promise<void>;

/**
 * Progress events of a per-file run
 */
export type RunProgressEvent =
  | { type: 'file-start'; path: string; index: number; total: number }
  | { type: 'file-stage'; path: string; stage: 'diff' | 'message' | 'commit' | 'format' }
  | { type: 'file-done'; path: string; index: number; total: number; status: CommitStatus };

/**
 * Options for a per-file commit run
 */
export interface RunOptions {
  /** Repository root */
  cwd: string;
  git: RepoGit;
  config: SoloCommitConfig;
  /** LLM completion function */
  llmComplete: LLMCompleteFunction;
  /** Log raw model responses and diffs */
  debug?: boolean;
  /** Formatter override (tests) */
  runFormatter?: FormatterRunner;
  /** Progress callback for UI updates */
  onProgress?: (event: RunProgressEvent) => void;
}
