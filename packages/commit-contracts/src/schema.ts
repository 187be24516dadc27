import { z } from 'zod';

// ============================================================================
// Core Types
// ============================================================================

/**
 * Conventional commit types accepted in a generated header
 */
export const ConventionalTypeSchema = z.enum([
  'feat',
  'fix',
  'refactor',
  'chore',
  'docs',
  'test',
  'build',
  'ci',
  'perf',
  'style',
]);

export type ConventionalType = z.infer<typeof ConventionalTypeSchema>;

// ============================================================================
// Git Status
// ============================================================================

/**
 * Raw change-set sources, in collection order
 */
export const GitStatusSchema = z.object({
  modified: z.array(z.string()),
  untracked: z.array(z.string()),
  staged: z.array(z.string()),
});

export type GitStatus = z.infer<typeof GitStatusSchema>;

/**
 * Relationship of a path to the tracked history
 */
export const ChangeKindSchema = z.enum(['modified', 'untracked', 'added', 'deleted', 'unknown']);

export type ChangeKind = z.infer<typeof ChangeKindSchema>;

/**
 * One isolated file change, created once per processed path
 */
export const ChangeRecordSchema = z.object({
  path: z.string(),
  kind: ChangeKindSchema,
  diff: z.string(),
});

export type ChangeRecord = Readonly<z.infer<typeof ChangeRecordSchema>>;

// ============================================================================
// Commit Message
// ============================================================================

/**
 * Structured commit message as requested from the model.
 * body/footer may come back as null.
 */
export const GeneratedMessageSchema = z.object({
  header: z.string(),
  body: z.string().nullish(),
  footer: z.string().nullish(),
});

export type GeneratedMessage = z.infer<typeof GeneratedMessageSchema>;

/**
 * Transport envelope of the local model service (non-streaming)
 */
export const ModelEnvelopeSchema = z.object({
  response: z.string(),
  model: z.string().optional(),
  done: z.boolean().optional(),
});

export type ModelEnvelope = z.infer<typeof ModelEnvelopeSchema>;

/**
 * Model answer for the documentation-regeneration mode
 */
export const ReadmeResponseSchema = z.object({
  readme_content: z.string(),
});

export type ReadmeResponse = z.infer<typeof ReadmeResponseSchema>;

// ============================================================================
// Outcomes
// ============================================================================

export const CommitStatusSchema = z.enum(['committed', 'skipped', 'failed']);

export type CommitStatus = z.infer<typeof CommitStatusSchema>;

export const PostFormatStatusSchema = z.enum(['recommitted', 'unchanged', 'failed']);

export type PostFormatStatus = z.infer<typeof PostFormatStatusSchema>;

/**
 * Terminal record for a single processed path
 */
export const CommitOutcomeSchema = z.object({
  path: z.string(),
  status: CommitStatusSchema,
  /** Commit message when committed, reason otherwise */
  message: z.string(),
  /** Error detail (synthesis failure, git error) */
  detail: z.string().optional(),
  sha: z.string().optional(),
  postFormat: z
    .object({
      status: PostFormatStatusSchema,
      detail: z.string().optional(),
    })
    .optional(),
});

export type CommitOutcome = Readonly<z.infer<typeof CommitOutcomeSchema>>;

// ============================================================================
// Command Outputs
// ============================================================================

export const CommitRunOutputSchema = z.object({
  repoRoot: z.string(),
  outcomes: z.array(CommitOutcomeSchema),
  totals: z.object({
    committed: z.number().int().min(0),
    skipped: z.number().int().min(0),
    failed: z.number().int().min(0),
  }),
});

export type CommitRunOutput = z.infer<typeof CommitRunOutputSchema>;

export const ReadmeOutputSchema = z.object({
  path: z.string(),
  files: z.number().int().min(0),
  bytes: z.number().int().min(0),
});

export type ReadmeOutput = z.infer<typeof ReadmeOutputSchema>;
