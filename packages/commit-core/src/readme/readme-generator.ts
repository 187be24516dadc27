/**
 * Documentation-regeneration mode: README from the tracked file manifest
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ReadmeResponseSchema, type ReadmeOutput, type SoloCommitConfig } from '@solo-commit/commit-contracts';
import type { RepoGit } from '../analyzer/repo-git';
import type { LLMCompleteFunction } from '../types';
import { isExcludedPath } from '../analyzer/git-status';
import { cleanModelText, parseJsonObject } from '../generator/llm-prompt';
import { ReadmeGenerationError, errorMessage } from '../errors';
import { useLogger } from '../utils/logger';

const EXISTING_README_CHARS = 4000;

export const README_INSTRUCTIONS = `You are a technical writer. Write the README.md of a software project from its file manifest.

CRITICAL OUTPUT FORMAT:
- Return ONLY a valid JSON object: { "readme_content": "<markdown>" }
- Escape newlines and quotes inside the string
- Do NOT add any text before or after the JSON

The README should contain:
1. Project name and a one-paragraph description inferred from the files
2. Installation and usage sections
3. A short overview of the directory layout
Do not invent features the manifest gives no evidence for.`;

export interface RegenerateReadmeOptions {
  cwd: string;
  git: RepoGit;
  config: SoloCommitConfig;
  llmComplete: LLMCompleteFunction;
  debug?: boolean;
}

/**
 * Build the README prompt from the manifest and the current README, if any
 */
export function buildReadmePrompt(files: string[], totalFiles: number, existingReadme?: string): string {
  const more = totalFiles > files.length ? `\n... and ${totalFiles - files.length} more files` : '';
  const current = existingReadme
    ? `\n\nCurrent README (may be outdated):\n${existingReadme.slice(0, EXISTING_README_CHARS)}`
    : '';

  return `${README_INSTRUCTIONS}

File manifest (${totalFiles} files):
${files.map((f) => `- ${f}`).join('\n')}${more}${current}

Generate the README as JSON:`;
}

/**
 * Extract README markdown from a raw completion.
 * A JSON object must carry non-blank `readme_content`; text that is not a
 * JSON object is taken as the markdown itself.
 */
export function parseReadmeResponse(raw: string): string {
  const cleaned = cleanModelText(raw);
  const record = parseJsonObject(cleaned, (r) => 'readme_content' in r);

  if (record) {
    const parsed = ReadmeResponseSchema.safeParse(record);
    if (parsed.success && parsed.data.readme_content.trim().length > 0) {
      return parsed.data.readme_content.trim() + '\n';
    }
    throw new ReadmeGenerationError('LLM returned no README content');
  }
  if (cleaned.length > 0) {
    return cleaned + '\n';
  }
  throw new ReadmeGenerationError('LLM returned no README content');
}

/**
 * Regenerate the README and write it to disk. No commit is made.
 */
export async function regenerateReadme(options: RegenerateReadmeOptions): Promise<ReadmeOutput> {
  const { cwd, git, config, llmComplete } = options;
  const logger = useLogger();

  const tracked = (await git.listTrackedFiles()).filter((f) => !isExcludedPath(f, config.git.excludedDirs));
  const manifest = tracked.slice(0, config.readme.maxFiles);

  const readmePath = join(cwd, config.readme.path);
  const existing = existsSync(readmePath) ? await readFile(readmePath, 'utf8') : undefined;

  let raw: string;
  try {
    const result = await llmComplete(buildReadmePrompt(manifest, tracked.length, existing), { json: true });
    raw = result.content;
  } catch (error) {
    throw new ReadmeGenerationError(`README generation failed: ${errorMessage(error)}`);
  }

  if (options.debug) {
    logger.debug('Raw LLM response for README', { raw });
  }

  const content = parseReadmeResponse(raw);
  await writeFile(readmePath, content, 'utf8');

  return {
    path: config.readme.path,
    files: tracked.length,
    bytes: Buffer.byteLength(content, 'utf8'),
  };
}
