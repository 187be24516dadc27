/**
 * LLM prompt building and response parsing
 */

import type { GeneratedMessage } from '@solo-commit/commit-contracts';
import { truncateDiff } from '../analyzer/file-diff';

/** Header used when the model produced nothing usable */
export const FALLBACK_HEADER = 'chore: update file';

/** Maximum header length on the plain-text path */
export const MAX_HEADER_LENGTH = 50;

const THINK_CLOSE = '</think>';

/**
 * Instructions for the per-file commit message
 */
export const COMMIT_INSTRUCTIONS = `You are a git commit message generator. You get the diff of ONE file and write the commit message for it.

CRITICAL OUTPUT FORMAT:
- Return ONLY a valid JSON object
- Do NOT wrap in markdown code blocks (no \`\`\`json, no \`\`\`)
- Do NOT add any text before or after the JSON
- Use null for "body" or "footer" when there is nothing to say

Rules:
1. "header" uses conventional commits: <type>: <description> or <type>(<scope>): <description>
2. Valid types: feat, fix, refactor, chore, docs, test, build, ci, perf, style
3. Imperative mood, lowercase, no period at the end, at most 50 characters
4. "body" explains what changed and why, wrapped at 72 characters
5. "footer" is only for BREAKING CHANGE notes or issue references

EXACT JSON SCHEMA:
{
  "header": "fix: handle empty config file",
  "body": "Return defaults instead of throwing when the file is empty.",
  "footer": null
}`;

/**
 * Build the prompt for a single file
 */
export function buildCommitPrompt(filePath: string, diff: string, maxDiffChars: number): string {
  return `${COMMIT_INSTRUCTIONS}

File: ${filePath}

Diff:
\`\`\`diff
${truncateDiff(diff, maxDiffChars)}
\`\`\`

Generate the commit message as JSON:`;
}

/**
 * Drop a reasoning trace: everything up to and including the last
 * closing tag. Text without a closing tag is returned unchanged.
 */
export function stripReasoningTrace(text: string): string {
  const close = text.lastIndexOf(THINK_CLOSE);
  if (close === -1) {
    return text;
  }
  return text.slice(close + THINK_CLOSE.length);
}

/**
 * Remove a leading (optionally language-tagged) and a trailing code fence
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  cleaned = cleaned.replace(/^```[\w-]*[ \t]*(?:\r?\n|$)/, '');
  cleaned = cleaned.replace(/(?:^|\r?\n)[ \t]*```[ \t]*$/, '');
  return cleaned.trim();
}

/**
 * Reasoning trace and fences removed: the model's actual answer
 */
export function cleanModelText(raw: string): string {
  return stripCodeFences(stripReasoningTrace(raw));
}

function repairTrailingCommas(text: string): string {
  return text.replace(/,(\s*[}\]])/g, '$1');
}

/**
 * Slice from the first '{' to the last '}', undefined when there is no such span
 */
function sliceJsonObject(text: string): string | undefined {
  const jsonStart = text.indexOf('{');
  const jsonEnd = text.lastIndexOf('}');
  if (jsonStart === -1 || jsonEnd === -1 || jsonStart >= jsonEnd) {
    return undefined;
  }
  return text.substring(jsonStart, jsonEnd + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseRecord(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(repairTrailingCommas(text));
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export type RecordFilter = (record: Record<string, unknown>) => boolean;

/**
 * Parse cleaned text as a JSON object, undefined when it is not one.
 *
 * The whole text is tried first. An object cut out of surrounding prose is
 * only taken when `acceptFragment` says it is the expected shape, so plain
 * text that happens to contain braces stays plain text.
 */
export function parseJsonObject(
  text: string,
  acceptFragment: RecordFilter = () => true
): Record<string, unknown> | undefined {
  const whole = tryParseRecord(text);
  if (whole) {
    return whole;
  }

  const fragment = sliceJsonObject(text);
  if (fragment === undefined) {
    return undefined;
  }
  const parsed = tryParseRecord(fragment);
  return parsed && acceptFragment(parsed) ? parsed : undefined;
}

const hasStringHeader: RecordFilter = (record) => typeof record.header === 'string';

function optionalText(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function isFenceLine(line: string): boolean {
  return line.trim().startsWith('```');
}

/**
 * Plain-text tier: first meaningful line, capped at MAX_HEADER_LENGTH
 */
export function headerFromPlainText(text: string): string {
  const lines = text.split(/\r?\n/);
  let line = lines[0] ?? '';

  if (isFenceLine(line)) {
    line = lines.find((l) => !isFenceLine(l) && l.trim().length > 0) ?? '';
  }

  const header = line.trim().slice(0, MAX_HEADER_LENGTH).trim();
  return header.length > 0 ? header : FALLBACK_HEADER;
}

/**
 * Turn a raw model completion into a commit message.
 *
 * Tiers: structured JSON → first line of plain text → FALLBACK_HEADER.
 * Pure and total: always returns a message with a non-empty header.
 */
export function parseCommitResponse(raw: string): GeneratedMessage {
  const cleaned = cleanModelText(raw);
  const parsed = parseJsonObject(cleaned, hasStringHeader);

  if (parsed) {
    const header = typeof parsed.header === 'string' ? parsed.header.trim() : '';
    if (header.length === 0) {
      return { header: FALLBACK_HEADER, body: null, footer: null };
    }
    return {
      header,
      body: optionalText(parsed.body),
      footer: optionalText(parsed.footer),
    };
  }

  return { header: headerFromPlainText(cleaned), body: null, footer: null };
}

/**
 * Final commit message text: header, blank line, body, blank line, footer
 */
export function formatCommitMessage(message: GeneratedMessage): string {
  let text = message.header;
  if (message.body && message.body.trim().length > 0) {
    text += '\n\n' + message.body.trim();
  }
  if (message.footer && message.footer.trim().length > 0) {
    text += '\n\n' + message.footer.trim();
  }
  return text;
}
