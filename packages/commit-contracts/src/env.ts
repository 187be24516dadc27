/**
 * Environment variable definitions
 */

import { z } from 'zod';
import type { SoloCommitEnvOverrides } from './types/config';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

/**
 * One schema per variable, so an invalid value drops only itself
 */
export const soloCommitEnv = {
  SOLO_COMMIT_LLM_ENDPOINT: z.string().url(),
  SOLO_COMMIT_LLM_MODEL: z.string().trim().min(1),
  SOLO_COMMIT_LLM_TIMEOUT_MS: z.coerce.number().int().positive(),
  SOLO_COMMIT_LLM_JSON_MODE: booleanString,
  SOLO_COMMIT_REMOTE: z.string().trim().min(1),
  SOLO_COMMIT_FORMAT_COMMAND: z.string().trim().min(1),
} as const;

export type SoloCommitEnvVar = keyof typeof soloCommitEnv;

export const SOLO_COMMIT_ENV_VARS: readonly SoloCommitEnvVar[] = [
  'SOLO_COMMIT_LLM_ENDPOINT',
  'SOLO_COMMIT_LLM_MODEL',
  'SOLO_COMMIT_LLM_TIMEOUT_MS',
  'SOLO_COMMIT_LLM_JSON_MODE',
  'SOLO_COMMIT_REMOTE',
  'SOLO_COMMIT_FORMAT_COMMAND',
];

export interface EnvParseResult {
  overrides: SoloCommitEnvOverrides;
  /** Variables that were set but did not validate */
  rejected: SoloCommitEnvVar[];
}

/**
 * Parse overrides from an environment map. Unset variables are skipped,
 * invalid ones are reported and the default stays in effect.
 */
export function parseSoloCommitEnv(source: Record<string, string | undefined>): EnvParseResult {
  const rejected: SoloCommitEnvVar[] = [];

  function read<T>(key: SoloCommitEnvVar, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    const raw = source[key];
    if (raw === undefined || raw === '') {
      return undefined;
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      rejected.push(key);
      return undefined;
    }
    return parsed.data;
  }

  const overrides: SoloCommitEnvOverrides = {
    SOLO_COMMIT_LLM_ENDPOINT: read('SOLO_COMMIT_LLM_ENDPOINT', soloCommitEnv.SOLO_COMMIT_LLM_ENDPOINT),
    SOLO_COMMIT_LLM_MODEL: read('SOLO_COMMIT_LLM_MODEL', soloCommitEnv.SOLO_COMMIT_LLM_MODEL),
    SOLO_COMMIT_LLM_TIMEOUT_MS: read('SOLO_COMMIT_LLM_TIMEOUT_MS', soloCommitEnv.SOLO_COMMIT_LLM_TIMEOUT_MS),
    SOLO_COMMIT_LLM_JSON_MODE: read('SOLO_COMMIT_LLM_JSON_MODE', soloCommitEnv.SOLO_COMMIT_LLM_JSON_MODE),
    SOLO_COMMIT_REMOTE: read('SOLO_COMMIT_REMOTE', soloCommitEnv.SOLO_COMMIT_REMOTE),
    SOLO_COMMIT_FORMAT_COMMAND: read('SOLO_COMMIT_FORMAT_COMMAND', soloCommitEnv.SOLO_COMMIT_FORMAT_COMMAND),
  };

  return { overrides, rejected };
}
