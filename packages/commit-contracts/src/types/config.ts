/**
 * Run Configuration Contract
 *
 * There is no configuration file: defaults below are overridden by
 * environment variables (see env.ts) and nothing else.
 */

/**
 * Local model service configuration
 */
export interface LLMConfig {
  /** Generate endpoint of the local model service */
  endpoint: string;
  /** Model name sent with every request */
  model: string;
  /** Upper bound for a single request, in milliseconds */
  timeoutMs: number;
  /** Ask the service for a JSON object response */
  jsonMode: boolean;
  /** Diffs longer than this are truncated before prompting */
  maxDiffChars: number;
}

/**
 * Git configuration
 */
export interface GitConfig {
  /** Remote that every commit is pushed to (default: origin) */
  remote: string;
  /** Directories never processed, regardless of ignore rules */
  excludedDirs: string[];
}

/**
 * Post-commit formatter for infrastructure-config files
 */
export interface FormatConfig {
  /** File extensions the formatter applies to (default: ['.tf']) */
  extensions: string[];
  /** Formatter executable */
  command: string;
  /** Arguments placed before the file path */
  args: string[];
  /** Message of the follow-up commit */
  message: string;
}

/**
 * Documentation-regeneration mode
 */
export interface ReadmeConfig {
  /** Output path, relative to the repository root */
  path: string;
  /** Manifest cap sent to the model */
  maxFiles: number;
}

/**
 * Effective configuration of a run
 */
export interface SoloCommitConfig {
  llm: LLMConfig;
  git: GitConfig;
  format: FormatConfig;
  readme: ReadmeConfig;
}

/**
 * Default configuration values
 */
export const defaultSoloCommitConfig: SoloCommitConfig = {
  llm: {
    endpoint: 'http://localhost:11434/api/generate',
    model: 'deepseek-r1:32b',
    timeoutMs: 120_000,
    jsonMode: true,
    maxDiffChars: 8000,
  },
  git: {
    remote: 'origin',
    excludedDirs: ['.idea'],
  },
  format: {
    extensions: ['.tf'],
    command: 'terraform',
    args: ['fmt'],
    message: 'style: format terraform files',
  },
  readme: {
    path: 'README.md',
    maxFiles: 500,
  },
};

/**
 * Environment overrides, already parsed by soloCommitEnv
 */
export interface SoloCommitEnvOverrides {
  SOLO_COMMIT_LLM_ENDPOINT?: string;
  SOLO_COMMIT_LLM_MODEL?: string;
  SOLO_COMMIT_LLM_TIMEOUT_MS?: number;
  SOLO_COMMIT_LLM_JSON_MODE?: boolean;
  SOLO_COMMIT_REMOTE?: string;
  SOLO_COMMIT_FORMAT_COMMAND?: string;
}

/**
 * Resolve config with env variable overrides
 */
export function resolveSoloCommitConfig(env: SoloCommitEnvOverrides = {}): SoloCommitConfig {
  const d = defaultSoloCommitConfig;

  return {
    llm: {
      endpoint: env.SOLO_COMMIT_LLM_ENDPOINT ?? d.llm.endpoint,
      model: env.SOLO_COMMIT_LLM_MODEL ?? d.llm.model,
      timeoutMs: env.SOLO_COMMIT_LLM_TIMEOUT_MS ?? d.llm.timeoutMs,
      jsonMode: env.SOLO_COMMIT_LLM_JSON_MODE ?? d.llm.jsonMode,
      maxDiffChars: d.llm.maxDiffChars,
    },
    git: {
      remote: env.SOLO_COMMIT_REMOTE ?? d.git.remote,
      excludedDirs: [...d.git.excludedDirs],
    },
    format: {
      ...d.format,
      args: [...d.format.args],
      extensions: [...d.format.extensions],
      command: env.SOLO_COMMIT_FORMAT_COMMAND ?? d.format.command,
    },
    readme: { ...d.readme },
  };
}
