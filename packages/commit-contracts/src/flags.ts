/**
 * Declarative flag definitions
 *
 * Define flags once, use them in the CLI program and in command handlers.
 */

/**
 * Flags for the default command
 *
 * @example
 * ```bash
 * solo-commit --debug
 * solo-commit --readme
 * ```
 */
export const runFlags = {
  debug: {
    type: 'boolean',
    description: 'Print raw model responses and the diff text sent to the model',
    default: false,
  },
  readme: {
    type: 'boolean',
    description: 'Regenerate README.md from the tracked file manifest instead of committing',
    default: false,
  },
} as const;

export type RunFlagName = keyof typeof runFlags;

/**
 * Parsed input of the default command
 */
export type RunFlags = { [K in RunFlagName]: boolean };
