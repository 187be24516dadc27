/**
 * solo-commit CLI
 *
 * @module @solo-commit/commit-cli
 */

export * from './cli';
