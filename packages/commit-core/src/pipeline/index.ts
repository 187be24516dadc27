export { processFile, runFileCommits, type RunFileCommitsResult } from './run-file-commits';
