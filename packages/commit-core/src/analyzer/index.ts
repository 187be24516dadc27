/**
 * Git analyzer module
 */

export {
  findRepoRoot,
  getGitStatus,
  getAllChangedFiles,
  collectChangedFiles,
  hasChanges,
  isExcludedPath,
} from './git-status';

export {
  extractChange,
  isNewFileDiff,
  truncateDiff,
  NEW_FILE_MARKER,
  NO_CHANGES_MARKER,
} from './file-diff';

export { createRepoGit, type RepoGit, type IgnoreCheck } from './repo-git';
