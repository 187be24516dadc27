/**
 * Commit applier module
 */

export {
  commitAndPush,
  IGNORED_REASON,
  type CommitFileResult,
  type CommitFileOptions,
  type CommitStage,
} from './commit-file';

export {
  applyPostFormat,
  isInfraConfigFile,
  runExternalFormatter,
  type PostFormatResult,
  type PostFormatOptions,
} from './post-format';
