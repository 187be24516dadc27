/**
 * Commit message generator module
 */

export {
  synthesizeCommitMessage,
  NEW_FILE_MESSAGE,
  AUTOMATED_FALLBACK_MESSAGE,
  TIMEOUT_DETAIL,
  type SynthesizeOptions,
  type SynthesisResult,
} from './message-synthesizer';

export {
  buildCommitPrompt,
  parseCommitResponse,
  formatCommitMessage,
  stripReasoningTrace,
  stripCodeFences,
  cleanModelText,
  headerFromPlainText,
  COMMIT_INSTRUCTIONS,
  FALLBACK_HEADER,
  MAX_HEADER_LENGTH,
} from './llm-prompt';
