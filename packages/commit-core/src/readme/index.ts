export {
  regenerateReadme,
  buildReadmePrompt,
  parseReadmeResponse,
  README_INSTRUCTIONS,
  type RegenerateReadmeOptions,
} from './readme-generator';
