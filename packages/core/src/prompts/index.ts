export {
  buildAgainstPrompt,
  buildForPrompt,
  buildStagePrompt,
  buildSynthesisPrompt,
} from './debate-prompts.js';
