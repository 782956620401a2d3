export {
  highlights,
  composeAnswer,
  renderSourceEntry,
  chunkTitle,
  chunkLocation,
  PLACEHOLDER_HIGHLIGHT,
  CLOSING_NOTE,
  MAX_HIGHLIGHTS,
  MIN_HIGHLIGHT_LENGTH,
} from './extractive.js';
export { buildMessages, buildContextBlock, snippet, SYSTEM_INSTRUCTION } from './prompts.js';
export {
  AnswerSynthesizer,
  type SynthesizerOptions,
  type Synthesis,
  type SynthesisTier,
} from './synthesizer.js';
