export {
  extractJsonObject,
  failClosed,
  normalizeCategory,
  parseIntent,
  type IntentClassifier,
  type IntentParseResult
} from './intent.js';
export { classifyByPattern, PatternIntentClassifier } from './pattern.js';
export { LlmIntentClassifier, type LlmClassifierOptions } from './llm.js';
