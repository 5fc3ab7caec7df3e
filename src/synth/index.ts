export {
  EXECUTION_FAILURE_MESSAGE,
  GENERATION_FAILURE_MESSAGE,
  NO_DATA_DISABLED,
  NO_DATA_FALLBACK,
  NO_DATA_SYSTEM_PROMPT,
  refusalFor,
  renderTable,
  ResponseSynthesizer,
  VALIDATION_FAILURE_MESSAGE,
  type SynthesizerOptions
} from './synthesizer.js';
