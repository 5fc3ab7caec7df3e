export { ExecutionPlanSchema, type PlanGenerator } from './generator.js';
export { KeywordPlanGenerator } from './keyword.js';
export { describeCatalog, LlmPlanGenerator, type LlmPlanGeneratorOptions } from './llm.js';
