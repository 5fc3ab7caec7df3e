export {
  isIssuedPlan,
  validate,
  ValidatedPlan,
  type ValidatedAggregation,
  type ValidatedFilter,
  type ValidationResult,
  type ValidatorOptions
} from './validator.js';
