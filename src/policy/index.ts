export { decide } from './engine.js';
export {
  DEFAULT_POLICY_TABLE,
  loadPolicyTable,
  parsePolicyTable,
  PolicyTableSchema,
  type LoadedPolicy
} from './loader.js';
