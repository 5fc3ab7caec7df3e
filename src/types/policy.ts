import type { IntentCategory } from './intent.js';

export type DecisionOutcome = 'ALLOW_NO_DATA' | 'ALLOW_WITH_AUTH' | 'DENY';

export type DecisionReason =
  | 'SAFE_KNOWLEDGE'
  | 'AUTHORIZED'
  | 'LOW_CONFIDENCE'
  | 'UNKNOWN_INTENT'
  | 'INSUFFICIENT_ENTITLEMENT'
  | 'OUT_OF_SCOPE';

export interface PolicyRule {
  roles: string[];
  resource_classes: string[];
}

export interface PolicyCategoryEntry {
  out_of_scope?: boolean;
  rules: PolicyRule[];
}

export interface PolicyTable {
  version: string;
  confidence_threshold: number;
  categories: Partial<Record<string, PolicyCategoryEntry>>;
}

export interface PolicyDecision {
  readonly category: IntentCategory;
  readonly outcome: DecisionOutcome;
  /** Resource classes the request may touch. Empty unless ALLOW_WITH_AUTH. */
  readonly authorizedScope: readonly string[];
  readonly reason: DecisionReason;
  readonly policyVersion: string;
  readonly schemaVersion: number;
}
