import type {
  DecisionOutcome,
  DecisionReason,
  Identity,
  Intent,
  IntentCategory,
  PolicyDecision,
  PolicyTable
} from '../types/index.js';
import { isIntentCategory } from '../types/index.js';

function decision(
  category: IntentCategory,
  outcome: DecisionOutcome,
  reason: DecisionReason,
  table: PolicyTable,
  schemaVersion: number,
  authorizedScope: string[] = []
): PolicyDecision {
  return Object.freeze({
    category,
    outcome,
    authorizedScope: Object.freeze(authorizedScope),
    reason,
    policyVersion: table.version,
    schemaVersion
  });
}

function intersect(sets: string[][]): string[] {
  const [first = [], ...rest] = sets;
  return [...new Set(first)].filter((item) => rest.every((set) => set.includes(item))).sort();
}

/**
 * Deterministic decision from an advisory intent. Pure and total: no I/O,
 * no clock, and every input combination maps to exactly one decision.
 *
 * When several rules grant the identity access to the same category, the
 * most restrictive wins: the authorized scope is the intersection of their
 * resource classes.
 */
export function decide(
  intent: Intent,
  identity: Identity,
  table: PolicyTable,
  schemaVersion: number
): PolicyDecision {
  const category: IntentCategory = isIntentCategory(intent.category) ? intent.category : 'OUT_OF_SCOPE';

  // No role escalates an out-of-scope classification
  if (category === 'OUT_OF_SCOPE') {
    return decision(category, 'DENY', isIntentCategory(intent.category) ? 'OUT_OF_SCOPE' : 'UNKNOWN_INTENT', table, schemaVersion);
  }

  const entry = table.categories[category];
  if (!entry) {
    return decision(category, 'DENY', 'UNKNOWN_INTENT', table, schemaVersion);
  }

  if (entry.out_of_scope) {
    return decision(category, 'DENY', 'OUT_OF_SCOPE', table, schemaVersion);
  }

  if (!Number.isFinite(intent.confidence) || intent.confidence < table.confidence_threshold) {
    return decision(category, 'DENY', 'LOW_CONFIDENCE', table, schemaVersion);
  }

  if (category === 'SAFE_KNOWLEDGE') {
    return decision(category, 'ALLOW_NO_DATA', 'SAFE_KNOWLEDGE', table, schemaVersion);
  }

  const held = new Set(identity.roles);
  const matched = entry.rules.filter((rule) => rule.roles.every((role) => held.has(role)));
  if (matched.length === 0) {
    return decision(category, 'DENY', 'INSUFFICIENT_ENTITLEMENT', table, schemaVersion);
  }

  const scope = intersect(matched.map((rule) => rule.resource_classes));
  if (scope.length === 0) {
    return decision(category, 'DENY', 'INSUFFICIENT_ENTITLEMENT', table, schemaVersion);
  }

  return decision(category, 'ALLOW_WITH_AUTH', 'AUTHORIZED', table, schemaVersion, scope);
}
