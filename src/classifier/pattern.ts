import type { ConversationTurn, Intent, IntentCategory } from '../types/index.js';
import type { IntentClassifier } from './intent.js';

// Attempts to talk the system out of its access rules, or to write.
const OUT_OF_SCOPE_PATTERNS = [
  /ignore\s+(?:(?:all|any|the|previous|your|my)\s+)*(?:access\s+|security\s+)?(?:rules|instructions|restrictions|policies|permissions)/i,
  /\b(?:bypass|override|circumvent|disable)\s+(?:the\s+|your\s+|all\s+)?(?:access|security|permission|policy|policies|entitlement)/i,
  /(?:you\s+are\s+now|pretend\s+(?:to\s+be|you\s+are)|act\s+as)\s+(?:an?\s+)?(?:admin|administrator|root|superuser|dba)/i,
  /\b(?:drop|delete|truncate|update|insert|alter|grant|revoke)\s+(?:table|from|into|all|privileges|the|every)\b/i,
  /\[SYSTEM\]|\[INST\]|<<SYS>>|<\|im_start\|>/i,
  /\b(?:passwords?|credentials|api\s+keys?|secrets?)\s+(?:of|for)\s+(?:all|every|other)\b/i,
];

const ANALYSIS_PATTERNS = [
  /\b(?:compare|comparison|trend|trends|forecast|correlat\w*|breakdown|break\s+down|analy[sz]e|analysis\s+of)\b/i,
  /\bwhy\s+did\b/i,
  /\b(?:over\s+time|year[-\s]over[-\s]year|month[-\s]over[-\s]month|quarter[-\s]over[-\s]quarter)\b/i,
];

const DATA_QUERY_PATTERNS = [
  /\b(?:show|list|give\s+me|fetch|pull|display|look\s+up|lookup)\b/i,
  /\bhow\s+(?:many|much)\b.*\b(?:we|our|us|do|did|does)\b/i,
  /\b(?:total|sum|average|count)\s+(?:of|for)\b/i,
  /\b(?:for|in|of)\s+[a-z][a-z ]*\s+#?\d+\b/i,
];

const SAFE_KNOWLEDGE_PATTERNS = [
  /^\s*(?:what\s+(?:is|are|does)|what's|define|explain|describe)\b/i,
  /\b(?:meaning|definition)\s+of\b/i,
  /^\s*how\s+(?:is|are|do|does)\b.*\b(?:calculated|computed|defined|measured)\b/i,
];

const RULES: Array<[IntentCategory, RegExp[], number]> = [
  ['OUT_OF_SCOPE', OUT_OF_SCOPE_PATTERNS, 0.95],
  ['ANALYSIS', ANALYSIS_PATTERNS, 0.85],
  ['DATA_QUERY', DATA_QUERY_PATTERNS, 0.9],
  ['SAFE_KNOWLEDGE', SAFE_KNOWLEDGE_PATTERNS, 0.9],
];

const UNMATCHED_CONFIDENCE = 0.2;

export function classifyByPattern(input: string): Intent {
  for (const [category, patterns, confidence] of RULES) {
    const index = patterns.findIndex((pattern) => pattern.test(input));
    if (index !== -1) {
      return Object.freeze({
        category,
        confidence,
        rationale: `matched ${category.toLowerCase()} pattern #${index + 1}`
      });
    }
  }

  // Nothing recognisable: most restrictive category, below any sane threshold
  return Object.freeze({
    category: 'OUT_OF_SCOPE',
    confidence: UNMATCHED_CONFIDENCE,
    rationale: 'no pattern matched'
  });
}

/**
 * Deterministic classifier used when no model backend is configured.
 * Conversation context is ignored.
 */
export class PatternIntentClassifier implements IntentClassifier {
  async classify(query: string, _context: readonly ConversationTurn[] = []): Promise<Intent> {
    return classifyByPattern(query);
  }
}
