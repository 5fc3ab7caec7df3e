import { z } from 'zod';
import { INTENT_CATEGORIES, isIntentCategory } from '../types/index.js';
import type { ConversationTurn, Intent, IntentCategory } from '../types/index.js';

/**
 * Advisory only: implementations receive text and bounded context, never an
 * identity or a handle that can reach a data source.
 */
export interface IntentClassifier {
  classify(query: string, context: readonly ConversationTurn[]): Promise<Intent>;
}

export function failClosed(rationale: string): Intent {
  return Object.freeze({ category: 'OUT_OF_SCOPE', confidence: 0, rationale });
}

// Accepts `FPNA_DATA_QUERY` style labels: one domain segment before a known category.
export function normalizeCategory(label: string): IntentCategory | undefined {
  const upper = label.trim().toUpperCase().replace(/[\s-]+/g, '_');
  if (isIntentCategory(upper)) return upper;

  for (const category of INTENT_CATEGORIES) {
    const suffix = `_${category}`;
    if (upper.endsWith(suffix)) {
      const prefix = upper.slice(0, -suffix.length);
      if (/^[A-Z0-9]+$/.test(prefix)) return category;
    }
  }
  return undefined;
}

const RawIntentSchema = z.object({
  category: z.string(),
  confidence: z.number().min(0).max(1),
  rationale: z.string().optional()
});

export type IntentParseResult = { ok: true; intent: Intent } | { ok: false; reason: string };

/**
 * Boundary check for model output. A well-formed reply naming a category
 * outside the closed set is coerced to OUT_OF_SCOPE rather than rejected.
 */
export function parseIntent(raw: unknown): IntentParseResult {
  const parsed = RawIntentSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: `malformed classifier output: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
  }

  const category = normalizeCategory(parsed.data.category);
  if (!category) {
    return {
      ok: true,
      intent: failClosed(`coerced unknown category ${JSON.stringify(parsed.data.category.slice(0, 64))}`)
    };
  }

  return {
    ok: true,
    intent: Object.freeze({
      category,
      confidence: parsed.data.confidence,
      rationale: (parsed.data.rationale ?? '').slice(0, 500)
    })
  };
}

// Pulls the first JSON object out of a reply that may carry prose or code fences.
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}
