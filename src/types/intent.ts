export const INTENT_CATEGORIES = ['SAFE_KNOWLEDGE', 'DATA_QUERY', 'ANALYSIS', 'OUT_OF_SCOPE'] as const;

export type IntentCategory = (typeof INTENT_CATEGORIES)[number];

export interface Intent {
  readonly category: IntentCategory;
  /** In [0, 1]. */
  readonly confidence: number;
  readonly rationale: string;
}

export function isIntentCategory(value: string): value is IntentCategory {
  return INTENT_CATEGORIES.some((category) => category === value);
}
