import { describe, it, expect } from 'vitest';
import type { Identity, Intent, IntentCategory } from '../types/index.js';
import { decide } from './engine.js';
import { POLICY, analyst, accountManager, guest } from '../testing/fixtures.js';

function intent(category: IntentCategory, confidence = 0.9): Intent {
  return { category, confidence, rationale: 'test' };
}

describe('decide', () => {
  it.each([
    ['SAFE_KNOWLEDGE', 0.9, guest, 'ALLOW_NO_DATA', 'SAFE_KNOWLEDGE'],
    ['DATA_QUERY', 0.9, analyst, 'ALLOW_WITH_AUTH', 'AUTHORIZED'],
    ['DATA_QUERY', 0.9, guest, 'DENY', 'INSUFFICIENT_ENTITLEMENT'],
    ['DATA_QUERY', 0.4, analyst, 'DENY', 'LOW_CONFIDENCE'],
    ['SAFE_KNOWLEDGE', 0.69, guest, 'DENY', 'LOW_CONFIDENCE'],
    ['OUT_OF_SCOPE', 1, analyst, 'DENY', 'OUT_OF_SCOPE']
  ] as const)('%s at %s for %s → %s', (category, confidence, identity, outcome, reason) => {
    const decision = decide(intent(category, confidence), identity, POLICY, 3);
    expect(decision.outcome).toBe(outcome);
    expect(decision.reason).toBe(reason);
    expect(decision.policyVersion).toBe('test-1');
    expect(decision.schemaVersion).toBe(3);
  });

  it('accepts a confidence exactly at the threshold', () => {
    expect(decide(intent('DATA_QUERY', 0.7), analyst, POLICY, 1).outcome).toBe('ALLOW_WITH_AUTH');
  });

  it('returns the sorted resource classes of the matching rule as scope', () => {
    const decision = decide(intent('DATA_QUERY'), analyst, POLICY, 1);
    expect(decision.authorizedScope).toEqual(['cost_center', 'hr']);
    expect(decide(intent('DATA_QUERY'), accountManager, POLICY, 1).authorizedScope).toEqual(['customer']);
  });

  it('intersects overlapping grants so the most restrictive rule wins', () => {
    const both: Identity = { ...analyst, roles: ['analyst', 'account_manager'] };
    const decision = decide(intent('DATA_QUERY'), both, POLICY, 1);
    // cost_center/hr ∩ customer is empty
    expect(decision.outcome).toBe('DENY');
    expect(decision.reason).toBe('INSUFFICIENT_ENTITLEMENT');

    const contractor: Identity = { ...analyst, roles: ['analyst', 'contractor'] };
    expect(decide(intent('ANALYSIS'), contractor, POLICY, 1).outcome).toBe('DENY');
    expect(decide(intent('ANALYSIS'), analyst, POLICY, 1).authorizedScope).toEqual(['cost_center']);
  });

  it('never lets a role escalate an out-of-scope intent', () => {
    const admin: Identity = { ...analyst, roles: ['analyst', 'account_manager', 'admin'] };
    const decision = decide(intent('OUT_OF_SCOPE', 1), admin, POLICY, 1);
    expect(decision.outcome).toBe('DENY');
    expect(decision.authorizedScope).toEqual([]);
  });

  it('denies categories missing from the table as unknown intent', () => {
    const table = { ...POLICY, categories: { SAFE_KNOWLEDGE: { rules: [] } } };
    const decision = decide(intent('DATA_QUERY'), analyst, table, 1);
    expect(decision.outcome).toBe('DENY');
    expect(decision.reason).toBe('UNKNOWN_INTENT');
  });

  it('honours an out_of_scope flag on any category', () => {
    const table = {
      ...POLICY,
      categories: { ...POLICY.categories, ANALYSIS: { out_of_scope: true, rules: [] } }
    };
    expect(decide(intent('ANALYSIS'), analyst, table, 1).reason).toBe('OUT_OF_SCOPE');
  });

  it('denies a non-finite confidence', () => {
    expect(decide(intent('DATA_QUERY', Number.NaN), analyst, POLICY, 1).reason).toBe('LOW_CONFIDENCE');
  });

  it('is deterministic and returns frozen decisions', () => {
    const first = decide(intent('DATA_QUERY'), analyst, POLICY, 2);
    const second = decide(intent('DATA_QUERY'), analyst, POLICY, 2);
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.authorizedScope)).toBe(true);
  });
});
