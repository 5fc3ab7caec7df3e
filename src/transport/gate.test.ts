import { describe, it, expect } from 'vitest';
import { TransportGate, type TransportConfig } from './gate.js';

const CONFIG: TransportConfig = {
  apiKeys: new Map([
    ['test-key', { user_id: 'u-analyst', tenant: 'acme', roles: ['analyst'], entitlements: ['PII'] }]
  ]),
  allowedOrigins: ['https://app.example.test', 'https://*.internal.test'],
  rateLimits: { requestsPerSecond: 2, maxInputChars: 20, maxContextChars: 10 }
};

function gate(now: () => number = () => 0): TransportGate {
  return new TransportGate(CONFIG, now);
}

describe('TransportGate', () => {
  it('binds the identity to the API key', () => {
    expect(gate().check({ apiKey: 'test-key', queryText: 'What is variance?', context: [] })).toEqual({
      ok: true,
      identity: { userId: 'u-analyst', tenant: 'acme', roles: ['analyst'], entitlements: ['PII'] }
    });
  });

  it.each([
    [{ apiKey: undefined, queryText: 'q', context: [] }, 401, 'AUTH_FAILED'],
    [{ apiKey: 'wrong-key', queryText: 'q', context: [] }, 401, 'AUTH_FAILED'],
    [{ apiKey: 'test-key', origin: 'https://evil.test', queryText: 'q', context: [] }, 403, 'CORS_VIOLATION'],
    [{ apiKey: 'test-key', queryText: '   ', context: [] }, 400, 'EMPTY_INPUT'],
    [{ apiKey: 'test-key', queryText: 'x'.repeat(21), context: [] }, 413, 'INPUT_TOO_LARGE'],
    [
      { apiKey: 'test-key', queryText: 'q', context: [{ role: 'user' as const, content: 'eleven char' }] },
      413,
      'CONTEXT_TOO_LARGE'
    ]
  ])('rejects %o with %i', (request, status, code) => {
    expect(gate().check(request)).toMatchObject({ ok: false, status, code });
  });

  it('accepts wildcard origins', () => {
    const result = gate().check({ apiKey: 'test-key', origin: 'https://fin.internal.test', queryText: 'q', context: [] });
    expect(result.ok).toBe(true);
  });

  it('limits requests per key per second', () => {
    let now = 1000;
    const limited = gate(() => now);
    const request = { apiKey: 'test-key', queryText: 'q', context: [] };

    expect(limited.check(request).ok).toBe(true);
    expect(limited.check(request).ok).toBe(true);
    expect(limited.check(request)).toMatchObject({ ok: false, status: 429, code: 'RATE_LIMITED' });

    now = 2001;
    expect(limited.check(request).ok).toBe(true);
  });
});
