import type { ConversationTurn, Identity } from '../types/index.js';
import type { ConfiguredIdentity } from '../config.js';

export interface TransportConfig {
  /** API key → identity bound to it. The identity never comes from the request body. */
  apiKeys: Map<string, ConfiguredIdentity>;
  allowedOrigins: string[];
  rateLimits: {
    requestsPerSecond: number;
    maxInputChars: number;
    maxContextChars: number;
  };
}

export interface TransportRequest {
  apiKey?: string;
  origin?: string;
  queryText: string;
  context: ConversationTurn[];
}

export type TransportResult =
  | { ok: true; identity: Identity }
  | { ok: false; status: number; code: string; reason: string };

function originAllowed(origin: string, allowedOrigins: string[]): boolean {
  return allowedOrigins.some((allowed) => {
    if (allowed.includes('*')) {
      const escaped = allowed.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'));
      return new RegExp('^' + escaped.join('.*') + '$').test(origin);
    }
    return allowed === origin;
  });
}

/**
 * Checks that run before any pipeline stage: API key, origin, per-key rate
 * and input size.
 */
export class TransportGate {
  private readonly requestCounts = new Map<string, { count: number; resetAt: number }>();

  constructor(
    private readonly config: TransportConfig,
    private readonly now: () => number = Date.now
  ) {}

  check(request: TransportRequest): TransportResult {
    const { apiKey, origin } = request;
    const bound = apiKey ? this.config.apiKeys.get(apiKey) : undefined;

    if (!apiKey || !bound) {
      return { ok: false, status: 401, code: 'AUTH_FAILED', reason: 'Invalid or missing API key' };
    }

    if (origin && this.config.allowedOrigins.length > 0 && !originAllowed(origin, this.config.allowedOrigins)) {
      return { ok: false, status: 403, code: 'CORS_VIOLATION', reason: `Origin ${origin} not allowed` };
    }

    // Rate limiting
    const now = this.now();
    const keyState = this.requestCounts.get(apiKey) ?? { count: 0, resetAt: now + 1000 };

    if (now > keyState.resetAt) {
      keyState.count = 0;
      keyState.resetAt = now + 1000;
    }

    keyState.count++;
    this.requestCounts.set(apiKey, keyState);

    if (keyState.count > this.config.rateLimits.requestsPerSecond) {
      return { ok: false, status: 429, code: 'RATE_LIMITED', reason: 'Rate limit exceeded' };
    }

    if (request.queryText.trim().length === 0) {
      return { ok: false, status: 400, code: 'EMPTY_INPUT', reason: 'Query text is empty' };
    }

    if (request.queryText.length > this.config.rateLimits.maxInputChars) {
      return {
        ok: false,
        status: 413,
        code: 'INPUT_TOO_LARGE',
        reason: `Input exceeds ${this.config.rateLimits.maxInputChars} characters`
      };
    }

    const contextChars = request.context.reduce((total, turn) => total + turn.content.length, 0);
    if (contextChars > this.config.rateLimits.maxContextChars) {
      return {
        ok: false,
        status: 413,
        code: 'CONTEXT_TOO_LARGE',
        reason: `Conversation context exceeds ${this.config.rateLimits.maxContextChars} characters`
      };
    }

    return {
      ok: true,
      identity: {
        userId: bound.user_id,
        tenant: bound.tenant,
        roles: [...bound.roles],
        entitlements: [...bound.entitlements]
      }
    };
  }
}
