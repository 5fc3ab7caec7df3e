import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { ErrorResponse, HttpQueryResponse } from './types/index.js';
import type { QueryGateConfig } from './config.js';
import type { Runtime } from './runtime.js';
import { TransportGate } from './transport/gate.js';
import { silentLogger, type Logger } from './logger.js';
import { QUERYGATE_VERSION } from './version.js';

const QueryBodySchema = z.object({
  query_text: z.string(),
  conversation_context: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string()
      })
    )
    .default([]),
  // Caller's own id, echoed back and recorded; never used as the audit key
  correlation_id: z.string().min(1).max(128).optional()
});

export interface ServerOptions {
  config: QueryGateConfig;
  runtime: Pick<Runtime, 'pipeline' | 'audit' | 'policy' | 'backends'>;
  logger?: Logger;
}

export async function buildServer({ config, runtime, logger = silentLogger }: ServerOptions): Promise<FastifyInstance> {
  const gate = new TransportGate({
    apiKeys: new Map(config.auth.api_keys.map((entry) => [entry.key, entry.identity])),
    allowedOrigins: config.auth.allowed_origins,
    rateLimits: {
      requestsPerSecond: config.rate_limits.requests_per_second,
      maxInputChars: config.rate_limits.max_input_chars,
      maxContextChars: config.rate_limits.max_context_chars
    }
  });

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins,
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_second * 60,
    timeWindow: '1 minute'
  });

  // Health endpoint
  app.get('/api/health', async () => {
    const auditVerification = await runtime.audit.verify();
    return {
      status: 'healthy',
      version: QUERYGATE_VERSION,
      policy_version: runtime.policy.table.version,
      backends: runtime.backends,
      audit_log_valid: auditVerification.valid
    };
  });

  app.post('/api/query', async (request, reply) => {
    const startTime = Date.now();
    const parsed = QueryBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const response: ErrorResponse = {
        request_id: uuidv4(),
        error_code: 'BAD_REQUEST',
        message: parsed.error.issues[0]?.message ?? 'Invalid request body'
      };
      reply.status(400);
      return response;
    }

    const body = parsed.data;
    const requestId = uuidv4();
    const apiKey = request.headers.authorization?.replace(/^Bearer\s+/i, '');

    const gated = gate.check({
      apiKey,
      origin: request.headers.origin,
      queryText: body.query_text,
      context: body.conversation_context
    });

    if (!gated.ok) {
      logger.warn({ request_id: requestId, correlation_id: body.correlation_id, code: gated.code }, 'Request blocked at transport');
      const response: ErrorResponse = {
        request_id: requestId,
        error_code: gated.code,
        message: gated.reason
      };
      reply.status(gated.status);
      return response;
    }

    const abort = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) abort.abort(new Error('Client disconnected'));
    });

    const result = await runtime.pipeline.handle(
      {
        queryText: body.query_text,
        identity: gated.identity,
        conversationContext: body.conversation_context
      },
      { requestId, correlationId: body.correlation_id, signal: abort.signal }
    );

    const response: HttpQueryResponse = {
      request_id: requestId,
      ...(body.correlation_id === undefined ? {} : { correlation_id: body.correlation_id }),
      response_text: result.responseText,
      decision_outcome: result.decisionOutcome,
      audit_id: result.auditId,
      stages: result.stages,
      processing_time_ms: Date.now() - startTime
    };

    logger.info(
      {
        request_id: requestId,
        decision_outcome: result.decisionOutcome,
        processing_time_ms: response.processing_time_ms
      },
      'Request processed'
    );

    if (result.decisionOutcome === 'DENY') {
      reply.status(403);
    }
    return response;
  });

  return app;
}
