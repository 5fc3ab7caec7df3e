import { v4 as uuidv4 } from 'uuid';
import type {
  AuditStage,
  DecisionOutcome,
  ExecutionPlan,
  Identity,
  Intent,
  PolicyDecision,
  Query,
  QueryRequest,
  QueryResponse,
  SchemaSnapshot
} from '../types/index.js';
import { SAFE_REFUSAL } from '../types/index.js';
import type { IntentClassifier } from '../classifier/index.js';
import { failClosed } from '../classifier/index.js';
import { decide, type LoadedPolicy } from '../policy/index.js';
import type { SchemaCatalog } from '../catalog/index.js';
import type { PlanGenerator } from '../planner/index.js';
import { validate, type ValidatedPlan } from '../validator/index.js';
import type { ExecutionGateway } from '../gateway/index.js';
import {
  EXECUTION_FAILURE_MESSAGE,
  GENERATION_FAILURE_MESSAGE,
  VALIDATION_FAILURE_MESSAGE,
  type ResponseSynthesizer
} from '../synth/index.js';
import { hashObject, sha256, type AuditTrail } from '../audit/index.js';
import { errorMessage, ExecutionError, PlanValidationError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export interface PipelineDependencies {
  classifier: IntentClassifier;
  policy: LoadedPolicy;
  catalog: SchemaCatalog;
  generator: PlanGenerator;
  gateway: ExecutionGateway;
  synthesizer: ResponseSynthesizer;
  audit: AuditTrail;
  logger?: Logger;
}

export interface PipelineOptions {
  maxRows: number;
  maxContextTurns: number;
  /** Data source whose latest snapshot version is bound into each decision. */
  schemaVersionSource?: string;
}

export interface PipelineResult extends QueryResponse {
  stages: AuditStage[];
}

interface RequestState {
  query: Query;
  stages: AuditStage[];
  log: Logger;
}

/**
 * One independent invocation per query. The only state shared between
 * invocations is the catalog cache and the audit sink.
 */
export class QueryPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  async handle(request: QueryRequest, options: { requestId?: string; correlationId?: string; signal?: AbortSignal } = {}): Promise<PipelineResult> {
    const requestId = options.requestId ?? uuidv4();
    const query: Query = Object.freeze({
      requestId,
      correlationId: options.correlationId,
      text: request.queryText,
      context: Object.freeze((request.conversationContext ?? []).slice(-this.options.maxContextTurns)),
      identity: Object.freeze({
        ...request.identity,
        roles: [...request.identity.roles],
        entitlements: [...request.identity.entitlements]
      }),
      receivedAt: new Date().toISOString()
    });
    const state: RequestState = {
      query,
      stages: [],
      log: this.logger.child({ request_id: requestId, user_id: query.identity.userId })
    };

    try {
      return await this.run(state, options.signal);
    } catch (error) {
      state.log.error({ err: errorMessage(error), stages: state.stages }, 'Pipeline aborted');
      return this.respond(state, SAFE_REFUSAL, 'DENY');
    }
  }

  private async run(state: RequestState, signal?: AbortSignal): Promise<PipelineResult> {
    const { query } = state;

    const intent = await this.classify(query);
    await this.audit(state, 'classification', intent.category, {
      category: intent.category,
      confidence: intent.confidence,
      rationale: intent.rationale,
      query_hash: sha256(query.text),
      context_turns: query.context.length,
      ...(query.correlationId === undefined ? {} : { correlation_id: query.correlationId })
    });

    const schemaVersion = await this.decisionSchemaVersion(state);
    const decision = decide(intent, query.identity, this.deps.policy.table, schemaVersion);
    await this.audit(state, 'decision', decision.outcome, {
      category: decision.category,
      reason: decision.reason,
      authorized_scope: [...decision.authorizedScope],
      policy_version: decision.policyVersion,
      policy_hash: this.deps.policy.hash,
      schema_version: decision.schemaVersion
    });
    state.log.info({ outcome: decision.outcome, reason: decision.reason }, 'Policy decision');

    if (decision.outcome !== 'ALLOW_WITH_AUTH') {
      const text = await this.deps.synthesizer.synthesize(decision, query.text);
      return this.respond(state, text, decision.outcome);
    }

    const plan = await this.generate(state, intent, decision);
    if (!plan) {
      return this.respond(state, GENERATION_FAILURE_MESSAGE, 'DENY');
    }

    const validated = await this.validatePlan(state, plan, decision);
    if (!validated) {
      return this.respond(state, VALIDATION_FAILURE_MESSAGE, 'DENY');
    }

    try {
      const result = await this.deps.gateway.execute(validated, { signal });
      await this.audit(state, 'execution', 'SUCCEEDED', {
        data_source_id: result.dataSourceId,
        resource: result.resource,
        row_count: result.rowCount,
        truncated: result.truncated,
        masked_fields: result.maskedFields,
        result_hash: hashObject(result.rows)
      });
      const text = await this.deps.synthesizer.synthesize(decision, query.text, result);
      return this.respond(state, text, 'ALLOW_WITH_AUTH');
    } catch (error) {
      if (!(error instanceof ExecutionError)) throw error;
      state.log.error({ kind: error.kind, err: errorMessage(error.cause ?? error) }, 'Execution failed');
      await this.audit(state, 'execution', 'FAILED', {
        kind: error.kind,
        transient: error.transient,
        message: error.message
      });
      return this.respond(state, EXECUTION_FAILURE_MESSAGE, 'DENY');
    }
  }

  private async classify(query: Query): Promise<Intent> {
    try {
      return await this.deps.classifier.classify(query.text, query.context);
    } catch (error) {
      return failClosed(`classification failure: ${errorMessage(error)}`);
    }
  }

  private async decisionSchemaVersion(state: RequestState): Promise<number> {
    const source = this.options.schemaVersionSource;
    if (!source) return 0;
    try {
      return (await this.deps.catalog.getSnapshot(source)).version;
    } catch (error) {
      state.log.warn({ err: errorMessage(error), source }, 'Schema version unavailable for decision');
      return 0;
    }
  }

  private async generate(state: RequestState, intent: Intent, decision: PolicyDecision): Promise<ExecutionPlan | undefined> {
    let plan: ExecutionPlan;
    try {
      plan = await this.deps.generator.generate(state.query.text, intent, decision.authorizedScope);
    } catch (error) {
      state.log.warn({ err: errorMessage(error) }, 'Plan generation failed');
      await this.audit(state, 'generation', 'FAILED', { message: errorMessage(error) });
      return undefined;
    }

    await this.audit(state, 'generation', 'GENERATED', {
      data_source_id: plan.dataSourceId,
      resource: plan.resource,
      operation: plan.operation,
      plan_hash: hashObject(plan)
    });
    return plan;
  }

  /**
   * Pins one snapshot for the rest of the request: the ValidatedPlan carries
   * it into execution and masking.
   */
  private async validatePlan(
    state: RequestState,
    plan: ExecutionPlan,
    decision: PolicyDecision
  ): Promise<ValidatedPlan | undefined> {
    let snapshot: SchemaSnapshot;
    try {
      snapshot = await this.deps.catalog.getSnapshot(plan.dataSourceId);
    } catch (error) {
      await this.audit(state, 'validation', 'REJECTED', {
        kind: 'UnknownResource',
        message: 'Data source not in catalog',
        detail: { data_source_id: plan.dataSourceId, error: errorMessage(error) }
      });
      return undefined;
    }

    const result = validate(plan, snapshot, decision, state.query.identity, { maxRows: this.options.maxRows });
    if (!result.ok) {
      await this.rejected(state, result.error, snapshot);
      return undefined;
    }

    await this.audit(state, 'validation', 'VALIDATED', result.plan.summary());
    return result.plan;
  }

  private async rejected(state: RequestState, error: PlanValidationError, snapshot: SchemaSnapshot): Promise<void> {
    state.log.warn({ kind: error.kind }, 'Plan rejected');
    await this.audit(state, 'validation', 'REJECTED', {
      kind: error.kind,
      message: error.message,
      detail: error.detail,
      schema_version: snapshot.version
    });
  }

  private async audit(
    state: RequestState,
    stage: AuditStage,
    outcome: string,
    summary: Record<string, unknown>
  ): Promise<void> {
    await this.deps.audit.record({
      requestId: state.query.requestId,
      stage,
      outcome,
      summary,
      identity: identityOf(state.query)
    });
    state.stages.push(stage);
  }

  private respond(state: RequestState, responseText: string, decisionOutcome: DecisionOutcome): PipelineResult {
    return {
      responseText,
      decisionOutcome,
      auditId: state.query.requestId,
      stages: [...state.stages]
    };
  }
}

function identityOf(query: Query): Identity {
  return {
    userId: query.identity.userId,
    tenant: query.identity.tenant,
    roles: [...query.identity.roles],
    entitlements: [...query.identity.entitlements]
  };
}
