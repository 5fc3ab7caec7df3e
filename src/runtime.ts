import type { Pool } from 'pg';
import type { QueryGateConfig } from './config.js';
import { ConfigError } from './errors.js';
import type { Logger } from './logger.js';
import { InferenceRouter } from './inference/router.js';
import { LlmIntentClassifier, PatternIntentClassifier, type IntentClassifier } from './classifier/index.js';
import { DEFAULT_POLICY_TABLE, loadPolicyTable, type LoadedPolicy } from './policy/index.js';
import { FileSchemaCatalog } from './catalog/index.js';
import { KeywordPlanGenerator, LlmPlanGenerator, type PlanGenerator } from './planner/index.js';
import {
  createPgPool,
  DocumentAdapter,
  ExecutionGateway,
  MemoryDocumentSource,
  pgConnector,
  RelationalAdapter
} from './gateway/index.js';
import { ResponseSynthesizer } from './synth/index.js';
import { AuditTrail, hashObject, JsonlAuditSink, loadKeyPair } from './audit/index.js';
import { QueryPipeline } from './pipeline/index.js';

export interface Runtime {
  pipeline: QueryPipeline;
  audit: AuditTrail;
  gateway: ExecutionGateway;
  policy: LoadedPolicy;
  backends: string[];
  close(): Promise<void>;
}

function requireRouter(router: InferenceRouter | undefined, purpose: string): InferenceRouter {
  if (!router) {
    throw new ConfigError(`${purpose} needs at least one inference backend`);
  }
  return router;
}

export async function createRuntime(config: QueryGateConfig, logger: Logger): Promise<Runtime> {
  const router =
    config.inference.backends.length > 0
      ? new InferenceRouter(config.inference.backends, config.inference.default || config.inference.backends[0]?.name || '')
      : undefined;

  const classifier: IntentClassifier =
    config.classifier.backend === 'llm'
      ? new LlmIntentClassifier(requireRouter(router, 'LLM classifier'), {
          backend: config.classifier.model_backend,
          timeoutMs: config.classifier.timeout_ms,
          retries: config.classifier.retries,
          backoffMs: config.classifier.backoff_ms,
          maxContextTurns: config.classifier.max_context_turns,
          logger: logger.child({ module: 'classifier' })
        })
      : new PatternIntentClassifier();

  const policy: LoadedPolicy = config.policy.table
    ? await loadPolicyTable(config.policy.table)
    : { table: DEFAULT_POLICY_TABLE, hash: hashObject(DEFAULT_POLICY_TABLE), source: 'builtin' };
  logger.info({ policy_version: policy.table.version, source: policy.source }, 'Policy table loaded');

  const catalog = new FileSchemaCatalog(config.catalog.directory);
  const sourceIds = config.sources.map((source) => source.id);

  const generator: PlanGenerator =
    config.generator.backend === 'llm'
      ? new LlmPlanGenerator(requireRouter(router, 'LLM plan generator'), catalog, {
          backend: config.generator.model_backend,
          timeoutMs: config.generator.timeout_ms,
          dataSourceIds: sourceIds
        })
      : new KeywordPlanGenerator(catalog, sourceIds);

  const gateway = new ExecutionGateway({
    timeoutMs: config.execution.timeout_ms,
    retries: config.execution.retries,
    backoffMs: config.execution.backoff_ms,
    logger: logger.child({ module: 'gateway' })
  });
  const pools: Pool[] = [];

  for (const source of config.sources) {
    if (source.family === 'relational') {
      if (!source.connection_string) {
        throw new ConfigError(`Relational source ${source.id} has no connection_string (or DATABASE_URL)`);
      }
      const pool = createPgPool(source.connection_string, source.pool_size);
      pool.on('error', (error) => logger.error({ source: source.id, err: error.message }, 'Idle database client error'));
      pools.push(pool);
      gateway.register(source.id, new RelationalAdapter(pgConnector(pool)));
    } else {
      if (!source.fixture) {
        throw new ConfigError(`Document source ${source.id} has no fixture file`);
      }
      gateway.register(source.id, new DocumentAdapter(await MemoryDocumentSource.fromFile(source.fixture)));
    }
  }

  const audit = await AuditTrail.open(new JsonlAuditSink(config.audit.log), {
    keyPair: loadKeyPair(config.audit.key_dir),
    logger: logger.child({ module: 'audit' })
  });

  const synthesizer = new ResponseSynthesizer({
    knowledgeModel: config.knowledge.enabled ? requireRouter(router, 'Knowledge answers') : undefined,
    backend: config.knowledge.model_backend,
    timeoutMs: config.knowledge.timeout_ms,
    logger: logger.child({ module: 'synthesizer' })
  });

  const pipeline = new QueryPipeline(
    { classifier, policy, catalog, generator, gateway, synthesizer, audit, logger: logger.child({ module: 'pipeline' }) },
    {
      maxRows: config.execution.max_rows,
      maxContextTurns: config.classifier.max_context_turns,
      schemaVersionSource: config.policy.schema_version_source ?? sourceIds[0]
    }
  );

  return {
    pipeline,
    audit,
    gateway,
    policy,
    backends: router?.getAvailableBackends() ?? [],
    async close() {
      await Promise.all(pools.map((pool) => pool.end()));
    }
  };
}
