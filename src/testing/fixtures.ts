import type { ExecutionPlan, Identity, PolicyTable, Row, SchemaSnapshot } from '../types/index.js';
import type { InferenceRequest, InferenceResponse, TextModel } from '../inference/router.js';
import type { SqlClient, SqlConnector } from '../gateway/index.js';
import { buildSnapshot, type SnapshotFile } from '../catalog/index.js';
import { decide } from '../policy/index.js';
import { validate, type ValidatedPlan } from '../validator/index.js';

export const FINANCE_SNAPSHOT_FILE: SnapshotFile = {
  data_source_id: 'finance_dw',
  version: 2,
  family: 'relational',
  sensitivity_tags: ['PII'],
  resources: [
    {
      name: 'cost_centers',
      resource_class: 'cost_center',
      aliases: ['cost center'],
      fields: [
        { name: 'cost_center_id', type: 'integer', aliases: ['cost center'] },
        { name: 'name', type: 'text' },
        { name: 'budget', type: 'numeric' },
        { name: 'actual', type: 'numeric' },
        { name: 'variance', type: 'numeric' }
      ]
    },
    {
      name: 'employees',
      resource_class: 'hr',
      aliases: ['employee', 'staff'],
      fields: [
        { name: 'employee_id', type: 'integer', aliases: ['employee'] },
        { name: 'full_name', type: 'text', sensitivity: ['PII'], aliases: ['name'] },
        { name: 'salary', type: 'numeric', sensitivity: ['PII'] },
        { name: 'cost_center_id', type: 'integer', aliases: ['cost center'] }
      ]
    },
    {
      name: 'board_minutes',
      resource_class: 'board',
      owner: 'globex',
      fields: [{ name: 'minute_id', type: 'integer' }]
    }
  ]
};

export const financeSnapshot: SchemaSnapshot = buildSnapshot(FINANCE_SNAPSHOT_FILE);

export const crmSnapshot: SchemaSnapshot = buildSnapshot({
  data_source_id: 'crm',
  version: 1,
  family: 'document',
  sensitivity_tags: ['PII'],
  resources: [
    {
      name: 'accounts',
      resource_class: 'customer',
      aliases: ['account', 'customer'],
      fields: [
        { name: 'account_id', type: 'text', aliases: ['account'] },
        { name: 'company', type: 'text' },
        { name: 'region', type: 'text' },
        { name: 'annual_revenue', type: 'numeric', aliases: ['revenue'] },
        { name: 'contact_email', type: 'text', sensitivity: ['PII'], aliases: ['email'] }
      ]
    }
  ]
});

export const POLICY: PolicyTable = {
  version: 'test-1',
  confidence_threshold: 0.7,
  categories: {
    SAFE_KNOWLEDGE: { rules: [] },
    DATA_QUERY: {
      rules: [
        { roles: ['analyst'], resource_classes: ['cost_center', 'hr'] },
        { roles: ['account_manager'], resource_classes: ['customer'] }
      ]
    },
    ANALYSIS: {
      rules: [
        { roles: ['analyst'], resource_classes: ['cost_center'] },
        { roles: ['analyst', 'contractor'], resource_classes: [] }
      ]
    },
    OUT_OF_SCOPE: { out_of_scope: true, rules: [] }
  }
};

export const analyst: Identity = { userId: 'u-analyst', tenant: 'acme', roles: ['analyst'], entitlements: [] };
export const analystWithPii: Identity = { ...analyst, userId: 'u-hr', entitlements: ['PII'] };
export const guest: Identity = { userId: 'u-guest', tenant: 'acme', roles: ['guest'], entitlements: [] };
export const accountManager: Identity = {
  userId: 'u-am',
  tenant: 'acme',
  roles: ['account_manager'],
  entitlements: []
};

export const COST_CENTER_ROWS: Row[] = [
  { cost_center_id: 101, name: 'Finance Ops', budget: 50000, actual: 53500, variance: -3500 }
];

/** Runs a plan through a DATA_QUERY decision and the validator, failing the test on rejection. */
export function issuePlan(
  plan: ExecutionPlan,
  identity: Identity,
  snapshot: SchemaSnapshot = financeSnapshot,
  maxRows = 500
): ValidatedPlan {
  const decision = decide({ category: 'DATA_QUERY', confidence: 0.9, rationale: 'test' }, identity, POLICY, snapshot.version);
  const result = validate(plan, snapshot, decision, identity, { maxRows });
  if (!result.ok) throw result.error;
  return result.plan;
}

type Reply = string | Error | ((request: InferenceRequest) => Promise<string>);

/** Scripted model: each call consumes the next reply; the last one repeats. */
export class FakeModel implements TextModel {
  readonly calls: InferenceRequest[] = [];

  constructor(private readonly replies: Reply[]) {}

  async infer(request: InferenceRequest): Promise<InferenceResponse> {
    this.calls.push(request);
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply === undefined) throw new Error('FakeModel has no replies');
    if (reply instanceof Error) throw reply;
    const output = typeof reply === 'function' ? await reply(request) : reply;
    return { output, model: 'fake', latencyMs: 0 };
  }
}

export interface RecordedStatement {
  text: string;
  values?: unknown[];
}

/**
 * In-process stand-in for a pg pool. `respond` sees every statement and
 * returns the rows for the data query.
 */
export class FakeSqlConnector implements SqlConnector {
  readonly statements: RecordedStatement[] = [];
  readonly releases: Array<Error | undefined> = [];
  connects = 0;

  constructor(private readonly respond: (text: string, values: unknown[] | undefined) => Promise<Row[]> | Row[] = () => []) {}

  async connect(): Promise<SqlClient> {
    this.connects++;
    return {
      query: async (text: string, values?: unknown[]) => {
        this.statements.push({ text, values });
        return this.respond(text, values);
      },
      release: (error?: Error) => {
        this.releases.push(error);
      }
    };
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
