import type {
  AggregateFunction,
  ExecutionPlan,
  FilterOperator,
  FilterValue,
  Identity,
  PolicyDecision,
  ReadOperation,
  ResourceDefinition,
  SchemaSnapshot
} from '../types/index.js';
import { AGGREGATE_FUNCTIONS, FILTER_OPERATORS, READ_OPERATIONS } from '../types/index.js';
import { PlanValidationError, type PlanValidationErrorKind } from '../errors.js';
import { findResource } from '../catalog/index.js';

// Never exported: holding this value is what it means to be the validator.
const ISSUE_TOKEN: unique symbol = Symbol('querygate.validated-plan');
const issuedPlans = new WeakSet<object>();

export interface ValidatedFilter {
  readonly field: string;
  readonly op: FilterOperator;
  readonly value: FilterValue;
}

export interface ValidatedAggregation {
  readonly fn: AggregateFunction;
  readonly field: string;
  readonly groupBy: readonly string[];
}

interface ValidatedPlanInit {
  operation: ReadOperation;
  fields: string[];
  filters: ValidatedFilter[];
  aggregation?: ValidatedAggregation;
  limit: number;
  resource: Readonly<ResourceDefinition>;
  snapshot: SchemaSnapshot;
  decision: PolicyDecision;
  identity: Identity;
}

/**
 * A plan proven to reference only existing, in-scope, entitlement-covered
 * fields of one resource in a pinned snapshot. Only `validate()` can
 * construct one; the gateway accepts nothing else.
 */
export class ValidatedPlan {
  readonly dataSourceId: string;
  readonly operation: ReadOperation;
  readonly resource: string;
  readonly fields: readonly string[];
  readonly filters: readonly ValidatedFilter[];
  readonly aggregation?: ValidatedAggregation;
  readonly limit: number;
  /** Snapshot pinned at validation time; execution and masking use the same one. */
  readonly snapshot: SchemaSnapshot;
  readonly resourceDefinition: Readonly<ResourceDefinition>;
  readonly decision: PolicyDecision;
  readonly identity: Readonly<Identity>;
  readonly validatedAt: string;

  constructor(token: typeof ISSUE_TOKEN, init: ValidatedPlanInit) {
    if (token !== ISSUE_TOKEN) {
      throw new TypeError('ValidatedPlan can only be issued by the plan validator');
    }
    this.dataSourceId = init.snapshot.dataSourceId;
    this.operation = init.operation;
    this.resource = init.resource.name;
    this.fields = Object.freeze([...init.fields]);
    this.filters = Object.freeze(init.filters.map((filter) => Object.freeze({ ...filter })));
    if (init.aggregation) {
      this.aggregation = Object.freeze({ ...init.aggregation, groupBy: Object.freeze([...init.aggregation.groupBy]) });
    }
    this.limit = init.limit;
    this.snapshot = init.snapshot;
    this.resourceDefinition = init.resource;
    this.decision = init.decision;
    this.identity = Object.freeze({
      ...init.identity,
      roles: [...init.identity.roles],
      entitlements: [...init.identity.entitlements]
    });
    this.validatedAt = new Date().toISOString();
    Object.freeze(this);
    issuedPlans.add(this);
  }

  summary(): Record<string, unknown> {
    return {
      data_source_id: this.dataSourceId,
      schema_version: this.snapshot.version,
      operation: this.operation,
      resource: this.resource,
      fields: [...this.fields],
      filter_fields: this.filters.map((filter) => filter.field),
      aggregation: this.aggregation ? `${this.aggregation.fn}(${this.aggregation.field})` : null,
      limit: this.limit
    };
  }
}

export function isIssuedPlan(value: unknown): value is ValidatedPlan {
  return value instanceof ValidatedPlan && issuedPlans.has(value);
}

export type ValidationResult = { ok: true; plan: ValidatedPlan } | { ok: false; error: PlanValidationError };

export interface ValidatorOptions {
  maxRows: number;
}

const DEFAULT_OPTIONS: ValidatorOptions = { maxRows: 1000 };

function reject(kind: PlanValidationErrorKind, message: string, detail: Record<string, unknown>): ValidationResult {
  return { ok: false, error: new PlanValidationError(kind, message, detail) };
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Second, independent security boundary. Checks run in a fixed order:
 * (a) existence in the pinned snapshot, (b) resource class within the
 * decision's scope and tenant ownership, (c) sensitivity tags covered by the
 * identity's entitlements, (d) read-only operation shape.
 */
export function validate(
  plan: ExecutionPlan,
  snapshot: SchemaSnapshot,
  decision: PolicyDecision,
  identity: Identity,
  options: ValidatorOptions = DEFAULT_OPTIONS
): ValidationResult {
  if (decision.outcome !== 'ALLOW_WITH_AUTH') {
    return reject('ScopeViolation', 'Decision does not authorize data access', { outcome: decision.outcome });
  }

  // (a) existence
  if (plan.dataSourceId !== snapshot.dataSourceId) {
    return reject('UnknownResource', 'Unknown data source', { data_source_id: plan.dataSourceId });
  }
  const resource = findResource(snapshot, plan.resource);
  if (!resource) {
    return reject('UnknownResource', 'Unknown resource', { resource: plan.resource, schema_version: snapshot.version });
  }

  const groupBy = plan.aggregation?.groupBy ?? [];
  const selected = plan.fields.length > 0 ? plan.fields : plan.aggregation ? groupBy : resource.fields.map((f) => f.name);
  const referenced = [
    ...new Set([
      ...selected,
      ...plan.filters.map((filter) => filter.field),
      ...(plan.aggregation ? [plan.aggregation.field, ...groupBy] : [])
    ])
  ];

  const byName = new Map(resource.fields.map((field) => [field.name, field]));
  const unknown = referenced.filter((name) => !byName.has(name));
  if (unknown.length > 0) {
    return reject('UnknownResource', 'Unknown field', { resource: resource.name, fields: unknown });
  }

  // (b) scope and ownership
  if (!decision.authorizedScope.includes(resource.resourceClass)) {
    return reject('ScopeViolation', 'Resource class outside authorized scope', {
      resource: resource.name,
      resource_class: resource.resourceClass,
      authorized_scope: [...decision.authorizedScope]
    });
  }
  if (resource.owner !== undefined && resource.owner !== identity.tenant) {
    return reject('ScopeViolation', 'Resource owned by another tenant', {
      resource: resource.name,
      tenant: identity.tenant
    });
  }

  // (c) column-level entitlements, independent of the coarser decision
  const entitlements = new Set(identity.entitlements);
  for (const name of referenced) {
    const missing = (byName.get(name)?.sensitivity ?? []).filter((tag) => !entitlements.has(tag));
    if (missing.length > 0) {
      return reject('EntitlementMissing', 'Field requires an entitlement the identity lacks', {
        resource: resource.name,
        field: name,
        missing_entitlements: missing
      });
    }
  }

  // (d) read-only shape
  const operation = plan.operation.trim().toLowerCase();
  if (!isOneOf(READ_OPERATIONS, operation)) {
    return reject('UnsupportedOperation', 'Operation is not read-only', { operation: plan.operation });
  }

  const filters: ValidatedFilter[] = [];
  for (const filter of plan.filters) {
    const op = filter.op.trim().toLowerCase();
    if (!isOneOf(FILTER_OPERATORS, op)) {
      return reject('UnsupportedOperation', 'Unsupported filter operator', { op: filter.op });
    }
    if ((op === 'in') !== Array.isArray(filter.value)) {
      return reject('UnsupportedOperation', 'Filter value does not match operator', { field: filter.field, op });
    }
    filters.push({ field: filter.field, op, value: filter.value });
  }

  let aggregation: ValidatedAggregation | undefined;
  if (operation === 'aggregate') {
    if (!plan.aggregation) {
      return reject('UnsupportedOperation', 'Aggregate operation without aggregation', {});
    }
    const fn = plan.aggregation.fn.trim().toLowerCase();
    if (!isOneOf(AGGREGATE_FUNCTIONS, fn)) {
      return reject('UnsupportedOperation', 'Unsupported aggregate function', { fn: plan.aggregation.fn });
    }
    const ungrouped = selected.filter((name) => !groupBy.includes(name));
    if (ungrouped.length > 0) {
      return reject('UnsupportedOperation', 'Selected fields must be grouped', { fields: ungrouped });
    }
    aggregation = { fn, field: plan.aggregation.field, groupBy: [...new Set(groupBy)] };
  } else if (plan.aggregation) {
    return reject('UnsupportedOperation', 'Aggregation on a select operation', {});
  }

  if (plan.limit !== undefined && (!Number.isInteger(plan.limit) || plan.limit <= 0)) {
    return reject('UnsupportedOperation', 'Invalid limit', { limit: plan.limit });
  }

  return {
    ok: true,
    plan: new ValidatedPlan(ISSUE_TOKEN, {
      operation,
      fields: aggregation ? [...aggregation.groupBy] : [...new Set(selected)],
      filters,
      aggregation,
      limit: Math.min(plan.limit ?? options.maxRows, options.maxRows),
      resource,
      snapshot,
      decision,
      identity
    })
  };
}
