export const FILTER_OPERATORS = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'contains'] as const;
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const AGGREGATE_FUNCTIONS = ['sum', 'avg', 'count', 'min', 'max'] as const;
export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

export const READ_OPERATIONS = ['select', 'aggregate'] as const;
export type ReadOperation = (typeof READ_OPERATIONS)[number];

export type FilterValue = string | number | boolean | Array<string | number>;

export interface PlanFilter {
  field: string;
  /** Untrusted; checked against FILTER_OPERATORS by the validator. */
  op: string;
  value: FilterValue;
}

export interface PlanAggregation {
  fn: string;
  field: string;
  groupBy: string[];
}

// Candidate plan as produced by a generator. Nothing here is trusted.
export interface ExecutionPlan {
  dataSourceId: string;
  operation: string;
  resource: string;
  fields: string[];
  filters: PlanFilter[];
  aggregation?: PlanAggregation;
  limit?: number;
}

export type Row = Record<string, unknown>;

export interface ExecutionResult {
  dataSourceId: string;
  resource: string;
  columns: string[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  maskedFields: string[];
}
