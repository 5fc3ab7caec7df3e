import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { AggregateFunction, FilterValue, Row } from '../../types/index.js';
import type { ValidatedFilter, ValidatedPlan } from '../../validator/index.js';
import { ConfigError, ExecutionError, errorMessage } from '../../errors.js';
import type { RunOptions, SourceAdapter } from '../adapter.js';
import { aggregateAlias, maskRows, type MaskedRows } from '../masking.js';

export type DocumentOperator = '$eq' | '$ne' | '$gt' | '$gte' | '$lt' | '$lte' | '$in' | '$regex';

export type DocumentCondition = Record<string, Partial<Record<DocumentOperator, FilterValue>>>;

export interface DocumentQuery {
  collection: string;
  filter: { $and: DocumentCondition[] };
  projection: string[];
  group?: { by: string[]; fn: AggregateFunction; field: string; as: string };
  limit: number;
}

export interface DocumentSource {
  find(query: DocumentQuery, options: { signal: AbortSignal }): Promise<Row[]>;
}

const OPERATORS: Record<ValidatedFilter['op'], DocumentOperator> = {
  eq: '$eq',
  neq: '$ne',
  gt: '$gt',
  gte: '$gte',
  lt: '$lt',
  lte: '$lte',
  in: '$in',
  contains: '$regex'
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class DocumentAdapter implements SourceAdapter<DocumentQuery> {
  readonly family = 'document' as const;

  constructor(private readonly source: DocumentSource) {}

  translate(plan: ValidatedPlan): DocumentQuery {
    const query: DocumentQuery = {
      collection: plan.resource,
      filter: {
        $and: plan.filters.map((filter): DocumentCondition => {
          const operators: Partial<Record<DocumentOperator, FilterValue>> = {};
          operators[OPERATORS[filter.op]] =
            filter.op === 'contains' ? escapeRegExp(String(filter.value)) : filter.value;
          return { [filter.field]: operators };
        })
      },
      projection: [...plan.fields],
      limit: plan.limit + 1
    };

    if (plan.aggregation) {
      const { fn, field, groupBy } = plan.aggregation;
      query.group = { by: [...groupBy], fn, field, as: aggregateAlias(fn, field) };
    }
    return query;
  }

  async run(native: DocumentQuery, options: RunOptions): Promise<Row[]> {
    if (options.signal.aborted) {
      throw new ExecutionError('cancelled', 'Cancelled before execution');
    }
    try {
      const rows = await this.source.find(native, { signal: options.signal });
      return rows.slice(0, options.maxRows);
    } catch (error) {
      if (error instanceof ExecutionError) throw error;
      throw new ExecutionError('adapter', `Document source error: ${errorMessage(error)}`, { cause: error });
    }
  }

  applyMasking(rows: Row[], plan: ValidatedPlan): MaskedRows {
    return maskRows(rows, plan);
  }
}

// ── In-process source ─────────────────────────────────────────────────

type Comparable = string | number;

function isComparable(value: unknown): value is Comparable {
  return typeof value === 'string' || typeof value === 'number';
}

function compare(actual: unknown, expected: FilterValue, test: (a: Comparable, b: Comparable) => boolean): boolean {
  return isComparable(actual) && isComparable(expected) && typeof actual === typeof expected && test(actual, expected);
}

function matchesOperator(actual: unknown, op: DocumentOperator, expected: FilterValue): boolean {
  switch (op) {
    case '$eq':
      return actual === expected;
    case '$ne':
      return actual !== expected;
    case '$gt':
      return compare(actual, expected, (a, b) => a > b);
    case '$gte':
      return compare(actual, expected, (a, b) => a >= b);
    case '$lt':
      return compare(actual, expected, (a, b) => a < b);
    case '$lte':
      return compare(actual, expected, (a, b) => a <= b);
    case '$in':
      return Array.isArray(expected) && isComparable(actual) && expected.some((candidate) => candidate === actual);
    case '$regex':
      return actual !== null && actual !== undefined && new RegExp(String(expected), 'i').test(String(actual));
  }
}

function matches(doc: Row, condition: DocumentCondition): boolean {
  return Object.entries(condition).every(([field, operators]) =>
    Object.entries(operators).every(([op, expected]) => {
      const operator = Object.values(OPERATORS).find((candidate) => candidate === op);
      return operator !== undefined && expected !== undefined && matchesOperator(doc[field], operator, expected);
    })
  );
}

function aggregate(fn: AggregateFunction, values: unknown[]): number | null {
  if (fn === 'count') {
    return values.filter((value) => value !== null && value !== undefined).length;
  }
  const numbers = values.filter((value): value is number => typeof value === 'number');
  if (numbers.length === 0) return null;
  switch (fn) {
    case 'sum':
      return numbers.reduce((total, value) => total + value, 0);
    case 'avg':
      return numbers.reduce((total, value) => total + value, 0) / numbers.length;
    case 'min':
      return Math.min(...numbers);
    case 'max':
      return Math.max(...numbers);
  }
}

const CollectionsFileSchema = z.object({
  collections: z.record(z.array(z.record(z.unknown())))
});

/**
 * Evaluates document queries over collections held in memory, loaded from a
 * YAML or JSON file of the form `{ collections: { name: [docs] } }`.
 */
export class MemoryDocumentSource implements DocumentSource {
  constructor(private readonly collections: Record<string, Row[]>) {}

  static async fromFile(path: string): Promise<MemoryDocumentSource> {
    let raw: unknown;
    try {
      raw = parseYaml(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read document fixture ${path}: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = CollectionsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid document fixture ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return new MemoryDocumentSource(parsed.data.collections);
  }

  async find(query: DocumentQuery, options: { signal: AbortSignal }): Promise<Row[]> {
    const documents = this.collections[query.collection];
    if (!documents) {
      throw new ExecutionError('adapter', `Unknown collection ${query.collection}`);
    }

    await Promise.resolve();
    if (options.signal.aborted) {
      throw new ExecutionError('cancelled', 'Query cancelled');
    }

    const selected = documents.filter((doc) => query.filter.$and.every((condition) => matches(doc, condition)));

    if (query.group) {
      const { by, fn, field, as } = query.group;
      const groups = new Map<string, Row[]>();
      for (const doc of selected) {
        const key = JSON.stringify(by.map((name) => doc[name] ?? null));
        groups.set(key, [...(groups.get(key) ?? []), doc]);
      }
      if (groups.size === 0 && by.length === 0) {
        groups.set('[]', []);
      }
      return [...groups.values()].slice(0, query.limit).map((members) => {
        const row: Row = {};
        for (const name of by) {
          row[name] = members[0]?.[name] ?? null;
        }
        row[as] = aggregate(fn, members.map((doc) => doc[field]));
        return row;
      });
    }

    return selected.slice(0, query.limit).map((doc) => {
      const row: Row = {};
      for (const name of query.projection) {
        row[name] = doc[name] ?? null;
      }
      return row;
    });
  }
}
