import pg from 'pg';
import type { Pool } from 'pg';
import type { Row } from '../../types/index.js';
import type { ValidatedFilter, ValidatedPlan } from '../../validator/index.js';
import { ExecutionError, errorMessage } from '../../errors.js';
import type { RunOptions, SourceAdapter } from '../adapter.js';
import { aggregateAlias, maskRows, type MaskedRows } from '../masking.js';

export interface SqlQuery {
  text: string;
  values: unknown[];
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<Row[]>;
  /** Passing an error destroys the connection instead of returning it to the pool. */
  release(error?: Error): void;
}

export interface SqlConnector {
  connect(): Promise<SqlClient>;
}

export function createPgPool(connectionString: string, max = 10): Pool {
  return new pg.Pool({ connectionString, max });
}

export function pgConnector(pool: Pool): SqlConnector {
  return {
    async connect(): Promise<SqlClient> {
      const client = await pool.connect();
      return {
        async query(text: string, values?: unknown[]): Promise<Row[]> {
          const result = await client.query(text, values);
          return result.rows;
        },
        release(error?: Error): void {
          client.release(error);
        }
      };
    }
  };
}

export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

const COMPARATORS: Record<Exclude<ValidatedFilter['op'], 'in' | 'contains'>, string> = {
  eq: '=',
  neq: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<='
};

function whereClause(filters: readonly ValidatedFilter[], values: unknown[]): string {
  if (filters.length === 0) return '';

  const conditions = filters.map((filter) => {
    const column = quoteIdentifier(filter.field);
    switch (filter.op) {
      case 'in':
        values.push(filter.value);
        return `${column} = ANY($${values.length})`;
      case 'contains':
        values.push(`%${escapeLike(String(filter.value))}%`);
        return `${column}::text ILIKE $${values.length}`;
      default:
        values.push(filter.value);
        return `${column} ${COMPARATORS[filter.op]} $${values.length}`;
    }
  });
  return ` WHERE ${conditions.join(' AND ')}`;
}

// SQLSTATE classes worth one more attempt: connection exceptions, serialization, admin shutdown.
const TRANSIENT_SQLSTATES = /^(08|40001|40P01|57P0[123])/;
const TRANSIENT_ERRNO = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE']);

function codeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toExecutionError(error: unknown): ExecutionError {
  if (error instanceof ExecutionError) return error;
  const code = codeOf(error);
  if (code === '57014') {
    return new ExecutionError('timeout', 'Statement timed out', { cause: error });
  }
  const transient = code !== undefined && (TRANSIENT_SQLSTATES.test(code) || TRANSIENT_ERRNO.has(code));
  return new ExecutionError('adapter', `Relational source error: ${errorMessage(error)}`, { cause: error, transient });
}

/**
 * Parameterised SQL over a pooled connection, inside a READ ONLY transaction
 * with a statement timeout. Aborting the signal destroys the connection so
 * the server-side statement does not outlive the request.
 */
export class RelationalAdapter implements SourceAdapter<SqlQuery> {
  readonly family = 'relational' as const;

  constructor(private readonly connector: SqlConnector) {}

  translate(plan: ValidatedPlan): SqlQuery {
    const values: unknown[] = [];
    const columns = plan.fields.map(quoteIdentifier);

    if (plan.aggregation) {
      const { fn, field } = plan.aggregation;
      columns.push(`${fn.toUpperCase()}(${quoteIdentifier(field)}) AS ${quoteIdentifier(aggregateAlias(fn, field))}`);
    }

    let text = `SELECT ${columns.join(', ')} FROM ${quoteIdentifier(plan.resource)}`;
    text += whereClause(plan.filters, values);
    if (plan.aggregation && plan.aggregation.groupBy.length > 0) {
      text += ` GROUP BY ${plan.aggregation.groupBy.map(quoteIdentifier).join(', ')}`;
    }
    // One extra row so the gateway can tell the result was truncated
    values.push(plan.limit + 1);
    text += ` LIMIT $${values.length}`;

    return { text, values };
  }

  async run(native: SqlQuery, options: RunOptions): Promise<Row[]> {
    if (options.signal.aborted) {
      throw new ExecutionError('cancelled', 'Cancelled before execution');
    }

    let client: SqlClient;
    try {
      client = await this.connector.connect();
    } catch (error) {
      throw toExecutionError(error);
    }

    // The listener below never fires for a signal that aborted while connecting
    if (options.signal.aborted) {
      client.release(new Error('Query cancelled'));
      throw new ExecutionError('cancelled', 'Cancelled before execution');
    }

    let destroyed = false;
    const destroy = (reason: Error) => {
      if (destroyed) return;
      destroyed = true;
      client.release(reason);
    };
    const onAbort = () => destroy(new Error('Query cancelled'));
    options.signal.addEventListener('abort', onAbort, { once: true });

    try {
      await client.query('BEGIN READ ONLY');
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`);
      const rows = await client.query(native.text, native.values);
      await client.query('COMMIT');
      return rows.slice(0, options.maxRows);
    } catch (error) {
      if (!destroyed) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          destroy(rollbackError instanceof Error ? rollbackError : new Error(errorMessage(rollbackError)));
        }
      }
      throw toExecutionError(error);
    } finally {
      options.signal.removeEventListener('abort', onAbort);
      if (!destroyed) {
        destroyed = true;
        client.release();
      }
    }
  }

  applyMasking(rows: Row[], plan: ValidatedPlan): MaskedRows {
    return maskRows(rows, plan);
  }
}
