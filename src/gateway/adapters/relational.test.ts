import { describe, it, expect } from 'vitest';
import { ExecutionError } from '../../errors.js';
import { FakeSqlConnector, analyst, issuePlan, sleep } from '../../testing/fixtures.js';
import { quoteIdentifier, RelationalAdapter, toExecutionError, type SqlClient } from './relational.js';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('RelationalAdapter.translate', () => {
  const adapter = new RelationalAdapter(new FakeSqlConnector());

  it('parameterises every value, including the look-ahead limit', () => {
    const plan = issuePlan(
      {
        dataSourceId: 'finance_dw',
        operation: 'select',
        resource: 'cost_centers',
        fields: ['cost_center_id', 'variance'],
        filters: [{ field: 'cost_center_id', op: 'eq', value: 101 }]
      },
      analyst
    );
    expect(adapter.translate(plan)).toEqual({
      text: 'SELECT "cost_center_id", "variance" FROM "cost_centers" WHERE "cost_center_id" = $1 LIMIT $2',
      values: [101, 501]
    });
  });

  it('renders grouped aggregates and escapes LIKE patterns', () => {
    const plan = issuePlan(
      {
        dataSourceId: 'finance_dw',
        operation: 'aggregate',
        resource: 'cost_centers',
        fields: [],
        filters: [
          { field: 'budget', op: 'gte', value: 1000 },
          { field: 'name', op: 'contains', value: '50%_off' }
        ],
        aggregation: { fn: 'sum', field: 'variance', groupBy: ['name'] },
        limit: 20
      },
      analyst
    );
    expect(adapter.translate(plan)).toEqual({
      text:
        'SELECT "name", SUM("variance") AS "sum_variance" FROM "cost_centers" ' +
        'WHERE "budget" >= $1 AND "name"::text ILIKE $2 GROUP BY "name" LIMIT $3',
      values: [1000, '%50\\%\\_off%', 21]
    });
  });

  it('binds list membership as a single array parameter', () => {
    const plan = issuePlan(
      {
        dataSourceId: 'finance_dw',
        operation: 'select',
        resource: 'cost_centers',
        fields: ['name'],
        filters: [{ field: 'cost_center_id', op: 'in', value: [101, 102] }]
      },
      analyst
    );
    expect(adapter.translate(plan)).toEqual({
      text: 'SELECT "name" FROM "cost_centers" WHERE "cost_center_id" = ANY($1) LIMIT $2',
      values: [[101, 102], 501]
    });
  });
});

describe('RelationalAdapter.run', () => {
  const query = { text: 'SELECT "name" FROM "cost_centers" LIMIT $1', values: [3] };

  it('runs inside a read-only transaction with a statement timeout', async () => {
    const connector = new FakeSqlConnector((text) => (text.startsWith('SELECT') ? [{ name: 'a' }, { name: 'b' }] : []));
    const rows = await new RelationalAdapter(connector).run(query, {
      signal: new AbortController().signal,
      maxRows: 1,
      timeoutMs: 1234.7
    });

    expect(rows).toEqual([{ name: 'a' }]);
    expect(connector.statements).toEqual([
      { text: 'BEGIN READ ONLY', values: undefined },
      { text: 'SET LOCAL statement_timeout = 1234', values: undefined },
      { text: query.text, values: [3] },
      { text: 'COMMIT', values: undefined }
    ]);
    expect(connector.releases).toEqual([undefined]);
  });

  it('rolls back and classifies source errors', async () => {
    const connector = new FakeSqlConnector((text) => {
      if (text.startsWith('SELECT')) throw withCode('could not serialize access', '40001');
      return [];
    });
    const error = await new RelationalAdapter(connector)
      .run(query, { signal: new AbortController().signal, maxRows: 10, timeoutMs: 1000 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({ kind: 'adapter', transient: true });
    expect(connector.statements.map((statement) => statement.text).at(-1)).toBe('ROLLBACK');
    expect(connector.releases).toEqual([undefined]);
  });

  it('destroys the connection when aborted mid-query', async () => {
    const controller = new AbortController();
    const connector = new FakeSqlConnector((text) => {
      if (!text.startsWith('SELECT')) return [];
      controller.abort();
      throw new Error('connection terminated');
    });
    await expect(
      new RelationalAdapter(connector).run(query, { signal: controller.signal, maxRows: 10, timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(ExecutionError);

    expect(connector.releases).toHaveLength(1);
    expect(connector.releases[0]).toBeInstanceOf(Error);
    expect(connector.statements.map((statement) => statement.text)).not.toContain('ROLLBACK');
  });

  it('runs nothing when cancelled while connecting', async () => {
    class SlowConnector extends FakeSqlConnector {
      async connect(): Promise<SqlClient> {
        await sleep(30);
        return super.connect();
      }
    }
    const connector = new SlowConnector();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(
      new RelationalAdapter(connector).run(query, { signal: controller.signal, maxRows: 10, timeoutMs: 5000 })
    ).rejects.toMatchObject({ kind: 'cancelled' });
    expect(connector.statements).toEqual([]);
    expect(connector.releases).toHaveLength(1);
    expect(connector.releases[0]).toBeInstanceOf(Error);
  });

  it('does not connect when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const connector = new FakeSqlConnector();
    await expect(
      new RelationalAdapter(connector).run(query, { signal: controller.signal, maxRows: 10, timeoutMs: 1000 })
    ).rejects.toMatchObject({ kind: 'cancelled' });
    expect(connector.connects).toBe(0);
  });
});

describe('toExecutionError', () => {
  it.each([
    ['57014', 'timeout', false],
    ['08006', 'adapter', true],
    ['ECONNRESET', 'adapter', true],
    ['42P01', 'adapter', false]
  ])('maps %s to %s (transient: %s)', (code, kind, transient) => {
    expect(toExecutionError(withCode('boom', code))).toMatchObject({ kind, transient });
  });
});

describe('quoteIdentifier', () => {
  it('quotes each dotted part and doubles embedded quotes', () => {
    expect(quoteIdentifier('finance.cost_centers')).toBe('"finance"."cost_centers"');
    expect(quoteIdentifier('a"b')).toBe('"a""b"');
  });
});
