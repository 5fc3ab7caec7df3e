import type { ExecutionResult, Row } from '../types/index.js';
import { isIssuedPlan, type ValidatedPlan } from '../validator/index.js';
import { ExecutionError, errorMessage } from '../errors.js';
import { runWithDeadline } from '../deadline.js';
import { withRetry } from '../retry.js';
import { silentLogger, type Logger } from '../logger.js';
import type { SourceAdapter } from './adapter.js';

export interface GatewayOptions {
  /** Per-request deadline covering every attempt. */
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  logger?: Logger;
}

/**
 * Sole holder of data-source capability. Accepts only plans issued by the
 * validator and runs them through the adapter registered for their data
 * source, under one deadline, then masks the rows.
 */
export class ExecutionGateway {
  private readonly adapters = new Map<string, SourceAdapter>();
  private readonly logger: Logger;

  constructor(private readonly options: GatewayOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  register(dataSourceId: string, adapter: SourceAdapter): this {
    this.adapters.set(dataSourceId, adapter);
    return this;
  }

  hasSource(dataSourceId: string): boolean {
    return this.adapters.has(dataSourceId);
  }

  async execute(plan: ValidatedPlan, options: { signal?: AbortSignal } = {}): Promise<ExecutionResult> {
    if (!isIssuedPlan(plan)) {
      throw new ExecutionError('rejected_plan', 'Gateway only executes plans issued by the validator');
    }

    const adapter = this.adapters.get(plan.dataSourceId);
    if (!adapter || adapter.family !== plan.snapshot.family) {
      throw new ExecutionError('no_adapter', `No ${plan.snapshot.family} adapter registered for ${plan.dataSourceId}`);
    }

    const native = adapter.translate(plan);
    const deadline = Date.now() + this.options.timeoutMs;

    const rows = await withRetry(
      (attempt) => this.attempt(adapter, native, plan, deadline, attempt, options.signal),
      {
        retries: this.options.retries,
        backoffMs: this.options.backoffMs,
        signal: options.signal,
        shouldRetry: (error) =>
          error instanceof ExecutionError && error.transient && deadline - Date.now() > this.options.backoffMs,
        onRetry: (error, attempt) =>
          this.logger.warn({ data_source: plan.dataSourceId, attempt, err: errorMessage(error) }, 'Retrying execution')
      }
    ).catch((error: unknown) => {
      throw this.normalize(error, options.signal);
    });

    const truncated = rows.length > plan.limit;
    const masked = adapter.applyMasking(truncated ? rows.slice(0, plan.limit) : rows, plan);

    return {
      dataSourceId: plan.dataSourceId,
      resource: plan.resource,
      columns: masked.columns,
      rows: masked.rows,
      rowCount: masked.rows.length,
      truncated,
      maskedFields: masked.maskedFields
    };
  }

  private async attempt(
    adapter: SourceAdapter,
    native: unknown,
    plan: ValidatedPlan,
    deadline: number,
    attempt: number,
    signal?: AbortSignal
  ): Promise<Row[]> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new ExecutionError('timeout', `Execution deadline of ${this.options.timeoutMs}ms exceeded`);
    }

    this.logger.debug({ data_source: plan.dataSourceId, resource: plan.resource, attempt }, 'Executing plan');
    return runWithDeadline(
      (attemptSignal) => adapter.run(native, { signal: attemptSignal, maxRows: plan.limit + 1, timeoutMs: remaining }),
      remaining,
      () => new ExecutionError('timeout', `Execution deadline of ${this.options.timeoutMs}ms exceeded`),
      signal
    );
  }

  private normalize(error: unknown, signal?: AbortSignal): ExecutionError {
    if (signal?.aborted && !(error instanceof ExecutionError && error.kind === 'timeout')) {
      return new ExecutionError('cancelled', 'Execution cancelled', { cause: error });
    }
    if (error instanceof ExecutionError) return error;
    return new ExecutionError('adapter', errorMessage(error), { cause: error });
  }
}
