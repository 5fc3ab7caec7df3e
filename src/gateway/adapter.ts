import type { Row, SourceFamily } from '../types/index.js';
import type { ValidatedPlan } from '../validator/index.js';
import type { MaskedRows } from './masking.js';

export interface RunOptions {
  signal: AbortSignal;
  /** Rows to fetch at most. */
  maxRows: number;
  /** Time left before the request deadline. */
  timeoutMs: number;
}

/**
 * One implementation per data-source family. Adapters only ever see plans
 * that passed validation; native errors are reported as ExecutionError and
 * never as authorization failures.
 */
export interface SourceAdapter<TNative = unknown> {
  readonly family: SourceFamily;
  translate(plan: ValidatedPlan): TNative;
  run(native: TNative, options: RunOptions): Promise<Row[]>;
  /** Masks against the plan's pinned snapshot and identity. */
  applyMasking(rows: Row[], plan: ValidatedPlan): MaskedRows;
}
