export type PlanValidationErrorKind =
  | 'UnknownResource'
  | 'ScopeViolation'
  | 'EntitlementMissing'
  | 'UnsupportedOperation';

export type ExecutionErrorKind = 'timeout' | 'cancelled' | 'adapter' | 'no_adapter' | 'rejected_plan';

export class QueryGateError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Timeout, model error or malformed output from the intent classifier.
export class ClassificationFailure extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CLASSIFICATION_FAILURE', message, options);
  }
}

export class PlanGenerationError extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PLAN_GENERATION_FAILED', message, options);
  }
}

/**
 * Rejection of a candidate plan. `detail` may describe schema structure and
 * must only ever reach the audit trail, never the caller.
 */
export class PlanValidationError extends QueryGateError {
  readonly kind: PlanValidationErrorKind;
  readonly detail: Record<string, unknown>;

  constructor(kind: PlanValidationErrorKind, message: string, detail: Record<string, unknown> = {}) {
    super('PLAN_REJECTED', message);
    this.kind = kind;
    this.detail = detail;
  }
}

export class ExecutionError extends QueryGateError {
  readonly kind: ExecutionErrorKind;
  readonly transient: boolean;

  constructor(
    kind: ExecutionErrorKind,
    message: string,
    options?: { cause?: unknown; transient?: boolean }
  ) {
    super('EXECUTION_FAILED', message, options);
    this.kind = kind;
    this.transient = options?.transient ?? false;
  }
}

export class ConfigError extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CatalogError extends QueryGateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CATALOG_UNAVAILABLE', message, options);
  }
}
