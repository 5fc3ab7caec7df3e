import type { Row } from '../types/index.js';
import type { ValidatedPlan } from '../validator/index.js';

export const REDACTED = '[REDACTED]';

export interface OutputColumn {
  name: string;
  /** Resource field the value is derived from. */
  source: string;
}

export function aggregateAlias(fn: string, field: string): string {
  return `${fn}_${field}`;
}

export function outputColumns(plan: ValidatedPlan): OutputColumn[] {
  const columns = plan.fields.map((field) => ({ name: field, source: field }));
  if (plan.aggregation) {
    const { fn, field } = plan.aggregation;
    columns.push({ name: aggregateAlias(fn, field), source: field });
  }
  return columns;
}

export interface MaskedRows {
  rows: Row[];
  columns: string[];
  maskedFields: string[];
}

/**
 * Keeps only the plan's output columns and redacts any whose source field
 * carries a sensitivity tag the identity is not entitled to. Runs after the
 * validator has already excluded such fields.
 */
export function maskRows(rows: Row[], plan: ValidatedPlan): MaskedRows {
  const entitlements = new Set(plan.identity.entitlements);
  const fields = new Map(plan.resourceDefinition.fields.map((field) => [field.name, field]));
  const columns = outputColumns(plan);

  const redacted = new Set(
    columns
      .filter((column) => {
        const tags = fields.get(column.source)?.sensitivity;
        // A column that cannot be traced to the pinned snapshot is treated as sensitive
        return tags === undefined || tags.some((tag) => !entitlements.has(tag));
      })
      .map((column) => column.name)
  );

  const masked = rows.map((row) => {
    const out: Row = {};
    for (const column of columns) {
      out[column.name] = redacted.has(column.name) ? REDACTED : (row[column.name] ?? null);
    }
    return out;
  });

  return {
    rows: masked,
    columns: columns.map((column) => column.name),
    maskedFields: [...redacted]
  };
}
