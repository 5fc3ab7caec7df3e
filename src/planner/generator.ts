import { z } from 'zod';
import type { ExecutionPlan, Intent } from '../types/index.js';

/**
 * Produces a candidate plan. Output is untrusted: the authorized scope is a
 * hint only, and enforcement belongs to the validator.
 */
export interface PlanGenerator {
  generate(query: string, intent: Intent, authorizedScope: readonly string[]): Promise<ExecutionPlan>;
}

const FilterValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.union([z.string(), z.number()]))
]);

// Structural shape only. Operations, operators and names are checked later.
export const ExecutionPlanSchema = z.object({
  dataSourceId: z.string().min(1),
  operation: z.string().min(1),
  resource: z.string().min(1),
  fields: z.array(z.string()).default([]),
  filters: z
    .array(
      z.object({
        field: z.string(),
        op: z.string(),
        value: FilterValueSchema
      })
    )
    .default([]),
  aggregation: z
    .object({
      fn: z.string(),
      field: z.string(),
      groupBy: z.array(z.string()).default([])
    })
    .optional(),
  limit: z.number().int().positive().optional()
});
