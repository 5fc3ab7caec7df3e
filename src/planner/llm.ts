import type { ExecutionPlan, Intent, SchemaSnapshot } from '../types/index.js';
import type { SchemaCatalog } from '../catalog/index.js';
import type { TextModel } from '../inference/router.js';
import { extractJsonObject } from '../classifier/intent.js';
import { PlanGenerationError, errorMessage } from '../errors.js';
import { runWithDeadline } from '../deadline.js';
import { ExecutionPlanSchema, type PlanGenerator } from './generator.js';

const PLANNER_SYSTEM_PROMPT = `You translate a business question into a read-only query plan.

Reply with a single JSON object and nothing else:
{
  "dataSourceId": "<data source id>",
  "operation": "select" | "aggregate",
  "resource": "<resource name>",
  "fields": ["<field>", ...],
  "filters": [{"field": "<field>", "op": "eq|neq|gt|gte|lt|lte|in|contains", "value": <value>}],
  "aggregation": {"fn": "sum|avg|count|min|max", "field": "<field>", "groupBy": ["<field>"]},
  "limit": <positive integer>
}
Omit "aggregation" for plain selects. Use only names from the catalog below.`;

export interface LlmPlanGeneratorOptions {
  backend?: string;
  timeoutMs: number;
  dataSourceIds?: string[];
}

export function describeCatalog(snapshots: SchemaSnapshot[], authorizedScope: readonly string[]): string {
  const lines = [`Authorized resource classes: ${authorizedScope.join(', ') || '(none)'}`];
  for (const snapshot of snapshots) {
    lines.push(`Data source ${snapshot.dataSourceId} (${snapshot.family}):`);
    for (const resource of snapshot.resources) {
      const fields = resource.fields.map((field) => `${field.name}:${field.type}`).join(', ');
      lines.push(`  - ${resource.name} [${resource.resourceClass}] ${fields}`);
    }
  }
  return lines.join('\n');
}

export class LlmPlanGenerator implements PlanGenerator {
  constructor(
    private readonly model: TextModel,
    private readonly catalog: SchemaCatalog,
    private readonly options: LlmPlanGeneratorOptions
  ) {}

  async generate(query: string, intent: Intent, authorizedScope: readonly string[]): Promise<ExecutionPlan> {
    const sources = this.options.dataSourceIds ?? (await this.catalog.listDataSources());
    const snapshots = await Promise.all(sources.map((id) => this.catalog.getSnapshot(id)));
    const input = `${describeCatalog(snapshots, authorizedScope)}\n\nIntent: ${intent.category}\nQuestion: ${query}`;

    let output: string;
    try {
      const response = await runWithDeadline(
        (signal) =>
          this.model.infer(
            { input, systemPrompt: PLANNER_SYSTEM_PROMPT, maxTokens: 600, temperature: 0, signal },
            this.options.backend
          ),
        this.options.timeoutMs,
        () => new PlanGenerationError(`Plan generation timed out after ${this.options.timeoutMs}ms`)
      );
      output = response.output;
    } catch (error) {
      if (error instanceof PlanGenerationError) throw error;
      throw new PlanGenerationError(`Model error: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = ExecutionPlanSchema.safeParse(extractJsonObject(output));
    if (!parsed.success) {
      throw new PlanGenerationError(`Malformed plan: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }
}
