import type {
  ExecutionPlan,
  FieldDefinition,
  Intent,
  PlanAggregation,
  PlanFilter,
  ResourceDefinition,
  SchemaSnapshot
} from '../types/index.js';
import type { SchemaCatalog } from '../catalog/index.js';
import { PlanGenerationError } from '../errors.js';
import type { PlanGenerator } from './generator.js';

const NUMERIC_TYPES = new Set(['integer', 'int', 'bigint', 'numeric', 'decimal', 'float', 'double', 'number', 'money']);

const AGGREGATE_WORDS: Array<[RegExp, string]> = [
  [/\b(?:total|sum)\b/i, 'sum'],
  [/\b(?:average|avg|mean)\b/i, 'avg'],
  [/\b(?:count|number\s+of|how\s+many)\b/i, 'count'],
  [/\b(?:max|maximum|highest|largest)\b/i, 'max'],
  [/\b(?:min|minimum|lowest|smallest)\b/i, 'min'],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function termsOf(item: { name: string; aliases: readonly string[] }): string[] {
  return [...new Set([item.name, item.name.replace(/_/g, ' '), ...item.aliases])]
    .map((term) => term.toLowerCase())
    .sort((a, b) => b.length - a.length);
}

function mentions(query: string, item: { name: string; aliases: readonly string[] }): boolean {
  return termsOf(item).some((term) => new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i').test(query));
}

function parseValue(raw: string): string | number {
  const unquoted = raw.replace(/^['"]|['"]$/g, '');
  if (unquoted !== raw) return unquoted;
  return Number(raw);
}

function filterFor(query: string, field: FieldDefinition): PlanFilter | undefined {
  for (const term of termsOf(field)) {
    const pattern = new RegExp(
      `\\b${escapeRegExp(term)}\\s*(?:=|:|is)?\\s*#?(-?\\d+(?:\\.\\d+)?|'[^']*'|"[^"]*")`,
      'i'
    );
    const match = pattern.exec(query);
    if (match?.[1] !== undefined) {
      return { field: field.name, op: 'eq', value: parseValue(match[1]) };
    }
  }
  return undefined;
}

function aggregationFor(
  query: string,
  resource: Readonly<ResourceDefinition>,
  mentioned: FieldDefinition[],
  filters: PlanFilter[]
): PlanAggregation | undefined {
  const hit = AGGREGATE_WORDS.find(([pattern]) => pattern.test(query));
  if (!hit) return undefined;

  const filtered = new Set(filters.map((filter) => filter.field));
  const groupBy = resource.fields
    .filter((field) => termsOf(field).some((term) => new RegExp(`\\bby\\s+${escapeRegExp(term)}\\b`, 'i').test(query)))
    .map((field) => field.name);
  const candidates = mentioned.filter((field) => !filtered.has(field.name) && !groupBy.includes(field.name));
  const numeric = candidates.find((field) => NUMERIC_TYPES.has(field.type.toLowerCase()));
  const target = hit[1] === 'count' ? (candidates[0] ?? resource.fields[0]) : numeric;
  if (!target) return undefined;

  return { fn: hit[1], field: target.name, groupBy };
}

/**
 * Deterministic generator: resolves the first catalog resource the query
 * names, the fields it mentions, `<field> <value>` equality filters and a
 * simple aggregate. It does not look at the authorized scope.
 */
export class KeywordPlanGenerator implements PlanGenerator {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly dataSourceIds?: string[]
  ) {}

  async generate(query: string, _intent: Intent, _authorizedScope: readonly string[]): Promise<ExecutionPlan> {
    const match = await this.findResource(query);
    if (!match) {
      throw new PlanGenerationError('Query does not name a known resource');
    }
    const { snapshot, resource } = match;

    const mentioned = resource.fields.filter((field) => mentions(query, field));
    const filters = resource.fields.flatMap((field) => {
      const filter = filterFor(query, field);
      return filter ? [filter] : [];
    });
    const aggregation = aggregationFor(query, resource, mentioned, filters);
    const limitMatch = /\b(?:top|first|limit)\s+(\d+)\b/i.exec(query);

    const plan: ExecutionPlan = {
      dataSourceId: snapshot.dataSourceId,
      operation: aggregation ? 'aggregate' : 'select',
      resource: resource.name,
      fields: aggregation ? [...aggregation.groupBy] : mentioned.map((field) => field.name),
      filters
    };
    if (aggregation) plan.aggregation = aggregation;
    if (limitMatch?.[1]) plan.limit = Number(limitMatch[1]);

    return plan;
  }

  private async findResource(
    query: string
  ): Promise<{ snapshot: SchemaSnapshot; resource: Readonly<ResourceDefinition> } | undefined> {
    const sources = this.dataSourceIds ?? (await this.catalog.listDataSources());
    for (const dataSourceId of sources) {
      const snapshot = await this.catalog.getSnapshot(dataSourceId);
      const resource = snapshot.resources.find((candidate) => mentions(query, candidate));
      if (resource) return { snapshot, resource };
    }
    return undefined;
  }
}
