import { z } from 'zod';
import type { FieldDefinition, ResourceDefinition, SchemaSnapshot } from '../types/index.js';
import { ConfigError } from '../errors.js';

const FieldSchema = z.object({
  name: z.string().min(1),
  type: z.string().default('text'),
  sensitivity: z.array(z.string()).default([]),
  aliases: z.array(z.string()).default([])
});

const ResourceSchema = z.object({
  name: z.string().min(1),
  resource_class: z.string().min(1),
  owner: z.string().optional(),
  aliases: z.array(z.string()).default([]),
  fields: z.array(FieldSchema).min(1)
});

export const SnapshotFileSchema = z
  .object({
    data_source_id: z.string().min(1),
    version: z.number().int().nonnegative(),
    family: z.enum(['relational', 'document']),
    sensitivity_tags: z.array(z.string()).default([]),
    resources: z.array(ResourceSchema)
  })
  .superRefine((snapshot, ctx) => {
    const known = new Set(snapshot.sensitivity_tags);
    for (const resource of snapshot.resources) {
      for (const field of resource.fields) {
        for (const tag of field.sensitivity) {
          if (!known.has(tag)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `${resource.name}.${field.name} uses undeclared sensitivity tag ${tag}`
            });
          }
        }
      }
    }
  });

export type SnapshotFile = z.input<typeof SnapshotFileSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildSnapshot(raw: unknown, origin = 'snapshot'): SchemaSnapshot {
  const result = SnapshotFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${origin}: ${result.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  const parsed = result.data;

  const resources: ResourceDefinition[] = parsed.resources.map((resource) => ({
    name: resource.name,
    resourceClass: resource.resource_class,
    owner: resource.owner,
    aliases: resource.aliases,
    fields: resource.fields.map(
      (field): FieldDefinition => ({
        name: field.name,
        type: field.type,
        sensitivity: field.sensitivity,
        aliases: field.aliases
      })
    )
  }));

  return deepFreeze({
    dataSourceId: parsed.data_source_id,
    version: parsed.version,
    family: parsed.family,
    sensitivityTags: parsed.sensitivity_tags,
    resources
  });
}

export function findResource(snapshot: SchemaSnapshot, name: string): Readonly<ResourceDefinition> | undefined {
  return snapshot.resources.find((resource) => resource.name === name);
}
