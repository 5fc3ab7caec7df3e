export type SourceFamily = 'relational' | 'document';

export interface FieldDefinition {
  name: string;
  type: string;
  sensitivity: string[];
  aliases: string[];
}

export interface ResourceDefinition {
  name: string;
  resourceClass: string;
  /** Owning tenant; unowned resources are shared across tenants. */
  owner?: string;
  aliases: string[];
  fields: FieldDefinition[];
}

export interface SchemaSnapshot {
  readonly dataSourceId: string;
  readonly version: number;
  readonly family: SourceFamily;
  readonly sensitivityTags: readonly string[];
  readonly resources: readonly Readonly<ResourceDefinition>[];
}
