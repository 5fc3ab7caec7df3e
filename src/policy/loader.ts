import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { PolicyTable } from '../types/index.js';
import { INTENT_CATEGORIES } from '../types/index.js';
import { ConfigError, errorMessage } from '../errors.js';
import { hashObject } from '../audit/hasher.js';

const RuleSchema = z.object({
  roles: z.array(z.string().min(1)).min(1),
  resource_classes: z.array(z.string().min(1))
});

const EntrySchema = z.object({
  out_of_scope: z.boolean().optional(),
  rules: z.array(RuleSchema).default([])
});

export const PolicyTableSchema = z.object({
  version: z.string().min(1),
  confidence_threshold: z.number().min(0).max(1),
  categories: z.record(z.enum(INTENT_CATEGORIES), EntrySchema)
});

export interface LoadedPolicy {
  table: PolicyTable;
  /** Hash of the table as loaded, bound into decision audit records. */
  hash: string;
  source: string;
}

export function parsePolicyTable(raw: unknown, source = 'policy table'): LoadedPolicy {
  const result = PolicyTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`);
  }
  const table: PolicyTable = result.data;
  return { table, hash: hashObject(table), source };
}

export async function loadPolicyTable(path: string): Promise<LoadedPolicy> {
  if (!existsSync(path)) {
    throw new ConfigError(`Policy table not found at ${path}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot parse policy table ${path}: ${errorMessage(error)}`, { cause: error });
  }
  return parsePolicyTable(raw, path);
}

// Deny-everything-but-knowledge table used when no policy file is configured.
export const DEFAULT_POLICY_TABLE: PolicyTable = {
  version: 'builtin-1',
  confidence_threshold: 0.7,
  categories: {
    SAFE_KNOWLEDGE: { rules: [] },
    OUT_OF_SCOPE: { out_of_scope: true, rules: [] }
  }
};
