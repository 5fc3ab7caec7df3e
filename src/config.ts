import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

const IdentitySchema = z.object({
  user_id: z.string().min(1),
  tenant: z.string().min(1),
  roles: z.array(z.string()).default([]),
  entitlements: z.array(z.string()).default([])
});

const BackendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string().min(1),
  baseUrl: z.string().url().optional()
});

const SourceSchema = z.object({
  id: z.string().min(1),
  family: z.enum(['relational', 'document']),
  connection_string: z.string().optional(),
  fixture: z.string().optional(),
  pool_size: z.number().int().positive().default(10)
});

export const QueryGateConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8088),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  auth: z
    .object({
      api_keys: z.array(z.object({ key: z.string().min(1), identity: IdentitySchema })).default([]),
      allowed_origins: z.array(z.string()).default([])
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_second: z.number().positive().default(10),
      max_input_chars: z.number().int().positive().default(2000),
      max_context_chars: z.number().int().positive().default(8000)
    })
    .default({}),
  inference: z
    .object({
      backends: z.array(BackendSchema).default([]),
      default: z.string().default('')
    })
    .default({}),
  classifier: z
    .object({
      backend: z.enum(['pattern', 'llm']).default('pattern'),
      model_backend: z.string().optional(),
      timeout_ms: z.number().int().positive().default(5000),
      retries: z.number().int().min(0).max(1).default(1),
      backoff_ms: z.number().int().min(0).default(200),
      max_context_turns: z.number().int().min(0).default(6)
    })
    .default({}),
  generator: z
    .object({
      backend: z.enum(['keyword', 'llm']).default('keyword'),
      model_backend: z.string().optional(),
      timeout_ms: z.number().int().positive().default(15000)
    })
    .default({}),
  knowledge: z
    .object({
      enabled: z.boolean().default(false),
      model_backend: z.string().optional(),
      timeout_ms: z.number().int().positive().default(15000)
    })
    .default({}),
  policy: z
    .object({
      table: z.string().optional(),
      schema_version_source: z.string().optional()
    })
    .default({}),
  catalog: z
    .object({
      directory: z.string().default(resolve(homedir(), '.querygate', 'catalog'))
    })
    .default({}),
  sources: z.array(SourceSchema).default([]),
  execution: z
    .object({
      timeout_ms: z.number().int().positive().default(10000),
      max_rows: z.number().int().positive().default(500),
      retries: z.number().int().min(0).max(1).default(1),
      backoff_ms: z.number().int().min(0).default(250)
    })
    .default({}),
  audit: z
    .object({
      log: z.string().default(resolve(homedir(), '.querygate', 'logs', 'audit.jsonl')),
      key_dir: z.string().default(resolve(homedir(), '.querygate', 'keys'))
    })
    .default({}),
  logging: z
    .object({
      level: z.string().default('info'),
      pretty: z.boolean().default(false)
    })
    .default({})
});

export type QueryGateConfig = z.infer<typeof QueryGateConfigSchema>;
export type ConfiguredIdentity = z.infer<typeof IdentitySchema>;

export const CONFIG_PATHS = [
  resolve(process.cwd(), 'querygate.yaml'),
  resolve(homedir(), '.querygate', 'config.yaml'),
  resolve(homedir(), '.config', 'querygate', 'config.yaml')
];

function resolveFrom(base: string, path: string | undefined): string | undefined {
  if (path === undefined) return undefined;
  if (path.startsWith('~/')) return resolve(homedir(), path.slice(2));
  return isAbsolute(path) ? path : resolve(base, path);
}

/**
 * Validates raw configuration, makes file paths absolute relative to
 * `baseDir`, and applies environment overrides.
 */
export function parseConfig(raw: unknown, baseDir: string, env: NodeJS.ProcessEnv = process.env): QueryGateConfig {
  const result = QueryGateConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const config = result.data;

  config.policy.table = resolveFrom(baseDir, config.policy.table);
  config.catalog.directory = resolveFrom(baseDir, config.catalog.directory) ?? config.catalog.directory;
  config.audit.log = resolveFrom(baseDir, config.audit.log) ?? config.audit.log;
  config.audit.key_dir = resolveFrom(baseDir, config.audit.key_dir) ?? config.audit.key_dir;
  for (const source of config.sources) {
    source.fixture = resolveFrom(baseDir, source.fixture);
    if (source.family === 'relational' && !source.connection_string && env.DATABASE_URL) {
      source.connection_string = env.DATABASE_URL;
    }
  }

  if (env.LOG_LEVEL) {
    config.logging.level = env.LOG_LEVEL;
  }
  if (env.QUERYGATE_API_KEY && !config.auth.api_keys.some((entry) => entry.key === env.QUERYGATE_API_KEY)) {
    // An env-provided key never carries roles; grant them in the config file
    config.auth.api_keys.push({
      key: env.QUERYGATE_API_KEY,
      identity: { user_id: 'env-key', tenant: 'default', roles: [], entitlements: [] }
    });
  }

  const backendNames = new Set(config.inference.backends.map((backend) => backend.name));
  const wantsModel = [
    config.classifier.backend === 'llm' ? config.classifier.model_backend : undefined,
    config.generator.backend === 'llm' ? config.generator.model_backend : undefined,
    config.knowledge.enabled ? config.knowledge.model_backend : undefined
  ];
  for (const name of wantsModel) {
    if (name && !backendNames.has(name)) {
      throw new ConfigError(`Inference backend ${name} is not configured`);
    }
  }

  return config;
}

export function loadConfig(paths: string[] = CONFIG_PATHS): { config: QueryGateConfig; path?: string } {
  for (const path of paths) {
    if (existsSync(path)) {
      let raw: unknown;
      try {
        raw = parseYaml(readFileSync(path, 'utf-8'));
      } catch (error) {
        throw new ConfigError(`Cannot parse ${path}: ${errorMessage(error)}`, { cause: error });
      }
      return { config: parseConfig(raw, dirname(path)), path };
    }
  }

  // Default configuration
  return { config: parseConfig({}, process.cwd()) };
}
