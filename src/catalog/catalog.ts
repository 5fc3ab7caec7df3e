import { readdir, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { SchemaSnapshot } from '../types/index.js';
import { CatalogError, ConfigError, errorMessage } from '../errors.js';
import { buildSnapshot } from './snapshot.js';

/**
 * Read-only access to versioned schema snapshots. Snapshots are produced by
 * an external ingestion process; versions only ever increase.
 */
export interface SchemaCatalog {
  /** Latest version when `version` is omitted. */
  getSnapshot(dataSourceId: string, version?: number): Promise<SchemaSnapshot>;
  listDataSources(): Promise<string[]>;
}

export class MemorySchemaCatalog implements SchemaCatalog {
  private readonly snapshots = new Map<string, Map<number, SchemaSnapshot>>();

  constructor(snapshots: SchemaSnapshot[] = []) {
    for (const snapshot of snapshots) {
      this.publish(snapshot);
    }
  }

  publish(snapshot: SchemaSnapshot): void {
    const versions = this.snapshots.get(snapshot.dataSourceId) ?? new Map<number, SchemaSnapshot>();
    const latest = Math.max(-1, ...versions.keys());
    if (snapshot.version <= latest) {
      throw new CatalogError(
        `Snapshot version ${snapshot.version} for ${snapshot.dataSourceId} is not newer than ${latest}`
      );
    }
    versions.set(snapshot.version, snapshot);
    this.snapshots.set(snapshot.dataSourceId, versions);
  }

  async getSnapshot(dataSourceId: string, version?: number): Promise<SchemaSnapshot> {
    const versions = this.snapshots.get(dataSourceId);
    if (!versions || versions.size === 0) {
      throw new CatalogError(`Unknown data source ${dataSourceId}`);
    }
    const wanted = version ?? Math.max(...versions.keys());
    const snapshot = versions.get(wanted);
    if (!snapshot) {
      throw new CatalogError(`Snapshot ${dataSourceId}@${wanted} not found`);
    }
    return snapshot;
  }

  async listDataSources(): Promise<string[]> {
    return [...this.snapshots.keys()].sort();
  }
}

const VERSION_FILE = /^v(\d+)\.ya?ml$/;

/**
 * Snapshots laid out as `<directory>/<dataSourceId>/v<version>.yaml`.
 * Parsed snapshots are cached by id and version; the directory is re-listed
 * on every latest-version lookup so newly ingested versions are picked up.
 */
export class FileSchemaCatalog implements SchemaCatalog {
  private readonly cache = new Map<string, Promise<SchemaSnapshot>>();

  constructor(private readonly directory: string) {}

  async listDataSources(): Promise<string[]> {
    if (!existsSync(this.directory)) return [];
    const entries = await readdir(this.directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  async listVersions(dataSourceId: string): Promise<Map<number, string>> {
    const dir = join(this.directory, dataSourceId);
    const versions = new Map<number, string>();
    if (!existsSync(dir)) return versions;

    for (const file of await readdir(dir)) {
      const match = VERSION_FILE.exec(file);
      if (match) {
        versions.set(Number(match[1]), join(dir, file));
      }
    }
    return versions;
  }

  async getSnapshot(dataSourceId: string, version?: number): Promise<SchemaSnapshot> {
    const versions = await this.listVersions(dataSourceId);
    if (versions.size === 0) {
      throw new CatalogError(`Unknown data source ${dataSourceId}`);
    }
    const wanted = version ?? Math.max(...versions.keys());
    const path = versions.get(wanted);
    if (!path) {
      throw new CatalogError(`Snapshot ${dataSourceId}@${wanted} not found`);
    }

    const key = `${dataSourceId}@${wanted}`;
    let pending = this.cache.get(key);
    if (!pending) {
      pending = this.load(path, dataSourceId, wanted);
      this.cache.set(key, pending);
      void pending.catch(() => this.cache.delete(key));
    }
    return pending;
  }

  private async load(path: string, dataSourceId: string, version: number): Promise<SchemaSnapshot> {
    let raw: unknown;
    try {
      raw = parseYaml(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new CatalogError(`Cannot read snapshot ${path}: ${errorMessage(error)}`, { cause: error });
    }

    const snapshot = buildSnapshot(raw, path);
    if (snapshot.dataSourceId !== dataSourceId || snapshot.version !== version) {
      throw new ConfigError(
        `${path} declares ${snapshot.dataSourceId}@${snapshot.version}, expected ${dataSourceId}@${version}`
      );
    }
    return snapshot;
  }
}
