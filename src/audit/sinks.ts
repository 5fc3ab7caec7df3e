import { appendFile, mkdir, readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import type { AuditRecord } from '../types/index.js';

export interface AuditSink {
  append(record: AuditRecord): Promise<void>;
  readAll(): Promise<AuditRecord[]>;
}

const AuditRecordSchema = z.object({
  event_id: z.string(),
  request_id: z.string(),
  stage: z.enum(['classification', 'decision', 'generation', 'validation', 'execution']),
  timestamp: z.string(),
  actor: z.object({
    user_id: z.string(),
    tenant: z.string(),
    roles: z.array(z.string())
  }),
  outcome: z.string(),
  summary: z.record(z.unknown()),
  payload_hash: z.string(),
  prev_record_hash: z.string(),
  querygate_version: z.string(),
  signature: z.string().optional()
});

export function parseAuditLine(line: string): AuditRecord {
  return AuditRecordSchema.parse(JSON.parse(line));
}

/**
 * Append-only JSONL file. Writes go through a single promise queue so lines
 * from concurrent requests never interleave; callers only wait for their own
 * append.
 */
export class JsonlAuditSink implements AuditSink {
  private tail: Promise<void> = Promise.resolve();
  private dirReady?: Promise<string | undefined>;

  constructor(private readonly logPath: string) {}

  append(record: AuditRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    const write = this.tail.then(async () => {
      this.dirReady ??= mkdir(dirname(this.logPath), { recursive: true });
      await this.dirReady;
      await appendFile(this.logPath, line, 'utf-8');
    });
    // Keep the queue moving after a failed write; the failure is reported to
    // the caller through `write`.
    this.tail = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  async readAll(): Promise<AuditRecord[]> {
    await this.tail;
    if (!existsSync(this.logPath)) return [];

    const content = await readFile(this.logPath, 'utf-8');
    return content
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map(parseAuditLine);
  }
}

export class MemoryAuditSink implements AuditSink {
  private readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record }));
  }

  async readAll(): Promise<AuditRecord[]> {
    return [...this.records];
  }

  forRequest(requestId: string): AuditRecord[] {
    return this.records.filter((record) => record.request_id === requestId);
  }
}
