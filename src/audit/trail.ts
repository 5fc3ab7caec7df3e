import { v4 as uuidv4 } from 'uuid';
import type { AuditRecord, AuditStage, Identity } from '../types/index.js';
import { QUERYGATE_VERSION } from '../version.js';
import { silentLogger, type Logger } from '../logger.js';
import { HashChain, hashObject } from './hasher.js';
import { auditSigningPayload, signAuditRecord, verifySignature, type KeyPair } from './signer.js';
import type { AuditSink } from './sinks.js';

export interface AuditEntry {
  requestId: string;
  stage: AuditStage;
  outcome: string;
  summary: Record<string, unknown>;
  identity: Identity;
  timestamp?: Date;
}

export interface AuditTrailOptions {
  keyPair?: KeyPair | null;
  logger?: Logger;
}

type ChainedFields = Omit<AuditRecord, 'prev_record_hash' | 'signature'>;

function chainedFields(record: AuditRecord): ChainedFields {
  const { prev_record_hash: _prev, signature: _signature, ...rest } = record;
  return rest;
}

/**
 * Hash-chained, optionally signed, append-only record of every stage
 * transition. Records are appended one at a time through a promise queue and
 * the chain only advances once the sink has accepted a record, so a failed
 * write leaves no gap for the next record to point across.
 */
export class AuditTrail {
  private readonly chain: HashChain;
  private readonly keyPair: KeyPair | null;
  private readonly logger: Logger;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly sink: AuditSink,
    options: AuditTrailOptions & { genesisHash?: string } = {}
  ) {
    this.chain = new HashChain(options.genesisHash);
    this.keyPair = options.keyPair ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  // Resumes the chain from the last record already in the sink.
  static async open(sink: AuditSink, options: AuditTrailOptions = {}): Promise<AuditTrail> {
    const records = await sink.readAll();
    const last = records[records.length - 1];
    const genesisHash = last ? HashChain.chainHashOf(chainedFields(last), last.prev_record_hash) : undefined;
    return new AuditTrail(sink, { ...options, genesisHash });
  }

  record(entry: AuditEntry): Promise<AuditRecord> {
    const base: ChainedFields = {
      event_id: uuidv4(),
      request_id: entry.requestId,
      stage: entry.stage,
      timestamp: (entry.timestamp ?? new Date()).toISOString(),
      actor: {
        user_id: entry.identity.userId,
        tenant: entry.identity.tenant,
        roles: [...entry.identity.roles]
      },
      outcome: entry.outcome,
      summary: entry.summary,
      payload_hash: hashObject(entry.summary),
      querygate_version: QUERYGATE_VERSION
    };

    const write = this.tail.then(() => this.append(base));
    // A failed append is reported to its caller; the queue moves on.
    this.tail = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async append(base: ChainedFields): Promise<AuditRecord> {
    const record: AuditRecord = { ...base, prev_record_hash: this.chain.getCurrentHash() };
    if (this.keyPair) {
      record.signature = signAuditRecord(record, this.keyPair.privateKey);
    }

    await this.sink.append(record);
    this.chain.addRecord(base);
    this.logger.debug({ request_id: record.request_id, stage: record.stage, outcome: record.outcome }, 'Audit record written');

    return Object.freeze(record);
  }

  async verify(): Promise<{ valid: boolean; errors: string[] }> {
    const records = await this.sink.readAll();
    const errors: string[] = [];
    let expectedPrev: string | null = null;

    records.forEach((record, i) => {
      if (expectedPrev !== null && record.prev_record_hash !== expectedPrev) {
        errors.push(`Record ${i}: Chain broken - expected prev_hash ${expectedPrev}, got ${record.prev_record_hash}`);
      }
      if (record.payload_hash !== hashObject(record.summary)) {
        errors.push(`Record ${i}: Payload hash mismatch`);
      }
      if (this.keyPair && record.signature) {
        const payload = auditSigningPayload(record);
        if (!verifySignature(payload, record.signature, this.keyPair.publicKey)) {
          errors.push(`Record ${i}: Invalid signature`);
        }
      }
      expectedPrev = HashChain.chainHashOf(chainedFields(record), record.prev_record_hash);
    });

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
