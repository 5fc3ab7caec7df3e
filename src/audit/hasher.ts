import { createHash } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = canonicalize(entry);
    }
    return sorted;
  }
  return value;
}

// Key order does not affect the hash, at any depth.
export function hashObject(obj: unknown): string {
  return sha256(JSON.stringify(canonicalize(obj)));
}

// Hash chain for tamper-evident log
export class HashChain {
  private prevHash: string;

  constructor(genesisHash?: string) {
    this.prevHash = genesisHash || sha256('querygate-genesis-' + Date.now());
  }

  // Add a record and return its chain hash
  addRecord(record: object): { recordHash: string; chainHash: string; prevHash: string } {
    const recordHash = hashObject(record);
    const prevHash = this.prevHash;
    const chainHash = sha256(recordHash + prevHash);

    this.prevHash = chainHash;

    return { recordHash, chainHash, prevHash };
  }

  static chainHashOf(record: object, prevHash: string): string {
    return sha256(hashObject(record) + prevHash);
  }

  getCurrentHash(): string {
    return this.prevHash;
  }
}
