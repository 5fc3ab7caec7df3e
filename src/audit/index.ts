export { sha256, hashObject, HashChain } from './hasher.js';
export {
  generateKeyPair,
  saveKeyPair,
  loadKeyPair,
  signData,
  verifySignature,
  signAuditRecord,
  type KeyPair
} from './signer.js';
export { AuditTrail, type AuditEntry, type AuditTrailOptions } from './trail.js';
export { JsonlAuditSink, MemoryAuditSink, parseAuditLine, type AuditSink } from './sinks.js';
