export { ExecutionGateway, type GatewayOptions } from './gateway.js';
export type { RunOptions, SourceAdapter } from './adapter.js';
export { aggregateAlias, maskRows, outputColumns, REDACTED, type MaskedRows, type OutputColumn } from './masking.js';
export {
  createPgPool,
  pgConnector,
  quoteIdentifier,
  RelationalAdapter,
  toExecutionError,
  type SqlClient,
  type SqlConnector,
  type SqlQuery
} from './adapters/relational.js';
export {
  DocumentAdapter,
  MemoryDocumentSource,
  type DocumentCondition,
  type DocumentOperator,
  type DocumentQuery,
  type DocumentSource
} from './adapters/document.js';
