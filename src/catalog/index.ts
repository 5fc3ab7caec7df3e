export { FileSchemaCatalog, MemorySchemaCatalog, type SchemaCatalog } from './catalog.js';
export { buildSnapshot, findResource, SnapshotFileSchema, type SnapshotFile } from './snapshot.js';
