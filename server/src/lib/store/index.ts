export type { DocumentStore, StoredDocument, DocumentFields } from './types.js';
export { isDocumentFields, toDocumentFields } from './types.js';
export { MemoryDocumentStore } from './memoryStore.js';
export { PostgresDocumentStore } from './postgresStore.js';
