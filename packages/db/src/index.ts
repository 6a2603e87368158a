/**
 * @roomrelay/db -- Document store collaborator for the room relay.
 *
 * Exposes the store contract the relay is written against and a SQLite
 * implementation with polling live queries.
 *
 * @module db
 */
export {
  SqliteDocumentStore,
  DEFAULT_POLL_INTERVAL_MS,
  INDEX_REQUIRED_MESSAGE,
  indexName,
} from './document-store.js';
export type { SqliteDocumentStoreOptions } from './document-store.js';
export { LiveQuery } from './live-query.js';
export type { LiveQueryOptions, SequencedDocument } from './live-query.js';
export type {
  DocumentCollection,
  DocumentData,
  DocumentStore,
  FieldFilter,
  FilterOp,
  FilterValue,
  ListenerRegistration,
  QuerySnapshot,
  QuerySpec,
  SnapshotListener,
  StoreConnector,
  StoreSettings,
  StoredDocument,
} from './types.js';
