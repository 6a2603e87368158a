/**
 * Collaborator contract for the document store behind the relay.
 *
 * The relay only ever appends documents and listens to filtered, ordered
 * live queries, so the contract stays this small. {@link SqliteDocumentStore}
 * is the bundled implementation; any store that can honour these shapes
 * (a hosted document database, an in-process fake) can be plugged in
 * through a {@link StoreConnector}.
 *
 * @module db/types
 */

/** Scalar values a filter may compare against. */
export type FilterValue = string | number;

/** A stored document body. Must be JSON-serializable. */
export type DocumentData = Record<string, unknown>;

/** A document as delivered by a live query. */
export interface StoredDocument {
  /** Store-assigned document id (ULID). */
  id: string;
  data: DocumentData;
}

export type FilterOp = '==' | '>=';

export interface FieldFilter {
  field: string;
  op: FilterOp;
  value: FilterValue;
}

/** Definition of a live query. Ordering is always ascending. */
export interface QuerySpec {
  where: FieldFilter[];
  orderBy?: string;
}

/** One delivery from a live query. */
export interface QuerySnapshot {
  docs: StoredDocument[];
  /** True when the documents were replayed from the local cache. */
  fromCache: boolean;
}

export type SnapshotListener = (snapshot: QuerySnapshot) => void;

/** Handle on a running live query. */
export interface ListenerRegistration {
  /**
   * Settles when the query stops listening: resolves after {@link stop} or
   * store termination, rejects with the underlying error on a fault.
   */
  readonly done: Promise<void>;
  /** Request termination. Safe to call more than once. */
  stop(): void;
}

export interface DocumentCollection {
  readonly name: string;
  /** Append a document and return its generated id. */
  add(data: DocumentData): Promise<string>;
  listen(query: QuerySpec, listener: SnapshotListener): ListenerRegistration;
}

export interface StoreSettings {
  /** Cache query results locally and replay them to new listeners. */
  persistenceEnabled: boolean;
}

export interface DocumentStore {
  readonly settings: Readonly<StoreSettings>;
  /** Change settings. Only allowed before the first collection is opened. */
  configure(settings: Partial<StoreSettings>): void;
  collection(name: string): DocumentCollection;
  /** Stop every listener and release the connection. Idempotent. */
  terminate(): Promise<void>;
  /** Drop locally cached query results. */
  clearPersistence(): Promise<void>;
}

/** Opens a fresh store connection. */
export type StoreConnector = () => DocumentStore | Promise<DocumentStore>;
