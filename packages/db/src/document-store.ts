/**
 * SQLite-backed append-only document store with live queries.
 *
 * Documents live in a single `documents` table keyed by collection name and
 * hold their body as JSON text. Filters and ordering are evaluated with
 * `json_extract`, so field names are restricted to plain identifiers and
 * inlined into the SQL; that also lets the expression indexes created by
 * {@link SqliteDocumentStore.ensureIndex} match the query text.
 *
 * @module db/document-store
 */
import Database from 'better-sqlite3';
import { monotonicFactory } from 'ulidx';
import { LiveQuery, type SequencedDocument } from './live-query.js';
import type {
  DocumentCollection,
  DocumentData,
  DocumentStore,
  FilterValue,
  ListenerRegistration,
  QuerySpec,
  SnapshotListener,
  StoreSettings,
  StoredDocument,
} from './types.js';

// === Constants ===

/** Default interval for picking up writes made by other connections. */
export const DEFAULT_POLL_INTERVAL_MS = 250;

/** Prefix of the fault raised when a query lacks its composite index. */
export const INDEX_REQUIRED_MESSAGE = 'The query requires an index';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// === Row Shape ===

interface DocumentRow {
  seq: number;
  id: string;
  data: string;
}

// === Migrations ===

const DOCUMENTS_MIGRATION = `
CREATE TABLE IF NOT EXISTS documents (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  collection TEXT NOT NULL,
  data TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_documents_collection_seq ON documents (collection, seq);
`;

// === Helpers ===

function assertIdentifier(kind: string, value: string): void {
  if (!IDENTIFIER.test(value)) {
    throw new Error(`Invalid ${kind} name: '${value}'`);
  }
}

function fieldExpr(field: string): string {
  return `json_extract(data, '$.${field}')`;
}

function typeExpr(field: string): string {
  return `json_type(data, '$.${field}')`;
}

function rangeTypes(value: FilterValue): string {
  return typeof value === 'number' ? `'integer', 'real'` : `'text'`;
}

function isRecord(value: unknown): value is DocumentData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseData(text: string): DocumentData {
  const value: unknown = JSON.parse(text);
  return isRecord(value) ? value : {};
}

/** Name of the composite index serving `fields` in `collection`. */
export function indexName(collection: string, fields: readonly string[]): string {
  return `idx_doc_${collection}_${fields.join('_')}`;
}

// === Options ===

export interface SqliteDocumentStoreOptions {
  /** Path to a database file, `':memory:'`, or an open database to share. */
  database: string | Database.Database;
  /** @default 250 */
  pollIntervalMs?: number;
  /**
   * Fault queries that combine equality and range filters unless the
   * composite index from {@link SqliteDocumentStore.ensureIndex} exists.
   * @default false
   */
  enforceIndexes?: boolean;
}

// === SqliteDocumentStore ===

/**
 * Document store on better-sqlite3.
 *
 * A store constructed from a path owns its database and closes it on
 * {@link terminate}; a store constructed from an open database leaves it
 * open, so several store connections can share one database (as separate
 * processes would share one file).
 *
 * @example
 * ```ts
 * const store = new SqliteDocumentStore({ database: '/var/lib/relay/relay.db' });
 * const messages = store.collection('Messages');
 * const id = await messages.add({ roomCode: 'ABCD', timestamp: Date.now(), payload: 'hi' });
 * const registration = messages.listen(
 *   { where: [{ field: 'roomCode', op: '==', value: 'ABCD' }], orderBy: 'timestamp' },
 *   (snapshot) => console.log(snapshot.docs),
 * );
 * registration.stop();
 * await store.terminate();
 * ```
 */
export class SqliteDocumentStore implements DocumentStore {
  private readonly db: Database.Database;
  private readonly ownsDatabase: boolean;
  private readonly pollIntervalMs: number;
  private readonly enforceIndexes: boolean;
  private readonly generateUlid = monotonicFactory();
  private readonly insertStmt: Database.Statement;
  private readonly indexExistsStmt: Database.Statement;
  private readonly readStmts = new Map<string, Database.Statement>();
  private readonly collections = new Map<string, DocumentCollection>();
  private readonly queries = new Map<string, Set<LiveQuery>>();
  private readonly cache = new Map<string, StoredDocument[]>();
  private currentSettings: StoreSettings = { persistenceEnabled: true };
  private terminated = false;

  constructor(options: SqliteDocumentStoreOptions) {
    if (typeof options.database === 'string') {
      this.db = new Database(options.database);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
      this.ownsDatabase = true;
    } else {
      this.db = options.database;
      this.ownsDatabase = false;
    }
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.enforceIndexes = options.enforceIndexes ?? false;

    this.db.exec(DOCUMENTS_MIGRATION);
    this.insertStmt = this.db.prepare(
      `INSERT INTO documents (id, collection, data, created_at) VALUES (?, ?, ?, ?)`,
    );
    this.indexExistsStmt = this.db.prepare(
      `SELECT 1 FROM sqlite_master WHERE type = 'index' AND name = ?`,
    );
  }

  get settings(): Readonly<StoreSettings> {
    return this.currentSettings;
  }

  configure(settings: Partial<StoreSettings>): void {
    this.assertOpen();
    if (this.collections.size > 0) {
      throw new Error('Store settings can only be changed before the first collection is opened');
    }
    this.currentSettings = { ...this.currentSettings, ...settings };
  }

  collection(name: string): DocumentCollection {
    this.assertOpen();
    assertIdentifier('collection', name);
    let collection = this.collections.get(name);
    if (!collection) {
      collection = {
        name,
        add: (data) => this.addDocument(name, data),
        listen: (query, listener) => this.listen(name, query, listener),
      };
      this.collections.set(name, collection);
    }
    return collection;
  }

  /**
   * Create the composite expression index for a query filtering on
   * `fields` (equality fields first, range field last).
   *
   * @returns The index name
   */
  ensureIndex(collection: string, fields: readonly string[]): string {
    this.assertOpen();
    assertIdentifier('collection', collection);
    for (const field of fields) assertIdentifier('field', field);
    const name = indexName(collection, fields);
    const columns = ['collection', ...fields.map(fieldExpr)].join(', ');
    this.db.exec(`CREATE INDEX IF NOT EXISTS ${name} ON documents (${columns})`);
    return name;
  }

  /** Append a document to a collection and wake that collection's listeners. */
  async addDocument(collection: string, data: DocumentData): Promise<string> {
    this.assertOpen();
    const id = this.generateUlid();
    this.insertStmt.run(id, collection, JSON.stringify(data), new Date().toISOString());
    for (const query of this.queries.get(collection) ?? []) {
      query.schedule();
    }
    return id;
  }

  /** Open a live query on a collection. */
  listen(collection: string, query: QuerySpec, listener: SnapshotListener): ListenerRegistration {
    this.assertOpen();
    const cacheKey = `${collection}:${JSON.stringify(query)}`;
    const persistence = this.currentSettings.persistenceEnabled;

    const live = new LiveQuery({
      read: (afterSeq) => this.read(collection, query, afterSeq),
      listener,
      pollIntervalMs: this.pollIntervalMs,
      cached: persistence ? this.cache.get(cacheKey) : undefined,
      onDelivered: persistence
        ? (docs, initial) => {
            const previous = initial ? [] : (this.cache.get(cacheKey) ?? []);
            this.cache.set(cacheKey, [...previous, ...docs]);
          }
        : undefined,
      onSettled: () => {
        this.queries.get(collection)?.delete(live);
      },
    });

    let active = this.queries.get(collection);
    if (!active) {
      active = new Set();
      this.queries.set(collection, active);
    }
    active.add(live);
    live.start();
    return live;
  }

  async terminate(): Promise<void> {
    if (this.terminated) return;
    this.terminated = true;
    for (const active of this.queries.values()) {
      for (const query of [...active]) query.stop();
    }
    this.queries.clear();
    this.collections.clear();
    if (this.ownsDatabase) this.db.close();
  }

  async clearPersistence(): Promise<void> {
    this.cache.clear();
  }

  private read(collection: string, query: QuerySpec, afterSeq: number): SequencedDocument[] {
    const clauses = ['collection = ?', 'seq > ?'];
    const params: FilterValue[] = [collection, afterSeq];
    for (const filter of query.where) {
      assertIdentifier('field', filter.field);
      clauses.push(`${fieldExpr(filter.field)} ${filter.op === '==' ? '=' : '>='} ?`);
      params.push(filter.value);
      if (filter.op === '>=') {
        // SQLite sorts TEXT above every number; a range only spans values of the bound's type.
        clauses.push(`${typeExpr(filter.field)} IN (${rangeTypes(filter.value)})`);
      }
    }
    if (query.orderBy !== undefined) assertIdentifier('field', query.orderBy);
    if (this.enforceIndexes) this.assertIndexed(collection, query);

    const order =
      query.orderBy !== undefined ? `${fieldExpr(query.orderBy)} ASC, seq ASC` : 'seq ASC';
    const sql = `SELECT seq, id, data FROM documents WHERE ${clauses.join(' AND ')} ORDER BY ${order}`;

    let stmt = this.readStmts.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.readStmts.set(sql, stmt);
    }
    const rows = stmt.all(...params) as DocumentRow[];
    return rows.map((row) => ({ seq: row.seq, id: row.id, data: parseData(row.data) }));
  }

  private assertIndexed(collection: string, query: QuerySpec): void {
    const equality = query.where.filter((f) => f.op === '==').map((f) => f.field);
    const range = query.where.filter((f) => f.op === '>=').map((f) => f.field);
    if (equality.length === 0 || range.length === 0) return;

    const fields = [...equality, ...range];
    if (this.indexExistsStmt.get(indexName(collection, fields)) !== undefined) return;

    const list = fields.map((f) => `'${f}'`).join(', ');
    throw new Error(
      `${INDEX_REQUIRED_MESSAGE}. Create it with ensureIndex('${collection}', [${list}]).`,
    );
  }

  private assertOpen(): void {
    if (this.terminated) {
      throw new Error('Store has been terminated');
    }
  }
}
