import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteDocumentStore, indexName } from '../document-store.js';
import type { QuerySnapshot, QuerySpec } from '../types.js';

// === Setup ===

let db: Database.Database;
let store: SqliteDocumentStore;

const roomQuery = (roomCode: string, from: number): QuerySpec => ({
  where: [
    { field: 'roomCode', op: '==', value: roomCode },
    { field: 'timestamp', op: '>=', value: from },
  ],
  orderBy: 'timestamp',
});

beforeEach(() => {
  db = new Database(':memory:');
  store = new SqliteDocumentStore({ database: db, pollIntervalMs: 0 });
});

afterEach(async () => {
  await store.terminate();
  db.close();
});

function collect(): { snapshots: QuerySnapshot[]; listener: (s: QuerySnapshot) => void } {
  const snapshots: QuerySnapshot[] = [];
  return { snapshots, listener: (s) => snapshots.push(s) };
}

function payloads(snapshot: QuerySnapshot | undefined): unknown[] {
  return (snapshot?.docs ?? []).map((d) => d.data.payload);
}

// === Tests ===

describe('add', () => {
  it('returns distinct, increasing ids', async () => {
    const messages = store.collection('Messages');
    const a = await messages.add({ payload: 'a' });
    const b = await messages.add({ payload: 'b' });
    expect(a).not.toBe(b);
    expect(b > a).toBe(true);
  });

  it('stores the document body as JSON', async () => {
    await store.collection('Messages').add({ roomCode: 'ABCD', timestamp: 5, payload: 'x' });
    const row = db.prepare('SELECT collection, data FROM documents').get() as {
      collection: string;
      data: string;
    };
    expect(row.collection).toBe('Messages');
    expect(JSON.parse(row.data)).toEqual({ roomCode: 'ABCD', timestamp: 5, payload: 'x' });
  });
});

describe('listen', () => {
  it('delivers an initial snapshot even when nothing matches', async () => {
    const { snapshots, listener } = collect();
    const registration = store.collection('Messages').listen(roomQuery('ABCD', 0), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));
    expect(snapshots[0]).toEqual({ docs: [], fromCache: false });
    registration.stop();
  });

  it('filters by equality and lower bound, ordered by the order field', async () => {
    const messages = store.collection('Messages');
    await messages.add({ roomCode: 'ABCD', timestamp: 150, payload: 'x' });
    await messages.add({ roomCode: 'ABCD', timestamp: 120, payload: 'y' });
    await messages.add({ roomCode: 'ABCD', timestamp: 90, payload: 'old' });
    await messages.add({ roomCode: 'WXYZ', timestamp: 130, payload: 'other room' });
    await messages.add({ roomCode: 'ABCD', timestamp: 100, payload: 'boundary' });

    const { snapshots, listener } = collect();
    const registration = messages.listen(roomQuery('ABCD', 100), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));
    expect(payloads(snapshots[0])).toEqual(['boundary', 'y', 'x']);
    registration.stop();
  });

  it('leaves values of another type out of a range filter', async () => {
    const messages = store.collection('Messages');
    await messages.add({ roomCode: 'ABCD', timestamp: '150', payload: 'string stamp' });
    await messages.add({ roomCode: 'ABCD', payload: 'no stamp' });
    await messages.add({ roomCode: 'ABCD', timestamp: 120.5, payload: 'real' });
    await messages.add({ roomCode: 'ABCD', timestamp: 130, payload: 'integer' });

    const { snapshots, listener } = collect();
    const registration = messages.listen(roomQuery('ABCD', 100), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));
    expect(payloads(snapshots[0])).toEqual(['real', 'integer']);
    registration.stop();
  });

  it('compares string bounds against strings only', async () => {
    const messages = store.collection('Messages');
    await messages.add({ label: 'b', payload: 'text' });
    await messages.add({ label: 5, payload: 'number' });

    const { snapshots, listener } = collect();
    const registration = messages.listen({ where: [{ field: 'label', op: '>=', value: 'a' }] }, listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));
    expect(payloads(snapshots[0])).toEqual(['text']);
    registration.stop();
  });

  it('only delivers documents appended since the previous snapshot', async () => {
    const messages = store.collection('Messages');
    await messages.add({ roomCode: 'ABCD', timestamp: 10, payload: 'first' });
    const { snapshots, listener } = collect();
    const registration = messages.listen(roomQuery('ABCD', 0), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));

    await messages.add({ roomCode: 'ABCD', timestamp: 20, payload: 'second' });
    await vi.waitFor(() => expect(snapshots).toHaveLength(2));
    expect(payloads(snapshots[1])).toEqual(['second']);
    registration.stop();
  });

  it('ignores documents in other collections', async () => {
    const { snapshots, listener } = collect();
    const registration = store.collection('Messages').listen(roomQuery('ABCD', 0), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));

    await store.collection('Other').add({ roomCode: 'ABCD', timestamp: 1, payload: 'elsewhere' });
    await store.collection('Messages').add({ roomCode: 'ABCD', timestamp: 2, payload: 'here' });
    await vi.waitFor(() => expect(snapshots).toHaveLength(2));
    expect(payloads(snapshots[1])).toEqual(['here']);
    registration.stop();
  });

  it('picks up writes from another connection by polling', async () => {
    const polling = new SqliteDocumentStore({ database: db, pollIntervalMs: 10 });
    const writer = new SqliteDocumentStore({ database: db, pollIntervalMs: 0 });
    const { snapshots, listener } = collect();
    const registration = polling.collection('Messages').listen(roomQuery('ABCD', 0), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));

    await writer.collection('Messages').add({ roomCode: 'ABCD', timestamp: 1, payload: 'remote' });
    await vi.waitFor(() => expect(snapshots).toHaveLength(2));
    expect(payloads(snapshots[1])).toEqual(['remote']);

    registration.stop();
    await polling.terminate();
    await writer.terminate();
  });

  it('resolves done when stopped and delivers nothing afterwards', async () => {
    const messages = store.collection('Messages');
    const { snapshots, listener } = collect();
    const registration = messages.listen(roomQuery('ABCD', 0), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));

    registration.stop();
    registration.stop();
    await expect(registration.done).resolves.toBeUndefined();

    await messages.add({ roomCode: 'ABCD', timestamp: 1, payload: 'late' });
    await new Promise((resolve) => setImmediate(resolve));
    expect(snapshots).toHaveLength(1);
  });

  it('faults the query when the listener throws', async () => {
    const registration = store.collection('Messages').listen(roomQuery('ABCD', 0), () => {
      throw new Error('listener exploded');
    });
    await expect(registration.done).rejects.toThrow('listener exploded');
  });

  it('faults the query on an invalid field name', async () => {
    const registration = store
      .collection('Messages')
      .listen({ where: [{ field: 'room code', op: '==', value: 'ABCD' }] }, () => undefined);
    await expect(registration.done).rejects.toThrow("Invalid field name: 'room code'");
  });
});

describe('index enforcement', () => {
  let strict: SqliteDocumentStore;

  beforeEach(() => {
    strict = new SqliteDocumentStore({ database: db, pollIntervalMs: 0, enforceIndexes: true });
  });

  afterEach(async () => {
    await strict.terminate();
  });

  it('faults a composite query without its index', async () => {
    const registration = strict.collection('Messages').listen(roomQuery('ABCD', 0), () => undefined);
    await expect(registration.done).rejects.toThrow(
      "The query requires an index. Create it with ensureIndex('Messages', ['roomCode', 'timestamp']).",
    );
  });

  it('runs the query once the index exists', async () => {
    expect(strict.ensureIndex('Messages', ['roomCode', 'timestamp'])).toBe(
      'idx_doc_Messages_roomCode_timestamp',
    );
    const { snapshots, listener } = collect();
    const registration = strict.collection('Messages').listen(roomQuery('ABCD', 0), listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));
    registration.stop();
    await expect(registration.done).resolves.toBeUndefined();
  });

  it('does not require an index for a single-field query', async () => {
    const { snapshots, listener } = collect();
    const registration = strict
      .collection('Messages')
      .listen({ where: [{ field: 'roomCode', op: '==', value: 'ABCD' }] }, listener);
    await vi.waitFor(() => expect(snapshots).toHaveLength(1));
    registration.stop();
  });

  it('names indexes after collection and fields', () => {
    expect(indexName('Messages', ['roomCode', 'timestamp'])).toBe('idx_doc_Messages_roomCode_timestamp');
  });
});

describe('persistence', () => {
  it('replays the cached snapshot to a new listener on the same query', async () => {
    const messages = store.collection('Messages');
    await messages.add({ roomCode: 'ABCD', timestamp: 1, payload: 'cached' });

    const first = collect();
    const a = messages.listen(roomQuery('ABCD', 0), first.listener);
    await vi.waitFor(() => expect(first.snapshots).toHaveLength(1));
    a.stop();

    const second = collect();
    const b = messages.listen(roomQuery('ABCD', 0), second.listener);
    await vi.waitFor(() => expect(second.snapshots).toHaveLength(2));
    expect(second.snapshots[0]?.fromCache).toBe(true);
    expect(payloads(second.snapshots[0])).toEqual(['cached']);
    expect(second.snapshots[1]?.fromCache).toBe(false);
    b.stop();
  });

  it('does not replay after clearPersistence', async () => {
    const messages = store.collection('Messages');
    await messages.add({ roomCode: 'ABCD', timestamp: 1, payload: 'cached' });
    const first = collect();
    const a = messages.listen(roomQuery('ABCD', 0), first.listener);
    await vi.waitFor(() => expect(first.snapshots).toHaveLength(1));
    a.stop();

    await store.clearPersistence();
    const second = collect();
    const b = messages.listen(roomQuery('ABCD', 0), second.listener);
    await vi.waitFor(() => expect(second.snapshots).toHaveLength(1));
    expect(second.snapshots[0]?.fromCache).toBe(false);
    b.stop();
  });

  it('never caches when persistence is disabled', async () => {
    const uncached = new SqliteDocumentStore({ database: db, pollIntervalMs: 0 });
    uncached.configure({ persistenceEnabled: false });
    const messages = uncached.collection('Messages');
    await messages.add({ roomCode: 'ABCD', timestamp: 1, payload: 'x' });

    const first = collect();
    const a = messages.listen(roomQuery('ABCD', 0), first.listener);
    await vi.waitFor(() => expect(first.snapshots).toHaveLength(1));
    a.stop();

    const second = collect();
    const b = messages.listen(roomQuery('ABCD', 0), second.listener);
    await vi.waitFor(() => expect(second.snapshots).toHaveLength(1));
    expect(second.snapshots[0]?.fromCache).toBe(false);
    b.stop();
    await uncached.terminate();
  });

  it('rejects configure after a collection was opened', () => {
    store.collection('Messages');
    expect(() => store.configure({ persistenceEnabled: false })).toThrow(
      'Store settings can only be changed before the first collection is opened',
    );
  });
});

describe('terminate', () => {
  it('stops active listeners', async () => {
    const registration = store.collection('Messages').listen(roomQuery('ABCD', 0), () => undefined);
    await store.terminate();
    await expect(registration.done).resolves.toBeUndefined();
  });

  it('is idempotent', async () => {
    await store.terminate();
    await expect(store.terminate()).resolves.toBeUndefined();
  });

  it('rejects further use', async () => {
    const messages = store.collection('Messages');
    await store.terminate();
    expect(() => store.collection('Messages')).toThrow('Store has been terminated');
    await expect(messages.add({ payload: 'x' })).rejects.toThrow('Store has been terminated');
  });

  it('leaves a shared database open', async () => {
    await store.terminate();
    expect(db.open).toBe(true);
  });

  it('closes a database it opened itself', async () => {
    const owned = new SqliteDocumentStore({ database: ':memory:', pollIntervalMs: 0 });
    const messages = owned.collection('Messages');
    await owned.terminate();
    await expect(messages.add({ payload: 'x' })).rejects.toThrow('Store has been terminated');
  });
});

describe('collection', () => {
  it('rejects names that are not identifiers', () => {
    expect(() => store.collection('my messages')).toThrow("Invalid collection name: 'my messages'");
  });

  it('returns the same collection for the same name', () => {
    expect(store.collection('Messages')).toBe(store.collection('Messages'));
  });
});
