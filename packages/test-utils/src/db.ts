import Database from 'better-sqlite3';
import { SqliteDocumentStore } from '@roomrelay/db';

/**
 * Creates a fresh in-memory database for one test.
 * Share it between stores to simulate several connections to one file.
 */
export function createTestDatabase(): Database.Database {
  return new Database(':memory:');
}

/**
 * Creates a document store on `database` with interval polling disabled;
 * appends through any store on the same connection still wake its listeners.
 */
export function createTestStore(database: Database.Database = createTestDatabase()): SqliteDocumentStore {
  return new SqliteDocumentStore({ database, pollIntervalMs: 0 });
}
