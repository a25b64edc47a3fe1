import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

import { loadRuntimeConfig, resolveDatabasePath } from '../../infra/config/runtime-config.js';
import { SqliteSessionStore } from '../../infra/persistence/sqlite-session-store.js';

/**
 * Open the SQLite session store named by a database URL (or the configured one)
 */
export function openSessionStore(databaseUrl?: string): SqliteSessionStore {
  const url = databaseUrl ?? loadRuntimeConfig().storage.databaseUrl;
  const dbPath = resolveDatabasePath(url);
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const store = new SqliteSessionStore(new Database(dbPath));
  store.initialize();
  return store;
}
