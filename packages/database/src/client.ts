import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { runMigrations } from './migrations.js';
import * as schema from './schema.js';

export type AccountsDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseConnection = {
  db: AccountsDatabase;
  sqlite: Database.Database;
  close: () => void;
};

const MEMORY_URL = ':memory:';

function toFilename(url: string): string {
  return url.startsWith('file:') ? url.slice('file:'.length) : url;
}

/**
 * Open the SQLite database, apply migrations and wrap it in drizzle.
 *
 * `:memory:` gives every call its own isolated database (used by tests).
 */
export function createDatabase(url: string = process.env.DATABASE_URL ?? MEMORY_URL): DatabaseConnection {
  const filename = toFilename(url);
  if (filename !== MEMORY_URL) {
    mkdirSync(dirname(filename), { recursive: true });
  }

  const sqlite = new Database(filename);
  if (filename !== MEMORY_URL) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  runMigrations(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}
