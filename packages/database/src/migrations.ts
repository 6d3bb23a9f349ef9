import type Database from 'better-sqlite3';

export type Migration = {
  version: number;
  name: string;
  up: string;
};

/**
 * Migration 001: users, refresh tokens and single-use action tokens
 */
export const INITIAL_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL,
  username TEXT NOT NULL,
  password_hash TEXT NOT NULL,
  recovery_email TEXT,
  phone_number TEXT,
  address TEXT,
  country TEXT,
  bio TEXT,
  role TEXT NOT NULL DEFAULT 'user'
    CHECK (role IN ('admin', 'moderator', 'user')),
  is_active INTEGER NOT NULL DEFAULT 1,
  is_blocked INTEGER NOT NULL DEFAULT 0,
  is_email_verified INTEGER NOT NULL DEFAULT 0,
  last_login_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  deleted_at INTEGER
);

-- Uniqueness only among live accounts; soft-deleted rows release their email/username
CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email_live
  ON users (email) WHERE deleted_at IS NULL;
CREATE UNIQUE INDEX IF NOT EXISTS idx_users_username_live
  ON users (username) WHERE deleted_at IS NULL;
CREATE INDEX IF NOT EXISTS idx_users_created_at ON users (created_at);

CREATE TABLE IF NOT EXISTS refresh_tokens (
  jti TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users (id),
  expires_at INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  revoked_at INTEGER,
  replaced_by TEXT
);

CREATE INDEX IF NOT EXISTS idx_refresh_tokens_user ON refresh_tokens (user_id, revoked_at);
CREATE INDEX IF NOT EXISTS idx_refresh_tokens_expires_at ON refresh_tokens (expires_at);

CREATE TABLE IF NOT EXISTS action_tokens (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users (id),
  purpose TEXT NOT NULL
    CHECK (purpose IN ('password_reset', 'email_verification')),
  hash_envelope TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  consumed_at INTEGER
);

CREATE INDEX IF NOT EXISTS idx_action_tokens_user_purpose ON action_tokens (user_id, purpose);
`;

export const MIGRATIONS: Migration[] = [
  { version: 1, name: '001_initial', up: INITIAL_SCHEMA_SQL },
];

/**
 * Apply pending migrations, tracked through PRAGMA user_version
 * @returns Names of the migrations that ran
 */
export function runMigrations(sqlite: Database.Database, migrations = MIGRATIONS): string[] {
  const current = Number(sqlite.pragma('user_version', { simple: true })) || 0;
  const applied: string[] = [];

  for (const migration of migrations) {
    if (migration.version <= current) {
      continue;
    }
    sqlite.transaction(() => {
      sqlite.exec(migration.up);
      sqlite.pragma(`user_version = ${migration.version}`);
    })();
    applied.push(migration.name);
  }

  return applied;
}
