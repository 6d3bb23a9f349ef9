import Database from 'better-sqlite3';

export type UniqueViolation = {
  table: string;
  column: string;
};

// better-sqlite3 reports SQLITE_CONSTRAINT_UNIQUE as "UNIQUE constraint failed: users.email"
const UNIQUE_MESSAGE = /UNIQUE constraint failed: (\w+)\.(\w+)/;
const MAX_CAUSE_DEPTH = 5;

/**
 * First SqliteError in an error's cause chain, if any
 */
export function findSqliteError(error: unknown): InstanceType<typeof Database.SqliteError> | null {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if (current instanceof Database.SqliteError) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

/**
 * Detect a SQLite unique violation anywhere in an error's cause chain
 */
export function findUniqueViolation(error: unknown): UniqueViolation | null {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    const match = UNIQUE_MESSAGE.exec(current.message);
    if (match?.[1] && match[2]) {
      return { table: match[1], column: match[2] };
    }
    current = current.cause;
  }
  return null;
}

export function isCheckViolation(error: unknown): boolean {
  return findSqliteError(error)?.code === 'SQLITE_CONSTRAINT_CHECK';
}
