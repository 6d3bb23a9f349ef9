/**
 * @accounts/database
 *
 * SQLite persistence: drizzle schema, raw SQL migrations and the connection factory.
 */

export * from './schema.js';
export { createDatabase, type AccountsDatabase, type DatabaseConnection } from './client.js';
export { INITIAL_SCHEMA_SQL, MIGRATIONS, runMigrations, type Migration } from './migrations.js';
export {
  findSqliteError,
  findUniqueViolation,
  isCheckViolation,
  type UniqueViolation,
} from './errors.js';
