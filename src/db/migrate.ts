import type Database from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';
import { getSchemaVersion, setSchemaVersion, runMigrations, LATEST_VERSION } from './migrations/index.js';

/**
 * Per-connection SQL functions. `REGEXP` backs the `x REGEXP y` operator used
 * by record searches; an invalid pattern matches nothing instead of failing
 * the whole statement.
 */
export function registerSqlFunctions(db: Database.Database): void {
  const cache = new Map<string, RegExp | null>();

  db.function('regexp', { deterministic: true }, (pattern: unknown, value: unknown) => {
    if (typeof pattern !== 'string' || typeof value !== 'string') return 0;
    let re = cache.get(pattern);
    if (re === undefined) {
      try {
        re = new RegExp(pattern);
      } catch {
        re = null;
      }
      cache.set(pattern, re);
    }
    return re !== null && re.test(value) ? 1 : 0;
  });
}

/**
 * Prepare a connection and bring its schema to the latest version.
 *
 * - New database (user_version = 0, no tables): runs full schema SQL and sets version.
 * - Existing database below LATEST_VERSION: runs incremental migrations, then
 *   the schema SQL so that indexes added later exist too.
 * - Already up to date: schema SQL only (every statement is IF NOT EXISTS).
 */
export function migrateDatabase(db: Database.Database): void {
  db.pragma('foreign_keys = ON');
  registerSqlFunctions(db);

  const currentVersion = getSchemaVersion(db);
  if (currentVersion >= LATEST_VERSION) {
    db.exec(SCHEMA_SQL);
    return;
  }

  const row = db
    .prepare<[], { cnt: number }>(
      "SELECT COUNT(*) AS cnt FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'",
    )
    .get();

  if (currentVersion === 0 && (row?.cnt ?? 0) === 0) {
    db.exec(SCHEMA_SQL);
    setSchemaVersion(db, LATEST_VERSION);
    return;
  }

  runMigrations(db, currentVersion);
  db.exec(SCHEMA_SQL);
}
