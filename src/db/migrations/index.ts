/**
 * surfacewatch — Database migration registry
 *
 * Schema versions are tracked in SQLite's PRAGMA user_version. SCHEMA_SQL
 * is version 1. A fresh database gets SCHEMA_SQL directly and is stamped with
 * LATEST_VERSION; older databases replay the migrations above their stamp.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  description: string;
  up(db: Database.Database): void;
}

/** Version written by SCHEMA_SQL itself. */
export const BASE_VERSION = 1;

/** Sorted by version ascending. Each entry upgrades from the version below it. */
const MIGRATIONS: readonly Migration[] = [];

export const LATEST_VERSION: number = MIGRATIONS.reduce(
  (latest, m) => Math.max(latest, m.version),
  BASE_VERSION,
);

export function getSchemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

export function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${Math.trunc(version)}`);
}

/** Migrations that still have to run for a database stamped with `currentVersion`. */
export function pendingMigrations(currentVersion: number): Migration[] {
  const from = Math.max(currentVersion, BASE_VERSION);
  return MIGRATIONS.filter((m) => m.version > from);
}

/**
 * Apply every pending migration, each inside its own transaction, then stamp
 * the database with LATEST_VERSION. Returns the versions that were applied.
 */
export function runMigrations(db: Database.Database, currentVersion: number): number[] {
  const applied: number[] = [];
  for (const migration of pendingMigrations(currentVersion)) {
    db.transaction(() => migration.up(db))();
    applied.push(migration.version);
  }
  setSchemaVersion(db, LATEST_VERSION);
  return applied;
}
