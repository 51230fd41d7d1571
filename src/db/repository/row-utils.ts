import type Database from 'better-sqlite3';
import {
  IDENTIFIER_TYPES,
  RECORD_SETS,
  ZONES,
  type IdentifierType,
  type RecordSet,
  type ScopeCode,
  type TriageStatus,
  type Zone,
} from '../../types/entities.js';

/**
 * Narrow a TEXT column to one of a fixed set of literals.
 * Values outside the set fall back to `fallback`.
 */
export function narrowLiteral<T extends string>(
  values: readonly T[],
  value: string,
  fallback: T,
): T {
  for (const candidate of values) {
    if (candidate === value) return candidate;
  }
  return fallback;
}

export function toIdentifierType(value: string): IdentifierType {
  return narrowLiteral(IDENTIFIER_TYPES, value, 'UNKNOWN');
}

export function toZone(value: string): Zone {
  return narrowLiteral(ZONES, value, 'external');
}

export function toRecordSet(value: string): RecordSet {
  return narrowLiteral(RECORD_SETS, value, 'discovery');
}

export function toScopeCode(value: string): ScopeCode {
  return value === 'I' ? 'I' : 'E';
}

export function toTriageStatus(value: number): TriageStatus {
  if (value === 1) return 1;
  if (value === 0) return 0;
  return -1;
}

/** Build `(?, ?, ...)` for an IN clause. */
export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

/** Most values bound to one `IN (...)` list; keeps statements under SQLite's variable limit. */
export const IN_CHUNK_SIZE = 500;

/** Split `items` into consecutive slices of at most `size`. */
export function chunked<T>(items: readonly T[], size: number = IN_CHUNK_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Run a write statement over `ids` in chunks inside one transaction and
 * return the total number of changed rows. `sql` receives the placeholder list.
 */
export function runForIds(
  db: Database.Database,
  ids: readonly number[],
  sql: (list: string) => string,
  leading: readonly (string | number)[] = [],
): number {
  if (ids.length === 0) return 0;
  return db.transaction(() =>
    chunked(ids).reduce(
      (total, chunk) =>
        total + db.prepare<unknown[]>(sql(placeholders(chunk.length))).run(...leading, ...chunk).changes,
      0,
    ),
  )();
}

/**
 * Regex include / exclude predicate over a set of text columns.
 * Produces `(a REGEXP ? OR b REGEXP ?)` and, when `exclude` is non-empty,
 * `AND NOT (a REGEXP ? OR b REGEXP ?)`.
 */
export function regexpClause(
  columns: readonly string[],
  regexp: string,
  exclude: string,
): { sql: string; params: string[] } {
  const anyOf = `(${columns.map((c) => `${c} REGEXP ?`).join(' OR ')})`;
  const params: string[] = columns.map(() => regexp);
  let sql = anyOf;
  if (exclude !== '') {
    sql += ` AND NOT ${anyOf}`;
    params.push(...columns.map(() => exclude));
  }
  return { sql, params };
}
