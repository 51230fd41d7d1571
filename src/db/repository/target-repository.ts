import type Database from 'better-sqlite3';
import type { Target, Zone } from '../../types/entities.js';
import type { TargetFields, UpsertResult } from '../../types/repository.js';
import { regexpClause, runForIds, toIdentifierType, toZone } from './row-utils.js';

/**
 * Raw row shape returned by better-sqlite3 for the `targets` table.
 * Column names are snake_case as defined in the schema.
 */
interface TargetRow {
  id: number;
  zone: string;
  name: string;
  type: string;
  tag: string;
  owner: string;
  metadata: string;
  lastdate: string;
  created_at: string;
}

const COLUMNS = 'id, zone, name, type, tag, owner, metadata, lastdate, created_at';

/** Maps a snake_case DB row to a camelCase Target entity. */
function rowToTarget(row: TargetRow): Target {
  return {
    id: row.id,
    zone: toZone(row.zone),
    name: row.name,
    type: toIdentifierType(row.type),
    tag: row.tag,
    owner: row.owner,
    metadata: row.metadata,
    lastdate: row.lastdate,
    createdAt: row.created_at,
  };
}

/** Optional `lastdate` window applied by {@link TargetRepository.findByTag}. */
export interface LastdateWindow {
  /** lastdate < before */
  before?: string;
  /** lastdate >= atOrAfter */
  atOrAfter?: string;
}

/**
 * Repository for the `targets` table (the external and internal scope
 * registries). Rows are keyed by (zone, name).
 */
export class TargetRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Insert the target or refresh an existing one with the same (zone, name).
   * On conflict only type, tag and lastdate change; owner and metadata keep
   * their stored values unless `refreshOwner` is set.
   */
  upsertByName(
    zone: Zone,
    name: string,
    fields: TargetFields,
    options: { refreshOwner?: boolean } = {},
  ): UpsertResult<Target> {
    const inserted = this.db
      .prepare<[string, string, string, string, string, string, string, string]>(
        `INSERT INTO targets (zone, name, type, tag, owner, metadata, lastdate, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (zone, name) DO NOTHING`,
      )
      .run(
        zone,
        name,
        fields.type,
        fields.tag,
        fields.owner,
        fields.metadata,
        fields.lastdate,
        fields.lastdate,
      ).changes > 0;

    if (!inserted && options.refreshOwner === true) {
      this.db
        .prepare<[string, string, string, string, string, string, string]>(
          `UPDATE targets SET type = ?, tag = ?, owner = ?, metadata = ?, lastdate = ?
           WHERE zone = ? AND name = ?`,
        )
        .run(fields.type, fields.tag, fields.owner, fields.metadata, fields.lastdate, zone, name);
    } else if (!inserted) {
      this.db
        .prepare<[string, string, string, string, string]>(
          'UPDATE targets SET type = ?, tag = ?, lastdate = ? WHERE zone = ? AND name = ?',
        )
        .run(fields.type, fields.tag, fields.lastdate, zone, name);
    }

    const record = this.findByName(zone, name);
    if (!record) {
      throw new Error(`Target vanished during upsert: ${zone}/${name}`);
    }
    return { record, inserted };
  }

  /** Find a Target by its natural key. Returns undefined if not found. */
  findByName(zone: Zone, name: string): Target | undefined {
    const row = this.db
      .prepare<[string, string], TargetRow>(
        `SELECT ${COLUMNS} FROM targets WHERE zone = ? AND name = ?`,
      )
      .get(zone, name);
    return row ? rowToTarget(row) : undefined;
  }

  /** Targets of a zone carrying `tag`, optionally narrowed by lastdate. */
  findByTag(zone: Zone, tag: string, window: LastdateWindow = {}): Target[] {
    let sql = `SELECT ${COLUMNS} FROM targets WHERE zone = ? AND tag = ?`;
    const params: string[] = [zone, tag];
    if (window.before !== undefined) {
      sql += ' AND lastdate < ?';
      params.push(window.before);
    }
    if (window.atOrAfter !== undefined) {
      sql += ' AND lastdate >= ?';
      params.push(window.atOrAfter);
    }
    sql += ' ORDER BY id';
    return this.db.prepare<string[], TargetRow>(sql).all(...params).map(rowToTarget);
  }

  /** Return all Targets of a zone. */
  findAll(zone: Zone): Target[] {
    return this.db
      .prepare<[string], TargetRow>(`SELECT ${COLUMNS} FROM targets WHERE zone = ? ORDER BY id`)
      .all(zone)
      .map(rowToTarget);
  }

  /** Regex search over name and metadata. */
  search(zone: Zone, regexp: string, exclude = ''): Target[] {
    const where = regexpClause(['name', 'metadata'], regexp, exclude);
    return this.db
      .prepare<string[], TargetRow>(
        `SELECT ${COLUMNS} FROM targets WHERE zone = ? AND ${where.sql} ORDER BY id`,
      )
      .all(zone, ...where.params)
      .map(rowToTarget);
  }

  /** Delete Targets by id. Returns the number of rows deleted. */
  deleteMany(ids: readonly number[]): number {
    return runForIds(this.db, ids, (list) => `DELETE FROM targets WHERE id IN (${list})`);
  }
}
