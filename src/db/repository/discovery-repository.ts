import type Database from 'better-sqlite3';
import type { Discovery } from '../../types/entities.js';
import type {
  DiscoveryFields,
  UpdateDiscoveryInput,
  UpsertResult,
} from '../../types/repository.js';
import { regexpClause, runForIds, toIdentifierType } from './row-utils.js';
import type { LastdateWindow } from './target-repository.js';

interface DiscoveryRow {
  id: number;
  name: string;
  type: string;
  tag: string;
  info: string;
  owner: string;
  metadata: string;
  lastdate: string;
  created_at: string;
}

const COLUMNS = 'id, name, type, tag, info, owner, metadata, lastdate, created_at';

function rowToDiscovery(row: DiscoveryRow): Discovery {
  return {
    id: row.id,
    name: row.name,
    type: toIdentifierType(row.type),
    tag: row.tag,
    info: row.info,
    owner: row.owner,
    metadata: row.metadata,
    lastdate: row.lastdate,
    createdAt: row.created_at,
  };
}

/**
 * Repository for the `discoveries` table (subdomain enumeration results).
 * Rows are keyed by name.
 */
export class DiscoveryRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Insert a discovery, or on resighting refresh only `info`, `tag` and
   * `lastdate`. Owner, metadata and type keep their first-seen values; an
   * empty `info` keeps the stored one.
   */
  upsertByName(name: string, fields: DiscoveryFields): UpsertResult<Discovery> {
    const inserted = this.db
      .prepare<[string, string, string, string, string, string, string, string]>(
        `INSERT INTO discoveries (name, type, tag, info, owner, metadata, lastdate, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (name) DO NOTHING`,
      )
      .run(
        name,
        fields.type,
        fields.tag,
        fields.info,
        fields.owner,
        fields.metadata,
        fields.lastdate,
        fields.lastdate,
      ).changes > 0;

    if (!inserted) {
      this.update(name, {
        tag: fields.tag,
        lastdate: fields.lastdate,
        ...(fields.info !== '' ? { info: fields.info } : {}),
      });
    }

    const record = this.findByName(name);
    if (!record) {
      throw new Error(`Discovery vanished during upsert: ${name}`);
    }
    return { record, inserted };
  }

  findByName(name: string): Discovery | undefined {
    const row = this.db
      .prepare<[string], DiscoveryRow>(`SELECT ${COLUMNS} FROM discoveries WHERE name = ?`)
      .get(name);
    return row ? rowToDiscovery(row) : undefined;
  }

  findByTag(tag: string, window: LastdateWindow = {}): Discovery[] {
    let sql = `SELECT ${COLUMNS} FROM discoveries WHERE tag = ?`;
    const params: string[] = [tag];
    if (window.before !== undefined) {
      sql += ' AND lastdate < ?';
      params.push(window.before);
    }
    if (window.atOrAfter !== undefined) {
      sql += ' AND lastdate >= ?';
      params.push(window.atOrAfter);
    }
    sql += ' ORDER BY id';
    return this.db.prepare<string[], DiscoveryRow>(sql).all(...params).map(rowToDiscovery);
  }

  findAll(): Discovery[] {
    return this.db
      .prepare<[], DiscoveryRow>(`SELECT ${COLUMNS} FROM discoveries ORDER BY id`)
      .all()
      .map(rowToDiscovery);
  }

  /** Regex search over name and metadata. */
  search(regexp: string, exclude = ''): Discovery[] {
    const where = regexpClause(['name', 'metadata'], regexp, exclude);
    return this.db
      .prepare<string[], DiscoveryRow>(
        `SELECT ${COLUMNS} FROM discoveries WHERE ${where.sql} ORDER BY id`,
      )
      .all(...where.params)
      .map(rowToDiscovery);
  }

  /** Update by name. Returns true if a row changed. */
  update(name: string, input: UpdateDiscoveryInput): boolean {
    const setClauses: string[] = [];
    const params: string[] = [];

    if (input.tag !== undefined) {
      setClauses.push('tag = ?');
      params.push(input.tag);
    }
    if (input.info !== undefined) {
      setClauses.push('info = ?');
      params.push(input.info);
    }
    if (input.lastdate !== undefined) {
      setClauses.push('lastdate = ?');
      params.push(input.lastdate);
    }
    if (setClauses.length === 0) return false;

    params.push(name);
    const result = this.db
      .prepare<string[]>(`UPDATE discoveries SET ${setClauses.join(', ')} WHERE name = ?`)
      .run(...params);
    return result.changes > 0;
  }

  deleteMany(ids: readonly number[]): number {
    return runForIds(this.db, ids, (list) => `DELETE FROM discoveries WHERE id IN (${list})`);
  }
}
