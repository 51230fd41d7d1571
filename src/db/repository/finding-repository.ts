import type Database from 'better-sqlite3';
import type { Finding, TriageStatus } from '../../types/entities.js';
import type { CreateFindingInput, UpdateFindingInput } from '../../types/repository.js';
import {
  regexpClause,
  runForIds,
  toIdentifierType,
  toScopeCode,
  toTriageStatus,
} from './row-utils.js';

/**
 * Raw row shape returned by better-sqlite3 for the `findings` table.
 * Column names are snake_case as defined in the schema.
 */
interface FindingRow {
  id: number;
  name: string;
  vulnerability: string;
  tfp: number;
  type: string;
  ipv4: string;
  ipv6: string;
  level: string;
  scope: string;
  engine: string;
  status: string;
  detectiondate: string;
  firstdate: string;
  lastdate: string;
  bumpdate: string;
  ptime: string;
  uri: string;
  full_uri: string;
  uri_truncated: number;
  port: number;
  protocol: string;
  nname: string;
  owner: string;
  metadata: string;
  info: string;
  ticket: string | null;
}

const COLUMNS = `id, name, vulnerability, tfp, type, ipv4, ipv6, level, scope, engine, status,
  detectiondate, firstdate, lastdate, bumpdate, ptime, uri, full_uri, uri_truncated, port,
  protocol, nname, owner, metadata, info, ticket`;

/** Maps a snake_case DB row to a camelCase Finding entity. */
function rowToFinding(row: FindingRow): Finding {
  const finding: Finding = {
    id: row.id,
    name: row.name,
    vulnerability: row.vulnerability,
    tfp: toTriageStatus(row.tfp),
    type: toIdentifierType(row.type),
    ipv4: row.ipv4,
    ipv6: row.ipv6,
    level: row.level,
    scope: toScopeCode(row.scope),
    engine: row.engine,
    status: row.status,
    detectiondate: row.detectiondate,
    firstdate: row.firstdate,
    lastdate: row.lastdate,
    bumpdate: row.bumpdate,
    ptime: row.ptime,
    uri: row.uri,
    fullUri: row.full_uri,
    uriTruncated: row.uri_truncated === 1 ? 1 : 0,
    port: row.port,
    protocol: row.protocol,
    nname: row.nname,
    owner: row.owner,
    metadata: row.metadata,
    info: row.info,
  };
  if (row.ticket !== null) {
    finding.ticket = row.ticket;
  }
  return finding;
}

const UPDATABLE_COLUMNS: ReadonlyArray<readonly [keyof UpdateFindingInput, string]> = [
  ['tfp', 'tfp'],
  ['level', 'level'],
  ['engine', 'engine'],
  ['status', 'status'],
  ['lastdate', 'lastdate'],
  ['bumpdate', 'bumpdate'],
  ['ptime', 'ptime'],
  ['uri', 'uri'],
  ['fullUri', 'full_uri'],
  ['uriTruncated', 'uri_truncated'],
  ['port', 'port'],
  ['nname', 'nname'],
  ['owner', 'owner'],
  ['metadata', 'metadata'],
  ['info', 'info'],
  ['ticket', 'ticket'],
];

/**
 * Repository for the `findings` table.
 * Findings are keyed by (name, vulnerability).
 */
export class FindingRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new Finding and return the full entity. */
  create(input: CreateFindingInput): Finding {
    const result = this.db
      .prepare(
        `INSERT INTO findings (name, vulnerability, tfp, type, ipv4, ipv6, level, scope, engine,
           status, detectiondate, firstdate, lastdate, bumpdate, ptime, uri, full_uri,
           uri_truncated, port, protocol, nname, owner, metadata, info, ticket)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.name,
        input.vulnerability,
        input.tfp,
        input.type,
        input.ipv4,
        input.ipv6,
        input.level,
        input.scope,
        input.engine,
        input.status,
        input.detectiondate,
        input.firstdate,
        input.lastdate,
        input.bumpdate,
        input.ptime,
        input.uri,
        input.fullUri,
        input.uriTruncated,
        input.port,
        input.protocol,
        input.nname,
        input.owner,
        input.metadata,
        input.info,
        input.ticket ?? null,
      );

    return { ...input, id: Number(result.lastInsertRowid) };
  }

  findById(id: number): Finding | undefined {
    const row = this.db
      .prepare<[number], FindingRow>(`SELECT ${COLUMNS} FROM findings WHERE id = ?`)
      .get(id);
    return row ? rowToFinding(row) : undefined;
  }

  /** Find a Finding by its natural key. Returns undefined if not found. */
  findByKey(name: string, vulnerability: string): Finding | undefined {
    const row = this.db
      .prepare<[string, string], FindingRow>(
        `SELECT ${COLUMNS} FROM findings WHERE name = ? AND vulnerability = ?`,
      )
      .get(name, vulnerability);
    return row ? rowToFinding(row) : undefined;
  }

  /** Every finding of a host name. */
  findByName(name: string): Finding[] {
    return this.db
      .prepare<[string], FindingRow>(`SELECT ${COLUMNS} FROM findings WHERE name = ? ORDER BY id`)
      .all(name)
      .map(rowToFinding);
  }

  findAll(): Finding[] {
    return this.db
      .prepare<[], FindingRow>(`SELECT ${COLUMNS} FROM findings ORDER BY id`)
      .all()
      .map(rowToFinding);
  }

  /** Regex search over full URI, vulnerability and metadata. */
  search(regexp: string, exclude = ''): Finding[] {
    const where = regexpClause(['full_uri', 'vulnerability', 'metadata'], regexp, exclude);
    return this.db
      .prepare<string[], FindingRow>(`SELECT ${COLUMNS} FROM findings WHERE ${where.sql} ORDER BY id`)
      .all(...where.params)
      .map(rowToFinding);
  }

  /** Findings whose review deadline has passed. */
  findDue(now: string): Finding[] {
    return this.db
      .prepare<[string], FindingRow>(
        `SELECT ${COLUMNS} FROM findings WHERE bumpdate < ? ORDER BY bumpdate, id`,
      )
      .all(now)
      .map(rowToFinding);
  }

  /** Findings not re-observed since `before`. */
  findUnseenSince(before: string): Finding[] {
    return this.db
      .prepare<[string], FindingRow>(
        `SELECT ${COLUMNS} FROM findings WHERE lastdate < ? ORDER BY id`,
      )
      .all(before)
      .map(rowToFinding);
  }

  /**
   * Update an existing Finding with the provided fields.
   * Returns the updated entity, or undefined if the Finding was not found.
   */
  update(id: number, input: UpdateFindingInput): Finding | undefined {
    const setClauses: string[] = [];
    const params: Array<string | number> = [];

    for (const [field, column] of UPDATABLE_COLUMNS) {
      const value = input[field];
      if (value !== undefined) {
        setClauses.push(`${column} = ?`);
        params.push(value);
      }
    }

    if (setClauses.length === 0) {
      return this.findById(id);
    }

    const result = this.db
      .prepare<Array<string | number>>(`UPDATE findings SET ${setClauses.join(', ')} WHERE id = ?`)
      .run(...params, id);
    if (result.changes === 0) {
      return undefined;
    }
    return this.findById(id);
  }

  /** Set the triage status of many findings. Returns the number updated. */
  setTriage(ids: readonly number[], tfp: TriageStatus): number {
    return runForIds(this.db, ids, (list) => `UPDATE findings SET tfp = ? WHERE id IN (${list})`, [tfp]);
  }

  deleteMany(ids: readonly number[]): number {
    return runForIds(this.db, ids, (list) => `DELETE FROM findings WHERE id IN (${list})`);
  }

  /** Delete every finding. Returns the number of rows deleted. */
  deleteAll(): number {
    return this.db.prepare('DELETE FROM findings').run().changes;
  }
}
