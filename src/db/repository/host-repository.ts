import type Database from 'better-sqlite3';
import type { Host, ProbeLine, ServiceRow, Zone } from '../../types/entities.js';
import type { ServiceDescriptor } from '../../types/parser.js';
import type { CreateHostInput, UpdateHostInput } from '../../types/repository.js';
import { chunked, placeholders, regexpClause, runForIds, toIdentifierType, toZone } from './row-utils.js';

/**
 * Raw row shape returned by better-sqlite3 for the `hosts` table.
 * Column names are snake_case as defined in the schema.
 */
interface HostRow {
  id: number;
  zone: string;
  name: string;
  nname: string;
  ipv4: string;
  type: string;
  tag: string;
  service_ssh: string;
  service_rdp: string;
  service_ftp: string;
  service_telnet: string;
  service_smb: string;
  info: string;
  info_gnmap: string;
  owner: string;
  metadata: string;
  lastdate: string;
  created_at: string;
}

interface ServiceDbRow {
  id: number;
  host_id: number;
  port: string;
  state: string;
  protocol: string;
  owner: string;
  name: string;
  rpc_info: string;
  version: string;
}

interface ProbeLineDbRow {
  id: number;
  host_id: number;
  position: number;
  line: string;
}

const HOST_COLUMNS = `id, zone, name, nname, ipv4, type, tag,
  service_ssh, service_rdp, service_ftp, service_telnet, service_smb,
  info, info_gnmap, owner, metadata, lastdate, created_at`;

/** Maps a snake_case DB row to a camelCase Host entity. */
function rowToHost(row: HostRow): Host {
  return {
    id: row.id,
    zone: toZone(row.zone),
    name: row.name,
    nname: row.nname,
    ipv4: row.ipv4,
    type: toIdentifierType(row.type),
    tag: row.tag,
    serviceSsh: row.service_ssh,
    serviceRdp: row.service_rdp,
    serviceFtp: row.service_ftp,
    serviceTelnet: row.service_telnet,
    serviceSmb: row.service_smb,
    info: row.info,
    infoGnmap: row.info_gnmap,
    owner: row.owner,
    metadata: row.metadata,
    lastdate: row.lastdate,
    createdAt: row.created_at,
  };
}

function rowToService(row: ServiceDbRow): ServiceRow {
  return {
    id: row.id,
    hostId: row.host_id,
    port: row.port,
    state: row.state,
    protocol: row.protocol,
    owner: row.owner,
    name: row.name,
    rpcInfo: row.rpc_info,
    version: row.version,
  };
}

function rowToProbeLine(row: ProbeLineDbRow): ProbeLine {
  return { id: row.id, hostId: row.host_id, position: row.position, line: row.line };
}

/** camelCase field → column for partial updates. */
const UPDATABLE_COLUMNS: ReadonlyArray<readonly [keyof UpdateHostInput, string]> = [
  ['nname', 'nname'],
  ['ipv4', 'ipv4'],
  ['info', 'info'],
  ['infoGnmap', 'info_gnmap'],
  ['owner', 'owner'],
  ['metadata', 'metadata'],
  ['lastdate', 'lastdate'],
  ['serviceSsh', 'service_ssh'],
  ['serviceRdp', 'service_rdp'],
  ['serviceFtp', 'service_ftp'],
  ['serviceTelnet', 'service_telnet'],
  ['serviceSmb', 'service_smb'],
];

/** Search filter over hosts. `owner` is an equality match. */
export interface HostSearch {
  regexp: string;
  exclude?: string;
  owner?: string;
}

/**
 * Repository for the `hosts` table and the rows it owns (`services`,
 * `probe_lines`). Hosts are keyed by (zone, name).
 */
export class HostRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Insert a new Host and return the full entity. */
  create(input: CreateHostInput, now: string = input.lastdate): Host {
    const result = this.db
      .prepare(
        `INSERT INTO hosts (zone, name, nname, ipv4, type, tag,
           service_ssh, service_rdp, service_ftp, service_telnet, service_smb,
           info, info_gnmap, owner, metadata, lastdate, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.zone,
        input.name,
        input.nname,
        input.ipv4,
        input.type,
        input.tag,
        input.serviceSsh,
        input.serviceRdp,
        input.serviceFtp,
        input.serviceTelnet,
        input.serviceSmb,
        input.info,
        input.infoGnmap,
        input.owner,
        input.metadata,
        input.lastdate,
        now,
      );

    return { ...input, id: Number(result.lastInsertRowid), createdAt: now };
  }

  findById(id: number): Host | undefined {
    const row = this.db
      .prepare<[number], HostRow>(`SELECT ${HOST_COLUMNS} FROM hosts WHERE id = ?`)
      .get(id);
    return row ? rowToHost(row) : undefined;
  }

  /** Find a Host by its natural key. Returns undefined if not found. */
  findByName(zone: Zone, name: string): Host | undefined {
    const row = this.db
      .prepare<[string, string], HostRow>(
        `SELECT ${HOST_COLUMNS} FROM hosts WHERE zone = ? AND name = ?`,
      )
      .get(zone, name);
    return row ? rowToHost(row) : undefined;
  }

  /** Hosts whose name or nname is one of `names`, each host once, in id order. */
  findLinked(zone: Zone, names: readonly string[]): Host[] {
    const byId = new Map<number, Host>();
    for (const chunk of chunked(names)) {
      const list = placeholders(chunk.length);
      const rows = this.db
        .prepare<string[], HostRow>(
          `SELECT ${HOST_COLUMNS} FROM hosts
           WHERE zone = ? AND (name IN (${list}) OR nname IN (${list}))`,
        )
        .all(zone, ...chunk, ...chunk);
      for (const row of rows) {
        byId.set(row.id, rowToHost(row));
      }
    }
    return [...byId.values()].sort((a, b) => a.id - b.id);
  }

  findAll(zone: Zone): Host[] {
    return this.db
      .prepare<[string], HostRow>(`SELECT ${HOST_COLUMNS} FROM hosts WHERE zone = ? ORDER BY id`)
      .all(zone)
      .map(rowToHost);
  }

  /** Hosts of one zone carrying exactly `tag`. */
  findByTag(zone: Zone, tag: string): Host[] {
    return this.db
      .prepare<[string, string], HostRow>(`SELECT ${HOST_COLUMNS} FROM hosts WHERE zone = ? AND tag = ? ORDER BY id`)
      .all(zone, tag)
      .map(rowToHost);
  }

  /**
   * Regex search over the scan report, the brute-force fields and the probe
   * lines of each host.
   */
  search(zone: Zone, filter: HostSearch): Host[] {
    const columns = [
      'info',
      'service_ssh',
      'service_rdp',
      'service_ftp',
      'service_smb',
      'service_telnet',
      "COALESCE((SELECT group_concat(p.line, char(10)) FROM probe_lines p WHERE p.host_id = hosts.id), '')",
    ];
    const where = regexpClause(columns, filter.regexp, filter.exclude ?? '');
    let sql = `SELECT ${HOST_COLUMNS} FROM hosts WHERE zone = ? AND ${where.sql}`;
    const params: string[] = [zone, ...where.params];
    if (filter.owner !== undefined && filter.owner !== '') {
      sql += ' AND owner = ?';
      params.push(filter.owner);
    }
    sql += ' ORDER BY id';
    return this.db.prepare<string[], HostRow>(sql).all(...params).map(rowToHost);
  }

  /**
   * Update an existing Host with the provided fields.
   * Returns the updated entity, or undefined if the Host was not found.
   */
  update(id: number, input: UpdateHostInput): Host | undefined {
    const setClauses: string[] = [];
    const params: string[] = [];

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
      .prepare<unknown[]>(`UPDATE hosts SET ${setClauses.join(', ')} WHERE id = ?`)
      .run(...params, id);
    if (result.changes === 0) {
      return undefined;
    }
    return this.findById(id);
  }

  /** Delete Hosts by id; their services and probe lines go with them. */
  deleteMany(ids: readonly number[]): number {
    return runForIds(this.db, ids, (list) => `DELETE FROM hosts WHERE id IN (${list})`);
  }

  // ----------------------------------------------------------
  // services
  // ----------------------------------------------------------

  listServices(hostId: number): ServiceRow[] {
    return this.db
      .prepare<[number], ServiceDbRow>(
        `SELECT id, host_id, port, state, protocol, owner, name, rpc_info, version
         FROM services WHERE host_id = ? ORDER BY id`,
      )
      .all(hostId)
      .map(rowToService);
  }

  /** Replace every service of a host with `services`, in order. */
  replaceServices(hostId: number, services: readonly ServiceDescriptor[]): void {
    const del = this.db.prepare<[number]>('DELETE FROM services WHERE host_id = ?');
    const ins = this.db.prepare<[number, string, string, string, string, string, string, string]>(
      `INSERT INTO services (host_id, port, state, protocol, owner, name, rpc_info, version)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.db.transaction(() => {
      del.run(hostId);
      for (const s of services) {
        ins.run(hostId, s.port, s.state, s.protocol, s.owner, s.name, s.rpcInfo, s.version);
      }
    })();
  }

  // ----------------------------------------------------------
  // probe lines
  // ----------------------------------------------------------

  listProbeLines(hostId: number): ProbeLine[] {
    return this.db
      .prepare<[number], ProbeLineDbRow>(
        'SELECT id, host_id, position, line FROM probe_lines WHERE host_id = ? ORDER BY position',
      )
      .all(hostId)
      .map(rowToProbeLine);
  }

  /** Probe lines joined with newlines, the legacy text form. */
  probeText(hostId: number): string {
    return this.listProbeLines(hostId)
      .map((p) => p.line)
      .join('\n');
  }

  replaceProbeLines(hostId: number, lines: readonly string[]): void {
    const del = this.db.prepare<[number]>('DELETE FROM probe_lines WHERE host_id = ?');
    const ins = this.db.prepare<[number, number, string]>(
      'INSERT INTO probe_lines (host_id, position, line) VALUES (?, ?, ?)',
    );
    this.db.transaction(() => {
      del.run(hostId);
      lines.forEach((line, i) => ins.run(hostId, i, line));
    })();
  }

  appendProbeLine(hostId: number, line: string): void {
    this.db
      .prepare<[number, number, string]>(
        `INSERT INTO probe_lines (host_id, position, line)
         VALUES (?, (SELECT COALESCE(MAX(position) + 1, 0) FROM probe_lines WHERE host_id = ?), ?)`,
      )
      .run(hostId, hostId, line);
  }
}
