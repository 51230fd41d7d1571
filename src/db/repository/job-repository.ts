import type Database from 'better-sqlite3';
import type { Job } from '../../types/entities.js';
import type { CreateJobInput } from '../../types/repository.js';
import { toRecordSet } from './row-utils.js';

interface JobRow {
  id: number;
  name: string;
  input: string;
  module: string;
  regexp: string;
  exclude: string;
  tag: string;
  info: string;
  created_at: string;
}

const COLUMNS = 'id, name, input, module, regexp, exclude, tag, info, created_at';

function rowToJob(row: JobRow): Job {
  return {
    id: row.id,
    name: row.name,
    input: toRecordSet(row.input),
    module: row.module,
    regexp: row.regexp,
    exclude: row.exclude,
    tag: row.tag,
    info: row.info,
    createdAt: row.created_at,
  };
}

/** Repository for the `jobs` table. */
export class JobRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  create(input: CreateJobInput, now: string = new Date().toISOString()): Job {
    const result = this.db
      .prepare<[string, string, string, string, string, string, string, string]>(
        `INSERT INTO jobs (name, input, module, regexp, exclude, tag, info, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.name,
        input.input,
        input.module,
        input.regexp,
        input.exclude,
        input.tag,
        input.info,
        now,
      );
    return { ...input, id: Number(result.lastInsertRowid), createdAt: now };
  }

  findById(id: number): Job | undefined {
    const row = this.db
      .prepare<[number], JobRow>(`SELECT ${COLUMNS} FROM jobs WHERE id = ?`)
      .get(id);
    return row ? rowToJob(row) : undefined;
  }

  findByName(name: string): Job | undefined {
    const row = this.db
      .prepare<[string], JobRow>(`SELECT ${COLUMNS} FROM jobs WHERE name = ?`)
      .get(name);
    return row ? rowToJob(row) : undefined;
  }

  findAll(): Job[] {
    return this.db
      .prepare<[], JobRow>(`SELECT ${COLUMNS} FROM jobs ORDER BY id`)
      .all()
      .map(rowToJob);
  }

  /** Delete a Job by id. Returns true if a row was deleted. */
  delete(id: number): boolean {
    return this.db.prepare<[number]>('DELETE FROM jobs WHERE id = ?').run(id).changes > 0;
  }
}
