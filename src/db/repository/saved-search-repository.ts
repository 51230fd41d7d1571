import type Database from 'better-sqlite3';
import type { SavedSearch } from '../../types/entities.js';
import type { CreateSavedSearchInput } from '../../types/repository.js';

interface SavedSearchRow {
  id: number;
  name: string;
  regexp: string;
  exclude: string;
  tag: string;
  info: string;
}

/** Repository for named search presets. Keyed by name. */
export class SavedSearchRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Create the preset or overwrite the one with the same name. */
  save(input: CreateSavedSearchInput): SavedSearch {
    this.db
      .prepare<[string, string, string, string, string]>(
        `INSERT INTO saved_searches (name, regexp, exclude, tag, info)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (name) DO UPDATE SET
           regexp = excluded.regexp,
           exclude = excluded.exclude,
           tag = excluded.tag,
           info = excluded.info`,
      )
      .run(input.name, input.regexp, input.exclude, input.tag, input.info);

    const saved = this.findByName(input.name);
    if (!saved) {
      throw new Error(`Saved search vanished during save: ${input.name}`);
    }
    return saved;
  }

  findByName(name: string): SavedSearch | undefined {
    return this.db
      .prepare<[string], SavedSearchRow>(
        'SELECT id, name, regexp, exclude, tag, info FROM saved_searches WHERE name = ?',
      )
      .get(name);
  }

  findAll(): SavedSearch[] {
    return this.db
      .prepare<[], SavedSearchRow>(
        'SELECT id, name, regexp, exclude, tag, info FROM saved_searches ORDER BY name',
      )
      .all();
  }

  delete(name: string): boolean {
    return this.db.prepare<[string]>('DELETE FROM saved_searches WHERE name = ?').run(name).changes > 0;
  }
}
