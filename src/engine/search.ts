/**
 * surfacewatch — 正規表現検索
 *
 * レコード集合ごとに検索対象の列が決まっている。
 *   discovery / targets / intargets: name, metadata
 *   services / inservices: info, ブルートフォース欄, プローブ行（owner は完全一致でも拾う）
 *   nuclei: full_uri, vulnerability, metadata
 */

import type Database from 'better-sqlite3';
import { DiscoveryRepository } from '../db/repository/discovery-repository.js';
import { FindingRepository } from '../db/repository/finding-repository.js';
import { HostRepository } from '../db/repository/host-repository.js';
import { SavedSearchRepository } from '../db/repository/saved-search-repository.js';
import { TargetRepository } from '../db/repository/target-repository.js';
import { LookupError } from '../errors.js';
import type { Host, RecordSet, SavedSearch, Zone } from '../types/entities.js';

export interface SearchQuery {
  recordSet: RecordSet;
  regexp: string;
  exclude?: string;
  /** services / inservices のみ。指定時は owner が一致するホストに絞る */
  owner?: string;
}

export interface SearchHit {
  recordSet: RecordSet;
  id: number;
  name: string;
  /** 一覧表示用の補足（ipv4、タグ、脆弱性名など） */
  detail: string;
}

function searchHosts(db: Database.Database, zone: Zone, query: SearchQuery): Host[] {
  const repo = new HostRepository(db);
  const exclude = query.exclude ?? '';
  const byRegexp = repo.search(zone, { regexp: query.regexp, exclude, owner: query.owner });
  const seen = new Set(byRegexp.map((h) => h.id));
  const ownerFilter = query.owner ?? '';
  const byOwner = repo
    .findAll(zone)
    .filter(
      (h) =>
        h.owner === query.regexp &&
        h.owner !== exclude &&
        (ownerFilter === '' || h.owner === ownerFilter) &&
        !seen.has(h.id),
    );
  return [...byRegexp, ...byOwner].sort((a, b) => a.id - b.id);
}

export function searchRecords(db: Database.Database, query: SearchQuery): SearchHit[] {
  const exclude = query.exclude ?? '';
  const { recordSet } = query;

  switch (recordSet) {
    case 'discovery':
      return new DiscoveryRepository(db)
        .search(query.regexp, exclude)
        .map((d) => ({ recordSet, id: d.id, name: d.name, detail: d.tag }));
    case 'targets':
    case 'intargets': {
      const zone: Zone = recordSet === 'targets' ? 'external' : 'internal';
      return new TargetRepository(db)
        .search(zone, query.regexp, exclude)
        .map((t) => ({ recordSet, id: t.id, name: t.name, detail: t.tag }));
    }
    case 'services':
    case 'inservices': {
      const zone: Zone = recordSet === 'services' ? 'external' : 'internal';
      return searchHosts(db, zone, query).map((h) => ({
        recordSet,
        id: h.id,
        name: h.name,
        detail: h.ipv4,
      }));
    }
    case 'nuclei':
      return new FindingRepository(db)
        .search(query.regexp, exclude)
        .map((f) => ({ recordSet, id: f.id, name: f.name, detail: f.vulnerability }));
    default: {
      const _exhaustive: never = recordSet;
      throw new Error(`Unknown record set: ${String(_exhaustive)}`);
    }
  }
}

// ============================================================
// 保存済み検索
// ============================================================

export function saveSearch(
  db: Database.Database,
  input: { name: string; regexp: string; exclude?: string; tag?: string; info?: string },
): SavedSearch {
  return new SavedSearchRepository(db).save({
    name: input.name,
    regexp: input.regexp,
    exclude: input.exclude ?? '',
    tag: input.tag ?? '',
    info: input.info ?? '',
  });
}

export function listSavedSearches(db: Database.Database): SavedSearch[] {
  return new SavedSearchRepository(db).findAll();
}

export function deleteSavedSearch(db: Database.Database, name: string): void {
  if (!new SavedSearchRepository(db).delete(name)) {
    throw new LookupError('saved search', name);
  }
}

/** 保存済み検索の条件で検索する */
export function runSavedSearch(
  db: Database.Database,
  name: string,
  recordSet: RecordSet,
): SearchHit[] {
  const saved = new SavedSearchRepository(db).findByName(name);
  if (saved === undefined) {
    throw new LookupError('saved search', name);
  }
  return searchRecords(db, { recordSet, regexp: saved.regexp, exclude: saved.exclude });
}
