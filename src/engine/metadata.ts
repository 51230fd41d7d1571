/**
 * surfacewatch — Metadata Resolver
 *
 * 識別子の所有者・スコープ・タグをスコープ登録（targets）から引く。
 * internal で見つからなければ external を、そこにも無ければ既定値を返す。
 */

import type Database from 'better-sqlite3';
import { TargetRepository } from '../db/repository/target-repository.js';
import type { Zone } from '../types/entities.js';

export interface ResolvedMetadata {
  owner: string;
  scope: string;
  tag: string;
  [key: string]: unknown;
}

export interface MetadataLookup {
  metadata: ResolvedMetadata;
  /** 登録済みの生 JSON（既定値の場合はそのシリアライズ） */
  raw: string;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** JSON オブジェクトとして読む。壊れた JSON やオブジェクト以外は空。 */
export function parseJsonObject(raw: string): Record<string, unknown> {
  if (raw.length <= 1) return {};
  try {
    const value: unknown = JSON.parse(raw);
    return isPlainObject(value) ? value : {};
  } catch {
    return {};
  }
}

/**
 * 保存済みのメタデータ JSON を読む。壊れた JSON やオブジェクト以外は空として扱い、
 * owner / scope / tag が欠けていれば既定値で埋める。
 */
export function parseMetadata(raw: string, scope = 'Untracked'): ResolvedMetadata {
  const parsed = parseJsonObject(raw);

  return {
    ...parsed,
    owner: typeof parsed['owner'] === 'string' ? parsed['owner'] : 'Unknown',
    scope: typeof parsed['scope'] === 'string' ? parsed['scope'] : scope,
    tag: typeof parsed['tag'] === 'string' ? parsed['tag'] : 'new',
  };
}

/** 識別子のメタデータを解決する */
export function resolveMetadata(
  db: Database.Database,
  name: string,
  zone: Zone = 'internal',
): MetadataLookup {
  const target = new TargetRepository(db).findByName(zone, name);
  if (target) {
    return { metadata: parseMetadata(target.metadata, zone), raw: target.metadata };
  }
  if (zone === 'internal') {
    return resolveMetadata(db, name, 'external');
  }
  const metadata: ResolvedMetadata = { scope: zone, owner: 'Unknown', tag: 'new' };
  return { metadata, raw: JSON.stringify(metadata) };
}

/** レコードに保存済みのメタデータへ解決結果を上書きマージした JSON */
export function mergeMetadata(storedRaw: string, resolved: ResolvedMetadata): string {
  return JSON.stringify({ ...parseMetadata(storedRaw), ...resolved });
}
