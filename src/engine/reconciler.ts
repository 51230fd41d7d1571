/**
 * surfacewatch — Reconciliation Engine（スコープ登録・発見結果）
 *
 * 名前の一覧を取り込み、作業モードに応じて古いレコードを削除する。
 *
 *   merge        追加・更新のみ
 *   sync         今回のバッチに含まれなかった同タグのレコードを削除
 *   delete       今回のバッチに含まれたレコードを削除
 *   deletebytag  同タグのレコードを全て削除
 *
 * スコープ登録の削除は、同名（または逆引き名が同名）のホストに連鎖する。
 * 削除イベントは全て、行を物理削除する前に発行する。
 */

import Database from 'better-sqlite3';
import { DiscoveryRepository } from '../db/repository/discovery-repository.js';
import { HostRepository } from '../db/repository/host-repository.js';
import type { LastdateWindow } from '../db/repository/target-repository.js';
import { TargetRepository } from '../db/repository/target-repository.js';
import { LookupError } from '../errors.js';
import { classifyIdentifier } from '../parser/identifier.js';
import type { Discovery, Target, Zone } from '../types/entities.js';
import type { ParsedTargetRecord } from '../types/parser.js';
import type {
  EngineContext,
  ReconcileDiscoveriesInput,
  ReconcileResult,
  ReconcileTargetsInput,
  ImportTargetsInput,
  WorkMode,
} from '../types/engine.js';
import { parseJsonObject, parseMetadata, resolveMetadata } from './metadata.js';

export const DELETE_SERVICE_MESSAGE = '[DELETE][OBJECT FROM SERVICES DATABASE]';
export const DELETE_TARGET_MESSAGE = '[DELETE][OBJECT FROM TARGET DATABASE]';
export const DELETE_DISCOVERY_MESSAGE = '[DELETE][OBJECT FROM DISCOVERY DATABASE]';

/** 台帳から取り込んだ新規スコープ登録の通知 */
export function importedTargetMessage(zone: Zone): string {
  return `[NEW][OBJECT INTO ${zone.toUpperCase()} TARGET DATABASE]`;
}

/** 一意制約違反かどうか */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code.startsWith('SQLITE_CONSTRAINT');
}

/** 作業モードに対応する lastdate 条件。merge は削除しないので undefined。 */
function deleteWindow(mode: WorkMode, batchStart: string): LastdateWindow | undefined {
  switch (mode) {
    case 'merge':
      return undefined;
    case 'sync':
      return { before: batchStart };
    case 'delete':
      return { atOrAfter: batchStart };
    case 'deletebytag':
      return {};
    default: {
      const _exhaustive: never = mode;
      throw new Error(`Unknown work mode: ${String(_exhaustive)}`);
    }
  }
}

function cleanNames(names: readonly string[]): string[] {
  return names.map((n) => n.trim()).filter((n) => n !== '');
}

// ============================================================
// スコープ登録
// ============================================================

export function reconcileTargets(ctx: EngineContext, input: ReconcileTargetsInput): ReconcileResult {
  const log = ctx.logger.child({ component: 'reconciler', zone: input.zone, tag: input.tag });
  const repo = new TargetRepository(ctx.db);
  const batchStart = ctx.now().toISOString();
  const result: ReconcileResult = { inserted: 0, updated: 0, skipped: 0, deleted: 0 };

  for (const name of cleanNames(input.names)) {
    const type = classifyIdentifier(name);
    const { metadata, raw } = resolveMetadata(ctx.db, name, input.zone);

    let inserted: boolean;
    try {
      inserted = repo.upsertByName(input.zone, name, {
        type,
        tag: input.tag,
        owner: metadata.owner,
        metadata: raw,
        lastdate: batchStart,
      }).inserted;
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      log.warn({ err, name }, 'duplicated target, skipping');
      result.skipped++;
      continue;
    }

    if (inserted) {
      ctx.delta.emit({
        ...metadata,
        message: `[TARGET][NEW OBJECT][${input.zone.toUpperCase()}]`,
        type,
        name,
        tag: input.tag,
        zone: input.zone,
      });
      result.inserted++;
    } else {
      result.updated++;
    }
  }

  const window = deleteWindow(input.mode, batchStart);
  if (window !== undefined) {
    const candidates = repo.findByTag(input.zone, input.tag, window);
    log.info({ mode: input.mode, candidates: candidates.length }, 'deleting targets');
    result.deleted = deleteTargets(ctx, input.zone, candidates);
  }

  return result;
}

/**
 * 所有者と付帯情報を持つスコープ登録を取り込む。
 *
 * 既存の登録も owner と metadata を台帳の値で上書きする。新規登録の通知には
 * 台帳の 1 件（metadata の JSON）をそのまま展開する。削除は reconcileTargets と同じ。
 */
export function importTargets(ctx: EngineContext, input: ImportTargetsInput): ReconcileResult {
  const log = ctx.logger.child({ component: 'reconciler', zone: input.zone, tag: input.tag });
  const repo = new TargetRepository(ctx.db);
  const batchStart = ctx.now().toISOString();
  const result: ReconcileResult = { inserted: 0, updated: 0, skipped: 0, deleted: 0 };

  for (const record of input.records) {
    const name = record.name.trim();
    if (name === '') {
      result.skipped++;
      continue;
    }
    const type = classifyIdentifier(name);

    let inserted: boolean;
    try {
      inserted = repo.upsertByName(
        input.zone,
        name,
        { type, tag: input.tag, owner: record.owner, metadata: record.metadata, lastdate: batchStart },
        { refreshOwner: true },
      ).inserted;
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      log.warn({ err, name }, 'duplicated target, skipping');
      result.skipped++;
      continue;
    }

    if (inserted) {
      ctx.delta.emit({
        ...unitFields(record),
        message: importedTargetMessage(input.zone),
        type,
        name,
        lastupdate: batchStart,
      });
      result.inserted++;
    } else {
      result.updated++;
    }
  }

  const window = deleteWindow(input.mode, batchStart);
  if (window !== undefined) {
    const candidates = repo.findByTag(input.zone, input.tag, window);
    log.info({ mode: input.mode, candidates: candidates.length }, 'deleting targets');
    result.deleted = deleteTargets(ctx, input.zone, candidates);
  }

  return result;
}

/** 台帳 1 件の項目。壊れた JSON なら owner だけ */
function unitFields(record: ParsedTargetRecord): Record<string, unknown> {
  return { ...parseJsonObject(record.metadata), owner: record.owner };
}

/**
 * スコープ登録を連鎖削除する。
 *
 * 1. 名前または逆引き名が一致するホストごとに SERVICES の削除イベント
 * 2. スコープ登録ごとに TARGET の削除イベント
 * 3. まとめて 1 トランザクションで削除（サービス行・プローブ行はホストに連鎖）
 */
export function deleteTargets(ctx: EngineContext, zone: Zone, targets: readonly Target[]): number {
  if (targets.length === 0) return 0;
  const targetRepo = new TargetRepository(ctx.db);
  const hostRepo = new HostRepository(ctx.db);

  const hosts = hostRepo.findLinked(
    zone,
    targets.map((t) => t.name),
  );

  for (const host of hosts) {
    ctx.delta.emit({
      message: DELETE_SERVICE_MESSAGE,
      type: classifyIdentifier(host.name),
      name: host.name,
      lastupdate: host.lastdate,
    });
  }
  for (const target of targets) {
    ctx.delta.emit({
      message: DELETE_TARGET_MESSAGE,
      type: classifyIdentifier(target.name),
      name: target.name,
      lastupdate: target.lastdate,
    });
  }

  return ctx.db.transaction(() => {
    hostRepo.deleteMany(hosts.map((h) => h.id));
    return targetRepo.deleteMany(targets.map((t) => t.id));
  })();
}

/** 名前を指定してスコープ登録を 1 件削除する。見つからなければ LookupError。 */
export function deleteTarget(ctx: EngineContext, zone: Zone, name: string): void {
  const target = new TargetRepository(ctx.db).findByName(zone, name);
  if (!target) {
    throw new LookupError('target', `${zone}/${name}`);
  }
  deleteTargets(ctx, zone, [target]);
}

// ============================================================
// 発見結果
// ============================================================

export function reconcileDiscoveries(
  ctx: EngineContext,
  input: ReconcileDiscoveriesInput & { owner?: string },
): ReconcileResult {
  const log = ctx.logger.child({ component: 'reconciler', tag: input.tag });
  const repo = new DiscoveryRepository(ctx.db);
  const batchStart = ctx.now().toISOString();
  const owner = input.owner ?? 'Unknown';
  const result: ReconcileResult = { inserted: 0, updated: 0, skipped: 0, deleted: 0 };

  for (const name of cleanNames(input.names)) {
    const type = classifyIdentifier(name);
    const metadata = { owner };

    let inserted: boolean;
    try {
      inserted = repo.upsertByName(name, {
        type,
        tag: input.tag,
        info: '',
        owner,
        metadata: JSON.stringify(metadata),
        lastdate: batchStart,
      }).inserted;
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      log.warn({ err, name }, 'duplicated discovery, skipping');
      result.skipped++;
      continue;
    }

    if (inserted) {
      ctx.delta.emit({ ...metadata, message: '[DISCOVERY][NEW OBJECT]', type, name, tag: input.tag });
      result.inserted++;
    } else {
      result.updated++;
    }
  }

  const window = deleteWindow(input.mode, batchStart);
  if (window !== undefined) {
    const candidates = repo.findByTag(input.tag, window);
    log.info({ mode: input.mode, candidates: candidates.length }, 'deleting discoveries');
    result.deleted = deleteDiscoveries(ctx, candidates);
  }

  return result;
}

/** 発見結果を削除する。行ごとにメタデータ付きの削除イベントを出してから一括削除。 */
export function deleteDiscoveries(ctx: EngineContext, rows: readonly Discovery[]): number {
  if (rows.length === 0) return 0;
  for (const row of rows) {
    ctx.delta.emit({
      ...parseMetadata(row.metadata),
      owner: row.owner,
      message: DELETE_DISCOVERY_MESSAGE,
      type: classifyIdentifier(row.name),
      name: row.name,
      tag: row.tag,
      lastupdate: row.lastdate,
    });
  }
  return new DiscoveryRepository(ctx.db).deleteMany(rows.map((r) => r.id));
}

export function deleteDiscovery(ctx: EngineContext, name: string): void {
  const row = new DiscoveryRepository(ctx.db).findByName(name);
  if (!row) {
    throw new LookupError('discovery', name);
  }
  deleteDiscoveries(ctx, [row]);
}
