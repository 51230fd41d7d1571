/**
 * surfacewatch — Vulnerability Lifecycle Manager
 *
 * Finding の upsert、トリアージ（tfp）、対応期限（ptime / bumpdate）、
 * フィルタ、期限切れ通知・未観測 Finding の掃除・全削除を扱う。
 */

import { FindingRepository } from '../db/repository/finding-repository.js';
import { classifyIdentifier } from '../parser/identifier.js';
import type { Finding, ScopeCode, TriageStatus } from '../types/entities.js';
import type { EngineContext } from '../types/engine.js';
import type { ParsedProbeFinding } from '../types/parser.js';
import type { UpsertResult } from '../types/repository.js';

// ============================================================
// 対応期限
// ============================================================

/** ptime コードごとの対応期限（時間） */
export const PTIME_HOURS = {
  P0E: 72,
  P1I: 336,
  P1E: 336,
  P2I: 720,
  P2E: 720,
  P3I: 1440,
  P4E: 2160,
  P4I: 2160,
  P5I: 720,
  P5E: 720,
} as const;

export type PtimeCode = keyof typeof PTIME_HOURS;
type Level = 'critical' | 'high' | 'medium' | 'low' | 'info';

const PTIME_BY_SCOPE: Record<ScopeCode, Record<Level, PtimeCode>> = {
  E: { critical: 'P0E', high: 'P1E', medium: 'P2E', low: 'P4E', info: 'P5E' },
  I: { critical: 'P1I', high: 'P2I', medium: 'P3I', low: 'P4I', info: 'P5I' },
};

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** 「新しい」Finding とみなす検出からの日数 */
export const NEW_FINDING_DAYS = 7;

export function isPtimeCode(value: string): value is PtimeCode {
  return Object.prototype.hasOwnProperty.call(PTIME_HOURS, value);
}

function toLevel(level: string): Level {
  switch (level) {
    case 'critical':
    case 'high':
    case 'medium':
    case 'low':
    case 'info':
      return level;
    default:
      return 'medium';
  }
}

/**
 * 深刻度とスコープから ptime を決める。
 * 未知の深刻度は medium、未知のスコープは E として扱う。
 */
export function computePtime(level: string, scope: string): { ptime: PtimeCode; hours: number } {
  const scopeCode: ScopeCode = scope === 'I' ? 'I' : 'E';
  const ptime = PTIME_BY_SCOPE[scopeCode][toLevel(level)];
  return { ptime, hours: PTIME_HOURS[ptime] };
}

/** bumpdate = detectiondate + hours */
export function computeBumpdate(detectiondate: string, hours: number): string {
  return new Date(new Date(detectiondate).getTime() + hours * HOUR_MS).toISOString();
}

// ============================================================
// フィルタ
// ============================================================

export const FINDING_FILTERS = ['true', 'false', 'bump', 'new', 'old'] as const;
export type FindingFilter = (typeof FINDING_FILTERS)[number];

function matchesFilter(finding: Finding, filter: FindingFilter, newSince: string): boolean {
  switch (filter) {
    case 'true':
      return finding.tfp === 1;
    case 'false':
      return finding.tfp === 0;
    case 'bump':
      return finding.tfp === -1;
    case 'new':
      return finding.tfp === -1 && finding.detectiondate >= newSince;
    case 'old':
      return finding.tfp === -1 && finding.detectiondate < newSince;
    default: {
      const _exhaustive: never = filter;
      throw new Error(`Unknown filter: ${String(_exhaustive)}`);
    }
  }
}

/**
 * 有効なフィルタのいずれかに一致する Finding を返す（OR）。
 * フィルタが 1 つも無い場合と全て有効な場合は全件を返す。
 */
export function applyFindingFilters(
  findings: readonly Finding[],
  filters: readonly FindingFilter[],
  now: Date,
): Finding[] {
  const enabled = new Set(filters);
  if (enabled.size === 0 || enabled.size === FINDING_FILTERS.length) {
    return [...findings];
  }
  const newSince = new Date(now.getTime() - NEW_FINDING_DAYS * DAY_MS).toISOString();
  return findings.filter((f) => [...enabled].some((filter) => matchesFilter(f, filter, newSince)));
}

// ============================================================
// Upsert
// ============================================================

export interface FindingObservation extends ParsedProbeFinding {
  scope: ScopeCode;
  owner: string;
  metadata: string;
}

/**
 * 観測した Finding を保存する。
 *
 * 既存の場合は owner / metadata / info / level / lastdate を更新し、
 * 保存済みの detectiondate から ptime と bumpdate を再計算する。
 * refreshLocation が true なら uri / nname / port / engine も更新する。
 * firstdate と detectiondate は変わらない。
 */
export function upsertFinding(
  ctx: EngineContext,
  observation: FindingObservation,
  refreshLocation = false,
): UpsertResult<Finding> {
  const repo = new FindingRepository(ctx.db);
  const now = ctx.now().toISOString();
  const { ptime, hours } = computePtime(observation.level, observation.scope);
  const existing = repo.findByKey(observation.name, observation.vulnerability);

  if (existing) {
    const updated = repo.update(existing.id, {
      owner: observation.owner,
      metadata: observation.metadata,
      info: observation.info,
      level: observation.level,
      lastdate: now,
      ptime,
      bumpdate: computeBumpdate(existing.detectiondate, hours),
      ...(refreshLocation
        ? {
            uri: observation.uri,
            fullUri: observation.fullUri,
            uriTruncated: observation.uriTruncated,
            nname: observation.nname,
            port: observation.port,
            engine: observation.engine,
          }
        : {}),
    });
    return { record: updated ?? existing, inserted: false };
  }

  const detectiondate = observation.detectiondate ?? now;
  const record = repo.create({
    name: observation.name,
    vulnerability: observation.vulnerability,
    tfp: -1,
    type: classifyIdentifier(observation.name),
    ipv4: observation.ipv4,
    ipv6: observation.ipv6,
    level: observation.level,
    scope: observation.scope,
    engine: observation.engine,
    status: observation.status,
    detectiondate,
    firstdate: now,
    lastdate: now,
    bumpdate: computeBumpdate(detectiondate, hours),
    ptime,
    uri: observation.uri,
    fullUri: observation.fullUri,
    uriTruncated: observation.uriTruncated,
    port: observation.port,
    protocol: 'tcp',
    nname: observation.nname,
    owner: observation.owner,
    metadata: observation.metadata,
    info: observation.info,
  });
  return { record, inserted: true };
}

// ============================================================
// 対象の選択
// ============================================================

/** 操作対象の選び方 */
export type FindingSelector =
  | { kind: 'key'; name: string; vulnerability: string }
  | { kind: 'host'; name: string }
  | { kind: 'search'; regexp: string; exclude?: string };

function selectFindings(repo: FindingRepository, selector: FindingSelector): Finding[] {
  switch (selector.kind) {
    case 'key': {
      const found = repo.findByKey(selector.name, selector.vulnerability);
      return found ? [found] : [];
    }
    case 'host':
      return repo.findByName(selector.name);
    case 'search':
      return repo.search(selector.regexp, selector.exclude ?? '');
    default: {
      const _exhaustive: never = selector;
      throw new Error(`Unknown selector: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * 入力から選択方法を決める。search、name + vulnerability、name の順に優先する。
 * どれも無ければ undefined。
 */
export function toFindingSelector(params: {
  name?: string;
  vulnerability?: string;
  search?: string;
  exclude?: string;
}): FindingSelector | undefined {
  if (params.search !== undefined && params.search !== '') {
    return { kind: 'search', regexp: params.search, exclude: params.exclude };
  }
  if (params.name !== undefined && params.name !== '') {
    if (params.vulnerability !== undefined && params.vulnerability !== '') {
      return { kind: 'key', name: params.name, vulnerability: params.vulnerability };
    }
    return { kind: 'host', name: params.name };
  }
  return undefined;
}

/** 選択方法をイベントに載せるフィールド */
function selectorFields(selector: FindingSelector): Record<string, string> {
  switch (selector.kind) {
    case 'key':
      return { name: selector.name, vulnerability: selector.vulnerability };
    case 'host':
      return { name: selector.name };
    case 'search':
      return { search: selector.regexp };
    default: {
      const _exhaustive: never = selector;
      throw new Error(`Unknown selector: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** トリアージ系メッセージの接尾辞 */
function bulkSuffix(selector: FindingSelector): string {
  if (selector.kind === 'host') return '[ALL]';
  if (selector.kind === 'search') return '[BySEARCH]';
  return '';
}

// ============================================================
// 操作
// ============================================================

export interface BulkOperationResult {
  message: string;
  affected: number;
}

/**
 * Finding を削除する。フィルタは検索による選択にだけ適用する。
 * selector が無い場合は何も削除せず ERROR のイベントだけを出す。
 */
export function deleteFindings(
  ctx: EngineContext,
  selector: FindingSelector | undefined,
  filters: readonly FindingFilter[] = [],
): BulkOperationResult {
  const repo = new FindingRepository(ctx.db);

  if (selector === undefined) {
    const message = '[NUCLEI][DELETE][ERROR]';
    ctx.delta.emit({ message, name: 'None' });
    return { message, affected: 0 };
  }

  let message = '[NUCLEI][DELETE]';
  let targets = selectFindings(repo, selector);
  if (selector.kind === 'host') {
    message = '[NUCLEI][DELETE][ALL]';
  } else if (selector.kind === 'search') {
    message = '[NUCLEI][DELETE][SEARCH]';
    targets = applyFindingFilters(targets, filters, ctx.now());
  }

  const affected = repo.deleteMany(targets.map((f) => f.id));
  if (affected === 0) {
    ctx.logger.debug({ selector }, 'no findings matched for deletion');
  }
  ctx.delta.emit({ message, ...selectorFields(selector) });
  return { message, affected };
}

/** トリアージ操作名を tfp に変換する。true / false 以外は未設定（-1）。 */
export function triageStatusOf(action: string): TriageStatus {
  if (action === 'true') return 1;
  if (action === 'false') return 0;
  return -1;
}

/** トリアージ状態を設定する */
export function setTriage(
  ctx: EngineContext,
  action: string,
  selector: FindingSelector,
  filters: readonly FindingFilter[] = [],
): BulkOperationResult {
  const repo = new FindingRepository(ctx.db);
  const targets = applyFindingFilters(selectFindings(repo, selector), filters, ctx.now());
  const affected = repo.setTriage(
    targets.map((f) => f.id),
    triageStatusOf(action),
  );

  const message = `[NUCLEI][${action.toUpperCase()}]${bulkSuffix(selector)}`;
  ctx.delta.emit({ message, ...selectorFields(selector) });
  return { message, affected };
}

/**
 * ptime を手動で上書きする。未知のコードは P0E。
 * bumpdate も新しい ptime で検出日から再計算する。
 */
export function setPtimeOverride(
  ctx: EngineContext,
  code: string,
  selector: FindingSelector,
  filters: readonly FindingFilter[] = [],
): BulkOperationResult {
  const repo = new FindingRepository(ctx.db);
  const ptime: PtimeCode = isPtimeCode(code) ? code : 'P0E';
  const targets = applyFindingFilters(selectFindings(repo, selector), filters, ctx.now());

  const affected = ctx.db.transaction(() => {
    let count = 0;
    for (const finding of targets) {
      const bumpdate = computeBumpdate(finding.detectiondate, PTIME_HOURS[ptime]);
      if (repo.update(finding.id, { ptime, bumpdate }) !== undefined) count++;
    }
    return count;
  })();

  const message = `[NUCLEI][PTIME]${bulkSuffix(selector)}`;
  ctx.delta.emit({ message, ptime, ...selectorFields(selector) });
  return { message, affected };
}

function sweepFields(finding: Finding): Record<string, string | number> {
  return {
    owner: finding.owner,
    host: finding.name,
    level: finding.level,
    scope: finding.scope,
    vulnerability: finding.vulnerability,
    engine: finding.engine,
    detectiondate: finding.detectiondate,
    port: finding.port,
    protocol: finding.protocol,
    ptime: finding.ptime,
  };
}

/** 対応期限（bumpdate）を過ぎた Finding ごとに通知する。通知件数を返す。 */
export function alertUnattended(ctx: EngineContext): number {
  const due = new FindingRepository(ctx.db).findDue(ctx.now().toISOString());
  for (const finding of due) {
    ctx.delta.emit({ ...sweepFields(finding), message: '[NUCLEI][ALERT][UNATTENDED]' });
  }
  ctx.logger.info({ count: due.length }, 'unattended findings alerted');
  return due.length;
}

/** retentionDays 日以上観測されていない Finding を通知してから削除する */
export function cleanUnseen(ctx: EngineContext, retentionDays = 30): number {
  const repo = new FindingRepository(ctx.db);
  const before = new Date(ctx.now().getTime() - retentionDays * DAY_MS).toISOString();
  const unseen = repo.findUnseenSince(before);
  for (const finding of unseen) {
    ctx.delta.emit({ ...sweepFields(finding), message: '[NUCLEI][DELETE][UNSEEN]' });
  }
  const deleted = repo.deleteMany(unseen.map((f) => f.id));
  ctx.logger.info({ deleted, before }, 'unseen findings cleaned');
  return deleted;
}

/** 全 Finding を削除する。イベントは出さない。 */
export function purgeFindings(ctx: EngineContext): number {
  const deleted = new FindingRepository(ctx.db).deleteAll();
  ctx.logger.warn({ deleted }, 'all findings purged');
  return deleted;
}
