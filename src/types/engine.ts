/**
 * surfacewatch — Engine layer type definitions
 *
 * Engine 層の入出力型。MCP / CLI の両方から再利用する。
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { Zone } from './entities.js';
import type { ParsedTargetRecord } from './parser.js';

// ============================================================
// Delta
// ============================================================

/** 下流に渡す変更イベント。message 以外のキーはイベントごとに異なる。 */
export interface DeltaEvent {
  message: string;
  [key: string]: unknown;
}

/** 時刻情報を付与済みのイベント */
export interface StampedDelta extends DeltaEvent {
  timestamp: string;
  datestamp: string;
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

/** Delta の出力先。emit は書き込みが完了してから戻る。 */
export interface DeltaSink {
  emit(event: DeltaEvent): StampedDelta;
}

// ============================================================
// Context
// ============================================================

/** Engine の各操作に明示的に渡す依存 */
export interface EngineContext {
  db: Database.Database;
  delta: DeltaSink;
  logger: Logger;
  /** テストで固定できるよう時刻は注入する */
  now: () => Date;
}

// ============================================================
// Reconcile
// ============================================================

export const WORK_MODES = ['merge', 'sync', 'delete', 'deletebytag'] as const;
export type WorkMode = (typeof WORK_MODES)[number];

export interface ReconcileTargetsInput {
  zone: Zone;
  tag: string;
  mode: WorkMode;
  names: readonly string[];
}

export interface ImportTargetsInput {
  zone: Zone;
  tag: string;
  mode: WorkMode;
  records: readonly ParsedTargetRecord[];
}

export interface ReconcileDiscoveriesInput {
  tag: string;
  mode: WorkMode;
  names: readonly string[];
}

export interface ReconcileResult {
  inserted: number;
  updated: number;
  skipped: number;
  deleted: number;
}

// ============================================================
// Ingest
// ============================================================

/** 行単位の取り込み結果 */
export interface IngestSummary {
  parsed: number;
  skipped: number;
  created: number;
  updated: number;
  alerts: number;
}

export function emptyIngestSummary(): IngestSummary {
  return { parsed: 0, skipped: 0, created: 0, updated: 0, alerts: 0 };
}
