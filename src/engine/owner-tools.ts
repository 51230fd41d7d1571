/**
 * surfacewatch — 所有者台帳の補助ツール
 *
 * 複数の台帳 CSV の結合、アドレス列の抽出、タグ単位でのホスト削除。
 */

import { parse as parseCsv } from 'csv-parse/sync';
import { HostRepository } from '../db/repository/host-repository.js';
import { classifyIdentifier } from '../parser/identifier.js';
import type { Host, Zone } from '../types/entities.js';
import type { EngineContext } from '../types/engine.js';
import { splitLines } from '../types/parser.js';
import { DELETE_SERVICE_MESSAGE } from './reconciler.js';

/** 台帳 CSV でアドレスが入っている列 */
export const ADDRESS_COLUMN = 3;

/** 各入力の 1 行目（見出し）を捨てて連結する。空行は落とす。 */
export function mergeCsv(contents: readonly string[]): string[] {
  return contents.flatMap((content) => splitLines(content).slice(1).filter((line) => line.trim() !== ''));
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row: unknown) => Array.isArray(row) && row.every((cell: unknown) => typeof cell === 'string'))
  );
}

/** 見出しを除いた各行のアドレス列。列が足りない行は飛ばす。 */
export function extractCsvAddresses(contents: readonly string[]): string[] {
  const addresses: string[] = [];
  for (const content of contents) {
    const rows: unknown = parseCsv(content, { skip_empty_lines: true, relax_column_count: true, relax_quotes: true });
    if (!isStringRows(rows)) continue;
    for (const row of rows.slice(1)) {
      const address = row[ADDRESS_COLUMN]?.trim() ?? '';
      if (address !== '') addresses.push(address);
    }
  }
  return addresses;
}

export interface RemoveByTagResult {
  hosts: string[];
  deleted: number;
}

/**
 * タグが一致するホストを削除する。`apply` が false なら対象を返すだけ。
 * 削除するときはホストごとに SERVICES の削除イベントを出してから消す。
 */
export function removeHostsByTag(ctx: EngineContext, zone: Zone, tag: string, apply: boolean): RemoveByTagResult {
  const repo = new HostRepository(ctx.db);
  const hosts: Host[] = repo.findByTag(zone, tag);
  const names = hosts.map((h) => h.name);
  ctx.logger.info({ zone, tag, hosts: names.length, apply }, 'hosts selected by tag');
  if (!apply || hosts.length === 0) return { hosts: names, deleted: 0 };

  for (const host of hosts) {
    ctx.delta.emit({
      message: DELETE_SERVICE_MESSAGE,
      type: classifyIdentifier(host.name),
      name: host.name,
      lastupdate: host.lastdate,
    });
  }
  return { hosts: names, deleted: repo.deleteMany(hosts.map((h) => h.id)) };
}
