/**
 * surfacewatch — 課題管理システムへの起票
 *
 * 起票先は IssueTracker の実装に任せる。Finding 1 件につきチケットは 1 枚まで。
 * 起票先の失敗はログに残し、呼び出し元は中断しない。
 */

import { FindingRepository } from '../db/repository/finding-repository.js';
import { LookupError } from '../errors.js';
import type { Finding } from '../types/entities.js';
import type { EngineContext } from '../types/engine.js';

export interface TicketRequest {
  summary: string;
  description: string;
  /** Finding の深刻度。優先度への対応付けは起票先が行う。 */
  severity: string;
}

export interface IssueTracker {
  /** 起票してチケットのキーを返す */
  open(ticket: TicketRequest): Promise<string>;
  close(ticketKey: string): Promise<void>;
}

export function buildTicketRequest(finding: Finding): TicketRequest {
  const description = [
    '*Summary:*',
    `${finding.vulnerability} (${finding.level}) detected by ${finding.engine}`,
    '',
    '*Hosts:*',
    finding.name,
    '',
    '*Location:*',
    finding.fullUri,
  ].join('\n');
  return {
    summary: `Finding - ${finding.vulnerability}`,
    description,
    severity: finding.level,
  };
}

/**
 * チケットが無ければ起票する。既にあればそのキーを返す。
 * 起票先が失敗したときは undefined。
 */
export async function dispatchTicket(
  ctx: EngineContext,
  tracker: IssueTracker,
  findingId: number,
): Promise<string | undefined> {
  const repo = new FindingRepository(ctx.db);
  const finding = repo.findById(findingId);
  if (finding === undefined) {
    throw new LookupError('finding', findingId);
  }
  if (finding.ticket !== undefined) {
    return finding.ticket;
  }

  let key: string;
  try {
    key = await tracker.open(buildTicketRequest(finding));
  } catch (err) {
    ctx.logger.error({ err, findingId }, 'issue tracker failed to open ticket');
    return undefined;
  }

  repo.update(finding.id, { ticket: key });
  ctx.logger.info({ findingId, ticket: key }, 'ticket opened');
  return key;
}

/**
 * 指定した深刻度の未判定・真陽性の Finding をまとめて起票する。誤検知は対象外。
 */
export async function dispatchTicketsForLevel(
  ctx: EngineContext,
  tracker: IssueTracker,
  level: string,
): Promise<string[]> {
  const candidates = new FindingRepository(ctx.db)
    .findAll()
    .filter((f) => f.level === level && f.tfp !== 0 && f.ticket === undefined);

  const keys: string[] = [];
  for (const finding of candidates) {
    const key = await dispatchTicket(ctx, tracker, finding.id);
    if (key !== undefined) keys.push(key);
  }
  return keys;
}

/** チケットを閉じる。チケットが無いか起票先が失敗したときは false。 */
export async function closeTicket(
  ctx: EngineContext,
  tracker: IssueTracker,
  findingId: number,
): Promise<boolean> {
  const finding = new FindingRepository(ctx.db).findById(findingId);
  if (finding === undefined) {
    throw new LookupError('finding', findingId);
  }
  if (finding.ticket === undefined) {
    return false;
  }
  try {
    await tracker.close(finding.ticket);
  } catch (err) {
    ctx.logger.error({ err, findingId, ticket: finding.ticket }, 'issue tracker failed to close ticket');
    return false;
  }
  return true;
}
