/**
 * surfacewatch — ポートスキャン結果の取り込み
 *
 * 初出のホストはホストとサービスを作成し、ホスト 1 件と各サービスの Delta を出す。
 * 既知のホストは保存済みサービスと構造比較し、開いた / 閉じたサービスだけ Delta を出す。
 */

import { HostRepository } from '../db/repository/host-repository.js';
import {
  diffServices,
  encodeServices,
  toServiceDescriptor,
} from '../parser/service-descriptor.js';
import { classifyIdentifier } from '../parser/identifier.js';
import type { Host, Zone } from '../types/entities.js';
import type { EngineContext, IngestSummary } from '../types/engine.js';
import { emptyIngestSummary } from '../types/engine.js';
import type { LineParseResult, ParsedHostScan, ServiceDescriptor } from '../types/parser.js';
import { resolveMetadata } from './metadata.js';
import { isUniqueViolation } from './reconciler.js';

export const NEW_HOST_MESSAGE = '[NMAP][New Host Found]';
export const NEW_SERVICE_MESSAGE = '[NMAP][New Service Found]';
export const CLOSED_SERVICE_MESSAGE = '[NMAP][Service Closed]';

/** スキャン取り込みで作成されるホストのタグ */
export const SERVICES_TAG = '[Services]';

export interface HostIngestOptions {
  zone: Zone;
  /** スキャンレポート全文（.nmap）。ホストの info に保存する */
  report?: string;
}

/** Delta 用のサービス表現。rpc_info は info キーで出す */
function serviceFields(service: ServiceDescriptor): Record<string, string> {
  return {
    port: service.port,
    state: service.state,
    protocol: service.protocol,
    owner: service.owner,
    name: service.name,
    info: service.rpcInfo,
    version: service.version,
  };
}

export function ingestHostScans(
  ctx: EngineContext,
  parsed: LineParseResult<ParsedHostScan>,
  options: HostIngestOptions,
): IngestSummary {
  const log = ctx.logger.child({ component: 'host-ingest', zone: options.zone });
  const repo = new HostRepository(ctx.db);
  const summary = emptyIngestSummary();
  summary.parsed = parsed.records.length;
  summary.skipped = parsed.skipped.length;

  for (const skipped of parsed.skipped) {
    log.debug({ line: skipped.lineNumber, reason: skipped.reason }, 'line skipped');
  }

  for (const scan of parsed.records) {
    const existing = repo.findByName(options.zone, scan.name);
    const created = existing === undefined ? createHost(ctx, repo, scan, options) : undefined;

    if (created !== undefined) {
      summary.created++;
      summary.alerts += 1 + scan.services.length;
      continue;
    }

    const host = existing ?? repo.findByName(options.zone, scan.name);
    if (host === undefined) {
      log.warn({ name: scan.name }, 'host disappeared during ingest, skipping');
      summary.skipped++;
      continue;
    }
    summary.alerts += updateHost(ctx, repo, host, scan, options);
    summary.updated++;
  }

  log.info({ ...summary }, 'host ingest finished');
  return summary;
}

/** 初出ホストを作成して Delta を出す。一意制約違反なら undefined（更新側へ回す）。 */
function createHost(
  ctx: EngineContext,
  repo: HostRepository,
  scan: ParsedHostScan,
  options: HostIngestOptions,
): Host | undefined {
  const { metadata, raw } = resolveMetadata(ctx.db, scan.name, options.zone);

  const insert = ctx.db.transaction((): Host => {
    const row = repo.create({
      zone: options.zone,
      name: scan.name,
      nname: scan.nname,
      ipv4: scan.ipv4,
      type: classifyIdentifier(scan.name),
      tag: SERVICES_TAG,
      serviceSsh: '',
      serviceRdp: '',
      serviceFtp: '',
      serviceTelnet: '',
      serviceSmb: '',
      info: options.report ?? '',
      infoGnmap: scan.line,
      owner: metadata.owner,
      metadata: raw,
      lastdate: ctx.now().toISOString(),
    });
    repo.replaceServices(row.id, scan.services);
    return row;
  });

  let host: Host;
  try {
    host = insert();
  } catch (err) {
    if (!isUniqueViolation(err)) throw err;
    ctx.logger.debug({ name: scan.name }, 'host already exists, updating instead');
    return undefined;
  }

  ctx.delta.emit({
    message: NEW_HOST_MESSAGE,
    name: scan.name,
    nname: scan.nname,
    ipv4: scan.ipv4,
    services: encodeServices(scan.services),
  });
  for (const service of scan.services) {
    ctx.delta.emit({
      ...serviceFields(service),
      message: NEW_SERVICE_MESSAGE,
      hostname: scan.name,
      hostnname: scan.nname,
      ipv4: scan.ipv4,
    });
  }
  return host;
}

/** 既知ホストのサービス差分を Delta に出してから上書きする。出した Delta 数を返す。 */
function updateHost(
  ctx: EngineContext,
  repo: HostRepository,
  host: Host,
  scan: ParsedHostScan,
  options: HostIngestOptions,
): number {
  const previous = repo.listServices(host.id).map(toServiceDescriptor);
  const diff = diffServices(previous, scan.services);
  const hostFields = { hostname: scan.name, hostnname: scan.nname, ipv4: scan.ipv4 };

  for (const service of diff.opened) {
    ctx.delta.emit({ ...serviceFields(service), message: NEW_SERVICE_MESSAGE, ...hostFields });
  }
  for (const service of diff.closed) {
    ctx.delta.emit({ ...serviceFields(service), message: CLOSED_SERVICE_MESSAGE, ...hostFields });
  }

  ctx.db.transaction(() => {
    repo.update(host.id, {
      info: options.report ?? host.info,
      nname: scan.nname,
      ipv4: scan.ipv4,
      infoGnmap: scan.line,
      lastdate: ctx.now().toISOString(),
    });
    repo.replaceServices(host.id, scan.services);
  })();

  return diff.opened.length + diff.closed.length;
}
