/**
 * surfacewatch — ブルートフォース結果の取り込み（patator / hydra）
 *
 * 成功した認証情報ごとに Delta を出し、ホストのプロトコル欄・owner・メタデータを更新する。
 * ホストが見つからない認証情報も通知はする。
 */

import { HostRepository } from '../db/repository/host-repository.js';
import type { Zone } from '../types/entities.js';
import type { EngineContext, IngestSummary } from '../types/engine.js';
import { emptyIngestSummary } from '../types/engine.js';
import type { LineParseResult, ParsedCredential } from '../types/parser.js';
import type { UpdateHostInput } from '../types/repository.js';
import { mergeMetadata, resolveMetadata } from './metadata.js';

export const BRUTEFORCE_TOOLS = ['patator', 'hydra'] as const;
export type BruteforceTool = (typeof BRUTEFORCE_TOOLS)[number];

export const BRUTEFORCE_PROTOCOLS = ['ssh', 'rdp', 'ftp', 'telnet', 'smb'] as const;
export type BruteforceProtocol = (typeof BRUTEFORCE_PROTOCOLS)[number];

type ServiceField = 'serviceSsh' | 'serviceRdp' | 'serviceFtp' | 'serviceTelnet' | 'serviceSmb';

const SERVICE_FIELDS: Record<BruteforceProtocol, ServiceField> = {
  ssh: 'serviceSsh',
  rdp: 'serviceRdp',
  ftp: 'serviceFtp',
  telnet: 'serviceTelnet',
  smb: 'serviceSmb',
};

/** ホストのプロトコル欄に書く値 */
export function bruteforceFieldValue(
  protocol: BruteforceProtocol,
  credential: ParsedCredential,
): string {
  return `${protocol.toUpperCase()} BruteForce:{${credential.username}:${credential.password}}  `;
}

export function bruteforceMessage(tool: BruteforceTool, protocol: BruteforceProtocol): string {
  return `[${tool.toUpperCase()}][${protocol.toUpperCase()} BRUTEFORCE]`;
}

export interface BruteforceIngestOptions {
  tool: BruteforceTool;
  protocol: BruteforceProtocol;
  zone: Zone;
}

export function ingestCredentials(
  ctx: EngineContext,
  parsed: LineParseResult<ParsedCredential>,
  options: BruteforceIngestOptions,
): IngestSummary {
  const log = ctx.logger.child({
    component: 'bruteforce-ingest',
    tool: options.tool,
    protocol: options.protocol,
  });
  const repo = new HostRepository(ctx.db);
  const summary = emptyIngestSummary();
  summary.parsed = parsed.records.length;
  summary.skipped = parsed.skipped.length;

  for (const skipped of parsed.skipped) {
    log.debug({ line: skipped.lineNumber, reason: skipped.reason }, 'line skipped');
  }

  const message = bruteforceMessage(options.tool, options.protocol);
  for (const credential of parsed.records) {
    const { metadata } = resolveMetadata(ctx.db, credential.hostname, options.zone);
    ctx.delta.emit({
      ...metadata,
      message,
      hostname: credential.hostname,
      username: credential.username,
      password: credential.password,
    });
    summary.alerts++;

    const host = repo.findByName(options.zone, credential.hostname);
    if (host === undefined) {
      log.warn({ hostname: credential.hostname }, 'credential for unknown host, not stored');
      continue;
    }

    const update: UpdateHostInput = {
      owner: metadata.owner,
      metadata: mergeMetadata(host.metadata, metadata),
    };
    update[SERVICE_FIELDS[options.protocol]] = bruteforceFieldValue(options.protocol, credential);
    repo.update(host.id, update);
    summary.updated++;
  }

  log.info({ ...summary }, 'bruteforce ingest finished');
  return summary;
}
