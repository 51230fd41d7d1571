/**
 * surfacewatch — Ingest Engine
 *
 * スキャナー出力を読み込み、パーサーと取り込み処理に振り分ける。
 * ingestContent() はコアロジック（ファイルシステム非依存・テスト可能）。
 * ingestFile() はファイル読み込みの薄いラッパー。
 */

import fs from 'node:fs';
import path from 'node:path';
import { parseAmassLines, parseSubfinderJsonl } from '../parser/amass-parser.js';
import { parseHydraLines, parsePatatorCsv } from '../parser/bruteforce-parser.js';
import { parseGnmapLines } from '../parser/gnmap-parser.js';
import { parseNmapXml } from '../parser/nmap-parser.js';
import { parseWpscanJson } from '../parser/wpscan-parser.js';
import { parseNucleiHttpLines, parseNucleiLines, parseNucleiNetworkLines } from '../parser/nuclei-parser.js';
import type { Zone } from '../types/entities.js';
import type { EngineContext, IngestSummary } from '../types/engine.js';
import {
  BRUTEFORCE_PROTOCOLS,
  BRUTEFORCE_TOOLS,
  type BruteforceProtocol,
  type BruteforceTool,
  ingestCredentials,
} from './bruteforce-ingest.js';
import { ingestDiscoveries } from './discovery-ingest.js';
import { ingestHostScans } from './host-ingest.js';
import {
  ingestProbeFindings,
  ingestProbeLines,
  PROBE_LINE_VARIANTS,
  PROBE_VARIANTS,
  type ProbeVariant,
} from './probe-ingest.js';
import { ingestWpscan } from './wpscan-ingest.js';

export type BruteforceParser = `${BruteforceTool}.${BruteforceProtocol}`;

export const INGEST_PARSERS = [
  'amass',
  'subfinder',
  'gnmap',
  'nmap.xml',
  'wpscan.json',
  ...PROBE_VARIANTS,
  ...PROBE_LINE_VARIANTS,
  ...BRUTEFORCE_TOOLS.flatMap((tool) =>
    BRUTEFORCE_PROTOCOLS.map((protocol) => `${tool}.${protocol}` as const),
  ),
] as const;
export type IngestParser = (typeof INGEST_PARSERS)[number];

export function isIngestParser(value: string): value is IngestParser {
  return INGEST_PARSERS.some((p) => p === value);
}

export interface IngestRequest {
  parser: IngestParser;
  content: string;
  /** ホスト・Finding の区分。既定は external */
  zone?: Zone;
  /** スキャン結果のホスト名を上書きする */
  host?: string;
  /** .nmap のレポート全文（gnmap 取り込み時にホストの info へ保存） */
  report?: string;
}

function isProbeVariant(parser: IngestParser): parser is ProbeVariant {
  return PROBE_VARIANTS.some((v) => v === parser);
}

function splitBruteforceParser(
  parser: IngestParser,
): { tool: BruteforceTool; protocol: BruteforceProtocol } | undefined {
  for (const tool of BRUTEFORCE_TOOLS) {
    for (const protocol of BRUTEFORCE_PROTOCOLS) {
      if (parser === `${tool}.${protocol}`) return { tool, protocol };
    }
  }
  return undefined;
}

/**
 * スキャナー出力の文字列を直接受け取り、取り込む。
 * ファイルシステムに依存しないため、テストから直接呼び出せる。
 */
export function ingestContent(ctx: EngineContext, request: IngestRequest): IngestSummary {
  const zone = request.zone ?? 'external';
  const hostOptions = request.host !== undefined ? { hostOverride: request.host } : {};
  const { parser } = request;

  if (isProbeVariant(parser)) {
    return ingestProbeFindings(ctx, parseNucleiLines(request.content), { zone, variant: parser });
  }

  const bruteforce = splitBruteforceParser(parser);
  if (bruteforce !== undefined) {
    const parsed =
      bruteforce.tool === 'patator'
        ? parsePatatorCsv(request.content)
        : parseHydraLines(request.content);
    return ingestCredentials(ctx, parsed, { ...bruteforce, zone });
  }

  switch (parser) {
    case 'amass':
      return ingestDiscoveries(ctx, 'amass', parseAmassLines(request.content));
    case 'subfinder':
      return ingestDiscoveries(ctx, 'subfinder', parseSubfinderJsonl(request.content));
    case 'gnmap':
      return ingestHostScans(ctx, parseGnmapLines(request.content, hostOptions), {
        zone,
        report: request.report,
      });
    case 'nmap.xml':
      return ingestHostScans(ctx, parseNmapXml(request.content, hostOptions), {
        zone,
        report: request.report,
      });
    case 'wpscan.json':
      return ingestWpscan(ctx, parseWpscanJson(request.content), { zone });
    case 'nuclei.http':
      return ingestProbeLines(ctx, parseNucleiHttpLines(request.content), { zone, variant: parser });
    case 'nuclei.network':
      return ingestProbeLines(ctx, parseNucleiNetworkLines(request.content), { zone, variant: parser });
    default:
      throw new Error(`Unknown parser: ${parser}`);
  }
}

export interface IngestFileRequest extends Omit<IngestRequest, 'content' | 'report'> {
  path: string;
}

/**
 * ファイルパスからスキャナー出力を読み込み、取り込む。
 * gnmap の場合、同じベース名の .nmap があればレポート全文として読む。
 */
export function ingestFile(ctx: EngineContext, request: IngestFileRequest): IngestSummary {
  const resolved = path.resolve(request.path);
  const content = fs.readFileSync(resolved, 'utf-8');

  let report: string | undefined;
  if (request.parser === 'gnmap') {
    const reportPath = resolved.replace(/\.gnmap$/, '') + '.nmap';
    if (reportPath !== resolved && fs.existsSync(reportPath)) {
      report = fs.readFileSync(reportPath, 'utf-8');
    }
  }

  ctx.logger.debug({ path: resolved, parser: request.parser }, 'ingesting file');
  return ingestContent(ctx, {
    parser: request.parser,
    zone: request.zone,
    host: request.host,
    content,
    report,
  });
}
