/**
 * surfacewatch — WordPress スキャン結果の取り込み
 *
 * 脆弱性を持つ区画ごとに Delta を 1 件出し、脆弱性ごとに Finding を upsert する。
 * Finding の名前・URI はスキャン対象の URL。
 */

import { DeltaEmitError } from '../errors.js';
import { truncateUri } from '../parser/nuclei-parser.js';
import { vulnerabilityId } from '../parser/wpscan-parser.js';
import type { Zone } from '../types/entities.js';
import type { EngineContext, IngestSummary } from '../types/engine.js';
import { emptyIngestSummary } from '../types/engine.js';
import type { LineParseResult, ParsedWpscanSection, WpscanVulnerability } from '../types/parser.js';
import { upsertFinding } from './lifecycle.js';
import { scopeOfZone } from './probe-ingest.js';

export const WPSCAN_ENGINE = 'WPSCAN';
export const WPSCAN_LEVEL = 'medium';
export const WPSCAN_PORT = 443;

export function wpscanMessage(targetUrl: string): string {
  return `[WPSCAN][VULNERABILITY][${targetUrl}]`;
}

function recordVulnerability(
  ctx: EngineContext,
  section: ParsedWpscanSection,
  vulnerability: WpscanVulnerability,
  zone: Zone,
): boolean {
  const info = JSON.stringify(vulnerability.raw);
  return upsertFinding(ctx, {
    name: section.targetUrl,
    nname: section.targetUrl,
    port: WPSCAN_PORT,
    vulnerability: vulnerabilityId(vulnerability),
    engine: WPSCAN_ENGINE,
    level: WPSCAN_LEVEL,
    status: '',
    fullUri: section.targetUrl,
    ...truncateUri(section.targetUrl),
    ipv4: section.targetIp,
    ipv6: '',
    info,
    line: info,
    scope: scopeOfZone(zone),
    owner: 'Unknown',
    metadata: JSON.stringify(vulnerability.references),
  }).inserted;
}

export function ingestWpscan(
  ctx: EngineContext,
  parsed: LineParseResult<ParsedWpscanSection>,
  options: { zone: Zone },
): IngestSummary {
  const log = ctx.logger.child({ component: 'wpscan-ingest' });
  const summary = emptyIngestSummary();
  summary.skipped = parsed.skipped.length;
  for (const skipped of parsed.skipped) {
    log.warn({ reason: skipped.reason }, 'wpscan report skipped');
  }

  for (const section of parsed.records) {
    ctx.delta.emit({
      message: wpscanMessage(section.targetUrl),
      url: section.targetUrl,
      ip: section.targetIp,
      section: section.section,
      datetime: ctx.now().toISOString(),
      vulnerabilities: section.vulnerabilities.map((v) => v.raw),
    });
    summary.alerts++;

    for (const vulnerability of section.vulnerabilities) {
      summary.parsed++;
      try {
        if (recordVulnerability(ctx, section, vulnerability, options.zone)) {
          summary.created++;
        } else {
          summary.updated++;
        }
      } catch (err) {
        if (err instanceof DeltaEmitError) throw err;
        log.warn({ err, section: section.section, title: vulnerability.title }, 'vulnerability not recorded, skipping');
        summary.skipped++;
      }
    }
  }

  log.info({ ...summary }, 'wpscan ingest finished');
  return summary;
}
