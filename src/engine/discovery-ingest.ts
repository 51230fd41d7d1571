/**
 * surfacewatch — 発見結果の取り込み（amass / subfinder）
 *
 * 既存の名前は info / tag / lastdate のみ更新し、Delta は出さない。
 * 新しい名前は作成し、解決済みメタデータを重ねた Delta を出す。
 */

import { DiscoveryRepository } from '../db/repository/discovery-repository.js';
import { classifyIdentifier } from '../parser/identifier.js';
import type { LineParseResult, ParsedDiscovery } from '../types/parser.js';
import type { EngineContext, IngestSummary } from '../types/engine.js';
import { emptyIngestSummary } from '../types/engine.js';
import { resolveMetadata } from './metadata.js';
import { isUniqueViolation } from './reconciler.js';

export type DiscoverySource = 'amass' | 'subfinder';

const NEW_DOMAIN_MESSAGES: Record<DiscoverySource, string> = {
  amass: '[AMASS][New Domain Found]',
  subfinder: '[DISCOVERY][New Domain Found]',
};

export function ingestDiscoveries(
  ctx: EngineContext,
  source: DiscoverySource,
  parsed: LineParseResult<ParsedDiscovery>,
): IngestSummary {
  const log = ctx.logger.child({ component: 'discovery-ingest', source });
  const repo = new DiscoveryRepository(ctx.db);
  const summary = emptyIngestSummary();
  summary.parsed = parsed.records.length;
  summary.skipped = parsed.skipped.length;

  for (const skipped of parsed.skipped) {
    log.debug({ line: skipped.lineNumber, reason: skipped.reason }, 'line skipped');
  }

  const now = ctx.now().toISOString();
  for (const record of parsed.records) {
    const type = classifyIdentifier(record.name);
    const { metadata, raw } = resolveMetadata(ctx.db, record.name);

    let inserted: boolean;
    try {
      inserted = repo.upsertByName(record.name, {
        type,
        tag: record.tag,
        info: record.info,
        owner: metadata.owner,
        metadata: raw,
        lastdate: now,
      }).inserted;
    } catch (err) {
      if (!isUniqueViolation(err)) throw err;
      log.warn({ err, name: record.name }, 'duplicated discovery, skipping');
      summary.skipped++;
      continue;
    }

    if (!inserted) {
      log.debug({ name: record.name }, 'discovery already known, updated');
      summary.updated++;
      continue;
    }

    summary.created++;
    ctx.delta.emit({
      name: record.name,
      type,
      info: record.info,
      ...metadata,
      message: NEW_DOMAIN_MESSAGES[source],
      full_message: record.line,
    });
    summary.alerts++;
  }

  log.info({ ...summary }, 'discovery ingest finished');
  return summary;
}
