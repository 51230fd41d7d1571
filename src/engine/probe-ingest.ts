/**
 * surfacewatch — 脆弱性プローブ結果の取り込み（nuclei）
 *
 * 1 回の取り込みごとに ProbeRun を作る。ホストに初めて触れたときに以前の行を
 * スナップショットして現在の行で置き換え、以降は追記する。スナップショットに
 * 無い行だけが新しい Finding として Delta になる。
 */

import { HostRepository } from '../db/repository/host-repository.js';
import { DeltaEmitError } from '../errors.js';
import { classifyIdentifier } from '../parser/identifier.js';
import { toMissingWafFinding } from '../parser/nuclei-parser.js';
import type { Host, ScopeCode, Zone } from '../types/entities.js';
import type { EngineContext, IngestSummary } from '../types/engine.js';
import { emptyIngestSummary } from '../types/engine.js';
import type { LineParseResult, ParsedProbeFinding, ParsedProbeLine } from '../types/parser.js';
import { SERVICES_TAG } from './host-ingest.js';
import { upsertFinding } from './lifecycle.js';
import { mergeMetadata, resolveMetadata, type ResolvedMetadata } from './metadata.js';

export const NEW_FINDING_MESSAGE = '[NUCLEI][New Finding]';

export const PROBE_VARIANTS = ['nuclei', 'nuclei.waf', 'nuclei.onlyalert'] as const;
export type ProbeVariant = (typeof PROBE_VARIANTS)[number];

/** ホストの行と通知だけを扱い、Finding を作らない形式 */
export const PROBE_LINE_VARIANTS = ['nuclei.http', 'nuclei.network'] as const;
export type ProbeLineVariant = (typeof PROBE_LINE_VARIANTS)[number];

export function scopeOfZone(zone: Zone): ScopeCode {
  return zone === 'internal' ? 'I' : 'E';
}

/**
 * 1 回の取り込み中に共有される状態。スレッドをまたいで使わない。
 */
export class ProbeRun {
  /** ホスト名 → 取り込み前に保存されていた行 */
  private readonly snapshots = new Map<string, ReadonlySet<string>>();
  /** 今回すでに upsert した name|vulnerability */
  private readonly upserted = new Set<string>();
  private readonly hosts: HostRepository;
  readonly summary: IngestSummary = emptyIngestSummary();

  constructor(
    private readonly ctx: EngineContext,
    readonly zone: Zone,
  ) {
    this.hosts = new HostRepository(ctx.db);
  }

  /** 1 件の Finding を反映する */
  record(finding: ParsedProbeFinding): void {
    const { metadata, storedMetadata } = this.observe(finding);

    const key = `${finding.name}|${finding.vulnerability}`;
    if (this.upserted.has(key)) return;
    this.upserted.add(key);

    const { inserted } = upsertFinding(this.ctx, {
      ...finding,
      scope: scopeOfZone(this.zone),
      owner: metadata.owner,
      metadata: storedMetadata,
    });
    if (inserted) {
      this.summary.created++;
    } else {
      this.summary.updated++;
    }
  }

  /**
   * 行をホストに反映し、スナップショットに無い行なら通知する。
   * 見つからないホストは作成して通知する。
   */
  observe(probe: ParsedProbeLine): { metadata: ResolvedMetadata; storedMetadata: string } {
    const { metadata, raw } = resolveMetadata(this.ctx.db, probe.name, this.zone);
    const host = this.hosts.findByName(this.zone, probe.name);

    if (host === undefined) {
      this.createHost(probe, metadata.owner, raw);
      this.alert(probe, metadata);
      return { metadata, storedMetadata: raw };
    }
    const storedMetadata = mergeMetadata(host.metadata, metadata);
    if (this.touch(host, probe, metadata.owner, storedMetadata)) this.alert(probe, metadata);
    return { metadata, storedMetadata };
  }

  /**
   * 既存ホストに行を反映する。行がスナップショットに無ければ true。
   * 初めて触れたホストにはスナップショットが無い状態だったとみなす。
   */
  private touch(host: Host, probe: ParsedProbeLine, owner: string, metadata: string): boolean {
    const snapshot = this.snapshots.get(host.name);
    if (snapshot !== undefined) {
      this.hosts.appendProbeLine(host.id, probe.line);
      return !snapshot.has(probe.line);
    }

    const previous = new Set(this.hosts.listProbeLines(host.id).map((l) => l.line));
    this.snapshots.set(host.name, previous);
    this.ctx.db.transaction(() => {
      this.hosts.replaceProbeLines(host.id, [probe.line]);
      this.hosts.update(host.id, { owner, metadata });
    })();
    return !previous.has(probe.line);
  }

  private createHost(probe: ParsedProbeLine, owner: string, metadata: string): void {
    this.ctx.logger.debug({ name: probe.name }, 'probed host not found, creating');
    const host = this.hosts.create({
      zone: this.zone,
      name: probe.name,
      nname: probe.name,
      ipv4: probe.ipv4,
      type: classifyIdentifier(probe.name),
      tag: SERVICES_TAG,
      serviceSsh: '',
      serviceRdp: '',
      serviceFtp: '',
      serviceTelnet: '',
      serviceSmb: '',
      info: '',
      infoGnmap: '',
      owner,
      metadata,
      lastdate: this.ctx.now().toISOString(),
    });
    this.hosts.replaceProbeLines(host.id, [probe.line]);
    this.snapshots.set(host.name, new Set());
  }

  private alert(probe: ParsedProbeLine, metadata: Record<string, unknown>): void {
    this.ctx.delta.emit({
      ...metadata,
      message: NEW_FINDING_MESSAGE,
      host: probe.name,
      finding: probe.line,
    });
    this.summary.alerts++;
  }
}

/** 通知のみ。ホストも Finding も保存しない。 */
function alertOnly(ctx: EngineContext, finding: ParsedProbeFinding): void {
  ctx.delta.emit({
    message: NEW_FINDING_MESSAGE,
    host: finding.name,
    finding: finding.line,
    datetime: finding.detectiondate ?? ctx.now().toISOString(),
    url: finding.fullUri,
    waf: finding.vulnerability,
    status: finding.status,
    protocol: finding.engine,
    level: finding.level,
  });
}

export interface ProbeIngestOptions {
  zone: Zone;
  variant: ProbeVariant;
}

export function ingestProbeFindings(
  ctx: EngineContext,
  parsed: LineParseResult<ParsedProbeFinding>,
  options: ProbeIngestOptions,
): IngestSummary {
  const log = ctx.logger.child({ component: 'probe-ingest', variant: options.variant });
  for (const skipped of parsed.skipped) {
    log.debug({ line: skipped.lineNumber, reason: skipped.reason }, 'line skipped');
  }

  if (options.variant === 'nuclei.onlyalert') {
    const summary = emptyIngestSummary();
    summary.parsed = parsed.records.length;
    summary.skipped = parsed.skipped.length;
    for (const finding of parsed.records) {
      alertOnly(ctx, finding);
      summary.alerts++;
    }
    log.info({ ...summary }, 'probe alerts emitted');
    return summary;
  }

  const run = new ProbeRun(ctx, options.zone);
  run.summary.parsed = parsed.records.length;
  run.summary.skipped = parsed.skipped.length;

  for (const parsedFinding of parsed.records) {
    const finding =
      options.variant === 'nuclei.waf' ? toMissingWafFinding(parsedFinding) : parsedFinding;
    if (finding === undefined) {
      run.summary.skipped++;
      continue;
    }
    try {
      run.record(finding);
    } catch (err) {
      if (err instanceof DeltaEmitError) throw err;
      log.warn({ err, name: finding.name, line: finding.line }, 'finding not recorded, skipping');
      run.summary.skipped++;
    }
  }

  log.info({ ...run.summary }, 'probe ingest finished');
  return run.summary;
}

/**
 * http / network テンプレートの出力を取り込む。行をホストに保存して新しい行を
 * 通知するだけで、Finding は作らない。
 */
export function ingestProbeLines(
  ctx: EngineContext,
  parsed: LineParseResult<ParsedProbeLine>,
  options: { zone: Zone; variant: ProbeLineVariant },
): IngestSummary {
  const log = ctx.logger.child({ component: 'probe-ingest', variant: options.variant });
  const hosts = new HostRepository(ctx.db);
  const run = new ProbeRun(ctx, options.zone);
  run.summary.parsed = parsed.records.length;
  run.summary.skipped = parsed.skipped.length;

  for (const probe of parsed.records) {
    const known = hosts.findByName(options.zone, probe.name) !== undefined;
    try {
      run.observe(probe);
    } catch (err) {
      if (err instanceof DeltaEmitError) throw err;
      log.warn({ err, name: probe.name, line: probe.line }, 'probe line not recorded, skipping');
      run.summary.skipped++;
      continue;
    }
    if (known) {
      run.summary.updated++;
    } else {
      run.summary.created++;
    }
  }

  log.info({ ...run.summary }, 'probe lines ingested');
  return run.summary;
}
