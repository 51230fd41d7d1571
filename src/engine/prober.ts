/**
 * surfacewatch — HTTP プローバー
 *
 * ワードリストによるコンテンツ探索と応答コードの監視。
 * リクエストは順番に await し、1 件ごとにタイムアウトを掛ける。
 * タイムアウトや接続失敗は「結果なし」としてログに残す。
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { matchStatusCode, parseStatusCodes } from '../parser/response-codes.js';
import type { EngineContext } from '../types/engine.js';
import { getJob } from './jobs.js';

export const DEFAULT_ALERT_CODES = '4xx,5xx';

export interface ProbeSummary {
  requested: number;
  failed: number;
  alerts: number;
}

interface ProbeCommon {
  jobId: number;
  urls: readonly string[];
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface WordlistProbeOptions extends ProbeCommon {
  dictionary: string;
  wordlistDir: string;
}

export interface ResponseCodeProbeOptions extends ProbeCommon {
  /** `"404"`, `"4xx,5xx"` など */
  codes?: string;
  dictionary?: string;
}

/** `<dir>/<name>.dict` を読み、空行を除いた語を返す */
export function loadWordlist(dir: string, name: string): string[] {
  return readFileSync(join(dir, `${name}.dict`), 'utf-8')
    .split(/\r?\n/)
    .map((w) => w.trim())
    .filter((w) => w !== '');
}

/** ステータスコードを返す。失敗時は undefined。 */
async function requestStatus(
  ctx: EngineContext,
  fetchImpl: typeof fetch,
  url: string,
  timeoutMs: number,
): Promise<number | undefined> {
  try {
    const res = await fetchImpl(url, {
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs),
    });
    return res.status;
  } catch (err) {
    ctx.logger.debug({ err, url }, 'no result');
    return undefined;
  }
}

/** ワードリストの各語を URL に付けて GET し、2xx を通知する */
export async function probeWordlist(
  ctx: EngineContext,
  options: WordlistProbeOptions,
): Promise<ProbeSummary> {
  const job = getJob(ctx.db, options.jobId);
  const words = loadWordlist(options.wordlistDir, options.dictionary);
  const fetchImpl = options.fetchImpl ?? fetch;
  const log = ctx.logger.child({ component: 'prober', mode: 'wordlist', jobId: job.id });
  const summary: ProbeSummary = { requested: 0, failed: 0, alerts: 0 };

  for (const raw of options.urls) {
    const base = raw.trim();
    if (base === '') continue;
    for (const word of words) {
      const url = `${base}/${word}`;
      summary.requested++;
      const status = await requestStatus(ctx, fetchImpl, url, options.timeoutMs);
      if (status === undefined) {
        summary.failed++;
        continue;
      }
      if (status < 200 || status >= 300) continue;

      ctx.delta.emit({
        message: `[wordlist-${options.dictionary}][RESPONSE][${status}]`,
        url,
        dictionary: options.dictionary,
        datetime: ctx.now().toISOString(),
        JobID: job.id,
        scope: job.input,
      });
      summary.alerts++;
    }
  }

  log.info({ ...summary }, 'wordlist probe finished');
  return summary;
}

/** 各 URL を GET し、応答コードが指定に一致したら通知する */
export async function probeResponseCodes(
  ctx: EngineContext,
  options: ResponseCodeProbeOptions,
): Promise<ProbeSummary> {
  const job = getJob(ctx.db, options.jobId);
  const fetchImpl = options.fetchImpl ?? fetch;
  const log = ctx.logger.child({ component: 'prober', mode: 'codes', jobId: job.id });
  const { matchers, invalid } = parseStatusCodes(options.codes ?? DEFAULT_ALERT_CODES);
  if (invalid.length > 0) {
    log.warn({ invalid }, 'ignoring unrecognized status codes');
  }
  const summary: ProbeSummary = { requested: 0, failed: 0, alerts: 0 };

  for (const raw of options.urls) {
    const url = raw.trim();
    if (url === '') continue;
    summary.requested++;
    const status = await requestStatus(ctx, fetchImpl, url, options.timeoutMs);
    if (status === undefined) {
      summary.failed++;
      continue;
    }
    const matched = matchStatusCode(matchers, status);
    if (matched === undefined) continue;

    ctx.delta.emit({
      message: `[STATUS][CODE][${matched}][${status}]`,
      url,
      dictionary: options.dictionary ?? '',
      datetime: ctx.now().toISOString(),
      JobID: job.id,
      scope: job.input,
    });
    summary.alerts++;
  }

  log.info({ ...summary }, 'response code probe finished');
  return summary;
}
