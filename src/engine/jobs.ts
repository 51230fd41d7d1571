/**
 * surfacewatch — ジョブ
 *
 * ジョブはレコード集合と include / exclude の正規表現の組。
 * selectJobTargets は検索結果をスキャナーへ渡す入力（ホスト名や URL）に展開する。
 */

import type Database from 'better-sqlite3';
import { HostRepository } from '../db/repository/host-repository.js';
import { JobRepository } from '../db/repository/job-repository.js';
import { LookupError } from '../errors.js';
import type { Job, RecordSet, ServiceRow } from '../types/entities.js';
import { searchRecords } from './search.js';

export interface CreateJobRequest {
  name: string;
  input: RecordSet;
  module?: string;
  regexp?: string;
  exclude?: string;
  tag?: string;
  info?: string;
}

export function createJob(db: Database.Database, request: CreateJobRequest, now = new Date()): Job {
  return new JobRepository(db).create(
    {
      name: request.name,
      input: request.input,
      module: request.module ?? 'error',
      regexp: request.regexp ?? '.*',
      exclude: request.exclude ?? '',
      tag: request.tag ?? '',
      info: request.info ?? '',
    },
    now.toISOString(),
  );
}

/** ジョブを取得する。存在しなければ LookupError。 */
export function getJob(db: Database.Database, id: number): Job {
  const job = new JobRepository(db).findById(id);
  if (job === undefined) {
    throw new LookupError('job', id);
  }
  return job;
}

export function listJobs(db: Database.Database): Job[] {
  return new JobRepository(db).findAll();
}

export function deleteJob(db: Database.Database, id: number): void {
  if (!new JobRepository(db).delete(id)) {
    throw new LookupError('job', id);
  }
}

// ============================================================
// 対象の展開
// ============================================================

export const TARGET_FORMATS = ['host', 'url', 'ftp', 'telnet'] as const;
export type TargetFormat = (typeof TARGET_FORMATS)[number];

/** ホストのサービスから URL を組み立てる。該当しないサービスは無視する。 */
export function serviceUrls(name: string, services: readonly ServiceRow[], format: TargetFormat): string[] {
  const urls: string[] = [];
  for (const service of services) {
    const url = serviceUrl(name, service, format);
    if (url !== undefined) urls.push(url);
  }
  return urls;
}

function withPort(scheme: string, name: string, port: string, defaultPort: string): string {
  return port === defaultPort ? `${scheme}://${name}` : `${scheme}://${name}:${port}`;
}

function serviceUrl(name: string, service: ServiceRow, format: TargetFormat): string | undefined {
  const svc = service.name;
  switch (format) {
    case 'host':
      return undefined;
    case 'url':
      if (svc.includes('https') || (svc.includes('http') && svc.includes('ssl'))) {
        return withPort('https', name, service.port, '443');
      }
      if (svc.includes('http')) {
        if (service.port === '443') return `https://${name}`;
        return withPort('http', name, service.port, '80');
      }
      return undefined;
    case 'ftp':
      return svc.includes('ftp') ? withPort('ftp', name, service.port, '21') : undefined;
    case 'telnet':
      return svc.includes('telnet') ? withPort('telnet', name, service.port, '23') : undefined;
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown target format: ${String(_exhaustive)}`);
    }
  }
}

/**
 * ジョブの条件で対象を選ぶ。
 * format が host 以外の場合、サービスを持つレコード集合（services / inservices）の
 * ホストだけが URL に展開される。
 */
export function selectJobTargets(
  db: Database.Database,
  jobId: number,
  format: TargetFormat = 'host',
): string[] {
  const job = getJob(db, jobId);
  const hits = searchRecords(db, { recordSet: job.input, regexp: job.regexp, exclude: job.exclude });

  if (format === 'host') {
    return [...new Set(hits.map((h) => h.name))];
  }

  if (job.input !== 'services' && job.input !== 'inservices') {
    return [];
  }
  const hosts = new HostRepository(db);
  return hits.flatMap((hit) => serviceUrls(hit.name, hosts.listServices(hit.id), format));
}
