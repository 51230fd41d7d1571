/**
 * surfacewatch — WordPress スキャン結果パーサー
 *
 * wpscan の `--format json` 出力から、脆弱性を持つ区画を取り出す。
 * 区画はプラグイン（キー順）、version、main_theme、config_backups の順。
 */

import { z } from 'zod';
import type { LineParseResult, ParsedWpscanSection, WpscanVulnerability } from '../types/parser.js';
import { emptyLineParseResult } from '../types/parser.js';

const vulnerabilitySchema = z
  .object({
    title: z.string(),
    references: z.record(z.unknown()).default({}),
  })
  .passthrough();

const sectionSchema = z
  .object({
    vulnerabilities: z.array(vulnerabilitySchema).default([]),
  })
  .passthrough();

const reportSchema = z.object({
  target_url: z.string().min(1),
  target_ip: z.string().default(''),
  plugins: z.record(sectionSchema).nullish(),
  version: sectionSchema.nullish(),
  main_theme: sectionSchema.nullish(),
  config_backups: sectionSchema.nullish(),
});

type WpscanReport = z.infer<typeof reportSchema>;

const FIXED_SECTIONS = ['version', 'main_theme', 'config_backups'] as const;

/** 参照に CVE があれば `CVE-<最初の番号>`、無ければタイトル */
export function vulnerabilityId(vulnerability: WpscanVulnerability): string {
  const cve = vulnerability.references['cve'];
  if (Array.isArray(cve) && cve.length > 0) {
    const first: unknown = cve[0];
    if (typeof first === 'string' || typeof first === 'number') return `CVE-${first}`;
  }
  return vulnerability.title;
}

function toSection(
  report: WpscanReport,
  section: string,
  content: z.infer<typeof sectionSchema> | null | undefined,
): ParsedWpscanSection | undefined {
  if (content === null || content === undefined || content.vulnerabilities.length === 0) return undefined;
  return {
    section,
    targetUrl: report.target_url,
    targetIp: report.target_ip,
    vulnerabilities: content.vulnerabilities.map(({ title, references, ...rest }) => ({
      title,
      references,
      raw: { title, references, ...rest },
    })),
  };
}

export function parseWpscanJson(content: string): LineParseResult<ParsedWpscanSection> {
  const result = emptyLineParseResult<ParsedWpscanSection>();
  const head = content.slice(0, 200);

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    result.skipped.push({ lineNumber: 1, line: head, reason: 'invalid JSON' });
    return result;
  }
  const report = reportSchema.safeParse(parsed);
  if (!report.success) {
    const issue = report.error.issues[0];
    const reason = issue === undefined ? 'invalid report' : `${issue.path.join('.')}: ${issue.message}`;
    result.skipped.push({ lineNumber: 1, line: head, reason });
    return result;
  }

  const data = report.data;
  const sections: Array<ParsedWpscanSection | undefined> = [
    ...Object.entries(data.plugins ?? {}).map(([plugin, section]) => toSection(data, `plugins/${plugin}`, section)),
    ...FIXED_SECTIONS.map((name) => toSection(data, name, data[name])),
  ];
  for (const section of sections) {
    if (section !== undefined) result.records.push(section);
  }

  return result;
}
