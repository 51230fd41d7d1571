/**
 * surfacewatch — Nuclei 出力パーサー
 *
 * 2 種類の行形式を扱う。
 *
 *   [2022-09-05 07:17:51] [CVE-2021-40438] [http] [critical] http://host/path
 *   [2022-09-01 22:19:31] [waf-detect:apachegeneric] [matched] [http] [info] https://host/
 *
 * および `-jsonl` 出力（`{"template-id": ...}`）。
 * どちらも ParsedProbeFinding に変換し、URI からホスト名とポートを決定する。
 */

import type { LineParseResult, ParsedProbeFinding, ParsedProbeLine } from '../types/parser.js';
import { emptyLineParseResult, splitLines } from '../types/parser.js';
import { classifyIdentifier, DOMAIN_PATTERN } from './identifier.js';

/** 既知の深刻度。それ以外は info に丸める */
export const SEVERITY_LEVELS = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type SeverityLevel = (typeof SEVERITY_LEVELS)[number];

/** uri 列に格納する最大長 */
export const URI_MAX_LENGTH = 250;

const FINDING_LINE = /^\[[A-Za-z0-9 \-:]*\] \[/;
const BRACKET_GROUP = /^\s*\[([^\]]*)\]/;
const BRACKET_DATE = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;
const JSON_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})(?:\.(\d+))?/;

// ホスト / ポート推定用（アンカーなし、最初の一致を使う）
const DOMAIN = new RegExp(DOMAIN_PATTERN);
const DOMAIN_PORT = new RegExp(`${DOMAIN_PATTERN}:(\\d+)`);
const IP = /(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})/;
const IP_PORT = /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}:\d+/;
const PORT = /:(\d+)/;
const DOUBLE_PORT = /:\d+:(\d+)/;

// ============================================================
// ユーティリティ
// ============================================================

export function normalizeSeverity(value: string): SeverityLevel {
  const lower = value.toLowerCase();
  for (const level of SEVERITY_LEVELS) {
    if (level === lower) return level;
  }
  return 'info';
}

/** 明示ポート。`host:port:port` の場合は後ろのポート */
function explicitPort(uri: string): string {
  return DOUBLE_PORT.exec(uri)?.[1] ?? PORT.exec(uri)?.[1] ?? '443';
}

/**
 * URI からホスト名とポートを決める。
 *
 * ドメイン+ポート → IPv4+ポート → ドメイン → IPv4 の順に試す。
 * 明示ポートが無い場合は https → 443、http → 80、それ以外 443。
 */
export function resolveHostAndPort(uri: string): { name: string; port: number } {
  if (DOMAIN_PORT.test(uri)) {
    return { name: DOMAIN.exec(uri)?.[0] ?? '', port: Number(explicitPort(uri)) };
  }
  if (IP_PORT.test(uri)) {
    return { name: IP.exec(uri)?.[1] ?? '', port: Number(explicitPort(uri)) };
  }

  const name = DOMAIN.exec(uri)?.[0] ?? IP.exec(uri)?.[1] ?? '';
  const plainHttp = uri.startsWith('http') && !uri.startsWith('https');
  return { name, port: plainHttp ? 80 : 443 };
}

export function truncateUri(fullUri: string): { uri: string; uriTruncated: 0 | 1 } {
  return fullUri.length > URI_MAX_LENGTH
    ? { uri: fullUri.slice(0, URI_MAX_LENGTH), uriTruncated: 1 }
    : { uri: fullUri, uriTruncated: 0 };
}

/** 暦として存在する日時か（2024-13-45 などを弾く） */
function isValidTimestamp(iso: string): boolean {
  return !Number.isNaN(Date.parse(iso));
}

/** JSONL の timestamp（ナノ秒精度まで）をミリ秒精度の ISO 文字列にする */
function normalizeTimestamp(value: string): string | undefined {
  const m = JSON_TIMESTAMP.exec(value);
  if (m === null) return undefined;
  const millis = (m[3] ?? '').slice(0, 3).padEnd(3, '0');
  return `${m[1]}T${m[2]}.${millis}Z`;
}

function baseFinding(fullUri: string, line: string): Omit<
  ParsedProbeFinding,
  'vulnerability' | 'engine' | 'level' | 'status' | 'detectiondate' | 'info'
> {
  const { name, port } = resolveHostAndPort(fullUri);
  return {
    name,
    nname: name,
    port,
    fullUri,
    ...truncateUri(fullUri),
    ipv4: classifyIdentifier(name) === 'ADDRESS' ? name : '',
    ipv6: '',
    line,
  };
}

// ============================================================
// ブラケット形式
// ============================================================

/** 行頭のブラケット群と、その後ろの残りを返す */
function takeBracketGroups(line: string): { groups: string[]; rest: string } {
  const groups: string[] = [];
  let rest = line;
  for (;;) {
    const m = BRACKET_GROUP.exec(rest);
    if (m === null) break;
    groups.push(m[1] ?? '');
    rest = rest.slice(m[0].length);
  }
  return { groups, rest: rest.trim() };
}

/** ブラケット形式の 1 行をパースする。形式外なら理由の文字列を返す。 */
export function parseNucleiBracketLine(line: string): ParsedProbeFinding | string {
  if (!FINDING_LINE.test(line)) return 'not a finding line';

  const { groups, rest } = takeBracketGroups(line);
  let detectiondate: string | undefined;
  let fields = groups;
  const date = BRACKET_DATE.exec(groups[0] ?? '');
  if (date !== null) {
    detectiondate = `${date[1]}T${date[2]}.000Z`;
    if (!isValidTimestamp(detectiondate)) return 'invalid detection date';
    fields = groups.slice(1);
  }

  if (fields.length < 3) return 'too few bracket groups';
  const fullUri = rest.split(/\s+/)[0] ?? '';
  if (fullUri === '') return 'missing URI';

  const finding: ParsedProbeFinding = {
    ...baseFinding(fullUri, line),
    vulnerability: fields[0] ?? '',
    // [vulnerability] [status] [engine] [level] の 5 グループ形式
    status: fields.length >= 4 ? (fields[1] ?? '') : '',
    engine: fields[fields.length - 2] ?? '',
    level: normalizeSeverity(fields[fields.length - 1] ?? ''),
    info: '',
  };
  if (detectiondate !== undefined) {
    finding.detectiondate = detectiondate;
  }
  return finding;
}

// ============================================================
// JSONL 形式
// ============================================================

interface NucleiJsonFinding {
  'template-id': string;
  info: { severity?: unknown } & Record<string, unknown>;
  type: string;
  host: string;
  'matched-at'?: string;
  ip?: string;
  timestamp?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNucleiJsonFinding(value: unknown): value is NucleiJsonFinding {
  if (!isRecord(value)) return false;
  if (typeof value['template-id'] !== 'string') return false;
  if (!isRecord(value.info)) return false;
  if (typeof value.type !== 'string') return false;
  if (typeof value.host !== 'string') return false;
  if ('matched-at' in value && typeof value['matched-at'] !== 'string') return false;
  if ('ip' in value && typeof value.ip !== 'string') return false;
  if ('timestamp' in value && typeof value.timestamp !== 'string') return false;
  return true;
}

/** JSONL 形式の 1 行をパースする。形式外なら理由の文字列を返す。 */
export function parseNucleiJsonLine(line: string): ParsedProbeFinding | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return 'invalid JSON';
  }
  if (!isNucleiJsonFinding(parsed)) return 'missing template-id/info/type/host';

  const fullUri = parsed['matched-at'] ?? parsed.host;
  const severity = typeof parsed.info.severity === 'string' ? parsed.info.severity : '';
  const finding: ParsedProbeFinding = {
    ...baseFinding(fullUri, line),
    vulnerability: parsed['template-id'],
    engine: parsed.type,
    level: normalizeSeverity(severity),
    status: '',
    info: JSON.stringify(parsed.info),
  };

  const ip = parsed.ip ?? '';
  if (ip.includes(':')) {
    finding.ipv6 = ip;
  } else if (ip !== '') {
    finding.ipv4 = ip;
  }
  const detected = parsed.timestamp !== undefined ? normalizeTimestamp(parsed.timestamp) : undefined;
  if (detected !== undefined) {
    if (!isValidTimestamp(detected)) return 'invalid timestamp';
    finding.detectiondate = detected;
  }
  return finding;
}

// ============================================================
// メインパーサー
// ============================================================

/**
 * nuclei 出力をパースする。`{` で始まる行は JSONL、それ以外はブラケット形式。
 */
export function parseNucleiLines(content: string): LineParseResult<ParsedProbeFinding> {
  const result = emptyLineParseResult<ParsedProbeFinding>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === '') return;
    const parsed = line.startsWith('{') ? parseNucleiJsonLine(line) : parseNucleiBracketLine(line);
    if (typeof parsed === 'string') {
      result.skipped.push({ lineNumber: index + 1, line, reason: parsed });
      return;
    }
    if (parsed.name === '') {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'no host in URI' });
      return;
    }
    result.records.push(parsed);
  });

  return result;
}

/**
 * WAF 検出テンプレートの結果から WAF 未設置の Finding を作る。
 * status が failed の行だけを MISSING-WAF / medium として残す。
 */
export function toMissingWafFinding(finding: ParsedProbeFinding): ParsedProbeFinding | undefined {
  if (finding.status !== 'failed') return undefined;
  return { ...finding, vulnerability: 'MISSING-WAF', level: 'medium' };
}

// ============================================================
// 行だけを保存する形式（http / network テンプレートの出力）
// ============================================================

const NETWORK_LINE = /\[network\]/;

/** 抜き出した部分からホスト名を決める。ドメインが無ければ IPv4 */
function hostOf(fragment: string): string {
  return DOMAIN.exec(fragment)?.[0] ?? IP.exec(fragment)?.[1] ?? '';
}

function parseHostLines(
  content: string,
  extract: (line: string) => string | undefined,
): LineParseResult<ParsedProbeLine> {
  const result = emptyLineParseResult<ParsedProbeLine>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === '') return;
    const fragment = extract(line);
    if (fragment === undefined) {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'no target in line' });
      return;
    }
    const name = hostOf(fragment);
    if (name === '') {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'no host in target' });
      return;
    }
    result.records.push({ name, ipv4: classifyIdentifier(name) === 'ADDRESS' ? name : '', line });
  });

  return result;
}

/** `scheme://host[:port]/...` を含む行。ホストは `://` の直後から最初の `/` まで */
export function parseNucleiHttpLines(content: string): LineParseResult<ParsedProbeLine> {
  return parseHostLines(content, (line) => {
    if (!line.includes('http') || !line.includes('://')) return undefined;
    return line.split('://')[1]?.split('/')[0];
  });
}

/** `[network]` を含む行。ホストは最後の空白区切りトークンの `:` より前 */
export function parseNucleiNetworkLines(content: string): LineParseResult<ParsedProbeLine> {
  return parseHostLines(content, (line) => {
    if (!NETWORK_LINE.test(line)) return undefined;
    return line.trim().split(' ').pop()?.split(':')[0];
  });
}
