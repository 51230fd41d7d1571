/**
 * surfacewatch — スコープ登録の取り込みパーサー
 *
 * 資産台帳のエクスポート（CSV / JSON）や証明書透過ログの検索結果を、
 * 所有者と付帯情報を持つ ParsedTargetRecord に変換する。
 *
 *   jsonl      1 行 1 オブジェクト（domain 必須、owner 任意）。行そのものを metadata に保存
 *   vmw.csv    ,Public IP,OwnerEmail,Account ID,ServiceName,Environment,RequestedBy
 *   vmw.csvfd  ,accountID,entityId,PublicIP,OwnerEmail,ServiceName,Environment,RequestedBy
 *   vmw.json   { アカウント ID: [ドメイン[], 所有者, 環境] }（DNS ゾーンのエクスポート）
 *   crt.sh     1 行 1 ドメイン。所有者は呼び出し側が指定
 *
 * jsonl 以外は一度 jsonl と同じ単位（TargetUnit）に変換してから metadata にする。
 */

import { parse as parseCsv } from 'csv-parse/sync';
import type { LineParseResult, ParsedTargetRecord } from '../types/parser.js';
import { emptyLineParseResult, splitLines } from '../types/parser.js';

export const TARGET_IMPORT_FORMATS = ['jsonl', 'vmw.csv', 'vmw.csvfd', 'vmw.json', 'crt.sh'] as const;
export type TargetImportFormat = (typeof TARGET_IMPORT_FORMATS)[number];

export interface TargetImportOptions {
  /** 変換した単位に載せるタグ */
  tag: string;
  /** crt.sh の所有者 */
  owner?: string;
}

/** 変換後の 1 件。JSON にしたものが metadata になる */
interface TargetUnit {
  owner: string;
  accountid?: string;
  environment?: string;
  tag: string;
  domain: string;
  description?: string;
}

export const DEFAULT_IMPORT_OWNER = 'user@domain';
export const CRTSH_DESCRIPTION = 'Discovery from Crt.sh';

/** Route 53 のエクスポートでワイルドカードを表すエスケープ */
const ESCAPED_WILDCARD = /\\052\./g;

function unitRecord(unit: TargetUnit, line: string): ParsedTargetRecord {
  return { name: unit.domain, owner: unit.owner, metadata: JSON.stringify(unit), line };
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row: unknown) => Array.isArray(row) && row.every((cell: unknown) => typeof cell === 'string'))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

// ============================================================
// jsonl
// ============================================================

export function parseTargetJsonl(content: string): LineParseResult<ParsedTargetRecord> {
  const result = emptyLineParseResult<ParsedTargetRecord>();

  splitLines(content).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'invalid JSON' });
      return;
    }
    const domain = isRecord(parsed) ? parsed['domain'] : undefined;
    if (typeof domain !== 'string' || domain.trim() === '') {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'missing domain' });
      return;
    }

    const owner = isRecord(parsed) ? parsed['owner'] : undefined;
    result.records.push({
      name: domain.trim(),
      owner: typeof owner === 'string' ? owner : 'Unknown',
      metadata: line,
      line,
    });
  });

  return result;
}

// ============================================================
// CSV 台帳
// ============================================================

interface CsvLayout {
  columns: number;
  toUnit(row: string[], tag: string): TargetUnit;
}

const CSV_LAYOUTS = {
  'vmw.csv': {
    columns: 7,
    toUnit: (row, tag) => ({
      owner: `${row[2] ?? ''},${row[6] ?? ''}`,
      accountid: row[3] ?? '',
      environment: row[5] ?? '',
      tag,
      domain: (row[1] ?? '').trim(),
      description: row[4] ?? '',
    }),
  },
  'vmw.csvfd': {
    columns: 8,
    toUnit: (row, tag) => ({
      owner: `${row[4] ?? ''},${row[7] ?? ''}`,
      accountid: row[1] ?? '',
      environment: row[6] ?? '',
      tag,
      domain: (row[3] ?? '').trim(),
      description: row[5] ?? '',
    }),
  },
} satisfies Record<string, CsvLayout>;

/** 台帳 CSV を読む。1 行目は見出しとして捨てる。 */
export function parseTargetCsv(
  content: string,
  layout: keyof typeof CSV_LAYOUTS,
  options: TargetImportOptions,
): LineParseResult<ParsedTargetRecord> {
  const result = emptyLineParseResult<ParsedTargetRecord>();
  const csvLayout: CsvLayout = CSV_LAYOUTS[layout];

  const rows: unknown = parseCsv(content, {
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });
  if (!isStringRows(rows)) return result;

  rows.slice(1).forEach((row, index) => {
    const line = row.join(',');
    const lineNumber = index + 2;
    if (row.length < csvLayout.columns) {
      result.skipped.push({ lineNumber, line, reason: `expected ${csvLayout.columns} columns` });
      return;
    }
    const unit = csvLayout.toUnit(row, options.tag);
    if (unit.domain === '') {
      result.skipped.push({ lineNumber, line, reason: 'missing domain' });
      return;
    }
    result.records.push(unitRecord(unit, line));
  });

  return result;
}

// ============================================================
// DNS ゾーンのエクスポート
// ============================================================

/** ゾーン名の末尾の `.` を落とし、`\052.`（ワイルドカード）を取り除く */
export function normalizeZoneDomain(domain: string): string {
  return domain.slice(0, -1).replace(ESCAPED_WILDCARD, '');
}

export function parseTargetZoneJson(
  content: string,
  options: TargetImportOptions,
): LineParseResult<ParsedTargetRecord> {
  const result = emptyLineParseResult<ParsedTargetRecord>();

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    result.skipped.push({ lineNumber: 1, line: content.slice(0, 200), reason: 'invalid JSON' });
    return result;
  }
  if (!isRecord(parsed)) {
    result.skipped.push({ lineNumber: 1, line: content.slice(0, 200), reason: 'expected an object of accounts' });
    return result;
  }

  Object.entries(parsed).forEach(([account, section], index) => {
    const line = JSON.stringify({ [account]: section });
    const [domains, owner, environment] = isList(section) ? section : [];
    if (!isList(domains)) {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'expected [domains, owner, environment]' });
      return;
    }
    for (const domain of domains) {
      if (typeof domain !== 'string') continue;
      const name = normalizeZoneDomain(domain);
      if (name === '') continue;
      result.records.push(
        unitRecord(
          {
            owner: String(owner ?? ''),
            accountid: account,
            environment: String(environment ?? ''),
            tag: options.tag,
            domain: name,
          },
          line,
        ),
      );
    }
  });

  return result;
}

// ============================================================
// crt.sh
// ============================================================

export function parseCrtshLines(content: string, options: TargetImportOptions): LineParseResult<ParsedTargetRecord> {
  const result = emptyLineParseResult<ParsedTargetRecord>();
  const owner = options.owner ?? DEFAULT_IMPORT_OWNER;

  for (const rawLine of splitLines(content)) {
    const domain = rawLine.trim();
    if (domain === '') continue;
    result.records.push(unitRecord({ owner, tag: options.tag, domain, description: CRTSH_DESCRIPTION }, domain));
  }

  return result;
}

/** 形式名からパーサーを選ぶ */
export function parseTargetImport(
  format: TargetImportFormat,
  content: string,
  options: TargetImportOptions,
): LineParseResult<ParsedTargetRecord> {
  switch (format) {
    case 'jsonl':
      return parseTargetJsonl(content);
    case 'vmw.csv':
    case 'vmw.csvfd':
      return parseTargetCsv(content, format, options);
    case 'vmw.json':
      return parseTargetZoneJson(content, options);
    case 'crt.sh':
      return parseCrtshLines(content, options);
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown target import format: ${String(_exhaustive)}`);
    }
  }
}
