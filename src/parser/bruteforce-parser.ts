/**
 * surfacewatch — ブルートフォース結果パーサー
 *
 * patator の CSV 出力と hydra のテキスト出力から、成功した認証情報を取り出す。
 */

import { parse as parseCsv } from 'csv-parse/sync';
import type { LineParseResult, ParsedCredential } from '../types/parser.js';
import { emptyLineParseResult, splitLines } from '../types/parser.js';

/** patator の CSV で成功を示す code 列の値 */
const PATATOR_SUCCESS_CODE = '0';
const PATATOR_CODE_COLUMN = 2;
const PATATOR_CANDIDATE_COLUMN = 5;

const HYDRA_LINE =
  /^(\[.*\])(\[.*\])\s+host:\s+([a-z,0-9,A-Z,.]*)\s+login:\s+(\S*)\s+password:\s+(.*)$/;

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row: unknown) => Array.isArray(row) && row.every((cell: unknown) => typeof cell === 'string'))
  );
}

/**
 * patator の CSV 出力をパースする。
 *
 * code 列が 0 の行だけを成功とみなし、candidate 列（`host:user:password`）を分解する。
 * 失敗行は skipped に入れない（試行結果であって不正な行ではない）。
 */
export function parsePatatorCsv(content: string): LineParseResult<ParsedCredential> {
  const result = emptyLineParseResult<ParsedCredential>();

  const rows: unknown = parseCsv(content, {
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_records_with_error: true,
  });
  if (!isStringRows(rows)) {
    return result;
  }

  rows.forEach((row, index) => {
    if (row[PATATOR_CODE_COLUMN] !== PATATOR_SUCCESS_CODE) return;

    const line = row.join(',');
    const candidate = (row[PATATOR_CANDIDATE_COLUMN] ?? '').split(':');
    const [hostname = '', username = ''] = candidate;
    if (candidate.length < 3 || hostname === '') {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'malformed candidate column' });
      return;
    }

    result.records.push({
      hostname,
      username,
      // パスワード中の ':' はそのまま残す
      password: candidate.slice(2).join(':'),
      line,
    });
  });

  return result;
}

/** hydra の出力をパースする。`#` で始まる行は無視する。 */
export function parseHydraLines(content: string): LineParseResult<ParsedCredential> {
  const result = emptyLineParseResult<ParsedCredential>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === '' || line.startsWith('#')) return;

    const m = HYDRA_LINE.exec(line);
    if (m === null) {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'not a hydra result line' });
      return;
    }

    result.records.push({
      hostname: m[3] ?? '',
      username: m[4] ?? '',
      password: m[5] ?? '',
      line,
    });
  });

  return result;
}
