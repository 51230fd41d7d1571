/**
 * surfacewatch — サブドメイン列挙パーサー
 *
 * amass のテキスト出力（`[Source] host info`）と subfinder の JSONL 出力を
 * ParsedDiscovery の配列に変換する。
 */

import type { LineParseResult, ParsedDiscovery } from '../types/parser.js';
import { emptyLineParseResult, splitLines } from '../types/parser.js';

const SOURCE_PREFIX = /^\[[A-Za-z0-9 ]+\].*/;
const TAG_SEPARATOR = /\]\s+/;
const WHITESPACE = /\s+/;

/**
 * amass のテキスト出力をパースする。
 *
 * 先頭のブラケット群（`[A][B]`）がタグ、その後ろを空白で分割した
 * 先頭トークンがドメイン、2 番目が info。
 */
export function parseAmassLines(content: string): LineParseResult<ParsedDiscovery> {
  const result = emptyLineParseResult<ParsedDiscovery>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === '') return;
    if (!SOURCE_PREFIX.test(line)) {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'no source tag' });
      return;
    }

    const [tagPart = '', rest = ''] = line.split(TAG_SEPARATOR);
    const tokens = rest.trim().split(WHITESPACE);
    const name = tokens[0] ?? '';
    if (name === '') {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'missing domain' });
      return;
    }

    result.records.push({
      name,
      tag: `${tagPart}]`,
      info: tokens[1] ?? '',
      line,
    });
  });

  return result;
}

// ============================================================
// subfinder JSONL
// ============================================================

interface SubfinderEntry {
  host: string;
  input: string;
  sources: string[];
}

function isSubfinderEntry(value: unknown): value is SubfinderEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('host' in value) || typeof value.host !== 'string') return false;
  if (!('input' in value) || typeof value.input !== 'string') return false;
  if (!('sources' in value) || !Array.isArray(value.sources)) return false;
  return value.sources.every((s: unknown) => typeof s === 'string');
}

/** subfinder の JSONL 出力をパースする。タグは sources を `[s1][s2]` に連結したもの。 */
export function parseSubfinderJsonl(content: string): LineParseResult<ParsedDiscovery> {
  const result = emptyLineParseResult<ParsedDiscovery>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'invalid JSON' });
      return;
    }
    if (!isSubfinderEntry(parsed)) {
      result.skipped.push({ lineNumber: index + 1, line, reason: 'missing host/input/sources' });
      return;
    }

    result.records.push({
      name: parsed.host,
      tag: parsed.sources.map((s) => `[${s}]`).join(''),
      info: parsed.input,
      line,
    });
  });

  return result;
}
