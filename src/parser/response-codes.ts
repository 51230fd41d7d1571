/**
 * surfacewatch — HTTP ステータスコードの指定
 *
 * `"404"`、`"4xx,5xx"`、`"200,301,4xx"` のような指定をパースし、
 * 応答コードとの一致を判定する。
 */

export type StatusCodeMatcher =
  | { kind: 'exact'; code: number }
  | { kind: 'class'; hundreds: number };

const EXACT = /^\d{3}$/;
const CLASS = /^([1-5])xx$/i;

/** カンマ区切りの指定をパースする。解釈できない要素は invalid に入る。 */
export function parseStatusCodes(codes: string): {
  matchers: StatusCodeMatcher[];
  invalid: string[];
} {
  const matchers: StatusCodeMatcher[] = [];
  const invalid: string[] = [];

  for (const raw of codes.split(',')) {
    const item = raw.trim();
    if (item === '') continue;
    if (EXACT.test(item)) {
      matchers.push({ kind: 'exact', code: Number(item) });
      continue;
    }
    const cls = CLASS.exec(item);
    if (cls !== null) {
      matchers.push({ kind: 'class', hundreds: Number(cls[1]) });
      continue;
    }
    invalid.push(item);
  }

  return { matchers, invalid };
}

/**
 * 一致した指定を文字列で返す（`"404"` / `"4xx"`）。一致しなければ undefined。
 * 個別コードの一致がクラス指定より優先される。
 */
export function matchStatusCode(
  matchers: readonly StatusCodeMatcher[],
  status: number,
): string | undefined {
  for (const m of matchers) {
    if (m.kind === 'exact' && m.code === status) return String(m.code);
  }
  for (const m of matchers) {
    if (m.kind === 'class' && Math.floor(status / 100) === m.hundreds) return `${m.hundreds}xx`;
  }
  return undefined;
}
