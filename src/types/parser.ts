/**
 * surfacewatch — Parser intermediate types
 *
 * パーサーは DB の ID を持たない中間表現を返す。
 * Engine 層が自然キー（name, name+vulnerability）で DB を検索・upsert する。
 */

// ============================================================
// 中間表現（DB ID を持たない）
// ============================================================

/** 7 フィールドのサービス記述子 port/state/protocol/owner/name/rpc_info/version */
export interface ServiceDescriptor {
  port: string;
  state: string;
  protocol: string;
  owner: string;
  name: string;
  rpcInfo: string;
  version: string;
}

/** サブドメイン列挙ツールの 1 行 */
export interface ParsedDiscovery {
  name: string;
  /** 連結済みのソースタグ（例: "[CertSpotter][DNS]"） */
  tag: string;
  info: string;
  line: string;
}

/** ポートスキャンのホスト 1 件 */
export interface ParsedHostScan {
  name: string;
  nname: string;
  ipv4: string;
  /** ポート一覧の生文字列（", " 区切りの記述子） */
  portList: string;
  services: ServiceDescriptor[];
  line: string;
}

/** 脆弱性プローブ出力の 1 行 */
export interface ParsedProbeFinding {
  name: string;
  nname: string;
  port: number;
  vulnerability: string;
  engine: string;
  level: string;
  /** 5 グループ形式の状態トークン（"matched" / "failed" など）。無ければ空文字 */
  status: string;
  /** 行に日付が無い場合は undefined（取り込み時刻で補完する） */
  detectiondate?: string;
  fullUri: string;
  uri: string;
  uriTruncated: 0 | 1;
  ipv4: string;
  ipv6: string;
  /** JSONL 形式の info オブジェクト等、任意の付帯情報（JSON 文字列） */
  info: string;
  line: string;
}

/** 深刻度を読まないプローブ出力の 1 行（ホストの行として保存するだけ） */
export interface ParsedProbeLine {
  name: string;
  ipv4: string;
  line: string;
}

/** WordPress スキャン結果の脆弱性 1 件 */
export interface WpscanVulnerability {
  title: string;
  references: Record<string, unknown>;
  /** レポート上の元オブジェクト */
  raw: Record<string, unknown>;
}

/** 脆弱性を持つレポートの区画（プラグインごと、バージョン、テーマ、設定バックアップ） */
export interface ParsedWpscanSection {
  section: string;
  targetUrl: string;
  targetIp: string;
  vulnerabilities: WpscanVulnerability[];
}

/** ブルートフォースで得られた認証情報 */
export interface ParsedCredential {
  hostname: string;
  username: string;
  password: string;
  line: string;
}

/** スコープ登録の取り込み 1 件（所有者・付帯情報つき） */
export interface ParsedTargetRecord {
  name: string;
  owner: string;
  /** 保存する metadata の JSON 文字列 */
  metadata: string;
  line: string;
}

/** スキップした行と理由 */
export interface SkippedLine {
  lineNumber: number;
  line: string;
  reason: string;
}

// ============================================================
// パース結果
// ============================================================

/** パーサーが返す統一的な結果型 */
export interface LineParseResult<T> {
  records: T[];
  skipped: SkippedLine[];
}

/** 空の LineParseResult を生成するユーティリティ */
export function emptyLineParseResult<T>(): LineParseResult<T> {
  return { records: [], skipped: [] };
}

/** 入力テキストを行に分割する（CRLF 対応）。空行の扱いは各パーサーに任せる。 */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}
