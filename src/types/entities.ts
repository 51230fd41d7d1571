/**
 * surfacewatch — Entity type definitions
 *
 * DB の各テーブルに対応する camelCase のエンティティ型。
 * Repository 層がスネークケースの行をこの型に変換して返す。
 */

// ============================================================
// 共通列挙
// ============================================================

/** 識別子の分類結果 */
export const IDENTIFIER_TYPES = [
  'ADDRESS',
  'CIDR',
  'URL',
  'DOMAIN',
  'FILE_HASH',
  'EMAIL',
  'UNKNOWN',
] as const;
export type IdentifierType = (typeof IDENTIFIER_TYPES)[number];

/** ネットワーク区分（外部 / 内部） */
export const ZONES = ['external', 'internal'] as const;
export type Zone = (typeof ZONES)[number];

/** Finding のスコープコード（E = external, I = internal） */
export type ScopeCode = 'E' | 'I';

/** トリアージ状態: -1 未設定 / 0 誤検知 / 1 真陽性 */
export type TriageStatus = -1 | 0 | 1;

// ============================================================
// エンティティ
// ============================================================

/** 外部・内部のスコープ登録 */
export interface Target {
  id: number;
  zone: Zone;
  name: string;
  type: IdentifierType;
  tag: string;
  owner: string;
  metadata: string;
  lastdate: string;
  createdAt: string;
}

/** サブドメイン列挙などの発見結果 */
export interface Discovery {
  id: number;
  name: string;
  type: IdentifierType;
  tag: string;
  info: string;
  owner: string;
  metadata: string;
  lastdate: string;
  createdAt: string;
}

/** サービスを持つホスト（ポートスキャン結果の集約行） */
export interface Host {
  id: number;
  zone: Zone;
  name: string;
  nname: string;
  ipv4: string;
  type: IdentifierType;
  tag: string;
  serviceSsh: string;
  serviceRdp: string;
  serviceFtp: string;
  serviceTelnet: string;
  serviceSmb: string;
  info: string;
  infoGnmap: string;
  owner: string;
  metadata: string;
  lastdate: string;
  createdAt: string;
}

/** ホストに従属するサービス行（7 フィールド記述子の永続化形） */
export interface ServiceRow {
  id: number;
  hostId: number;
  port: string;
  state: string;
  protocol: string;
  owner: string;
  name: string;
  rpcInfo: string;
  version: string;
}

/** ホストに従属する脆弱性プローブ出力の 1 行 */
export interface ProbeLine {
  id: number;
  hostId: number;
  position: number;
  line: string;
}

/** 脆弱性 Finding（name + vulnerability で一意） */
export interface Finding {
  id: number;
  name: string;
  vulnerability: string;
  tfp: TriageStatus;
  type: IdentifierType;
  ipv4: string;
  ipv6: string;
  level: string;
  scope: ScopeCode;
  engine: string;
  status: string;
  detectiondate: string;
  firstdate: string;
  lastdate: string;
  bumpdate: string;
  ptime: string;
  uri: string;
  fullUri: string;
  uriTruncated: 0 | 1;
  port: number;
  protocol: string;
  nname: string;
  owner: string;
  metadata: string;
  info: string;
  ticket?: string;
}

/** ジョブが対象を選ぶレコード集合 */
export const RECORD_SETS = [
  'discovery',
  'services',
  'inservices',
  'targets',
  'intargets',
  'nuclei',
] as const;
export type RecordSet = (typeof RECORD_SETS)[number];

/** redteam モジュールに紐づくジョブ */
export interface Job {
  id: number;
  name: string;
  input: RecordSet;
  module: string;
  regexp: string;
  exclude: string;
  tag: string;
  info: string;
  createdAt: string;
}

/** 保存済みの検索条件 */
export interface SavedSearch {
  id: number;
  name: string;
  regexp: string;
  exclude: string;
  tag: string;
  info: string;
}
