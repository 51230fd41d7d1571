/**
 * surfacewatch — SQLite schema
 *
 * This schema is the single source of truth for the database structure.
 * Incremental changes for existing databases live in ./migrations.
 */

export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- ============================================================
-- スコープ登録（外部 / 内部）
-- ============================================================
CREATE TABLE IF NOT EXISTS targets (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  zone          TEXT NOT NULL,              -- "external" | "internal"
  name          TEXT NOT NULL,
  type          TEXT NOT NULL DEFAULT 'DOMAIN',
  tag           TEXT NOT NULL DEFAULT 'DEFAULT',
  owner         TEXT NOT NULL DEFAULT '',
  metadata      TEXT NOT NULL DEFAULT '',   -- JSON (owner, scope, tag, ...)
  lastdate      TEXT NOT NULL,
  created_at    TEXT NOT NULL,
  UNIQUE (zone, name)
);

CREATE INDEX IF NOT EXISTS idx_targets_tag ON targets(zone, tag);

-- ============================================================
-- 発見結果（サブドメイン列挙）
-- ============================================================
CREATE TABLE IF NOT EXISTS discoveries (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  name          TEXT NOT NULL UNIQUE,
  type          TEXT NOT NULL DEFAULT 'DOMAIN',
  tag           TEXT NOT NULL DEFAULT 'DEFAULT',
  info          TEXT NOT NULL DEFAULT '',
  owner         TEXT NOT NULL DEFAULT '',
  metadata      TEXT NOT NULL DEFAULT '',
  lastdate      TEXT NOT NULL,
  created_at    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_discoveries_tag ON discoveries(tag);

-- ============================================================
-- ホスト（サービス集約）
-- ============================================================
CREATE TABLE IF NOT EXISTS hosts (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  zone            TEXT NOT NULL,
  name            TEXT NOT NULL,
  nname           TEXT NOT NULL DEFAULT 'unknown',   -- リダイレクト / 逆引き名
  ipv4            TEXT NOT NULL DEFAULT '',
  type            TEXT NOT NULL DEFAULT 'DOMAIN',
  tag             TEXT NOT NULL DEFAULT '',
  service_ssh     TEXT NOT NULL DEFAULT '',
  service_rdp     TEXT NOT NULL DEFAULT '',
  service_ftp     TEXT NOT NULL DEFAULT '',
  service_telnet  TEXT NOT NULL DEFAULT '',
  service_smb     TEXT NOT NULL DEFAULT '',
  info            TEXT NOT NULL DEFAULT '',          -- スキャンレポート全文
  info_gnmap      TEXT NOT NULL DEFAULT '',          -- grep 形式の生行
  owner           TEXT NOT NULL DEFAULT '',
  metadata        TEXT NOT NULL DEFAULT '',
  lastdate        TEXT NOT NULL,
  created_at      TEXT NOT NULL,
  UNIQUE (zone, name)
);

CREATE INDEX IF NOT EXISTS idx_hosts_nname ON hosts(zone, nname);

-- ============================================================
-- サービス（ホストに従属）
-- ============================================================
CREATE TABLE IF NOT EXISTS services (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  host_id       INTEGER NOT NULL,
  port          TEXT NOT NULL,
  state         TEXT NOT NULL,
  protocol      TEXT NOT NULL,
  owner         TEXT NOT NULL,
  name          TEXT NOT NULL,
  rpc_info      TEXT NOT NULL,
  version       TEXT NOT NULL,
  FOREIGN KEY (host_id) REFERENCES hosts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_services_host ON services(host_id);

-- ============================================================
-- 脆弱性プローブ出力の行（ホストに従属）
-- ============================================================
CREATE TABLE IF NOT EXISTS probe_lines (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  host_id       INTEGER NOT NULL,
  position      INTEGER NOT NULL,
  line          TEXT NOT NULL,
  FOREIGN KEY (host_id) REFERENCES hosts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_probe_lines_host ON probe_lines(host_id, position);

-- ============================================================
-- 脆弱性 Finding
-- ============================================================
CREATE TABLE IF NOT EXISTS findings (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  name            TEXT NOT NULL,
  vulnerability   TEXT NOT NULL,
  tfp             INTEGER NOT NULL DEFAULT -1,       -- -1 未設定 / 0 誤検知 / 1 真陽性
  type            TEXT NOT NULL DEFAULT 'DOMAIN',
  ipv4            TEXT NOT NULL DEFAULT '',
  ipv6            TEXT NOT NULL DEFAULT '',
  level           TEXT NOT NULL DEFAULT 'critical',
  scope           TEXT NOT NULL DEFAULT 'E',         -- "E" | "I"
  engine          TEXT NOT NULL DEFAULT 'network',
  status          TEXT NOT NULL DEFAULT '',
  detectiondate   TEXT NOT NULL,
  firstdate       TEXT NOT NULL,
  lastdate        TEXT NOT NULL,
  bumpdate        TEXT NOT NULL,
  ptime           TEXT NOT NULL DEFAULT 'P1E',
  uri             TEXT NOT NULL,
  full_uri        TEXT NOT NULL,
  uri_truncated   INTEGER NOT NULL DEFAULT 0,
  port            INTEGER NOT NULL DEFAULT 0,
  protocol        TEXT NOT NULL DEFAULT 'tcp',
  nname           TEXT NOT NULL DEFAULT 'unknown',
  owner           TEXT NOT NULL DEFAULT '',
  metadata        TEXT NOT NULL DEFAULT '',
  info            TEXT NOT NULL DEFAULT '',
  ticket          TEXT,
  UNIQUE (name, vulnerability)
);

CREATE INDEX IF NOT EXISTS idx_findings_bumpdate ON findings(bumpdate);
CREATE INDEX IF NOT EXISTS idx_findings_lastdate ON findings(lastdate);

-- ============================================================
-- ジョブ / 保存済み検索
-- ============================================================
CREATE TABLE IF NOT EXISTS jobs (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  name          TEXT NOT NULL UNIQUE,
  input         TEXT NOT NULL DEFAULT 'discovery',
  module        TEXT NOT NULL DEFAULT 'error',
  regexp        TEXT NOT NULL DEFAULT '',
  exclude       TEXT NOT NULL DEFAULT '',
  tag           TEXT NOT NULL DEFAULT '',
  info          TEXT NOT NULL DEFAULT '',
  created_at    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS saved_searches (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  name          TEXT NOT NULL UNIQUE,
  regexp        TEXT NOT NULL DEFAULT '.*',
  exclude       TEXT NOT NULL DEFAULT '',
  tag           TEXT NOT NULL DEFAULT '',
  info          TEXT NOT NULL DEFAULT ''
);
`;
