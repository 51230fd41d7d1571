/**
 * surfacewatch — Runtime wiring
 *
 * 設定からデータベース・ロガー・Delta 出力を組み立て、EngineContext を作る。
 * MCP サーバーと CLI の両方が使う。
 */

import Database from 'better-sqlite3';
import type { Config } from './config.js';
import { migrateDatabase } from './db/migrate.js';
import { FileDeltaEmitter } from './engine/delta.js';
import { createLogger } from './logger.js';
import type { EngineContext } from './types/engine.js';

export interface Runtime {
  ctx: EngineContext;
  close(): void;
}

export function createRuntime(config: Config): Runtime {
  const logger = createLogger(config.logLevel);
  const db = new Database(config.dbPath);
  migrateDatabase(db);

  const now = (): Date => new Date();
  const delta = new FileDeltaEmitter({
    dir: config.alertsDir,
    retries: config.deltaRetries,
    logger,
    now,
  });

  logger.debug({ dbPath: config.dbPath, alertsDir: config.alertsDir }, 'runtime ready');
  return {
    ctx: { db, delta, logger, now },
    close: () => db.close(),
  };
}
