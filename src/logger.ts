/**
 * surfacewatch — Logger
 *
 * stdout は MCP の stdio トランスポートが使うため、ログは stderr に書く。
 * エントリポイントで 1 つ作り、各コンポーネントには child を渡す。
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({ name: 'surfacewatch', level }, pino.destination(2));
}
