/**
 * surfacewatch — Delta / Alert emitter
 *
 * 変更イベントに時刻情報を付与し、JSON 1 行のファイルとして書き出す。
 * ファイルはまず journal/ に書いて fsync し、完成してから queue/ に rename する。
 * 下流のコンシューマは queue/ だけを監視すればよい。
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { DeltaEmitError } from '../errors.js';
import type { DeltaEvent, DeltaSink, StampedDelta } from '../types/engine.js';

export const JOURNAL_DIR = 'journal';
export const QUEUE_DIR = 'queue';

/** UTC の時刻情報をイベントに付与する */
export function stampDelta(event: DeltaEvent, at: Date): StampedDelta {
  return {
    ...event,
    timestamp: String(at.getTime() / 1000),
    datestamp: at.toISOString(),
    year: String(at.getUTCFullYear()),
    month: String(at.getUTCMonth() + 1),
    day: String(at.getUTCDate()),
    hour: String(at.getUTCHours()),
    minute: String(at.getUTCMinutes()),
    second: String(at.getUTCSeconds()),
  };
}

export interface FileDeltaEmitterOptions {
  /** journal/ と queue/ を置くディレクトリ */
  dir: string;
  /** 1 イベントあたりの書き込み試行回数 */
  retries?: number;
  logger: Logger;
  now?: () => Date;
}

export class FileDeltaEmitter implements DeltaSink {
  private readonly journalDir: string;
  private readonly queueDir: string;
  private readonly retries: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: FileDeltaEmitterOptions) {
    this.journalDir = path.join(options.dir, JOURNAL_DIR);
    this.queueDir = path.join(options.dir, QUEUE_DIR);
    this.retries = Math.max(1, options.retries ?? 3);
    this.logger = options.logger.child({ component: 'delta' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * イベントを queue/ に書き出す。全ての試行が失敗したら DeltaEmitError。
   */
  emit(event: DeltaEvent): StampedDelta {
    const stamped = stampDelta(event, this.now());
    const body = JSON.stringify(stamped);
    const fileName = crypto.createHash('sha256').update(body).digest('hex');

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        this.writeThrough(fileName, `${body}\n`);
        this.logger.debug({ delta: event.message, file: fileName }, 'delta emitted');
        return stamped;
      } catch (err) {
        lastError = err;
        this.logger.warn({ err, attempt, delta: event.message }, 'delta write failed');
      }
    }

    throw new DeltaEmitError(
      `Failed to emit delta "${event.message}" after ${this.retries} attempts`,
      this.retries,
      { cause: lastError },
    );
  }

  private writeThrough(fileName: string, content: string): void {
    fs.mkdirSync(this.journalDir, { recursive: true });
    fs.mkdirSync(this.queueDir, { recursive: true });

    const journalPath = path.join(this.journalDir, fileName);
    try {
      const fd = fs.openSync(journalPath, 'w');
      try {
        fs.writeSync(fd, content);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(journalPath, path.join(this.queueDir, fileName));
    } catch (err) {
      // 書きかけのファイルを queue/ に出さない
      fs.rmSync(journalPath, { force: true });
      throw err;
    }
  }
}
