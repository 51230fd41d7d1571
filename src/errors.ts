/**
 * surfacewatch — Error types
 */

/** ジョブや登録済みレコードが見つからない。呼び出し全体を中断する。 */
export class LookupError extends Error {
  readonly entity: string;
  readonly key: string;

  constructor(entity: string, key: string | number) {
    super(`${entity} not found: ${String(key)}`);
    this.name = 'LookupError';
    this.entity = entity;
    this.key = String(key);
  }
}

/** Delta の書き込みが再試行後も失敗した。原因となった操作を中断する。 */
export class DeltaEmitError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeltaEmitError';
    this.attempts = attempts;
  }
}
