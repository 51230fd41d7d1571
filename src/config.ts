/**
 * surfacewatch — Runtime configuration
 *
 * 環境変数から設定を読み込み、zod で検証する。
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  SURFACEWATCH_DB_PATH: z.string().min(1).default('surfacewatch.db'),
  SURFACEWATCH_ALERTS_DIR: z.string().min(1).default('./alerts'),
  SURFACEWATCH_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SURFACEWATCH_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  SURFACEWATCH_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SURFACEWATCH_WORDLIST_DIR: z.string().min(1).default('./wordlists'),
  SURFACEWATCH_DELTA_RETRIES: z.coerce.number().int().min(1).default(3),
  SURFACEWATCH_JIRA_URL: z.string().url().optional(),
  SURFACEWATCH_JIRA_USER: z.string().default(''),
  SURFACEWATCH_JIRA_TOKEN: z.string().default(''),
  SURFACEWATCH_JIRA_PROJECT: z.string().default('SEC'),
  SURFACEWATCH_JIRA_CLOSE_TRANSITION: z.string().min(1).default('31'),
  SURFACEWATCH_JIRA_PRIORITIES: z
    .string()
    .default('critical=Highest,high=High,medium=Medium,low=Low,info=Lowest'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

/** 起票先 Jira の接続設定 */
export interface TrackerConfig {
  url: string;
  user: string;
  token: string;
  project: string;
  closeTransition: string;
  /** 深刻度 → Jira の優先度名 */
  priorities: Record<string, string>;
}

export interface Config {
  dbPath: string;
  alertsDir: string;
  logLevel: LogLevel;
  retentionDays: number;
  probeTimeoutMs: number;
  wordlistDir: string;
  deltaRetries: number;
  /** SURFACEWATCH_JIRA_URL が無ければ起票しない */
  tracker?: TrackerConfig;
}

/** `critical=Highest,high=High` 形式を読む。`=` の無い要素は無視する。 */
export function parsePriorities(value: string): Record<string, string> {
  const priorities: Record<string, string> = {};
  for (const pair of value.split(',')) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    priorities[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return priorities;
}

/**
 * 環境変数から Config を生成する。不正な値は ZodError を投げる。
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.parse(env);
  return {
    dbPath: parsed.SURFACEWATCH_DB_PATH,
    alertsDir: parsed.SURFACEWATCH_ALERTS_DIR,
    logLevel: parsed.SURFACEWATCH_LOG_LEVEL,
    retentionDays: parsed.SURFACEWATCH_RETENTION_DAYS,
    probeTimeoutMs: parsed.SURFACEWATCH_PROBE_TIMEOUT_MS,
    wordlistDir: parsed.SURFACEWATCH_WORDLIST_DIR,
    deltaRetries: parsed.SURFACEWATCH_DELTA_RETRIES,
    ...(parsed.SURFACEWATCH_JIRA_URL === undefined
      ? {}
      : {
          tracker: {
            url: parsed.SURFACEWATCH_JIRA_URL,
            user: parsed.SURFACEWATCH_JIRA_USER,
            token: parsed.SURFACEWATCH_JIRA_TOKEN,
            project: parsed.SURFACEWATCH_JIRA_PROJECT,
            closeTransition: parsed.SURFACEWATCH_JIRA_CLOSE_TRANSITION,
            priorities: parsePriorities(parsed.SURFACEWATCH_JIRA_PRIORITIES),
          },
        }),
  };
}
