/**
 * surfacewatch — Jira への起票
 *
 * REST API v2 を native fetch で呼ぶ IssueTracker の実装。
 */

import { z } from 'zod';
import type { TrackerConfig } from '../config.js';
import type { IssueTracker, TicketRequest } from './tickets.js';

const createdIssueSchema = z.object({ key: z.string().min(1) });

/** 深刻度に対応が無いときの優先度 */
export const DEFAULT_PRIORITY = 'Medium';

export interface JiraTrackerOptions extends TrackerConfig {
  /** テストで差し替える */
  fetch?: typeof fetch;
}

export class JiraTracker implements IssueTracker {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: JiraTrackerOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
  }

  async open(ticket: TicketRequest): Promise<string> {
    const body = await this.request('POST', '/rest/api/2/issue', {
      fields: {
        project: { key: this.options.project },
        summary: ticket.summary,
        description: ticket.description,
        issuetype: { name: 'Bug' },
        priority: { name: this.options.priorities[ticket.severity] ?? DEFAULT_PRIORITY },
      },
    });
    return createdIssueSchema.parse(body).key;
  }

  async close(ticketKey: string): Promise<void> {
    await this.request('POST', `/rest/api/2/issue/${encodeURIComponent(ticketKey)}/transitions`, {
      transition: { id: this.options.closeTransition },
    });
  }

  private async request(method: string, path: string, payload: unknown): Promise<unknown> {
    const auth = Buffer.from(`${this.options.user}:${this.options.token}`).toString('base64');
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Basic ${auth}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      throw new Error(`Jira ${method} ${path} failed: HTTP ${response.status} ${response.statusText}`);
    }
    // 遷移 API は 204 で本文なし
    if (response.status === 204) return undefined;
    const parsed: unknown = await response.json();
    return parsed;
  }
}
