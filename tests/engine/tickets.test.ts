import { describe, it, expect, beforeEach } from 'vitest';
import { FindingRepository } from '../../src/db/repository/finding-repository.js';
import {
  buildTicketRequest,
  closeTicket,
  dispatchTicket,
  dispatchTicketsForLevel,
  type IssueTracker,
  type TicketRequest,
} from '../../src/engine/tickets.js';
import { LookupError } from '../../src/errors.js';
import { createTestContext, type TestContext } from '../helpers/context.js';
import { findingInput } from '../helpers/fixtures.js';

class FakeTracker implements IssueTracker {
  readonly opened: TicketRequest[] = [];
  readonly closed: string[] = [];
  failing = false;

  async open(ticket: TicketRequest): Promise<string> {
    if (this.failing) throw new Error('tracker unavailable');
    this.opened.push(ticket);
    return `SEC-${this.opened.length}`;
  }

  async close(ticketKey: string): Promise<void> {
    if (this.failing) throw new Error('tracker unavailable');
    this.closed.push(ticketKey);
  }
}

describe('tickets', () => {
  let ctx: TestContext;
  let repo: FindingRepository;
  let tracker: FakeTracker;

  beforeEach(() => {
    ctx = createTestContext();
    repo = new FindingRepository(ctx.db);
    tracker = new FakeTracker();
  });

  it('buildTicketRequest は脆弱性名と深刻度を載せる', () => {
    const request = buildTicketRequest({ ...findingInput(), id: 1 });
    expect(request.summary).toBe('Finding - CVE-2021-40438');
    expect(request.severity).toBe('critical');
    expect(request.description).toContain('https://web.example.com/');
  });

  it('チケットは 1 度だけ作成し、キーを保存する', async () => {
    const finding = repo.create(findingInput());
    expect(await dispatchTicket(ctx, tracker, finding.id)).toBe('SEC-1');
    expect(await dispatchTicket(ctx, tracker, finding.id)).toBe('SEC-1');
    expect(tracker.opened).toHaveLength(1);
    expect(repo.findById(finding.id)?.ticket).toBe('SEC-1');
  });

  it('トラッカーの失敗は undefined を返し、キーを保存しない', async () => {
    const finding = repo.create(findingInput());
    tracker.failing = true;
    expect(await dispatchTicket(ctx, tracker, finding.id)).toBeUndefined();
    expect(repo.findById(finding.id)?.ticket).toBeUndefined();
  });

  it('存在しない Finding は LookupError', async () => {
    await expect(dispatchTicket(ctx, tracker, 99)).rejects.toThrow(LookupError);
  });

  it('深刻度ごとの一括作成は誤検知とチケット済みを除く', async () => {
    repo.create(findingInput({ vulnerability: 'a' }));
    repo.create(findingInput({ vulnerability: 'b', tfp: 0 }));
    repo.create(findingInput({ vulnerability: 'c', ticket: 'SEC-OLD' }));
    repo.create(findingInput({ vulnerability: 'd', level: 'high' }));
    repo.create(findingInput({ vulnerability: 'e', tfp: 1 }));

    expect(await dispatchTicketsForLevel(ctx, tracker, 'critical')).toEqual(['SEC-1', 'SEC-2']);
    expect(tracker.opened.map((t) => t.summary)).toEqual(['Finding - a', 'Finding - e']);
  });

  it('closeTicket はチケットがあれば閉じる', async () => {
    const withTicket = repo.create(findingInput({ vulnerability: 'a', ticket: 'SEC-7' }));
    const without = repo.create(findingInput({ vulnerability: 'b' }));

    expect(await closeTicket(ctx, tracker, withTicket.id)).toBe(true);
    expect(await closeTicket(ctx, tracker, without.id)).toBe(false);
    expect(tracker.closed).toEqual(['SEC-7']);

    tracker.failing = true;
    expect(await closeTicket(ctx, tracker, withTicket.id)).toBe(false);
  });
});
