import { describe, it, expect, beforeEach } from 'vitest';
import { DiscoveryRepository } from '../../src/db/repository/discovery-repository.js';
import { TargetRepository } from '../../src/db/repository/target-repository.js';
import { ingestDiscoveries } from '../../src/engine/discovery-ingest.js';
import { parseAmassLines, parseSubfinderJsonl } from '../../src/parser/amass-parser.js';
import { createTestContext, type TestContext } from '../helpers/context.js';

describe('ingestDiscoveries', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('新しいドメインを作成し、行全体を載せたイベントを出す', () => {
    const line = '[CertSpotter] app.example.com 10.0.0.1';
    const summary = ingestDiscoveries(ctx, 'amass', parseAmassLines(`${line}\nnoise`));

    expect(summary).toEqual({ parsed: 1, skipped: 1, created: 1, updated: 0, alerts: 1 });
    expect(ctx.delta.events[0]).toMatchObject({
      message: '[AMASS][New Domain Found]',
      name: 'app.example.com',
      type: 'DOMAIN',
      tag: 'new',
      info: '10.0.0.1',
      owner: 'Unknown',
      full_message: line,
    });
  });

  it('既知のドメインは更新のみでイベントを出さない', () => {
    ingestDiscoveries(ctx, 'amass', parseAmassLines('[DNS] app.example.com 10.0.0.1'));
    ctx.delta.clear();
    ctx.setNow('2024-03-02T12:00:00.000Z');

    const summary = ingestDiscoveries(ctx, 'amass', parseAmassLines('[Brute Forcing] app.example.com'));
    expect(summary).toMatchObject({ created: 0, updated: 1, alerts: 0 });
    expect(ctx.delta.events).toEqual([]);
    expect(new DiscoveryRepository(ctx.db).findByName('app.example.com')).toMatchObject({
      tag: '[Brute Forcing]',
      info: '10.0.0.1',
      lastdate: '2024-03-02T12:00:00.000Z',
    });
  });

  it('スコープ登録のメタデータを引き継ぐ', () => {
    new TargetRepository(ctx.db).upsertByName('external', 'shop.example.com', {
      type: 'DOMAIN',
      tag: 'DEFAULT',
      owner: 'Commerce',
      metadata: '{"owner":"Commerce","tag":"prod"}',
      lastdate: '2024-03-01T00:00:00.000Z',
    });
    const jsonl = JSON.stringify({ host: 'shop.example.com', input: 'example.com', sources: ['crtsh'] });
    ingestDiscoveries(ctx, 'subfinder', parseSubfinderJsonl(jsonl));

    expect(ctx.delta.events[0]).toMatchObject({
      message: '[DISCOVERY][New Domain Found]',
      owner: 'Commerce',
      scope: 'external',
      tag: 'prod',
    });
    expect(new DiscoveryRepository(ctx.db).findByName('shop.example.com')?.owner).toBe('Commerce');
  });
});
