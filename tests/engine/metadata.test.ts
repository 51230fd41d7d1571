import { describe, it, expect, beforeEach } from 'vitest';
import { TargetRepository } from '../../src/db/repository/target-repository.js';
import { mergeMetadata, parseMetadata, resolveMetadata } from '../../src/engine/metadata.js';
import { createTestContext, type TestContext } from '../helpers/context.js';

describe('parseMetadata', () => {
  it('欠けた owner / scope / tag を既定値で埋める', () => {
    expect(parseMetadata('{"team":"blue"}')).toEqual({
      team: 'blue',
      owner: 'Unknown',
      scope: 'Untracked',
      tag: 'new',
    });
  });

  it('壊れた JSON や配列は空のオブジェクトとして扱う', () => {
    expect(parseMetadata('{oops', 'external')).toEqual({ owner: 'Unknown', scope: 'external', tag: 'new' });
    expect(parseMetadata('[1,2]')).toEqual({ owner: 'Unknown', scope: 'Untracked', tag: 'new' });
  });
});

describe('resolveMetadata', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  function register(zone: 'external' | 'internal', name: string, metadata: Record<string, string>): void {
    new TargetRepository(ctx.db).upsertByName(zone, name, {
      type: 'DOMAIN',
      tag: 'DEFAULT',
      owner: metadata['owner'] ?? 'Unknown',
      metadata: JSON.stringify(metadata),
      lastdate: '2024-03-01T00:00:00.000Z',
    });
  }

  it('internal に無ければ external の登録を使う', () => {
    register('external', 'pay.example.com', { owner: 'Payments', tag: 'prod', team: 'blue' });
    const { metadata, raw } = resolveMetadata(ctx.db, 'pay.example.com');
    expect(metadata).toEqual({ owner: 'Payments', scope: 'external', tag: 'prod', team: 'blue' });
    expect(raw).toBe('{"owner":"Payments","tag":"prod","team":"blue"}');
  });

  it('internal の登録が優先される', () => {
    register('external', 'db.example.com', { owner: 'External Team' });
    register('internal', 'db.example.com', { owner: 'Internal Team' });
    expect(resolveMetadata(ctx.db, 'db.example.com').metadata.owner).toBe('Internal Team');
  });

  it('どこにも無ければ既定値', () => {
    expect(resolveMetadata(ctx.db, 'unknown.example.com')).toEqual({
      metadata: { scope: 'external', owner: 'Unknown', tag: 'new' },
      raw: '{"scope":"external","owner":"Unknown","tag":"new"}',
    });
  });

  it('external を指定した場合は internal を見ない', () => {
    register('internal', 'intra.example.com', { owner: 'Internal Team' });
    expect(resolveMetadata(ctx.db, 'intra.example.com', 'external').metadata.owner).toBe('Unknown');
  });
});

describe('mergeMetadata', () => {
  it('保存済みのキーを残しつつ解決結果で上書きする', () => {
    const merged = mergeMetadata('{"owner":"Old","note":"keep"}', { owner: 'New', scope: 'external', tag: 'prod' });
    expect(JSON.parse(merged)).toEqual({ owner: 'New', note: 'keep', scope: 'external', tag: 'prod' });
  });
});
