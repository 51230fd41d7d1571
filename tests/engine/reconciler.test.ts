import { describe, it, expect, beforeEach } from 'vitest';
import { DiscoveryRepository } from '../../src/db/repository/discovery-repository.js';
import { HostRepository } from '../../src/db/repository/host-repository.js';
import { TargetRepository } from '../../src/db/repository/target-repository.js';
import { ingestContent } from '../../src/engine/ingest.js';
import {
  DELETE_DISCOVERY_MESSAGE,
  DELETE_SERVICE_MESSAGE,
  DELETE_TARGET_MESSAGE,
  deleteDiscovery,
  deleteTarget,
  importTargets,
  importedTargetMessage,
  reconcileDiscoveries,
  reconcileTargets,
} from '../../src/engine/reconciler.js';
import { resolveMetadata } from '../../src/engine/metadata.js';
import { LookupError } from '../../src/errors.js';
import { parseTargetImport } from '../../src/parser/target-import-parser.js';
import type { DeltaEvent, DeltaSink, EngineContext, StampedDelta } from '../../src/types/engine.js';
import type { ServiceDescriptor } from '../../src/types/parser.js';
import { createTestContext, type TestContext } from '../helpers/context.js';
import { hostInput } from '../helpers/fixtures.js';

function svc(port: string, name: string): ServiceDescriptor {
  return { port, state: 'open', protocol: 'tcp', owner: '', name, rpcInfo: '', version: '' };
}

/** サービス付きのホストを直接作る */
function seedHost(hosts: HostRepository, name: string, nname: string, ipv4: string): number {
  const host = hosts.create(hostInput({ name, nname, ipv4 }));
  hosts.replaceServices(host.id, [svc('22', 'ssh'), svc('443', 'https')]);
  return host.id;
}

const FIVE = ['a.example.com', 'b.example.com', 'c.example.com', 'd.example.com', 'e.example.com'];

describe('reconcileTargets', () => {
  let ctx: TestContext;
  let repo: TargetRepository;

  beforeEach(() => {
    ctx = createTestContext('2024-03-01T00:00:00.000Z');
    repo = new TargetRepository(ctx.db);
  });

  it('merge は冪等で、新規登録のときだけイベントを出す', () => {
    const names = ['a.example.com', '10.0.0.1', '  ', ''];
    expect(reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names })).toEqual({
      inserted: 2,
      updated: 0,
      skipped: 0,
      deleted: 0,
    });
    ctx.setNow('2024-03-02T00:00:00.000Z');
    expect(reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names })).toEqual({
      inserted: 0,
      updated: 2,
      skipped: 0,
      deleted: 0,
    });

    expect(ctx.delta.messages()).toEqual([
      '[TARGET][NEW OBJECT][EXTERNAL]',
      '[TARGET][NEW OBJECT][EXTERNAL]',
    ]);
    expect(ctx.delta.events[1]).toMatchObject({ name: '10.0.0.1', type: 'ADDRESS', tag: 'T', zone: 'external' });
    expect(repo.findAll('external').map((t) => t.lastdate)).toEqual([
      '2024-03-02T00:00:00.000Z',
      '2024-03-02T00:00:00.000Z',
    ]);
  });

  it('sync は今回のバッチに無い同タグの登録を削除する', () => {
    reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names: FIVE });
    reconcileTargets(ctx, { zone: 'external', tag: 'OTHER', mode: 'merge', names: ['z.example.com'] });
    ctx.delta.clear();

    ctx.setNow('2024-03-02T00:00:00.000Z');
    const result = reconcileTargets(ctx, {
      zone: 'external',
      tag: 'T',
      mode: 'sync',
      names: ['a.example.com', 'c.example.com', 'e.example.com'],
    });

    expect(result).toEqual({ inserted: 0, updated: 3, skipped: 0, deleted: 2 });
    expect(repo.findAll('external').map((t) => t.name)).toEqual([
      'a.example.com',
      'c.example.com',
      'e.example.com',
      'z.example.com',
    ]);
    expect(ctx.delta.events.map((e) => [e.message, e['name']])).toEqual([
      [DELETE_TARGET_MESSAGE, 'b.example.com'],
      [DELETE_TARGET_MESSAGE, 'd.example.com'],
    ]);
  });

  it('delete は今回のバッチに含まれた登録を削除する', () => {
    reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names: FIVE });
    ctx.setNow('2024-03-02T00:00:00.000Z');
    const result = reconcileTargets(ctx, {
      zone: 'external',
      tag: 'T',
      mode: 'delete',
      names: ['b.example.com'],
    });
    expect(result.deleted).toBe(1);
    expect(repo.findByName('external', 'b.example.com')).toBeUndefined();
    expect(repo.findAll('external')).toHaveLength(4);
  });

  it('deletebytag は同タグの登録を全て削除する', () => {
    reconcileTargets(ctx, { zone: 'internal', tag: 'T', mode: 'merge', names: FIVE });
    reconcileTargets(ctx, { zone: 'internal', tag: 'KEEP', mode: 'merge', names: ['k.example.com'] });
    const result = reconcileTargets(ctx, { zone: 'internal', tag: 'T', mode: 'deletebytag', names: [] });
    expect(result.deleted).toBe(5);
    expect(repo.findAll('internal').map((t) => t.name)).toEqual(['k.example.com']);
  });

  it('登録の削除は同名のホストに連鎖し、イベントを先に出す', () => {
    reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names: ['web.example.com'] });
    ingestContent(ctx, {
      parser: 'gnmap',
      content: 'Host: 10.0.0.5 (web.example.com)\tPorts: 22/open/tcp//ssh///',
    });
    const hosts = new HostRepository(ctx.db);
    const host = hosts.findByName('external', 'web.example.com');
    expect(host).toBeDefined();
    ctx.delta.clear();

    deleteTarget(ctx, 'external', 'web.example.com');

    expect(ctx.delta.messages()).toEqual([DELETE_SERVICE_MESSAGE, DELETE_TARGET_MESSAGE]);
    expect(ctx.delta.events[0]).toMatchObject({ name: 'web.example.com', type: 'DOMAIN' });
    expect(hosts.findByName('external', 'web.example.com')).toBeUndefined();
    expect(hosts.listServices(host?.id ?? 0)).toEqual([]);
    expect(repo.findByName('external', 'web.example.com')).toBeUndefined();
  });

  it('sync で消える登録のホストとサービスも連鎖削除し、2 回目は何もしない', () => {
    reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names: FIVE });
    const hosts = new HostRepository(ctx.db);
    const b = seedHost(hosts, 'b.example.com', 'b.example.com', '10.0.0.2');
    const c = seedHost(hosts, 'c.example.com', 'c.example.com', '10.0.0.3');
    const d = seedHost(hosts, 'd.example.com', 'd.example.com', '10.0.0.4');
    ctx.delta.clear();

    ctx.setNow('2024-03-02T00:00:00.000Z');
    const names = ['a.example.com', 'c.example.com', 'e.example.com'];
    const first = reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'sync', names });

    expect(first).toEqual({ inserted: 0, updated: 3, skipped: 0, deleted: 2 });
    expect(ctx.delta.events.map((e) => [e.message, e['name']])).toEqual([
      [DELETE_SERVICE_MESSAGE, 'b.example.com'],
      [DELETE_SERVICE_MESSAGE, 'd.example.com'],
      [DELETE_TARGET_MESSAGE, 'b.example.com'],
      [DELETE_TARGET_MESSAGE, 'd.example.com'],
    ]);
    expect(hosts.findAll('external').map((h) => h.name)).toEqual(['c.example.com']);
    expect(hosts.listServices(b)).toEqual([]);
    expect(hosts.listServices(d)).toEqual([]);
    expect(hosts.listServices(c)).toHaveLength(2);

    ctx.delta.clear();
    ctx.setNow('2024-03-03T00:00:00.000Z');
    const second = reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'sync', names });
    expect(second).toEqual({ inserted: 0, updated: 3, skipped: 0, deleted: 0 });
    expect(ctx.delta.events).toEqual([]);
    expect(repo.findAll('external').map((t) => t.name)).toEqual(names);
  });

  it('リンクされたホストが 2 件ある登録の削除はイベント 3 件を全て行の削除前に出す', () => {
    reconcileTargets(ctx, { zone: 'external', tag: 'T', mode: 'merge', names: ['web.example.com'] });
    const hosts = new HostRepository(ctx.db);
    seedHost(hosts, 'web.example.com', 'web.example.com', '10.0.0.5');
    seedHost(hosts, '10.0.0.5', 'web.example.com', '10.0.0.5');
    seedHost(hosts, 'other.example.com', 'other.example.com', '10.0.0.9');
    ctx.delta.clear();

    const seen: Array<[string, boolean, number]> = [];
    const checking: DeltaSink = {
      emit(event: DeltaEvent): StampedDelta {
        seen.push([
          event.message,
          repo.findByName('external', 'web.example.com') !== undefined,
          hosts.findAll('external').length,
        ]);
        return ctx.delta.emit(event);
      },
    };
    const checked: EngineContext = { ...ctx, delta: checking };

    deleteTarget(checked, 'external', 'web.example.com');

    expect(seen).toEqual([
      [DELETE_SERVICE_MESSAGE, true, 3],
      [DELETE_SERVICE_MESSAGE, true, 3],
      [DELETE_TARGET_MESSAGE, true, 3],
    ]);
    expect(ctx.delta.events.map((e) => [e['name'], e['type']])).toEqual([
      ['web.example.com', 'DOMAIN'],
      ['10.0.0.5', 'ADDRESS'],
      ['web.example.com', 'DOMAIN'],
    ]);
    expect(hosts.findAll('external').map((h) => h.name)).toEqual(['other.example.com']);
    expect(repo.findByName('external', 'web.example.com')).toBeUndefined();
  });

  it('存在しない登録の削除は LookupError', () => {
    expect(() => deleteTarget(ctx, 'external', 'missing.example.com')).toThrow(LookupError);
  });
});

describe('importTargets', () => {
  let ctx: TestContext;
  let repo: TargetRepository;

  beforeEach(() => {
    ctx = createTestContext('2024-03-01T00:00:00.000Z');
    repo = new TargetRepository(ctx.db);
  });

  it('台帳の所有者と metadata を保存し、以降の解決で使われる', () => {
    const { records } = parseTargetImport('crt.sh', 'app.example.com\n', { tag: 'CRT', owner: 'secops@example.com' });

    const result = importTargets(ctx, { zone: 'external', tag: 'CRT', mode: 'merge', records });

    expect(result).toEqual({ inserted: 1, updated: 0, skipped: 0, deleted: 0 });
    expect(ctx.delta.events[0]).toMatchObject({
      message: '[NEW][OBJECT INTO EXTERNAL TARGET DATABASE]',
      name: 'app.example.com',
      type: 'DOMAIN',
      owner: 'secops@example.com',
      description: 'Discovery from Crt.sh',
      lastupdate: '2024-03-01T00:00:00.000Z',
    });
    expect(repo.findByName('external', 'app.example.com')?.owner).toBe('secops@example.com');
    expect(resolveMetadata(ctx.db, 'app.example.com', 'internal').metadata).toMatchObject({
      owner: 'secops@example.com',
      tag: 'CRT',
      scope: 'external',
    });
  });

  it('既存の登録は所有者と metadata を上書きし、通知しない', () => {
    reconcileTargets(ctx, { zone: 'internal', tag: 'LEDGER', mode: 'merge', names: ['10.0.0.5'] });
    ctx.delta.clear();
    const line = '{"domain":"10.0.0.5","owner":"infra@example.com"}';

    const result = importTargets(ctx, {
      zone: 'internal',
      tag: 'LEDGER',
      mode: 'merge',
      records: parseTargetImport('jsonl', line, { tag: 'LEDGER' }).records,
    });

    expect(result).toEqual({ inserted: 0, updated: 1, skipped: 0, deleted: 0 });
    expect(ctx.delta.events).toEqual([]);
    expect(repo.findByName('internal', '10.0.0.5')).toMatchObject({ owner: 'infra@example.com', metadata: line });
  });

  it('sync は台帳に無くなった同タグの登録を削除する', () => {
    const first = parseTargetImport('crt.sh', 'a.example.com\nb.example.com\n', { tag: 'CRT' }).records;
    importTargets(ctx, { zone: 'external', tag: 'CRT', mode: 'merge', records: first });
    ctx.delta.clear();
    ctx.setNow('2024-03-02T00:00:00.000Z');

    const second = parseTargetImport('crt.sh', 'a.example.com\n', { tag: 'CRT' }).records;
    const result = importTargets(ctx, { zone: 'external', tag: 'CRT', mode: 'sync', records: second });

    expect(result).toEqual({ inserted: 0, updated: 1, skipped: 0, deleted: 1 });
    expect(ctx.delta.events.map((e) => [e.message, e['name']])).toEqual([[DELETE_TARGET_MESSAGE, 'b.example.com']]);
  });

  it('importedTargetMessage はゾーン名を大文字にする', () => {
    expect(importedTargetMessage('internal')).toBe('[NEW][OBJECT INTO INTERNAL TARGET DATABASE]');
  });
});

describe('reconcileDiscoveries', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext('2024-03-01T00:00:00.000Z');
  });

  it('新規の発見結果に owner 付きのイベントを出す', () => {
    const result = reconcileDiscoveries(ctx, {
      tag: 'manual',
      mode: 'merge',
      names: ['api.example.com'],
      owner: 'Payments',
    });
    expect(result.inserted).toBe(1);
    expect(ctx.delta.events[0]).toMatchObject({
      message: '[DISCOVERY][NEW OBJECT]',
      owner: 'Payments',
      name: 'api.example.com',
      tag: 'manual',
    });
  });

  it('sync で消えた発見結果は保存済みメタデータ付きで通知してから削除する', () => {
    reconcileDiscoveries(ctx, { tag: 'manual', mode: 'merge', names: ['a.example.com', 'b.example.com'], owner: 'Ops' });
    ctx.delta.clear();
    ctx.setNow('2024-03-02T00:00:00.000Z');

    const result = reconcileDiscoveries(ctx, { tag: 'manual', mode: 'sync', names: ['a.example.com'] });
    expect(result.deleted).toBe(1);
    expect(ctx.delta.events).toHaveLength(1);
    expect(ctx.delta.events[0]).toMatchObject({
      message: DELETE_DISCOVERY_MESSAGE,
      name: 'b.example.com',
      owner: 'Ops',
      tag: 'manual',
      lastupdate: '2024-03-01T00:00:00.000Z',
    });
    expect(new DiscoveryRepository(ctx.db).findAll().map((d) => d.name)).toEqual(['a.example.com']);
  });

  it('存在しない発見結果の削除は LookupError', () => {
    expect(() => deleteDiscovery(ctx, 'missing.example.com')).toThrow(LookupError);
  });
});
