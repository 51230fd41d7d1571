import { describe, it, expect, beforeEach } from 'vitest';
import { HostRepository } from '../../src/db/repository/host-repository.js';
import { FindingRepository } from '../../src/db/repository/finding-repository.js';
import { reconcileDiscoveries, reconcileTargets } from '../../src/engine/reconciler.js';
import {
  deleteSavedSearch,
  listSavedSearches,
  runSavedSearch,
  saveSearch,
  searchRecords,
} from '../../src/engine/search.js';
import { LookupError } from '../../src/errors.js';
import { createTestContext, type TestContext } from '../helpers/context.js';
import { findingInput, hostInput } from '../helpers/fixtures.js';

describe('searchRecords', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
    reconcileTargets(ctx, { zone: 'external', tag: 'web', mode: 'merge', names: ['shop.example.com', 'blog.example.com'] });
    reconcileTargets(ctx, { zone: 'internal', tag: 'lan', mode: 'merge', names: ['db.corp.example'] });
    reconcileDiscoveries(ctx, { tag: 'manual', mode: 'merge', names: ['api.example.com'] });

    const hosts = new HostRepository(ctx.db);
    hosts.create(hostInput({ name: 'shop.example.com', ipv4: '10.0.0.10', info: 'OpenSSH 8.9', owner: 'Commerce' }));
    hosts.create(hostInput({ name: 'blog.example.com', ipv4: '10.0.0.11', info: 'nginx', owner: 'Marketing' }));

    new FindingRepository(ctx.db).create(findingInput({ name: 'shop.example.com', vulnerability: 'git-config' }));
  });

  it('targets / intargets は zone ごとに名前を検索する', () => {
    expect(searchRecords(ctx.db, { recordSet: 'targets', regexp: '^shop' })).toEqual([
      { recordSet: 'targets', id: 1, name: 'shop.example.com', detail: 'web' },
    ]);
    expect(searchRecords(ctx.db, { recordSet: 'intargets', regexp: 'corp' }).map((h) => h.name)).toEqual([
      'db.corp.example',
    ]);
  });

  it('discovery はタグを detail にする', () => {
    expect(searchRecords(ctx.db, { recordSet: 'discovery', regexp: 'api' })).toEqual([
      { recordSet: 'discovery', id: 1, name: 'api.example.com', detail: 'manual' },
    ]);
  });

  it('services はレポートを検索し、owner の完全一致でも拾う', () => {
    expect(searchRecords(ctx.db, { recordSet: 'services', regexp: 'OpenSSH' }).map((h) => h.detail)).toEqual([
      '10.0.0.10',
    ]);
    expect(searchRecords(ctx.db, { recordSet: 'services', regexp: 'Marketing' }).map((h) => h.name)).toEqual([
      'blog.example.com',
    ]);
    expect(searchRecords(ctx.db, { recordSet: 'services', regexp: '.*', owner: 'Commerce' }).map((h) => h.name)).toEqual([
      'shop.example.com',
    ]);
    expect(searchRecords(ctx.db, { recordSet: 'inservices', regexp: '.*' })).toEqual([]);
  });

  it('nuclei は脆弱性名を detail にし、exclude で除外する', () => {
    expect(searchRecords(ctx.db, { recordSet: 'nuclei', regexp: 'git' }).map((h) => h.detail)).toEqual(['git-config']);
    expect(searchRecords(ctx.db, { recordSet: 'nuclei', regexp: 'git', exclude: 'config' })).toEqual([]);
  });
});

describe('保存済み検索', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
    reconcileTargets(ctx, { zone: 'external', tag: 'web', mode: 'merge', names: ['shop.example.com', 'blog.example.com'] });
  });

  it('保存・上書き・実行・削除', () => {
    saveSearch(ctx.db, { name: 'shops', regexp: 'blog' });
    saveSearch(ctx.db, { name: 'shops', regexp: 'shop', tag: 'web' });

    expect(listSavedSearches(ctx.db)).toEqual([
      { id: 1, name: 'shops', regexp: 'shop', exclude: '', tag: 'web', info: '' },
    ]);
    expect(runSavedSearch(ctx.db, 'shops', 'targets').map((h) => h.name)).toEqual(['shop.example.com']);

    deleteSavedSearch(ctx.db, 'shops');
    expect(listSavedSearches(ctx.db)).toEqual([]);
  });

  it('存在しない保存済み検索は LookupError', () => {
    expect(() => runSavedSearch(ctx.db, 'missing', 'targets')).toThrow(LookupError);
    expect(() => deleteSavedSearch(ctx.db, 'missing')).toThrow(LookupError);
  });
});
