import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { migrateDatabase } from '../../../src/db/migrate.js';
import { FindingRepository } from '../../../src/db/repository/finding-repository.js';
import { findingInput } from '../../helpers/fixtures.js';

describe('FindingRepository', () => {
  let repo: FindingRepository;

  beforeEach(() => {
    const db = new Database(':memory:');
    migrateDatabase(db);
    repo = new FindingRepository(db);
  });

  it('create / findByKey - ticket が無ければプロパティを持たない', () => {
    const created = repo.create(findingInput());
    const found = repo.findByKey('web.example.com', 'CVE-2021-40438');
    expect(found).toEqual(created);
    expect(found && 'ticket' in found).toBe(false);
  });

  it('name + vulnerability は一意', () => {
    repo.create(findingInput());
    expect(() => repo.create(findingInput())).toThrow();
    expect(repo.create(findingInput({ vulnerability: 'git-config' })).id).toBeGreaterThan(0);
  });

  it('findDue - bumpdate が現在時刻より前のものを bumpdate 順に返す', () => {
    repo.create(findingInput({ vulnerability: 'late', bumpdate: '2024-03-03T00:00:00.000Z' }));
    repo.create(findingInput({ vulnerability: 'early', bumpdate: '2024-03-02T00:00:00.000Z' }));
    repo.create(findingInput({ vulnerability: 'future', bumpdate: '2024-04-01T00:00:00.000Z' }));

    expect(repo.findDue('2024-03-10T00:00:00.000Z').map((f) => f.vulnerability)).toEqual(['early', 'late']);
  });

  it('findUnseenSince - lastdate が指定時刻より前のもの', () => {
    repo.create(findingInput({ vulnerability: 'stale', lastdate: '2024-01-01T00:00:00.000Z' }));
    repo.create(findingInput({ vulnerability: 'fresh', lastdate: '2024-03-01T00:00:00.000Z' }));
    expect(repo.findUnseenSince('2024-02-01T00:00:00.000Z').map((f) => f.vulnerability)).toEqual(['stale']);
  });

  it('update / setTriage - 指定したフィールドだけ更新する', () => {
    const a = repo.create(findingInput({ vulnerability: 'a' }));
    const b = repo.create(findingInput({ vulnerability: 'b' }));

    expect(repo.update(a.id, { ticket: 'SEC-1', level: 'high' })).toMatchObject({ ticket: 'SEC-1', level: 'high', ptime: 'P0E' });
    expect(repo.setTriage([a.id, b.id], 0)).toBe(2);
    expect(repo.findAll().map((f) => f.tfp)).toEqual([0, 0]);
    expect(repo.update(9999, { level: 'low' })).toBeUndefined();
  });

  it('search - URI・脆弱性名・メタデータを検索し、exclude で除外する', () => {
    repo.create(findingInput({ vulnerability: 'git-config', metadata: '{"owner":"Payments"}' }));
    repo.create(findingInput({ vulnerability: 'CVE-2021-40438' }));
    expect(repo.search('Payments').map((f) => f.vulnerability)).toEqual(['git-config']);
    expect(repo.search('web\\.example', 'git').map((f) => f.vulnerability)).toEqual(['CVE-2021-40438']);
  });

  it('deleteMany / deleteAll', () => {
    const a = repo.create(findingInput({ vulnerability: 'a' }));
    repo.create(findingInput({ vulnerability: 'b' }));
    repo.create(findingInput({ vulnerability: 'c' }));
    expect(repo.deleteMany([a.id])).toBe(1);
    expect(repo.deleteAll()).toBe(2);
    expect(repo.findAll()).toEqual([]);
  });
});
