import { describe, it, expect } from 'vitest';
import {
  CRTSH_DESCRIPTION,
  normalizeZoneDomain,
  parseTargetImport,
} from '../../src/parser/target-import-parser.js';

const OPTIONS = { tag: 'LEDGER', owner: 'secops@example.com' };

describe('parseTargetImport', () => {
  it('jsonl は domain と owner を読み、行をそのまま metadata にする', () => {
    const line = '{"domain":"app.example.com","owner":"web-team@example.com","environment":"prod"}';
    const result = parseTargetImport('jsonl', `${line}\nnot json\n{"owner":"x"}\n{"domain":"b.example.com"}\n`, OPTIONS);

    expect(result.records).toEqual([
      { name: 'app.example.com', owner: 'web-team@example.com', metadata: line, line },
      {
        name: 'b.example.com',
        owner: 'Unknown',
        metadata: '{"domain":"b.example.com"}',
        line: '{"domain":"b.example.com"}',
      },
    ]);
    expect(result.skipped.map((s) => [s.lineNumber, s.reason])).toEqual([
      [2, 'invalid JSON'],
      [3, 'missing domain'],
    ]);
  });

  it('vmw.csv は見出しを捨て、所有者を 2 列連結する', () => {
    const csv = [
      ',Public IP,OwnerEmail,Account ID,ServiceName,Environment,RequestedBy',
      '1,203.0.113.10,owner@example.com,1111,billing,prod,requester@example.com',
      '2,203.0.113.11,short',
    ].join('\n');

    const result = parseTargetImport('vmw.csv', csv, OPTIONS);

    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.name).toBe('203.0.113.10');
    expect(result.records[0]?.owner).toBe('owner@example.com,requester@example.com');
    expect(JSON.parse(result.records[0]?.metadata ?? '')).toEqual({
      owner: 'owner@example.com,requester@example.com',
      accountid: '1111',
      environment: 'prod',
      tag: 'LEDGER',
      domain: '203.0.113.10',
      description: 'billing',
    });
    expect(result.skipped).toEqual([
      { lineNumber: 3, line: '2,203.0.113.11,short', reason: 'expected 7 columns' },
    ]);
  });

  it('vmw.csvfd は列の並びが異なる', () => {
    const csv = [
      ',accountID,entityId,PublicIP,OwnerEmail,ServiceName,Environment,RequestedBy',
      '1,2222,ent-1,198.51.100.7,ops@example.com,api,stage,lead@example.com',
    ].join('\n');

    const [record] = parseTargetImport('vmw.csvfd', csv, OPTIONS).records;

    expect(record?.name).toBe('198.51.100.7');
    expect(record?.owner).toBe('ops@example.com,lead@example.com');
    expect(JSON.parse(record?.metadata ?? '')).toMatchObject({ accountid: '2222', environment: 'stage', description: 'api' });
  });

  it('vmw.json はアカウントごとのドメインを展開し、ワイルドカードを外す', () => {
    const zones = JSON.stringify({
      '1111': [['example.com.', '\\052.dev.example.com.'], 'owner@example.com', 'prod'],
      broken: 'not a section',
    });

    const result = parseTargetImport('vmw.json', zones, OPTIONS);

    expect(result.records.map((r) => [r.name, r.owner])).toEqual([
      ['example.com', 'owner@example.com'],
      ['dev.example.com', 'owner@example.com'],
    ]);
    expect(JSON.parse(result.records[1]?.metadata ?? '')).toEqual({
      owner: 'owner@example.com',
      accountid: '1111',
      environment: 'prod',
      tag: 'LEDGER',
      domain: 'dev.example.com',
    });
    expect(result.skipped.map((s) => [s.lineNumber, s.reason])).toEqual([
      [2, 'expected [domains, owner, environment]'],
    ]);
  });

  it('vmw.json の JSON が壊れていれば 1 件スキップ', () => {
    expect(parseTargetImport('vmw.json', '{', OPTIONS).skipped.map((s) => s.reason)).toEqual(['invalid JSON']);
  });

  it('crt.sh は指定した所有者を使う', () => {
    const result = parseTargetImport('crt.sh', 'a.example.com\n\n b.example.com \n', OPTIONS);

    expect(result.records.map((r) => [r.name, r.owner])).toEqual([
      ['a.example.com', 'secops@example.com'],
      ['b.example.com', 'secops@example.com'],
    ]);
    expect(JSON.parse(result.records[0]?.metadata ?? '')).toEqual({
      owner: 'secops@example.com',
      tag: 'LEDGER',
      domain: 'a.example.com',
      description: CRTSH_DESCRIPTION,
    });
  });

  it('normalizeZoneDomain は末尾のドットを落とす', () => {
    expect(normalizeZoneDomain('www.example.com.')).toBe('www.example.com');
    expect(normalizeZoneDomain('\\052.example.com.')).toBe('example.com');
  });
});
