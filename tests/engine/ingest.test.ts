import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FindingRepository } from '../../src/db/repository/finding-repository.js';
import { HostRepository } from '../../src/db/repository/host-repository.js';
import { DiscoveryRepository } from '../../src/db/repository/discovery-repository.js';
import { INGEST_PARSERS, ingestContent, ingestFile, isIngestParser } from '../../src/engine/ingest.js';
import { NEW_FINDING_MESSAGE } from '../../src/engine/probe-ingest.js';
import { createTestContext, type TestContext } from '../helpers/context.js';
import { hostInput } from '../helpers/fixtures.js';

describe('isIngestParser', () => {
  it('ツールとプロトコルの組み合わせも受け付ける', () => {
    expect(INGEST_PARSERS).toContain('hydra.smb');
    expect(isIngestParser('patator.rdp')).toBe(true);
    expect(isIngestParser('nuclei.waf')).toBe(true);
    expect(isIngestParser('nuclei.http')).toBe(true);
    expect(isIngestParser('wpscan.json')).toBe(true);
    expect(isIngestParser('ffuf')).toBe(false);
  });
});

describe('ingestContent', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('subfinder は発見結果として取り込む', () => {
    const content = JSON.stringify({ host: 'api.example.com', input: 'example.com', sources: ['crtsh'] });
    const summary = ingestContent(ctx, { parser: 'subfinder', content });
    expect(summary.created).toBe(1);
    expect(new DiscoveryRepository(ctx.db).findByName('api.example.com')?.tag).toBe('[crtsh]');
  });

  it('nmap.xml は host 指定でホスト名を上書きする', () => {
    const xml = `<nmaprun><host><address addr="10.0.0.8" addrtype="ipv4"/><ports>
      <port protocol="tcp" portid="22"><state state="open"/><service name="ssh"/></port>
    </ports></host></nmaprun>`;
    ingestContent(ctx, { parser: 'nmap.xml', content: xml, zone: 'internal', host: 'bastion.corp.example' });
    const host = new HostRepository(ctx.db).findByName('internal', 'bastion.corp.example');
    expect(host).toMatchObject({ ipv4: '10.0.0.8', infoGnmap: 'Host: 10.0.0.8 ()\tPorts: 22/open/tcp//ssh//' });
  });

  it('nuclei は既定で external の Finding になる', () => {
    ingestContent(ctx, { parser: 'nuclei', content: '[git-config] [http] [medium] https://web.example.com/.git/config' });
    expect(new FindingRepository(ctx.db).findAll().map((f) => [f.name, f.scope])).toEqual([['web.example.com', 'E']]);
  });

  it('nuclei.http は行をホストに保存して通知し、Finding は作らない', () => {
    const http = '[2024-03-01 10:00:00] [tech-detect:nginx] [http] [info] https://web.example.com:8443/login';
    const network = '[2024-03-01 10:00:01] [ssh-auth-methods] [network] [info] 10.0.0.5:22';
    const content = [http, network].join('\n');

    expect(ingestContent(ctx, { parser: 'nuclei.http', content })).toEqual({
      parsed: 1,
      skipped: 1,
      created: 1,
      updated: 0,
      alerts: 1,
    });
    expect(ctx.delta.events[0]).toMatchObject({ message: NEW_FINDING_MESSAGE, host: 'web.example.com', finding: http });

    ctx.delta.clear();
    expect(ingestContent(ctx, { parser: 'nuclei.http', content })).toEqual({
      parsed: 1,
      skipped: 1,
      created: 0,
      updated: 1,
      alerts: 0,
    });

    const hosts = new HostRepository(ctx.db);
    const host = hosts.findByName('external', 'web.example.com');
    expect(hosts.listProbeLines(host?.id ?? 0).map((l) => l.line)).toEqual([http]);
    expect(new FindingRepository(ctx.db).findAll()).toEqual([]);
  });

  it('nuclei.network はアドレスのホストを作る', () => {
    const line = '[2024-03-01 10:00:01] [ssh-auth-methods] [network] [info] 10.0.0.5:22';
    ingestContent(ctx, { parser: 'nuclei.network', content: line, zone: 'internal' });
    expect(new HostRepository(ctx.db).findByName('internal', '10.0.0.5')).toMatchObject({
      ipv4: '10.0.0.5',
      type: 'ADDRESS',
      tag: '[Services]',
    });
  });

  it('ブルートフォースはツールとプロトコルに振り分ける', () => {
    new HostRepository(ctx.db).create(hostInput({ name: '10.0.0.5' }));
    ingestContent(ctx, {
      parser: 'hydra.telnet',
      content: '[23][telnet] host: 10.0.0.5   login: admin   password: test-pass',
    });
    expect(new HostRepository(ctx.db).findByName('external', '10.0.0.5')?.serviceTelnet).toBe(
      'TELNET BruteForce:{admin:test-pass}  ',
    );
    expect(ctx.delta.messages()).toEqual(['[HYDRA][TELNET BRUTEFORCE]']);
  });
});

describe('ingestFile', () => {
  let ctx: TestContext;
  let dir: string;

  beforeEach(() => {
    ctx = createTestContext();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'surfacewatch-ingest-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('gnmap と同名の .nmap をレポートとして読む', () => {
    const gnmapPath = path.join(dir, 'scan.gnmap');
    fs.writeFileSync(gnmapPath, 'Host: 10.0.0.5 (web.example.com)\tPorts: 443/open/tcp//https///\n');
    fs.writeFileSync(path.join(dir, 'scan.nmap'), 'Nmap scan report for web.example.com (10.0.0.5)\n');

    const summary = ingestFile(ctx, { parser: 'gnmap', path: gnmapPath });
    expect(summary).toMatchObject({ parsed: 1, created: 1 });
    expect(new HostRepository(ctx.db).findByName('external', 'web.example.com')?.info).toBe(
      'Nmap scan report for web.example.com (10.0.0.5)\n',
    );
  });

  it('.nmap が無ければ info は空', () => {
    const gnmapPath = path.join(dir, 'only.gnmap');
    fs.writeFileSync(gnmapPath, 'Host: 10.0.0.6 ()\tPorts: 22/open/tcp//ssh///\n');
    ingestFile(ctx, { parser: 'gnmap', path: gnmapPath });
    expect(new HostRepository(ctx.db).findByName('external', '10.0.0.6')?.info).toBe('');
  });

  it('存在しないファイルは例外になる', () => {
    expect(() => ingestFile(ctx, { parser: 'amass', path: path.join(dir, 'missing.txt') })).toThrow();
  });
});
