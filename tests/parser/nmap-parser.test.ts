import { describe, it, expect } from 'vitest';
import { parseNmapXml } from '../../src/parser/nmap-parser.js';

// ============================================================
// 共通 XML フィクスチャ
// ============================================================

/** 単一ホスト・3ポート (22/ssh, 80/http, 443/https) + hostname */
const SINGLE_HOST_XML = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE nmaprun>
<nmaprun scanner="nmap" args="nmap -sV -p- 10.0.0.1" start="1700000000">
  <host starttime="1700000000" endtime="1700000100">
    <status state="up" reason="syn-ack"/>
    <address addr="10.0.0.1" addrtype="ipv4"/>
    <hostnames>
      <hostname name="example.com" type="PTR"/>
    </hostnames>
    <ports>
      <port protocol="tcp" portid="22">
        <state state="open" reason="syn-ack"/>
        <service name="ssh" product="OpenSSH" version="8.9p1" extrainfo="Ubuntu" conf="10"/>
      </port>
      <port protocol="tcp" portid="80">
        <state state="open" reason="syn-ack"/>
        <service name="http" product="nginx" version="1.18.0" conf="10"/>
      </port>
      <port protocol="tcp" portid="443">
        <state state="open" reason="syn-ack"/>
        <service name="https" product="nginx" version="1.18.0" tunnel="ssl" conf="10"/>
      </port>
    </ports>
  </host>
</nmaprun>`;

/** IPv4 を持つホストと IPv6 だけのホスト、ports の無いホスト */
const MIXED_XML = `<?xml version="1.0" encoding="UTF-8"?>
<nmaprun scanner="nmap">
  <host>
    <address addr="fe80::1" addrtype="ipv6"/>
  </host>
  <host>
    <address addr="10.0.0.4" addrtype="ipv4"/>
    <address addr="00:11:22:33:44:55" addrtype="mac"/>
  </host>
</nmaprun>`;

// ============================================================
// テスト
// ============================================================

describe('parseNmapXml', () => {
  it('ポートを 7 フィールドの記述子に変換する', () => {
    const result = parseNmapXml(SINGLE_HOST_XML);
    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.services).toEqual([
      { port: '22', state: 'open', protocol: 'tcp', owner: '', name: 'ssh', rpcInfo: '', version: 'OpenSSH 8.9p1 (Ubuntu)' },
      { port: '80', state: 'open', protocol: 'tcp', owner: '', name: 'http', rpcInfo: '', version: 'nginx 1.18.0' },
      { port: '443', state: 'open', protocol: 'tcp', owner: '', name: 'ssl|https', rpcInfo: '', version: 'nginx 1.18.0' },
    ]);
  });

  it('hostname があればホスト名に使い、grep 形式と同じポート一覧を作る', () => {
    const host = parseNmapXml(SINGLE_HOST_XML).records[0];
    expect(host).toMatchObject({ name: 'example.com', nname: 'example.com', ipv4: '10.0.0.1' });
    expect(host?.portList).toBe(
      '22/open/tcp//ssh//OpenSSH 8.9p1 (Ubuntu), 80/open/tcp//http//nginx 1.18.0, 443/open/tcp//ssl|https//nginx 1.18.0',
    );
  });

  it('IPv4 の無いホストはスキップし、hostname が無ければ IPv4 を名前にする', () => {
    const result = parseNmapXml(MIXED_XML);
    expect(result.skipped).toEqual([{ lineNumber: 1, line: '', reason: 'host without IPv4 address' }]);
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ name: '10.0.0.4', nname: '', portList: '', services: [] });
  });

  it('hostOverride が指定されればそれを使う', () => {
    const result = parseNmapXml(SINGLE_HOST_XML, { hostOverride: 'scan-target.example.com' });
    expect(result.records[0]?.name).toBe('scan-target.example.com');
  });

  it('host 要素が無ければ空の結果', () => {
    const result = parseNmapXml('<nmaprun scanner="nmap"></nmaprun>');
    expect(result).toEqual({ records: [], skipped: [] });
  });
});
