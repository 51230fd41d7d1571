import { describe, it, expect } from 'vitest';
import {
  diffServices,
  encodeServices,
  parseServiceDescriptor,
  servicesEqual,
} from '../../src/parser/service-descriptor.js';
import type { ServiceDescriptor } from '../../src/types/parser.js';

function svc(port: string, name: string, version = ''): ServiceDescriptor {
  return { port, state: 'open', protocol: 'tcp', owner: '', name, rpcInfo: '', version };
}

describe('parseServiceDescriptor', () => {
  it('7 フィールドを順に取り出す', () => {
    expect(parseServiceDescriptor('22/open/tcp//ssh//OpenSSH 8.9p1')).toEqual({
      port: '22',
      state: 'open',
      protocol: 'tcp',
      owner: '',
      name: 'ssh',
      rpcInfo: '',
      version: 'OpenSSH 8.9p1',
    });
  });

  it('フィールドが 7 未満なら undefined', () => {
    expect(parseServiceDescriptor('22/open/tcp//ssh')).toBeUndefined();
  });

  it('8 個目以降のフィールドは無視する', () => {
    expect(parseServiceDescriptor('80/open/tcp//http//nginx/extra')?.version).toBe('nginx');
  });
});

describe('encodeServices', () => {
  it('記述子を ", " で連結する', () => {
    expect(encodeServices([svc('22', 'ssh'), svc('80', 'http', 'nginx')])).toBe(
      '22/open/tcp//ssh//, 80/open/tcp//http//nginx',
    );
  });

  it('空の一覧は空文字', () => {
    expect(encodeServices([])).toBe('');
  });
});

describe('diffServices', () => {
  it('開いた・閉じた・変化なしに分ける', () => {
    const diff = diffServices([svc('22', 'ssh'), svc('80', 'http')], [svc('22', 'ssh'), svc('443', 'https')]);
    expect(diff.unchanged.map((s) => s.port)).toEqual(['22']);
    expect(diff.opened.map((s) => s.port)).toEqual(['443']);
    expect(diff.closed.map((s) => s.port)).toEqual(['80']);
  });

  it('version が変われば別の記述子として扱う', () => {
    const diff = diffServices([svc('80', 'http', 'nginx 1.18')], [svc('80', 'http', 'nginx 1.24')]);
    expect(diff.opened).toHaveLength(1);
    expect(diff.closed).toHaveLength(1);
    expect(diff.unchanged).toHaveLength(0);
  });

  it('servicesEqual は 7 フィールドすべてを比較する', () => {
    expect(servicesEqual(svc('22', 'ssh'), svc('22', 'ssh'))).toBe(true);
    expect(servicesEqual(svc('22', 'ssh'), { ...svc('22', 'ssh'), owner: 'root' })).toBe(false);
  });
});
