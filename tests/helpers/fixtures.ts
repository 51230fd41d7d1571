/**
 * surfacewatch — テスト用の入力フィクスチャ
 */

import type { CreateFindingInput, CreateHostInput } from '../../src/types/repository.js';

export function hostInput(overrides: Partial<CreateHostInput> = {}): CreateHostInput {
  return {
    zone: 'external',
    name: 'web.example.com',
    nname: 'web.example.com',
    ipv4: '10.0.0.5',
    type: 'DOMAIN',
    tag: '[Services]',
    serviceSsh: '',
    serviceRdp: '',
    serviceFtp: '',
    serviceTelnet: '',
    serviceSmb: '',
    info: '',
    infoGnmap: '',
    owner: 'Unknown',
    metadata: '{}',
    lastdate: '2024-03-01T12:00:00.000Z',
    ...overrides,
  };
}

export function findingInput(overrides: Partial<CreateFindingInput> = {}): CreateFindingInput {
  return {
    name: 'web.example.com',
    vulnerability: 'CVE-2021-40438',
    tfp: -1,
    type: 'DOMAIN',
    ipv4: '',
    ipv6: '',
    level: 'critical',
    scope: 'E',
    engine: 'http',
    status: '',
    detectiondate: '2024-03-01T12:00:00.000Z',
    firstdate: '2024-03-01T12:00:00.000Z',
    lastdate: '2024-03-01T12:00:00.000Z',
    bumpdate: '2024-03-04T12:00:00.000Z',
    ptime: 'P0E',
    uri: 'https://web.example.com/',
    fullUri: 'https://web.example.com/',
    uriTruncated: 0,
    port: 443,
    protocol: 'tcp',
    nname: 'web.example.com',
    owner: 'Unknown',
    metadata: '{}',
    info: '',
    ...overrides,
  };
}

/** 脆弱性のあるプラグインと本体バージョンを含む wpscan の JSON 出力 */
export const WPSCAN_REPORT = JSON.stringify({
  target_url: 'https://blog.example.com/',
  target_ip: '203.0.113.20',
  plugins: {
    'contact-form': {
      location: 'https://blog.example.com/wp-content/plugins/contact-form/',
      vulnerabilities: [
        { title: 'Contact Form <= 5.0 - XSS', references: { cve: ['2024-0001'], url: ['https://example.com/a'] } },
      ],
    },
    akismet: { vulnerabilities: [] },
  },
  version: { number: '6.0', vulnerabilities: [{ title: 'WP < 6.1 - SQLi', references: {} }] },
  main_theme: null,
});
