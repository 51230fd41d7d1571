import { describe, it, expect } from 'vitest';
import { parseWpscanJson, vulnerabilityId } from '../../src/parser/wpscan-parser.js';
import { WPSCAN_REPORT } from '../helpers/fixtures.js';

describe('parseWpscanJson', () => {
  it('脆弱性のある区画だけを、プラグイン・version の順に返す', () => {
    const result = parseWpscanJson(WPSCAN_REPORT);

    expect(result.skipped).toEqual([]);
    expect(result.records.map((r) => [r.section, r.targetUrl, r.targetIp, r.vulnerabilities.length])).toEqual([
      ['plugins/contact-form', 'https://blog.example.com/', '203.0.113.20', 1],
      ['version', 'https://blog.example.com/', '203.0.113.20', 1],
    ]);
    expect(result.records[0]?.vulnerabilities[0]?.raw).toEqual({
      title: 'Contact Form <= 5.0 - XSS',
      references: { cve: ['2024-0001'], url: ['https://example.com/a'] },
    });
  });

  it('target_url が無いレポートはスキップする', () => {
    const result = parseWpscanJson('{"target_ip":"203.0.113.20"}');
    expect(result.records).toEqual([]);
    expect(result.skipped.map((s) => s.reason)).toEqual(['target_url: Required']);
  });

  it('壊れた JSON はスキップする', () => {
    expect(parseWpscanJson('{').skipped.map((s) => s.reason)).toEqual(['invalid JSON']);
  });
});

describe('vulnerabilityId', () => {
  it('CVE があれば CVE 番号、無ければタイトル', () => {
    expect(vulnerabilityId({ title: 't', references: { cve: ['2024-0001'] }, raw: {} })).toBe('CVE-2024-0001');
    expect(vulnerabilityId({ title: 'Plugin - XSS', references: { cve: [] }, raw: {} })).toBe('Plugin - XSS');
  });
});
