/**
 * surfacewatch — Nmap XML パーサー
 *
 * nmap の XML 出力を解析し、grep 形式と同じ ParsedHostScan を返す。
 * 各ポートは 7 フィールドの記述子に変換する。
 * fast-xml-parser を使用して XML をパースする。
 */

import { XMLParser } from 'fast-xml-parser';
import type { LineParseResult, ParsedHostScan, ServiceDescriptor } from '../types/parser.js';
import { emptyLineParseResult } from '../types/parser.js';
import { encodeServices } from './service-descriptor.js';

// ============================================================
// XML パース後の型定義（unknown から安全に取り出すための構造）
// ============================================================

interface NmapAddress {
  '@_addr': string;
  '@_addrtype': string;
}

interface NmapHostname {
  '@_name': string;
  '@_type'?: string;
}

interface NmapServiceAttr {
  '@_name'?: string;
  '@_product'?: string;
  '@_version'?: string;
  '@_extrainfo'?: string;
  '@_tunnel'?: string;
}

interface NmapPort {
  '@_protocol': string;
  '@_portid': string | number;
  state?: { '@_state': string };
  service?: NmapServiceAttr;
}

interface NmapHost {
  address?: NmapAddress | NmapAddress[];
  hostnames?: {
    hostname?: NmapHostname | NmapHostname[];
  };
  ports?: {
    port?: NmapPort | NmapPort[];
  };
}

interface NmapRun {
  nmaprun?: {
    host?: NmapHost | NmapHost[];
  };
}

// ============================================================
// ユーティリティ
// ============================================================

/** 値を配列に正規化する。undefined/null は空配列を返す。 */
function ensureArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** product, version, extrainfo から version フィールドを合成する */
function buildVersion(service: NmapServiceAttr | undefined): string {
  if (service === undefined) return '';
  const parts: string[] = [];
  if (service['@_product']) parts.push(service['@_product']);
  if (service['@_version']) parts.push(service['@_version']);
  if (service['@_extrainfo']) parts.push(`(${service['@_extrainfo']})`);
  return parts.join(' ');
}

/** tunnel=ssl の場合は grep 形式と同じく `ssl|<name>` にする */
function serviceName(service: NmapServiceAttr | undefined): string {
  const name = service?.['@_name'] ?? '';
  return service?.['@_tunnel'] === 'ssl' ? `ssl|${name}` : name;
}

function toDescriptor(port: NmapPort): ServiceDescriptor {
  return {
    port: String(port['@_portid']),
    state: port.state?.['@_state'] ?? '',
    protocol: port['@_protocol'],
    owner: '',
    name: serviceName(port.service),
    rpcInfo: '',
    version: buildVersion(port.service),
  };
}

// ============================================================
// メインパーサー
// ============================================================

/**
 * nmap XML 出力をパースする。
 *
 * IPv4 アドレスを持たないホストは skipped に入る。
 * ホスト名は hostOverride、最初の hostname、IPv4 の順で決まる。
 */
export function parseNmapXml(
  xml: string,
  options: { hostOverride?: string } = {},
): LineParseResult<ParsedHostScan> {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    allowBooleanAttributes: true,
  });

  const parsed: unknown = parser.parse(xml);
  const nmapRun = parsed as NmapRun;

  const result = emptyLineParseResult<ParsedHostScan>();

  ensureArray(nmapRun.nmaprun?.host).forEach((host, index) => {
    const ipv4 = ensureArray(host.address).find((a) => a['@_addrtype'] === 'ipv4')?.['@_addr'];
    if (ipv4 === undefined) {
      result.skipped.push({ lineNumber: index + 1, line: '', reason: 'host without IPv4 address' });
      return;
    }

    const nname = ensureArray(host.hostnames?.hostname)[0]?.['@_name'] ?? '';
    const services = ensureArray(host.ports?.port).map(toDescriptor);
    const portList = encodeServices(services);

    result.records.push({
      name: options.hostOverride ?? (nname !== '' ? nname : ipv4),
      nname,
      ipv4,
      portList,
      services,
      line: `Host: ${ipv4} (${nname})\tPorts: ${portList}`,
    });
  });

  return result;
}
