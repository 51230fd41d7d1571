/**
 * surfacewatch — nmap grep 形式（.gnmap）パーサー
 *
 * `Host: <ipv4> (<name>)\tPorts: <svc>, <svc>, ...` の行から
 * ParsedHostScan を生成する。
 */

import type { LineParseResult, ParsedHostScan, ServiceDescriptor } from '../types/parser.js';
import { emptyLineParseResult, splitLines } from '../types/parser.js';
import { parseServiceDescriptor } from './service-descriptor.js';

const PORTS_MARKER = /.*Ports:\s/;
const HOST_FIELD = /Host:\s+(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})\s+\((.*?)\)/;

export interface GnmapParseOptions {
  /** 指定時はホスト名としてこの値を使う */
  hostOverride?: string;
}

/**
 * .gnmap の内容をパースする。
 *
 * ホスト名は hostOverride、逆引き名（空でなければ）、IPv4 の順で決まる。
 * 7 フィールドに満たない記述子はそのエントリだけ捨てる。
 */
export function parseGnmapLines(
  content: string,
  options: GnmapParseOptions = {},
): LineParseResult<ParsedHostScan> {
  const result = emptyLineParseResult<ParsedHostScan>();

  splitLines(content).forEach((line, index) => {
    if (line.trim() === '' || line.startsWith('#')) return;
    const lineNumber = index + 1;

    if (!PORTS_MARKER.test(line)) {
      result.skipped.push({ lineNumber, line, reason: 'no port list' });
      return;
    }

    const segments = line.split('\t');
    const host = HOST_FIELD.exec(segments[0] ?? '');
    const portSegment = segments[1];
    if (host === null || portSegment === undefined) {
      result.skipped.push({ lineNumber, line, reason: 'malformed host field' });
      return;
    }

    const ipv4 = host[1] ?? '';
    const nname = (host[2] ?? '').trim();
    const name = options.hostOverride ?? (nname !== '' ? nname : ipv4);

    // "Ports: " 以降、次のタブ（Ignored State など）の手前まで
    const afterMarker = portSegment.split(PORTS_MARKER)[1] ?? '';
    const portList = (afterMarker.split('\t')[0] ?? '').replace(/\n+$/, '');

    const services: ServiceDescriptor[] = [];
    if (portList.length > 1) {
      for (const entry of portList.split(', ')) {
        const service = parseServiceDescriptor(entry);
        if (service !== undefined) {
          services.push(service);
        }
      }
    }

    result.records.push({
      name,
      nname,
      ipv4,
      portList: portList.length > 1 ? portList : '',
      services,
      line,
    });
  });

  return result;
}
