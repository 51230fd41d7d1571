/**
 * surfacewatch — 7 フィールドのサービス記述子
 *
 * `port/state/protocol/owner/name/rpc_info/version` の形式を扱う。
 * ポート一覧は `", "` 区切りで記述子を並べた文字列。
 */

import type { ServiceDescriptor } from '../types/parser.js';

const FIELD_COUNT = 7;

/**
 * 記述子 1 件をパースする。フィールドが 7 未満なら undefined。
 * 8 個目以降のフィールドは無視する。
 */
export function parseServiceDescriptor(raw: string): ServiceDescriptor | undefined {
  const fields = raw.split('/');
  if (fields.length < FIELD_COUNT) {
    return undefined;
  }
  const [port = '', state = '', protocol = '', owner = '', name = '', rpcInfo = '', version = ''] =
    fields;
  return { port, state, protocol, owner, name, rpcInfo, version };
}

export function encodeServiceDescriptor(service: ServiceDescriptor): string {
  return [
    service.port,
    service.state,
    service.protocol,
    service.owner,
    service.name,
    service.rpcInfo,
    service.version,
  ].join('/');
}

/** ポート一覧（エクスポート形式）を生成する */
export function encodeServices(services: readonly ServiceDescriptor[]): string {
  return services.map(encodeServiceDescriptor).join(', ');
}

/** 7 フィールドすべての構造的等価 */
export function servicesEqual(a: ServiceDescriptor, b: ServiceDescriptor): boolean {
  return (
    a.port === b.port &&
    a.state === b.state &&
    a.protocol === b.protocol &&
    a.owner === b.owner &&
    a.name === b.name &&
    a.rpcInfo === b.rpcInfo &&
    a.version === b.version
  );
}

export interface ServiceDiff {
  /** 新しい一覧にのみ存在する */
  opened: ServiceDescriptor[];
  /** 古い一覧にのみ存在する */
  closed: ServiceDescriptor[];
  /** 両方に存在する */
  unchanged: ServiceDescriptor[];
}

/** 旧サービス一覧と新サービス一覧の差分 */
export function diffServices(
  previous: readonly ServiceDescriptor[],
  current: readonly ServiceDescriptor[],
): ServiceDiff {
  const opened = current.filter((s) => !previous.some((p) => servicesEqual(p, s)));
  const closed = previous.filter((p) => !current.some((s) => servicesEqual(p, s)));
  const unchanged = current.filter((s) => previous.some((p) => servicesEqual(p, s)));
  return { opened, closed, unchanged };
}

/** DB 行など余分なフィールドを持つ値から 7 フィールドだけを取り出す */
export function toServiceDescriptor(service: ServiceDescriptor): ServiceDescriptor {
  return {
    port: service.port,
    state: service.state,
    protocol: service.protocol,
    owner: service.owner,
    name: service.name,
    rpcInfo: service.rpcInfo,
    version: service.version,
  };
}
