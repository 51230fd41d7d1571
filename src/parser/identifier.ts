/**
 * surfacewatch — 識別子の種別判定
 *
 * 文字列を ADDRESS / CIDR / URL / DOMAIN / FILE_HASH / EMAIL / UNKNOWN に分類する。
 * 判定順は固定で、最初に一致したものを採用する。
 */

import type { IdentifierType } from '../types/entities.js';

const IPV4 = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;
const CIDR = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\/\d{1,2}$/;
export const DOMAIN_PATTERN =
  '(?!-)(?:[a-zA-Z\\d-]{0,62}[a-zA-Z\\d]\\.){1,126}(?!\\d+)[a-zA-Z\\d]{1,63}';
const DOMAIN = new RegExp(`^${DOMAIN_PATTERN}$`);
const SHA256 = /^[A-Fa-f0-9]{64}$/;
const MD5 = /^[A-Fa-f0-9]{32}$/;
const EMAIL = /^[A-Za-z0-9.+-]+@[A-Za-z0-9.-]+\.[a-zA-Z]*$/;

/** 識別子の種別を返す。例外は投げない。 */
export function classifyIdentifier(value: string): IdentifierType {
  if (IPV4.test(value)) return 'ADDRESS';
  if (CIDR.test(value)) return 'CIDR';
  if (value.toLowerCase().startsWith('http')) return 'URL';
  if (DOMAIN.test(value)) return 'DOMAIN';
  // SHA-256 と MD5 はどちらもファイルハッシュ扱い
  if (SHA256.test(value)) return 'FILE_HASH';
  if (MD5.test(value)) return 'FILE_HASH';
  if (EMAIL.test(value)) return 'EMAIL';
  return 'UNKNOWN';
}
