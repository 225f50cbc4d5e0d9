// ============================================
// VOTESHIELD - Voter Identity
// ============================================

import { createHash } from 'crypto';

export type HeaderBag = Record<string, string | string[] | undefined>;

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * JSON with object keys sorted at every level, so equal values always
 * serialize to the same string.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Stable per-identity token. Authenticated voters hash their user id only;
 * anonymous voters hash the (fingerprint, ip, user agent) tuple, so identical
 * anonymous devices share a token.
 */
export function voterTokenFor(
  userId: string | null,
  ip: string | null,
  userAgent: string | null,
  fingerprint: string | null
): string {
  if (userId) {
    return sha256Hex(`user:${userId}`);
  }
  return sha256Hex(canonicalJson({
    fp: fingerprint ?? '',
    ip: ip ?? '',
    ua: userAgent ?? '',
  }));
}

function firstHeader(headers: HeaderBag, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Client IP: first x-forwarded-for hop, then x-real-ip, then the socket address.
 */
export function extractIp(headers: HeaderBag, remoteAddress?: string | null): string | null {
  const forwarded = firstHeader(headers, 'x-forwarded-for');
  if (forwarded) {
    const first = forwarded.split(',')[0].trim();
    if (first) return first;
  }

  const realIp = firstHeader(headers, 'x-real-ip')?.trim();
  if (realIp) return realIp;

  return remoteAddress || null;
}
