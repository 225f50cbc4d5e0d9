// ============================================
// VOTESHIELD - Device Fingerprint Helpers
// ============================================

import { canonicalJson, sha256Hex, type HeaderBag } from './voter-identity.js';

export const FINGERPRINT_LENGTH = 64;

const HEX_PATTERN = /^[0-9a-f]+$/i;

// Headers combined into a server-side fingerprint when the client sends none
const FINGERPRINT_HEADERS = [
  'user-agent',
  'accept-language',
  'accept-encoding',
  'accept',
  'connection',
  'dnt',
] as const;

export type FingerprintCheck =
  | { valid: true }
  | { valid: false; error: string };

export function validateFingerprintFormat(fingerprint: string | null | undefined): FingerprintCheck {
  if (!fingerprint) {
    return { valid: false, error: 'Fingerprint is required' };
  }
  if (fingerprint.length !== FINGERPRINT_LENGTH) {
    return { valid: false, error: `Fingerprint must be ${FINGERPRINT_LENGTH} characters long` };
  }
  if (!HEX_PATTERN.test(fingerprint)) {
    return { valid: false, error: 'Fingerprint must be a hexadecimal string' };
  }
  return { valid: true };
}

/**
 * Anonymous voters must present a well-formed fingerprint; authenticated voters may omit it.
 */
export function requireFingerprintForAnonymous(
  fingerprint: string | null | undefined,
  isAuthenticated: boolean
): FingerprintCheck {
  if (isAuthenticated) {
    return fingerprint ? validateFingerprintFormat(fingerprint) : { valid: true };
  }
  if (!fingerprint) {
    return { valid: false, error: 'Fingerprint is required for anonymous votes' };
  }
  return validateFingerprintFormat(fingerprint);
}

export function deriveFingerprintFromHeaders(headers: HeaderBag): string {
  const signals: Record<string, string> = {};
  for (const name of FINGERPRINT_HEADERS) {
    const value = headers[name];
    signals[name.replace(/-/g, '_')] = (Array.isArray(value) ? value.join(',') : value) ?? '';
  }
  return sha256Hex(canonicalJson(signals));
}

export function normalizeFingerprint(fingerprint: string | null | undefined): string | null {
  const trimmed = fingerprint?.trim();
  return trimmed ? trimmed.toLowerCase() : null;
}
