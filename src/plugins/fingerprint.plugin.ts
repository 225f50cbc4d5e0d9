// ============================================
// VOTESHIELD - Fingerprint Extraction Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { extractIp, type HeaderBag } from '../utils/voter-identity.js';
import { deriveFingerprintFromHeaders, normalizeFingerprint } from '../utils/fingerprint.js';

export const FINGERPRINT_HEADER = 'x-fingerprint';

export type FingerprintSource = 'header' | 'derived';

declare module 'fastify' {
  interface FastifyRequest {
    clientIp: string | null;
    fingerprint: string | null;
    fingerprintSource: FingerprintSource | null;
  }
}

function headerValue(headers: HeaderBag, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

const fingerprintPluginImpl: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('clientIp', null);
  fastify.decorateRequest('fingerprint', null);
  fastify.decorateRequest('fingerprintSource', null);

  fastify.addHook('onRequest', async (request) => {
    request.clientIp = extractIp(request.headers, request.socket.remoteAddress);

    const sent = normalizeFingerprint(headerValue(request.headers, FINGERPRINT_HEADER));
    if (sent) {
      request.fingerprint = sent;
      request.fingerprintSource = 'header';
    } else {
      request.fingerprint = deriveFingerprintFromHeaders(request.headers);
      request.fingerprintSource = 'derived';
    }
  });
};

export const fingerprintPlugin = fp(fingerprintPluginImpl, {
  name: 'voteshield-fingerprint',
});
