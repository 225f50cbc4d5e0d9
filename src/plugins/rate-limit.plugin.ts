// ============================================
// VOTESHIELD - Vote Rate Limit Plugin
// ============================================

import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit, { type RateLimitOptions } from '@fastify/rate-limit';
import { RateLimitError } from './error-handler.plugin.js';

const WINDOW_MS = 60 * 60 * 1000;

export interface VoteRateLimitOptions {
  anonymousPerHour: number;
  authenticatedPerHour: number;
}

declare module 'fastify' {
  interface FastifyInstance {
    voteRateLimit: RateLimitOptions;
  }
}

function subjectOf(request: FastifyRequest): string {
  return request.user ? `user:${request.user.userId}` : `ip:${request.clientIp ?? request.ip}`;
}

/**
 * Route options for vote casting: signed-in voters are counted per user,
 * everyone else per client address. Counting runs as a preHandler so
 * optionalAuth has already resolved the user.
 */
const voteRateLimitPluginImpl: FastifyPluginAsync<VoteRateLimitOptions> = async (fastify, options) => {
  await fastify.register(rateLimit, { global: false });

  fastify.decorate('voteRateLimit', {
    hook: 'preHandler',
    timeWindow: WINDOW_MS,
    keyGenerator: subjectOf,
    max: (_request: FastifyRequest, key: string) =>
      key.startsWith('user:') ? options.authenticatedPerHour : options.anonymousPerHour,
    errorResponseBuilder: (_request, context) => new RateLimitError(Math.max(1, Math.ceil(context.ttl / 1000))),
  } satisfies RateLimitOptions);
};

export const voteRateLimitPlugin = fp(voteRateLimitPluginImpl, {
  name: 'voteshield-vote-rate-limit',
  dependencies: ['voteshield-auth', 'voteshield-fingerprint'],
});
