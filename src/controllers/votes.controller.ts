// ============================================
// VOTESHIELD - Votes Controller
// ============================================

import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { castVoteSchema } from '../schemas/votes.schema.js';
import { idParamSchema } from '../schemas/common.schema.js';
import { UnauthorizedError } from '../plugins/error-handler.plugin.js';
import type { VoteRecord } from '../repositories/vote.repository.js';

const IDEMPOTENCY_HEADER = 'idempotency-key';

function serializeVote(vote: VoteRecord) {
  return {
    id: vote.id,
    pollId: vote.pollId,
    optionId: vote.optionId,
    isValid: vote.isValid,
    riskScore: vote.riskScore,
    createdAt: vote.createdAt.toISOString(),
  };
}

function headerKey(request: FastifyRequest): string | undefined {
  const value = request.headers[IDEMPOTENCY_HEADER];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function requireUserId(request: FastifyRequest): string {
  if (!request.user) {
    throw new UnauthorizedError();
  }
  return request.user.userId;
}

export const votesController: FastifyPluginAsync = async (fastify) => {
  const voteService = fastify.services.votes;

  // Cast a vote (anonymous or authenticated)
  fastify.post('/api/votes/cast', {
    preHandler: [fastify.optionalAuth],
    config: { rateLimit: fastify.voteRateLimit },
  }, async (request, reply) => {
    const body = castVoteSchema.parse(request.body);
    const userId = request.user?.userId ?? null;

    // Signed-in voters are only fingerprinted when the client sends one
    const fingerprint = userId && request.fingerprintSource !== 'header' ? null : request.fingerprint;

    const result = await voteService.castVote({
      pollId: body.pollId,
      optionId: body.optionId,
      idempotencyKey: body.idempotencyKey ?? headerKey(request),
      voter: {
        userId,
        ip: request.clientIp,
        userAgent: request.headers['user-agent'] ?? null,
        fingerprint,
      },
    });

    reply.status(result.isNew ? 201 : 200);
    return {
      success: true,
      isNew: result.isNew,
      vote: serializeVote(result.vote),
    };
  });

  // List the caller's votes
  fastify.get('/api/votes/mine', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    const votes = await voteService.listVotesForUser(requireUserId(request));
    return { votes: votes.map(serializeVote) };
  });

  // Retract the caller's vote
  fastify.delete('/api/votes/:id', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    const { id } = idParamSchema.parse(request.params);
    await voteService.retractVote(requireUserId(request), id);
    return { success: true };
  });
};
