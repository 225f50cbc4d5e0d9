// ============================================
// VOTESHIELD - Fingerprint Blocks Controller
// ============================================

import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import {
  blockFingerprintSchema,
  fingerprintParamSchema,
  listBlocksQuerySchema,
} from '../schemas/fraud.schema.js';
import { ForbiddenError } from '../plugins/error-handler.plugin.js';
import type { BlockInfo, BlockEvent } from '../repositories/fingerprint-block.repository.js';

export function requireAdmin(request: FastifyRequest): string {
  if (!request.user || request.user.role !== 'admin') {
    throw new ForbiddenError('Admin access required');
  }
  return request.user.userId;
}

function serializeBlock(block: BlockInfo) {
  return {
    fingerprint: block.fingerprint,
    reason: block.reason,
    isActive: block.isActive,
    blockedAt: block.blockedAt.toISOString(),
    blockedBy: block.blockedBy,
    unblockedAt: block.unblockedAt?.toISOString() ?? null,
    unblockedBy: block.unblockedBy,
    firstSeenUser: block.firstSeenUser,
    totalUsers: block.totalUsers,
    totalVotes: block.totalVotes,
  };
}

function serializeEvent(event: BlockEvent) {
  return {
    action: event.action,
    actor: event.actor,
    reason: event.reason,
    totalUsers: event.totalUsers,
    totalVotes: event.totalVotes,
    createdAt: event.createdAt.toISOString(),
  };
}

export const fingerprintBlocksController: FastifyPluginAsync = async (fastify) => {
  const registry = fastify.services.blocks;

  // List blocks
  fastify.get('/api/admin/fingerprint-blocks', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    requireAdmin(request);
    const query = listBlocksQuerySchema.parse(request.query);

    const [blocks, activeCount] = await Promise.all([
      registry.list(query),
      registry.countActive(),
    ]);

    return {
      blocks: blocks.map(serializeBlock),
      activeCount,
      limit: query.limit,
      offset: query.offset,
    };
  });

  // Block manually
  fastify.post('/api/admin/fingerprint-blocks', {
    preHandler: [fastify.authenticate],
  }, async (request, reply) => {
    const adminId = requireAdmin(request);
    const body = blockFingerprintSchema.parse(request.body);

    const block = await registry.block(body.fingerprint, body.reason, null, 0, 0, adminId);

    reply.status(201);
    return { success: true, block: serializeBlock(block) };
  });

  // Unblock
  fastify.delete('/api/admin/fingerprint-blocks/:fingerprint', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    const adminId = requireAdmin(request);
    const { fingerprint } = fingerprintParamSchema.parse(request.params);

    const block = await registry.unblock(fingerprint, adminId);
    return { success: true, block: serializeBlock(block) };
  });

  // Block/unblock history
  fastify.get('/api/admin/fingerprint-blocks/:fingerprint/history', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    requireAdmin(request);
    const { fingerprint } = fingerprintParamSchema.parse(request.params);

    const events = await registry.history(fingerprint);
    return { fingerprint, events: events.map(serializeEvent) };
  });
};
