// ============================================
// VOTESHIELD - Controllers Barrel Export & Registration
// ============================================

import { FastifyInstance } from 'fastify';
import { votesController } from './votes.controller.js';
import { fingerprintBlocksController } from './fingerprint-blocks.controller.js';
import { fraudController } from './fraud.controller.js';

export async function registerControllers(fastify: FastifyInstance): Promise<void> {
  await fastify.register(votesController);
  await fastify.register(fingerprintBlocksController);
  await fastify.register(fraudController);
}

// Export individual controllers for testing
export {
  votesController,
  fingerprintBlocksController,
  fraudController,
};
