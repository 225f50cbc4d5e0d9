// ============================================
// VOTESHIELD - Fraud Analysis Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { analyzeSchema, listAlertsQuerySchema } from '../schemas/fraud.schema.js';
import { requireAdmin } from './fingerprint-blocks.controller.js';
import type { FraudAlert } from '../repositories/fraud-alert.repository.js';

function serializeAlert(alert: FraudAlert) {
  return {
    id: alert.id,
    pollId: alert.pollId,
    voteId: alert.voteId,
    patternType: alert.patternType,
    ipAddress: alert.ipAddress,
    reasons: alert.reasons,
    riskScore: alert.riskScore,
    createdAt: alert.createdAt.toISOString(),
  };
}

export const fraudController: FastifyPluginAsync = async (fastify) => {
  const { patterns, alerts } = fastify.services;

  // Run pattern analysis now
  fastify.post('/api/admin/fraud/analyze', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    requireAdmin(request);
    const body = analyzeSchema.parse(request.body ?? {});

    const summary = await patterns.run(body.pollId ?? null, body.windowHours);
    return { success: true, summary };
  });

  // Recent alerts, optionally for one poll
  fastify.get('/api/admin/fraud/alerts', {
    preHandler: [fastify.authenticate],
  }, async (request) => {
    requireAdmin(request);
    const query = listAlertsQuerySchema.parse(request.query);

    const results = query.pollId
      ? await alerts.listForPoll(query.pollId, query.limit, query.offset)
      : await alerts.listRecent(query.limit, query.offset);

    return { alerts: results.map(serializeAlert) };
  });
};
