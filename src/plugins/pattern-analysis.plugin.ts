// ============================================
// VOTESHIELD - Pattern Analysis Scheduler Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

export interface PatternAnalysisPluginOptions {
  enabled?: boolean;
  intervalMinutes?: number;
  windowHours?: number;
}

const MINUTE_MS = 60 * 1000;

const patternAnalysisPluginImpl: FastifyPluginAsync<PatternAnalysisPluginOptions> = async (fastify, options) => {
  if (!options.enabled) {
    fastify.log.info('Scheduled pattern analysis disabled');
    return;
  }

  const intervalMs = (options.intervalMinutes ?? 60) * MINUTE_MS;
  const windowHours = options.windowHours ?? 24;
  let running = false;

  const tick = () => {
    // Skip a tick while the previous run is still going
    if (running) return;
    running = true;
    fastify.services.patterns.run(null, windowHours)
      .catch(err => fastify.log.error({ err }, 'Scheduled pattern analysis failed'))
      .finally(() => {
        running = false;
      });
  };

  const timer = setInterval(tick, intervalMs);
  timer.unref();
  fastify.log.info({ intervalMinutes: intervalMs / MINUTE_MS, windowHours }, 'Scheduled pattern analysis enabled');

  fastify.addHook('onClose', async () => {
    clearInterval(timer);
  });
};

export const patternAnalysisPlugin = fp(patternAnalysisPluginImpl, {
  name: 'voteshield-pattern-analysis',
  dependencies: ['voteshield-services'],
});
