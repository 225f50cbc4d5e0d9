// ============================================
// VOTESHIELD - Services Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { env } from '../config/env.js';
import { loadFraudConfig, type FraudDetectionConfig } from '../config/fraud.js';
import { createCache } from '../cache/index.js';
import type { VolatileCache } from '../cache/volatile-cache.js';
import { createServices, type ServiceContainer } from '../services/container.js';
import type { JobScheduler } from '../services/vote.service.js';
import type { NotificationTransport } from '../services/notification.service.js';

declare module 'fastify' {
  interface FastifyInstance {
    cache: VolatileCache;
    services: ServiceContainer;
  }
}

export interface ServicesPluginOptions {
  cache?: VolatileCache;
  fraudConfig?: Partial<FraudDetectionConfig>;
  transport?: NotificationTransport;
  schedule?: JobScheduler;
}

const servicesPluginImpl: FastifyPluginAsync<ServicesPluginOptions> = async (fastify, options) => {
  const cache = options.cache ?? createCache(env, fastify.log);
  fastify.decorate('cache', cache);

  const config: FraudDetectionConfig = { ...loadFraudConfig(env), ...options.fraudConfig };
  const services = createServices({
    db: fastify.db,
    cache,
    logger: fastify.log,
    config,
    deepAnalysis: env.DEEP_ANALYSIS_ENABLED,
    transport: options.transport,
    schedule: options.schedule,
  });
  fastify.decorate('services', services);

  fastify.addHook('onClose', async () => {
    services.events.removeAllListeners();
  });
};

export const servicesPlugin = fp(servicesPluginImpl, {
  name: 'voteshield-services',
});
