// ============================================
// VOTESHIELD - Fastify App Setup
// ============================================

import Fastify, { FastifyInstance } from 'fastify';
import { env, isDevelopment } from './config/env.js';
import { openDatabase, type DrizzleDb } from './db/drizzle.js';
import { resolveLogLevel, PRETTY_TRANSPORT } from './utils/logger.js';
import {
  corsPlugin,
  websocketPlugin,
  errorHandlerPlugin,
  authPlugin,
  fingerprintPlugin,
  servicesPlugin,
  patternAnalysisPlugin,
  voteRateLimitPlugin,
  type ServicesPluginOptions,
  type VoteRateLimitOptions,
} from './plugins/index.js';
import { registerControllers } from './controllers/index.js';

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    db: DrizzleDb;
  }
}

export interface AppOptions extends ServicesPluginOptions {
  logger?: boolean;
  dbPath?: string;
  patternAnalysis?: boolean;
  voteRateLimit?: Partial<VoteRateLimitOptions>;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false
      ? false
      : {
          level: resolveLogLevel(),
          ...(isDevelopment() && { transport: PRETTY_TRANSPORT }),
        },
  });

  // Decorate with database
  const { sqlite, db } = openDatabase(options.dbPath);
  fastify.decorate('db', db);
  fastify.addHook('onClose', async () => {
    sqlite.close();
  });

  // Register plugins
  await fastify.register(errorHandlerPlugin);
  await fastify.register(corsPlugin);
  await fastify.register(authPlugin);
  await fastify.register(fingerprintPlugin);
  await fastify.register(servicesPlugin, {
    cache: options.cache,
    fraudConfig: options.fraudConfig,
    transport: options.transport,
    schedule: options.schedule,
  });
  await fastify.register(voteRateLimitPlugin, {
    anonymousPerHour: options.voteRateLimit?.anonymousPerHour ?? env.VOTE_RATE_LIMIT_ANON_PER_HOUR,
    authenticatedPerHour: options.voteRateLimit?.authenticatedPerHour ?? env.VOTE_RATE_LIMIT_USER_PER_HOUR,
  });
  await fastify.register(websocketPlugin);
  await fastify.register(patternAnalysisPlugin, {
    enabled: options.patternAnalysis ?? env.PATTERN_ANALYSIS_ENABLED,
    intervalMinutes: env.PATTERN_ANALYSIS_INTERVAL_MINUTES,
    windowHours: env.FRAUD_WINDOW_HOURS,
  });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // API version info
  fastify.get('/api', async () => {
    return {
      name: 'VoteShield API',
      version: '1.0.0',
      framework: 'Fastify',
    };
  });

  // Register all API controllers
  await registerControllers(fastify);

  return fastify;
}

export async function startApp(): Promise<FastifyInstance> {
  const app = await buildApp();

  try {
    const address = await app.listen({
      host: env.HOST,
      port: env.PORT,
    });
    app.log.info(`VoteShield server running at ${address}`);
    return app;
  } catch (err) {
    app.log.error(err);
    throw err;
  }
}
