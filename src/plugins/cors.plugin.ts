// ============================================
// VOTESHIELD - CORS Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import cors from '@fastify/cors';
import { env, isDevelopment } from '../config/env.js';

export function parseOrigins(value: string): string[] {
  return value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
}

export const corsPlugin: FastifyPluginAsync = async (fastify) => {
  await fastify.register(cors, {
    origin: isDevelopment()
      ? true // Allow all origins in development
      : parseOrigins(env.CORS_ORIGINS),
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Fingerprint', 'Idempotency-Key'],
    credentials: true,
  });
};
