// ============================================
// VOTESHIELD - Logger
// ============================================

import { pino, type BaseLogger, type LevelWithSilent } from 'pino';
import { env, isDevelopment, isTest } from '../config/env.js';

/**
 * Logging surface services depend on. Fastify's request-scoped logger and
 * standalone pino instances both satisfy it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function resolveLogLevel(): LevelWithSilent {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (isTest()) return 'silent';
  return isDevelopment() ? 'debug' : 'info';
}

export const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: {
    translateTime: 'HH:MM:ss Z',
    ignore: 'pid,hostname',
  },
};

/**
 * Standalone logger for code running outside a Fastify request (scripts, jobs, tests).
 */
export function createLogger(name?: string): Logger {
  return pino({
    name,
    level: resolveLogLevel(),
    ...(isDevelopment() && { transport: PRETTY_TRANSPORT }),
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
