// ============================================
// VOTESHIELD - Environment Configuration
// ============================================

import { z } from 'zod';

// Custom coerce helpers
const coerceNumber = z.coerce.number();
const coerceBoolean = z.string().transform(v => v === 'true');

const envSchema = z.object({
  // Server
  PORT: coerceNumber.default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Database
  DB_PATH: z.string().default('./voteshield.db'),
  DB_BUSY_TIMEOUT_MS: coerceNumber.int().positive().default(5000),

  // Auth
  JWT_SECRET: z.string().min(32).default('development-secret-key-change-in-production'),
  JWT_EXPIRES_IN_SECONDS: coerceNumber.int().positive().default(7 * 24 * 60 * 60),

  // Volatile cache (falls back to in-process memory when unset)
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional(),
  CACHE_TIMEOUT_MS: coerceNumber.int().positive().default(500),
  CACHE_READ_RETRIES: coerceNumber.int().min(0).max(5).default(2),

  // Fraud detection
  FRAUD_USER_THRESHOLD: coerceNumber.int().min(2).default(2),
  FRAUD_IP_THRESHOLD: coerceNumber.int().min(2).default(2),
  FRAUD_VELOCITY_PER_HOUR: coerceNumber.positive().default(10),
  FRAUD_BLOCK_SCORE: coerceNumber.int().min(1).max(100).default(70),
  FRAUD_WINDOW_HOURS: coerceNumber.positive().default(24),
  FINGERPRINT_CACHE_TTL_SECONDS: coerceNumber.int().positive().default(3600),

  // Vote casting rate limits, per hour
  VOTE_RATE_LIMIT_ANON_PER_HOUR: coerceNumber.int().positive().default(50),
  VOTE_RATE_LIMIT_USER_PER_HOUR: coerceNumber.int().positive().default(200),

  // Background jobs
  PATTERN_ANALYSIS_ENABLED: coerceBoolean.default('true'),
  PATTERN_ANALYSIS_INTERVAL_MINUTES: coerceNumber.positive().default(60),
  DEEP_ANALYSIS_ENABLED: coerceBoolean.default('true'),

  // CORS
  CORS_ORIGINS: z.string().default(''),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = loadEnv();

export function isDevelopment(): boolean {
  return env.NODE_ENV === 'development';
}

export function isProduction(): boolean {
  return env.NODE_ENV === 'production';
}

export function isTest(): boolean {
  return env.NODE_ENV === 'test';
}
