// ============================================
// VOTESHIELD - Fraud Detection Configuration
// ============================================

import type { Env } from './env.js';

// ============================================
// Cache Keys
// ============================================
export const CACHE_KEYS = {
  IDEMPOTENCY_PREFIX: 'idempotency:',
  FINGERPRINT_ACTIVITY_PREFIX: 'fp:activity:',
};

// ============================================
// Thresholds & Weights
// ============================================

export interface FraudDetectionConfig {
  /** Distinct users on one fingerprint before the shared-principal rule fires */
  userThreshold: number;
  /** Distinct IPs on one fingerprint before the shared-principal rule fires */
  ipThreshold: number;
  userWeight: number;
  ipWeight: number;
  velocityWeight: number;
  fingerprintChangeWeight: number;
  /** Votes per hour above which a fingerprint is voting too fast */
  velocityPerHour: number;
  /** Velocity is meaningless for one or two votes */
  velocityMinVotes: number;
  blockScore: number;
  windowHours: number;
  deepAnalysisWindowHours: number;
  deepAnalysisWarnScore: number;
  rapidFingerprintChangeCount: number;

  activityTtlSeconds: number;
  idempotencyTtlSeconds: number;
  cacheTimeoutMs: number;
  cacheReadRetries: number;

  // Pattern analysis
  alertThreshold: number;
  flagThreshold: number;
  burstWindowMinutes: number;
  burstMinVotes: number;
  ipClusterMinVoters: number;
  subnetClusterMinIps: number;
  fingerprintReuseMinVoters: number;
  flagRetryLimit: number;
}

export const DEFAULT_FRAUD_CONFIG: FraudDetectionConfig = {
  userThreshold: 2,
  ipThreshold: 2,
  userWeight: 40,
  ipWeight: 30,
  velocityWeight: 20,
  fingerprintChangeWeight: 30,
  velocityPerHour: 10,
  velocityMinVotes: 3,
  blockScore: 70,
  windowHours: 24,
  deepAnalysisWindowHours: 168, // 7 days
  deepAnalysisWarnScore: 70,
  rapidFingerprintChangeCount: 3,

  activityTtlSeconds: 3600,
  idempotencyTtlSeconds: 3600,
  cacheTimeoutMs: 500,
  cacheReadRetries: 2,

  alertThreshold: 50,
  flagThreshold: 70,
  burstWindowMinutes: 5,
  burstMinVotes: 10,
  ipClusterMinVoters: 3,
  subnetClusterMinIps: 5,
  fingerprintReuseMinVoters: 2,
  flagRetryLimit: 3,
};

export function resolveFraudConfig(overrides: Partial<FraudDetectionConfig> = {}): FraudDetectionConfig {
  return { ...DEFAULT_FRAUD_CONFIG, ...overrides };
}

export function loadFraudConfig(source: Env): FraudDetectionConfig {
  return resolveFraudConfig({
    userThreshold: source.FRAUD_USER_THRESHOLD,
    ipThreshold: source.FRAUD_IP_THRESHOLD,
    velocityPerHour: source.FRAUD_VELOCITY_PER_HOUR,
    blockScore: source.FRAUD_BLOCK_SCORE,
    windowHours: source.FRAUD_WINDOW_HOURS,
    activityTtlSeconds: source.FINGERPRINT_CACHE_TTL_SECONDS,
    cacheTimeoutMs: source.CACHE_TIMEOUT_MS,
    cacheReadRetries: source.CACHE_READ_RETRIES,
  });
}
