// ============================================
// VOTESHIELD - Service Wiring
// ============================================

import type { DrizzleDb } from '../db/drizzle.js';
import type { VolatileCache } from '../cache/volatile-cache.js';
import type { FraudDetectionConfig } from '../config/fraud.js';
import type { Logger } from '../utils/logger.js';
import { VoteEventBus } from '../events/vote-events.js';
import {
  PollRepository,
  VoteRepository,
  VoteAttemptRepository,
  FingerprintBlockRepository,
  FraudAlertRepository,
  NotificationRepository,
} from '../repositories/index.js';
import { IdempotencyStore } from './idempotency.service.js';
import { FingerprintActivityCache } from './fingerprint-activity.service.js';
import { FingerprintBlockRegistry } from './fingerprint-block.service.js';
import { FingerprintAnalysisService } from './fingerprint-analysis.service.js';
import { SuspicionEngine } from './suspicion.service.js';
import { PatternAnalyzer } from './pattern-analysis.service.js';
import { VoteService, type JobScheduler } from './vote.service.js';
import { NotificationService, LoggingTransport, type NotificationTransport } from './notification.service.js';

export interface ServiceContainerOptions {
  db: DrizzleDb;
  cache: VolatileCache;
  logger: Logger;
  config: FraudDetectionConfig;
  deepAnalysis?: boolean;
  transport?: NotificationTransport;
  clock?: () => Date;
  schedule?: JobScheduler;
}

export interface ServiceContainer {
  events: VoteEventBus;
  polls: PollRepository;
  votes: VoteService;
  attempts: VoteAttemptRepository;
  idempotency: IdempotencyStore;
  activity: FingerprintActivityCache;
  blocks: FingerprintBlockRegistry;
  suspicion: SuspicionEngine;
  patterns: PatternAnalyzer;
  alerts: FraudAlertRepository;
  notifications: NotificationService;
}

/**
 * Build every service over one database and one cache, and subscribe the
 * notification service to flagged votes.
 */
export function createServices(options: ServiceContainerOptions): ServiceContainer {
  const { db, cache, logger, config, clock } = options;

  const events = new VoteEventBus(logger);
  const polls = new PollRepository(db);
  const voteRepo = new VoteRepository(db);
  const attempts = new VoteAttemptRepository(db);
  const alerts = new FraudAlertRepository(db);

  const idempotency = new IdempotencyStore(cache, voteRepo, logger, config.idempotencyTtlSeconds);
  const activity = new FingerprintActivityCache(cache, config.activityTtlSeconds);
  const blocks = new FingerprintBlockRegistry(new FingerprintBlockRepository(db), logger);
  const suspicion = new SuspicionEngine({ votes: voteRepo, blocks, activity, events, logger, config, clock });
  const analysis = options.deepAnalysis === false
    ? null
    : new FingerprintAnalysisService(voteRepo, activity, logger, config, clock);

  const votes = new VoteService({
    polls,
    votes: voteRepo,
    attempts,
    idempotency,
    blocks,
    suspicion,
    activity,
    analysis,
    events,
    logger,
    clock,
    schedule: options.schedule,
  });

  const patterns = new PatternAnalyzer({ polls, votes: voteRepo, alerts, events, logger, config, clock });

  const notifications = new NotificationService(
    new NotificationRepository(db),
    options.transport ?? new LoggingTransport(logger),
    logger
  );
  events.on('vote_flagged', async (event) => {
    await notifications.onVoteFlagged(event);
  });

  return { events, polls, votes, attempts, idempotency, activity, blocks, suspicion, patterns, alerts, notifications };
}
