// ============================================
// VOTESHIELD - Repositories Barrel Export
// ============================================

export { BaseRepository } from './base.repository.js';
export { PollRepository, type Poll, type PollOption, type PollResults, type CreatePollInput } from './poll.repository.js';
export { VoteRepository, type VoteRecord, type NewVote, type CommitResult, type FlagState } from './vote.repository.js';
export { VoteAttemptRepository, type VoteAttempt, type VoteAttemptInput } from './vote-attempt.repository.js';
export { FingerprintBlockRepository, type BlockInfo, type BlockEvent, type BlockInput } from './fingerprint-block.repository.js';
export { FraudAlertRepository, type FraudAlert, type NewFraudAlert } from './fraud-alert.repository.js';
export { NotificationRepository, type Notification, type NewNotification } from './notification.repository.js';
