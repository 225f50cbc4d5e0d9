// ============================================
// VOTESHIELD - Vote Event Bus
// ============================================

import { EventEmitter } from 'events';
import type { Logger } from '../utils/logger.js';

export interface PollResultsChangedEvent {
  pollId: string;
}

export interface VoteFlaggedEvent {
  voteId: string | null; // null when the attempt was blocked before a vote existed
  userId: string | null;
  pollId: string;
  reasons: string[];
  riskScore: number;
}

export interface VoteEventMap {
  poll_results_changed: PollResultsChangedEvent;
  vote_flagged: VoteFlaggedEvent;
}

export type VoteEventName = keyof VoteEventMap;

type Listener<K extends VoteEventName> = (payload: VoteEventMap[K]) => void | Promise<void>;

/**
 * In-process dispatch for outbound events. Listener failures are logged
 * and never reach the emitter.
 */
export class VoteEventBus {
  private emitter = new EventEmitter();

  constructor(private logger: Logger) {}

  on<K extends VoteEventName>(event: K, listener: Listener<K>): () => void {
    const wrapped = (payload: VoteEventMap[K]) => {
      try {
        const result = listener(payload);
        if (result instanceof Promise) {
          result.catch(err => this.logger.error({ err, event }, 'Vote event listener failed'));
        }
      } catch (err) {
        this.logger.error({ err, event }, 'Vote event listener failed');
      }
    };
    this.emitter.on(event, wrapped);
    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<K extends VoteEventName>(event: K, payload: VoteEventMap[K]): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: VoteEventName): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
