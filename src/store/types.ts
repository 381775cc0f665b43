/**
 * Persistence collaborator contracts.
 * Any backend (SQL row locks, Redis WATCH/MULTI, ...) can sit behind these
 * as long as `update` is an atomic read-modify-write per key.
 */

import type { OutcomeRecord, PromptEvent, RouteDecision } from '../types.js';

export interface RecordStore<T> {
  get(key: string): Promise<T | undefined>;
  /**
   * Atomically replaces the value under `key` with `mutate(current)`.
   * Concurrent updates of the same key are applied one after another.
   */
  update(key: string, mutate: (current: T | undefined) => T): Promise<T>;
}

export interface HistoryQuery {
  organization: string;
  /** Inclusive lower bound */
  from?: Date;
  /** Exclusive upper bound */
  to?: Date;
  user?: string;
}

/**
 * Append-only log of prompt events, decisions and outcomes
 */
export interface HistoryStore {
  appendEvent(event: PromptEvent): Promise<void>;
  appendDecision(decision: RouteDecision): Promise<void>;
  appendOutcome(outcome: OutcomeRecord): Promise<void>;
  getDecision(id: string): Promise<RouteDecision | undefined>;
  listDecisions(query: HistoryQuery): Promise<RouteDecision[]>;
  listOutcomes(query: HistoryQuery): Promise<OutcomeRecord[]>;
}
