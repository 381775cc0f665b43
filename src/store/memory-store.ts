/**
 * In-process stores for single-node deployments and tests
 */

import type { OutcomeRecord, PromptEvent, RouteDecision } from '../types.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { HistoryQuery, HistoryStore, RecordStore } from './types.js';

export class MemoryRecordStore<T> implements RecordStore<T> {
  private records = new Map<string, T>();
  private mutex = new KeyedMutex();

  async get(key: string): Promise<T | undefined> {
    return this.records.get(key);
  }

  update(key: string, mutate: (current: T | undefined) => T): Promise<T> {
    return this.mutex.run(key, () => {
      const next = mutate(this.records.get(key));
      this.records.set(key, next);
      return next;
    });
  }

  keys(): string[] {
    return [...this.records.keys()];
  }

  /**
   * Point-in-time copy of all records
   */
  snapshot(): Record<string, T> {
    return Object.fromEntries(this.records);
  }

  static fromSnapshot<T>(snapshot: Record<string, T>): MemoryRecordStore<T> {
    const store = new MemoryRecordStore<T>();
    for (const [key, value] of Object.entries(snapshot)) {
      store.records.set(key, value);
    }
    return store;
  }
}

function inRange(timestamp: string, query: HistoryQuery): boolean {
  const at = Date.parse(timestamp);
  if (query.from && at < query.from.getTime()) return false;
  if (query.to && at >= query.to.getTime()) return false;
  return true;
}

function matches(
  record: { organization: string; user: string; timestamp: string },
  query: HistoryQuery
): boolean {
  return record.organization === query.organization
    && (query.user === undefined || record.user === query.user)
    && inRange(record.timestamp, query);
}

export class MemoryHistoryStore implements HistoryStore {
  private events: PromptEvent[] = [];
  private decisions: RouteDecision[] = [];
  private decisionIndex = new Map<string, RouteDecision>();
  private outcomes: OutcomeRecord[] = [];

  constructor(private maxRecords = 50_000) {}

  async appendEvent(event: PromptEvent): Promise<void> {
    this.events.push(event);
    this.trim(this.events);
  }

  async appendDecision(decision: RouteDecision): Promise<void> {
    this.decisions.push(decision);
    this.decisionIndex.set(decision.id, decision);
    for (const dropped of this.trim(this.decisions)) {
      this.decisionIndex.delete(dropped.id);
    }
  }

  async appendOutcome(outcome: OutcomeRecord): Promise<void> {
    this.outcomes.push(outcome);
    this.trim(this.outcomes);
  }

  async getDecision(id: string): Promise<RouteDecision | undefined> {
    return this.decisionIndex.get(id);
  }

  async listDecisions(query: HistoryQuery): Promise<RouteDecision[]> {
    return this.decisions.filter(d => matches(d, query));
  }

  async listOutcomes(query: HistoryQuery): Promise<OutcomeRecord[]> {
    return this.outcomes.filter(o => matches(o, query));
  }

  async listEvents(query: HistoryQuery): Promise<PromptEvent[]> {
    return this.events.filter(e => matches(e, query));
  }

  /**
   * Drops the oldest records beyond `maxRecords`, returning them
   */
  private trim<T>(list: T[]): T[] {
    const excess = list.length - this.maxRecords;
    return excess > 0 ? list.splice(0, excess) : [];
  }
}
