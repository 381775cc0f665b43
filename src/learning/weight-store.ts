/**
 * Adaptive channel weights per organization and per user.
 *
 * Lookup is layered: user cell, then org cell, then DEFAULT_WEIGHT.
 * Feedback nudges a cell by exponential moving average and clamps it to
 * [MIN_WEIGHT, MAX_WEIGHT]. Each cell update is one atomic read-modify-write.
 */

import type { Channel, ChannelScores } from '../types.js';
import { CHANNELS, emptyChannelScores } from '../types.js';
import type { RecordStore } from '../store/types.js';
import { withTimeout } from '../store/timeout.js';

export const DEFAULT_WEIGHT = 1.0;
export const MIN_WEIGHT = 0.0;
export const MAX_WEIGHT = 2.0;

export interface WeightStoreOptions {
  learningRate: number;
  timeoutMs: number;
}

export interface FeedbackResult {
  /** Effective weight for the (org, user, channel) before the update */
  before: number;
  after: number;
  /** Org-level cell before/after */
  orgBefore: number;
  orgAfter: number;
}

export function clampWeight(value: number): number {
  return Math.min(MAX_WEIGHT, Math.max(MIN_WEIGHT, value));
}

/**
 * One EMA step: `old + rate * (observed - old)`, clamped
 */
export function emaStep(old: number, observed: number, learningRate: number): number {
  return clampWeight(old + learningRate * (observed - old));
}

/**
 * Ids are URI-encoded so a `:` inside an organization or user id cannot
 * line up with another cell's key.
 */
export function weightKey(organization: string, user: string | undefined, channel: Channel): string {
  const org = encodeURIComponent(organization);
  return user === undefined
    ? `weight:${org}:*:${channel}`
    : `weight:${org}:user:${encodeURIComponent(user)}:${channel}`;
}

export class WeightStore {
  constructor(
    private store: RecordStore<number>,
    private options: WeightStoreOptions
  ) {}

  async getWeight(organization: string, user: string | undefined, channel: Channel): Promise<number> {
    if (user !== undefined) {
      const userWeight = await this.read(weightKey(organization, user, channel));
      if (userWeight !== undefined) return userWeight;
    }
    return this.getOrgWeight(organization, channel);
  }

  async getOrgWeight(organization: string, channel: Channel): Promise<number> {
    const orgWeight = await this.read(weightKey(organization, undefined, channel));
    return orgWeight ?? DEFAULT_WEIGHT;
  }

  async getWeights(organization: string, user: string | undefined): Promise<ChannelScores> {
    const weights = emptyChannelScores(DEFAULT_WEIGHT);
    const resolved = await Promise.all(
      CHANNELS.map(channel => this.getWeight(organization, user, channel))
    );
    CHANNELS.forEach((channel, i) => {
      weights[channel] = resolved[i] ?? DEFAULT_WEIGHT;
    });
    return weights;
  }

  /**
   * Applies one observed utility to the user cell (seeded from the org-level
   * weight when absent) and then to the org cell.
   */
  async applyFeedback(
    organization: string,
    user: string | undefined,
    channel: Channel,
    observedUtility: number
  ): Promise<FeedbackResult> {
    if (user === undefined) {
      const org = await this.step(weightKey(organization, undefined, channel), DEFAULT_WEIGHT, observedUtility);
      return { before: org.before, after: org.after, orgBefore: org.before, orgAfter: org.after };
    }

    const seed = await this.getOrgWeight(organization, channel);
    const own = await this.step(weightKey(organization, user, channel), seed, observedUtility);
    const org = await this.step(weightKey(organization, undefined, channel), DEFAULT_WEIGHT, observedUtility);

    return { before: own.before, after: own.after, orgBefore: org.before, orgAfter: org.after };
  }

  /**
   * EMA update of a single cell; `seed` stands in for a missing value
   */
  private async step(key: string, seed: number, observed: number): Promise<{ before: number; after: number }> {
    let before = seed;
    const after = await this.write(key, current => {
      before = current ?? seed;
      return emaStep(before, observed, this.options.learningRate);
    });
    return { before, after };
  }

  private read(key: string): Promise<number | undefined> {
    return withTimeout(`weight read ${key}`, this.options.timeoutMs, () => this.store.get(key));
  }

  private write(key: string, mutate: (current: number | undefined) => number): Promise<number> {
    return withTimeout(`weight update ${key}`, this.options.timeoutMs, () => this.store.update(key, mutate));
  }
}
