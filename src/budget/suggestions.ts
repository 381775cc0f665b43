/**
 * Cost suggestions attached to a budget status, drawn from the period's
 * recorded outcomes
 */

import type { PricingTable } from '../routing/pricing.js';
import { averageRatePer1k } from '../routing/pricing.js';
import type { Channel } from '../types.js';

export interface SpendSample {
  channel: Channel;
  model?: string;
  actualCost: number;
}

export interface SuggestionInput {
  samples: SpendSample[];
  monthlyLimit: number;
  /** Policy maps at least one model to a cheaper fallback */
  hasFallbacks: boolean;
  at: Date;
  pricing?: PricingTable;
}

/** Average per-1k rate from which a model counts as premium */
export const PREMIUM_RATE_PER_1K = 0.02;

export const SUGGESTION_LIMITS = {
  agentCostShare: 0.5,
  directCostShare: 0.4,
  directRequests: 20,
  webRequestShare: 0.1,
  premiumCostShare: 0.7,
  busyRequests: 100,
  costPerRequest: 0.05,
  lateMonthDay: 20,
  lateMonthSpendShare: 0.8,
} as const;

export const NO_USAGE_SUGGESTION = 'Route a few requests to get cost suggestions for this organization';

export function isPremiumModel(model: string, pricing?: PricingTable): boolean {
  return averageRatePer1k(model, pricing) >= PREMIUM_RATE_PER_1K;
}

export function buildBudgetSuggestions(input: SuggestionInput): string[] {
  const { samples, monthlyLimit, at, pricing } = input;
  if (samples.length === 0) return [NO_USAGE_SUGGESTION];

  const limits = SUGGESTION_LIMITS;
  const suggestions: string[] = [];
  const requests = samples.length;
  const totalCost = samples.reduce((sum, s) => sum + s.actualCost, 0);
  const costOf = (channel: Channel): number =>
    samples.filter(s => s.channel === channel).reduce((sum, s) => sum + s.actualCost, 0);
  const countOf = (channel: Channel): number => samples.filter(s => s.channel === channel).length;

  if (totalCost > 0 && costOf('agent') / totalCost > limits.agentCostShare) {
    suggestions.push('Agent runs account for over 50% of spend. Break complex tasks into smaller prompts.');
  }

  if (totalCost > 0 && costOf('direct') / totalCost > limits.directCostShare && countOf('direct') > limits.directRequests) {
    suggestions.push('Serve simple direct questions with smaller or local models.');
  }

  if (countOf('web') < requests * limits.webRequestShare) {
    suggestions.push('Web is underused. Route fresh-information prompts to web instead of large models.');
  }

  const premiumCost = samples
    .filter(s => s.model !== undefined && isPremiumModel(s.model, pricing))
    .reduce((sum, s) => sum + s.actualCost, 0);
  if (totalCost > 0 && input.hasFallbacks && premiumCost / totalCost > limits.premiumCostShare) {
    const share = ((premiumCost / totalCost) * 100).toFixed(1);
    suggestions.push(`Premium models account for ${share}% of spend. Enable soft mode so fallbacks apply to routine tasks.`);
  }

  if (requests > limits.busyRequests) {
    const perRequest = totalCost / requests;
    if (perRequest > limits.costPerRequest) {
      suggestions.push(`Average cost per request ($${perRequest.toFixed(3)}) is high. Use more specific prompts and cheaper routes.`);
    }
  }

  if (
    monthlyLimit > 0
    && at.getUTCDate() > limits.lateMonthDay
    && totalCost > monthlyLimit * limits.lateMonthSpendShare
  ) {
    suggestions.push('Late-month spend is high. Batch non-urgent requests until the next period.');
  }

  return suggestions;
}
