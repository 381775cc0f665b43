/**
 * Weekly routing recommendations for an organization.
 *
 * Two sources: drift in org-level channel weights over the window, and
 * usage rules over the window's decisions and outcomes.
 */

import type { Channel, OutcomeRecord, RouteDecision } from '../types.js';
import { CHANNELS } from '../types.js';
import { round } from './aggregator.js';

export type RecommendationKind = 'weight-trend' | 'usage-rule';

export interface Recommendation {
  id: string;
  kind: RecommendationKind;
  /** Higher first */
  priority: number;
  channel?: Channel;
  title: string;
  action: string;
  evidence: Record<string, number>;
}

export interface RecommendationThresholds {
  /** Share of decisions routed direct above which small models are suggested */
  shortQaShare: number;
  /** Web decisions in the window above which freshness routing is suggested */
  freshnessHits: number;
  /** Agent share above which agent use is questioned... */
  agentShare: number;
  /** ...when average agent utility is below this */
  agentUtility: number;
  /** Fraction of downgraded decisions above which the budget is flagged */
  downgradeRate: number;
}

export const DEFAULT_RECOMMENDATION_THRESHOLDS: RecommendationThresholds = {
  shortQaShare: 0.3,
  freshnessHits: 50,
  agentShare: 0.2,
  agentUtility: 1.0,
  downgradeRate: 0.25,
};

export interface RecommendationInput {
  organization: string;
  decisions: RouteDecision[];
  outcomes: OutcomeRecord[];
  /** Smallest org-level weight change worth reporting */
  minWeightDelta: number;
  thresholds?: Partial<RecommendationThresholds>;
}

export interface WeightTrend {
  channel: Channel;
  from: number;
  to: number;
  delta: number;
  samples: number;
}

/**
 * Org-level weight movement per channel, from the first recorded
 * `weightBefore` to the last `weightAfter` in the window
 */
export function weightTrends(outcomes: OutcomeRecord[]): WeightTrend[] {
  const trends: WeightTrend[] = [];

  for (const channel of CHANNELS) {
    const updates = outcomes
      .filter(o => o.channel === channel)
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp));

    let from: number | undefined;
    let to: number | undefined;
    let samples = 0;
    for (const outcome of updates) {
      if (outcome.weightBefore === undefined || outcome.weightAfter === undefined) continue;
      from ??= outcome.weightBefore;
      to = outcome.weightAfter;
      samples++;
    }

    if (from !== undefined && to !== undefined) {
      trends.push({ channel, from, to, delta: round(to - from, 4), samples });
    }
  }

  return trends;
}

function trendRecommendation(trend: WeightTrend, minWeightDelta: number): Recommendation {
  const rising = trend.delta > 0;
  return {
    id: `weight-trend:${trend.channel}`,
    kind: 'weight-trend',
    priority: Math.abs(trend.delta) >= 2 * minWeightDelta ? 3 : 2,
    channel: trend.channel,
    title: rising
      ? `Team outcomes favor the ${trend.channel} channel`
      : `Team outcomes disfavor the ${trend.channel} channel`,
    action: rising
      ? `Raise the ${trend.channel} weight in the routing policy to ${round(trend.to, 2)}`
      : `Lower the ${trend.channel} weight in the routing policy to ${round(trend.to, 2)}`,
    evidence: { from: trend.from, to: trend.to, delta: trend.delta, samples: trend.samples },
  };
}

function usageRecommendations(
  decisions: RouteDecision[],
  outcomes: OutcomeRecord[],
  thresholds: RecommendationThresholds
): Recommendation[] {
  const total = decisions.length;
  if (total === 0) return [];

  const count = (channel: Channel): number => decisions.filter(d => d.channel === channel).length;
  const recommendations: Recommendation[] = [];

  const directShare = round(count('direct') / total, 4);
  if (directShare > thresholds.shortQaShare) {
    recommendations.push({
      id: 'downshift-short-qa',
      kind: 'usage-rule',
      priority: 2,
      channel: 'direct',
      title: 'Short single-question prompts are a large share of traffic',
      action: 'Serve direct answers with a smaller model such as openai/gpt-4o-mini or local/tiny-llama',
      evidence: { share: directShare, decisions: count('direct') },
    });
  }

  const webHits = count('web');
  if (webHits > thresholds.freshnessHits) {
    recommendations.push({
      id: 'prefer-web-for-freshness',
      kind: 'usage-rule',
      priority: 1,
      channel: 'web',
      title: 'Many prompts ask for fresh information',
      action: 'Route latest/pricing/release/version prompts to web first',
      evidence: { decisions: webHits },
    });
  }

  const agentShare = round(count('agent') / total, 4);
  const agentOutcomes = outcomes.filter(o => o.channel === 'agent');
  if (agentShare > thresholds.agentShare && agentOutcomes.length > 0) {
    const agentUtility = round(
      agentOutcomes.reduce((sum, o) => sum + o.observedUtility, 0) / agentOutcomes.length,
      4
    );
    if (agentUtility < thresholds.agentUtility) {
      recommendations.push({
        id: 'agent-threshold',
        kind: 'usage-rule',
        priority: 2,
        channel: 'agent',
        title: 'Agent runs are frequent but pay off below expectations',
        action: 'Require plan/implement/deploy verbs before routing to agent',
        evidence: { share: agentShare, averageUtility: agentUtility },
      });
    }
  }

  const downgraded = decisions.filter(d => d.wasDowngraded).length;
  const downgradeRate = round(downgraded / total, 4);
  if (downgradeRate > thresholds.downgradeRate) {
    recommendations.push({
      id: 'frequent-downgrades',
      kind: 'usage-rule',
      priority: 3,
      title: 'Budget pressure is downgrading many requests',
      action: 'Raise the monthly limit or move routine traffic to cheaper default models',
      evidence: { rate: downgradeRate, decisions: downgraded },
    });
  }

  return recommendations;
}

export function compareRecommendations(a: Recommendation, b: Recommendation): number {
  return b.priority - a.priority || a.id.localeCompare(b.id);
}

export function buildWeeklyRecommendations(input: RecommendationInput): Recommendation[] {
  const thresholds = { ...DEFAULT_RECOMMENDATION_THRESHOLDS, ...input.thresholds };

  const trends = weightTrends(input.outcomes)
    .filter(trend => Math.abs(trend.delta) >= input.minWeightDelta)
    .map(trend => trendRecommendation(trend, input.minWeightDelta));

  return [...trends, ...usageRecommendations(input.decisions, input.outcomes, thresholds)]
    .sort(compareRecommendations);
}
