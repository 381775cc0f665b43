/**
 * Usage summaries folded from decision and outcome history.
 * Read-only: nothing here writes back to the stores.
 */

import type { PricingTable } from '../routing/pricing.js';
import { downgradeSavings } from '../routing/pricing.js';
import type { Channel, OutcomeRecord, RouteDecision } from '../types.js';

export interface UsageInput {
  organization: string;
  period: string;
  decisions: RouteDecision[];
  outcomes: OutcomeRecord[];
  /** Ledger total for the period, when known */
  ledgerSpend?: number;
  /** Utility at or above which a decision counts as high-value */
  highValueUtility: number;
  pricing?: PricingTable;
}

export interface ChannelUsage {
  decisions: number;
  /** Fraction of all decisions */
  share: number;
  outcomes: number;
  averageUtility: number;
  actualCost: number;
}

export interface UserUsage {
  user: string;
  decisions: number;
  downgraded: number;
  refused: number;
  highValue: number;
  /** Non-downgraded high-value decisions / decisions */
  efficiency: number;
  actualCost: number;
}

export interface ModelUsage {
  model: string;
  /** Decisions served on this model */
  served: number;
  /** Decisions that asked for this model */
  requested: number;
  estimatedCost: number;
}

export type UsageDimension = 'user' | 'feature' | 'model';

/**
 * Request-level usage folded from outcome reports
 */
export interface RequestUsage {
  key: string;
  requests: number;
  tokensIn: number;
  tokensOut: number;
  actualCost: number;
  /** Nearest-rank p95 over outcomes that reported a latency; 0 when none did */
  p95LatencyMs: number;
}

export interface UsageSummary {
  organization: string;
  period: string;
  totalDecisions: number;
  totalOutcomes: number;
  downgradedCount: number;
  refusedCount: number;
  degradedCount: number;
  averageConfidence: number;
  totalEstimatedCost: number;
  totalActualCost: number;
  ledgerSpend: number;
  estimatedSavings: number;
  byChannel: Record<Channel, ChannelUsage>;
  byUser: UserUsage[];
  byModel: ModelUsage[];
  totalTokensIn: number;
  totalTokensOut: number;
  requests: Record<UsageDimension, RequestUsage[]>;
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

const ratio = (part: number, whole: number): number => (whole > 0 ? round(part / whole, 4) : 0);

const money = (value: number): number => round(value, 6);

/**
 * Nearest-rank percentile, `p` in (0, 1]; 0 for an empty list
 */
export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(1, Math.ceil(p * sorted.length));
  return sorted[rank - 1] ?? 0;
}

const dimensionKey: Record<UsageDimension, (outcome: OutcomeRecord) => string> = {
  user: o => o.user,
  feature: o => o.feature ?? 'default',
  model: o => o.model ?? 'unknown',
};

/**
 * Requests, tokens, cost and p95 latency per user, feature or model.
 * Most expensive first.
 */
export function summarizeRequests(outcomes: OutcomeRecord[], by: UsageDimension): RequestUsage[] {
  const groups = new Map<string, OutcomeRecord[]>();
  for (const outcome of outcomes) {
    const key = dimensionKey[by](outcome);
    groups.set(key, [...(groups.get(key) ?? []), outcome]);
  }

  return [...groups.entries()]
    .map(([key, group]) => ({
      key,
      requests: group.length,
      tokensIn: group.reduce((sum, o) => sum + (o.tokensIn ?? 0), 0),
      tokensOut: group.reduce((sum, o) => sum + (o.tokensOut ?? 0), 0),
      actualCost: money(group.reduce((sum, o) => sum + o.actualCost, 0)),
      p95LatencyMs: percentile(
        group.flatMap(o => (o.latencyMs === undefined ? [] : [o.latencyMs])),
        0.95
      ),
    }))
    .sort((a, b) => b.actualCost - a.actualCost || a.key.localeCompare(b.key));
}

/**
 * Latest outcome per decision id
 */
export function linkOutcomes(outcomes: OutcomeRecord[]): Map<string, OutcomeRecord> {
  const linked = new Map<string, OutcomeRecord>();
  for (const outcome of outcomes) {
    if (outcome.decisionId === undefined) continue;
    const previous = linked.get(outcome.decisionId);
    if (!previous || previous.timestamp <= outcome.timestamp) {
      linked.set(outcome.decisionId, outcome);
    }
  }
  return linked;
}

/**
 * Cost avoided by downgrades: for each downgraded decision, the estimated cost
 * scaled by the price gap between the requested and the served model.
 */
export function estimateSavings(decisions: RouteDecision[], pricing?: PricingTable): number {
  let total = 0;
  for (const decision of decisions) {
    if (!decision.wasDowngraded) continue;
    total += downgradeSavings(decision.estimatedCost, decision.requestedModel, decision.servedModel, pricing);
  }
  return money(total);
}

function summarizeChannels(decisions: RouteDecision[], outcomes: OutcomeRecord[]): Record<Channel, ChannelUsage> {
  const usage = (channel: Channel): ChannelUsage => {
    const chosen = decisions.filter(d => d.channel === channel).length;
    const observed = outcomes.filter(o => o.channel === channel);
    const utility = observed.reduce((sum, o) => sum + o.observedUtility, 0);
    return {
      decisions: chosen,
      share: ratio(chosen, decisions.length),
      outcomes: observed.length,
      averageUtility: observed.length > 0 ? round(utility / observed.length, 4) : 0,
      actualCost: money(observed.reduce((sum, o) => sum + o.actualCost, 0)),
    };
  };

  return {
    web: usage('web'),
    agent: usage('agent'),
    ask: usage('ask'),
    direct: usage('direct'),
  };
}

function summarizeUsers(
  decisions: RouteDecision[],
  outcomes: OutcomeRecord[],
  highValueUtility: number
): UserUsage[] {
  const linked = linkOutcomes(outcomes);
  const users = new Map<string, UserUsage>();

  const bucket = (user: string): UserUsage => {
    let usage = users.get(user);
    if (!usage) {
      usage = { user, decisions: 0, downgraded: 0, refused: 0, highValue: 0, efficiency: 0, actualCost: 0 };
      users.set(user, usage);
    }
    return usage;
  };

  for (const decision of decisions) {
    const usage = bucket(decision.user);
    usage.decisions++;
    if (decision.wasDowngraded) usage.downgraded++;
    if (decision.refused) usage.refused++;

    const outcome = linked.get(decision.id);
    if (!decision.wasDowngraded && !decision.refused && outcome && outcome.observedUtility >= highValueUtility) {
      usage.highValue++;
    }
  }

  for (const outcome of outcomes) {
    bucket(outcome.user).actualCost += outcome.actualCost;
  }

  return [...users.values()]
    .map(usage => ({
      ...usage,
      efficiency: ratio(usage.highValue, usage.decisions),
      actualCost: money(usage.actualCost),
    }))
    .sort((a, b) => a.user.localeCompare(b.user));
}

function summarizeModels(decisions: RouteDecision[]): ModelUsage[] {
  const models = new Map<string, ModelUsage>();
  const bucket = (model: string): ModelUsage => {
    let usage = models.get(model);
    if (!usage) {
      usage = { model, served: 0, requested: 0, estimatedCost: 0 };
      models.set(model, usage);
    }
    return usage;
  };

  for (const decision of decisions) {
    bucket(decision.requestedModel).requested++;
    if (decision.refused) continue;
    const served = bucket(decision.servedModel);
    served.served++;
    served.estimatedCost += decision.estimatedCost;
  }

  return [...models.values()]
    .map(usage => ({ ...usage, estimatedCost: money(usage.estimatedCost) }))
    .sort((a, b) => b.served - a.served || a.model.localeCompare(b.model));
}

export function summarizeUsage(input: UsageInput): UsageSummary {
  const { decisions, outcomes } = input;
  const confidence = decisions.reduce((sum, d) => sum + d.confidence, 0);
  const actualCost = outcomes.reduce((sum, o) => sum + o.actualCost, 0);

  return {
    organization: input.organization,
    period: input.period,
    totalDecisions: decisions.length,
    totalOutcomes: outcomes.length,
    downgradedCount: decisions.filter(d => d.wasDowngraded).length,
    refusedCount: decisions.filter(d => d.refused).length,
    degradedCount: decisions.filter(d => d.degraded).length,
    averageConfidence: decisions.length > 0 ? round(confidence / decisions.length, 4) : 0,
    totalEstimatedCost: money(decisions.reduce((sum, d) => sum + d.estimatedCost, 0)),
    totalActualCost: money(actualCost),
    ledgerSpend: money(input.ledgerSpend ?? actualCost),
    estimatedSavings: estimateSavings(decisions, input.pricing),
    byChannel: summarizeChannels(decisions, outcomes),
    byUser: summarizeUsers(decisions, outcomes, input.highValueUtility),
    byModel: summarizeModels(decisions),
    totalTokensIn: outcomes.reduce((sum, o) => sum + (o.tokensIn ?? 0), 0),
    totalTokensOut: outcomes.reduce((sum, o) => sum + (o.tokensOut ?? 0), 0),
    requests: {
      user: summarizeRequests(outcomes, 'user'),
      feature: summarizeRequests(outcomes, 'feature'),
      model: summarizeRequests(outcomes, 'model'),
    },
  };
}
