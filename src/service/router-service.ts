/**
 * Routing service: the external surface of the decision engine and the
 * budget ledger.
 *
 * suggestRoute: features → rule scores → weights → decision → budget
 * directive → enforcement. recordOutcome: ledger commit, then best-effort
 * weight feedback and history.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { buildOptimizeReport, buildWeeklyRecommendations, summarizeUsage } from '../analytics/index.js';
import type { OptimizeReport, Recommendation, UsageSummary } from '../analytics/index.js';
import {
  BudgetLedger,
  buildBudgetAlerts,
  buildBudgetSuggestions,
  computeBudgetState,
  daysRemaining,
  observePolicy,
  periodBounds,
  periodKey,
  projectPeriodSpend,
  resolveEnforcement,
  stateAtLeast,
} from '../budget/index.js';
import type { BudgetAlert, BudgetPolicy, Directive, Enforcement, PolicyProvider, SpendSample } from '../budget/index.js';
import type { RouterConfig } from '../config.js';
import { InvalidFeatureInputError, InvalidOutcomeError, PersistenceUnavailableError, PolicyNotFoundError } from '../errors.js';
import { extractFeatures, hashPrompt, validateFeatures } from '../features/index.js';
import type { PromptContext } from '../features/index.js';
import { WeightStore } from '../learning/index.js';
import type { FeedbackResult } from '../learning/index.js';
import type { RouterLogger } from '../logging/index.js';
import { createComponentLogger } from '../logging/index.js';
import { decideRoute, describeRationale } from '../routing/decision-engine.js';
import { DEFAULT_MODEL_PRICING, estimateModelCost, estimateTokens } from '../routing/pricing.js';
import { buildSuggestionPack } from '../routing/suggestions.js';
import type { SuggestionPack } from '../routing/suggestions.js';
import { scoreChannels } from '../scoring/index.js';
import type { HistoryStore } from '../store/index.js';
import { withTimeout } from '../store/index.js';
import type {
  BudgetMode,
  BudgetState,
  Channel,
  ChannelScores,
  OutcomeRecord,
  PromptEvent,
  RouteDecision,
} from '../types.js';
import { CHANNELS } from '../types.js';

export interface SuggestRouteRequest {
  organization: string;
  user: string;
  /** Feature record; validated before use */
  features: unknown;
  /** Defaults to routing.defaultModel */
  requestedModel?: string;
  /** Expected cost on the requested model (USD) */
  estimatedCost?: number;
  promptHash?: string;
}

export interface SuggestPromptRequest extends Omit<SuggestRouteRequest, 'features' | 'promptHash'> {
  prompt: string;
  context?: PromptContext;
}

export interface RouteSuggestion {
  decisionId: string;
  eventId: string;
  /** Channel chosen by the engine; kept when the request is refused */
  channel: Channel;
  /** Model to serve, absent when refused */
  model?: string;
  requestedModel: string;
  confidence: number;
  scores: ChannelScores;
  rationale: string[];
  reasons: string[];
  directive: Directive;
  enforcement: Enforcement;
  wasDowngraded: boolean;
  refused: boolean;
  degraded: boolean;
  /** Ready-made follow-ups for each channel */
  suggestions: SuggestionPack;
}

export interface OutcomeReport {
  organization: string;
  user: string;
  channel: Channel;
  observedUtility: number;
  /** Realized cost in USD */
  actualCost: number;
  decisionId?: string;
  /** Defaults to the served model of the linked decision */
  model?: string;
  feature?: string;
  tokensIn?: number;
  tokensOut?: number;
  latencyMs?: number;
}

export interface BudgetStatus {
  organization: string;
  period: string;
  state: BudgetState;
  mode: BudgetMode;
  cumulativeSpend: number;
  monthlyLimit: number;
  alertThreshold: number;
  percentUsed: number;
  /** Month-end spend at the current daily rate */
  projectedSpend: number;
  daysRemaining: number;
  alerts: BudgetAlert[];
  /** No policy was found; observe-mode defaults apply */
  degraded: boolean;
  suggestions: string[];
}

export interface CostEstimateRequest {
  inputTokens: number;
  outputTokens?: number;
  /** Defaults to every priced model */
  models?: string[];
}

export interface CostEstimate {
  model: string;
  cost: number;
}

export interface RouterServiceDeps {
  config: RouterConfig;
  weights: WeightStore;
  ledger: BudgetLedger;
  history: HistoryStore;
  policies: PolicyProvider;
  logger?: RouterLogger;
}

const RouteRequestSchema = z.object({
  organization: z.string().min(1),
  user: z.string().min(1),
  requestedModel: z.string().min(1).optional(),
  estimatedCost: z.number().finite().min(0).optional(),
  promptHash: z.string().regex(/^[a-f0-9]{64}$/).optional(),
});

export const OutcomeReportSchema = z.object({
  organization: z.string().min(1),
  user: z.string().min(1),
  channel: z.enum(CHANNELS),
  observedUtility: z.number().finite().min(0).max(2),
  actualCost: z.number().finite().min(0),
  decisionId: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  feature: z.string().min(1).optional(),
  tokensIn: z.number().int().min(0).optional(),
  tokensOut: z.number().int().min(0).optional(),
  latencyMs: z.number().finite().min(0).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Raw prompt, when routing started from text */
interface RouteInternals {
  prompt?: string;
}

interface ResolvedPolicy {
  policy: BudgetPolicy;
  degraded: boolean;
}

export class RouterService {
  private config: RouterConfig;
  private weights: WeightStore;
  private ledger: BudgetLedger;
  private history: HistoryStore;
  private policies: PolicyProvider;
  private logger: RouterLogger;

  constructor(deps: RouterServiceDeps) {
    this.config = deps.config;
    this.weights = deps.weights;
    this.ledger = deps.ledger;
    this.history = deps.history;
    this.policies = deps.policies;
    this.logger = deps.logger ?? createComponentLogger('RouterService', deps.config.logging);
  }

  suggestRoute(request: SuggestRouteRequest): Promise<RouteSuggestion> {
    return this.route(request, {});
  }

  /**
   * Extracts features from raw prompt text, then routes. Only the features
   * and a hash of the prompt are stored. Without an explicit estimate, the
   * cost is estimated from the prompt length on the requested model.
   */
  suggestRouteForPrompt(request: SuggestPromptRequest): Promise<RouteSuggestion> {
    const { prompt, context, ...rest } = request;
    const features = extractFeatures(prompt, context, {
      recentSessionMinutes: this.config.routing.recentSessionMinutes,
    });
    const estimatedCost = rest.estimatedCost ?? estimateModelCost(
      rest.requestedModel ?? this.config.routing.defaultModel,
      estimateTokens(prompt),
      this.config.routing.expectedOutputTokens,
      this.config.pricing
    );
    return this.route({ ...rest, estimatedCost, features, promptHash: hashPrompt(prompt) }, { prompt });
  }

  private async route(request: SuggestRouteRequest, internals: RouteInternals): Promise<RouteSuggestion> {
    const parsed = RouteRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidFeatureInputError('Malformed route request', formatIssues(parsed.error));
    }
    const { organization, user, promptHash } = parsed.data;
    const features = validateFeatures(request.features);
    const requestedModel = parsed.data.requestedModel ?? this.config.routing.defaultModel;
    const estimatedCost = parsed.data.estimatedCost ?? 0;
    const log = this.logger.child({ organization, user });

    const scoring = scoreChannels(features);
    const weights = await this.weights.getWeights(organization, user);
    const choice = decideRoute(scoring, weights);

    const { policy, degraded: policyDegraded } = await this.resolvePolicy(organization);
    const directive = await this.checkBudget(organization, { estimatedCost, requestedModel }, policy);
    const enforcement = resolveEnforcement(directive, { channel: choice.channel, model: requestedModel });

    const degraded = policyDegraded || directive.state === 'UNKNOWN';
    const refused = enforcement.outcome === 'refuse';
    const servedModel = enforcement.outcome === 'route' ? enforcement.model : requestedModel;
    const wasDowngraded = enforcement.outcome === 'route' && enforcement.wasDowngraded;
    const timestamp = new Date().toISOString();

    const event: PromptEvent = {
      id: randomUUID(),
      organization,
      user,
      features,
      ...(promptHash && { promptHash }),
      timestamp,
    };

    const decision: RouteDecision = {
      id: randomUUID(),
      eventId: event.id,
      organization,
      user,
      channel: choice.channel,
      ruleScores: choice.ruleScores,
      weights: choice.weights,
      scores: choice.scores,
      confidence: choice.confidence,
      rationale: choice.rationale,
      requestedModel,
      servedModel,
      estimatedCost,
      directive: directive.kind,
      wasDowngraded,
      refused,
      degraded,
      timestamp,
    };

    await this.bestEffort('record route decision', log, async () => {
      await this.history.appendEvent(event);
      await this.history.appendDecision(decision);
    });

    log.info('Route decided', {
      decisionId: decision.id,
      channel: decision.channel,
      confidence: Math.round(decision.confidence * 1000) / 1000,
      directive: directive.kind,
      state: directive.state,
      servedModel: refused ? undefined : servedModel,
      degraded,
    });

    return {
      decisionId: decision.id,
      eventId: event.id,
      channel: choice.channel,
      ...(enforcement.outcome === 'route' && { model: enforcement.model }),
      requestedModel,
      confidence: choice.confidence,
      scores: choice.scores,
      rationale: choice.rationale,
      reasons: describeRationale(choice.rationale),
      directive,
      enforcement,
      wasDowngraded,
      refused,
      degraded,
      suggestions: buildSuggestionPack(internals.prompt),
    };
  }

  /**
   * Commits the realized cost, then applies the observed utility to the
   * weights when a prior, non-refused decision for (org, user, channel)
   * exists. Nothing after the commit can fail the call.
   *
   * @throws InvalidOutcomeError for malformed reports
   * @throws PersistenceUnavailableError when the ledger commit fails
   */
  async recordOutcome(report: OutcomeReport): Promise<void> {
    const parsed = OutcomeReportSchema.safeParse(report);
    if (!parsed.success) {
      throw new InvalidOutcomeError('Malformed outcome report', formatIssues(parsed.error));
    }
    const { organization, user, channel, observedUtility, actualCost, decisionId } = parsed.data;
    const log = this.logger.child({ organization, user });

    const { policy } = await this.resolvePolicy(organization);
    const entry = await this.ledger.commit(organization, actualCost);
    logBudgetTransition(policy, entry.cumulativeSpend - actualCost, entry.cumulativeSpend, log);

    const decision = await this.bestEffort('find prior decision', log, () =>
      this.findDecision(organization, user, channel, decisionId)
    );

    let feedback: FeedbackResult | undefined;
    if (decision) {
      feedback = await this.bestEffort('apply weight feedback', log, () =>
        this.weights.applyFeedback(organization, user, channel, observedUtility)
      );
    } else {
      log.warn('No prior decision for outcome; weights unchanged', { channel, decisionId });
    }

    const { feature, tokensIn, tokensOut, latencyMs } = parsed.data;
    const model = parsed.data.model ?? decision?.servedModel;
    const outcome: OutcomeRecord = {
      id: randomUUID(),
      ...(decision && { decisionId: decision.id }),
      organization,
      user,
      channel,
      observedUtility,
      actualCost,
      ...(model !== undefined && { model }),
      ...(feature !== undefined && { feature }),
      ...(tokensIn !== undefined && { tokensIn }),
      ...(tokensOut !== undefined && { tokensOut }),
      ...(latencyMs !== undefined && { latencyMs }),
      ...(feedback && { weightBefore: feedback.orgBefore, weightAfter: feedback.orgAfter }),
      timestamp: new Date().toISOString(),
    };

    await this.bestEffort('record outcome', log, () => this.history.appendOutcome(outcome));

    log.debug('Outcome recorded', {
      channel,
      observedUtility,
      actualCost,
      weightBefore: feedback?.before,
      weightAfter: feedback?.after,
    });
  }

  getWeight(organization: string, user: string | undefined, channel: Channel): Promise<number> {
    return this.weights.getWeight(organization, user, channel);
  }

  async getBudgetStatus(organization: string): Promise<BudgetStatus> {
    const { policy, degraded } = await this.resolvePolicy(organization);
    const now = new Date();
    const entry = await this.ledger.getEntry(organization, periodKey(now));

    const spend = entry.cumulativeSpend;
    const projectedSpend = Math.round(projectPeriodSpend(spend, now) * 100) / 100;
    const log = this.logger.child({ organization });

    const { start, end } = periodBounds(entry.period);
    const outcomes = await this.bestEffort('list period outcomes', log, () =>
      this.history.listOutcomes({ organization, from: start, to: end })
    );
    const samples: SpendSample[] = (outcomes ?? []).map(o => ({
      channel: o.channel,
      ...(o.model !== undefined && { model: o.model }),
      actualCost: o.actualCost,
    }));

    return {
      organization,
      period: entry.period,
      state: computeBudgetState(spend, policy),
      mode: policy.mode,
      cumulativeSpend: spend,
      monthlyLimit: policy.monthlyLimit,
      alertThreshold: policy.alertThreshold,
      percentUsed: policy.monthlyLimit > 0 ? Math.round((spend / policy.monthlyLimit) * 1000) / 10 : 0,
      projectedSpend,
      daysRemaining: daysRemaining(now),
      alerts: buildBudgetAlerts({
        cumulativeSpend: spend,
        monthlyLimit: policy.monthlyLimit,
        alertThreshold: policy.alertThreshold,
        projectedSpend,
      }),
      degraded,
      suggestions: buildBudgetSuggestions({
        samples,
        monthlyLimit: policy.monthlyLimit,
        hasFallbacks: Object.keys(policy.fallbacks).length > 0,
        at: now,
        pricing: this.config.pricing,
      }),
    };
  }

  /**
   * @param period "YYYY-MM"; defaults to the current month
   */
  async getUsageSummary(organization: string, period: string = periodKey()): Promise<UsageSummary> {
    const { start, end } = periodBounds(period);
    const query = { organization, from: start, to: end };

    const [decisions, outcomes, entry] = await Promise.all([
      this.history.listDecisions(query),
      this.history.listOutcomes(query),
      this.ledger.getEntry(organization, period),
    ]);

    return summarizeUsage({
      organization,
      period,
      decisions,
      outcomes,
      ledgerSpend: entry.cumulativeSpend,
      highValueUtility: this.config.learning.highValueUtility,
      pricing: this.config.pricing,
    });
  }

  /**
   * Recommendations over the trailing analytics window ending at `now`
   */
  async weeklyRecommendations(organization: string, now: Date = new Date()): Promise<Recommendation[]> {
    const { minWeightDelta } = this.config.analytics;
    const query = this.windowQuery(organization, now);

    const [decisions, outcomes] = await Promise.all([
      this.history.listDecisions(query),
      this.history.listOutcomes(query),
    ]);

    const recommendations = buildWeeklyRecommendations({ organization, decisions, outcomes, minWeightDelta });
    this.logger.debug('Weekly recommendations built', {
      organization,
      decisions: decisions.length,
      outcomes: outcomes.length,
      recommendations: recommendations.length,
    });
    return recommendations;
  }

  /**
   * ROI report over the same window as the weekly recommendations
   */
  async optimizeReport(organization: string, now: Date = new Date()): Promise<OptimizeReport> {
    const query = this.windowQuery(organization, now);
    const [decisions, outcomes, recommendations] = await Promise.all([
      this.history.listDecisions(query),
      this.history.listOutcomes(query),
      this.weeklyRecommendations(organization, now),
    ]);

    return buildOptimizeReport({
      organization,
      windowDays: this.config.analytics.windowDays,
      decisions,
      outcomes,
      recommendations,
      pricing: this.config.pricing,
    });
  }

  /**
   * Cheapest first; equal costs by model id
   */
  estimateCosts(request: CostEstimateRequest): CostEstimate[] {
    const inputTokens = Math.max(0, request.inputTokens);
    const outputTokens = Math.max(0, request.outputTokens ?? 0);
    const models = request.models ?? [
      ...new Set([...Object.keys(DEFAULT_MODEL_PRICING), ...Object.keys(this.config.pricing ?? {})]),
    ];

    return models
      .map(model => ({
        model,
        cost: estimateModelCost(model, inputTokens, outputTokens, this.config.pricing),
      }))
      .sort((a, b) => a.cost - b.cost || a.model.localeCompare(b.model));
  }

  private windowQuery(organization: string, now: Date): { organization: string; from: Date; to: Date } {
    return {
      organization,
      from: new Date(now.getTime() - this.config.analytics.windowDays * 86_400_000),
      to: new Date(now.getTime() + 1),
    };
  }

  private async resolvePolicy(organization: string): Promise<ResolvedPolicy> {
    try {
      return { policy: await this.policies.getPolicy(organization), degraded: false };
    } catch (error) {
      if (!(error instanceof PolicyNotFoundError)) throw error;
      this.logger.warn('No budget policy; running in observe mode', { organization });
      return {
        policy: observePolicy(organization, this.config.budget.defaultAlertThreshold),
        degraded: true,
      };
    }
  }

  /**
   * Ledger read failures degrade to an allow with unknown spend
   */
  private async checkBudget(
    organization: string,
    request: { estimatedCost: number; requestedModel: string },
    policy: BudgetPolicy
  ): Promise<Directive> {
    try {
      return await this.ledger.checkAndReserve(organization, request, policy);
    } catch (error) {
      if (!(error instanceof PersistenceUnavailableError)) throw error;
      this.logger.warn('Budget check unavailable; allowing request', {
        organization,
        operation: error.operation,
        reason: error.message,
      });
      return {
        kind: 'allow',
        state: 'UNKNOWN',
        mode: policy.mode,
        period: periodKey(),
        alert: false,
        degraded: true,
      };
    }
  }

  private async findDecision(
    organization: string,
    user: string,
    channel: Channel,
    decisionId?: string
  ): Promise<RouteDecision | undefined> {
    const matches = (d: RouteDecision): boolean =>
      !d.refused && d.organization === organization && d.user === user && d.channel === channel;

    if (decisionId !== undefined) {
      const decision = await this.history.getDecision(decisionId);
      return decision && matches(decision) ? decision : undefined;
    }

    const decisions = await this.history.listDecisions({ organization, user });
    return decisions.filter(matches).at(-1);
  }

  /**
   * Runs a store call whose failure must not fail the caller; failures are logged
   */
  private async bestEffort<T>(operation: string, log: RouterLogger, work: () => Promise<T>): Promise<T | undefined> {
    try {
      return await withTimeout(operation, this.config.persistence.timeoutMs, work);
    } catch (error) {
      log.warn(`Failed to ${operation}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}

function logBudgetTransition(policy: BudgetPolicy, spendBefore: number, spendAfter: number, log: RouterLogger): void {
  const before = computeBudgetState(spendBefore, policy);
  const after = computeBudgetState(spendAfter, policy);
  if (before !== after && stateAtLeast(after, 'NEAR_THRESHOLD')) {
    log.warn('Budget state changed', {
      from: before,
      to: after,
      cumulativeSpend: spendAfter,
      monthlyLimit: policy.monthlyLimit,
    });
  }
}
