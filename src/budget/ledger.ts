/**
 * Monthly spend ledger and budget directives.
 *
 * One entry per (organization, period), stored under its own key, so a new
 * month starts from zero without touching the old entry. `commit` is the only
 * writer. Budget state is recomputed from spend on every check.
 */

import { InvalidOutcomeError } from '../errors.js';
import type { RouterLogger } from '../logging/index.js';
import type { RecordStore } from '../store/types.js';
import { withTimeout } from '../store/timeout.js';
import type { BudgetMode, BudgetState, LedgerEntry } from '../types.js';
import { periodKey } from './period.js';
import type { BudgetPolicy } from './policy.js';

export interface BudgetRequest {
  /** Expected cost of the prospective request on the requested model */
  estimatedCost: number;
  requestedModel: string;
}

interface DirectiveBase {
  state: BudgetState;
  mode: BudgetMode;
  period: string;
  cumulativeSpend: number;
  /** cumulativeSpend + estimatedCost */
  projectedSpend: number;
  /** State is at or past the alert threshold */
  alert: boolean;
}

/**
 * Directive computed from the ledger
 */
export type BudgetDirective =
  | (DirectiveBase & { kind: 'allow' })
  | (DirectiveBase & { kind: 'downgrade'; fromModel: string; targetModel: string })
  | (DirectiveBase & { kind: 'block'; reason: 'budget-exceeded' });

/**
 * Stand-in when the ledger could not be read: spend is unknown and
 * the request is allowed.
 */
export interface UnknownBudgetDirective {
  kind: 'allow';
  state: 'UNKNOWN';
  mode: BudgetMode;
  period: string;
  alert: false;
  degraded: true;
}

export type Directive = BudgetDirective | UnknownBudgetDirective;

export interface LedgerOptions {
  timeoutMs: number;
}

const STATE_ORDER: Record<BudgetState, number> = {
  UNDER_THRESHOLD: 0,
  NEAR_THRESHOLD: 1,
  OVER_LIMIT: 2,
};

export function stateAtLeast(state: BudgetState, floor: BudgetState): boolean {
  return STATE_ORDER[state] >= STATE_ORDER[floor];
}

/**
 * A zero limit means the organization has no limit to be near or over.
 */
export function computeBudgetState(spend: number, policy: Pick<BudgetPolicy, 'monthlyLimit' | 'alertThreshold'>): BudgetState {
  if (policy.monthlyLimit <= 0) return 'UNDER_THRESHOLD';

  const ratio = spend / policy.monthlyLimit;
  if (ratio >= 1) return 'OVER_LIMIT';
  if (ratio >= policy.alertThreshold) return 'NEAR_THRESHOLD';
  return 'UNDER_THRESHOLD';
}

/**
 * Directive for a prospective request given the last-known spend
 */
export function evaluateDirective(
  policy: BudgetPolicy,
  entry: Pick<LedgerEntry, 'period' | 'cumulativeSpend'>,
  request: BudgetRequest
): BudgetDirective {
  const state = computeBudgetState(entry.cumulativeSpend, policy);
  const base: DirectiveBase = {
    state,
    mode: policy.mode,
    period: entry.period,
    cumulativeSpend: entry.cumulativeSpend,
    projectedSpend: entry.cumulativeSpend + Math.max(0, request.estimatedCost),
    alert: stateAtLeast(state, 'NEAR_THRESHOLD'),
  };

  if (state !== 'OVER_LIMIT' || policy.mode === 'observe') {
    return { ...base, kind: 'allow' };
  }

  if (policy.mode === 'hard') {
    return { ...base, kind: 'block', reason: 'budget-exceeded' };
  }

  // soft: single hop only; no mapping means no hard stop
  const targetModel = policy.fallbacks[request.requestedModel];
  if (targetModel === undefined || targetModel === request.requestedModel) {
    return { ...base, kind: 'allow' };
  }
  return { ...base, kind: 'downgrade', fromModel: request.requestedModel, targetModel };
}

export function ledgerKey(organization: string, period: string): string {
  return `ledger:${encodeURIComponent(organization)}:${period}`;
}

export class BudgetLedger {
  constructor(
    private store: RecordStore<LedgerEntry>,
    private options: LedgerOptions,
    private logger?: RouterLogger
  ) {}

  /**
   * Entry for the period (current month by default); a zero entry when absent
   */
  async getEntry(organization: string, period: string = periodKey()): Promise<LedgerEntry> {
    const key = ledgerKey(organization, period);
    const entry = await withTimeout(`ledger read ${key}`, this.options.timeoutMs, () => this.store.get(key));
    return entry ?? { organization, period, cumulativeSpend: 0, lastUpdated: new Date(0).toISOString() };
  }

  /**
   * Checks a prospective spend against the last-known state. Nothing is
   * written: concurrent checks may see slightly stale spend, and `commit`
   * remains the source of truth.
   */
  async checkAndReserve(organization: string, request: BudgetRequest, policy: BudgetPolicy): Promise<BudgetDirective> {
    const entry = await this.getEntry(organization);
    const directive = evaluateDirective(policy, entry, request);

    if (directive.alert) {
      this.logger?.warn('Budget alert', {
        organization,
        state: directive.state,
        mode: directive.mode,
        cumulativeSpend: directive.cumulativeSpend,
        monthlyLimit: policy.monthlyLimit,
        directive: directive.kind,
      });
    }

    return directive;
  }

  /**
   * Adds realized cost to the current period. Atomic per (organization, period).
   *
   * @throws InvalidOutcomeError for negative or non-finite costs
   */
  async commit(organization: string, actualCost: number): Promise<LedgerEntry> {
    if (!Number.isFinite(actualCost) || actualCost < 0) {
      throw new InvalidOutcomeError(`Cost must be a non-negative number, got ${actualCost}`);
    }

    const now = new Date();
    const period = periodKey(now);
    const key = ledgerKey(organization, period);

    const entry = await withTimeout(`ledger commit ${key}`, this.options.timeoutMs, () =>
      this.store.update(key, current => ({
        organization,
        period,
        cumulativeSpend: (current?.cumulativeSpend ?? 0) + actualCost,
        lastUpdated: now.toISOString(),
      }))
    );

    this.logger?.debug('Ledger commit', {
      organization,
      period,
      actualCost,
      cumulativeSpend: entry.cumulativeSpend,
    });

    return entry;
  }
}
