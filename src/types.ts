/**
 * Shared domain types for routewise
 */

export const CHANNELS = ['web', 'agent', 'ask', 'direct'] as const;

/** Destination handling a prompt */
export type Channel = typeof CHANNELS[number];

/**
 * Tie-break priority, highest first. Cheaper, lower-risk channels win ties.
 */
export const CHANNEL_PRIORITY: readonly Channel[] = ['ask', 'direct', 'agent', 'web'];

export type ChannelScores = Record<Channel, number>;

export type LengthBucket = 'short' | 'medium' | 'long';

/**
 * Derived classification signals. Never carries prompt text.
 */
export interface PromptFeatures {
  mentionsFreshness: boolean;
  mentionsImplementationVerb: boolean;
  mentionsComparison: boolean;
  multiStep: boolean;
  /** 0 = fully specified, 1 = highly ambiguous */
  questionAmbiguityScore: number;
  lengthBucket: LengthBucket;
  questionCount: number;
  hasCodeSelection: boolean;
  recentSession: boolean;
  /** Signal-group ids that matched (e.g. "freshness:release") */
  matchedSignals: string[];
}

export interface PromptEvent {
  id: string;
  organization: string;
  user: string;
  features: PromptFeatures;
  /** sha256 of the prompt, for dedup metrics only */
  promptHash?: string;
  timestamp: string;
}

export type BudgetMode = 'observe' | 'soft' | 'hard';

export type BudgetState = 'UNDER_THRESHOLD' | 'NEAR_THRESHOLD' | 'OVER_LIMIT';

export type DirectiveKind = 'allow' | 'downgrade' | 'block';

export interface RouteDecision {
  id: string;
  eventId: string;
  organization: string;
  user: string;
  channel: Channel;
  ruleScores: ChannelScores;
  weights: ChannelScores;
  scores: ChannelScores;
  confidence: number;
  rationale: string[];
  requestedModel: string;
  servedModel: string;
  estimatedCost: number;
  directive: DirectiveKind;
  wasDowngraded: boolean;
  refused: boolean;
  degraded: boolean;
  timestamp: string;
}

export interface OutcomeRecord {
  id: string;
  decisionId?: string;
  organization: string;
  user: string;
  channel: Channel;
  observedUtility: number;
  actualCost: number;
  /** Model that served the request, when known */
  model?: string;
  /** Caller-side feature the request came from */
  feature?: string;
  tokensIn?: number;
  tokensOut?: number;
  latencyMs?: number;
  /** Org-level weight before/after the feedback, when it was applied */
  weightBefore?: number;
  weightAfter?: number;
  timestamp: string;
}

export interface LedgerEntry {
  organization: string;
  /** Billing period key, "YYYY-MM" in UTC */
  period: string;
  cumulativeSpend: number;
  lastUpdated: string;
}

export function isChannel(value: unknown): value is Channel {
  return CHANNELS.some(channel => channel === value);
}

export function emptyChannelScores(fill = 0): ChannelScores {
  return { web: fill, agent: fill, ask: fill, direct: fill };
}
