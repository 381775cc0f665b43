/**
 * routewise - budget-aware prompt routing
 *
 * Picks a channel (web, agent, ask, direct) for each prompt from rule scores
 * and team-learned weights, enforces a monthly spend budget per organization,
 * and reports usage, savings and weekly recommendations.
 */

export * from './types.js';

export {
  RoutingError,
  InvalidFeatureInputError,
  InvalidOutcomeError,
  PolicyNotFoundError,
  PersistenceUnavailableError,
  isRoutingError,
} from './errors.js';

export {
  RouterConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  validateConfig,
  mergeWithDefaults,
  type RouterConfig,
  type RouterConfigInput,
} from './config.js';

export {
  extractFeatures,
  hashPrompt,
  validateFeatures,
  PromptFeaturesSchema,
  type PromptContext,
} from './features/index.js';

export { scoreChannels, HEURISTICS, type ScoringResult } from './scoring/index.js';

export { WeightStore, DEFAULT_WEIGHT, type FeedbackResult } from './learning/index.js';

export {
  decideRoute,
  describeRationale,
  rankChannels,
  type ChannelDecision,
} from './routing/decision-engine.js';

export {
  DEFAULT_MODEL_PRICING,
  estimateModelCost,
  estimateTokens,
  getModelPricing,
  type ModelPricing,
  type PricingTable,
} from './routing/pricing.js';

export { buildSuggestionPack, scopedWebQuery, type SuggestionPack } from './routing/suggestions.js';

export {
  BudgetLedger,
  StaticPolicyProvider,
  BudgetPolicySchema,
  computeBudgetState,
  resolveEnforcement,
  buildBudgetSuggestions,
  periodKey,
  type BudgetPolicy,
  type BudgetPolicyInput,
  type PolicyProvider,
  type Directive,
  type BudgetDirective,
  type UnknownBudgetDirective,
  type Enforcement,
  type BudgetAlert,
} from './budget/index.js';

export {
  summarizeUsage,
  buildWeeklyRecommendations,
  buildOptimizeReport,
  summarizeRequests,
  type UsageSummary,
  type RequestUsage,
  type OptimizeReport,
  type Recommendation,
} from './analytics/index.js';

export {
  MemoryRecordStore,
  MemoryHistoryStore,
  type RecordStore,
  type HistoryStore,
  type HistoryQuery,
} from './store/index.js';

export {
  RouterService,
  createRouter,
  type CreateRouterOptions,
  type SuggestRouteRequest,
  type SuggestPromptRequest,
  type RouteSuggestion,
  type OutcomeReport,
  type BudgetStatus,
  type CostEstimate,
} from './service/index.js';

export { createRoutes, RouterServer, startRouterServer } from './server/index.js';

export { createLogger, createComponentLogger, RouterLogger } from './logging/index.js';
