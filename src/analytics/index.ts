export {
  summarizeUsage,
  estimateSavings,
  linkOutcomes,
  percentile,
  round,
  summarizeRequests,
  type UsageInput,
  type UsageSummary,
  type ChannelUsage,
  type UserUsage,
  type ModelUsage,
  type RequestUsage,
  type UsageDimension,
} from './aggregator.js';

export {
  buildWeeklyRecommendations,
  compareRecommendations,
  weightTrends,
  DEFAULT_RECOMMENDATION_THRESHOLDS,
  type Recommendation,
  type RecommendationKind,
  type RecommendationInput,
  type RecommendationThresholds,
  type WeightTrend,
} from './recommendations.js';

export {
  buildOptimizeReport,
  renderReportMarkdown,
  formatUsd,
  OPTIMIZATION_SAVINGS_RATE,
  DEFAULT_OPTIMIZATION_NOTES,
  type OptimizeReport,
  type OptimizeReportInput,
} from './reports.js';
