export {
  RouterService,
  OutcomeReportSchema,
  type RouterServiceDeps,
  type SuggestRouteRequest,
  type SuggestPromptRequest,
  type RouteSuggestion,
  type OutcomeReport,
  type BudgetStatus,
  type CostEstimateRequest,
  type CostEstimate,
} from './router-service.js';

export { createRouter, type CreateRouterOptions } from './factory.js';
