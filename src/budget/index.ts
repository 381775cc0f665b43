/**
 * Budget - main exports
 */

export {
  periodKey,
  isPeriodKey,
  periodBounds,
  daysInPeriod,
  daysRemaining,
  projectPeriodSpend,
} from './period.js';

export {
  BudgetPolicySchema,
  StaticPolicyProvider,
  parseBudgetPolicy,
  observePolicy,
  type BudgetPolicy,
  type BudgetPolicyInput,
  type PolicyProvider,
  type StaticPolicyOptions,
} from './policy.js';

export {
  BudgetLedger,
  computeBudgetState,
  evaluateDirective,
  ledgerKey,
  stateAtLeast,
  type BudgetRequest,
  type BudgetDirective,
  type UnknownBudgetDirective,
  type Directive,
  type LedgerOptions,
} from './ledger.js';

export {
  resolveEnforcement,
  type Enforcement,
  type RequestedRoute,
} from './enforcement.js';

export {
  buildBudgetAlerts,
  type AlertLevel,
  type AlertInput,
  type BudgetAlert,
} from './alerts.js';

export {
  buildBudgetSuggestions,
  isPremiumModel,
  PREMIUM_RATE_PER_1K,
  SUGGESTION_LIMITS,
  NO_USAGE_SUGGESTION,
  type SpendSample,
  type SuggestionInput,
} from './suggestions.js';
