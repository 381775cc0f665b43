import { BudgetLedger, StaticPolicyProvider } from '../budget/index.js';
import type { BudgetPolicyInput, PolicyProvider } from '../budget/index.js';
import { mergeWithDefaults } from '../config.js';
import type { RouterConfig, RouterConfigInput } from '../config.js';
import { WeightStore } from '../learning/index.js';
import type { RouterLogger } from '../logging/index.js';
import { createComponentLogger } from '../logging/index.js';
import { MemoryHistoryStore, MemoryRecordStore } from '../store/index.js';
import type { HistoryStore, RecordStore } from '../store/index.js';
import type { LedgerEntry } from '../types.js';
import { RouterService } from './router-service.js';

export interface CreateRouterOptions {
  /** Partial config merged with defaults, or an already-parsed config */
  config?: RouterConfigInput | RouterConfig;
  /** Policy snapshots, or a provider that owns them */
  policies?: BudgetPolicyInput[] | PolicyProvider;
  weightStore?: RecordStore<number>;
  ledgerStore?: RecordStore<LedgerEntry>;
  history?: HistoryStore;
  logger?: RouterLogger;
}

/**
 * Wires a RouterService. Stores default to in-process memory.
 */
export function createRouter(options: CreateRouterOptions = {}): RouterService {
  const config = mergeWithDefaults(options.config);
  const logger = options.logger ?? createComponentLogger('router', config.logging);
  const timeoutMs = config.persistence.timeoutMs;

  const policies = Array.isArray(options.policies) || options.policies === undefined
    ? new StaticPolicyProvider(options.policies, { defaultAlertThreshold: config.budget.defaultAlertThreshold })
    : options.policies;

  return new RouterService({
    config,
    weights: new WeightStore(options.weightStore ?? new MemoryRecordStore<number>(), {
      learningRate: config.learning.learningRate,
      timeoutMs,
    }),
    ledger: new BudgetLedger(
      options.ledgerStore ?? new MemoryRecordStore<LedgerEntry>(),
      { timeoutMs },
      logger.child({ component: 'BudgetLedger' })
    ),
    history: options.history ?? new MemoryHistoryStore(),
    policies,
    logger: logger.child({ component: 'RouterService' }),
  });
}
