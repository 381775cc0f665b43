/**
 * Budget policy snapshots. Policies are owned by an external configuration
 * collaborator; the core only validates and reads them.
 */

import { z } from 'zod';
import { PolicyNotFoundError } from '../errors.js';

export const BudgetPolicySchema = z.object({
  organization: z.string().min(1),
  /** USD per calendar month; 0 disables limit awareness */
  monthlyLimit: z.number().min(0),
  mode: z.enum(['observe', 'soft', 'hard']).default('observe'),
  /** Fraction of the limit at which alerts start, in (0, 1] */
  alertThreshold: z.number().gt(0).max(1).default(0.8),
  /** Single-hop model substitutions applied in soft mode */
  fallbacks: z.record(z.string().min(1)).default({}),
});

export type BudgetPolicy = Readonly<z.infer<typeof BudgetPolicySchema>>;

export type BudgetPolicyInput = z.input<typeof BudgetPolicySchema>;

export interface PolicyProvider {
  /**
   * @throws PolicyNotFoundError when the organization has no policy
   */
  getPolicy(organization: string): Promise<BudgetPolicy>;
}

function freeze(policy: z.infer<typeof BudgetPolicySchema>): BudgetPolicy {
  return Object.freeze({ ...policy, fallbacks: Object.freeze({ ...policy.fallbacks }) });
}

/**
 * @param defaultAlertThreshold applied when the snapshot omits one
 */
export function parseBudgetPolicy(input: unknown, defaultAlertThreshold?: number): BudgetPolicy {
  const parsed = defaultAlertThreshold === undefined
    ? BudgetPolicySchema.parse(input)
    : BudgetPolicySchema.extend({
      alertThreshold: z.number().gt(0).max(1).default(defaultAlertThreshold),
    }).parse(input);
  return freeze(parsed);
}

/**
 * Stand-in used when an organization has no policy: observe mode with no
 * limit, so nothing is ever downgraded or blocked.
 */
export function observePolicy(organization: string, alertThreshold = 0.8): BudgetPolicy {
  return freeze({ organization, monthlyLimit: 0, mode: 'observe', alertThreshold, fallbacks: {} });
}

export interface StaticPolicyOptions {
  /** Alert threshold for snapshots that omit one */
  defaultAlertThreshold?: number;
}

/**
 * In-memory provider holding one immutable snapshot per organization.
 * `replace` swaps a snapshot in a single assignment.
 */
export class StaticPolicyProvider implements PolicyProvider {
  private policies = new Map<string, BudgetPolicy>();

  constructor(policies: BudgetPolicyInput[] = [], private options: StaticPolicyOptions = {}) {
    for (const policy of policies) {
      this.replace(policy);
    }
  }

  async getPolicy(organization: string): Promise<BudgetPolicy> {
    const policy = this.policies.get(organization);
    if (!policy) {
      throw new PolicyNotFoundError(organization);
    }
    return policy;
  }

  replace(input: BudgetPolicyInput): BudgetPolicy {
    const policy = parseBudgetPolicy(input, this.options.defaultAlertThreshold);
    this.policies.set(policy.organization, policy);
    return policy;
  }

  remove(organization: string): boolean {
    return this.policies.delete(organization);
  }

  organizations(): string[] {
    return [...this.policies.keys()];
  }
}
