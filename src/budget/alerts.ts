export type AlertLevel = 'info' | 'warning' | 'critical';

export interface BudgetAlert {
  id: 'budget-exceeded' | 'budget-nearly-exhausted' | 'budget-threshold' | 'projected-overrun';
  level: AlertLevel;
  message: string;
  actionRequired: boolean;
}

export interface AlertInput {
  cumulativeSpend: number;
  monthlyLimit: number;
  alertThreshold: number;
  /** Month-end spend at the current daily rate */
  projectedSpend: number;
}

/** Percent used at which alerts escalate to critical before the limit */
const CRITICAL_PERCENT = 90;
/** Projected overrun tolerated before warning */
const PROJECTION_SLACK = 1.1;

const usd = (value: number): string => `$${value.toFixed(2)}`;

/**
 * At most one alert, the most severe that applies. No limit, no alerts.
 */
export function buildBudgetAlerts(input: AlertInput): BudgetAlert[] {
  const { cumulativeSpend, monthlyLimit, alertThreshold, projectedSpend } = input;
  if (monthlyLimit <= 0) return [];

  const percent = (cumulativeSpend / monthlyLimit) * 100;

  if (percent >= 100) {
    return [{
      id: 'budget-exceeded',
      level: 'critical',
      message: `Budget exceeded: ${usd(cumulativeSpend)} / ${usd(monthlyLimit)}`,
      actionRequired: true,
    }];
  }
  if (percent >= CRITICAL_PERCENT) {
    return [{
      id: 'budget-nearly-exhausted',
      level: 'critical',
      message: `Budget nearly exhausted: ${percent.toFixed(1)}% used`,
      actionRequired: true,
    }];
  }
  if (percent >= alertThreshold * 100) {
    return [{
      id: 'budget-threshold',
      level: 'warning',
      message: `Budget alert: ${percent.toFixed(1)}% of monthly limit used`,
      actionRequired: false,
    }];
  }
  if (projectedSpend > monthlyLimit * PROJECTION_SLACK) {
    return [{
      id: 'projected-overrun',
      level: 'warning',
      message: `Projected to exceed budget: ${usd(projectedSpend)} estimated for the month`,
      actionRequired: false,
    }];
  }
  return [];
}
