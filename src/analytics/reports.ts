/**
 * ROI report over the recommendation window, as data and as markdown
 */

import type { PricingTable } from '../routing/pricing.js';
import type { OutcomeRecord, RouteDecision } from '../types.js';
import { estimateSavings, round } from './aggregator.js';
import type { Recommendation } from './recommendations.js';

/** Share of window spend assumed recoverable by better routing */
export const OPTIMIZATION_SAVINGS_RATE = 0.25;

export const DEFAULT_OPTIMIZATION_NOTES: readonly string[] = [
  'Downshift short Q&A to cheaper or local models',
  'Prefer web for freshness keywords',
  'Require action verbs before routing to agent',
];

export interface OptimizeReportInput {
  organization: string;
  windowDays: number;
  decisions: RouteDecision[];
  outcomes: OutcomeRecord[];
  recommendations: Recommendation[];
  pricing?: PricingTable;
}

export interface OptimizeReport {
  organization: string;
  windowDays: number;
  totalCost: number;
  /** Already saved by budget downgrades in the window */
  realizedSavings: number;
  /** Further savings expected from acting on the notes */
  potentialSavings: number;
  notes: string[];
  markdown: string;
}

export function formatUsd(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function renderReportMarkdown(report: Omit<OptimizeReport, 'markdown'>): string {
  return [
    `# ROI report: ${report.organization}`,
    '',
    `Last ${report.windowDays} days`,
    '',
    `**Spend:** ${formatUsd(report.totalCost)}`,
    `**Saved by downgrades:** ${formatUsd(report.realizedSavings)}`,
    `**Estimated further savings:** ${formatUsd(report.potentialSavings)}`,
    '',
    'Recommendations:',
    ...report.notes.map(note => `- ${note}`),
    '',
  ].join('\n');
}

export function buildOptimizeReport(input: OptimizeReportInput): OptimizeReport {
  const totalCost = round(input.outcomes.reduce((sum, o) => sum + o.actualCost, 0), 6);
  const notes = input.recommendations.length > 0
    ? input.recommendations.map(r => r.action)
    : [...DEFAULT_OPTIMIZATION_NOTES];

  const report = {
    organization: input.organization,
    windowDays: input.windowDays,
    totalCost,
    realizedSavings: estimateSavings(input.decisions, input.pricing),
    potentialSavings: round(totalCost * OPTIMIZATION_SAVINGS_RATE, 6),
    notes,
  };

  return { ...report, markdown: renderReportMarkdown(report) };
}
