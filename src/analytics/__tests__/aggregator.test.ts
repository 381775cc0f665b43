import { describe, test, expect } from 'vitest';
import { estimateSavings, linkOutcomes, percentile, summarizeRequests, summarizeUsage } from '../aggregator.js';
import type { PricingTable } from '../../routing/pricing.js';
import type { OutcomeRecord, RouteDecision } from '../../types.js';
import { emptyChannelScores } from '../../types.js';

const pricing: PricingTable = {
  big: { inputPer1k: 1, outputPer1k: 1 },
  small: { inputPer1k: 0.25, outputPer1k: 0.25 },
};

function decision(overrides: Partial<RouteDecision> & Pick<RouteDecision, 'id'>): RouteDecision {
  return {
    eventId: `event-${overrides.id}`,
    organization: 'acme',
    user: 'alice',
    channel: 'direct',
    ruleScores: emptyChannelScores(),
    weights: emptyChannelScores(1),
    scores: emptyChannelScores(),
    confidence: 0.5,
    rationale: [],
    requestedModel: 'big',
    servedModel: 'big',
    estimatedCost: 0.4,
    directive: 'allow',
    wasDowngraded: false,
    refused: false,
    degraded: false,
    timestamp: '2026-03-02T10:00:00.000Z',
    ...overrides,
  };
}

function outcome(overrides: Partial<OutcomeRecord> & Pick<OutcomeRecord, 'id'>): OutcomeRecord {
  return {
    organization: 'acme',
    user: 'alice',
    channel: 'direct',
    observedUtility: 1,
    actualCost: 0.5,
    timestamp: '2026-03-02T10:01:00.000Z',
    ...overrides,
  };
}

describe('linkOutcomes', () => {
  test('should keep the latest outcome per decision', () => {
    const linked = linkOutcomes([
      outcome({ id: 'o1', decisionId: 'd1', observedUtility: 0.2, timestamp: '2026-03-02T10:05:00.000Z' }),
      outcome({ id: 'o2', decisionId: 'd1', observedUtility: 1.8, timestamp: '2026-03-02T10:03:00.000Z' }),
      outcome({ id: 'o3' }),
    ]);

    expect([...linked.keys()]).toEqual(['d1']);
    expect(linked.get('d1')?.id).toBe('o1');
  });
});

describe('estimateSavings', () => {
  test('should price the gap between requested and served models', () => {
    const decisions = [
      decision({ id: 'd1', wasDowngraded: true, servedModel: 'small', directive: 'downgrade' }),
      decision({ id: 'd2' }),
    ];
    expect(estimateSavings(decisions, pricing)).toBe(0.3);
  });

  test('should be zero without downgrades', () => {
    expect(estimateSavings([decision({ id: 'd1' })], pricing)).toBe(0);
  });
});

describe('summarizeUsage', () => {
  const decisions = [
    decision({ id: 'd1', channel: 'web', confidence: 0.9 }),
    decision({ id: 'd2', channel: 'direct', confidence: 0.6, wasDowngraded: true, servedModel: 'small', directive: 'downgrade' }),
    decision({ id: 'd3', user: 'bob', channel: 'agent', confidence: 0.3, refused: true, directive: 'block' }),
    decision({ id: 'd4', user: 'bob', channel: 'web', confidence: 0.4, degraded: true }),
  ];
  const outcomes = [
    outcome({ id: 'o1', decisionId: 'd1', channel: 'web', observedUtility: 1.5, actualCost: 0.25 }),
    outcome({ id: 'o2', decisionId: 'd2', channel: 'direct', observedUtility: 1.9, actualCost: 0.125 }),
    outcome({ id: 'o4', decisionId: 'd4', user: 'bob', channel: 'web', observedUtility: 0.5, actualCost: 0.5 }),
  ];

  const summary = summarizeUsage({
    organization: 'acme',
    period: '2026-03',
    decisions,
    outcomes,
    highValueUtility: 1.2,
    pricing,
  });

  test('should count decisions by enforcement result', () => {
    expect(summary.totalDecisions).toBe(4);
    expect(summary.totalOutcomes).toBe(3);
    expect(summary.downgradedCount).toBe(1);
    expect(summary.refusedCount).toBe(1);
    expect(summary.degradedCount).toBe(1);
    expect(summary.averageConfidence).toBe(0.55);
  });

  test('should total costs and savings', () => {
    expect(summary.totalEstimatedCost).toBe(1.6);
    expect(summary.totalActualCost).toBe(0.875);
    expect(summary.ledgerSpend).toBe(0.875);
    expect(summary.estimatedSavings).toBe(0.3);
  });

  test('should prefer the ledger total when given', () => {
    const withLedger = summarizeUsage({
      organization: 'acme',
      period: '2026-03',
      decisions,
      outcomes,
      ledgerSpend: 2,
      highValueUtility: 1.2,
    });
    expect(withLedger.ledgerSpend).toBe(2);
    expect(withLedger.totalActualCost).toBe(0.875);
  });

  test('should break usage down by channel', () => {
    expect(summary.byChannel.web).toEqual({
      decisions: 2,
      share: 0.5,
      outcomes: 2,
      averageUtility: 1,
      actualCost: 0.75,
    });
    expect(summary.byChannel.ask).toEqual({
      decisions: 0,
      share: 0,
      outcomes: 0,
      averageUtility: 0,
      actualCost: 0,
    });
  });

  test('should score efficiency per user from non-downgraded high-value decisions', () => {
    expect(summary.byUser).toEqual([
      { user: 'alice', decisions: 2, downgraded: 1, refused: 0, highValue: 1, efficiency: 0.5, actualCost: 0.375 },
      { user: 'bob', decisions: 2, downgraded: 0, refused: 1, highValue: 0, efficiency: 0, actualCost: 0.5 },
    ]);
  });

  test('should break usage down by model', () => {
    expect(summary.byModel).toEqual([
      { model: 'big', served: 2, requested: 4, estimatedCost: 0.8 },
      { model: 'small', served: 1, requested: 0, estimatedCost: 0.4 },
    ]);
  });

  test('should return zeros for an empty period', () => {
    const empty = summarizeUsage({
      organization: 'acme',
      period: '2026-03',
      decisions: [],
      outcomes: [],
      highValueUtility: 1.2,
    });
    expect(empty.totalDecisions).toBe(0);
    expect(empty.averageConfidence).toBe(0);
    expect(empty.byChannel.direct.share).toBe(0);
    expect(empty.byUser).toEqual([]);
    expect(empty.byModel).toEqual([]);
  });
});

describe('percentile', () => {
  test('should use the nearest rank', () => {
    const latencies = Array.from({ length: 21 }, (_, i) => (21 - i) * 10);
    expect(percentile(latencies, 0.95)).toBe(200);
    expect(percentile([300, 100, 200], 0.95)).toBe(300);
    expect(percentile([42], 0.95)).toBe(42);
    expect(percentile([], 0.95)).toBe(0);
  });
});

describe('summarizeRequests', () => {
  const outcomes = [
    outcome({ id: 'o1', feature: 'chat', model: 'big', tokensIn: 100, tokensOut: 40, latencyMs: 900, actualCost: 0.5 }),
    outcome({ id: 'o2', feature: 'chat', model: 'small', tokensIn: 50, tokensOut: 10, latencyMs: 300, actualCost: 0.25 }),
    outcome({ id: 'o3', user: 'bob', tokensIn: 10, actualCost: 0.125 }),
  ];

  test('should group by feature with a default bucket', () => {
    expect(summarizeRequests(outcomes, 'feature')).toEqual([
      { key: 'chat', requests: 2, tokensIn: 150, tokensOut: 50, actualCost: 0.75, p95LatencyMs: 900 },
      { key: 'default', requests: 1, tokensIn: 10, tokensOut: 0, actualCost: 0.125, p95LatencyMs: 0 },
    ]);
  });

  test('should group by model and by user', () => {
    expect(summarizeRequests(outcomes, 'model').map(u => u.key)).toEqual(['big', 'small', 'unknown']);
    expect(summarizeRequests(outcomes, 'user').map(u => [u.key, u.requests])).toEqual([
      ['alice', 2],
      ['bob', 1],
    ]);
  });

  test('should total tokens in the usage summary', () => {
    const summary = summarizeUsage({
      organization: 'acme',
      period: '2026-03',
      decisions: [],
      outcomes,
      highValueUtility: 1,
    });
    expect(summary.totalTokensIn).toBe(160);
    expect(summary.totalTokensOut).toBe(50);
    expect(summary.requests.feature).toHaveLength(2);
  });
});
