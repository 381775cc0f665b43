import { describe, test, expect } from 'vitest';
import { decideRoute, describeRationale, marginConfidence, rankChannels } from '../decision-engine.js';
import { logistic, scoreChannels } from '../../scoring/rule-scorer.js';
import { extractFeatures } from '../../features/extractor.js';
import type { ChannelScores, PromptFeatures } from '../../types.js';
import { emptyChannelScores } from '../../types.js';

const blank: PromptFeatures = {
  mentionsFreshness: false,
  mentionsImplementationVerb: false,
  mentionsComparison: false,
  multiStep: false,
  questionAmbiguityScore: 0,
  lengthBucket: 'medium',
  questionCount: 0,
  hasCodeSelection: false,
  recentSession: false,
  matchedSignals: [],
};

const neutral = (): ChannelScores => emptyChannelScores(1);

describe('rankChannels', () => {
  test('should order by score, breaking ties ask > direct > agent > web', () => {
    expect(rankChannels({ web: 0.5, agent: 0.5, ask: 0.5, direct: 0.5 })).toEqual(['ask', 'direct', 'agent', 'web']);
    expect(rankChannels({ web: 0.9, agent: 0.2, ask: 0.2, direct: 0.7 })).toEqual(['web', 'direct', 'ask', 'agent']);
  });
});

describe('marginConfidence', () => {
  test('should normalize the margin by the top score', () => {
    expect(marginConfidence(0.8, 0.6)).toBeCloseTo(0.25, 12);
    expect(marginConfidence(0.5, 0.5)).toBe(0);
    expect(marginConfidence(0, 0)).toBe(0);
  });
});

describe('decideRoute', () => {
  test('should send a freshness question to web', () => {
    const features = extractFeatures("What's the latest pricing for this week?");
    const decision = decideRoute(scoreChannels(features), neutral());

    expect(decision.channel).toBe('web');
    expect(decision.confidence).toBeCloseTo(1 - 0.5 / logistic(1.2), 12);
    expect(decision.rationale).toEqual(['freshness']);
  });

  test('should send implementation work to agent', () => {
    const features = extractFeatures('Refactor the auth module and then deploy it');
    const decision = decideRoute(scoreChannels(features), neutral());

    expect(decision.channel).toBe('agent');
    expect(decision.rationale).toEqual(['implementation-verb', 'multi-step']);
  });

  test('should fall back to ask on a full tie', () => {
    const decision = decideRoute(scoreChannels(blank), neutral());

    expect(decision.channel).toBe('ask');
    expect(decision.confidence).toBe(0);
    expect(decision.ranking).toEqual(['ask', 'direct', 'agent', 'web']);
    expect(decision.rationale).toEqual(['no-strong-signal', 'tie-break']);
  });

  test('should multiply rule scores by weights', () => {
    const weights = { ...neutral(), agent: 1.2 };
    const decision = decideRoute(scoreChannels(blank), weights);

    expect(decision.channel).toBe('agent');
    expect(decision.scores.agent).toBeCloseTo(0.6, 12);
    expect(decision.ruleScores.agent).toBe(0.5);
    expect(decision.weights.agent).toBe(1.2);
    expect(decision.confidence).toBeCloseTo(1 / 6, 12);
    expect(decision.rationale).toEqual(['no-strong-signal', 'weight-boost']);
  });

  test('should let a low weight override a strong rule score', () => {
    const scoring = scoreChannels({ ...blank, mentionsFreshness: true });
    const decision = decideRoute(scoring, { ...neutral(), web: 0.5 });

    expect(decision.scores.web).toBeCloseTo(logistic(1.2) / 2, 12);
    expect(decision.channel).toBe('ask');
    expect(decision.rationale).toEqual(['no-strong-signal', 'tie-break']);
  });

  test('should report a penalty when the chosen channel is down-weighted', () => {
    const scoring = scoreChannels({ ...blank, mentionsImplementationVerb: true });
    const decision = decideRoute(scoring, { ...neutral(), agent: 0.9 });

    expect(decision.channel).toBe('agent');
    expect(decision.rationale).toEqual(['implementation-verb', 'weight-penalty']);
  });

  test('should have zero confidence when every weight is zero', () => {
    const decision = decideRoute(scoreChannels(blank), emptyChannelScores(0));
    expect(decision.channel).toBe('ask');
    expect(decision.confidence).toBe(0);
  });

  test('should be deterministic', () => {
    const scoring = scoreChannels({ ...blank, questionAmbiguityScore: 0.4, mentionsComparison: true });
    expect(decideRoute(scoring, neutral())).toEqual(decideRoute(scoring, neutral()));
  });
});

describe('describeRationale', () => {
  test('should render known tags and pass unknown ones through', () => {
    expect(describeRationale(['freshness', 'tie-break', 'custom'])).toEqual([
      'Fresh or volatile information → web',
      'Tied scores resolved toward the cheaper channel',
      'custom',
    ]);
  });
});
