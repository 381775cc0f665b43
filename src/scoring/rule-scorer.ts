/**
 * Static heuristics: feature record in, per-channel score in (0, 1) out.
 * Raw scores are weighted sums of non-negative heuristic weights squashed by
 * a logistic curve, so adding a signal never lowers a channel's score.
 */

import type { Channel, ChannelScores, PromptFeatures } from '../types.js';
import { CHANNELS, emptyChannelScores } from '../types.js';

export interface Heuristic {
  id: string;
  channel: Channel;
  /** Raw contribution when the heuristic fires fully */
  weight: number;
  /** Activation in [0, 1]; 0 means not matched */
  activation: (features: PromptFeatures) => number;
}

export interface Contribution {
  id: string;
  amount: number;
}

export interface ScoringResult {
  /** Logistic-squashed scores, each in (0, 1) */
  scores: ChannelScores;
  /** Pre-squash weighted sums */
  raw: ChannelScores;
  /** Fired heuristics per channel, largest first */
  contributions: Record<Channel, Contribution[]>;
}

const on = (flag: boolean): number => (flag ? 1 : 0);

export const HEURISTICS: Heuristic[] = [
  {
    id: 'freshness',
    channel: 'web',
    weight: 1.2,
    activation: f => on(f.mentionsFreshness),
  },
  {
    id: 'comparison',
    channel: 'web',
    weight: 0.4,
    activation: f => on(f.mentionsComparison),
  },
  {
    id: 'implementation-verb',
    channel: 'agent',
    weight: 1.1,
    activation: f => on(f.mentionsImplementationVerb),
  },
  {
    id: 'multi-step',
    channel: 'agent',
    weight: 0.6,
    activation: f => on(f.multiStep),
  },
  {
    id: 'code-selection',
    channel: 'agent',
    weight: 0.3,
    activation: f => on(f.hasCodeSelection),
  },
  {
    id: 'ambiguity',
    channel: 'ask',
    weight: 1.5,
    activation: f => f.questionAmbiguityScore,
  },
  {
    id: 'several-questions',
    channel: 'ask',
    weight: 0.3,
    activation: f => on(f.questionCount > 1),
  },
  {
    id: 'short-factual',
    channel: 'direct',
    weight: 0.9,
    activation: f => on(
      f.lengthBucket === 'short'
      && f.questionCount === 1
      && !f.mentionsFreshness
      && !f.mentionsImplementationVerb
    ),
  },
  {
    id: 'session-follow-up',
    channel: 'direct',
    weight: 0.2,
    activation: f => on(f.recentSession),
  },
];

export function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export function scoreChannels(features: PromptFeatures): ScoringResult {
  const raw = emptyChannelScores();
  const contributions: Record<Channel, Contribution[]> = {
    web: [],
    agent: [],
    ask: [],
    direct: [],
  };

  for (const heuristic of HEURISTICS) {
    const activation = Math.min(1, Math.max(0, heuristic.activation(features)));
    if (activation === 0) continue;

    const amount = heuristic.weight * activation;
    raw[heuristic.channel] += amount;
    contributions[heuristic.channel].push({ id: heuristic.id, amount });
  }

  const scores = emptyChannelScores();
  for (const channel of CHANNELS) {
    scores[channel] = logistic(raw[channel]);
    contributions[channel].sort((a, b) => b.amount - a.amount);
  }

  return { scores, raw, contributions };
}
