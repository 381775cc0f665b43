/**
 * Combines rule scores with adaptive weights and picks a channel.
 * Pure computation: the weights are read by the caller beforehand.
 */

import type { ScoringResult } from '../scoring/rule-scorer.js';
import type { Channel, ChannelScores } from '../types.js';
import { CHANNEL_PRIORITY, CHANNELS, emptyChannelScores } from '../types.js';

export interface ChannelDecision {
  channel: Channel;
  /** ruleScore × weight per channel */
  scores: ChannelScores;
  ruleScores: ChannelScores;
  weights: ChannelScores;
  /** Normalized margin between the top two final scores, in [0, 1] */
  confidence: number;
  /** Channels ordered best first, ties in priority order */
  ranking: Channel[];
  rationale: string[];
}

/** Most signals quoted in a rationale */
const MAX_RATIONALE_SIGNALS = 3;

const priorityOf = (channel: Channel): number => CHANNEL_PRIORITY.indexOf(channel);

/**
 * Best-first ordering; equal scores fall back to ask > direct > agent > web
 */
export function rankChannels(scores: ChannelScores): Channel[] {
  return [...CHANNELS].sort((a, b) => {
    const diff = scores[b] - scores[a];
    return diff !== 0 ? diff : priorityOf(a) - priorityOf(b);
  });
}

export function marginConfidence(top: number, second: number): number {
  if (top <= 0) return 0;
  return Math.max(0, Math.min(1, (top - second) / top));
}

export function decideRoute(scoring: ScoringResult, weights: ChannelScores): ChannelDecision {
  const scores = emptyChannelScores();
  for (const channel of CHANNELS) {
    scores[channel] = scoring.scores[channel] * weights[channel];
  }

  const ranking = rankChannels(scores);
  const [channel = 'ask', runnerUp = channel] = ranking;
  const confidence = marginConfidence(scores[channel], scores[runnerUp]);

  const rationale = scoring.contributions[channel]
    .slice(0, MAX_RATIONALE_SIGNALS)
    .map(c => c.id);

  if (rationale.length === 0) rationale.push('no-strong-signal');
  if (weights[channel] > 1) rationale.push('weight-boost');
  if (weights[channel] < 1) rationale.push('weight-penalty');
  if (scores[channel] === scores[runnerUp]) rationale.push('tie-break');

  return {
    channel,
    scores,
    ruleScores: { ...scoring.scores },
    weights: { ...weights },
    confidence,
    ranking,
    rationale,
  };
}

const RATIONALE_TEXT: Record<string, string> = {
  'freshness': 'Fresh or volatile information → web',
  'comparison': 'Comparison or pricing question → web',
  'implementation-verb': 'Implementation work → agent',
  'multi-step': 'Multi-step task → agent',
  'code-selection': 'Code selected in the editor → agent',
  'ambiguity': 'Underspecified request → ask',
  'several-questions': 'Several questions at once → ask',
  'short-factual': 'Short, well-specified question → direct',
  'session-follow-up': 'Follow-up in an active session → direct',
  'no-strong-signal': 'No strong signals; ask or direct are safe defaults',
  'weight-boost': 'Team history favors this channel',
  'weight-penalty': 'Team history disfavors this channel',
  'tie-break': 'Tied scores resolved toward the cheaper channel',
};

/**
 * Human-readable reasons for display; unknown tags pass through as-is
 */
export function describeRationale(tags: string[]): string[] {
  return tags.map(tag => RATIONALE_TEXT[tag] ?? tag);
}
