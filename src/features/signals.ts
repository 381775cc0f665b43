/**
 * Keyword tables for prompt classification.
 *
 * Each group contributes its id to `matchedSignals` when any of its keywords
 * (or patterns) appears in the prompt. Only the ids leave the extractor.
 */

export type SignalFamily = 'freshness' | 'implementation' | 'multiStep' | 'ambiguity' | 'comparison';

export interface SignalGroup {
  id: string;
  keywords: string[];
  patterns?: RegExp[];
  /** Contribution to the family's score; only ambiguity uses it as a magnitude */
  weight: number;
  description: string;
}

export const PROMPT_SIGNALS: Record<SignalFamily, SignalGroup[]> = {
  freshness: [
    {
      id: 'freshness:temporal',
      keywords: ['today', 'latest', 'this week', 'this month', 'currently', 'right now', 'recent', 'news'],
      weight: 1.0,
      description: 'Time-sensitive wording',
    },
    {
      id: 'freshness:release',
      keywords: ['release', 'changelog', 'version', 'deprecated', 'deprecation', 'breaking change', 'roadmap'],
      weight: 1.0,
      description: 'Release and version questions',
    },
    {
      id: 'freshness:market',
      keywords: ['price', 'pricing', 'schedule', 'policy', 'who is'],
      weight: 1.0,
      description: 'Volatile facts',
    },
    {
      id: 'freshness:year',
      keywords: [],
      patterns: [/\b20\d{2}\b/],
      weight: 1.0,
      description: 'Explicit calendar year',
    },
  ],

  implementation: [
    {
      id: 'implementation:build',
      keywords: ['implement', 'scaffold', 'build', 'create a', 'generate project', 'set up', 'write a script'],
      weight: 1.0,
      description: 'Build something new',
    },
    {
      id: 'implementation:change',
      keywords: ['refactor', 'migrate', 'integrate', 'upgrade', 'rewrite', 'fix the'],
      weight: 1.0,
      description: 'Change existing code',
    },
    {
      id: 'implementation:ops',
      keywords: ['deploy', 'benchmark', 'write tests', 'create pr', 'open a pr', 'automate', 'scrape'],
      weight: 1.0,
      description: 'Operational tasks',
    },
  ],

  multiStep: [
    {
      id: 'multistep:explicit',
      keywords: ['step-by-step', 'step by step', 'pipeline', 'workflow', 'end-to-end', 'and then'],
      weight: 1.0,
      description: 'Explicitly multi-step request',
    },
    {
      id: 'multistep:list',
      keywords: [],
      // two or more bullet or numbered lines
      patterns: [/(?:^|\n)\s*(?:[-*]|\d+[.)])\s+\S[^\n]*\n\s*(?:[-*]|\d+[.)])\s+\S/],
      weight: 1.0,
      description: 'Task list in the prompt',
    },
  ],

  ambiguity: [
    {
      id: 'ambiguity:superlative',
      keywords: ['best', 'cheapest', 'fastest', 'quickest', 'easiest'],
      weight: 0.4,
      description: 'Superlatives without criteria',
    },
    {
      id: 'ambiguity:open-ended',
      keywords: ['recommend', 'suggest', 'any ideas', 'what should i', 'which one'],
      weight: 0.4,
      description: 'Open-ended asks',
    },
    {
      id: 'ambiguity:uncertain',
      keywords: ['not sure', 'maybe', 'something like', 'somehow', 'kind of'],
      weight: 0.3,
      description: 'Hedged wording',
    },
    {
      id: 'ambiguity:missing-context',
      keywords: ['for my use case', 'near me', 'it depends', 'my setup', 'our stack'],
      weight: 0.3,
      description: 'Depends on context the prompt does not give',
    },
  ],

  comparison: [
    {
      id: 'comparison:explicit',
      keywords: ['compare', 'comparison', 'versus', 'vs', 'difference between', 'how much', 'cheaper than'],
      weight: 1.0,
      description: 'Comparisons and cost questions',
    },
  ],
};

const keywordPatterns = new Map<string, RegExp>();

function keywordPattern(keyword: string): RegExp {
  let pattern = keywordPatterns.get(keyword);
  if (!pattern) {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    pattern = new RegExp(`(?:^|[^a-z0-9])${escaped}(?:$|[^a-z0-9])`);
    keywordPatterns.set(keyword, pattern);
  }
  return pattern;
}

/**
 * True when any keyword or pattern of the group occurs in `lowerText`
 */
export function matchesGroup(group: SignalGroup, lowerText: string): boolean {
  return group.keywords.some(keyword => keywordPattern(keyword).test(lowerText))
    || (group.patterns ?? []).some(pattern => pattern.test(lowerText));
}

/**
 * Groups of one family that match the (lower-cased) text, in table order
 */
export function matchFamily(family: SignalFamily, lowerText: string): SignalGroup[] {
  return PROMPT_SIGNALS[family].filter(group => matchesGroup(group, lowerText));
}
