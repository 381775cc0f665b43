/**
 * Per-channel follow-up material returned with every route suggestion
 */

export interface SuggestionPack {
  /** Clarifying questions to send back before answering */
  ask: string[];
  /** Scoped search query; only built when the prompt text is at hand */
  web?: string;
  /** Plan template and tool chain for an agent run */
  agent: string[];
  /** Answer guidance for a direct reply */
  direct: string;
}

export const CLARIFYING_QUESTIONS: readonly string[] = [
  'Goal & success metric?',
  'Constraints (budget, deadline, platform)?',
  'Inputs available (files, URLs, APIs)?',
];

export const AGENT_PLAN: readonly string[] = [
  'Plan:\n1) Subtasks\n2) Tools\n3) Execute\n4) Verify\n5) Summarize',
  'Tools: web search → parse → write notes / open a PR',
];

export const DIRECT_GUIDANCE = 'Answer concisely with 3 bullets and a short example.';

/**
 * Official docs from the start of last year onward
 */
export function scopedWebQuery(prompt: string, at: Date = new Date()): string {
  const topic = prompt.trim().replace(/\?+$/, '').replace(/\s+/g, ' ');
  return `${topic} site:docs official after:${at.getUTCFullYear() - 1}-01-01`;
}

export function buildSuggestionPack(prompt?: string, at?: Date): SuggestionPack {
  return {
    ask: [...CLARIFYING_QUESTIONS],
    ...(prompt !== undefined && { web: scopedWebQuery(prompt, at) }),
    agent: [...AGENT_PLAN],
    direct: DIRECT_GUIDANCE,
  };
}
