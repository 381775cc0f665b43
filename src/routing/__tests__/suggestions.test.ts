import { describe, test, expect } from 'vitest';
import { buildSuggestionPack, scopedWebQuery } from '../suggestions.js';

describe('scopedWebQuery', () => {
  test('should strip trailing question marks and collapse whitespace', () => {
    expect(scopedWebQuery('  What changed in   the latest release??', new Date('2026-03-10T00:00:00Z')))
      .toBe('What changed in the latest release site:docs official after:2025-01-01');
  });
});

describe('buildSuggestionPack', () => {
  test('should include a web query only when given the prompt', () => {
    const withPrompt = buildSuggestionPack('latest node release?', new Date('2026-01-01T00:00:00Z'));
    expect(withPrompt.web).toBe('latest node release site:docs official after:2025-01-01');

    const withoutPrompt = buildSuggestionPack();
    expect(withoutPrompt.web).toBeUndefined();
    expect('web' in withoutPrompt).toBe(false);
  });

  test('should carry questions, a plan and answer guidance', () => {
    const pack = buildSuggestionPack();
    expect(pack.ask).toEqual([
      'Goal & success metric?',
      'Constraints (budget, deadline, platform)?',
      'Inputs available (files, URLs, APIs)?',
    ]);
    expect(pack.agent[0]).toBe('Plan:\n1) Subtasks\n2) Tools\n3) Execute\n4) Verify\n5) Summarize');
    expect(pack.direct).toBe('Answer concisely with 3 bullets and a short example.');
  });

  test('should hand out copies of the shared lists', () => {
    const pack = buildSuggestionPack();
    pack.ask.push('extra');
    expect(buildSuggestionPack().ask).toHaveLength(3);
  });
});
