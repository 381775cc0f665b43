/**
 * Feature extraction: prompt text in, fixed-shape feature record out.
 *
 * The prompt is only read here. Callers keep the returned features and,
 * optionally, `hashPrompt()`; the text itself must not travel further.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { InvalidFeatureInputError } from '../errors.js';
import type { LengthBucket, PromptFeatures } from '../types.js';
import { matchFamily } from './signals.js';

export interface PromptContext {
  /** Caller has code selected in the editor */
  hasCodeSelection?: boolean;
  /** Minutes since the session started */
  sessionAgeMinutes?: number;
}

export interface ExtractOptions {
  /** Sessions at most this old count as recent (default 30) */
  recentSessionMinutes?: number;
}

export const LENGTH_THRESHOLDS = {
  short: 280,
  medium: 1200,
} as const;

export function bucketLength(length: number): LengthBucket {
  if (length < LENGTH_THRESHOLDS.short) return 'short';
  if (length < LENGTH_THRESHOLDS.medium) return 'medium';
  return 'long';
}

export function extractFeatures(
  prompt: string,
  context: PromptContext = {},
  options: ExtractOptions = {}
): PromptFeatures {
  const text = prompt.trim().toLowerCase();
  const recentLimit = options.recentSessionMinutes ?? 30;

  const freshness = matchFamily('freshness', text);
  const implementation = matchFamily('implementation', text);
  const multiStep = matchFamily('multiStep', text);
  const ambiguity = matchFamily('ambiguity', text);
  const comparison = matchFamily('comparison', text);

  const ambiguityScore = Math.min(1, ambiguity.reduce((sum, group) => sum + group.weight, 0));

  return {
    mentionsFreshness: freshness.length > 0,
    mentionsImplementationVerb: implementation.length > 0,
    mentionsComparison: comparison.length > 0,
    multiStep: multiStep.length > 0,
    questionAmbiguityScore: Math.round(ambiguityScore * 100) / 100,
    lengthBucket: bucketLength(text.length),
    questionCount: (text.match(/\?/g) ?? []).length,
    hasCodeSelection: context.hasCodeSelection ?? false,
    recentSession: context.sessionAgeMinutes !== undefined && context.sessionAgeMinutes <= recentLimit,
    matchedSignals: [...freshness, ...implementation, ...multiStep, ...ambiguity, ...comparison]
      .map(group => group.id),
  };
}

/**
 * Content-agnostic digest for dedup metrics. Whitespace and case are normalized
 * so trivially re-typed prompts collide.
 */
export function hashPrompt(prompt: string): string {
  const normalized = prompt.trim().toLowerCase().replace(/\s+/g, ' ');
  return createHash('sha256').update(normalized).digest('hex');
}

export const PromptFeaturesSchema = z.object({
  mentionsFreshness: z.boolean(),
  mentionsImplementationVerb: z.boolean(),
  mentionsComparison: z.boolean().default(false),
  multiStep: z.boolean().default(false),
  questionAmbiguityScore: z.number().min(0).max(1),
  lengthBucket: z.enum(['short', 'medium', 'long']),
  questionCount: z.number().int().min(0).default(0),
  hasCodeSelection: z.boolean().default(false),
  recentSession: z.boolean().default(false),
  matchedSignals: z.array(z.string().max(64)).max(64).default([]),
}).strict();

/**
 * Validates a caller-supplied feature record. Unknown keys are rejected so
 * raw prompt fields cannot slip through.
 *
 * @throws InvalidFeatureInputError
 */
export function validateFeatures(input: unknown): PromptFeatures {
  const result = PromptFeaturesSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new InvalidFeatureInputError('Malformed prompt feature record', issues);
  }
  return result.data;
}
