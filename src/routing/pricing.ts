/**
 * Model pricing for cost estimates and downgrade savings
 */

export interface ModelPricing {
  inputPer1k: number;
  outputPer1k: number;
}

export type PricingTable = Record<string, ModelPricing>;

/**
 * Default model pricing per 1k tokens (USD)
 */
export const DEFAULT_MODEL_PRICING: PricingTable = {
  'anthropic/claude-3-haiku': { inputPer1k: 0.00025, outputPer1k: 0.00125 },
  'anthropic/claude-3-opus': { inputPer1k: 0.015, outputPer1k: 0.075 },
  'anthropic/claude-sonnet-4': { inputPer1k: 0.003, outputPer1k: 0.015 },
  'anthropic/claude-opus-4': { inputPer1k: 0.015, outputPer1k: 0.075 },

  'openai/gpt-3.5-turbo': { inputPer1k: 0.0005, outputPer1k: 0.0015 },
  'openai/gpt-4': { inputPer1k: 0.03, outputPer1k: 0.06 },
  'openai/gpt-4-turbo': { inputPer1k: 0.01, outputPer1k: 0.03 },
  'openai/gpt-4o': { inputPer1k: 0.0025, outputPer1k: 0.01 },
  'openai/gpt-4o-mini': { inputPer1k: 0.00015, outputPer1k: 0.0006 },

  'google/gemini-2.5-flash': { inputPer1k: 0.0003, outputPer1k: 0.0025 },
  'google/gemini-2.5-pro': { inputPer1k: 0.00125, outputPer1k: 0.01 },

  'local/tiny-llama': { inputPer1k: 0, outputPer1k: 0 },
};

/** Unknown models are priced like a mid-range hosted model */
export const FALLBACK_PRICING: ModelPricing = { inputPer1k: 0.003, outputPer1k: 0.015 };

/**
 * Priority: custom overrides, built-in table, then FALLBACK_PRICING.
 */
export function getModelPricing(model: string, customPricing?: PricingTable): ModelPricing {
  return customPricing?.[model] ?? DEFAULT_MODEL_PRICING[model] ?? FALLBACK_PRICING;
}

/**
 * Plain average of input and output rate per 1k tokens
 */
export function averageRatePer1k(model: string, customPricing?: PricingTable): number {
  const pricing = getModelPricing(model, customPricing);
  return (pricing.inputPer1k + pricing.outputPer1k) / 2;
}

/**
 * Estimated USD cost of a request, rounded to 6 decimals
 */
export function estimateModelCost(
  model: string,
  inputTokens: number,
  outputTokens = 0,
  customPricing?: PricingTable
): number {
  const pricing = getModelPricing(model, customPricing);
  const total = (inputTokens / 1000) * pricing.inputPer1k + (outputTokens / 1000) * pricing.outputPer1k;
  return Math.round(total * 1_000_000) / 1_000_000;
}

/**
 * Cost saved by serving `servedModel` instead of `requestedModel`, given the
 * estimated cost on the requested model. Never negative.
 */
export function downgradeSavings(
  estimatedCost: number,
  requestedModel: string,
  servedModel: string,
  customPricing?: PricingTable
): number {
  const requestedRate = averageRatePer1k(requestedModel, customPricing);
  if (requestedRate <= 0 || estimatedCost <= 0) return 0;

  const servedRate = averageRatePer1k(servedModel, customPricing);
  return Math.max(0, estimatedCost * (1 - servedRate / requestedRate));
}

/** Rough characters-per-token ratio for English prose */
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
