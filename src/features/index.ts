export {
  extractFeatures,
  hashPrompt,
  validateFeatures,
  bucketLength,
  PromptFeaturesSchema,
  LENGTH_THRESHOLDS,
  type PromptContext,
  type ExtractOptions,
} from './extractor.js';

export {
  PROMPT_SIGNALS,
  matchesGroup,
  matchFamily,
  type SignalFamily,
  type SignalGroup,
} from './signals.js';
