export {
  WeightStore,
  clampWeight,
  emaStep,
  weightKey,
  DEFAULT_WEIGHT,
  MIN_WEIGHT,
  MAX_WEIGHT,
  type WeightStoreOptions,
  type FeedbackResult,
} from './weight-store.js';
