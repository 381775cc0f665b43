export {
  scoreChannels,
  logistic,
  HEURISTICS,
  type Heuristic,
  type Contribution,
  type ScoringResult,
} from './rule-scorer.js';
