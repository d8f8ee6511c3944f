export {
  score,
  scoreQuery,
  type ComplexityAnalysis,
  type MatchedSignal,
} from './complexity-scorer';
export {
  DEFAULT_COMPLEXITY_KEYWORDS,
  DEFAULT_SCORER_CONFIG,
  DEFAULT_SCORING_SIGNALS,
  type ScorerConfig,
  type ScoringSignal,
  type ScoringSignalName,
} from './scoring-signals';
