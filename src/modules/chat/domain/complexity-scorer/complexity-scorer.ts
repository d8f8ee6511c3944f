import {
  DEFAULT_SCORER_CONFIG,
  DEFAULT_SCORING_SIGNALS,
  type ScorerConfig,
  type ScoringSignal,
  type ScoringSignalName,
} from './scoring-signals';

export interface MatchedSignal {
  name: ScoringSignalName;
  points: number;
  description: string;
}

export interface ComplexityAnalysis {
  score: number;
  signals: MatchedSignal[];
  length: number;
  /** True when `scoreCap` lowered the raw sum. */
  capped: boolean;
}

/**
 * Sums the points of every signal that matches. Each signal contributes at most once.
 */
export function scoreQuery(
  text: string,
  config: ScorerConfig = DEFAULT_SCORER_CONFIG,
  signals: readonly ScoringSignal[] = DEFAULT_SCORING_SIGNALS,
): ComplexityAnalysis {
  const matched: MatchedSignal[] = signals
    .filter((signal) => signal.matches(text, config))
    .map((signal) => ({
      name: signal.name,
      points: signal.points,
      description: signal.describe(config),
    }));

  const rawScore = matched.reduce((total, signal) => total + signal.points, 0);
  const cap = config.scoreCap;
  const score = typeof cap === 'number' ? Math.min(rawScore, cap) : rawScore;

  return {
    score,
    signals: matched,
    length: text.length,
    capped: score < rawScore,
  };
}

export function score(text: string, config: ScorerConfig = DEFAULT_SCORER_CONFIG): number {
  return scoreQuery(text, config).score;
}
