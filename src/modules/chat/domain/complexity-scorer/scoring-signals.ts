export type ScoringSignalName =
  | 'long_query'
  | 'complexity_keyword'
  | 'code_block'
  | 'multiple_questions'
  | 'list_structure';

export interface ScorerConfig {
  /** Queries strictly longer than this many characters count as long. */
  lengthThreshold: number;
  minQuestionMarks: number;
  /** Lowercase keywords matched as case-insensitive substrings. */
  keywords: readonly string[];
  scoreCap?: number;
}

export interface ScoringSignal {
  name: ScoringSignalName;
  points: number;
  describe: (config: ScorerConfig) => string;
  matches: (text: string, config: ScorerConfig) => boolean;
}

export const DEFAULT_COMPLEXITY_KEYWORDS: readonly string[] = [
  'analyze',
  'explain in detail',
  'compare',
  'contrast',
  'evaluate',
  'synthesize',
  'create a plan',
  'design',
  'architect',
  'optimize',
  'debug complex',
  'refactor',
  'implement algorithm',
];

export const DEFAULT_SCORER_CONFIG: ScorerConfig = {
  lengthThreshold: 500,
  minQuestionMarks: 2,
  keywords: DEFAULT_COMPLEXITY_KEYWORDS,
};

const CODE_FENCE_PATTERN = /^[ \t]*```/m;
const LIST_ITEM_PATTERN = /^[ \t]*(?:\d+[.)]|[-*•])[ \t]/m;

export const DEFAULT_SCORING_SIGNALS: readonly ScoringSignal[] = [
  {
    name: 'long_query',
    points: 2,
    describe: (config) => `longer than ${config.lengthThreshold} characters`,
    matches: (text, config) => text.length > config.lengthThreshold,
  },
  {
    name: 'complexity_keyword',
    points: 2,
    describe: () => 'mentions a complex task',
    matches: (text, config) => {
      const normalized = text.toLowerCase();
      return config.keywords.some((keyword) => normalized.includes(keyword));
    },
  },
  {
    name: 'code_block',
    points: 1,
    describe: () => 'contains a fenced code block',
    matches: (text) => CODE_FENCE_PATTERN.test(text),
  },
  {
    name: 'multiple_questions',
    points: 1,
    describe: (config) => `asks at least ${config.minQuestionMarks} questions`,
    matches: (text, config) => countQuestionMarks(text) >= config.minQuestionMarks,
  },
  {
    name: 'list_structure',
    points: 1,
    describe: () => 'contains a numbered or bulleted list',
    matches: (text) => LIST_ITEM_PATTERN.test(text),
  },
];

function countQuestionMarks(text: string): number {
  let count = 0;
  for (const character of text) {
    if (character === '?') {
      count++;
    }
  }
  return count;
}
