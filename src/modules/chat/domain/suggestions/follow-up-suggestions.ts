export type SuggestionCategory = 'follow_up' | 'clarification' | 'related_topic';

export interface FollowUpSuggestion {
  text: string;
  category: SuggestionCategory;
}

export const MAX_FOLLOW_UP_SUGGESTIONS = 3;

const CODE_PATTERN = /\bcode\b|```/i;
const ERROR_PATTERN = /\b(?:error|exception)s?\b/i;

const CODE_SUGGESTIONS: FollowUpSuggestion[] = [
  { text: 'Can you explain this code step by step?', category: 'clarification' },
  { text: 'How can I optimize this code?', category: 'follow_up' },
];

const ERROR_SUGGESTIONS: FollowUpSuggestion[] = [
  { text: 'What causes this error?', category: 'clarification' },
  { text: 'How can I prevent this in the future?', category: 'follow_up' },
];

const GENERIC_SUGGESTIONS: FollowUpSuggestion[] = [
  { text: 'Tell me more about this topic', category: 'related_topic' },
  { text: 'Can you provide an example?', category: 'clarification' },
  { text: 'What are the best practices?', category: 'follow_up' },
];

/**
 * Rule-based follow-up prompts for an assistant reply.
 * Code rules come before error rules; generic prompts only when neither matches.
 */
export function buildFollowUpSuggestions(assistantReply: string): FollowUpSuggestion[] {
  const suggestions: FollowUpSuggestion[] = [];

  if (CODE_PATTERN.test(assistantReply)) {
    suggestions.push(...CODE_SUGGESTIONS);
  }

  if (ERROR_PATTERN.test(assistantReply)) {
    suggestions.push(...ERROR_SUGGESTIONS);
  }

  if (suggestions.length === 0) {
    suggestions.push(...GENERIC_SUGGESTIONS);
  }

  return suggestions.slice(0, MAX_FOLLOW_UP_SUGGESTIONS).map((suggestion) => ({ ...suggestion }));
}
