export {
  buildFollowUpSuggestions,
  MAX_FOLLOW_UP_SUGGESTIONS,
  type FollowUpSuggestion,
  type SuggestionCategory,
} from './follow-up-suggestions';
