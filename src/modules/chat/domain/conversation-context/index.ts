export {
  ConversationContext,
  type ChatRole,
  type ContextLimits,
  type ContextTurn,
} from './conversation-context';
