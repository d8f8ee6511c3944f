import type { ChatRole, ContextTurn } from '../../domain/conversation-context';
import type { FollowUpSuggestion } from '../../domain/suggestions';

export interface ChatSessionRecord {
  id: string;
  userId: string | null;
  title: string;
  createdAt: string;
  updatedAt: string;
  isActive: boolean;
  messageCount: number;
  lastMessage: string | null;
}

export interface StoredMessage {
  id: string;
  sessionId: string;
  role: ChatRole;
  content: string;
  modelUsed: string | null;
  complexityScore: number | null;
  tokenCount: number | null;
  latencyMs: number | null;
  timestamp: string;
  metadata: Record<string, unknown>;
}

/** One side of a completed exchange, handed to persistence after a successful dispatch. */
export interface TurnRecord {
  role: ChatRole;
  content: string;
  modelUsed: string | null;
  complexityScore: number | null;
  tokenCount: number | null;
  latencyMs: number | null;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface PersistTurnResult {
  /** Ids in the same order as the records passed in. */
  messageIds: string[];
}

export interface ChatPersistencePort {
  createSession(input: { title?: string; userId?: string }): Promise<ChatSessionRecord>;
  getSession(sessionId: string): Promise<ChatSessionRecord | null>;
  listSessions(input: { limit: number; offset: number }): Promise<ChatSessionRecord[]>;
  renameSession(sessionId: string, title: string): Promise<ChatSessionRecord | null>;
  deleteSession(sessionId: string): Promise<boolean>;
  getConversationHistory(input: { sessionId: string; limit: number }): Promise<ContextTurn[]>;
  getSessionMessages(sessionId: string): Promise<StoredMessage[]>;
  persistTurn(sessionId: string, records: TurnRecord[]): Promise<PersistTurnResult>;
  countMessages(sessionId: string): Promise<number>;
  saveSuggestions(input: { messageId: string; suggestions: FollowUpSuggestion[] }): Promise<void>;
  getSuggestions(messageId: string): Promise<FollowUpSuggestion[]>;
  checkHealth(): Promise<boolean>;
}
