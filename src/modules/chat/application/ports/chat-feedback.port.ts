export interface PersistFeedbackInput {
  sessionId: string;
  messageId?: string;
  rating: number;
  comment?: string;
  wasHelpful?: boolean;
  requestId: string;
}

export interface FeedbackRecord {
  id: string;
  sessionId: string;
  messageId: string | null;
  rating: number;
  comment: string | null;
  wasHelpful: boolean | null;
  createdAt: string;
}

export interface FeedbackStats {
  totalFeedback: number;
  averageRating: number;
  helpfulCount: number;
  helpfulRatio: number;
}

export interface ChatFeedbackPort {
  /** Fails with FeedbackTargetError when the session or message does not match. */
  persistFeedback(input: PersistFeedbackInput): Promise<FeedbackRecord>;
  getSessionFeedback(sessionId: string): Promise<FeedbackRecord[]>;
  getFeedbackStats(): Promise<FeedbackStats>;
}
