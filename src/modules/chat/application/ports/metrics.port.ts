export type ChatRequestOutcome = 'succeeded' | 'fell_back' | 'failed';
export type AttemptResult = 'succeeded' | 'transient' | 'unavailable' | 'invalid_request' | 'cancelled';

export interface MetricsPort {
  incrementChatRequest(input: {
    model: string;
    outcome: ChatRequestOutcome;
    autoSelected: boolean;
  }): void;

  incrementDispatchAttempt(input: { model: string; result: AttemptResult }): void;

  observeDispatchLatency(input: { model: string; seconds: number }): void;

  observeComplexityScore(score: number): void;

  incrementFallback(reason: string): void;

  addTokens(input: { model: string; tokens: number }): void;

  incrementFeedbackReceived(input: { helpful: boolean | null }): void;
}
