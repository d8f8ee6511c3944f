import type {
  AttemptResult,
  ChatRequestOutcome,
  MetricsPort,
} from '@/modules/chat/application/ports/metrics.port';

export class RecordingMetrics implements MetricsPort {
  readonly chatRequests: Array<{ model: string; outcome: ChatRequestOutcome; autoSelected: boolean }> = [];
  readonly attempts: Array<{ model: string; result: AttemptResult }> = [];
  readonly latencies: Array<{ model: string; seconds: number }> = [];
  readonly complexityScores: number[] = [];
  readonly fallbacks: string[] = [];
  readonly tokens: Array<{ model: string; tokens: number }> = [];
  readonly feedback: Array<{ helpful: boolean | null }> = [];

  incrementChatRequest(input: { model: string; outcome: ChatRequestOutcome; autoSelected: boolean }): void {
    this.chatRequests.push(input);
  }

  incrementDispatchAttempt(input: { model: string; result: AttemptResult }): void {
    this.attempts.push(input);
  }

  observeDispatchLatency(input: { model: string; seconds: number }): void {
    this.latencies.push(input);
  }

  observeComplexityScore(score: number): void {
    this.complexityScores.push(score);
  }

  incrementFallback(reason: string): void {
    this.fallbacks.push(reason);
  }

  addTokens(input: { model: string; tokens: number }): void {
    this.tokens.push(input);
  }

  incrementFeedbackReceived(input: { helpful: boolean | null }): void {
    this.feedback.push(input);
  }
}
