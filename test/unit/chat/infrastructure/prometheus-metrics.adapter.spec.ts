import { PrometheusMetricsAdapter } from '@/modules/chat/infrastructure/adapters/metrics/prometheus-metrics.adapter';

describe('PrometheusMetricsAdapter', () => {
  it('renders counters with their labels', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.incrementChatRequest({ model: 'gpt-4', outcome: 'succeeded', autoSelected: true });
    metrics.incrementChatRequest({ model: 'gpt-4', outcome: 'succeeded', autoSelected: true });
    metrics.incrementChatRequest({ model: 'gpt-35-turbo', outcome: 'fell_back', autoSelected: false });
    metrics.incrementDispatchAttempt({ model: 'gpt-4', result: 'transient' });
    metrics.incrementFallback('retries_exhausted');
    metrics.addTokens({ model: 'gpt-4', tokens: 120 });
    metrics.addTokens({ model: 'gpt-4', tokens: 0 });
    metrics.incrementFeedbackReceived({ helpful: true });
    metrics.incrementFeedbackReceived({ helpful: null });

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).toContain('# TYPE chat_requests_total counter');
    expect(lines).toContain('chat_requests_total{model="gpt-4",outcome="succeeded",auto_selected="true"} 2');
    expect(lines).toContain(
      'chat_requests_total{model="gpt-35-turbo",outcome="fell_back",auto_selected="false"} 1',
    );
    expect(lines).toContain('chat_dispatch_attempts_total{model="gpt-4",result="transient"} 1');
    expect(lines).toContain('chat_fallback_total{reason="retries_exhausted"} 1');
    expect(lines).toContain('chat_tokens_total{model="gpt-4"} 120');
    expect(lines).toContain('chat_feedback_received_total{helpful="true"} 1');
    expect(lines).toContain('chat_feedback_received_total{helpful="unknown"} 1');
  });

  it('renders cumulative histogram buckets', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.observeComplexityScore(3);
    metrics.observeDispatchLatency({ model: 'gpt-4', seconds: 0.4 });

    const lines = metrics.renderPrometheus().split('\n');

    expect(lines).not.toContain('chat_complexity_score_bucket{le="2"} 1');
    expect(lines).toContain('chat_complexity_score_bucket{le="3"} 1');
    expect(lines).toContain('chat_complexity_score_bucket{le="+Inf"} 1');
    expect(lines).toContain('chat_complexity_score_sum 3');
    expect(lines).toContain('chat_complexity_score_count 1');
    expect(lines).toContain('chat_dispatch_latency_seconds_bucket{model="gpt-4",le="0.5"} 1');
    expect(lines).toContain('chat_dispatch_latency_seconds_sum{model="gpt-4"} 0.4');
    expect(lines).toContain('chat_dispatch_latency_seconds_count{model="gpt-4"} 1');
  });

  it('escapes label values', () => {
    const metrics = new PrometheusMetricsAdapter();

    metrics.incrementFallback('odd"reason|x');

    expect(metrics.renderPrometheus()).toContain('chat_fallback_total{reason="odd\\"reason_x"} 1');
  });
});
