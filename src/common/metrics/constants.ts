export const CHAT_METRIC_REQUESTS_TOTAL = 'chat_requests_total';
export const CHAT_METRIC_DISPATCH_ATTEMPTS_TOTAL = 'chat_dispatch_attempts_total';
export const CHAT_METRIC_FALLBACK_TOTAL = 'chat_fallback_total';
export const CHAT_METRIC_DISPATCH_LATENCY_SECONDS = 'chat_dispatch_latency_seconds';
export const CHAT_METRIC_COMPLEXITY_SCORE = 'chat_complexity_score';
export const CHAT_METRIC_FEEDBACK_RECEIVED_TOTAL = 'chat_feedback_received_total';
export const CHAT_METRIC_TOKENS_TOTAL = 'chat_tokens_total';

export const CHAT_DISPATCH_LATENCY_BUCKETS = [0.25, 0.5, 1, 2, 3, 5, 8, 13, 21, 30] as const;
export const CHAT_COMPLEXITY_SCORE_BUCKETS = [0, 1, 2, 3, 4, 5, 6, 8] as const;
