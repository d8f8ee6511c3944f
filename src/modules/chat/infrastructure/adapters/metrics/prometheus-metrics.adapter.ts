import { Injectable } from '@nestjs/common';
import type {
  AttemptResult,
  ChatRequestOutcome,
  MetricsPort,
} from '../../../application/ports/metrics.port';
import {
  CHAT_COMPLEXITY_SCORE_BUCKETS,
  CHAT_DISPATCH_LATENCY_BUCKETS,
  CHAT_METRIC_COMPLEXITY_SCORE,
  CHAT_METRIC_DISPATCH_ATTEMPTS_TOTAL,
  CHAT_METRIC_DISPATCH_LATENCY_SECONDS,
  CHAT_METRIC_FALLBACK_TOTAL,
  CHAT_METRIC_FEEDBACK_RECEIVED_TOTAL,
  CHAT_METRIC_REQUESTS_TOTAL,
  CHAT_METRIC_TOKENS_TOTAL,
} from '../../../../../common/metrics/constants';

interface Histogram {
  buckets: Map<string, number>;
  sum: Map<string, number>;
  count: Map<string, number>;
}

function createHistogram(): Histogram {
  return { buckets: new Map(), sum: new Map(), count: new Map() };
}

@Injectable()
export class PrometheusMetricsAdapter implements MetricsPort {
  private readonly requests = new Map<string, number>();
  private readonly attempts = new Map<string, number>();
  private readonly fallbacks = new Map<string, number>();
  private readonly tokens = new Map<string, number>();
  private readonly feedback = new Map<string, number>();

  private readonly dispatchLatency = createHistogram();
  private readonly complexityScores = createHistogram();

  incrementChatRequest(input: {
    model: string;
    outcome: ChatRequestOutcome;
    autoSelected: boolean;
  }): void {
    const key = `${sanitizeLabelValue(input.model)}|${input.outcome}|${String(input.autoSelected)}`;
    increment(this.requests, key, 1);
  }

  incrementDispatchAttempt(input: { model: string; result: AttemptResult }): void {
    increment(this.attempts, `${sanitizeLabelValue(input.model)}|${input.result}`, 1);
  }

  observeDispatchLatency(input: { model: string; seconds: number }): void {
    const seconds = Number.isFinite(input.seconds) && input.seconds >= 0 ? input.seconds : 0;
    observe(this.dispatchLatency, sanitizeLabelValue(input.model), seconds, CHAT_DISPATCH_LATENCY_BUCKETS);
  }

  observeComplexityScore(score: number): void {
    const value = Number.isFinite(score) && score >= 0 ? score : 0;
    observe(this.complexityScores, '', value, CHAT_COMPLEXITY_SCORE_BUCKETS);
  }

  incrementFallback(reason: string): void {
    increment(this.fallbacks, sanitizeLabelValue(reason), 1);
  }

  addTokens(input: { model: string; tokens: number }): void {
    if (!Number.isFinite(input.tokens) || input.tokens <= 0) {
      return;
    }
    increment(this.tokens, sanitizeLabelValue(input.model), input.tokens);
  }

  incrementFeedbackReceived(input: { helpful: boolean | null }): void {
    const helpful = input.helpful === null ? 'unknown' : String(input.helpful);
    increment(this.feedback, helpful, 1);
  }

  renderPrometheus(): string {
    const lines: string[] = [];

    lines.push(`# HELP ${CHAT_METRIC_REQUESTS_TOTAL} Total chat requests by final model and outcome.`);
    lines.push(`# TYPE ${CHAT_METRIC_REQUESTS_TOTAL} counter`);
    for (const [key, value] of this.requests.entries()) {
      const [model, outcome, autoSelected] = key.split('|');
      lines.push(
        `${CHAT_METRIC_REQUESTS_TOTAL}{model="${model}",outcome="${outcome}",auto_selected="${autoSelected}"} ${value}`,
      );
    }

    lines.push(`# HELP ${CHAT_METRIC_DISPATCH_ATTEMPTS_TOTAL} Model invocation attempts by result.`);
    lines.push(`# TYPE ${CHAT_METRIC_DISPATCH_ATTEMPTS_TOTAL} counter`);
    for (const [key, value] of this.attempts.entries()) {
      const [model, result] = key.split('|');
      lines.push(`${CHAT_METRIC_DISPATCH_ATTEMPTS_TOTAL}{model="${model}",result="${result}"} ${value}`);
    }

    lines.push(`# HELP ${CHAT_METRIC_FALLBACK_TOTAL} Fallbacks to the secondary model by reason.`);
    lines.push(`# TYPE ${CHAT_METRIC_FALLBACK_TOTAL} counter`);
    for (const [reason, value] of this.fallbacks.entries()) {
      lines.push(`${CHAT_METRIC_FALLBACK_TOTAL}{reason="${reason}"} ${value}`);
    }

    lines.push(`# HELP ${CHAT_METRIC_TOKENS_TOTAL} Tokens reported by successful invocations.`);
    lines.push(`# TYPE ${CHAT_METRIC_TOKENS_TOTAL} counter`);
    for (const [model, value] of this.tokens.entries()) {
      lines.push(`${CHAT_METRIC_TOKENS_TOTAL}{model="${model}"} ${value}`);
    }

    lines.push(`# HELP ${CHAT_METRIC_FEEDBACK_RECEIVED_TOTAL} Feedback entries by helpfulness.`);
    lines.push(`# TYPE ${CHAT_METRIC_FEEDBACK_RECEIVED_TOTAL} counter`);
    for (const [helpful, value] of this.feedback.entries()) {
      lines.push(`${CHAT_METRIC_FEEDBACK_RECEIVED_TOTAL}{helpful="${helpful}"} ${value}`);
    }

    lines.push(`# HELP ${CHAT_METRIC_DISPATCH_LATENCY_SECONDS} Model invocation latency in seconds.`);
    lines.push(`# TYPE ${CHAT_METRIC_DISPATCH_LATENCY_SECONDS} histogram`);
    renderHistogram(lines, CHAT_METRIC_DISPATCH_LATENCY_SECONDS, this.dispatchLatency, 'model');

    lines.push(`# HELP ${CHAT_METRIC_COMPLEXITY_SCORE} Complexity score of incoming queries.`);
    lines.push(`# TYPE ${CHAT_METRIC_COMPLEXITY_SCORE} histogram`);
    renderHistogram(lines, CHAT_METRIC_COMPLEXITY_SCORE, this.complexityScores, null);

    return `${lines.join('\n')}\n`;
  }
}

function increment(target: Map<string, number>, key: string, amount: number): void {
  target.set(key, (target.get(key) ?? 0) + amount);
}

function observe(
  histogram: Histogram,
  label: string,
  value: number,
  buckets: readonly number[],
): void {
  increment(histogram.sum, label, value);
  increment(histogram.count, label, 1);

  for (const bucket of buckets) {
    if (value <= bucket) {
      increment(histogram.buckets, `${label}|${bucket}`, 1);
    }
  }
  increment(histogram.buckets, `${label}|+Inf`, 1);
}

function renderHistogram(
  lines: string[],
  name: string,
  histogram: Histogram,
  labelName: string | null,
): void {
  const labels = (label: string): string =>
    labelName === null ? '' : `${labelName}="${label}",`;
  const plainLabels = (label: string): string =>
    labelName === null ? '' : `{${labelName}="${label}"}`;

  for (const [key, value] of histogram.buckets.entries()) {
    const separator = key.lastIndexOf('|');
    const label = key.slice(0, separator);
    const bucket = key.slice(separator + 1);
    lines.push(`${name}_bucket{${labels(label)}le="${bucket}"} ${value}`);
  }
  for (const [label, value] of histogram.sum.entries()) {
    lines.push(`${name}_sum${plainLabels(label)} ${value}`);
  }
  for (const [label, value] of histogram.count.entries()) {
    lines.push(`${name}_count${plainLabels(label)} ${value}`);
  }
}

function sanitizeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\|/g, '_');
}
