/**
 * Prometheus metrics for the judging relay
 *
 * Provides SLI tracking for:
 * - Submission outcomes (judged / failed by reason)
 * - Verdict distribution
 * - Judging duration (upload to verdict)
 * - HTTP request duration and count
 */

import client from 'prom-client';

// Create a new registry
export const metricsRegistry = new client.Registry();

// Add default metrics (process, gc, etc.)
client.collectDefaultMetrics({ register: metricsRegistry });

// ============================================================================
// Submission Metrics
// ============================================================================

/**
 * Counter for submission outcomes
 * Labels: status (judged/failed), reason (failure reason or "none"), judge
 */
export const submissionTotal = new client.Counter({
  name: 'judgebot_submission_total',
  help: 'Total number of submissions by outcome',
  labelNames: ['status', 'reason', 'judge'] as const,
  registers: [metricsRegistry],
});

/**
 * Counter for verdicts returned by judges
 */
export const verdictTotal = new client.Counter({
  name: 'judgebot_verdict_total',
  help: 'Total number of terminal verdicts received',
  labelNames: ['verdict', 'judge'] as const,
  registers: [metricsRegistry],
});

/**
 * Histogram for judging duration, upload to verdict
 */
export const judgingDurationSeconds = new client.Histogram({
  name: 'judgebot_judging_duration_seconds',
  help: 'Time from accepted upload to terminal verdict in seconds',
  buckets: [1, 2, 5, 10, 20, 30, 60, 120, 300],
  registers: [metricsRegistry],
});

/**
 * Gauge for submissions currently in flight
 */
export const inFlightSubmissions = new client.Gauge({
  name: 'judgebot_in_flight_submissions',
  help: 'Number of submissions currently being judged',
  registers: [metricsRegistry],
});

// ============================================================================
// API Request Metrics
// ============================================================================

export const httpRequestDurationSeconds = new client.Histogram({
  name: 'judgebot_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 120],
  registers: [metricsRegistry],
});

export const httpRequestTotal = new client.Counter({
  name: 'judgebot_http_request_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [metricsRegistry],
});

/**
 * Record an HTTP request
 */
export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number
): void {
  const labels = { method, route, status_code: String(statusCode) };
  httpRequestDurationSeconds.observe(labels, durationSeconds);
  httpRequestTotal.inc(labels);
}

/**
 * Get all metrics in Prometheus exposition format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}
