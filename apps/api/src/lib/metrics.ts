/**
 * Prometheus metrics for the Questline API and award worker
 *
 * Provides SLI tracking for:
 * - Award pipeline outcomes and duration
 * - Ledger duplicate deliveries
 * - Badge awards
 * - Rank cache write retries and dead-lettered jobs
 */

import client from 'prom-client';

export const metricsRegistry = new client.Registry();

// Add default metrics (process, gc, etc.)
client.collectDefaultMetrics({ register: metricsRegistry });

// ============================================================================
// Award Pipeline Metrics
// ============================================================================

/**
 * Counter for pipeline runs
 * Labels: outcome (passed/failed/noop/resumed)
 */
export const awardOutcomeTotal = new client.Counter({
  name: 'questline_award_outcome_total',
  help: 'Total number of award pipeline runs by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const awardPipelineDurationSeconds = new client.Histogram({
  name: 'questline_award_pipeline_duration_seconds',
  help: 'Duration of award pipeline runs in seconds',
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [metricsRegistry],
});

/**
 * Ledger writes that hit an existing entry for the attempt
 */
export const ledgerDuplicateTotal = new client.Counter({
  name: 'questline_ledger_duplicate_total',
  help: 'Award applications skipped because the attempt was already in the ledger',
  registers: [metricsRegistry],
});

export const badgesAwardedTotal = new client.Counter({
  name: 'questline_badges_awarded_total',
  help: 'Total number of badges awarded',
  labelNames: ['condition_type'] as const,
  registers: [metricsRegistry],
});

export const rankCacheRetryTotal = new client.Counter({
  name: 'questline_rank_cache_retry_total',
  help: 'Rank cache writes retried after a failure',
  registers: [metricsRegistry],
});

// ============================================================================
// Job Dispatch Metrics
// ============================================================================

/**
 * Labels: stage (enqueue/worker)
 */
export const jobFailureTotal = new client.Counter({
  name: 'questline_job_failure_total',
  help: 'Award job failures by stage',
  labelNames: ['stage'] as const,
  registers: [metricsRegistry],
});

export const deadLetterTotal = new client.Counter({
  name: 'questline_dead_letter_total',
  help: 'Award jobs moved to the dead-letter queue',
  registers: [metricsRegistry],
});

export const reconciledAttemptsTotal = new client.Counter({
  name: 'questline_reconciled_attempts_total',
  help: 'Stale submitted attempts re-enqueued by the reconciliation sweep',
  registers: [metricsRegistry],
});

// ============================================================================
// API Request Metrics
// ============================================================================

/**
 * Labels: method, route, status_code
 */
export const httpRequestDurationSeconds = new client.Histogram({
  name: 'questline_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [metricsRegistry],
});

export const httpRequestTotal = new client.Counter({
  name: 'questline_http_request_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [metricsRegistry],
});

// ============================================================================
// Helper Functions
// ============================================================================

export type AwardOutcomeLabel = 'passed' | 'failed' | 'noop' | 'resumed';

export function recordAwardOutcome(outcome: AwardOutcomeLabel, durationSeconds?: number) {
  awardOutcomeTotal.inc({ outcome });
  if (durationSeconds !== undefined) {
    awardPipelineDurationSeconds.observe(durationSeconds);
  }
}

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number
) {
  const labels = {
    method,
    route: normalizeRoute(route),
    status_code: String(statusCode),
  };
  httpRequestTotal.inc(labels);
  httpRequestDurationSeconds.observe(labels, durationSeconds);
}

/**
 * Normalize route for metrics (replace IDs with placeholders)
 */
export function normalizeRoute(route: string): string {
  return route
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
    .replace(/\/\d+/g, '/:id');
}

export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}
