import type {
  AggregateStatistics,
  EndpointSummary,
  ErrorRecord,
  LatencyStats,
  RequestOutcome,
  RunStatistics,
  RunSummary,
} from './types.js';

/** Error records kept per run. */
export const DEFAULT_ERROR_LIMIT = 100;
/** Error records kept in the combined view across runs. */
export const DEFAULT_ERROR_PREVIEW = 10;

export function calculateLatencyStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

function percentile(sorted: number[], p: number): number {
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

export function successRate(successful: number, total: number): number {
  return total > 0 ? (successful / total) * 100 : 0;
}

function toErrorRecord(outcome: RequestOutcome): ErrorRecord {
  const record: ErrorRecord = {
    endpoint: outcome.endpoint,
    method: outcome.method,
    error: outcome.error ?? 'Unknown error',
  };
  if (outcome.statusCode !== undefined) record.statusCode = outcome.statusCode;
  if (outcome.requestData !== undefined) record.requestData = outcome.requestData;
  return record;
}

function summarizeEndpoints(outcomes: RequestOutcome[]): EndpointSummary[] {
  const groups = new Map<string, { summary: EndpointSummary; latencies: number[] }>();

  for (const outcome of outcomes) {
    const key = `${outcome.method} ${outcome.name}`;
    let group = groups.get(key);
    if (!group) {
      group = {
        summary: {
          name: outcome.name,
          method: outcome.method,
          totalRequests: 0,
          successfulRequests: 0,
          failedRequests: 0,
          avgTime: 0,
        },
        latencies: [],
      };
      groups.set(key, group);
    }
    group.summary.totalRequests++;
    if (outcome.success) {
      group.summary.successfulRequests++;
      group.latencies.push(outcome.responseTime);
    } else {
      group.summary.failedRequests++;
    }
  }

  return [...groups.values()].map(({ summary, latencies }) => ({
    ...summary,
    avgTime: calculateLatencyStats(latencies).avg,
  }));
}

export interface RunStatisticsOptions {
  durationMs?: number;
  errorLimit?: number;
  /** Endpoint tasks that failed before producing outcomes. */
  taskErrors?: number;
}

/**
 * Summarises one run. Latency figures cover successful requests only and
 * are all zero when nothing succeeded.
 */
export function computeRunStatistics(
  outcomes: RequestOutcome[],
  options: RunStatisticsOptions = {},
): RunStatistics {
  const errorLimit = options.errorLimit ?? DEFAULT_ERROR_LIMIT;
  const durationMs = options.durationMs ?? 0;

  const successful = outcomes.filter(o => o.success);
  const failed = outcomes.filter(o => !o.success);
  const responseTimes = successful.map(o => o.responseTime);
  const stats = calculateLatencyStats(responseTimes);

  return {
    totalRequests: outcomes.length,
    successfulRequests: successful.length,
    failedRequests: failed.length,
    minTime: stats.min,
    maxTime: stats.max,
    avgTime: stats.avg,
    p50: stats.p50,
    p95: stats.p95,
    p99: stats.p99,
    responseTimes,
    noSuccessfulRequests: successful.length === 0,
    errors: failed.slice(0, errorLimit).map(toErrorRecord),
    endpoints: summarizeEndpoints(outcomes),
    taskErrors: options.taskErrors ?? 0,
    durationMs,
    throughput: durationMs > 0 ? outcomes.length / (durationMs / 1000) : 0,
  };
}

export class MetricsCollector {
  private outcomes: RequestOutcome[] = [];
  private taskErrors = 0;
  private startTime: number = 0;

  start(): void {
    this.startTime = performance.now();
  }

  record(outcomes: RequestOutcome[]): void {
    // not push(...outcomes): large lists exceed the engine's argument limit
    for (const outcome of outcomes) {
      this.outcomes.push(outcome);
    }
  }

  recordTaskError(): void {
    this.taskErrors++;
  }

  getResult(options: Omit<RunStatisticsOptions, 'durationMs' | 'taskErrors'> = {}): RunStatistics {
    const durationMs = performance.now() - this.startTime;
    return computeRunStatistics(this.outcomes, { ...options, durationMs, taskErrors: this.taskErrors });
  }

  reset(): void {
    this.outcomes = [];
    this.taskErrors = 0;
    this.startTime = 0;
  }
}

/**
 * Combines several runs. Latency figures are recomputed over the
 * concatenated samples of every run, not averaged across runs.
 */
export function aggregateRuns(
  runs: RunStatistics[],
  options: { errorPreview?: number } = {},
): AggregateStatistics {
  const errorPreview = options.errorPreview ?? DEFAULT_ERROR_PREVIEW;

  const totalRequests = runs.reduce((sum, r) => sum + r.totalRequests, 0);
  const successfulRequests = runs.reduce((sum, r) => sum + r.successfulRequests, 0);
  const failedRequests = runs.reduce((sum, r) => sum + r.failedRequests, 0);
  const taskErrors = runs.reduce((sum, r) => sum + r.taskErrors, 0);
  const responseTimes = runs.flatMap(r => r.responseTimes);
  const allErrors = runs.flatMap(r => r.errors);
  const stats = calculateLatencyStats(responseTimes);

  const summaries: RunSummary[] = runs.map((r, index) => ({
    run: index + 1,
    totalRequests: r.totalRequests,
    successfulRequests: r.successfulRequests,
    successRate: successRate(r.successfulRequests, r.totalRequests),
    avgTime: r.avgTime,
  }));

  return {
    runCount: runs.length,
    totalRequests,
    successfulRequests,
    failedRequests,
    successRate: successRate(successfulRequests, totalRequests),
    minTime: stats.min,
    maxTime: stats.max,
    avgTime: stats.avg,
    p50: stats.p50,
    p95: stats.p95,
    p99: stats.p99,
    responseTimes,
    noSuccessfulRequests: successfulRequests === 0,
    errors: allErrors.slice(0, errorPreview),
    totalErrors: failedRequests,
    taskErrors,
    runs: summaries,
  };
}
