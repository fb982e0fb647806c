import type { AggregateStatistics, EndpointSpec, RequestOutcome, RunStatistics, TestConfig } from './types.js';
import { TemplateResolver } from './resolver.js';
import { RequestExecutor } from './executor.js';
import { MetricsCollector, aggregateRuns } from './metrics.js';
import { runEndpoint } from './endpoint-runner.js';
import { type Rng, createRng } from './random.js';

export interface Completion<T> {
  /** Position of the task in the submitted list. */
  index: number;
  result: PromiseSettledResult<T>;
}

/**
 * Runs `tasks` with at most `concurrency` in flight. Results are returned in
 * completion order; a rejected task does not stop the others.
 *
 * A throwing `onComplete` does not stop the pool either: every task still
 * runs, and the hook errors are rethrown together once all workers are idle.
 */
export async function runConcurrent<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number,
  onComplete?: (completion: Completion<T>) => void,
): Promise<Completion<T>[]> {
  const completions: Completion<T>[] = [];
  const hookErrors: unknown[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      let result: PromiseSettledResult<T>;
      try {
        result = { status: 'fulfilled', value: await tasks[index]() };
      } catch (reason) {
        result = { status: 'rejected', reason };
      }
      const completion = { index, result };
      completions.push(completion);
      try {
        onComplete?.(completion);
      } catch (error) {
        hookErrors.push(error);
      }
    }
  };

  const poolSize = Math.max(1, Math.min(concurrency, tasks.length));
  await Promise.all(Array.from({ length: poolSize }, () => worker()));

  if (hookErrors.length > 0) {
    throw new AggregateError(hookErrors, `${hookErrors.length} completion hook(s) failed`);
  }
  return completions;
}

export interface RunOptions {
  resolver?: TemplateResolver;
  executor?: RequestExecutor;
  rng?: Rng;
  errorLimit?: number;
  sleep?: (ms: number) => Promise<void>;
  onEndpointComplete?: (endpoint: EndpointSpec, outcomes: RequestOutcome[]) => void;
  onTaskError?: (endpoint: EndpointSpec, error: unknown) => void;
}

/**
 * One full pass over every endpoint. Endpoint tasks share the config, the
 * resolver and the executor; each owns its own outcome list until it
 * completes.
 */
export async function runTests(config: TestConfig, options: RunOptions = {}): Promise<RunStatistics> {
  const resolver = options.resolver ?? new TemplateResolver(config, { rng: options.rng ?? createRng(config.seed) });
  const executor = options.executor ?? new RequestExecutor();
  const metrics = new MetricsCollector();

  const tasks = config.endpoints.map(endpoint => () =>
    runEndpoint(endpoint, { config, resolver, executor, sleep: options.sleep }),
  );

  metrics.start();

  const taskFailed = (endpoint: EndpointSpec, error: unknown) => {
    metrics.recordTaskError();
    options.onTaskError?.(endpoint, error);
  };

  await runConcurrent(tasks, config.numWorkers, ({ index, result }) => {
    const endpoint = config.endpoints[index];
    if (result.status === 'rejected') {
      taskFailed(endpoint, result.reason);
      return;
    }
    metrics.record(result.value);
    try {
      options.onEndpointComplete?.(endpoint, result.value);
    } catch (error) {
      taskFailed(endpoint, error);
    }
  });

  return metrics.getResult({ errorLimit: options.errorLimit });
}

export interface SuiteOptions extends RunOptions {
  errorPreview?: number;
  onRunStart?: (run: number, total: number) => void;
  onRunComplete?: (run: number, stats: RunStatistics) => void | Promise<void>;
}

export interface SuiteResult {
  runs: RunStatistics[];
  aggregate: AggregateStatistics;
}

/** Repeats `runTests` `config.numTestRuns` times and combines the results. */
export async function runSuite(config: TestConfig, options: SuiteOptions = {}): Promise<SuiteResult> {
  const rng = options.rng ?? createRng(config.seed);
  const resolver = options.resolver ?? new TemplateResolver(config, { rng });
  const executor = options.executor ?? new RequestExecutor();
  const runs: RunStatistics[] = [];

  for (let run = 1; run <= config.numTestRuns; run++) {
    options.onRunStart?.(run, config.numTestRuns);
    const stats = await runTests(config, { ...options, resolver, executor });
    runs.push(stats);
    await options.onRunComplete?.(run, stats);
  }

  return { runs, aggregate: aggregateRuns(runs, { errorPreview: options.errorPreview }) };
}
