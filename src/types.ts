/** A value as it appears in a configuration document. */
export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export type TemplateMap = { [key: string]: TemplateValue };

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

export interface EndpointSpec {
  name: string;
  description?: string;
  method: HttpMethod;
  path: string;
  /** Raw body template. A string starting with `@` names a file to load. */
  data?: TemplateValue;
  params?: TemplateMap;
  headers?: TemplateMap;
  /** Pause after each request, in milliseconds. */
  delay?: number;
  /** Send `data` as JSON (default) or as a url-encoded form. */
  jsonContent: boolean;
  /** Per-request timeout in seconds; falls back to the config timeout. */
  timeout?: number;
}

export interface LookupTables {
  variables: TemplateMap;
  generators: TemplateMap;
  datasets: TemplateMap;
  ranges: TemplateMap;
}

export interface ScenarioOverlay {
  numWorkers?: number;
  requestsPerEndpoint?: number;
  numTestRuns?: number;
  /** Endpoint names to keep; all endpoints when absent. */
  endpoints?: string[];
}

export interface ReportSettings {
  outputDir: string;
  includeRequestDetails: boolean;
}

export interface TestConfig extends LookupTables {
  baseUrl: string;
  endpoints: EndpointSpec[];
  numWorkers: number;
  requestsPerEndpoint: number;
  numTestRuns: number;
  defaultHeaders: Record<string, string>;
  /** Default request timeout in seconds. */
  timeout: number;
  seed?: number;
  scenarios: Record<string, ScenarioOverlay>;
  report: ReportSettings;
  /** Directory that `@file` body references are resolved against. */
  baseDir: string;
}

export interface RequestOutcome {
  name: string;
  endpoint: string;
  method: HttpMethod;
  success: boolean;
  statusCode?: number;
  /** Elapsed milliseconds from dispatch to full response receipt. */
  responseTime: number;
  error?: string;
  /** The attempted payload, kept only for failed requests. */
  requestData?: TemplateValue;
}

export interface ErrorRecord {
  endpoint: string;
  method: HttpMethod;
  statusCode?: number;
  error: string;
  requestData?: TemplateValue;
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface EndpointSummary {
  name: string;
  method: HttpMethod;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  avgTime: number;
}

export interface RunStatistics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  minTime: number;
  maxTime: number;
  avgTime: number;
  p50: number;
  p95: number;
  p99: number;
  /** Latencies of successful requests, in collection order. */
  responseTimes: number[];
  noSuccessfulRequests: boolean;
  errors: ErrorRecord[];
  endpoints: EndpointSummary[];
  /** Endpoint tasks that failed outright and contributed no outcomes. */
  taskErrors: number;
  durationMs: number;
  throughput: number;
}

export interface RunSummary {
  run: number;
  totalRequests: number;
  successfulRequests: number;
  successRate: number;
  avgTime: number;
}

export interface AggregateStatistics {
  runCount: number;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  /** Percentage in [0, 100]. */
  successRate: number;
  minTime: number;
  maxTime: number;
  avgTime: number;
  p50: number;
  p95: number;
  p99: number;
  responseTimes: number[];
  noSuccessfulRequests: boolean;
  errors: ErrorRecord[];
  totalErrors: number;
  taskErrors: number;
  runs: RunSummary[];
}
