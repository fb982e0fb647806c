import type { RequestOutcome, TestConfig } from '../../src/types.js';

export const BASE_URL = 'http://api.test/v1';

export function makeConfig(overrides: Partial<TestConfig> = {}): TestConfig {
  return {
    baseUrl: BASE_URL,
    endpoints: [{ name: 'Health', method: 'GET', path: '/health', jsonContent: true }],
    numWorkers: 2,
    requestsPerEndpoint: 1,
    numTestRuns: 1,
    defaultHeaders: { Accept: 'application/json' },
    variables: {},
    generators: {},
    datasets: {},
    ranges: {},
    timeout: 10,
    scenarios: {},
    report: { outputDir: 'reports', includeRequestDetails: true },
    baseDir: process.cwd(),
    ...overrides,
  };
}

export function makeOutcome(overrides: Partial<RequestOutcome> = {}): RequestOutcome {
  return {
    name: 'Health',
    endpoint: `${BASE_URL}/health`,
    method: 'GET',
    success: true,
    statusCode: 200,
    responseTime: 10,
    ...overrides,
  };
}

export function failedOutcome(overrides: Partial<RequestOutcome> = {}): RequestOutcome {
  return makeOutcome({
    success: false,
    statusCode: 500,
    error: '500 Server Error: Internal Server Error for url: http://api.test/v1/health',
    ...overrides,
  });
}
