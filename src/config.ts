import { readFile } from 'fs/promises';
import { dirname, resolve as resolvePath } from 'path';
import { parse as parseYaml } from 'yaml';
import { isTemplateMap } from './providers.js';
import type {
  EndpointSpec,
  HttpMethod,
  ReportSettings,
  ScenarioOverlay,
  TemplateMap,
  TemplateValue,
  TestConfig,
} from './types.js';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'];

export class ConfigError extends Error {
  field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigError';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ConfigOverrides {
  baseUrl?: string;
  numWorkers?: number;
  requestsPerEndpoint?: number;
  numTestRuns?: number;
  seed?: number;
  outputDir?: string;
  scenario?: string;
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Converts parsed YAML/JSON into a `TemplateValue`, rejecting anything else. */
export function toTemplateValue(value: unknown, path: string): TemplateValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new ConfigError(`${path} must be a finite number`, path);
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((item, i) => toTemplateValue(item, `${path}[${i}]`));
  }
  if (isRecord(value)) {
    const map: TemplateMap = {};
    for (const [key, item] of Object.entries(value)) {
      map[key] = toTemplateValue(item, `${path}.${key}`);
    }
    return map;
  }
  throw new ConfigError(`${path} has an unsupported value`, path);
}

function pickField(raw: RawRecord, snake: string, camel: string): unknown {
  return raw[snake] ?? raw[camel];
}

function templateMap(value: unknown, path: string): TemplateMap {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError(`${path} must be a mapping`, path);
  const converted = toTemplateValue(value, path);
  return isTemplateMap(converted) ? converted : {};
}

function stringMap(value: unknown, path: string): Record<string, string> {
  const map: Record<string, string> = {};
  for (const [key, item] of Object.entries(templateMap(value, path))) {
    map[key] = typeof item === 'string' ? item : JSON.stringify(item);
  }
  return map;
}

function positiveInt(value: unknown, path: string, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${path} must be a positive integer`, path);
  }
  return value;
}

function optionalNumber(value: unknown, path: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${path} must be a non-negative number`, path);
  }
  return value;
}

function parseEndpoint(raw: unknown, index: number): EndpointSpec {
  const path = `endpoints[${index}]`;
  if (!isRecord(raw)) throw new ConfigError(`${path} must be a mapping`, path);

  if (typeof raw.path !== 'string' || raw.path === '') {
    throw new ConfigError(`${path}.path is required`, `${path}.path`);
  }

  const methodName = typeof raw.method === 'string' ? raw.method.toUpperCase() : 'GET';
  const method = HTTP_METHODS.find(m => m === methodName);
  if (!method) {
    throw new ConfigError(`${path}.method "${String(raw.method)}" is not a supported HTTP method`, `${path}.method`);
  }

  const rawJsonContent = pickField(raw, 'json_content', 'jsonContent');
  let jsonContent = true;
  if (rawJsonContent !== undefined) {
    if (typeof rawJsonContent !== 'boolean') {
      throw new ConfigError(`${path}.json_content must be a boolean`, `${path}.json_content`);
    }
    jsonContent = rawJsonContent;
  }

  const endpoint: EndpointSpec = {
    name: typeof raw.name === 'string' && raw.name !== '' ? raw.name : `${method} ${raw.path}`,
    method,
    path: raw.path,
    jsonContent,
  };

  if (typeof raw.description === 'string') endpoint.description = raw.description;
  if (raw.data !== undefined) endpoint.data = toTemplateValue(raw.data, `${path}.data`);
  if (raw.params !== undefined) endpoint.params = templateMap(raw.params, `${path}.params`);
  if (raw.headers !== undefined) endpoint.headers = templateMap(raw.headers, `${path}.headers`);

  const delay = optionalNumber(raw.delay, `${path}.delay`);
  if (delay !== undefined) endpoint.delay = delay;
  const timeout = optionalNumber(raw.timeout, `${path}.timeout`);
  if (timeout !== undefined) endpoint.timeout = timeout;

  return endpoint;
}

function parseScenarios(value: unknown): Record<string, ScenarioOverlay> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new ConfigError('scenarios must be a mapping', 'scenarios');

  const scenarios: Record<string, ScenarioOverlay> = {};
  for (const [name, raw] of Object.entries(value)) {
    const path = `scenarios.${name}`;
    if (!isRecord(raw)) throw new ConfigError(`${path} must be a mapping`, path);

    const overlay: ScenarioOverlay = {};
    const workers = pickField(raw, 'num_workers', 'numWorkers');
    const requests = pickField(raw, 'requests_per_endpoint', 'requestsPerEndpoint');
    const runs = pickField(raw, 'num_test_runs', 'numTestRuns');
    if (workers !== undefined) overlay.numWorkers = positiveInt(workers, `${path}.num_workers`, 1);
    if (requests !== undefined) overlay.requestsPerEndpoint = positiveInt(requests, `${path}.requests_per_endpoint`, 1);
    if (runs !== undefined) overlay.numTestRuns = positiveInt(runs, `${path}.num_test_runs`, 1);
    if (Array.isArray(raw.endpoints)) {
      overlay.endpoints = raw.endpoints.filter((e): e is string => typeof e === 'string');
    }
    scenarios[name] = overlay;
  }
  return scenarios;
}

function parseReport(value: unknown): ReportSettings {
  const raw = isRecord(value) ? value : {};
  const outputDir = pickField(raw, 'output_dir', 'outputDir');
  const details = pickField(raw, 'include_request_details', 'includeRequestDetails');
  return {
    outputDir: typeof outputDir === 'string' && outputDir !== '' ? outputDir : 'reports',
    includeRequestDetails: typeof details === 'boolean' ? details : true,
  };
}

/**
 * Builds a `TestConfig` from a parsed configuration document. Keys may be
 * written in snake_case (as in YAML files) or camelCase.
 */
export function parseConfig(raw: unknown, baseDir = process.cwd()): TestConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a mapping');
  }

  const baseUrl = pickField(raw, 'base_url', 'baseUrl');
  if (typeof baseUrl !== 'string' || baseUrl === '') {
    throw new ConfigError('base_url is required', 'base_url');
  }

  if (!Array.isArray(raw.endpoints) || raw.endpoints.length === 0) {
    throw new ConfigError('endpoints must be a non-empty list', 'endpoints');
  }

  let seed: number | undefined;
  if (raw.seed !== undefined && raw.seed !== null) {
    if (typeof raw.seed !== 'number' || !Number.isInteger(raw.seed)) {
      throw new ConfigError('seed must be an integer', 'seed');
    }
    seed = raw.seed;
  }

  return {
    baseUrl,
    endpoints: raw.endpoints.map((endpoint, i) => parseEndpoint(endpoint, i)),
    numWorkers: positiveInt(pickField(raw, 'num_workers', 'numWorkers'), 'num_workers', 10),
    requestsPerEndpoint: positiveInt(
      pickField(raw, 'requests_per_endpoint', 'requestsPerEndpoint'),
      'requests_per_endpoint',
      100,
    ),
    numTestRuns: positiveInt(pickField(raw, 'num_test_runs', 'numTestRuns'), 'num_test_runs', 5),
    defaultHeaders: stringMap(pickField(raw, 'default_headers', 'defaultHeaders'), 'default_headers'),
    variables: templateMap(raw.variables, 'variables'),
    generators: templateMap(raw.generators, 'generators'),
    datasets: templateMap(raw.datasets, 'datasets'),
    ranges: templateMap(raw.ranges, 'ranges'),
    timeout: optionalNumber(raw.timeout, 'timeout') ?? 10,
    seed,
    scenarios: parseScenarios(raw.scenarios),
    report: parseReport(raw.report),
    baseDir,
  };
}

function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`, name);
  }
  return parsed;
}

/** Overrides read from PERF_* environment variables. */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (env.PERF_BASE_URL) overrides.baseUrl = env.PERF_BASE_URL;
  const workers = parseIntEnv(env.PERF_WORKERS, 'PERF_WORKERS');
  const requests = parseIntEnv(env.PERF_REQUESTS, 'PERF_REQUESTS');
  const runs = parseIntEnv(env.PERF_RUNS, 'PERF_RUNS');
  const seed = parseIntEnv(env.PERF_SEED, 'PERF_SEED');
  if (workers !== undefined) overrides.numWorkers = workers;
  if (requests !== undefined) overrides.requestsPerEndpoint = requests;
  if (runs !== undefined) overrides.numTestRuns = runs;
  if (seed !== undefined) overrides.seed = seed;
  if (env.PERF_OUTPUT_DIR) overrides.outputDir = env.PERF_OUTPUT_DIR;
  return overrides;
}

/**
 * Applies a named scenario, then explicit overrides, on top of a parsed
 * config.
 */
export function applyOverrides(config: TestConfig, overrides: ConfigOverrides = {}): TestConfig {
  const result: TestConfig = { ...config };

  if (overrides.scenario !== undefined) {
    const scenario = config.scenarios[overrides.scenario];
    if (!scenario) {
      const known = Object.keys(config.scenarios).join(', ') || 'none defined';
      throw new ConfigError(`Unknown scenario "${overrides.scenario}" (available: ${known})`, 'scenario');
    }
    if (scenario.numWorkers !== undefined) result.numWorkers = scenario.numWorkers;
    if (scenario.requestsPerEndpoint !== undefined) result.requestsPerEndpoint = scenario.requestsPerEndpoint;
    if (scenario.numTestRuns !== undefined) result.numTestRuns = scenario.numTestRuns;
    if (scenario.endpoints) {
      const names = new Set(scenario.endpoints);
      result.endpoints = config.endpoints.filter(e => names.has(e.name));
      if (result.endpoints.length === 0) {
        throw new ConfigError(`Scenario "${overrides.scenario}" selects no endpoints`, 'scenario');
      }
    }
  }

  if (overrides.baseUrl !== undefined) result.baseUrl = overrides.baseUrl;
  if (overrides.numWorkers !== undefined) {
    result.numWorkers = positiveInt(overrides.numWorkers, 'num_workers', result.numWorkers);
  }
  if (overrides.requestsPerEndpoint !== undefined) {
    result.requestsPerEndpoint = positiveInt(
      overrides.requestsPerEndpoint,
      'requests_per_endpoint',
      result.requestsPerEndpoint,
    );
  }
  if (overrides.numTestRuns !== undefined) {
    result.numTestRuns = positiveInt(overrides.numTestRuns, 'num_test_runs', result.numTestRuns);
  }
  if (overrides.seed !== undefined) result.seed = overrides.seed;
  if (overrides.outputDir !== undefined) {
    result.report = { ...result.report, outputDir: overrides.outputDir };
  }

  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}

/** Reads, parses and freezes a YAML or JSON configuration file. */
export async function loadConfig(configPath: string, overrides: ConfigOverrides = {}): Promise<TestConfig> {
  const file = resolvePath(configPath);

  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${file}: ${errorMessage(error)}`);
  }

  return deepFreeze(applyOverrides(parseConfig(raw, dirname(file)), overrides));
}
