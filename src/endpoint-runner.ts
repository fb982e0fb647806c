import { readFile } from 'fs/promises';
import { extname, isAbsolute, resolve as resolvePath } from 'path';
import { parse as parseYaml } from 'yaml';
import type { EndpointSpec, RequestOutcome, TemplateMap, TemplateValue, TestConfig } from './types.js';
import type { TemplateResolver } from './resolver.js';
import type { RequestExecutor } from './executor.js';
import { toTemplateValue } from './config.js';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export interface EndpointContext {
  config: TestConfig;
  resolver: TemplateResolver;
  executor: RequestExecutor;
  sleep?: (ms: number) => Promise<void>;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function buildUrl(baseUrl: string, path: string, query?: Record<string, string>): string {
  const url = `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  if (!query || Object.keys(query).length === 0) return url;
  const search = new URLSearchParams(query).toString();
  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
}

/**
 * Reads an out-of-line body referenced as `@path`. JSON and YAML files are
 * parsed; anything else is returned as text.
 */
export async function loadBodyTemplate(reference: string, baseDir: string): Promise<TemplateValue> {
  const relative = reference.slice(1);
  const file = isAbsolute(relative) ? relative : resolvePath(baseDir, relative);
  const content = await readFile(file, 'utf8');

  switch (extname(file).toLowerCase()) {
    case '.json':
      return toTemplateValue(JSON.parse(content), file);
    case '.yaml':
    case '.yml':
      return toTemplateValue(parseYaml(content), file);
    default:
      return content;
  }
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some(key => key.toLowerCase() === wanted);
}

function isEmptyBody(data: TemplateValue): boolean {
  if (data === null || data === '') return true;
  if (Array.isArray(data)) return data.length === 0;
  return typeof data === 'object' && Object.keys(data).length === 0;
}

export function encodeBody(
  data: TemplateValue,
  jsonContent: boolean,
  headers: Record<string, string>,
): string {
  if (jsonContent) {
    if (!hasHeader(headers, 'content-type')) headers['Content-Type'] = 'application/json';
    return JSON.stringify(data);
  }

  if (!hasHeader(headers, 'content-type')) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
  }
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(data)) {
      form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
    }
    return form.toString();
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

function resolveStringMap(resolver: TemplateResolver, map: TemplateMap | undefined): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(map ?? {})) {
    resolved[key] = resolver.resolveText(value);
  }
  return resolved;
}

/**
 * Fires `config.requestsPerEndpoint` requests at one endpoint, one after
 * another, resolving the templates afresh for every request.
 */
export async function runEndpoint(endpoint: EndpointSpec, ctx: EndpointContext): Promise<RequestOutcome[]> {
  const { config, resolver, executor } = ctx;
  const sleep = ctx.sleep ?? delay;
  const results: RequestOutcome[] = [];

  let template = endpoint.data;
  if (typeof template === 'string' && template.startsWith('@')) {
    template = await loadBodyTemplate(template, config.baseDir);
  }

  const timeoutMs = (endpoint.timeout ?? config.timeout) * 1000;
  const sendsBody = BODY_METHODS.has(endpoint.method);

  for (let i = 0; i < config.requestsPerEndpoint; i++) {
    const url = buildUrl(
      config.baseUrl,
      resolver.resolveText(endpoint.path),
      endpoint.params ? resolveStringMap(resolver, endpoint.params) : undefined,
    );
    const headers = { ...config.defaultHeaders, ...resolveStringMap(resolver, endpoint.headers) };

    let data: TemplateValue | undefined;
    let body: string | undefined;
    if (sendsBody && template !== undefined) {
      const resolved = resolver.resolve(template);
      if (!isEmptyBody(resolved)) {
        data = resolved;
        body = encodeBody(resolved, endpoint.jsonContent, headers);
      }
    }

    const outcome = await executor.send({
      name: endpoint.name,
      method: endpoint.method,
      url,
      headers,
      data,
      body,
      timeoutMs,
    });
    results.push(outcome);

    if (endpoint.delay !== undefined && endpoint.delay > 0) {
      await sleep(endpoint.delay);
    }
  }

  return results;
}
