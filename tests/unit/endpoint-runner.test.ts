/**
 * Unit Tests: per-endpoint request loop, URL and body building, file bodies.
 */
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildUrl, encodeBody, loadBodyTemplate, runEndpoint } from '../../src/endpoint-runner.js';
import { RequestExecutor } from '../../src/executor.js';
import { TemplateResolver } from '../../src/resolver.js';
import { createSeededRng } from '../../src/random.js';
import type { EndpointSpec, TestConfig } from '../../src/types.js';
import { FakeTransport, statusSequence } from '../helpers/mock-fetch.js';
import { BASE_URL, makeConfig } from '../helpers/fixtures.js';

function setup(config: TestConfig, transport = new FakeTransport()) {
  const resolver = new TemplateResolver(config, { rng: createSeededRng(5) });
  const executor = new RequestExecutor({ transport });
  const sleep = vi.fn(async (_ms: number) => {});
  return { transport, sleep, ctx: { config, resolver, executor, sleep } };
}

describe('buildUrl', () => {
  it('joins base and path with a single slash', () => {
    expect(buildUrl('http://api.test/v1/', '/items/1')).toBe('http://api.test/v1/items/1');
    expect(buildUrl('http://api.test/v1', 'items')).toBe('http://api.test/v1/items');
  });

  it('appends query parameters', () => {
    expect(buildUrl('http://api.test', '/search', { q: 'a b', limit: '10' })).toBe(
      'http://api.test/search?q=a+b&limit=10',
    );
    expect(buildUrl('http://api.test', '/search?x=1', { y: '2' })).toBe('http://api.test/search?x=1&y=2');
  });
});

describe('encodeBody', () => {
  it('encodes JSON and sets the content type', () => {
    const headers: Record<string, string> = {};
    expect(encodeBody({ id: 1, tags: ['a'] }, true, headers)).toBe('{"id":1,"tags":["a"]}');
    expect(headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('encodes a mapping as a form', () => {
    const headers: Record<string, string> = {};
    expect(encodeBody({ name: 'x y', count: 2, tags: ['a'] }, false, headers)).toBe(
      'name=x+y&count=2&tags=%5B%22a%22%5D',
    );
    expect(headers).toEqual({ 'Content-Type': 'application/x-www-form-urlencoded' });
  });

  it('keeps an existing content type header', () => {
    const headers = { 'content-type': 'application/vnd.test+json' };
    encodeBody({ a: 1 }, true, headers);
    expect(headers).toEqual({ 'content-type': 'application/vnd.test+json' });
  });

  it('sends a string as-is in form mode', () => {
    expect(encodeBody('raw=1', false, {})).toBe('raw=1');
  });
});

describe('runEndpoint', () => {
  const createItem: EndpointSpec = {
    name: 'Create Item',
    method: 'POST',
    path: '/items',
    data: { id: '$uuid', name: 'Item ${username}', qty: '$random{1,5}' },
    jsonContent: true,
  };

  it('sends requests_per_endpoint requests with freshly resolved bodies', async () => {
    const config = makeConfig({ requestsPerEndpoint: 3, variables: { username: 'alice' } });
    const { transport, ctx } = setup(config);

    const outcomes = await runEndpoint(createItem, ctx);

    expect(outcomes).toHaveLength(3);
    expect(transport.requests).toHaveLength(3);
    const bodies = transport.requests.map(r => JSON.parse(r.body ?? '{}'));
    expect(new Set(bodies.map(b => b.id)).size).toBe(3);
    for (const body of bodies) {
      expect(body.name).toBe('Item alice');
      expect([1, 2, 3, 4, 5]).toContain(body.qty);
    }
    expect(transport.requests[0].url).toBe(`${BASE_URL}/items`);
    expect(transport.requests[0].headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/json',
    });
    expect(transport.requests[0].timeoutMs).toBe(10000);
  });

  it('keeps request order in its outcomes', async () => {
    const config = makeConfig({ requestsPerEndpoint: 3 });
    const { ctx } = setup(config, new FakeTransport(statusSequence([200, 500, 204])));

    const outcomes = await runEndpoint({ ...createItem, data: undefined }, ctx);

    expect(outcomes.map(o => o.success)).toEqual([true, false, true]);
    expect(outcomes.map(o => o.statusCode)).toEqual([200, 500, 204]);
  });

  it('does not send a body for GET requests', async () => {
    const { transport, ctx } = setup(makeConfig());
    await runEndpoint({ ...createItem, method: 'GET' }, ctx);
    expect(transport.requests[0].body).toBeUndefined();
  });

  it('resolves path, query parameters and headers per request', async () => {
    const config = makeConfig({ variables: { item_id: 7, token: 'test-token' } });
    const { transport, ctx } = setup(config);

    await runEndpoint(
      {
        name: 'Get Item',
        method: 'GET',
        path: '/items/${item_id}',
        params: { q: '$random{only}', limit: 10 },
        headers: { Authorization: 'Bearer ${token}' },
        jsonContent: true,
        timeout: 2,
      },
      ctx,
    );

    expect(transport.requests[0]).toEqual({
      method: 'GET',
      url: `${BASE_URL}/items/7?q=only&limit=10`,
      headers: { Accept: 'application/json', Authorization: 'Bearer test-token' },
      body: undefined,
      timeoutMs: 2000,
    });
  });

  it('records the failed payload', async () => {
    const { ctx } = setup(makeConfig(), new FakeTransport(statusSequence([422])));
    const [outcome] = await runEndpoint({ ...createItem, data: { name: 'fixed' } }, ctx);
    expect(outcome.success).toBe(false);
    expect(outcome.requestData).toEqual({ name: 'fixed' });
  });

  it('pauses after each request when a delay is configured', async () => {
    const { sleep, ctx } = setup(makeConfig({ requestsPerEndpoint: 3 }));
    await runEndpoint({ ...createItem, delay: 25 }, ctx);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(25);
  });

  it('does not pause without a delay', async () => {
    const { sleep, ctx } = setup(makeConfig({ requestsPerEndpoint: 2 }));
    await runEndpoint(createItem, ctx);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sends form bodies when json_content is false', async () => {
    const { transport, ctx } = setup(makeConfig({ defaultHeaders: {} }));
    await runEndpoint({ ...createItem, data: { user: 'bob', n: 1 }, jsonContent: false }, ctx);
    expect(transport.requests[0].body).toBe('user=bob&n=1');
    expect(transport.requests[0].headers).toEqual({ 'Content-Type': 'application/x-www-form-urlencoded' });
  });
});

describe('file bodies', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'perf-runner-body-'));
    await writeFile(join(dir, 'body.json'), '{"name": "${username}", "id": "$uuid"}');
    await writeFile(join(dir, 'body.yaml'), 'name: ${username}\ntags:\n  - a\n  - b\n');
    await writeFile(join(dir, 'body.txt'), 'raw ${username}');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses JSON files', async () => {
    expect(await loadBodyTemplate('@body.json', dir)).toEqual({ name: '${username}', id: '$uuid' });
  });

  it('parses YAML files', async () => {
    expect(await loadBodyTemplate('@body.yaml', dir)).toEqual({ name: '${username}', tags: ['a', 'b'] });
  });

  it('reads other files as text', async () => {
    expect(await loadBodyTemplate('@body.txt', dir)).toBe('raw ${username}');
  });

  it('accepts absolute paths', async () => {
    expect(await loadBodyTemplate(`@${join(dir, 'body.txt')}`, '/nowhere')).toBe('raw ${username}');
  });

  it('resolves templates inside a loaded body', async () => {
    const config = makeConfig({ baseDir: dir, variables: { username: 'carol' }, requestsPerEndpoint: 2 });
    const { transport, ctx } = setup(config);

    await runEndpoint({ name: 'Upload', method: 'POST', path: '/upload', data: '@body.json', jsonContent: true }, ctx);

    const bodies = transport.requests.map(r => JSON.parse(r.body ?? '{}'));
    expect(bodies[0].name).toBe('carol');
    expect(bodies[0].id).not.toBe(bodies[1].id);
  });

  it('sends a text body as-is in form mode', async () => {
    const config = makeConfig({ baseDir: dir, variables: { username: 'dave' } });
    const { transport, ctx } = setup(config);

    await runEndpoint({ name: 'Upload', method: 'PUT', path: '/upload', data: '@body.txt', jsonContent: false }, ctx);

    expect(transport.requests[0].body).toBe('raw dave');
  });

  it('rejects when the file is missing', async () => {
    const { ctx } = setup(makeConfig({ baseDir: dir }));
    await expect(
      runEndpoint({ name: 'Upload', method: 'POST', path: '/upload', data: '@missing.json', jsonContent: true }, ctx),
    ).rejects.toThrow(/ENOENT/);
  });
});
