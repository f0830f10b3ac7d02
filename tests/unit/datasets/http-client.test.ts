import { describe, expect, it } from 'vitest';

import { readAll } from '@/common/utils/streams.js';
import { createHttpClient, type FetchFn } from '@/modules/datasets/shell/providers/http.js';

import { jsonResponse, makeFakeFetch, makeSilentLogger, textResponse } from '../../fixtures/fakes.js';

const RESOURCE_URL = 'https://api.test/resource';

const makeHttp = (fetch: FetchFn) =>
  createHttpClient({
    fetch,
    retries: 2,
    retryDelayMs: 0,
    logger: makeSilentLogger(),
    sleep: async () => {},
  });

describe('http client', () => {
  it('retries GETs on server errors', async () => {
    let calls = 0;
    const fake = makeFakeFetch({
      [`GET ${RESOURCE_URL}`]: () => {
        calls += 1;
        return calls === 1 ? textResponse('busy', 503) : jsonResponse({ ok: true });
      },
    });

    const result = await makeHttp(fake.fetch).getJson(RESOURCE_URL);

    expect(result._unsafeUnwrap()).toEqual({ ok: true });
    expect(fake.requests).toHaveLength(2);
    expect(fake.requests[0]?.headers['accept']).toBe('application/json');
  });

  it('gives up after the retry budget', async () => {
    const fake = makeFakeFetch({ [`GET ${RESOURCE_URL}`]: () => textResponse('down', 500) });

    const result = await makeHttp(fake.fetch).getJson(RESOURCE_URL);

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('NetworkError');
    expect(fake.requests).toHaveLength(3);
  });

  it('does not retry client errors', async () => {
    const fake = makeFakeFetch();

    const result = await makeHttp(fake.fetch).getJson(RESOURCE_URL);

    const error = result._unsafeUnwrapErr();
    expect(error.message).toBe(`HTTP 404 Not Found (${RESOURCE_URL})`);
    if (error.type === 'NetworkError') {
      expect(error.status).toBe(404);
      expect(error.retryable).toBe(false);
    }
    expect(fake.requests).toHaveLength(1);
  });

  it('retries requests that never reached the server', async () => {
    let calls = 0;
    const failing: FetchFn = async () => {
      calls += 1;
      throw new TypeError('fetch failed');
    };

    const result = await makeHttp(failing).open(RESOURCE_URL);

    expect(result._unsafeUnwrapErr().message).toBe(`Request failed: fetch failed (${RESOURCE_URL})`);
    expect(calls).toBe(3);
  });

  it('sends other methods once', async () => {
    const fake = makeFakeFetch({ [`POST ${RESOURCE_URL}`]: () => textResponse('busy', 503) });

    const result = await makeHttp(fake.fetch).send(RESOURCE_URL, { method: 'POST' });

    expect(result.isErr()).toBe(true);
    expect(fake.requests).toHaveLength(1);
  });

  it('streams response bodies', async () => {
    const fake = makeFakeFetch({ [`GET ${RESOURCE_URL}`]: () => textResponse('payload') });

    const stream = (await makeHttp(fake.fetch).open(RESOURCE_URL))._unsafeUnwrap();

    expect(new TextDecoder().decode(await readAll(stream))).toBe('payload');
  });

  it('rejects bodies that are not JSON', async () => {
    const fake = makeFakeFetch({ [`GET ${RESOURCE_URL}`]: () => textResponse('nope') });

    const result = await makeHttp(fake.fetch).getJson(RESOURCE_URL);

    expect(result._unsafeUnwrapErr().message).toBe(`Response is not valid JSON (${RESOURCE_URL})`);
  });
});
