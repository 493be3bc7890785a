import { afterEach, describe, expect, it, vi } from 'vitest';
import { createAxiosTransport, type AxiosInstanceLike } from '../transport/axiosTransport';
import { createFetchTransport, fetchTransport, type FetchLike } from '../transport/fetchTransport';
import type { TransportRequest } from '../types';

const request: TransportRequest = {
  method: 'POST',
  url: 'https://example.com/api/items',
  headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
  body: new TextEncoder().encode('a=1'),
};

describe('createFetchTransport', () => {
  it('sends the request and returns status, headers and bytes for any status', async () => {
    const fetchImpl = vi.fn<FetchLike>(
      async () => new Response('not here', { status: 404, headers: { 'Content-Type': 'text/plain', 'X-Trace': 't-1' } }),
    );
    const signal = new AbortController().signal;

    const response = await createFetchTransport(fetchImpl)(request, signal);

    expect(fetchImpl).toHaveBeenCalledWith('https://example.com/api/items', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: request.body,
      signal,
    });
    expect(response.status).toBe(404);
    expect(response.headers).toEqual({ 'content-type': 'text/plain', 'x-trace': 't-1' });
    expect(response.body).toBeInstanceOf(Uint8Array);
    expect(new TextDecoder().decode(response.body)).toBe('not here');
  });

  it('rejects when fetch fails', async () => {
    const transport = createFetchTransport(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(transport(request, new AbortController().signal)).rejects.toThrow('fetch failed');
  });
});

describe('fetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('uses the global fetch at request time', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await fetchTransport({ method: 'GET', url: 'https://example.com/ping', headers: {} }, new AbortController().signal);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(response.status).toBe(204);
    expect(response.body).toEqual(new Uint8Array(0));
  });
});

describe('createAxiosTransport', () => {
  it('requests raw bytes and accepts every status', async () => {
    const data = new TextEncoder().encode('{"ok":true}');
    const axiosRequest = vi.fn<AxiosInstanceLike['request']>(async () => ({
      status: 500,
      headers: { 'content-type': 'application/json', 'set-cookie': ['a=1', 'b=2'], 'x-empty': null },
      data,
    }));
    const signal = new AbortController().signal;

    const response = await createAxiosTransport({ request: axiosRequest })(request, signal);

    const config = axiosRequest.mock.calls[0][0];
    expect(config).toMatchObject({
      url: 'https://example.com/api/items',
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      data: request.body,
      signal,
      responseType: 'arraybuffer',
    });
    expect(config.validateStatus?.(503)).toBe(true);
    expect(response).toEqual({
      status: 500,
      headers: { 'content-type': 'application/json', 'set-cookie': 'a=1, b=2' },
      body: data,
    });
  });

  it('returns an empty body when axios yields no bytes', async () => {
    const transport = createAxiosTransport({
      request: async () => ({ status: 204, headers: {}, data: '' }),
    });

    const response = await transport({ method: 'DELETE', url: 'https://example.com/x', headers: {} }, new AbortController().signal);

    expect(response.body).toEqual(new Uint8Array(0));
  });
});
