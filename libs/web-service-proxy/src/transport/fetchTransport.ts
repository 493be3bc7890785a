import { normalizeHeaders } from '../classify';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * fetch-based HTTP transport. Every status is returned as a response; the
 * body is read in full as bytes.
 *
 * `fetchImpl` defaults to the global fetch, looked up on each request.
 */
export const createFetchTransport = (fetchImpl: FetchLike = (url, init) => fetch(url, init)): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await fetchImpl(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    });

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers: normalizeHeaders(headers),
      body: new Uint8Array(await response.arrayBuffer()),
    };
  };
};

export const fetchTransport: HttpTransport = createFetchTransport();
