import { STATUS_CODES } from 'node:http';
import type { HttpHeaders, RawHttpResponse, ResponseOutcome } from './types';

const textDecoder = new TextDecoder('utf-8');

/**
 * Lower-cases header names so lookups do not depend on the transport.
 */
export function normalizeHeaders(headers: HttpHeaders): HttpHeaders {
  const result: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

/**
 * MIME type of a Content-Type header value, without parameters.
 */
export function mimeType(contentType?: string): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const type = contentType.split(';')[0]?.trim().toLowerCase();
  return type || undefined;
}

export function reasonPhrase(status: number): string | undefined {
  return STATUS_CODES[status];
}

export function toBytes(body: ArrayBuffer | Uint8Array): Uint8Array {
  return body instanceof Uint8Array ? body : new Uint8Array(body);
}

/**
 * Classifies a response: 2xx is a success carrying the content; anything
 * else is an HTTP error whose message is the body for `text/*` responses and
 * the standard reason phrase otherwise.
 */
export function classify(
  status: number,
  contentType: string | undefined,
  headers: HttpHeaders,
  content: Uint8Array,
): ResponseOutcome {
  const type = mimeType(contentType);

  if (Math.floor(status / 100) === 2) {
    return { kind: 'success', content, contentType: type, headers };
  }

  const message = type?.startsWith('text/') ? textDecoder.decode(content) : reasonPhrase(status);

  return {
    kind: 'http-error',
    status,
    message,
    contentType: type,
    headers,
    content,
  };
}

export function classifyResponse(response: RawHttpResponse): ResponseOutcome {
  const headers = normalizeHeaders(response.headers);
  return classify(response.status, headers['content-type'], headers, toBytes(response.body));
}
