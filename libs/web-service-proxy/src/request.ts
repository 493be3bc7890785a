import { createMultipartBoundary, encodeFormBody, encodeMultipartBody, encodeQuery } from './encoding';
import type {
  ArgumentMap,
  AttachmentReadFailureMode,
  Encoding,
  HttpHeaders,
  HttpMethod,
  Logger,
  RequestDescriptor,
} from './types';

export const FORM_URLENCODED = 'application/x-www-form-urlencoded';
export const MULTIPART_FORM_DATA = 'multipart/form-data';
export const OCTET_STREAM = 'application/octet-stream';

export interface BuildRequestOptions {
  method: HttpMethod;
  path: string;
  arguments?: ArgumentMap;
  content?: Uint8Array | string;
  contentType?: string;
  encoding: Encoding;
  serverUrl: string | URL;
  headers?: HttpHeaders;
  /** Fixed boundary for multipart bodies; a random one is generated per call otherwise. */
  boundary?: string;
  attachmentReadFailure?: AttachmentReadFailureMode;
  logger?: Logger;
}

/**
 * Builds the transport request for a service call.
 *
 * Arguments are sent in the query string unless the method is POST and no
 * explicit content is given, in which case they become the body, encoded per
 * `encoding`. Explicit content is sent as-is with `contentType`, or
 * `application/octet-stream` when the caller set no content type.
 */
export async function buildRequest(opts: BuildRequestOptions): Promise<RequestDescriptor> {
  const args = opts.arguments ?? {};
  const hasContent = opts.content !== undefined;
  const argumentsInQuery = opts.method !== 'POST' || hasContent;

  const query = argumentsInQuery ? encodeQuery(args) : '';
  const url = resolveUrl(opts.serverUrl, opts.path, query);
  const headers: HttpHeaders = { ...opts.headers };

  let body: Uint8Array | undefined;
  // Only explicit content reports its type on the descriptor.
  let contentType: string | undefined;

  if (!argumentsInQuery) {
    if (opts.encoding === 'multipart') {
      const boundary = opts.boundary ?? createMultipartBoundary();
      setHeader(headers, 'Content-Type', `${MULTIPART_FORM_DATA}; boundary=${boundary}`);
      body = await encodeMultipartBody(args, boundary, {
        attachmentReadFailure: opts.attachmentReadFailure,
        logger: opts.logger,
      });
    } else {
      setHeader(headers, 'Content-Type', FORM_URLENCODED);
      body = encodeFormBody(args);
    }
  } else if (opts.content !== undefined) {
    body = typeof opts.content === 'string' ? new TextEncoder().encode(opts.content) : opts.content;
    contentType = opts.contentType || getHeader(headers, 'Content-Type') || OCTET_STREAM;
    setHeader(headers, 'Content-Type', contentType);
  }

  return {
    method: opts.method,
    url,
    headers,
    body,
    contentType,
  };
}

/**
 * Copies `base` and applies each of `overrides` on top, replacing any header
 * of the same name regardless of case.
 */
export function mergeHeaders(base: HttpHeaders, overrides: HttpHeaders = {}): HttpHeaders {
  const merged: HttpHeaders = { ...base };
  for (const [name, value] of Object.entries(overrides)) {
    setHeader(merged, name, value);
  }
  return merged;
}

/**
 * Resolves `path` against the server URL. A server URL ending in `/` keeps
 * its path prefix for relative paths.
 */
export function resolveUrl(serverUrl: string | URL, path: string, query: string): string {
  const url = new URL(path, serverUrl);
  if (!query) {
    return url.toString();
  }
  // Appended as text: the URL search setter would re-escape characters such as `'`.
  const hash = url.hash;
  url.hash = '';
  const separator = url.search ? '&' : '?';
  return `${url.toString()}${separator}${query}${hash}`;
}

export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) {
      return value;
    }
  }
  return undefined;
}

export function setHeader(headers: HttpHeaders, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) {
      delete headers[key];
    }
  }
  headers[name] = value;
}
