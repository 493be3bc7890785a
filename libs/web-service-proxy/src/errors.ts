import type { HttpHeaders } from './types';

export type ErrorCategory = 'http' | 'network' | 'timeout' | 'canceled' | 'decoding' | 'encoding';

/**
 * Base class for every failure delivered to a result handler.
 */
export abstract class WebServiceError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WebServiceError';
  }
}

/**
 * Non-2xx response. `message` is the server's text body when the response
 * was `text/*`, otherwise the standard reason phrase for the status.
 */
export class HttpError extends WebServiceError {
  readonly category = 'http';
  readonly status: number;
  readonly statusMessage?: string;
  readonly headers: HttpHeaders;
  readonly body: Uint8Array;

  constructor(
    status: number,
    options: {
      message?: string;
      headers?: HttpHeaders;
      body?: Uint8Array;
    } = {},
  ) {
    super(options.message ?? `HTTP ${status}`);
    this.name = 'HttpError';
    this.status = status;
    this.statusMessage = options.message;
    this.headers = options.headers ?? {};
    this.body = options.body ?? new Uint8Array(0);
  }
}

/**
 * The transport failed before a response was received.
 */
export class TransportError extends WebServiceError {
  readonly category: ErrorCategory = 'network';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends TransportError {
  override readonly category = 'timeout';

  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`Request timed out after ${timeoutMs}ms`, options);
    this.name = 'TimeoutError';
  }
}

export class RequestCanceledError extends TransportError {
  override readonly category = 'canceled';

  constructor(options?: { cause?: unknown }) {
    super('Request was canceled', options);
    this.name = 'RequestCanceledError';
  }
}

/**
 * The response decoder rejected the content of a 2xx response.
 */
export class DecodingError extends WebServiceError {
  readonly category = 'decoding';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodingError';
  }
}

/**
 * An argument could not be encoded into the request.
 */
export class ArgumentEncodingError extends WebServiceError {
  readonly category = 'encoding';

  constructor(
    message: string,
    readonly argument: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ArgumentEncodingError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
