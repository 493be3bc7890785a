import type { FileRef } from './arguments';
import type { WebServiceError } from './errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/**
 * Encoding used for the body of a POST request that carries its arguments.
 */
export type Encoding = 'form-urlencoded' | 'multipart';

/**
 * A single argument occurrence. `Date` values are sent as epoch milliseconds;
 * `null` and `undefined` are omitted from the encoded output.
 */
export type ArgumentScalar = string | number | boolean | Date | FileRef | null | undefined;

/**
 * An argument value: a scalar, or a flat list of scalars (one occurrence per element).
 */
export type ArgumentValue = ArgumentScalar | readonly ArgumentScalar[];

export type ArgumentMap = Readonly<Record<string, ArgumentValue>>;

export type LoggerMeta = Record<string, unknown> & {
  invocationId?: number;
  method?: HttpMethod;
  url?: string;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Transport-ready request produced by the request assembler.
 */
export interface RequestDescriptor {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
  contentType?: string;
}

export type TransportRequest = RequestDescriptor;

/**
 * Raw HTTP response returned by a transport.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer | Uint8Array;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * Network failures and aborts are reported by rejecting.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type ResponseOutcome =
  | { kind: 'success'; content: Uint8Array; contentType?: string; headers: HttpHeaders }
  | { kind: 'http-error'; status: number; message?: string; contentType?: string; headers: HttpHeaders; content: Uint8Array };

/**
 * Turns the content of a successful response into a result value.
 * Called only for 2xx responses with a non-empty body; throwing turns the
 * call into a `DecodingError`.
 */
export type ResponseDecoder<T> = (content: Uint8Array, contentType: string | undefined) => T | undefined | Promise<T | undefined>;

/**
 * Serialized execution context on which result handlers run.
 */
export interface ExecutionContext {
  execute(task: () => void): void;
}

export type InvocationResult<T> =
  | { ok: true; value: T | undefined }
  | { ok: false; error: WebServiceError };

export type ResultHandler<T> = (result: T | undefined, error: WebServiceError | undefined) => void;

/**
 * What a cancelled invocation reports: `fail` delivers a `RequestCanceledError`,
 * `silent` suppresses the result handler.
 */
export type CancellationMode = 'fail' | 'silent';

/**
 * What happens when an attachment's bytes cannot be read while building a
 * multipart body: `empty` sends an empty part, `fail` fails the call.
 */
export type AttachmentReadFailureMode = 'empty' | 'fail';

export interface WebServiceProxyConfig {
  serverUrl: string | URL;
  transport?: HttpTransport;
  encoding?: Encoding;
  defaultHeaders?: HttpHeaders;
  /** Per-call timeout. Default: none. */
  timeoutMs?: number;
  logger?: Logger;
  dispatchContext?: ExecutionContext;
  cancellation?: CancellationMode;
  attachmentReadFailure?: AttachmentReadFailureMode;
}

export interface InvokeOptions<T = unknown> {
  method: HttpMethod;
  path: string;
  arguments?: ArgumentMap;
  /** Explicit request body. When present, arguments always go to the query string. */
  content?: Uint8Array | string;
  contentType?: string;
  headers?: HttpHeaders;
  timeoutMs?: number;
  /** Default: `jsonDecoder()`. */
  decoder?: ResponseDecoder<T>;
  signal?: AbortSignal;
}

export interface Invocation<T> {
  readonly id: number;
  /** Settles after the result handler has run (or been suppressed). Never rejects. */
  readonly completion: Promise<InvocationResult<T>>;
  cancel(): void;
}
