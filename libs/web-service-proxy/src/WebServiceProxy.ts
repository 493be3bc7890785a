import { classifyResponse } from './classify';
import { jsonDecoder } from './decoders';
import { createSerialExecutionContext, ResultDispatcher } from './dispatch';
import {
  ArgumentEncodingError,
  DecodingError,
  HttpError,
  RequestCanceledError,
  TimeoutError,
  TransportError,
  WebServiceError,
  errorMessage,
} from './errors';
import { buildRequest, mergeHeaders } from './request';
import { fetchTransport } from './transport/fetchTransport';
import type {
  AttachmentReadFailureMode,
  CancellationMode,
  Encoding,
  ExecutionContext,
  HttpHeaders,
  HttpTransport,
  Invocation,
  InvokeOptions,
  Logger,
  LoggerMeta,
  RawHttpResponse,
  RequestDescriptor,
  ResultHandler,
  WebServiceProxyConfig,
} from './types';

interface RunState<T> {
  id: number;
  options: InvokeOptions<T>;
  dispatcher: ResultDispatcher<T>;
  controller: AbortController;
  meta: LoggerMeta;
  startedAt: number;
}

/**
 * Web service invocation proxy.
 *
 * Encodes named arguments into the query string or request body, executes
 * the request through the configured transport, classifies the response and
 * delivers exactly one result per call on the dispatch context.
 *
 * @example
 * ```typescript
 * const proxy = new WebServiceProxy({ serverUrl: 'https://api.example.com/service/' });
 *
 * proxy.invoke<number[]>(
 *   { method: 'GET', path: 'fibonacci', arguments: { count: 8 } },
 *   (result, error) => {
 *     if (error) console.error(error.message);
 *     else console.log(result);
 *   },
 * );
 * ```
 */
export class WebServiceProxy {
  readonly serverUrl: URL;

  /** Encoding for POST requests without explicit content. Read when each call is built. */
  encoding: Encoding;

  /** Headers sent with every call; per-call headers take precedence. */
  defaultHeaders: HttpHeaders;

  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly dispatchContext: ExecutionContext;
  private readonly timeoutMs?: number;
  private readonly cancellation: CancellationMode;
  private readonly attachmentReadFailure: AttachmentReadFailureMode;
  private nextInvocationId = 1;

  constructor(config: WebServiceProxyConfig) {
    this.serverUrl = new URL(config.serverUrl);
    this.encoding = config.encoding ?? 'form-urlencoded';
    this.defaultHeaders = { ...config.defaultHeaders };
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger;
    this.dispatchContext = config.dispatchContext ?? createSerialExecutionContext();
    this.timeoutMs = config.timeoutMs;
    this.cancellation = config.cancellation ?? 'fail';
    this.attachmentReadFailure = config.attachmentReadFailure ?? 'empty';
  }

  /**
   * Starts a service call. `handler` runs exactly once on the dispatch
   * context, after the response has been decoded; it is skipped only for a
   * call cancelled while the proxy is in `silent` cancellation mode.
   */
  invoke<T = unknown>(options: InvokeOptions<T>, handler?: ResultHandler<T>): Invocation<T> {
    const id = this.nextInvocationId++;
    const dispatcher = new ResultDispatcher<T>({
      invocationId: id,
      context: this.dispatchContext,
      handler,
      logger: this.logger,
    });
    const controller = new AbortController();
    const state: RunState<T> = {
      id,
      options,
      dispatcher,
      controller,
      meta: { invocationId: id, method: options.method, path: options.path },
      startedAt: Date.now(),
    };

    const cancel = () => this.cancel(state);
    const signal = options.signal;
    if (signal?.aborted) {
      cancel();
    } else {
      signal?.addEventListener('abort', cancel, { once: true });
    }

    void this.run(state)
      .catch((error: unknown) => {
        this.settleWithError(state, toWebServiceError(error));
      })
      .finally(() => signal?.removeEventListener('abort', cancel));

    return {
      id,
      completion: dispatcher.completion,
      cancel,
    };
  }

  /**
   * Promise form of {@link invoke}: resolves with the decoded result or
   * rejects with a {@link WebServiceError}.
   */
  async call<T = unknown>(options: InvokeOptions<T>): Promise<T | undefined> {
    const result = await this.invoke<T>(options).completion;
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  private async run<T>(state: RunState<T>): Promise<void> {
    const { options, dispatcher, controller } = state;

    let request: RequestDescriptor;
    try {
      request = await buildRequest({
        method: options.method,
        path: options.path,
        arguments: options.arguments,
        content: options.content,
        contentType: options.contentType,
        encoding: this.encoding,
        serverUrl: this.serverUrl,
        headers: mergeHeaders(this.defaultHeaders, options.headers),
        attachmentReadFailure: this.attachmentReadFailure,
        logger: this.logger,
      });
    } catch (error) {
      this.settleWithError(state, toEncodingError(error));
      return;
    }

    if (dispatcher.isSettled) {
      return;
    }

    state.meta.url = request.url;
    this.logger?.debug('proxy.invoke.start', state.meta);

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const timeoutHandle =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort();
            this.settleWithError(state, new TimeoutError(timeoutMs));
          }, timeoutMs);

    let response: RawHttpResponse;
    try {
      response = await this.transport(request, controller.signal);
    } catch (error) {
      if (!dispatcher.isSettled) {
        this.settleWithError(state, new TransportError(`Request failed: ${errorMessage(error)}`, { cause: error }));
      }
      return;
    } finally {
      clearTimeout(timeoutHandle);
    }

    if (dispatcher.isSettled) {
      this.logger?.debug('proxy.dispatch.dropped', { ...state.meta, status: response.status });
      return;
    }

    const outcome = classifyResponse(response);
    if (outcome.kind === 'http-error') {
      this.settleWithError(
        state,
        new HttpError(outcome.status, { message: outcome.message, headers: outcome.headers, body: outcome.content }),
      );
      return;
    }

    let value: T | undefined;
    if (outcome.content.byteLength > 0) {
      const decoder = options.decoder ?? jsonDecoder<T>();
      try {
        value = await decoder(outcome.content, outcome.contentType);
      } catch (error) {
        this.settleWithError(state, new DecodingError(`Response could not be decoded: ${errorMessage(error)}`, { cause: error }));
        return;
      }
    }

    if (dispatcher.succeed(value)) {
      this.logger?.info('proxy.invoke.success', {
        ...state.meta,
        status: response.status,
        durationMs: Date.now() - state.startedAt,
      });
    }
  }

  private cancel<T>(state: RunState<T>): void {
    if (state.dispatcher.isSettled) {
      return;
    }
    state.controller.abort();
    const error = new RequestCanceledError();
    const settled = this.cancellation === 'silent' ? state.dispatcher.suppress(error) : state.dispatcher.fail(error);
    if (settled) {
      this.logger?.info('proxy.invoke.canceled', {
        ...state.meta,
        silent: this.cancellation === 'silent',
        durationMs: Date.now() - state.startedAt,
      });
    }
  }

  private settleWithError<T>(state: RunState<T>, error: WebServiceError): void {
    if (!state.dispatcher.fail(error)) {
      return;
    }
    this.logger?.error('proxy.invoke.failed', {
      ...state.meta,
      status: error instanceof HttpError ? error.status : undefined,
      category: error.category,
      error: error.message,
      durationMs: Date.now() - state.startedAt,
    });
  }
}

function toEncodingError(error: unknown): WebServiceError {
  if (error instanceof WebServiceError) {
    return error;
  }
  return new ArgumentEncodingError(`Request could not be built: ${errorMessage(error)}`, '', { cause: error });
}

function toWebServiceError(error: unknown): WebServiceError {
  if (error instanceof WebServiceError) {
    return error;
  }
  return new TransportError(errorMessage(error), { cause: error });
}
