import { errorMessage, TransportError, type WebServiceError } from './errors';
import type { ExecutionContext, InvocationResult, Logger, ResultHandler } from './types';

/**
 * Runs tasks one at a time, in submission order, each on its own turn of the
 * event loop. A task that throws is reported through `onError` and does not
 * stop the queue.
 */
export function createSerialExecutionContext(onError?: (error: unknown) => void): ExecutionContext {
  const queue: Array<() => void> = [];
  let scheduled = false;

  const drain = () => {
    const task = queue.shift();
    if (!task) {
      scheduled = false;
      return;
    }
    try {
      task();
    } catch (error) {
      if (onError) {
        onError(error);
      } else {
        // Rethrown outside the queue so the failure is not lost.
        queueMicrotask(() => {
          throw error;
        });
      }
    }
    setImmediate(drain);
  };

  return {
    execute(task) {
      queue.push(task);
      if (!scheduled) {
        scheduled = true;
        setImmediate(drain);
      }
    },
  };
}

/**
 * Runs each task synchronously on the caller's stack.
 */
export const immediateExecutionContext: ExecutionContext = {
  execute(task) {
    task();
  },
};

export interface DispatchOptions<T> {
  invocationId: number;
  context: ExecutionContext;
  handler?: ResultHandler<T>;
  logger?: Logger;
}

/**
 * Delivers the terminal result of one invocation on its execution context.
 * Only the first settling call has any effect; later ones are logged and
 * dropped. A handler that throws is logged, as hook failures are elsewhere.
 */
export class ResultDispatcher<T> {
  private settled = false;
  private readonly resolveCompletion: (result: InvocationResult<T>) => void;
  readonly completion: Promise<InvocationResult<T>>;

  constructor(private readonly options: DispatchOptions<T>) {
    let resolveCompletion: (result: InvocationResult<T>) => void = () => undefined;
    this.completion = new Promise<InvocationResult<T>>((resolve) => {
      resolveCompletion = resolve;
    });
    this.resolveCompletion = resolveCompletion;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  succeed(value: T | undefined): boolean {
    return this.deliver({ ok: true, value });
  }

  fail(error: WebServiceError): boolean {
    return this.deliver({ ok: false, error });
  }

  /**
   * Settles without calling the handler.
   */
  suppress(error: WebServiceError): boolean {
    if (!this.claim('suppress')) {
      return false;
    }
    this.resolveCompletion({ ok: false, error });
    return true;
  }

  private deliver(result: InvocationResult<T>): boolean {
    if (!this.claim(result.ok ? 'success' : 'failure')) {
      return false;
    }
    const { context, handler, invocationId, logger } = this.options;
    try {
      context.execute(() => {
        try {
          if (result.ok) {
            handler?.(result.value, undefined);
          } else {
            handler?.(undefined, result.error);
          }
        } catch (error) {
          logger?.error('proxy.dispatch.handler.failed', { invocationId, error: errorMessage(error) });
        } finally {
          this.resolveCompletion(result);
        }
      });
    } catch (error) {
      // The handler is unreachable; the completion still settles once.
      logger?.error('proxy.dispatch.context.failed', { invocationId, error: errorMessage(error) });
      this.resolveCompletion({
        ok: false,
        error: new TransportError(`Result could not be dispatched: ${errorMessage(error)}`, { cause: error }),
      });
    }
    return true;
  }

  private claim(kind: string): boolean {
    if (this.settled) {
      this.options.logger?.debug('proxy.dispatch.dropped', { invocationId: this.options.invocationId, kind });
      return false;
    }
    this.settled = true;
    return true;
  }
}
