import { loadProxyConfigFromEnv, type ProxyEnv } from './config';
import { WebServiceProxy } from './WebServiceProxy';
import type { Logger, LoggerMeta, WebServiceProxyConfig } from './types';

/**
 * Console logger used by createWebServiceProxy when no logger is given.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

/**
 * Creates a WebServiceProxy with defaults suitable for most use cases.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Encoding: application/x-www-form-urlencoded
 * - Dispatch: serial execution context
 * - Cancellation: delivered as a RequestCanceledError
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const proxy = createWebServiceProxy({ serverUrl: 'https://api.example.com/service/' });
 * const items = await proxy.call<string[]>({ method: 'GET', path: 'items', arguments: { limit: 10 } });
 * ```
 */
export function createWebServiceProxy(config: WebServiceProxyConfig): WebServiceProxy {
  return new WebServiceProxy({
    ...config,
    logger: config.logger ?? new ConsoleLogger(),
  });
}

/**
 * Creates a proxy from environment variables (see loadProxyConfigFromEnv),
 * with `overrides` applied last.
 */
export function createWebServiceProxyFromEnv(
  overrides: Partial<WebServiceProxyConfig> = {},
  env: ProxyEnv = process.env,
): WebServiceProxy {
  return createWebServiceProxy({
    ...loadProxyConfigFromEnv(env),
    ...overrides,
  });
}
