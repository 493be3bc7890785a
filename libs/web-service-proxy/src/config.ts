import { z } from 'zod';
import type { Encoding, WebServiceProxyConfig } from './types';

const ENCODINGS = ['form-urlencoded', 'multipart'] as const satisfies readonly Encoding[];

const envSchema = z.object({
  WEB_SERVICE_PROXY_SERVER_URL: z
    .string({ required_error: 'WEB_SERVICE_PROXY_SERVER_URL environment variable is required' })
    .url('WEB_SERVICE_PROXY_SERVER_URL must be an absolute URL'),
  WEB_SERVICE_PROXY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive('WEB_SERVICE_PROXY_TIMEOUT_MS must be a positive integer')
    .optional(),
  WEB_SERVICE_PROXY_ENCODING: z.enum(ENCODINGS).optional(),
});

export type ProxyEnv = Record<string, string | undefined>;

/**
 * Reads proxy settings from environment variables.
 *
 * Required:
 * - `WEB_SERVICE_PROXY_SERVER_URL` - Server URL that call paths resolve against
 *
 * Optional:
 * - `WEB_SERVICE_PROXY_TIMEOUT_MS` - Per-call timeout
 * - `WEB_SERVICE_PROXY_ENCODING` - `form-urlencoded` (default) or `multipart`
 */
export function loadProxyConfigFromEnv(env: ProxyEnv = process.env): WebServiceProxyConfig {
  // Blank values count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid web service proxy configuration: ${issues}`);
  }

  const config: WebServiceProxyConfig = {
    serverUrl: parsed.data.WEB_SERVICE_PROXY_SERVER_URL,
  };
  if (parsed.data.WEB_SERVICE_PROXY_TIMEOUT_MS !== undefined) {
    config.timeoutMs = parsed.data.WEB_SERVICE_PROXY_TIMEOUT_MS;
  }
  if (parsed.data.WEB_SERVICE_PROXY_ENCODING !== undefined) {
    config.encoding = parsed.data.WEB_SERVICE_PROXY_ENCODING;
  }
  return config;
}
