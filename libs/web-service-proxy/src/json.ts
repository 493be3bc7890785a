import { z } from 'zod';

export const APPLICATION_JSON = 'application/json';

/**
 * Date sent over the wire as integer milliseconds since the epoch.
 */
export const epochMillisDate = z
  .number()
  .int()
  .transform((millis) => new Date(millis));

/**
 * Serializes a value as JSON, writing dates as epoch milliseconds.
 */
export function stringifyJson(value: unknown): string {
  return JSON.stringify(value, function (this: Record<string, unknown>, key: string, current: unknown) {
    const original = this[key];
    return original instanceof Date ? original.getTime() : current;
  });
}

export function encodeJson(value: unknown): Uint8Array {
  return new TextEncoder().encode(stringifyJson(value));
}

export function parseJson(content: Uint8Array): unknown {
  return JSON.parse(new TextDecoder('utf-8').decode(content));
}
