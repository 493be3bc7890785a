import type { z } from 'zod';
import { APPLICATION_JSON, parseJson } from './json';
import type { ResponseDecoder } from './types';

/**
 * Parses JSON content. Responses of any other type decode to `undefined`.
 */
export function jsonDecoder<T = unknown>(): ResponseDecoder<T> {
  return (content, contentType) => {
    if (!contentType?.startsWith(APPLICATION_JSON)) {
      return undefined;
    }
    // Untyped: the caller picks T. Use schemaDecoder to validate the shape.
    return parseJson(content) as T;
  };
}

/**
 * Parses JSON content and validates it against `schema`. Use
 * `epochMillisDate` for date fields.
 */
export function schemaDecoder<S extends z.ZodTypeAny>(schema: S): ResponseDecoder<z.output<S>> {
  return (content, contentType) => {
    if (!contentType?.startsWith(APPLICATION_JSON)) {
      return undefined;
    }
    return schema.parse(parseJson(content));
  };
}

export function textDecoder(): ResponseDecoder<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  return (content) => decoder.decode(content);
}

export function bytesDecoder(): ResponseDecoder<Uint8Array> {
  return (content) => content;
}
