import { randomUUID } from 'node:crypto';
import { expandArguments, FileRef, stringifyOccurrence } from './arguments';
import { ArgumentEncodingError, errorMessage } from './errors';
import type { ArgumentMap, AttachmentReadFailureMode, Logger } from './types';

// RFC 3986 query characters, minus the delimiters that separate pairs.
const QUERY_ALLOWED = new Set(
  Array.from("ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~!$'()*+,;:@/?", (c) => c.charCodeAt(0)),
);

const textEncoder = new TextEncoder();

/**
 * Percent-encodes a query component. `+` is escaped to `%2B` so that servers
 * decoding `application/x-www-form-urlencoded` do not read it as a space.
 */
export function encodeQueryComponent(value: string): string {
  let encoded = '';
  for (const byte of textEncoder.encode(value)) {
    encoded += QUERY_ALLOWED.has(byte)
      ? String.fromCharCode(byte)
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return encoded.replace(/\+/g, '%2B');
}

export function encodeQuery(args: ArgumentMap): string {
  const pairs: string[] = [];
  for (const { key, occurrences } of expandArguments(args)) {
    const encodedKey = encodeQueryComponent(key);
    for (const occurrence of occurrences) {
      pairs.push(`${encodedKey}=${encodeQueryComponent(stringifyOccurrence(occurrence))}`);
    }
  }
  return pairs.join('&');
}

export function encodeFormBody(args: ArgumentMap): Uint8Array {
  return textEncoder.encode(encodeQuery(args));
}

export function createMultipartBoundary(): string {
  return randomUUID();
}

export interface MultipartOptions {
  attachmentReadFailure?: AttachmentReadFailureMode;
  logger?: Logger;
}

export async function encodeMultipartBody(
  args: ArgumentMap,
  boundary: string,
  options: MultipartOptions = {},
): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const append = (text: string) => chunks.push(textEncoder.encode(text));

  for (const { key, occurrences } of expandArguments(args)) {
    const name = encodeQueryComponent(key);
    for (const occurrence of occurrences) {
      append(`--${boundary}\r\n`);
      append(`Content-Disposition: form-data; name="${name}"`);

      if (occurrence instanceof FileRef) {
        append(`; filename="${quoteFilename(key, occurrence.name)}"\r\n`);
        append('Content-Type: application/octet-stream\r\n\r\n');
        chunks.push(await readAttachment(key, occurrence, options));
      } else {
        append('\r\n\r\n');
        append(stringifyOccurrence(occurrence));
      }

      append('\r\n');
    }
  }

  append(`--${boundary}--\r\n`);

  return concatBytes(chunks);
}

/**
 * Filename for a part header: `"` is escaped as `%22`; line breaks are rejected.
 */
function quoteFilename(key: string, name: string): string {
  if (/[\r\n]/.test(name)) {
    throw new ArgumentEncodingError(`Attachment name for argument "${key}" contains a line break`, key);
  }
  return name.replace(/"/g, '%22');
}

async function readAttachment(key: string, file: FileRef, options: MultipartOptions): Promise<Uint8Array> {
  try {
    return await file.source.read();
  } catch (error) {
    if (options.attachmentReadFailure === 'fail') {
      throw new ArgumentEncodingError(`Attachment "${file.name}" could not be read: ${errorMessage(error)}`, key, {
        cause: error,
      });
    }
    options.logger?.warn('proxy.attachment.read.failed', {
      argument: key,
      filename: file.name,
      error: errorMessage(error),
    });
    return new Uint8Array(0);
  }
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const length = chunks.reduce((total, chunk) => total + chunk.byteLength, 0);
  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}
