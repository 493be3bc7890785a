import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { ArgumentEncodingError } from './errors';
import type { ArgumentMap, ArgumentScalar, ArgumentValue } from './types';

/**
 * Source of the bytes sent for a file part.
 */
export interface ByteSource {
  read(): Promise<Uint8Array>;
}

/**
 * A file argument. Encoded as a `filename` part in multipart bodies; in a
 * query string or form body only its name is sent.
 */
export class FileRef {
  constructor(
    readonly name: string,
    readonly source: ByteSource,
  ) {}

  toString(): string {
    return this.name;
  }
}

/**
 * Attachment read from disk when the request body is encoded.
 * `name` defaults to the last path component.
 */
export function fileAttachment(path: string, name: string = basename(path)): FileRef {
  return new FileRef(name, {
    read: async () => new Uint8Array(await readFile(path)),
  });
}

export function bytesAttachment(name: string, bytes: Uint8Array | string): FileRef {
  const data = typeof bytes === 'string' ? new TextEncoder().encode(bytes) : bytes;
  return new FileRef(name, {
    read: async () => data,
  });
}

export type Occurrence = Exclude<ArgumentScalar, null | undefined>;

export interface ArgumentEntry {
  key: string;
  occurrences: Occurrence[];
}

/**
 * Expands an argument map into keyed occurrences, in insertion order.
 * Keys that are blank are dropped, as are null and undefined occurrences.
 */
export function expandArguments(args: ArgumentMap): ArgumentEntry[] {
  const entries: ArgumentEntry[] = [];
  for (const [key, value] of Object.entries(args)) {
    if (key.trim() === '') {
      continue;
    }
    entries.push({ key, occurrences: expandValue(key, value) });
  }
  return entries;
}

function expandValue(key: string, value: ArgumentValue): Occurrence[] {
  const elements: readonly unknown[] = Array.isArray(value) ? value : [value];
  const occurrences: Occurrence[] = [];
  for (const element of elements) {
    if (element === null || element === undefined) {
      continue;
    }
    occurrences.push(checkScalar(key, element));
  }
  return occurrences;
}

function checkScalar(key: string, element: unknown): Occurrence {
  switch (typeof element) {
    case 'string':
    case 'boolean':
      return element;
    case 'number':
      if (!Number.isFinite(element)) {
        throw new ArgumentEncodingError(`Argument "${key}" is not a finite number`, key);
      }
      return element;
    case 'object':
      if (element instanceof Date) {
        if (Number.isNaN(element.getTime())) {
          throw new ArgumentEncodingError(`Argument "${key}" is an invalid date`, key);
        }
        return element;
      }
      if (element instanceof FileRef) {
        return element;
      }
      if (Array.isArray(element)) {
        throw new ArgumentEncodingError(`Argument "${key}" contains a nested list`, key);
      }
      break;
    default:
      break;
  }
  throw new ArgumentEncodingError(`Argument "${key}" has an unsupported value type (${typeof element})`, key);
}

/**
 * Text form of a non-file occurrence. Dates become epoch milliseconds.
 */
export function stringifyOccurrence(occurrence: Occurrence): string {
  if (occurrence instanceof Date) {
    return String(occurrence.getTime());
  }
  return String(occurrence);
}
