import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { bytesDecoder, jsonDecoder, schemaDecoder, textDecoder } from '../decoders';
import { encodeJson, epochMillisDate, stringifyJson } from '../json';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('stringifyJson', () => {
  it('writes dates as epoch milliseconds at any depth', () => {
    expect(stringifyJson({ when: new Date(1000), nested: [new Date(2000)], name: 'x' })).toBe(
      '{"when":1000,"nested":[2000],"name":"x"}',
    );
  });

  it('writes a top-level date as a number', () => {
    expect(stringifyJson(new Date(42))).toBe('42');
  });

  it('encodes to UTF-8 bytes', () => {
    expect(Array.from(encodeJson({ a: 'é' }))).toEqual(Array.from(bytes('{"a":"é"}')));
  });
});

describe('jsonDecoder', () => {
  it('parses JSON content', async () => {
    const decode = jsonDecoder<{ items: string[] }>();
    expect(await decode(bytes('{"items":["a","b"]}'), 'application/json')).toEqual({ items: ['a', 'b'] });
  });

  it('returns undefined for other content types', async () => {
    const decode = jsonDecoder();
    expect(await decode(bytes('hello'), 'text/plain')).toBeUndefined();
    expect(await decode(bytes('{}'), undefined)).toBeUndefined();
  });

  it('throws on malformed JSON', () => {
    const decode = jsonDecoder();
    expect(() => decode(bytes('{"a":'), 'application/json')).toThrow(SyntaxError);
  });
});

describe('schemaDecoder', () => {
  const Event = z.object({
    id: z.number(),
    title: z.string(),
    startsAt: epochMillisDate,
  });

  it('validates the payload and converts epoch milliseconds to dates', async () => {
    const decode = schemaDecoder(Event);
    const value = await decode(bytes('{"id":7,"title":"launch","startsAt":1700000000000}'), 'application/json');

    expect(value).toEqual({ id: 7, title: 'launch', startsAt: new Date(1_700_000_000_000) });
  });

  it('throws when the payload does not match', () => {
    const decode = schemaDecoder(Event);
    expect(() => decode(bytes('{"id":"7","title":"launch","startsAt":0}'), 'application/json')).toThrow(z.ZodError);
  });

  it('rejects fractional timestamps', () => {
    expect(epochMillisDate.safeParse(1.5).success).toBe(false);
  });
});

describe('textDecoder', () => {
  it('decodes UTF-8 text', async () => {
    expect(await textDecoder()(bytes('héllo'), 'text/plain')).toBe('héllo');
  });

  it('throws on invalid UTF-8', () => {
    expect(() => textDecoder()(new Uint8Array([0xff, 0xfe]), 'text/plain')).toThrow(TypeError);
  });
});

describe('bytesDecoder', () => {
  it('returns the content unchanged', async () => {
    const content = new Uint8Array([1, 2, 3]);
    expect(await bytesDecoder()(content, 'application/octet-stream')).toBe(content);
  });
});
