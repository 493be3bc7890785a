import { describe, expect, it } from 'vitest';
import { classify, classifyResponse, mimeType } from '../classify';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('classify', () => {
  it('treats any 2xx status as success and strips content type parameters', () => {
    const content = bytes('{"a":1}');
    const outcome = classify(200, 'Application/JSON; charset=UTF-8', {}, content);

    expect(outcome).toEqual({ kind: 'success', content, contentType: 'application/json', headers: {} });
  });

  it('treats 204 without a content type as success', () => {
    const outcome = classify(204, undefined, {}, new Uint8Array(0));

    expect(outcome.kind).toBe('success');
    expect(outcome.contentType).toBeUndefined();
  });

  it('uses the reason phrase as the message for non-text errors', () => {
    const outcome = classify(403, 'application/json', {}, bytes('{"error":"nope"}'));

    expect(outcome).toMatchObject({ kind: 'http-error', status: 403, message: 'Forbidden' });
  });

  it('uses a text/plain body as the message', () => {
    const outcome = classify(500, 'text/plain; charset=utf-8', {}, bytes('boom'));

    expect(outcome).toMatchObject({ kind: 'http-error', status: 500, message: 'boom', contentType: 'text/plain' });
  });

  it('uses any text body as the message', () => {
    const outcome = classify(502, 'text/html', {}, bytes('<p>bad gateway</p>'));
    expect(outcome).toMatchObject({ message: '<p>bad gateway</p>' });
  });

  it('leaves the message empty for an unknown status without a text body', () => {
    const outcome = classify(599, undefined, {}, new Uint8Array(0));

    expect(outcome.kind).toBe('http-error');
    expect(outcome.kind === 'http-error' ? outcome.message : 'unexpected').toBeUndefined();
  });

  it('treats redirects as errors', () => {
    const outcome = classify(302, undefined, {}, new Uint8Array(0));
    expect(outcome).toMatchObject({ kind: 'http-error', status: 302, message: 'Found' });
  });
});

describe('classifyResponse', () => {
  it('reads the content type from headers of any case', () => {
    const body = new ArrayBuffer(2);
    new Uint8Array(body).set([91, 93]);
    const outcome = classifyResponse({
      status: 201,
      headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'r-1' },
      body,
    });

    expect(outcome.kind).toBe('success');
    expect(outcome.contentType).toBe('application/json');
    expect(outcome.headers).toEqual({ 'content-type': 'application/json', 'x-request-id': 'r-1' });
    expect(Array.from(outcome.content)).toEqual([91, 93]);
  });
});

describe('mimeType', () => {
  it('returns undefined for a missing or blank header', () => {
    expect(mimeType(undefined)).toBeUndefined();
    expect(mimeType(' ; charset=utf-8')).toBeUndefined();
  });
});
