import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { InMemoryHttpCache } from '../cache/InMemoryHttpCache';
import { CacheMissError, CodecEncodeError, CodecParseError } from '../errors';
import { HttpClient } from '../HttpClient';
import { asJson, asText } from '../decoders';
import { digestHex, sign } from '../signature';
import type { HttpClientConfig, HttpHeaders, HttpTransport, Logger } from '../types';

const encoder = new TextEncoder();
const jsonBody = (value: unknown) => encoder.encode(JSON.stringify(value));

const respondWith = (status: number, body: Uint8Array = jsonBody({}), headers: HttpHeaders = {}) =>
  vi.fn<HttpTransport>().mockResolvedValue({ status, headers, body });

const DEFAULT_HEADER_SEGMENT = 'headers:accept:application/json&content-type:application/json';

const Person = z.object({ name: z.string(), age: z.number() });

describe('HttpClient', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  const createClient = (overrides: Partial<HttpClientConfig> = {}) =>
    new HttpClient({
      host: 'https://api.example.com/v1',
      logger,
      ...overrides,
    });

  it('performs a GET request and decodes JSON', async () => {
    const transport = respondWith(200, jsonBody({ name: 'Ada', age: 36 }), { 'content-type': 'application/json' });
    const client = createClient({ transport });

    const result = await client.get('/users/42', { decode: asJson(Person, 'Person') });

    const canonical = `GET|https://api.example.com/v1/users/42|${DEFAULT_HEADER_SEGMENT}`;
    expect(result).toEqual({
      ok: true,
      value: { name: 'Ada', age: 36 },
      response: { status: 200, headers: { 'content-type': 'application/json' } },
      canonicalString: canonical,
      signature: sign(canonical),
    });
    expect(transport).toHaveBeenCalledWith(
      {
        method: 'GET',
        url: 'https://api.example.com/v1/users/42',
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
        body: undefined,
        cachePolicy: 'useProtocolCachePolicy',
        signature: sign(canonical),
      },
      expect.any(AbortSignal),
    );
  });

  it('returns raw bytes when no decoder is given', async () => {
    const transport = respondWith(200, new Uint8Array([1, 2, 3]));
    const result = await createClient({ transport }).delete('/items/1');

    expect(result.ok && result.value).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('decodes text responses', async () => {
    const transport = respondWith(200, encoder.encode('pong'));
    const result = await createClient({ transport }).get('/ping', { decode: asText() });

    expect(result.ok && result.value).toBe('pong');
  });

  it.each([200, 299])('treats status %i as success', async (status) => {
    const result = await createClient({ transport: respondWith(status) }).get('/status');
    expect(result.ok).toBe(true);
  });

  it.each([99, 199, 300, 404, 500, 600])('treats status %i as a server failure', async (status) => {
    const body = encoder.encode('nope');
    const result = await createClient({ transport: respondWith(status, body, { 'x-request-id': 'r-1' }) }).get('/status');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'server', statusCode: status, body });
      expect(result.response).toEqual({ status, headers: { 'x-request-id': 'r-1' } });
      expect(result.signature).toBe(sign(result.canonicalString));
    }
  });

  it('reports transport errors with the trace of the built request', async () => {
    const cause = new Error('ECONNRESET');
    const transport = vi.fn<HttpTransport>().mockRejectedValue(cause);

    const result = await createClient({ transport }).get('/users');

    const canonical = `GET|https://api.example.com/v1/users|${DEFAULT_HEADER_SEGMENT}`;
    expect(result).toEqual({
      ok: false,
      error: { kind: 'transport', cause },
      response: undefined,
      canonicalString: canonical,
      signature: sign(canonical),
    });
  });

  it('reports responses that are not HTTP responses as invalid', async () => {
    const result = await createClient({ transport: respondWith(200.5) }).get('/users');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ kind: 'invalidResponse' });
      expect(result.canonicalString).not.toBe('');
    }
  });

  it('fails with invalidURL and an empty trace when the host is empty', async () => {
    const transport = respondWith(200);
    const result = await createClient({ host: '', transport }).get('/users');

    expect(result).toEqual({ ok: false, error: { kind: 'invalidURL' }, canonicalString: '', signature: '' });
    expect(transport).not.toHaveBeenCalled();
  });

  it('fails with encoding and an empty trace when the body cannot be serialized', async () => {
    const transport = respondWith(200);
    const result = await createClient({ transport }).post('/users', { body: { id: 1n } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('encoding');
      expect(result.error.kind === 'encoding' && result.error.cause).toBeInstanceOf(CodecEncodeError);
      expect(result.canonicalString).toBe('');
      expect(result.signature).toBe('');
    }
    expect(transport).not.toHaveBeenCalled();
  });

  it('maps decode failures to the missing field', async () => {
    const transport = respondWith(200, jsonBody({ name: 'Josh' }));
    const result = await createClient({ transport }).get('/people/1', { decode: asJson(Person, 'Person') });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({
        kind: 'decoding',
        typeName: 'Person',
        fieldPath: 'age',
        cause: expect.any(CodecParseError),
      });
      expect(result.response).toBeUndefined();
      expect(result.signature).toBe(sign(result.canonicalString));
    }
  });

  it('names decode failures after the schema description when no type name is given', async () => {
    const transport = respondWith(200, jsonBody({ id: 'x' }));
    const Item = z.object({ id: z.number().int() }).describe('Item');
    const result = await createClient({ transport }).get('/items/1', { decode: asJson(Item) });

    expect(!result.ok && result.error).toEqual({
      kind: 'decoding',
      typeName: 'Item',
      fieldPath: 'id',
      cause: expect.any(CodecParseError),
    });
  });

  it('encodes JSON bodies and signs them with a body hash', async () => {
    const transport = respondWith(201);
    const result = await createClient({ transport }).post('/users', { body: { name: 'Ada' } });

    const body = encoder.encode('{"name":"Ada"}');
    const canonical = `POST|https://api.example.com/v1/users|${DEFAULT_HEADER_SEGMENT}`;
    expect(transport.mock.calls[0][0].body).toEqual(body);
    expect(result.canonicalString).toBe(canonical);
    expect(result.signature).toBe(sign(`${canonical}|body:${digestHex(body)}`));
  });

  it('sends byte bodies as they are', async () => {
    const transport = respondWith(200);
    await createClient({ transport }).put('/blobs/1', { body: new Uint8Array([9, 8, 7]) });

    expect(transport.mock.calls[0][0].body).toEqual(new Uint8Array([9, 8, 7]));
  });

  it('lets per-call headers override defaults with their own casing', async () => {
    const transport = respondWith(200);
    await createClient({ transport }).get('/users', { headers: { accept: 'text/plain', 'X-Trace': 't-1' } });

    expect(transport.mock.calls[0][0].headers).toEqual({
      accept: 'text/plain',
      'Content-Type': 'application/json',
      'X-Trace': 't-1',
    });
  });

  it('adds query and fragment to the URL and the canonical string', async () => {
    const transport = respondWith(200);
    const result = await createClient({ transport, defaultHeaders: {} }).get('/search', {
      query: { q: 'a b', page: '2' },
      fragment: 'results',
    });

    expect(transport.mock.calls[0][0].url).toBe('https://api.example.com/v1/search?q=a%20b&page=2#results');
    expect(result.canonicalString).toBe('GET|https://api.example.com/v1/search?page=2&q=a b#results');
  });

  it('produces the same signature for five identical calls', async () => {
    const client = createClient({ transport: respondWith(200) });
    const signatures: string[] = [];
    for (let i = 0; i < 5; i += 1) {
      const result = await client.get('/users', { query: { page: '1' } });
      signatures.push(result.signature);
    }

    expect(new Set(signatures).size).toBe(1);
    expect(signatures[0]).not.toBe('');
  });

  it('prefers the configured port over one in the host', async () => {
    const transport = respondWith(200);
    const client = createClient({ host: 'http://localhost:3000/api', port: 9000, transport });

    await client.get('/health');

    expect(client.parsedHost).toEqual({ scheme: 'http', host: 'localhost', port: 9000, basePath: '/api' });
    expect(transport.mock.calls[0][0].url).toBe('http://localhost:9000/api/health');
  });

  it('freezes its settings', () => {
    const client = createClient();
    expect(Object.isFrozen(client.settings)).toBe(true);
    expect(Object.isFrozen(client.settings.parsedHost)).toBe(true);
    expect(Object.isFrozen(client.settings.defaultHeaders)).toBe(true);
  });

  it('forwards the cache policy to the transport', async () => {
    const transport = respondWith(200);
    const client = createClient({ transport, defaultCachePolicy: 'reloadIgnoringCacheData' });

    await client.get('/a');
    await client.get('/b', { cachePolicy: 'returnCacheDataElseLoad' });

    expect(transport.mock.calls[0][0].cachePolicy).toBe('reloadIgnoringCacheData');
    expect(transport.mock.calls[1][0].cachePolicy).toBe('returnCacheDataElseLoad');
  });

  describe('cancellation', () => {
    it('does not call the transport when already aborted', async () => {
      const transport = respondWith(200);
      const controller = new AbortController();
      controller.abort();

      const result = await createClient({ transport }).get('/users', { signal: controller.signal });

      expect(!result.ok && result.error.kind).toBe('cancelled');
      expect(result.canonicalString).not.toBe('');
      expect(transport).not.toHaveBeenCalled();
    });

    it('reports cancellation instead of a transport error when aborted in flight', async () => {
      const controller = new AbortController();
      const transport = vi.fn<HttpTransport>().mockImplementation(async () => {
        controller.abort();
        throw new Error('The operation was aborted');
      });

      const result = await createClient({ transport }).get('/users', { signal: controller.signal });

      expect(!result.ok && result.error.kind).toBe('cancelled');
    });

    it('does not decode a response that arrives after cancellation', async () => {
      const controller = new AbortController();
      const transport = vi.fn<HttpTransport>().mockImplementation(async () => {
        controller.abort();
        return { status: 200, headers: {}, body: jsonBody({ name: 'Ada', age: 36 }) };
      });

      const result = await createClient({ transport }).get('/people/1', {
        decode: asJson(Person, 'Person'),
        signal: controller.signal,
      });

      expect(!result.ok && result.error.kind).toBe('cancelled');
    });
  });

  describe('buildRequest and execute', () => {
    it('builds a frozen descriptor with the base path applied', async () => {
      const prepared = await createClient().buildRequest({
        method: 'PATCH',
        path: 'users/1/',
        body: { name: 'Ada' },
        headers: { 'X-Trace': 't-1' },
      });

      expect(prepared.ok).toBe(true);
      if (prepared.ok) {
        expect(prepared.descriptor).toEqual({
          method: 'PATCH',
          scheme: 'https',
          host: 'api.example.com',
          port: undefined,
          path: '/v1/users/1',
          headers: { Accept: 'application/json', 'Content-Type': 'application/json', 'X-Trace': 't-1' },
          query: undefined,
          fragment: undefined,
          body: encoder.encode('{"name":"Ada"}'),
          cachePolicy: 'useProtocolCachePolicy',
        });
        expect(Object.isFrozen(prepared.descriptor)).toBe(true);
      }
    });

    it('executes a prepared descriptor', async () => {
      const transport = respondWith(200, jsonBody({ name: 'Ada', age: 36 }));
      const client = createClient({ transport });
      const prepared = await client.buildRequest({ method: 'GET', path: '/people/1' });
      if (!prepared.ok) throw new Error('expected a descriptor');

      const raw = await client.execute(prepared.descriptor);
      const decoded = await client.execute(prepared.descriptor, asJson(Person));

      expect(raw.ok && raw.value).toEqual(jsonBody({ name: 'Ada', age: 36 }));
      expect(decoded.ok && decoded.value).toEqual({ name: 'Ada', age: 36 });
      expect(raw.signature).toBe(decoded.signature);
    });

    it('reports invalidURL from buildRequest for an empty host', async () => {
      const prepared = await createClient({ host: '   ' }).buildRequest({ method: 'GET', path: '/x' });
      expect(prepared).toEqual({ ok: false, error: { kind: 'invalidURL' }, canonicalString: '', signature: '' });
    });
  });

  describe('request', () => {
    it('dispatches on the given method', async () => {
      const transport = respondWith(200, jsonBody({ name: 'Ada', age: 36 }));
      const result = await createClient({ transport }).request({
        method: 'PUT',
        path: '/people/1',
        body: { name: 'Ada', age: 36 },
        decode: asJson(Person),
      });

      expect(transport.mock.calls[0][0].method).toBe('PUT');
      expect(result.ok && result.value.name).toBe('Ada');
    });
  });

  describe('logging', () => {
    it('logs failures with their kind and signature', async () => {
      const result = await createClient({ transport: respondWith(500) }).get('/broken');

      expect(logger.warn).toHaveBeenCalledWith('http.request.failed', {
        kind: 'server',
        method: 'GET',
        path: '/v1/broken',
        status: 500,
        signature: result.signature,
      });
    });

    it('logs sends and successes at debug level', async () => {
      const result = await createClient({ transport: respondWith(204) }).get('/ok');

      expect(logger.debug).toHaveBeenCalledWith('http.request.send', {
        method: 'GET',
        url: 'https://api.example.com/v1/ok',
        signature: result.signature,
      });
      expect(logger.debug).toHaveBeenCalledWith('http.request.succeeded', { status: 204, signature: result.signature });
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('with a cache provider', () => {
    it('serves repeated GETs from the cache and clears it on request', async () => {
      const cache = new InMemoryHttpCache();
      const transport = respondWith(200, jsonBody({ name: 'Ada', age: 36 }));
      const client = createClient({ transport, cache });

      const first = await client.get('/people/1', { decode: asJson(Person) });
      const second = await client.get('/people/1', { decode: asJson(Person) });

      expect(transport).toHaveBeenCalledTimes(1);
      expect(second).toEqual(first);
      expect(cache.size).toBe(1);

      await client.clearCache();
      expect(cache.size).toBe(0);
    });

    it('surfaces a cache miss under returnCacheDataDontLoad as a transport failure', async () => {
      const transport = respondWith(200);
      const client = createClient({ transport, cache: new InMemoryHttpCache() });

      const result = await client.get('/people/1', { cachePolicy: 'returnCacheDataDontLoad' });

      expect(!result.ok && result.error.kind).toBe('transport');
      expect(!result.ok && result.error.kind === 'transport' && result.error.cause).toBeInstanceOf(CacheMissError);
      expect(transport).not.toHaveBeenCalled();
    });

    it('keeps rejecting a malformed reply instead of serving it from the cache', async () => {
      const cache = new InMemoryHttpCache();
      const transport: HttpTransport = vi.fn().mockResolvedValue({ status: 200, headers: {}, body: new ArrayBuffer(4) });
      const client = createClient({ transport, cache });

      const first = await client.get('/x');
      const second = await client.get('/x');

      expect(!first.ok && first.error.kind).toBe('invalidResponse');
      expect(!second.ok && second.error.kind).toBe('invalidResponse');
      expect(transport).toHaveBeenCalledTimes(2);
      expect(cache.size).toBe(0);
    });

    it('reports a null reply as invalid whether or not a cache is configured', async () => {
      const transport: HttpTransport = vi.fn().mockResolvedValue(null);

      const cached = await createClient({ transport, cache: new InMemoryHttpCache() }).get('/x');
      const uncached = await createClient({ transport }).get('/x');

      expect(!cached.ok && cached.error.kind).toBe('invalidResponse');
      expect(!uncached.ok && uncached.error.kind).toBe('invalidResponse');
    });

    it('does nothing on clearCache without a cache provider', async () => {
      await expect(createClient().clearCache()).resolves.toBeUndefined();
    });
  });
});
