import { describe, it, expect, vi, afterEach } from 'vitest';
import { isResourceLoadError, ResourceLoadError } from '../errors';
import {
  createDocumentFetcher,
  createStylesheetFetcher,
  fetchAssetWithTimeout,
  fetchTextWithTimeout,
} from '../http';
import { fakeDocument, TEST_HEADERS } from './fakeServices';

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('fetchTextWithTimeout', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the identifying user agent', async () => {
    const fetchMock = stubFetch(() => new Response('<html></html>'));

    await expect(fetchTextWithTimeout('https://example.com', TEST_HEADERS, 5000)).resolves.toBe('<html></html>');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://example.com');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ 'User-Agent': 'DragonFly/1.0' });
  });

  it('reports server errors as transport failures', async () => {
    stubFetch(() => new Response('boom', { status: 500 }));

    const error = await fetchTextWithTimeout('https://example.com', TEST_HEADERS, 5000).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ResourceLoadError);
    expect(isResourceLoadError(error)).toBe(true);
    expect(error).toMatchObject({ kind: 'transport', url: 'https://example.com' });
    expect(error).toHaveProperty('message', 'HTTP 500 while fetching https://example.com');
  });

  it('reports 404 as not found', async () => {
    stubFetch(() => new Response('missing', { status: 404 }));

    await expect(fetchTextWithTimeout('https://example.com/gone', TEST_HEADERS, 5000)).rejects.toMatchObject({
      kind: 'not-found',
    });
  });

  it('wraps network errors', async () => {
    const cause = new TypeError('fetch failed');
    stubFetch(() => {
      throw cause;
    });

    const error = await fetchTextWithTimeout('https://example.com', TEST_HEADERS, 5000).catch((e: unknown) => e);
    expect(isResourceLoadError(error)).toBe(true);
    expect(isResourceLoadError(cause)).toBe(false);
    expect(error).toHaveProperty('cause', cause);
  });

  it('describes wrapped network errors', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    await expect(fetchTextWithTimeout('https://example.com', TEST_HEADERS, 5000)).rejects.toMatchObject({
      kind: 'transport',
      message: 'Failed to fetch https://example.com: fetch failed',
    });
  });
});

describe('fetchAssetWithTimeout', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the bytes and content type', async () => {
    stubFetch(
      () =>
        new Response(new Uint8Array([1, 2, 3]), {
          headers: { 'content-type': 'image/png' },
        }),
    );

    const asset = await fetchAssetWithTimeout('https://example.com/favicon.png', TEST_HEADERS, 5000);
    expect(Array.from(asset.bytes)).toEqual([1, 2, 3]);
    expect(asset.contentType).toBe('image/png');
  });
});

describe('createDocumentFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('parses the fetched body', async () => {
    stubFetch(() => new Response('<title>Hi</title>'));
    const document = fakeDocument({ title: 'Hi' });
    const parse = vi.fn((_source: string) => document);

    const fetchDocument = createDocumentFetcher({ timeoutMs: 5000, parse });

    await expect(fetchDocument('https://example.com', TEST_HEADERS)).resolves.toBe(document);
    expect(parse).toHaveBeenCalledWith('<title>Hi</title>');
  });

  it('returns null when the transport fails', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    const fetchDocument = createDocumentFetcher({ timeoutMs: 5000 });
    await expect(fetchDocument('https://example.com', TEST_HEADERS)).resolves.toBeNull();
  });

  it('returns null when the parser finds no document', async () => {
    stubFetch(() => new Response('garbage'));

    const fetchDocument = createDocumentFetcher({ timeoutMs: 5000, parse: () => null });
    await expect(fetchDocument('https://example.com', TEST_HEADERS)).resolves.toBeNull();
  });
});

describe('createStylesheetFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns null on HTTP errors', async () => {
    stubFetch(() => new Response('nope', { status: 503 }));

    const fetchStylesheet = createStylesheetFetcher({ timeoutMs: 5000 });
    await expect(fetchStylesheet('https://example.com/site.css', TEST_HEADERS)).resolves.toBeNull();
  });

  it('parses stylesheets with the default parser', async () => {
    stubFetch(() => new Response('h1 { font-weight: bold; }'));

    const fetchStylesheet = createStylesheetFetcher({ timeoutMs: 5000 });
    const sheet = await fetchStylesheet('https://example.com/site.css', TEST_HEADERS);
    expect(sheet?.cssRules).toHaveLength(1);
  });
});
