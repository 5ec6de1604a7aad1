import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteCache } from '../cache/sqliteCache.js';
import { FetchError, ResponseShapeError, UnexpectedContentTypeError } from '../errors.js';
import { jot } from '../jot.js';
import { API, binaryResponse, createFakeOrigin, jsonResponse } from '../test-helpers.js';
import { CachedFetcher, USER_AGENT } from './fetcher.js';

const HELLO_MD5 = '5d41402abc4b2a76b9719d911017c592';
const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

describe('CachedFetcher.requestKey', () => {
  it('appends query parameters in order and skips undefined ones', () => {
    expect(
      CachedFetcher.requestKey(`${API}/mods/search`, { gameId: 432, gameVersion: undefined, slug: 'jei' }),
    ).toBe(`${API}/mods/search?gameId=432&slug=jei`);
  });

  it('keeps parameters already present in the URL', () => {
    expect(CachedFetcher.requestKey(`${API}/mods/search?gameId=432`, { slug: 'jei' })).toBe(
      `${API}/mods/search?gameId=432&slug=jei`,
    );
  });

  it('encodes parameter values the way they are sent', () => {
    expect(CachedFetcher.requestKey(`${API}/mods/search`, { searchFilter: 'just enough' })).toBe(
      `${API}/mods/search?searchFilter=just+enough`,
    );
  });
});

describe('CachedFetcher', () => {
  let now: number;
  let cache: SqliteCache;

  beforeEach(() => {
    now = 1_700_000_000;
    cache = new SqliteCache({ filePath: ':memory:', clock: () => now });
  });

  afterEach(() => {
    cache.close();
  });

  it('fetches once and answers the second call from the cache', async () => {
    const fetchMock = createFakeOrigin({ [`${API}/mods/1`]: () => jsonResponse({ data: 1 }) });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock, headers: { 'x-api-key': 'test-key' } });

    await expect(fetcher.getText({ url: `${API}/mods/1`, operation: 'test' })).resolves.toBe('{"data":1}');
    await expect(fetcher.getText({ url: `${API}/mods/1`, operation: 'test' })).resolves.toBe('{"data":1}');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(`${API}/mods/1`, {
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT, 'x-api-key': 'test-key' },
    });
  });

  it('shares a cache entry between requests that serialize to the same URL', async () => {
    const url = `${API}/mods/search?gameId=432&slug=jei`;
    const fetchMock = createFakeOrigin({ [url]: () => jsonResponse({ data: [] }) });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    await fetcher.getText({ url: `${API}/mods/search?gameId=432`, query: { slug: 'jei' }, operation: 'test' });
    await fetcher.getText({ url: `${API}/mods/search`, query: { gameId: 432, slug: 'jei' }, operation: 'test' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(cache.entry(url)?.payload).toBe('{"data":[]}');
  });

  it('refetches metadata after the default TTL of one day', async () => {
    const fetchMock = createFakeOrigin({ [`${API}/mods/1`]: () => jsonResponse({ data: 1 }) });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    await fetcher.getText({ url: `${API}/mods/1`, operation: 'test' });
    now += 86_399;
    await fetcher.getText({ url: `${API}/mods/1`, operation: 'test' });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    now += 1;
    await fetcher.getText({ url: `${API}/mods/1`, operation: 'test' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('keeps only one origin request in flight at a time', async () => {
    let active = 0;
    let maxActive = 0;
    const fetchMock = vi.fn<typeof fetch>(async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return jsonResponse({ data: [] });
    });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    await Promise.all([1, 2, 3, 4].map((id) => fetcher.getText({ url: `${API}/mods/${id}`, operation: 'test' })));

    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(maxActive).toBe(1);
  });

  it('answers cached keys while an origin request holds the gate', async () => {
    let release: (response: Response) => void = () => undefined;
    const fetchMock = vi.fn<typeof fetch>(async (input) => {
      if (String(input) === `${API}/mods/2`) {
        return new Promise<Response>((resolve) => {
          release = resolve;
        });
      }
      return jsonResponse({ data: 1 });
    });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });
    await fetcher.getText({ url: `${API}/mods/1`, operation: 'test' });

    const pending = fetcher.getText({ url: `${API}/mods/2`, operation: 'test' });
    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(2));

    await expect(fetcher.getText({ url: `${API}/mods/1`, operation: 'test' })).resolves.toBe('{"data":1}');
    expect(fetchMock).toHaveBeenCalledTimes(2);

    release(jsonResponse({ data: 2 }));
    await expect(pending).resolves.toBe('{"data":2}');
  });

  it('annotates a failing status with the operation and does not cache it', async () => {
    const fetchMock = createFakeOrigin({});
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });
    const target = { url: `${API}/mods/7/files`, operation: 'fetching files for project id 7' };

    await expect(fetcher.getText(target)).rejects.toMatchObject({
      name: 'FetchError',
      operation: 'fetching files for project id 7',
      status: 404,
      message: `Failed fetching files for project id 7: status 404 Not Found (${API}/mods/7/files)`,
    });
    await expect(fetcher.getText(target)).rejects.toBeInstanceOf(FetchError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(cache.entry(`${API}/mods/7/files`)).toBeUndefined();
  });

  it('wraps transport failures and keeps the original as cause', async () => {
    const transport = new TypeError('fetch failed');
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(transport);
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    const error = await fetcher.getText({ url: `${API}/mods/1`, operation: 'test' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ cause: transport });
  });

  it('reports an XML answer as a miscomputed URL', async () => {
    const url = 'https://media.forgecdn.net/files/1/2/missing.jar';
    const fetchMock = createFakeOrigin({
      [url]: () => new Response('<Error>NoSuchKey</Error>', { headers: { 'content-type': 'application/xml' } }),
    });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    const error = await fetcher.getFileInfo(url, 'hashing').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UnexpectedContentTypeError);
    expect(error).toMatchObject({ operation: 'hashing', url, contentType: 'application/xml' });
    expect(cache.entry(url)).toBeUndefined();
  });

  it('rejects responses that do not match the schema', async () => {
    const fetchMock = createFakeOrigin({ [`${API}/mods/1`]: () => jsonResponse({ data: { id: 'one' } }) });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });
    const schema = jot.object({ data: jot.object({ id: jot.integer() }) });

    await expect(fetcher.getJson({ url: `${API}/mods/1`, operation: 'test' }, schema)).rejects.toBeInstanceOf(
      ResponseShapeError,
    );
  });

  it('hashes a binary without sending catalog headers', async () => {
    const url = 'https://media.forgecdn.net/files/1/2/hello.jar';
    const fetchMock = createFakeOrigin({ [url]: () => binaryResponse('hello') });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock, headers: { 'x-api-key': 'test-key' } });

    await expect(fetcher.getFileInfo(url, 'hashing')).resolves.toEqual({
      md5: HELLO_MD5,
      sha256: HELLO_SHA256,
      size: 5,
      downloadUrl: url,
    });
    expect(fetchMock).toHaveBeenCalledWith(url, { headers: { Accept: '*/*', 'User-Agent': USER_AGENT } });
  });

  it('caches edge and media variants of a download under one key', async () => {
    const media = 'https://media.forgecdn.net/files/1/2/hello.jar';
    const fetchMock = createFakeOrigin({ [media]: () => binaryResponse('hello') });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    const fromEdge = await fetcher.getFileInfo('https://edge.forgecdn.net/files/1/2/hello.jar', 'hashing');
    const fromMedia = await fetcher.getFileInfo(media, 'hashing');

    expect(fromEdge).toEqual(fromMedia);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(media, expect.anything());
    expect(cache.entry(media)?.payload).toBe(JSON.stringify(fromMedia));
  });

  it('keeps file hashes for far longer than metadata', async () => {
    const url = 'https://media.forgecdn.net/files/1/2/hello.jar';
    const fetchMock = createFakeOrigin({ [url]: () => binaryResponse('hello') });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    await fetcher.getFileInfo(url, 'hashing');
    now += 86_400 * 300;
    await fetcher.getFileInfo(url, 'hashing');

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('finds stored entries by the URL as it was first given', async () => {
    const stored = 'https://media.forgecdn.net/files/1/2/a%20b%2Bc.jar';
    const fetchMock = createFakeOrigin({
      [stored]: () => binaryResponse('hello'),
      [`${API}/mods/1`]: () => jsonResponse({ data: 1 }),
    });
    const fetcher = new CachedFetcher({ cache, fetch: fetchMock });

    await fetcher.getFileInfo('https://edge.forgecdn.net/files/1/2/a b+c.jar', 'hashing');
    await fetcher.getText({ url: `${API}/mods/1`, operation: 'test' });

    expect(CachedFetcher.findCached(cache, 'https://edge.forgecdn.net/files/1/2/a b+c.jar')?.key).toBe(stored);
    expect(CachedFetcher.findCached(cache, `${API}/mods/1`)?.payload).toBe('{"data":1}');
    expect(CachedFetcher.findCached(cache, 'https://media.forgecdn.net/files/1/2/a+b.jar')).toBeUndefined();
  });
});
