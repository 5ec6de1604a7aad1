import pLimit, { type LimitFunction } from 'p-limit';
import type { CacheEntry, CacheStore } from '../cache/cache.js';
import { FetchError, ResponseShapeError, UnexpectedContentTypeError } from '../errors.js';
import { contentDigest } from '../utils/hash.js';
import { days } from '../utils/time.js';
import type { Logger } from '../utils/logger.js';
import type { CurseModFileInfo } from '../types/index.js';
import { jot, type JotSchema } from '../jot.js';
import { canonicalDownloadUrl, canonicalHost } from './urls.js';

export const DEFAULT_TTL = days(1);
/** Published files never change, so their hashes are kept for a year. */
export const INFINITE_TTL = days(365);

export const USER_AGENT = 'modpack-manifests/0.1.0';

export type QueryValue = string | number | undefined;

export interface FetchTarget {
  url: string;
  query?: Record<string, QueryValue>;
  ttlSeconds?: number;
  /** Describes the logical operation for error messages, e.g. "fetching addon info for project id 1". */
  operation: string;
}

export interface CachedFetcherOptions {
  cache: CacheStore;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Cache-aside fetching on top of a {@link CacheStore}. Cache hits never touch
 * the network; misses go through one shared gate so only a single origin
 * request is in flight at a time.
 */
export class CachedFetcher {
  private readonly cache: CacheStore;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly gate: LimitFunction;
  private readonly logger: Logger | undefined;

  constructor(options: CachedFetcherOptions) {
    this.cache = options.cache;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.gate = pLimit(1);
    this.logger = options.logger;
  }

  /** The key a request is cached under: the URL exactly as it is sent. */
  static requestKey(url: string, query: Record<string, QueryValue> = {}): string {
    const resolved = new URL(canonicalHost(url));
    for (const [name, value] of Object.entries(query)) {
      if (value !== undefined) {
        resolved.searchParams.append(name, String(value));
      }
    }
    return resolved.toString();
  }

  /**
   * Looks a URL up the way it would have been stored: first as a request
   * key, then as a download URL with its file name re-encoded.
   */
  static findCached(cache: CacheStore, url: string): CacheEntry | undefined {
    const keys = new Set([CachedFetcher.requestKey(url), canonicalDownloadUrl(url)]);
    for (const key of keys) {
      const entry = cache.entry(key);
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }

  async getText(target: FetchTarget): Promise<string> {
    const key = CachedFetcher.requestKey(target.url, target.query);
    return this.cache.getOrPut(key, target.ttlSeconds ?? DEFAULT_TTL, () =>
      this.gate(async () => {
        this.logger?.(`Fetching ${key}`);
        const response = await this.send(key, target.operation, 'application/json');
        return response.text();
      }),
    );
  }

  async getJson<T>(target: FetchTarget, schema: JotSchema<T>): Promise<T> {
    const text = await this.getText(target);
    const url = CachedFetcher.requestKey(target.url, target.query);

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ResponseShapeError(`Response to ${target.operation} is not valid JSON (${url})`, { cause: error });
    }

    try {
      return schema.parse(raw, 'response');
    } catch (error) {
      throw new ResponseShapeError(`Unexpected response shape while ${target.operation} (${url})`, {
        cause: error,
      });
    }
  }

  /**
   * Downloads a published binary and returns its hashes. Cached for
   * {@link INFINITE_TTL} under the canonical download URL, so the `edge` and
   * `media` CDN hosts share one entry.
   */
  async getFileInfo(downloadUrl: string, operation: string): Promise<CurseModFileInfo> {
    const url = canonicalDownloadUrl(downloadUrl);
    const json = await this.cache.getOrPut(url, INFINITE_TTL, () =>
      this.gate(async () => {
        this.logger?.(`Downloading ${url}`);
        const response = await this.send(url, operation, '*/*', false);
        const bytes = new Uint8Array(await response.arrayBuffer());
        const info: CurseModFileInfo = { ...contentDigest(bytes), downloadUrl: url };
        return JSON.stringify(info);
      }),
    );

    try {
      return fileInfoSchema.parse(JSON.parse(json), 'fileInfo');
    } catch (error) {
      throw new ResponseShapeError(`Cached file description for ${url} is unreadable`, { cause: error });
    }
  }

  private async send(url: string, operation: string, accept: string, withHeaders = true): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Accept: accept,
          'User-Agent': USER_AGENT,
          ...(withHeaders ? this.headers : {}),
        },
      });
    } catch (error) {
      throw new FetchError(operation, url, 'request failed', { cause: error });
    }

    if (!response.ok) {
      throw new FetchError(operation, url, `status ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
      });
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (/xml/i.test(contentType) || (accept === 'application/json' && /text\/html/i.test(contentType))) {
      throw new UnexpectedContentTypeError(operation, url, contentType);
    }

    return response;
  }
}

const fileInfoSchema = jot.object({
  md5: jot.string(),
  sha256: jot.string(),
  size: jot.integer(),
  downloadUrl: jot.string(),
});
