import { vi } from 'vitest';
import { SqliteCache } from './cache/sqliteCache.js';
import { CurseForgeClient } from './clients/curseforge.js';
import { CachedFetcher } from './clients/fetcher.js';

export const API = 'https://api.example.test/v1';

export type Route = () => Response;

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function binaryResponse(text: string): Response {
  return new Response(text, { headers: { 'content-type': 'application/java-archive' } });
}

/** A `fetch` stand-in answering from a URL → response table; anything else is a 404. */
export function createFakeOrigin(routes: Record<string, Route>) {
  return vi.fn<typeof fetch>(async (input) => {
    const route = routes[String(input)];
    return route ? route() : new Response('not found', { status: 404, statusText: 'Not Found' });
  });
}

export function modJson(id: number, name: string, slug: string) {
  return {
    id,
    gameId: 432,
    name,
    slug,
    links: { websiteUrl: `https://www.curseforge.com/minecraft/mc-mods/${slug}` },
  };
}

export interface FileJsonInput {
  id: number;
  modId: number;
  fileName: string;
  fileDate?: string;
  releaseType?: 1 | 2 | 3;
  downloadUrl?: string | null;
  dependencies?: Array<{ modId: number; relationType: number }>;
}

export function fileJson(input: FileJsonInput) {
  return {
    id: input.id,
    modId: input.modId,
    displayName: input.fileName,
    fileName: input.fileName,
    fileDate: input.fileDate ?? '2020-01-01T00:00:00.000Z',
    releaseType: input.releaseType ?? 1,
    downloadUrl: input.downloadUrl === undefined ? null : input.downloadUrl,
    gameVersions: ['1.12.2'],
    dependencies: input.dependencies ?? [],
  };
}

export function page(data: unknown[], index: number, pageSize: number) {
  return { data, pagination: { index, pageSize, resultCount: data.length, totalCount: data.length } };
}

export interface TestCatalog {
  cache: SqliteCache;
  fetcher: CachedFetcher;
  client: CurseForgeClient;
  fetchMock: ReturnType<typeof createFakeOrigin>;
  clock: { now: number };
}

export function createTestCatalog(routes: Record<string, Route>, options: { pageSize?: number } = {}): TestCatalog {
  const clock = { now: 1_700_000_000 };
  const cache = new SqliteCache({ filePath: ':memory:', clock: () => clock.now });
  const fetchMock = createFakeOrigin(routes);
  const fetcher = new CachedFetcher({ cache, fetch: fetchMock, headers: { 'x-api-key': 'test-key' } });
  const client = new CurseForgeClient({ fetcher, baseUrl: API, pageSize: options.pageSize ?? 50 });
  return { cache, fetcher, client, fetchMock, clock };
}
