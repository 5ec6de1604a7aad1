const HOST_ALIASES: ReadonlyMap<string, string> = new Map([['edge.forgecdn.net', 'media.forgecdn.net']]);

const CDN_BASE = 'https://edge.forgecdn.net/files';

const SLUG_PATTERN = /.*\/(?<slug>[^/]+)\/?$/;

/** Rewrites aliased CDN hosts to their canonical counterpart. */
export function canonicalHost(url: string): string {
  const parsed = new URL(url);
  const canonical = HOST_ALIASES.get(parsed.hostname);
  if (canonical) {
    parsed.hostname = canonical;
  }
  return parsed.toString();
}

/**
 * Decodes and re-encodes the file name segment. The catalog hands out URLs
 * with and without encoding, and the CDN only accepts `+` as `%2B`.
 */
export function encodeFileName(fileName: string): string {
  return encodeURIComponent(safeDecode(fileName));
}

/** The canonical form of a download URL, used both as cache key and request target. */
export function canonicalDownloadUrl(url: string): string {
  const parsed = new URL(canonicalHost(url));
  const segments = parsed.pathname.split('/');
  const last = segments.pop() ?? '';
  segments.push(encodeFileName(last));
  parsed.pathname = segments.join('/');
  return parsed.toString();
}

/** Download URL for a file the catalog lists without one. */
export function downloadUrlForFile(fileId: number, fileName: string): string {
  const url = `${CDN_BASE}/${Math.floor(fileId / 1000)}/${fileId % 1000}/${encodeFileName(fileName)}`;
  return canonicalDownloadUrl(url);
}

export function fileNameFromUrl(url: string): string {
  const segments = new URL(url).pathname.split('/').filter((segment) => segment.length > 0);
  return safeDecode(segments[segments.length - 1] ?? '');
}

export function slugFromWebsiteUrl(url: string): string | undefined {
  return SLUG_PATTERN.exec(url)?.groups?.slug;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Not valid percent-encoding; treat it as already decoded.
    return segment;
  }
}
