export interface CacheEntry {
  key: string;
  payload: string;
  /** Seconds since the Unix epoch at which the payload was computed. */
  fetchedAt: number;
}

export type Compute = () => Promise<string>;

export interface CacheStore {
  /**
   * Returns the payload stored for `key` if it is younger than `ttlSeconds`.
   * Otherwise runs `compute`, stores its result and returns it. A failing
   * `compute` leaves the store untouched and its error reaches the caller as is.
   */
  getOrPut(key: string, ttlSeconds: number, compute: Compute): Promise<string>;
  entry(key: string): CacheEntry | undefined;
  close(): void;
}
