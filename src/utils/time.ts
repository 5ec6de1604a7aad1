export const SECONDS_PER_DAY = 86_400;

export function epochSecondsNow(): number {
  return Math.floor(Date.now() / 1000);
}

export function epochToIso(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString();
}

export function days(count: number): number {
  return count * SECONDS_PER_DAY;
}

export function describeAge(seconds: number): string {
  if (seconds < 60) {
    return `${seconds}s`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)}m`;
  }
  if (seconds < SECONDS_PER_DAY) {
    return `${Math.floor(seconds / 3600)}h`;
  }
  return `${Math.floor(seconds / SECONDS_PER_DAY)}d`;
}
