export type Logger = (message: string) => void;

let verbose = process.env.DEBUG !== undefined && process.env.DEBUG !== '';

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function createLogger(scope: string, qualifier?: string): Logger {
  return (message: string) => console.log(`[${scope}${qualifier ? `:${qualifier}` : ''}] ${message}`);
}

/** Same format as `createLogger`, but silent unless `--verbose` or `DEBUG` is set. */
export function createDebugLogger(scope: string, qualifier?: string): Logger {
  const log = createLogger(scope, qualifier);
  return (message: string) => {
    if (verbose) {
      log(message);
    }
  };
}
