export class CacheOpenError extends Error {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`Unable to open cache database at ${path}`, options);
    this.name = 'CacheOpenError';
    this.path = path;
  }
}

export class CacheStoreError extends Error {
  readonly key: string;

  constructor(message: string, key: string, options?: ErrorOptions) {
    super(`${message} (${key})`, options);
    this.name = 'CacheStoreError';
    this.key = key;
  }
}

/**
 * Transport failure or non-success HTTP status, annotated with the logical
 * operation that issued the request (e.g. "fetching files for project id 1234").
 */
export class FetchError extends Error {
  readonly operation: string;
  readonly url: string;
  readonly status: number | undefined;

  constructor(operation: string, url: string, detail: string, options?: ErrorOptions & { status?: number }) {
    super(`Failed ${operation}: ${detail} (${url})`, options);
    this.name = 'FetchError';
    this.operation = operation;
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * The origin answered with a body we never ask for, usually an XML error
 * document from the CDN. This means the request URL itself was built wrong.
 */
export class UnexpectedContentTypeError extends Error {
  readonly operation: string;
  readonly url: string;
  readonly contentType: string;

  constructor(operation: string, url: string, contentType: string) {
    super(`Failed ${operation}: unexpected content type "${contentType}", the URL is probably miscomputed (${url})`);
    this.name = 'UnexpectedContentTypeError';
    this.operation = operation;
    this.url = url;
    this.contentType = contentType;
  }
}

export class ResponseShapeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ResponseShapeError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ManifestError extends Error {
  readonly path: string;

  constructor(path: string, detail: string, options?: ErrorOptions) {
    super(`Invalid manifest ${path}: ${detail}`, options);
    this.name = 'ManifestError';
    this.path = path;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** One mod of a manifest could not be resolved; `cause` holds the reason. */
export class ResolutionError extends Error {
  readonly subject: string;

  constructor(subject: string, options?: ErrorOptions) {
    super(`Failed to resolve ${subject}`, options);
    this.name = 'ResolutionError';
    this.subject = subject;
  }
}

export class IntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/** Joins an error and its `cause` chain into one line for the terminal. */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  while (current !== undefined && parts.length < 8) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(': caused by ');
}
