import axios from 'axios';

export type CatalogErrorCode =
  | 'network'
  | 'http'
  | 'too-large'
  | 'parse'
  | 'busy'
  | 'no-acquisition-link'
  | 'transfer'
  | 'cancelled'
  | 'invalid-url';

/**
 * Base class for everything the engine reports. `transient` marks failures
 * that are eligible for a single retry.
 */
export class CatalogError extends Error {
  readonly code: CatalogErrorCode;
  readonly transient: boolean;

  constructor(code: CatalogErrorCode, message: string, options?: { cause?: unknown; transient?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.transient = options?.transient ?? false;
  }
}

export class NetworkError extends CatalogError {
  constructor(message: string, cause?: unknown) {
    super('network', message, { cause, transient: true });
  }
}

export class HttpError extends CatalogError {
  readonly status: number;

  constructor(status: number, url: string) {
    super('http', `Server answered ${status} for ${url}`);
    this.status = status;
  }
}

export class TooLargeError extends CatalogError {
  readonly limit: number;

  constructor(limit: number, url: string) {
    super('too-large', `Response from ${url} exceeds ${limit} bytes`);
    this.limit = limit;
  }
}

export class ParseError extends CatalogError {
  constructor(message: string, cause?: unknown) {
    super('parse', message, { cause });
  }
}

export class BusyError extends CatalogError {
  constructor() {
    super('busy', 'Another request is already in progress');
  }
}

export class NoAcquisitionLinkError extends CatalogError {
  readonly entryId: string;

  constructor(entryId: string) {
    super('no-acquisition-link', `Entry ${entryId} has no downloadable link`);
    this.entryId = entryId;
  }
}

export class TransferError extends CatalogError {
  readonly reason: string;

  constructor(reason: string, cause?: unknown) {
    super('transfer', `Transfer failed: ${reason}`, { cause });
    this.reason = reason;
  }
}

export class CancelledError extends CatalogError {
  constructor() {
    super('cancelled', 'Request was cancelled');
  }
}

export class InvalidUrlError extends CatalogError {
  constructor(url: string) {
    super('invalid-url', `Not an absolute http(s) URL: ${url}`);
  }
}

/**
 * Maps anything thrown by axios, fs or host callbacks onto the taxonomy.
 * HTTP status and size checks happen before this, so an axios error that
 * reaches here without a response is a connection-level failure.
 */
export function toCatalogError(error: unknown, url = ''): CatalogError {
  if (error instanceof CatalogError) return error;

  if (axios.isCancel(error)) return new CancelledError();

  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new HttpError(error.response.status, url);
    }
    if (error.message.includes('maxContentLength')) {
      return new TooLargeError(error.config?.maxContentLength ?? 0, url);
    }
    if (error.code === 'ERR_CANCELED') return new CancelledError();
    const code = error.code ? ` (${error.code})` : '';
    return new NetworkError(`Could not reach ${url || 'server'}${code}`, error);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') return new CancelledError();
    return new TransferError(error.message, error);
  }

  return new TransferError(typeof error === 'string' ? error : 'Unknown error', error);
}

export function isCancelled(error: unknown): boolean {
  return error instanceof CatalogError && error.code === 'cancelled';
}

/**
 * Message suitable for showing in the host UI.
 */
export function describeError(error: CatalogError): string {
  switch (error.code) {
    case 'network':
      return 'Could not reach the catalog server. Check the connection and try again.';
    case 'http':
      if (error instanceof HttpError && error.status === 404) return 'Catalog page not found';
      if (error instanceof HttpError && (error.status === 401 || error.status === 403)) {
        return 'The catalog server refused access';
      }
      return error instanceof HttpError ? `Catalog server error (${error.status})` : error.message;
    case 'too-large':
      return 'Response too large - the server sent more data than allowed';
    case 'parse':
      return 'The server did not return a readable OPDS catalog';
    case 'busy':
      return 'Still loading, please wait';
    case 'no-acquisition-link':
      return 'No downloadable format is offered for this book';
    case 'transfer':
      return error.message;
    case 'cancelled':
      return 'Cancelled';
    case 'invalid-url':
      return 'The catalog URL must start with http:// or https://';
  }
}
