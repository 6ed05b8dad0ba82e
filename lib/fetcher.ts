import axios, { type AxiosInstance } from 'axios';
import { TextDecoder } from 'util';
import { DEFAULT_USER_AGENT, type EngineConfig } from './config';
import {
  CancelledError,
  HttpError,
  InvalidUrlError,
  TooLargeError,
  isCancelled,
  toCatalogError,
} from './errors';
import type { RawDocument } from './types';

export interface FetchFeedOptions {
  client?: AxiosInstance;
  timeoutMs?: number;
  maxBytes?: number;
  userAgent?: string;
  signal?: AbortSignal;
}

const ACCEPT_FEED = 'application/atom+xml;profile=opds-catalog, application/atom+xml, application/xml;q=0.9, */*;q=0.8';

export function assertAbsoluteUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidUrlError(url);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidUrlError(url);
  }
  return parsed;
}

/**
 * Retrieves one feed document. Performs no retries: that policy belongs
 * to the caller (see withTransientRetry).
 */
export async function fetchFeedDocument(url: string, options: FetchFeedOptions = {}): Promise<RawDocument> {
  const { client = axios, timeoutMs = 20_000, maxBytes = 10 * 1024 * 1024, signal } = options;
  assertAbsoluteUrl(url);

  if (signal?.aborted) throw new CancelledError();

  try {
    console.log('[Feed Fetcher] GET', url);
    const response = await client.get<ArrayBuffer>(url, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        'Accept': ACCEPT_FEED,
      },
      responseType: 'arraybuffer',
      timeout: timeoutMs,
      maxContentLength: maxBytes,
      maxRedirects: 5,
      signal,
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new HttpError(response.status, url);
    }

    const body = Buffer.from(response.data);
    if (body.byteLength > maxBytes) {
      throw new TooLargeError(maxBytes, url);
    }

    const finalUrl = response.request?.res?.responseUrl;
    const contentType = headerValue(response.headers['content-type']);

    return {
      url: typeof finalUrl === 'string' && finalUrl ? finalUrl : url,
      status: response.status,
      contentType,
      server: headerValue(response.headers['server']) || null,
      body: decodeFeedBody(body, contentType),
    };
  } catch (error) {
    const catalogError = toCatalogError(error, url);
    if (!isCancelled(catalogError)) {
      console.error(`[Feed Fetcher] Failed to fetch ${url}:`, catalogError.message);
    }
    throw catalogError;
  }
}

/**
 * Decodes with the charset of the Content-Type header, else the encoding
 * named in the XML declaration, else UTF-8. Unknown labels fall back to UTF-8.
 */
export function decodeFeedBody(body: Buffer, contentType: string): string {
  const declared =
    contentType.match(/;\s*charset="?([\w.:-]+)"?/i)?.[1] ??
    body.subarray(0, 256).toString('latin1').match(/^(?:\uFEFF|\u00EF\u00BB\u00BF)?\s*<\?xml[^>]*\bencoding\s*=\s*["']([\w.:-]+)["']/i)?.[1];

  if (declared) {
    try {
      return new TextDecoder(declared).decode(body);
    } catch {
      console.log(`[Feed Fetcher] Unknown encoding ${declared}, decoding as UTF-8`);
    }
  }
  return new TextDecoder('utf-8').decode(body);
}

function headerValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.filter((v) => typeof v === 'string').join(', ');
  return '';
}

/**
 * Runs `operation`, repeating it when it fails with a transient error,
 * up to `retries` extra attempts. Cancellation is never retried.
 */
export async function withTransientRetry<T>(
  operation: () => Promise<T>,
  retries: number,
  signal?: AbortSignal
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      const catalogError = toCatalogError(error);
      if (!catalogError.transient || attempt >= retries) throw catalogError;
      if (signal?.aborted) throw new CancelledError();
      attempt++;
      console.log(`[Feed Fetcher] Retrying after transient failure (${attempt}/${retries}): ${catalogError.message}`);
    }
  }
}

export function fetchOptionsFromConfig(
  config: Pick<EngineConfig, 'fetchTimeoutMs' | 'maxFeedBytes' | 'userAgent'>,
  client?: AxiosInstance
): FetchFeedOptions {
  return {
    client,
    timeoutMs: config.fetchTimeoutMs,
    maxBytes: config.maxFeedBytes,
    userAgent: config.userAgent,
  };
}
