import { AxiosError } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { CancelledError, HttpError, InvalidUrlError, NetworkError, TooLargeError } from './errors';
import { decodeFeedBody, fetchFeedDocument, withTransientRetry } from './fetcher';
import { createMockClient } from './testing/mock-http';

const FEED_URL = 'https://books.example.org/opds';

describe('fetchFeedDocument', () => {
  it('returns the body with content type and server header', async () => {
    const { client, calls } = createMockClient({
      [FEED_URL]: {
        body: '<feed/>',
        headers: { 'content-type': 'application/atom+xml;charset=utf-8', server: 'calibre 7.6.0' },
      },
    });

    const document = await fetchFeedDocument(FEED_URL, { client });

    expect(document).toEqual({
      url: FEED_URL,
      status: 200,
      contentType: 'application/atom+xml;charset=utf-8',
      server: 'calibre 7.6.0',
      body: '<feed/>',
    });
    expect(calls).toEqual([FEED_URL]);
  });

  it('reports non-2xx answers as HttpError', async () => {
    const { client } = createMockClient({ [FEED_URL]: { status: 503, body: 'busy' } });

    const failure = fetchFeedDocument(FEED_URL, { client });

    await expect(failure).rejects.toBeInstanceOf(HttpError);
    await expect(failure).rejects.toMatchObject({ status: 503, transient: false });
  });

  it('rejects bodies above the size cap', async () => {
    const { client } = createMockClient({ [FEED_URL]: { body: 'x'.repeat(64) } });

    await expect(fetchFeedDocument(FEED_URL, { client, maxBytes: 32 })).rejects.toBeInstanceOf(TooLargeError);
  });

  it('maps connection failures to a transient NetworkError', async () => {
    const { client } = createMockClient({ [FEED_URL]: new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED') });

    const failure = fetchFeedDocument(FEED_URL, { client });

    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toMatchObject({ transient: true });
  });

  it('refuses relative and non-http URLs without a request', async () => {
    const { client, calls } = createMockClient({});

    await expect(fetchFeedDocument('/opds', { client })).rejects.toBeInstanceOf(InvalidUrlError);
    await expect(fetchFeedDocument('ftp://books.example.org/opds', { client })).rejects.toBeInstanceOf(InvalidUrlError);
    expect(calls).toEqual([]);
  });

  it('does not start a request once the signal is aborted', async () => {
    const { client, calls } = createMockClient({ [FEED_URL]: { body: '<feed/>' } });
    const controller = new AbortController();
    controller.abort();

    await expect(fetchFeedDocument(FEED_URL, { client, signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(calls).toEqual([]);
  });
});

describe('decodeFeedBody', () => {
  it('follows the encoding named in the XML declaration', async () => {
    const xml = '<?xml version="1.0" encoding="ISO-8859-1"?><feed><title>Café</title></feed>';
    const { client } = createMockClient({
      [FEED_URL]: { body: Buffer.from(xml, 'latin1'), headers: { 'content-type': 'application/atom+xml' } },
    });

    expect((await fetchFeedDocument(FEED_URL, { client })).body).toBe(xml);
  });

  it('lets the Content-Type charset win over the declaration', () => {
    const body = Buffer.concat([Buffer.from('<?xml version="1.0" encoding="utf-8"?>Caf'), Buffer.from([0xe9])]);

    expect(decodeFeedBody(body, 'text/xml; charset=windows-1252')).toBe('<?xml version="1.0" encoding="utf-8"?>Café');
  });

  it('decodes unknown encodings as UTF-8', () => {
    const xml = '<?xml version="1.0" encoding="x-made-up"?><feed>Café</feed>';

    expect(decodeFeedBody(Buffer.from(xml, 'utf-8'), '')).toBe(xml);
  });
});

describe('withTransientRetry', () => {
  it('retries once after a network error', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new NetworkError('reset'))
      .mockResolvedValueOnce('page');

    await expect(withTransientRetry(operation, 1)).resolves.toBe('page');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up after the allowed retries', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new NetworkError('reset'));

    await expect(withTransientRetry(operation, 1)).rejects.toBeInstanceOf(NetworkError);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('does not retry once the signal is aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn<() => Promise<string>>().mockImplementation(async () => {
      controller.abort();
      throw new NetworkError('reset');
    });

    await expect(withTransientRetry(operation, 1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('never retries fatal errors', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpError(404, FEED_URL));

    await expect(withTransientRetry(operation, 1)).rejects.toBeInstanceOf(HttpError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
