import { describe, expect, it } from 'vitest';
import { fetchCalibreTimestamps, isCalibreServer, withServerTimestamps } from './calibre-timestamps';
import { ParseError } from './errors';
import { BASE, makeEntry } from './testing/catalog-fixtures';
import { createMockClient } from './testing/mock-http';

const json = (value: unknown) => ({ body: JSON.stringify(value), headers: { 'content-type': 'application/json' } });

describe('isCalibreServer', () => {
  it('recognizes the calibre content server header', () => {
    expect(isCalibreServer('calibre 7.6.0')).toBe(true);
    expect(isCalibreServer(' Calibre')).toBe(true);
    expect(isCalibreServer('nginx/1.25')).toBe(false);
    expect(isCalibreServer(null)).toBe(false);
  });
});

describe('fetchCalibreTimestamps', () => {
  it('maps book uuids to their library timestamps', async () => {
    const { client, calls } = createMockClient({
      [`${BASE}/ajax/search`]: json({ total_num: 3, book_ids: [1, 2] }),
      [`${BASE}/ajax/search?num=3&offset=0`]: json({ total_num: 3, book_ids: [1, 2, 3] }),
      [`${BASE}/ajax/books?ids=1,2,3`]: json({
        1: { uuid: 'uuid-1', timestamp: '2021-05-04T10:20:30.500+00:00' },
        2: { uuid: 'uuid-2', timestamp: null },
        3: null,
      }),
    });

    const timestamps = await fetchCalibreTimestamps(`${BASE}/opds/new?page=2`, { client });

    expect(timestamps).toEqual(new Map([['uuid-1', new Date('2021-05-04T10:20:30.500Z')]]));
    expect(calls).toEqual([
      `${BASE}/ajax/search`,
      `${BASE}/ajax/search?num=3&offset=0`,
      `${BASE}/ajax/books?ids=1,2,3`,
    ]);
  });

  it('skips the book lookup for an empty library', async () => {
    const { client, calls } = createMockClient({
      [`${BASE}/ajax/search`]: json({ total_num: 0, book_ids: [] }),
      [`${BASE}/ajax/search?num=0&offset=0`]: json({ total_num: 0, book_ids: [] }),
    });

    expect((await fetchCalibreTimestamps(`${BASE}/opds`, { client })).size).toBe(0);
    expect(calls).toHaveLength(2);
  });

  it('reports malformed answers as ParseError', async () => {
    const broken = createMockClient({ [`${BASE}/ajax/search`]: { body: '<html>' } });
    const unexpected = createMockClient({ [`${BASE}/ajax/search`]: json({ total_num: 'many' }) });

    await expect(fetchCalibreTimestamps(`${BASE}/opds`, { client: broken.client })).rejects.toBeInstanceOf(ParseError);
    await expect(fetchCalibreTimestamps(`${BASE}/opds`, { client: unexpected.client })).rejects.toBeInstanceOf(
      ParseError
    );
  });
});

describe('withServerTimestamps', () => {
  it('replaces updated values of entries with a known identifier', () => {
    const stamped = makeEntry('a', { identifiers: ['urn:uuid:uuid-1', 'uuid-1'] });
    const untouched = makeEntry('b');
    const timestamp = new Date('2021-05-04T10:20:30.500Z');

    const [first, second] = withServerTimestamps([stamped, untouched], new Map([['uuid-1', timestamp]]));

    expect(first).toEqual({ ...stamped, updated: timestamp });
    expect(stamped.updated).toBeNull();
    expect(second).toBe(untouched);
  });
});
