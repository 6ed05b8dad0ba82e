import { z } from 'zod';
import { assertAbsoluteUrl, fetchFeedDocument, type FetchFeedOptions } from './fetcher';
import { ParseError } from './errors';
import type { Entry } from './types';

/*
 * calibre's OPDS feeds stamp every entry with the modification time of the
 * whole database. Its REST API has the real per-book timestamps.
 */

const CalibreSearchSchema = z.object({
  total_num: z.number().int().nonnegative(),
  book_ids: z.array(z.union([z.number(), z.string()])),
});

const CalibreBookSchema = z.object({
  uuid: z.string().min(1),
  timestamp: z.string().nullish(),
});

const CalibreBooksSchema = z.record(z.string(), CalibreBookSchema.nullable());

export function isCalibreServer(server: string | null): boolean {
  return !!server && server.trim().toLowerCase().startsWith('calibre');
}

async function getJson<T extends z.ZodTypeAny>(url: string, schema: T, options: FetchFeedOptions): Promise<z.infer<T>> {
  const document = await fetchFeedDocument(url, options);

  let json: unknown;
  try {
    json = JSON.parse(document.body);
  } catch (error) {
    throw new ParseError(`Invalid JSON from ${url}`, error);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ParseError(`Unexpected response from ${url}: ${result.error.issues[0]?.message ?? 'invalid'}`, result.error);
  }
  return result.data;
}

/**
 * Fetches uuid → timestamp for every book on the calibre server hosting `opdsUrl`.
 * The search endpoint is queried twice: once for the total count, then for all ids.
 */
export async function fetchCalibreTimestamps(opdsUrl: string, options: FetchFeedOptions = {}): Promise<Map<string, Date>> {
  const { origin } = assertAbsoluteUrl(opdsUrl);

  const firstSearch = await getJson(`${origin}/ajax/search`, CalibreSearchSchema, options);
  const fullSearch = await getJson(
    `${origin}/ajax/search?num=${firstSearch.total_num}&offset=0`,
    CalibreSearchSchema,
    options
  );

  const timestamps = new Map<string, Date>();
  const bookIds = fullSearch.book_ids.map(String);
  if (bookIds.length === 0) return timestamps;

  const books = await getJson(`${origin}/ajax/books?ids=${bookIds.join(',')}`, CalibreBooksSchema, options);

  for (const bookId of bookIds) {
    const book = books[bookId];
    if (!book?.timestamp) continue;
    const time = Date.parse(book.timestamp);
    if (!Number.isNaN(time)) timestamps.set(book.uuid, new Date(time));
  }

  console.log(`[Calibre Timestamps] Resolved ${timestamps.size} of ${bookIds.length} books from ${origin}`);
  return timestamps;
}

/**
 * Returns entries whose `updated` value is replaced by the server timestamp
 * of the first identifier found in `timestamps`. Other entries are returned as is.
 */
export function withServerTimestamps(entries: readonly Entry[], timestamps: ReadonlyMap<string, Date>): Entry[] {
  return entries.map((entry) => {
    for (const identifier of entry.identifiers) {
      const timestamp = timestamps.get(identifier);
      if (timestamp) return { ...entry, updated: timestamp };
    }
    return entry;
  });
}
