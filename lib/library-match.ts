import type { ClassifiedEntry, Entry, LibraryIndex, LibraryMatch, LocalBook } from './types';

/**
 * Normalizes titles and author names for exact matching:
 * case-fold, trim, collapse whitespace. No fuzzy distance.
 */
export function normalizeMatchKey(value: string): string {
  return value
    .normalize('NFC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

function titleAuthorKey(title: string, author: string): string {
  return `${normalizeMatchKey(title)}\u0000${normalizeMatchKey(author)}`;
}

/**
 * Builds an in-memory index over a snapshot of the local library.
 * Each book is reachable by its identifiers, the title with the
 * full author list and the title with each single author.
 */
export function createLibraryIndex(books: readonly LocalBook[]): LibraryIndex {
  const byIdentifier = new Map<string, LocalBook>();
  const byTitleAuthor = new Map<string, LocalBook>();

  for (const book of books) {
    for (const identifier of book.identifiers ?? []) {
      const key = identifier.trim();
      if (key && !byIdentifier.has(key)) byIdentifier.set(key, book);
    }

    if (!normalizeMatchKey(book.title)) continue;

    const authorKeys = book.authors.length > 1 ? [book.authors.join(' & '), ...book.authors] : book.authors;
    for (const author of authorKeys) {
      const key = titleAuthorKey(book.title, author);
      if (!byTitleAuthor.has(key)) byTitleAuthor.set(key, book);
    }
  }

  return {
    byIdentifier: (identifier) => byIdentifier.get(identifier.trim()),
    byTitleAuthor: (title, author) => byTitleAuthor.get(titleAuthorKey(title, author)),
  };
}

/**
 * Finds the local book an entry corresponds to, if any.
 * An identifier match is taken first; title + author equality is the
 * fallback for servers whose ids are unrelated to the local library.
 */
export function matchEntry(entry: Entry, index: LibraryIndex): LibraryMatch | null {
  for (const identifier of entry.identifiers) {
    const book = index.byIdentifier(identifier);
    if (book) return { by: 'identifier', book };
  }

  if (!normalizeMatchKey(entry.title) || entry.authors.length === 0) return null;

  const candidates = entry.authors.length > 1 ? [entry.authors.join(' & '), ...entry.authors] : entry.authors;
  for (const author of candidates) {
    const book = index.byTitleAuthor(entry.title, author);
    if (book) return { by: 'title-author', book };
  }

  return null;
}

export function classifyEntries(entries: readonly Entry[], index: LibraryIndex): ClassifiedEntry[] {
  return entries.map((entry) => {
    const match = matchEntry(entry, index);
    return { entry, inLibrary: match !== null, match };
  });
}
