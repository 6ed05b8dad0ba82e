import type { CatalogError } from './errors';

export type AcquisitionRelation =
  | 'acquisition'
  | 'open-access'
  | 'borrow'
  | 'buy'
  | 'sample'
  | 'subscribe'
  | 'generic';

export interface AcquisitionLink {
  href: string;
  mimeType: string;
  relation: AcquisitionRelation;
}

/**
 * One book listing in a feed. Never mutated after parsing: corrections
 * (server timestamps) produce new objects.
 */
export interface Entry {
  readonly id: string;
  readonly title: string;
  readonly authors: readonly string[];
  readonly acquisitionLinks: readonly AcquisitionLink[];
  readonly summary: string;
  readonly updated: Date | null;
  readonly tags: readonly string[];
  // Raw id, id without its urn:uuid: prefix, and any dc:identifier values
  readonly identifiers: readonly string[];
}

export interface SubcatalogLink {
  href: string;
  title: string;
  kind: 'navigation' | 'acquisition';
}

export interface Pagination {
  next?: string;
  previous?: string;
  first?: string;
  last?: string;
}

export interface Page {
  readonly url: string;
  readonly id: string;
  readonly title: string;
  readonly updated: Date | null;
  readonly entries: readonly Entry[];
  readonly subcatalogs: readonly SubcatalogLink[];
  readonly pagination: Readonly<Pagination>;
  readonly server: string | null;
}

export interface RawDocument {
  url: string;
  status: number;
  contentType: string;
  server: string | null;
  body: string;
}

export interface FilterState {
  query: string;
  hideAlreadyInLibrary: boolean;
  hideNewspapers: boolean;
}

export const EMPTY_FILTER: FilterState = Object.freeze({
  query: '',
  hideAlreadyInLibrary: false,
  hideNewspapers: false,
});

export interface LocalBook {
  // Library database key; never compared with feed identifiers
  id: string;
  title: string;
  authors: string[];
  // uuid, ISBN and other identifiers a feed may carry
  identifiers?: string[];
}

/**
 * Read-only view of the local library used for matching.
 * Hosts may implement this over their own storage.
 */
export interface LibraryIndex {
  byIdentifier(identifier: string): LocalBook | undefined;
  byTitleAuthor(title: string, author: string): LocalBook | undefined;
}

export interface LibraryMatch {
  by: 'identifier' | 'title-author';
  book: LocalBook;
}

export interface ClassifiedEntry {
  entry: Entry;
  inLibrary: boolean;
  match: LibraryMatch | null;
}

export type FrameStatus = 'empty' | 'loading' | 'loaded' | 'loading-more' | 'failed';

export interface FrameContext {
  filter: FilterState;
  scrollOffset: number;
}

export interface FrameSnapshot {
  url: string;
  title: string;
  status: FrameStatus;
  entries: readonly Entry[];
  subcatalogs: readonly SubcatalogLink[];
  pagination: Readonly<Pagination>;
  hasMore: boolean;
  pagesLoaded: number;
  server: string | null;
  error: CatalogError | null;
  context: FrameContext;
}

export interface SessionSnapshot {
  depth: number;
  breadcrumbs: string[];
  current: FrameSnapshot | null;
  isCalibreServer: boolean;
}

export type OperationResult =
  | { status: 'ok'; frame: FrameSnapshot }
  | { status: 'failed'; error: CatalogError }
  | { status: 'busy'; error: CatalogError }
  | { status: 'cancelled' }
  | { status: 'no-more' };

export type DownloadStatus = 'pending' | 'in-progress' | 'succeeded' | 'failed';

export interface DownloadedFile {
  path: string;
  fileName: string;
  mimeType: string;
  size: number;
}

export interface DownloadTask {
  entryId: string;
  entry: Entry;
  link: AcquisitionLink | null;
  status: DownloadStatus;
  error: CatalogError | null;
  // The staged copy handed to addBook. Its path is removed once the task
  // settles; only the name, type and size remain meaningful.
  file: DownloadedFile | null;
  book: LocalBook | null;
}

export interface DownloadSummary {
  succeeded: DownloadTask[];
  failed: DownloadTask[];
  cancelled: DownloadTask[];
}

/**
 * Destination supplied by the host. Receives a fully written file and
 * returns the book it became in the local library.
 */
export interface LibraryTarget {
  addBook(file: DownloadedFile, entry: Entry): Promise<LocalBook>;
}

export interface TimestampTarget {
  findIdenticalBooks(query: { title: string; authors: readonly string[] }): Promise<readonly string[]>;
  setTimestamps(updates: ReadonlyMap<string, Date>): Promise<void>;
}
