import type { AxiosInstance } from 'axios';
import { isCalibreServer, withServerTimestamps } from './calibre-timestamps';
import { EngineConfigSchema, newspaperTitleRegExp, type EngineConfig, type EngineConfigInput } from './config';
import { filterEntries, type NewspaperHeuristic } from './entry-filter';
import { BusyError, CatalogError, toCatalogError } from './errors';
import { fetchFeedDocument, fetchOptionsFromConfig, withTransientRetry } from './fetcher';
import { classifyEntries } from './library-match';
import { parseFeed } from './parser';
import {
  EMPTY_FILTER,
  type ClassifiedEntry,
  type Entry,
  type FilterState,
  type FrameContext,
  type FrameSnapshot,
  type FrameStatus,
  type LibraryIndex,
  type OperationResult,
  type Page,
  type Pagination,
  type SessionSnapshot,
  type SubcatalogLink,
} from './types';

export type PageLoader = (url: string, signal: AbortSignal) => Promise<Page>;
export type SessionListener = (snapshot: SessionSnapshot) => void;

export interface CatalogSessionOptions {
  config?: EngineConfigInput;
  client?: AxiosInstance;
  // Replaces fetch + parse, e.g. to add authentication or caching
  loadPage?: PageLoader;
}

interface PendingRequest {
  token: number;
  controller: AbortController;
}

interface NavigationFrame {
  url: string;
  title: string;
  status: FrameStatus;
  entries: readonly Entry[];
  subcatalogs: readonly SubcatalogLink[];
  pagination: Readonly<Pagination>;
  pagesLoaded: number;
  visitedPages: Set<string>;
  server: string | null;
  error: CatalogError | null;
  context: FrameContext;
  pending: PendingRequest | null;
  // Pushed by navigateInto and not loaded yet: a failure pops it
  discardOnFailure: boolean;
}

export function createPageLoader(config: EngineConfig, client?: AxiosInstance): PageLoader {
  const fetchOptions = fetchOptionsFromConfig(config, client);
  return async (url, signal) => parseFeed(await fetchFeedDocument(url, { ...fetchOptions, signal }));
}

function createFrame(url: string, title: string, discardOnFailure: boolean): NavigationFrame {
  return {
    url,
    title,
    status: 'empty',
    entries: [],
    subcatalogs: [],
    pagination: {},
    pagesLoaded: 0,
    visitedPages: new Set(),
    server: null,
    error: null,
    context: { filter: EMPTY_FILTER, scrollOffset: 0 },
    pending: null,
    discardOnFailure,
  };
}

function isBusy(frame: NavigationFrame): boolean {
  return frame.status === 'loading' || frame.status === 'loading-more';
}

function appendUnique<T>(existing: readonly T[], incoming: readonly T[], keyOf: (item: T) => string): T[] {
  const seen = new Set(existing.map(keyOf));
  const result = [...existing];
  for (const item of incoming) {
    const key = keyOf(item);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(item);
  }
  return result;
}

/**
 * Navigation state for one catalog browsing session.
 *
 * Frames form a stack from the root catalog to the current subcatalog.
 * Each frame accumulates the entries of every page loaded at its level and
 * is kept, not refetched, when the user navigates back to it.
 *
 * Every fetch carries a token; a response is applied only if its token is
 * still the frame's pending one and the frame is still on the stack.
 * Anything else was superseded and is reported as `cancelled`.
 */
export class CatalogSession {
  private frames: NavigationFrame[] = [];
  private nextToken = 0;
  private readonly listeners = new Set<SessionListener>();
  private readonly config: EngineConfig;
  private readonly loadPage: PageLoader;
  private readonly newspapers: NewspaperHeuristic;

  constructor(options: CatalogSessionOptions = {}) {
    this.config = EngineConfigSchema.parse(options.config ?? {});
    this.loadPage = options.loadPage ?? createPageLoader(this.config, options.client);
    this.newspapers = {
      tags: this.config.newspaperTags,
      titlePattern: newspaperTitleRegExp(this.config),
    };
  }

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Starts over at a root catalog. Any request in flight is cancelled.
   */
  async open(url: string, title = ''): Promise<OperationResult> {
    this.frames.forEach((frame) => this.cancelPending(frame));
    const root = createFrame(url, title, false);
    this.frames = [root];
    console.log('[Catalog Session] Opening catalog:', url);
    return this.load(root, url, 'replace');
  }

  async navigateInto(link: Pick<SubcatalogLink, 'href' | 'title'>): Promise<OperationResult> {
    const current = this.currentFrame();
    if (!current) return this.open(link.href, link.title);
    if (isBusy(current)) return { status: 'busy', error: new BusyError() };

    const frame = createFrame(link.href, link.title, true);
    this.frames.push(frame);
    return this.load(frame, link.href, 'replace');
  }

  /**
   * Pops the current frame, cancelling its request if one is in flight.
   * The root frame is never popped.
   */
  goBack(): boolean {
    if (this.frames.length <= 1) return false;
    const frame = this.frames.pop();
    if (frame) this.cancelPending(frame);
    this.emit();
    return true;
  }

  async loadMore(): Promise<OperationResult> {
    const frame = this.currentFrame();
    if (!frame) return { status: 'no-more' };
    if (isBusy(frame)) return { status: 'busy', error: new BusyError() };

    const next = frame.pagination.next;
    // Servers that link a page back to itself would loop forever
    if (!next || frame.visitedPages.has(next)) return { status: 'no-more' };

    return this.load(frame, next, 'append');
  }

  /**
   * Loads following pages one at a time until the feed ends, a page fails
   * or `maxPages` pages were appended.
   */
  async loadAll(maxPages = Number.POSITIVE_INFINITY): Promise<OperationResult> {
    let last: OperationResult = { status: 'no-more' };
    for (let loaded = 0; loaded < maxPages; loaded++) {
      const result = await this.loadMore();
      if (result.status === 'no-more') return loaded > 0 ? last : result;
      if (result.status !== 'ok') return result;
      last = result;
    }
    return last;
  }

  /**
   * Re-fetches the first page of the current frame and replaces its entries.
   * Supersedes a request already in flight for this frame. A frame that was
   * never loaded is still popped if this load fails.
   */
  async refresh(): Promise<OperationResult> {
    const frame = this.currentFrame();
    if (!frame) return { status: 'no-more' };
    return this.load(frame, frame.url, 'replace');
  }

  setFilter(filter: FilterState): void {
    const frame = this.currentFrame();
    if (!frame) return;
    frame.context = { ...frame.context, filter: { ...filter } };
    this.emit();
  }

  setScrollOffset(scrollOffset: number): void {
    const frame = this.currentFrame();
    if (!frame) return;
    frame.context = { ...frame.context, scrollOffset };
    this.emit();
  }

  /**
   * Render-ready rows for the current frame
   */
  visibleRows(index: LibraryIndex, filter?: FilterState): ClassifiedEntry[] {
    const frame = this.currentFrame();
    if (!frame) return [];
    return filterEntries(classifyEntries(frame.entries, index), filter ?? frame.context.filter, this.newspapers);
  }

  /**
   * Entries of the current frame with the given ids that are not yet in
   * the library, in frame order.
   */
  selectMissing(ids: Iterable<string>, index: LibraryIndex): Entry[] {
    const frame = this.currentFrame();
    if (!frame) return [];
    const wanted = new Set(ids);
    return classifyEntries(
      frame.entries.filter((entry) => wanted.has(entry.id)),
      index
    )
      .filter((row) => !row.inLibrary)
      .map((row) => row.entry);
  }

  applyServerTimestamps(timestamps: ReadonlyMap<string, Date>): OperationResult {
    const frame = this.currentFrame();
    if (!frame) return { status: 'no-more' };
    if (isBusy(frame)) return { status: 'busy', error: new BusyError() };

    frame.entries = withServerTimestamps(frame.entries, timestamps);
    this.emit();
    return { status: 'ok', frame: this.snapshotFrame(frame) };
  }

  snapshot(): SessionSnapshot {
    const current = this.currentFrame();
    return {
      depth: this.frames.length,
      breadcrumbs: this.frames.map((frame) => frame.title),
      current: current ? this.snapshotFrame(current) : null,
      isCalibreServer: isCalibreServer(current?.server ?? null),
    };
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancels every request in flight and drops all listeners
   */
  dispose(): void {
    this.frames.forEach((frame) => this.cancelPending(frame));
    this.listeners.clear();
  }

  private currentFrame(): NavigationFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  private cancelPending(frame: NavigationFrame): void {
    if (!frame.pending) return;
    frame.pending.controller.abort();
    frame.pending = null;
  }

  private isCurrentRequest(frame: NavigationFrame, request: PendingRequest): boolean {
    return frame.pending === request && this.frames.includes(frame);
  }

  /**
   * Fetches `url` for `frame`. If the frame has never loaded and was pushed
   * by navigateInto, a failure (or a cancellation raised by the loader)
   * removes it from the stack; otherwise the frame is marked failed and keeps
   * the entries of its last good state.
   */
  private async load(frame: NavigationFrame, url: string, mode: 'replace' | 'append'): Promise<OperationResult> {
    this.cancelPending(frame);

    const request: PendingRequest = { token: ++this.nextToken, controller: new AbortController() };
    frame.pending = request;
    frame.status = mode === 'append' ? 'loading-more' : 'loading';
    frame.error = null;
    this.emit();

    let page: Page;
    try {
      const { signal } = request.controller;
      page = await withTransientRetry(() => this.loadPage(url, signal), this.config.transientRetries, signal);
    } catch (error) {
      if (!this.isCurrentRequest(frame, request)) return { status: 'cancelled' };
      frame.pending = null;

      const catalogError = toCatalogError(error, url);
      const discard = frame.discardOnFailure && this.currentFrame() === frame;
      if (catalogError.code === 'cancelled') {
        if (discard) {
          this.frames.pop();
        } else {
          frame.status = frame.pagesLoaded > 0 ? 'loaded' : 'empty';
        }
        this.emit();
        return { status: 'cancelled' };
      }

      console.error(`[Catalog Session] Failed to load ${url}:`, catalogError.message);
      if (discard) {
        this.frames.pop();
      } else {
        frame.status = 'failed';
        frame.error = catalogError;
      }
      this.emit();
      return { status: 'failed', error: catalogError };
    }

    if (!this.isCurrentRequest(frame, request)) {
      console.log(`[Catalog Session] Discarding stale response for ${url}`);
      return { status: 'cancelled' };
    }
    frame.pending = null;

    if (mode === 'append') {
      frame.entries = appendUnique(frame.entries, page.entries, (entry) => entry.id);
      frame.subcatalogs = appendUnique(frame.subcatalogs, page.subcatalogs, (link) => link.href);
      frame.pagesLoaded += 1;
      frame.visitedPages.add(url);
    } else {
      frame.entries = appendUnique([], page.entries, (entry) => entry.id);
      frame.subcatalogs = appendUnique([], page.subcatalogs, (link) => link.href);
      frame.pagesLoaded = 1;
      frame.visitedPages = new Set([url]);
      frame.title = frame.title || page.title;
      frame.discardOnFailure = false;
    }
    frame.pagination = page.pagination;
    frame.server = page.server;
    frame.status = 'loaded';

    console.log(
      `[Catalog Session] Loaded ${page.entries.length} entries and ${page.subcatalogs.length} subcatalogs from ${url}` +
        ` (${frame.entries.length} accumulated)`
    );
    this.emit();
    return { status: 'ok', frame: this.snapshotFrame(frame) };
  }

  private snapshotFrame(frame: NavigationFrame): FrameSnapshot {
    return {
      url: frame.url,
      title: frame.title,
      status: frame.status,
      entries: frame.entries,
      subcatalogs: frame.subcatalogs,
      pagination: frame.pagination,
      hasMore: !!frame.pagination.next && !frame.visitedPages.has(frame.pagination.next),
      pagesLoaded: frame.pagesLoaded,
      server: frame.server,
      error: frame.error,
      context: frame.context,
    };
  }

  private emit(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error('[Catalog Session] Listener threw:', error);
      }
    }
  }
}
