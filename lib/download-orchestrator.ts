import type { AxiosInstance } from 'axios';
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from './config';
import { CatalogError, NoAcquisitionLinkError, TransferError, isCancelled, toCatalogError } from './errors';
import { withTransientRetry } from './fetcher';
import { matchesFormat } from './formats';
import { createHttpTransfer, discardStagedFile, type BookTransfer } from './transfer';
import type {
  AcquisitionLink,
  AcquisitionRelation,
  DownloadSummary,
  DownloadTask,
  DownloadedFile,
  Entry,
  LibraryTarget,
  TimestampTarget,
} from './types';

const MAX_CONCURRENCY = 3;

// calibre's client always put EPUB first
export const DEFAULT_FORMAT_PREFERENCE = 'epub';

// Relations that hand out the file itself (not a store page or a preview)
const DOWNLOADABLE_RELATIONS: ReadonlySet<AcquisitionRelation> = new Set(['acquisition', 'open-access', 'generic']);

export interface DownloadOptions {
  // Format name or MIME type; '' takes the first downloadable link
  formatPreference?: string;
  concurrency?: number;
  // Checked between items and before a retry; transfers already started run to completion
  signal?: AbortSignal;
  onUpdate?: (task: DownloadTask) => void;
}

export interface DownloadOrchestratorOptions {
  library: LibraryTarget;
  config?: EngineConfigInput;
  client?: AxiosInstance;
  transfer?: BookTransfer;
}

export interface FixTimestampsResult {
  updated: string[];
  unmatched: string[];
  skipped: string[];
}

/**
 * Picks the link matching the preferred format, else the first
 * downloadable link. Returns null when the entry offers no file.
 */
export function selectAcquisitionLink(
  entry: Entry,
  formatPreference = DEFAULT_FORMAT_PREFERENCE
): AcquisitionLink | null {
  const downloadable = entry.acquisitionLinks.filter((link) => DOWNLOADABLE_RELATIONS.has(link.relation));
  if (formatPreference) {
    const preferred = downloadable.find((link) => matchesFormat(link, formatPreference));
    if (preferred) return preferred;
  }
  return downloadable[0] ?? null;
}

function asTransferError(error: unknown): CatalogError {
  const catalogError = toCatalogError(error);
  if (catalogError instanceof TransferError || catalogError instanceof NoAcquisitionLinkError) {
    return catalogError;
  }
  return new TransferError(catalogError.message, catalogError);
}

export class DownloadOrchestrator {
  private readonly config: EngineConfig;
  private readonly library: LibraryTarget;
  private readonly transfer: BookTransfer;

  constructor(options: DownloadOrchestratorOptions) {
    this.config = EngineConfigSchema.parse(options.config ?? {});
    this.library = options.library;
    this.transfer =
      options.transfer ??
      createHttpTransfer({
        client: options.client,
        timeoutMs: this.config.transferTimeoutMs,
        maxBytes: this.config.maxBookBytes,
        userAgent: this.config.userAgent,
        stagingDir: this.config.stagingDir,
      });
  }

  /**
   * Copies each entry into the library. One entry failing never stops the
   * batch; the summary lists every task by outcome, in input order.
   */
  async download(entries: readonly Entry[], options: DownloadOptions = {}): Promise<DownloadSummary> {
    const { formatPreference = DEFAULT_FORMAT_PREFERENCE, signal, onUpdate } = options;
    const concurrency = Math.min(Math.max(1, Math.floor(options.concurrency ?? this.config.downloadConcurrency)), MAX_CONCURRENCY);

    const report = (task: DownloadTask) => {
      if (!onUpdate) return;
      try {
        onUpdate({ ...task });
      } catch (error) {
        console.error('[Download] Progress listener threw:', error);
      }
    };

    const tasks: DownloadTask[] = entries.map((entry) => ({
      entryId: entry.id,
      entry,
      link: null,
      status: 'pending',
      error: null,
      file: null,
      book: null,
    }));
    tasks.forEach(report);

    console.log(`[Download] Starting batch of ${tasks.length} books (concurrency ${concurrency})`);

    let cursor = 0;
    const worker = async () => {
      while (cursor < tasks.length && !signal?.aborted) {
        const task = tasks[cursor++];
        await this.runTask(task, formatPreference, report, signal);
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, tasks.length) }, worker));

    const summary: DownloadSummary = {
      succeeded: tasks.filter((task) => task.status === 'succeeded'),
      failed: tasks.filter((task) => task.status === 'failed'),
      cancelled: tasks.filter((task) => task.status === 'pending'),
    };

    console.log(
      `[Download] Batch finished: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed` +
        (summary.cancelled.length > 0 ? `, ${summary.cancelled.length} cancelled` : '')
    );
    return summary;
  }

  /**
   * Sets the library timestamp of each entry's local copy to the entry's
   * `updated` value. Touches only local metadata and can be re-run safely.
   */
  async fixTimestamps(entries: readonly Entry[], target: TimestampTarget): Promise<FixTimestampsResult> {
    const result: FixTimestampsResult = { updated: [], unmatched: [], skipped: [] };
    const updates = new Map<string, Date>();

    for (const entry of entries) {
      const timestamp = entry.updated;
      if (!timestamp) {
        result.skipped.push(entry.id);
        continue;
      }

      const bookIds = await findIdenticalBooks(entry, target);
      if (bookIds.length === 0) {
        console.log(`[Download] Failed to set timestamp of book: ${entry.title}`);
        result.unmatched.push(entry.id);
        continue;
      }

      bookIds.forEach((bookId) => updates.set(bookId, timestamp));
      result.updated.push(entry.id);
    }

    if (updates.size > 0) {
      await target.setTimestamps(updates);
    }
    return result;
  }

  /**
   * fixTimestamps for the books a batch copied successfully
   */
  async fixTimestampsFor(summary: DownloadSummary, target: TimestampTarget): Promise<FixTimestampsResult> {
    return this.fixTimestamps(
      summary.succeeded.map((task) => task.entry),
      target
    );
  }

  private async runTask(
    task: DownloadTask,
    formatPreference: string,
    report: (task: DownloadTask) => void,
    signal?: AbortSignal
  ) {
    const { entry } = task;
    const link = selectAcquisitionLink(entry, formatPreference);
    if (!link) {
      task.status = 'failed';
      task.error = new NoAcquisitionLinkError(entry.id);
      console.error(`[Download] ${entry.title}: ${task.error.message}`);
      report(task);
      return;
    }

    task.link = link;
    task.status = 'in-progress';
    report(task);

    let file: DownloadedFile | null = null;
    try {
      file = await withTransientRetry(() => this.transfer({ entry, link }), this.config.transientRetries, signal);
      task.book = await this.library.addBook(file, entry);
      task.file = file;
      task.status = 'succeeded';
    } catch (error) {
      if (isCancelled(error)) {
        // Batch cancelled before a retry: the book was never copied
        task.status = 'pending';
        console.log(`[Download] ${entry.title}: cancelled before retrying`);
      } else {
        task.status = 'failed';
        task.error = asTransferError(error);
        console.error(`[Download] ${entry.title}: ${task.error.message}`);
      }
    }

    if (file) {
      await discardStagedFile(file).catch((error: unknown) => {
        console.error('[Download] Could not remove staged file:', error);
      });
    }
    report(task);
  }
}

/**
 * Library books identical to the entry. With several authors each author
 * is tried on its own and the results are merged.
 */
async function findIdenticalBooks(entry: Entry, target: TimestampTarget): Promise<string[]> {
  if (entry.authors.length < 2) {
    return [...(await target.findIdenticalBooks({ title: entry.title, authors: entry.authors }))];
  }

  const bookIds = new Set<string>();
  for (const author of entry.authors) {
    const matches = await target.findIdenticalBooks({ title: entry.title, authors: [author] });
    matches.forEach((bookId) => bookIds.add(bookId));
  }
  return [...bookIds];
}
