export * from './types';
export * from './errors';
export { EngineConfigSchema, loadEngineConfig, newspaperTitleRegExp } from './config';
export type { EngineConfig, EngineConfigInput } from './config';
export { assertAbsoluteUrl, fetchFeedDocument, withTransientRetry } from './fetcher';
export type { FetchFeedOptions } from './fetcher';
export { parseFeed } from './parser';
export { CatalogSession, createPageLoader } from './catalog-session';
export type { CatalogSessionOptions, PageLoader, SessionListener } from './catalog-session';
export { classifyEntries, createLibraryIndex, matchEntry, normalizeMatchKey } from './library-match';
export { filterEntries, isNewspaper, matchesQuery } from './entry-filter';
export type { NewspaperHeuristic } from './entry-filter';
export { DEFAULT_FORMAT_PREFERENCE, DownloadOrchestrator, selectAcquisitionLink } from './download-orchestrator';
export type { DownloadOptions, DownloadOrchestratorOptions, FixTimestampsResult } from './download-orchestrator';
export { createHttpTransfer, writeFileAtomic } from './transfer';
export type { BookTransfer, HttpTransferOptions, TransferRequest } from './transfer';
export { fetchCalibreTimestamps, isCalibreServer, withServerTimestamps } from './calibre-timestamps';
export { extensionFor, matchesFormat } from './formats';
export { createReadableFilename } from './utils/filename';
