export { ConcurrencyLimiter, type ConcurrencyLimits } from "./concurrency.js";
export { checksumCompare, computeChecksum, selectChecksum } from "./checksum.js";
export {
  DEFAULT_API_URL,
  loadHubConfig,
  resolveDownloaderSettings,
  type DownloaderOverrides,
  type DownloaderSettings,
  type DownloaderSettingsInput,
  type HubConfig,
} from "./config.js";
export {
  Downloader,
  StatusBoard,
  type DownloadAllResult,
  type DownloadCallOptions,
  type DownloaderOptions,
  type DownloadProgressEvent,
  type QuicklookInfo,
  type QuicklookResult,
} from "./downloader.js";
export * from "./errors.js";
export {
  formatBatchResult,
  formatDownloadedProduct,
  formatProductInfo,
  formatQuicklookResult,
} from "./formatters.js";
export {
  HubClient,
  type CallOptions,
  type CatalogClient,
  type FetchLike,
  type RequestOptions,
} from "./hub-client.js";
export {
  createLogger,
  silentLogger,
  type HubLogger,
  type LogLevel,
  type LogSink,
} from "./logger.js";
export { triggerAndWait, triggerOfflineRetrieval } from "./lta.js";
export { filterNodes, parseManifest, type DataObjectInfo } from "./manifest.js";
export {
  AllNodesFilter,
  AndFilter,
  buildNodeFilter,
  NotFilter,
  OrFilter,
  PathFilter,
  SizeFilter,
  type NodeFilter,
  type NodeFilterOptions,
} from "./node-filters.js";
export { transferFile, type TransferProgress } from "./transfer.js";
export {
  DownloadStatus,
  isSuccessful,
  type Checksums,
  type NodeInfo,
  type ProductInfo,
} from "./utils.js";
