/**
 * Download orchestration: per-product status tracking, a download pool and a
 * separate Long Term Archive trigger pool, retries and result aggregation
 */
import { writeFile, mkdir } from "fs/promises";
import path from "path";
import pLimit from "p-limit";

import { ConcurrencyLimiter } from "./concurrency.js";
import {
  DownloaderOverrides,
  DownloaderSettings,
  DownloaderSettingsInput,
  resolveDownloaderSettings,
} from "./config.js";
import {
  DownloadCancelledError,
  formatError,
  HubError,
  InvalidChecksumError,
  LTATriggered,
  UnauthorizedError,
} from "./errors.js";
import type { CatalogClient } from "./hub-client.js";
import { createLogger, HubLogger } from "./logger.js";
import { StatusRecorder, triggerAndWait, TriggerContext, triggerOfflineRetrieval } from "./lta.js";
import { filterNodes, parseManifest } from "./manifest.js";
import { NodeFilter, normalizeNodePath } from "./node-filters.js";
import { TransferContext, transferFile } from "./transfer.js";
import {
  DownloadStatus,
  NodeInfo,
  pathExists,
  ProductInfo,
  raceAbort,
  sleep,
  throwIfCancelled,
} from "./utils.js";

export type DownloadProgressEvent =
  | { kind: "status"; productId: string; status: DownloadStatus }
  | { kind: "transfer"; productId: string; path: string; bytes: number; total: number }
  | { kind: "verify"; productId: string; path: string; bytes: number; total: number };

export interface DownloaderOptions extends DownloaderSettingsInput {
  nodeFilter?: NodeFilter;
  logger?: HubLogger;
  onProgress?: (event: DownloadProgressEvent) => void;
}

export interface DownloadCallOptions {
  signal?: AbortSignal;
  overrides?: DownloaderOverrides;
}

export interface DownloadAllResult {
  statuses: Map<string, DownloadStatus>;
  exceptions: Map<string, Error>;
  productInfos: Map<string, ProductInfo>;
}

export interface QuicklookInfo extends ProductInfo {
  path: string;
  downloadedBytes: number;
  quicklookSize: number;
  error: string;
}

export interface QuicklookResult {
  downloaded: Map<string, QuicklookInfo>;
  failed: Map<string, string>;
}

/**
 * Outcome of one worker lane
 */
export type LaneResult =
  | { kind: "downloaded"; info: ProductInfo }
  | { kind: "online" }
  | { kind: "abandoned" }
  | { kind: "cancelled" }
  | { kind: "failed"; error: Error };

interface Completion {
  key: number;
  productId: string;
  result: LaneResult;
}

/**
 * Status per product for one batch. A product never leaves DOWNLOADED.
 */
export class StatusBoard implements StatusRecorder {
  private readonly statuses = new Map<string, DownloadStatus>();

  constructor(
    productIds: Iterable<string>,
    private readonly onChange?: (productId: string, status: DownloadStatus) => void
  ) {
    for (const id of productIds) {
      this.statuses.set(id, DownloadStatus.UNAVAILABLE);
    }
  }

  get(id: string): DownloadStatus | undefined {
    return this.statuses.get(id);
  }

  set(id: string, status: DownloadStatus): void {
    const current = this.statuses.get(id);
    if (current === status || current === DownloadStatus.DOWNLOADED) {
      return;
    }
    this.statuses.set(id, status);
    this.onChange?.(id, status);
  }

  countWith(status: DownloadStatus): number {
    let count = 0;
    for (const value of this.statuses.values()) {
      if (value === status) count += 1;
    }
    return count;
  }

  snapshot(): Map<string, DownloadStatus> {
    return new Map(this.statuses);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function classify(error: unknown, signal?: AbortSignal): LaneResult {
  if (error instanceof DownloadCancelledError || signal?.aborted) {
    return { kind: "cancelled" };
  }
  return { kind: "failed", error: toError(error) };
}

export class Downloader {
  readonly api: CatalogClient;
  private base: DownloaderSettings;
  private readonly limiter: ConcurrencyLimiter;
  private readonly logger: HubLogger;
  private readonly onProgress?: (event: DownloadProgressEvent) => void;

  constructor(api: CatalogClient, options: DownloaderOptions = {}) {
    const { logger, onProgress, ...settings } = options;
    this.api = api;
    this.base = resolveDownloaderSettings(settings);
    this.logger = logger ?? createLogger("sathub-download");
    this.onProgress = onProgress;
    this.limiter = new ConcurrencyLimiter({
      transfer: this.base.nConcurrentDl,
      trigger: this.base.nConcurrentTrigger,
    });
  }

  get settings(): DownloaderSettings {
    return this.base;
  }

  get concurrency(): ConcurrencyLimiter {
    return this.limiter;
  }

  /**
   * Change the server quotas. Rebuilds the matching limiter; running requests keep their slot.
   */
  setConcurrency(limits: { nConcurrentDl?: number; nConcurrentTrigger?: number }): void {
    this.base = resolveDownloaderSettings(this.base, limits);
    this.limiter.resize({ transfer: limits.nConcurrentDl, trigger: limits.nConcurrentTrigger });
  }

  private triggerContext(signal?: AbortSignal): TriggerContext {
    return { api: this.api, limiter: this.limiter, logger: this.logger, signal };
  }

  private transferContext(
    productId: string,
    settings: DownloaderSettings,
    signal?: AbortSignal
  ): TransferContext {
    const onProgress = this.onProgress;
    return {
      api: this.api,
      limiter: this.limiter,
      logger: this.logger,
      verifyChecksum: settings.verifyChecksum,
      signal,
      onProgress: onProgress
        ? (progress) => onProgress({ kind: "transfer", productId, ...progress })
        : undefined,
      onVerifyProgress: onProgress
        ? (progress) => onProgress({ kind: "verify", productId, ...progress })
        : undefined,
    };
  }

  /**
   * Trigger retrieval of an offline product from the Long Term Archive
   * @returns true if retrieval was triggered, false if the product is already online
   */
  triggerOfflineRetrieval(id: string, signal?: AbortSignal): Promise<boolean> {
    return triggerOfflineRetrieval(id, this.triggerContext(signal));
  }

  /**
   * Download one product, or the selected files of it when a node filter is set.
   * Incomplete downloads are continued and complete files are skipped.
   * @throws LTATriggered when the product is archived and its retrieval was triggered
   */
  async download(id: string, options: DownloadCallOptions = {}): Promise<ProductInfo> {
    const settings = resolveDownloaderSettings(this.base, options.overrides);
    return this.downloadProduct(id, settings, options.signal);
  }

  private async downloadProduct(
    id: string,
    settings: DownloaderSettings,
    signal?: AbortSignal
  ): Promise<ProductInfo> {
    throwIfCancelled(signal);
    const info = await this.limiter.transfer(() => this.api.getProductOdata(id, { signal }));
    if (settings.nodeFilter) {
      return this.downloadNodes(info, settings, signal);
    }

    const filename = await this.limiter.transfer(() => this.api.getFilename(info, { signal }));
    const finalPath = path.join(settings.directory, filename);
    this.logger.info(`Downloading ${id} to ${finalPath}`);

    if (await pathExists(finalPath)) {
      // Assumed complete; only .incomplete files get verified
      return { ...info, path: finalPath, downloadedBytes: 0 };
    }

    if (!(await this.limiter.transfer(() => this.api.isOnline(id, { signal })))) {
      await this.triggerOfflineRetrieval(id, signal);
      throw new LTATriggered(id);
    }

    const downloadedBytes = await transferFile(
      info,
      finalPath,
      this.transferContext(id, settings, signal)
    );
    return { ...info, online: true, path: finalPath, downloadedBytes };
  }

  private async downloadNodes(
    info: ProductInfo,
    settings: DownloaderSettings,
    signal?: AbortSignal
  ): Promise<ProductInfo> {
    const productDir = path.resolve(settings.directory, `${info.title}.SAFE`);
    const manifestPath = path.join(productDir, "manifest.safe");
    if (
      !(await pathExists(manifestPath)) &&
      (await this.triggerOfflineRetrieval(info.id, signal))
    ) {
      throw new LTATriggered(info.id);
    }

    const manifest = await this.limiter.transfer(() =>
      this.api.getManifest(info, manifestPath, { signal })
    );
    const nodes: Record<string, NodeInfo> = {
      [manifest.node.nodePath]: { ...manifest.node, path: manifestPath, downloadedBytes: 0 },
    };
    const selected = filterNodes(
      parseManifest(manifest.data),
      info,
      (product, nodePath) => this.api.nodeUrl(product, nodePath, "value"),
      settings.nodeFilter
    );

    const ctx = this.transferContext(info.id, settings, signal);
    let downloadedBytes = 0;
    for (const node of Object.values(selected)) {
      const nodePath = path.resolve(productDir, normalizeNodePath(node.nodePath));
      if (!nodePath.startsWith(productDir + path.sep)) {
        throw new HubError(`Manifest entry ${node.nodePath} points outside the product directory`);
      }
      this.logger.info(`Downloading ${info.id} node to ${nodePath}`);
      this.logger.debug(`Node URL for ${info.id}: ${node.url}`);
      const bytes = await transferFile(node, nodePath, ctx);
      downloadedBytes += bytes;
      nodes[node.nodePath] = { ...node, path: nodePath, downloadedBytes: bytes };
    }

    return {
      ...info,
      online: true,
      path: productDir,
      nodePath: `./${info.title}.SAFE`,
      nodes,
      downloadedBytes,
    };
  }

  /**
   * Download with at most `maxAttempts` tries. Cancellation and rejected credentials
   * are never retried.
   */
  private async downloadWithRetry(
    id: string,
    settings: DownloaderSettings,
    statuses: StatusBoard,
    signal: AbortSignal
  ): Promise<ProductInfo> {
    let lastError: unknown = new HubError(`Download of ${id} was not attempted`);
    for (let attempt = 1; attempt <= settings.maxAttempts; attempt++) {
      throwIfCancelled(signal);
      if (attempt > 1) {
        await sleep(settings.dlRetryDelayMs, signal);
      }
      statuses.set(id, DownloadStatus.DOWNLOAD_STARTED);
      try {
        return await this.downloadProduct(id, settings, signal);
      } catch (error) {
        if (error instanceof DownloadCancelledError || signal.aborted) {
          throw error;
        }
        if (error instanceof UnauthorizedError) {
          throw error;
        }
        if (error instanceof InvalidChecksumError) {
          this.logger.warn(`Invalid checksum. The downloaded file for '${id}' is corrupted.`);
        } else {
          this.logger.error(`There was an error downloading ${id}: ${formatError(error)}`);
        }
        this.logger.info(`${settings.maxAttempts - attempt} retries left`);
        lastError = error;
      }
    }
    this.logger.info(`No retries left for ${id}. Terminating.`);
    throw lastError;
  }

  private async runTriggerLane(
    id: string,
    settings: DownloaderSettings,
    statuses: StatusBoard,
    signal: AbortSignal
  ): Promise<LaneResult> {
    if (signal.aborted) {
      return { kind: "cancelled" };
    }
    try {
      await triggerAndWait(id, this.triggerContext(signal), {
        signal,
        statuses,
        retryDelayMs: settings.ltaRetryDelayMs,
        timeoutMs: settings.ltaTimeoutMs,
      });
      return { kind: "online" };
    } catch (error) {
      return classify(error, signal);
    }
  }

  private async runDownloadLane(
    id: string,
    settings: DownloaderSettings,
    statuses: StatusBoard,
    signal: AbortSignal,
    retrieved?: Promise<boolean>
  ): Promise<LaneResult> {
    if (signal.aborted) {
      return { kind: "cancelled" };
    }
    try {
      // Offline products wait for their trigger lane
      if (retrieved && !(await raceAbort(retrieved, signal))) {
        return { kind: "abandoned" };
      }
      const info = await this.downloadWithRetry(id, settings, statuses, signal);
      return { kind: "downloaded", info };
    } catch (error) {
      return classify(error, signal);
    }
  }

  /**
   * Download a set of products. Online products are downloaded right away; offline
   * ones are retrieved from the Long Term Archive by a separate pool first.
   * @throws The failing error with fail-fast, any UnauthorizedError, or the most
   * recent error when not a single product was downloaded
   */
  async downloadAll(
    ids: Iterable<string>,
    options: DownloadCallOptions = {}
  ): Promise<DownloadAllResult> {
    const settings = resolveDownloaderSettings(this.base, options.overrides);
    const productIds = [...new Set(ids)];
    const exceptions = new Map<string, Error>();
    const productInfos = new Map<string, ProductInfo>();
    if (productIds.length === 0) {
      return { statuses: new Map(), exceptions, productInfos };
    }
    this.logger.info(
      `Will download ${productIds.length} products using ${settings.nConcurrentDl} workers`
    );

    const statuses = new StatusBoard(productIds, (productId, status) =>
      this.onProgress?.({ kind: "status", productId, status })
    );
    let lastError: Error | undefined;
    const record = (id: string, error: Error) => {
      exceptions.set(id, error);
      lastError = error;
    };

    const online: string[] = [];
    const offline: string[] = [];

    // Archival status and product info
    for (const id of productIds) {
      throwIfCancelled(options.signal);
      try {
        const info = await this.limiter.transfer(() =>
          this.api.getProductOdata(id, { signal: options.signal })
        );
        productInfos.set(id, info);
        if (info.online) {
          statuses.set(id, DownloadStatus.ONLINE);
          online.push(id);
        } else {
          statuses.set(id, DownloadStatus.OFFLINE);
          offline.push(id);
        }
      } catch (error) {
        if (error instanceof UnauthorizedError || !(error instanceof HubError)) {
          throw error;
        }
        record(id, error);
        if (settings.failFast) {
          throw error;
        }
        this.logger.error(
          `Getting product info for ${id} failed, can't download: ${formatError(error)}`
        );
      }
    }

    // Files already on disk need neither a transfer nor a share of the archive quota
    if (!settings.nodeFilter) {
      for (const id of [...online, ...offline]) {
        throwIfCancelled(options.signal);
        const info = productInfos.get(id);
        if (!info) continue;
        let filename: string;
        try {
          filename = await this.limiter.transfer(() =>
            this.api.getFilename(info, { signal: options.signal })
          );
        } catch (error) {
          if (error instanceof UnauthorizedError || !(error instanceof HubError)) {
            throw error;
          }
          record(id, error);
          if (settings.failFast) {
            throw error;
          }
          this.logger.error(
            `Resolving the filename of ${id} failed, can't download: ${formatError(error)}`
          );
          statuses.set(id, DownloadStatus.UNAVAILABLE);
          removeFrom(online, id);
          removeFrom(offline, id);
          continue;
        }

        const finalPath = path.join(settings.directory, filename);
        if (await pathExists(finalPath)) {
          this.logger.info(`Skipping already downloaded ${filename}.`);
          productInfos.set(id, { ...info, path: finalPath, downloadedBytes: 0 });
          statuses.set(id, DownloadStatus.DOWNLOADED);
          removeFrom(online, id);
          removeFrom(offline, id);
        } else if (!info.online) {
          this.logger.info(`${info.title} (${id}) is in LTA and will be triggered.`);
        }
      }
    }

    const controller = new AbortController();
    const { signal } = controller;
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    // Separate pools, so that waiting on the archive never occupies every download worker
    const downloadPool = pLimit(
      Math.max(1, Math.min(settings.nConcurrentDl, online.length + offline.length))
    );
    const triggerPool = pLimit(Math.max(1, Math.min(settings.nConcurrentTrigger, offline.length)));

    const pending = new Map<number, Promise<Completion>>();
    let nextKey = 0;
    const track = (productId: string, lane: Promise<LaneResult>) => {
      const key = nextKey++;
      pending.set(
        key,
        lane.then((result) => ({ key, productId, result }))
      );
    };

    const retrieved = new Map<string, Promise<boolean>>();
    for (const id of offline) {
      const lane = triggerPool(() => this.runTriggerLane(id, settings, statuses, signal));
      retrieved.set(
        id,
        lane.then((result) => result.kind === "online")
      );
      track(id, lane);
    }
    for (const id of [...online, ...offline]) {
      track(
        id,
        downloadPool(() =>
          this.runDownloadLane(id, settings, statuses, signal, retrieved.get(id))
        )
      );
    }

    let fatal: Error | undefined;
    try {
      while (pending.size > 0) {
        const { key, productId, result } = await Promise.race(pending.values());
        pending.delete(key);

        if (result.kind === "downloaded") {
          productInfos.set(productId, result.info);
          statuses.set(productId, DownloadStatus.DOWNLOADED);
          exceptions.delete(productId);
        } else if (result.kind === "cancelled") {
          if (!exceptions.has(productId)) {
            record(productId, new DownloadCancelledError());
          }
        } else if (result.kind === "failed") {
          record(productId, result.error);
          if (settings.failFast || result.error instanceof UnauthorizedError) {
            fatal = result.error;
            break;
          }
          this.logger.error(`${productId} failed: ${formatError(result.error)}`);
        }
      }
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
      if (pending.size > 0) {
        controller.abort();
        await Promise.all(pending.values());
      }
    }

    if (fatal) {
      throw fatal;
    }
    if (options.signal?.aborted) {
      throw new DownloadCancelledError("Batch download cancelled");
    }

    for (const [id, info] of productInfos) {
      if (statuses.get(id) === DownloadStatus.TRIGGERED) {
        productInfos.set(id, { ...info, online: false });
      }
    }

    if (statuses.countWith(DownloadStatus.DOWNLOADED) === 0) {
      throw lastError ?? new HubError("Downloading all products failed for an unknown reason");
    }
    return { statuses: statuses.snapshot(), exceptions, productInfos };
  }

  /**
   * Open the product's transfer stream, e.g. to forward it elsewhere
   * @throws LTATriggered when the product is archived and its retrieval was triggered
   */
  async getStream(id: string, signal?: AbortSignal): Promise<Response> {
    if (!(await this.limiter.transfer(() => this.api.isOnline(id, { signal })))) {
      await this.triggerOfflineRetrieval(id, signal);
      throw new LTATriggered(id);
    }
    const response = await this.limiter.transfer(() =>
      this.api.get(this.api.getDownloadUrl(id), { signal, timeout: false })
    );
    await this.api.checkResponse(response, { testJson: false });
    return response;
  }

  /**
   * Download a product's preview image to `<title>.jpeg`; existing images are skipped
   */
  async downloadQuicklook(id: string, options: DownloadCallOptions = {}): Promise<QuicklookInfo> {
    const settings = resolveDownloaderSettings(this.base, options.overrides);
    const info = await this.limiter.transfer(() =>
      this.api.getProductOdata(id, { signal: options.signal })
    );
    const quicklookPath = path.join(settings.directory, `${info.title}.jpeg`);
    this.logger.info(`Downloading quicklook ${info.title} to ${quicklookPath}`);

    const response = await this.limiter.transfer(() =>
      this.api.get(info.quicklookUrl, { signal: options.signal })
    );
    await this.api.checkResponse(response, { testJson: false });
    const content = Buffer.from(await response.arrayBuffer());
    const result: QuicklookInfo = {
      ...info,
      path: quicklookPath,
      downloadedBytes: 0,
      quicklookSize: content.length,
      error: "",
    };

    if (await pathExists(quicklookPath)) {
      return result;
    }

    const contentType = response.headers.get("content-type") ?? "unknown";
    if (contentType !== "image/jpeg") {
      return { ...result, error: `Quicklook is not jpeg but ${contentType}` };
    }

    await mkdir(settings.directory, { recursive: true });
    await writeFile(quicklookPath, content);
    return { ...result, downloadedBytes: content.length };
  }

  async downloadAllQuicklooks(
    ids: Iterable<string>,
    options: DownloadCallOptions = {}
  ): Promise<QuicklookResult> {
    const settings = resolveDownloaderSettings(this.base, options.overrides);
    const productIds = [...new Set(ids)];
    this.logger.info(`Will download ${productIds.length} quicklooks`);

    const limit = pLimit(settings.nConcurrentDl);
    const downloaded = new Map<string, QuicklookInfo>();
    const failed = new Map<string, string>();
    await Promise.all(
      productIds.map((id) =>
        limit(async () => {
          const info = await this.downloadQuicklook(id, options);
          if (info.error === "") {
            downloaded.set(id, info);
          } else {
            failed.set(id, info.error);
          }
        })
      )
    );
    return { downloaded, failed };
  }
}

function removeFrom(list: string[], id: string): void {
  const index = list.indexOf(id);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
