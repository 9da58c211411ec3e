import { access } from "fs/promises";
import path from "path";
import { setTimeout as delay } from "timers/promises";

import { DownloadCancelledError } from "./errors.js";

/**
 * Progress of one product within a single batch run.
 * Only `DOWNLOADED` counts as success.
 */
export const DownloadStatus = {
  UNAVAILABLE: "UNAVAILABLE",
  OFFLINE: "OFFLINE",
  TRIGGERED: "TRIGGERED",
  ONLINE: "ONLINE",
  DOWNLOAD_STARTED: "DOWNLOAD_STARTED",
  DOWNLOADED: "DOWNLOADED",
} as const;

export type DownloadStatus = (typeof DownloadStatus)[keyof typeof DownloadStatus];

export function isSuccessful(status: DownloadStatus | undefined): boolean {
  return status === DownloadStatus.DOWNLOADED;
}

export type ChecksumAlgorithm = "md5" | "sha3-256";

export const CHECKSUM_ALGORITHMS: readonly ChecksumAlgorithm[] = ["sha3-256", "md5"];

export type Checksums = Partial<Record<ChecksumAlgorithm, string>>;

export type AttributeValue = string | number | Date;

export interface ProductInfo {
  id: string;
  title: string;
  size: number;
  checksums: Checksums;
  date: Date | null;
  creationDate: Date | null;
  ingestionDate: Date | null;
  // GML as served; geometry conversion lives outside this package
  footprint: string | null;
  url: string;
  quicklookUrl: string;
  online: boolean;
  attributes?: Record<string, AttributeValue>;
  path?: string;
  downloadedBytes?: number;
  nodePath?: string;
  nodes?: Record<string, NodeInfo>;
}

/**
 * One file inside a multi-file product package
 */
export interface NodeInfo {
  productId: string;
  title: string;
  nodePath: string;
  url: string;
  size: number;
  checksums: Checksums;
  path?: string;
  downloadedBytes?: number;
}

/**
 * What the resumable transfer needs to know about a file, product or node
 */
export interface TransferTarget {
  url: string;
  size: number;
  checksums: Checksums;
}

export const INCOMPLETE_SUFFIX = ".incomplete";

export function incompletePath(finalPath: string): string {
  return `${finalPath}${INCOMPLETE_SUFFIX}`;
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Sleep that rejects with DownloadCancelledError as soon as the signal aborts
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new DownloadCancelledError();
  }
  if (ms <= 0) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new DownloadCancelledError();
    }
    throw error;
  }
}

/**
 * Resolves with the promise's value, or rejects with DownloadCancelledError
 * once the signal aborts, whichever happens first
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new DownloadCancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new DownloadCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new DownloadCancelledError();
  }
}

/**
 * Validates that a directory path is safe and within allowed directories
 * @param filePath - The path to validate
 * @param allowedDirs - Array of allowed base directories (optional)
 * @returns true if path is valid and safe
 */
export function validateFilePath(filePath: string, allowedDirs?: string[]): boolean {
  if (!filePath) {
    return false;
  }

  // Directory traversal attempts are refused outright
  if (filePath.split(/[\\/]/).includes("..")) {
    return false;
  }

  const resolved = path.resolve(filePath);
  if (allowedDirs && allowedDirs.length > 0) {
    return allowedDirs.some((dir) => {
      const resolvedDir = path.resolve(dir);
      return resolved.startsWith(resolvedDir + path.sep) || resolved === resolvedDir;
    });
  }

  return true;
}

/**
 * Format a byte count for display
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KiB", "MiB", "GiB", "TiB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
}
