/**
 * Resumable, checksum-verified file transfer through a `.incomplete` temp file
 */
import { mkdir, open, rename, stat, unlink } from "fs/promises";
import path from "path";

import { checksumCompare } from "./checksum.js";
import type { ConcurrencyLimiter } from "./concurrency.js";
import { DownloadCancelledError, HubError, InvalidChecksumError } from "./errors.js";
import { CatalogClient, summarizeResponse } from "./hub-client.js";
import type { HubLogger } from "./logger.js";
import { incompletePath, pathExists, throwIfCancelled, TransferTarget } from "./utils.js";

export interface TransferProgress {
  path: string;
  /** Bytes on disk, including those from earlier attempts */
  bytes: number;
  total: number;
}

export interface TransferContext {
  api: CatalogClient;
  limiter: ConcurrencyLimiter;
  logger: HubLogger;
  verifyChecksum: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: TransferProgress) => void;
  /** Bytes hashed so far while the checksum of `path` is verified */
  onVerifyProgress?: (progress: TransferProgress) => void;
}

/**
 * Download `target` to `finalPath`, resuming from an existing `.incomplete` file.
 * An existing final file is trusted as complete and not re-verified.
 * @returns Number of bytes transferred by this call
 */
export async function transferFile(
  target: TransferTarget,
  finalPath: string,
  ctx: TransferContext
): Promise<number> {
  if (await pathExists(finalPath)) {
    return 0;
  }

  const tempPath = incompletePath(finalPath);
  let complete = false;
  let verified = false;

  if (await pathExists(tempPath)) {
    const { size } = await stat(tempPath);
    if (size > target.size) {
      ctx.logger.warn(
        `Existing incomplete file ${tempPath} is larger than the expected final size (${size} vs ${target.size} bytes). Deleting it.`
      );
      await unlink(tempPath);
    } else if (size === target.size) {
      if (ctx.verifyChecksum && !(await verifyFile(tempPath, target, ctx))) {
        ctx.logger.warn(
          `Existing incomplete file ${tempPath} appears to be fully downloaded but its checksum is incorrect. Deleting it.`
        );
        await unlink(tempPath);
      } else {
        complete = true;
        verified = ctx.verifyChecksum;
      }
    } else {
      ctx.logger.info(`Download will resume from existing incomplete file ${tempPath}.`);
    }
  }

  let downloaded = 0;
  if (!complete) {
    await mkdir(path.dirname(tempPath), { recursive: true });
    downloaded = await streamToFile(target.url, tempPath, target.size, ctx);
  }

  if (ctx.verifyChecksum && !verified) {
    throwIfCancelled(ctx.signal);
    if (!(await verifyFile(tempPath, target, ctx))) {
      await unlink(tempPath);
      throw new InvalidChecksumError();
    }
  }

  await rename(tempPath, finalPath);
  return downloaded;
}

function verifyFile(
  filePath: string,
  target: TransferTarget,
  ctx: TransferContext
): Promise<boolean> {
  const report = ctx.onVerifyProgress;
  if (!report) {
    return checksumCompare(filePath, target.checksums);
  }
  let bytes = 0;
  return checksumCompare(filePath, target.checksums, {
    onProgress: (block) => {
      bytes += block;
      report({ path: filePath, bytes, total: target.size });
    },
  });
}

/**
 * Append the remote bytes after whatever `tempPath` already holds.
 * Every body read waits for a transfer slot, and cancellation is checked before each one.
 */
async function streamToFile(
  url: string,
  tempPath: string,
  totalSize: number,
  ctx: TransferContext
): Promise<number> {
  throwIfCancelled(ctx.signal);

  let offset = (await pathExists(tempPath)) ? (await stat(tempPath)).size : 0;
  const headers: Record<string, string> = offset > 0 ? { Range: `bytes=${offset}-` } : {};

  const response = await ctx.limiter.transfer(() =>
    ctx.api.get(url, { headers, signal: ctx.signal, timeout: false })
  );
  await ctx.api.checkResponse(response, { testJson: false });

  if (offset > 0 && response.status !== 206) {
    ctx.logger.warn(`Server ignored the range request for ${tempPath}; restarting from zero`);
    offset = 0;
  }
  if (!response.body) {
    throw new HubError("Response body is null", summarizeResponse(response));
  }

  const reader = response.body.getReader();
  const handle = await open(tempPath, offset > 0 ? "a" : "w");
  let downloaded = 0;
  let finished = false;
  try {
    while (true) {
      throwIfCancelled(ctx.signal);
      const { done, value } = await ctx.limiter.transfer(() => reader.read());
      if (done) {
        finished = true;
        break;
      }
      if (value.length > 0) {
        await handle.write(value);
        downloaded += value.length;
        ctx.onProgress?.({ path: tempPath, bytes: offset + downloaded, total: totalSize });
      }
    }
  } catch (error) {
    if (ctx.signal?.aborted) {
      throw new DownloadCancelledError();
    }
    throw error;
  } finally {
    await handle.close();
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        ctx.logger.debug(`Closing the response stream for ${tempPath} failed: ${String(error)}`);
      });
    }
  }
  return downloaded;
}
