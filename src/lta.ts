/**
 * Long Term Archive retrieval: trigger probes and the trigger-and-wait loop
 */
import type { ConcurrencyLimiter } from "./concurrency.js";
import { DownloadCancelledError, formatError, LTAError, ServerError } from "./errors.js";
import { CatalogClient, summarizeResponse } from "./hub-client.js";
import type { HubLogger } from "./logger.js";
import { DownloadStatus, sleep } from "./utils.js";

export interface TriggerContext {
  api: CatalogClient;
  limiter: ConcurrencyLimiter;
  logger: HubLogger;
  signal?: AbortSignal;
}

/**
 * Probe the product's transfer URL for two bytes. Requesting zero bytes upsets some hubs.
 * @returns true if retrieval was accepted, false if the product is already online
 * @throws LTAError when the user quota is exhausted (reason "quota") or the archive
 * refuses the request (reason "unavailable")
 * @throws ServerError on an unexpected response
 */
export async function triggerOfflineRetrieval(id: string, ctx: TriggerContext): Promise<boolean> {
  const url = ctx.api.getDownloadUrl(id);
  const response = await ctx.limiter.trigger(() =>
    ctx.limiter.transfer(async () => {
      const probe = await ctx.api.get(url, {
        headers: { Range: "bytes=0-1" },
        signal: ctx.signal,
      });
      // Release the connection; only the status matters
      await probe.body?.cancel();
      return probe;
    })
  );

  const cause = response.headers.get("cause-message");
  const status = response.status;
  if (status === 200 || status === 206) {
    ctx.logger.debug(`Product ${id} is online`);
    return false;
  }
  if (status === 202) {
    ctx.logger.debug(`Product ${id} accepted for retrieval`);
    return true;
  }
  if (status === 403 && cause?.includes("concurrent flows")) {
    ctx.logger.debug(`Product ${id} is online but the concurrent downloads limit was exceeded`);
    return false;
  }
  if (status === 403) {
    const msg = `User quota exceeded: ${cause ?? "no cause given"}`;
    ctx.logger.error(msg);
    throw new LTAError(msg, "quota", summarizeResponse(response));
  }
  if (status === 503) {
    const msg = `Request not accepted: ${cause ?? "no cause given"}`;
    ctx.logger.error(msg);
    throw new LTAError(msg, "unavailable", summarizeResponse(response));
  }
  if (status < 400) {
    const msg = `Unexpected response ${status}: ${cause ?? "no cause given"}`;
    ctx.logger.error(msg);
    throw new ServerError(msg, summarizeResponse(response));
  }
  await ctx.api.checkResponse(response, { testJson: false });
  throw new ServerError(`Unexpected response ${status}`, summarizeResponse(response));
}

export interface StatusRecorder {
  get(id: string): DownloadStatus | undefined;
  set(id: string, status: DownloadStatus): void;
}

export interface TriggerLoopOptions {
  signal?: AbortSignal;
  statuses: StatusRecorder;
  retryDelayMs: number;
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Keep triggering an offline product and polling until it is online.
 * Transient archive and server errors are retried; quota exhaustion, the
 * timeout and cancellation end the loop.
 */
export async function triggerAndWait(
  id: string,
  ctx: TriggerContext,
  options: TriggerLoopOptions
): Promise<void> {
  const { statuses, retryDelayMs, timeoutMs } = options;
  const signal = options.signal ?? ctx.signal;
  const probeCtx: TriggerContext = { ...ctx, signal };
  const now = options.now ?? Date.now;
  const deadline = timeoutMs !== undefined ? now() + timeoutMs : undefined;

  while (!signal?.aborted) {
    if (await ctx.limiter.transfer(() => ctx.api.isOnline(id, { signal }))) {
      break;
    }
    if (signal?.aborted) {
      break;
    }

    if (statuses.get(id) === DownloadStatus.OFFLINE) {
      try {
        const triggered = await triggerOfflineRetrieval(id, probeCtx);
        if (!triggered) {
          break;
        }
        statuses.set(id, DownloadStatus.TRIGGERED);
        ctx.logger.info(`${id} accepted for retrieval`);
      } catch (error) {
        if (!isTransientTriggerError(error)) {
          throw error;
        }
        ctx.logger.info(
          `Request for ${id} was not accepted: ${formatError(error)}. Retrying in ${Math.round(retryDelayMs / 1000)} seconds`
        );
      }
    }

    let wait = retryDelayMs;
    if (deadline !== undefined) {
      const remaining = deadline - now();
      if (remaining <= 0) {
        throw new LTAError(
          `Product ${id} did not come online within ${Math.round((timeoutMs ?? 0) / 1000)} seconds`,
          "timeout"
        );
      }
      wait = Math.min(wait, remaining);
    }
    await sleep(wait, signal);
  }

  if (signal?.aborted) {
    throw new DownloadCancelledError(`Retrieval of ${id} cancelled`);
  }
  ctx.logger.info(`${id} retrieval from LTA completed`);
  statuses.set(id, DownloadStatus.ONLINE);
}

function isTransientTriggerError(error: unknown): boolean {
  if (error instanceof LTAError) {
    return error.retryable;
  }
  return error instanceof ServerError;
}
