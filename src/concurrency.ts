/**
 * Server-side connection quotas, enforced for one Downloader instance
 */
import pLimit, { type LimitFunction } from "p-limit";

export interface ConcurrencyLimits {
  /** Concurrent GET requests against the hub, transfers and probes alike */
  transfer: number;
  /** Concurrent Long Term Archive retrieval requests */
  trigger: number;
}

export class ConcurrencyLimiter {
  private transferLimit: LimitFunction;
  private triggerLimit: LimitFunction;
  private limits: ConcurrencyLimits;

  constructor(limits: ConcurrencyLimits) {
    assertPositive(limits.transfer, "transfer");
    assertPositive(limits.trigger, "trigger");
    this.limits = { ...limits };
    this.transferLimit = pLimit(limits.transfer);
    this.triggerLimit = pLimit(limits.trigger);
  }

  get current(): Readonly<ConcurrencyLimits> {
    return { ...this.limits };
  }

  /**
   * Replace a limiter with one of the new size. Tasks already admitted by the old
   * limiter keep their slot; later acquisitions queue on the new one.
   */
  resize(limits: Partial<ConcurrencyLimits>): void {
    if (limits.transfer !== undefined && limits.transfer !== this.limits.transfer) {
      assertPositive(limits.transfer, "transfer");
      this.limits.transfer = limits.transfer;
      this.transferLimit = pLimit(limits.transfer);
    }
    if (limits.trigger !== undefined && limits.trigger !== this.limits.trigger) {
      assertPositive(limits.trigger, "trigger");
      this.limits.trigger = limits.trigger;
      this.triggerLimit = pLimit(limits.trigger);
    }
  }

  transfer<T>(task: () => Promise<T>): Promise<T> {
    return this.transferLimit(task);
  }

  trigger<T>(task: () => Promise<T>): Promise<T> {
    return this.triggerLimit(task);
  }

  /** Tasks currently holding a transfer slot */
  get activeTransfers(): number {
    return this.transferLimit.activeCount;
  }

  get activeTriggers(): number {
    return this.triggerLimit.activeCount;
  }
}

function assertPositive(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Concurrency limit '${name}' must be a positive integer, got ${value}`);
  }
}
