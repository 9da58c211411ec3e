/**
 * Error taxonomy for data hub requests and downloads
 */

/**
 * The parts of an HTTP response kept on an error for reporting
 */
export interface ResponseSummary {
  status: number;
  reason?: string;
  url?: string;
}

/**
 * Invalid response from the data hub. Base class for the more specific errors.
 */
export class HubError extends Error {
  readonly msg: string;
  readonly response?: ResponseSummary;

  constructor(msg = "", response?: ResponseSummary, options?: ErrorOptions) {
    super(msg, options);
    this.name = new.target.name;
    this.msg = msg;
    this.response = response;
  }

  override toString(): string {
    if (!this.response) {
      return this.msg;
    }
    const reason = this.response.reason ? ` ${this.response.reason}` : "";
    const separator = this.msg.includes("\n") ? "\n" : "";
    return `HTTP status ${this.response.status}${reason}: ${separator}${this.msg}`;
  }
}

/**
 * No product exists for the requested key
 */
export class InvalidKeyError extends HubError {
  override toString(): string {
    return this.msg;
  }
}

/**
 * Credentials were rejected. Never retried: the whole batch cannot proceed.
 */
export class UnauthorizedError extends HubError {
  override toString(): string {
    return this.msg;
  }
}

/**
 * The server answered in an unexpected manner, typically during maintenance
 */
export class ServerError extends HubError {}

export type LTAErrorReason = "quota" | "unavailable" | "timeout";

/**
 * Retrieving a product from the Long Term Archive failed
 */
export class LTAError extends HubError {
  readonly reason: LTAErrorReason;

  constructor(msg: string, reason: LTAErrorReason, response?: ResponseSummary) {
    super(msg, response);
    this.reason = reason;
  }

  /** Quota exhaustion and timeouts end the retrieval loop; a busy archive does not. */
  get retryable(): boolean {
    return this.reason === "unavailable";
  }
}

/**
 * The product is archived and its retrieval from the Long Term Archive was triggered
 */
export class LTATriggered extends HubError {
  readonly productId: string;

  constructor(productId: string) {
    super(`Product ${productId} is not online. Triggered retrieval from the Long Term Archive.`);
    this.productId = productId;
  }
}

/**
 * The checksum of a local file does not match the one declared by the server
 */
export class InvalidChecksumError extends Error {
  constructor(message = "File corrupt: checksums do not match") {
    super(message);
    this.name = "InvalidChecksumError";
  }
}

/**
 * The descriptor carries no checksum in a supported algorithm.
 * Distinct from a mismatch: nothing was verified.
 */
export class ChecksumUnavailableError extends Error {
  constructor(message = "No MD5 or SHA3-256 checksum available") {
    super(message);
    this.name = "ChecksumUnavailableError";
  }
}

export class DownloadCancelledError extends Error {
  constructor(message = "Download cancelled", options?: ErrorOptions) {
    super(message, options);
    this.name = "DownloadCancelledError";
  }
}

/**
 * Human-readable one-line description of any thrown value
 */
export function formatError(error: unknown): string {
  if (error instanceof HubError) {
    return `${error.name}: ${error.toString()}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
