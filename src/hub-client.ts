/**
 * Authenticated access to the data hub's OData API
 */
import { mkdir, readFile, writeFile } from "fs/promises";
import path from "path";

import type { HubConfig } from "./config.js";
import {
  DownloadCancelledError,
  formatError,
  HubError,
  InvalidKeyError,
  ResponseSummary,
  ServerError,
  UnauthorizedError,
} from "./errors.js";
import { createLogger, HubLogger } from "./logger.js";
import { ODataEnvelopeSchema, ODataNodeSchema, parseODataProduct } from "./odata.js";
import { NodeInfo, pathExists, ProductInfo } from "./utils.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
  method?: "GET" | "HEAD";
  headers?: Record<string, string>;
  /** Cancels the request; aborting it surfaces as DownloadCancelledError */
  signal?: AbortSignal;
  /** Apply the configured timeout (default true). Long transfers turn it off. */
  timeout?: boolean;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export type NodeUrlKind = "value" | "json" | "full";

export interface ManifestResult {
  node: NodeInfo;
  data: Buffer;
}

/**
 * What the download core needs from the catalog
 */
export interface CatalogClient {
  readonly apiUrl: string;
  getProductOdata(id: string, options?: { full?: boolean } & CallOptions): Promise<ProductInfo>;
  isOnline(id: string, options?: CallOptions): Promise<boolean>;
  getFilename(info: ProductInfo, options?: CallOptions): Promise<string>;
  get(url: string, options?: RequestOptions): Promise<Response>;
  checkResponse(response: Response, options?: { testJson?: boolean }): Promise<void>;
  getDownloadUrl(id: string): string;
  getQuicklookUrl(id: string): string;
  nodeUrl(info: ProductInfo, nodePath: string, kind?: NodeUrlKind): string;
  getManifest(
    info: ProductInfo,
    manifestPath?: string,
    options?: CallOptions
  ): Promise<ManifestResult>;
}

export function summarizeResponse(response: Response): ResponseSummary {
  return { status: response.status, reason: response.statusText || undefined, url: response.url };
}

/**
 * Pull a readable message out of an error response: the `cause-message` header,
 * an OData error document, or the body text with markup removed
 */
export async function extractErrorMessage(response: Response): Promise<string> {
  const cause = response.headers.get("cause-message");
  if (cause) {
    return cause;
  }

  let text = "";
  try {
    text = await response.text();
  } catch {
    return "Invalid API response.";
  }

  const trimmed = text.trim();
  if (trimmed.startsWith("{")) {
    try {
      const body: unknown = JSON.parse(trimmed);
      const message = readODataErrorMessage(body);
      if (message) {
        return message;
      }
    } catch {
      // not JSON after all
    }
    return "Invalid API response.";
  }

  const plain = trimmed
    .replace(/<(script|style)[\s\S]*?<\/\1>/gi, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return plain || "Invalid API response.";
}

function readODataErrorMessage(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("error" in body)) return undefined;
  const error = body.error;
  if (typeof error !== "object" || error === null || !("message" in error)) return undefined;
  const message = error.message;
  if (typeof message === "string") return message;
  if (typeof message === "object" && message !== null && "value" in message) {
    return typeof message.value === "string" ? message.value : undefined;
  }
  return undefined;
}

/**
 * Map an HTTP error status to the matching error class
 */
export function errorForStatus(msg: string, response: ResponseSummary): HubError {
  if (response.status === 401) {
    return new UnauthorizedError(msg, response);
  }
  if (response.status === 404) {
    return new InvalidKeyError(msg, response);
  }
  if (response.status >= 500) {
    return new ServerError(msg, response);
  }
  return new HubError(msg, response);
}

const CONTENT_DISPOSITION_FILENAME = /filename\*?=(?:UTF-8'')?"?([^";]+)"?/i;

export function filenameFromContentDisposition(header: string | null): string | null {
  if (!header) return null;
  const match = header.match(CONTENT_DISPOSITION_FILENAME);
  if (!match) return null;
  let raw = match[1].trim();
  try {
    raw = decodeURIComponent(raw);
  } catch {
    // keep the undecoded name
  }
  const name = path.basename(raw);
  return name && name !== "." && name !== ".." ? name : null;
}

/**
 * Filename used when the server does not name the file itself
 */
export function guessFilename(info: Pick<ProductInfo, "title">): string {
  const extension = info.title.startsWith("S5P") ? ".nc" : ".zip";
  return `${info.title}${extension}`;
}

export class HubClient implements CatalogClient {
  readonly apiUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: HubLogger;

  constructor(config: HubConfig, options: { fetch?: FetchLike; logger?: HubLogger } = {}) {
    this.apiUrl = config.apiUrl.endsWith("/") ? config.apiUrl : `${config.apiUrl}/`;
    const credentials = Buffer.from(`${config.user}:${config.password}`).toString("base64");
    this.authorization = `Basic ${credentials}`;
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createLogger("sathub-client");
  }

  /**
   * Authenticated request. Network failures and timeouts become ServerError with the
   * original error as cause.
   */
  async get(url: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? "GET";
    this.logger.debug(`${method} ${url}`);
    try {
      return await this.fetchImpl(url, {
        method,
        headers: { Authorization: this.authorization, ...options.headers },
        signal: this.requestSignal(options),
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new DownloadCancelledError(`Request cancelled: ${method} ${url}`, { cause: error });
      }
      const msg = `Request failed: ${method} ${url}: ${formatError(error)}`;
      throw new ServerError(msg, undefined, { cause: error });
    }
  }

  private requestSignal(options: RequestOptions): AbortSignal | undefined {
    const timeout =
      options.timeout !== false && this.timeoutMs
        ? AbortSignal.timeout(this.timeoutMs)
        : undefined;
    if (options.signal && timeout) {
      return AbortSignal.any([options.signal, timeout]);
    }
    return options.signal ?? timeout;
  }

  /**
   * Throw the matching HubError unless the response is 2xx (and valid JSON when asked)
   */
  async checkResponse(response: Response, options: { testJson?: boolean } = {}): Promise<void> {
    const testJson = options.testJson ?? true;
    if (response.ok) {
      if (!testJson) {
        return;
      }
      try {
        await response.clone().json();
        return;
      } catch {
        throw new HubError("Invalid API response.", summarizeResponse(response));
      }
    }
    const msg = await extractErrorMessage(response);
    throw errorForStatus(msg, summarizeResponse(response));
  }

  productUrl(id: string): string {
    return `${this.apiUrl}odata/v1/Products('${id}')`;
  }

  getDownloadUrl(id: string): string {
    return `${this.productUrl(id)}/$value`;
  }

  getQuicklookUrl(id: string): string {
    return `${this.productUrl(id)}/Products('Quicklook')/$value`;
  }

  nodeUrl(info: ProductInfo, nodePath: string, kind?: NodeUrlKind): string {
    const relative = nodePath.startsWith("./") ? nodePath.slice(2) : nodePath;
    const segments = relative
      .split("/")
      .filter(Boolean)
      .map((segment) => `Nodes('${segment}')`)
      .join("/");
    const suffix =
      kind === "value"
        ? "/$value"
        : kind === "json"
          ? "?$format=json"
          : kind === "full"
            ? "?$format=json&$expand=Attributes"
            : "";
    return `${this.productUrl(info.id)}/Nodes('${info.title}.SAFE')/${segments}${suffix}`;
  }

  /**
   * Access the OData API to get a product's descriptor
   * @param id - The product UUID
   * @param options.full - Also fetch the extended attribute list
   */
  async getProductOdata(
    id: string,
    options: { full?: boolean } & CallOptions = {}
  ): Promise<ProductInfo> {
    let url = `${this.productUrl(id)}?$format=json`;
    if (options.full) {
      url += "&$expand=Attributes";
    }
    const response = await this.get(url, { signal: options.signal });
    await this.checkResponse(response);
    const parsed = ODataEnvelopeSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new HubError(
        `Invalid API response: ${parsed.error.issues[0]?.message ?? "unexpected product format"}`,
        summarizeResponse(response)
      );
    }
    return parseODataProduct(parsed.data.d, this.getQuicklookUrl(id));
  }

  async isOnline(id: string, options: CallOptions = {}): Promise<boolean> {
    const response = await this.get(`${this.productUrl(id)}/Online/$value`, {
      signal: options.signal,
    });
    if (!response.ok) {
      await this.checkResponse(response, { testJson: false });
    }
    const text = (await response.text()).trim();
    if (text === "true") return true;
    if (text === "false") return false;
    throw new HubError(
      `Could not verify whether product ${id} is online`,
      summarizeResponse(response)
    );
  }

  /**
   * The server-side filename from Content-Disposition for online products,
   * otherwise a guess based on the title
   */
  async getFilename(info: ProductInfo, options: CallOptions = {}): Promise<string> {
    if (info.online) {
      const response = await this.get(info.url, { method: "HEAD", signal: options.signal });
      await this.checkResponse(response, { testJson: false });
      const filename = filenameFromContentDisposition(response.headers.get("content-disposition"));
      if (filename) {
        return filename;
      }
    }
    return guessFilename(info);
  }

  /**
   * Fetch the product's manifest.safe, reusing a local copy when present
   */
  async getManifest(
    info: ProductInfo,
    manifestPath?: string,
    options: CallOptions = {}
  ): Promise<ManifestResult> {
    const node: NodeInfo = {
      productId: info.id,
      title: info.title,
      nodePath: "./manifest.safe",
      url: this.nodeUrl(info, "manifest.safe", "value"),
      size: 0,
      checksums: {},
    };

    if (manifestPath && (await pathExists(manifestPath))) {
      this.logger.info(`Manifest file already available (${manifestPath}), skip download`);
      const data = await readFile(manifestPath);
      return { node: { ...node, size: data.length }, data };
    }

    const metaResponse = await this.get(this.nodeUrl(info, "manifest.safe", "json"), {
      signal: options.signal,
    });
    await this.checkResponse(metaResponse);
    const meta = ODataNodeSchema.safeParse(await metaResponse.json());
    if (!meta.success) {
      throw new HubError("Invalid API response.", summarizeResponse(metaResponse));
    }
    const size = Number(meta.data.d.ContentLength);

    const response = await this.get(node.url, { signal: options.signal });
    await this.checkResponse(response, { testJson: false });
    const data = Buffer.from(await response.arrayBuffer());
    if (data.length !== size) {
      throw new HubError("File corrupt: data length do not match", summarizeResponse(response));
    }

    if (manifestPath) {
      await mkdir(path.dirname(manifestPath), { recursive: true });
      await writeFile(manifestPath, data);
    }
    return { node: { ...node, size }, data };
  }
}
