import { createHash } from "node:crypto";
import { ReadableStream } from "node:stream/web";

import { HubClient } from "../../src/hub-client.js";
import { silentLogger } from "../../src/logger.js";
import type { Checksums } from "../../src/utils.js";

export const API_URL = "https://hub.test/";
export const TEST_USER = "test-user";
export const TEST_PASSWORD = "test-secret";

export interface FakeProductInit {
  id: string;
  title: string;
  content?: Buffer;
  online?: boolean;
  /** Declared checksums; defaults to the MD5 of the content */
  checksums?: Checksums;
  /** Content-Disposition filename; null leaves the header out */
  filename?: string | null;
  supportsRange?: boolean;
  /** Status of a trigger probe while offline */
  triggerStatus?: number;
  causeMessage?: string;
  /** Online polls after an accepted trigger before the product is online */
  pollsUntilOnline?: number;
  /** Full transfers served with a flipped first byte */
  corruptTransfers?: number;
  /** Status served for product metadata instead of the document */
  metadataStatus?: number;
  /** Files of the product package by path, e.g. "measurement/b04.jp2" */
  nodes?: Record<string, Buffer>;
  quicklook?: { body: Buffer; contentType: string };
  attributes?: Record<string, string>;
}

type OptionalFields = "nodes" | "quicklook" | "attributes" | "metadataStatus" | "causeMessage";

export interface FakeProduct extends Required<Omit<FakeProductInit, OptionalFields>> {
  nodes?: Record<string, Buffer>;
  quicklook?: { body: Buffer; contentType: string };
  attributes?: Record<string, string>;
  metadataStatus?: number;
  causeMessage?: string;
  triggered: boolean;
  polls: number;
}

export interface RecordedRequest {
  method: string;
  url: string;
  range: string | null;
}

export function md5(data: Buffer | string): string {
  return createHash("md5").update(data).digest("hex");
}

export function sha3(data: Buffer | string): string {
  return createHash("sha3-256").update(data).digest("hex");
}

export function productUrl(id: string): string {
  return `${API_URL}odata/v1/Products('${id}')`;
}

/** A request that never answers and rejects with the signal's reason once aborted */
export function hangUntilAborted(init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/** A body that delivers `first` and then stalls until the signal aborts */
export function stalledBody(first: Uint8Array, init?: RequestInit): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(first);
      const signal = init?.signal;
      if (!signal) return;
      signal.addEventListener("abort", () => controller.error(signal.reason), { once: true });
    },
  });
}

export function buildManifest(nodes: Record<string, Buffer>): string {
  const objects = Object.entries(nodes)
    .map(
      ([nodePath, data], index) => `    <dataObject ID="obj${index}">
      <byteStream mimeType="application/octet-stream" size="${data.length}">
        <fileLocation locatorType="URL" href="./${nodePath}"/>
        <checksum checksumName="MD5">${md5(data)}</checksum>
      </byteStream>
    </dataObject>`
    )
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<xfdu:XFDU xmlns:xfdu="urn:ccsds:schema:xfdu:1" version="esa/safe/sentinel/1.1/sentinel-2/msi/archive_l1c_user_product">
  <metadataSection/>
  <dataObjectSection>
${objects}
  </dataObjectSection>
</xfdu:XFDU>
`;
}

function bytes(data: Buffer | string): Uint8Array {
  return new Uint8Array(typeof data === "string" ? Buffer.from(data) : data);
}

/**
 * In-process stand-in for a data hub's OData API, served through a fetch function
 */
export class FakeHub {
  readonly products = new Map<string, FakeProduct>();
  readonly requests: RecordedRequest[] = [];
  unauthorized = false;

  constructor(products: FakeProductInit[] = []) {
    for (const product of products) {
      this.add(product);
    }
  }

  add(init: FakeProductInit): FakeProduct {
    const content = init.content ?? Buffer.from(`content of ${init.title}`);
    const product: FakeProduct = {
      online: true,
      checksums: { md5: md5(content) },
      filename: `${init.title}.zip`,
      supportsRange: true,
      triggerStatus: 202,
      pollsUntilOnline: 1,
      corruptTransfers: 0,
      ...init,
      content,
      triggered: false,
      polls: 0,
    };
    this.products.set(product.id, product);
    return product;
  }

  client(options: { timeoutMs?: number } = {}): HubClient {
    return new HubClient(
      { apiUrl: API_URL, user: TEST_USER, password: TEST_PASSWORD, timeoutMs: options.timeoutMs },
      { fetch: this.fetch, logger: silentLogger }
    );
  }

  count(predicate: (request: RecordedRequest) => boolean): number {
    return this.requests.filter(predicate).length;
  }

  /** GET requests for a product's full transfer URL, probes included */
  transferRequests(id: string): RecordedRequest[] {
    const url = `${productUrl(id)}/$value`;
    return this.requests.filter((request) => request.method === "GET" && request.url === url);
  }

  readonly fetch = async (input: string, init?: RequestInit): Promise<Response> => {
    const headers = new Headers(init?.headers);
    const method = init?.method ?? "GET";
    this.requests.push({ method, url: input, range: headers.get("range") });

    const expected = `Basic ${Buffer.from(`${TEST_USER}:${TEST_PASSWORD}`).toString("base64")}`;
    if (this.unauthorized || headers.get("authorization") !== expected) {
      return new Response("<html><body><h1>401 Unauthorized</h1></body></html>", {
        status: 401,
        statusText: "Unauthorized",
      });
    }

    const prefix = `${API_URL}odata/v1/`;
    const match = input.startsWith(prefix)
      ? input.slice(prefix.length).match(/^Products\('([^']+)'\)(.*)$/)
      : null;
    const product = match ? this.products.get(match[1]) : undefined;
    if (!match || !product) {
      return Response.json(
        { error: { code: null, message: { lang: "en", value: "Invalid key" } } },
        { status: 404, statusText: "Not Found" }
      );
    }

    const rest = match[2];
    if (rest.startsWith("?$format=json")) {
      return this.metadata(product, rest.includes("$expand=Attributes"));
    }
    if (rest === "/Online/$value") {
      return this.online(product);
    }
    if (rest === "/$value") {
      return method === "HEAD" ? this.head(product) : this.transfer(product, headers.get("range"));
    }
    if (rest === "/Products('Quicklook')/$value") {
      return product.quicklook
        ? new Response(bytes(product.quicklook.body), {
            headers: { "content-type": product.quicklook.contentType },
          })
        : new Response("Not found", { status: 404 });
    }
    if (rest.startsWith(`/Nodes('${product.title}.SAFE')/`)) {
      return this.node(product, rest.slice(`/Nodes('${product.title}.SAFE')/`.length));
    }
    return new Response("Not found", { status: 404 });
  };

  private metadata(product: FakeProduct, full: boolean): Response {
    if (product.metadataStatus) {
      return new Response("Service temporarily unavailable", { status: product.metadataStatus });
    }
    const checksum = Object.entries(product.checksums).map(([algorithm, value]) => ({
      Algorithm: algorithm === "md5" ? "MD5" : "SHA3-256",
      Value: value,
    }));
    const document = {
      d: {
        __metadata: { media_src: `${productUrl(product.id)}/$value` },
        Id: product.id,
        Name: product.title,
        ContentLength: String(product.content.length),
        Checksum: checksum.length === 1 ? checksum[0] : checksum,
        ContentDate: { Start: "/Date(1600000000000)/", End: "/Date(1600000001000)/" },
        ContentGeometry: "<gml:Polygon/>",
        CreationDate: "/Date(1600000100000)/",
        IngestionDate: "/Date(1600000200000)/",
        Online: product.online,
        ...(full && product.attributes
          ? {
              Attributes: {
                results: Object.entries(product.attributes).map(([Name, Value]) => ({
                  Name,
                  Value,
                })),
              },
            }
          : {}),
      },
    };
    return Response.json(document);
  }

  private online(product: FakeProduct): Response {
    if (!product.online && product.triggered) {
      product.polls += 1;
      if (product.polls >= product.pollsUntilOnline) {
        product.online = true;
      }
    }
    return new Response(product.online ? "true" : "false");
  }

  private head(product: FakeProduct): Response {
    const headers: Record<string, string> = {
      "content-length": String(product.content.length),
    };
    if (product.filename) {
      headers["content-disposition"] = `inline;filename="${product.filename}"`;
    }
    return new Response(null, { headers });
  }

  private transfer(product: FakeProduct, range: string | null): Response {
    if (!product.online) {
      const headers: Record<string, string> = {};
      if (product.causeMessage) {
        headers["cause-message"] = product.causeMessage;
      }
      if (product.triggerStatus === 202) {
        product.triggered = true;
      }
      return new Response(null, { status: product.triggerStatus, headers });
    }

    let body = product.content;
    const rangeMatch = range?.match(/^bytes=(\d+)-(\d*)$/);
    if (rangeMatch && product.supportsRange) {
      const start = Number(rangeMatch[1]);
      const end = rangeMatch[2] ? Number(rangeMatch[2]) + 1 : body.length;
      return new Response(bytes(body.subarray(start, end)), {
        status: 206,
        headers: { "content-range": `bytes ${start}-${end - 1}/${body.length}` },
      });
    }

    if (product.corruptTransfers > 0) {
      product.corruptTransfers -= 1;
      body = Buffer.from(body);
      body[0] = body[0] ^ 0xff;
    }
    return new Response(bytes(body), {
      headers: product.filename
        ? { "content-disposition": `inline;filename="${product.filename}"` }
        : {},
    });
  }

  private node(product: FakeProduct, rest: string): Response {
    const nodes = product.nodes ?? {};
    const segments = [...rest.matchAll(/Nodes\('([^']+)'\)/g)].map((segment) => segment[1]);
    const nodePath = segments.join("/");
    const suffix = rest.slice(rest.lastIndexOf(")") + 1);
    const data =
      nodePath === "manifest.safe" ? Buffer.from(buildManifest(nodes)) : nodes[nodePath];
    if (!data) {
      return new Response("Not found", { status: 404 });
    }
    if (suffix === "?$format=json") {
      return Response.json({
        d: { Id: segments[segments.length - 1], ContentLength: String(data.length) },
      });
    }
    if (suffix === "/$value") {
      return new Response(bytes(data));
    }
    return new Response("Not found", { status: 404 });
  }
}
