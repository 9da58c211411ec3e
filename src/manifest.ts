/**
 * SAFE manifest parsing: one data object per file in the product package
 */
import * as cheerio from "cheerio";

import { HubError } from "./errors.js";
import type { NodeFilter } from "./node-filters.js";
import { ChecksumAlgorithm, Checksums, NodeInfo, ProductInfo } from "./utils.js";

export interface DataObjectInfo {
  id: string;
  href: string;
  size: number;
  checksums: Checksums;
}

function toChecksumAlgorithm(name: string): ChecksumAlgorithm | null {
  const normalized = name.trim().toLowerCase();
  return normalized === "md5" || normalized === "sha3-256" ? normalized : null;
}

/**
 * Read the dataObjectSection of a manifest.safe document
 */
export function parseManifest(xml: string | Buffer): DataObjectInfo[] {
  const $ = cheerio.load(xml.toString(), { xml: true });
  const section = $("dataObjectSection");
  if (section.length === 0) {
    throw new HubError("Manifest has no dataObjectSection");
  }

  return section
    .children("dataObject")
    .toArray()
    .map((element) => {
      const dataObject = $(element);
      const id = dataObject.attr("ID") ?? "";
      const byteStream = dataObject.children("byteStream").first();
      const size = Number(byteStream.attr("size"));
      const href = byteStream.children("fileLocation").first().attr("href");
      if (!href || !Number.isFinite(size)) {
        throw new HubError(`Manifest data object ${id || "(unnamed)"} lacks a location or size`);
      }

      const checksums: Checksums = {};
      byteStream.children("checksum").each((_, checksumElement) => {
        const checksum = $(checksumElement);
        const algorithm = toChecksumAlgorithm(checksum.attr("checksumName") ?? "");
        if (!algorithm) {
          throw new HubError(
            `Unsupported checksum ${checksum.attr("checksumName") ?? ""} in manifest data object ${id}`
          );
        }
        checksums[algorithm] = checksum.text().trim();
      });

      return { id, href, size, checksums };
    });
}

export type NodeUrlBuilder = (info: ProductInfo, nodePath: string) => string;

/**
 * Turn the manifest's data objects into node descriptors, keeping those the filter accepts.
 * Keys are the node paths as written in the manifest.
 */
export function filterNodes(
  dataObjects: DataObjectInfo[],
  product: ProductInfo,
  nodeUrl: NodeUrlBuilder,
  filter?: NodeFilter
): Record<string, NodeInfo> {
  const nodes: Record<string, NodeInfo> = {};
  for (const dataObject of dataObjects) {
    const relative = dataObject.href.startsWith("./") ? dataObject.href.slice(2) : dataObject.href;
    const node: NodeInfo = {
      productId: product.id,
      title: product.title,
      nodePath: dataObject.href,
      url: nodeUrl(product, relative),
      size: dataObject.size,
      checksums: dataObject.checksums,
    };
    if (filter && !filter.accepts(node)) {
      continue;
    }
    nodes[node.nodePath] = node;
  }
  return nodes;
}
