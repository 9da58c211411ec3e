/**
 * OData product metadata parsing
 */
import { z } from "zod";

import type { AttributeValue, Checksums, ProductInfo } from "./utils.js";

const ODataChecksumSchema = z.object({
  Algorithm: z.string(),
  Value: z.string(),
});

const ODataAttributeSchema = z.object({
  Name: z.string(),
  Value: z.string(),
});

export const ODataProductSchema = z.object({
  Id: z.string(),
  Name: z.string(),
  ContentLength: z.union([z.string(), z.number()]),
  Checksum: z.union([ODataChecksumSchema, z.array(ODataChecksumSchema)]).nullish(),
  ContentDate: z.object({ Start: z.string().nullish() }).nullish(),
  ContentGeometry: z.string().nullish(),
  CreationDate: z.string().nullish(),
  IngestionDate: z.string().nullish(),
  Online: z.boolean().optional(),
  __metadata: z.object({ media_src: z.string() }),
  Attributes: z
    .object({ results: z.array(ODataAttributeSchema).optional() })
    .passthrough()
    .nullish(),
});

export type ODataProduct = z.infer<typeof ODataProductSchema>;

export const ODataEnvelopeSchema = z.object({ d: ODataProductSchema });

export const ODataNodeSchema = z.object({
  d: z.object({
    ContentLength: z.union([z.string(), z.number()]),
  }),
});

/**
 * Convert an OData JSON timestamp such as "/Date(1445558400000)/" to a Date
 */
export function parseODataTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const match = value.match(/^\/Date\((-?\d+)\)\/$/);
  if (!match) return null;
  return new Date(Number(match[1]));
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

/**
 * Attribute values arrive as strings; numbers and ISO dates are converted
 */
export function convertAttributeValue(value: string): AttributeValue {
  const trimmed = value.trim();
  if (/^-?\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }
  if (/^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(trimmed)) {
    return Number.parseFloat(trimmed);
  }
  if (ISO_DATE.test(trimmed)) {
    return new Date(trimmed);
  }
  return value;
}

export function parseChecksums(checksum: ODataProduct["Checksum"]): Checksums {
  const checksums: Checksums = {};
  const entries = Array.isArray(checksum) ? checksum : checksum ? [checksum] : [];
  for (const entry of entries) {
    const algorithm = entry.Algorithm.toLowerCase();
    if (algorithm === "md5" || algorithm === "sha3-256") {
      checksums[algorithm] = entry.Value;
    }
  }
  return checksums;
}

/**
 * Map an OData product entity to a product descriptor
 * @param product - The `d` member of the OData response
 * @param quicklookUrl - Where the product's preview image is served
 */
export function parseODataProduct(product: ODataProduct, quicklookUrl: string): ProductInfo {
  const info: ProductInfo = {
    id: product.Id,
    title: product.Name,
    size: Number(product.ContentLength),
    checksums: parseChecksums(product.Checksum),
    date: parseODataTimestamp(product.ContentDate?.Start),
    creationDate: parseODataTimestamp(product.CreationDate),
    ingestionDate: parseODataTimestamp(product.IngestionDate),
    footprint: product.ContentGeometry ?? null,
    url: product.__metadata.media_src,
    quicklookUrl,
    // Hubs without an archive tier omit the flag
    online: product.Online ?? true,
  };

  const attributes = product.Attributes?.results;
  if (attributes && attributes.length > 0) {
    const converted: Record<string, AttributeValue> = {};
    for (const attr of attributes) {
      converted[attr.Name] = convertAttributeValue(attr.Value);
    }
    info.attributes = converted;
  }
  return info;
}
