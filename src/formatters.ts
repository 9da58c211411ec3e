/**
 * Text summaries of products and download results for tool output
 */
import type { DownloadAllResult, QuicklookResult } from "./downloader.js";
import { formatError } from "./errors.js";
import { DownloadStatus, formatBytes, ProductInfo } from "./utils.js";

/**
 * Format a product descriptor for display
 */
export function formatProductInfo(info: ProductInfo): string {
  const lines: string[] = [];

  lines.push(`# ${info.title}`);
  lines.push("");
  lines.push(`**ID**: ${info.id}`);
  lines.push(`**Size**: ${formatBytes(info.size)}`);
  lines.push(`**Online**: ${info.online ? "yes" : "no (Long Term Archive)"}`);
  if (info.date) {
    lines.push(`**Sensing start**: ${info.date.toISOString()}`);
  }
  if (info.ingestionDate) {
    lines.push(`**Ingested**: ${info.ingestionDate.toISOString()}`);
  }

  const checksums = Object.entries(info.checksums);
  if (checksums.length > 0) {
    lines.push(
      `**Checksums**: ${checksums.map(([algorithm, value]) => `${algorithm} ${value}`).join(", ")}`
    );
  }

  if (info.attributes) {
    const names = Object.keys(info.attributes);
    lines.push("");
    lines.push(`**Attributes** (${names.length}):`);
    for (const name of names.slice(0, 20)) {
      const value = info.attributes[name];
      lines.push(`- ${name}: ${value instanceof Date ? value.toISOString() : String(value)}`);
    }
    if (names.length > 20) {
      lines.push(`- ... ${names.length - 20} more`);
    }
  }

  return lines.join("\n");
}

export function formatDownloadedProduct(info: ProductInfo): string {
  const transferred = info.downloadedBytes ?? 0;
  let output =
    transferred > 0
      ? `Downloaded ${info.title} (${formatBytes(transferred)}) to ${info.path ?? "?"}`
      : `${info.title} is already available at ${info.path ?? "?"}`;

  if (info.nodes) {
    const nodes = Object.values(info.nodes);
    output += `\n\n${nodes.length} files:\n`;
    output += nodes.map((node) => `- ${node.nodePath} (${formatBytes(node.size)})`).join("\n");
  }
  return output;
}

/**
 * Summarize a batch: counts per status, then one line per product
 */
export function formatBatchResult(result: DownloadAllResult): string {
  const counts = new Map<DownloadStatus, number>();
  for (const status of result.statuses.values()) {
    counts.set(status, (counts.get(status) ?? 0) + 1);
  }

  const lines: string[] = [];
  lines.push(`Processed ${result.statuses.size} products`);
  for (const [status, count] of counts) {
    lines.push(`- ${status}: ${count}`);
  }
  lines.push("");

  for (const [id, status] of result.statuses) {
    const info = result.productInfos.get(id);
    const label = info ? `${info.title} (${id})` : id;
    const error = result.exceptions.get(id);
    if (status === DownloadStatus.DOWNLOADED) {
      lines.push(`✓ ${label} → ${info?.path ?? "?"}`);
    } else if (error) {
      lines.push(`✗ ${label}: ${formatError(error)}`);
    } else {
      lines.push(`… ${label}: ${status}`);
    }
  }
  return lines.join("\n");
}

export function formatQuicklookResult(result: QuicklookResult): string {
  const lines = [`Downloaded ${result.downloaded.size} quicklooks`];
  for (const info of result.downloaded.values()) {
    lines.push(`- ${info.title}: ${info.path}`);
  }
  if (result.failed.size > 0) {
    lines.push("");
    lines.push(`Failed: ${result.failed.size}`);
    for (const [id, error] of result.failed) {
      lines.push(`- ${id}: ${error}`);
    }
  }
  return lines.join("\n");
}

/**
 * JSON-friendly view of a batch result
 */
export function batchResultToJson(result: DownloadAllResult) {
  return {
    statuses: Object.fromEntries(result.statuses),
    exceptions: Object.fromEntries(
      [...result.exceptions].map(([id, error]) => [id, formatError(error)])
    ),
    products: Object.fromEntries(
      [...result.productInfos].map(([id, info]) => [
        id,
        {
          title: info.title,
          online: info.online,
          path: info.path ?? null,
          downloadedBytes: info.downloadedBytes ?? 0,
        },
      ])
    ),
  };
}
