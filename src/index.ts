#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from "@modelcontextprotocol/sdk/types.js";
import dotenv from "dotenv";
import { z } from "zod";

import { DownloaderOverrides, DownloaderSettingsInput, loadHubConfig } from "./config.js";
import { Downloader } from "./downloader.js";
import { formatError, LTATriggered } from "./errors.js";
import {
  batchResultToJson,
  formatBatchResult,
  formatDownloadedProduct,
  formatProductInfo,
  formatQuicklookResult,
} from "./formatters.js";
import { CatalogClient, HubClient } from "./hub-client.js";
import { createLogger, LogLevel } from "./logger.js";
import { buildNodeFilter, NodeFilter } from "./node-filters.js";
import { validateFilePath } from "./utils.js";

const SERVER_NAME = "sathub-mcp";
const SERVER_VERSION = "0.1.0";

const NODE_SELECTION_PROPERTIES = {
  nodes: {
    type: "boolean",
    description:
      "Download the product as a directory of its files (<title>.SAFE/...) instead of one archive. Implied by include, exclude and max_size.",
  },
  include: {
    type: "array",
    items: { type: "string" },
    description:
      "Glob patterns for files to download, matched case-insensitively against the path inside the product. Patterns without '/' match the file name, e.g. '*B04*.jp2'",
  },
  exclude: {
    type: "array",
    items: { type: "string" },
    description: "Glob patterns for files to skip, e.g. 'preview/*'",
  },
  max_size: {
    type: "number",
    description: "Skip files larger than this many bytes",
    minimum: 0,
  },
} as const;

// Tool: get_product_info - product metadata from the OData API
const GET_PRODUCT_INFO_TOOL: Tool = {
  name: "get_product_info",
  description:
    "Get a product's metadata from the data hub: title, size, checksums, sensing date and whether it is online or in the Long Term Archive (LTA).",
  inputSchema: {
    type: "object",
    properties: {
      product_id: { type: "string", description: "Product UUID" },
      full: {
        type: "boolean",
        description: "Also return the full attribute list",
        default: false,
      },
    },
    required: ["product_id"],
  },
};

const DOWNLOAD_PRODUCT_TOOL: Tool = {
  name: "download_product",
  description:
    "Download one product. Interrupted downloads resume from their .incomplete file and the result is verified against the server's checksum. If the product is in the Long Term Archive its retrieval is triggered instead; call again once it is online.",
  inputSchema: {
    type: "object",
    properties: {
      product_id: { type: "string", description: "Product UUID" },
      directory: {
        type: "string",
        description: "Output directory (default: current working directory)",
      },
      verify_checksum: {
        type: "boolean",
        description: "Verify the file checksum after the transfer",
        default: true,
      },
      ...NODE_SELECTION_PROPERTIES,
    },
    required: ["product_id"],
  },
};

// Tool: download_products - batch download with LTA retrieval and retries
const DOWNLOAD_PRODUCTS_TOOL: Tool = {
  name: "download_products",
  description:
    "Download several products concurrently. Offline products are retrieved from the Long Term Archive while online ones download; failed downloads are retried. Products already on disk are skipped.",
  inputSchema: {
    type: "object",
    properties: {
      product_ids: {
        type: "array",
        items: { type: "string" },
        minItems: 1,
        description: "Product UUIDs",
      },
      directory: {
        type: "string",
        description: "Output directory (default: current working directory)",
      },
      fail_fast: {
        type: "boolean",
        description: "Stop the whole batch at the first failed product",
        default: false,
      },
      max_attempts: {
        type: "number",
        description: "Download attempts per product (default: 10)",
        minimum: 1,
      },
      n_concurrent_dl: {
        type: "number",
        description: "Concurrent downloads (default: server quota, usually 2)",
        minimum: 1,
      },
      lta_timeout_seconds: {
        type: "number",
        description: "Give up on products that are not online after this many seconds",
        minimum: 1,
      },
      ...NODE_SELECTION_PROPERTIES,
    },
    required: ["product_ids"],
  },
};

const TRIGGER_OFFLINE_RETRIEVAL_TOOL: Tool = {
  name: "trigger_offline_retrieval",
  description:
    "Request retrieval of an offline product from the Long Term Archive without downloading it. Reports whether the product was already online.",
  inputSchema: {
    type: "object",
    properties: {
      product_id: { type: "string", description: "Product UUID" },
    },
    required: ["product_id"],
  },
};

const DOWNLOAD_QUICKLOOKS_TOOL: Tool = {
  name: "download_quicklooks",
  description: "Download the JPEG preview images of products as <title>.jpeg",
  inputSchema: {
    type: "object",
    properties: {
      product_ids: {
        type: "array",
        items: { type: "string" },
        minItems: 1,
        description: "Product UUIDs",
      },
      directory: {
        type: "string",
        description: "Output directory (default: current working directory)",
      },
    },
    required: ["product_ids"],
  },
};

const NodeSelectionArgs = {
  nodes: z.boolean().optional(),
  include: z.array(z.string().min(1)).optional(),
  exclude: z.array(z.string().min(1)).optional(),
  max_size: z.number().nonnegative().optional(),
};

const ProductIdArgs = z.object({ product_id: z.string().min(1) });

const ProductInfoArgs = ProductIdArgs.extend({ full: z.boolean().default(false) });

const DownloadProductArgs = ProductIdArgs.extend({
  directory: z.string().optional(),
  verify_checksum: z.boolean().optional(),
  ...NodeSelectionArgs,
});

const DownloadProductsArgs = z.object({
  product_ids: z.array(z.string().min(1)).min(1),
  directory: z.string().optional(),
  fail_fast: z.boolean().optional(),
  max_attempts: z.number().int().positive().optional(),
  n_concurrent_dl: z.number().int().positive().optional(),
  lta_timeout_seconds: z.number().positive().optional(),
  ...NodeSelectionArgs,
});

const DownloadQuicklooksArgs = z.object({
  product_ids: z.array(z.string().min(1)).min(1),
  directory: z.string().optional(),
});

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid arguments: ${details}`);
  }
  return parsed.data;
}

function nodeFilterFrom(args: {
  nodes?: boolean;
  include?: string[];
  exclude?: string[];
  max_size?: number;
}): NodeFilter | undefined {
  if (!args.nodes && !args.include && !args.exclude && args.max_size === undefined) {
    return undefined;
  }
  return buildNodeFilter({ include: args.include, exclude: args.exclude, maxSize: args.max_size });
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

function jsonBlock(metadata: unknown): { type: "text"; text: string } {
  return { type: "text", text: `JSON metadata:\n${JSON.stringify(metadata, null, 2)}` };
}

const NOTIFICATION_LEVEL: Record<LogLevel, "debug" | "info" | "warning" | "error"> = {
  debug: "debug",
  info: "info",
  warn: "warning",
  error: "error",
};

export interface ServerOptions {
  api: CatalogClient;
  settings?: DownloaderSettingsInput;
  /** Output directories must lie within one of these, when given */
  allowedDirs?: string[];
  /** Also write log lines to stderr (default true) */
  console?: boolean;
}

/**
 * Create the MCP server around one Downloader, so that the hub's connection
 * quotas hold across concurrent tool calls
 */
export function createServer(options: ServerOptions): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    }
  );

  function notifyProgress(message: string, level: LogLevel = "info") {
    // Nothing to notify before a client is connected
    if (!server.transport) return;
    server
      .notification({
        method: "notifications/message",
        params: { level: NOTIFICATION_LEVEL[level], logger: SERVER_NAME, data: message },
      })
      .catch((error: unknown) => {
        console.error(`Could not forward log message: ${formatError(error)}`);
      });
  }

  const logger = createLogger(SERVER_NAME, {
    console: options.console,
    sink: (level, line) => notifyProgress(line, level),
  });
  const downloader = new Downloader(options.api, { ...options.settings, logger });

  function checkDirectory(directory: string | undefined): string | undefined {
    if (directory !== undefined && !validateFilePath(directory, options.allowedDirs)) {
      throw new Error(`Invalid output directory: ${directory}`);
    }
    return directory;
  }

  // Handle tool listing
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        GET_PRODUCT_INFO_TOOL,
        DOWNLOAD_PRODUCT_TOOL,
        DOWNLOAD_PRODUCTS_TOOL,
        TRIGGER_OFFLINE_RETRIEVAL_TOOL,
        DOWNLOAD_QUICKLOOKS_TOOL,
      ],
    };
  });

  // Handle tool execution
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    if (request.params.name === "get_product_info") {
      try {
        const args = parseArgs(ProductInfoArgs, request.params.arguments);
        const info = await options.api.getProductOdata(args.product_id, { full: args.full });
        return {
          content: [{ type: "text", text: formatProductInfo(info) }, jsonBlock(info)],
        };
      } catch (error) {
        return errorResult(`Error getting product info: ${formatError(error)}`);
      }
    }

    if (request.params.name === "download_product") {
      try {
        const args = parseArgs(DownloadProductArgs, request.params.arguments);
        const overrides: DownloaderOverrides = {
          directory: checkDirectory(args.directory),
          verifyChecksum: args.verify_checksum,
          nodeFilter: nodeFilterFrom(args),
        };
        try {
          const info = await downloader.download(args.product_id, { overrides });
          return {
            content: [
              { type: "text", text: formatDownloadedProduct(info) },
              jsonBlock({
                id: info.id,
                title: info.title,
                path: info.path ?? null,
                downloadedBytes: info.downloadedBytes ?? 0,
                nodes: info.nodes ? Object.keys(info.nodes) : null,
              }),
            ],
          };
        } catch (error) {
          if (error instanceof LTATriggered) {
            return {
              content: [
                { type: "text", text: error.message },
                jsonBlock({ id: args.product_id, triggered: true }),
              ],
            };
          }
          throw error;
        }
      } catch (error) {
        return errorResult(`Error downloading product: ${formatError(error)}`);
      }
    }

    if (request.params.name === "download_products") {
      try {
        const args = parseArgs(DownloadProductsArgs, request.params.arguments);
        const overrides: DownloaderOverrides = {
          directory: checkDirectory(args.directory),
          failFast: args.fail_fast,
          maxAttempts: args.max_attempts,
          nConcurrentDl: args.n_concurrent_dl,
          ltaTimeoutMs:
            args.lta_timeout_seconds !== undefined
              ? Math.round(args.lta_timeout_seconds * 1000)
              : undefined,
          nodeFilter: nodeFilterFrom(args),
        };
        const result = await downloader.downloadAll(args.product_ids, { overrides });
        return {
          content: [
            { type: "text", text: formatBatchResult(result) },
            jsonBlock(batchResultToJson(result)),
          ],
        };
      } catch (error) {
        return errorResult(`Error downloading products: ${formatError(error)}`);
      }
    }

    if (request.params.name === "trigger_offline_retrieval") {
      try {
        const args = parseArgs(ProductIdArgs, request.params.arguments);
        const triggered = await downloader.triggerOfflineRetrieval(args.product_id);
        const text = triggered
          ? `Retrieval of ${args.product_id} from the Long Term Archive was accepted`
          : `${args.product_id} is already online`;
        return {
          content: [
            { type: "text", text },
            jsonBlock({ id: args.product_id, triggered }),
          ],
        };
      } catch (error) {
        return errorResult(`Error triggering retrieval: ${formatError(error)}`);
      }
    }

    if (request.params.name === "download_quicklooks") {
      try {
        const args = parseArgs(DownloadQuicklooksArgs, request.params.arguments);
        const result = await downloader.downloadAllQuicklooks(args.product_ids, {
          overrides: { directory: checkDirectory(args.directory) },
        });
        return {
          content: [
            { type: "text", text: formatQuicklookResult(result) },
            jsonBlock({
              downloaded: Object.fromEntries(
                [...result.downloaded].map(([id, info]) => [id, info.path])
              ),
              failed: Object.fromEntries(result.failed),
            }),
          ],
        };
      } catch (error) {
        return errorResult(`Error downloading quicklooks: ${formatError(error)}`);
      }
    }

    throw new Error(`Unknown tool: ${request.params.name}`);
  });

  return server;
}

let _server: Server | null = null;

/**
 * Start the MCP server with credentials from the environment (and .env)
 * @param transport - Optional transport instance, defaults to StdioServerTransport
 */
export async function startServer(transport?: Transport) {
  if (_server) return;
  dotenv.config();
  const config = loadHubConfig();
  const server = createServer({ api: new HubClient(config) });
  await server.connect(transport ?? new StdioServerTransport());
  _server = server;
  console.error(`Satellite data hub MCP Server running on stdio (${config.apiUrl})`);
}

/**
 * Stop the MCP server
 */
export async function stopServer() {
  if (!_server) return;
  const server = _server;
  _server = null;
  await server.close();
}

// If this module is executed directly (CLI), start the server and hook fatal errors
// - Local dev: src/index.ts, src/index.js, dist/src/index.js
// - npm/npx: symlink named "sathub-mcp"
const scriptPath = process.argv[1] ?? "";
const isDirectExecution =
  scriptPath.endsWith("src/index.ts") ||
  scriptPath.endsWith("src/index.js") ||
  scriptPath.endsWith("dist/src/index.js") ||
  scriptPath.endsWith(SERVER_NAME);

if (isDirectExecution) {
  startServer().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
