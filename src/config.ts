/**
 * Connection and downloader settings, validated with zod
 */
import { z } from "zod";

import type { NodeFilter } from "./node-filters.js";

export const DEFAULT_API_URL = "https://apihub.copernicus.eu/apihub/";

export const HubConfigSchema = z.object({
  apiUrl: z
    .string()
    .url()
    .transform((url) => (url.endsWith("/") ? url : `${url}/`)),
  user: z.string().min(1, "User name is required"),
  password: z.string().min(1, "Password is required"),
  timeoutMs: z.number().int().positive().optional(),
});

export type HubConfig = z.infer<typeof HubConfigSchema>;

/**
 * Read hub credentials from the environment (DHUS_URL, DHUS_USER, DHUS_PASSWORD, DHUS_TIMEOUT_MS)
 */
export function loadHubConfig(env: NodeJS.ProcessEnv = process.env): HubConfig {
  const timeout = env.DHUS_TIMEOUT_MS?.trim();
  const parsed = HubConfigSchema.safeParse({
    apiUrl: env.DHUS_URL?.trim() || DEFAULT_API_URL,
    user: env.DHUS_USER ?? "",
    password: env.DHUS_PASSWORD ?? "",
    timeoutMs: timeout ? Number(timeout) : undefined,
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid hub configuration: ${details}`);
  }
  return parsed.data;
}

export const DownloaderSettingsSchema = z.object({
  directory: z.string().min(1).default("."),
  verifyChecksum: z.boolean().default(true),
  failFast: z.boolean().default(false),
  maxAttempts: z.number().int().positive().default(10),
  nConcurrentDl: z.number().int().positive().default(2),
  nConcurrentTrigger: z.number().int().positive().default(1),
  ltaRetryDelayMs: z.number().int().nonnegative().default(60_000),
  dlRetryDelayMs: z.number().int().nonnegative().default(10_000),
  ltaTimeoutMs: z.number().int().positive().optional(),
});

export type DownloaderSettingsInput = z.input<typeof DownloaderSettingsSchema>;

/**
 * Immutable settings for one download call. A node filter switches downloads from
 * whole archives to the selected files of each product.
 */
export type DownloaderSettings = Readonly<
  z.output<typeof DownloaderSettingsSchema> & { nodeFilter?: NodeFilter }
>;

export interface DownloaderOverrides extends DownloaderSettingsInput {
  nodeFilter?: NodeFilter | null;
}

/**
 * Derive the settings for one call from base settings plus explicit overrides.
 * `nodeFilter: null` removes a filter set on the base.
 */
export function resolveDownloaderSettings(
  base: DownloaderSettingsInput & { nodeFilter?: NodeFilter },
  overrides: DownloaderOverrides = {}
): DownloaderSettings {
  const { nodeFilter: overrideFilter, ...rest } = overrides;
  const { nodeFilter: baseFilter, ...baseRest } = base;
  const merged = DownloaderSettingsSchema.parse({
    ...withoutUndefined(baseRest),
    ...withoutUndefined(rest),
  });
  const nodeFilter = overrideFilter === null ? undefined : (overrideFilter ?? baseFilter);
  return Object.freeze({ ...merged, nodeFilter });
}

function withoutUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
