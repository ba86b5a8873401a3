import path from "node:path";
import slug from "slug";

import { OUTPUT_BASE_DIR, SELECTOR_CACHE_FILENAME } from "../constants";
import type { CliArgs } from "../types/schemas";

const HOUR_MS = 60 * 60 * 1000;

// Environment variable consulted for each flag left off the command line
export const ENV_FALLBACKS = {
  url: "TARGET_URL",
  maxArticles: "MAX_ARTICLES",
  ai: "AI_SELECTORS",
  model: "AI_MODEL",
  renderWaitMs: "RENDER_WAIT_MS",
  pageTimeoutMs: "PAGE_TIMEOUT_MS",
  aiTimeoutMs: "AI_TIMEOUT_MS",
  fetcher: "PAGE_FETCHER",
  out: "OUTPUT_DIR",
  selectorCacheTtlHours: "SELECTOR_CACHE_TTL_HOURS",
  dataset: "BIGQUERY_DATASET_ID",
  table: "BIGQUERY_TABLE_ID",
  project: "GOOGLE_CLOUD_PROJECT",
  logLevel: "LOG_LEVEL",
} as const satisfies Partial<Record<keyof CliArgs, string>>;

export const envFallbacks = (
  env: NodeJS.ProcessEnv
): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(ENV_FALLBACKS).map(([flag, name]) => [flag, env[name]])
  );

/**
 * Output directory for a run: the explicit one, or a per-site directory
 * under tmp/scrape-news named after the target URL.
 */
export const resolveOutputDir = ({
  url,
  out,
  cwd,
}: {
  url: string;
  out?: string;
  cwd: string;
}): string => {
  if (out) {
    return path.resolve(cwd, out);
  }

  const urlWithoutProtocol = url
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "");
  return path.join(cwd, OUTPUT_BASE_DIR, slug(urlWithoutProtocol));
};

export const resolveSelectorCachePath = (cwd: string): string =>
  path.join(cwd, OUTPUT_BASE_DIR, SELECTOR_CACHE_FILENAME);

/**
 * TTL for cached selectors, or null when caching is off.
 */
export const selectorCacheTtlMs = (hours: number): number | null =>
  hours > 0 ? hours * HOUR_MS : null;
