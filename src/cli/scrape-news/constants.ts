import type { SelectorSpec } from "./types/schemas";

// Defaults for run configuration (overridable by flag or env)
export const DEFAULT_TARGET_URL = "https://www.yogonet.com/international/";
export const DEFAULT_MAX_ARTICLES = 10;
export const DEFAULT_MODEL_ID = "gpt-5-mini";
export const DEFAULT_RENDER_WAIT_MS = 5000;
export const DEFAULT_PAGE_TIMEOUT_MS = 30000;
export const DEFAULT_AI_TIMEOUT_MS = 30000;
export const DEFAULT_BIGQUERY_DATASET_ID = "news_index";
export const DEFAULT_BIGQUERY_TABLE_ID = "scraped_articles";

// Output location (relative to cwd)
export const OUTPUT_BASE_DIR = "tmp/scrape-news";
export const SELECTOR_CACHE_FILENAME = "selector-cache.json";

// Known-good selectors for the default target's listing markup
export const DEFAULT_SELECTOR_SPEC: SelectorSpec = Object.freeze({
  articleContainer: "div.slot.noticia",
  title: "h2.titulo a",
  kicker: "div.volanta",
  image: "div.imagen img",
  link: "h2.titulo a",
});

// Separator for capitalized words in the flat CSV output
export const CSV_LIST_SEPARATOR = "|";
