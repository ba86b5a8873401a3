import { z } from "zod";

import {
  DEFAULT_AI_TIMEOUT_MS,
  DEFAULT_BIGQUERY_DATASET_ID,
  DEFAULT_BIGQUERY_TABLE_ID,
  DEFAULT_MAX_ARTICLES,
  DEFAULT_MODEL_ID,
  DEFAULT_PAGE_TIMEOUT_MS,
  DEFAULT_RENDER_WAIT_MS,
  DEFAULT_TARGET_URL,
} from "../constants";

// ============================================
// CLI Arguments
// ============================================

// minimist yields real booleans for bare flags and strings for `--flag=false`
// or environment values; both spellings are accepted.
const BooleanFlag = z.union([z.boolean(), z.stringbool()]);

export const CliArgsSchema = z.object({
  url: z.url().default(DEFAULT_TARGET_URL),
  maxArticles: z.coerce
    .number()
    .int()
    .positive("maxArticles must be a positive integer")
    .default(DEFAULT_MAX_ARTICLES),
  ai: BooleanFlag.default(false),
  model: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  renderWaitMs: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_RENDER_WAIT_MS),
  pageTimeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_PAGE_TIMEOUT_MS),
  aiTimeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_AI_TIMEOUT_MS),
  fetcher: z.enum(["playwright", "http"]).default("playwright"),
  out: z.string().trim().min(1).optional(),
  selectorCacheTtlHours: z.coerce.number().int().nonnegative().default(0),
  dataset: z.string().trim().min(1).default(DEFAULT_BIGQUERY_DATASET_ID),
  table: z.string().trim().min(1).default(DEFAULT_BIGQUERY_TABLE_ID),
  project: z.string().trim().min(1).optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  verbose: BooleanFlag.default(false),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

// ============================================
// Selectors
// ============================================

export const SELECTOR_FIELDS = [
  "articleContainer",
  "title",
  "kicker",
  "image",
  "link",
] as const;

export type SelectorField = (typeof SELECTOR_FIELDS)[number];

const SelectorString = z.string().trim().min(1);

export const SelectorSpecSchema = z.strictObject({
  articleContainer: SelectorString,
  title: SelectorString,
  kicker: SelectorString,
  image: SelectorString,
  link: SelectorString,
});

export type SelectorSpec = z.infer<typeof SelectorSpecSchema>;

// Shape the discovery model is asked to return. Parsed strictly: unknown keys
// are rejected rather than ignored.
export const SelectorCandidateSchema = SelectorSpecSchema.extend({
  confidence: z.number().min(0).max(1).nullable(),
}).strict();

export type SelectorCandidate = z.infer<typeof SelectorCandidateSchema>;

export type SelectorSource = "static" | "ai_assisted";

export type SelectorResolution =
  | { source: "static"; spec: SelectorSpec }
  | {
      source: "ai_assisted";
      spec: SelectorSpec;
      confidence?: number;
      fromCache: boolean;
    };

// ============================================
// Articles
// ============================================

const HttpUrl = z
  .url({ protocol: /^https?$/ })
  .describe("absolute http(s) URL");

export const ExtractedArticleSchema = z.object({
  title: z.string().trim().min(1),
  kicker: z.string(),
  imageUrl: z.union([HttpUrl, z.literal("")]),
  linkUrl: HttpUrl,
});

export type ExtractedArticle = z.infer<typeof ExtractedArticleSchema>;

export type ArticleMetrics = {
  readonly wordCount: number;
  readonly charCount: number;
  readonly capitalizedWords: readonly string[];
};

export type ArticleRecord = Readonly<ExtractedArticle> & {
  readonly metrics: ArticleMetrics;
  readonly ingestedAt: string;
};

export type Batch = readonly ArticleRecord[];

// ============================================
// Run summary
// ============================================

export type RunStatus = "succeeded" | "failed" | "cancelled";

export type SinkOutcome = {
  name: string;
  ok: boolean;
  error?: string;
};

export type RunSummary = {
  status: RunStatus;
  attempted: number;
  extracted: number;
  dropped: number;
  selectorSource: SelectorSource | null;
  sinks: SinkOutcome[];
  error?: string;
};
