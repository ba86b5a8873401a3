#!/usr/bin/env tsx
// npm run scrape:news -- [--url=<index page>] [--maxArticles=10] [--ai]

// Scrape one news index page into articles with title metrics and write them
// to tmp/scrape-news/[url-slug]/ and, when a project is configured, BigQuery.

import "dotenv/config";

import { BigQueryWarehouse } from "~clients/bigquery-warehouse";
import { HttpPageFetcher } from "~clients/http-page-fetcher";
import { Logger } from "~clients/logger";
import type { PageFetcher } from "~clients/page-snapshot";
import { PlaywrightPageFetcher } from "~clients/playwright-page-fetcher";
import { parseArgs } from "~utils/parse-args";

import { ArticleExtractor } from "./clients/article-extractor";
import type { ArticleSink } from "./clients/article-sink";
import { FileBatchWriter } from "./clients/file-batch-writer";
import { ScrapePipeline } from "./clients/scrape-pipeline";
import { SelectorCache } from "./clients/selector-cache";
import { OpenAiSelectorDiscovery } from "./clients/selector-discovery";
import { SelectorResolver } from "./clients/selector-resolver";
import { WarehouseSink } from "./clients/warehouse-sink";
import { CliArgsSchema } from "./types/schemas";
import {
  envFallbacks,
  resolveOutputDir,
  resolveSelectorCachePath,
  selectorCacheTtlMs,
} from "./utils/run-config";

const logger = new Logger({ level: "info", useColors: true });
const controller = new AbortController();
const onInterrupt = () => {
  logger.warn("Interrupted, cancelling run...");
  controller.abort();
};
let pipeline: ScrapePipeline | null = null;

process.once("SIGINT", onInterrupt);

try {
  logger.info("Scrape News running...");

  // 1. Parse command-line arguments (flags, then environment, then defaults)
  const args = parseArgs({
    logger,
    schema: CliArgsSchema,
    fallbacks: envFallbacks(process.env),
  });
  logger.setLevel(args.verbose ? "debug" : args.logLevel);

  const cwd = process.cwd();
  const outputDir = resolveOutputDir({ url: args.url, out: args.out, cwd });
  logger.info("Output directory", { outputDir });

  // 2. Wire collaborators
  const fetcher: PageFetcher =
    args.fetcher === "http"
      ? new HttpPageFetcher({
          logger: logger.child("fetch"),
          defaultTimeoutMs: args.pageTimeoutMs,
        })
      : new PlaywrightPageFetcher({
          logger: logger.child("fetch"),
          defaultTimeoutMs: args.pageTimeoutMs,
        });

  const ttlMs = selectorCacheTtlMs(args.selectorCacheTtlHours);
  const resolver = new SelectorResolver({
    logger: logger.child("selectors"),
    aiEnabled: args.ai,
    modelId: args.model,
    apiTimeoutMs: args.aiTimeoutMs,
    discovery: args.ai
      ? new OpenAiSelectorDiscovery({ logger: logger.child("selectors") })
      : undefined,
    cache:
      args.ai && ttlMs !== null
        ? new SelectorCache({
            logger: logger.child("selectors"),
            filePath: resolveSelectorCachePath(cwd),
            ttlMs,
          })
        : undefined,
  });

  const sinks: ArticleSink[] = [
    new FileBatchWriter({ logger: logger.child("files"), outputDir }),
  ];
  if (args.project) {
    sinks.push(
      new WarehouseSink({
        logger: logger.child("warehouse"),
        warehouse: new BigQueryWarehouse({
          logger: logger.child("warehouse"),
          projectId: args.project,
        }),
        datasetId: args.dataset,
        tableId: args.table,
      })
    );
  } else {
    logger.info("No BigQuery project configured; skipping warehouse upload");
  }

  // 3. Run pipeline
  pipeline = new ScrapePipeline({
    logger: logger.child("pipeline"),
    fetcher,
    resolver,
    extractor: new ArticleExtractor({ logger: logger.child("extract") }),
    sinks,
    url: args.url,
    maxArticles: args.maxArticles,
    waitPolicy: { renderWaitMs: args.renderWaitMs },
  });

  const { summary, batch } = await pipeline.run({ signal: controller.signal });

  // 4. Report
  for (const [index, record] of batch.entries()) {
    logger.info(`${index + 1}. ${record.title}`, {
      wordCount: record.metrics.wordCount,
      charCount: record.metrics.charCount,
      capitalizedWords: record.metrics.capitalizedWords,
    });
  }

  logger.info("Run summary", summary);

  if (summary.status !== "succeeded") {
    process.exitCode = 1;
  }
} catch (error) {
  logger.error("Fatal error", { error });
  process.exitCode = 1;
} finally {
  process.off("SIGINT", onInterrupt);
  if (pipeline) {
    try {
      await pipeline.close();
    } catch (closeError) {
      logger.error("Failed to close pipeline", { error: closeError });
      process.exitCode = process.exitCode ?? 1;
    }
  }
}
