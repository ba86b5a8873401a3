import type { Logger } from "~clients/logger";
import type {
  PageFetcher,
  PageSnapshot,
  WaitPolicy,
} from "~clients/page-snapshot";

import type {
  Batch,
  RunSummary,
  SelectorResolution,
  SinkOutcome,
} from "../types/schemas";
import { enrichArticle } from "../utils/title-metrics";
import type { ArticleExtractor, ExtractionResult } from "./article-extractor";
import type { ArticleSink, SinkContext } from "./article-sink";
import type { SelectorResolver } from "./selector-resolver";

export type ScrapePipelineConfig = {
  logger: Logger;
  fetcher: PageFetcher;
  resolver: SelectorResolver;
  extractor: ArticleExtractor;
  sinks: readonly ArticleSink[];
  url: string;
  maxArticles: number;
  waitPolicy?: WaitPolicy;
  now?: () => Date;
};

export type RunOptions = {
  signal?: AbortSignal;
};

export type RunResult = {
  summary: RunSummary;
  batch: Batch;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * One scrape run: fetch, resolve selectors, extract, enrich, emit.
 * Stages run strictly in sequence; the fetcher is released on every exit
 * path.
 */
export class ScrapePipeline {
  private logger: Logger;
  private fetcher: PageFetcher;
  private resolver: SelectorResolver;
  private extractor: ArticleExtractor;
  private sinks: readonly ArticleSink[];
  private url: string;
  private maxArticles: number;
  private waitPolicy: WaitPolicy | undefined;
  private now: () => Date;

  constructor(config: ScrapePipelineConfig) {
    this.logger = config.logger;
    this.fetcher = config.fetcher;
    this.resolver = config.resolver;
    this.extractor = config.extractor;
    this.sinks = config.sinks;
    this.url = config.url;
    this.maxArticles = config.maxArticles;
    this.waitPolicy = config.waitPolicy;
    this.now = config.now ?? (() => new Date());
  }

  async run({ signal }: RunOptions = {}): Promise<RunResult> {
    let resolution: SelectorResolution | null = null;
    let extraction: ExtractionResult | null = null;

    const cancelled = (): RunResult => {
      this.logger.warn("Run cancelled before emitting");
      return {
        summary: {
          status: "cancelled",
          attempted: extraction?.attempted ?? 0,
          extracted: extraction?.articles.length ?? 0,
          dropped: extraction?.dropped ?? 0,
          selectorSource: resolution?.source ?? null,
          sinks: [],
        },
        batch: [],
      };
    };

    try {
      if (signal?.aborted) {
        return cancelled();
      }

      // 1. Fetch
      let snapshot: PageSnapshot;
      try {
        this.logger.info("Fetching page", {
          url: this.url,
          fetcher: this.fetcher.name,
        });
        snapshot = await this.fetcher.fetchPage({
          url: this.url,
          waitPolicy: this.waitPolicy,
        });
      } catch (error) {
        this.logger.error("Page fetch failed", { error: errorMessage(error) });
        return {
          summary: {
            status: "failed",
            attempted: 0,
            extracted: 0,
            dropped: 0,
            selectorSource: null,
            sinks: [],
            error: errorMessage(error),
          },
          batch: [],
        };
      }
      if (signal?.aborted) {
        return cancelled();
      }

      // 2. Resolve selectors
      resolution = await this.resolver.resolve({
        markupSample: snapshot.markupSample,
      });
      if (signal?.aborted) {
        return cancelled();
      }

      // 3. Extract
      extraction = this.extractor.extract({
        html: snapshot.html,
        baseUrl: snapshot.baseUrl,
        spec: resolution.spec,
        maxArticles: this.maxArticles,
      });
      this.logger.info(
        `Extracted ${extraction.articles.length} of ${extraction.containersFound} entries`,
        { source: resolution.source, dropped: extraction.dropped }
      );

      if (
        extraction.articles.length === 0 &&
        resolution.source === "ai_assisted" &&
        resolution.fromCache
      ) {
        this.logger.warn("Cached selectors matched no articles");
        await this.resolver.invalidateCached({
          markupSample: snapshot.markupSample,
        });
      }

      // 4. Enrich
      const ingestedAt = this.now().toISOString();
      const batch: Batch = Object.freeze(
        extraction.articles.map((article) => enrichArticle(article, ingestedAt))
      );
      if (signal?.aborted) {
        return cancelled();
      }

      // 5. Emit
      const sinks =
        batch.length === 0
          ? []
          : await this.emit(batch, {
              url: snapshot.baseUrl,
              resolution,
              ingestedAt,
            });
      if (batch.length === 0) {
        this.logger.warn("No articles extracted; nothing to emit");
      }

      return {
        summary: {
          status: "succeeded",
          attempted: extraction.attempted,
          extracted: batch.length,
          dropped: extraction.dropped,
          selectorSource: resolution.source,
          sinks,
        },
        batch,
      };
    } finally {
      await this.close();
    }
  }

  /**
   * Hand the batch to every sink in order. A failing sink is recorded and
   * the remaining sinks still run.
   */
  private async emit(
    batch: Batch,
    context: SinkContext
  ): Promise<SinkOutcome[]> {
    const outcomes: SinkOutcome[] = [];

    for (const sink of this.sinks) {
      try {
        await sink.write(batch, context);
        outcomes.push({ name: sink.name, ok: true });
      } catch (error) {
        this.logger.error(`Sink ${sink.name} failed`, {
          error: errorMessage(error),
        });
        outcomes.push({ name: sink.name, ok: false, error: errorMessage(error) });
      }
    }

    return outcomes;
  }

  async close(): Promise<void> {
    try {
      await this.fetcher.close();
    } catch (error) {
      this.logger.warn("Failed to release page fetcher", { error });
    }
  }
}
