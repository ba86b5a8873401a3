import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "~clients/logger";

import { CSV_LIST_SEPARATOR } from "../constants";
import type { ArticleRecord, Batch } from "../types/schemas";
import { formatCsv } from "../utils/csv";
import type { CsvValue } from "../utils/csv";
import type { ArticleSink, SinkContext } from "./article-sink";
import { PersistenceFailure } from "./article-sink";

export const ARTICLES_JSON_FILENAME = "articles.json";
export const ARTICLES_CSV_FILENAME = "articles.csv";
export const SELECTORS_JSON_FILENAME = "selectors.json";

export const CSV_COLUMNS = [
  "title",
  "kicker",
  "image_url",
  "link_url",
  "word_count",
  "char_count",
  "capitalized_words",
  "ingestion_timestamp",
] as const;

export type FileBatchWriterConfig = {
  logger: Logger;
  outputDir: string;
};

const toCsvValues = (record: ArticleRecord): CsvValue[] => [
  record.title,
  record.kicker,
  record.imageUrl,
  record.linkUrl,
  record.metrics.wordCount,
  record.metrics.charCount,
  record.metrics.capitalizedWords.join(CSV_LIST_SEPARATOR),
  record.ingestedAt,
];

/**
 * Writes each run's batch to the output directory as JSON and CSV, next to
 * the selector set that produced it. Files are overwritten per run.
 */
export class FileBatchWriter implements ArticleSink {
  readonly name = "files";
  private logger: Logger;
  private outputDir: string;

  constructor(config: FileBatchWriterConfig) {
    this.logger = config.logger;
    this.outputDir = config.outputDir;
  }

  async write(batch: Batch, context: SinkContext): Promise<void> {
    const jsonPath = path.join(this.outputDir, ARTICLES_JSON_FILENAME);
    const csvPath = path.join(this.outputDir, ARTICLES_CSV_FILENAME);
    const selectorsPath = path.join(this.outputDir, SELECTORS_JSON_FILENAME);

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(jsonPath, JSON.stringify(batch, null, 2));
      await fs.writeFile(
        csvPath,
        formatCsv(CSV_COLUMNS, batch.map(toCsvValues))
      );
      await fs.writeFile(
        selectorsPath,
        JSON.stringify(
          {
            url: context.url,
            resolvedAt: context.ingestedAt,
            ...context.resolution,
          },
          null,
          2
        )
      );
    } catch (error) {
      throw new PersistenceFailure(
        this.name,
        `could not write to ${this.outputDir}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    }

    this.logger.info(`Wrote ${batch.length} articles to ${this.outputDir}`);
    this.logger.debug("Output files", { jsonPath, csvPath, selectorsPath });
  }
}
