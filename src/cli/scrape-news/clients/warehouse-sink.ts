import type {
  Warehouse,
  WarehouseField,
  WarehouseRow,
} from "~clients/bigquery-warehouse";
import type { Logger } from "~clients/logger";

import type { ArticleRecord, Batch } from "../types/schemas";
import type { ArticleSink } from "./article-sink";
import { PersistenceFailure } from "./article-sink";

export const ARTICLE_TABLE_SCHEMA: readonly WarehouseField[] = [
  { name: "title", type: "STRING", mode: "REQUIRED" },
  { name: "kicker", type: "STRING", mode: "NULLABLE" },
  { name: "image_url", type: "STRING", mode: "NULLABLE" },
  { name: "link_url", type: "STRING", mode: "REQUIRED" },
  { name: "word_count", type: "INTEGER", mode: "NULLABLE" },
  { name: "char_count", type: "INTEGER", mode: "NULLABLE" },
  { name: "capitalized_words", type: "STRING", mode: "REPEATED" },
  { name: "ingestion_timestamp", type: "TIMESTAMP", mode: "REQUIRED" },
];

export type WarehouseSinkConfig = {
  logger: Logger;
  warehouse: Warehouse;
  datasetId: string;
  tableId: string;
};

export const toWarehouseRow = (record: ArticleRecord): WarehouseRow => ({
  title: record.title,
  kicker: record.kicker,
  image_url: record.imageUrl,
  link_url: record.linkUrl,
  word_count: record.metrics.wordCount,
  char_count: record.metrics.charCount,
  capitalized_words: [...record.metrics.capitalizedWords],
  ingestion_timestamp: record.ingestedAt,
});

export class WarehouseSink implements ArticleSink {
  readonly name = "warehouse";
  private logger: Logger;
  private warehouse: Warehouse;
  private datasetId: string;
  private tableId: string;

  constructor(config: WarehouseSinkConfig) {
    this.logger = config.logger;
    this.warehouse = config.warehouse;
    this.datasetId = config.datasetId;
    this.tableId = config.tableId;
  }

  async write(batch: Batch): Promise<void> {
    const target = `${this.datasetId}.${this.tableId}`;

    await this.warehouse.ensureTable(
      this.datasetId,
      this.tableId,
      ARTICLE_TABLE_SCHEMA
    );
    const { insertedCount, failedCount } = await this.warehouse.insertRows(
      this.datasetId,
      this.tableId,
      batch.map(toWarehouseRow)
    );

    if (failedCount > 0) {
      throw new PersistenceFailure(
        this.name,
        `${failedCount} of ${batch.length} rows rejected by ${target}`
      );
    }

    this.logger.info(`Inserted ${insertedCount} rows into ${target}`);
  }
}
