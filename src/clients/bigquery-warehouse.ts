import { BigQuery } from "@google-cloud/bigquery";

import type { Logger } from "./logger";

export type WarehouseFieldType = "STRING" | "INTEGER" | "TIMESTAMP";
export type WarehouseFieldMode = "REQUIRED" | "NULLABLE" | "REPEATED";

export type WarehouseField = {
  name: string;
  type: WarehouseFieldType;
  mode: WarehouseFieldMode;
};

export type WarehouseRow = Record<string, unknown>;

export type InsertResult = {
  insertedCount: number;
  failedCount: number;
};

/**
 * Append-only destination table store.
 */
export type Warehouse = {
  ensureTable(
    datasetId: string,
    tableId: string,
    schema: readonly WarehouseField[]
  ): Promise<void>;
  insertRows(
    datasetId: string,
    tableId: string,
    rows: readonly WarehouseRow[]
  ): Promise<InsertResult>;
};

export type BigQueryWarehouseConfig = {
  logger: Logger;
  projectId?: string; // Falls back to the client's own discovery (GOOGLE_CLOUD_PROJECT, credentials file)
  location?: string;
};

// Shape of the error the client throws when only some rows were rejected
type PartialFailure = Error & { errors: unknown[] };

const isPartialFailure = (error: unknown): error is PartialFailure =>
  error instanceof Error &&
  error.name === "PartialFailureError" &&
  "errors" in error &&
  Array.isArray(error.errors);

/**
 * BigQuery-backed warehouse. Datasets and tables are created on first use;
 * rows are streamed with insertAll.
 */
export class BigQueryWarehouse implements Warehouse {
  private logger: Logger;
  private client: BigQuery;
  private location: string | undefined;

  constructor(config: BigQueryWarehouseConfig) {
    this.logger = config.logger;
    this.location = config.location;
    this.client = new BigQuery(
      config.projectId ? { projectId: config.projectId } : {}
    );
  }

  private dataset(datasetId: string) {
    return this.client.dataset(
      datasetId,
      this.location ? { location: this.location } : {}
    );
  }

  async ensureTable(
    datasetId: string,
    tableId: string,
    schema: readonly WarehouseField[]
  ): Promise<void> {
    const [dataset] = await this.dataset(datasetId).get({ autoCreate: true });

    const table = dataset.table(tableId);
    const [exists] = await table.exists();
    if (exists) {
      this.logger.debug(`Table ${datasetId}.${tableId} exists`);
      return;
    }

    await dataset.createTable(tableId, { schema: { fields: [...schema] } });
    this.logger.info(`Created table ${datasetId}.${tableId}`);
  }

  async insertRows(
    datasetId: string,
    tableId: string,
    rows: readonly WarehouseRow[]
  ): Promise<InsertResult> {
    if (rows.length === 0) {
      return { insertedCount: 0, failedCount: 0 };
    }

    const table = this.dataset(datasetId).table(tableId);
    try {
      await table.insert([...rows]);
      return { insertedCount: rows.length, failedCount: 0 };
    } catch (error) {
      if (!isPartialFailure(error)) {
        throw error;
      }
      const failedCount = Math.min(error.errors.length, rows.length);
      this.logger.warn(`Rejected ${failedCount} rows`, {
        table: `${datasetId}.${tableId}`,
        errors: error.errors,
      });
      return { insertedCount: rows.length - failedCount, failedCount };
    }
  }
}
