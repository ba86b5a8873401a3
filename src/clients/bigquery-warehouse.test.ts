import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BigQueryWarehouse } from "./bigquery-warehouse";
import type { WarehouseField } from "./bigquery-warehouse";
import { Logger } from "./logger";

const { bigQueryMock, datasetMock } = vi.hoisted(() => ({
  bigQueryMock: vi.fn(),
  datasetMock: vi.fn(),
}));

vi.mock("@google-cloud/bigquery", () => ({
  BigQuery: bigQueryMock,
}));

const SCHEMA: WarehouseField[] = [
  { name: "title", type: "STRING", mode: "REQUIRED" },
  { name: "word_count", type: "INTEGER", mode: "NULLABLE" },
];

class PartialFailureError extends Error {
  errors: unknown[];

  constructor(errors: unknown[]) {
    super("A failure occurred during this request.");
    this.name = "PartialFailureError";
    this.errors = errors;
  }
}

describe("BigQueryWarehouse", () => {
  const logger = new Logger({ level: "error" });
  let existsMock: ReturnType<typeof vi.fn>;
  let insertMock: ReturnType<typeof vi.fn>;
  let createTableMock: ReturnType<typeof vi.fn>;
  let getDatasetMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    existsMock = vi.fn().mockResolvedValue([false]);
    insertMock = vi.fn().mockResolvedValue([{}]);
    createTableMock = vi.fn().mockResolvedValue([{}, {}]);

    const table = { exists: existsMock, insert: insertMock };
    const dataset = {
      table: vi.fn().mockReturnValue(table),
      createTable: createTableMock,
    };
    getDatasetMock = vi.fn().mockResolvedValue([dataset, {}]);

    datasetMock.mockReturnValue({ ...dataset, get: getDatasetMock });
    bigQueryMock.mockImplementation(function MockBigQuery() {
      return { dataset: datasetMock };
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("passes the project id to the client", () => {
    new BigQueryWarehouse({ logger, projectId: "test-project" });

    expect(bigQueryMock).toHaveBeenCalledWith({ projectId: "test-project" });
  });

  describe("ensureTable", () => {
    it("creates the dataset and a missing table", async () => {
      const warehouse = new BigQueryWarehouse({ logger });

      await warehouse.ensureTable("news_index", "scraped_articles", SCHEMA);

      expect(datasetMock).toHaveBeenCalledWith("news_index", {});
      expect(getDatasetMock).toHaveBeenCalledWith({ autoCreate: true });
      expect(createTableMock).toHaveBeenCalledWith("scraped_articles", {
        schema: { fields: SCHEMA },
      });
    });

    it("leaves an existing table alone", async () => {
      existsMock.mockResolvedValue([true]);
      const warehouse = new BigQueryWarehouse({ logger, location: "EU" });

      await warehouse.ensureTable("news_index", "scraped_articles", SCHEMA);

      expect(datasetMock).toHaveBeenCalledWith("news_index", { location: "EU" });
      expect(createTableMock).not.toHaveBeenCalled();
    });
  });

  describe("insertRows", () => {
    const rows = [
      { title: "A", word_count: 1 },
      { title: "B", word_count: 1 },
      { title: "C", word_count: 1 },
    ];

    it("streams all rows", async () => {
      const warehouse = new BigQueryWarehouse({ logger });

      const result = await warehouse.insertRows("news_index", "scraped_articles", rows);

      expect(insertMock).toHaveBeenCalledWith(rows);
      expect(result).toEqual({ insertedCount: 3, failedCount: 0 });
    });

    it("skips the request for an empty batch", async () => {
      const warehouse = new BigQueryWarehouse({ logger });

      const result = await warehouse.insertRows("news_index", "scraped_articles", []);

      expect(insertMock).not.toHaveBeenCalled();
      expect(result).toEqual({ insertedCount: 0, failedCount: 0 });
    });

    it("reports rows rejected by a partial failure", async () => {
      insertMock.mockRejectedValue(
        new PartialFailureError([
          { row: rows[1], errors: [{ reason: "invalid", message: "bad value" }] },
        ])
      );
      const warehouse = new BigQueryWarehouse({ logger });

      const result = await warehouse.insertRows("news_index", "scraped_articles", rows);

      expect(result).toEqual({ insertedCount: 2, failedCount: 1 });
    });

    it("rethrows other errors", async () => {
      insertMock.mockRejectedValue(new Error("Not found: Table news_index.scraped_articles"));
      const warehouse = new BigQueryWarehouse({ logger });

      await expect(
        warehouse.insertRows("news_index", "scraped_articles", rows)
      ).rejects.toThrow("Not found: Table news_index.scraped_articles");
    });
  });
});
