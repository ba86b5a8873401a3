import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Logger } from "~clients/logger";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_SELECTOR_SPEC } from "../constants";
import type { ArticleRecord } from "../types/schemas";
import { enrichArticle } from "../utils/title-metrics";
import type { SinkContext } from "./article-sink";
import { PersistenceFailure } from "./article-sink";
import { FileBatchWriter } from "./file-batch-writer";

const INGESTED_AT = "2026-10-19T08:00:00.000Z";

const CONTEXT: SinkContext = {
  url: "https://example.com/news/",
  resolution: { source: "static", spec: DEFAULT_SELECTOR_SPEC },
  ingestedAt: INGESTED_AT,
};

const BATCH: ArticleRecord[] = [
  enrichArticle(
    {
      title: 'Casino "Royale" Reopens, Again',
      kicker: "Venues",
      imageUrl: "https://example.com/img/royale.jpg",
      linkUrl: "https://example.com/royale",
    },
    INGESTED_AT
  ),
  enrichArticle(
    {
      title: "quiet week for operators",
      kicker: "",
      imageUrl: "",
      linkUrl: "https://example.com/quiet",
    },
    INGESTED_AT
  ),
];

describe("FileBatchWriter", () => {
  const logger = new Logger({ level: "error" });
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "file-batch-writer-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("writes the batch as JSON with nested metrics", async () => {
    const outputDir = path.join(tmpDir, "out");
    const writer = new FileBatchWriter({ logger, outputDir });

    await writer.write(BATCH, CONTEXT);

    const json: unknown = JSON.parse(
      await fs.readFile(path.join(outputDir, "articles.json"), "utf8")
    );
    expect(json).toEqual([
      {
        title: 'Casino "Royale" Reopens, Again',
        kicker: "Venues",
        imageUrl: "https://example.com/img/royale.jpg",
        linkUrl: "https://example.com/royale",
        metrics: {
          wordCount: 4,
          charCount: 30,
          capitalizedWords: ["Casino", "Reopens,", "Again"],
        },
        ingestedAt: INGESTED_AT,
      },
      {
        title: "quiet week for operators",
        kicker: "",
        imageUrl: "",
        linkUrl: "https://example.com/quiet",
        metrics: { wordCount: 4, charCount: 24, capitalizedWords: [] },
        ingestedAt: INGESTED_AT,
      },
    ]);
  });

  it("writes one quoted CSV row per article", async () => {
    const writer = new FileBatchWriter({ logger, outputDir: tmpDir });

    await writer.write(BATCH, CONTEXT);

    const csv = await fs.readFile(path.join(tmpDir, "articles.csv"), "utf8");
    expect(csv.split("\r\n")).toEqual([
      "title,kicker,image_url,link_url,word_count,char_count,capitalized_words,ingestion_timestamp",
      `"Casino ""Royale"" Reopens, Again",Venues,https://example.com/img/royale.jpg,https://example.com/royale,4,30,"Casino|Reopens,|Again",${INGESTED_AT}`,
      `quiet week for operators,,,https://example.com/quiet,4,24,,${INGESTED_AT}`,
      "",
    ]);
  });

  it("records the selector set next to the batch", async () => {
    const writer = new FileBatchWriter({ logger, outputDir: tmpDir });

    await writer.write(BATCH, {
      ...CONTEXT,
      resolution: {
        source: "ai_assisted",
        spec: DEFAULT_SELECTOR_SPEC,
        confidence: 0.8,
        fromCache: true,
      },
    });

    const selectors: unknown = JSON.parse(
      await fs.readFile(path.join(tmpDir, "selectors.json"), "utf8")
    );
    expect(selectors).toEqual({
      url: "https://example.com/news/",
      resolvedAt: INGESTED_AT,
      source: "ai_assisted",
      spec: DEFAULT_SELECTOR_SPEC,
      confidence: 0.8,
      fromCache: true,
    });
  });

  it("wraps write errors in a PersistenceFailure", async () => {
    const blocker = path.join(tmpDir, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const writer = new FileBatchWriter({
      logger,
      outputDir: path.join(blocker, "out"),
    });

    const result = writer.write(BATCH, CONTEXT);

    await expect(result).rejects.toBeInstanceOf(PersistenceFailure);
    await expect(result).rejects.toThrow(/^files: could not write to /);
  });
});
