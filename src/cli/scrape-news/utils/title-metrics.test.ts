import { describe, expect, it } from "vitest";

import type { ExtractedArticle } from "../types/schemas";
import {
  computeTitleMetrics,
  countCharacters,
  countWords,
  enrichArticle,
  findCapitalizedWords,
} from "./title-metrics";

describe("countWords", () => {
  it("counts whitespace-delimited tokens", () => {
    expect(countWords("Breaking: Market Falls Sharply")).toBe(4);
  });

  it("treats runs of mixed whitespace as one separator", () => {
    expect(countWords("  multiple   spaces\tand\nnewlines ")).toBe(4);
  });

  it("returns 0 for an empty title", () => {
    expect(countWords("")).toBe(0);
  });
});

describe("countCharacters", () => {
  it("counts the title length", () => {
    expect(countCharacters("Breaking: Market Falls Sharply")).toBe(30);
  });

  it("counts an astral character once", () => {
    expect(countCharacters("Big 🎰 Win")).toBe(9);
  });

  it("counts a combining mark as its own position", () => {
    expect(countCharacters("Cafe\u0301")).toBe(5);
  });
});

describe("findCapitalizedWords", () => {
  it("keeps punctuation attached to the token", () => {
    expect(findCapitalizedWords("Breaking: Market Falls Sharply")).toEqual([
      "Breaking:",
      "Market",
      "Falls",
      "Sharply",
    ]);
  });

  it("preserves order and duplicates", () => {
    expect(findCapitalizedWords("New York sets New Rules")).toEqual([
      "New",
      "York",
      "New",
      "Rules",
    ]);
  });

  it("skips tokens starting with lowercase, digits or punctuation", () => {
    expect(
      findCapitalizedWords('iPhone Sales Rise 5% in Q3 "Quoted" Title')
    ).toEqual(["Sales", "Rise", "Q3", "Title"]);
  });

  it("recognises non-ASCII uppercase letters", () => {
    expect(findCapitalizedWords("Élan vital de l'Été")).toEqual(["Élan"]);
  });
});

describe("computeTitleMetrics", () => {
  it("is idempotent", () => {
    const title = "Rep. Titus Revives Push to Eliminate Sports Betting Tax";
    const first = computeTitleMetrics(title);
    const second = computeTitleMetrics(title);

    expect(second).toEqual(first);
    expect(first).toEqual({
      wordCount: 9,
      charCount: 55,
      capitalizedWords: [
        "Rep.",
        "Titus",
        "Revives",
        "Push",
        "Eliminate",
        "Sports",
        "Betting",
        "Tax",
      ],
    });
  });
});

describe("enrichArticle", () => {
  const article: ExtractedArticle = {
    title: "Casino Revenue Climbs",
    kicker: "MARKETS",
    imageUrl: "https://example.com/img/x.jpg",
    linkUrl: "https://example.com/news/1",
  };

  it("attaches metrics and the ingestion timestamp", () => {
    const record = enrichArticle(article, "2026-01-01T00:00:00.000Z");

    expect(record).toEqual({
      ...article,
      metrics: {
        wordCount: 3,
        charCount: 21,
        capitalizedWords: ["Casino", "Revenue", "Climbs"],
      },
      ingestedAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("returns a frozen record", () => {
    const record = enrichArticle(article, "2026-01-01T00:00:00.000Z");

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.metrics)).toBe(true);
    expect(Object.isFrozen(record.metrics.capitalizedWords)).toBe(true);
  });
});
