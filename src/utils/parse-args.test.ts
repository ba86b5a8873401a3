import { Logger } from "~clients/logger";
import { parseArgs } from "~utils/parse-args";
import { describe, expect, it } from "vitest";

import { CliArgsSchema } from "../cli/scrape-news/types/schemas";

describe("parseArgs", () => {
  const logger = new Logger({
    level: "error",
    useColors: false,
    useTimestamps: false,
  });

  it("applies defaults when no flags are given", () => {
    const args = parseArgs({ logger, schema: CliArgsSchema, rawArgs: [] });

    expect(args.url).toBe("https://www.yogonet.com/international/");
    expect(args.maxArticles).toBe(10);
    expect(args.ai).toBe(false);
    expect(args.fetcher).toBe("playwright");
    expect(args.renderWaitMs).toBe(5000);
    expect(args.selectorCacheTtlHours).toBe(0);
    expect(args.project).toBeUndefined();
  });

  it("parses args after a standalone double-dash separator", () => {
    const args = parseArgs({
      logger,
      schema: CliArgsSchema,
      rawArgs: ["--", "--url=https://example.com/news", "--maxArticles=5"],
    });

    expect(args.url).toBe("https://example.com/news");
    expect(args.maxArticles).toBe(5);
  });

  it("parses boolean flags", () => {
    expect(
      parseArgs({ logger, schema: CliArgsSchema, rawArgs: ["--ai", "--verbose"] })
    ).toMatchObject({ ai: true, verbose: true });
    expect(
      parseArgs({ logger, schema: CliArgsSchema, rawArgs: ["--ai=false"] }).ai
    ).toBe(false);
  });

  it("uses fallbacks for absent flags only", () => {
    const args = parseArgs({
      logger,
      schema: CliArgsSchema,
      rawArgs: ["--maxArticles=3"],
      fallbacks: {
        maxArticles: "20",
        ai: "true",
        model: "gpt-4.1-mini",
        project: "",
        fetcher: undefined,
      },
    });

    expect(args.maxArticles).toBe(3);
    expect(args.ai).toBe(true);
    expect(args.model).toBe("gpt-4.1-mini");
    expect(args.project).toBeUndefined();
    expect(args.fetcher).toBe("playwright");
  });

  it("rejects a non-positive article cap", () => {
    expect(() =>
      parseArgs({ logger, schema: CliArgsSchema, rawArgs: ["--maxArticles=0"] })
    ).toThrow("maxArticles must be a positive integer");
    expect(() =>
      parseArgs({
        logger,
        schema: CliArgsSchema,
        rawArgs: [],
        fallbacks: { maxArticles: "-2" },
      })
    ).toThrow("maxArticles must be a positive integer");
  });

  it("throws on an invalid --fetcher value", () => {
    expect(() =>
      parseArgs({ logger, schema: CliArgsSchema, rawArgs: ["--fetcher=curl"] })
    ).toThrow();
  });
});
