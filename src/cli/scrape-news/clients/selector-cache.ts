import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "~clients/logger";
import { buildStructureSkeleton } from "~utils/markup-sample";
import { z } from "zod";

import { SelectorSpecSchema } from "../types/schemas";
import type { SelectorSpec } from "../types/schemas";

const SelectorCacheEntrySchema = z.object({
  spec: SelectorSpecSchema,
  confidence: z.number().nullable(),
  modelId: z.string(),
  createdAt: z.iso.datetime(),
});

const SelectorCacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), SelectorCacheEntrySchema),
});

export type SelectorCacheEntry = z.infer<typeof SelectorCacheEntrySchema>;
type SelectorCacheFile = z.infer<typeof SelectorCacheFileSchema>;

export type SelectorCacheConfig = {
  logger: Logger;
  filePath: string;
  ttlMs: number;
  now?: () => Date;
};

const isErrnoCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

/**
 * AI-discovered selectors keyed by a fingerprint of the page's structural
 * sample. A changed layout yields a new fingerprint, so stale selectors are
 * never looked up; entries also expire after the TTL and can be invalidated
 * explicitly.
 */
export class SelectorCache {
  private logger: Logger;
  private filePath: string;
  private ttlMs: number;
  private now: () => Date;

  constructor(config: SelectorCacheConfig) {
    this.logger = config.logger;
    this.filePath = config.filePath;
    this.ttlMs = config.ttlMs;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Hashes the sample's tag and class outline only. The sample is cut at a
   * fixed length, so a large change in text volume can still shift how much
   * structure it covers.
   */
  static fingerprint(markupSample: string): string {
    return crypto
      .createHash("sha256")
      .update(buildStructureSkeleton(markupSample))
      .digest("hex");
  }

  private async load(): Promise<SelectorCacheFile> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return { version: 1, entries: {} };
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger.warn("Ignoring malformed selector cache", {
        filePath: this.filePath,
        error,
      });
      return { version: 1, entries: {} };
    }

    const parsed = SelectorCacheFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn("Ignoring unreadable selector cache", {
        filePath: this.filePath,
        issues: parsed.error.issues.length,
      });
      return { version: 1, entries: {} };
    }
    return parsed.data;
  }

  private async save(file: SelectorCacheFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(file, null, 2));
  }

  private isExpired(entry: SelectorCacheEntry): boolean {
    const age = this.now().getTime() - Date.parse(entry.createdAt);
    return age >= this.ttlMs;
  }

  /**
   * Look up a live entry. Expired entries are reported as misses.
   */
  async get(fingerprint: string): Promise<SelectorCacheEntry | null> {
    const file = await this.load();
    const entry = file.entries[fingerprint];
    if (!entry) {
      return null;
    }
    if (this.isExpired(entry)) {
      this.logger.debug("Selector cache entry expired", { fingerprint });
      return null;
    }
    return entry;
  }

  async set(
    fingerprint: string,
    {
      spec,
      confidence,
      modelId,
    }: { spec: SelectorSpec; confidence: number | null; modelId: string }
  ): Promise<void> {
    const file = await this.load();

    // Prune expired entries while rewriting the file
    const entries = Object.fromEntries(
      Object.entries(file.entries).filter(([, entry]) => !this.isExpired(entry))
    );
    entries[fingerprint] = {
      spec,
      confidence,
      modelId,
      createdAt: this.now().toISOString(),
    };

    await this.save({ version: 1, entries });
  }

  /**
   * Drop an entry so the next run resolves selectors afresh.
   * @returns Whether an entry was removed
   */
  async invalidate(fingerprint: string): Promise<boolean> {
    const file = await this.load();
    if (!(fingerprint in file.entries)) {
      return false;
    }

    const { [fingerprint]: _removed, ...entries } = file.entries;
    await this.save({ version: 1, entries });
    this.logger.info("Invalidated cached selectors", { fingerprint });
    return true;
  }
}
