import type { Logger } from "~clients/logger";
import { JSDOM } from "jsdom";

import { DEFAULT_SELECTOR_SPEC } from "../constants";
import {
  SELECTOR_FIELDS,
  SelectorCandidateSchema,
  SelectorSpecSchema,
} from "../types/schemas";
import type {
  SelectorCandidate,
  SelectorResolution,
  SelectorSpec,
} from "../types/schemas";
import { SelectorCache } from "./selector-cache";
import type { SelectorDiscovery } from "./selector-discovery";

export type SelectorResolverConfig = {
  logger: Logger;
  aiEnabled: boolean;
  modelId: string;
  apiTimeoutMs: number;
  discovery?: SelectorDiscovery;
  cache?: SelectorCache;
  defaultSpec?: SelectorSpec;
};

export type ResolveRequest = {
  markupSample: string;
};

/**
 * Raised inside the resolver when discovery yields nothing usable. Never
 * leaves resolve(): it is converted into the static fallback.
 */
export class SelectorResolutionFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SelectorResolutionFailure";
  }
}

const EMPTY_DOCUMENT = new JSDOM("<!DOCTYPE html><body></body>").window
  .document;

/**
 * Whether a string compiles as a CSS selector. Matching nothing is fine;
 * a syntax error is not.
 */
export const isValidCssSelector = (selector: string): boolean => {
  try {
    EMPTY_DOCUMENT.querySelector(selector);
    return true;
  } catch {
    return false;
  }
};

/**
 * Decides which selector set a run uses: the static default, or one
 * discovered by the AI collaborator when enabled and valid. Any discovery
 * failure degrades to the static set instead of failing the run.
 */
export class SelectorResolver {
  private logger: Logger;
  private aiEnabled: boolean;
  private modelId: string;
  private apiTimeoutMs: number;
  private discovery: SelectorDiscovery | null;
  private cache: SelectorCache | null;
  private defaultSpec: SelectorSpec;

  constructor(config: SelectorResolverConfig) {
    this.logger = config.logger;
    this.aiEnabled = config.aiEnabled;
    this.modelId = config.modelId;
    this.apiTimeoutMs = config.apiTimeoutMs;
    this.discovery = config.discovery ?? null;
    this.cache = config.cache ?? null;
    this.defaultSpec = SelectorResolver.checkDefaultSpec(
      config.defaultSpec ?? DEFAULT_SELECTOR_SPEC
    );

    if (this.aiEnabled && !this.discovery) {
      throw new Error("AI selector resolution requires a discovery client");
    }
  }

  private static checkDefaultSpec(spec: SelectorSpec): SelectorSpec {
    const parsed = SelectorSpecSchema.safeParse(spec);
    if (!parsed.success) {
      throw new Error(
        `Invalid default selector set: ${parsed.error.issues
          .map((issue) => issue.message)
          .join("; ")}`
      );
    }
    const invalid = SELECTOR_FIELDS.filter(
      (field) => !isValidCssSelector(parsed.data[field])
    );
    if (invalid.length > 0) {
      throw new Error(
        `Invalid default selector set: ${invalid.join(", ")} not valid CSS`
      );
    }
    return parsed.data;
  }

  private staticResolution(): SelectorResolution {
    const resolution: SelectorResolution = {
      source: "static",
      spec: Object.freeze({ ...this.defaultSpec }),
    };
    return Object.freeze(resolution);
  }

  private aiResolution({
    spec,
    confidence,
    fromCache,
  }: {
    spec: SelectorSpec;
    confidence: number | null;
    fromCache: boolean;
  }): SelectorResolution {
    const resolution: SelectorResolution = {
      source: "ai_assisted",
      spec,
      fromCache,
      ...(confidence === null ? {} : { confidence }),
    };
    return Object.freeze(resolution);
  }

  async resolve({ markupSample }: ResolveRequest): Promise<SelectorResolution> {
    if (!this.aiEnabled || !this.discovery) {
      this.logger.info("Using static selectors");
      return this.staticResolution();
    }

    const fingerprint = SelectorCache.fingerprint(markupSample);
    const cached = await this.readCache(fingerprint);
    if (cached) {
      return cached;
    }

    try {
      const candidate = await this.discoverWithTimeout(
        this.discovery,
        markupSample
      );
      const resolution = this.aiResolution({
        spec: this.toSelectorSpec(candidate),
        confidence: candidate.confidence,
        fromCache: false,
      });

      this.logger.info("Using AI-discovered selectors", {
        confidence: candidate.confidence,
      });
      await this.writeCache(fingerprint, candidate);
      return resolution;
    } catch (error) {
      this.logger.warn(
        "Selector discovery failed, falling back to static selectors",
        { reason: error instanceof Error ? error.message : String(error) }
      );
      return this.staticResolution();
    }
  }

  /**
   * Forget cached selectors for this page structure, e.g. after they found
   * no articles. Takes effect from the next run.
   */
  async invalidateCached({ markupSample }: ResolveRequest): Promise<void> {
    if (!this.cache) {
      return;
    }

    try {
      await this.cache.invalidate(SelectorCache.fingerprint(markupSample));
    } catch (error) {
      this.logger.warn("Failed to invalidate cached selectors", { error });
    }
  }

  /**
   * Call discovery bounded by apiTimeoutMs. On expiry the call's signal is
   * aborted and the race rejects without waiting for the collaborator.
   */
  private async discoverWithTimeout(
    discovery: SelectorDiscovery,
    markupSample: string
  ): Promise<SelectorCandidate> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new SelectorResolutionFailure(
          `Selector discovery timed out after ${this.apiTimeoutMs}ms`
        );
        controller.abort(error);
        reject(error);
      }, this.apiTimeoutMs);
    });

    try {
      const payload = await Promise.race([
        discovery.identifySelectors({
          markupSample,
          modelId: this.modelId,
          signal: controller.signal,
        }),
        timeout,
      ]);
      return this.parseCandidate(payload);
    } finally {
      clearTimeout(timer);
    }
  }

  private parseCandidate(payload: unknown): SelectorCandidate {
    const result = SelectorCandidateSchema.safeParse(payload);
    if (!result.success) {
      const fields = result.error.issues
        .map((issue) => issue.path.join(".") || issue.message)
        .join(", ");
      throw new SelectorResolutionFailure(
        `Discovery returned an invalid selector payload (${fields})`
      );
    }
    return result.data;
  }

  private toSelectorSpec(candidate: SelectorCandidate): SelectorSpec {
    const invalid = SELECTOR_FIELDS.filter(
      (field) => !isValidCssSelector(candidate[field])
    );
    if (invalid.length > 0) {
      throw new SelectorResolutionFailure(
        `Discovery returned unparsable selectors for: ${invalid.join(", ")}`
      );
    }

    return Object.freeze({
      articleContainer: candidate.articleContainer,
      title: candidate.title,
      kicker: candidate.kicker,
      image: candidate.image,
      link: candidate.link,
    });
  }

  private async readCache(
    fingerprint: string
  ): Promise<SelectorResolution | null> {
    if (!this.cache) {
      return null;
    }

    try {
      const entry = await this.cache.get(fingerprint);
      if (!entry || entry.modelId !== this.modelId) {
        return null;
      }
      this.logger.info("Using cached AI-discovered selectors", { fingerprint });
      return this.aiResolution({
        spec: this.toSelectorSpec({
          ...entry.spec,
          confidence: entry.confidence,
        }),
        confidence: entry.confidence,
        fromCache: true,
      });
    } catch (error) {
      this.logger.warn("Selector cache lookup failed", { error });
      return null;
    }
  }

  private async writeCache(
    fingerprint: string,
    candidate: SelectorCandidate
  ): Promise<void> {
    if (!this.cache) {
      return;
    }

    try {
      const { confidence, ...spec } = candidate;
      await this.cache.set(fingerprint, {
        spec,
        confidence,
        modelId: this.modelId,
      });
    } catch (error) {
      this.logger.warn("Failed to store selectors in cache", { error });
    }
  }
}
