import { buildMarkupSample } from "~utils/markup-sample";

// Possible wait strategies for page load
export type WaitStrategy = "load" | "domcontentloaded" | "networkidle";

export type WaitPolicy = {
  waitStrategy?: WaitStrategy;
  renderWaitMs?: number; // Extra settle time after the load event for client-rendered listings
  timeoutMs?: number; // Navigation/response timeout
};

export type PageSnapshot = {
  html: string; // Full markup, used for extraction
  markupSample: string; // Bounded structural excerpt, used for selector discovery
  baseUrl: string; // Final URL after redirects; relative links resolve against it
  title?: string;
};

export type FetchPageRequest = {
  url: string;
  waitPolicy?: WaitPolicy;
};

/**
 * Source of rendered page snapshots. Implementations own whatever
 * browser or connection they open and release it in close().
 */
export type PageFetcher = {
  readonly name: string;
  fetchPage(request: FetchPageRequest): Promise<PageSnapshot>;
  close(): Promise<void>;
};

/**
 * The page could not be obtained (unreachable, HTTP error, render timeout).
 * Fatal to a run.
 */
export class FetchFailure extends Error {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to fetch ${url}: ${message}`, options);
    this.name = "FetchFailure";
    this.url = url;
  }
}

export const createPageSnapshot = ({
  html,
  baseUrl,
  title,
}: {
  html: string;
  baseUrl: string;
  title?: string;
}): PageSnapshot => ({
  html,
  markupSample: buildMarkupSample(html),
  baseUrl,
  ...(title ? { title } : {}),
});
