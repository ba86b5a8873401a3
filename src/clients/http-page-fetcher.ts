import type { Logger } from "./logger";
import { createPageSnapshot, FetchFailure } from "./page-snapshot";
import type {
  FetchPageRequest,
  PageFetcher,
  PageSnapshot,
} from "./page-snapshot";

export type HttpPageFetcherConfig = {
  logger: Logger;
  defaultTimeoutMs?: number;
  userAgent?: string;
};

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; news-index-scraper/0.1)";

/**
 * Plain HTTP page fetcher. No JavaScript runs, so it only suits listings
 * rendered on the server; it needs no browser.
 */
export class HttpPageFetcher implements PageFetcher {
  readonly name = "http";
  private logger: Logger;
  private defaultTimeoutMs: number;
  private userAgent: string;

  constructor({ logger, defaultTimeoutMs, userAgent }: HttpPageFetcherConfig) {
    this.logger = logger;
    this.defaultTimeoutMs = defaultTimeoutMs ?? 30000;
    this.userAgent = userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * Performs a GET request to the specified URL.
   * @throws FetchFailure on network errors, timeouts and non-2xx responses
   */
  private async get(url: string, timeoutMs: number): Promise<Response> {
    this.logger.debug("Fetching URL", { url, timeoutMs });

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "user-agent": this.userAgent, accept: "text/html" },
        signal: AbortSignal.timeout(timeoutMs),
        redirect: "follow",
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === "TimeoutError"
          ? `timeout after ${timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new FetchFailure(url, reason, { cause: error });
    }

    this.logger.debug("Response status", { status: response.status });
    if (!response.ok) {
      throw new FetchFailure(
        url,
        `HTTP ${response.status} ${response.statusText}`.trim()
      );
    }
    return response;
  }

  async fetchPage({
    url,
    waitPolicy = {},
  }: FetchPageRequest): Promise<PageSnapshot> {
    const response = await this.get(
      url,
      waitPolicy.timeoutMs ?? this.defaultTimeoutMs
    );
    const html = await response.text();
    const snapshot = createPageSnapshot({
      html,
      baseUrl: response.url || url,
    });

    this.logger.info("Page loaded", {
      baseUrl: snapshot.baseUrl,
      length: html.length,
    });
    return snapshot;
  }

  async close(): Promise<void> {
    // Nothing held between requests
  }
}
