import { chromium } from "playwright";
import type { Browser, Page } from "playwright";

import type { Logger } from "./logger";
import { createPageSnapshot, FetchFailure } from "./page-snapshot";
import type {
  FetchPageRequest,
  PageFetcher,
  PageSnapshot,
  WaitPolicy,
  WaitStrategy,
} from "./page-snapshot";

export type PlaywrightPageFetcherConfig = {
  logger: Logger;
  headless?: boolean; // Whether to run browser in headless mode (default: true)
  defaultTimeoutMs?: number; // Default navigation timeout in milliseconds
  defaultWaitStrategy?: WaitStrategy;
  defaultRenderWaitMs?: number;
};

/**
 * Page fetcher that renders the target in headless Chromium, so listings
 * built client-side are present in the snapshot.
 */
export class PlaywrightPageFetcher implements PageFetcher {
  readonly name = "playwright";
  private logger: Logger;
  private headless: boolean;
  private defaultTimeoutMs: number;
  private defaultWaitStrategy: WaitStrategy;
  private defaultRenderWaitMs: number;
  private browser: Browser | null = null;

  constructor(config: PlaywrightPageFetcherConfig) {
    this.logger = config.logger;
    this.headless = config.headless ?? true;
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 30000;
    this.defaultWaitStrategy = config.defaultWaitStrategy ?? "load";
    this.defaultRenderWaitMs = config.defaultRenderWaitMs ?? 0;
  }

  /**
   * Get or launch the browser instance.
   * @throws If browser launch fails
   */
  private async getBrowser(): Promise<Browser> {
    if (!this.browser?.isConnected()) {
      this.logger.debug("Launching browser", { headless: this.headless });
      this.browser = await chromium.launch({ headless: this.headless });
    }
    return this.browser;
  }

  private async navigateAndWait({
    page,
    url,
    waitPolicy,
  }: {
    page: Page;
    url: string;
    waitPolicy: WaitPolicy;
  }): Promise<void> {
    const timeout = waitPolicy.timeoutMs ?? this.defaultTimeoutMs;
    const waitUntil = waitPolicy.waitStrategy ?? this.defaultWaitStrategy;
    const renderWaitMs = waitPolicy.renderWaitMs ?? this.defaultRenderWaitMs;

    this.logger.debug("Navigating to URL", { url, waitUntil, timeout });

    await page.goto(url, { timeout, waitUntil });

    if (renderWaitMs > 0) {
      this.logger.debug("Waiting for client rendering", { renderWaitMs });
      await page.waitForTimeout(renderWaitMs);
    }
  }

  async fetchPage({
    url,
    waitPolicy = {},
  }: FetchPageRequest): Promise<PageSnapshot> {
    let page: Page | null = null;

    try {
      const browser = await this.getBrowser();
      page = await browser.newPage();

      await this.navigateAndWait({ page, url, waitPolicy });

      const html = await page.content();
      const snapshot = createPageSnapshot({
        html,
        baseUrl: page.url(),
        title: await page.title(),
      });

      this.logger.info("Page loaded", {
        title: snapshot.title,
        baseUrl: snapshot.baseUrl,
        length: html.length,
      });
      return snapshot;
    } catch (error) {
      throw new FetchFailure(url, this.describeError(error), { cause: error });
    } finally {
      await page?.close();
    }
  }

  /**
   * Classify a Playwright failure into a short reason for the run summary.
   */
  private describeError(error: unknown): string {
    if (!(error instanceof Error)) {
      return String(error);
    }
    if (error.name === "TimeoutError" || error.message.includes("Timeout")) {
      return `timeout (${error.message})`;
    }
    if (error.message.includes("net::ERR_")) {
      return `network error (${error.message})`;
    }
    if (error.message.includes("Executable doesn't exist")) {
      return "Chromium is not installed; run `npx playwright install chromium`";
    }
    return error.message;
  }

  /**
   * Close the browser and release resources. Safe to call repeatedly.
   */
  async close(): Promise<void> {
    if (this.browser) {
      this.logger.debug("Closing browser");
      await this.browser.close();
      this.browser = null;
    }
  }
}
