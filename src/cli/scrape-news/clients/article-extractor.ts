import type { Logger } from "~clients/logger";
import { JSDOM } from "jsdom";

import { ExtractedArticleSchema } from "../types/schemas";
import type { ExtractedArticle, SelectorSpec } from "../types/schemas";

export type ExtractRequest = {
  html: string;
  baseUrl: string;
  spec: SelectorSpec;
  maxArticles: number;
};

export type ExtractionResult = {
  articles: ExtractedArticle[];
  attempted: number; // Containers evaluated before the cap was reached
  dropped: number;
  containersFound: number;
};

export type ArticleExtractorConfig = {
  logger: Logger;
};

const collapseWhitespace = (text: string): string =>
  text.replace(/\s+/gu, " ").trim();

/**
 * Resolve a raw attribute value against the page URL. Anything that is not
 * an absolute http(s) URL afterwards is treated as missing.
 */
const resolveHttpUrl = (
  raw: string | null | undefined,
  baseUrl: string
): string | undefined => {
  const value = raw?.trim();
  if (!value) {
    return undefined;
  }

  let url: URL;
  try {
    url = new URL(value, baseUrl);
  } catch {
    return undefined;
  }

  return url.protocol === "http:" || url.protocol === "https:"
    ? url.href
    : undefined;
};

// An ancestor anchor only counts while it is still inside the container.
const findHref = (element: Element, container: Element): string | null => {
  if (element.hasAttribute("href")) {
    return element.getAttribute("href");
  }
  const ancestor = element.closest("a[href]");
  const anchor =
    ancestor && container.contains(ancestor)
      ? ancestor
      : element.querySelector("a[href]");
  return anchor?.getAttribute("href") ?? null;
};

export class ArticleExtractor {
  private logger: Logger;

  constructor(config: ArticleExtractorConfig) {
    this.logger = config.logger;
  }

  /**
   * Apply a selector set to a page. Containers are visited in document
   * order and every sub-selector is evaluated inside its own container.
   * Stops as soon as maxArticles records have been accepted.
   */
  extract({ html, baseUrl, spec, maxArticles }: ExtractRequest): ExtractionResult {
    const dom = new JSDOM(html);
    const document = dom.window.document;

    try {
      let containers: Element[];
      try {
        containers = Array.from(document.querySelectorAll(spec.articleContainer));
      } catch (error) {
        this.logger.warn("Article container selector failed", {
          selector: spec.articleContainer,
          error,
        });
        return { articles: [], attempted: 0, dropped: 0, containersFound: 0 };
      }

      this.logger.debug("Found article containers", {
        count: containers.length,
      });

      const articles: ExtractedArticle[] = [];
      let attempted = 0;
      let dropped = 0;

      for (const [index, container] of containers.entries()) {
        if (articles.length >= maxArticles) {
          break;
        }
        attempted++;

        try {
          const article = this.extractOne(container, spec, baseUrl);
          if (article.success) {
            articles.push(article.data);
          } else {
            dropped++;
            this.logger.warn("Dropping article", {
              position: index,
              reason: article.reason,
            });
          }
        } catch (error) {
          dropped++;
          this.logger.warn("Dropping article", { position: index, error });
        }
      }

      return {
        articles,
        attempted,
        dropped,
        containersFound: containers.length,
      };
    } finally {
      dom.window.close();
    }
  }

  private extractOne(
    container: Element,
    spec: SelectorSpec,
    baseUrl: string
  ):
    | { success: true; data: ExtractedArticle }
    | { success: false; reason: string } {
    const titleElement = container.querySelector(spec.title);
    const kickerElement = container.querySelector(spec.kicker);
    const imageElement = container.querySelector(spec.image);
    const linkElement = container.querySelector(spec.link);

    const title = collapseWhitespace(titleElement?.textContent ?? "");
    if (!title) {
      return { success: false, reason: "missing title" };
    }

    const linkUrl = linkElement
      ? resolveHttpUrl(findHref(linkElement, container), baseUrl)
      : undefined;
    if (!linkUrl) {
      return { success: false, reason: "missing or invalid link" };
    }

    const imageUrl =
      resolveHttpUrl(
        imageElement?.getAttribute("src") ||
          imageElement?.getAttribute("data-src"),
        baseUrl
      ) ?? "";

    const result = ExtractedArticleSchema.safeParse({
      title,
      kicker: collapseWhitespace(kickerElement?.textContent ?? ""),
      imageUrl,
      linkUrl,
    });
    if (!result.success) {
      return {
        success: false,
        reason: result.error.issues.map((issue) => issue.message).join("; "),
      };
    }

    return { success: true, data: result.data };
  }
}
