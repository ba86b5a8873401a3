import type {
  ArticleMetrics,
  ArticleRecord,
  ExtractedArticle,
} from "../types/schemas";

const UPPERCASE_START = /^\p{Lu}/u;

/**
 * Split a title on runs of Unicode whitespace, dropping empty tokens.
 */
export const tokenizeTitle = (title: string): string[] =>
  title.split(/\s+/u).filter((token) => token.length > 0);

export const countWords = (title: string): number =>
  tokenizeTitle(title).length;

/**
 * Count Unicode code points. A surrogate pair (emoji, astral CJK) counts once;
 * combining marks count as their own position.
 */
export const countCharacters = (title: string): number =>
  Array.from(title).length;

/**
 * Tokens whose first code point is an uppercase letter (Unicode Lu).
 * Punctuation stays attached to its token; order and duplicates are kept.
 */
export const findCapitalizedWords = (title: string): string[] =>
  tokenizeTitle(title).filter((token) => UPPERCASE_START.test(token));

export const computeTitleMetrics = (title: string): ArticleMetrics =>
  Object.freeze({
    wordCount: countWords(title),
    charCount: countCharacters(title),
    capitalizedWords: Object.freeze(findCapitalizedWords(title)),
  });

/**
 * Attach metrics to an extracted article. The result is frozen; metrics are
 * never recomputed on an existing record.
 */
export const enrichArticle = (
  article: ExtractedArticle,
  ingestedAt: string
): ArticleRecord =>
  Object.freeze({
    title: article.title,
    kicker: article.kicker,
    imageUrl: article.imageUrl,
    linkUrl: article.linkUrl,
    metrics: computeTitleMetrics(article.title),
    ingestedAt,
  });
