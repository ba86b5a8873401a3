import sanitize from "sanitize-html";

// Upper bound on the excerpt handed to selector discovery
export const MARKUP_SAMPLE_MAX_CHARS = 10000;

/**
 * Structural view of a page: layout tags plus the attributes selectors hang
 * on. Scripts, styles, inline SVG and presentational attributes are dropped.
 */
const STRUCTURE_OPTIONS: sanitize.IOptions = {
  allowedTags: [
    ...sanitize.defaults.allowedTags,
    "img",
    "picture",
    "source",
    "time",
  ],
  allowedAttributes: {
    "*": ["class", "id", "role", "datetime"],
    a: ["href"],
    img: ["src", "data-src", "alt"],
    source: ["srcset"],
  },
  nonTextTags: [
    "script",
    "style",
    "textarea",
    "option",
    "noscript",
    "svg",
    "title",
    "template",
    "iframe",
  ],
  disallowedTagsMode: "discard",
};

/**
 * Reduce a page to a bounded excerpt of its body structure.
 */
export const buildMarkupSample = (
  html: string,
  maxChars = MARKUP_SAMPLE_MAX_CHARS
): string =>
  sanitize(html, STRUCTURE_OPTIONS)
    .replace(/\s+/g, " ")
    .replace(/> </g, "><")
    .trim()
    .slice(0, maxChars);

const SKELETON_OPTIONS: sanitize.IOptions = {
  allowedTags: false,
  allowedAttributes: {
    "*": ["class", "id", "role"],
  },
  textFilter: () => "",
};

/**
 * Tag and class outline of a sample, with text, links and image sources
 * removed. Headline changes leave it untouched; a layout change does not.
 */
export const buildStructureSkeleton = (markup: string): string =>
  sanitize(markup, SKELETON_OPTIONS).replace(/\s+/g, " ").trim();
