/**
 * Text Normalizer Module
 * Flattens scraped HTML or text into clean plain text and rebuilds minimal HTML for display
 */

import * as cheerio from "cheerio";

/**
 * Elements dropped before text extraction (noise)
 */
const NOISE_SELECTORS = [
  "script",
  "style",
  "noscript",
  "iframe",
  "svg",
  "img",
  "picture",
  "figure",
  "nav",
  "header",
  "footer",
  "button",
  ".cookie-banner",
  ".advertisement",
  ".social-share",
];

// Paragraph-level blocks are separated by a blank line, rows and list items by a line break
const PARAGRAPH_SELECTORS = [
  "p",
  "div",
  "section",
  "article",
  "ul",
  "ol",
  "table",
  "blockquote",
  "pre",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
];

const ALLOWED_ATTRIBUTES = new Set(["href", "src", "alt", "title", "class"]);

const BULLET_PATTERN = /^(?:[•▪●]\s*|[-*]\s+)(.+)$/;
const ORDERED_PATTERN = /^\d+[.)]\s+(.+)$/;
const HTML_PATTERN = /<\/?[a-z][a-z0-9]*(?:\s[^>]*)?\/?>/i;

export interface CleanTextOptions {
  /** Lowercase phrases; an entry ending in "*" drops any line starting with it */
  denylist?: string[];
}

interface DenylistMatcher {
  exact: Set<string>;
  prefixes: string[];
}

const matcherCache = new WeakMap<string[], DenylistMatcher>();

function stripTrailingPunctuation(value: string): string {
  return value.replace(/[\s.!?:;,]+$/, "").trim();
}

function getDenylistMatcher(denylist: string[]): DenylistMatcher {
  const cached = matcherCache.get(denylist);
  if (cached) return cached;

  const matcher: DenylistMatcher = { exact: new Set(), prefixes: [] };
  for (const entry of denylist) {
    const phrase = entry.trim().toLowerCase();
    if (!phrase) continue;
    if (phrase.endsWith("*")) {
      matcher.prefixes.push(phrase.slice(0, -1).trim());
    } else {
      matcher.exact.add(stripTrailingPunctuation(phrase));
    }
  }
  matcherCache.set(denylist, matcher);
  return matcher;
}

/**
 * True when the whole line is boilerplate: every piece between "|", "•" or "·"
 * separators is a denylisted phrase, or the line starts with a prefix entry
 */
export function isBoilerplateLine(line: string, denylist: string[]): boolean {
  const lower = line.trim().toLowerCase();
  if (!lower) return false;

  const matcher = getDenylistMatcher(denylist);
  if (matcher.prefixes.some((prefix) => prefix && lower.startsWith(prefix))) {
    return true;
  }

  const pieces = lower
    .split(/\s*[|•·]\s*/)
    .map(stripTrailingPunctuation)
    .filter((piece) => piece.length > 0);

  return pieces.length > 0 && pieces.every((piece) => matcher.exact.has(piece));
}

export function looksLikeHtml(value: string): boolean {
  return HTML_PATTERN.test(value);
}

function decodeBasicEntities(text: string): string {
  return text
    .replace(/&nbsp;/gi, " ")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;|&apos;/gi, "'")
    .replace(/&amp;/gi, "&");
}

/**
 * Regex tag strip used when the HTML parser fails
 */
export function stripTags(html: string): string {
  const text = html
    .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, " ")
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<li[^>]*>/gi, "\n- ")
    .replace(/<\/(p|div|li|ul|ol|tr|h[1-6]|section|article)>/gi, "\n")
    .replace(/<[^>]*>/g, " ");
  return decodeBasicEntities(text);
}

/**
 * Converts an HTML fragment into text with one block per line and "- " bullets
 */
export function htmlToText(html: string): string {
  // Source formatting whitespace carries no meaning; line breaks come from block elements
  const $ = cheerio.load(html.replace(/\s+/g, " "));

  NOISE_SELECTORS.forEach((selector) => {
    $(selector).remove();
  });

  $("br").replaceWith("\n");
  $("li").each((_, element) => {
    $(element).prepend("- ");
  });
  $("li, tr").each((_, element) => {
    $(element).after("\n");
  });
  $(PARAGRAPH_SELECTORS.join(",")).each((_, element) => {
    $(element).before("\n");
    $(element).after("\n\n");
  });

  return $("body").text();
}

function normalizeLines(text: string, denylist: string[]): string {
  const lines = text
    .replace(/\r\n?/g, "\n")
    .replace(/\u00a0/g, " ")
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v]+/g, " ").trim())
    .filter((line) => !isBoilerplateLine(line, denylist));

  return lines.join("\n").replace(/\n{3,}/g, "\n\n").trim();
}

/**
 * Cleans raw description text or HTML into plain text
 */
export function cleanText(raw: string | null | undefined, options: CleanTextOptions = {}): string {
  if (!raw || !raw.trim()) return "";
  const denylist = options.denylist ?? [];

  if (!looksLikeHtml(raw)) {
    return normalizeLines(raw, denylist);
  }

  let text: string;
  try {
    text = htmlToText(raw);
  } catch {
    text = stripTags(raw);
  }
  return normalizeLines(text, denylist);
}

/**
 * Drops scripts, styles, comments and every attribute outside the allow-list
 */
export function sanitizeHtml(html: string): string {
  if (!html.trim()) return "";

  try {
    const $ = cheerio.load(html.replace(/<!--[\s\S]*?-->/g, ""));
    $("script, style, noscript, iframe").remove();

    $("body *").each((_, element) => {
      const node = $(element);
      const attributes = node.attr() ?? {};
      for (const [name, value] of Object.entries(attributes)) {
        const lowerName = name.toLowerCase();
        if (!ALLOWED_ATTRIBUTES.has(lowerName)) {
          node.removeAttr(name);
        } else if ((lowerName === "href" || lowerName === "src") && /^\s*javascript:/i.test(value)) {
          node.removeAttr(name);
        }
      }
    });

    return ($("body").html() ?? "").trim();
  } catch {
    return escapeHtml(stripTags(html).trim());
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function isHeadingLine(line: string): boolean {
  return line.length <= 60 && /[A-Z]/.test(line) && line === line.toUpperCase();
}

/**
 * Rebuilds paragraphs, lists and headings from cleaned text, one element per line
 */
export function toMinimalHtml(text: string): string {
  const output: string[] = [];
  const blocks = text
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter((block) => block.length > 0);

  for (const block of blocks) {
    let openList: "ul" | "ol" | null = null;
    let paragraph: string[] = [];

    const flushParagraph = () => {
      if (paragraph.length > 0) {
        output.push(`<p>${escapeHtml(paragraph.join(" "))}</p>`);
        paragraph = [];
      }
    };
    const closeList = () => {
      if (openList) {
        output.push(`</${openList}>`);
        openList = null;
      }
    };
    const addItem = (listType: "ul" | "ol", content: string) => {
      flushParagraph();
      if (openList !== listType) {
        closeList();
        output.push(`<${listType}>`);
        openList = listType;
      }
      output.push(`<li>${escapeHtml(content.trim())}</li>`);
    };

    const lines = block
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    for (const line of lines) {
      const bullet = BULLET_PATTERN.exec(line);
      const ordered = ORDERED_PATTERN.exec(line);

      if (bullet) {
        addItem("ul", bullet[1]);
      } else if (ordered) {
        addItem("ol", ordered[1]);
      } else if (isHeadingLine(line)) {
        flushParagraph();
        closeList();
        output.push(`<h3>${escapeHtml(line)}</h3>`);
      } else {
        closeList();
        paragraph.push(line);
      }
    }

    flushParagraph();
    closeList();
  }

  return output.join("\n");
}
