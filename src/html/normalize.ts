import { parse } from "node-html-parser";
import { normalizeLineEndings, stripZeroWidth } from "../markdown/normalize";

const STRIKE_TAGS = new Set(["S", "STRIKE"]);

const LINE_THROUGH = /text-decoration(?:-line)?\s*:[^;]*line-through/i;

/**
 * Rewrites `<s>`, `<strike>` and inline `text-decoration: line-through`
 * elements as `<del>`, the one spelling every pandoc reader maps to
 * strikeout. Other attributes of a rewritten element are dropped.
 */
export const strikethroughToDel = (html: string) => {
  const root = parse(html);
  const struck = root
    .querySelectorAll("*")
    .filter((el) => STRIKE_TAGS.has(el.tagName) || LINE_THROUGH.test(el.getAttribute("style") ?? ""));
  if (!struck.length) return html;

  // Innermost first: an outer element re-parses its (already rewritten) inner HTML.
  for (const el of struck.reverse()) el.replaceWith(`<del>${el.innerHTML}</del>`);
  return root.toString();
};

export type HtmlInputOptions = { strikethroughToDel?: boolean };

export const normalizeHtml = (html: string, options: HtmlInputOptions = {}) => {
  const cleaned = stripZeroWidth(normalizeLineEndings(html));
  return options.strikethroughToDel === false ? cleaned : strikethroughToDel(cleaned);
};

/** Plain-text fallback for a rich-text paste of HTML input. */
export const htmlToPlainText = (html: string) => parse(html).structuredText.trim();
