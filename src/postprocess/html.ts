import { HTMLElement, parse, TextNode, type Node as HtmlNode } from "node-html-parser";

const normalizeCellText = (value: string) =>
  value
    .replace(/&nbsp;/g, " ")
    .replace(/\u00A0/g, " ")
    .replace(/\s+/g, " ")
    .trim();

const TEX_ANNOTATION =
  'annotation[encoding="application/x-tex"], annotation[encoding="application/x-latex"]';

/** Text of a node; MathML contributes its TeX annotation rather than its glyphs. */
const textOf = (node: HtmlNode): string => {
  if (node instanceof TextNode) return node.text;
  if (!(node instanceof HTMLElement)) return "";
  if (node.tagName === "MATH") {
    const tex = node.querySelector(TEX_ANNOTATION)?.textContent.trim();
    if (tex) return tex;
  }
  return node.childNodes.map(textOf).join("");
};

export const extractTables = (html: string): HTMLElement[] =>
  parse(html)
    .querySelectorAll("table")
    .filter((table) => !table.parentNode?.closest("table"));

type Cell = { tag: "th" | "td"; text: string };

/** Header and body rows in document order; each cell flattened to one line of text. */
const tableCells = (table: HTMLElement): Cell[][] =>
  table
    .querySelectorAll("tr")
    .filter((row) => row.closest("table") === table)
    .map((row) =>
      row
        .querySelectorAll("th, td")
        .filter((cell) => cell.closest("table") === table)
        .map((cell): Cell => ({
          tag: cell.tagName === "TH" ? "th" : "td",
          text: normalizeCellText(textOf(cell)),
        })),
    );

export const tableToRows = (table: HTMLElement): string[][] =>
  tableCells(table).map((row) => row.map((cell) => cell.text));

const escapeHtml = (value: string) =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

/** The table rebuilt from cell text alone: no attributes, no inline markup. */
export const plainTableHtml = (table: HTMLElement) => {
  const rows = tableCells(table).map(
    (row) => `<tr>${row.map(({ tag, text }) => `<${tag}>${escapeHtml(text)}</${tag}>`).join("")}</tr>`,
  );
  return `<table>${rows.join("")}</table>`;
};

export const rowsToTsv = (rows: string[][]) =>
  rows.map((cells) => cells.map((cell) => cell.replace(/\t/g, " ")).join("\t")).join("\n");

export type TableFragment = { html: string; plainText: string; rowCount: number };

export type TableFragmentOptions = {
  /** Keep the cells' inline formatting (default true). */
  keepFormat?: boolean;
};

/** Keeps only the tables of an HTML fragment; null when there is none. */
export const toTableFragment = (html: string, options: TableFragmentOptions = {}): TableFragment | null => {
  const tables = extractTables(html);
  if (!tables.length) return null;

  const rows = tables.map(tableToRows);
  const render = options.keepFormat === false ? plainTableHtml : (table: HTMLElement) => table.toString();
  return {
    html: tables.map(render).join("\n"),
    plainText: rows.map(rowsToTsv).join("\n\n"),
    rowCount: rows.reduce((sum, table) => sum + table.length, 0),
  };
};
