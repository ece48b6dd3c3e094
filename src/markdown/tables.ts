import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkMath from "remark-math";
import { visit } from "unist-util-visit";
import type { Table } from "mdast";

const parser = unified().use(remarkParse).use(remarkGfm).use(remarkMath);

export type TableShape = { rows: number; columns: number };

export const findMarkdownTables = (markdown: string): Table[] => {
  const tables: Table[] = [];
  visit(parser.parse(markdown), "table", (node) => {
    tables.push(node);
  });
  return tables;
};

export const hasMarkdownTable = (markdown: string) => findMarkdownTables(markdown).length > 0;

export const tableShape = (table: Table): TableShape => ({
  rows: table.children.length,
  columns: table.children.reduce((max, row) => Math.max(max, row.children.length), 0),
});
