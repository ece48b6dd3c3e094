import type { EngineWriter } from "../engine/types";
import { DOCX_MIME } from "../postprocess/docx";

export const TARGET_FORMATS = ["word", "excel-table", "html-rich-text"] as const;

export type TargetFormat = (typeof TARGET_FORMATS)[number];

export type FormatProfile = {
  writer: EngineWriter;
  mimeType: string;
  extension: string;
  label: string;
};

export const FORMAT_PROFILES: Record<TargetFormat, FormatProfile> = {
  word: { writer: "docx", mimeType: DOCX_MIME, extension: "docx", label: "Word" },
  "excel-table": { writer: "html", mimeType: "text/html", extension: "html", label: "Excel table" },
  "html-rich-text": { writer: "html", mimeType: "text/html", extension: "html", label: "HTML rich text" },
};

const ALIASES: Record<string, TargetFormat> = {
  word: "word",
  docx: "word",
  excel: "excel-table",
  "excel-table": "excel-table",
  table: "excel-table",
  html: "html-rich-text",
  "html-rich-text": "html-rich-text",
};

export const parseTargetFormat = (value: string): TargetFormat | null =>
  Object.hasOwn(ALIASES, value.toLowerCase()) ? ALIASES[value.toLowerCase()] : null;
