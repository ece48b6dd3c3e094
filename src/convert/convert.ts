import { ConversionError, toConversionError } from "../errors";
import type { ConversionEngine, InputFormat, MathHook } from "../engine/types";
import { createMathFilter, type RuleSet } from "../filter/rules";
import { htmlToPlainText, normalizeHtml } from "../html/normalize";
import { createLogger } from "../logger";
import { normalizeMarkdown } from "../markdown/normalize";
import { findMarkdownTables, tableShape } from "../markdown/tables";
import { disableFirstParagraphIndent } from "../postprocess/docx";
import { extractTables, toTableFragment } from "../postprocess/html";
import { FORMAT_PROFILES, type TargetFormat } from "./formats";
import type { ConversionResult, RenderedDocument } from "./types";

const logger = createLogger("convert");

export const DEFAULT_TIMEOUT_MS = 30_000;

export type ConvertOptions = {
  engine: ConversionEngine;
  /** What the source text is (default Markdown). */
  inputFormat?: InputFormat;
  /** Run the rewrite rules over every math node (default true). */
  latexReplacements?: boolean;
  /** Emit math as literal TeX text instead of native equations. */
  keepOriginalFormula?: boolean;
  /** Word output from Markdown (default true). */
  disableFirstParagraphIndent?: boolean;
  /** Word output from HTML (default true). */
  htmlDisableFirstParagraphIndent?: boolean;
  /** HTML input: rewrite every strikethrough spelling as `<del>` (default true). */
  strikethroughToDel?: boolean;
  /** Excel-table target enabled (default true). */
  enableExcel?: boolean;
  /** Excel-table target: keep the cells' inline formatting (default true). */
  excelKeepFormat?: boolean;
  referenceDocx?: string | null;
  timeoutMs?: number;
  signal?: AbortSignal;
};

/** Deadline and caller signal folded into one; the deadline's reason is a TimeoutError. */
export const combineSignals = (timeoutMs: number, signal?: AbortSignal) => {
  const deadline = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([deadline, signal]) : deadline;
};

type PreparedInput = { format: InputFormat; source: string; plainText: string };

const prepareInput = (input: string, options: ConvertOptions): PreparedInput => {
  if (options.inputFormat === "html") {
    const source = normalizeHtml(input, { strikethroughToDel: options.strikethroughToDel });
    return { format: "html", source, plainText: htmlToPlainText(source) };
  }
  return { format: "markdown", source: normalizeMarkdown(input), plainText: input };
};

const countTables = ({ format, source }: PreparedInput) => {
  if (format === "html") return extractTables(source).length;
  const tables = findMarkdownTables(source);
  if (tables.length) logger.debug(`Found ${tables.length} Markdown table(s)`, { shapes: tables.map(tableShape) });
  return tables.length;
};

/* ------------------------------ post-processing ----------------------------- */

const pick = ({ mimeType, extension }: { mimeType: string; extension: string }) => ({
  mimeType,
  extension,
});

const finishWord = async (
  data: Buffer,
  input: PreparedInput,
  options: ConvertOptions,
): Promise<RenderedDocument> => {
  const flag =
    input.format === "html" ? options.htmlDisableFirstParagraphIndent : options.disableFirstParagraphIndent;
  const patched = flag === false ? data : await disableFirstParagraphIndent(data);
  return { format: "word", ...pick(FORMAT_PROFILES.word), data: patched, plainText: input.plainText };
};

const finishHtml = (data: Buffer, input: PreparedInput): RenderedDocument => ({
  format: "html-rich-text",
  ...pick(FORMAT_PROFILES["html-rich-text"]),
  data,
  plainText: input.plainText,
});

const finishExcel = (data: Buffer, options: ConvertOptions): RenderedDocument => {
  const fragment = toTableFragment(data.toString("utf8"), { keepFormat: options.excelKeepFormat });
  if (!fragment) {
    throw new ConversionError("UnsupportedTargetContent", "The converted document contains no table");
  }
  logger.debug(`Kept ${fragment.rowCount} table row(s)`);
  return {
    format: "excel-table",
    ...pick(FORMAT_PROFILES["excel-table"]),
    data: Buffer.from(fragment.html, "utf8"),
    plainText: fragment.plainText,
  };
};

/* --------------------------------- convert --------------------------------- */

const run = async (
  text: string,
  target: TargetFormat,
  ruleSet: RuleSet,
  options: ConvertOptions,
  signal: AbortSignal,
): Promise<RenderedDocument> => {
  const input = prepareInput(text, options);

  if (target === "excel-table") {
    if (options.enableExcel === false) {
      throw new ConversionError("UnsupportedTargetContent", "Excel table conversion is disabled");
    }
    if (!countTables(input)) {
      const message =
        input.format === "html"
          ? "No table found in the HTML input"
          : "No Markdown table found to paste into Excel";
      throw new ConversionError("UnsupportedTargetContent", message);
    }
  }

  const { engine } = options;
  const info = await engine.probe(signal);
  signal.throwIfAborted();

  const mathHooks: MathHook[] =
    options.latexReplacements === false || !ruleSet.length ? [] : [createMathFilter(ruleSet)];
  const profile = FORMAT_PROFILES[target];

  logger.debug(`Rendering ${input.format} to ${target} with ${info.name} ${info.version}`);
  const data = await engine.render({
    source: input.source,
    inputFormat: input.format,
    writer: profile.writer,
    mathHooks,
    literalMath: options.keepOriginalFormula === true,
    referenceDoc: profile.writer === "docx" ? options.referenceDocx ?? undefined : undefined,
    signal,
  });
  signal.throwIfAborted();

  switch (target) {
    case "word":
      return finishWord(data, input, options);
    case "html-rich-text":
      return finishHtml(data, input);
    case "excel-table":
      return finishExcel(data, options);
  }
};

/**
 * Converts Markdown (or HTML, per `inputFormat`) into the target format.
 * Never throws: every failure, including a timeout or a cancel, comes back
 * as `{ ok: false }`.
 */
export const convert = async (
  source: string,
  target: TargetFormat,
  ruleSet: RuleSet,
  options: ConvertOptions,
): Promise<ConversionResult> => {
  const signal = combineSignals(options.timeoutMs ?? DEFAULT_TIMEOUT_MS, options.signal);
  try {
    const document = await run(source, target, ruleSet, options, signal);
    signal.throwIfAborted();
    return { ok: true, document };
  } catch (error) {
    const failure = toConversionError(error, signal);
    logger.debug(`Conversion to ${target} failed: ${failure.kind}`, { detail: failure.detail });
    return { ok: false, error: failure };
  }
};
