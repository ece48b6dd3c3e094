export * from "./errors";
export { createLogger, type Logger } from "./logger";
export * from "./filter/rules";
export * from "./filter/rule-file";
export type * from "./engine/types";
export {
  PandocEngine,
  resolvePandocPath,
  readerArgs,
  writerArgs,
  INSTALL_GUIDANCE,
  type PandocEngineOptions,
} from "./engine/pandoc";
export { runProcess, type ProcessRunner, type ProcessOutput } from "./engine/process";
export { normalizeMarkdown } from "./markdown/normalize";
export { normalizeHtml, strikethroughToDel, htmlToPlainText, type HtmlInputOptions } from "./html/normalize";
export { extractTables, plainTableHtml, toTableFragment, type TableFragment } from "./postprocess/html";
export { findMarkdownTables, hasMarkdownTable, tableShape } from "./markdown/tables";
export * from "./convert/formats";
export type * from "./convert/types";
export { convert, combineSignals, DEFAULT_TIMEOUT_MS, type ConvertOptions } from "./convert/convert";
export { ConversionJob, type JobState, type ConversionJobInit } from "./convert/job";
export type { OutputSink } from "./sinks/types";
export { FileSink, createSaveDirSink, generateOutputPath } from "./sinks/file";
export { ClipboardSink, type ClipboardPayload, type ClipboardWriter } from "./sinks/clipboard";
export { StreamSink } from "./sinks/stream";
export * from "./notify";
export { ConfigSchema, ConfigError, loadConfig, parseConfig, type Config } from "./config";
