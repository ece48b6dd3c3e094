import { ConversionError, errorMessage, isMissingBinaryError, toConversionError } from "../errors";
import { createLogger } from "../logger";
import { applyMathHooks, collectMath, isPandocDocument, literalizeMath, type PandocDocument } from "./pandoc-ast";
import { runProcess, type ProcessOutput, type ProcessRunner, type RunOptions } from "./process";
import type { ConversionEngine, EngineInfo, EngineWriter, InputFormat, RenderRequest } from "./types";

const logger = createLogger("pandoc");

export const MARKDOWN_INPUT_FORMAT =
  "markdown+tex_math_dollars+tex_math_single_backslash+pipe_tables+task_lists+strikeout+autolink_bare_uris";

export const HTML_INPUT_FORMAT = "html";

export const INSTALL_GUIDANCE =
  "Pandoc not found. Install pandoc (https://pandoc.org/installing.html) or set PANDOC_PATH.";

/** `PANDOC_PATH` wins over the configured path; plain `pandoc` is looked up on PATH. */
export const resolvePandocPath = (configured?: string | null, env: NodeJS.ProcessEnv = process.env) => {
  const envPath = env.PANDOC_PATH;
  if (envPath && envPath.trim()) return envPath.trim();
  return configured?.trim() || "pandoc";
};

export const parseVersionLine = (output: string) => {
  const firstLine = output.split(/\r?\n/, 1)[0] ?? "";
  const match = firstLine.match(/^pandoc(?:\.exe)?\s+v?(\d+(?:\.\d+)*)/i);
  return match ? match[1] : null;
};

export const readerArgs = (inputFormat: InputFormat = "markdown") => [
  "-f",
  inputFormat === "html" ? HTML_INPUT_FORMAT : MARKDOWN_INPUT_FORMAT,
  "-t",
  "json",
];

export const writerArgs = (writer: EngineWriter, referenceDoc?: string) => {
  const args = ["-f", "json", "-t", writer, "-o", "-"];
  if (writer === "html") args.push("--mathml");
  if (writer === "docx" && referenceDoc) args.push("--reference-doc", referenceDoc);
  return args;
};

export type PandocEngineOptions = {
  pandocPath?: string | null;
  run?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
};

/**
 * Drives pandoc in two passes: Markdown or HTML → JSON AST, then (after the math
 * hooks rewrote the AST in process) JSON → target writer on stdout.
 */
export class PandocEngine implements ConversionEngine {
  readonly name = "pandoc";
  readonly path: string;
  private readonly run: ProcessRunner;
  private info: EngineInfo | null = null;

  constructor(options: PandocEngineOptions = {}) {
    this.path = resolvePandocPath(options.pandocPath, options.env);
    this.run = options.run ?? runProcess;
  }

  /** Only a successful probe is cached; a failure is retried on the next call. */
  async probe(signal?: AbortSignal): Promise<EngineInfo> {
    if (this.info) return this.info;
    const { code, stdout, stderr } = await this.exec(["--version"], { signal });
    const version = code === 0 ? parseVersionLine(stdout.toString("utf8")) : null;
    if (!version) {
      throw new ConversionError("ExternalEngineMissing", INSTALL_GUIDANCE, {
        detail: stderr.trim() || `${this.path} --version did not report a pandoc version`,
      });
    }
    logger.debug(`Using pandoc ${version} at ${this.path}`);
    this.info = { name: this.name, version, path: this.path };
    return this.info;
  }

  async render(request: RenderRequest): Promise<Buffer> {
    const { signal, inputFormat = "markdown" } = request;

    const parsed = await this.exec(readerArgs(inputFormat), { input: request.source, signal });
    if (parsed.code !== 0) {
      const label = inputFormat === "html" ? "HTML" : "Markdown";
      throw this.failure(`Pandoc could not parse the ${label} input`, parsed);
    }

    let doc = readDocument(parsed.stdout);
    logger.debug(`Parsed document with ${collectMath(doc).length} math node(s)`);

    doc = applyMathHooks(doc, request.mathHooks);
    if (request.literalMath) doc = literalizeMath(doc);

    const written = await this.exec(writerArgs(request.writer, request.referenceDoc), {
      input: JSON.stringify(doc),
      signal,
    });
    if (written.code !== 0) {
      throw this.failure(`Pandoc could not write ${request.writer}`, written);
    }
    return written.stdout;
  }

  private async exec(args: readonly string[], options: RunOptions): Promise<ProcessOutput> {
    try {
      return await this.run(this.path, args, options);
    } catch (error) {
      if (isMissingBinaryError(error) && !options.signal?.aborted) {
        throw new ConversionError("ExternalEngineMissing", INSTALL_GUIDANCE, {
          detail: `${this.path}: not found`,
          cause: error,
        });
      }
      throw toConversionError(error, options.signal);
    }
  }

  private failure(message: string, output: ProcessOutput) {
    const detail = output.stderr.trim() || `Pandoc exited with code ${output.code}`;
    return new ConversionError("ParseFailure", message, { detail });
  }
}

const readDocument = (stdout: Buffer): PandocDocument => {
  let json: unknown;
  try {
    json = JSON.parse(stdout.toString("utf8"));
  } catch (error) {
    throw new ConversionError("ParseFailure", "Pandoc returned an unreadable AST", {
      detail: errorMessage(error),
      cause: error,
    });
  }
  if (!isPandocDocument(json)) {
    throw new ConversionError("ParseFailure", "Pandoc returned an unexpected AST shape");
  }
  return json;
};
