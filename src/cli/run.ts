import { readFile } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { parseArgs } from "node:util";
import { loadConfig, type Config } from "../config";
import { parseTargetFormat } from "../convert/formats";
import { ConversionJob } from "../convert/job";
import { PandocEngine } from "../engine/pandoc";
import type { ConversionEngine, InputFormat } from "../engine/types";
import { errorMessage, isConversionError } from "../errors";
import { loadDefaultRules, loadRuleFile } from "../filter/rule-file";
import type { RuleSet } from "../filter/rules";
import { ConsoleNotifier, describeFailure, describeResult, type Notifier } from "../notify";
import { createSaveDirSink, FileSink } from "../sinks/file";
import { StreamSink } from "../sinks/stream";
import type { OutputSink } from "../sinks/types";

export const USAGE = `Usage: pastemd [file] --to word|excel|html [--from markdown|html] [--out path] [--config path] [--rules path]

Reads Markdown (or HTML with --from html) from <file> (or stdin) and writes
the converted document to --out, to the configured save directory when
keepFile is set, or to stdout.`;

export type CliDeps = {
  stdin: Readable;
  stdout: Writable;
  env?: NodeJS.ProcessEnv;
  engine?: ConversionEngine;
  notifier?: Notifier;
};

const readStream = async (stream: Readable) => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

const loadRules = (config: Config, override?: string): Promise<RuleSet> => {
  if (!config.latexReplacements) return Promise.resolve([]);
  const rulesPath = override ?? config.rulesPath;
  return rulesPath ? loadRuleFile(rulesPath) : loadDefaultRules();
};

const pickSink = (config: Config, out: string | undefined, stdout: Writable): OutputSink => {
  if (out) return new FileSink(out);
  if (config.keepFile) return createSaveDirSink(config.saveDir);
  return new StreamSink(stdout);
};

const parseInputFormat = (value: string): InputFormat | null =>
  value === "markdown" || value === "md" ? "markdown" : value === "html" ? "html" : null;

const parseCliArgs = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      to: { type: "string", short: "t" },
      from: { type: "string", short: "f" },
      out: { type: "string", short: "o" },
      config: { type: "string", short: "c" },
      rules: { type: "string", short: "r" },
      help: { type: "boolean", short: "h" },
    },
  });

/** Runs one conversion from the command line; resolves to the process exit code. */
export const runCli = async (argv: readonly string[], deps: CliDeps): Promise<number> => {
  const env = deps.env ?? process.env;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    console.error(USAGE);
    return 0;
  }

  const target = parseTargetFormat(values.to ?? "word");
  const inputFormat = parseInputFormat(values.from ?? "markdown");
  if (!target || !inputFormat || positionals.length > 1) {
    console.error(USAGE);
    return 1;
  }

  let config: Config;
  try {
    config = await loadConfig(values.config, env);
  } catch (error) {
    console.error(errorMessage(error));
    return 1;
  }

  const notifier = deps.notifier ?? new ConsoleNotifier(config.notify);

  let ruleSet: RuleSet;
  let source: string;
  try {
    ruleSet = await loadRules(config, values.rules);
    source = positionals[0] ? await readFile(positionals[0], "utf8") : await readStream(deps.stdin);
  } catch (error) {
    if (!isConversionError(error)) {
      console.error(`Cannot read input: ${errorMessage(error)}`);
      return 1;
    }
    notifier.notify(describeFailure(error));
    return 1;
  }

  const job = new ConversionJob({
    source,
    target,
    ruleSet,
    sink: pickSink(config, values.out, deps.stdout),
    options: {
      engine: deps.engine ?? new PandocEngine({ pandocPath: config.pandocPath }),
      inputFormat,
      latexReplacements: config.latexReplacements,
      keepOriginalFormula: config.keepOriginalFormula,
      disableFirstParagraphIndent: config.disableFirstParagraphIndent,
      htmlDisableFirstParagraphIndent: config.htmlDisableFirstParagraphIndent,
      strikethroughToDel: config.htmlFormatting.strikethroughToDel,
      enableExcel: config.enableExcel,
      excelKeepFormat: config.excelKeepFormat,
      referenceDocx: config.referenceDocx,
      timeoutMs: config.timeoutMs,
    },
  });

  const result = await job.run();
  notifier.notify(describeResult(result));
  return result.ok ? 0 : 1;
};
