import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_TIMEOUT_MS } from "./convert/convert";
import { errorMessage } from "./errors";

export const ConfigSchema = z
  .object({
    pandocPath: z.string().default("pandoc"),
    referenceDocx: z.string().nullable().default(null),
    saveDir: z.string().default(path.join(os.homedir(), "Documents", "pastemd")),
    keepFile: z.boolean().default(false),
    notify: z.boolean().default(true),
    enableExcel: z.boolean().default(true),
    latexReplacements: z.boolean().default(true),
    keepOriginalFormula: z.boolean().default(false),
    disableFirstParagraphIndent: z.boolean().default(true),
    htmlDisableFirstParagraphIndent: z.boolean().default(true),
    excelKeepFormat: z.boolean().default(true),
    htmlFormatting: z
      .object({ strikethroughToDel: z.boolean().default(true) })
      .strict()
      .default({}),
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    rulesPath: z.string().nullable().default(null),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");

const envOverrides = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};
  if (env.PASTEMD_RULES?.trim()) overrides.rulesPath = env.PASTEMD_RULES.trim();
  if (env.PASTEMD_TIMEOUT_MS?.trim()) {
    const timeoutMs = Number(env.PASTEMD_TIMEOUT_MS);
    if (!Number.isFinite(timeoutMs)) {
      throw new ConfigError(`PASTEMD_TIMEOUT_MS is not a number: ${env.PASTEMD_TIMEOUT_MS}`);
    }
    overrides.timeoutMs = timeoutMs;
  }
  return overrides;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Validates raw settings merged with environment overrides. `PANDOC_PATH` is read by the engine. */
export const parseConfig = (raw: unknown, env: NodeJS.ProcessEnv = process.env): Config => {
  const base = raw ?? {};
  if (!isRecord(base)) {
    throw new ConfigError("Configuration must be a JSON object");
  }
  const parsed = ConfigSchema.safeParse({ ...base, ...envOverrides(env) });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const loadConfig = async (
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> => {
  if (!configPath) return parseConfig(undefined, env);

  let json: unknown;
  try {
    json = JSON.parse(await readFile(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${configPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseConfig(json, env);
};
