import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConversionError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { compileRules, type RuleSet } from "./rules";

const logger = createLogger("rules");

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL("../../rules/latex-replacements.json", import.meta.url),
);

export const RewriteRuleSchema = z.object({
  pattern: z.string().min(1, "pattern must not be empty"),
  replacement: z.string(),
  description: z.string().optional(),
});

/** Either a bare array of rules or `{ "rules": [...] }`. */
export const RuleFileSchema = z.union([
  z.array(RewriteRuleSchema),
  z.object({ rules: z.array(RewriteRuleSchema) }),
]);

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");

/** Parses and compiles rule-file text; `source` only labels error messages. */
export const parseRuleFile = (content: string, source: string): RuleSet => {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConversionError("RuleConfigError", `Rule file ${source} is not valid JSON`, {
      detail: errorMessage(error),
      cause: error,
    });
  }

  const parsed = RuleFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConversionError("RuleConfigError", `Rule file ${source} has an invalid shape`, {
      detail: formatIssues(parsed.error),
    });
  }

  const rules = Array.isArray(parsed.data) ? parsed.data : parsed.data.rules;
  return compileRules(rules);
};

export const loadRuleFile = async (filePath: string): Promise<RuleSet> => {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConversionError("RuleConfigError", `Cannot read rule file ${filePath}`, {
      detail: errorMessage(error),
      cause: error,
    });
  }

  const rules = parseRuleFile(content, filePath);
  logger.debug(`Loaded ${rules.length} rewrite rule(s) from ${filePath}`);
  return rules;
};

export const loadDefaultRules = () => loadRuleFile(DEFAULT_RULES_PATH);
