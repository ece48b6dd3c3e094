/**
 * Ordered LaTeX rewrite rules applied to the payload of every math node.
 *
 * A rule is data: a regular-expression source (compiled in unicode mode)
 * and a replacement string (`$1`…`$9`, `$<name>` and `$&` references,
 * `$$` for a literal dollar).
 * Rules run in list order and each one rewrites the output of the previous
 * one, so a later rule can clean up what an earlier rule left behind.
 */

import { ConversionError, errorMessage } from "../errors";
import type { MathHook } from "../engine/types";

export interface RewriteRule {
  readonly pattern: string;
  readonly replacement: string;
  readonly description?: string;
}

export interface CompiledRule extends RewriteRule {
  readonly regex: RegExp;
}

export type RuleSet = readonly CompiledRule[];

const ruleLabel = (rule: RewriteRule, index: number) =>
  rule.description ? `Rule ${index + 1} (${rule.description})` : `Rule ${index + 1}`;

const captureGroupCount = (pattern: string) => {
  // An empty alternative always matches, so exec() reports every group.
  const match = new RegExp(`${pattern}|`, "u").exec("");
  return match ? match.length - 1 : 0;
};

const referencedGroups = (replacement: string) =>
  Array.from(replacement.replace(/\$\$/g, "").matchAll(/\$([1-9])/g), (m) => Number(m[1]));

export const compileRule = (rule: RewriteRule, index: number): CompiledRule => {
  const label = ruleLabel(rule, index);

  if (!rule.pattern) {
    throw new ConversionError("RuleConfigError", `${label} has an empty pattern`);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(rule.pattern, "gu");
  } catch (error) {
    throw new ConversionError("RuleConfigError", `${label} has an invalid pattern`, {
      detail: `${rule.pattern}: ${errorMessage(error)}`,
      cause: error,
    });
  }

  // A pattern that matches "" would splice the replacement between every character.
  if (new RegExp(rule.pattern, "u").test("")) {
    throw new ConversionError("RuleConfigError", `${label} matches the empty string`, {
      detail: rule.pattern,
    });
  }

  const groups = captureGroupCount(rule.pattern);
  const missing = referencedGroups(rule.replacement).find((group) => group > groups);
  if (missing !== undefined) {
    throw new ConversionError("RuleConfigError", `${label} references capture group $${missing}`, {
      detail: `pattern ${rule.pattern} has ${groups} capture group(s)`,
    });
  }

  return Object.freeze({ ...rule, regex });
};

/** Validates and freezes a rule list. Fails on the first malformed rule. */
export const compileRules = (rules: readonly RewriteRule[]): RuleSet =>
  Object.freeze(rules.map((rule, index) => compileRule(rule, index)));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const expandReplacement = (template: string, match: string, captures: unknown[], named: unknown) =>
  template.replace(/\$(?:(\$)|(&)|<([^>]*)>|([1-9]))/g, (_token: string, dollar?: string, whole?: string, name?: string, index?: string) => {
    if (dollar) return "$";
    if (whole) return match;
    if (name !== undefined) {
      const value = isRecord(named) ? named[name] : undefined;
      return typeof value === "string" ? value : "";
    }
    const value = captures[Number(index) - 1];
    return typeof value === "string" ? value : "";
  });

/** Replacer that leaves zero-width matches alone, so lookarounds and `\b` never splice text in. */
const replacerFor =
  (template: string) =>
  (match: string, ...args: unknown[]) => {
    if (match === "") return match;
    const named = isRecord(args[args.length - 1]) ? args[args.length - 1] : undefined;
    const captures = args.slice(0, args.length - (named === undefined ? 2 : 3));
    return expandReplacement(template, match, captures, named);
  };

export const applyRules = (text: string, rules: RuleSet): string =>
  rules.reduce((current, rule) => current.replace(rule.regex, replacerFor(rule.replacement)), text);

/** The hook handed to the conversion engine; the mode tag is never touched. */
export const createMathFilter =
  (rules: RuleSet): MathHook =>
  (text) =>
    applyRules(text, rules);
