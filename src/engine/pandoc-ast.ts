/**
 * Minimal typing for pandoc's JSON AST and the math-node walk over it.
 *
 * Math elements look like `{ "t": "Math", "c": [{ "t": "InlineMath" }, "x^2"] }`
 * (or `DisplayMath`). Everything else is carried through untouched.
 */

import type { MathHook, MathMode } from "./types";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export interface PandocDocument {
  "pandoc-api-version": number[];
  meta: JsonObject;
  blocks: JsonValue[];
}

export type MathElement = { mode: MathMode; type: JsonObject; text: string };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isPandocDocument = (value: unknown): value is PandocDocument =>
  isObject(value) &&
  Array.isArray(value["pandoc-api-version"]) &&
  isObject(value.meta) &&
  Array.isArray(value.blocks);

const mathMode = (tag: JsonValue | undefined): MathMode | null => {
  if (tag === "InlineMath") return "inline";
  if (tag === "DisplayMath") return "display";
  return null;
};

export const readMath = (node: JsonObject): MathElement | null => {
  if (node.t !== "Math" || !Array.isArray(node.c) || node.c.length !== 2) return null;
  const [type, text] = node.c;
  if (!isObject(type) || typeof text !== "string") return null;
  const mode = mathMode(type.t);
  return mode ? { mode, type, text } : null;
};

type MathReplacer = (math: MathElement) => JsonObject;

const mapElements = (value: JsonValue, replace: MathReplacer): JsonValue => {
  if (Array.isArray(value)) return value.map((item) => mapElements(item, replace));
  if (!isObject(value)) return value;
  const math = readMath(value);
  if (math) return replace(math);
  return mapObject(value, replace);
};

const mapObject = (node: JsonObject, replace: MathReplacer): JsonObject => {
  const out: JsonObject = {};
  for (const [key, child] of Object.entries(node)) out[key] = mapElements(child, replace);
  return out;
};

const mapDocument = (doc: PandocDocument, replace: MathReplacer): PandocDocument => ({
  ...doc,
  meta: mapObject(doc.meta, replace),
  blocks: doc.blocks.map((block) => mapElements(block, replace)),
});

/** Runs every math payload through the hooks in order; the InlineMath/DisplayMath tag is kept. */
export const applyMathHooks = (doc: PandocDocument, hooks: readonly MathHook[]): PandocDocument => {
  if (!hooks.length) return doc;
  return mapDocument(doc, ({ mode, type, text }) => ({
    t: "Math",
    c: [type, hooks.reduce((current, hook) => hook(current, mode), text)],
  }));
};

/** Replaces each math node by its TeX source wrapped in dollar delimiters. */
export const literalizeMath = (doc: PandocDocument): PandocDocument =>
  mapDocument(doc, ({ mode, text }) => {
    const delimiter = mode === "display" ? "$$" : "$";
    return { t: "Str", c: `${delimiter}${text}${delimiter}` };
  });

export const collectMath = (value: JsonValue | PandocDocument): MathElement[] => {
  const found: MathElement[] = [];
  const visit = (node: JsonValue) => {
    if (Array.isArray(node)) {
      node.forEach(visit);
      return;
    }
    if (!isObject(node)) return;
    const math = readMath(node);
    if (math) {
      found.push(math);
      return;
    }
    Object.values(node).forEach(visit);
  };
  if (isPandocDocument(value)) {
    visit(value.meta);
    value.blocks.forEach(visit);
  } else {
    visit(value);
  }
  return found;
};
