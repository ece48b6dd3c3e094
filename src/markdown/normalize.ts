export const stripZeroWidth = (value: string) =>
  value.replace(/[\u200B\u200C\u200D\u2060\uFEFF\u00AD\u202A-\u202E\u2066-\u2069]/g, "");

export const normalizeLineEndings = (value: string) => value.replace(/\r\n?/g, "\n");

const FENCE = /^\s{0,3}(`{3,}|~{3,})/;

/** Applies `fn` to the text between fenced code blocks; fenced lines pass through as-is. */
export const mapOutsideFences = (text: string, fn: (chunk: string) => string) => {
  const out: string[] = [];
  let buffer: string[] = [];
  let fence: string | null = null;

  const flush = () => {
    if (buffer.length) out.push(fn(buffer.join("\n")));
    buffer = [];
  };

  for (const line of text.split("\n")) {
    const match = line.match(FENCE);
    if (fence === null) {
      if (match) {
        flush();
        fence = match[1];
        out.push(line);
      } else {
        buffer.push(line);
      }
      continue;
    }
    out.push(line);
    if (match && match[1][0] === fence[0] && match[1].length >= fence.length) fence = null;
  }
  flush();

  return out.join("\n");
};

const CODE_SPAN = /(`+)(?!`)[\s\S]*?(?<!`)\1(?!`)/g;

/** Applies `fn` to the text around backtick code spans; the spans pass through as-is. */
export const mapOutsideCodeSpans = (text: string, fn: (chunk: string) => string) => {
  const pattern = new RegExp(CODE_SPAN.source, "g");
  let out = "";
  let last = 0;
  for (let match = pattern.exec(text); match; match = pattern.exec(text)) {
    out += fn(text.slice(last, match.index)) + match[0];
    last = match.index + match[0].length;
  }
  return out + fn(text.slice(last));
};

/**
 * Bracket delimiters to dollar delimiters:
 *
 * - `\[ … \]` → `$$ … $$` (display math, may span lines)
 * - `\( … \)` → `$…$` (inline math, trimmed: pandoc rejects `$ x $`)
 */
export const normalizeLatexDelimiters = (text: string) =>
  text
    .replace(/\\\[([\s\S]*?)\\\]/g, (_m, inner: string) => `$$${inner}$$`)
    .replace(/\\\(([\s\S]*?)\\\)/g, (_m, inner: string) => `$${inner.trim()}$`);

export const normalizeMarkdown = (markdown: string) =>
  mapOutsideFences(stripZeroWidth(normalizeLineEndings(markdown)), (chunk) =>
    mapOutsideCodeSpans(chunk, normalizeLatexDelimiters),
  );
