import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import { convert, type ConvertOptions } from "../src/convert/convert";
import type { ConversionResult, RenderedDocument } from "../src/convert/types";
import { PandocEngine } from "../src/engine/pandoc";
import { collectMath } from "../src/engine/pandoc-ast";
import { loadDefaultRules } from "../src/filter/rule-file";
import { DOCX_MIME } from "../src/postprocess/docx";
import { FakePandoc, mathNode, pandocDocument, para, type FakePandocOptions } from "./helpers/fake-pandoc";

const rules = await loadDefaultRules();

const kernAst = pandocDocument(
  para(mathNode(String.raw`a \kern 10pt b`)),
  para(mathNode(String.raw`{\kern 5pt}`, "display")),
);

const setup = (fakeOptions: FakePandocOptions = {}, options: Omit<ConvertOptions, "engine"> = {}) => {
  const fake = new FakePandoc({ ast: kernAst, ...fakeOptions });
  const engine = new PandocEngine({ run: fake.run, env: {} });
  return { fake, options: { engine, ...options } };
};

const documentOf = (result: ConversionResult): RenderedDocument => {
  if (!result.ok) throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  return result.document;
};

const errorOf = (result: ConversionResult) => {
  if (result.ok) throw new Error("Expected a failure");
  return result.error;
};

const documentXml = async (data: Buffer) => {
  const zip = await JSZip.loadAsync(data);
  return (await zip.file("word/document.xml")?.async("string")) ?? "";
};

const markdown = String.raw`Spacing $a \kern 10pt b$`;

describe("convert to Word", () => {
  it("corrects math before the writer runs", async () => {
    const { fake, options } = setup();
    const doc = documentOf(await convert(markdown, "word", rules, options));

    expect(doc.format).toBe("word");
    expect(doc.mimeType).toBe(DOCX_MIME);
    expect(doc.extension).toBe("docx");
    expect(doc.plainText).toBe(markdown);

    const xml = await documentXml(doc.data);
    expect(xml).toContain(String.raw`a \qquad b`);
    expect(xml).not.toContain(String.raw`\kern`);
    expect(collectMath(fake.written ?? pandocDocument()).map((math) => [math.mode, math.text])).toEqual([
      ["inline", String.raw`a \qquad b`],
      ["display", String.raw`\qquad`],
    ]);
  });

  it("clears the first-line indent unless disabled", async () => {
    const patched = documentOf(await convert(markdown, "word", rules, setup().options));
    expect(await documentXml(patched.data)).toContain('w:firstLine="0"');

    const untouched = documentOf(
      await convert(markdown, "word", rules, setup({}, { disableFirstParagraphIndent: false }).options),
    );
    expect(await documentXml(untouched.data)).not.toContain("w:firstLine");
  });

  it("skips the rules when replacements are disabled", async () => {
    const { fake, options } = setup({}, { latexReplacements: false });
    documentOf(await convert(markdown, "word", rules, options));
    expect(collectMath(fake.written ?? pandocDocument())[0].text).toBe(String.raw`a \kern 10pt b`);
  });

  it("keeps formulas as literal TeX when asked to", async () => {
    const { fake, options } = setup({}, { keepOriginalFormula: true });
    documentOf(await convert(markdown, "word", rules, options));
    expect(fake.written?.blocks).toEqual([
      para({ t: "Str", c: String.raw`$a \qquad b$` }),
      para({ t: "Str", c: String.raw`$$\qquad$$` }),
    ]);
  });

  it("passes the reference document and the normalised Markdown", async () => {
    const { fake, options } = setup({}, { referenceDocx: "/styles/ref.docx" });
    documentOf(await convert(String.raw`\(x\)`, "word", rules, options));

    expect(fake.commandLines[0]).toBe("--version");
    expect(fake.calls[1].input).toBe("$x$");
    expect(fake.commandLines[2]).toBe("-f json -t docx -o - --reference-doc /styles/ref.docx");
  });
});

describe("convert to HTML rich text", () => {
  it("returns the writer's fragment with the Markdown as fallback", async () => {
    const { fake, options } = setup({ html: () => "<p>done</p>" }, { referenceDocx: "/styles/ref.docx" });
    const doc = documentOf(await convert("# Title", "html-rich-text", rules, options));

    expect(doc.mimeType).toBe("text/html");
    expect(doc.extension).toBe("html");
    expect(doc.data.toString("utf8")).toBe("<p>done</p>");
    expect(doc.plainText).toBe("# Title");
    expect(fake.commandLines[2]).toBe("-f json -t html -o - --mathml");
  });
});

describe("convert to an Excel table", () => {
  const table = ["| x | y |", "|---|---|", "| 1 | 2 |"].join("\n");
  const tableHtml = "<h2>t</h2><table><tr><th>x</th><th>y</th></tr><tr><td>1</td><td>2</td></tr></table>";

  it("keeps only the tables", async () => {
    const { options } = setup({ html: () => tableHtml });
    const doc = documentOf(await convert(table, "excel-table", rules, options));

    expect(doc.format).toBe("excel-table");
    expect(doc.data.toString("utf8")).toBe(
      "<table><tr><th>x</th><th>y</th></tr><tr><td>1</td><td>2</td></tr></table>",
    );
    expect(doc.plainText).toBe("x\ty\n1\t2");
  });

  it("fails before the engine runs when there is no table", async () => {
    const { fake, options } = setup();
    const error = errorOf(await convert("just $x$ text", "excel-table", rules, options));

    expect(error.kind).toBe("UnsupportedTargetContent");
    expect(error.message).toBe("No Markdown table found to paste into Excel");
    expect(fake.calls).toEqual([]);
  });

  it("fails when the target is disabled", async () => {
    const { fake, options } = setup({}, { enableExcel: false });
    const error = errorOf(await convert(table, "excel-table", rules, options));

    expect(error.kind).toBe("UnsupportedTargetContent");
    expect(error.message).toBe("Excel table conversion is disabled");
    expect(fake.calls).toEqual([]);
  });

  it("fails when the rendered HTML has no table", async () => {
    const { options } = setup({ html: () => "<p>1 | 2</p>" });
    const error = errorOf(await convert(table, "excel-table", rules, options));

    expect(error.kind).toBe("UnsupportedTargetContent");
    expect(error.message).toBe("The converted document contains no table");
  });
});

describe("convert from HTML", () => {
  const html = "<p><s>old</s> text</p>";

  it("reads HTML and falls back to its text", async () => {
    const { fake, options } = setup({}, { inputFormat: "html" });
    const doc = documentOf(await convert(html, "word", rules, options));

    expect(fake.commandLines[1]).toBe("-f html -t json");
    expect(fake.calls[1].input).toBe("<p><del>old</del> text</p>");
    expect(doc.plainText).toBe("old text");
    expect(await documentXml(doc.data)).toContain('w:firstLine="0"');
  });

  it("keeps strikethrough tags when the rewrite is off", async () => {
    const { fake, options } = setup({}, { inputFormat: "html", strikethroughToDel: false });
    documentOf(await convert(html, "html-rich-text", rules, options));
    expect(fake.calls[1].input).toBe(html);
  });

  it("uses its own first-line indent switch", async () => {
    const markdownOff = setup({}, { inputFormat: "html", disableFirstParagraphIndent: false }).options;
    const patched = documentOf(await convert(html, "word", rules, markdownOff));
    expect(await documentXml(patched.data)).toContain('w:firstLine="0"');

    const htmlOff = setup({}, { inputFormat: "html", htmlDisableFirstParagraphIndent: false }).options;
    const untouched = documentOf(await convert(html, "word", rules, htmlOff));
    expect(await documentXml(untouched.data)).not.toContain("w:firstLine");
  });

  it("needs a table for the Excel target", async () => {
    const { fake, options } = setup({}, { inputFormat: "html" });
    const error = errorOf(await convert(html, "excel-table", rules, options));

    expect(error.kind).toBe("UnsupportedTargetContent");
    expect(error.message).toBe("No table found in the HTML input");
    expect(fake.calls).toEqual([]);
  });

  it("drops cell formatting for Excel when asked to", async () => {
    const rendered = '<table class="t"><tr><td><strong>1</strong></td></tr></table>';
    const { options } = setup({ html: () => rendered }, { inputFormat: "html", excelKeepFormat: false });
    const doc = documentOf(await convert("<table><tr><td>1</td></tr></table>", "excel-table", rules, options));

    expect(doc.data.toString("utf8")).toBe("<table><tr><td>1</td></tr></table>");
    expect(doc.plainText).toBe("1");
  });
});

describe("convert failures", () => {
  it("reports a missing engine", async () => {
    const { options } = setup({ missing: true });
    const error = errorOf(await convert(markdown, "word", rules, options));
    expect(error.kind).toBe("ExternalEngineMissing");
  });

  it("reports a parse failure", async () => {
    const { options } = setup({ parseFailure: { code: 1, stderr: "bad input" } });
    const error = errorOf(await convert(markdown, "html-rich-text", rules, options));
    expect(error.kind).toBe("ParseFailure");
    expect(error.detail).toBe("bad input");
  });

  it("reports a cancel", async () => {
    const { fake, options } = setup({}, { signal: AbortSignal.abort() });
    const error = errorOf(await convert(markdown, "word", rules, options));
    expect(error.kind).toBe("Cancelled");
    expect(fake.commandLines).toEqual(["--version"]);
  });

  it("reports a timeout", async () => {
    const { options } = setup({ hang: true }, { timeoutMs: 20 });
    const error = errorOf(await convert(markdown, "word", rules, options));
    expect(error.kind).toBe("Timeout");
    expect(error.message).toBe("Conversion timed out");
  });
});
