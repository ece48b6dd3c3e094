import JSZip from "jszip";
import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import type { Document as XmlDoc, Element as XmlEl, Node as XmlNode } from "@xmldom/xmldom";
import { ConversionError, errorMessage } from "../errors";
import { createLogger } from "../logger";

const logger = createLogger("docx");

export const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

/** Body paragraph styles pandoc's docx writer emits. */
const BODY_STYLES = new Set(["FirstParagraph", "BodyText", "Compact"]);

/** w:pPr children the schema places after w:ind. */
const AFTER_IND = new Set([
  "contextualSpacing",
  "mirrorIndents",
  "suppressOverlap",
  "jc",
  "textDirection",
  "textAlignment",
  "textboxTightWrap",
  "outlineLvl",
  "divId",
  "cnfStyle",
  "rPr",
  "sectPr",
  "pPrChange",
]);

/* -------------------------------- XML utils -------------------------------- */

const tagLocal = (name: string) => (name.includes(":") ? name.split(":")[1] : name);

const isElement = (node: XmlNode): node is XmlEl => node.nodeType === 1;

const childElements = (el: XmlEl) => {
  const out: XmlEl[] = [];
  for (let node = el.firstChild; node; node = node.nextSibling) {
    if (isElement(node)) out.push(node);
  }
  return out;
};

const firstChild = (el: XmlEl, local: string) =>
  childElements(el).find((child) => tagLocal(child.tagName) === local) ?? null;

const clearFirstLineIndent = (doc: XmlDoc, pPr: XmlEl) => {
  let ind = firstChild(pPr, "ind");
  if (!ind) {
    ind = doc.createElementNS(W_NS, "w:ind");
    const before = childElements(pPr).find((child) => AFTER_IND.has(tagLocal(child.tagName)));
    pPr.insertBefore(ind, before ?? null);
  }
  ind.setAttributeNS(W_NS, "w:firstLine", "0");
  ind.setAttributeNS(W_NS, "w:firstLineChars", "0");
  ind.removeAttributeNS(W_NS, "hanging");
  ind.removeAttributeNS(W_NS, "hangingChars");
};

/* ---------------------------- DOCX patch (indent) --------------------------- */

/**
 * Pins an explicit zero first-line indent on every body paragraph so that,
 * once pasted, paragraphs do not inherit the indent of the destination
 * document's Normal style.
 */
export const disableFirstParagraphIndent = async (fileBuffer: Buffer): Promise<Buffer> => {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(fileBuffer);
  } catch (error) {
    throw new ConversionError("ParseFailure", "Pandoc produced an unreadable DOCX package", {
      detail: errorMessage(error),
      cause: error,
    });
  }

  const documentXml = zip.file("word/document.xml");
  if (!documentXml) return fileBuffer;

  const doc = new DOMParser().parseFromString(await documentXml.async("string"), "text/xml");
  const paragraphs = doc.getElementsByTagNameNS(W_NS, "p");
  let patched = 0;

  for (let i = 0; i < paragraphs.length; i += 1) {
    const paragraph = paragraphs.item(i);
    const pPr = paragraph && firstChild(paragraph, "pPr");
    if (!pPr) continue;

    const style = firstChild(pPr, "pStyle")?.getAttributeNS(W_NS, "val");
    if (!style || !BODY_STYLES.has(style)) continue;

    clearFirstLineIndent(doc, pPr);
    patched += 1;
  }

  if (!patched) return fileBuffer;
  logger.debug(`Cleared first-line indent on ${patched} paragraph(s)`);

  zip.file("word/document.xml", new XMLSerializer().serializeToString(doc));
  return zip.generateAsync({ type: "nodebuffer" });
};
