import type { ConversionError } from "../errors";
import type { TargetFormat } from "./formats";

export interface RenderedDocument {
  format: TargetFormat;
  mimeType: string;
  extension: string;
  data: Buffer;
  /** Plain-text flavour that accompanies the rich payload on the clipboard. */
  plainText: string;
}

export type ConversionResult =
  | { ok: true; document: RenderedDocument }
  | {
      ok: false;
      error: ConversionError;
      /** Set when conversion succeeded but delivery failed. */
      document?: RenderedDocument;
    };
