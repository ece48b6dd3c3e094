import type { RenderedDocument } from "../convert/types";

export interface OutputSink {
  readonly name: string;
  write(document: RenderedDocument): Promise<void>;
}
