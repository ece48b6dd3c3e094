import type { RenderedDocument } from "../convert/types";
import type { OutputSink } from "./types";

/** What the host clipboard receives: one rich flavour plus a plain-text fallback. */
export type ClipboardPayload = {
  mimeType: string;
  data: Buffer;
  plainText: string;
};

/** Host-provided port to the system clipboard. */
export interface ClipboardWriter {
  writeRich(payload: ClipboardPayload): Promise<void>;
}

// One queue per writer, shared by every sink that wraps it.
const queues = new WeakMap<ClipboardWriter, Promise<void>>();

export class ClipboardSink implements OutputSink {
  readonly name = "clipboard";

  constructor(private readonly writer: ClipboardWriter) {}

  write(document: RenderedDocument): Promise<void> {
    const payload: ClipboardPayload = {
      mimeType: document.mimeType,
      data: document.data,
      plainText: document.plainText,
    };
    const previous = queues.get(this.writer) ?? Promise.resolve();
    const next = previous.then(() => this.writer.writeRich(payload));
    // The queue continues past a failed write; the failure still reaches this caller.
    queues.set(
      this.writer,
      next.then(
        () => undefined,
        () => undefined,
      ),
    );
    return next;
  }
}
