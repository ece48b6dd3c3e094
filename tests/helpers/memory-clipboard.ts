import type { ClipboardPayload, ClipboardWriter } from "../../src/sinks/clipboard";

/** Records clipboard writes; each write can be held open to observe ordering. */
export class MemoryClipboard implements ClipboardWriter {
  readonly writes: ClipboardPayload[] = [];
  readonly log: string[] = [];
  delayMs = 0;
  failNext: Error | null = null;

  async writeRich(payload: ClipboardPayload): Promise<void> {
    const label = payload.plainText;
    this.log.push(`start ${label}`);
    if (this.delayMs) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      this.log.push(`fail ${label}`);
      throw error;
    }
    this.writes.push(payload);
    this.log.push(`end ${label}`);
  }
}
