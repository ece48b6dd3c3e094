import type { Writable } from "node:stream";
import type { RenderedDocument } from "../convert/types";
import type { OutputSink } from "./types";

export class StreamSink implements OutputSink {
  readonly name = "stream";

  constructor(private readonly stream: Writable) {}

  write(document: RenderedDocument): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(document.data, (error) => (error ? reject(error) : resolve()));
    });
  }
}
