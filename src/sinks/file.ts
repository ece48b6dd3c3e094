import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { RenderedDocument } from "../convert/types";
import { createLogger } from "../logger";
import type { OutputSink } from "./types";

const logger = createLogger("file-sink");

const pad = (value: number) => String(value).padStart(2, "0");

export const timestamp = (now: Date) =>
  `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
  `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

/** `<saveDir>/pastemd_YYYYMMDD_HHMMSS.<ext>`, local time. */
export const generateOutputPath = (saveDir: string, extension: string, now = new Date()) =>
  path.join(saveDir, `pastemd_${timestamp(now)}.${extension.replace(/^\./, "")}`);

/** Writes beside the target first and renames, so a failed write leaves no partial file. */
export class FileSink implements OutputSink {
  readonly name = "file";

  constructor(private readonly target: string | ((document: RenderedDocument) => string)) {}

  async write(document: RenderedDocument): Promise<void> {
    const target = typeof this.target === "string" ? this.target : this.target(document);
    const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${randomUUID()}.tmp`);

    await mkdir(path.dirname(target), { recursive: true });
    try {
      await writeFile(tmp, document.data);
      await rename(tmp, target);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
    logger.info(`Saved ${document.format} output to ${target}`);
  }
}

/** A FileSink that names each document by timestamp inside `saveDir`. */
export const createSaveDirSink = (saveDir: string, clock: () => Date = () => new Date()) =>
  new FileSink((document) => generateOutputPath(saveDir, document.extension, clock()));
