import { describe, expect, it, vi } from "vitest";
import { ConversionJob, type ConversionJobInit } from "../src/convert/job";
import type { RenderedDocument } from "../src/convert/types";
import { PandocEngine } from "../src/engine/pandoc";
import type { ConversionEngine } from "../src/engine/types";
import { compileRules } from "../src/filter/rules";
import { FakePandoc, type FakePandocOptions } from "./helpers/fake-pandoc";

const rules = compileRules([{ pattern: String.raw`\\kern\s+\d+pt`, replacement: String.raw`\qquad` }]);

const recordingSink = (write: (document: RenderedDocument) => Promise<void> = async () => {}) => ({
  name: "memory",
  write: vi.fn(write),
});

const makeJob = (init: Partial<ConversionJobInit> = {}, fakeOptions: FakePandocOptions = {}) => {
  const sink = init.sink ?? recordingSink();
  const engine = new PandocEngine({ run: new FakePandoc(fakeOptions).run, env: {} });
  const job = new ConversionJob({
    source: "# Notes",
    target: "word",
    ruleSet: rules,
    options: { engine },
    sink,
    ...init,
  });
  return { job, sink };
};

describe("ConversionJob", () => {
  it("converts, delivers and ends in succeeded", async () => {
    const sink = recordingSink();
    const { job } = makeJob({ sink });
    expect(job.state).toBe("idle");

    const running = job.run();
    expect(job.state).toBe("converting");
    const result = await running;

    expect(job.state).toBe("succeeded");
    expect(result.ok).toBe(true);
    expect(job.result).toBe(result);
    expect(sink.write).toHaveBeenCalledTimes(1);
    expect(sink.write.mock.calls[0][0]).toMatchObject({ format: "word", extension: "docx" });
  });

  it("runs only once", async () => {
    const { job } = makeJob();
    await job.run();
    await expect(job.run()).rejects.toThrow("Conversion job already succeeded");
  });

  it("does not touch the sink when the engine is missing", async () => {
    const sink = recordingSink();
    const { job } = makeJob({ sink }, { missing: true });

    const result = await job.run();

    expect(job.state).toBe("failed");
    expect(result.ok ? null : result.error.kind).toBe("ExternalEngineMissing");
    expect(sink.write).not.toHaveBeenCalled();
  });

  it("does not touch the sink for an Excel target without a table", async () => {
    const sink = recordingSink();
    const { job } = makeJob({ sink, target: "excel-table", source: "no table" });

    const result = await job.run();

    expect(result.ok ? null : result.error.kind).toBe("UnsupportedTargetContent");
    expect(sink.write).not.toHaveBeenCalled();
  });

  it("reports a failed delivery with the document attached", async () => {
    const sink = recordingSink(async () => {
      throw new Error("disk full");
    });
    const { job } = makeJob({ sink });

    const result = await job.run();

    expect(job.state).toBe("failed");
    if (result.ok) throw new Error("Expected a failure");
    expect(result.error.kind).toBe("SinkWriteFailure");
    expect(result.error.message).toBe("Could not deliver the word output");
    expect(result.error.detail).toBe("disk full");
    expect(result.document?.format).toBe("word");
  });

  it("does not deliver after a cancel", async () => {
    const controller = new AbortController();
    const engine: ConversionEngine = {
      name: "stub",
      probe: async () => ({ name: "stub", version: "1", path: "stub" }),
      render: async () => {
        controller.abort();
        return Buffer.from("<p>x</p>");
      },
    };
    const sink = recordingSink();
    const job = new ConversionJob({
      source: "x",
      target: "html-rich-text",
      ruleSet: rules,
      options: { engine, signal: controller.signal },
      sink,
    });

    const result = await job.run();

    expect(result.ok ? null : result.error.kind).toBe("Cancelled");
    expect(sink.write).not.toHaveBeenCalled();
  });
});
