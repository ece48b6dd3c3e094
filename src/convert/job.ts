import { ConversionError, errorMessage } from "../errors";
import type { RuleSet } from "../filter/rules";
import { createLogger } from "../logger";
import type { OutputSink } from "../sinks/types";
import { convert, type ConvertOptions } from "./convert";
import type { TargetFormat } from "./formats";
import type { ConversionResult } from "./types";

const logger = createLogger("job");

export type JobState = "idle" | "converting" | "succeeded" | "failed";

export type ConversionJobInit = {
  /** Markdown, or HTML when `options.inputFormat` says so. */
  source: string;
  target: TargetFormat;
  ruleSet: RuleSet;
  options: ConvertOptions;
  sink: OutputSink;
};

/**
 * One user action: convert once, deliver on success. States move
 * idle → converting → succeeded | failed and never go back.
 */
export class ConversionJob {
  private current: JobState = "idle";
  private outcome: ConversionResult | null = null;

  constructor(private readonly init: ConversionJobInit) {}

  get state(): JobState {
    return this.current;
  }

  get result(): ConversionResult | null {
    return this.outcome;
  }

  async run(): Promise<ConversionResult> {
    if (this.current !== "idle") {
      throw new Error(`Conversion job already ${this.current}`);
    }
    this.current = "converting";

    const { source, target, ruleSet, options, sink } = this.init;
    const converted = await convert(source, target, ruleSet, options);
    if (!converted.ok) return this.finish(converted);

    const { document } = converted;
    // A cancel that lands after rendering still wins over delivery.
    if (options.signal?.aborted) {
      return this.finish({
        ok: false,
        error: new ConversionError("Cancelled", "Conversion was cancelled", {
          cause: options.signal.reason,
        }),
      });
    }

    try {
      await sink.write(document);
    } catch (error) {
      logger.error(`Writing ${target} output to ${sink.name} failed`, error);
      return this.finish({
        ok: false,
        error: new ConversionError("SinkWriteFailure", `Could not deliver the ${target} output`, {
          detail: errorMessage(error),
          cause: error,
        }),
        document,
      });
    }

    return this.finish(converted);
  }

  private finish(result: ConversionResult): ConversionResult {
    this.current = result.ok ? "succeeded" : "failed";
    this.outcome = result;
    return result;
  }
}
