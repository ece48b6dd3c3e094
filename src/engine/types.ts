export type MathMode = "inline" | "display";

/** Rewrites the source of one math node. Must be pure: it may run on any node, in any order. */
export type MathHook = (text: string, mode: MathMode) => string;

export type EngineWriter = "docx" | "html";

export type InputFormat = "markdown" | "html";

export interface EngineInfo {
  name: string;
  version: string;
  path: string;
}

export interface RenderRequest {
  source: string;
  /** Defaults to Markdown. */
  inputFormat?: InputFormat;
  writer: EngineWriter;
  /** Applied in order to every inline and display math node. */
  mathHooks: readonly MathHook[];
  /** Re-emit math as its literal TeX source instead of native equations. */
  literalMath?: boolean;
  referenceDoc?: string;
  signal?: AbortSignal;
}

export interface ConversionEngine {
  readonly name: string;
  /** Throws a ConversionError of kind ExternalEngineMissing when the engine is unusable. */
  probe(signal?: AbortSignal): Promise<EngineInfo>;
  render(request: RenderRequest): Promise<Buffer>;
}
