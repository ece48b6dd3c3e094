export const CONVERSION_ERROR_KINDS = [
  "ExternalEngineMissing",
  "ParseFailure",
  "UnsupportedTargetContent",
  "RuleConfigError",
  "SinkWriteFailure",
  "Cancelled",
  "Timeout",
] as const;

export type ConversionErrorKind = (typeof CONVERSION_ERROR_KINDS)[number];

type ConversionErrorOptions = { detail?: string; cause?: unknown };

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly detail?: string;

  constructor(kind: ConversionErrorKind, message: string, options: ConversionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ConversionError";
    this.kind = kind;
    this.detail = options.detail;
  }
}

export const isConversionError = (value: unknown): value is ConversionError =>
  value instanceof ConversionError;

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const errorName = (value: unknown) =>
  typeof value === "object" && value !== null && "name" in value && typeof value.name === "string"
    ? value.name
    : undefined;

export const isMissingBinaryError = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const abortKind = (reason: unknown): ConversionErrorKind =>
  errorName(reason) === "TimeoutError" ? "Timeout" : "Cancelled";

const abortError = (kind: ConversionErrorKind, cause: unknown, detail?: string) =>
  new ConversionError(kind, kind === "Timeout" ? "Conversion timed out" : "Conversion was cancelled", {
    detail,
    cause,
  });

/**
 * Maps anything thrown during a job to a ConversionError. When the job's
 * signal has fired, the abort reason decides between Timeout and Cancelled,
 * whatever the underlying process reported.
 */
export const toConversionError = (error: unknown, signal?: AbortSignal): ConversionError => {
  if (isConversionError(error)) return error;

  if (signal?.aborted) {
    return abortError(abortKind(signal.reason), error, errorMessage(error));
  }

  const name = errorName(error);
  if (name === "TimeoutError") return abortError("Timeout", error);
  if (name === "AbortError") {
    return abortError(abortKind(error instanceof Error ? error.cause : undefined), error);
  }

  if (isMissingBinaryError(error)) {
    return new ConversionError("ExternalEngineMissing", "Conversion engine not found", {
      detail: errorMessage(error),
      cause: error,
    });
  }

  return new ConversionError("ParseFailure", "Conversion failed", {
    detail: errorMessage(error),
    cause: error,
  });
};
