import type { ConversionResult } from "./convert/types";
import type { ConversionError, ConversionErrorKind } from "./errors";
import { FORMAT_PROFILES } from "./convert/formats";

export const APP_TITLE = "PasteMD";

export type NotificationLevel = "info" | "error";

export type Notification = {
  level: NotificationLevel;
  title: string;
  message: string;
  detail?: string;
};

export interface Notifier {
  notify(notification: Notification): void;
}

const GUIDANCE: Record<ConversionErrorKind, string> = {
  ExternalEngineMissing: "Install pandoc or set its path in the configuration.",
  ParseFailure: "Check the input for syntax the converter cannot read.",
  UnsupportedTargetContent: "Choose another target format for this content.",
  RuleConfigError: "Fix the rewrite rule file and try again.",
  SinkWriteFailure: "The document was converted but could not be delivered.",
  Cancelled: "",
  Timeout: "Try a smaller document or raise the timeout.",
};

export const describeFailure = (error: ConversionError): Notification => {
  const guidance = GUIDANCE[error.kind];
  return {
    level: "error",
    title: APP_TITLE,
    message: guidance ? `${error.message}. ${guidance}` : error.message,
    detail: error.detail,
  };
};

export const describeResult = (result: ConversionResult): Notification =>
  result.ok
    ? {
        level: "info",
        title: APP_TITLE,
        message: `Converted to ${FORMAT_PROFILES[result.document.format].label}`,
      }
    : describeFailure(result.error);

export class ConsoleNotifier implements Notifier {
  constructor(private readonly enabled = true) {}

  notify({ level, title, message, detail }: Notification) {
    if (!this.enabled) return;
    const line = `${title}: ${message}`;
    if (level === "error") {
      console.error(detail ? `${line}\n  ${detail}` : line);
    } else {
      console.error(line);
    }
  }
}
