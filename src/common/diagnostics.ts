import { type Logger, commonLogger } from "./logger";
import messages from "./messages.json";
import { DIAGNOSTICS } from "./metrics";

export type DiagnosticKey = keyof typeof messages;
export type DiagnosticLevel = "warning" | "info";

export interface Diagnostic {
  level: DiagnosticLevel;
  key: DiagnosticKey;
  values: string[];
  message: string;
}

/**
 * Replaces `%1$s`, `%2$s`, ... with the positional values
 */
export function formatMessage(key: DiagnosticKey, values: readonly string[]): string {
  return messages[key].replace(/%(\d+)\$s/g, (match, position: string) => {
    return values[Number(position) - 1] ?? match;
  });
}

/**
 * Collects recoverable problems found while generating a project. Each problem is logged when
 * it is reported and kept so callers can summarize or assert on them afterwards.
 */
export class Diagnostics {
  private items: Diagnostic[] = [];
  private logger: Logger;

  constructor(options?: { logger?: Logger }) {
    this.logger = options?.logger ?? commonLogger;
  }

  warning(key: DiagnosticKey, ...values: string[]): void {
    this.add("warning", key, values);
  }

  info(key: DiagnosticKey, ...values: string[]): void {
    this.add("info", key, values);
  }

  get all(): readonly Diagnostic[] {
    return this.items;
  }

  get warnings(): Diagnostic[] {
    return this.items.filter((item) => item.level === "warning");
  }

  withKey(key: DiagnosticKey): Diagnostic[] {
    return this.items.filter((item) => item.key === key);
  }

  private add(level: DiagnosticLevel, key: DiagnosticKey, values: string[]): void {
    const message = formatMessage(key, values);
    this.items.push({ level, key, values, message });
    DIAGNOSTICS.labels(level, key).inc();
    if (level === "warning") {
      this.logger.warn(message, { key, values });
    } else {
      this.logger.log(message, { key, values });
    }
  }
}
