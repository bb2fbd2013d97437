import type { LogLevel, SimLogger } from "@polity/schemas";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function sanitizeName(name: string): string {
  // Strip control chars so agent names from config cannot forge log lines
  // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
  return name.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
}

export class ConsoleLogger implements SimLogger {
  private prefix: string;
  private level: LogLevel;
  private threshold: number;

  constructor(component: string, level: LogLevel = "info", parentPrefix = "") {
    this.prefix = `${parentPrefix}[${sanitizeName(component)}]`;
    this.level = level;
    this.threshold = LEVEL_ORDER[level];
  }

  child(component: string): ConsoleLogger {
    return new ConsoleLogger(component, this.level, this.prefix);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

/** Discards everything. For library callers that want a quiet engine. */
export const silentLogger: SimLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
