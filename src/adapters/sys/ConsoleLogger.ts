import type { LogMeta, LoggerPort } from "../../ports/sys/LoggerPort";

export type LogLevel = "debug" | "info" | "warn" | "error";

export function formatMessage(message: string, meta?: LogMeta): string {
  if (!meta || !Object.keys(meta).length) return message;
  try {
    return `${message} ${JSON.stringify(meta)}`;
  } catch {
    return `${message} ${String(meta)}`;
  }
}

function log(level: LogLevel, payload: string) {
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly prefix?: string) {}

  debug(message: string, meta?: LogMeta): void {
    log("debug", this.render(message, meta));
  }
  info(message: string, meta?: LogMeta): void {
    log("info", this.render(message, meta));
  }
  warn(message: string, meta?: LogMeta): void {
    log("warn", this.render(message, meta));
  }
  error(message: string, meta?: LogMeta): void {
    log("error", this.render(message, meta));
  }

  private render(message: string, meta?: LogMeta): string {
    const text = formatMessage(message, meta);
    return this.prefix ? `[${this.prefix}] ${text}` : text;
  }
}
