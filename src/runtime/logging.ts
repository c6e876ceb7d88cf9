import { createWriteStream, existsSync, mkdirSync, type WriteStream } from "fs";
import path from "path";
import type { LogMeta, LoggerPort } from "../ports/sys/LoggerPort";
import { ConsoleLogger, formatMessage, type LogLevel } from "../adapters/sys/ConsoleLogger";
import { describeError } from "../shared/errors";

export interface LoggingOptions {
  /** File every log line is appended to. Omit to keep logs in memory only. */
  logFile?: string;
  /** Mirror log lines to the console (debug mode). */
  echo?: boolean;
  now?: () => Date;
}

export interface LoggingHandle {
  readonly logPath?: string;
  readonly echoEnabled: boolean;
  forScope(scope: string): LoggerPort;
  setEcho(enabled: boolean): void;
  shutdown(): Promise<void>;
}

export function formatLogLine(
  timestamp: Date,
  level: LogLevel,
  scope: string,
  message: string,
  meta?: LogMeta
): string {
  return `[${timestamp.toISOString()}] ${level.toUpperCase()} [${scope}] ${formatMessage(message, meta)}`;
}

/**
 * Builds the logging context for one session. Created once at startup and
 * handed to every component; `shutdown` writes the closing banner and
 * closes the file.
 */
export function initializeLogging(options: LoggingOptions = {}): LoggingHandle {
  const now = options.now ?? (() => new Date());
  let echo = Boolean(options.echo);
  let stream: WriteStream | null = null;
  let closed = false;
  let resolvedLog: string | undefined;

  if (options.logFile) {
    resolvedLog = path.resolve(options.logFile);
    const logDir = path.dirname(resolvedLog);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    const logPath = resolvedLog;
    stream = createWriteStream(logPath, { flags: "a" });
    // An unwritable log file turns file output off instead of crashing the session.
    stream.on("error", (err) => {
      if (!stream) return;
      stream = null;
      console.warn(`Cannot write log file ${logPath}, file logging disabled: ${describeError(err)}`);
    });
    stream.write(`[${now().toISOString()}] --- session started ---\n`);
  }

  const consoles = new Map<string, ConsoleLogger>();
  const consoleFor = (scope: string) => {
    let logger = consoles.get(scope);
    if (!logger) {
      logger = new ConsoleLogger(scope);
      consoles.set(scope, logger);
    }
    return logger;
  };

  const emit = (scope: string, level: LogLevel, message: string, meta?: LogMeta) => {
    if (stream && !closed) {
      stream.write(`${formatLogLine(now(), level, scope, message, meta)}\n`);
    }
    if (echo) {
      consoleFor(scope)[level](message, meta);
    }
  };

  return {
    logPath: resolvedLog,
    get echoEnabled() {
      return echo;
    },
    forScope(scope: string): LoggerPort {
      return {
        debug: (message, meta) => emit(scope, "debug", message, meta),
        info: (message, meta) => emit(scope, "info", message, meta),
        warn: (message, meta) => emit(scope, "warn", message, meta),
        error: (message, meta) => emit(scope, "error", message, meta),
      };
    },
    setEcho(enabled: boolean) {
      echo = enabled;
    },
    shutdown(): Promise<void> {
      const current = stream;
      if (!current || closed) {
        closed = true;
        return Promise.resolve();
      }
      closed = true;
      current.write(`[${now().toISOString()}] --- session ended ---\n`);
      return new Promise<void>((resolve, reject) => {
        current.once("error", reject);
        current.end(() => resolve());
      });
    },
  };
}
