import pino from "pino";
import type { Logger, LogLevel } from "@autolayer/types";
import type { LoggerConfig } from "./env";

const STDERR_FD = 2;

/**
 * Thin pino wrapper implementing Logger.
 * Every method delegates directly to the underlying pino instance.
 */
export class PinoLogger implements Logger {
  constructor(private pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child(attributes));
  }
}

/**
 * Resolves the "auto" log format: human-readable output when stderr is an
 * interactive terminal, JSON lines otherwise.
 */
export function useHumanFormat(config: LoggerConfig, isTTY: boolean): boolean {
  return config.logFormat === "human" || (config.logFormat === "auto" && isTTY);
}

export function createLogger(config: LoggerConfig): PinoLogger {
  const streams: pino.StreamEntry[] = [];

  // stdout is reserved for the patched template
  if (useHumanFormat(config, process.stderr.isTTY === true)) {
    streams.push({
      level: config.logLevel,
      stream: pino.transport({ target: "pino-pretty", options: { destination: STDERR_FD } }),
    });
  } else {
    streams.push({ level: config.logLevel, stream: pino.destination(STDERR_FD) });
  }

  // Opened synchronously so that the file exists and holds every record when the run ends
  if (config.logFilePath) {
    streams.push({
      level: config.logLevel,
      stream: pino.destination({ dest: config.logFilePath, sync: true, mkdir: true }),
    });
  }

  const logger = pino(
    {
      level: config.logLevel,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return new PinoLogger(logger);
}
