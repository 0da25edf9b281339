import type { LogLevel } from "@autolayer/types";

export type LogFormat = "json" | "human" | "auto";

export type LoggerConfig = {
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
};

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

const LOG_FORMATS: Record<string, LogFormat> = {
  json: "json",
  human: "human",
  auto: "auto",
};

export function readLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const rawLevel = env.AUTOLAYER_LOG_LEVEL?.toLowerCase() ?? "";
  const rawFormat = env.AUTOLAYER_LOG_FORMAT?.toLowerCase() ?? "";

  return {
    logLevel: LOG_LEVELS[rawLevel] ?? "info",
    logFormat: LOG_FORMATS[rawFormat] ?? "auto",
    logFilePath: env.AUTOLAYER_LOG_FILE_PATH || null,
  };
}
