export { readLoggerEnv } from "./env";
export type { LoggerConfig, LogFormat } from "./env";
export { PinoLogger, createLogger, useHumanFormat } from "./logger";
export { NoopLogger, NOOP_LOGGER } from "./noop";
