import type { Logger } from "@autolayer/types";

export class NoopLogger implements Logger {
  debug(_message: string, _attributes?: Record<string, unknown>): void {}
  info(_message: string, _attributes?: Record<string, unknown>): void {}
  warn(_message: string, _attributes?: Record<string, unknown>): void {}
  error(_message: string, _attributes?: Record<string, unknown>): void {}

  child(_name: string, _attributes?: Record<string, unknown>): Logger {
    return this;
  }

  withContext(_attributes: Record<string, unknown>): Logger {
    return this;
  }
}

export const NOOP_LOGGER: Logger = new NoopLogger();
