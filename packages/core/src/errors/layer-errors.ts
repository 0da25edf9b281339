export class AutolayerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AutolayerError";
  }
}

/**
 * A function selected for extraction has no runtime, so its layer folder
 * layout cannot be chosen. Aborts the run.
 */
export class MissingRuntimeError extends AutolayerError {
  constructor(public readonly functionId: string) {
    super(`Function "${functionId}" has no runtime defined; cannot build its dependency layer`);
    this.name = "MissingRuntimeError";
  }
}

export class UnsupportedRuntimeError extends AutolayerError {
  constructor(public readonly runtime: string) {
    super(`Runtime "${runtime}" has no dependency layer layout`);
    this.name = "UnsupportedRuntimeError";
  }
}

export class InvalidTemplateError extends AutolayerError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTemplateError";
  }
}
