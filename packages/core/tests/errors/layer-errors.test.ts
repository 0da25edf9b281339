import { describe, it, expect } from "vitest";
import {
  AutolayerError,
  InvalidTemplateError,
  MissingRuntimeError,
  UnsupportedRuntimeError,
} from "../../src/errors/layer-errors";

describe("MissingRuntimeError", () => {
  it("should name the function and extend AutolayerError", () => {
    const error = new MissingRuntimeError("Fn1");

    expect(error).toBeInstanceOf(AutolayerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("MissingRuntimeError");
    expect(error.functionId).toBe("Fn1");
    expect(error.message).toBe(
      'Function "Fn1" has no runtime defined; cannot build its dependency layer',
    );
  });
});

describe("UnsupportedRuntimeError", () => {
  it("should carry the runtime", () => {
    const error = new UnsupportedRuntimeError("ruby3.2");

    expect(error.name).toBe("UnsupportedRuntimeError");
    expect(error.runtime).toBe("ruby3.2");
  });
});

describe("InvalidTemplateError", () => {
  it("should keep the message", () => {
    const error = new InvalidTemplateError("bad template");

    expect(error).toBeInstanceOf(AutolayerError);
    expect(error.name).toBe("InvalidTemplateError");
    expect(error.message).toBe("bad template");
  });
});
