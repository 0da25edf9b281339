import { describe, it, expect } from "vitest";
import { layerSubfolderFor, runtimeFamilyOf } from "../../src/runtime/layout";
import { UnsupportedRuntimeError } from "../../src/errors/layer-errors";

describe("runtimeFamilyOf", () => {
  it.each([
    ["python3.11", "python"],
    ["python3.9", "python"],
    ["nodejs20.x", "nodejs"],
    ["java21", "java"],
    ["java8.al2", "java"],
  ])("maps %s to the %s family", (runtime, family) => {
    expect(runtimeFamilyOf(runtime)).toBe(family);
  });

  it("returns undefined for unsupported or missing runtimes", () => {
    expect(runtimeFamilyOf("ruby3.2")).toBeUndefined();
    expect(runtimeFamilyOf("provided.al2023")).toBeUndefined();
    expect(runtimeFamilyOf("")).toBeUndefined();
    expect(runtimeFamilyOf(undefined)).toBeUndefined();
  });
});

describe("layerSubfolderFor", () => {
  it("places python dependencies under the versioned site-packages folder", () => {
    expect(layerSubfolderFor("python3.11")).toBe("python/lib/python3.11/site-packages");
  });

  it("places Node.js dependencies under nodejs", () => {
    expect(layerSubfolderFor("nodejs20.x")).toBe("nodejs");
  });

  it("places Java dependencies under java", () => {
    expect(layerSubfolderFor("java17")).toBe("java");
  });

  it("throws for a runtime outside the supported families", () => {
    expect(() => layerSubfolderFor("ruby3.2")).toThrow(UnsupportedRuntimeError);
    expect(() => layerSubfolderFor("ruby3.2")).toThrow(
      'Runtime "ruby3.2" has no dependency layer layout',
    );
  });
});
