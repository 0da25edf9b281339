import { describe, it, expect } from "vitest";
import { isLocalPath, rebaseRelativePath } from "../src/path";

describe("isLocalPath", () => {
  it("accepts relative and absolute file system paths", () => {
    expect(isLocalPath("src/handlers")).toBe(true);
    expect(isLocalPath("./hello_world")).toBe(true);
    expect(isLocalPath("/opt/build/layer")).toBe(true);
  });

  it("rejects remote locations", () => {
    expect(isLocalPath("s3://bucket/code.zip")).toBe(false);
    expect(isLocalPath("https://example.com/template.yaml")).toBe(false);
    expect(isLocalPath("http://example.com/template.yaml")).toBe(false);
  });

  it("rejects empty strings and non-string values", () => {
    expect(isLocalPath("")).toBe(false);
    expect(isLocalPath(undefined)).toBe(false);
    expect(isLocalPath({ Bucket: "b", Key: "k" })).toBe(false);
  });
});

describe("rebaseRelativePath", () => {
  it("rewrites a relative path for a deeper root", () => {
    expect(rebaseRelativePath("src", "/project", "/project/.build")).toBe("../src");
  });

  it("rewrites a relative path for a shallower root", () => {
    expect(rebaseRelativePath("../shared/code", "/project/app", "/project")).toBe("shared/code");
  });

  it("returns '.' when the path resolves to the new root itself", () => {
    expect(rebaseRelativePath("out", "/project", "/project/out")).toBe(".");
  });

  it("leaves absolute paths untouched", () => {
    expect(rebaseRelativePath("/opt/deps", "/project", "/project/.build")).toBe("/opt/deps");
  });

  it("leaves remote paths untouched", () => {
    expect(rebaseRelativePath("s3://bucket/key", "/project", "/project/.build")).toBe(
      "s3://bucket/key",
    );
  });
});
