import { describe, it, expect } from "vitest";
import { checksum } from "../src/checksum";

describe("checksum", () => {
  it("returns the hex md5 digest of the input", () => {
    expect(checksum("Fn1")).toBe("362b6916747ba49068e7ca5248e0d496");
  });

  it("is stable across calls", () => {
    expect(checksum("MyStack")).toBe(checksum("MyStack"));
  });

  it("differs for different inputs", () => {
    expect(checksum("MyStack")).not.toBe(checksum("my-stack"));
  });
});
