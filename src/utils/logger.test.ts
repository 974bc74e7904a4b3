import { describe, it, expect } from "vitest";
import { Logger, parseFileSize } from "./logger";

describe("parseFileSize", () => {
  it("reads size suffixes", () => {
    expect(parseFileSize("512")).toBe(512);
    expect(parseFileSize("10m")).toBe(10 * 1024 * 1024);
    expect(parseFileSize("1.5KB")).toBe(1536);
  });

  it("falls back to 10 MB for unreadable sizes", () => {
    expect(parseFileSize("lots")).toBe(10 * 1024 * 1024);
  });
});

describe("Logger", () => {
  it("nests child scopes", () => {
    const child = new Logger("session").child("capture");
    expect(() => child.info("scoped")).not.toThrow();
  });
});
