/**
 * Unit tests for output helpers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { formatMegabytes, output, parsePositiveInt, say, takeFlag } from "../../src/lib/output.js";

describe("output helpers", () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("prints strings directly in non-json mode", () => {
    output("hello world");
    expect(consoleSpy).toHaveBeenCalledWith("hello world");
  });

  it("JSON-stringifies objects", () => {
    output({ rows: 3 });
    expect(JSON.parse(String(consoleSpy.mock.calls[0][0]))).toEqual({ rows: 3 });
  });

  it("say prints progress lines", () => {
    say("Generating data in batches...");
    expect(consoleSpy).toHaveBeenCalledWith("Generating data in batches...");
  });
});

describe("takeFlag", () => {
  it("removes the flag and its value", () => {
    expect(takeFlag(["40", "--seed", "7", "out.csv"], "--seed")).toEqual({ value: "7", rest: ["40", "out.csv"] });
  });

  it("leaves the list alone when the flag is absent", () => {
    expect(takeFlag(["40"], "--seed")).toEqual({ value: undefined, rest: ["40"] });
  });
});

describe("parsePositiveInt", () => {
  it("accepts digit separators", () => {
    expect(parsePositiveInt("1_000_000")).toBe(1_000_000);
    expect(parsePositiveInt("5,000")).toBe(5000);
  });

  it("rejects zero, negatives and non-numbers", () => {
    expect(parsePositiveInt("0")).toBeNull();
    expect(parsePositiveInt("-4")).toBeNull();
    expect(parsePositiveInt("1e3")).toBeNull();
  });
});

describe("formatMegabytes", () => {
  it("shows one decimal", () => {
    expect(formatMegabytes(1024 * 1024 * 2.5)).toBe("2.5 MB");
  });
});
