import { describe, expect, it } from "vitest";
import {
  parseLength,
  parseNumberList,
  toDimensional,
  toUserUnit,
} from "../src/parser/length.js";

describe("unit conversion", () => {
  it("uses 96 pixels per inch", () => {
    expect(toDimensional(96, "in")).toBe(1);
    expect(toUserUnit(1, "cm")).toBeCloseTo(37.795275591, 8);
    expect(toDimensional(16, "pt")).toBeCloseTo(12, 10);
  });

  it("round-trips through a unit", () => {
    expect(toDimensional(toUserUnit(3, "cm"), "cm")).toBeCloseTo(3, 12);
  });
});

describe("parseLength", () => {
  it("reads bare numbers as pixels", () => {
    expect(parseLength("10")).toBe(10);
    expect(parseLength(" -2.5 ")).toBe(-2.5);
  });

  it("converts absolute units", () => {
    expect(parseLength("1in")).toBe(96);
    expect(parseLength("12pt")).toBeCloseTo(16, 10);
    expect(parseLength("10mm")).toBeCloseTo(37.795275591, 8);
  });

  it("resolves relative units against their base", () => {
    expect(parseLength("2em", { fontSize: 12 })).toBe(24);
    expect(parseLength("50%", { percentBase: 200 })).toBe(100);
  });

  it("returns undefined without a base or for garbage", () => {
    expect(parseLength("2em")).toBeUndefined();
    expect(parseLength("abc")).toBeUndefined();
    expect(parseLength(undefined)).toBeUndefined();
  });
});

describe("parseNumberList", () => {
  it("splits on whitespace and commas", () => {
    expect(parseNumberList("0 0 100,50")).toEqual([0, 0, 100, 50]);
  });

  it("handles exponents and signs without separators", () => {
    expect(parseNumberList("1e2-3")).toEqual([100, -3]);
  });

  it("returns an empty list for a missing value", () => {
    expect(parseNumberList(undefined)).toEqual([]);
  });
});
