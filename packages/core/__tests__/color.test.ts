import { describe, expect, it } from "vitest";
import { parseColor, toHexByte } from "../src/parser/color.js";

describe("parseColor", () => {
  it("expands short hex colors", () => {
    expect(parseColor("#f00")).toEqual({ hex: "FF0000", alpha: 1 });
  });

  it("reads the alpha of 8-digit hex colors", () => {
    const color = parseColor("#FF000080");
    expect(color?.hex).toBe("FF0000");
    expect(color?.alpha).toBeCloseTo(128 / 255, 10);
  });

  it("parses rgb() and rgba()", () => {
    expect(parseColor("rgb(255, 0, 0)")).toEqual({ hex: "FF0000", alpha: 1 });
    expect(parseColor("rgba(0, 128, 255, 0.5)")).toEqual({ hex: "0080FF", alpha: 0.5 });
    expect(parseColor("rgb(100%, 50%, 0%)")).toEqual({ hex: "FF8000", alpha: 1 });
  });

  it("parses named colors", () => {
    expect(parseColor("red")).toEqual({ hex: "FF0000", alpha: 1 });
    expect(parseColor("SteelBlue")).toEqual({ hex: "4682B4", alpha: 1 });
    expect(parseColor("transparent")).toEqual({ hex: "000000", alpha: 0 });
  });

  it("returns undefined for non-colors", () => {
    expect(parseColor("none")).toBeUndefined();
    expect(parseColor("url(#grad)")).toBeUndefined();
  });
});

describe("toHexByte", () => {
  it("formats two upper-case digits", () => {
    expect(toHexByte(102)).toBe("66");
    expect(toHexByte(5)).toBe("05");
    expect(toHexByte(255)).toBe("FF");
  });

  it("clamps out-of-range values", () => {
    expect(toHexByte(300)).toBe("FF");
    expect(toHexByte(-4)).toBe("00");
  });
});
