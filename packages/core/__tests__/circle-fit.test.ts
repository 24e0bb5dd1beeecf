import { describe, expect, it } from "vitest";
import { circleFrom3Points, sampleAnchors } from "../src/geometry/circle-fit.js";

describe("circleFrom3Points", () => {
  it("recovers the unit circle", () => {
    const result = circleFrom3Points({ x: 1, y: 0 }, { x: 0, y: 1 }, { x: -1, y: 0 });
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.cx).toBeCloseTo(0, 12);
    expect(result.value.cy).toBeCloseTo(0, 12);
    expect(result.value.r).toBeCloseTo(1, 12);
  });

  it("recovers an offset circle", () => {
    const result = circleFrom3Points({ x: 8, y: -2 }, { x: 3, y: 3 }, { x: -2, y: -2 });
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.cx).toBeCloseTo(3, 10);
    expect(result.value.cy).toBeCloseTo(-2, 10);
    expect(result.value.r).toBeCloseTo(5, 10);
  });

  it("rejects collinear points", () => {
    const result = circleFrom3Points({ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 2 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("degenerate-geometry");
  });

  it("rejects coincident points", () => {
    const result = circleFrom3Points({ x: 1, y: 1 }, { x: 1, y: 1 }, { x: 2, y: 0 });
    expect(result.ok).toBe(false);
  });
});

describe("sampleAnchors", () => {
  it("returns the end points of the first three drawing commands", () => {
    expect(
      sampleAnchors([
        { type: "move", x: 1, y: 0 },
        { type: "line", x: 0, y: 1 },
        { type: "cubic", c1x: 0, c1y: 0, c2x: 0, c2y: 0, x: -1, y: 0 },
        { type: "line", x: 0, y: -1 },
        { type: "close" },
      ]),
    ).toEqual([
      { x: 0, y: 1 },
      { x: -1, y: 0 },
      { x: 0, y: -1 },
    ]);
  });

  it("returns undefined for short paths", () => {
    expect(
      sampleAnchors([
        { type: "move", x: 0, y: 0 },
        { type: "line", x: 1, y: 0 },
        { type: "close" },
      ]),
    ).toBeUndefined();
  });
});
