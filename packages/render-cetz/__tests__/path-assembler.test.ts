import type { PathCommand } from "@svg2cetz/core";
import { describe, expect, it } from "vitest";
import { assemblePath, formatGroup } from "../src/path-assembler.js";
import { cm, contextFor } from "./helpers.js";

// Selection box 4cm square: CeTZ (a, b) is document (cm(a), cm(4 - b))
const ctx = contextFor({ x: 0, y: 0, width: cm(4), height: cm(4) });

const at = (a: number, b: number) => ({ x: cm(a), y: cm(4) - cm(b) });
const M = (a: number, b: number): PathCommand => ({ type: "move", ...at(a, b) });
const L = (a: number, b: number): PathCommand => ({ type: "line", ...at(a, b) });
const Z: PathCommand = { type: "close" };
function C(c1: [number, number], c2: [number, number], end: [number, number]): PathCommand {
  const p1 = at(...c1);
  const p2 = at(...c2);
  const p = at(...end);
  return { type: "cubic", c1x: p1.x, c1y: p1.y, c2x: p2.x, c2y: p2.y, x: p.x, y: p.y };
}

describe("assemblePath", () => {
  it("closes a polyline back to its start", () => {
    expect(assemblePath([M(0, 0), L(1, 0), L(1, 1), Z], ctx)).toEqual([
      { kind: "line", points: [[0, 0], [1, 0], [1, 1], [0, 0]] },
    ]);
  });

  it("does not repeat the start when the path already returned to it", () => {
    expect(assemblePath([M(0, 0), L(1, 0), L(0, 0), Z], ctx)).toEqual([
      { kind: "line", points: [[0, 0], [1, 0], [0, 0]] },
    ]);
  });

  it("orders bezier points start, end, controls", () => {
    expect(assemblePath([M(0, 0), C([0, 1], [1, 1], [1, 0])], ctx)).toEqual([
      { kind: "bezier", points: [[0, 0], [1, 0], [0, 1], [1, 1]] },
    ]);
  });

  it("starts a new group whenever the segment kind changes", () => {
    expect(assemblePath([M(0, 0), L(1, 0), C([1, 1], [2, 1], [2, 0]), L(3, 0)], ctx)).toEqual([
      { kind: "line", points: [[0, 0], [1, 0]] },
      { kind: "bezier", points: [[1, 0], [2, 0], [1, 1], [2, 1]] },
      { kind: "line", points: [[2, 0], [3, 0]] },
    ]);
  });

  it("closes a curve with a separate line", () => {
    expect(assemblePath([M(0, 0), C([0, 1], [1, 1], [1, 0]), Z], ctx)).toEqual([
      { kind: "bezier", points: [[0, 0], [1, 0], [0, 1], [1, 1]] },
      { kind: "line", points: [[1, 0], [0, 0]] },
    ]);
  });

  it("drops moves that draw nothing", () => {
    expect(assemblePath([M(0, 0), M(1, 1), L(2, 2)], ctx)).toEqual([
      { kind: "line", points: [[1, 1], [2, 2]] },
    ]);
    expect(assemblePath([M(0, 0)], ctx)).toEqual([]);
  });

  it("returns frozen groups", () => {
    const [group] = assemblePath([M(0, 0), L(1, 0)], ctx);
    expect(Object.isFrozen(group)).toBe(true);
    expect(Object.isFrozen(group.points)).toBe(true);
  });
});

describe("formatGroup", () => {
  const group = { kind: "line" as const, points: [[0, 0], [1.5, 2]] as const };

  it("prints the points", () => {
    expect(formatGroup(group)).toBe("line((0, 0), (1.5, 2))");
  });

  it("appends the style", () => {
    expect(formatGroup(group, "stroke: none")).toBe("line((0, 0), (1.5, 2), stroke: none)");
  });
});
