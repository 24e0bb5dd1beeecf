import { describe, expect, it } from "vitest";
import { SceneDocument } from "../src/document/svg-document.js";
import {
  GeometricBoundsQuery,
  querySelectionBoxes,
  type BoundingBoxQuery,
} from "../src/query/bounding-box-query.js";
import { ok, type Result } from "../src/types/result.js";
import type { BoxXYWH } from "../src/types/geometry.js";

const SVG = `
<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100">
  <rect id="r" x="10" y="20" width="30" height="40"/>
  <circle id="c" cx="50" cy="50" r="5"/>
  <text id="t" x="0" y="20" font-size="10">abcd</text>
</svg>`;

class FixedQuery implements BoundingBoxQuery {
  constructor(private readonly boxes: Record<string, BoxXYWH>) {}

  queryBoundingBoxes(ids: readonly string[]): Result<Map<string, BoxXYWH>> {
    const found = new Map<string, BoxXYWH>();
    for (const id of ids) {
      const box = this.boxes[id];
      if (box) found.set(id, box);
    }
    return ok(found);
  }
}

describe("GeometricBoundsQuery", () => {
  const doc = SceneDocument.parse(SVG);
  const query = new GeometricBoundsQuery(doc);

  it("measures shapes exactly", () => {
    const result = query.queryBoundingBoxes(["r"]);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.get("r")).toEqual({ x: 10, y: 20, width: 30, height: 40 });
  });

  it("measures circles through their outline", () => {
    const result = query.queryBoundingBoxes(["c"]);
    if (!result.ok) throw new Error(result.error.message);
    const box = result.value.get("c");
    expect(box?.x).toBeCloseTo(45, 9);
    expect(box?.y).toBeCloseTo(45, 9);
    expect(box?.width).toBeCloseTo(10, 9);
    expect(box?.height).toBeCloseTo(10, 9);
  });

  it("estimates text from font size and length", () => {
    const result = query.queryBoundingBoxes(["t"]);
    if (!result.ok) throw new Error(result.error.message);
    const box = result.value.get("t");
    expect(box?.x).toBe(0);
    expect(box?.y).toBeCloseTo(12, 9);
    expect(box?.width).toBeCloseTo(22, 9);
    expect(box?.height).toBeCloseTo(12.5, 9);
  });

  it("anchors text through the style cascade", () => {
    const anchored = SceneDocument.parse(`
<svg xmlns="http://www.w3.org/2000/svg">
  <g text-anchor="middle"><text id="mid" x="50" y="20" font-size="10">abcd</text></g>
  <text id="end" x="50" y="20" font-size="10" style="text-anchor:end">abcd</text>
</svg>`);
    const result = new GeometricBoundsQuery(anchored).queryBoundingBoxes(["mid", "end"]);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.get("mid")?.x).toBeCloseTo(39, 9);
    expect(result.value.get("end")?.x).toBeCloseTo(28, 9);
  });

  it("skips unknown ids", () => {
    const result = query.queryBoundingBoxes(["missing"]);
    expect(result.ok && result.value.size).toBe(0);
  });
});

describe("querySelectionBoxes", () => {
  const doc = SceneDocument.parse(SVG);
  const elements = doc.selectByIds(["r", "c"]);

  it("derives the global box from every element", () => {
    const query = new FixedQuery({
      r: { x: 10, y: 20, width: 30, height: 40 },
      c: { x: 45, y: 45, width: 10, height: 10 },
    });
    const result = querySelectionBoxes(query, elements);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.global).toEqual({
      left: 10,
      top: 20,
      right: 55,
      bottom: 60,
      width: 45,
      height: 40,
    });
    expect(result.value.perElement.get("c")).toEqual({
      left: 45,
      top: 45,
      right: 55,
      bottom: 55,
      width: 10,
      height: 10,
    });
  });

  it("fails when nothing could be measured", () => {
    const result = querySelectionBoxes(new FixedQuery({}), elements);
    expect(result).toEqual({
      ok: false,
      error: {
        code: "bounding-box-unavailable",
        severity: "error",
        message: "Could not determine the bounding box of selected objects.",
        elementId: null,
        suggestion: "Select at least one visible shape",
      },
    });
  });
});
