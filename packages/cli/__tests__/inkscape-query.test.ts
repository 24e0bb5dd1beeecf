import { SceneDocument } from "@svg2cetz/core";
import { describe, expect, it } from "vitest";
import { InkscapeBoundsQuery, parseQueryOutput } from "../src/query/inkscape-query.js";

describe("parseQueryOutput", () => {
  const output = "0,10\n0,5\n20,20\n10,10\n";

  it("reads one column per id", () => {
    const result = parseQueryOutput(output, ["a", "b"], 1);
    if (!result.ok) throw new Error(result.error.message);
    expect(Object.fromEntries(result.value)).toEqual({
      a: { x: 0, y: 0, width: 20, height: 10 },
      b: { x: 10, y: 5, width: 20, height: 10 },
    });
  });

  it("scales user units to document pixels", () => {
    const result = parseQueryOutput(output, ["a"], 2);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.get("a")).toEqual({ x: 0, y: 0, width: 40, height: 20 });
  });

  it("skips ids without values", () => {
    const result = parseQueryOutput("1\n2\n3\n4", ["a", "b"], 1);
    if (!result.ok) throw new Error(result.error.message);
    expect([...result.value.keys()]).toEqual(["a"]);
  });

  it("returns nothing for truncated output", () => {
    const result = parseQueryOutput("1,2\n3,4", ["a", "b"], 1);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.size).toBe(0);
  });
});

describe("InkscapeBoundsQuery", () => {
  const document = SceneDocument.parse(
    `<svg xmlns="http://www.w3.org/2000/svg"><rect id="r" width="1" height="1"/></svg>`,
  );

  it("asks nothing for an empty selection", () => {
    const result = new InkscapeBoundsQuery(document, "svg2cetz-no-such-inkscape").queryBoundingBoxes([]);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.size).toBe(0);
  });
});
