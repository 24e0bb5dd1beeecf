import { GeometricBoundsQuery, SceneDocument } from "@svg2cetz/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createQuery, reportError, selectElements } from "../src/commands/shared.js";
import { InkscapeBoundsQuery } from "../src/query/inkscape-query.js";

const document = SceneDocument.parse(`
<svg xmlns="http://www.w3.org/2000/svg">
  <defs><linearGradient id="g"/></defs>
  <rect id="a" width="1" height="1"/>
  <g id="layer"><circle id="b" r="1"/></g>
</svg>`);

describe("selectElements", () => {
  it("selects every top-level shape by default", () => {
    expect(selectElements(document, undefined).map((e) => e.id)).toEqual(["a", "layer"]);
    expect(selectElements(document, []).map((e) => e.id)).toEqual(["a", "layer"]);
  });

  it("selects by id", () => {
    expect(selectElements(document, ["b"]).map((e) => e.id)).toEqual(["b"]);
  });

  it("throws on an unknown id", () => {
    expect(() => selectElements(document, ["nope"])).toThrow('No element with id "nope"');
  });
});

describe("createQuery", () => {
  it("measures geometry unless asked otherwise", () => {
    expect(createQuery(document, {})).toBeInstanceOf(GeometricBoundsQuery);
    expect(createQuery(document, { query: "inkscape" })).toBeInstanceOf(InkscapeBoundsQuery);
  });

  it("rejects unknown query kinds", () => {
    expect(() => createQuery(document, { query: "browser" })).toThrow(
      'Unknown bounding-box query "browser" (expected geometry or inkscape)',
    );
  });
});

describe("reportError", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints informational issues without exiting", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    reportError({
      code: "empty-selection",
      severity: "info",
      message: "No object was selected!",
      elementId: null,
    });
    expect(log).toHaveBeenCalledWith("No object was selected!");
  });
});
