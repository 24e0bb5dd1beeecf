import { describe, expect, it } from "vitest";
import { textContent } from "../src/document/scene-element.js";
import { SceneDocument } from "../src/document/svg-document.js";

const SVG = `
<svg xmlns="http://www.w3.org/2000/svg"
     xmlns:inkscape="http://www.inkscape.org/namespaces/inkscape"
     xmlns:sodipodi="http://sodipodi.sourceforge.net/DTD/sodipodi-0.dtd"
     width="200" viewBox="0 0 100 50">
  <defs>
    <linearGradient id="grad"/>
  </defs>
  <metadata id="meta"/>
  <g id="outer" transform="translate(10,0)">
    <rect id="a" transform="scale(2)" x="1" y="2" width="10" height="4" rx="3"/>
    <g id="inner">
      <circle id="b" cx="5" cy="5" r="2"/>
    </g>
  </g>
  <line id="c" x1="0" y1="0" x2="10" y2="5"/>
  <polygon id="d" points="0,0 10,0 10,10"/>
  <text id="t"><tspan sodipodi:role="line">Hello</tspan><tspan sodipodi:role="line">world</tspan></text>
  <ellipse cx="1" cy="1" rx="2" ry="1"/>
  <image id="img" width="1" height="1"/>
</svg>`;

describe("SceneDocument.parse", () => {
  it("rejects documents without an <svg> root", () => {
    expect(() => SceneDocument.parse("<html></html>")).toThrow(
      "Failed to parse SVG: the root element is not <svg>",
    );
  });

  it("derives the view box scale from the physical width", () => {
    expect(SceneDocument.parse(SVG).viewBoxScale).toBe(2);
  });

  it("uses a scale of 1 without a view box", () => {
    const doc = SceneDocument.parse('<svg xmlns="http://www.w3.org/2000/svg" width="10"/>');
    expect(doc.viewBoxScale).toBe(1);
  });
});

describe("selection", () => {
  it("lists visual top-level elements only", () => {
    const doc = SceneDocument.parse(SVG);
    expect(doc.topLevelElements().map((e) => e.id)).toEqual([
      "outer",
      "c",
      "d",
      "t",
      "",
      "img",
    ]);
  });

  it("flattens groups into document order without duplicates", () => {
    const doc = SceneDocument.parse(SVG);
    const selection = doc.selectByIds(["c", "outer", "b"]);
    expect(doc.flatten(selection).map((e) => e.id)).toEqual(["a", "b", "c"]);
  });

  it("throws on an unknown id", () => {
    const doc = SceneDocument.parse(SVG);
    expect(() => doc.selectByIds(["nope"])).toThrow('No element with id "nope"');
  });

  it("generates missing ids", () => {
    const doc = SceneDocument.parse(SVG);
    const elements = doc.flatten(doc.topLevelElements());
    doc.ensureIds(elements);
    expect(elements.map((e) => e.id)).toEqual(["a", "b", "c", "d", "t", "ellipse1", "img"]);
    expect(doc.getElementById("ellipse1")?.tagName).toBe("ellipse");
  });
});

describe("SceneElement", () => {
  const doc = SceneDocument.parse(SVG);
  const element = (id: string) => {
    const node = doc.getElementById(id);
    if (!node) throw new Error(`missing #${id}`);
    return doc.wrap(node);
  };

  it("composes ancestor transforms", () => {
    expect(element("a").cumulativeTransform).toEqual({
      a: 2,
      b: 0,
      c: 0,
      d: 2,
      e: 10,
      f: 0,
    });
  });

  it("fills in and clamps a missing rect radius", () => {
    expect(element("a").shape()).toEqual({
      kind: "rect",
      x: 1,
      y: 2,
      width: 10,
      height: 4,
      rx: 3,
      ry: 2,
    });
  });

  it("expresses lines and polygons as path data", () => {
    expect(element("c").shape()).toEqual({
      kind: "path",
      source: "line",
      d: "M 0 0 L 10 5",
    });
    expect(element("d").shape()).toEqual({
      kind: "path",
      source: "polygon",
      d: "M 0 0 L 10 0 L 10 10 Z",
    });
  });

  it("classifies other elements as unsupported", () => {
    expect(element("img").shape()).toEqual({ kind: "unsupported", tagName: "image" });
  });

  it("finds other elements of the document", () => {
    expect(element("a").lookup("grad")?.tagName).toBe("linearGradient");
  });

  it("starts a new line for every sodipodi line", () => {
    const node = doc.getElementById("t");
    if (!node) throw new Error("missing #t");
    expect(textContent(node)).toBe("Hello\nworld");
  });
});
