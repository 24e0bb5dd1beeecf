import {
  GeometricBoundsQuery,
  SceneDocument,
  parseConfig,
  resolveOptions,
} from "@svg2cetz/core";
import { describe, expect, it } from "vitest";
import { convertSelection } from "../src/render-cetz.js";

const DRAWING = `
<svg xmlns="http://www.w3.org/2000/svg" width="6cm" height="4cm" viewBox="0 0 60 40">
  <defs>
    <linearGradient id="unused"><stop offset="0" stop-color="red"/></linearGradient>
  </defs>
  <g id="layer1">
    <rect id="frame" x="0" y="0" width="30" height="20" fill="none" stroke="black" stroke-width="1"/>
    <circle id="dot" cx="45" cy="30" r="10" fill="#00ff00"/>
  </g>
</svg>`;

const CONFIG = `
precision: 1
wrap: figure
`;

describe("end-to-end CeTZ conversion", () => {
  it("converts a whole drawing with geometric bounds", () => {
    const document = SceneDocument.parse(DRAWING);
    const options = resolveOptions(parseConfig(CONFIG));
    const result = convertSelection(
      document,
      document.topLevelElements(),
      new GeometricBoundsQuery(document),
      options,
    );
    if (!result.ok) throw new Error(result.error.message);

    expect(result.value).toEqual([
      "#figure(",
      "    cetz.canvas({",
      "        import cetz.draw: *",
      '        rect((0, 2), (3, 4), stroke: (paint: rgb("000000FF"), thickness: 2.83pt))',
      '        circle((4.5, 1), radius: 1, fill: rgb("00FF00FF"), stroke: none)',
      "    })",
      ")",
    ]);
  });
});
