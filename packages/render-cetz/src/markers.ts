import { attr, type MarkerPolicy, type SceneElement } from "@svg2cetz/core";
import { typstString } from "./utils.js";

export interface MarkStyle {
  symbol: string;
  /** Typst fill, e.g. `black`; absent for outline marks. */
  fill?: string;
}

/**
 * Inkscape stock markers (by `inkscape:stockid`) and the CeTZ mark that
 * draws them.
 */
export const STOCK_MARKERS: Readonly<Record<string, MarkStyle>> = {
  "Wide arrow": { symbol: "straight" },
  "Wide, rounded arrow": { symbol: "straight" },
  "Wide, heavy arrow": { symbol: "straight" },
  "Triangle arrow": { symbol: "triangle", fill: "black" },
  "Colored triangle": { symbol: "triangle" },
  "Dart arrow": { symbol: "triangle", fill: "black" },
  "Concave triangle arrow": { symbol: "stealth", fill: "black" },
  "Rounded arrow": { symbol: "triangle", fill: "black" },
  Dot: { symbol: "circle", fill: "black" },
  "Colored dot": { symbol: "circle" },
  Square: { symbol: "rect", fill: "black" },
  "Colored square": { symbol: "rect" },
  Diamond: { symbol: "diamond", fill: "black" },
  "Colored diamond": { symbol: "diamond" },
  Stop: { symbol: "bar" },
  X: { symbol: "x" },
  "Empty semicircle": { symbol: "hook" },
  "Stylized triangle arrow": { symbol: "barbed" },
};

export const DEFAULT_MARKER = "Triangle arrow";

type Side = "start" | "end";

/**
 * Look up the mark for a stock id. Unknown ids fall back to the default
 * marker, or are dropped under `no_unknown_marker`.
 */
export function resolveMark(
  stockId: string | undefined,
  policy: MarkerPolicy,
): MarkStyle | undefined {
  const known = stockId !== undefined ? STOCK_MARKERS[stockId] : undefined;
  if (known) return known;
  return policy === "default_marker" ? STOCK_MARKERS[DEFAULT_MARKER] : undefined;
}

/**
 * The `mark:` clause for an element's start/end markers, or `undefined`
 * when it has none.
 *
 *   mark: (start: (symbol: "triangle", fill: black), end: (symbol: "x"))
 */
export function serializeMarkers(
  element: SceneElement,
  policy: MarkerPolicy,
): string | undefined {
  const style = element.style();
  const parts: string[] = [];

  const sides: Array<[Side, string | undefined]> = [
    ["start", style.markerStart],
    ["end", style.markerEnd],
  ];
  for (const [side, id] of sides) {
    if (id === undefined) continue;
    // A reference to a missing <marker> draws nothing
    const node = element.lookup(id);
    if (!node) continue;

    const mark = resolveMark(attr(node, "inkscape:stockid"), policy);
    if (!mark) continue;

    const fill = mark.fill !== undefined ? `, fill: ${mark.fill}` : "";
    parts.push(`${side}: (symbol: ${typstString(mark.symbol)}${fill})`);
  }

  if (parts.length === 0) return undefined;
  return `mark: (${parts.join(", ")})`;
}
