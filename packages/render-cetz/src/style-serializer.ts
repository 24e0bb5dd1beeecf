import {
  fail,
  ok,
  toDimensional,
  type ComputedStyle,
  type PaintRef,
  type Result,
  type SceneElement,
} from "@svg2cetz/core";
import {
  roundNumber,
  type ConversionContext,
  type ElementFrame,
} from "./coordinate-transform.js";
import { serializeMarkers } from "./markers.js";
import { formatPaint, resolvePaint } from "./paint.js";
import { typstString } from "./utils.js";

export interface StyleOptions {
  includeMarkers?: boolean;
  includeTextInfo?: boolean;
}

/** CSS generic families; all of them map to the configured default font. */
const GENERIC_FAMILIES = new Set([
  "serif",
  "sans-serif",
  "monospace",
  "cursive",
  "fantasy",
  "system-ui",
  "ui-serif",
  "ui-sans-serif",
  "ui-monospace",
  "ui-rounded",
  "math",
  "emoji",
  "fangsong",
]);

const FONT_WEIGHTS: Readonly<Record<string, string>> = {
  normal: "regular",
  bold: "bold",
  "100": "thin",
  "200": "extralight",
  "300": "light",
  "400": "regular",
  "500": "medium",
  "600": "semibold",
  "700": "bold",
  "800": "extrabold",
  "900": "black",
};

const PAINT_ORDER_DEFAULT = ["fill", "stroke", "markers"];

/**
 * Serialize an element's style as the keyword arguments of a CeTZ draw
 * call, in a fixed order: fill, stroke, mark, then the text properties.
 *
 *   ["fill: rgb(\"FF000066\")", "stroke: (paint: rgb(\"000000FF\"))"]
 */
export function serializeStyle(
  element: SceneElement,
  ctx: ConversionContext,
  frame: ElementFrame,
  opts: StyleOptions = {},
): Result<string[]> {
  const style = element.style();
  const scaleFactor = lengthScale(element, ctx);
  const clauses: string[] = [];

  const fill = paintClause(element, ctx, frame, style.fill, style.fillOpacity);
  if (!fill.ok) return fill;
  if (fill.value !== "none") clauses.push(`fill: ${fill.value}`);

  const stroke = strokeClause(element, ctx, frame, style, scaleFactor);
  if (!stroke.ok) return stroke;
  clauses.push(`stroke: ${stroke.value}`);

  if (opts.includeMarkers) {
    const mark = serializeMarkers(element, ctx.marker);
    if (mark) clauses.push(mark);
  }

  if (opts.includeTextInfo) {
    clauses.push(...textClauses(style, ctx, scaleFactor));
  }

  return ok(clauses);
}

/**
 * Document pixels per user unit of the element: the view box scale times
 * the uniform part of its transform.
 */
function lengthScale(element: SceneElement, ctx: ConversionContext): number {
  const m = element.cumulativeTransform;
  return ctx.viewBoxScale * Math.sqrt(Math.abs(m.a * m.d - m.b * m.c));
}

function paintClause(
  element: SceneElement,
  ctx: ConversionContext,
  frame: ElementFrame,
  paint: PaintRef,
  paintOpacity: number,
): Result<string> {
  const opacity = element.style().opacity;
  const value = resolvePaint(
    element,
    { paint, opacity: opacity * paintOpacity, elementOpacity: opacity },
    frame.boundingBox,
    ctx.viewBoxScale,
  );
  if (value === undefined) return ok("none");
  if (value.kind === "unsupported") {
    return fail(
      "unsupported-paint",
      value.reason,
      element.id || null,
      "Use a flat color, a linear gradient or a radial gradient",
    );
  }
  return ok(formatPaint(value));
}

function strokeClause(
  element: SceneElement,
  ctx: ConversionContext,
  frame: ElementFrame,
  style: ComputedStyle,
  scaleFactor: number,
): Result<string> {
  if (style.stroke.type === "none" || style.strokeWidth <= 0) return ok("none");

  const paint = paintClause(element, ctx, frame, style.stroke, style.strokeOpacity);
  if (!paint.ok) return paint;
  if (paint.value === "none") return ok("none");

  const parts = [`paint: ${paint.value}`];

  const widthPt = toDimensional(style.strokeWidth * scaleFactor, "pt");
  // 1pt is CeTZ's default thickness
  if (widthPt - 1 > 1e-5) {
    const halved = strokeBeforeFill(style.paintOrder) ? widthPt / 2 : widthPt;
    parts.push(`thickness: ${roundNumber(halved, 2)}pt`);
  }

  if (style.strokeLinecap !== "butt") {
    parts.push(`cap: ${typstString(style.strokeLinecap)}`);
  }
  if (style.strokeLinejoin !== "miter") {
    parts.push(`join: ${typstString(style.strokeLinejoin)}`);
  }
  if (style.strokeMiterlimit !== "4") {
    parts.push(`miter-limit: ${style.strokeMiterlimit}`);
  }

  if (style.strokeDasharray.length > 0) {
    const toPt = (length: number) =>
      `${roundNumber(toDimensional(length * scaleFactor, "pt"), 2)}pt`;
    const lengths = style.strokeDasharray.map(toPt);
    // A one-element Typst array needs a trailing comma
    const array = lengths.length === 1 ? `(${lengths[0]},)` : `(${lengths.join(", ")})`;
    const phase = roundNumber(toDimensional(style.strokeDashoffset * scaleFactor, "pt"), 2);
    parts.push(phase === 0 ? `dash: ${array}` : `dash: (array: ${array}, phase: ${phase}pt)`);
  }

  return ok(`(${parts.join(", ")})`);
}

/**
 * True when `paint-order` draws the stroke before the fill. Missing
 * keywords follow in their default order.
 */
export function strokeBeforeFill(paintOrder: string): boolean {
  const listed = paintOrder.trim() === "normal" ? [] : paintOrder.trim().split(/\s+/);
  const order = listed.filter((k) => PAINT_ORDER_DEFAULT.includes(k));
  for (const keyword of PAINT_ORDER_DEFAULT) {
    if (!order.includes(keyword)) order.push(keyword);
  }
  return order.indexOf("stroke") < order.indexOf("fill");
}

function textClauses(
  style: ComputedStyle,
  ctx: ConversionContext,
  scaleFactor: number,
): string[] {
  const clauses: string[] = [];

  if (!ctx.ignoreFont) {
    clauses.push(`font: ${typstString(fontName(style.fontFamily, ctx.defaultFont))}`);
  }

  const size = roundNumber(toDimensional(style.fontSize * scaleFactor, "pt"), 0);
  clauses.push(`size: ${size}pt`);

  const weight = FONT_WEIGHTS[style.fontWeight] ?? style.fontWeight;
  if (weight !== "regular") clauses.push(`weight: ${typstString(weight)}`);

  if (style.fontStyle !== "normal") clauses.push(`style: ${typstString(style.fontStyle)}`);

  return clauses;
}

/**
 * First family of a `font-family` list, unquoted. Generic families become
 * the default font.
 */
export function fontName(fontFamily: string, defaultFont: string): string {
  const first = fontFamily.split(",")[0].trim().replace(/^['"]|['"]$/g, "").trim();
  if (first === "" || GENERIC_FAMILIES.has(first.toLowerCase())) return defaultFont;
  return first;
}
