import { parseColor, type RgbColor } from "../parser/color.js";
import { parseLength } from "../parser/length.js";
import { attr, parentElement, urlReference } from "./dom.js";

export type PaintRef =
  | { type: "none" }
  | { type: "color"; color: RgbColor }
  | { type: "url"; id: string };

/**
 * Cascade-resolved style of one element. Lengths are in the element's
 * user units.
 */
export interface ComputedStyle {
  fill: PaintRef;
  fillOpacity: number;
  /** Own opacity multiplied by the opacity of every ancestor group. */
  opacity: number;
  stroke: PaintRef;
  strokeOpacity: number;
  strokeWidth: number;
  strokeLinecap: string;
  strokeLinejoin: string;
  /** Kept as written so that the default `4` can be recognised verbatim. */
  strokeMiterlimit: string;
  strokeDasharray: number[];
  strokeDashoffset: number;
  paintOrder: string;
  /** Id of the referenced `<marker>` element. */
  markerStart?: string;
  markerEnd?: string;
  fontFamily: string;
  fontSize: number;
  fontWeight: string;
  fontStyle: string;
  textAnchor: string;
}

export interface StopStyle {
  color: RgbColor;
  opacity: number;
}

const INHERITED = new Set([
  "color",
  "fill",
  "fill-opacity",
  "fill-rule",
  "stroke",
  "stroke-width",
  "stroke-opacity",
  "stroke-linecap",
  "stroke-linejoin",
  "stroke-miterlimit",
  "stroke-dasharray",
  "stroke-dashoffset",
  "paint-order",
  "marker-start",
  "marker-mid",
  "marker-end",
  "font-family",
  "font-size",
  "font-weight",
  "font-style",
  "text-anchor",
]);

const NOT_INHERITED = new Set(["opacity", "stop-color", "stop-opacity"]);

const INITIAL: Record<string, string> = {
  color: "black",
  fill: "black",
  "fill-opacity": "1",
  opacity: "1",
  stroke: "none",
  "stroke-width": "1",
  "stroke-opacity": "1",
  "stroke-linecap": "butt",
  "stroke-linejoin": "miter",
  "stroke-miterlimit": "4",
  "stroke-dasharray": "none",
  "stroke-dashoffset": "0",
  "paint-order": "normal",
  "marker-start": "none",
  "marker-end": "none",
  "font-family": "sans-serif",
  // CSS `medium`
  "font-size": "16",
  "font-weight": "normal",
  "font-style": "normal",
  "text-anchor": "start",
  "stop-color": "black",
  "stop-opacity": "1",
};

const FONT_SIZE_KEYWORDS: Record<string, number> = {
  "xx-small": 9,
  "x-small": 10,
  small: 13,
  medium: 16,
  large: 18,
  "x-large": 24,
  "xx-large": 32,
};

/**
 * Parse an inline `style` attribute into property/value pairs.
 *
 *   "fill:red; stroke-width: 2px" → { fill: "red", "stroke-width": "2px" }
 */
export function parseInlineStyle(value: string | undefined): Map<string, string> {
  const declarations = new Map<string, string>();
  if (!value) return declarations;

  for (const part of value.split(";")) {
    const colon = part.indexOf(":");
    if (colon === -1) continue;
    const name = part.slice(0, colon).trim().toLowerCase();
    const raw = part.slice(colon + 1).replace(/!important/i, "").trim();
    if (name !== "" && raw !== "") declarations.set(name, raw);
  }
  return declarations;
}

/**
 * Properties declared on the element itself: presentation attributes,
 * overridden by the `style` attribute. The `marker` shorthand expands to
 * its three longhands.
 */
function declaredProperties(node: Element): Map<string, string> {
  const declared = new Map<string, string>();
  const inline = parseInlineStyle(attr(node, "style"));

  const assign = (name: string, value: string) => {
    if (name === "marker") {
      declared.set("marker-start", value);
      declared.set("marker-mid", value);
      declared.set("marker-end", value);
    } else {
      declared.set(name, value);
    }
  };

  for (const name of [...INHERITED, ...NOT_INHERITED, "marker"]) {
    const value = attr(node, name);
    if (value !== undefined) assign(name, value.trim());
  }
  for (const [name, value] of inline) {
    if (INHERITED.has(name) || NOT_INHERITED.has(name) || name === "marker") {
      assign(name, value);
    }
  }
  return declared;
}

const resolvedCache = new WeakMap<Element, Map<string, string>>();

/**
 * Resolve every known property for the element by walking up its
 * ancestors. `font-size` is stored already converted to user units so
 * that relative sizes compound correctly.
 */
function resolvedProperties(node: Element): Map<string, string> {
  const cached = resolvedCache.get(node);
  if (cached) return cached;

  const parent = parentElement(node);
  const parentProps = parent ? resolvedProperties(parent) : undefined;
  const resolved = new Map<string, string>();

  for (const name of INHERITED) {
    const inherited = parentProps?.get(name) ?? INITIAL[name];
    if (inherited !== undefined) resolved.set(name, inherited);
  }
  for (const name of NOT_INHERITED) {
    resolved.set(name, INITIAL[name]);
  }

  const parentFontSize = Number(parentProps?.get("font-size") ?? INITIAL["font-size"]);
  for (const [name, value] of declaredProperties(node)) {
    if (value === "inherit") {
      const inherited = parentProps?.get(name) ?? INITIAL[name];
      if (inherited !== undefined) resolved.set(name, inherited);
    } else if (name === "font-size") {
      const size = resolveFontSize(value, parentFontSize);
      if (size !== undefined) resolved.set(name, String(size));
    } else {
      resolved.set(name, value);
    }
  }

  resolvedCache.set(node, resolved);
  return resolved;
}

function resolveFontSize(value: string, parentSize: number): number | undefined {
  const keyword = FONT_SIZE_KEYWORDS[value.toLowerCase()];
  if (keyword !== undefined) return keyword;
  if (value === "larger") return parentSize * 1.2;
  if (value === "smaller") return parentSize / 1.2;
  return parseLength(value, { fontSize: parentSize, percentBase: parentSize });
}

function parseOpacity(value: string | undefined): number {
  if (value === undefined) return 1;
  const trimmed = value.trim();
  const num = trimmed.endsWith("%") ? parseFloat(trimmed) / 100 : parseFloat(trimmed);
  if (Number.isNaN(num)) return 1;
  return Math.min(1, Math.max(0, num));
}

function parsePaint(value: string | undefined, currentColor: string): PaintRef {
  if (value === undefined) return { type: "none" };
  const trimmed = value.trim();
  if (trimmed === "none") return { type: "none" };

  const id = urlReference(trimmed);
  if (id !== undefined) return { type: "url", id };

  const source = trimmed.toLowerCase() === "currentcolor" ? currentColor : trimmed;
  const color = parseColor(source);
  return color ? { type: "color", color } : { type: "none" };
}

function parseMarker(value: string | undefined): string | undefined {
  if (value === undefined || value === "none") return undefined;
  return urlReference(value);
}

function parseDashArray(value: string | undefined, fontSize: number): number[] {
  if (value === undefined || value.trim() === "none") return [];
  const parts = value.trim().split(/[\s,]+/).filter((p) => p !== "");
  const lengths: number[] = [];
  for (const part of parts) {
    const length = parseLength(part, { fontSize });
    if (length === undefined || length < 0) return [];
    lengths.push(length);
  }
  // An all-zero pattern draws a solid line
  return lengths.every((l) => l === 0) ? [] : lengths;
}

/**
 * Compute the cascade-resolved style of an element.
 */
export function computeStyle(node: Element): ComputedStyle {
  const props = resolvedProperties(node);
  const get = (name: string): string | undefined => props.get(name) ?? INITIAL[name];

  const fontSize = Number(get("font-size"));
  const currentColor = get("color") ?? "black";

  let opacity = parseOpacity(get("opacity"));
  for (let ancestor = parentElement(node); ancestor; ancestor = parentElement(ancestor)) {
    opacity *= parseOpacity(resolvedProperties(ancestor).get("opacity"));
  }

  const strokeWidth = parseLength(get("stroke-width"), { fontSize }) ?? 1;
  const dashOffset = parseLength(get("stroke-dashoffset"), { fontSize }) ?? 0;

  const style: ComputedStyle = {
    fill: parsePaint(get("fill"), currentColor),
    fillOpacity: parseOpacity(get("fill-opacity")),
    opacity,
    stroke: parsePaint(get("stroke"), currentColor),
    strokeOpacity: parseOpacity(get("stroke-opacity")),
    strokeWidth,
    strokeLinecap: get("stroke-linecap") ?? "butt",
    strokeLinejoin: get("stroke-linejoin") ?? "miter",
    strokeMiterlimit: get("stroke-miterlimit") ?? "4",
    strokeDasharray: parseDashArray(get("stroke-dasharray"), fontSize),
    strokeDashoffset: dashOffset,
    paintOrder: get("paint-order") ?? "normal",
    fontFamily: get("font-family") ?? "sans-serif",
    fontSize,
    fontWeight: get("font-weight") ?? "normal",
    fontStyle: get("font-style") ?? "normal",
    textAnchor: get("text-anchor") ?? "start",
  };

  const markerStart = parseMarker(get("marker-start"));
  if (markerStart !== undefined) style.markerStart = markerStart;
  const markerEnd = parseMarker(get("marker-end"));
  if (markerEnd !== undefined) style.markerEnd = markerEnd;

  return style;
}

/**
 * Color and opacity of a gradient `<stop>`.
 */
export function computeStopStyle(node: Element): StopStyle {
  const props = resolvedProperties(node);
  const currentColor = props.get("color") ?? "black";
  const raw = props.get("stop-color") ?? "black";
  const source = raw.toLowerCase() === "currentcolor" ? currentColor : raw;
  const color = parseColor(source) ?? { hex: "000000", alpha: 1 };
  return {
    color: { hex: color.hex, alpha: 1 },
    opacity: parseOpacity(props.get("stop-opacity")) * color.alpha,
  };
}
