import {
  applyToPoint,
  attr,
  childElements,
  computeStopStyle,
  hrefReference,
  multiply,
  parseLength,
  parseTransform,
  scale,
  tagName,
  toHexByte,
  type BoundingBox,
  type Matrix,
  type PaintRef,
  type SceneElement,
} from "@svg2cetz/core";
import { roundInteger } from "./coordinate-transform.js";

export interface GradientStop {
  /** `RRGGBB`, upper case. */
  hex: string;
  /** Alpha byte, 0–255. */
  alpha: number;
  /** Offset along the gradient, whole percent. */
  offset: number;
}

export type PaintValue =
  | { kind: "solid"; hex: string; alpha: number }
  | { kind: "linear-gradient"; stops: GradientStop[]; angle: number }
  | {
      kind: "radial-gradient";
      stops: GradientStop[];
      center: [number, number];
      radius: number;
      focalCenter: [number, number];
    }
  | { kind: "unsupported"; reason: string };

export interface PaintInput {
  paint: PaintRef;
  /** Element opacity times the fill/stroke opacity. */
  opacity: number;
  /** Element opacity alone, applied to gradient stops. */
  elementOpacity: number;
}

/**
 * Resolve a paint reference into something CeTZ can draw. `none` yields
 * `undefined`.
 */
export function resolvePaint(
  element: SceneElement,
  input: PaintInput,
  bbox: Readonly<BoundingBox>,
  viewBoxScale: number,
): PaintValue | undefined {
  const { paint } = input;
  switch (paint.type) {
    case "none":
      return undefined;
    case "color":
      return {
        kind: "solid",
        hex: paint.color.hex,
        alpha: roundInteger(input.opacity * paint.color.alpha * 255),
      };
    case "url": {
      const server = element.lookup(paint.id);
      if (!server) {
        return { kind: "unsupported", reason: `Paint server #${paint.id} does not exist` };
      }
      const chain = gradientChain(element, server);
      switch (tagName(server)) {
        case "linearGradient":
          return linearGradient(chain, element, input.elementOpacity, bbox);
        case "radialGradient":
          return radialGradient(chain, element, input.elementOpacity, bbox, viewBoxScale);
        case "meshgradient":
        case "meshGradient":
          return { kind: "unsupported", reason: "Mesh gradients are not supported" };
        default:
          return {
            kind: "unsupported",
            reason: `Paint server <${tagName(server)}> is not supported`,
          };
      }
    }
  }
}

/** Format a resolved paint as a Typst value. */
export function formatPaint(paint: Exclude<PaintValue, { kind: "unsupported" }>): string {
  switch (paint.kind) {
    case "solid":
      return formatRgb(paint.hex, paint.alpha);
    case "linear-gradient":
      return `gradient.linear(${formatStops(paint.stops)}, angle: ${paint.angle}deg)`;
    case "radial-gradient": {
      const [cx, cy] = paint.center;
      const [fx, fy] = paint.focalCenter;
      return (
        `gradient.radial(${formatStops(paint.stops)}, ` +
        `center: (${cx}%, ${cy}%), radius: ${paint.radius}%, ` +
        `focal-center: (${fx}%, ${fy}%))`
      );
    }
  }
}

function formatRgb(hex: string, alpha: number): string {
  return `rgb("${hex}${toHexByte(alpha)}")`;
}

function formatStops(stops: GradientStop[]): string {
  return stops.map((s) => `(${formatRgb(s.hex, s.alpha)}, ${s.offset}%)`).join(", ");
}

/**
 * The gradient followed by every gradient it inherits from through
 * `href`. Stops cycles.
 */
function gradientChain(element: SceneElement, start: Element): Element[] {
  const chain: Element[] = [];
  for (let node: Element | undefined = start; node && !chain.includes(node); ) {
    chain.push(node);
    const next = hrefReference(node);
    node = next !== undefined ? element.lookup(next) : undefined;
  }
  return chain;
}

/** First value of an attribute along the inheritance chain. */
function chainAttr(chain: Element[], name: string): string | undefined {
  for (const node of chain) {
    const value = attr(node, name);
    if (value !== undefined) return value;
  }
  return undefined;
}

function chainStops(chain: Element[], elementOpacity: number): GradientStop[] {
  const owner = chain.find((node) => childElements(node).some((c) => tagName(c) === "stop"));
  if (!owner) return [];

  let previous = 0;
  return childElements(owner)
    .filter((c) => tagName(c) === "stop")
    .map((stop) => {
      const style = computeStopStyle(stop);
      // Offsets are clamped and never decrease
      const offset = Math.max(previous, clamp01(parseFraction(attr(stop, "offset")) ?? 0));
      previous = offset;
      return {
        hex: style.color.hex,
        alpha: roundInteger(elementOpacity * style.opacity * 255),
        offset: roundInteger(offset * 100),
      };
    });
}

/** `0.5` and `50%` both read as 0.5. */
function parseFraction(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  const num = parseFloat(trimmed);
  if (Number.isNaN(num)) return undefined;
  return trimmed.endsWith("%") ? num / 100 : num;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function usesObjectBoundingBox(chain: Element[]): boolean {
  return chainAttr(chain, "gradientUnits") !== "userSpaceOnUse";
}

/**
 * A gradient coordinate: a fraction of the box under `objectBoundingBox`,
 * a user-space length otherwise.
 */
function coordinate(
  chain: Element[],
  name: string,
  fallback: number,
  objectBox: boolean,
): number {
  const raw = chainAttr(chain, name);
  if (raw === undefined) return fallback;
  const value = objectBox ? parseFraction(raw) : parseLength(raw);
  return value ?? fallback;
}

function linearGradient(
  chain: Element[],
  element: SceneElement,
  elementOpacity: number,
  bbox: Readonly<BoundingBox>,
): PaintValue {
  const objectBox = usesObjectBoundingBox(chain);
  const x1 = coordinate(chain, "x1", 0, objectBox);
  const y1 = coordinate(chain, "y1", 0, objectBox);
  const x2 = coordinate(chain, "x2", 1, objectBox);
  const y2 = coordinate(chain, "y2", 0, objectBox);

  // Direction of the gradient vector in document space
  const m = gradientMatrix(chain, element, bbox, objectBox);
  const dx = m.a * (x2 - x1) + m.c * (y2 - y1);
  const dy = m.b * (x2 - x1) + m.d * (y2 - y1);
  const angle = roundInteger((Math.atan2(dy, dx) * 180) / Math.PI);

  return {
    kind: "linear-gradient",
    stops: chainStops(chain, elementOpacity),
    angle,
  };
}

function radialGradient(
  chain: Element[],
  element: SceneElement,
  elementOpacity: number,
  bbox: Readonly<BoundingBox>,
  viewBoxScale: number,
): PaintValue {
  const objectBox = usesObjectBoundingBox(chain);
  const half = objectBox ? 0.5 : 0;
  const cx = coordinate(chain, "cx", half, objectBox);
  const cy = coordinate(chain, "cy", half, objectBox);
  const r = coordinate(chain, "r", half, objectBox);
  const fx = coordinate(chain, "fx", cx, objectBox);
  const fy = coordinate(chain, "fy", cy, objectBox);
  const stops = chainStops(chain, elementOpacity);

  if (objectBox) {
    // Already relative to the shape's box
    const g = parseTransform(chainAttr(chain, "gradientTransform"));
    const center = applyToPoint(g, cx, cy);
    const focal = applyToPoint(g, fx, fy);
    return {
      kind: "radial-gradient",
      stops,
      center: [percent(center.x), percent(center.y)],
      radius: percent(r * Math.sqrt(Math.abs(g.a * g.d - g.b * g.c))),
      focalCenter: [percent(focal.x), percent(focal.y)],
    };
  }

  const m = multiply(scale(viewBoxScale), gradientMatrix(chain, element, bbox, false));
  const center = applyToPoint(m, cx, cy);
  const focal = applyToPoint(m, fx, fy);
  const radius = r * Math.sqrt(Math.abs(m.a * m.d - m.b * m.c));

  const relX = (x: number) => (bbox.width > 0 ? Math.abs(x - bbox.left) / bbox.width : 0);
  const relY = (y: number) => (bbox.height > 0 ? Math.abs(y - bbox.top) / bbox.height : 0);

  return {
    kind: "radial-gradient",
    stops,
    center: [percent(relX(center.x)), percent(relY(center.y))],
    radius: percent(bbox.height > 0 ? radius / bbox.height : 0),
    focalCenter: [percent(relX(focal.x)), percent(relY(focal.y))],
  };
}

/**
 * Maps gradient coordinates to document space. Bounding-box units are
 * stretched over the element's box.
 */
function gradientMatrix(
  chain: Element[],
  element: SceneElement,
  bbox: Readonly<BoundingBox>,
  objectBox: boolean,
): Matrix {
  const g = parseTransform(chainAttr(chain, "gradientTransform"));
  if (objectBox) {
    return multiply(
      { a: bbox.width, b: 0, c: 0, d: bbox.height, e: bbox.left, f: bbox.top },
      g,
    );
  }
  return multiply(element.cumulativeTransform, g);
}

function percent(fraction: number): number {
  return roundInteger(fraction * 100);
}
