import {
  toDimensional,
  toUserUnit,
  type BoundingBox,
  type ConversionOptions,
  type MarkerPolicy,
  type Point,
  type WrapStyle,
} from "@svg2cetz/core";

/**
 * Read-only settings shared by every element of one run.
 */
export type ConversionContext = Readonly<{
  /** Box around the whole selection, in document pixels. */
  boundingBox: Readonly<BoundingBox>;
  viewBoxScale: number;
  precision: number;
  ignoreFont: boolean;
  defaultFont: string;
  marker: MarkerPolicy;
  wrap: WrapStyle;
}>;

/**
 * Per-element data, replaced before each element is converted.
 */
export interface ElementFrame {
  /** The element's own box, in document pixels. */
  boundingBox: Readonly<BoundingBox>;
}

/** A coordinate pair in CeTZ space (centimetres, y up). */
export type MappedPoint = readonly [number, number];

export function createContext(
  options: ConversionOptions,
  boundingBox: BoundingBox,
  viewBoxScale: number,
): ConversionContext {
  return Object.freeze({
    boundingBox: Object.freeze({ ...boundingBox }),
    viewBoxScale,
    precision: options.precision,
    ignoreFont: options.ignoreFont,
    defaultFont: options.defaultFont,
    marker: options.marker,
    wrap: options.wrap,
  });
}

/**
 * Round to `precision` decimals, ties to even. Integral results come back
 * as integers, so they print without a trailing `.0`.
 *
 *   roundNumber(2.0049, 2) → 2
 *   roundNumber(2.345, 1)  → 2.3
 *   roundNumber(0.125, 2)  → 0.12
 */
export function roundNumber(value: number, precision: number): number {
  const factor = 10 ** precision;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  let rounded: number;
  if (scaled - floor === 0.5 && (floor + 0.5) / factor === value) {
    rounded = (floor % 2 === 0 ? floor : floor + 1) / factor;
  } else {
    rounded = Number(value.toFixed(precision));
  }
  // Avoid printing "-0"
  return rounded === 0 ? 0 : rounded;
}

/** Round to a whole number, ties to even. */
export function roundInteger(value: number): number {
  return roundNumber(value, 0);
}

/**
 * Convert a document point (pixels, origin top-left, y down) into CeTZ
 * space: centimetres from the bottom-left of the selection box, y up.
 */
export function mapPoint(x: number, y: number, ctx: ConversionContext): MappedPoint {
  const { left, bottom } = ctx.boundingBox;
  return [
    roundNumber(toDimensional(x - left, "cm"), ctx.precision),
    roundNumber(toDimensional(bottom - y, "cm"), ctx.precision),
  ];
}

/** Inverse of `mapPoint`, up to its rounding. */
export function unmapPoint(point: MappedPoint, ctx: ConversionContext): Point {
  const { left, bottom } = ctx.boundingBox;
  return {
    x: left + toUserUnit(point[0], "cm"),
    y: bottom - toUserUnit(point[1], "cm"),
  };
}

/** Convert a document length in pixels to rounded centimetres. */
export function mapLength(px: number, ctx: ConversionContext): number {
  return roundNumber(toDimensional(px, "cm"), ctx.precision);
}

export function formatPoint(point: MappedPoint): string {
  return `(${point[0]}, ${point[1]})`;
}
