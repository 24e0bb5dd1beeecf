export type LengthUnit = "px" | "pt" | "pc" | "mm" | "cm" | "in" | "q";

// CSS reference pixel: 96 per inch
const PX_PER_UNIT: Record<LengthUnit, number> = {
  px: 1,
  pt: 96 / 72,
  pc: 16,
  mm: 96 / 25.4,
  cm: 96 / 2.54,
  in: 96,
  q: 96 / 101.6,
};

const NUMBER = /[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?/gi;
const LENGTH = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)$/i;

/**
 * Convert a value in pixels into the given unit.
 *
 *   toDimensional(96, "in")   → 1
 *   toDimensional(37.8, "cm") → ~1.0001
 */
export function toDimensional(px: number, unit: LengthUnit): number {
  return px / PX_PER_UNIT[unit];
}

/**
 * Convert a value in the given unit into pixels.
 */
export function toUserUnit(value: number, unit: LengthUnit): number {
  return value * PX_PER_UNIT[unit];
}

export function isLengthUnit(unit: string): unit is LengthUnit {
  return Object.prototype.hasOwnProperty.call(PX_PER_UNIT, unit);
}

/**
 * Parse an SVG/CSS length into pixels.
 *
 * Bare numbers are pixels. `em` is relative to `fontSize`; `%` is relative
 * to `percentBase`. Returns `undefined` for anything unparseable or for a
 * relative unit without its base.
 */
export function parseLength(
  value: string | null | undefined,
  bases: { fontSize?: number; percentBase?: number } = {},
): number | undefined {
  if (value === null || value === undefined) return undefined;
  const match = value.trim().match(LENGTH);
  if (!match) return undefined;

  const num = parseFloat(match[1]);
  const unit = match[2].toLowerCase();

  if (unit === "") return num;
  if (isLengthUnit(unit)) return toUserUnit(num, unit);
  if (unit === "em" && bases.fontSize !== undefined) return num * bases.fontSize;
  // Approximated as half an em
  if (unit === "ex" && bases.fontSize !== undefined) {
    return (num * bases.fontSize) / 2;
  }
  if (unit === "%" && bases.percentBase !== undefined) {
    return (num / 100) * bases.percentBase;
  }
  return undefined;
}

/**
 * Parse a whitespace/comma separated list of numbers, as used by
 * `points` and `viewBox`.
 */
export function parseNumberList(value: string | null | undefined): number[] {
  if (!value) return [];
  return Array.from(value.matchAll(NUMBER), (m) => parseFloat(m[0]));
}

