import {
  IDENTITY,
  multiply,
  rotate,
  scale,
  skewX,
  skewY,
  translate,
} from "../geometry/matrix.js";
import type { Matrix } from "../types/geometry.js";
import { parseNumberList } from "./length.js";

const TRANSFORM_FN = /(matrix|translate|scale|rotate|skewX|skewY)\s*\(([^)]*)\)/g;

/**
 * Parse an SVG `transform` attribute into a single matrix.
 *
 *   "translate(10, 20) scale(2)" → { a: 2, d: 2, e: 10, f: 20, ... }
 *
 * Functions apply right-to-left, as in SVG. Unknown or malformed
 * functions are ignored.
 */
export function parseTransform(value: string | null | undefined): Matrix {
  if (!value) return { ...IDENTITY };

  let result: Matrix = { ...IDENTITY };
  for (const match of value.matchAll(TRANSFORM_FN)) {
    const args = parseNumberList(match[2]);
    const m = functionMatrix(match[1], args);
    if (m) result = multiply(result, m);
  }
  return result;
}

function functionMatrix(name: string, args: number[]): Matrix | undefined {
  switch (name) {
    case "matrix":
      if (args.length !== 6) return undefined;
      return {
        a: args[0],
        b: args[1],
        c: args[2],
        d: args[3],
        e: args[4],
        f: args[5],
      };
    case "translate":
      if (args.length === 0) return undefined;
      return translate(args[0], args[1] ?? 0);
    case "scale":
      if (args.length === 0) return undefined;
      return scale(args[0], args[1] ?? args[0]);
    case "rotate":
      if (args.length === 0) return undefined;
      return rotate(args[0], args[1] ?? 0, args[2] ?? 0);
    case "skewX":
      if (args.length === 0) return undefined;
      return skewX(args[0]);
    case "skewY":
      if (args.length === 0) return undefined;
      return skewY(args[0]);
    default:
      return undefined;
  }
}
