import type { Matrix, Point } from "../types/geometry.js";

export const IDENTITY: Readonly<Matrix> = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

/**
 * Compose two transforms: the result applies `right` first, then `left`.
 */
export function multiply(left: Matrix, right: Matrix): Matrix {
  return {
    a: left.a * right.a + left.c * right.b,
    b: left.b * right.a + left.d * right.b,
    c: left.a * right.c + left.c * right.d,
    d: left.b * right.c + left.d * right.d,
    e: left.a * right.e + left.c * right.f + left.e,
    f: left.b * right.e + left.d * right.f + left.f,
  };
}

export function applyToPoint(m: Matrix, x: number, y: number): Point {
  return {
    x: m.a * x + m.c * y + m.e,
    y: m.b * x + m.d * y + m.f,
  };
}

/**
 * True when the transform rotates or skews, i.e. it is not made up only of
 * translation and axis-aligned scaling.
 */
export function hasShearOrRotation(m: Matrix, tolerance = 1e-5): boolean {
  return Math.abs(m.b) >= tolerance || Math.abs(m.c) >= tolerance;
}

/**
 * True unless the transform is a uniform scale, a rotation and a
 * translation (`a = d`, `b = -c`). Mirroring counts as non-uniform.
 */
export function hasNonUniformScale(m: Matrix, tolerance = 1e-5): boolean {
  return Math.abs(m.a - m.d) >= tolerance || Math.abs(m.b + m.c) >= tolerance;
}

export function translate(tx: number, ty = 0): Matrix {
  return { a: 1, b: 0, c: 0, d: 1, e: tx, f: ty };
}

export function scale(sx: number, sy = sx): Matrix {
  return { a: sx, b: 0, c: 0, d: sy, e: 0, f: 0 };
}

export function rotate(degrees: number, cx = 0, cy = 0): Matrix {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const rotation: Matrix = { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
  if (cx === 0 && cy === 0) return rotation;
  return multiply(translate(cx, cy), multiply(rotation, translate(-cx, -cy)));
}

export function skewX(degrees: number): Matrix {
  return { a: 1, b: 0, c: Math.tan((degrees * Math.PI) / 180), d: 1, e: 0, f: 0 };
}

export function skewY(degrees: number): Matrix {
  return { a: 1, b: Math.tan((degrees * Math.PI) / 180), c: 0, d: 1, e: 0, f: 0 };
}
