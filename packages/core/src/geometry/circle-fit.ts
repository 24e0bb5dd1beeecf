import { fail, ok, type Result } from "../types/result.js";
import type { NormalizedPath, Point } from "../types/geometry.js";

/** Minimal complex number: just what the three-point fit needs. */
class Complex {
  constructor(
    readonly re: number,
    readonly im: number,
  ) {}

  static of(p: Point): Complex {
    return new Complex(p.x, p.y);
  }

  add(o: Complex): Complex {
    return new Complex(this.re + o.re, this.im + o.im);
  }

  sub(o: Complex): Complex {
    return new Complex(this.re - o.re, this.im - o.im);
  }

  mul(o: Complex): Complex {
    return new Complex(
      this.re * o.re - this.im * o.im,
      this.re * o.im + this.im * o.re,
    );
  }

  div(o: Complex): Complex {
    const den = o.re * o.re + o.im * o.im;
    return new Complex(
      (this.re * o.re + this.im * o.im) / den,
      (this.im * o.re - this.re * o.im) / den,
    );
  }

  scale(k: number): Complex {
    return new Complex(this.re * k, this.im * k);
  }

  abs(): number {
    return Math.hypot(this.re, this.im);
  }
}

export interface Circle {
  cx: number;
  cy: number;
  r: number;
}

// Below this the three points are treated as collinear
const COLLINEAR_TOLERANCE = 1e-12;

/**
 * Center and radius of the circle through three points.
 *
 * With the points as complex numbers x, y, z and w = (z - x) / (y - x):
 * c = (x - y)(w - |w|²) / (2i·Im w) - x; the center is -c and the radius
 * |c + x|.
 */
export function circleFrom3Points(p1: Point, p2: Point, p3: Point): Result<Circle> {
  const x = Complex.of(p1);
  const y = Complex.of(p2);
  const z = Complex.of(p3);

  const yx = y.sub(x);
  if (yx.abs() === 0) {
    return fail(
      "degenerate-geometry",
      "Cannot fit a circle through coincident points",
    );
  }

  const w = z.sub(x).div(yx);
  if (Math.abs(w.im) < COLLINEAR_TOLERANCE) {
    return fail(
      "degenerate-geometry",
      "Cannot fit a circle through collinear points",
    );
  }

  const absW = w.abs();
  const numerator = x.sub(y).mul(w.sub(new Complex(absW * absW, 0)));
  // Dividing by 2i·Im(w) is multiplying by -i / (2·Im(w))
  const c = numerator.mul(new Complex(0, -1)).scale(1 / (2 * w.im)).sub(x);

  return ok({ cx: -c.re, cy: -c.im, r: c.add(x).abs() });
}

/**
 * End points of the first three drawing commands after the initial move:
 * three distinct points on a normalized circle.
 */
export function sampleAnchors(path: NormalizedPath): [Point, Point, Point] | undefined {
  const anchors: Point[] = [];
  for (const cmd of path.slice(1, 4)) {
    if (cmd.type === "close") return undefined;
    anchors.push({ x: cmd.x, y: cmd.y });
  }
  if (anchors.length < 3) return undefined;
  return [anchors[0], anchors[1], anchors[2]];
}
