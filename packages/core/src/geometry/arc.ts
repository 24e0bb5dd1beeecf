import type { Point } from "../types/geometry.js";

export interface CubicSegment {
  c1: Point;
  c2: Point;
  end: Point;
}

/**
 * Approximate an SVG elliptical arc by cubic beziers, one per sweep of at
 * most 90 degrees. Uses the endpoint-to-center conversion from the SVG
 * implementation notes (F.6.5). A zero radius degrades to a straight
 * segment expressed as a cubic.
 */
export function arcToCubics(
  from: Point,
  rxIn: number,
  ryIn: number,
  xAxisRotation: number,
  largeArc: boolean,
  sweep: boolean,
  to: Point,
): CubicSegment[] {
  if (from.x === to.x && from.y === to.y) return [];

  let rx = Math.abs(rxIn);
  let ry = Math.abs(ryIn);
  if (rx === 0 || ry === 0) {
    return [
      {
        c1: lerp(from, to, 1 / 3),
        c2: lerp(from, to, 2 / 3),
        end: { ...to },
      },
    ];
  }

  const phi = (xAxisRotation * Math.PI) / 180;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);

  // Step 1: compute (x1', y1')
  const dx = (from.x - to.x) / 2;
  const dy = (from.y - to.y) / 2;
  const x1p = cosPhi * dx + sinPhi * dy;
  const y1p = -sinPhi * dx + cosPhi * dy;

  // Scale radii up when they cannot span the endpoints
  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry);
  if (lambda > 1) {
    const s = Math.sqrt(lambda);
    rx *= s;
    ry *= s;
  }

  // Step 2: compute (cx', cy')
  const rx2 = rx * rx;
  const ry2 = ry * ry;
  const num = rx2 * ry2 - rx2 * y1p * y1p - ry2 * x1p * x1p;
  const den = rx2 * y1p * y1p + ry2 * x1p * x1p;
  let coef = den === 0 ? 0 : Math.sqrt(Math.max(0, num / den));
  if (largeArc === sweep) coef = -coef;
  const cxp = (coef * rx * y1p) / ry;
  const cyp = (-coef * ry * x1p) / rx;

  // Step 3: compute (cx, cy)
  const cx = cosPhi * cxp - sinPhi * cyp + (from.x + to.x) / 2;
  const cy = sinPhi * cxp + cosPhi * cyp + (from.y + to.y) / 2;

  // Step 4: start angle and sweep
  const theta1 = vectorAngle(1, 0, (x1p - cxp) / rx, (y1p - cyp) / ry);
  let delta = vectorAngle(
    (x1p - cxp) / rx,
    (y1p - cyp) / ry,
    (-x1p - cxp) / rx,
    (-y1p - cyp) / ry,
  );
  if (!sweep && delta > 0) delta -= 2 * Math.PI;
  if (sweep && delta < 0) delta += 2 * Math.PI;

  // Tolerance keeps an exact quarter turn in a single segment
  const count = Math.max(1, Math.ceil(Math.abs(delta) / (Math.PI / 2) - 1e-9));
  const step = delta / count;
  const k = (4 / 3) * Math.tan(step / 4);

  const pointAt = (angle: number): Point => {
    const x = rx * Math.cos(angle);
    const y = ry * Math.sin(angle);
    return {
      x: cosPhi * x - sinPhi * y + cx,
      y: sinPhi * x + cosPhi * y + cy,
    };
  };
  const derivativeAt = (angle: number): Point => {
    const x = -rx * Math.sin(angle);
    const y = ry * Math.cos(angle);
    return { x: cosPhi * x - sinPhi * y, y: sinPhi * x + cosPhi * y };
  };

  const segments: CubicSegment[] = [];
  let angle = theta1;
  let start = { ...from };
  for (let i = 0; i < count; i++) {
    const next = angle + step;
    const end = i === count - 1 ? { ...to } : pointAt(next);
    const d1 = derivativeAt(angle);
    const d2 = derivativeAt(next);
    segments.push({
      c1: { x: start.x + k * d1.x, y: start.y + k * d1.y },
      c2: { x: end.x - k * d2.x, y: end.y - k * d2.y },
      end,
    });
    start = end;
    angle = next;
  }
  return segments;
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  const sign = ux * vy - uy * vx < 0 ? -1 : 1;
  const dot = ux * vx + uy * vy;
  const len = Math.hypot(ux, uy) * Math.hypot(vx, vy);
  const cos = Math.min(1, Math.max(-1, dot / len));
  return sign * Math.acos(cos);
}

function lerp(a: Point, b: Point, t: number): Point {
  return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
}
