import type { BoundingBox, BoxXYWH, NormalizedPath } from "../types/geometry.js";

/**
 * Exact geometric bounds of a normalized path: line end points plus the
 * extrema of every cubic segment. Returns `undefined` for an empty path.
 */
export function pathBounds(path: NormalizedPath): BoxXYWH | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  let curX = 0;
  let curY = 0;

  const include = (x: number, y: number) => {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  };

  for (const cmd of path) {
    switch (cmd.type) {
      case "move":
      case "line":
        include(cmd.x, cmd.y);
        curX = cmd.x;
        curY = cmd.y;
        break;
      case "cubic": {
        include(cmd.x, cmd.y);
        const xs = cubicExtrema(curX, cmd.c1x, cmd.c2x, cmd.x);
        const ys = cubicExtrema(curY, cmd.c1y, cmd.c2y, cmd.y);
        for (const t of [...xs, ...ys]) {
          include(
            cubicAt(curX, cmd.c1x, cmd.c2x, cmd.x, t),
            cubicAt(curY, cmd.c1y, cmd.c2y, cmd.y, t),
          );
        }
        curX = cmd.x;
        curY = cmd.y;
        break;
      }
      case "close":
        break;
    }
  }

  if (minX === Infinity) return undefined;
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

function cubicAt(p0: number, p1: number, p2: number, p3: number, t: number): number {
  const mt = 1 - t;
  return mt * mt * mt * p0 + 3 * mt * mt * t * p1 + 3 * mt * t * t * p2 + t * t * t * p3;
}

/** Parameters in (0, 1) where the derivative of one coordinate vanishes. */
function cubicExtrema(p0: number, p1: number, p2: number, p3: number): number[] {
  // B'(t)/3 = a t² + b t + c
  const a = -p0 + 3 * p1 - 3 * p2 + p3;
  const b = 2 * (p0 - 2 * p1 + p2);
  const c = p1 - p0;
  const roots: number[] = [];

  if (Math.abs(a) < 1e-12) {
    if (Math.abs(b) > 1e-12) roots.push(-c / b);
  } else {
    const disc = b * b - 4 * a * c;
    if (disc >= 0) {
      const sq = Math.sqrt(disc);
      roots.push((-b + sq) / (2 * a), (-b - sq) / (2 * a));
    }
  }
  return roots.filter((t) => t > 0 && t < 1);
}

export function toBoundingBox({ x, y, width, height }: BoxXYWH): BoundingBox {
  return {
    left: x,
    top: y,
    right: x + width,
    bottom: y + height,
    width,
    height,
  };
}

/**
 * Smallest box enclosing all the given boxes; `undefined` when empty.
 */
export function unionBoxes(boxes: Iterable<BoxXYWH>): BoundingBox | undefined {
  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;

  for (const box of boxes) {
    left = Math.min(left, box.x);
    top = Math.min(top, box.y);
    right = Math.max(right, box.x + box.width);
    bottom = Math.max(bottom, box.y + box.height);
  }

  if (left === Infinity) return undefined;
  return { left, top, right, bottom, width: right - left, height: bottom - top };
}
