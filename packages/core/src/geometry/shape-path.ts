import type { RectGeometry, ShapeGeometry } from "../types/geometry.js";

/**
 * Express any shape as SVG path data in its own user space.
 */
export function shapeToPathData(shape: ShapeGeometry): string {
  switch (shape.kind) {
    case "rect":
      return rectPathData(shape);
    case "circle":
      return ellipsePathData(shape.cx, shape.cy, shape.r, shape.r);
    case "ellipse":
      return ellipsePathData(shape.cx, shape.cy, shape.rx, shape.ry);
    case "path":
      return shape.d;
  }
}

/**
 * A plain rectangle is `M L L L Z` once normalized: the corner read back
 * by the rectangle renderer depends on this shape.
 */
function rectPathData({ x, y, width, height, rx, ry }: RectGeometry): string {
  const right = x + width;
  const bottom = y + height;
  if (rx <= 0 || ry <= 0) {
    return `M ${x} ${y} H ${right} V ${bottom} H ${x} Z`;
  }
  const arc = (toX: number, toY: number) => `A ${rx} ${ry} 0 0 1 ${toX} ${toY}`;
  return [
    `M ${x + rx} ${y}`,
    `H ${right - rx}`,
    arc(right, y + ry),
    `V ${bottom - ry}`,
    arc(right - rx, bottom),
    `H ${x + rx}`,
    arc(x, bottom - ry),
    `V ${y + ry}`,
    arc(x + rx, y),
    "Z",
  ].join(" ");
}

/**
 * Four quarter arcs starting at the rightmost point and running through
 * the bottom, left and top points (clockwise on screen).
 */
function ellipsePathData(cx: number, cy: number, rx: number, ry: number): string {
  const arc = (toX: number, toY: number) => `A ${rx} ${ry} 0 0 1 ${toX} ${toY}`;
  return [
    `M ${cx + rx} ${cy}`,
    arc(cx, cy + ry),
    arc(cx - rx, cy),
    arc(cx, cy - ry),
    arc(cx + rx, cy),
    "Z",
  ].join(" ");
}
