// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

/**
 * Affine matrix in SVG order: `[a c e; b d f; 0 0 1]`.
 */
export interface Matrix {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

/** Raw box as reported by a bounding-box query. */
export interface BoxXYWH {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface BoundingBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
  width: number;
  height: number;
}

// ---- Normalized path ----

export type PathCommand =
  | { type: "move"; x: number; y: number }
  | { type: "line"; x: number; y: number }
  | {
      type: "cubic";
      c1x: number;
      c1y: number;
      c2x: number;
      c2y: number;
      x: number;
      y: number;
    }
  | { type: "close" };

/**
 * Absolute-coordinate path in document pixels containing only move,
 * line, cubic and close commands.
 */
export type NormalizedPath = readonly PathCommand[];

// ---- Shapes ----

export type PathSource = "path" | "line" | "polyline" | "polygon";

export interface RectGeometry {
  kind: "rect";
  x: number;
  y: number;
  width: number;
  height: number;
  rx: number;
  ry: number;
}

export interface CircleGeometry {
  kind: "circle";
  cx: number;
  cy: number;
  r: number;
}

export interface EllipseGeometry {
  kind: "ellipse";
  cx: number;
  cy: number;
  rx: number;
  ry: number;
}

export interface PathGeometry {
  kind: "path";
  source: PathSource;
  /** Path data in SVG `d` syntax. */
  d: string;
}

export type ShapeGeometry =
  | RectGeometry
  | CircleGeometry
  | EllipseGeometry
  | PathGeometry;
