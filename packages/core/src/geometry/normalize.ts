import { makeAbsolute, parseSVG } from "svg-path-parser";
import type { SceneElement } from "../document/scene-element.js";
import { fail, ok, type Result } from "../types/result.js";
import type {
  Matrix,
  NormalizedPath,
  PathCommand,
  Point,
  ShapeGeometry,
} from "../types/geometry.js";
import { arcToCubics } from "./arc.js";
import { applyToPoint, multiply, scale } from "./matrix.js";
import { shapeToPathData } from "./shape-path.js";

/**
 * Normalize a shape into document pixels:
 *
 * 1. non-path shapes are expressed as path data;
 * 2. relative commands become absolute, H/V become lines and Q/T/S/A
 *    become cubic beziers;
 * 3. `transform` is baked into every point, control points included;
 * 4. everything is scaled by `viewBoxScale`.
 *
 * The result only contains move, line, cubic and close commands.
 */
export function normalizePath(
  shape: ShapeGeometry,
  transform: Matrix,
  viewBoxScale: number,
  elementId: string | null = null,
): Result<NormalizedPath> {
  const parsed = toCanonical(shapeToPathData(shape));
  if (!parsed.ok) {
    return fail("malformed-path", parsed.message, elementId, "Check the path data of this element");
  }

  const m = viewBoxScale === 1 ? transform : multiply(scale(viewBoxScale), transform);
  const path = parsed.commands.map((cmd): PathCommand => {
    switch (cmd.type) {
      case "move":
      case "line": {
        const p = applyToPoint(m, cmd.x, cmd.y);
        return { type: cmd.type, x: p.x, y: p.y };
      }
      case "cubic": {
        const c1 = applyToPoint(m, cmd.c1x, cmd.c1y);
        const c2 = applyToPoint(m, cmd.c2x, cmd.c2y);
        const end = applyToPoint(m, cmd.x, cmd.y);
        return { type: "cubic", c1x: c1.x, c1y: c1.y, c2x: c2.x, c2y: c2.y, x: end.x, y: end.y };
      }
      case "close":
        return cmd;
    }
  });
  return ok(path);
}

/**
 * Normalize an element's own geometry with its cumulative transform.
 * Returns `undefined` for text and unsupported elements.
 */
export function normalizeElement(
  element: SceneElement,
  viewBoxScale: number,
): Result<NormalizedPath> | undefined {
  const shape = element.shape();
  if (shape.kind === "text" || shape.kind === "unsupported") return undefined;
  return normalizePath(shape, element.cumulativeTransform, viewBoxScale, element.id || null);
}

type Canonical =
  | { ok: true; commands: PathCommand[] }
  | { ok: false; message: string };

/**
 * Parse path data and rewrite it with absolute move, line, cubic and close
 * commands only, in the path's own coordinates.
 */
function toCanonical(d: string): Canonical {
  if (d.trim() === "") return { ok: true, commands: [] };

  let parsed: ReturnType<typeof makeAbsolute>;
  try {
    parsed = makeAbsolute(parseSVG(d));
  } catch (err) {
    return {
      ok: false,
      message: `Invalid path data: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const out: PathCommand[] = [];
  let current: Point = { x: 0, y: 0 };
  let subpathStart: Point = { x: 0, y: 0 };
  // Reflection sources for S and T
  let lastCubicCtrl: Point | undefined;
  let lastQuadCtrl: Point | undefined;
  let closed = false;

  const cubic = (c1: Point, c2: Point, end: Point) => {
    out.push({ type: "cubic", c1x: c1.x, c1y: c1.y, c2x: c2.x, c2y: c2.y, x: end.x, y: end.y });
    current = end;
  };
  const quadratic = (ctrl: Point, end: Point) => {
    const c1 = {
      x: current.x + (2 / 3) * (ctrl.x - current.x),
      y: current.y + (2 / 3) * (ctrl.y - current.y),
    };
    const c2 = {
      x: end.x + (2 / 3) * (ctrl.x - end.x),
      y: end.y + (2 / 3) * (ctrl.y - end.y),
    };
    cubic(c1, c2, end);
  };
  const reflect = (ctrl: Point | undefined): Point =>
    ctrl ? { x: 2 * current.x - ctrl.x, y: 2 * current.y - ctrl.y } : { ...current };

  for (const cmd of parsed) {
    // A drawing command right after Z starts from the subpath start
    if (closed && cmd.code !== "M") {
      out.push({ type: "move", x: subpathStart.x, y: subpathStart.y });
    }
    closed = false;

    let cubicCtrl: Point | undefined;
    let quadCtrl: Point | undefined;

    switch (cmd.code) {
      case "M":
        current = { x: cmd.x, y: cmd.y };
        subpathStart = current;
        out.push({ type: "move", x: cmd.x, y: cmd.y });
        break;
      case "L":
        current = { x: cmd.x, y: cmd.y };
        out.push({ type: "line", x: cmd.x, y: cmd.y });
        break;
      case "H":
        current = { x: cmd.x, y: current.y };
        out.push({ type: "line", x: current.x, y: current.y });
        break;
      case "V":
        current = { x: current.x, y: cmd.y };
        out.push({ type: "line", x: current.x, y: current.y });
        break;
      case "C":
        cubicCtrl = { x: cmd.x2, y: cmd.y2 };
        cubic({ x: cmd.x1, y: cmd.y1 }, cubicCtrl, { x: cmd.x, y: cmd.y });
        break;
      case "S":
        cubicCtrl = { x: cmd.x2, y: cmd.y2 };
        cubic(reflect(lastCubicCtrl), cubicCtrl, { x: cmd.x, y: cmd.y });
        break;
      case "Q":
        quadCtrl = { x: cmd.x1, y: cmd.y1 };
        quadratic(quadCtrl, { x: cmd.x, y: cmd.y });
        break;
      case "T":
        quadCtrl = reflect(lastQuadCtrl);
        quadratic(quadCtrl, { x: cmd.x, y: cmd.y });
        break;
      case "A":
        for (const seg of arcToCubics(
          current,
          cmd.rx,
          cmd.ry,
          cmd.xAxisRotation,
          cmd.largeArc,
          cmd.sweep,
          { x: cmd.x, y: cmd.y },
        )) {
          cubic(seg.c1, seg.c2, seg.end);
        }
        break;
      case "Z":
        out.push({ type: "close" });
        current = subpathStart;
        closed = true;
        break;
    }

    lastCubicCtrl = cubicCtrl;
    lastQuadCtrl = quadCtrl;
  }

  return { ok: true, commands: out };
}
