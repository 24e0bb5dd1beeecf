import {
  fail,
  hasShearOrRotation,
  normalizePath,
  ok,
  type RectGeometry,
  type Result,
  type SceneElement,
} from "@svg2cetz/core";
import {
  formatPoint,
  mapPoint,
  roundInteger,
  type ConversionContext,
  type ElementFrame,
} from "../coordinate-transform.js";
import { serializeStyle } from "../style-serializer.js";
import { renderPath } from "./path-renderer.js";

const RADIUS_TOLERANCE = 1e-5;

/**
 * Render a rectangle as `rect(bottom-left, top-right, ...)`, or as
 * `grid(...)` when the element is labelled "grid". Rotated or skewed
 * rectangles go through the path renderer.
 */
export function renderRect(
  element: SceneElement,
  shape: RectGeometry,
  ctx: ConversionContext,
  frame: ElementFrame,
): Result<string> {
  if (hasShearOrRotation(element.cumulativeTransform)) {
    return renderPath(element, shape, ctx, frame);
  }

  const elementId = element.id || null;
  // Corners are read off the square-cornered outline
  const squared: RectGeometry = { ...shape, rx: 0, ry: 0 };
  const path = normalizePath(squared, element.cumulativeTransform, ctx.viewBoxScale, elementId);
  if (!path.ok) return path;

  const [topLeft, , bottomRight] = path.value;
  if (
    path.value.length !== 5 ||
    topLeft.type !== "move" ||
    bottomRight.type !== "line"
  ) {
    return fail(
      "malformed-rectangle",
      `Rectangle outline has ${path.value.length} commands, expected 5`,
      elementId,
    );
  }

  const style = serializeStyle(element, ctx, frame);
  if (!style.ok) return style;

  const from = mapPoint(topLeft.x, bottomRight.y, ctx);
  const to = mapPoint(bottomRight.x, topLeft.y, ctx);
  const args = [formatPoint(from), formatPoint(to)];

  if (shape.rx > RADIUS_TOLERANCE || shape.ry > RADIUS_TOLERANCE) {
    const rx = percentOf(shape.rx, shape.width);
    const ry = percentOf(shape.ry, shape.height);
    args.push(`radius: (rest: (${rx}%, ${ry}%))`);
  }
  args.push(...style.value);

  const call = element.label === "grid" ? "grid" : "rect";
  return ok(`${call}(${args.join(", ")})`);
}

function percentOf(radius: number, size: number): number {
  return size > 0 ? roundInteger((radius / size) * 100) : 0;
}
