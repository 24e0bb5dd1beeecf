import {
  circleFrom3Points,
  fail,
  hasNonUniformScale,
  hasShearOrRotation,
  normalizePath,
  ok,
  sampleAnchors,
  type Circle,
  type CircleGeometry,
  type EllipseGeometry,
  type Result,
  type SceneElement,
} from "@svg2cetz/core";
import {
  formatPoint,
  mapLength,
  mapPoint,
  type ConversionContext,
  type ElementFrame,
} from "../coordinate-transform.js";
import { serializeStyle } from "../style-serializer.js";
import { renderPath } from "./path-renderer.js";

/**
 * Recover the transformed circle by fitting three points of its
 * normalized outline.
 */
function fitCircle(
  element: SceneElement,
  shape: CircleGeometry | EllipseGeometry,
  ctx: ConversionContext,
): Result<Circle> {
  const elementId = element.id || null;
  const path = normalizePath(shape, element.cumulativeTransform, ctx.viewBoxScale, elementId);
  if (!path.ok) return path;

  const anchors = sampleAnchors(path.value);
  if (!anchors) {
    return fail("degenerate-geometry", "Circle outline has fewer than three points", elementId);
  }
  const circle = circleFrom3Points(...anchors);
  if (!circle.ok) return fail(circle.error.code, circle.error.message, elementId);
  return circle;
}

/** `circle((cx, cy), radius: r, ...)` */
export function renderCircle(
  element: SceneElement,
  shape: CircleGeometry,
  ctx: ConversionContext,
  frame: ElementFrame,
): Result<string> {
  const circle = fitCircle(element, shape, ctx);
  if (!circle.ok) return circle;

  const style = serializeStyle(element, ctx, frame);
  if (!style.ok) return style;

  const center = formatPoint(mapPoint(circle.value.cx, circle.value.cy, ctx));
  const radius = mapLength(circle.value.r, ctx);
  return ok(`circle(${[center, `radius: ${radius}`, ...style.value].join(", ")})`);
}

/**
 * `circle((cx, cy), radius: (rx, ry), ...)`. The ellipse is squashed into
 * a circle of radius `rx` for the fit; `ry` is scaled back afterwards.
 * Ellipses that are rotated, skewed or scaled unevenly go through the
 * path renderer.
 */
export function renderEllipse(
  element: SceneElement,
  shape: EllipseGeometry,
  ctx: ConversionContext,
  frame: ElementFrame,
): Result<string> {
  const m = element.cumulativeTransform;
  if (hasShearOrRotation(m) || hasNonUniformScale(m)) {
    return renderPath(element, shape, ctx, frame);
  }
  if (shape.rx <= 0) {
    return fail("degenerate-geometry", "Ellipse has a zero x radius", element.id || null);
  }

  const circle = fitCircle(element, { ...shape, ry: shape.rx }, ctx);
  if (!circle.ok) return circle;

  const style = serializeStyle(element, ctx, frame);
  if (!style.ok) return style;

  const radiusX = circle.value.r;
  const radiusY = radiusX * (shape.ry / shape.rx);
  const center = formatPoint(mapPoint(circle.value.cx, circle.value.cy, ctx));
  const radius = `radius: (${mapLength(radiusX, ctx)}, ${mapLength(radiusY, ctx)})`;
  return ok(`circle(${[center, radius, ...style.value].join(", ")})`);
}
