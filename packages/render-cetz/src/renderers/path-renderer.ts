import {
  fail,
  normalizePath,
  ok,
  type Result,
  type SceneElement,
  type ShapeGeometry,
} from "@svg2cetz/core";
import type { ConversionContext, ElementFrame } from "../coordinate-transform.js";
import { assemblePath, formatGroup } from "../path-assembler.js";
import { serializeStyle } from "../style-serializer.js";
import { indent } from "../utils.js";

/**
 * Render any shape through its normalized path. A single group becomes a
 * `line`/`bezier` call carrying the markers; several groups are wrapped
 * in a `merge-path` block without them.
 */
export function renderPath(
  element: SceneElement,
  shape: ShapeGeometry,
  ctx: ConversionContext,
  frame: ElementFrame,
): Result<string> {
  const elementId = element.id || null;
  const path = normalizePath(shape, element.cumulativeTransform, ctx.viewBoxScale, elementId);
  if (!path.ok) return path;

  const groups = assemblePath(path.value, ctx);
  if (groups.length === 0) {
    return fail("malformed-path", "Path has no drawable segments", elementId);
  }

  const single = groups.length === 1;
  const style = serializeStyle(element, ctx, frame, { includeMarkers: single });
  if (!style.ok) return style;
  const styleArgs = style.value.join(", ");

  if (single) return ok(formatGroup(groups[0], styleArgs));

  const body = groups.map((group) => indent(formatGroup(group), "    "));
  return ok([`merge-path(${styleArgs}, {`, ...body, "})"].join("\n"));
}
