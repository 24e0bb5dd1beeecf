import { ok, type Result, type SceneElement, type TextShape } from "@svg2cetz/core";
import {
  formatPoint,
  mapPoint,
  roundInteger,
  type ConversionContext,
  type ElementFrame,
} from "../coordinate-transform.js";
import { serializeStyle } from "../style-serializer.js";
import { escapeTypst } from "../utils.js";

/**
 * Render text as `content((x, y), text(...)[...])`, placed at the centre
 * of its own bounding box.
 */
export function renderText(
  element: SceneElement,
  shape: TextShape,
  ctx: ConversionContext,
  frame: ElementFrame,
): Result<string> {
  const style = serializeStyle(element, ctx, frame, { includeTextInfo: true });
  if (!style.ok) return style;

  const { left, top, width, height } = frame.boundingBox;
  const center = mapPoint(left + width / 2, top + height / 2, ctx);

  const args = [formatPoint(center)];
  const angle = textAngle(element);
  if (angle !== 0) args.push(`angle: ${angle}deg`);
  args.push(`text(${style.value.join(", ")})[${typstBody(shape.content)}]`);

  return ok(`content(${args.join(", ")})`);
}

/**
 * Paragraphs are separated by an empty line; the lines of a paragraph run
 * together.
 *
 *   "Hello\nworld\n\nBye" → "Helloworld#linebreak()Bye"
 */
export function typstBody(content: string): string {
  return content
    .split("\n\n")
    .map((paragraph) => escapeTypst(paragraph.replace(/\n/g, "")))
    .join("#linebreak()");
}

/**
 * Counter-clockwise rotation in whole degrees, in [0, 360). SVG rotates
 * clockwise since its y axis points down.
 */
export function textAngle(element: SceneElement): number {
  const { a, b } = element.cumulativeTransform;
  const degrees = roundInteger((Math.atan2(b, a) * 180) / Math.PI);
  return (((360 - degrees) % 360) + 360) % 360;
}
