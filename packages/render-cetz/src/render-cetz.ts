import {
  fail,
  ok,
  querySelectionBoxes,
  type BoundingBoxQuery,
  type ConversionOptions,
  type Result,
  type SceneDocument,
  type SceneElement,
} from "@svg2cetz/core";
import { CetzCanvas } from "./cetz-canvas.js";
import {
  createContext,
  type ConversionContext,
  type ElementFrame,
} from "./coordinate-transform.js";
import { renderCircle, renderEllipse } from "./renderers/circle-renderer.js";
import { renderPath } from "./renderers/path-renderer.js";
import { renderRect } from "./renderers/rect-renderer.js";
import { renderText } from "./renderers/text-renderer.js";

/**
 * Convert one element into a CeTZ draw call (possibly spanning several
 * lines).
 */
export function convertElement(
  element: SceneElement,
  ctx: ConversionContext,
  frame: ElementFrame,
): Result<string> {
  const shape = element.shape();
  switch (shape.kind) {
    case "rect":
      return renderRect(element, shape, ctx, frame);
    case "circle":
      return renderCircle(element, shape, ctx, frame);
    case "ellipse":
      return renderEllipse(element, shape, ctx, frame);
    case "path":
      return renderPath(element, shape, ctx, frame);
    case "text":
      return renderText(element, shape, ctx, frame);
    case "unsupported":
      return unsupportedElement(element, shape.tagName);
  }
}

function unsupportedElement(element: SceneElement, tag: string): Result<never> {
  return fail(
    "unsupported-element",
    `Cannot convert <${tag}> elements`,
    element.id || null,
    "Convert the object to a path first",
  );
}

/**
 * Convert a selection into the lines of a CeTZ block. Groups are
 * flattened, bounding boxes are queried once for every element, and
 * shapes are emitted bottom to top.
 */
export function convertSelection(
  document: SceneDocument,
  selection: readonly SceneElement[],
  query: BoundingBoxQuery,
  options: ConversionOptions,
): Result<string[]> {
  const elements = document.flatten(selection);
  if (elements.length === 0) {
    return fail("empty-selection", "No object was selected!", null, "Pass the id of a shape with --id");
  }

  for (const element of elements) {
    const shape = element.shape();
    if (shape.kind === "unsupported") return unsupportedElement(element, shape.tagName);
  }

  document.ensureIds(elements);
  const boxes = querySelectionBoxes(query, elements);
  if (!boxes.ok) return boxes;

  const ctx = createContext(options, boxes.value.global, document.viewBoxScale);
  const canvas = new CetzCanvas(options.wrap);

  for (const element of elements) {
    const boundingBox = boxes.value.perElement.get(element.id);
    if (!boundingBox) {
      return fail(
        "bounding-box-unavailable",
        `Could not determine the bounding box of "${element.id}".`,
        element.id,
      );
    }
    const entry = convertElement(element, ctx, { boundingBox });
    if (!entry.ok) return entry;
    canvas.add(entry.value);
  }

  return ok(canvas.toLines());
}
